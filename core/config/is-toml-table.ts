/**
 * Type guard for a TOML table (a plain object, not an array or a date).
 *
 * @param value - Parsed TOML value.
 * @returns True if the value is a table.
 */
export function isTomlTable(value: unknown): value is Record<string, unknown> {
  return (
    value !== null &&
    typeof value === 'object' &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  )
}
