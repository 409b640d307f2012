/**
 * Normalizes a path for glob matching: forward slashes, no leading `./` and
 * no trailing slash.
 *
 * @param path - Relative or display path.
 * @returns Normalized path; `.` stays `.`.
 */
export function normalizeMatchPath(path: string): string {
  let normalized = path.replaceAll('\\', '/')
  while (normalized.startsWith('./')) {
    normalized = normalized.slice(2)
  }
  if (normalized.length > 1 && normalized.endsWith('/')) {
    normalized = normalized.replace(/\/+$/u, '')
  }
  return normalized || '.'
}
