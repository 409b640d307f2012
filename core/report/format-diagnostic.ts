import type { Diagnostic } from '../../types/diagnostic'

/**
 * Renders a diagnostic as `path:line:column: CODE message`.
 *
 * @example
 *   formatDiagnostic(diagnostic)
 *   // 'myfile.txt:15:32: AS001 spelling mistake `helol`'
 *
 * @param diagnostic - Diagnostic to render.
 * @returns One report line, without a trailing newline.
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  let { message, column, path, line, code } = diagnostic
  return `${path}:${line}:${column}: ${code} ${message}`
}

/**
 * Renders diagnostics as a report, one line each, in the given order.
 *
 * @param diagnostics - Diagnostics to render.
 * @returns The report; an empty string when there is nothing to report.
 */
export function formatReport(diagnostics: readonly Diagnostic[]): string {
  return diagnostics
    .map(diagnostic => `${formatDiagnostic(diagnostic)}\n`)
    .join('')
}
