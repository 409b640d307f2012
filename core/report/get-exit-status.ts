/**
 * Computes the process exit status of a run.
 *
 * @param diagnosticCount - Number of spelling diagnostics.
 * @param errorCount - Number of configuration errors.
 * @returns 1 if anything was reported, 0 otherwise.
 */
export function getExitStatus(
  diagnosticCount: number,
  errorCount: number = 0,
): 0 | 1 {
  return diagnosticCount > 0 || errorCount > 0 ? 1 : 0
}
