import type { ConfigError } from '../core/config/config-error'
import type { Diagnostic } from './diagnostic'

/**
 * Outcome of a spell-check run.
 */
export interface CheckResult {
  /**
   * Spelling mistakes in the order they were found.
   */
  diagnostics: Diagnostic[]

  /**
   * Configuration errors that stopped the run before scanning.
   */
  errors: ConfigError[]

  /**
   * Process exit status: 0 when clean, 1 otherwise.
   */
  exitStatus: 0 | 1
}
