import pc from 'picocolors'

import type { ConfigError } from '../core/config/config-error'

/**
 * Prints a configuration error to stderr.
 *
 * @param error - Configuration error to report.
 */
export function printConfigError(error: ConfigError): void {
  let location = error.file ? pc.gray(` (${error.file})`) : ''
  console.error(`${pc.redBright('Error:')} ${error.message}${location}`)
}
