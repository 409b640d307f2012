import pc from 'picocolors'
import cac from 'cac'

import type { Diagnostic } from '../types/diagnostic'

import { formatDiagnostic } from '../core/report/format-diagnostic'
import { printSkippedFile } from './print-skipped-file'
import { printConfigError } from './print-config-error'
import { runSpellCheck } from '../core/index'
import { version } from '../package.json'

/** CLI Options. */
interface CLIOptions {
  /** Report files that were skipped because of their content. */
  verbose?: boolean
}

/**
 * Prints a diagnostic to stdout in the report format.
 *
 * @param diagnostic - Diagnostic to print.
 */
function printDiagnostic(diagnostic: Diagnostic): void {
  console.info(formatDiagnostic(diagnostic))
}

/** Run the CLI. */
export function run(): void {
  let cli = cac('antiseptic')

  cli
    .help()
    .version(version)
    .option('--verbose', 'Report files skipped as binary or unreadable')
    .command('[...files]', 'Spell-check files, directories or globs')
    .action(async (files: string[], options: CLIOptions) => {
      try {
        let result = await runSpellCheck({
          onSkippedFile: options.verbose ? printSkippedFile : undefined,
          onDiagnostic: printDiagnostic,
          cwd: process.cwd(),
          paths: files,
        })

        for (let error of result.errors) {
          printConfigError(error)
        }

        process.exitCode = result.exitStatus
      } catch (error) {
        console.error(
          pc.redBright('Error:'),
          error instanceof Error ? error.message : String(error),
        )
        process.exit(1)
      }
    })

  cli.parse()
}
