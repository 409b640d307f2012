import type { ResolvedConfig } from '../types/resolved-config'
import type { SkippedFile } from '../types/skipped-file'
import type { CheckResult } from '../types/check-result'
import type { Diagnostic } from '../types/diagnostic'

import { loadBundledVocabulary } from './dictionary/load-bundled-vocabulary'
import { expandPathArguments } from './fs/expand-path-arguments'
import { createDictionary } from './dictionary/create-dictionary'
import { createPathFilter } from './filters/create-path-filter'
import { resolveConfig } from './config/resolve-config'
import { getExitStatus } from './report/get-exit-status'
import { ConfigError } from './config/config-error'
import { checkFiles } from './check/check-files'
import { walkFiles } from './fs/walk-files'

/** Options for a spell-check run. */
export interface RunSpellCheckOptions {
  /** Called as soon as each diagnostic is found. */
  onDiagnostic?(diagnostic: Diagnostic): void

  /** Called for each file skipped because of its content. */
  onSkippedFile?(skipped: SkippedFile): void

  /** Base word list. Defaults to the bundled vocabulary. */
  vocabulary?: Iterable<string>

  /** File, directory or glob arguments. Defaults to the working directory. */
  paths?: readonly string[]

  /** Working directory: configuration is read from here, paths resolve here. */
  cwd: string
}

/**
 * Spell-checks a set of paths.
 *
 * Configuration is resolved completely before any file is visited. A
 * configuration error ends the run with no diagnostics and exit status 1; any
 * other failure rejects.
 *
 * @example
 *   const { diagnostics, exitStatus } = await runSpellCheck({
 *     cwd: process.cwd(),
 *     paths: ['src'],
 *   })
 *
 * @param options - Run options.
 * @returns Diagnostics, configuration errors and the exit status.
 */
export async function runSpellCheck(
  options: RunSpellCheckOptions,
): Promise<CheckResult> {
  let { onSkippedFile, onDiagnostic, vocabulary, paths = [], cwd } = options

  let resolved: ResolvedConfig
  try {
    resolved = await resolveConfig(cwd)
  } catch (error) {
    if (error instanceof ConfigError) {
      return {
        exitStatus: getExitStatus(0, 1),
        errors: [error],
        diagnostics: [],
      }
    }
    throw error
  }
  let { config } = resolved

  let dictionary = createDictionary(
    vocabulary ?? (await loadBundledVocabulary()),
    config.allowedWords,
  )
  let filter = createPathFilter(config.exclude)
  let roots = await expandPathArguments(paths, cwd)

  let diagnostics: Diagnostic[] = []
  let files = walkFiles(roots, { filter, cwd })
  for await (let diagnostic of checkFiles(files, {
    minWordLength: config.minWordLength,
    onSkippedFile,
    dictionary,
    cwd,
  })) {
    diagnostics.push(diagnostic)
    onDiagnostic?.(diagnostic)
  }

  return {
    exitStatus: getExitStatus(diagnostics.length),
    errors: [],
    diagnostics,
  }
}
