export type { RunSpellCheckOptions } from './run-spell-check'
export type { CheckFilesOptions } from './check/check-files'
export type { TextFileResult } from './fs/read-text-file'
export type { ResolvedConfig } from '../types/resolved-config'
export type { IgnoredLines } from '../types/ignored-lines'
export type { CheckResult } from '../types/check-result'
export type { SkippedFile } from '../types/skipped-file'
export type { PathFilter } from '../types/path-filter'
export type { Dictionary } from '../types/dictionary'
export type { Diagnostic } from '../types/diagnostic'
export type { Config } from '../types/config'
export type { Token } from '../types/token'

export {
  findBundledVocabulary,
  loadBundledVocabulary,
} from './dictionary/load-bundled-vocabulary'
export { formatDiagnostic, formatReport } from './report/format-diagnostic'
export { getDefaultConfig, parseConfig } from './config/parse-config'
export { expandPathArguments } from './fs/expand-path-arguments'
export { createDictionary } from './dictionary/create-dictionary'
export { createPathFilter } from './filters/create-path-filter'
export { getIgnoredLines } from './ignore/get-ignored-lines'
export { resolveConfig } from './config/resolve-config'
export { getExitStatus } from './report/get-exit-status'
export { ConfigError } from './config/config-error'
export { readTextFile } from './fs/read-text-file'
export { runSpellCheck } from './run-spell-check'
export { checkFiles } from './check/check-files'
export { tokenize } from './tokenizer/tokenize'
export { checkText } from './check/check-text'
export { walkFiles } from './fs/walk-files'
export {
  DEFAULT_EXCLUDE,
  DIAGNOSTIC_CODE,
  CONFIG_FILES,
} from './constants'
