/** Raised when a configuration file is unreadable, malformed or mistyped. */
export class ConfigError extends Error {
  /** Configuration key at fault, when the error concerns a single key. */
  public readonly key: undefined | string

  /** Configuration file the error was found in. */
  public readonly file: undefined | string

  /**
   * Creates a new ConfigError.
   *
   * @param message - Description of the problem.
   * @param details - Offending key and file, when known.
   * @param details.key - Configuration key at fault.
   * @param details.file - Configuration file name.
   */
  public constructor(
    message: string,
    details: { file?: string; key?: string } = {},
  ) {
    super(message)
    this.name = 'ConfigError'
    this.key = details.key
    this.file = details.file
  }
}
