import type { Config } from './config'

/**
 * Configuration together with the file it was read from.
 */
export interface ResolvedConfig {
  /**
   * Name of the configuration file, or null when defaults were used.
   */
  file: string | null

  config: Config
}
