/**
 * Shared types for the dosbox-config module.
 */

/** One `*.conf` file found in the config root, with its capabilities. */
export interface CandidateConfig {
  /** Absolute path */
  path: string;
  /** File name without directory */
  name: string;
  /** Has an `[sdl]` section header (display/audio settings) */
  hasDisplaySection: boolean;
  /** Has an `[autoexec]` section header at all */
  hasStartupSection: boolean;
  /** `[autoexec]` is followed by at least one non-blank, non-comment line */
  hasNonEmptyStartupSection: boolean;
}

export interface SelectedConfigs {
  settingsConfig: CandidateConfig | null;
  autoexecConfig: CandidateConfig | null;
}

/** Result of a successful resolve: an autoexec config is always present. */
export interface ResolvedConfigs {
  settingsConfig: CandidateConfig | null;
  autoexecConfig: CandidateConfig;
}
