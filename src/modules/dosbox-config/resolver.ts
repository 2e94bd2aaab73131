import { readdirSync, statSync } from "fs";
import { join } from "path";
import type { CandidateConfig, ResolvedConfigs, SelectedConfigs } from "./types.js";
import { inspectConfig } from "./config-file.js";
import { ContentError } from "../../errors.js";
import { logger } from "../../logger.js";

const log = logger.child({ module: "config-resolver" });

// ---------------------------------------------------------------------------
// Scan order
// ---------------------------------------------------------------------------

/**
 * The two name patterns, scanned one after the other. A `dosbox*.conf` file
 * also matches `*.conf` and is visited twice.
 */
export const CONFIG_NAME_PATTERNS: ReadonlyArray<RegExp> = [
  /^dosbox.*\.conf$/,
  /^.*\.conf$/,
];

/** If the autoexec candidate's name contains this, it beats earlier picks. */
const PREFERRED_AUTOEXEC_MARKER = "single";

function isFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

/**
 * Immediate, non-hidden files of `dir` whose names match `pattern`, sorted by
 * code unit so the result does not depend on the filesystem's own ordering.
 */
export function matchFiles(dir: string, pattern: RegExp): string[] {
  let entries: string[];
  try {
    entries = readdirSync(dir);
  } catch {
    return [];
  }

  return entries
    .filter((name) => !name.startsWith(".") && pattern.test(name))
    .sort()
    .map((name) => join(dir, name))
    .filter(isFile);
}

/**
 * Every config path in scan order, duplicates included.
 */
export function listConfigCandidates(configRoot: string): string[] {
  return CONFIG_NAME_PATTERNS.flatMap((pattern) => matchFiles(configRoot, pattern));
}

// ---------------------------------------------------------------------------
// Selection
// ---------------------------------------------------------------------------

/**
 * Picks the settings and autoexec configs from candidates given in scan order.
 *
 *   settingsConfig: the last candidate with an `[sdl]` section.
 *   autoexecConfig: the first candidate with a non-empty `[autoexec]`, unless
 *                   a later one has "single" in its name, in which case the
 *                   last such one. If none has commands, the first candidate
 *                   with an `[autoexec]` header at all.
 */
export function selectConfigs(candidates: ReadonlyArray<CandidateConfig>): SelectedConfigs {
  let settingsConfig: CandidateConfig | null = null;
  let autoexecConfig: CandidateConfig | null = null;

  for (const candidate of candidates) {
    if (candidate.hasDisplaySection) {
      settingsConfig = candidate;
    }
    if (
      candidate.hasNonEmptyStartupSection &&
      (candidate.name.includes(PREFERRED_AUTOEXEC_MARKER) || autoexecConfig === null)
    ) {
      autoexecConfig = candidate;
    }
  }

  if (autoexecConfig === null) {
    autoexecConfig = candidates.find((c) => c.hasStartupSection) ?? null;
    if (autoexecConfig) {
      log.debug({ name: autoexecConfig.name }, "Fell back to config with empty autoexec");
    }
  }

  return { settingsConfig, autoexecConfig };
}

/**
 * Scans `configRoot` and returns the configs to install.
 * Each file is read once even though it may be visited twice.
 *
 * Throws ContentError (listing the directory) when no config has an
 * `[autoexec]` section.
 */
export function resolveConfigs(configRoot: string): ResolvedConfigs {
  const inspected = new Map<string, CandidateConfig>();
  const candidates = listConfigCandidates(configRoot).map((path) => {
    const cached = inspected.get(path);
    if (cached) return cached;
    const candidate = inspectConfig(path);
    inspected.set(path, candidate);
    return candidate;
  });

  log.debug(
    { configRoot, candidates: candidates.map((c) => c.name) },
    "Scanned config candidates"
  );

  const { settingsConfig, autoexecConfig } = selectConfigs(candidates);
  if (!autoexecConfig) {
    let entries: string[] = [];
    try {
      entries = readdirSync(configRoot).sort();
    } catch (err) {
      log.debug({ err, configRoot }, "Could not list config root");
    }
    throw new ContentError(configRoot, entries);
  }

  log.debug(
    { settings: settingsConfig?.name ?? null, autoexec: autoexecConfig.name },
    "Resolved configs"
  );
  return { settingsConfig, autoexecConfig };
}
