/**
 * Heuristic constants and their overridable configuration shapes.
 *
 * Defaults are frozen; callers pass a Partial<...> to override individual
 * fields, and the resolve* helpers fill in the rest.
 */

import { join } from "path";
import { homedir } from "os";

export interface IndexConfig {
  /** Top-level directory names under the data root that never hold logs */
  skipDirectories: readonly string[];
  /** Naming convention for bucket directories */
  bucketPattern: RegExp;
}

export interface ValidationConfig {
  /** Placeholder prefixes that are always safe to replace */
  acknowledgments: readonly string[];
  /** Placeholders shorter than this are treated as brief by construction */
  shortPlaceholderLength: number;
  /** How many leading words to compare */
  wordWindow: number;
  /** Leading words that must agree position-for-position */
  minMatchingWords: number;
}

export interface ExtractionConfig {
  /** Substrings that mark a text block as agent-internal bookkeeping */
  internalMarkers: readonly string[];
}

export const DEFAULT_INDEX_CONFIG: Readonly<IndexConfig> = Object.freeze({
  skipDirectories: Object.freeze([
    "workspace-sessions",
    "default",
    "dev_data",
    "index",
    ".migrations",
  ]),
  bucketPattern: /^[0-9a-f]{32}$/,
});

export const DEFAULT_VALIDATION_CONFIG: Readonly<ValidationConfig> =
  Object.freeze({
    acknowledgments: Object.freeze([
      "on it",
      "on it.",
      "i'll",
      "let me",
      "sure",
      "okay",
      "ok",
      "i can",
      "i will",
      "understood",
      "got it",
      "working on",
      "looking",
      "checking",
      "analyzing",
      "reading",
      "examining",
    ]),
    shortPlaceholderLength: 100,
    wordWindow: 5,
    minMatchingWords: 2,
  });

export const DEFAULT_EXTRACTION_CONFIG: Readonly<ExtractionConfig> =
  Object.freeze({
    internalMarkers: Object.freeze([
      "<EnvironmentContext>",
      "<identity>",
      "<implicitInstruction>",
      "<steering-reminder>",
    ]),
  });

export function resolveIndexConfig(
  overrides?: Partial<IndexConfig>,
): IndexConfig {
  return { ...DEFAULT_INDEX_CONFIG, ...overrides };
}

export function resolveValidationConfig(
  overrides?: Partial<ValidationConfig>,
): ValidationConfig {
  return { ...DEFAULT_VALIDATION_CONFIG, ...overrides };
}

export function resolveExtractionConfig(
  overrides?: Partial<ExtractionConfig>,
): ExtractionConfig {
  return { ...DEFAULT_EXTRACTION_CONFIG, ...overrides };
}

export const DATA_ROOT_ENV = "TRANSCRIPT_RECONCILE_DATA_ROOT";

/**
 * Where the IDE agent keeps its global storage on this platform.
 */
export function platformDataRoot(
  platform: NodeJS.Platform = process.platform,
  home: string = homedir(),
): string {
  const tail = ["Kiro", "User", "globalStorage", "kiro.kiroagent"];
  if (platform === "darwin") {
    return join(home, "Library", "Application Support", ...tail);
  }
  if (platform === "win32") {
    return join(process.env.APPDATA ?? join(home, "AppData", "Roaming"), ...tail);
  }
  return join(home, ".config", ...tail);
}

/**
 * Resolve the data root: explicit value, then environment, then platform default.
 */
export function resolveDataRoot(
  explicit?: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  return explicit || env[DATA_ROOT_ENV] || platformDataRoot();
}
