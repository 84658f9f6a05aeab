/**
 * Unified Configuration System
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Environment variables: EXPANDITE_* (highest priority, for CI overrides)
 * 2. Programmatic: config.set() calls
 * 3. Config files: .expanditerc, expandite.config.js, package.json#expandite, ...
 * 4. Defaults (lowest priority)
 *
 * Values read from files and the environment are validated; an invalid value
 * is reported with a warning and the lower-priority value stays in effect.
 *
 * @example
 * ```typescript
 * import { config } from "@expandite/core";
 *
 * config.get("recursionLimit")   // → 64
 * config.set({ traceMacros: true });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import { DEFAULT_EDITION, isEdition, type Edition } from "./span.js";

// ============================================================================
// Types
// ============================================================================

export interface ExpanditeConfig {
  /** Log every expansion to the console */
  verbose?: boolean;
  /** Edition new syntax extensions are created in */
  edition?: Edition;
  /** Maximum nesting depth of macro expansions */
  recursionLimit?: number;
  /** Start with `trace_macros!(true)` in effect */
  traceMacros?: boolean;
  /** Colored diagnostics; unset means auto-detect from NO_COLOR / FORCE_COLOR */
  colors?: boolean;
}

export interface ResolvedConfig {
  verbose: boolean;
  edition: Edition;
  recursionLimit: number;
  traceMacros: boolean;
  colors?: boolean;
}

const DEFAULTS: ResolvedConfig = {
  verbose: false,
  edition: DEFAULT_EDITION,
  recursionLimit: 64,
  traceMacros: false,
};

// ============================================================================
// Global State
// ============================================================================

let configStore: ResolvedConfig = { ...DEFAULTS };
let programmatic: ExpanditeConfig = {};
let configLoaded = false;
let configFilePath: string | undefined;

// ============================================================================
// Validation
// ============================================================================

function warnInvalid(key: string, value: unknown, source: string): void {
  console.warn(`[expandite] ignoring invalid value ${JSON.stringify(value)} for "${key}" in ${source}`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Keep the known keys of `raw` whose values have the right shape. Unknown
 * keys are ignored.
 */
export function validateConfig(raw: unknown, source: string): ExpanditeConfig {
  const result: ExpanditeConfig = {};
  if (!isRecord(raw)) {
    if (raw !== undefined && raw !== null) warnInvalid("<root>", raw, source);
    return result;
  }

  for (const key of ["verbose", "traceMacros", "colors"] as const) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value === "boolean") result[key] = value;
    else warnInvalid(key, value, source);
  }

  const edition = raw.edition;
  if (edition !== undefined) {
    // Editions are years; YAML and the environment hand them over as numbers.
    const text = typeof edition === "number" ? String(edition) : edition;
    if (isEdition(text)) result.edition = text;
    else warnInvalid("edition", edition, source);
  }

  const limit = raw.recursionLimit;
  if (limit !== undefined) {
    if (typeof limit === "number" && Number.isInteger(limit) && limit > 0) result.recursionLimit = limit;
    else warnInvalid("recursionLimit", limit, source);
  }

  return result;
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   EXPANDITE_VERBOSE=1              → { verbose: true }
 *   EXPANDITE_RECURSION_LIMIT=128    → { recursionLimit: 128 }
 */
function loadConfigFromEnv(): ExpanditeConfig {
  const envConfig: Record<string, unknown> = {};
  const PREFIX = "EXPANDITE_";

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    // EXPANDITE_RECURSION_LIMIT → recursionLimit
    const configKey = key
      .slice(PREFIX.length)
      .toLowerCase()
      .replace(/_([a-z])/g, (_match, letter: string) => letter.toUpperCase());

    let parsedValue: unknown;
    if (value === "1" || value === "true") {
      parsedValue = true;
    } else if (value === "0" || value === "false" || value === "") {
      parsedValue = false;
    } else if (/^\d+$/.test(value)) {
      parsedValue = parseInt(value, 10);
    } else {
      parsedValue = value;
    }

    envConfig[configKey] = parsedValue;
  }

  // A bare "1" parses as `true`; a recursion limit of 1 is still a number.
  if (envConfig.recursionLimit === true) envConfig.recursionLimit = 1;

  return validateConfig(envConfig, "environment");
}

// ============================================================================
// Config File Loading
// ============================================================================

const MODULE_NAME = "expandite";

function loadConfigFromFiles(): ExpanditeConfig {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `${MODULE_NAME}.config.js`,
      `${MODULE_NAME}.config.cjs`,
    ],
  });
  try {
    const result = explorer.search();
    if (result && !result.isEmpty) {
      configFilePath = result.filepath;
      const raw: unknown = result.config;
      return validateConfig(raw, result.filepath);
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`[expandite] failed to load configuration file: ${message}`);
  }
  return {};
}

// ============================================================================
// Config Initialization
// ============================================================================

function initializeConfig(): void {
  if (configLoaded) return;

  const fileConfig = loadConfigFromFiles();
  const envConfig = loadConfigFromEnv();

  // Merge: defaults < file < programmatic < env
  configStore = { ...DEFAULTS, ...fileConfig, ...programmatic, ...envConfig };
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

function get<K extends keyof ResolvedConfig>(key: K): ResolvedConfig[K] {
  initializeConfig();
  return configStore[key];
}

/**
 * Set configuration values programmatically. Environment variables still
 * take precedence.
 */
function set(values: ExpanditeConfig): void {
  programmatic = { ...programmatic, ...values };
  configLoaded = false;
  initializeConfig();
}

/** Whether a key has a truthy value. */
function has(key: keyof ResolvedConfig): boolean {
  return !!get(key);
}

function getAll(): Readonly<ResolvedConfig> {
  initializeConfig();
  return configStore;
}

/** Path of the loaded config file, if one was found. */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/** Forget everything loaded or set (mainly for testing). */
function reset(): void {
  configStore = { ...DEFAULTS };
  programmatic = {};
  configLoaded = false;
  configFilePath = undefined;
}

export const config = {
  get,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
} as const;

/**
 * Helper for writing type-checked `expandite.config.js` files.
 */
export function defineConfig(cfg: ExpanditeConfig): ExpanditeConfig {
  return cfg;
}
