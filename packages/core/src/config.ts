/**
 * Unified Configuration System
 *
 * Provides a centralized configuration API for utilkit packages.
 * Configuration is loaded from (in priority order):
 *
 * 1. Programmatic: config.set() calls, merged on top of everything loaded
 * 2. Environment variables: UTILKIT_*
 * 3. Config files: .utilkitrc, .utilkitrc.json, utilkit.config.js, etc.
 *    in the working directory
 * 4. package.json: "utilkit" key
 * 5. Defaults
 *
 * Keys are lower-case: environment variable names are lower-cased on load,
 * so `UTILKIT_LONGTUPLE_DEFAULTSIZE=8` lands on `longtuple.defaultsize`.
 *
 * @example
 * ```typescript
 * import { config } from "@utilkit/core";
 *
 * config.get("debug");                   // → false
 * config.getNumber("longtuple.defaultsize"); // → 5
 *
 * config.set({ longtuple: { defaultsize: 8 } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import { debug } from "./log.js";

// ============================================================================
// Types
// ============================================================================

/**
 * LongTuple configuration options.
 */
export interface LongTupleConfig {
  /** Chunk size used when none is passed to `makeLongTuple` */
  defaultsize?: number;
}

/**
 * Full utilkit configuration schema.
 */
export interface UtilkitConfig {
  /** Enable debug logging */
  debug?: boolean;
  /** Allow ANSI colours in rendered output */
  color?: boolean;
  /** LongTuple configuration */
  longtuple?: LongTupleConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

type ConfigTree = Record<string, unknown>;

// ============================================================================
// Global State
// ============================================================================

let configStore: ConfigTree = {};
let configLoaded = false;
let configFilePath: string | undefined;
let configLoadError: unknown;

const DEFAULTS: UtilkitConfig = {
  debug: false,
  color: true,
  longtuple: {
    defaultsize: 5,
  },
};

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is ConfigTree {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: ConfigTree, path: string, value: unknown): void {
  const parts = path.split(".");
  let current: ConfigTree = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const part = parts[i];
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: ConfigTree = {};
      current[part] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

/**
 * Get a nested value using dot notation.
 */
function getNestedValue(obj: unknown, path: string): unknown {
  let current: unknown = obj;

  for (const part of path.split(".")) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Deep merge objects (right takes precedence).
 */
function deepMerge(target: ConfigTree, source: ConfigTree): ConfigTree {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 * Variables prefixed with UTILKIT_ are parsed into the config object.
 *
 * Examples:
 *   UTILKIT_DEBUG=1                     → { debug: true }
 *   UTILKIT_LONGTUPLE_DEFAULTSIZE=8     → { longtuple: { defaultsize: 8 } }
 *
 * Numeric paths (see NUMERIC_PATHS) skip the boolean reading, so
 * UTILKIT_LONGTUPLE_DEFAULTSIZE=1 is the number 1.
 */
/** Paths whose environment values are always read as numbers. */
const NUMERIC_PATHS: ReadonlySet<string> = new Set(["longtuple.defaultsize"]);

function loadConfigFromEnv(): ConfigTree {
  const envConfig: ConfigTree = {};
  const PREFIX = "UTILKIT_";

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    // Double underscore __ becomes nested object separator
    const configPath = key
      .slice(PREFIX.length)
      .toLowerCase()
      .replace(/__/g, ".")
      .replace(/_/g, ".");

    let parsedValue: unknown;
    if (NUMERIC_PATHS.has(configPath)) {
      parsedValue = value.trim() === "" ? NaN : Number(value);
    } else if (value === "1" || value === "true") {
      parsedValue = true;
    } else if (value === "0" || value === "false" || value === "") {
      parsedValue = false;
    } else if (/^\d+$/.test(value)) {
      parsedValue = parseInt(value, 10);
    } else {
      parsedValue = value;
    }

    setNestedValue(envConfig, configPath, parsedValue);
  }

  return envConfig;
}

// ============================================================================
// Config File Loading (cosmiconfig)
// ============================================================================

const MODULE_NAME = "utilkit";

/**
 * Load configuration synchronously from files.
 * Uses cosmiconfig to search for config in standard locations.
 */
function loadConfigFromFiles(): ConfigTree {
  try {
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

    const result = explorer.search();
    if (result && !result.isEmpty && isRecord(result.config)) {
      configFilePath = result.filepath;
      return result.config;
    }
  } catch (error) {
    // Reported once the rest of the configuration is in place
    configLoadError = error;
  }

  return {};
}

// ============================================================================
// Config Initialization
// ============================================================================

/**
 * Initialize configuration from all sources.
 * Priority: env vars > config files > defaults
 */
function initializeConfig(): void {
  if (configLoaded) return;

  const fileConfig = loadConfigFromFiles();
  const envConfig = loadConfigFromEnv();

  // Merge: defaults < fileConfig < envConfig
  configStore = deepMerge(deepMerge(DEFAULTS, fileConfig), envConfig);
  configLoaded = true;

  if (configLoadError !== undefined) {
    debug("Failed to load config file", configLoadError);
  }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by path.
 *
 * @param path - Dot-notation path (e.g., "longtuple.defaultsize", "debug")
 * @returns The configuration value, or undefined if not set
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Get a numeric configuration value; anything that is not a finite number
 * reads as undefined.
 */
function getNumber(path: string): number | undefined {
  const value = get(path);
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

/**
 * Get a boolean configuration value; non-booleans read as undefined.
 */
function getBoolean(path: string): boolean | undefined {
  const value = get(path);
  return typeof value === "boolean" ? value : undefined;
}

/**
 * Set configuration values programmatically.
 * Merges with existing configuration.
 *
 * @example
 * config.set({ debug: true });
 * config.set({ longtuple: { defaultsize: 8 } });
 */
function set(values: UtilkitConfig): void {
  initializeConfig();
  configStore = deepMerge(configStore, values);
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: string): boolean {
  return !!get(path);
}

/**
 * Get all configuration values.
 */
function getAll(): Readonly<ConfigTree> {
  initializeConfig();
  return configStore;
}

/**
 * Get the path to the loaded config file (if any).
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Reset configuration to defaults (mainly for testing).
 */
function reset(): void {
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
  configLoadError = undefined;
}

/**
 * Conditional value based on a truthy configuration path.
 */
function when<T, U = undefined>(
  path: string,
  thenValue: () => T,
  elseValue?: () => U
): T | U | undefined {
  if (has(path)) {
    return thenValue();
  }
  return elseValue?.();
}

// ============================================================================
// Export: config object
// ============================================================================

/**
 * Unified configuration API.
 */
export const config = {
  get,
  getNumber,
  getBoolean,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
  when,
} as const;

/**
 * Helper for creating type-safe configuration files.
 */
export function defineConfig(cfg: UtilkitConfig): UtilkitConfig {
  return cfg;
}
