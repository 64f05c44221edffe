/**
 * Unified Configuration System
 *
 * Provides a centralized configuration API for the marklet parsers.
 * Configuration is layered (later layers win):
 *
 * 1. Defaults
 * 2. Config files: marklet.config.js, .markletrc, .markletrc.json, or the
 *    "marklet" key of package.json
 * 3. Environment variables: MARKLET_*
 * 4. Programmatic: config.set() calls
 *
 * @example
 * ```typescript
 * import { config } from "@marklet/core";
 *
 * config.getBoolean("debug")                                        // → boolean
 * config.getChoice("css.onError", ["fail", "skip"] as const, "fail") // → "fail" | "skip"
 *
 * config.set({ references: { onMissing: "empty" } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

/** How unresolved `{{ reference }}` spans are rendered after rewriting. */
export type MissingReferenceMode = "invalid" | "empty";

/** How the style sheet parser treats a malformed declaration block. */
export type StyleErrorMode = "fail" | "skip";

/**
 * Full marklet configuration schema.
 */
export interface MarkletConfig {
  /** Enable debug logging */
  debug?: boolean;
  references?: {
    onMissing?: MissingReferenceMode;
  };
  css?: {
    onError?: StyleErrorMode;
  };
  /** Custom user configuration, readable from directives through the cursor */
  [key: string]: unknown;
}

// ============================================================================
// Global State
// ============================================================================

let configStore: Record<string, unknown> = {};
let configLoaded = false;
let configFilePath: string | undefined;

const MODULE_NAME = "marklet";

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  let current: Record<string, unknown> = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const part = parts[i];
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

/**
 * Get a nested value using dot notation.
 */
export function getNestedValue(obj: unknown, path: string): unknown {
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
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
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
// Config File Loading (cosmiconfig)
// ============================================================================

/**
 * Load configuration synchronously from files.
 * Uses cosmiconfig to search for config in standard locations.
 */
function loadConfigFromFiles(): Record<string, unknown> {
  try {
    const explorer = cosmiconfigSync(MODULE_NAME, {
      searchPlaces: [
        "package.json",
        `.${MODULE_NAME}rc`,
        `.${MODULE_NAME}rc.json`,
        `.${MODULE_NAME}rc.yaml`,
        `.${MODULE_NAME}rc.yml`,
        `.${MODULE_NAME}rc.js`,
        `.${MODULE_NAME}rc.cjs`,
        `${MODULE_NAME}.config.js`,
        `${MODULE_NAME}.config.cjs`,
      ],
    });

    const result = explorer.search();
    const loaded: unknown = result?.config;
    if (result && !result.isEmpty && isRecord(loaded)) {
      configFilePath = result.filepath;
      return loaded;
    }
  } catch (error) {
    // A broken config file falls back to defaults
    console.warn(`[${MODULE_NAME}] Failed to load config file:`, error);
  }

  return {};
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 * Variables prefixed with MARKLET_ are parsed into the config object.
 *
 * Examples:
 *   MARKLET_DEBUG=1                   → { debug: true }
 *   MARKLET_CSS_ONERROR=skip          → { css: { onError: "skip" } }
 *   MARKLET_REFERENCES__ONMISSING=empty → { references: { onMissing: "empty" } }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};
  const PREFIX = "MARKLET_";

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    const configPath = key
      .slice(PREFIX.length)
      .toLowerCase()
      .replace(/__/g, ".")
      .replace(/_/g, ".");

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

    setNestedValue(envConfig, configPath, parsedValue);
  }

  return envConfig;
}

// ============================================================================
// Config Initialization
// ============================================================================

function defaults(): MarkletConfig {
  return {
    debug: false,
    references: { onMissing: "invalid" },
    css: { onError: "fail" },
  };
}

/**
 * Environment keys arrive lower-cased; map them back onto the camelCase
 * keys of a reference shape where one matches.
 */
function canonicalKeys(
  values: Record<string, unknown>,
  shape: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(values)) {
    const match = Object.keys(shape).find((k) => k.toLowerCase() === key) ?? key;
    const nested = shape[match];
    result[match] = isRecord(value) && isRecord(nested) ? canonicalKeys(value, nested) : value;
  }
  return result;
}

function initializeConfig(): void {
  if (configLoaded) return;

  const fileConfig = loadConfigFromFiles();
  const envConfig = canonicalKeys(loadConfigFromEnv(process.env), defaults());

  // Merge: defaults < fileConfig < envConfig
  configStore = deepMerge(deepMerge(defaults(), fileConfig), envConfig);
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by path.
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Get a boolean value; anything other than `true` reads as `false`.
 */
function getBoolean(path: string): boolean {
  return get(path) === true;
}

/**
 * Get a string value restricted to a set of choices.
 */
function getChoice<T extends string>(path: string, choices: readonly T[], fallback: T): T {
  const value = get(path);
  return choices.find((c) => c === value) ?? fallback;
}

/**
 * Set configuration values programmatically.
 */
function set(values: MarkletConfig): void {
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
function getAll(): Readonly<Record<string, unknown>> {
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
}

/**
 * Unified configuration API.
 */
export const config = {
  get,
  getBoolean,
  getChoice,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
} as const;

/**
 * Identity helper for typed config files (`marklet.config.js`).
 */
export function defineConfig(values: MarkletConfig): MarkletConfig {
  return values;
}

/** @internal exposed for tests */
export const __test = { loadConfigFromEnv, canonicalKeys, defaults };
