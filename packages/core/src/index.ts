/**
 * Core module exports for @marklet/core
 *
 * This package provides:
 * - Layered configuration (defaults, config files, environment)
 * - Scoped console logging
 * - Error classes shared by the other packages
 */

// Configuration System
export {
  config,
  defineConfig,
  getNestedValue,
  type MarkletConfig,
  type MissingReferenceMode,
  type StyleErrorMode,
} from "./config.js";

// Logging
export {
  createLogger,
  setLogWriter,
  type Logger,
  type LogLevel,
  type LogWriter,
} from "./logger.js";

// Errors
export { MarkletError, DirectiveRegistryError, PlaceholderError, StyleSheetError } from "./errors.js";
