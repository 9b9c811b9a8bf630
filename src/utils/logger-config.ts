/**
 * Centralized Logger Configuration
 *
 * Single source of truth for Pino logger options used by the standalone
 * logger in telemetry.ts.
 */

import type { LoggerOptions } from "pino";

/**
 * Paths to redact from all log output.
 * Uses Pino's path syntax with wildcards.
 */
export const REDACT_PATHS = [
  "*.password",
  "*.secret",
  "*.token",
  "*.apiKey",
  "*.api_key",
  "*.credentials",
] as const;

/**
 * Redaction censor string
 */
export const REDACT_CENSOR = "[REDACTED]";

export const SERVICE_NAME = "ceg-engine";

/**
 * Create a Pino-compatible redact configuration
 */
export function createRedactConfig() {
  return {
    paths: [...REDACT_PATHS],
    censor: REDACT_CENSOR,
  };
}

/**
 * Create full Pino logger options
 */
export function createLoggerConfig(level: string): LoggerOptions {
  return {
    level,
    base: { service: SERVICE_NAME },
    redact: createRedactConfig(),
  };
}
