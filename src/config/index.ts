/**
 * Centralized Configuration Module
 *
 * Provides type-safe, validated access to the environment variables the
 * engine reads. `LOG_LEVEL` and `NODE_ENV` belong to the host process and
 * are read by the telemetry logger directly. Parsing is deferred until first use so tests can stub the
 * environment before the first read.
 */

import { z } from "zod";

/**
 * Node id prefixes must be non-empty and free of whitespace
 */
const IdPrefix = z
  .string()
  .min(1)
  .regex(/^\S+$/, "must not contain whitespace");

/**
 * Configuration Schema
 */
const ConfigSchema = z.object({
  ceg: z.object({
    // Prefix for canonical node ids after generation: w0, w1, ..., w∞
    nodePrefix: IdPrefix.default("w"),
    // Prefix for event tree situation ids: s0, s1, ...
    situationPrefix: IdPrefix.default("s"),
  }),

  graph: z.object({
    maxNodes: z.coerce.number().int().positive().default(10_000),
    maxEdges: z.coerce.number().int().positive().default(50_000),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Treats empty strings as unset so that `FOO=` falls back to the default
 */
function optionalEnv(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

function parseConfig(): Config {
  const env = process.env;

  const rawConfig = {
    ceg: {
      nodePrefix: optionalEnv(env.CEG_NODE_PREFIX),
      situationPrefix: optionalEnv(env.CEG_SITUATION_PREFIX),
    },
    graph: {
      maxNodes: optionalEnv(env.GRAPH_MAX_NODES),
      maxEdges: optionalEnv(env.GRAPH_MAX_EDGES),
    },
  };

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration. Please check environment variables. ${issues}`);
  }
  return result.data;
}

let _cachedConfig: Config | null = null;

/**
 * Get configuration, parsing the environment on first access
 */
export function getConfig(): Config {
  if (_cachedConfig === null) {
    _cachedConfig = parseConfig();
  }
  return _cachedConfig;
}

/**
 * Reset cached configuration (for testing only)
 *
 * Allows tests to stub environment variables and re-parse.
 */
export function _resetConfigCache(): void {
  _cachedConfig = null;
}

