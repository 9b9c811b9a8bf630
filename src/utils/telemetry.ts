import { env } from "node:process";
import pino from "pino";
import { createLoggerConfig } from "./logger-config.js";

/**
 * Pino logger with secret redaction
 *
 * Redaction paths are centralized in src/utils/logger-config.ts.
 */
export const log = pino(createLoggerConfig(env.LOG_LEVEL || "info"));

export type TelemetryLeaf = string | number | boolean | null;
export type TelemetryValue = TelemetryLeaf | TelemetryValue[] | TelemetryShape;
export type TelemetryShape = { [key: string]: TelemetryValue };
export type Event = Record<string, unknown>;
export type TelemetrySink = (eventName: string, data: TelemetryShape) => void;

/**
 * Test sink for capturing telemetry events in tests.
 * Only used when NODE_ENV=test or VITEST=true
 */
let testSink: TelemetrySink | null = null;

export function setTestSink(sink: TelemetrySink | null): void {
  // Direct env check: the config module may not be initialised yet
  const isTestEnv = env.NODE_ENV === "test" || Boolean(env.VITEST);
  if (!isTestEnv) {
    throw new Error("setTestSink() can only be used in test environment");
  }
  testSink = sink;
}

/**
 * Frozen telemetry event names
 * DO NOT rename these; add a new event instead.
 */
export const TelemetryEvents = {
  EventTreeBuilt: "event_tree.built",
  StagedTreeBuilt: "staged_tree.built",

  CegGenerateStarted: "ceg.generate.started",
  CegGenerateCompleted: "ceg.generate.completed",
  CegGenerateFailed: "ceg.generate.failed",

  CegNodesMerged: "ceg.merge.applied",
  CegLeavesTrimmed: "ceg.trim.completed",
} as const;

export type TelemetryEventName = (typeof TelemetryEvents)[keyof typeof TelemetryEvents];

/**
 * All valid event names (for CI validation)
 */
export const VALID_EVENT_NAMES: Set<string> = new Set(Object.values(TelemetryEvents));

function sanitizeTelemetryValue(value: unknown): TelemetryValue | undefined {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }

  if (Array.isArray(value)) {
    const sanitizedArray: TelemetryValue[] = [];
    for (const item of value) {
      const sanitizedItem = sanitizeTelemetryValue(item);
      if (sanitizedItem !== undefined) {
        sanitizedArray.push(sanitizedItem);
      }
    }
    return sanitizedArray;
  }

  if (value instanceof Map) {
    return sanitizeTelemetryValue(Object.fromEntries(value));
  }

  if (value instanceof Set) {
    return sanitizeTelemetryValue([...value]);
  }

  if (typeof value === "object") {
    return sanitizeTelemetryData(Object.fromEntries(Object.entries(value)));
  }

  // functions, symbols, bigints and undefined are dropped
  return undefined;
}

function sanitizeTelemetryData(data: Event): TelemetryShape {
  const result: TelemetryShape = {};
  for (const [key, value] of Object.entries(data)) {
    const sanitized = sanitizeTelemetryValue(value);
    if (sanitized !== undefined) {
      result[key] = sanitized;
    }
  }
  return result;
}

export function emit(event: TelemetryEventName, data: Event = {}): void {
  const eventData = sanitizeTelemetryData(data);
  if (testSink) {
    testSink(event, eventData);
  }

  log.info({ event, ...eventData });
}
