import { ZodError } from "zod";

/**
 * Error codes for structured error objects
 */
export type ErrorCode =
  | "BAD_INPUT"
  | "MALFORMED_GRAPH"
  | "INELIGIBLE_MERGE"
  | "UNKNOWN_NODE"
  | "UNKNOWN_EDGE"
  | "INVALID_STAGE_ASSIGNMENT"
  | "INVALID_STATE"
  | "INTERNAL";

/**
 * Structured error (error.v1 schema)
 */
export interface ErrorV1 {
  schema: "error.v1";
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Base class for every error the engine raises on purpose.
 * Distinguishable from generic errors via `code`.
 */
export class CegError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = "CegError";
    // Maintain proper stack trace in V8
    Error.captureStackTrace?.(this, new.target);
  }
}

/**
 * Input is not a DAG, has no sink, or has several sink-like nodes.
 */
export class MalformedGraphError extends CegError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, "MALFORMED_GRAPH", details);
    this.name = "MalformedGraphError";
  }
}

/**
 * A merge was requested for a pair that fails the eligibility check.
 * Raised before the graph is touched.
 */
export class IneligibleMergeError extends CegError {
  constructor(public readonly pair: readonly [string, string]) {
    super(`Nodes ${pair[0]} and ${pair[1]} cannot be merged`, "INELIGIBLE_MERGE", {
      pair: [...pair],
    });
    this.name = "IneligibleMergeError";
  }
}

export class UnknownNodeError extends CegError {
  constructor(public readonly nodeId: string) {
    super(`Node ${nodeId} is not in the graph`, "UNKNOWN_NODE", { node: nodeId });
    this.name = "UnknownNodeError";
  }
}

export class UnknownEdgeError extends CegError {
  constructor(source: string, destination: string, label: string) {
    super(`Edge ${source} -> ${destination} (${label}) is not in the graph`, "UNKNOWN_EDGE", {
      source,
      destination,
      label,
    });
    this.name = "UnknownEdgeError";
  }
}

export class StageAssignmentError extends CegError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, "INVALID_STAGE_ASSIGNMENT", details);
    this.name = "StageAssignmentError";
  }
}

/**
 * An operation was called in a lifecycle state that does not allow it,
 * e.g. generating a chain event graph twice.
 */
export class GenerationStateError extends CegError {
  constructor(message: string, public readonly state: string) {
    super(message, "INVALID_STATE", { state });
    this.name = "GenerationStateError";
  }
}

/**
 * Build a structured error object
 */
export function buildErrorV1(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): ErrorV1 {
  const error: ErrorV1 = {
    schema: "error.v1",
    code,
    message,
  };

  if (details && Object.keys(details).length > 0) {
    error.details = details;
  }

  return error;
}

/**
 * Convert Zod validation error to ErrorV1
 */
export function zodErrorToErrorV1(error: ZodError): ErrorV1 {
  return buildErrorV1("BAD_INPUT", "Validation failed", {
    validation_errors: error.flatten(),
  });
}

/**
 * Convert any thrown value to ErrorV1 (never includes the stack)
 */
export function toErrorV1(error: unknown): ErrorV1 {
  if (error instanceof ZodError) {
    return zodErrorToErrorV1(error);
  }

  if (error instanceof CegError) {
    return buildErrorV1(error.code, error.message, error.details);
  }

  if (error instanceof Error) {
    return buildErrorV1("INTERNAL", error.message || "An unexpected error occurred");
  }

  if (typeof error === "string") {
    return buildErrorV1("INTERNAL", error);
  }

  return buildErrorV1("INTERNAL", "An unexpected error occurred");
}
