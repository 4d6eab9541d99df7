/**
 * Error taxonomy for the concept lab.
 *
 * Core modules throw these; the lab facade turns them into typed failure
 * results. Anything thrown that is not a LabError is a bug and propagates.
 */

/** Machine-readable failure code carried by every LabError. */
export type LabErrorCode =
  | "PROVIDER_UNAVAILABLE"
  | "PROVIDER_TIMEOUT"
  | "DIMENSION_MISMATCH"
  | "NOT_FOUND"
  | "INVALID_ARGUMENT"
  | "EMPTY_INPUT"
  | "SUPERSEDED";

/** Base class of every expected failure. */
export abstract class LabError extends Error {
  abstract readonly code: LabErrorCode;
  /** HTTP-equivalent status for a transport layer to use. */
  abstract readonly status: number;
  /** Whether the caller may retry the same request later. */
  readonly retryable: boolean = false;
}

/**
 * Thrown when the embedding backend cannot be reached, answers with a
 * non-2xx status or returns a body without an embedding. Degraded mode:
 * index operations that need no new vectors keep working.
 */
export class ProviderUnavailableError extends LabError {
  readonly code = "PROVIDER_UNAVAILABLE";
  readonly status = 503;
  override readonly retryable = true;

  constructor(detail: string) {
    super(`Embedding provider unavailable: ${detail}`);
    this.name = "ProviderUnavailableError";
  }
}

/** Thrown when an embedding request outlives its timeout. */
export class ProviderTimeoutError extends LabError {
  readonly code = "PROVIDER_TIMEOUT";
  readonly status = 504;
  override readonly retryable = true;

  constructor(timeoutMs: number) {
    super(`Embedding request timed out after ${timeoutMs}ms`);
    this.name = "ProviderTimeoutError";
  }
}

/** Thrown when two vectors that must share a length do not. */
export class DimensionMismatchError extends LabError {
  readonly code = "DIMENSION_MISMATCH";
  readonly status = 500;

  constructor(expected: number, actual: number) {
    super(`Vector length mismatch: ${expected} vs ${actual}`);
    this.name = "DimensionMismatchError";
  }
}

/** Thrown when a concept name is not in the index. */
export class NotFoundError extends LabError {
  readonly code = "NOT_FOUND";
  readonly status = 404;

  constructor(name: string) {
    super(`Unknown concept: "${name}"`);
    this.name = "NotFoundError";
  }
}

/** Thrown for a bad k, topK or feed. */
export class InvalidArgumentError extends LabError {
  readonly code = "INVALID_ARGUMENT";
  readonly status = 400;

  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

/**
 * Thrown when there are too few concepts for the operation, most often
 * none at all: the caller should mine some videos first.
 */
export class EmptyInputError extends LabError {
  readonly code = "EMPTY_INPUT";
  readonly status = 409;

  constructor(message: string) {
    super(message);
    this.name = "EmptyInputError";
  }
}

/** Thrown by a load that a later load overtook; the later feed stays indexed. */
export class LoadSupersededError extends LabError {
  readonly code = "SUPERSEDED";
  readonly status = 409;

  constructor() {
    super("A newer load replaced this one before it finished");
    this.name = "LoadSupersededError";
  }
}

/** Throw InvalidArgumentError unless `value` is an integer >= 1. */
export function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidArgumentError(`'${name}' must be a positive integer, got: ${value}`);
  }
}
