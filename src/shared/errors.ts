export type ErrorCode =
  | "VALIDATION_ERROR"
  | "INVALID_WEIGHTS"
  | "ENTITY_NOT_FOUND"
  | "ENTITY_NOT_EMBEDDED"
  | "DIMENSION_MISMATCH"
  | "INDEX_UNAVAILABLE"
  | "STORE_UNAVAILABLE"
  | "EMBEDDING_RATE_LIMITED"
  | "EMBEDDING_TIMEOUT"
  | "EMBEDDING_INVALID_INPUT"
  | "EMBEDDING_UNAUTHORIZED"
  | "CONCURRENT_MODIFICATION"
  | "ERASURE_INCOMPLETE"
  | "REQUEST_CANCELLED"
  | "INTERNAL_ERROR";

export abstract class MatchingCoreError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly httpStatus: number;
  abstract readonly retryable: boolean;

  constructor(
    message: string,
    readonly details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends MatchingCoreError {
  readonly code = "VALIDATION_ERROR";
  readonly httpStatus = 422;
  readonly retryable = false;

  constructor(readonly issues: string[]) {
    super(`Validation failed: ${issues.join("; ")}`, { issues });
  }
}

export class InvalidWeightsError extends MatchingCoreError {
  readonly code = "INVALID_WEIGHTS";
  readonly httpStatus = 422;
  readonly retryable = false;
}

export class EntityNotFoundError extends MatchingCoreError {
  readonly code = "ENTITY_NOT_FOUND";
  readonly httpStatus = 404;
  readonly retryable = false;

  constructor(category: string, externalId: string) {
    super(`${category} not found: ${externalId}`, { category, externalId });
  }
}

export class EntityNotEmbeddedError extends MatchingCoreError {
  readonly code = "ENTITY_NOT_EMBEDDED";
  readonly httpStatus = 409;
  readonly retryable = false;

  constructor(category: string, externalId: string) {
    super(`${category} has no vector representation yet: ${externalId}`, { category, externalId });
  }
}

export class DimensionMismatchError extends MatchingCoreError {
  readonly code = "DIMENSION_MISMATCH";
  readonly httpStatus = 422;
  readonly retryable = false;

  constructor(expected: number, actual: number, collection?: string) {
    super(`Vector dimension mismatch: expected ${expected}, got ${actual}`, {
      expected,
      actual,
      ...(collection ? { collection } : {}),
    });
  }
}

export class IndexUnavailableError extends MatchingCoreError {
  readonly code = "INDEX_UNAVAILABLE";
  readonly httpStatus = 503;
  readonly retryable = true;
}

export class StoreUnavailableError extends MatchingCoreError {
  readonly code = "STORE_UNAVAILABLE";
  readonly httpStatus = 503;
  readonly retryable = true;
}

export type EmbeddingFailureKind = "rate_limited" | "timeout" | "invalid_input" | "unauthorized";

const EMBEDDING_FAILURES: Record<EmbeddingFailureKind, { code: ErrorCode; httpStatus: number; retryable: boolean }> = {
  rate_limited: { code: "EMBEDDING_RATE_LIMITED", httpStatus: 503, retryable: true },
  timeout: { code: "EMBEDDING_TIMEOUT", httpStatus: 503, retryable: true },
  invalid_input: { code: "EMBEDDING_INVALID_INPUT", httpStatus: 422, retryable: false },
  // The gateway credentials are wrong; the caller cannot fix it by retrying.
  unauthorized: { code: "EMBEDDING_UNAUTHORIZED", httpStatus: 502, retryable: false },
};

export class EmbeddingGatewayError extends MatchingCoreError {
  readonly code: ErrorCode;
  readonly httpStatus: number;
  readonly retryable: boolean;

  constructor(
    readonly kind: EmbeddingFailureKind,
    message: string,
  ) {
    super(message, { kind });
    const failure = EMBEDDING_FAILURES[kind];
    this.code = failure.code;
    this.httpStatus = failure.httpStatus;
    this.retryable = failure.retryable;
  }
}

export class ConcurrentModificationError extends MatchingCoreError {
  readonly code = "CONCURRENT_MODIFICATION";
  readonly httpStatus = 409;
  readonly retryable = true;

  constructor(category: string, externalId: string, expectedVersion: number) {
    super(`${category} ${externalId} was modified concurrently`, {
      category,
      externalId,
      expectedVersion,
    });
  }
}

export class ErasureIncompleteError extends MatchingCoreError {
  readonly code = "ERASURE_INCOMPLETE";
  readonly httpStatus = 503;
  readonly retryable = true;
}

export class RequestCancelledError extends MatchingCoreError {
  readonly code = "REQUEST_CANCELLED";
  readonly httpStatus = 499;
  readonly retryable = false;

  constructor(stage: string) {
    super(`Request cancelled during ${stage}`, { stage });
  }
}

export class LifecycleError extends MatchingCoreError {
  readonly code: ErrorCode;
  readonly httpStatus: number;
  readonly retryable: boolean;

  constructor(
    message: string,
    readonly cause: unknown,
    details: Record<string, unknown> = {},
  ) {
    super(message, details);
    if (cause instanceof MatchingCoreError) {
      this.code = cause.code;
      this.httpStatus = cause.httpStatus;
      this.retryable = cause.retryable;
    } else {
      this.code = "INTERNAL_ERROR";
      this.httpStatus = 503;
      this.retryable = true;
    }
  }
}

export function isRetryable(error: unknown): boolean {
  return error instanceof MatchingCoreError && error.retryable;
}
