/**
 * RAG Error Types
 *
 * Typed error taxonomy shared by stores, retrievers, rerankers and the
 * streaming layer. Every error carries a stable code and at least one
 * remediation hint that can be shown to operators or clients.
 */

/** Stable error codes */
export type RagErrorCode =
  | "CONFIGURATION_INVALID"
  | "STORE_ADD_FAILED"
  | "STORE_SEARCH_FAILED"
  | "STORE_DELETE_FAILED"
  | "STORE_SETUP_FAILED"
  | "VALIDATION_FAILED"
  | "RERANK_DEGRADED"
  | "DEPENDENCY_NOT_INITIALIZED"
  | "DEPENDENCY_UNAVAILABLE";

/** Why a degradable stage fell back to its input */
export type DegradedReasonKind =
  | "timeout"
  | "http_error"
  | "malformed_response"
  | "transport_error"
  | "auth_failed"
  | "unknown";

/** Store operation that failed */
export type StoreOperation = "add" | "search" | "delete" | "setup";

export interface RagErrorOptions {
  cause?: unknown;
  solutions?: string[];
  context?: Record<string, unknown>;
}

/**
 * Base class for all taxonomy-level errors.
 */
export abstract class RagError extends Error {
  abstract readonly code: RagErrorCode;
  readonly solutions: string[];
  readonly context: Record<string, unknown>;
  readonly timestamp: number;

  constructor(message: string, defaultSolutions: string[], options: RagErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: toError(options.cause) });
    this.solutions =
      options.solutions && options.solutions.length > 0 ? options.solutions : defaultSolutions;
    this.context = options.context ?? {};
    this.timestamp = Date.now();
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      solutions: this.solutions,
      context: this.context,
      timestamp: this.timestamp,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }
}

/**
 * Invalid static configuration. Thrown at construction, never mid-request.
 */
export class ConfigurationError extends RagError {
  override readonly name = "ConfigurationError";
  readonly code = "CONFIGURATION_INVALID" as const;

  constructor(message: string, options: RagErrorOptions = {}) {
    super(message, ["Check the configuration value and restart the service."], options);
  }
}

const STORE_CODES: Record<StoreOperation, RagErrorCode> = {
  add: "STORE_ADD_FAILED",
  search: "STORE_SEARCH_FAILED",
  delete: "STORE_DELETE_FAILED",
  setup: "STORE_SETUP_FAILED",
};

/**
 * Backend transport or query failure, wrapped with its cause.
 */
export class StoreError extends RagError {
  override readonly name = "StoreError";
  readonly code: RagErrorCode;
  readonly backend: string;
  readonly operation: StoreOperation;

  constructor(
    backend: string,
    operation: StoreOperation,
    message: string,
    options: RagErrorOptions = {}
  ) {
    super(
      `${backend} ${operation} failed: ${message}`,
      [
        `Check that the ${backend} server is running and reachable.`,
        "Check that the collection exists and the vector dimension matches the index.",
      ],
      options
    );
    this.code = STORE_CODES[operation];
    this.backend = backend;
    this.operation = operation;
  }
}

/**
 * Malformed client input. Always recoverable.
 */
export class ValidationError extends RagError {
  override readonly name = "ValidationError";
  readonly code = "VALIDATION_FAILED" as const;
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], options: RagErrorOptions = {}) {
    super(message, ["Fix the request fields and send it again."], options);
    this.issues = issues;
  }
}

/**
 * Failure of a stage whose caller falls back to the unscored input.
 */
export class DegradableError extends RagError {
  override readonly name = "DegradableError";
  readonly code = "RERANK_DEGRADED" as const;
  readonly reason: DegradedReasonKind;

  constructor(reason: DegradedReasonKind, message: string, options: RagErrorOptions = {}) {
    super(message, ["Check the reranker provider status and credentials."], options);
    this.reason = reason;
  }
}

/**
 * A dependency that is not wired up or not initialized.
 */
export class LifecycleError extends RagError {
  override readonly name: string = "LifecycleError";
  readonly code: RagErrorCode = "DEPENDENCY_NOT_INITIALIZED";

  constructor(message: string, options: RagErrorOptions = {}) {
    super(message, ["Contact the server administrator."], options);
  }
}

/**
 * An optional npm package needed by a backend is not installed.
 */
export class DependencyUnavailableError extends LifecycleError {
  override readonly name = "DependencyUnavailableError";
  override readonly code = "DEPENDENCY_UNAVAILABLE" as const;
  readonly packageName: string;

  constructor(packageName: string, feature: string, options: RagErrorOptions = {}) {
    super(`install ${packageName} to use ${feature}`, {
      solutions: [`Run \`npm install ${packageName}\` and restart the service.`],
      ...options,
    });
    this.packageName = packageName;
  }
}

export function isRagError(error: unknown): error is RagError {
  return error instanceof RagError;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
