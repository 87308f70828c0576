export type PipelineErrorCode =
  | "transient_network"
  | "checksum_mismatch"
  | "authentication_failed"
  | "provider_request_rejected"
  | "invalid_scene"
  | "external_tool_failed"
  | "database_conflict"
  | "write_conflict"
  | "lease_lost"
  | "configuration_invalid"
  | "not_found"
  | "invalid_operation";

/**
 * Base class for every failure the pipeline classifies. `code` is stable and
 * is what ends up in the store and in log records.
 */
export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;
  readonly cause?: unknown;

  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message);
    this.name = new.target.name;
    this.cause = options.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class TransientNetworkError extends PipelineError {
  readonly code = "transient_network";
  readonly status?: number;
  readonly retryDelayMs?: number;

  constructor(message: string, options: { cause?: unknown; status?: number; retryDelayMs?: number } = {}) {
    super(message, options);
    this.status = options.status;
    this.retryDelayMs = options.retryDelayMs;
  }
}

export class ChecksumMismatchError extends PipelineError {
  readonly code = "checksum_mismatch";

  constructor(
    readonly expected: string,
    readonly actual: string
  ) {
    super(`Integrity check failed: expected ${expected}, got ${actual}`);
  }
}

export class AuthenticationError extends PipelineError {
  readonly code = "authentication_failed";
  readonly status?: number;

  constructor(message: string, options: { cause?: unknown; status?: number } = {}) {
    super(message, options);
    this.status = options.status;
  }
}

/** A provider rejected the request in a way that retrying will not fix. */
export class ProviderRequestError extends PipelineError {
  readonly code = "provider_request_rejected";

  constructor(
    message: string,
    readonly status?: number
  ) {
    super(message);
  }
}

export class InvalidSceneError extends PipelineError {
  readonly code = "invalid_scene";
}

export type ExternalToolFailureReason = "exit_code" | "timeout" | "missing_artifact" | "spawn_error";

export class ExternalToolFailure extends PipelineError {
  readonly code = "external_tool_failed";
  readonly reason: ExternalToolFailureReason;
  readonly exitCode?: number | null;
  readonly stderr?: string;

  constructor(args: {
    reason: ExternalToolFailureReason;
    message: string;
    exitCode?: number | null;
    stderr?: string;
    cause?: unknown;
  }) {
    super(args.message, { cause: args.cause });
    this.reason = args.reason;
    this.exitCode = args.exitCode;
    this.stderr = args.stderr;
  }
}

/** The entity is no longer in the state the write was conditioned on. */
export class DatabaseConflictError extends PipelineError {
  readonly code = "database_conflict";
}

/** A concurrent transaction won; the same write can be tried again as is. */
export class WriteConflictError extends PipelineError {
  readonly code = "write_conflict";
}

/** The worker no longer owns the job it is trying to write. */
export class LeaseLostError extends PipelineError {
  readonly code = "lease_lost";

  constructor(readonly jobId: string) {
    super(`Lease on job ${jobId} is no longer held`);
  }
}

export class ConfigurationError extends PipelineError {
  readonly code = "configuration_invalid";
}

export class NotFoundError extends PipelineError {
  readonly code = "not_found";
}

/** An administrative request that the entity's current status does not allow. */
export class InvalidOperationError extends PipelineError {
  readonly code = "invalid_operation";
}

// Errors raised by Node itself (fs, child_process, fetch) may come from
// another realm than this module's `Error`, so fields are read structurally.
const stringField = (value: unknown, field: "code" | "name" | "message"): string | undefined => {
  if (typeof value !== "object" || value === null || !(field in value)) return undefined;
  const fieldValue: unknown = Reflect.get(value, field);
  return typeof fieldValue === "string" ? fieldValue : undefined;
};

/** `code` of a system error such as `ENOENT`, or of a `PipelineError`. */
export const errorCodeOf = (reason: unknown): string | undefined => stringField(reason, "code");

export const toErrorMessage = (reason: unknown): string => stringField(reason, "message") ?? String(reason);

export const isAbortError = (value: unknown): boolean => {
  const name = stringField(value, "name");
  return name === "AbortError" || name === "CancellationError";
};

export class CancellationError extends Error {
  constructor(message = "Operation cancelled") {
    super(message);
    this.name = "CancellationError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const throwIfAborted = (signal?: AbortSignal): void => {
  if (signal?.aborted) throw new CancellationError(toErrorMessage(signal.reason ?? "Operation cancelled"));
};
