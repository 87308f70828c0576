import {
  AuthenticationError,
  ConfigurationError,
  DatabaseConflictError,
  ExternalToolFailure,
  InvalidSceneError,
  LeaseLostError,
  ProviderRequestError,
  errorCodeOf,
  isAbortError,
  toErrorMessage
} from "../../core/errors";
import type { JobError } from "../../core/jobs/Job";

const STDERR_TAIL_LIMIT = 4000;

export type FailureContext = {
  attempt: number;
  maxAttempts: number;
};

export type JobFailureDecision =
  | { action: "retry"; error: JobError }
  | { action: "fail"; error: JobError }
  | { action: "invalidate"; error: JobError }
  | { action: "suspend_sensor"; error: JobError }
  /** The scene moved on without this job; only the job is closed. */
  | { action: "stale"; error: JobError }
  /** Cancellation or lost lease: nothing may be written for this job. */
  | { action: "abandon"; reason: string };

export const toJobError = (reason: unknown, at: Date): JobError => {
  const code = errorCodeOf(reason) ?? "unexpected";
  const jobError: JobError = { code, message: toErrorMessage(reason), at };

  if (reason instanceof ExternalToolFailure) {
    jobError.exitCode = reason.exitCode ?? null;
    if (reason.stderr) jobError.stderr = reason.stderr.slice(-STDERR_TAIL_LIMIT);
  }
  return jobError;
};

/**
 * Decides what a failed download or process attempt does to its scene.
 * `TransientNetworkError`, `ChecksumMismatchError`, `ExternalToolFailure` and
 * unclassified errors are retried while the attempt budget lasts.
 */
export const classifyJobFailure = (reason: unknown, context: FailureContext, now: Date): JobFailureDecision => {
  if (reason instanceof LeaseLostError) {
    return { action: "abandon", reason: reason.message };
  }
  if (isAbortError(reason)) {
    return { action: "abandon", reason: toErrorMessage(reason) };
  }

  const error = toJobError(reason, now);

  if (reason instanceof AuthenticationError || reason instanceof ConfigurationError) {
    return { action: "suspend_sensor", error };
  }
  if (reason instanceof InvalidSceneError) {
    return { action: "invalidate", error };
  }
  if (reason instanceof ProviderRequestError) {
    return { action: "fail", error };
  }

  if (reason instanceof DatabaseConflictError) {
    return { action: "stale", error };
  }

  if (context.attempt < context.maxAttempts) {
    return { action: "retry", error };
  }
  return { action: "fail", error };
};
