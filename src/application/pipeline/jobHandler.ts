import type { Job, JobKind, Lease } from "../../core/jobs/Job";
import type { JobOutcome } from "./settleJob";

export type JobHandlerContext = {
  job: Job;
  lease: Lease;
  /** Aborted on forced shutdown or when the lease could not be renewed. */
  signal: AbortSignal;
};

/**
 * Runs one claimed job to completion and commits its result. Cancellation is
 * the only thing a handler rethrows; the worker then releases the lease.
 */
export type JobHandler = (ctx: JobHandlerContext) => Promise<JobOutcome>;

export type JobHandlers = Record<JobKind, JobHandler>;
