import { randomUUID } from "crypto";

export type JobKind = "download" | "process";

export type JobState = "queued" | "leased" | "succeeded" | "failed";

export type JobError = {
  code: string;
  message: string;
  exitCode?: number | null;
  stderr?: string;
  at: Date;
};

export type Job = {
  _id: string;
  sceneId: string;
  sensor: string;
  kind: JobKind;
  state: JobState;
  /** True while queued or leased; backs the one-open-job-per-scene-and-kind index. */
  active: boolean;
  leaseOwner?: string;
  leaseExpiresAt?: Date;
  attempt: number;
  availableAt: Date;
  version: number;
  lastError?: JobError;
  createdAt: Date;
  updatedAt: Date;
};

/**
 * Proof of ownership handed to a worker by a successful claim. Every write the
 * worker makes afterwards is fenced on all three fields.
 */
export type Lease = {
  jobId: string;
  owner: string;
  version: number;
};

export type NewJob = {
  sceneId: string;
  sensor: string;
  kind: JobKind;
  attempt: number;
  availableAt: Date;
};

export const leaseOf = (job: Job): Lease => {
  if (job.state !== "leased" || job.leaseOwner == null) {
    throw new Error(`Job ${job._id} is not leased`);
  }
  return { jobId: job._id, owner: job.leaseOwner, version: job.version };
};

export const createJob = (job: NewJob, now: Date): Job => ({
  _id: randomUUID(),
  sceneId: job.sceneId,
  sensor: job.sensor,
  kind: job.kind,
  state: "queued",
  active: true,
  attempt: job.attempt,
  availableAt: job.availableAt,
  version: 0,
  createdAt: now,
  updatedAt: now
});
