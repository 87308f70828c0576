import { DatabaseConflictError, LeaseLostError } from "../../core/errors";
import type { Job, JobError, Lease } from "../../core/jobs/Job";
import { sourcesOf } from "../../core/scene/sceneLifecycle";
import type { SceneStatus } from "../../core/scene/scene.types";
import type { StateStore, Transition } from "../../ports/StateStore";
import { addMs } from "../../shared/time/sleep";
import type { PipelineConfig } from "./pipeline.config";
import { retryDelayFor } from "./pipeline.config";
import type { JobFailureDecision } from "./pipeline.error-handler";

export type JobOutcome =
  | "succeeded"
  | "retry_scheduled"
  | "failed"
  | "invalidated"
  | "sensor_suspended"
  | "stale"
  | "abandoned"
  | "lease_lost";

const statusesByKind = {
  download: { active: "downloading", failed: "download_failed" },
  process: { active: "processing", failed: "processing_failed" }
} as const satisfies Record<Job["kind"], { active: SceneStatus; failed: SceneStatus }>;

export type SettleArgs = {
  store: StateStore;
  config: PipelineConfig;
  job: Job;
  lease: Lease;
  decision: JobFailureDecision;
  now: Date;
};

const closeJobOnly = (lease: Lease, lastError: JobError, now: Date): Transition => ({
  now,
  lease,
  job: { state: "failed", lastError }
});

/**
 * Commits the store changes a failure decision implies. A lost lease means
 * another worker owns the job now, so nothing is written and the outcome is
 * reported as `lease_lost`.
 */
export const settleJobFailure = async (args: SettleArgs): Promise<JobOutcome> => {
  const { store, config, job, lease, decision, now } = args;
  if (decision.action === "abandon") return "abandoned";

  const statuses = statusesByKind[job.kind];
  const lastError = decision.error;
  let transition: Transition;
  let outcome: JobOutcome;

  switch (decision.action) {
    case "retry": {
      transition = {
        now,
        lease,
        job: { state: "failed", lastError },
        scene: { id: job.sceneId, from: [statuses.active], to: statuses.active, patch: { lastError } },
        enqueue: {
          sceneId: job.sceneId,
          sensor: job.sensor,
          kind: job.kind,
          attempt: job.attempt + 1,
          availableAt: addMs(now, retryDelayFor(config, job.attempt))
        }
      };
      outcome = "retry_scheduled";
      break;
    }
    case "fail":
    case "suspend_sensor":
      transition = {
        now,
        lease,
        job: { state: "failed", lastError },
        scene: { id: job.sceneId, from: [statuses.active], to: statuses.failed, patch: { lastError } }
      };
      outcome = decision.action === "fail" ? "failed" : "sensor_suspended";
      break;
    case "invalidate":
      transition = {
        now,
        lease,
        job: { state: "failed", lastError },
        scene: { id: job.sceneId, from: sourcesOf("invalid"), to: "invalid", patch: { lastError } }
      };
      outcome = "invalidated";
      break;
    default:
      transition = closeJobOnly(lease, lastError, now);
      outcome = "stale";
      break;
  }

  try {
    await store.applyTransition(transition);
  } catch (err) {
    if (err instanceof LeaseLostError) return "lease_lost";
    if (!(err instanceof DatabaseConflictError)) throw err;

    // The scene left the expected status concurrently (e.g. an administrative
    // change); close the job and leave the scene alone.
    try {
      await store.applyTransition(closeJobOnly(lease, lastError, now));
    } catch (closeErr) {
      if (closeErr instanceof LeaseLostError) return "lease_lost";
      throw closeErr;
    }
    outcome = "stale";
  }

  if (decision.action === "suspend_sensor") {
    await store.suspendSensor(job.sensor, lastError.message, now);
    // eslint-disable-next-line no-console
    console.error(JSON.stringify({
      event: "sensor.suspended",
      sensor: job.sensor,
      sceneId: job.sceneId,
      code: lastError.code,
      reason: lastError.message
    }));
  } else {
    // eslint-disable-next-line no-console
    console.warn(JSON.stringify({
      event: `${job.kind}.${outcome}`,
      sceneId: job.sceneId,
      jobId: job._id,
      attempt: job.attempt,
      availableAt: outcome === "retry_scheduled" ? transition.enqueue?.availableAt.toISOString() : undefined,
      code: lastError.code,
      reason: lastError.message
    }));
  }

  return outcome;
};
