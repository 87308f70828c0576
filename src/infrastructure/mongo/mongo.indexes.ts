import type { CreateIndexesOptions, IndexSpecification } from "mongodb";

type IndexPlan = ReadonlyArray<{ keys: IndexSpecification; options: CreateIndexesOptions }>;

/**
 * Index plan, applied idempotently on first connection:
 * - scenes: unique (sensor, providerId) is the duplicate-scene guard
 * - scenes: (sensor, acquiredAt) gives the poller its next window start
 * - jobs: unique (sceneId, kind) over active jobs allows one queued-or-leased
 *   job per scene and kind, so at most one can ever be leased
 * - jobs: (state, createdAt) serves the claim query, (state, leaseExpiresAt) the reaper
 */
export const mongoIndexes: { scenes: IndexPlan; jobs: IndexPlan } = {
  scenes: [
    { keys: { sensor: 1, providerId: 1 }, options: { unique: true, name: "scene_provider_unique" } },
    { keys: { status: 1, sensor: 1 }, options: { name: "scene_status" } },
    { keys: { sensor: 1, acquiredAt: -1 }, options: { name: "scene_latest_acquired" } }
  ],
  jobs: [
    {
      keys: { sceneId: 1, kind: 1 },
      options: { unique: true, partialFilterExpression: { active: true }, name: "job_open_per_scene_kind" }
    },
    { keys: { state: 1, createdAt: 1 }, options: { name: "job_claim_order" } },
    { keys: { state: 1, leaseExpiresAt: 1 }, options: { name: "job_lease_expiry" } },
    { keys: { sceneId: 1, createdAt: 1 }, options: { name: "job_history" } }
  ]
};
