import type { Job, JobError, JobKind, Lease, NewJob } from "../core/jobs/Job";
import type { Scene, ScenePatch, SceneStatus } from "../core/scene/scene.types";

export type SensorState = {
  _id: string;
  suspended: boolean;
  suspendedReason?: string;
  suspendedAt?: Date;
  lastPolledAt?: Date;
  /** Set while descriptors from the last poll's window remain unstored. */
  retryFrom?: Date;
};

/**
 * One atomic change. When `lease` is given the job must still be leased by
 * that owner at that version, otherwise `LeaseLostError`. When `scene` is given
 * its status must be one of `from`, otherwise `DatabaseConflictError`. All
 * parts commit together or not at all.
 */
export type Transition = {
  now: Date;
  lease?: Lease;
  job?: {
    state: "succeeded" | "failed";
    lastError?: JobError;
  };
  scene?: {
    id: string;
    from: readonly SceneStatus[];
    to: SceneStatus;
    patch?: ScenePatch;
  };
  enqueue?: NewJob;
};

export type ClaimRequest = {
  owner: string;
  now: Date;
  leaseDurationMs: number;
};

export type LeaseRenewal = {
  lease: Lease;
  now: Date;
  leaseDurationMs: number;
};

export type SceneQuery = {
  sensor?: string;
  status?: SceneStatus;
  limit?: number;
};

export type StatusCount = {
  sensor: string;
  status: SceneStatus;
  count: number;
};

export type DiscoveryOutcome = "inserted" | "duplicate";

export type SensorRecords = {
  scenes: Scene[];
  jobs: Job[];
};

export interface StateStore {
  /** Inserts a scene and, when given, its first job in one transaction. */
  recordDiscovery(scene: Scene, job?: NewJob): Promise<DiscoveryOutcome>;
  findSceneByProviderId(sensor: string, providerId: string): Promise<Scene | null>;
  getScene(sceneId: string): Promise<Scene | null>;
  listScenes(query: SceneQuery): Promise<Scene[]>;
  /** Newest `acquiredAt` among the sensor's valid scenes, or null when it has none. */
  latestAcquiredAt(sensor: string): Promise<Date | null>;
  countScenesByStatus(sensor?: string): Promise<StatusCount[]>;

  getJob(jobId: string): Promise<Job | null>;
  listJobs(sceneId: string, kind?: JobKind): Promise<Job[]>;
  /**
   * Atomically leases the oldest claimable job: queued with `availableAt <= now`,
   * or leased with an expired lease. Jobs of suspended sensors stay where
   * they are until the sensor is resumed. Returns null when there is none.
   */
  claimNextJob(request: ClaimRequest): Promise<Job | null>;
  renewLease(renewal: LeaseRenewal): Promise<boolean>;
  /** Puts a leased job back in the queue so it is immediately reclaimable. */
  releaseLease(lease: Lease, now: Date): Promise<boolean>;
  /** Requeues every leased job whose lease expired at or before `now`. */
  reapExpiredLeases(now: Date): Promise<number>;

  applyTransition(transition: Transition): Promise<void>;

  /** Every scene and job of `sensor`, in discovery and creation order. */
  listSensorRecords(sensor: string): Promise<SensorRecords>;
  /**
   * Inserts an exported scene together with its jobs in one transaction;
   * `duplicate` when the scene, or a job with the same id, is already stored.
   */
  importSceneRecords(scene: Scene, jobs: readonly Job[]): Promise<DiscoveryOutcome>;

  getSensorState(sensor: string): Promise<SensorState | null>;
  suspendSensor(sensor: string, reason: string, now: Date): Promise<void>;
  resumeSensor(sensor: string): Promise<boolean>;
  /** Records a poll; `retryFrom` is kept when the poll left descriptors unstored and cleared otherwise. */
  markPolled(sensor: string, polledAt: Date, retryFrom?: Date): Promise<void>;

  close(): Promise<void>;
}
