import { DatabaseConflictError, LeaseLostError } from "../../src/core/errors";
import { createJob, type Job, type JobKind, type Lease, type NewJob } from "../../src/core/jobs/Job";
import type { Scene } from "../../src/core/scene/scene.types";
import type {
  ClaimRequest,
  DiscoveryOutcome,
  LeaseRenewal,
  SceneQuery,
  SensorRecords,
  SensorState,
  StateStore,
  StatusCount,
  Transition
} from "../../src/ports/StateStore";
import { addMs } from "../../src/shared/time/sleep";

const clone = <T>(value: T): T => structuredClone(value);

/**
 * In-process stand-in for the Mongo store. Every method does all its reads
 * and writes before its first `await`, so each call is atomic with respect to
 * other calls, the way a single transaction is.
 */
export class InMemoryStateStore implements StateStore {
  readonly scenes = new Map<string, Scene>();
  readonly jobs = new Map<string, Job>();
  readonly sensors = new Map<string, SensorState>();
  /** Every status a scene has been written with, in order. */
  readonly statusLog = new Map<string, Scene["status"][]>();
  failNextTransition?: Error;

  private holdsLease(job: Job | undefined, lease: Lease): job is Job {
    return job != null && job.state === "leased" && job.leaseOwner === lease.owner && job.version === lease.version;
  }

  private insertJob(newJob: NewJob, now: Date): void {
    const open = Array.from(this.jobs.values()).some(
      (job) => job.active && job.sceneId === newJob.sceneId && job.kind === newJob.kind
    );
    if (open) throw Object.assign(new Error("E11000 duplicate key: job_open_per_scene_kind"), { code: 11000 });
    const job = createJob(newJob, now);
    this.jobs.set(job._id, job);
  }

  private logStatus(scene: Scene): void {
    const log = this.statusLog.get(scene._id) ?? [];
    log.push(scene.status);
    this.statusLog.set(scene._id, log);
  }

  async recordDiscovery(scene: Scene, job?: NewJob): Promise<DiscoveryOutcome> {
    const duplicate = Array.from(this.scenes.values()).some(
      (existing) => existing.sensor === scene.sensor && existing.providerId === scene.providerId
    );
    if (duplicate) return "duplicate";
    this.scenes.set(scene._id, clone(scene));
    this.logStatus(scene);
    if (job) this.insertJob(job, scene.discoveredAt);
    return "inserted";
  }

  async findSceneByProviderId(sensor: string, providerId: string): Promise<Scene | null> {
    const scene = Array.from(this.scenes.values()).find((s) => s.sensor === sensor && s.providerId === providerId);
    return scene ? clone(scene) : null;
  }

  async getScene(sceneId: string): Promise<Scene | null> {
    const scene = this.scenes.get(sceneId);
    return scene ? clone(scene) : null;
  }

  async listScenes(query: SceneQuery): Promise<Scene[]> {
    return Array.from(this.scenes.values())
      .filter((scene) => (query.sensor ? scene.sensor === query.sensor : true))
      .filter((scene) => (query.status ? scene.status === query.status : true))
      .sort((a, b) => b.discoveredAt.getTime() - a.discoveredAt.getTime())
      .slice(0, query.limit ?? 100)
      .map(clone);
  }

  async latestAcquiredAt(sensor: string): Promise<Date | null> {
    let latest: Date | null = null;
    for (const scene of this.scenes.values()) {
      if (scene.sensor !== sensor || scene.status === "invalid") continue;
      if (!latest || scene.acquiredAt.getTime() > latest.getTime()) latest = scene.acquiredAt;
    }
    return latest ? new Date(latest) : null;
  }

  async countScenesByStatus(sensor?: string): Promise<StatusCount[]> {
    const counts = new Map<string, StatusCount>();
    for (const scene of this.scenes.values()) {
      if (sensor && scene.sensor !== sensor) continue;
      const key = `${scene.sensor}\u0000${scene.status}`;
      const row = counts.get(key) ?? { sensor: scene.sensor, status: scene.status, count: 0 };
      row.count += 1;
      counts.set(key, row);
    }
    return Array.from(counts.values()).sort(
      (a, b) => a.sensor.localeCompare(b.sensor) || a.status.localeCompare(b.status)
    );
  }

  async getJob(jobId: string): Promise<Job | null> {
    const job = this.jobs.get(jobId);
    return job ? clone(job) : null;
  }

  async listJobs(sceneId: string, kind?: JobKind): Promise<Job[]> {
    return Array.from(this.jobs.values())
      .filter((job) => job.sceneId === sceneId && (kind ? job.kind === kind : true))
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map(clone);
  }

  async claimNextJob(request: ClaimRequest): Promise<Job | null> {
    const candidate = Array.from(this.jobs.values())
      .filter((job) => !this.sensors.get(job.sensor)?.suspended)
      .filter(
        (job) =>
          (job.state === "queued" && job.availableAt.getTime() <= request.now.getTime()) ||
          (job.state === "leased" && job.leaseExpiresAt != null && job.leaseExpiresAt.getTime() <= request.now.getTime())
      )
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())[0];
    if (!candidate) return null;

    candidate.state = "leased";
    candidate.leaseOwner = request.owner;
    candidate.leaseExpiresAt = addMs(request.now, request.leaseDurationMs);
    candidate.updatedAt = request.now;
    candidate.version += 1;
    return clone(candidate);
  }

  async renewLease(renewal: LeaseRenewal): Promise<boolean> {
    const job = this.jobs.get(renewal.lease.jobId);
    if (!this.holdsLease(job, renewal.lease)) return false;
    job.leaseExpiresAt = addMs(renewal.now, renewal.leaseDurationMs);
    job.updatedAt = renewal.now;
    return true;
  }

  private requeue(job: Job, now: Date): void {
    job.state = "queued";
    job.leaseOwner = undefined;
    job.leaseExpiresAt = undefined;
    job.updatedAt = now;
    job.version += 1;
  }

  async releaseLease(lease: Lease, now: Date): Promise<boolean> {
    const job = this.jobs.get(lease.jobId);
    if (!this.holdsLease(job, lease)) return false;
    this.requeue(job, now);
    return true;
  }

  async reapExpiredLeases(now: Date): Promise<number> {
    let reaped = 0;
    for (const job of this.jobs.values()) {
      if (job.state === "leased" && job.leaseExpiresAt && job.leaseExpiresAt.getTime() <= now.getTime()) {
        this.requeue(job, now);
        reaped += 1;
      }
    }
    return reaped;
  }

  async applyTransition(transition: Transition): Promise<void> {
    if (this.failNextTransition) {
      const err = this.failNextTransition;
      this.failNextTransition = undefined;
      throw err;
    }

    const { now, lease } = transition;
    // Validate everything first so a failure leaves no partial write.
    const job = lease ? this.jobs.get(lease.jobId) : undefined;
    if (lease && !this.holdsLease(job, lease)) throw new LeaseLostError(lease.jobId);

    const scene = transition.scene ? this.scenes.get(transition.scene.id) : undefined;
    if (transition.scene && (!scene || !transition.scene.from.includes(scene.status))) {
      const { id, from, to } = transition.scene;
      throw new DatabaseConflictError(`Scene ${id} is not in [${from.join(", ")}]; cannot move to ${to}`);
    }

    if (transition.enqueue) {
      const target = transition.enqueue;
      const blocking = Array.from(this.jobs.values()).some(
        (other) =>
          other.active && other.sceneId === target.sceneId && other.kind === target.kind && other._id !== job?._id
      );
      const closesBlocking = job != null && transition.job != null && job.sceneId === target.sceneId && job.kind === target.kind;
      if (blocking || (job?.active && !closesBlocking && job.sceneId === target.sceneId && job.kind === target.kind)) {
        throw Object.assign(new Error("E11000 duplicate key: job_open_per_scene_kind"), { code: 11000 });
      }
    }

    if (job && transition.job) {
      job.state = transition.job.state;
      job.active = false;
      job.leaseOwner = undefined;
      job.leaseExpiresAt = undefined;
      job.version += 1;
      if (transition.job.lastError) job.lastError = clone(transition.job.lastError);
    }
    if (job) job.updatedAt = now;

    if (scene && transition.scene) {
      const patch = transition.scene.patch ?? {};
      scene.status = transition.scene.to;
      scene.updatedAt = now;
      if (patch.localPath !== undefined) scene.localPath = patch.localPath ?? undefined;
      if (patch.checksum !== undefined) scene.checksum = patch.checksum ?? undefined;
      if (patch.ardPath !== undefined) scene.ardPath = patch.ardPath ?? undefined;
      if (patch.attemptCount?.download != null) scene.attemptCount.download = patch.attemptCount.download;
      if (patch.attemptCount?.process != null) scene.attemptCount.process = patch.attemptCount.process;
      if (patch.lastError === null) scene.lastError = undefined;
      else if (patch.lastError) scene.lastError = clone(patch.lastError);
      scene.statusHistory.push({ status: scene.status, at: now });
      this.logStatus(scene);
    }

    if (transition.enqueue) this.insertJob(transition.enqueue, now);
  }

  async listSensorRecords(sensor: string): Promise<SensorRecords> {
    return {
      scenes: Array.from(this.scenes.values())
        .filter((scene) => scene.sensor === sensor)
        .sort((a, b) => a.discoveredAt.getTime() - b.discoveredAt.getTime())
        .map(clone),
      jobs: Array.from(this.jobs.values())
        .filter((job) => job.sensor === sensor)
        .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
        .map(clone)
    };
  }

  async importSceneRecords(scene: Scene, jobs: readonly Job[]): Promise<DiscoveryOutcome> {
    const duplicate =
      this.scenes.has(scene._id) ||
      Array.from(this.scenes.values()).some(
        (existing) => existing.sensor === scene.sensor && existing.providerId === scene.providerId
      ) ||
      jobs.some((job) => this.jobs.has(job._id));
    if (duplicate) return "duplicate";
    this.scenes.set(scene._id, clone(scene));
    this.logStatus(scene);
    for (const job of jobs) this.jobs.set(job._id, clone(job));
    return "inserted";
  }

  async getSensorState(sensor: string): Promise<SensorState | null> {
    const state = this.sensors.get(sensor);
    return state ? clone(state) : null;
  }

  async suspendSensor(sensor: string, reason: string, now: Date): Promise<void> {
    const state = this.sensors.get(sensor) ?? { _id: sensor, suspended: false };
    this.sensors.set(sensor, { ...state, suspended: true, suspendedReason: reason, suspendedAt: now });
  }

  async resumeSensor(sensor: string): Promise<boolean> {
    const state = this.sensors.get(sensor);
    if (!state?.suspended) return false;
    this.sensors.set(sensor, { _id: sensor, suspended: false, lastPolledAt: state.lastPolledAt, retryFrom: state.retryFrom });
    return true;
  }

  async markPolled(sensor: string, polledAt: Date, retryFrom?: Date): Promise<void> {
    const state = this.sensors.get(sensor) ?? { _id: sensor, suspended: false };
    this.sensors.set(sensor, { ...state, lastPolledAt: polledAt, retryFrom });
  }

  async close(): Promise<void> {}

  jobsOf(sceneId: string): Job[] {
    return Array.from(this.jobs.values())
      .filter((job) => job.sceneId === sceneId)
      .sort((a, b) => a.attempt - b.attempt || a.createdAt.getTime() - b.createdAt.getTime())
      .map(clone);
  }
}
