import { randomUUID } from "crypto";
import { hostname } from "os";
import { CancellationError, LeaseLostError, WriteConflictError, isAbortError, toErrorMessage } from "../../core/errors";
import { leaseOf, type Job, type Lease } from "../../core/jobs/Job";
import type { StateStore } from "../../ports/StateStore";
import { retry } from "../../shared/retry/retry";
import { sleep, systemClock, type Clock } from "../../shared/time/sleep";
import type { JobHandlers } from "../pipeline/jobHandler";
import type { PipelineConfig } from "../pipeline/pipeline.config";
import type { JobOutcome } from "../pipeline/settleJob";

export type WorkerPoolDeps = {
  store: StateStore;
  handlers: JobHandlers;
  config: PipelineConfig;
  clock?: Clock;
  /** Prefix of every lease owner this pool writes; defaults to host, pid and a random tag. */
  ownerPrefix?: string;
};

export type RunOnceResult = { claimed: false } | { claimed: true; jobId: string; outcome: JobOutcome | "released" };

export const defaultOwnerPrefix = (): string => `${hostname()}:${process.pid}:${randomUUID().slice(0, 8)}`;

/**
 * Fixed pool of workers draining the job queue. Ownership of a job is the
 * lease in the store; the pool only keeps it alive and gives it back.
 */
export class WorkerPool {
  private readonly clock: Clock;
  private readonly ownerPrefix: string;
  private accepting = false;
  private workers: Promise<void>[] = [];
  private reaper?: Promise<void>;
  /** Wakes idle workers and the reaper. */
  private readonly wake = new AbortController();
  /** Aborts in-flight handlers once the grace period is over. */
  private readonly hardStop = new AbortController();

  constructor(private readonly deps: WorkerPoolDeps) {
    this.clock = deps.clock ?? systemClock;
    this.ownerPrefix = deps.ownerPrefix ?? defaultOwnerPrefix();
  }

  get running(): boolean {
    return this.accepting;
  }

  start(): void {
    if (this.accepting || this.wake.signal.aborted) return;
    this.accepting = true;
    this.workers = Array.from({ length: this.deps.config.workerCount }, (_, index) =>
      this.workerLoop(`${this.ownerPrefix}/w${index}`)
    );
    this.reaper = this.reaperLoop();
    console.log(JSON.stringify({ event: "pool.started", workers: this.deps.config.workerCount, owner: this.ownerPrefix }));
  }

  /**
   * Stops claiming, lets in-flight jobs finish for `shutdownGraceMs`, then
   * aborts what is left. Aborted jobs have their leases released so another
   * process can claim them without waiting for the reaper.
   */
  async stop(): Promise<void> {
    if (this.wake.signal.aborted) return;
    this.accepting = false;
    this.wake.abort();

    const graceTimer = new AbortController();
    const drained = Promise.all(this.workers).then(() => true);
    const graceOver = sleep(this.deps.config.shutdownGraceMs, graceTimer.signal).then(() => false);
    const finished = await Promise.race([drained, graceOver]);
    graceTimer.abort();

    if (!finished) {
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({ event: "pool.shutdown_forced", graceMs: this.deps.config.shutdownGraceMs }));
      this.hardStop.abort(new CancellationError("Worker pool shut down"));
    }
    await Promise.all(this.workers);
    await this.reaper;
    console.log(JSON.stringify({ event: "pool.stopped", forced: !finished }));
  }

  /** Requeues expired leases; returns how many jobs were reaped. */
  async reapOnce(): Promise<number> {
    const reaped = await this.deps.store.reapExpiredLeases(this.clock());
    if (reaped > 0) {
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({ event: "reaper.requeued", count: reaped }));
    }
    return reaped;
  }

  /** Claims and runs at most one job as `owner`. */
  async runOnce(owner = `${this.ownerPrefix}/w0`): Promise<RunOnceResult> {
    const { store, config } = this.deps;
    const job = await retry(
      () => store.claimNextJob({ owner, now: this.clock(), leaseDurationMs: config.leaseDurationMs }),
      { retries: 3, minDelayMs: 0, maxDelayMs: 0, shouldRetry: (err) => err instanceof WriteConflictError }
    );
    if (!job) return { claimed: false };

    const lease = leaseOf(job);
    const outcome = await this.runClaimed(job, lease);
    return { claimed: true, jobId: job._id, outcome };
  }

  private async runClaimed(job: Job, lease: Lease): Promise<JobOutcome | "released"> {
    const { handlers } = this.deps;
    const jobController = new AbortController();
    const onHardStop = () => jobController.abort(this.hardStop.signal.reason);
    if (this.hardStop.signal.aborted) onHardStop();
    else this.hardStop.signal.addEventListener("abort", onHardStop, { once: true });

    const heartbeatStop = new AbortController();
    const heartbeat = this.heartbeat(lease, jobController, heartbeatStop.signal);

    console.log(JSON.stringify({
      event: "worker.job_claimed",
      owner: lease.owner,
      jobId: job._id,
      sceneId: job.sceneId,
      kind: job.kind,
      attempt: job.attempt
    }));

    try {
      const outcome = await handlers[job.kind]({ job, lease, signal: jobController.signal });
      if (outcome === "lease_lost") {
        // eslint-disable-next-line no-console
        console.warn(JSON.stringify({ event: "worker.lease_lost", owner: lease.owner, jobId: job._id, kind: job.kind }));
      }
      return outcome;
    } catch (err) {
      const cancelled = isAbortError(err) || jobController.signal.aborted;
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({
        event: cancelled ? "worker.job_cancelled" : "worker.job_crashed",
        owner: lease.owner,
        jobId: job._id,
        kind: job.kind,
        reason: toErrorMessage(err)
      }));
      await this.release(lease);
      return "released";
    } finally {
      heartbeatStop.abort();
      this.hardStop.signal.removeEventListener("abort", onHardStop);
      await heartbeat;
    }
  }

  private async heartbeat(lease: Lease, jobController: AbortController, stop: AbortSignal): Promise<void> {
    const { store, config } = this.deps;
    const intervalMs = Math.max(1, Math.floor(config.leaseDurationMs / 3));
    while (true) {
      await sleep(intervalMs, stop);
      if (stop.aborted) return;
      try {
        const renewed = await store.renewLease({ lease, now: this.clock(), leaseDurationMs: config.leaseDurationMs });
        if (!renewed) {
          // eslint-disable-next-line no-console
          console.warn(JSON.stringify({ event: "worker.lease_lost", owner: lease.owner, jobId: lease.jobId }));
          jobController.abort(new LeaseLostError(lease.jobId));
          return;
        }
      } catch (err) {
        // The lease is still ours until it expires; try again next beat.
        // eslint-disable-next-line no-console
        console.warn(JSON.stringify({ event: "worker.renew_failed", jobId: lease.jobId, reason: toErrorMessage(err) }));
      }
    }
  }

  private async release(lease: Lease): Promise<void> {
    try {
      const released = await this.deps.store.releaseLease(lease, this.clock());
      console.log(JSON.stringify({ event: released ? "worker.lease_released" : "worker.lease_already_gone", jobId: lease.jobId }));
    } catch (err) {
      // The reaper requeues it once the lease expires.
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({ event: "worker.release_failed", jobId: lease.jobId, reason: toErrorMessage(err) }));
    }
  }

  private async workerLoop(owner: string): Promise<void> {
    while (this.accepting) {
      let claimed = false;
      try {
        const result = await this.runOnce(owner);
        claimed = result.claimed && result.outcome !== "released";
      } catch (err) {
        // eslint-disable-next-line no-console
        console.error(JSON.stringify({ event: "worker.error", owner, reason: toErrorMessage(err) }));
      }
      if (!claimed && this.accepting) await sleep(this.deps.config.idleDelayMs, this.wake.signal);
    }
  }

  private async reaperLoop(): Promise<void> {
    const signal = this.wake.signal;
    while (!signal.aborted) {
      await sleep(this.deps.config.reaperIntervalMs, signal);
      if (signal.aborted) return;
      try {
        await this.reapOnce();
      } catch (err) {
        // eslint-disable-next-line no-console
        console.error(JSON.stringify({ event: "reaper.error", reason: toErrorMessage(err) }));
      }
    }
  }
}
