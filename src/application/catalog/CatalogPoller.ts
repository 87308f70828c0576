import { AuthenticationError, ConfigurationError, isAbortError, toErrorMessage } from "../../core/errors";
import type { BoundSensor } from "../../ports/SensorPlugin";
import type { StateStore } from "../../ports/StateStore";
import { sleep, systemClock, type Clock } from "../../shared/time/sleep";
import type { PipelineConfig } from "../pipeline/pipeline.config";
import { pollSensorCatalog, type PollSummary } from "./pollSensorCatalog.usecase";

export type SensorPollResult =
  | { sensor: string; status: "completed"; summary: PollSummary }
  | { sensor: string; status: "suspended"; reason: string }
  | { sensor: string; status: "failed"; reason: string };

export type PollOptions = {
  signal?: AbortSignal;
  /** Query from the sensor's start date instead of from what is already stored. */
  fromStart?: boolean;
};

export type CatalogPollerDeps = {
  store: StateStore;
  sensors: readonly BoundSensor[];
  config: PipelineConfig;
  concurrency?: number;
  clock?: Clock;
};

/**
 * One polling loop per sensor. Each query starts at the newest acquisition
 * time already stored for the sensor, so a scene the catalog publishes late
 * is still found as long as it is not older than that. A poll that could not
 * store every descriptor pins the next query to its own start.
 * A sensor whose credentials or configuration
 * are rejected is suspended in the store and its loop ends; any other query
 * failure is logged and tried again on the next tick.
 */
export class CatalogPoller {
  private readonly clock: Clock;
  private controller?: AbortController;
  private loops: Promise<void>[] = [];

  constructor(private readonly deps: CatalogPollerDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  async pollSensor(sensor: BoundSensor, options: PollOptions = {}): Promise<SensorPollResult> {
    const { store } = this.deps;
    const { signal } = options;
    const state = await store.getSensorState(sensor.name);
    if (state?.suspended) {
      return { sensor: sensor.name, status: "suspended", reason: state.suspendedReason ?? "suspended" };
    }

    const now = this.clock();
    const start = options.fromStart
      ? sensor.startDate
      : state?.retryFrom ?? (await store.latestAcquiredAt(sensor.name)) ?? sensor.startDate;
    const window = { start, end: now };
    const startedAt = Date.now();

    try {
      const summary = await pollSensorCatalog({
        store,
        sensor,
        window,
        signal,
        concurrency: this.deps.concurrency,
        clock: this.clock
      });
      if (signal?.aborted) {
        return { sensor: sensor.name, status: "failed", reason: "poll cancelled" };
      }

      await store.markPolled(sensor.name, now, summary.failed > 0 ? window.start : undefined);

      console.log(JSON.stringify({
        event: "poller.completed",
        sensor: sensor.name,
        windowStart: window.start.toISOString(),
        windowEnd: window.end.toISOString(),
        durationMs: Date.now() - startedAt,
        ...summary
      }));
      return { sensor: sensor.name, status: "completed", summary };
    } catch (err) {
      if (isAbortError(err) || signal?.aborted) {
        return { sensor: sensor.name, status: "failed", reason: "poll cancelled" };
      }

      const reason = toErrorMessage(err);
      if (err instanceof AuthenticationError || err instanceof ConfigurationError) {
        await store.suspendSensor(sensor.name, reason, this.clock());
        // eslint-disable-next-line no-console
        console.error(JSON.stringify({ event: "sensor.suspended", sensor: sensor.name, code: err.code, reason }));
        return { sensor: sensor.name, status: "suspended", reason };
      }

      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({ event: "poller.failed", sensor: sensor.name, reason }));
      return { sensor: sensor.name, status: "failed", reason };
    }
  }

  /** Polls every sensor (or only `sensorName`) once, concurrently. */
  async pollOnce(sensorName?: string, options: Omit<PollOptions, "signal"> = {}): Promise<SensorPollResult[]> {
    const sensors = sensorName ? this.deps.sensors.filter((sensor) => sensor.name === sensorName) : this.deps.sensors;
    if (sensorName && sensors.length === 0) {
      throw new ConfigurationError(`Sensor ${sensorName} is not configured or is disabled`);
    }
    return Promise.all(sensors.map((sensor) => this.pollSensor(sensor, options)));
  }

  start(): void {
    if (this.controller) return;
    const controller = new AbortController();
    this.controller = controller;
    this.loops = this.deps.sensors.map((sensor) => this.loop(sensor, controller.signal));
  }

  async stop(): Promise<void> {
    this.controller?.abort();
    await Promise.all(this.loops);
    this.loops = [];
    this.controller = undefined;
  }

  private async loop(sensor: BoundSensor, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let result: SensorPollResult;
      try {
        result = await this.pollSensor(sensor, { signal });
      } catch (err) {
        // Store unavailable; try again on the next tick.
        // eslint-disable-next-line no-console
        console.error(JSON.stringify({ event: "poller.error", sensor: sensor.name, reason: toErrorMessage(err) }));
        result = { sensor: sensor.name, status: "failed", reason: toErrorMessage(err) };
      }

      if (result.status === "suspended") {
        console.log(JSON.stringify({ event: "poller.stopped", sensor: sensor.name, reason: result.reason }));
        return;
      }
      await sleep(this.deps.config.pollIntervalMs, signal);
    }
  }
}
