import { WriteConflictError, toErrorMessage } from "../../core/errors";
import type { NewJob } from "../../core/jobs/Job";
import { buildScene, parseProviderId } from "../../core/scene/sceneMetadata";
import type { SceneDescriptor } from "../../core/scene/scene.types";
import type { BoundSensor, TimeWindow } from "../../ports/SensorPlugin";
import type { StateStore } from "../../ports/StateStore";
import { createLimiter } from "../../shared/concurrency/limiter";
import { retry } from "../../shared/retry/retry";
import { systemClock, type Clock } from "../../shared/time/sleep";

export type PollSummary = {
  discovered: number;
  duplicates: number;
  invalid: number;
  skipped: number;
  failed: number;
};

export type PollDeps = {
  store: StateStore;
  sensor: BoundSensor;
  window: TimeWindow;
  concurrency?: number;
  signal?: AbortSignal;
  clock?: Clock;
};

const DEFAULT_RECONCILE_CONCURRENCY = 8;

export const createPollSummaryTracker = () => {
  const counts: PollSummary = { discovered: 0, duplicates: 0, invalid: 0, skipped: 0, failed: 0 };
  return {
    add: (key: keyof PollSummary) => {
      counts[key] += 1;
      return counts[key];
    },
    summary: (): PollSummary => ({ ...counts })
  };
};

/**
 * Reconciles one catalog query into the store. New scenes are inserted with
 * their first download job; known `(sensor, providerId)` pairs are counted as
 * duplicates. A store failure on one descriptor is counted and does not stop
 * the others. Errors from the query itself propagate once in-flight
 * descriptors have settled.
 */
export const pollSensorCatalog = async (deps: PollDeps): Promise<PollSummary> => {
  const { store, sensor, window, signal } = deps;
  const clock = deps.clock ?? systemClock;
  const limit = createLimiter(deps.concurrency ?? DEFAULT_RECONCILE_CONCURRENCY);
  const tracker = createPollSummaryTracker();

  const reconcile = async (descriptor: SceneDescriptor): Promise<void> => {
    let providerId: string;
    try {
      providerId = parseProviderId(descriptor.providerId);
    } catch (err) {
      const skippedCount = tracker.add("skipped");
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({ event: "poller.scene_skipped", sensor: sensor.name, reason: toErrorMessage(err), skippedCount }));
      return;
    }

    try {
      if (await store.findSceneByProviderId(sensor.name, providerId)) {
        tracker.add("duplicates");
        return;
      }

      const now = clock();
      const scene = buildScene(sensor.name, { ...descriptor, providerId }, now);
      const job: NewJob | undefined =
        scene.status === "discovered"
          ? { sceneId: scene._id, sensor: sensor.name, kind: "download", attempt: 1, availableAt: now }
          : undefined;

      const outcome = await retry(() => store.recordDiscovery(scene, job), {
        retries: 3,
        minDelayMs: 50,
        maxDelayMs: 1000,
        signal,
        shouldRetry: (err) => err instanceof WriteConflictError
      });

      if (outcome === "duplicate") {
        tracker.add("duplicates");
      } else if (scene.status === "invalid") {
        tracker.add("invalid");
        // eslint-disable-next-line no-console
        console.warn(JSON.stringify({
          event: "poller.scene_invalid",
          sensor: sensor.name,
          sceneId: scene._id,
          providerId,
          reason: scene.lastError?.message
        }));
      } else {
        tracker.add("discovered");
      }
    } catch (err) {
      const failedCount = tracker.add("failed");
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({
        event: "poller.scene_failed",
        sensor: sensor.name,
        providerId,
        reason: toErrorMessage(err),
        failedCount
      }));
    }
  };

  const pending: Promise<void>[] = [];
  try {
    for await (const descriptor of sensor.query(window, { signal })) {
      if (signal?.aborted) break;
      // The next descriptor is pulled only once this one holds a slot.
      await new Promise<void>((started) => {
        pending.push(
          limit(() => {
            started();
            return reconcile(descriptor);
          })
        );
      });
    }
  } finally {
    await Promise.allSettled(pending);
  }

  return tracker.summary();
};
