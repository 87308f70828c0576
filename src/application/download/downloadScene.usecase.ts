import { mkdir } from "fs/promises";
import path from "path";
import {
  ChecksumMismatchError,
  ConfigurationError,
  DatabaseConflictError,
  InvalidSceneError,
  LeaseLostError,
  isAbortError,
  throwIfAborted
} from "../../core/errors";
import { descriptorOf, findMetadataProblem } from "../../core/scene/sceneMetadata";
import { sourcesOf } from "../../core/scene/sceneLifecycle";
import type { StorageLayout } from "../../infrastructure/storage/storageLayout";
import { promoteDirectory, removePath } from "../../infrastructure/storage/storageLayout";
import type { IntegrityToken, SensorDirectory } from "../../ports/SensorPlugin";
import type { StateStore } from "../../ports/StateStore";
import { computeFileChecksum, fileSize, formatChecksum } from "../../shared/checksum/checksum";
import { systemClock, type Clock } from "../../shared/time/sleep";
import type { JobHandler } from "../pipeline/jobHandler";
import type { PipelineConfig } from "../pipeline/pipeline.config";
import { classifyJobFailure } from "../pipeline/pipeline.error-handler";
import { settleJobFailure, type JobOutcome } from "../pipeline/settleJob";

export type DownloadDeps = {
  store: StateStore;
  sensors: SensorDirectory;
  storage: StorageLayout;
  config: PipelineConfig;
  clock?: Clock;
};

/**
 * Checks a downloaded file against the plugin's integrity token and returns
 * the checksum to record. Size tokens are recorded as sha256.
 */
export const verifyIntegrity = async (filePath: string, token: IntegrityToken): Promise<string> => {
  if (token.kind === "checksum") {
    const actual = await computeFileChecksum(filePath, token.algorithm);
    const expected = formatChecksum(token.algorithm, token.value.trim());
    const recorded = formatChecksum(token.algorithm, actual);
    if (recorded !== expected) throw new ChecksumMismatchError(expected, recorded);
    return recorded;
  }

  const size = await fileSize(filePath);
  if (size !== token.bytes) {
    throw new ChecksumMismatchError(`${token.bytes} bytes`, `${size} bytes`);
  }
  return formatChecksum("sha256", await computeFileChecksum(filePath, "sha256"));
};

export const createDownloadHandler = (deps: DownloadDeps): JobHandler => {
  const { store, sensors, storage, config } = deps;
  const clock = deps.clock ?? systemClock;

  return async ({ job, lease, signal }): Promise<JobOutcome> => {
    const fail = (reason: unknown) => {
      const now = clock();
      return settleJobFailure({
        store,
        config,
        job,
        lease,
        now,
        decision: classifyJobFailure(reason, { attempt: job.attempt, maxAttempts: config.maxDownloadAttempts }, now)
      });
    };

    const scene = await store.getScene(job.sceneId);
    if (!scene || (scene.status !== "discovered" && scene.status !== "downloading")) {
      const state = scene ? `is ${scene.status}` : "does not exist";
      return fail(new DatabaseConflictError(`Scene ${job.sceneId} ${state}; download job is stale`));
    }

    const problem = findMetadataProblem(scene);
    if (problem) {
      return fail(new InvalidSceneError(`Invalid scene: ${problem}`));
    }

    try {
      await store.applyTransition({
        now: clock(),
        lease,
        scene: {
          id: scene._id,
          from: sourcesOf("downloading"),
          to: "downloading",
          patch: { attemptCount: { download: job.attempt } }
        }
      });
    } catch (err) {
      if (err instanceof LeaseLostError) return "lease_lost";
      return fail(err);
    }

    const stagingDir = storage.stagingDir(scene.sensor, scene.providerId, job._id);
    try {
      const sensor = sensors.get(scene.sensor);
      if (!sensor) throw new ConfigurationError(`Sensor ${scene.sensor} is not configured`);

      await removePath(stagingDir);
      await mkdir(stagingDir, { recursive: true });
      const result = await sensor.download(descriptorOf(scene), stagingDir, { signal });
      throwIfAborted(signal);

      const fileName = path.basename(result.fileName);
      const checksum = await verifyIntegrity(path.join(stagingDir, fileName), result.integrity);

      const sceneDir = storage.sceneDir(scene.sensor, scene.providerId);
      await promoteDirectory(stagingDir, sceneDir);
      const localPath = path.join(sceneDir, fileName);

      const now = clock();
      await store.applyTransition({
        now,
        lease,
        job: { state: "succeeded" },
        scene: {
          id: scene._id,
          from: ["downloading"],
          to: "downloaded",
          patch: { localPath, checksum, lastError: null }
        },
        enqueue: { sceneId: scene._id, sensor: scene.sensor, kind: "process", attempt: 1, availableAt: now }
      });

      console.log(JSON.stringify({
        event: "download.completed",
        sensor: scene.sensor,
        sceneId: scene._id,
        providerId: scene.providerId,
        attempt: job.attempt,
        checksum
      }));
      return "succeeded";
    } catch (err) {
      await removePath(stagingDir);
      if (isAbortError(err) || signal.aborted) throw err;
      if (err instanceof LeaseLostError) return "lease_lost";
      return fail(err);
    }
  };
};
