import { mkdir, stat } from "fs/promises";
import {
  ConfigurationError,
  DatabaseConflictError,
  ExternalToolFailure,
  LeaseLostError,
  errorCodeOf,
  isAbortError,
  toErrorMessage
} from "../../core/errors";
import { sourcesOf } from "../../core/scene/sceneLifecycle";
import type { ToolRunResult, ToolRunner } from "../../infrastructure/ard/toolProcess";
import { runToolInvocation } from "../../infrastructure/ard/toolProcess";
import type { StorageLayout } from "../../infrastructure/storage/storageLayout";
import { removePath } from "../../infrastructure/storage/storageLayout";
import type { SensorDirectory, ToolInvocation } from "../../ports/SensorPlugin";
import type { StateStore } from "../../ports/StateStore";
import { systemClock, type Clock } from "../../shared/time/sleep";
import type { JobHandler } from "../pipeline/jobHandler";
import type { PipelineConfig } from "../pipeline/pipeline.config";
import { classifyJobFailure } from "../pipeline/pipeline.error-handler";
import { settleJobFailure, type JobOutcome } from "../pipeline/settleJob";

export type ProcessDeps = {
  store: StateStore;
  sensors: SensorDirectory;
  storage: StorageLayout;
  config: PipelineConfig;
  runTool?: ToolRunner;
  clock?: Clock;
};

const artifactExists = async (artifactPath: string): Promise<boolean> => {
  try {
    await stat(artifactPath);
    return true;
  } catch (err) {
    if (errorCodeOf(err) === "ENOENT") return false;
    throw err;
  }
};

/**
 * Turns a finished tool run into an `ExternalToolFailure`, or `undefined`
 * when it succeeded.
 */
export const interpretToolRun = async (
  invocation: ToolInvocation,
  run: ToolRunResult
): Promise<ExternalToolFailure | undefined> => {
  const program = invocation.program;
  if (run.error) {
    return new ExternalToolFailure({
      reason: "spawn_error",
      message: `${program} could not be started: ${toErrorMessage(run.error)}`,
      exitCode: null,
      stderr: run.stderr,
      cause: run.error
    });
  }
  if (run.timedOut) {
    return new ExternalToolFailure({
      reason: "timeout",
      message: `${program} exceeded its timeout of ${invocation.timeoutMs}ms`,
      exitCode: run.code,
      stderr: run.stderr
    });
  }
  if (run.code !== 0) {
    const how = run.code == null ? `was killed by ${run.signal ?? "a signal"}` : `exited with code ${run.code}`;
    return new ExternalToolFailure({
      reason: "exit_code",
      message: `${program} ${how}`,
      exitCode: run.code,
      stderr: run.stderr
    });
  }
  if (!(await artifactExists(invocation.expectedArtifact))) {
    return new ExternalToolFailure({
      reason: "missing_artifact",
      message: `${program} exited cleanly but ${invocation.expectedArtifact} was not produced`,
      exitCode: run.code,
      stderr: run.stderr
    });
  }
  return undefined;
};

export const createProcessHandler = (deps: ProcessDeps): JobHandler => {
  const { store, sensors, storage, config } = deps;
  const runTool = deps.runTool ?? runToolInvocation;
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
        decision: classifyJobFailure(reason, { attempt: job.attempt, maxAttempts: config.maxProcessAttempts }, now)
      });
    };

    const scene = await store.getScene(job.sceneId);
    if (!scene || (scene.status !== "downloaded" && scene.status !== "processing") || !scene.localPath) {
      const state = scene ? `is ${scene.status}${scene.localPath ? "" : " without a local path"}` : "does not exist";
      return fail(new DatabaseConflictError(`Scene ${job.sceneId} ${state}; process job is stale`));
    }
    const localPath = scene.localPath;

    try {
      await store.applyTransition({
        now: clock(),
        lease,
        scene: {
          id: scene._id,
          from: sourcesOf("processing"),
          to: "processing",
          patch: { attemptCount: { process: job.attempt } }
        }
      });
    } catch (err) {
      if (err instanceof LeaseLostError) return "lease_lost";
      return fail(err);
    }

    try {
      const sensor = sensors.get(scene.sensor);
      if (!sensor) throw new ConfigurationError(`Sensor ${scene.sensor} is not configured`);

      // Output of an earlier attempt must not pass for this attempt's artifact.
      const outputDir = storage.ardDir(scene.sensor, scene.providerId);
      await removePath(outputDir);
      await mkdir(outputDir, { recursive: true });
      const invocation = sensor.process(localPath, outputDir);

      console.log(JSON.stringify({
        event: "process.started",
        sensor: scene.sensor,
        sceneId: scene._id,
        program: invocation.program,
        attempt: job.attempt,
        timeoutMs: invocation.timeoutMs
      }));

      const run = await runTool(invocation, { signal });
      const failure = await interpretToolRun(invocation, run);
      if (failure) throw failure;

      await store.applyTransition({
        now: clock(),
        lease,
        job: { state: "succeeded" },
        scene: {
          id: scene._id,
          from: ["processing"],
          to: "processed",
          patch: { ardPath: invocation.expectedArtifact, lastError: null }
        }
      });

      console.log(JSON.stringify({
        event: "process.completed",
        sensor: scene.sensor,
        sceneId: scene._id,
        attempt: job.attempt,
        durationMs: run.durationMs,
        ardPath: invocation.expectedArtifact
      }));
      return "succeeded";
    } catch (err) {
      if (isAbortError(err) || signal.aborted) throw err;
      if (err instanceof LeaseLostError) return "lease_lost";
      return fail(err);
    }
  };
};
