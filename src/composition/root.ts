import type { AdminDeps } from "../application/admin/admin.usecase";
import { CatalogPoller } from "../application/catalog/CatalogPoller";
import { createProcessHandler } from "../application/ard/processScene.usecase";
import { createDownloadHandler } from "../application/download/downloadScene.usecase";
import type { JobHandlers } from "../application/pipeline/jobHandler";
import type { PipelineConfig } from "../application/pipeline/pipeline.config";
import { WorkerPool } from "../application/scheduler/WorkerPool";
import type { ToolRunner } from "../infrastructure/ard/toolProcess";
import { MongoStateStore } from "../infrastructure/mongo/MongoStateStore";
import { bindConfiguredSensors, defaultSensorBinders, type ConfiguredSensors, type SensorBinder } from "../infrastructure/sensors/registry";
import { createStorageLayout } from "../infrastructure/storage/storageLayout";
import { createSensorDirectory } from "../ports/SensorPlugin";
import type { StateStore } from "../ports/StateStore";
import { loadEnv } from "../shared/config/env";
import { loadRuntimeConfigFromEnv } from "../shared/config/runtime.config";
import { loadSensorsConfig } from "../shared/config/sensors.config";
import type { Clock } from "../shared/time/sleep";

export type PipelineOptions = {
  env?: NodeJS.ProcessEnv;
  /** Overrides the Mongo store built from `MONGO_URI`. */
  store?: StateStore;
  sensorBinders?: ReadonlyMap<string, SensorBinder>;
  runTool?: ToolRunner;
  clock?: Clock;
};

export type Pipeline = {
  config: PipelineConfig;
  store: StateStore;
  sensors: ConfiguredSensors;
  poller: CatalogPoller;
  pool: WorkerPool;
};

/** Store and storage layout for administrative commands; no sensor is bound. */
export const openAdmin = (env: NodeJS.ProcessEnv = process.env): AdminDeps => {
  const { MONGO_URI, MONGO_DB, STORAGE_ROOT } = loadEnv(env);
  return { store: new MongoStateStore(MONGO_URI, MONGO_DB), storage: createStorageLayout(STORAGE_ROOT) };
};

/** Builds every component from the environment and the sensors file; starts nothing. */
export const createPipeline = async (options: PipelineOptions = {}): Promise<Pipeline> => {
  const rawEnv = options.env ?? process.env;
  const env = loadEnv(rawEnv);
  const config = loadRuntimeConfigFromEnv(rawEnv);
  const entries = await loadSensorsConfig(env.SENSORS_CONFIG);
  const sensors = bindConfiguredSensors(entries, options.sensorBinders ?? defaultSensorBinders);

  const store = options.store ?? new MongoStateStore(env.MONGO_URI, env.MONGO_DB);
  const storage = createStorageLayout(env.STORAGE_ROOT);
  const directory = createSensorDirectory(sensors.sensors);
  const clock = options.clock;

  const handlers: JobHandlers = {
    download: createDownloadHandler({ store, sensors: directory, storage, config, clock }),
    process: createProcessHandler({ store, sensors: directory, storage, config, runTool: options.runTool, clock })
  };

  return {
    config,
    store,
    sensors,
    poller: new CatalogPoller({ store, sensors: sensors.sensors, config, clock }),
    pool: new WorkerPool({ store, handlers, config, clock })
  };
};

export const waitForTerminationSignal = (): Promise<NodeJS.Signals> =>
  new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
      resolve(signal);
    };
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);
  });

/**
 * Runs pollers and workers until `waitForShutdown` resolves, then drains the
 * pool and closes the store.
 */
export const runPipeline = async (
  options: PipelineOptions & { waitForShutdown?: () => Promise<string> } = {}
): Promise<void> => {
  const pipeline = await createPipeline(options);
  const waitForShutdown = options.waitForShutdown ?? waitForTerminationSignal;

  try {
    pipeline.poller.start();
    pipeline.pool.start();
    console.log(JSON.stringify({
      event: "pipeline.started",
      sensors: pipeline.sensors.sensors.map((sensor) => sensor.name),
      disabled: pipeline.sensors.disabled.map((sensor) => sensor.name)
    }));

    const reason = await waitForShutdown();
    console.log(JSON.stringify({ event: "pipeline.stopping", reason }));
    await pipeline.poller.stop();
    await pipeline.pool.stop();
  } finally {
    await pipeline.store.close();
  }
  console.log(JSON.stringify({ event: "pipeline.stopped" }));
};
