#!/usr/bin/env node
import { readFile, writeFile } from "fs/promises";
import { Command, InvalidArgumentError } from "commander";
import {
  archiveScene,
  exportSensorRecords,
  getScene,
  importSensorRecords,
  listJobs,
  listScenes,
  resetScene,
  resetUnprocessedScenes,
  resumeSensor,
  statusReport,
  type AdminDeps
} from "../application/admin/admin.usecase";
import { parsePathMap, parseSensorExport, serializeSensorExport } from "../application/admin/sensorRecords";
import { sceneStatuses } from "../core/scene/sceneLifecycle";
import type { SceneStatus } from "../core/scene/scene.types";
import { createPipeline, openAdmin, runPipeline } from "../composition/root";

type CliErrorEnvelope = {
  event: "command.failed";
  command?: string;
  name: string;
  message: string;
  code?: string;
  status?: number;
  exitCode?: number;
  stack?: string;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

/**
 * Only whitelisted, scalar fields of the error are printed: causes and
 * provider payloads may carry credentials.
 */
export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean, command?: string): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const errorRecord = isRecord(err) ? err : {};

  const envelope: CliErrorEnvelope = {
    event: "command.failed",
    name: error.name || "Error",
    message: error.message
  };
  if (command) envelope.command = command;

  if (typeof errorRecord.code === "string") {
    envelope.code = errorRecord.code;
  }
  if (typeof errorRecord.status === "number" && Number.isFinite(errorRecord.status)) {
    envelope.status = errorRecord.status;
  }
  if (typeof errorRecord.exitCode === "number" && Number.isFinite(errorRecord.exitCode)) {
    envelope.exitCode = errorRecord.exitCode;
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};

const print = (value: unknown): void => {
  console.log(JSON.stringify(value, null, 2));
};

export const parseLimit = (value: string): number => {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 1 || limit > 10_000) {
    throw new InvalidArgumentError("must be an integer in [1..10000]");
  }
  return limit;
};

export const parseStatus = (value: string): SceneStatus => {
  const status = sceneStatuses.find((candidate) => candidate === value);
  if (!status) throw new InvalidArgumentError(`must be one of ${sceneStatuses.join(", ")}`);
  return status;
};

/** Runs an administrative command against a store opened from the environment. */
const withAdmin = async (fn: (deps: AdminDeps) => Promise<void>): Promise<void> => {
  const deps = openAdmin();
  try {
    await fn(deps);
  } finally {
    await deps.store.close();
  }
};

export const buildProgram = (): Command => {
  const program = new Command();

  program
    .name("eodd")
    .description("Earth-observation scene ingestion: discovery, download, verification and ARD conversion")
    .version("1.0.0");

  program
    .command("run")
    .description("Run catalog pollers and the worker pool until SIGINT/SIGTERM")
    .action(async () => {
      await runPipeline();
    });

  program
    .command("poll")
    .description("Poll sensor catalogs once and record new scenes")
    .option("--sensor <name>", "Poll only this sensor")
    .option("--from-start", "Query from each sensor's start date instead of from the newest stored scene")
    .action(async (options: { sensor?: string; fromStart?: boolean }) => {
      const pipeline = await createPipeline();
      try {
        print(await pipeline.poller.pollOnce(options.sensor, { fromStart: options.fromStart === true }));
      } finally {
        await pipeline.store.close();
      }
    });

  program
    .command("reset")
    .description("Reset a download_failed or processing_failed scene and queue a new job")
    .argument("<sceneId>", "Scene identifier")
    .option("--redownload", "Delete the scene's files and start over from the download")
    .action((sceneId: string, options: { redownload?: boolean }) =>
      withAdmin(async (deps) => print(await resetScene(deps, sceneId, { redownload: options.redownload === true })))
    );

  program
    .command("reset-unprocessed")
    .description("Send every processing_failed scene of a sensor back to the download, deleting its files")
    .requiredOption("--sensor <name>", "Sensor whose scenes are reset")
    .action((options: { sensor: string }) =>
      withAdmin(async (deps) => print({ sensor: options.sensor, reset: await resetUnprocessedScenes(deps, options.sensor) }))
    );

  program
    .command("export")
    .description("Write a sensor's scenes and jobs to a JSON file")
    .requiredOption("--sensor <name>", "Sensor to export")
    .option("--out <file>", "Output file; standard output when omitted")
    .action((options: { sensor: string; out?: string }) =>
      withAdmin(async (deps) => {
        const text = serializeSensorExport(await exportSensorRecords(deps, options.sensor));
        if (options.out) await writeFile(options.out, `${text}\n`, "utf8");
        else process.stdout.write(`${text}\n`);
      })
    );

  program
    .command("import")
    .description("Add the scenes and jobs of an export file to the store")
    .argument("<file>", "File written by the export command")
    .option("--paths <file>", "JSON object of path prefixes to rewrite")
    .action((file: string, options: { paths?: string }) =>
      withAdmin(async (deps) => {
        const data = parseSensorExport(await readFile(file, "utf8"));
        const pathMap = options.paths ? parsePathMap(await readFile(options.paths, "utf8")) : undefined;
        print(await importSensorRecords(deps, data, { pathMap }));
      })
    );

  program
    .command("archive")
    .description("Mark a processed scene as archived")
    .argument("<sceneId>", "Scene identifier")
    .action((sceneId: string) => withAdmin(async (deps) => print(await archiveScene(deps, sceneId))));

  program
    .command("resume-sensor")
    .description("Clear the suspension of a sensor")
    .argument("<name>", "Sensor name")
    .action((name: string) => withAdmin(async (deps) => print({ sensor: name, resumed: await resumeSensor(deps, name) })));

  program
    .command("report")
    .description("Count scenes by sensor and status")
    .option("--sensor <name>", "Only this sensor")
    .action((options: { sensor?: string }) => withAdmin(async (deps) => print(await statusReport(deps, options.sensor))));

  program
    .command("scenes")
    .description("List scenes, most recently discovered first")
    .option("--sensor <name>", "Only this sensor")
    .option("--status <status>", "Only scenes in this status", parseStatus)
    .option("--limit <n>", "Maximum number of scenes", parseLimit, 50)
    .action((options: { sensor?: string; status?: SceneStatus; limit: number }) =>
      withAdmin(async (deps) => print(await listScenes(deps, options)))
    );

  program
    .command("scene")
    .description("Show a scene with its job history and diagnostics")
    .argument("<sceneId>", "Scene identifier")
    .action((sceneId: string) =>
      withAdmin(async (deps) => print({ scene: await getScene(deps, sceneId), jobs: await listJobs(deps, sceneId) }))
    );

  return program;
};

export const executeCli = async (argv: readonly string[] = process.argv): Promise<void> => {
  const program = buildProgram();
  try {
    await program.parseAsync([...argv]);
  } catch (err) {
    const envelope = buildCliErrorEnvelope(err, isDebugMode(), argv[2]);
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    process.exit(1);
  }
};

if (require.main === module) {
  void executeCli();
}
