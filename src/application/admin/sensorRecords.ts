import { InvalidOperationError } from "../../core/errors";
import type { Job, JobError, JobKind, JobState } from "../../core/jobs/Job";
import { sceneStatuses } from "../../core/scene/sceneLifecycle";
import { parseAcquiredAt, parseFootprint } from "../../core/scene/sceneMetadata";
import type { Footprint, Scene, SceneError, SceneStatus, StatusChange } from "../../core/scene/scene.types";
import type { SensorRecords } from "../../ports/StateStore";

export const SENSOR_EXPORT_FORMAT = "eodd.sensor-records";
export const SENSOR_EXPORT_VERSION = 1;

export type SensorExport = SensorRecords & {
  sensor: string;
  exportedAt: Date;
};

const jobKinds: readonly JobKind[] = ["download", "process"];
const jobStates: readonly JobState[] = ["queued", "leased", "succeeded", "failed"];

const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === "object" && value !== null;

/** Reads one record of an export file; every accessor names the offending field. */
const fieldReader = (record: Record<string, unknown>, where: string) => {
  const fail = (field: string, expected: string): never => {
    throw new InvalidOperationError(`${where}: ${field} must be ${expected}`);
  };

  const optionalString = (field: string): string | undefined => {
    const value = record[field];
    if (value == null) return undefined;
    return typeof value === "string" ? value : fail(field, "a string");
  };

  const optionalNumber = (field: string): number | undefined => {
    const value = record[field];
    if (value == null) return undefined;
    return typeof value === "number" && Number.isFinite(value) ? value : fail(field, "a number");
  };

  const optionalDate = (field: string): Date | undefined => {
    const value = record[field];
    if (value == null) return undefined;
    return parseAcquiredAt(value) ?? fail(field, "an ISO timestamp");
  };

  return {
    string: (field: string): string => optionalString(field) ?? fail(field, "a string"),
    number: (field: string): number => optionalNumber(field) ?? fail(field, "a number"),
    date: (field: string): Date => optionalDate(field) ?? fail(field, "an ISO timestamp"),
    boolean: (field: string): boolean => {
      const value = record[field];
      return typeof value === "boolean" ? value : fail(field, "a boolean");
    },
    oneOf: <T extends string>(field: string, allowed: readonly T[]): T =>
      allowed.find((candidate) => candidate === record[field]) ?? fail(field, `one of ${allowed.join(", ")}`),
    optionalString,
    optionalNumber,
    optionalDate,
    fail
  };
};

const parseError = (value: unknown, where: string): JobError & SceneError => {
  if (!isRecord(value)) throw new InvalidOperationError(`${where}: lastError must be an object`);
  const read = fieldReader(value, `${where} lastError`);
  const error: JobError & SceneError = { code: read.string("code"), message: read.string("message"), at: read.date("at") };
  if (value.exitCode === null) error.exitCode = null;
  else {
    const exitCode = read.optionalNumber("exitCode");
    if (exitCode !== undefined) error.exitCode = exitCode;
  }
  const stderr = read.optionalString("stderr");
  if (stderr !== undefined) error.stderr = stderr;
  return error;
};

const parseStoredFootprint = (value: unknown): Footprint | undefined => {
  if (isRecord(value) && value.type === "BBox") return parseFootprint(value.bbox);
  return parseFootprint(value);
};

const parseScene = (value: unknown, index: number): Scene => {
  const where = `scenes[${index}]`;
  if (!isRecord(value)) throw new InvalidOperationError(`${where} must be an object`);
  const read = fieldReader(value, where);

  const attempts = isRecord(value.attemptCount) ? value.attemptCount : read.fail("attemptCount", "an object");
  const attemptOf = fieldReader(attempts, `${where} attemptCount`);
  const history = Array.isArray(value.statusHistory) ? value.statusHistory : read.fail("statusHistory", "an array");
  const statusHistory = history.map((entry: unknown, position): StatusChange => {
    if (!isRecord(entry)) return read.fail(`statusHistory[${position}]`, "an object");
    const change = fieldReader(entry, `${where} statusHistory[${position}]`);
    return { status: change.oneOf<SceneStatus>("status", sceneStatuses), at: change.date("at") };
  });
  const properties = isRecord(value.properties) ? value.properties : read.fail("properties", "an object");

  const scene: Scene = {
    _id: read.string("_id"),
    sensor: read.string("sensor"),
    providerId: read.string("providerId"),
    acquiredAt: read.date("acquiredAt"),
    discoveredAt: read.date("discoveredAt"),
    updatedAt: read.date("updatedAt"),
    properties,
    status: read.oneOf<SceneStatus>("status", sceneStatuses),
    attemptCount: { download: attemptOf.number("download"), process: attemptOf.number("process") },
    statusHistory
  };

  if (value.footprint != null) {
    scene.footprint = parseStoredFootprint(value.footprint) ?? read.fail("footprint", "a Polygon, MultiPolygon or BBox");
  }
  const cloudCover = read.optionalNumber("cloudCover");
  if (cloudCover !== undefined) scene.cloudCover = cloudCover;
  const localPath = read.optionalString("localPath");
  if (localPath !== undefined) scene.localPath = localPath;
  const checksum = read.optionalString("checksum");
  if (checksum !== undefined) scene.checksum = checksum;
  const ardPath = read.optionalString("ardPath");
  if (ardPath !== undefined) scene.ardPath = ardPath;
  if (value.lastError != null) scene.lastError = parseError(value.lastError, where);
  return scene;
};

const parseJob = (value: unknown, index: number): Job => {
  const where = `jobs[${index}]`;
  if (!isRecord(value)) throw new InvalidOperationError(`${where} must be an object`);
  const read = fieldReader(value, where);

  const job: Job = {
    _id: read.string("_id"),
    sceneId: read.string("sceneId"),
    sensor: read.string("sensor"),
    kind: read.oneOf<JobKind>("kind", jobKinds),
    state: read.oneOf<JobState>("state", jobStates),
    active: read.boolean("active"),
    attempt: read.number("attempt"),
    availableAt: read.date("availableAt"),
    version: read.number("version"),
    createdAt: read.date("createdAt"),
    updatedAt: read.date("updatedAt")
  };
  const leaseOwner = read.optionalString("leaseOwner");
  if (leaseOwner !== undefined) job.leaseOwner = leaseOwner;
  const leaseExpiresAt = read.optionalDate("leaseExpiresAt");
  if (leaseExpiresAt !== undefined) job.leaseExpiresAt = leaseExpiresAt;
  if (value.lastError != null) job.lastError = parseError(value.lastError, where);
  return job;
};

export const serializeSensorExport = (data: SensorExport): string =>
  JSON.stringify(
    {
      format: SENSOR_EXPORT_FORMAT,
      version: SENSOR_EXPORT_VERSION,
      sensor: data.sensor,
      exportedAt: data.exportedAt,
      scenes: data.scenes,
      jobs: data.jobs
    },
    null,
    2
  );

/** Parses and validates an export file; every scene and job must belong to its sensor. */
export const parseSensorExport = (text: string): SensorExport => {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new InvalidOperationError("Sensor export is not valid JSON", { cause: err });
  }
  if (!isRecord(json) || json.format !== SENSOR_EXPORT_FORMAT) {
    throw new InvalidOperationError(`Sensor export must have format ${SENSOR_EXPORT_FORMAT}`);
  }
  if (json.version !== SENSOR_EXPORT_VERSION) {
    throw new InvalidOperationError(`Unsupported sensor export version ${String(json.version)}`);
  }

  const read = fieldReader(json, "Sensor export");
  const sensor = read.string("sensor");
  const sceneRows = Array.isArray(json.scenes) ? json.scenes : read.fail("scenes", "an array");
  const jobRows = Array.isArray(json.jobs) ? json.jobs : read.fail("jobs", "an array");
  const scenes = sceneRows.map(parseScene);
  const jobs = jobRows.map(parseJob);

  const foreign = [...scenes, ...jobs].find((row) => row.sensor !== sensor);
  if (foreign) {
    throw new InvalidOperationError(`Sensor export for ${sensor} contains a record of sensor ${foreign.sensor}`);
  }
  return { sensor, exportedAt: read.date("exportedAt"), scenes, jobs };
};

/** A JSON object mapping path prefixes of the exporting system to local ones. */
export const parsePathMap = (text: string): Record<string, string> => {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new InvalidOperationError("Path map is not valid JSON", { cause: err });
  }
  if (!isRecord(json)) throw new InvalidOperationError("Path map must be a JSON object");
  const pathMap: Record<string, string> = {};
  for (const [from, to] of Object.entries(json)) {
    if (typeof to !== "string") throw new InvalidOperationError(`Path map entry ${from} must be a string`);
    pathMap[from] = to;
  }
  return pathMap;
};
