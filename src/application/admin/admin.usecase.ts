import { ConfigurationError, InvalidOperationError, NotFoundError } from "../../core/errors";
import type { Job } from "../../core/jobs/Job";
import { canRedownload, resetTargetOf } from "../../core/scene/sceneLifecycle";
import type { Scene, ScenePatch } from "../../core/scene/scene.types";
import type { StorageLayout } from "../../infrastructure/storage/storageLayout";
import { removePath } from "../../infrastructure/storage/storageLayout";
import type { DiscoveryOutcome, SceneQuery, StateStore, StatusCount } from "../../ports/StateStore";
import { systemClock, type Clock } from "../../shared/time/sleep";
import type { SensorExport } from "./sensorRecords";

export type AdminDeps = {
  store: StateStore;
  /** Needed by operations that delete scene files. */
  storage?: StorageLayout;
  clock?: Clock;
};

export type ResetOptions = {
  /** Drop the local copy and start over from the download. */
  redownload?: boolean;
};

export type ImportOptions = {
  /** Path prefixes to rewrite, for records produced on another machine. */
  pathMap?: Readonly<Record<string, string>>;
};

export type ImportSummary = {
  sensor: string;
  inserted: number;
  duplicates: number;
};

export type StatusReport = {
  rows: StatusCount[];
  totals: Record<string, number>;
};

export const getScene = async (deps: AdminDeps, sceneId: string): Promise<Scene> => {
  const scene = await deps.store.getScene(sceneId);
  if (!scene) throw new NotFoundError(`Scene ${sceneId} does not exist`);
  return scene;
};

const redownloadScene = async (deps: AdminDeps, scene: Scene): Promise<void> => {
  const clock = deps.clock ?? systemClock;
  if (!deps.storage) throw new ConfigurationError("Deleting scene files needs the storage root");
  await removePath(deps.storage.sceneDir(scene.sensor, scene.providerId));
  await removePath(deps.storage.ardDir(scene.sensor, scene.providerId));

  const now = clock();
  await deps.store.applyTransition({
    now,
    scene: {
      id: scene._id,
      from: [scene.status],
      to: "discovered",
      patch: { localPath: null, checksum: null, ardPath: null, attemptCount: { download: 0, process: 0 }, lastError: null }
    },
    enqueue: { sceneId: scene._id, sensor: scene.sensor, kind: "download", attempt: 1, availableAt: now }
  });
  console.log(JSON.stringify({ event: "admin.scene_reset", sceneId: scene._id, from: scene.status, to: "discovered", kind: "download" }));
};

/**
 * Moves a terminally failed scene back to the status its failed step starts
 * from and queues a fresh job with a new attempt budget. With `redownload`
 * the scene's files are deleted and it starts over from the download.
 */
export const resetScene = async (deps: AdminDeps, sceneId: string, options: ResetOptions = {}): Promise<Scene> => {
  const clock = deps.clock ?? systemClock;
  const scene = await getScene(deps, sceneId);

  if (options.redownload) {
    if (!canRedownload(scene.status)) {
      throw new InvalidOperationError(`Scene ${sceneId} is ${scene.status}; only download_failed and processing_failed scenes can be downloaded again`);
    }
    await redownloadScene(deps, scene);
    return getScene(deps, sceneId);
  }

  const target = resetTargetOf(scene.status);
  if (!target) {
    throw new InvalidOperationError(`Scene ${sceneId} is ${scene.status}; only download_failed and processing_failed scenes can be reset`);
  }

  const now = clock();
  const patch: ScenePatch = {
    attemptCount: target.kind === "download" ? { download: 0 } : { process: 0 },
    lastError: null
  };
  await deps.store.applyTransition({
    now,
    scene: { id: scene._id, from: [scene.status], to: target.to, patch },
    enqueue: { sceneId: scene._id, sensor: scene.sensor, kind: target.kind, attempt: 1, availableAt: now }
  });

  console.log(JSON.stringify({ event: "admin.scene_reset", sceneId, from: scene.status, to: target.to, kind: target.kind }));
  return getScene(deps, sceneId);
};

const UNPROCESSED_PAGE_SIZE = 100;

/**
 * Sends every scene of `sensor` that was downloaded but could not be turned
 * into ARD back to the download, deleting its files. Returns the reset ids.
 */
export const resetUnprocessedScenes = async (deps: AdminDeps, sensor: string): Promise<string[]> => {
  const reset: string[] = [];
  for (;;) {
    const page = await deps.store.listScenes({ sensor, status: "processing_failed", limit: UNPROCESSED_PAGE_SIZE });
    if (page.length === 0) break;
    for (const scene of page) {
      await redownloadScene(deps, scene);
      reset.push(scene._id);
    }
  }
  console.log(JSON.stringify({ event: "admin.unprocessed_reset", sensor, count: reset.length }));
  return reset;
};

export const archiveScene = async (deps: AdminDeps, sceneId: string): Promise<Scene> => {
  const clock = deps.clock ?? systemClock;
  const scene = await getScene(deps, sceneId);
  if (scene.status !== "processed") {
    throw new InvalidOperationError(`Scene ${sceneId} is ${scene.status}; only processed scenes can be archived`);
  }

  await deps.store.applyTransition({ now: clock(), scene: { id: scene._id, from: ["processed"], to: "archived" } });
  console.log(JSON.stringify({ event: "admin.scene_archived", sceneId }));
  return getScene(deps, sceneId);
};

export const resumeSensor = async (deps: AdminDeps, sensor: string): Promise<boolean> => {
  const resumed = await deps.store.resumeSensor(sensor);
  console.log(JSON.stringify({ event: resumed ? "admin.sensor_resumed" : "admin.sensor_not_suspended", sensor }));
  return resumed;
};

export const statusReport = async (deps: AdminDeps, sensor?: string): Promise<StatusReport> => {
  const rows = await deps.store.countScenesByStatus(sensor);
  const totals: Record<string, number> = {};
  for (const row of rows) {
    totals[row.status] = (totals[row.status] ?? 0) + row.count;
  }
  return { rows, totals };
};

export const listScenes = (deps: AdminDeps, query: SceneQuery): Promise<Scene[]> => deps.store.listScenes(query);

export const listJobs = async (deps: AdminDeps, sceneId: string): Promise<Job[]> => {
  await getScene(deps, sceneId);
  return deps.store.listJobs(sceneId);
};

export const exportSensorRecords = async (deps: AdminDeps, sensor: string): Promise<SensorExport> => {
  const clock = deps.clock ?? systemClock;
  const records = await deps.store.listSensorRecords(sensor);
  console.log(JSON.stringify({ event: "admin.sensor_exported", sensor, scenes: records.scenes.length, jobs: records.jobs.length }));
  return { sensor, exportedAt: clock(), ...records };
};

const rewritePath = (value: string, pathMap: Readonly<Record<string, string>>): string => {
  const prefix = Object.keys(pathMap)
    .filter((candidate) => value.startsWith(candidate))
    .sort((a, b) => b.length - a.length)[0];
  return prefix === undefined ? value : `${pathMap[prefix]}${value.slice(prefix.length)}`;
};

/** A lease taken on the exporting system is never held here. */
const requeueImported = (job: Job, now: Date): Job => {
  if (job.state !== "leased") return job;
  const requeued: Job = { ...job, state: "queued", version: job.version + 1, updatedAt: now };
  delete requeued.leaseOwner;
  delete requeued.leaseExpiresAt;
  return requeued;
};

/**
 * Adds the scenes and jobs of an export to the store. Scenes already known
 * (by id or by provider id) are skipped together with their jobs.
 */
export const importSensorRecords = async (
  deps: AdminDeps,
  data: SensorExport,
  options: ImportOptions = {}
): Promise<ImportSummary> => {
  const clock = deps.clock ?? systemClock;
  const now = clock();
  const pathMap = options.pathMap ?? {};
  const jobsByScene = new Map<string, Job[]>();
  for (const job of data.jobs) {
    const list = jobsByScene.get(job.sceneId) ?? [];
    list.push(requeueImported(job, now));
    jobsByScene.set(job.sceneId, list);
  }

  const summary: ImportSummary = { sensor: data.sensor, inserted: 0, duplicates: 0 };
  for (const exported of data.scenes) {
    const scene: Scene = { ...exported };
    if (exported.localPath !== undefined) scene.localPath = rewritePath(exported.localPath, pathMap);
    if (exported.ardPath !== undefined) scene.ardPath = rewritePath(exported.ardPath, pathMap);
    const outcome: DiscoveryOutcome = await deps.store.importSceneRecords(scene, jobsByScene.get(scene._id) ?? []);
    if (outcome === "inserted") summary.inserted += 1;
    else summary.duplicates += 1;
  }

  console.log(JSON.stringify({ event: "admin.sensor_imported", ...summary }));
  return summary;
};
