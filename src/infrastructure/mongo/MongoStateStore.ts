import type { ClientSession, Collection, Filter, MongoClient, UpdateFilter } from "mongodb";
import { DatabaseConflictError, LeaseLostError, WriteConflictError } from "../../core/errors";
import { createJob, type Job, type JobKind, type Lease, type NewJob } from "../../core/jobs/Job";
import type { Scene, SceneStatus } from "../../core/scene/scene.types";
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
} from "../../ports/StateStore";
import { retry } from "../../shared/retry/retry";
import { addMs } from "../../shared/time/sleep";
import { createMongoClient, isDuplicateKeyError, isWriteConflictError } from "./MongoClientFactory";
import { mongoIndexes } from "./mongo.indexes";

export type CollectionNames = {
  scenes: string;
  jobs: string;
  sensors: string;
};

export const defaultCollectionNames: CollectionNames = {
  scenes: "scenes",
  jobs: "jobs",
  sensors: "sensors"
};

type StoreCollections = {
  client: MongoClient;
  scenes: Collection<Scene>;
  jobs: Collection<Job>;
  sensors: Collection<SensorState>;
};

type SceneSet = Partial<Scene> & {
  "attemptCount.download"?: number;
  "attemptCount.process"?: number;
};

const DEFAULT_SCENE_LIST_LIMIT = 100;
const WRITE_CONFLICT_RETRIES = 3;

export const leaseFilter = (lease: Lease): Filter<Job> => ({
  _id: lease.jobId,
  state: "leased",
  leaseOwner: lease.owner,
  version: lease.version
});

const requeueUpdate = (now: Date): UpdateFilter<Job> => ({
  $set: { state: "queued", updatedAt: now },
  $unset: { leaseOwner: "", leaseExpiresAt: "" },
  $inc: { version: 1 }
});

export const buildSceneUpdate = (scene: NonNullable<Transition["scene"]>, now: Date): UpdateFilter<Scene> => {
  const patch = scene.patch ?? {};
  const set: SceneSet = { status: scene.to, updatedAt: now };
  if (patch.localPath != null) set.localPath = patch.localPath;
  if (patch.checksum != null) set.checksum = patch.checksum;
  if (patch.ardPath != null) set.ardPath = patch.ardPath;
  if (patch.attemptCount?.download != null) set["attemptCount.download"] = patch.attemptCount.download;
  if (patch.attemptCount?.process != null) set["attemptCount.process"] = patch.attemptCount.process;
  if (patch.lastError) set.lastError = patch.lastError;

  const unset: Partial<Record<"localPath" | "checksum" | "ardPath" | "lastError", "">> = {};
  if (patch.localPath === null) unset.localPath = "";
  if (patch.checksum === null) unset.checksum = "";
  if (patch.ardPath === null) unset.ardPath = "";
  if (patch.lastError === null) unset.lastError = "";

  const update: UpdateFilter<Scene> = {
    $set: set,
    $push: { statusHistory: { status: scene.to, at: now } }
  };
  if (Object.keys(unset).length > 0) update.$unset = unset;
  return update;
};

/**
 * State store on MongoDB. Multi-document changes run in a transaction, so the
 * server must be a replica set (a single-node one is enough).
 */
export class MongoStateStore implements StateStore {
  private connecting?: Promise<StoreCollections>;

  constructor(
    private readonly mongoUri: string,
    private readonly dbName = "eodd",
    private readonly names: CollectionNames = defaultCollectionNames
  ) {}

  private getCollections(): Promise<StoreCollections> {
    if (!this.connecting) {
      this.connecting = this.connect().catch((err: unknown) => {
        this.connecting = undefined;
        throw err;
      });
    }
    return this.connecting;
  }

  private async connect(): Promise<StoreCollections> {
    const client = await createMongoClient(this.mongoUri);
    const db = client.db(this.dbName);
    const scenes = db.collection<Scene>(this.names.scenes);
    const jobs = db.collection<Job>(this.names.jobs);
    const sensors = db.collection<SensorState>(this.names.sensors);

    // Index creation is idempotent; the unique indexes carry the dedup and
    // exclusivity guarantees, so they must exist before any write.
    for (const idx of mongoIndexes.scenes) {
      await scenes.createIndex(idx.keys, idx.options);
    }
    for (const idx of mongoIndexes.jobs) {
      await jobs.createIndex(idx.keys, idx.options);
    }

    return { client, scenes, jobs, sensors };
  }

  private async inTransaction(fn: (session: ClientSession, collections: StoreCollections) => Promise<void>): Promise<void> {
    const collections = await this.getCollections();
    // withTransaction already retries transient errors for a while; a conflict
    // that outlives those gets a few more immediate attempts here.
    await retry(() => this.runTransaction(collections, fn), {
      retries: WRITE_CONFLICT_RETRIES,
      minDelayMs: 10,
      maxDelayMs: 100,
      shouldRetry: (err) => err instanceof WriteConflictError
    });
  }

  private async runTransaction(
    collections: StoreCollections,
    fn: (session: ClientSession, collections: StoreCollections) => Promise<void>
  ): Promise<void> {
    const session = collections.client.startSession();
    try {
      await session.withTransaction(() => fn(session, collections));
    } catch (err) {
      if (isWriteConflictError(err)) {
        throw new WriteConflictError("Transaction aborted by a concurrent write", { cause: err });
      }
      throw err;
    } finally {
      await session.endSession();
    }
  }

  async recordDiscovery(scene: Scene, job?: NewJob): Promise<DiscoveryOutcome> {
    try {
      await this.inTransaction(async (session, { scenes, jobs }) => {
        await scenes.insertOne(scene, { session });
        if (job) {
          await jobs.insertOne(createJob(job, scene.discoveredAt), { session });
        }
      });
      return "inserted";
    } catch (err) {
      if (isDuplicateKeyError(err)) return "duplicate";
      throw err;
    }
  }

  async findSceneByProviderId(sensor: string, providerId: string): Promise<Scene | null> {
    const { scenes } = await this.getCollections();
    return scenes.findOne({ sensor, providerId });
  }

  async getScene(sceneId: string): Promise<Scene | null> {
    const { scenes } = await this.getCollections();
    return scenes.findOne({ _id: sceneId });
  }

  async listScenes(query: SceneQuery): Promise<Scene[]> {
    const { scenes } = await this.getCollections();
    const filter: Filter<Scene> = {};
    if (query.sensor) filter.sensor = query.sensor;
    if (query.status) filter.status = query.status;
    return scenes
      .find(filter)
      .sort({ discoveredAt: -1 })
      .limit(query.limit ?? DEFAULT_SCENE_LIST_LIMIT)
      .toArray();
  }

  async latestAcquiredAt(sensor: string): Promise<Date | null> {
    const { scenes } = await this.getCollections();
    const latest = await scenes.findOne(
      { sensor, status: { $ne: "invalid" } },
      { sort: { acquiredAt: -1 }, projection: { acquiredAt: 1 } }
    );
    return latest?.acquiredAt ?? null;
  }

  async countScenesByStatus(sensor?: string): Promise<StatusCount[]> {
    const { scenes } = await this.getCollections();
    const rows = await scenes
      .aggregate<{ _id: { sensor: string; status: SceneStatus }; count: number }>([
        { $match: sensor ? { sensor } : {} },
        { $group: { _id: { sensor: "$sensor", status: "$status" }, count: { $sum: 1 } } },
        { $sort: { "_id.sensor": 1, "_id.status": 1 } }
      ])
      .toArray();
    return rows.map((row) => ({ sensor: row._id.sensor, status: row._id.status, count: row.count }));
  }

  async getJob(jobId: string): Promise<Job | null> {
    const { jobs } = await this.getCollections();
    return jobs.findOne({ _id: jobId });
  }

  async listJobs(sceneId: string, kind?: JobKind): Promise<Job[]> {
    const { jobs } = await this.getCollections();
    const filter: Filter<Job> = kind ? { sceneId, kind } : { sceneId };
    return jobs.find(filter).sort({ createdAt: 1 }).toArray();
  }

  async claimNextJob(request: ClaimRequest): Promise<Job | null> {
    const { jobs, sensors } = await this.getCollections();
    const { owner, now, leaseDurationMs } = request;
    const suspended = await sensors.distinct("_id", { suspended: true });
    try {
      // Single-document find-and-modify: two claimers can never both match
      // the same job. An expired lease is taken over directly; the version
      // bump fences out its previous owner.
      return await jobs.findOneAndUpdate(
        {
          $or: [
            { state: "queued", availableAt: { $lte: now } },
            { state: "leased", leaseExpiresAt: { $lte: now } }
          ],
          ...(suspended.length > 0 ? { sensor: { $nin: suspended } } : {})
        },
        {
          $set: {
            state: "leased",
            leaseOwner: owner,
            leaseExpiresAt: addMs(now, leaseDurationMs),
            updatedAt: now
          },
          $inc: { version: 1 }
        },
        { sort: { createdAt: 1 }, returnDocument: "after" }
      );
    } catch (err) {
      if (isWriteConflictError(err)) {
        throw new WriteConflictError("Claim lost a write conflict", { cause: err });
      }
      throw err;
    }
  }

  async renewLease(renewal: LeaseRenewal): Promise<boolean> {
    const { jobs } = await this.getCollections();
    const res = await jobs.updateOne(leaseFilter(renewal.lease), {
      $set: { leaseExpiresAt: addMs(renewal.now, renewal.leaseDurationMs), updatedAt: renewal.now }
    });
    return res.matchedCount === 1;
  }

  async releaseLease(lease: Lease, now: Date): Promise<boolean> {
    const { jobs } = await this.getCollections();
    const res = await jobs.updateOne(leaseFilter(lease), requeueUpdate(now));
    return res.matchedCount === 1;
  }

  async reapExpiredLeases(now: Date): Promise<number> {
    const { jobs } = await this.getCollections();
    const res = await jobs.updateMany({ state: "leased", leaseExpiresAt: { $lte: now } }, requeueUpdate(now));
    return res.modifiedCount;
  }

  async applyTransition(transition: Transition): Promise<void> {
    const { now, lease } = transition;
    await this.inTransaction(async (session, { scenes, jobs }) => {
      if (lease) {
        const update: UpdateFilter<Job> = transition.job
          ? {
              $set: {
                state: transition.job.state,
                active: false,
                updatedAt: now,
                ...(transition.job.lastError ? { lastError: transition.job.lastError } : {})
              },
              $unset: { leaseOwner: "", leaseExpiresAt: "" },
              $inc: { version: 1 }
            }
          : { $set: { updatedAt: now } };
        const res = await jobs.updateOne(leaseFilter(lease), update, { session });
        if (res.matchedCount !== 1) throw new LeaseLostError(lease.jobId);
      }

      if (transition.scene) {
        const { id, from, to } = transition.scene;
        const res = await scenes.updateOne(
          { _id: id, status: { $in: [...from] } },
          buildSceneUpdate(transition.scene, now),
          { session }
        );
        if (res.matchedCount !== 1) {
          throw new DatabaseConflictError(`Scene ${id} is not in [${from.join(", ")}]; cannot move to ${to}`);
        }
      }

      if (transition.enqueue) {
        await jobs.insertOne(createJob(transition.enqueue, now), { session });
      }
    });
  }

  async listSensorRecords(sensor: string): Promise<SensorRecords> {
    const { scenes, jobs } = await this.getCollections();
    const [sceneRows, jobRows] = await Promise.all([
      scenes.find({ sensor }).sort({ discoveredAt: 1, _id: 1 }).toArray(),
      jobs.find({ sensor }).sort({ createdAt: 1, _id: 1 }).toArray()
    ]);
    return { scenes: sceneRows, jobs: jobRows };
  }

  async importSceneRecords(scene: Scene, jobRows: readonly Job[]): Promise<DiscoveryOutcome> {
    try {
      await this.inTransaction(async (session, { scenes, jobs }) => {
        await scenes.insertOne(scene, { session });
        if (jobRows.length > 0) await jobs.insertMany([...jobRows], { session });
      });
      return "inserted";
    } catch (err) {
      if (isDuplicateKeyError(err)) return "duplicate";
      throw err;
    }
  }

  async getSensorState(sensor: string): Promise<SensorState | null> {
    const { sensors } = await this.getCollections();
    return sensors.findOne({ _id: sensor });
  }

  async suspendSensor(sensor: string, reason: string, now: Date): Promise<void> {
    const { sensors } = await this.getCollections();
    await sensors.updateOne(
      { _id: sensor },
      { $set: { suspended: true, suspendedReason: reason, suspendedAt: now } },
      { upsert: true }
    );
  }

  async resumeSensor(sensor: string): Promise<boolean> {
    const { sensors } = await this.getCollections();
    const res = await sensors.updateOne(
      { _id: sensor, suspended: true },
      { $set: { suspended: false }, $unset: { suspendedReason: "", suspendedAt: "" } }
    );
    return res.modifiedCount === 1;
  }

  async markPolled(sensor: string, polledAt: Date, retryFrom?: Date): Promise<void> {
    const { sensors } = await this.getCollections();
    const update: UpdateFilter<SensorState> = retryFrom
      ? { $set: { lastPolledAt: polledAt, retryFrom }, $setOnInsert: { suspended: false } }
      : { $set: { lastPolledAt: polledAt }, $unset: { retryFrom: "" }, $setOnInsert: { suspended: false } };
    await sensors.updateOne({ _id: sensor }, update, { upsert: true });
  }


  async close(): Promise<void> {
    const connecting = this.connecting;
    this.connecting = undefined;
    if (!connecting) return;
    const { client } = await connecting;
    await client.close();
  }
}
