import { MongoServerError } from "mongodb";
import { DatabaseConflictError, LeaseLostError, WriteConflictError } from "../../src/core/errors";
import { buildScene } from "../../src/core/scene/sceneMetadata";
import { buildSceneUpdate, leaseFilter, MongoStateStore } from "../../src/infrastructure/mongo/MongoStateStore";
import { makeDescriptor } from "../support/fakes";

const now = new Date("2024-05-01T00:00:00.000Z");
const lease = { jobId: "j1", owner: "host:1:abcd/w0", version: 3 };

type FakeCollections = {
  scenes: { insertOne: jest.Mock; updateOne: jest.Mock };
  jobs: { insertOne: jest.Mock; updateOne: jest.Mock; findOneAndUpdate: jest.Mock };
  sensors: { distinct: jest.Mock };
  endSession: jest.Mock;
};

const withFakeCollections = (store: MongoStateStore): FakeCollections => {
  const endSession = jest.fn().mockResolvedValue(undefined);
  const session = {
    withTransaction: async (fn: () => Promise<void>) => {
      await fn();
    },
    endSession
  };
  const fakes = {
    scenes: { insertOne: jest.fn().mockResolvedValue({}), updateOne: jest.fn().mockResolvedValue({ matchedCount: 1 }) },
    jobs: {
      insertOne: jest.fn().mockResolvedValue({}),
      updateOne: jest.fn().mockResolvedValue({ matchedCount: 1 }),
      findOneAndUpdate: jest.fn().mockResolvedValue(null)
    },
    sensors: { distinct: jest.fn().mockResolvedValue([]) }
  };
  (store as unknown as { connecting?: Promise<unknown> }).connecting = Promise.resolve({
    client: { startSession: () => session },
    scenes: fakes.scenes,
    jobs: fakes.jobs,
    sensors: fakes.sensors
  });
  return { ...fakes, endSession };
};

describe("MongoStateStore", () => {
  it("fences lease writes on job id, owner and version", () => {
    expect(leaseFilter(lease)).toEqual({ _id: "j1", state: "leased", leaseOwner: "host:1:abcd/w0", version: 3 });
  });

  it("builds scene updates with dotted attempt counters and history", () => {
    const update = buildSceneUpdate(
      { id: "sc1", from: ["download_failed"], to: "discovered", patch: { attemptCount: { download: 0 }, lastError: null } },
      now
    );

    expect(update).toEqual({
      $set: { status: "discovered", updatedAt: now, "attemptCount.download": 0 },
      $push: { statusHistory: { status: "discovered", at: now } },
      $unset: { lastError: "" }
    });
  });

  it("inserts a scene together with its first job", async () => {
    const store = new MongoStateStore("mongodb://localhost:27017/eodd");
    const fakes = withFakeCollections(store);
    const scene = buildScene("s1", makeDescriptor("A1"), now);

    await expect(
      store.recordDiscovery(scene, { sceneId: scene._id, sensor: "s1", kind: "download", attempt: 1, availableAt: now })
    ).resolves.toBe("inserted");

    expect(fakes.scenes.insertOne).toHaveBeenCalledWith(scene, expect.anything());
    expect(fakes.jobs.insertOne).toHaveBeenCalledWith(
      expect.objectContaining({ sceneId: scene._id, kind: "download", state: "queued", active: true, version: 0 }),
      expect.anything()
    );
    expect(fakes.endSession).toHaveBeenCalledTimes(1);
  });

  it("reports duplicate discoveries instead of failing", async () => {
    const store = new MongoStateStore("mongodb://localhost:27017/eodd");
    const fakes = withFakeCollections(store);
    fakes.scenes.insertOne.mockRejectedValue(new MongoServerError({ message: "E11000 duplicate key", code: 11000 }));

    await expect(store.recordDiscovery(buildScene("s1", makeDescriptor("A1"), now))).resolves.toBe("duplicate");
  });

  it("throws LeaseLostError and writes nothing else when the lease is gone", async () => {
    const store = new MongoStateStore("mongodb://localhost:27017/eodd");
    const fakes = withFakeCollections(store);
    fakes.jobs.updateOne.mockResolvedValue({ matchedCount: 0 });

    await expect(
      store.applyTransition({
        now,
        lease,
        job: { state: "succeeded" },
        scene: { id: "sc1", from: ["downloading"], to: "downloaded" }
      })
    ).rejects.toBeInstanceOf(LeaseLostError);
    expect(fakes.scenes.updateOne).not.toHaveBeenCalled();
  });

  it("throws DatabaseConflictError when the scene left the expected status", async () => {
    const store = new MongoStateStore("mongodb://localhost:27017/eodd");
    const fakes = withFakeCollections(store);
    fakes.scenes.updateOne.mockResolvedValue({ matchedCount: 0 });

    await expect(
      store.applyTransition({ now, scene: { id: "sc1", from: ["processed"], to: "archived" } })
    ).rejects.toThrow("Scene sc1 is not in [processed]; cannot move to archived");
    expect(fakes.jobs.insertOne).not.toHaveBeenCalled();
  });

  it("closes the job, moves the scene and enqueues the follow-up job", async () => {
    const store = new MongoStateStore("mongodb://localhost:27017/eodd");
    const fakes = withFakeCollections(store);

    await store.applyTransition({
      now,
      lease,
      job: { state: "succeeded" },
      scene: { id: "sc1", from: ["downloading"], to: "downloaded", patch: { localPath: "/data/a", checksum: "md5:aa" } },
      enqueue: { sceneId: "sc1", sensor: "s1", kind: "process", attempt: 1, availableAt: now }
    });

    expect(fakes.jobs.updateOne).toHaveBeenCalledWith(
      leaseFilter(lease),
      {
        $set: { state: "succeeded", active: false, updatedAt: now },
        $unset: { leaseOwner: "", leaseExpiresAt: "" },
        $inc: { version: 1 }
      },
      expect.anything()
    );
    expect(fakes.scenes.updateOne).toHaveBeenCalledWith(
      { _id: "sc1", status: { $in: ["downloading"] } },
      expect.objectContaining({ $set: { status: "downloaded", updatedAt: now, localPath: "/data/a", checksum: "md5:aa" } }),
      expect.anything()
    );
    expect(fakes.jobs.insertOne).toHaveBeenCalledWith(
      expect.objectContaining({ sceneId: "sc1", kind: "process", attempt: 1, state: "queued" }),
      expect.anything()
    );
  });

  it("retries transactions that lose a write conflict", async () => {
    const store = new MongoStateStore("mongodb://localhost:27017/eodd");
    const fakes = withFakeCollections(store);
    fakes.scenes.updateOne.mockRejectedValueOnce(new MongoServerError({ message: "WriteConflict", code: 112 }));

    await expect(
      store.applyTransition({ now, scene: { id: "sc1", from: ["processed"], to: "archived" } })
    ).resolves.toBeUndefined();
    expect(fakes.scenes.updateOne).toHaveBeenCalledTimes(2);
    expect(fakes.endSession).toHaveBeenCalledTimes(2);
  });

  it("reports a write conflict that outlasts its retries as WriteConflictError", async () => {
    const store = new MongoStateStore("mongodb://localhost:27017/eodd");
    const fakes = withFakeCollections(store);
    fakes.scenes.updateOne.mockRejectedValue(new MongoServerError({ message: "WriteConflict", code: 112 }));

    const result = store.applyTransition({ now, scene: { id: "sc1", from: ["processed"], to: "archived" } });

    await expect(result).rejects.toBeInstanceOf(WriteConflictError);
    await expect(result).rejects.not.toBeInstanceOf(DatabaseConflictError);
    expect(fakes.scenes.updateOne).toHaveBeenCalledTimes(4);
    expect(fakes.endSession).toHaveBeenCalledTimes(4);
  });

  it("leaves the jobs of suspended sensors out of claims", async () => {
    const store = new MongoStateStore("mongodb://localhost:27017/eodd");
    const fakes = withFakeCollections(store);
    fakes.sensors.distinct.mockResolvedValue(["s2"]);

    await expect(store.claimNextJob({ owner: "host:1:abcd/w0", now, leaseDurationMs: 60_000 })).resolves.toBeNull();

    expect(fakes.sensors.distinct).toHaveBeenCalledWith("_id", { suspended: true });
    expect(fakes.jobs.findOneAndUpdate).toHaveBeenCalledWith(
      {
        $or: [
          { state: "queued", availableAt: { $lte: now } },
          { state: "leased", leaseExpiresAt: { $lte: now } }
        ],
        sensor: { $nin: ["s2"] }
      },
      expect.objectContaining({ $inc: { version: 1 } }),
      { sort: { createdAt: 1 }, returnDocument: "after" }
    );
  });

  it("reports lost leases on renewal", async () => {
    const store = new MongoStateStore("mongodb://localhost:27017/eodd");
    const fakes = withFakeCollections(store);
    fakes.jobs.updateOne.mockResolvedValue({ matchedCount: 0 });

    await expect(store.renewLease({ lease, now, leaseDurationMs: 60_000 })).resolves.toBe(false);
    expect(fakes.jobs.updateOne).toHaveBeenCalledWith(leaseFilter(lease), {
      $set: { leaseExpiresAt: new Date("2024-05-01T00:01:00.000Z"), updatedAt: now }
    });
  });

  it("closes without connecting when never used", async () => {
    const store = new MongoStateStore("mongodb://localhost:27017/eodd");
    await expect(store.close()).resolves.toBeUndefined();
  });
});
