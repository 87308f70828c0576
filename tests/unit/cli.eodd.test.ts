import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { buildScene } from "../../src/core/scene/sceneMetadata";
import { InMemoryStateStore } from "../support/InMemoryStateStore";
import { makeDescriptor } from "../support/fakes";

describe("eodd CLI", () => {
  const envSnapshot = { ...process.env };

  afterEach(() => {
    process.env = { ...envSnapshot };
    jest.resetModules();
    jest.restoreAllMocks();
  });

  it("builds a controlled error envelope without stack by default", async () => {
    const { buildCliErrorEnvelope } = await import("../../src/cli/eodd");

    const error = Object.assign(new Error("Catalog request rejected credentials: 401"), {
      name: "AuthenticationError",
      code: "authentication_failed",
      status: 401,
      cause: { headers: { "x-api-key": "test-secret" } }
    });

    const envelope = buildCliErrorEnvelope(error, false, "poll");

    expect(envelope).toEqual({
      event: "command.failed",
      command: "poll",
      name: "AuthenticationError",
      message: "Catalog request rejected credentials: 401",
      code: "authentication_failed",
      status: 401
    });
    expect(JSON.stringify(envelope)).not.toContain("test-secret");
  });

  it("includes stack only when debug mode is enabled", async () => {
    const { buildCliErrorEnvelope, isDebugMode } = await import("../../src/cli/eodd");

    expect(buildCliErrorEnvelope(new Error("boom"), true).stack).toContain("Error: boom");
    expect(buildCliErrorEnvelope("plain", false)).toEqual({ event: "command.failed", name: "Error", message: "plain" });
    expect(isDebugMode({ DEBUG: "true" })).toBe(true);
    expect(isDebugMode({ DEBUG: "0" })).toBe(false);
  });

  it("validates list options", async () => {
    const { parseLimit, parseStatus } = await import("../../src/cli/eodd");

    expect(parseLimit("25")).toBe(25);
    expect(() => parseLimit("0")).toThrow("must be an integer in [1..10000]");
    expect(parseStatus("download_failed")).toBe("download_failed");
    expect(() => parseStatus("lost")).toThrow("must be one of discovered, downloading");
  });

  it("prints the status report and closes the store", async () => {
    const store = new InMemoryStateStore();
    const close = jest.spyOn(store, "close");
    jest.doMock("../../src/composition/root", () => ({
      openAdmin: () => ({ store }),
      createPipeline: jest.fn(),
      runPipeline: jest.fn()
    }));
    const logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);

    const { executeCli } = await import("../../src/cli/eodd");
    await executeCli(["node", "eodd", "report"]);

    expect(JSON.parse(String(logSpy.mock.calls[0]?.[0]))).toEqual({ rows: [], totals: {} });
    expect(close).toHaveBeenCalledTimes(1);
  });

  it("runs the pipeline for the run command", async () => {
    const runPipeline = jest.fn().mockResolvedValue(undefined);
    jest.doMock("../../src/composition/root", () => ({ openAdmin: jest.fn(), createPipeline: jest.fn(), runPipeline }));

    const { executeCli } = await import("../../src/cli/eodd");
    await executeCli(["node", "eodd", "run"]);

    expect(runPipeline).toHaveBeenCalledTimes(1);
  });

  it("logs a sanitized envelope and exits with code 1 on failure", async () => {
    process.env = { ...envSnapshot, DEBUG: "0" };
    const store = new InMemoryStateStore();
    const close = jest.spyOn(store, "close");
    jest.doMock("../../src/composition/root", () => ({
      openAdmin: () => ({ store }),
      createPipeline: jest.fn(),
      runPipeline: jest.fn()
    }));

    const errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    const exitSpy = jest.spyOn(process, "exit").mockImplementation(((code?: number) => {
      throw new Error(`EXIT:${String(code)}`);
    }) as never);

    const { executeCli } = await import("../../src/cli/eodd");
    await expect(executeCli(["node", "eodd", "reset", "missing-scene"])).rejects.toThrow("EXIT:1");

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(errorSpy.mock.calls[0]?.[0]))).toEqual({
      event: "command.failed",
      command: "reset",
      name: "NotFoundError",
      message: "Scene missing-scene does not exist",
      code: "not_found"
    });
    expect(close).toHaveBeenCalledTimes(1);
    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it("passes --from-start through to the poller", async () => {
    const pollOnce = jest.fn().mockResolvedValue([]);
    const close = jest.fn().mockResolvedValue(undefined);
    jest.doMock("../../src/composition/root", () => ({
      openAdmin: jest.fn(),
      createPipeline: jest.fn().mockResolvedValue({ poller: { pollOnce }, store: { close } }),
      runPipeline: jest.fn()
    }));
    jest.spyOn(console, "log").mockImplementation(() => undefined);

    const { executeCli } = await import("../../src/cli/eodd");
    await executeCli(["node", "eodd", "poll", "--sensor", "s1", "--from-start"]);
    await executeCli(["node", "eodd", "poll"]);

    expect(pollOnce.mock.calls).toEqual([
      ["s1", { fromStart: true }],
      [undefined, { fromStart: false }]
    ]);
    expect(close).toHaveBeenCalledTimes(2);
  });

  it("exports a sensor to a file that the import command reads back", async () => {
    const dir = await mkdtemp(path.join(tmpdir(), "eodd-cli-"));
    try {
      const source = new InMemoryStateStore();
      const scene = buildScene("s1", makeDescriptor("A1"), new Date("2024-05-01T00:00:00.000Z"));
      await source.recordDiscovery(scene, {
        sceneId: scene._id,
        sensor: "s1",
        kind: "download",
        attempt: 1,
        availableAt: scene.discoveredAt
      });
      const target = new InMemoryStateStore();
      const stores = [source, target];
      jest.doMock("../../src/composition/root", () => ({
        openAdmin: () => {
          const store = stores.shift();
          if (!store) throw new Error("no store left");
          return { store };
        },
        createPipeline: jest.fn(),
        runPipeline: jest.fn()
      }));
      const logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);
      const file = path.join(dir, "s1.json");

      const { executeCli } = await import("../../src/cli/eodd");
      await executeCli(["node", "eodd", "export", "--sensor", "s1", "--out", file]);
      await executeCli(["node", "eodd", "import", file]);

      expect(JSON.parse(String(logSpy.mock.calls[logSpy.mock.calls.length - 1]?.[0]))).toEqual({
        sensor: "s1",
        inserted: 1,
        duplicates: 0
      });
      expect(target.scenes.get(scene._id)).toEqual(source.scenes.get(scene._id));
      expect(Array.from(target.jobs.values()).map((job) => [job.kind, job.state])).toEqual([["download", "queued"]]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
