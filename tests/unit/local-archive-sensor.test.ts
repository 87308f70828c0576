import { mkdir, mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { ConfigurationError, InvalidSceneError, TransientNetworkError } from "../../src/core/errors";
import type { SceneDescriptor } from "../../src/core/scene/scene.types";
import {
  localArchivePlugin,
  parseLocalArchiveOptions,
  toArchiveDescriptor,
  type LocalArchiveOptions
} from "../../src/infrastructure/sensors/LocalArchiveSensor";

const window = { start: new Date("2024-04-01T00:00:00.000Z"), end: new Date("2024-05-01T00:00:00.000Z") };
const footprint = [10, 50, 11, 51];

describe("local archive sensor", () => {
  let root: string;
  let options: LocalArchiveOptions;

  const writeManifest = async (scenes: unknown[]) => {
    await writeFile(path.join(root, "manifest.json"), JSON.stringify({ scenes }));
  };

  const collect = async (): Promise<SceneDescriptor[]> => {
    const found: SceneDescriptor[] = [];
    for await (const descriptor of localArchivePlugin.query(options, window, {})) found.push(descriptor);
    return found;
  };

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), "eodd-archive-"));
    options = parseLocalArchiveOptions({ manifestPath: path.join(root, "manifest.json"), ard: { program: "ard-convert" } }, "radar");
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("defaults the archive root to the manifest directory", () => {
    expect(options.archiveRoot).toBe(path.resolve(root));
    expect(() => parseLocalArchiveOptions({ ard: { program: "x" } }, "radar")).toThrow("radar: manifestPath is required");
  });

  it("maps manifest entries", () => {
    expect(toArchiveDescriptor({ id: 7, acquired: "2024-04-02T00:00:00Z", footprint, cloudCover: 3, path: "a/7.tif", md5: "aa" })).toEqual({
      providerId: "7",
      acquiredAt: new Date("2024-04-02T00:00:00.000Z"),
      footprint: { type: "BBox", bbox: [10, 50, 11, 51] },
      cloudCover: 3,
      properties: { path: "a/7.tif", md5: "aa" }
    });
  });

  it("yields entries inside the half-open window and those with unreadable times", async () => {
    await writeManifest([
      { id: "before", acquired: "2024-03-31T23:59:59Z", footprint, path: "before.tif" },
      { id: "start", acquired: "2024-04-01T00:00:00Z", footprint, path: "start.tif" },
      { id: "end", acquired: "2024-05-01T00:00:00Z", footprint, path: "end.tif" },
      { id: "garbled", acquired: "someday", footprint, path: "garbled.tif" }
    ]);

    await expect(collect()).resolves.toEqual([
      expect.objectContaining({ providerId: "start" }),
      expect.objectContaining({ providerId: "garbled" })
    ]);
  });

  it("treats a missing manifest as transient and a broken one as misconfiguration", async () => {
    await expect(collect()).rejects.toBeInstanceOf(TransientNetworkError);

    await writeFile(path.join(root, "manifest.json"), "{");
    await expect(collect()).rejects.toBeInstanceOf(ConfigurationError);

    await writeFile(path.join(root, "manifest.json"), JSON.stringify({ items: [] }));
    await expect(collect()).rejects.toThrow('must contain a "scenes" array');
  });

  describe("download", () => {
    let destination: string;

    beforeEach(async () => {
      destination = path.join(root, "staging");
      await mkdir(path.join(root, "a"), { recursive: true });
      await mkdir(destination);
      await writeFile(path.join(root, "a", "7.tif"), "raster");
    });

    it("copies the file and prefers sha256 over md5", async () => {
      const descriptor = toArchiveDescriptor({ id: 7, path: "a/7.tif", sha256: " ABC ", md5: "def" });

      await expect(localArchivePlugin.download(options, descriptor, destination, {})).resolves.toEqual({
        fileName: "7.tif",
        integrity: { kind: "checksum", algorithm: "sha256", value: "ABC" }
      });
      await expect(readFile(path.join(destination, "7.tif"), "utf8")).resolves.toBe("raster");
    });

    it("falls back to the file size", async () => {
      const result = await localArchivePlugin.download(options, toArchiveDescriptor({ id: 7, path: "a/7.tif" }), destination, {});
      expect(result.integrity).toEqual({ kind: "size", bytes: 6 });
    });

    it("refuses paths that leave the archive", async () => {
      const descriptor = toArchiveDescriptor({ id: 8, path: "../outside.tif" });
      await expect(localArchivePlugin.download(options, descriptor, destination, {})).rejects.toBeInstanceOf(InvalidSceneError);
    });

    it("reports missing files as transient", async () => {
      const descriptor = toArchiveDescriptor({ id: 9, path: "a/9.tif" });
      await expect(localArchivePlugin.download(options, descriptor, destination, {})).rejects.toThrow(
        "Archive file for 9 is not reachable"
      );
    });
  });
});
