import { mkdir, mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { createStorageLayout, promoteDirectory, toPathSegment } from "../../src/infrastructure/storage/storageLayout";

describe("storage layout", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), "eodd-storage-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("keeps safe identifiers as they are", () => {
    expect(toPathSegment("S2A_MSIL1C_20240420T101031")).toBe("S2A_MSIL1C_20240420T101031");
    expect(toPathSegment("LC09.L1TP-042")).toBe("LC09.L1TP-042");
  });

  it("gives identifiers that clean to the same text different segments", () => {
    const colon = toPathSegment("A:1");
    const slash = toPathSegment("A/1");

    expect(colon).toMatch(/^A_1~[0-9a-f]{12}$/);
    expect(slash).toMatch(/^A_1~[0-9a-f]{12}$/);
    expect(new Set([colon, slash, toPathSegment("A_1")]).size).toBe(3);
    expect(toPathSegment("A:1")).toBe(colon);
  });

  it("never yields dot segments or empty ones", () => {
    expect(toPathSegment("..")).toMatch(/^_~[0-9a-f]{12}$/);
    expect(toPathSegment("")).toMatch(/^~[0-9a-f]{12}$/);
    expect(toPathSegment("a~b")).toMatch(/^a_b~[0-9a-f]{12}$/);
  });

  it("promotes colliding identifiers into separate scene directories", async () => {
    const storage = createStorageLayout(root);
    for (const providerId of ["A:1", "A_1"]) {
      const staging = storage.stagingDir("s1", providerId, "job-1");
      await mkdir(staging, { recursive: true });
      await writeFile(path.join(staging, "scene.dat"), `payload of ${providerId}`);
      await promoteDirectory(staging, storage.sceneDir("s1", providerId));
    }

    await expect(readFile(path.join(storage.sceneDir("s1", "A:1"), "scene.dat"), "utf8")).resolves.toBe("payload of A:1");
    await expect(readFile(path.join(storage.sceneDir("s1", "A_1"), "scene.dat"), "utf8")).resolves.toBe("payload of A_1");
  });
});
