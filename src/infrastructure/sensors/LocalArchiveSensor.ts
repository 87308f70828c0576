import { copyFile, readFile, stat } from "fs/promises";
import path from "path";
import {
  ConfigurationError,
  InvalidSceneError,
  TransientNetworkError,
  errorCodeOf,
  throwIfAborted,
  toErrorMessage
} from "../../core/errors";
import { parseAcquiredAt, parseFootprint } from "../../core/scene/sceneMetadata";
import type { SceneDescriptor } from "../../core/scene/scene.types";
import type { DownloadResult, IntegrityToken, PluginContext, SensorPlugin, TimeWindow } from "../../ports/SensorPlugin";
import { buildToolInvocation, parseArdToolOptions, type ArdToolOptions } from "./ardTool";

export type LocalArchiveOptions = {
  manifestPath: string;
  archiveRoot: string;
  ard: ArdToolOptions;
};

const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === "object" && value !== null;

const isMissingFile = (err: unknown): boolean => {
  const code = errorCodeOf(err);
  return code === "ENOENT" || code === "ENOTDIR";
};

export const parseLocalArchiveOptions = (raw: unknown, sensor: string): LocalArchiveOptions => {
  if (!isRecord(raw)) throw new ConfigurationError(`${sensor}: options must be an object`);
  const manifestPath = typeof raw.manifestPath === "string" ? raw.manifestPath.trim() : "";
  if (manifestPath === "") throw new ConfigurationError(`${sensor}: manifestPath is required`);

  const archiveRoot =
    typeof raw.archiveRoot === "string" && raw.archiveRoot.trim() !== ""
      ? raw.archiveRoot.trim()
      : path.dirname(manifestPath);

  return {
    manifestPath: path.resolve(manifestPath),
    archiveRoot: path.resolve(archiveRoot),
    ard: parseArdToolOptions(raw.ard, sensor)
  };
};

/**
 * Maps one manifest entry. Files live at `path`, relative to the archive
 * root; `sha256`/`md5` are hex digests when the archive publishes them.
 */
export const toArchiveDescriptor = (entry: unknown): SceneDescriptor => {
  const record: Record<string, unknown> = isRecord(entry) ? entry : {};
  const id = record.id;
  const properties: Record<string, unknown> = {};
  for (const key of ["path", "sha256", "md5"]) {
    if (typeof record[key] === "string") properties[key] = record[key];
  }

  return {
    providerId: typeof id === "string" || typeof id === "number" ? String(id) : "",
    acquiredAt: parseAcquiredAt(record.acquired) ?? new Date(Number.NaN),
    footprint: parseFootprint(record.footprint),
    cloudCover: typeof record.cloudCover === "number" ? record.cloudCover : undefined,
    properties
  };
};

const readManifest = async (manifestPath: string): Promise<unknown[]> => {
  let text: string;
  try {
    text = await readFile(manifestPath, "utf8");
  } catch (err) {
    // An unmounted archive usually comes back on its own.
    if (isMissingFile(err)) {
      throw new TransientNetworkError(`Archive manifest ${manifestPath} is not reachable`, { cause: err });
    }
    throw err;
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(`Archive manifest ${manifestPath} is not valid JSON: ${toErrorMessage(err)}`, { cause: err });
  }
  if (!isRecord(json) || !Array.isArray(json.scenes)) {
    throw new ConfigurationError(`Archive manifest ${manifestPath} must contain a "scenes" array`);
  }
  return json.scenes;
};

/** Entries with an unreadable acquisition time are passed on so they get recorded as invalid. */
const inWindow = (descriptor: SceneDescriptor, window: TimeWindow): boolean => {
  const time = descriptor.acquiredAt.getTime();
  if (Number.isNaN(time)) return true;
  return time >= window.start.getTime() && time < window.end.getTime();
};

async function* queryArchive(
  options: LocalArchiveOptions,
  window: TimeWindow,
  ctx: PluginContext
): AsyncGenerator<SceneDescriptor> {
  const entries = await readManifest(options.manifestPath);
  for (const entry of entries) {
    throwIfAborted(ctx.signal);
    const descriptor = toArchiveDescriptor(entry);
    if (inWindow(descriptor, window)) yield descriptor;
  }
}

const resolveSource = (options: LocalArchiveOptions, descriptor: SceneDescriptor): string => {
  const relative = descriptor.properties.path;
  if (typeof relative !== "string" || relative.trim() === "") {
    throw new InvalidSceneError(`Invalid scene: ${descriptor.providerId} has no archive path`);
  }
  const source = path.resolve(options.archiveRoot, relative);
  const fromRoot = path.relative(options.archiveRoot, source);
  if (fromRoot.startsWith("..") || path.isAbsolute(fromRoot)) {
    throw new InvalidSceneError(`Invalid scene: ${descriptor.providerId} points outside the archive`);
  }
  return source;
};

const integrityOf = async (descriptor: SceneDescriptor, source: string): Promise<IntegrityToken> => {
  const { sha256, md5 } = descriptor.properties;
  if (typeof sha256 === "string" && sha256.trim() !== "") {
    return { kind: "checksum", algorithm: "sha256", value: sha256.trim() };
  }
  if (typeof md5 === "string" && md5.trim() !== "") {
    return { kind: "checksum", algorithm: "md5", value: md5.trim() };
  }
  return { kind: "size", bytes: (await stat(source)).size };
};

const copyFromArchive = async (
  options: LocalArchiveOptions,
  descriptor: SceneDescriptor,
  destinationDir: string,
  ctx: PluginContext
): Promise<DownloadResult> => {
  const source = resolveSource(options, descriptor);
  throwIfAborted(ctx.signal);
  const fileName = path.basename(source);
  try {
    const integrity = await integrityOf(descriptor, source);
    await copyFile(source, path.join(destinationDir, fileName));
    return { fileName, integrity };
  } catch (err) {
    if (isMissingFile(err)) {
      throw new TransientNetworkError(`Archive file for ${descriptor.providerId} is not reachable`, { cause: err });
    }
    throw err;
  }
};

/** Scenes already sitting on a mounted archive, listed by a JSON manifest. */
export const localArchivePlugin: SensorPlugin<LocalArchiveOptions> = {
  type: "local-archive",
  parseOptions: parseLocalArchiveOptions,
  query: (options, window, ctx) => queryArchive(options, window, ctx),
  download: copyFromArchive,
  process: (options, localPath, outputDir) => buildToolInvocation(options.ard, localPath, outputDir)
};
