import { createHash } from "crypto";
import path from "path";
import { mkdir, rename, rm } from "fs/promises";

export type StorageLayout = {
  readonly root: string;
  stagingDir(sensor: string, providerId: string, jobId: string): string;
  sceneDir(sensor: string, providerId: string): string;
  ardDir(sensor: string, providerId: string): string;
};

const SAFE_SEGMENT = /^[A-Za-z0-9_-][A-Za-z0-9._-]{0,127}$/;
const MAX_CLEANED_LENGTH = 100;

/**
 * Provider identifiers end up in paths; keep them to one safe segment.
 * Values that are already safe pass through. Anything else is cleaned and
 * suffixed with `~` and a digest of the raw value; `~` never survives in a
 * safe value, so two different identifiers never share a segment.
 */
export const toPathSegment = (value: string): string => {
  if (SAFE_SEGMENT.test(value)) return value;
  const cleaned = value
    .replace(/[^A-Za-z0-9._-]+/g, "_")
    .replace(/^\.+/, "_")
    .slice(0, MAX_CLEANED_LENGTH);
  const digest = createHash("sha256").update(value).digest("hex").slice(0, 12);
  return `${cleaned}~${digest}`;
};

export const createStorageLayout = (root: string): StorageLayout => {
  const resolved = path.resolve(root);
  return {
    root: resolved,
    stagingDir: (sensor, providerId, jobId) =>
      path.join(resolved, "staging", toPathSegment(sensor), toPathSegment(providerId), toPathSegment(jobId)),
    sceneDir: (sensor, providerId) => path.join(resolved, "scenes", toPathSegment(sensor), toPathSegment(providerId)),
    ardDir: (sensor, providerId) => path.join(resolved, "ard", toPathSegment(sensor), toPathSegment(providerId))
  };
};

/**
 * Replaces `target` with `source`. `rename` is atomic within a filesystem,
 * which staging and final storage share by living under the same root.
 */
export const promoteDirectory = async (source: string, target: string): Promise<void> => {
  await mkdir(path.dirname(target), { recursive: true });
  await rm(target, { recursive: true, force: true });
  await rename(source, target);
};

export const removePath = async (target: string): Promise<void> => {
  await rm(target, { recursive: true, force: true });
};
