import { randomUUID } from "crypto";
import { InvalidSceneError } from "../errors";
import type { Footprint, Scene, SceneDescriptor } from "./scene.types";

/**
 * Normalizes a provider identifier. Scenes without one cannot be tracked at
 * all, so this throws rather than producing an `invalid` scene.
 */
export const parseProviderId = (value: unknown): string => {
  if (value == null) {
    throw new InvalidSceneError("Invalid scene: missing provider identifier");
  }

  if (typeof value === "number") {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new InvalidSceneError("Invalid scene: provider identifier must be a non-negative integer");
    }
    return String(value);
  }

  if (typeof value === "string") {
    const normalized = value.trim();
    if (normalized.length === 0) {
      throw new InvalidSceneError("Invalid scene: empty provider identifier");
    }
    return normalized;
  }

  throw new InvalidSceneError("Invalid scene: provider identifier is not a string");
};

export const parseAcquiredAt = (value: unknown): Date | undefined => {
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? undefined : value;
  if (typeof value !== "string" && typeof value !== "number") return undefined;
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed;
};

const isPosition = (value: unknown): boolean =>
  Array.isArray(value) && value.length >= 2 && value.every((n) => typeof n === "number" && Number.isFinite(n));

const isRing = (value: unknown): boolean => Array.isArray(value) && value.length >= 4 && value.every(isPosition);

const isPolygonCoordinates = (value: unknown): value is number[][][] =>
  Array.isArray(value) && value.length >= 1 && value.every(isRing);

const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === "object" && value !== null;

/**
 * Accepts GeoJSON Polygon / MultiPolygon geometries and `[w, s, e, n]`
 * bounding boxes. Anything else yields `undefined`.
 */
export const parseFootprint = (value: unknown): Footprint | undefined => {
  if (Array.isArray(value)) {
    if (value.length !== 4 || !value.every((n) => typeof n === "number" && Number.isFinite(n))) return undefined;
    const [west, south, east, north] = value;
    if (south > north || south < -90 || north > 90) return undefined;
    return { type: "BBox", bbox: [west, south, east, north] };
  }

  if (!isRecord(value)) return undefined;
  const coordinates = value.coordinates;
  if (value.type === "Polygon" && isPolygonCoordinates(coordinates)) {
    return { type: "Polygon", coordinates };
  }
  if (value.type === "MultiPolygon" && Array.isArray(coordinates) && coordinates.length > 0) {
    const polygons: number[][][][] = [];
    for (const polygon of coordinates) {
      if (!isPolygonCoordinates(polygon)) return undefined;
      polygons.push(polygon);
    }
    return { type: "MultiPolygon", coordinates: polygons };
  }
  return undefined;
};

/**
 * Returns the reason the metadata cannot be ingested, or `undefined` when it
 * is usable.
 */
export const findMetadataProblem = (
  metadata: Pick<SceneDescriptor, "acquiredAt" | "footprint" | "cloudCover">
): string | undefined => {
  if (Number.isNaN(metadata.acquiredAt.getTime())) return "invalid acquisition time";
  if (metadata.footprint == null) return "missing footprint";
  if (metadata.cloudCover != null && (!Number.isFinite(metadata.cloudCover) || metadata.cloudCover < 0 || metadata.cloudCover > 100)) {
    return `cloud cover ${metadata.cloudCover} outside [0..100]`;
  }
  return undefined;
};

export const buildScene = (sensor: string, descriptor: SceneDescriptor, now: Date): Scene => {
  const problem = findMetadataProblem(descriptor);
  const status = problem ? "invalid" : "discovered";

  return {
    _id: randomUUID(),
    sensor,
    providerId: descriptor.providerId,
    acquiredAt: descriptor.acquiredAt,
    discoveredAt: now,
    updatedAt: now,
    footprint: descriptor.footprint,
    cloudCover: descriptor.cloudCover,
    properties: descriptor.properties,
    status,
    attemptCount: { download: 0, process: 0 },
    lastError: problem ? { code: "invalid_scene", message: `Invalid scene: ${problem}`, at: now } : undefined,
    statusHistory: problem
      ? [
          { status: "discovered", at: now },
          { status: "invalid", at: now }
        ]
      : [{ status: "discovered", at: now }]
  };
};

export const descriptorOf = (scene: Scene): SceneDescriptor => ({
  providerId: scene.providerId,
  acquiredAt: scene.acquiredAt,
  footprint: scene.footprint,
  cloudCover: scene.cloudCover,
  properties: scene.properties
});
