import type { JobKind } from "../jobs/Job";

export type SceneStatus =
  | "discovered"
  | "downloading"
  | "downloaded"
  | "download_failed"
  | "processing"
  | "processed"
  | "processing_failed"
  | "invalid"
  | "archived";

export type BoundingBox = [west: number, south: number, east: number, north: number];

export type GeoJsonPolygon = {
  type: "Polygon";
  coordinates: number[][][];
};

export type GeoJsonMultiPolygon = {
  type: "MultiPolygon";
  coordinates: number[][][][];
};

export type Footprint = GeoJsonPolygon | GeoJsonMultiPolygon | { type: "BBox"; bbox: BoundingBox };

/**
 * What a sensor plugin reports for one acquisition. `properties` is opaque to
 * the pipeline and is handed back to the same plugin when downloading.
 */
export type SceneDescriptor = {
  providerId: string;
  acquiredAt: Date;
  footprint?: Footprint;
  cloudCover?: number;
  properties: Record<string, unknown>;
};

export type SceneError = {
  code: string;
  message: string;
  exitCode?: number | null;
  stderr?: string;
  at: Date;
};

export type StatusChange = {
  status: SceneStatus;
  at: Date;
};

export type Scene = {
  _id: string;
  sensor: string;
  providerId: string;
  acquiredAt: Date;
  discoveredAt: Date;
  updatedAt: Date;
  footprint?: Footprint;
  cloudCover?: number;
  properties: Record<string, unknown>;
  status: SceneStatus;
  localPath?: string;
  checksum?: string;
  ardPath?: string;
  attemptCount: Record<JobKind, number>;
  lastError?: SceneError;
  statusHistory: StatusChange[];
};

/** Fields a transition may set alongside the new status; `null` clears a field. */
export type ScenePatch = {
  localPath?: string | null;
  checksum?: string | null;
  ardPath?: string | null;
  attemptCount?: Partial<Record<JobKind, number>>;
  lastError?: SceneError | null;
};
