import type { JobKind } from "../jobs/Job";
import type { SceneStatus } from "./scene.types";

export const sceneStatuses: readonly SceneStatus[] = [
  "discovered",
  "downloading",
  "downloaded",
  "download_failed",
  "processing",
  "processed",
  "processing_failed",
  "invalid",
  "archived"
];

/**
 * Automated transitions. Re-entering `downloading` or `processing` happens
 * when a retry or a reclaimed job picks the scene up again.
 */
const transitions: Record<SceneStatus, readonly SceneStatus[]> = {
  discovered: ["downloading", "invalid"],
  downloading: ["downloading", "downloaded", "download_failed", "invalid"],
  downloaded: ["processing", "invalid"],
  processing: ["processing", "processed", "processing_failed", "invalid"],
  processed: ["archived", "invalid"],
  download_failed: [],
  processing_failed: [],
  invalid: [],
  archived: []
};

/** Administrative resets, the only backward moves. */
const resets: Partial<Record<SceneStatus, { to: SceneStatus; kind: JobKind }>> = {
  download_failed: { to: "discovered", kind: "download" },
  processing_failed: { to: "downloaded", kind: "process" }
};

/**
 * Starting over from the download: the local copy and any ARD output are
 * dropped and the scene goes back to `discovered`.
 */
const redownloadable: readonly SceneStatus[] = ["download_failed", "processing_failed"];

/** Position along the main line of the graph; failures sit level with their success. */
export const statusRank: Record<SceneStatus, number> = {
  discovered: 0,
  downloading: 1,
  downloaded: 2,
  download_failed: 2,
  processing: 3,
  processed: 4,
  processing_failed: 4,
  archived: 5,
  invalid: 6
};

export const terminalStatuses: readonly SceneStatus[] = ["download_failed", "processing_failed", "invalid", "archived"];

export const isTerminal = (status: SceneStatus): boolean => terminalStatuses.includes(status);

export const canTransition = (from: SceneStatus, to: SceneStatus): boolean => transitions[from].includes(to);

/** Statuses from which an automated move to `to` is allowed. */
export const sourcesOf = (to: SceneStatus): SceneStatus[] =>
  sceneStatuses.filter((from) => canTransition(from, to));

export const resetTargetOf = (status: SceneStatus): { to: SceneStatus; kind: JobKind } | undefined => resets[status];

export const canRedownload = (status: SceneStatus): boolean => redownloadable.includes(status);

/**
 * True when every step of `history` is an allowed transition, an
 * administrative reset or a redownload.
 */
export const isValidHistory = (history: readonly SceneStatus[]): boolean =>
  history.every((status, index) => {
    if (index === 0) return true;
    const previous = history[index - 1];
    return (
      canTransition(previous, status) ||
      resets[previous]?.to === status ||
      (canRedownload(previous) && status === "discovered")
    );
  });
