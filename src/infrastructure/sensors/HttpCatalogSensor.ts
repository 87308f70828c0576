import { createWriteStream } from "fs";
import path from "path";
import { Readable } from "stream";
import { pipeline } from "stream/promises";
import {
  AuthenticationError,
  CancellationError,
  ConfigurationError,
  InvalidSceneError,
  ProviderRequestError,
  TransientNetworkError,
  isAbortError,
  toErrorMessage
} from "../../core/errors";
import { parseAcquiredAt, parseFootprint } from "../../core/scene/sceneMetadata";
import type { SceneDescriptor } from "../../core/scene/scene.types";
import type { DownloadResult, IntegrityToken, PluginContext, SensorPlugin, TimeWindow } from "../../ports/SensorPlugin";
import { retry } from "../../shared/retry/retry";
import { toPathSegment } from "../storage/storageLayout";
import { buildToolInvocation, parseArdToolOptions, type ArdToolOptions } from "./ardTool";

export type HttpCatalogOptions = {
  baseUrl: string;
  apiKey: string;
  collection?: string;
  maxCloudCover?: number;
  pageSize: number;
  maxPages: number;
  timeoutMs: number;
  downloadTimeoutMs: number;
  ard: ArdToolOptions;
};

const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === "object" && value !== null;

const optionalInteger = (
  sensor: string,
  raw: Record<string, unknown>,
  key: string,
  fallback: number,
  range: { min: number; max: number }
): number => {
  const value = raw[key] ?? fallback;
  if (typeof value !== "number" || !Number.isInteger(value) || value < range.min || value > range.max) {
    throw new ConfigurationError(`${sensor}: ${key}=${String(value)} is out of allowed range [${range.min}..${range.max}]`);
  }
  return value;
};

/** Origin and path only; query strings and credentials stay out of logs. */
const safeUrl = (url: URL): string => `${url.origin}${url.pathname}`;

const retryAfterMs = (res: Response): number | undefined => {
  const retryAfter = res.headers.get("retry-after");
  return retryAfter && /^\d+$/.test(retryAfter) ? Number(retryAfter) * 1000 : undefined;
};

/** Maps a non-2xx response onto the pipeline's error classes. */
export const errorForStatus = (res: Response, what: string): Error => {
  const status = res.status;
  if (status === 401 || status === 403) {
    return new AuthenticationError(`${what} rejected credentials: ${status}`, { status });
  }
  if (status === 408 || status === 429 || status >= 500) {
    return new TransientNetworkError(`${what} failed: ${status}`, {
      status,
      retryDelayMs: status === 429 ? retryAfterMs(res) : undefined
    });
  }
  return new ProviderRequestError(`${what} failed: ${status}`, status);
};

type TimedRequest = {
  response: Response;
  /** Clears the timeout and the cancellation listener. */
  done: () => void;
};

/**
 * `fetch` with its own timeout, also aborted by the caller's signal. The
 * timeout keeps running until `done` so that it covers reading the body.
 */
const timedFetch = async (
  url: URL,
  headers: Record<string, string>,
  timeoutMs: number,
  what: string,
  signal?: AbortSignal
): Promise<TimedRequest> => {
  if (signal?.aborted) throw new CancellationError(`${what} cancelled`);

  const controller = new AbortController();
  let timedOut = false;
  const timeout = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onAbort = () => controller.abort();
  signal?.addEventListener("abort", onAbort, { once: true });
  const done = () => {
    clearTimeout(timeout);
    signal?.removeEventListener("abort", onAbort);
  };

  const translate = (err: unknown): Error => {
    if (signal?.aborted) return new CancellationError(`${what} cancelled`);
    if (timedOut) return new TransientNetworkError(`${what} timeout after ${timeoutMs}ms`, { cause: err });
    if (isAbortError(err)) return new CancellationError(`${what} cancelled`);
    return new TransientNetworkError(`${what} failed: ${toErrorMessage(err)}`, { cause: err });
  };

  try {
    const response = await fetch(url, { headers, signal: controller.signal });
    return { response, done };
  } catch (err) {
    done();
    throw translate(err);
  }
};

/** The catalog's item shape is loose; this keeps only what the pipeline needs. */
export const toSceneDescriptor = (item: unknown): SceneDescriptor => {
  const record: Record<string, unknown> = isRecord(item) ? item : {};
  const id = record.id;
  const providerId = typeof id === "string" || typeof id === "number" ? String(id) : "";
  const cloudCover = typeof record.cloud_cover === "number" ? record.cloud_cover : undefined;

  const properties: Record<string, unknown> = {};
  if (typeof record.download_url === "string") properties.downloadUrl = record.download_url;
  if (typeof record.md5 === "string") properties.md5 = record.md5;
  if (typeof record.size === "number") properties.size = record.size;

  return {
    providerId,
    acquiredAt: parseAcquiredAt(record.acquired) ?? new Date(Number.NaN),
    footprint: parseFootprint(record.footprint),
    cloudCover,
    properties
  };
};

const integrityOf = (descriptor: SceneDescriptor, res: Response): IntegrityToken => {
  const md5 = descriptor.properties.md5;
  if (typeof md5 === "string" && /^[0-9a-fA-F]{32}$/.test(md5.trim())) {
    return { kind: "checksum", algorithm: "md5", value: md5.trim() };
  }
  const contentLength = res.headers.get("content-length");
  if (contentLength && /^\d+$/.test(contentLength)) {
    return { kind: "size", bytes: Number(contentLength) };
  }
  const size = descriptor.properties.size;
  if (typeof size === "number" && Number.isInteger(size) && size >= 0) {
    return { kind: "size", bytes: size };
  }
  throw new InvalidSceneError(`Invalid scene: ${descriptor.providerId} has no checksum or size to verify against`);
};

const fileNameOf = (url: URL, providerId: string): string => {
  const base = path.posix.basename(url.pathname);
  return base === "" ? `${toPathSegment(providerId)}.dat` : toPathSegment(base);
};

export const parseHttpCatalogOptions = (raw: unknown, sensor: string): HttpCatalogOptions => {
  if (!isRecord(raw)) throw new ConfigurationError(`${sensor}: options must be an object`);

  const baseUrl = typeof raw.baseUrl === "string" ? raw.baseUrl : "";
  let parsed: URL;
  try {
    parsed = new URL(baseUrl);
  } catch {
    throw new ConfigurationError(`${sensor}: baseUrl must be a valid absolute http/https URL. Received: ${baseUrl}`);
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ConfigurationError(`${sensor}: baseUrl must use http or https scheme. Received: ${baseUrl}`);
  }

  const apiKey = typeof raw.apiKey === "string" ? raw.apiKey : "";
  if (apiKey.trim() === "") throw new ConfigurationError(`${sensor}: apiKey is required`);

  const collection = typeof raw.collection === "string" && raw.collection.trim() !== "" ? raw.collection.trim() : undefined;
  const maxCloudCover = raw.maxCloudCover;
  if (maxCloudCover != null && (typeof maxCloudCover !== "number" || maxCloudCover < 0 || maxCloudCover > 100)) {
    throw new ConfigurationError(`${sensor}: maxCloudCover must be a number in [0..100]`);
  }

  return {
    baseUrl,
    apiKey,
    collection,
    maxCloudCover: typeof maxCloudCover === "number" ? maxCloudCover : undefined,
    pageSize: optionalInteger(sensor, raw, "pageSize", 100, { min: 1, max: 1000 }),
    maxPages: optionalInteger(sensor, raw, "maxPages", 1000, { min: 1, max: 100_000 }),
    timeoutMs: optionalInteger(sensor, raw, "timeoutMs", 8000, { min: 1000, max: 120_000 }),
    downloadTimeoutMs: optionalInteger(sensor, raw, "downloadTimeoutMs", 30 * 60_000, { min: 1000, max: 86_400_000 }),
    ard: parseArdToolOptions(raw.ard, sensor)
  };
};

const fetchPage = async (
  options: HttpCatalogOptions,
  window: TimeWindow,
  offset: number,
  signal?: AbortSignal
): Promise<unknown[]> => {
  const url = new URL(options.baseUrl);
  url.pathname = url.pathname.endsWith("/") ? `${url.pathname}scenes` : `${url.pathname}/scenes`;
  url.searchParams.set("start", window.start.toISOString());
  url.searchParams.set("end", window.end.toISOString());
  url.searchParams.set("limit", String(options.pageSize));
  url.searchParams.set("offset", String(offset));
  if (options.collection) url.searchParams.set("collection", options.collection);
  if (options.maxCloudCover != null) url.searchParams.set("maxCloudCover", String(options.maxCloudCover));
  const requestUrl = safeUrl(url);

  const doFetch = async (): Promise<unknown[]> => {
    const { response, done } = await timedFetch(url, { "X-API-Key": options.apiKey }, options.timeoutMs, "Catalog request", signal);
    try {
      if (!response.ok) {
        await response.text().catch(() => "");
        throw errorForStatus(response, "Catalog request");
      }
      const json: unknown = await response.json();
      const items = Array.isArray(json) ? json : isRecord(json) ? json.items : undefined;
      if (!Array.isArray(items)) {
        throw new ProviderRequestError("Catalog response has no items array", response.status);
      }
      return items;
    } finally {
      done();
    }
  };

  return retry(doFetch, {
    retries: 5,
    minDelayMs: 250,
    maxDelayMs: 5000,
    signal,
    onRetry: ({ attempt, maxAttempts, error }) => {
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({
        event: "http.retry",
        status: error instanceof TransientNetworkError ? error.status ?? null : null,
        url: requestUrl,
        attempt,
        maxAttempts
      }));
    },
    onGiveUp: ({ attempt, maxAttempts, error }) => {
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({
        event: "http.give_up",
        status: error instanceof TransientNetworkError || error instanceof AuthenticationError ? error.status ?? null : null,
        url: requestUrl,
        attempt,
        maxAttempts
      }));
    },
    shouldRetry: (err) => {
      if (err instanceof TransientNetworkError) {
        return err.status === 429 ? { retry: true, delayMs: err.retryDelayMs } : true;
      }
      return false;
    }
  });
};

async function* queryCatalog(
  options: HttpCatalogOptions,
  window: TimeWindow,
  ctx: PluginContext
): AsyncGenerator<SceneDescriptor> {
  let offset = 0;
  for (let page = 0; page < options.maxPages; page += 1) {
    const items = await fetchPage(options, window, offset, ctx.signal);
    for (const item of items) {
      yield toSceneDescriptor(item);
    }
    if (items.length < options.pageSize) return;
    offset += items.length;
  }
}

const downloadAsset = async (
  options: HttpCatalogOptions,
  descriptor: SceneDescriptor,
  destinationDir: string,
  ctx: PluginContext
): Promise<DownloadResult> => {
  const downloadUrl = descriptor.properties.downloadUrl;
  if (typeof downloadUrl !== "string" || downloadUrl.trim() === "") {
    throw new InvalidSceneError(`Invalid scene: ${descriptor.providerId} has no download URL`);
  }

  let url: URL;
  try {
    url = new URL(downloadUrl, options.baseUrl);
  } catch {
    throw new InvalidSceneError(`Invalid scene: ${descriptor.providerId} has a malformed download URL`);
  }

  // The key is only sent to the catalog's own origin.
  const headers: Record<string, string> =
    url.origin === new URL(options.baseUrl).origin ? { "X-API-Key": options.apiKey } : {};
  const { response, done } = await timedFetch(url, headers, options.downloadTimeoutMs, "Download", ctx.signal);
  try {
    if (!response.ok || !response.body) {
      await response.text().catch(() => "");
      throw errorForStatus(response, `Download of ${safeUrl(url)}`);
    }
    const integrity = integrityOf(descriptor, response);
    const fileName = fileNameOf(url, descriptor.providerId);

    try {
      await pipeline(Readable.fromWeb(response.body), createWriteStream(path.join(destinationDir, fileName)));
    } catch (err) {
      if (ctx.signal?.aborted) throw new CancellationError("Download cancelled");
      throw new TransientNetworkError(`Download of ${safeUrl(url)} interrupted: ${toErrorMessage(err)}`, { cause: err });
    }
    return { fileName, integrity };
  } finally {
    done();
  }
};

/**
 * Scenes published by a JSON catalog over HTTP: `GET {baseUrl}/scenes` pages
 * through items of the form
 * `{ id, acquired, footprint, cloud_cover, download_url, md5?, size? }`.
 */
export const httpCatalogPlugin: SensorPlugin<HttpCatalogOptions> = {
  type: "http-catalog",
  parseOptions: parseHttpCatalogOptions,
  query: (options, window, ctx) => queryCatalog(options, window, ctx),
  download: downloadAsset,
  process: (options, localPath, outputDir) => buildToolInvocation(options.ard, localPath, outputDir)
};
