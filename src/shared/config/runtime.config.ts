import {
  defaultPipelineConfig,
  pipelineCaps,
  validatePipelineConfig,
  type PipelineConfig
} from "../../application/pipeline/pipeline.config";
import { ConfigurationError } from "../../core/errors";

/** Environment variable behind each pipeline option. */
export const pipelineEnvNames = {
  maxDownloadAttempts: "MAX_DOWNLOAD_ATTEMPTS",
  maxProcessAttempts: "MAX_PROCESS_ATTEMPTS",
  leaseDurationMs: "LEASE_DURATION_MS",
  pollIntervalMs: "POLL_INTERVAL_MS",
  workerCount: "WORKER_COUNT",
  retryBaseDelayMs: "RETRY_BASE_DELAY_MS",
  retryMaxDelayMs: "RETRY_MAX_DELAY_MS",
  reaperIntervalMs: "REAPER_INTERVAL_MS",
  idleDelayMs: "IDLE_DELAY_MS",
  shutdownGraceMs: "SHUTDOWN_GRACE_MS"
} as const satisfies Record<keyof PipelineConfig, string>;

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new ConfigurationError(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

const fromEnv = (env: NodeJS.ProcessEnv, key: keyof PipelineConfig): number =>
  parseOptionalIntInRange(env, pipelineEnvNames[key], pipelineCaps[key]) ?? defaultPipelineConfig[key];

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): PipelineConfig =>
  validatePipelineConfig({
    maxDownloadAttempts: fromEnv(env, "maxDownloadAttempts"),
    maxProcessAttempts: fromEnv(env, "maxProcessAttempts"),
    leaseDurationMs: fromEnv(env, "leaseDurationMs"),
    pollIntervalMs: fromEnv(env, "pollIntervalMs"),
    workerCount: fromEnv(env, "workerCount"),
    retryBaseDelayMs: fromEnv(env, "retryBaseDelayMs"),
    retryMaxDelayMs: fromEnv(env, "retryMaxDelayMs"),
    reaperIntervalMs: fromEnv(env, "reaperIntervalMs"),
    idleDelayMs: fromEnv(env, "idleDelayMs"),
    shutdownGraceMs: fromEnv(env, "shutdownGraceMs")
  });
