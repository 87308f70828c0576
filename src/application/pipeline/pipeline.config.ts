import { ConfigurationError } from "../../core/errors";
import { computeBackoffDelay } from "../../shared/retry/retry";

export type PipelineConfig = Readonly<{
  maxDownloadAttempts: number;
  maxProcessAttempts: number;
  leaseDurationMs: number;
  pollIntervalMs: number;
  workerCount: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  reaperIntervalMs: number;
  idleDelayMs: number;
  shutdownGraceMs: number;
}>;

export type PipelineConfigInput = Partial<PipelineConfig>;

export const defaultPipelineConfig: PipelineConfig = {
  maxDownloadAttempts: 3,
  maxProcessAttempts: 3,
  leaseDurationMs: 15 * 60_000,
  pollIntervalMs: 60 * 60_000,
  workerCount: 4,
  retryBaseDelayMs: 30_000,
  retryMaxDelayMs: 30 * 60_000,
  reaperIntervalMs: 60_000,
  idleDelayMs: 5_000,
  shutdownGraceMs: 30_000
};

export const pipelineCaps = {
  maxDownloadAttempts: { min: 1, max: 20 },
  maxProcessAttempts: { min: 1, max: 20 },
  leaseDurationMs: { min: 1_000, max: 86_400_000 },
  pollIntervalMs: { min: 1_000, max: 604_800_000 },
  workerCount: { min: 1, max: 64 },
  retryBaseDelayMs: { min: 0, max: 3_600_000 },
  retryMaxDelayMs: { min: 0, max: 86_400_000 },
  reaperIntervalMs: { min: 100, max: 3_600_000 },
  idleDelayMs: { min: 10, max: 600_000 },
  shutdownGraceMs: { min: 0, max: 600_000 }
} as const satisfies Record<keyof PipelineConfig, { min: number; max: number }>;

const pipelineConfigKeys: readonly (keyof PipelineConfig)[] = [
  "maxDownloadAttempts",
  "maxProcessAttempts",
  "leaseDurationMs",
  "pollIntervalMs",
  "workerCount",
  "retryBaseDelayMs",
  "retryMaxDelayMs",
  "reaperIntervalMs",
  "idleDelayMs",
  "shutdownGraceMs"
];

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigurationError(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const validatePipelineConfig = (config: PipelineConfig): PipelineConfig => {
  for (const key of pipelineConfigKeys) {
    assertIntegerInRange(key, config[key], pipelineCaps[key].min, pipelineCaps[key].max);
  }
  if (config.retryMaxDelayMs < config.retryBaseDelayMs) {
    throw new ConfigurationError(
      `retryMaxDelayMs=${config.retryMaxDelayMs} must be >= retryBaseDelayMs=${config.retryBaseDelayMs}`
    );
  }
  return Object.freeze({ ...config });
};

export const resolvePipelineConfig = (input: PipelineConfigInput = {}): PipelineConfig =>
  validatePipelineConfig({ ...defaultPipelineConfig, ...input });

/** Delay before attempt `attempt + 1` becomes claimable. */
export const retryDelayFor = (config: PipelineConfig, attempt: number): number =>
  computeBackoffDelay(attempt - 1, config.retryBaseDelayMs, config.retryMaxDelayMs);
