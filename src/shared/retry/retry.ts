import { sleep } from "../time/sleep";

/** `true`/`false`, or an explicit delay such as one taken from `Retry-After`. */
export type RetryDecision = boolean | { retry: boolean; delayMs?: number };

export type RetryAttempt = {
  attempt: number;
  maxAttempts: number;
  error: unknown;
};

export type RetryOptions = {
  /** Extra attempts after the first; 5 means at most 6 calls. */
  retries: number;
  minDelayMs: number;
  maxDelayMs: number;
  shouldRetry: (err: unknown) => RetryDecision;
  onRetry?: (ctx: RetryAttempt & { delayMs: number }) => void;
  onGiveUp?: (ctx: RetryAttempt) => void;
  randomFn?: () => number;
  jitterRatio?: number;
  signal?: AbortSignal;
};

/**
 * `baseDelayMs * 2^exponent`, capped at `maxDelayMs`. Used both for in-process
 * retries and for the `availableAt` of durable retry jobs.
 */
export const computeBackoffDelay = (exponent: number, baseDelayMs: number, maxDelayMs: number): number =>
  Math.min(maxDelayMs, baseDelayMs * Math.pow(2, Math.max(0, exponent)));

const clamp01 = (value: number): number => Math.min(1, Math.max(0, value));

const explicitDelay = (decision: RetryDecision): number | undefined => {
  if (typeof decision === "boolean") return undefined;
  const { delayMs } = decision;
  return typeof delayMs === "number" && Number.isFinite(delayMs) && delayMs >= 0 ? delayMs : undefined;
};

/** Wait before retry number `retryIndex` (0-based), jitter included. */
export const retryDelayMs = (
  retryIndex: number,
  decision: RetryDecision,
  opts: Pick<RetryOptions, "minDelayMs" | "maxDelayMs" | "randomFn" | "jitterRatio">
): number => {
  const requested = explicitDelay(decision);
  const base =
    requested === undefined
      ? computeBackoffDelay(retryIndex, opts.minDelayMs, opts.maxDelayMs)
      : Math.min(opts.maxDelayMs, requested);
  const random = opts.randomFn ?? Math.random;
  return base + Math.floor(base * clamp01(opts.jitterRatio ?? 0.2) * clamp01(random()));
};

export const retry = async <T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> => {
  const maxAttempts = opts.retries + 1;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await fn();
    } catch (err) {
      const decision = opts.shouldRetry(err);
      const wantsRetry = typeof decision === "boolean" ? decision : decision.retry;
      if (!wantsRetry || attempt >= maxAttempts || opts.signal?.aborted) {
        opts.onGiveUp?.({ attempt, maxAttempts, error: err });
        throw err;
      }

      const delayMs = retryDelayMs(attempt - 1, decision, opts);
      opts.onRetry?.({ attempt, maxAttempts, delayMs, error: err });
      await sleep(delayMs, opts.signal);
    }
  }
};
