export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * Resolves after `ms`, or as soon as `signal` aborts. Never rejects: callers
 * that care check `signal.aborted` afterwards.
 */
export const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export const addMs = (date: Date, ms: number): Date => new Date(date.getTime() + ms);
