export type CallSchedulerRetryPolicy = {
  readonly maxAttempts: number;
  /**
   * Return `null` to stop retrying and surface the original error.
   * `attempt` is 1-based and indicates the attempt that just failed.
   */
  readonly getDelayMs: (attempt: number, error: unknown) => number | null;
};

export type CallSchedulerOptions = {
  /**
   * Hard upper bound for in-flight calls.
   */
  readonly maxParallelRequests?: number;
  readonly retry?: CallSchedulerRetryPolicy;
};

export type CallSchedulerRunMetrics = {
  readonly queueWaitMs: number;
  readonly durationMs: number;
  readonly retryDelayMs: number;
  readonly attempts: number;
};

export type CallSchedulerRunOptions = {
  readonly onSettled?: (metrics: CallSchedulerRunMetrics) => void;
};

export type CallScheduler = {
  run: <T>(fn: () => Promise<T>, options?: CallSchedulerRunOptions) => Promise<T>;
  readonly activeCount: () => number;
  readonly pendingCount: () => number;
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  if (typeof value === "string") {
    return new Error(value);
  }
  return new Error("Unknown error");
}

function getStatusCode(error: unknown): number | undefined {
  if (!error || typeof error !== "object") {
    return undefined;
  }
  const maybe = error as { status?: unknown; statusCode?: unknown };
  for (const candidate of [maybe.status, maybe.statusCode]) {
    if (typeof candidate === "number") {
      return candidate;
    }
    if (typeof candidate === "string") {
      const parsed = Number.parseInt(candidate, 10);
      if (Number.isFinite(parsed)) {
        return parsed;
      }
    }
  }
  return undefined;
}

export function isOverloadError(error: unknown): boolean {
  const status = getStatusCode(error);
  if (status === 429 || status === 503 || status === 529) {
    return true;
  }
  const text = error instanceof Error ? error.message.toLowerCase() : "";
  return (
    text.includes("rate limit") ||
    text.includes("too many requests") ||
    text.includes("overload")
  );
}

/**
 * Retries overload errors with exponential backoff; every other error surfaces immediately.
 */
export function createOverloadRetryPolicy({
  maxAttempts = 4,
  baseDelayMs = 1_000,
  maxDelayMs = 30_000,
}: {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
} = {}): CallSchedulerRetryPolicy {
  return {
    maxAttempts,
    getDelayMs: (attempt, error) => {
      if (!isOverloadError(error)) {
        return null;
      }
      return Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));
    },
  };
}

export function createCallScheduler(options: CallSchedulerOptions = {}): CallScheduler {
  const maxParallelRequests = Math.max(1, Math.floor(options.maxParallelRequests ?? 3));
  const retryPolicy = options.retry;

  let active = 0;
  type QueueJob = () => Promise<void>;
  const queue: QueueJob[] = [];

  async function attemptWithRetries<T>(
    fn: () => Promise<T>,
    attempt: number,
    onRetryDelay: (delayMs: number) => void,
    onAttempt: (attempt: number) => void,
  ): Promise<T> {
    onAttempt(attempt);
    try {
      return await fn();
    } catch (error: unknown) {
      if (!retryPolicy || attempt >= retryPolicy.maxAttempts) {
        throw toError(error);
      }
      const delay = retryPolicy.getDelayMs(attempt, error);
      if (delay === null) {
        throw toError(error);
      }
      const normalizedDelay = Number.isFinite(delay) ? Math.max(0, delay) : 0;
      if (normalizedDelay > 0) {
        onRetryDelay(normalizedDelay);
        await sleep(normalizedDelay);
      }
      return attemptWithRetries(fn, attempt + 1, onRetryDelay, onAttempt);
    }
  }

  function drainQueue(): void {
    while (active < maxParallelRequests && queue.length > 0) {
      const job = queue.shift();
      if (!job) {
        continue;
      }
      active += 1;
      void job();
    }
  }

  function run<T>(fn: () => Promise<T>, runOptions: CallSchedulerRunOptions = {}): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const enqueuedAtMs = Date.now();
      queue.push(async () => {
        const startedAtMs = Date.now();
        let retryDelayMs = 0;
        let attempts = 0;
        try {
          resolve(
            await attemptWithRetries(
              fn,
              1,
              (delayMs) => {
                retryDelayMs += delayMs;
              },
              (attempt) => {
                attempts = attempt;
              },
            ),
          );
        } catch (error: unknown) {
          reject(toError(error));
        } finally {
          try {
            runOptions.onSettled?.({
              queueWaitMs: Math.max(0, startedAtMs - enqueuedAtMs),
              durationMs: Math.max(0, Date.now() - startedAtMs),
              retryDelayMs,
              attempts: Math.max(1, attempts),
            });
          } catch {
            // Metrics hooks must not interfere with scheduling.
          }
          active -= 1;
          queueMicrotask(drainQueue);
        }
      });
      drainQueue();
    });
  }

  return {
    run,
    activeCount: () => active,
    pendingCount: () => queue.length,
  };
}
