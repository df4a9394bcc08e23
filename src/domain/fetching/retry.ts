export type RetryPolicy = {
  maxRetries: number;
  /** Delay before retry number `attempt` (1-based). */
  delayMs: (attempt: number) => number;
};

export type Sleep = (ms: number) => Promise<void>;

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  delayMs: () => 1000
};

export const PAGE_PACING_MS = 200;

export const realSleep: Sleep = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
