// Retry with exponential backoff + jitter, shared by the page fetch path and the embedder

import { RetryExhaustedError } from "../errors";

export type ErrorClass = "transient" | "permanent";

export interface RetryOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Add up to baseDelayMs of random jitter to each delay */
  jitter?: boolean;
  classify?: (error: unknown) => ErrorClass;
}

export interface RetryContext {
  signal?: AbortSignal;
  /** Label used in retry log lines */
  label?: string;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxAttempts: 3,
  baseDelayMs: 250,
  maxDelayMs: 10000,
  jitter: true,
  classify: classifyNetworkError,
};

export function classifyNetworkError(error: unknown): ErrorClass {
  if (error instanceof Error) {
    if (error.name === "TimeoutError") return "transient";
    const message = error.message.toLowerCase();
    if (
      message.includes("network") ||
      message.includes("timeout") ||
      message.includes("econnreset") ||
      message.includes("econnrefused") ||
      message.includes("socket hang up") ||
      message.includes("fetch failed")
    ) {
      return "transient";
    }
  }
  return "permanent";
}

export function calculateBackoff(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  jitter: boolean
): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt);
  const jitterMs = jitter ? Math.random() * baseDelayMs : 0;
  return Math.min(exponentialDelay + jitterMs, maxDelayMs);
}

function retryAfterOf(error: unknown): number | null {
  if (typeof error === "object" && error !== null && "retryAfterMs" in error) {
    const value = error.retryAfterMs;
    return typeof value === "number" && Number.isFinite(value) ? value : null;
  }
  return null;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Runs an operation until it succeeds, fails permanently, or uses up its
 * attempts. Permanent failures are rethrown as-is; exhausted transient
 * failures become a RetryExhaustedError wrapping the last error.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  private readonly jitter: boolean;
  private readonly classify: (error: unknown) => ErrorClass;

  constructor(options?: RetryOptions) {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    this.maxAttempts = Math.max(1, opts.maxAttempts);
    this.baseDelayMs = opts.baseDelayMs;
    this.maxDelayMs = opts.maxDelayMs;
    this.jitter = opts.jitter;
    this.classify = opts.classify;
  }

  isTransient(error: unknown): boolean {
    return this.classify(error) === "transient";
  }

  async execute<T>(operation: (attempt: number) => Promise<T>, context?: RetryContext): Promise<T> {
    let lastError: unknown = null;

    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      context?.signal?.throwIfAborted();
      try {
        return await operation(attempt);
      } catch (error) {
        lastError = error;
        if (context?.signal?.aborted || !this.isTransient(error)) {
          throw error;
        }
        if (attempt >= this.maxAttempts - 1) {
          break;
        }

        const retryAfter = retryAfterOf(error);
        const delay = retryAfter !== null
          ? Math.min(retryAfter, this.maxDelayMs)
          : calculateBackoff(attempt, this.baseDelayMs, this.maxDelayMs, this.jitter);

        if (context?.onRetry) {
          context.onRetry(error, attempt + 1, delay);
        } else {
          const message = error instanceof Error ? error.message : String(error);
          console.warn(
            `[retry] ${context?.label ?? "operation"}: ${message}, attempt ${attempt + 1}/${this.maxAttempts}, waiting ${Math.round(delay)}ms`
          );
        }
        await sleep(delay, context?.signal);
      }
    }

    throw new RetryExhaustedError(this.maxAttempts, lastError);
  }
}
