import {
  DEFAULT_RETRY_SETTINGS,
  KeyedLock,
  createConcurrencyLimit,
  retry,
  silentLogger,
  withTimeout,
  type ConcurrencyLimit,
  type PlaygraphLogger,
  type RetrySettings,
  type VerifyMode,
} from "@playgraph/common";
import { RunCancelledError, TransientProviderError, isRetryableError } from "./errors.js";
import type { PlaylistProvider, TrackSet } from "./types.js";

export const DEFAULT_CONCURRENCY = 4;
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

/** Serialises writes to the same playlist across runs in this process. */
export const sharedPlaylistLock = new KeyedLock();

export interface RunContextOptions {
  provider: PlaylistProvider;
  logger?: PlaygraphLogger;
  /** Clock; defaults to the wall clock */
  now?: () => Date;
  signal?: AbortSignal;
  concurrency?: number;
  requestTimeoutMs?: number;
  retry?: Partial<RetrySettings>;
  verifyMode?: VerifyMode;
  playlistLock?: KeyedLock;
  /** Waits between retries; replaceable in tests */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Everything one evaluation pass needs. Created per run and dropped with it,
 * so the source cache never outlives the run that filled it.
 */
export interface RunContext {
  readonly provider: PlaylistProvider;
  readonly logger: PlaygraphLogger;
  readonly now: () => Date;
  readonly signal?: AbortSignal;
  readonly concurrency: number;
  readonly limit: ConcurrencyLimit;
  readonly requestTimeoutMs: number;
  readonly retry: RetrySettings;
  readonly verifyMode: VerifyMode;
  readonly playlistLock: KeyedLock;
  readonly sleep?: (ms: number) => Promise<void>;
  /** Source key to the pending or settled fetch */
  readonly sourceCache: Map<string, Promise<TrackSet>>;
  readonly stats: { apiCalls: number };
}

export function createRunContext(options: RunContextOptions): RunContext {
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? DEFAULT_CONCURRENCY));
  return {
    provider: options.provider,
    logger: options.logger ?? silentLogger,
    now: options.now ?? (() => new Date()),
    signal: options.signal,
    concurrency,
    limit: createConcurrencyLimit(concurrency),
    requestTimeoutMs: options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
    retry: { ...DEFAULT_RETRY_SETTINGS, ...options.retry },
    verifyMode: options.verifyMode ?? "end",
    playlistLock: options.playlistLock ?? sharedPlaylistLock,
    sleep: options.sleep,
    sourceCache: new Map(),
    stats: { apiCalls: 0 },
  };
}

export function throwIfCancelled(context: RunContext): void {
  if (context.signal?.aborted) {
    throw new RunCancelledError();
  }
}

/**
 * One remote call: refused once the run is cancelled, counted, and bounded by
 * the request timeout. A timeout surfaces as a transient provider error.
 */
export async function callProvider<T>(
  context: RunContext,
  label: string,
  operation: (provider: PlaylistProvider) => Promise<T>
): Promise<T> {
  throwIfCancelled(context);
  context.stats.apiCalls += 1;
  context.logger.debug(`-> ${label}`);
  return await withTimeout(
    operation(context.provider),
    context.requestTimeoutMs,
    label,
    (timedOut, ms) => new TransientProviderError(`${timedOut} timed out after ${ms}ms`)
  );
}

/**
 * Runs `operation` under the context's retry policy. Only transient failures
 * are retried, never after cancellation, and a server-suggested wait replaces
 * the computed backoff.
 */
export async function withRetries<T>(context: RunContext, label: string, operation: (attempt: number) => Promise<T>): Promise<T> {
  return await retry(operation, {
    retries: context.retry.attempts - 1,
    delayMs: context.retry.delayMs,
    backoffFactor: context.retry.backoffFactor,
    shouldRetry: (error) => isRetryableError(error) && !context.signal?.aborted,
    delayFor: (error, computed) =>
      error instanceof TransientProviderError && error.retryAfterMs !== undefined ? error.retryAfterMs : computed,
    onRetry: (error, attempt) => {
      context.logger.warn(`${label} failed (attempt ${attempt} of ${context.retry.attempts}), retrying`, error);
    },
    sleep: context.sleep,
  });
}
