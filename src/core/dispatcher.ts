/**
 * Enrichment Dispatcher
 * Bounded-concurrency fan-out of a per-record secondary fetch.
 * One record's failure is recorded against its key and never stops
 * the others.
 */

import { ZodError } from 'zod';
import { EnrichmentOutcome } from '../types';
import { CancelledError, EnrichError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { RetryPolicy, backoffDelay, isRetryableStatus, sleep } from '../utils/retry';

/**
 * Keyed, write-once map of enrichment outcomes. Tasks only ever write
 * their own key, so completion order never changes the final content.
 */
export class EnrichmentMap<V> {
  private outcomes: Map<string, EnrichmentOutcome<V>> = new Map();

  set(key: string, outcome: EnrichmentOutcome<V>): void {
    if (this.outcomes.has(key)) {
      throw new Error(`Enrichment outcome for "${key}" already recorded`);
    }
    this.outcomes.set(key, outcome);
  }

  get(key: string): EnrichmentOutcome<V> | undefined {
    return this.outcomes.get(key);
  }

  has(key: string): boolean {
    return this.outcomes.has(key);
  }

  get size(): number {
    return this.outcomes.size;
  }

  failures(): EnrichError[] {
    const errors: EnrichError[] = [];
    for (const outcome of this.outcomes.values()) {
      if (!outcome.ok) errors.push(outcome.error);
    }
    return errors;
  }
}

/**
 * Thrown by an enrich function to report the HTTP status of a failed call,
 * so the dispatcher can tell throttling from a permanent failure.
 */
export class EnrichHttpError extends Error {
  public readonly status: number;
  public readonly body: string;
  public readonly retryAfterMs?: number;

  constructor(status: number, body: string, retryAfterMs?: number) {
    super(`HTTP ${status}: ${body}`);
    this.name = 'EnrichHttpError';
    this.status = status;
    this.body = body;
    this.retryAfterMs = retryAfterMs;
  }
}

export interface DispatchOptions<T, V> {
  keyOf: (record: T) => string;
  /** Cheap synchronous pre-filter */
  eligible: (record: T) => boolean;
  enrich: (record: T, signal?: AbortSignal) => Promise<V>;
  concurrency: number;
  retry?: RetryPolicy;
  signal?: AbortSignal;
  onProgress?: (completed: number, total: number) => void;
}

export interface DispatchResult<V> {
  outcomes: EnrichmentMap<V>;
  dispatched: number;
  skipped: number;
}

const NO_RETRY: RetryPolicy = { maxRetries: 0, baseDelayMs: 0, maxDelayMs: 0 };

function isRetryable(error: unknown): boolean {
  if (error instanceof EnrichHttpError) {
    return isRetryableStatus(error.status);
  }
  // A body that does not decode will not decode on the next attempt either
  if (error instanceof ZodError || error instanceof SyntaxError) {
    return false;
  }
  // Anything else is a transport failure
  return true;
}

function toEnrichError(key: string, error: unknown, attempts: number): EnrichError {
  const status = error instanceof EnrichHttpError ? error.status : undefined;
  return new EnrichError(key, errorMessage(error), { status, attempts, cause: error });
}

async function enrichWithRetry<T, V>(
  key: string,
  record: T,
  options: DispatchOptions<T, V>
): Promise<EnrichmentOutcome<V>> {
  const policy = options.retry ?? NO_RETRY;
  let attempt = 0;

  for (;;) {
    attempt++;
    try {
      const value = await options.enrich(record, options.signal);
      return { ok: true, value };
    } catch (error) {
      const retriesUsed = attempt - 1;
      const canRetry =
        retriesUsed < policy.maxRetries && isRetryable(error) && !options.signal?.aborted;

      if (canRetry) {
        const retryAfter = error instanceof EnrichHttpError ? error.retryAfterMs : undefined;
        const delay = backoffDelay(attempt, policy, retryAfter);
        logger.debug(`Retrying ${key} in ${delay}ms after attempt ${attempt}: ${errorMessage(error)}`);
        await sleep(delay, options.signal);
        // Cancelled during backoff: keep the last failure, no further request
        if (!options.signal?.aborted) {
          continue;
        }
      }

      return { ok: false, error: toEnrichError(key, error, attempt) };
    }
  }
}

/**
 * Enrich every eligible record with at most `concurrency` calls in flight.
 * Resolves once every dispatched task has settled.
 */
export async function dispatch<T, V>(
  records: readonly T[],
  options: DispatchOptions<T, V>
): Promise<DispatchResult<V>> {
  if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
    throw new RangeError(`Concurrency must be a positive integer, got ${options.concurrency}`);
  }

  const queue: Array<{ key: string; record: T }> = [];
  const seen = new Set<string>();
  let skipped = 0;

  for (const record of records) {
    if (!options.eligible(record)) {
      skipped++;
      continue;
    }
    const key = options.keyOf(record);
    if (seen.has(key)) {
      logger.warn(`Duplicate record key "${key}" ignored`);
      continue;
    }
    seen.add(key);
    queue.push({ key, record });
  }

  const outcomes = new EnrichmentMap<V>();
  const total = queue.length;
  let next = 0;
  let completed = 0;

  logger.debug(`Dispatching ${total} enrichment task(s), concurrency ${options.concurrency}`);

  async function worker(): Promise<void> {
    while (next < queue.length) {
      if (options.signal?.aborted) return;

      const { key, record } = queue[next++];
      const outcome = await enrichWithRetry(key, record, options);

      if (!outcome.ok) {
        logger.debug(`Enrichment failed for ${key}: ${outcome.error.message}`);
      }
      outcomes.set(key, outcome);

      completed++;
      options.onProgress?.(completed, total);
    }
  }

  const workers = Array.from({ length: Math.min(options.concurrency, total) }, () => worker());
  await Promise.all(workers);

  if (options.signal?.aborted) {
    throw new CancelledError('enriching');
  }

  logger.debug(`Enrichment complete: ${outcomes.size - outcomes.failures().length} ok, ${outcomes.failures().length} failed`);

  return { outcomes, dispatched: total, skipped };
}
