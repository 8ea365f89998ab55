import { afterEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { EnrichHttpError, EnrichmentMap, dispatch } from '../dispatcher';
import { CancelledError, EnrichError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { RetryPolicy } from '../../utils/retry';

interface Row {
  key: string;
  eligible?: boolean;
}

const rows = (...keys: string[]): Row[] => keys.map((key) => ({ key }));
const instantRetry: RetryPolicy = { maxRetries: 2, baseDelayMs: 0, maxDelayMs: 0 };
const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 1));

function base(overrides: { concurrency?: number; retry?: RetryPolicy } = {}) {
  return {
    keyOf: (row: Row) => row.key,
    eligible: (row: Row) => row.eligible !== false,
    concurrency: overrides.concurrency ?? 4,
    retry: overrides.retry,
  };
}

function failureOf<V>(map: EnrichmentMap<V>, key: string): EnrichError {
  const outcome = map.get(key);
  if (!outcome || outcome.ok) {
    throw new Error(`expected a failed outcome for ${key}`);
  }
  return outcome.error;
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('dispatch', () => {
  it('records an outcome for every eligible record', async () => {
    const { outcomes, dispatched, skipped } = await dispatch(rows('a', 'b', 'c'), {
      ...base(),
      enrich: async (row) => row.key.toUpperCase(),
    });

    expect(dispatched).toBe(3);
    expect(skipped).toBe(0);
    expect(outcomes.get('b')).toEqual({ ok: true, value: 'B' });
  });

  it('never enriches records the pre-filter rejects', async () => {
    const enrich = vi.fn(async (row: Row) => row.key);

    const result = await dispatch([{ key: 'a' }, { key: 'b', eligible: false }, { key: 'c' }], {
      ...base(),
      enrich,
    });

    expect(enrich.mock.calls.map(([row]) => row.key)).toEqual(['a', 'c']);
    expect(result.skipped).toBe(1);
    expect(result.outcomes.has('b')).toBe(false);
  });

  it('keeps going when one record fails', async () => {
    const { outcomes } = await dispatch(rows('a', 'b', 'c', 'd'), {
      ...base(),
      enrich: async (row) => {
        if (row.key === 'b') throw new EnrichHttpError(404, 'not found');
        return row.key;
      },
    });

    expect(outcomes.size).toBe(4);
    expect(outcomes.failures().map((e) => e.key)).toEqual(['b']);
    expect(outcomes.get('d')).toEqual({ ok: true, value: 'd' });
    expect(failureOf(outcomes, 'b').message).toBe('HTTP 404: not found');
    expect(failureOf(outcomes, 'b').status).toBe(404);
  });

  it('logs each failure at debug level with its key', async () => {
    const debug = vi.spyOn(logger, 'debug');

    await dispatch(rows('carol'), {
      ...base(),
      enrich: async () => {
        throw new EnrichHttpError(404, 'gone');
      },
    });

    expect(debug).toHaveBeenCalledWith('Enrichment failed for carol: HTTP 404: gone');
  });

  it('never has more than `concurrency` calls in flight', async () => {
    let inFlight = 0;
    let peak = 0;

    await dispatch(rows('a', 'b', 'c', 'd', 'e', 'f', 'g', 'h', 'i', 'j'), {
      ...base({ concurrency: 3 }),
      enrich: async (row) => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await tick();
        inFlight--;
        return row.key;
      },
    });

    expect(peak).toBe(3);
  });

  it('runs sequentially with concurrency 1', async () => {
    const order: string[] = [];

    await dispatch(rows('a', 'b', 'c'), {
      ...base({ concurrency: 1 }),
      enrich: async (row) => {
        order.push(`start ${row.key}`);
        await tick();
        order.push(`end ${row.key}`);
        return row.key;
      },
    });

    expect(order).toEqual(['start a', 'end a', 'start b', 'end b', 'start c', 'end c']);
  });

  it.each([0, -1, 1.5])('rejects concurrency %s', async (concurrency) => {
    await expect(
      dispatch(rows('a'), { ...base({ concurrency }), enrich: async (row) => row.key })
    ).rejects.toBeInstanceOf(RangeError);
  });

  it('enriches a duplicate key only once', async () => {
    const warn = vi.spyOn(logger, 'warn');
    const enrich = vi.fn(async (row: Row) => row.key);

    const { dispatched } = await dispatch(rows('a', 'a', 'b'), { ...base(), enrich });

    expect(enrich).toHaveBeenCalledTimes(2);
    expect(dispatched).toBe(2);
    expect(warn).toHaveBeenCalledWith('Duplicate record key "a" ignored');
  });

  it('reports progress as tasks settle', async () => {
    const progress: Array<[number, number]> = [];

    await dispatch(rows('a', 'b', 'c'), {
      ...base({ concurrency: 1 }),
      enrich: async (row) => row.key,
      onProgress: (completed, total) => progress.push([completed, total]),
    });

    expect(progress).toEqual([
      [1, 3],
      [2, 3],
      [3, 3],
    ]);
  });

  describe('retries', () => {
    it('retries throttled calls until they succeed', async () => {
      let calls = 0;

      const { outcomes } = await dispatch(rows('a'), {
        ...base({ retry: instantRetry }),
        enrich: async () => {
          calls++;
          if (calls === 1) throw new EnrichHttpError(429, 'slow down', 0);
          return 'ok';
        },
      });

      expect(calls).toBe(2);
      expect(outcomes.get('a')).toEqual({ ok: true, value: 'ok' });
    });

    it('gives up after maxRetries on a persistent server error', async () => {
      const enrich = vi.fn(async (): Promise<string> => {
        throw new EnrichHttpError(503, 'unavailable');
      });

      const { outcomes } = await dispatch(rows('a'), { ...base({ retry: instantRetry }), enrich });

      expect(enrich).toHaveBeenCalledTimes(3);
      expect(failureOf(outcomes, 'a').attempts).toBe(3);
      expect(failureOf(outcomes, 'a').status).toBe(503);
    });

    it('does not retry a client error', async () => {
      const enrich = vi.fn(async (): Promise<string> => {
        throw new EnrichHttpError(404, 'missing');
      });

      const { outcomes } = await dispatch(rows('a'), { ...base({ retry: instantRetry }), enrich });

      expect(enrich).toHaveBeenCalledTimes(1);
      expect(failureOf(outcomes, 'a').attempts).toBe(1);
    });

    it('does not retry a body that fails to decode', async () => {
      const enrich = vi.fn(async (): Promise<string> => z.object({ userPurpose: z.string() }).parse({}).userPurpose);

      const { outcomes } = await dispatch(rows('a'), { ...base({ retry: instantRetry }), enrich });

      expect(enrich).toHaveBeenCalledTimes(1);
      expect(outcomes.failures()).toHaveLength(1);
    });

    it('retries a transport exception', async () => {
      let calls = 0;

      const { outcomes } = await dispatch(rows('a'), {
        ...base({ retry: instantRetry }),
        enrich: async () => {
          calls++;
          if (calls < 3) throw new Error('ECONNRESET');
          return 'ok';
        },
      });

      expect(calls).toBe(3);
      expect(outcomes.get('a')).toEqual({ ok: true, value: 'ok' });
    });

    it('makes a single attempt without a retry policy', async () => {
      const enrich = vi.fn(async (): Promise<string> => {
        throw new EnrichHttpError(500, 'oops');
      });

      await dispatch(rows('a'), { ...base(), enrich });

      expect(enrich).toHaveBeenCalledTimes(1);
    });
  });

  describe('cancellation', () => {
    it('starts no new tasks once aborted and raises CancelledError', async () => {
      const controller = new AbortController();
      const enrich = vi.fn(async (row: Row) => {
        controller.abort();
        return row.key;
      });

      await expect(
        dispatch(rows('a', 'b', 'c'), { ...base({ concurrency: 1 }), enrich, signal: controller.signal })
      ).rejects.toBeInstanceOf(CancelledError);
      expect(enrich).toHaveBeenCalledTimes(1);
    });

    it('makes no further attempt when cancelled while backing off', async () => {
      const controller = new AbortController();
      const enrich = vi.fn(async (): Promise<string> => {
        setTimeout(() => controller.abort(), 10);
        throw new EnrichHttpError(503, 'unavailable');
      });

      await expect(
        dispatch(rows('a'), {
          ...base({ retry: { maxRetries: 2, baseDelayMs: 1000, maxDelayMs: 1000 } }),
          enrich,
          signal: controller.signal,
        })
      ).rejects.toBeInstanceOf(CancelledError);
      expect(enrich).toHaveBeenCalledTimes(1);
    });
  });
});

describe('EnrichmentMap', () => {
  it('accepts each key once', () => {
    const map = new EnrichmentMap<string>();
    map.set('a', { ok: true, value: 'x' });

    expect(() => map.set('a', { ok: true, value: 'y' })).toThrow('Enrichment outcome for "a" already recorded');
    expect(map.get('a')).toEqual({ ok: true, value: 'x' });
  });
});
