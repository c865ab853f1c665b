import { describe, it, expect, vi, afterEach } from 'vitest';
import type { BatchIndexResult } from '../../knowledge/types';
import { BackgroundIndexer, type AutoIndexTarget } from '../backgroundIndexer';

const EMPTY: BatchIndexResult = { results: [], succeeded: 0, failed: 0 };

/** autoIndexNewFiles stays pending until release() is called. */
type GatedTarget = AutoIndexTarget & { calls: number; release: () => void };

function gatedTarget(): GatedTarget {
  const waiting: Array<() => void> = [];
  const target: GatedTarget = {
    calls: 0,
    release: () => waiting.splice(0).forEach((resolve) => resolve()),
    autoIndexNewFiles: async () => {
      target.calls++;
      await new Promise<void>((resolve) => waiting.push(resolve));
      return EMPTY;
    },
  };
  return target;
}

afterEach(() => {
  vi.useRealTimers();
});

/* ============= tick ============= */

describe('BackgroundIndexer.tick', () => {
  it('skips a tick while the previous run is active', async () => {
    const target = gatedTarget();
    const indexer = new BackgroundIndexer(target, 1000);

    const first = indexer.tick();
    const second = await indexer.tick();
    target.release();

    expect(second).toEqual({ ran: false });
    expect(await first).toEqual({ ran: true, result: EMPTY });
    expect(target.calls).toBe(1);
  });

  it('turns a failed run into an outcome', async () => {
    const indexer = new BackgroundIndexer(
      {
        autoIndexNewFiles: async () => {
          throw new Error('disk unavailable');
        },
      },
      1000
    );

    expect(await indexer.tick()).toEqual({ ran: true, error: 'disk unavailable' });
    expect(await indexer.tick()).toEqual({ ran: true, error: 'disk unavailable' });
  });
});

/* ============= start / stop ============= */

describe('BackgroundIndexer.start', () => {
  it('runs immediately and on every interval', async () => {
    vi.useFakeTimers();
    let calls = 0;
    const indexer = new BackgroundIndexer(
      {
        autoIndexNewFiles: async () => {
          calls++;
          return EMPTY;
        },
      },
      1000
    );

    indexer.start();
    await vi.advanceTimersByTimeAsync(2500);
    await indexer.stop();
    await vi.advanceTimersByTimeAsync(5000);

    expect(calls).toBe(3);
    expect(indexer.running).toBe(false);
  });

  it('stays idle when the interval is not positive', () => {
    const indexer = new BackgroundIndexer({ autoIndexNewFiles: async () => EMPTY }, 0);

    indexer.start();

    expect(indexer.running).toBe(false);
  });
});
