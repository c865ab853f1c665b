import { describe, it, expect } from 'vitest';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { safeDelete, withTempFile, type Remover } from '../cleanup';

const policy = { maxAttempts: 3, delayMs: 1 };

function busyError(): NodeJS.ErrnoException {
  const err: NodeJS.ErrnoException = new Error('EBUSY: resource busy or locked');
  err.code = 'EBUSY';
  return err;
}

/** Fails with EBUSY `failures` times, then succeeds. */
function flakyRemover(failures: number): { remove: Remover; calls: () => number } {
  let calls = 0;
  return {
    remove: async () => {
      calls++;
      if (calls <= failures) throw busyError();
    },
    calls: () => calls,
  };
}

/* ============= safeDelete ============= */

describe('safeDelete', () => {
  it('retries until the file is released', async () => {
    const flaky = flakyRemover(2);

    const result = await safeDelete('/tmp/locked.pdf', policy, flaky.remove);

    expect(result).toEqual({ deleted: true, attempts: 3 });
    expect(flaky.calls()).toBe(3);
  });

  it('gives up after maxAttempts and reports the last error', async () => {
    const flaky = flakyRemover(10);

    const result = await safeDelete('/tmp/locked.pdf', policy, flaky.remove);

    expect(result).toEqual({
      deleted: false,
      attempts: 3,
      error: 'EBUSY: resource busy or locked',
    });
    expect(flaky.calls()).toBe(3);
  });

  it('treats an already missing file as deleted', async () => {
    const missing = path.join(os.tmpdir(), 'kb-cleanup-does-not-exist.txt');

    expect(await safeDelete(missing, policy)).toEqual({ deleted: true, attempts: 1 });
  });
});

/* ============= withTempFile ============= */

describe('withTempFile', () => {
  it('exposes the data under the original extension and deletes it afterwards', async () => {
    let seen = '';

    const text = await withTempFile(Buffer.from('line item | 10'), 'Bill.CSV', policy, async (p) => {
      seen = p;
      return fs.readFile(p, 'utf8');
    });

    expect(text).toBe('line item | 10');
    expect(path.extname(seen)).toBe('.csv');
    await expect(fs.access(seen)).rejects.toThrow();
  });

  it('deletes the file when the callback throws', async () => {
    let seen = '';

    await expect(
      withTempFile(Buffer.from('x'), 'bill.pdf', policy, async (p) => {
        seen = p;
        throw new Error('parse failed');
      })
    ).rejects.toThrow('parse failed');

    await expect(fs.access(seen)).rejects.toThrow();
  });
});
