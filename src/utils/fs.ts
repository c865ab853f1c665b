/* src/utils/fs.ts
   Small FS helpers shared by the index store, the local vector store
   and the evaluation harness */
import { promises as fs } from 'node:fs';
import path from 'node:path';
import crypto from 'node:crypto';

export async function ensureDir(dir: string): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
}

function errorCode(err: unknown): string | undefined {
  if (err && typeof err === 'object' && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export function isNotFound(err: unknown): boolean {
  return errorCode(err) === 'ENOENT';
}

/**
 * Write to a temporary sibling, then rename over the target.
 * Falls back to copy+unlink when rename fails across devices (EXDEV/EPERM).
 */
export async function writeFileAtomic(finalPath: string, data: Buffer | string): Promise<void> {
  const dir = path.dirname(finalPath);
  await ensureDir(dir);

  const tmp = path.join(dir, `.tmp-${crypto.randomUUID()}`);
  const buf = typeof data === 'string' ? Buffer.from(data, 'utf8') : data;

  await fs.writeFile(tmp, buf);
  try {
    await fs.rename(tmp, finalPath);
  } catch (err) {
    const code = errorCode(err);
    if (code === 'EXDEV' || code === 'EPERM') {
      await fs.copyFile(tmp, finalPath);
      await fs.rm(tmp, { force: true });
    } else {
      await fs.rm(tmp, { force: true });
      throw err;
    }
  }
}

export async function fileExists(p: string): Promise<boolean> {
  try {
    const st = await fs.stat(p);
    return st.isFile();
  } catch (err) {
    if (isNotFound(err)) return false;
    throw err;
  }
}

/** Read and parse a JSON file; null when it does not exist. */
export async function readJsonFile(p: string): Promise<unknown> {
  try {
    const raw = await fs.readFile(p, 'utf8');
    return JSON.parse(raw);
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }
}

export function md5Hex(input: string): string {
  return crypto.createHash('md5').update(input, 'utf8').digest('hex');
}
