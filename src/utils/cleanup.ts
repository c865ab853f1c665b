// src/utils/cleanup.ts
// Temporary-file handling with a bounded deletion retry.
//
// On some platforms a file stays locked briefly after a parser closes it,
// so deletion is retried a fixed number of times before giving up.

import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { nanoid } from "nanoid";
import { createLogger } from "../observability/logger";
import { isNotFound } from "./fs";

const log = createLogger("utils/cleanup");

export interface RetryPolicy {
  maxAttempts: number;
  delayMs: number;
}

export interface SafeDeleteResult {
  deleted: boolean;
  attempts: number;
  error?: string;
}

/** Injection point for tests; defaults to fs.rm */
export type Remover = (p: string) => Promise<void>;

const defaultRemover: Remover = (p) => fs.rm(p);

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Delete a file, retrying up to maxAttempts with a fixed delay.
 * A file that is already gone counts as deleted.
 */
export async function safeDelete(
  filePath: string,
  policy: RetryPolicy,
  remove: Remover = defaultRemover
): Promise<SafeDeleteResult> {
  const maxAttempts = Math.max(1, policy.maxAttempts);
  let lastError = "";

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      await remove(filePath);
      return { deleted: true, attempts: attempt };
    } catch (err) {
      if (isNotFound(err)) return { deleted: true, attempts: attempt };
      lastError = err instanceof Error ? err.message : String(err);
      if (attempt < maxAttempts) await sleep(policy.delayMs);
    }
  }

  log.warn(
    { filePath, attempts: maxAttempts, error: lastError },
    "Could not delete temporary file"
  );
  return { deleted: false, attempts: maxAttempts, error: lastError };
}

/**
 * Write `data` to a uniquely named temporary file, run `fn` on its path,
 * and delete the file afterwards whether `fn` succeeds or throws.
 */
export async function withTempFile<T>(
  data: Buffer,
  filename: string,
  policy: RetryPolicy,
  fn: (tempPath: string) => Promise<T>,
  remove: Remover = defaultRemover
): Promise<T> {
  const ext = path.extname(filename).toLowerCase();
  const tempPath = path.join(os.tmpdir(), `upload-${nanoid(12)}${ext}`);

  await fs.writeFile(tempPath, data);
  try {
    return await fn(tempPath);
  } finally {
    await safeDelete(tempPath, policy, remove);
  }
}
