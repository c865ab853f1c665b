// src/knowledge/collectionName.ts
// Deterministic collection-name derivation.
//
// doc_{base}_{hash8}: base is a sanitized, truncated form of the filename
// without its extension; hash8 is the first 8 hex chars of md5(filename).
// Same filename always yields the same name; the hash suffix survives any
// truncation so distinct filenames stay distinct.

import path from "node:path";
import { md5Hex } from "../utils/fs";

/* ============= Constants ============= */

export const MAX_COLLECTION_NAME_LENGTH = 63;
const BASE_NAME_MAX_CHARS = 20;
const MIN_BASE_LENGTH = 3;
const HASH_LENGTH = 8;

/** Strip the final extension, as path.parse does ("a.b.pdf" → "a.b", ".env" → ".env"). */
function stripExtension(filename: string): string {
  const ext = path.extname(filename);
  return ext ? filename.slice(0, -ext.length) : filename;
}

function sanitizeBase(raw: string): string {
  let name = Array.from(raw).slice(0, BASE_NAME_MAX_CHARS).join("");
  name = name.replace(/[^A-Za-z0-9]/g, "_");
  name = name.replace(/^_+|_+$/g, "");
  name = name.replace(/_{2,}/g, "_");
  if (name.length < MIN_BASE_LENGTH) name = `doc_${name}`;
  return name;
}

export function collectionHash(filename: string): string {
  return md5Hex(filename).slice(0, HASH_LENGTH);
}

export function deriveCollectionName(filename: string): string {
  const hash = collectionHash(filename);
  const base = sanitizeBase(stripExtension(filename));
  const name = `doc_${base}_${hash}`;

  if (name.length > MAX_COLLECTION_NAME_LENGTH) {
    const keep = MAX_COLLECTION_NAME_LENGTH - HASH_LENGTH - 1;
    return `${name.slice(0, keep)}_${hash}`;
  }
  return name;
}
