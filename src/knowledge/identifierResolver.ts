// src/knowledge/identifierResolver.ts
// Resolve a loosely specified document identifier to one collection.
//
// Rules, first match wins:
//   1. stored path, exact then case-insensitive
//   2. collection name, exact then case-insensitive
//   3. basename of the stored path, case-insensitive
//   4. basename without extension, case-insensitive

import { IdentifierNotFound } from "./errors";

export interface ResolverEntry {
  path: string;
  collectionName: string;
}

/** Basename that accepts both `/` and `\` separators. */
export function baseName(p: string): string {
  const parts = p.split(/[\\/]/);
  return parts[parts.length - 1] ?? p;
}

export function stripExtension(name: string): string {
  const dot = name.lastIndexOf(".");
  return dot > 0 ? name.slice(0, dot) : name;
}

type Matcher = (entry: ResolverEntry, id: string, idLower: string) => boolean;

const RULES: readonly Matcher[] = [
  (e, id) => e.path === id,
  (e, _id, lower) => e.path.toLowerCase() === lower,
  (e, id) => e.collectionName === id,
  (e, _id, lower) => e.collectionName.toLowerCase() === lower,
  (e, _id, lower) => baseName(e.path).toLowerCase() === lower,
  (e, _id, lower) => stripExtension(baseName(e.path)).toLowerCase() === lower,
];

/**
 * Returns the collection name for `identifier`, or throws IdentifierNotFound.
 * Within a rule, entries are tried in the order given.
 */
export function resolveCollection(
  identifier: string,
  entries: readonly ResolverEntry[]
): string {
  const id = identifier.trim();
  if (id) {
    const lower = id.toLowerCase();
    for (const rule of RULES) {
      const hit = entries.find((e) => rule(e, id, lower));
      if (hit) return hit.collectionName;
    }
  }
  throw new IdentifierNotFound(identifier);
}

/** Non-throwing variant. */
export function tryResolveCollection(
  identifier: string,
  entries: readonly ResolverEntry[]
): string | null {
  try {
    return resolveCollection(identifier, entries);
  } catch (err) {
    if (err instanceof IdentifierNotFound) return null;
    throw err;
  }
}
