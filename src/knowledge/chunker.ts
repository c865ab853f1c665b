// src/knowledge/chunker.ts
// Recursive character text splitting.
//
// Tries separators in order (paragraph, line, word, character), splitting on
// the first one present. Pieces shorter than chunkSize are merged greedily up
// to chunkSize; longer pieces recurse with the remaining separators. Each
// separator is kept at the start of the piece that follows it, and chunks are
// whitespace-trimmed. Consecutive chunks share up to chunkOverlap characters.

/* ============= Types ============= */

export interface ChunkerOptions {
  chunkSize: number;
  chunkOverlap: number;
  separators?: readonly string[];
}

export const DEFAULT_SEPARATORS: readonly string[] = ["\n\n", "\n", " ", ""];

/* ============= Helpers ============= */

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Split on `separator`, attaching each separator to the following piece. */
function splitKeepingSeparator(text: string, separator: string): string[] {
  if (!separator) {
    return Array.from(text).filter((s) => s !== "");
  }

  const parts = text.split(new RegExp(`(${escapeRegExp(separator)})`));
  const out: string[] = [parts[0]];
  for (let i = 1; i < parts.length; i += 2) {
    out.push(parts[i] + (parts[i + 1] ?? ""));
  }
  return out.filter((s) => s !== "");
}

function joinChunk(pieces: string[], separator: string): string | null {
  const text = pieces.join(separator).trim();
  return text === "" ? null : text;
}

function mergeSplits(
  splits: string[],
  separator: string,
  { chunkSize, chunkOverlap }: ChunkerOptions
): string[] {
  const sepLen = separator.length;
  const chunks: string[] = [];
  let current: string[] = [];
  let total = 0;

  for (const piece of splits) {
    const len = piece.length;
    const joinCost = () => (current.length > 0 ? sepLen : 0);

    if (total + len + joinCost() > chunkSize) {
      if (current.length > 0) {
        const chunk = joinChunk(current, separator);
        if (chunk !== null) chunks.push(chunk);

        // Drop from the front until what remains fits as overlap.
        while (
          total > chunkOverlap ||
          (total + len + joinCost() > chunkSize && total > 0)
        ) {
          total -= current[0].length + (current.length > 1 ? sepLen : 0);
          current = current.slice(1);
        }
      }
    }

    current.push(piece);
    total += len + (current.length > 1 ? sepLen : 0);
  }

  const last = joinChunk(current, separator);
  if (last !== null) chunks.push(last);
  return chunks;
}

function splitRecursive(
  text: string,
  separators: readonly string[],
  options: ChunkerOptions
): string[] {
  let separator = separators[separators.length - 1] ?? "";
  let remaining: readonly string[] = [];

  for (let i = 0; i < separators.length; i++) {
    const candidate = separators[i];
    if (candidate === "") {
      separator = candidate;
      break;
    }
    if (text.includes(candidate)) {
      separator = candidate;
      remaining = separators.slice(i + 1);
      break;
    }
  }

  const chunks: string[] = [];
  let goodSplits: string[] = [];

  for (const piece of splitKeepingSeparator(text, separator)) {
    if (piece.length < options.chunkSize) {
      goodSplits.push(piece);
      continue;
    }

    if (goodSplits.length > 0) {
      chunks.push(...mergeSplits(goodSplits, "", options));
      goodSplits = [];
    }

    if (remaining.length === 0) {
      chunks.push(piece);
    } else {
      chunks.push(...splitRecursive(piece, remaining, options));
    }
  }

  if (goodSplits.length > 0) {
    chunks.push(...mergeSplits(goodSplits, "", options));
  }

  return chunks;
}

/* ============= Public API ============= */

export function splitText(text: string, options: ChunkerOptions): string[] {
  if (options.chunkSize <= 0) {
    throw new RangeError(`chunkSize must be positive, got ${options.chunkSize}`);
  }
  if (options.chunkOverlap < 0 || options.chunkOverlap >= options.chunkSize) {
    throw new RangeError(
      `chunkOverlap must be in [0, chunkSize), got ${options.chunkOverlap}`
    );
  }
  return splitRecursive(text, options.separators ?? DEFAULT_SEPARATORS, options);
}
