// src/knowledge/eligibility.ts
// Yes/no eligibility checks of bill line items against the indexed policies.
//
// Each distinct item description is asked once through the multi-document
// search; the boolean is memoized in an LRU cache that is cleared whenever
// the knowledge base changes.

import path from "node:path";
import type { TextExtractor } from "../extraction/textExtractor";
import { isExtractable } from "../extraction/textExtractor";
import { createLogger } from "../observability/logger";
import { recordEligibilityLookup } from "../observability/metrics";
import { withTempFile, type RetryPolicy } from "../utils/cleanup";
import { ExtractionFailure, UnsupportedFileType, errorMessage } from "./errors";
import type { ChangeListener, SearchResult, SearchStatus } from "./types";

const log = createLogger("knowledge/eligibility");

/* ============= Cache ============= */

export interface EligibilityCacheOptions {
  maxEntries: number;
  /** 0 disables expiry */
  ttlMs?: number;
  now?: () => number;
}

interface CacheEntry {
  value: boolean;
  storedAt: number;
}

/**
 * Bounded map of item description → eligibility. Map insertion order is the
 * recency order: reads re-insert, evictions take the first key.
 */
export class EligibilityCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly maxEntries: number;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(opts: EligibilityCacheOptions) {
    this.maxEntries = Math.max(1, opts.maxEntries);
    this.ttlMs = Math.max(0, opts.ttlMs ?? 0);
    this.now = opts.now ?? Date.now;
  }

  private expired(entry: CacheEntry): boolean {
    return this.ttlMs > 0 && this.now() - entry.storedAt >= this.ttlMs;
  }

  get(key: string): boolean | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    this.entries.delete(key);
    if (this.expired(entry)) return undefined;
    this.entries.set(key, entry);
    return entry.value;
  }

  has(key: string): boolean {
    const entry = this.entries.get(key);
    return entry !== undefined && !this.expired(entry);
  }

  set(key: string, value: boolean): void {
    this.entries.delete(key);
    this.entries.set(key, { value, storedAt: this.now() });
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  invalidate(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

/* ============= Query & answer normalization ============= */

export function normalizeQuery(query: string): string {
  return query
    .toLowerCase()
    .replace(/summarise/g, "summarize")
    .replace(/this documents/g, "these documents");
}

export function buildEligibilityQuestion(item: string): string {
  return normalizeQuery(
    `Is '${item}' payable under my insurance policy? Answer with ONLY 'Yes' or 'No'. Do not provide any explanation.`
  );
}

export function normalizeAnswer(answer: string): string {
  return answer.trim().toLowerCase().replace(/[.!]+$/, "").trim();
}

/** Only a bare "yes" counts; hedged answers are not eligible. */
export function isEligibleAnswer(answer: string): boolean {
  return normalizeAnswer(answer) === "yes";
}

/* ============= Bill parsing ============= */

export interface BillItem {
  description: string;
  amount: number;
}

const CELL_SEPARATOR = /\s*\|\s*|\t+|\s{2,}/;
const ROW_PREFIX = /^Row \d+:\s*/;
const TRAILING_AMOUNT = /^(.*\p{L}.*?)\s+([^\s\d]{0,4}\d[\d,]*(?:\.\d+)?)$/u;

/** "Rs. 1,200.50" → 1200.5; NaN when no number remains */
export function parseAmount(cell: string): number {
  const stripped = cell.replace(/[^\d.]+/g, "").replace(/^\.+|\.+$/g, "");
  return stripped ? Number(stripped) : NaN;
}

function splitCells(line: string): string[] {
  return line
    .replace(ROW_PREFIX, "")
    .split(CELL_SEPARATOR)
    .map((c) => c.trim())
    .filter((c) => c.length > 0);
}

/**
 * Line items from extracted bill text. A row is kept when its first cell is
 * a description and a later cell holds a number. Single-cell lines of the
 * form "description amount" are accepted as well.
 */
export function parseBillItems(text: string): BillItem[] {
  const items: BillItem[] = [];

  for (const line of text.split(/\r?\n/)) {
    let cells = splitCells(line);
    if (cells.length === 1) {
      const m = TRAILING_AMOUNT.exec(cells[0]);
      if (m) cells = [m[1].trim(), m[2]];
    }
    if (cells.length < 2) continue;

    const [description, ...rest] = cells;
    if (/^\d/.test(description) && !/\p{L}/u.test(description)) continue;

    for (const cell of rest) {
      if (!/\d/.test(cell)) continue;
      const amount = parseAmount(cell);
      if (Number.isNaN(amount)) continue;
      items.push({ description, amount });
      break;
    }
  }
  return items;
}

/* ============= Checker ============= */

export interface EligibilitySearch {
  searchAll(question: string): Promise<SearchResult>;
  onChange(listener: ChangeListener): () => void;
}

export interface ItemEligibility extends BillItem {
  eligible: boolean;
  cached: boolean;
  /** search outcome; absent when served from cache */
  status?: SearchStatus;
}

export interface EligibilityReport {
  items: ItemEligibility[];
  totalAmount: number;
  totalEligibleAmount: number;
}

export interface EligibilityCheckerOptions {
  search: EligibilitySearch;
  cache: EligibilityCache;
  extractor: TextExtractor;
  cleanup: RetryPolicy;
}

function roundCurrency(n: number): number {
  return Math.round(n * 100) / 100;
}

export class EligibilityChecker {
  private readonly unsubscribe: () => void;

  constructor(private readonly opts: EligibilityCheckerOptions) {
    this.unsubscribe = opts.search.onChange((change) => {
      if (opts.cache.size > 0) {
        log.debug({ change: change.kind, entries: opts.cache.size }, "Clearing eligibility cache");
      }
      opts.cache.clear();
    });
  }

  /** Stop listening for knowledge-base changes. */
  close(): void {
    this.unsubscribe();
  }

  /** Eligibility of one description, from cache or a fresh search. The exact description is the cache key. */
  async classify(description: string): Promise<{ eligible: boolean; cached: boolean; status?: SearchStatus }> {
    const key = description;
    const hit = this.opts.cache.get(key);
    if (hit !== undefined) {
      recordEligibilityLookup("hit");
      return { eligible: hit, cached: true };
    }
    recordEligibilityLookup("miss");

    const result = await this.opts.search.searchAll(buildEligibilityQuestion(key));
    const eligible = result.status === "answered" && isEligibleAnswer(result.answer);

    // Transient outcomes are not memoized.
    if (result.status === "answered" || result.status === "no_match") {
      this.opts.cache.set(key, eligible);
    }
    log.debug({ item: key, status: result.status, eligible }, "Classified line item");
    return { eligible, cached: false, status: result.status };
  }

  async checkItems(items: readonly BillItem[]): Promise<EligibilityReport> {
    const out: ItemEligibility[] = [];
    let totalAmount = 0;
    let totalEligibleAmount = 0;

    for (const item of items) {
      const verdict = await this.classify(item.description);
      out.push({ description: item.description, amount: item.amount, ...verdict });
      totalAmount += item.amount;
      if (verdict.eligible) totalEligibleAmount += item.amount;
    }

    log.info(
      { items: out.length, eligible: out.filter((i) => i.eligible).length },
      "Checked line items"
    );
    return {
      items: out,
      totalAmount: roundCurrency(totalAmount),
      totalEligibleAmount: roundCurrency(totalEligibleAmount),
    };
  }

  checkBill(text: string): Promise<EligibilityReport> {
    return this.checkItems(parseBillItems(text));
  }

  /** The upload lives in a temporary file only for the duration of extraction. */
  async checkBillFile(data: Buffer, filename: string): Promise<EligibilityReport> {
    if (!isExtractable(filename)) {
      throw new UnsupportedFileType(filename, path.extname(filename).toLowerCase());
    }
    let text: string;
    try {
      text = await withTempFile(data, filename, this.opts.cleanup, (tempPath) =>
        this.opts.extractor.extract(tempPath)
      );
    } catch (err) {
      throw new ExtractionFailure(filename, errorMessage(err));
    }
    if (!text.trim()) throw new ExtractionFailure(filename);
    return this.checkBill(text);
  }
}
