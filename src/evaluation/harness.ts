// src/evaluation/harness.ts
// Replays a labeled query set through the knowledge base, scores each answer
// and persists the run as a timestamped JSON artifact.

import { promises as fs } from "node:fs";
import path from "node:path";
import { createLogger } from "../observability/logger";
import { ensureDir, isNotFound } from "../utils/fs";
import { errorMessage } from "../knowledge/errors";
import type { SearchResult, SearchStatus } from "../knowledge/types";
import { computeCaseMetrics, summarizeSubset, type CaseMetrics, type SubsetSummary } from "./metrics";
import sampleQueries from "./sampleQueries.json";

const log = createLogger("evaluation/harness");

/* ============= Types ============= */

export interface EvaluationCase {
  query: string;
  expectedAnswer: string;
  expectedSources?: string[];
  /** selects single-document search; absent → all documents */
  documentName?: string;
}

export type SearchType = "single" | "multi";

export interface EvaluationRecord {
  query: string;
  searchType: SearchType;
  documentName: string | null;
  metrics: CaseMetrics;
  confidence: number;
  timestamp: string;
}

export interface SkippedCase {
  query: string;
  documentName: string | null;
  status: SearchStatus;
  reason: string;
}

export interface EvaluationSummary {
  totalQueries: number;
  singleDocumentQueries: number;
  multiDocumentQueries: number;
  overall: SubsetSummary;
  single: SubsetSummary | null;
  multi: SubsetSummary | null;
}

export interface EvaluationRun {
  summary: EvaluationSummary;
  detailedResults: EvaluationRecord[];
  skipped: SkippedCase[];
  timestamp: string;
}

export interface EvaluationSearch {
  searchAll(question: string): Promise<SearchResult>;
  searchDocument(identifier: string, question: string): Promise<SearchResult>;
}

export type SaveResult =
  | { persisted: true; filename: string }
  | { persisted: false; error: string };

/* ============= Sample set ============= */

export function sampleTestQueries(): EvaluationCase[] {
  return sampleQueries.map((q) => ({ ...q, expectedSources: [...q.expectedSources] }));
}

/** Validate an untrusted test-case list (e.g. an HTTP body). */
export function parseEvaluationCases(raw: unknown): EvaluationCase[] | null {
  if (!Array.isArray(raw)) return null;
  const cases: EvaluationCase[] = [];
  for (const item of raw) {
    if (typeof item !== "object" || item === null) return null;
    if (!("query" in item) || typeof item.query !== "string" || !item.query.trim()) return null;
    if (!("expectedAnswer" in item) || typeof item.expectedAnswer !== "string") return null;

    const c: EvaluationCase = { query: item.query, expectedAnswer: item.expectedAnswer };
    if ("expectedSources" in item && item.expectedSources !== undefined) {
      const sources: unknown = item.expectedSources;
      if (!Array.isArray(sources) || !sources.every((s) => typeof s === "string")) return null;
      c.expectedSources = sources.filter((s): s is string => typeof s === "string");
    }
    if ("documentName" in item && item.documentName !== undefined && item.documentName !== null) {
      if (typeof item.documentName !== "string") return null;
      c.documentName = item.documentName;
    }
    cases.push(c);
  }
  return cases;
}

/* ============= Run ============= */

function skipReason(result: SearchResult): string | null {
  switch (result.status) {
    case "no_documents":
    case "not_indexed":
    case "failed":
      return result.error.message;
    default:
      return null;
  }
}

export function summarizeRecords(records: readonly EvaluationRecord[]): EvaluationSummary {
  const single = records.filter((r) => r.searchType === "single");
  const multi = records.filter((r) => r.searchType === "multi");
  return {
    totalQueries: records.length,
    singleDocumentQueries: single.length,
    multiDocumentQueries: multi.length,
    overall: summarizeSubset(records),
    single: single.length > 0 ? summarizeSubset(single) : null,
    multi: multi.length > 0 ? summarizeSubset(multi) : null,
  };
}

/** Cases run sequentially so the completion backend sees one request at a time. */
export async function runEvaluation(
  search: EvaluationSearch,
  cases: readonly EvaluationCase[],
  clock: () => Date = () => new Date()
): Promise<EvaluationRun> {
  const detailedResults: EvaluationRecord[] = [];
  const skipped: SkippedCase[] = [];

  for (const testCase of cases) {
    const documentName = testCase.documentName ?? null;
    const result =
      documentName !== null
        ? await search.searchDocument(documentName, testCase.query)
        : await search.searchAll(testCase.query);

    const reason = skipReason(result);
    if (reason !== null) {
      log.warn({ query: testCase.query, status: result.status }, "Skipping evaluation case");
      skipped.push({ query: testCase.query, documentName, status: result.status, reason });
      continue;
    }

    detailedResults.push({
      query: testCase.query,
      searchType: documentName !== null ? "single" : "multi",
      documentName,
      metrics: computeCaseMetrics(
        testCase.expectedAnswer,
        result.answer,
        testCase.expectedSources ?? [],
        result.details.sources
      ),
      confidence: result.confidence,
      timestamp: clock().toISOString(),
    });
  }

  const run: EvaluationRun = {
    summary: summarizeRecords(detailedResults),
    detailedResults,
    skipped,
    timestamp: clock().toISOString(),
  };
  log.info(
    { evaluated: detailedResults.length, skipped: skipped.length },
    "Evaluation run complete"
  );
  return run;
}

/* ============= Persistence ============= */

export const RUN_FILENAME_PATTERN = /^evaluation_results_(\d{8}_\d{6})(?:_(\d+))?\.json$/;

function runOrderKey(filename: string): { stamp: string; seq: number } {
  const m = RUN_FILENAME_PATTERN.exec(filename);
  return { stamp: m ? m[1] : "", seq: m && m[2] !== undefined ? Number(m[2]) : 0 };
}

/** Newest first: by timestamp, then by the numeric collision suffix. */
export function compareRunsNewestFirst(a: string, b: string): number {
  const ka = runOrderKey(a);
  const kb = runOrderKey(b);
  if (ka.stamp !== kb.stamp) return ka.stamp < kb.stamp ? 1 : -1;
  return kb.seq - ka.seq;
}

export class InvalidRunFilename extends Error {
  constructor(filename: string) {
    super(`Not an evaluation results filename: ${filename}`);
    this.name = "InvalidRunFilename";
  }
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** UTC `YYYYMMDD_HHMMSS` */
export function runStamp(d: Date): string {
  return (
    `${d.getUTCFullYear()}${pad(d.getUTCMonth() + 1)}${pad(d.getUTCDate())}_` +
    `${pad(d.getUTCHours())}${pad(d.getUTCMinutes())}${pad(d.getUTCSeconds())}`
  );
}

function isEvaluationRun(v: unknown): v is EvaluationRun {
  return (
    typeof v === "object" &&
    v !== null &&
    "summary" in v &&
    typeof v.summary === "object" &&
    "detailedResults" in v &&
    Array.isArray(v.detailedResults) &&
    "timestamp" in v &&
    typeof v.timestamp === "string"
  );
}

function hasCode(err: unknown, code: string): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === code;
}

export class EvaluationStore {
  constructor(
    private readonly dir: string,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /** Never throws; a write failure is reported in the result. */
  async saveRun(run: EvaluationRun): Promise<SaveResult> {
    try {
      await ensureDir(this.dir);
      const body = JSON.stringify(run, null, 2);
      const stem = `evaluation_results_${runStamp(this.clock())}`;

      for (let n = 0; ; n++) {
        const filename = n === 0 ? `${stem}.json` : `${stem}_${n}.json`;
        try {
          await fs.writeFile(path.join(this.dir, filename), body, { flag: "wx" });
          log.info({ filename }, "Saved evaluation run");
          return { persisted: true, filename };
        } catch (err) {
          if (!hasCode(err, "EEXIST")) throw err;
        }
      }
    } catch (err) {
      log.error({ err: errorMessage(err), dir: this.dir }, "Failed to save evaluation run");
      return { persisted: false, error: errorMessage(err) };
    }
  }

  /** Artifact filenames, most recent first. */
  async listRuns(): Promise<string[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.dir);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }
    return names.filter((n) => RUN_FILENAME_PATTERN.test(n)).sort(compareRunsNewestFirst);
  }

  /** null when the artifact does not exist or cannot be parsed. */
  async loadRun(filename: string): Promise<EvaluationRun | null> {
    if (!RUN_FILENAME_PATTERN.test(filename)) throw new InvalidRunFilename(filename);

    let raw: string;
    try {
      raw = await fs.readFile(path.join(this.dir, filename), "utf8");
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }

    try {
      const parsed: unknown = JSON.parse(raw);
      if (isEvaluationRun(parsed)) return parsed;
      log.error({ filename }, "Evaluation artifact has an unexpected shape");
    } catch (err) {
      log.error({ filename, err: errorMessage(err) }, "Evaluation artifact is not valid JSON");
    }
    return null;
  }
}
