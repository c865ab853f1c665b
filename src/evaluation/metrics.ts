// src/evaluation/metrics.ts
// Per-query retrieval quality metrics and their aggregation.
//
// All text metrics work on lower-cased, whitespace-split word sets, so they
// measure vocabulary overlap only; they are a regression signal, not a
// judgement of answer correctness.

export interface SourceMetrics {
  precision: number;
  recall: number;
  f1: number;
  /** |E ∩ A| / |E ∪ A| */
  accuracy: number;
}

export interface CaseMetrics {
  answerRelevance: number;
  keywordCoverage: number;
  lengthRatio: number;
  /** present only when both expected and actual sources are non-empty */
  sources?: SourceMetrics;
}

export function words(text: string): string[] {
  return text.toLowerCase().split(/\s+/).filter((w) => w.length > 0);
}

function intersectionSize<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): number {
  let n = 0;
  for (const v of a) if (b.has(v)) n++;
  return n;
}

/** Word-set Jaccard; 1 when both texts are empty, 0 when exactly one is. */
export function answerRelevance(expected: string, actual: string): number {
  const e = new Set(words(expected));
  const a = new Set(words(actual));
  if (e.size === 0 && a.size === 0) return 1;
  if (e.size === 0 || a.size === 0) return 0;
  const shared = intersectionSize(e, a);
  return shared / (e.size + a.size - shared);
}

export function keywordCoverage(expected: string, actual: string): number {
  const e = new Set(words(expected));
  if (e.size === 0) return 0;
  return intersectionSize(e, new Set(words(actual))) / e.size;
}

export function lengthRatio(expected: string, actual: string): number {
  const expectedCount = words(expected).length;
  return expectedCount === 0 ? 0 : words(actual).length / expectedCount;
}

export function sourceMetrics(
  expected: readonly string[],
  actual: readonly string[]
): SourceMetrics | undefined {
  if (expected.length === 0 || actual.length === 0) return undefined;
  const e = new Set(expected);
  const a = new Set(actual);
  const shared = intersectionSize(e, a);
  const precision = shared / a.size;
  const recall = shared / e.size;
  const f1 = precision + recall > 0 ? (2 * precision * recall) / (precision + recall) : 0;
  return { precision, recall, f1, accuracy: shared / (e.size + a.size - shared) };
}

export function computeCaseMetrics(
  expectedAnswer: string,
  actualAnswer: string,
  expectedSources: readonly string[] = [],
  actualSources: readonly string[] = []
): CaseMetrics {
  const metrics: CaseMetrics = {
    answerRelevance: answerRelevance(expectedAnswer, actualAnswer),
    keywordCoverage: keywordCoverage(expectedAnswer, actualAnswer),
    lengthRatio: lengthRatio(expectedAnswer, actualAnswer),
  };
  const sources = sourceMetrics(expectedSources, actualSources);
  if (sources) metrics.sources = sources;
  return metrics;
}

/* ---------- Aggregation ---------- */

export interface MetricStats {
  mean: number;
  /** population standard deviation */
  std: number;
}

export function stats(values: readonly number[]): MetricStats {
  if (values.length === 0) return { mean: 0, std: 0 };
  const mean = values.reduce((s, v) => s + v, 0) / values.length;
  const variance = values.reduce((s, v) => s + (v - mean) ** 2, 0) / values.length;
  return { mean, std: Math.sqrt(variance) };
}

export interface SubsetSummary {
  count: number;
  answerRelevance: MetricStats;
  keywordCoverage: MetricStats;
  lengthRatio: MetricStats;
  confidence: MetricStats;
  /** null when no record in the subset has source metrics */
  sources: {
    count: number;
    precision: MetricStats;
    recall: MetricStats;
    f1: MetricStats;
    accuracy: MetricStats;
  } | null;
}

export function summarizeSubset(
  records: ReadonlyArray<{ metrics: CaseMetrics; confidence: number }>
): SubsetSummary {
  const pick = (f: (r: { metrics: CaseMetrics; confidence: number }) => number) =>
    stats(records.map(f));

  const withSources: SourceMetrics[] = [];
  for (const r of records) if (r.metrics.sources) withSources.push(r.metrics.sources);

  return {
    count: records.length,
    answerRelevance: pick((r) => r.metrics.answerRelevance),
    keywordCoverage: pick((r) => r.metrics.keywordCoverage),
    lengthRatio: pick((r) => r.metrics.lengthRatio),
    confidence: pick((r) => r.confidence),
    sources:
      withSources.length === 0
        ? null
        : {
            count: withSources.length,
            precision: stats(withSources.map((s) => s.precision)),
            recall: stats(withSources.map((s) => s.recall)),
            f1: stats(withSources.map((s) => s.f1)),
            accuracy: stats(withSources.map((s) => s.accuracy)),
          },
  };
}
