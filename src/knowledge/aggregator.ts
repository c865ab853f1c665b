// src/knowledge/aggregator.ts
// Multi-document retrieval aggregation.
//
// Pipeline:
//   1. query every target collection for its top-k chunks (failures excluded)
//   2. flatten candidates in collection order, then rank order
//   3. pick the best source (smallest defined distance, first wins ties)
//   4. confidence = clamp(1 - minDistance, 0, 1), 0 when no distance is defined
//   5. one combined prompt → Completion Service, answer returned verbatim
//
// The affine confidence is uncalibrated across embedding models; it is kept
// for compatibility with stored evaluation runs.

import type { CompletionService } from "../ai/types";
import type { VectorStore } from "../vectorstore/types";
import { createLogger } from "../observability/logger";
import { recordSearch } from "../observability/metrics";
import { errorMessage } from "./errors";
import { baseName } from "./identifierResolver";
import {
  GENERAL_KNOWLEDGE_SOURCE,
  MULTIPLE_DOCUMENTS_SOURCE,
  type RetrievalCandidate,
  type SearchDetails,
  type SearchResult,
} from "./types";

const log = createLogger("knowledge/aggregator");

/* ============= Constants ============= */

export const NO_MATCH_MULTI_ANSWER =
  "I couldn't find any relevant information in the documents.";
export const NO_MATCH_SINGLE_ANSWER =
  "I couldn't find any relevant information in the document.";

/* ============= Prompts ============= */

export function buildMultiDocumentPrompt(question: string, context: string): string {
  return (
    "Based on the following information from multiple documents, please provide a " +
    "comprehensive answer to the question. If the information is not sufficient, say so.\n\n" +
    `Question: ${question}\n\n` +
    `Information from documents:\n${context}\n\n` +
    "Answer:"
  );
}

export function buildSingleDocumentPrompt(question: string, context: string): string {
  return (
    "Based on the following information from the document, please answer the question. " +
    "If the information is not sufficient, say so.\n\n" +
    `Question: ${question}\n\n` +
    `Information from document:\n${context}\n\n` +
    "Answer:"
  );
}

/* ============= Ranking ============= */

/**
 * Index of the candidate with the smallest defined distance. Falls back to
 * the first candidate when no distance is defined; null only for an empty list.
 */
export function selectBestCandidate(candidates: readonly RetrievalCandidate[]): number | null {
  if (candidates.length === 0) return null;
  let best = 0;
  let found = false;
  let bestDistance = Infinity;
  for (let i = 0; i < candidates.length; i++) {
    const d = candidates[i].distance;
    if (d !== null && (!found || d < bestDistance)) {
      bestDistance = d;
      best = i;
      found = true;
    }
  }
  return best;
}

/** clamp(1 - minDistance, 0, 1); distances outside [0, 1] saturate. */
export function computeConfidence(candidates: readonly RetrievalCandidate[]): number {
  const defined = candidates
    .map((c) => c.distance)
    .filter((d): d is number => d !== null);
  if (defined.length === 0) return 0;
  return Math.max(0, Math.min(1, 1 - Math.min(...defined)));
}

/* ============= Fan-out ============= */

export interface CollectionTarget {
  collectionName: string;
  documentName: string;
}

export interface AggregatorDeps {
  vectorStore: VectorStore;
  completion: CompletionService;
  topK: number;
}

export interface GatheredCandidates {
  candidates: RetrievalCandidate[];
  answeredCollections: number;
  failedCollections: string[];
}

export async function gatherCandidates(
  deps: Pick<AggregatorDeps, "vectorStore" | "topK">,
  question: string,
  targets: readonly CollectionTarget[]
): Promise<GatheredCandidates> {
  const settled = await Promise.allSettled(
    targets.map((t) => deps.vectorStore.query(t.collectionName, question, deps.topK))
  );

  const candidates: RetrievalCandidate[] = [];
  const failedCollections: string[] = [];
  let answeredCollections = 0;

  settled.forEach((outcome, i) => {
    const target = targets[i];
    if (outcome.status === "rejected") {
      log.warn(
        { collection: target.collectionName, err: errorMessage(outcome.reason) },
        "Collection query failed; excluding it from the answer"
      );
      failedCollections.push(target.collectionName);
      return;
    }
    answeredCollections++;
    for (const match of outcome.value) {
      candidates.push({
        documentName: target.documentName,
        chunkText: match.text,
        distance: match.distance,
      });
    }
  });

  return { candidates, answeredCollections, failedCollections };
}

/* ============= Search ============= */

export type SearchScope = "single" | "multi";

interface ScopeSettings {
  noMatchAnswer: string;
  noMatchSource: (targets: readonly CollectionTarget[]) => string;
  buildPrompt: (question: string, context: string) => string;
}

const SCOPES: Record<SearchScope, ScopeSettings> = {
  multi: {
    noMatchAnswer: NO_MATCH_MULTI_ANSWER,
    noMatchSource: () => GENERAL_KNOWLEDGE_SOURCE,
    buildPrompt: buildMultiDocumentPrompt,
  },
  single: {
    noMatchAnswer: NO_MATCH_SINGLE_ANSWER,
    noMatchSource: (targets) =>
      targets.length > 0 ? baseName(targets[0].documentName) : GENERAL_KNOWLEDGE_SOURCE,
    buildPrompt: buildSingleDocumentPrompt,
  },
};

/**
 * Run the retrieval pipeline over `targets` and ask the Completion Service
 * once. Never throws: failures become a `failed` result.
 */
export async function aggregateSearch(
  deps: AggregatorDeps,
  question: string,
  targets: readonly CollectionTarget[],
  scope: SearchScope = "multi"
): Promise<SearchResult> {
  const started = Date.now();
  const settings = SCOPES[scope];
  const gathered = await gatherCandidates(deps, question, targets);
  const { candidates } = gathered;

  const details: SearchDetails = {
    sources: [],
    totalSourcesChecked: gathered.answeredCollections,
    failedCollections: gathered.failedCollections,
  };

  const finish = (result: SearchResult): SearchResult => {
    recordSearch(scope, result.status, Date.now() - started);
    return result;
  };

  if (targets.length > 0 && gathered.answeredCollections === 0) {
    return finish({
      status: "failed",
      answer: "",
      source: settings.noMatchSource(targets),
      confidence: 0,
      details,
      error: {
        code: "storage_failure",
        message: `All ${targets.length} collection queries failed`,
      },
    });
  }

  if (candidates.length === 0) {
    return finish({
      status: "no_match",
      answer: settings.noMatchAnswer,
      source: settings.noMatchSource(targets),
      confidence: 0,
      details,
    });
  }

  const bestIndex = selectBestCandidate(candidates);
  const winner = bestIndex === null ? null : baseName(candidates[bestIndex].documentName);
  const source =
    scope === "single"
      ? settings.noMatchSource(targets)
      : winner ?? MULTIPLE_DOCUMENTS_SOURCE;
  details.sources = winner ? [winner] : [];
  const confidence = computeConfidence(candidates);

  const context = candidates.map((c) => c.chunkText).join("\n");
  const prompt = settings.buildPrompt(question, context);
  log.debug(
    { scope, candidates: candidates.length, source, confidence },
    "Sending combined prompt"
  );

  try {
    const answer = await deps.completion.complete(prompt);
    return finish({ status: "answered", answer, source, confidence, details });
  } catch (err) {
    log.error({ err: errorMessage(err), scope }, "Completion call failed");
    return finish({
      status: "failed",
      answer: "",
      source,
      confidence: 0,
      details,
      error: { code: "completion_failed", message: `Completion failed: ${errorMessage(err)}` },
    });
  }
}
