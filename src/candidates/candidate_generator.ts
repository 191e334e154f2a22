import type { CandidateConfig } from "../config/siren_config";
import {
  RawNativeCandidateSchema,
  freezeCandidate,
  type Candidate,
} from "../contracts/candidate";
import type { IntentVector } from "../intent/intent_vector";
import { normalizeBaseScore } from "../scoring/resonance_scorer";
import type { AuxiliaryIndex, IndexHit } from "./vocabulary_index";

export type CandidateWarning = "malformed_candidate" | "index_unavailable";

export type CandidateGeneration = {
  candidates: Candidate[];
  nativeCount: number;
  auxiliaryCount: number;
  droppedMalformed: number;
  duplicatesMerged: number;
  warnings: CandidateWarning[];
  indexError?: string;
};

export type GenerateCandidatesArgs = {
  native: readonly unknown[];
  intent: IntentVector | null;
  index?: AuxiliaryIndex | null;
  config: CandidateConfig;
  embeddingDim: number;
};

// Logits and probabilities compare on the same [0, 1] scale.
const normalizedBaseOf = (candidate: Candidate) =>
  normalizeBaseScore(candidate.baseScore.value, candidate.baseScore.kind === "logit");

const compareNative = (a: Candidate, b: Candidate) => {
  const byScore = normalizedBaseOf(b) - normalizedBaseOf(a);
  if (byScore !== 0) return byScore;
  if (a.tokenId < b.tokenId) return -1;
  if (a.tokenId > b.tokenId) return 1;
  return 0;
};

function parseNative(
  raw: readonly unknown[],
  config: CandidateConfig,
  embeddingDim: number
): { valid: Candidate[]; dropped: number } {
  const valid: Candidate[] = [];
  let dropped = 0;
  for (const item of raw) {
    const parsed = RawNativeCandidateSchema.safeParse(item);
    if (!parsed.success || !parsed.data.embedding || parsed.data.embedding.length !== embeddingDim) {
      dropped += 1;
      continue;
    }
    valid.push(
      freezeCandidate({
        tokenId: parsed.data.tokenId,
        vocabulary: parsed.data.vocabulary ?? config.defaultVocabulary,
        source: "native",
        embedding: parsed.data.embedding,
        baseScore: { value: parsed.data.baseScore, kind: parsed.data.scoreKind },
      })
    );
  }
  return { valid, dropped };
}

async function searchWithTimeout(
  index: AuxiliaryIndex,
  query: readonly number[],
  k: number,
  timeoutMs: number
): Promise<IndexHit[]> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new Error(`index_timeout_${timeoutMs}ms`));
    }, timeoutMs);
  });
  try {
    return await Promise.race([index.search(query, k, { signal: controller.signal }), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

const isValidHit = (hit: IndexHit, embeddingDim: number) =>
  typeof hit.tokenId === "string" &&
  hit.tokenId.length > 0 &&
  hit.embedding.length === embeddingDim &&
  hit.embedding.every((value) => Number.isFinite(value)) &&
  (hit.baseScore === undefined || Number.isFinite(hit.baseScore.value));

/**
 * Bounded candidate set for one step: the decoder's own proposals first,
 * then intent neighbours from the auxiliary index. Never throws; index
 * failures degrade to native-only.
 *
 * Ordering:
 * 1. Native, by normalized base score (desc), de-duplicated, capped at maxCandidates.
 * 2. Auxiliary, by similarity (desc), skipping token ids already present.
 */
export async function generateCandidates(args: GenerateCandidatesArgs): Promise<CandidateGeneration> {
  const { config, embeddingDim } = args;
  const warnings: CandidateWarning[] = [];

  const { valid, dropped } = parseNative(args.native, config, embeddingDim);
  let droppedMalformed = dropped;

  const seen = new Set<string>();
  const candidates: Candidate[] = [];
  let duplicatesMerged = 0;

  for (const candidate of [...valid].sort(compareNative)) {
    if (seen.has(candidate.tokenId)) {
      duplicatesMerged += 1;
      continue;
    }
    if (candidates.length >= config.maxCandidates) break;
    seen.add(candidate.tokenId);
    candidates.push(candidate);
  }
  const nativeCount = candidates.length;

  let indexError: string | undefined;
  const room = Math.min(config.auxiliaryTopK, config.maxCandidates - candidates.length);
  if (args.index && args.intent && config.auxiliaryTopK > 0) {
    let hits: IndexHit[] = [];
    try {
      // Over-fetch by the native count so duplicates do not starve K'.
      hits = await searchWithTimeout(
        args.index,
        args.intent.vector,
        config.auxiliaryTopK + nativeCount,
        config.indexTimeoutMs
      );
    } catch (error) {
      indexError = error instanceof Error ? error.message : String(error);
      warnings.push("index_unavailable");
    }

    let added = 0;
    for (const hit of hits) {
      if (added >= room) break;
      if (!isValidHit(hit, embeddingDim)) {
        droppedMalformed += 1;
        continue;
      }
      if (seen.has(hit.tokenId)) {
        duplicatesMerged += 1;
        continue;
      }
      seen.add(hit.tokenId);
      candidates.push(
        freezeCandidate({
          tokenId: hit.tokenId,
          vocabulary: hit.vocabulary,
          source: "auxiliary",
          embedding: [...hit.embedding],
          baseScore: hit.baseScore ?? config.auxiliaryBaseScore,
        })
      );
      added += 1;
    }
  }

  if (droppedMalformed > 0) warnings.unshift("malformed_candidate");

  return {
    candidates,
    nativeCount,
    auxiliaryCount: candidates.length - nativeCount,
    droppedMalformed,
    duplicatesMerged,
    warnings,
    ...(indexError ? { indexError } : {}),
  };
}
