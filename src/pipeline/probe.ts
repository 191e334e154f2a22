import type { SirenConfig } from "../config/siren_config";
import { generateCandidates } from "../candidates/candidate_generator";
import type { AuxiliaryIndex } from "../candidates/vocabulary_index";
import { RawNativeCandidateSchema, summarizeScored, type ScoredCandidateSummary } from "../contracts/candidate";
import type { EmbeddingService } from "../embedding/hash_embedder";
import { embedProbeTerms, intentProbe } from "../intent/intent_vector";
import { kairosAlpha, rankCandidates } from "../scoring/resonance_scorer";

export type ProbeRequest = {
  terms: readonly string[];
  native: readonly unknown[];
  // Fixed blend weight; when absent the entropy-driven weight is used.
  alpha?: number;
  entropy?: number | null;
  includeAuxiliary?: boolean;
};

export type ProbeReport = {
  alpha: number;
  confidence: number;
  ranked: ScoredCandidateSummary[];
  droppedMalformed: number;
  warnings: string[];
};

/**
 * Forensic ranking: score candidates against a probe intent built from
 * explicit terms instead of the live context. Touches no gate and no memory.
 */
export async function runProbe(
  request: ProbeRequest,
  deps: { config: SirenConfig; embedder: EmbeddingService; index?: AuxiliaryIndex | null }
): Promise<ProbeReport> {
  const { config, embedder } = deps;
  const seeds = await embedProbeTerms(request.terms, embedder);
  const intent = intentProbe(seeds);

  const missing: Array<{ position: number; tokenId: string }> = [];
  request.native.forEach((item, position) => {
    const parsed = RawNativeCandidateSchema.safeParse(item);
    if (parsed.success && !parsed.data.embedding) missing.push({ position, tokenId: parsed.data.tokenId });
  });
  const embedded = missing.length > 0 ? await embedder.embed(missing.map((need) => need.tokenId)) : [];
  const native: unknown[] = [...request.native];
  missing.forEach((need, i) => {
    const parsed = RawNativeCandidateSchema.safeParse(native[need.position]);
    if (parsed.success) native[need.position] = { ...parsed.data, embedding: embedded[i] };
  });

  const generation = await generateCandidates({
    native,
    intent,
    index: request.includeAuxiliary ? deps.index : null,
    config: config.candidates,
    embeddingDim: config.embeddingDim,
  });
  const alpha =
    request.alpha ?? kairosAlpha(request.entropy ?? null, config.scoring);

  return {
    alpha,
    confidence: intent.confidence,
    ranked: rankCandidates(generation.candidates, intent.vector, alpha).map(summarizeScored),
    droppedMalformed: generation.droppedMalformed,
    warnings: [...generation.warnings],
  };
}
