import { z } from "zod";

import { ScoreKindSchema, type ScoreKind } from "../config/siren_config";
import type { Embedding } from "../embedding/vector";

export type CandidateSource = "native" | "auxiliary";

export type BaseScore = {
  value: number;
  kind: ScoreKind;
};

/**
 * One token proposed for a decoding step. Frozen once produced.
 */
export type Candidate = Readonly<{
  tokenId: string;
  vocabulary: string;
  source: CandidateSource;
  embedding: Readonly<Embedding>;
  baseScore: Readonly<BaseScore>;
}>;

export type ScoredCandidate = Readonly<{
  candidate: Candidate;
  normalizedBase: number;
  fidelity: number;
  resonance: number;
  alpha: number;
}>;

const finite = z.number().finite();

/**
 * Decoder output as it arrives. Embedding is optional here because the
 * session may resolve it through the embedding service; the generator drops
 * anything still missing one.
 */
export const RawNativeCandidateSchema = z
  .object({
    tokenId: z.string().min(1),
    vocabulary: z.string().min(1).optional(),
    baseScore: finite,
    scoreKind: ScoreKindSchema.default("logit"),
    embedding: z.array(finite).min(1).optional(),
  })
  .strict();
export type RawNativeCandidate = z.input<typeof RawNativeCandidateSchema>;

export const ContextItemSchema = z
  .object({
    token: z.string(),
    embedding: z.array(finite).min(1).optional(),
    suppressed: z.boolean().optional(),
  })
  .strict();
export type ContextItem = z.infer<typeof ContextItemSchema>;

export type ScoredCandidateSummary = {
  tokenId: string;
  vocabulary: string;
  source: CandidateSource;
  baseScore: number;
  baseKind: ScoreKind;
  normalizedBase: number;
  fidelity: number;
  resonance: number;
};

export const ScoredCandidateSummarySchema = z
  .object({
    tokenId: z.string(),
    vocabulary: z.string(),
    source: z.enum(["native", "auxiliary"]),
    baseScore: z.number(),
    baseKind: ScoreKindSchema,
    normalizedBase: z.number(),
    fidelity: z.number(),
    resonance: z.number(),
  })
  .strict();

export const summarizeScored = (scored: ScoredCandidate): ScoredCandidateSummary => ({
  tokenId: scored.candidate.tokenId,
  vocabulary: scored.candidate.vocabulary,
  source: scored.candidate.source,
  baseScore: scored.candidate.baseScore.value,
  baseKind: scored.candidate.baseScore.kind,
  normalizedBase: scored.normalizedBase,
  fidelity: scored.fidelity,
  resonance: scored.resonance,
});

export function freezeCandidate(candidate: {
  tokenId: string;
  vocabulary: string;
  source: CandidateSource;
  embedding: Embedding;
  baseScore: BaseScore;
}): Candidate {
  return Object.freeze({
    tokenId: candidate.tokenId,
    vocabulary: candidate.vocabulary,
    source: candidate.source,
    embedding: Object.freeze([...candidate.embedding]),
    baseScore: Object.freeze({ ...candidate.baseScore }),
  });
}
