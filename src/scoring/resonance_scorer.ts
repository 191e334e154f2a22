import type { ScoringConfig } from "../config/siren_config";
import type { Candidate, ScoredCandidate } from "../contracts/candidate";
import { cosineSimilarity } from "../embedding/vector";

/**
 * Resonance: decoder confidence blended with semantic fidelity to intent.
 *
 *   resonance = α · base + (1 − α) · fidelity
 *
 * base     = σ(logit) or the probability itself, clamped to [0, 1]
 * fidelity = (cos(candidate, intent) + 1) / 2
 *
 * α → 1 reproduces plain probability ranking; α → 0 ranks by fidelity alone.
 */

const clamp = (value: number, lo: number, hi: number) => Math.max(lo, Math.min(hi, value));
const clamp01 = (value: number) => clamp(value, 0, 1);

export const sigmoid = (x: number): number => 1 / (1 + Math.exp(-x));

export function normalizeBaseScore(baseScore: number, baseIsLogit: boolean): number {
  return clamp01(baseIsLogit ? sigmoid(baseScore) : baseScore);
}

export function fidelityOf(embedding: readonly number[], intent: readonly number[]): number {
  return (cosineSimilarity(embedding, intent) + 1) / 2;
}

export function resonanceScore(
  baseScore: number,
  candidateEmbedding: readonly number[],
  intentVector: readonly number[],
  blendWeight: number,
  baseIsLogit: boolean
): number {
  const alpha = clamp01(blendWeight);
  const base = normalizeBaseScore(baseScore, baseIsLogit);
  const fidelity = fidelityOf(candidateEmbedding, intentVector);
  return clamp01(alpha * base + (1 - alpha) * fidelity);
}

export type KairosAlphaConfig = Pick<
  ScoringConfig,
  | "blendWeight"
  | "alphaMin"
  | "alphaMax"
  | "alphaMapping"
  | "entropyPivot"
  | "linearSlope"
  | "sigmoidSteepness"
  | "maxShift"
>;

/**
 * Entropy-driven α: higher decoder uncertainty lowers α, shifting weight to
 * fidelity. Non-increasing in entropy for both mappings.
 */
export function kairosAlpha(entropy: number | null | undefined, config: KairosAlphaConfig): number {
  const bounded = (value: number) => clamp(value, config.alphaMin, config.alphaMax);
  if (entropy === null || entropy === undefined || !Number.isFinite(entropy)) {
    return bounded(config.blendWeight);
  }

  let shift: number;
  if (config.alphaMapping === "sigmoid") {
    shift = config.maxShift * sigmoid(config.sigmoidSteepness * (entropy - config.entropyPivot));
  } else {
    if (entropy <= config.entropyPivot) return bounded(config.blendWeight);
    shift = Math.min(config.maxShift, (entropy - config.entropyPivot) * config.linearSlope);
  }
  return bounded(config.blendWeight - shift);
}

export function scoreCandidate(
  candidate: Candidate,
  intentVector: readonly number[],
  alpha: number
): ScoredCandidate {
  const a = clamp01(alpha);
  const normalizedBase = normalizeBaseScore(
    candidate.baseScore.value,
    candidate.baseScore.kind === "logit"
  );
  const fidelity = fidelityOf(candidate.embedding, intentVector);
  return Object.freeze({
    candidate,
    normalizedBase,
    fidelity,
    resonance: clamp01(a * normalizedBase + (1 - a) * fidelity),
    alpha: a,
  });
}

/**
 * Strict total order: resonance desc, then normalized decoder score desc,
 * then token id in code-unit order.
 */
export function compareScored(a: ScoredCandidate, b: ScoredCandidate): number {
  if (b.resonance !== a.resonance) return b.resonance - a.resonance;
  if (b.normalizedBase !== a.normalizedBase) return b.normalizedBase - a.normalizedBase;
  if (a.candidate.tokenId < b.candidate.tokenId) return -1;
  if (a.candidate.tokenId > b.candidate.tokenId) return 1;
  return 0;
}

export function rankCandidates(
  candidates: readonly Candidate[],
  intentVector: readonly number[],
  alpha: number
): ScoredCandidate[] {
  return candidates.map((candidate) => scoreCandidate(candidate, intentVector, alpha)).sort(compareScored);
}

/** Ranking when no intent is available: decoder confidence only. */
export function rankByBaseScore(candidates: readonly Candidate[]): ScoredCandidate[] {
  return candidates
    .map((candidate) => {
      const normalizedBase = normalizeBaseScore(
        candidate.baseScore.value,
        candidate.baseScore.kind === "logit"
      );
      return Object.freeze({
        candidate,
        normalizedBase,
        fidelity: 0.5,
        resonance: normalizedBase,
        alpha: 1,
      });
    })
    .sort(compareScored);
}
