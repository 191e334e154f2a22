import { describe, it, expect } from "vitest";

import { freezeCandidate, type Candidate } from "../src/contracts/candidate";
import { embedProbeTerms, intentProbe } from "../src/intent/intent_vector";
import { runProbe } from "../src/pipeline/probe";
import {
  compareScored,
  kairosAlpha,
  rankByBaseScore,
  rankCandidates,
  resonanceScore,
  sigmoid,
} from "../src/scoring/resonance_scorer";
import { axis, FixtureEmbedder, testConfig } from "./fixtures";

const candidate = (tokenId: string, logit: number, embedding: number[], vocabulary = "en"): Candidate =>
  freezeCandidate({
    tokenId,
    vocabulary,
    source: "native",
    embedding,
    baseScore: { value: logit, kind: "logit" },
  });

const diagonal = [Math.SQRT1_2, Math.SQRT1_2, 0, 0];

// Unit vectors at increasing angles from axis 0, so cosine to axis 0 decreases.
const atAngle = (radians: number) => [Math.cos(radians), Math.sin(radians), 0, 0];

describe("resonanceScore", () => {
  it("stays within [0, 1]", () => {
    for (const logit of [-50, -2, 0, 2, 50]) {
      for (const alpha of [0, 0.3, 1, 1.7, -0.2]) {
        for (const embedding of [axis(0), axis(1), [-1, 0, 0, 0], [0, 0, 0, 0]]) {
          const value = resonanceScore(logit, embedding, axis(0), alpha, true);
          expect(value).toBeGreaterThanOrEqual(0);
          expect(value).toBeLessThanOrEqual(1);
        }
      }
    }
  });

  it("is non-decreasing in fidelity with the base score fixed", () => {
    const scores = [Math.PI, 2, 1, 0.5, 0].map((angle) =>
      resonanceScore(0.3, atAngle(angle), axis(0), 0.4, false)
    );
    for (let i = 1; i < scores.length; i += 1) {
      expect(scores[i]).toBeGreaterThanOrEqual(scores[i - 1]);
    }
  });

  it("is non-decreasing in the base score with fidelity fixed", () => {
    const scores = [-3, -1, 0, 1, 3].map((logit) => resonanceScore(logit, axis(1), axis(0), 0.4, true));
    for (let i = 1; i < scores.length; i += 1) {
      expect(scores[i]).toBeGreaterThanOrEqual(scores[i - 1]);
    }
  });

  it("blends normalized base and fidelity", () => {
    // σ(0) = 0.5, fidelity of orthogonal vectors = 0.5
    expect(resonanceScore(0, axis(1), axis(0), 0.3, true)).toBeCloseTo(0.5, 12);
    // probability kept as is; identical direction → fidelity 1
    expect(resonanceScore(0.2, axis(0), axis(0), 0.25, false)).toBeCloseTo(0.25 * 0.2 + 0.75, 12);
  });
});

describe("rankCandidates", () => {
  const pool = [
    candidate("c", -1, axis(0)),
    candidate("a", 2, axis(1)),
    candidate("b", 0.5, [-1, 0, 0, 0]),
  ];

  it("matches base-score ranking when alpha is 1", () => {
    const ranked = rankCandidates(pool, axis(0), 1);
    expect(ranked.map((scored) => scored.candidate.tokenId)).toEqual(["a", "b", "c"]);
  });

  it("depends only on fidelity when alpha is 0", () => {
    const ranked = rankCandidates(pool, axis(0), 0);
    expect(ranked.map((scored) => scored.candidate.tokenId)).toEqual(["c", "a", "b"]);
    for (const scored of ranked) expect(scored.resonance).toBe(scored.fidelity);
  });

  it("breaks resonance ties by base score, then token id", () => {
    const tied = [
      candidate("y", 0, axis(0)),
      candidate("x", 0, axis(0)),
      candidate("z", 1, axis(0)),
    ];
    const ranked = rankCandidates(tied, axis(0), 0);
    expect(ranked.map((scored) => scored.candidate.tokenId)).toEqual(["z", "x", "y"]);
    expect(compareScored(ranked[1], ranked[1])).toBe(0);
  });

  it("does not reorder its input", () => {
    const input = [...pool];
    rankCandidates(input, axis(0), 0.5);
    expect(input.map((entry) => entry.tokenId)).toEqual(["c", "a", "b"]);
  });

  it("ranks by base score alone without an intent", () => {
    const ranked = rankByBaseScore(pool);
    expect(ranked.map((scored) => scored.candidate.tokenId)).toEqual(["a", "b", "c"]);
    expect(ranked[0]).toMatchObject({ alpha: 1, fidelity: 0.5, resonance: sigmoid(2) });
  });

  it("places low-logit, high-fidelity terms above the decoder favourite under a probe intent", async () => {
    const embedder = new FixtureEmbedder({ maiden: axis(0), justice: axis(1) });
    const intent = intentProbe(await embedProbeTerms(["maiden", "justice"], embedder));
    const ranked = rankCandidates(
      [
        candidate("abduction", 1.2, axis(3)),
        candidate("παρθένος", -1.5, diagonal, "el"),
        candidate("τωရား", -1.7, axis(0), "my"),
      ],
      intent.vector,
      0.2
    );

    expect(ranked.map((scored) => scored.candidate.tokenId)).toEqual(["παρθένος", "τωရား", "abduction"]);
    expect(ranked[0].resonance).toBeCloseTo(0.2 * sigmoid(-1.5) + 0.8, 9);
    expect(ranked[1].resonance).toBeCloseTo(0.2 * sigmoid(-1.7) + 0.8 * ((Math.SQRT1_2 + 1) / 2), 9);
    expect(ranked[2].resonance).toBeCloseTo(0.2 * sigmoid(1.2) + 0.8 * 0.5, 9);
  });
});

describe("kairosAlpha", () => {
  const scoring = testConfig().scoring;

  it("returns the base weight without entropy or below the pivot", () => {
    expect(kairosAlpha(null, scoring)).toBe(0.5);
    expect(kairosAlpha(1, scoring)).toBe(0.5);
    expect(kairosAlpha(1.5, scoring)).toBe(0.5);
  });

  it("shifts linearly above the pivot up to the maximum shift", () => {
    expect(kairosAlpha(2.5, scoring)).toBeCloseTo(0.4, 12);
    expect(kairosAlpha(10, scoring)).toBeCloseTo(0.25, 12);
  });

  it("uses the sigmoid mapping when configured", () => {
    const sigmoidScoring = testConfig({ scoring: { alphaMapping: "sigmoid" } }).scoring;
    expect(kairosAlpha(1.5, sigmoidScoring)).toBeCloseTo(0.5 - 0.125, 12);
  });

  it("is non-increasing in entropy for both mappings", () => {
    for (const alphaMapping of ["linear", "sigmoid"] as const) {
      const config = testConfig({ scoring: { alphaMapping } }).scoring;
      let previous = Number.POSITIVE_INFINITY;
      for (let entropy = 0; entropy <= 8; entropy += 0.25) {
        const alpha = kairosAlpha(entropy, config);
        expect(alpha).toBeLessThanOrEqual(previous);
        previous = alpha;
      }
    }
  });

  it("clamps to the configured bounds", () => {
    const config = testConfig({ scoring: { blendWeight: 0.95, alphaMin: 0.3, maxShift: 0.9 } }).scoring;
    expect(kairosAlpha(null, config)).toBe(0.9);
    expect(kairosAlpha(50, config)).toBe(0.3);
  });
});

describe("runProbe", () => {
  it("ranks decoder candidates against the probe terms", async () => {
    const config = testConfig();
    const embedder = new FixtureEmbedder({ maiden: axis(0), justice: axis(1), virgo: diagonal });
    const report = await runProbe(
      {
        terms: ["maiden", "justice"],
        native: [
          { tokenId: "abduction", baseScore: 1.2, embedding: axis(3) },
          { tokenId: "virgo", vocabulary: "la", baseScore: -1.5 },
        ],
        alpha: 0.2,
      },
      { config, embedder }
    );

    expect(report.alpha).toBe(0.2);
    expect(report.ranked.map((entry) => entry.tokenId)).toEqual(["virgo", "abduction"]);
    expect(report.ranked[0].vocabulary).toBe("la");
    expect(report.droppedMalformed).toBe(0);
    expect(embedder.calls).toEqual([["maiden", "justice"], ["virgo"]]);
  });
});
