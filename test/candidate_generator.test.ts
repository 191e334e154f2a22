import { describe, it, expect } from "vitest";

import { generateCandidates } from "../src/candidates/candidate_generator";
import {
  InMemoryVocabularyIndex,
  type AuxiliaryIndex,
  type IndexHit,
} from "../src/candidates/vocabulary_index";
import { intentMean } from "../src/intent/intent_vector";
import { axis, DIM, testConfig } from "./fixtures";

const intent = intentMean([{ token: "ctx", embedding: axis(0) }]);

const native = (tokenId: string, baseScore: number, embedding: unknown = axis(1)) => ({
  tokenId,
  baseScore,
  embedding,
});

describe("generateCandidates", () => {
  it("sorts native candidates by score and keeps the first of each token id", async () => {
    const config = testConfig();
    const result = await generateCandidates({
      native: [native("b", 1), native("a", 2), native("b", 0.5, axis(2))],
      intent,
      config: config.candidates,
      embeddingDim: DIM,
    });

    expect(result.candidates.map((candidate) => candidate.tokenId)).toEqual(["a", "b"]);
    expect(result.candidates[1].embedding).toEqual(axis(1));
    expect(result.candidates[1].vocabulary).toBe("en");
    expect(result.candidates[1].baseScore).toEqual({ value: 1, kind: "logit" });
    expect(result.duplicatesMerged).toBe(1);
    expect(result.warnings).toEqual([]);
  });

  it("drops malformed candidates and counts them", async () => {
    const config = testConfig();
    const result = await generateCandidates({
      native: [
        native("ok", 1),
        native("short", 1, [1, 0]),
        { tokenId: "nan", baseScore: Number.NaN, embedding: axis(0) },
        { tokenId: "bare", baseScore: 1 },
        "not-a-candidate",
      ],
      intent,
      config: config.candidates,
      embeddingDim: DIM,
    });

    expect(result.candidates.map((candidate) => candidate.tokenId)).toEqual(["ok"]);
    expect(result.droppedMalformed).toBe(4);
    expect(result.warnings).toEqual(["malformed_candidate"]);
  });

  it("caps the set at maxCandidates", async () => {
    const config = testConfig({ candidates: { maxCandidates: 2 } });
    const result = await generateCandidates({
      native: [native("a", 1), native("b", 3), native("c", 2)],
      intent: null,
      config: config.candidates,
      embeddingDim: DIM,
    });
    expect(result.candidates.map((candidate) => candidate.tokenId)).toEqual(["b", "c"]);
  });

  it("compares logits and probabilities on the normalized scale before capping", async () => {
    const config = testConfig({ candidates: { maxCandidates: 2 } });
    const result = await generateCandidates({
      native: [
        // σ(0.8) ≈ 0.690 ranks below a probability of 0.75
        native("logit-low", 0.8),
        { tokenId: "prob", baseScore: 0.75, scoreKind: "probability", embedding: axis(1) },
        // σ(1.5) ≈ 0.818
        native("logit-high", 1.5),
      ],
      intent: null,
      config: config.candidates,
      embeddingDim: DIM,
    });
    expect(result.candidates.map((candidate) => candidate.tokenId)).toEqual(["logit-high", "prob"]);
  });

  it("keeps the stronger duplicate across score kinds", async () => {
    const config = testConfig();
    const result = await generateCandidates({
      native: [
        native("x", 0.8, axis(2)),
        { tokenId: "x", baseScore: 0.75, scoreKind: "probability", embedding: axis(1) },
      ],
      intent: null,
      config: config.candidates,
      embeddingDim: DIM,
    });
    expect(result.candidates).toHaveLength(1);
    expect(result.candidates[0].baseScore).toEqual({ value: 0.75, kind: "probability" });
    expect(result.candidates[0].embedding).toEqual(axis(1));
    expect(result.duplicatesMerged).toBe(1);
  });

  it("appends auxiliary neighbours that are not already present", async () => {
    const config = testConfig();
    const index = new InMemoryVocabularyIndex([
      { tokenId: "es:luz", vocabulary: "es", embedding: axis(0) },
      { tokenId: "fr:ombre", vocabulary: "fr", embedding: axis(2) },
      { tokenId: "a", vocabulary: "es", embedding: axis(0) },
    ]);
    const result = await generateCandidates({
      native: [native("a", 1)],
      intent,
      index,
      config: config.candidates,
      embeddingDim: DIM,
    });

    expect(result.candidates.map((candidate) => candidate.tokenId)).toEqual(["a", "es:luz", "fr:ombre"]);
    expect(result.candidates[0].source).toBe("native");
    expect(result.candidates[1]).toMatchObject({
      source: "auxiliary",
      vocabulary: "es",
      baseScore: { value: 0, kind: "probability" },
    });
    expect(result.nativeCount).toBe(1);
    expect(result.auxiliaryCount).toBe(2);
    expect(result.duplicatesMerged).toBe(1);
  });

  it("adds no more auxiliary candidates than the remaining room", async () => {
    const config = testConfig({ candidates: { maxCandidates: 2 } });
    const index = new InMemoryVocabularyIndex([
      { tokenId: "es:luz", vocabulary: "es", embedding: axis(0) },
      { tokenId: "fr:ombre", vocabulary: "fr", embedding: axis(2) },
    ]);
    const result = await generateCandidates({
      native: [native("a", 1)],
      intent,
      index,
      config: config.candidates,
      embeddingDim: DIM,
    });
    expect(result.candidates.map((candidate) => candidate.tokenId)).toEqual(["a", "es:luz"]);
  });

  it("falls back to native candidates when the index times out", async () => {
    const config = testConfig({ candidates: { indexTimeoutMs: 10 } });
    const hanging: AuxiliaryIndex = {
      search: () => new Promise<IndexHit[]>(() => undefined),
    };
    const result = await generateCandidates({
      native: [native("a", 1)],
      intent,
      index: hanging,
      config: config.candidates,
      embeddingDim: DIM,
    });

    expect(result.candidates.map((candidate) => candidate.tokenId)).toEqual(["a"]);
    expect(result.warnings).toEqual(["index_unavailable"]);
    expect(result.indexError).toBe("index_timeout_10ms");
  });

  it("falls back to native candidates when the index throws", async () => {
    const config = testConfig();
    const failing: AuxiliaryIndex = {
      search: async () => {
        throw new Error("index offline");
      },
    };
    const result = await generateCandidates({
      native: [native("a", 1)],
      intent,
      index: failing,
      config: config.candidates,
      embeddingDim: DIM,
    });
    expect(result.candidates).toHaveLength(1);
    expect(result.indexError).toBe("index offline");
  });

  it("skips the index when there is no intent", async () => {
    const config = testConfig();
    let searches = 0;
    const counting: AuxiliaryIndex = {
      search: async () => {
        searches += 1;
        return [];
      },
    };
    await generateCandidates({
      native: [native("a", 1)],
      intent: null,
      index: counting,
      config: config.candidates,
      embeddingDim: DIM,
    });
    expect(searches).toBe(0);
  });

  it("drops auxiliary hits with the wrong dimension", async () => {
    const config = testConfig();
    const index: AuxiliaryIndex = {
      search: async () => [
        { tokenId: "es:bad", vocabulary: "es", embedding: [1, 0], similarity: 1 },
        { tokenId: "es:luz", vocabulary: "es", embedding: axis(0), similarity: 0.9 },
      ],
    };
    const result = await generateCandidates({
      native: [],
      intent,
      index,
      config: config.candidates,
      embeddingDim: DIM,
    });
    expect(result.candidates.map((candidate) => candidate.tokenId)).toEqual(["es:luz"]);
    expect(result.droppedMalformed).toBe(1);
    expect(result.warnings).toEqual(["malformed_candidate"]);
  });
});
