import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

import { afterEach, describe, it, expect } from "vitest";

import {
  CachedVocabularyIndex,
  InMemoryVocabularyIndex,
  loadVocabularyIndex,
  type AuxiliaryIndex,
  type IndexHit,
} from "../src/candidates/vocabulary_index";
import { axis, FixtureEmbedder } from "./fixtures";

class CountingIndex implements AuxiliaryIndex {
  calls = 0;

  async search(query: readonly number[]): Promise<IndexHit[]> {
    this.calls += 1;
    return [{ tokenId: `hit-${this.calls}`, vocabulary: "fr", embedding: [...query], similarity: 1 }];
  }
}

describe("InMemoryVocabularyIndex", () => {
  const index = new InMemoryVocabularyIndex([
    { tokenId: "fr:b", vocabulary: "fr", embedding: axis(0) },
    { tokenId: "fr:a", vocabulary: "fr", embedding: axis(0) },
    { tokenId: "de:c", vocabulary: "de", embedding: axis(1) },
    { tokenId: "de:short", vocabulary: "de", embedding: [1, 0, 0] },
  ]);

  it("ranks by similarity and breaks ties by token id", async () => {
    const hits = await index.search(axis(0), 2);
    expect(hits.map((hit) => hit.tokenId)).toEqual(["fr:a", "fr:b"]);
    expect(hits[0].similarity).toBe(1);
  });

  it("skips entries whose dimension does not match the query", async () => {
    const hits = await index.search(axis(0), 10);
    expect(hits.map((hit) => hit.tokenId)).toEqual(["fr:a", "fr:b", "de:c"]);
    expect(hits[2].similarity).toBe(0);
  });

  it("returns nothing for k of zero", async () => {
    expect(await index.search(axis(0), 0)).toEqual([]);
  });

  it("rejects when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(index.search(axis(0), 1, { signal: controller.signal })).rejects.toThrow(
      "index_search_aborted"
    );
  });
});

describe("CachedVocabularyIndex", () => {
  it("serves near-identical queries from one cached answer", async () => {
    const inner = new CountingIndex();
    const cached = new CachedVocabularyIndex(inner, { maxEntries: 4 });

    const first = await cached.search([1, 0, 0, 0], 3);
    const second = await cached.search([1.001, 0, 0, 0], 3);

    expect(inner.calls).toBe(1);
    expect(second).toEqual(first);
    expect(cached.stats()).toEqual({ hits: 1, misses: 1, size: 1 });
  });

  it("keys on k as well as the query", async () => {
    const inner = new CountingIndex();
    const cached = new CachedVocabularyIndex(inner, { maxEntries: 4 });

    await cached.search(axis(0), 3);
    await cached.search(axis(0), 5);

    expect(inner.calls).toBe(2);
  });

  it("evicts the oldest entry past maxEntries", async () => {
    const inner = new CountingIndex();
    const cached = new CachedVocabularyIndex(inner, { maxEntries: 1 });

    await cached.search(axis(0), 3);
    await cached.search(axis(1), 3);
    await cached.search(axis(0), 3);

    expect(inner.calls).toBe(3);
    expect(cached.stats()).toEqual({ hits: 0, misses: 3, size: 1 });
  });

  it("hands out copies so callers cannot mutate the cache", async () => {
    const cached = new CachedVocabularyIndex(new CountingIndex(), { maxEntries: 4 });

    const first = await cached.search(axis(0), 3);
    first.pop();
    const second = await cached.search(axis(0), 3);

    expect(second.map((hit) => hit.tokenId)).toEqual(["hit-1"]);
  });

  it("passes straight through when caching is disabled", async () => {
    const inner = new CountingIndex();
    const cached = new CachedVocabularyIndex(inner, { maxEntries: 0 });

    await cached.search(axis(0), 3);
    await cached.search(axis(0), 3);

    expect(inner.calls).toBe(2);
    expect(cached.stats()).toEqual({ hits: 0, misses: 0, size: 0 });
  });
});

describe("loadVocabularyIndex", () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    dir = null;
  });

  const writeVocabulary = (body: unknown): string => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "siren-vocab-"));
    const file = path.join(dir, "vocabulary.json");
    fs.writeFileSync(file, JSON.stringify(body));
    return file;
  };

  it("embeds entry text, falling back to the token id", async () => {
    const file = writeVocabulary({
      version: "vocabulary-v1",
      entries: [
        { tokenId: "es:doncella", vocabulary: "es", text: "doncella" },
        { tokenId: "fr:lumiere", vocabulary: "fr", baseScore: { value: 0.4, kind: "probability" } },
      ],
    });
    const embedder = new FixtureEmbedder({ doncella: axis(0), "fr:lumiere": axis(1) });

    const index = await loadVocabularyIndex(file, embedder);

    expect(embedder.calls).toEqual([["doncella", "fr:lumiere"]]);
    expect(index.size).toBe(2);
    const hits = await index.search(axis(1), 1);
    expect(hits).toEqual([
      {
        tokenId: "fr:lumiere",
        vocabulary: "fr",
        embedding: axis(1),
        similarity: 1,
        baseScore: { value: 0.4, kind: "probability" },
      },
    ]);
  });

  it("rejects a file with the wrong version", async () => {
    const file = writeVocabulary({
      version: "vocabulary-v0",
      entries: [{ tokenId: "es:luz", vocabulary: "es" }],
    });

    await expect(loadVocabularyIndex(file, new FixtureEmbedder({}))).rejects.toThrow();
  });
});
