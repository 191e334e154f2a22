import * as fs from "node:fs";

import { z } from "zod";

import type { BaseScore } from "../contracts/candidate";
import { ScoreKindSchema } from "../config/siren_config";
import type { EmbeddingService } from "../embedding/hash_embedder";
import { cosineSimilarity, type Embedding } from "../embedding/vector";

export type IndexHit = {
  tokenId: string;
  vocabulary: string;
  embedding: Readonly<Embedding>;
  similarity: number;
  // Present when the index can vouch for a decoder-comparable score.
  baseScore?: BaseScore;
};

export type IndexSearchOptions = {
  signal?: AbortSignal;
};

/**
 * Auxiliary multilingual index. Approximate answers are acceptable; callers
 * bound the lookup with a timeout and fall back to native candidates.
 */
export interface AuxiliaryIndex {
  search(query: readonly number[], k: number, opts?: IndexSearchOptions): Promise<IndexHit[]>;
}

export type VocabularyEntry = {
  tokenId: string;
  vocabulary: string;
  embedding: Readonly<Embedding>;
  baseScore?: BaseScore;
};

const compareHits = (a: IndexHit, b: IndexHit) => {
  if (b.similarity !== a.similarity) return b.similarity - a.similarity;
  if (a.tokenId < b.tokenId) return -1;
  if (a.tokenId > b.tokenId) return 1;
  return 0;
};

const abortError = () => new Error("index_search_aborted");

/** Exact scan. Fine for the vocabulary sizes a single process holds. */
export class InMemoryVocabularyIndex implements AuxiliaryIndex {
  private entries: VocabularyEntry[];

  constructor(entries: VocabularyEntry[] = []) {
    this.entries = [...entries];
  }

  get size(): number {
    return this.entries.length;
  }

  add(entry: VocabularyEntry): void {
    this.entries.push(entry);
  }

  async search(
    query: readonly number[],
    k: number,
    opts: IndexSearchOptions = {}
  ): Promise<IndexHit[]> {
    if (opts.signal?.aborted) throw abortError();
    if (k <= 0) return [];
    const hits = this.entries
      .filter((entry) => entry.embedding.length === query.length)
      .map((entry) => ({
        tokenId: entry.tokenId,
        vocabulary: entry.vocabulary,
        embedding: entry.embedding,
        similarity: cosineSimilarity(entry.embedding, query),
        ...(entry.baseScore ? { baseScore: entry.baseScore } : {}),
      }));
    hits.sort(compareHits);
    return hits.slice(0, k);
  }
}

/**
 * Staged lookup: queries are quantized so near-identical intents from
 * consecutive steps share one cached answer. Bounded, oldest entry evicted.
 */
export class CachedVocabularyIndex implements AuxiliaryIndex {
  private cache = new Map<string, IndexHit[]>();
  private hits = 0;
  private misses = 0;

  constructor(
    private readonly inner: AuxiliaryIndex,
    private readonly opts: { maxEntries: number; precision?: number } = { maxEntries: 512 }
  ) {}

  private keyOf(query: readonly number[], k: number): string {
    const precision = this.opts.precision ?? 100;
    return `${k}|${query.map((value) => Math.round(value * precision)).join(",")}`;
  }

  stats(): { hits: number; misses: number; size: number } {
    return { hits: this.hits, misses: this.misses, size: this.cache.size };
  }

  async search(
    query: readonly number[],
    k: number,
    opts: IndexSearchOptions = {}
  ): Promise<IndexHit[]> {
    if (this.opts.maxEntries <= 0) return this.inner.search(query, k, opts);

    const key = this.keyOf(query, k);
    const cached = this.cache.get(key);
    if (cached) {
      this.hits += 1;
      return cached.slice();
    }

    this.misses += 1;
    const result = await this.inner.search(query, k, opts);
    this.cache.set(key, result);
    if (this.cache.size > this.opts.maxEntries) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) this.cache.delete(oldest.value);
    }
    return result.slice();
  }
}

const VocabularyFileSchema = z
  .object({
    version: z.literal("vocabulary-v1"),
    entries: z
      .array(
        z
          .object({
            tokenId: z.string().min(1),
            vocabulary: z.string().min(1),
            // Text handed to the embedder; defaults to the token id.
            text: z.string().min(1).optional(),
            baseScore: z
              .object({ value: z.number().finite(), kind: ScoreKindSchema })
              .strict()
              .optional(),
          })
          .strict()
      )
      .min(1),
  })
  .strict();

export async function loadVocabularyIndex(
  filePath: string,
  embedder: EmbeddingService
): Promise<InMemoryVocabularyIndex> {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  const parsed = VocabularyFileSchema.parse(raw);
  const embeddings = await embedder.embed(parsed.entries.map((entry) => entry.text ?? entry.tokenId));
  return new InMemoryVocabularyIndex(
    parsed.entries.map((entry, i) => ({
      tokenId: entry.tokenId,
      vocabulary: entry.vocabulary,
      embedding: embeddings[i],
      ...(entry.baseScore ? { baseScore: entry.baseScore } : {}),
    }))
  );
}
