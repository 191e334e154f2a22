import { SIREN_EMBED_DIM } from "../config/siren_config";
import type { Embedding } from "./vector";

/**
 * Text → vector collaborator. Implementations must place every vocabulary in
 * one shared space; alignment is the embedding model's job, not ours.
 */
export interface EmbeddingService {
  readonly dimension: number;
  embed(texts: string[]): Promise<Embedding[]>;
}

const hashToken = (token: string): number => {
  let hash = 5381;
  for (let i = 0; i < token.length; i += 1) {
    hash = ((hash << 5) + hash + token.charCodeAt(i)) >>> 0;
  }
  return hash >>> 0;
};

const WORD_PATTERN = /[\p{L}\p{N}]+/gu;

// Character trigrams with boundary marks, so related spellings share buckets.
const featuresOf = (word: string): string[] => {
  const marked = `<${word}>`;
  const chars = Array.from(marked);
  const features = [word];
  for (let i = 0; i + 3 <= chars.length; i += 1) {
    features.push(chars.slice(i, i + 3).join(""));
  }
  return features;
};

export const computeHashEmbedding = (text: string, dim = SIREN_EMBED_DIM): Embedding => {
  const vec = new Array<number>(dim).fill(0);
  const words = text.toLowerCase().match(WORD_PATTERN) ?? [];

  for (const word of words) {
    for (const feature of featuresOf(word)) {
      const hash = hashToken(feature);
      const idx = hash % dim;
      // Sign bit from the upper half keeps unrelated features from only adding up.
      vec[idx] += (hash >>> 16) & 1 ? 1 : -1;
    }
  }

  const norm = Math.sqrt(vec.reduce((sum, value) => sum + value * value, 0));
  if (norm > 0) {
    for (let i = 0; i < vec.length; i += 1) {
      vec[i] = vec[i] / norm;
    }
  }

  return vec;
};

/**
 * Deterministic local embedder for development and tests. It has no notion of
 * meaning across languages; production deployments plug in a real multilingual
 * model behind EmbeddingService.
 */
export class HashEmbedder implements EmbeddingService {
  constructor(public readonly dimension: number = SIREN_EMBED_DIM) {}

  async embed(texts: string[]): Promise<Embedding[]> {
    return texts.map((text) => computeHashEmbedding(text, this.dimension));
  }
}
