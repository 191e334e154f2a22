export type Embedding = number[];

const EPS = 1e-12;

function assertSameDim(a: readonly number[], b: readonly number[]): void {
  if (a.length !== b.length) {
    throw new RangeError(`Embedding dimension mismatch: ${a.length} vs ${b.length}`);
  }
}

export const zeros = (dim: number): Embedding => new Array<number>(dim).fill(0);

export function dot(a: readonly number[], b: readonly number[]): number {
  assertSameDim(a, b);
  let sum = 0;
  for (let i = 0; i < a.length; i += 1) {
    sum += a[i] * b[i];
  }
  return sum;
}

export const norm = (v: readonly number[]): number => Math.sqrt(dot(v, v));

export function add(a: readonly number[], b: readonly number[]): Embedding {
  assertSameDim(a, b);
  return a.map((value, i) => value + b[i]);
}

export function subtract(a: readonly number[], b: readonly number[]): Embedding {
  assertSameDim(a, b);
  return a.map((value, i) => value - b[i]);
}

export const scale = (v: readonly number[], factor: number): Embedding =>
  v.map((value) => value * factor);

/** Unit-length copy; a zero vector stays zero. */
export function l2Normalize(v: readonly number[]): Embedding {
  const n = norm(v);
  if (n < EPS) return v.map(() => 0);
  return v.map((value) => value / n);
}

/** Cosine in [-1, 1]; 0 when either side is a zero vector. */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  const denom = norm(a) * norm(b);
  if (denom < EPS) return 0;
  const cos = dot(a, b) / denom;
  return Math.max(-1, Math.min(1, cos));
}

export function weightedMean(
  vectors: ReadonlyArray<readonly number[]>,
  weights: readonly number[]
): Embedding {
  if (vectors.length === 0) {
    throw new RangeError("weightedMean requires at least one vector");
  }
  if (weights.length !== vectors.length) {
    throw new RangeError("weightedMean requires one weight per vector");
  }
  const dim = vectors[0].length;
  const acc = zeros(dim);
  let total = 0;
  for (let row = 0; row < vectors.length; row += 1) {
    const v = vectors[row];
    assertSameDim(acc, v);
    const w = weights[row];
    total += w;
    for (let i = 0; i < dim; i += 1) {
      acc[i] += v[i] * w;
    }
  }
  return total > EPS ? acc.map((value) => value / total) : acc;
}

export const meanOf = (vectors: ReadonlyArray<readonly number[]>): Embedding =>
  weightedMean(
    vectors,
    vectors.map(() => 1)
  );

/**
 * First principal direction of the rows (uncentered), by power iteration on XᵀX.
 * Deterministic: starts from the normalized column sums.
 */
export function dominantDirection(
  vectors: ReadonlyArray<readonly number[]>,
  iterations = 50
): Embedding {
  if (vectors.length === 0) {
    throw new RangeError("dominantDirection requires at least one vector");
  }
  const dim = vectors[0].length;
  let u = l2Normalize(vectors.reduce<Embedding>((acc, v) => add(acc, v), zeros(dim)));
  if (norm(u) < EPS) {
    u = l2Normalize(vectors[0]);
  }
  for (let step = 0; step < iterations; step += 1) {
    let next = zeros(dim);
    for (const v of vectors) {
      next = add(next, scale(v, dot(v, u)));
    }
    const normalized = l2Normalize(next);
    if (norm(normalized) < EPS) break;
    u = normalized;
  }
  return u;
}

/** v minus its projection on a (unit or non-unit) direction. */
export function removeProjection(v: readonly number[], direction: readonly number[]): Embedding {
  const unit = l2Normalize(direction);
  return subtract(v, scale(unit, dot(v, unit)));
}
