import type { IntentMethod } from "../config/siren_config";
import type { EmbeddingService } from "../embedding/hash_embedder";
import {
  cosineSimilarity,
  dominantDirection,
  l2Normalize,
  meanOf,
  norm,
  removeProjection,
  weightedMean,
  type Embedding,
} from "../embedding/vector";
import { SirenPipelineError } from "../errors/pipeline_error";

/**
 * Intent vectors: a single embedding for what the generation is currently
 * trying to say. Every builder here is a pure function of its arguments.
 *
 * Context is ordered oldest → newest; windows always take the newest entries.
 */

export type IntentContextEntry = {
  token: string;
  embedding: readonly number[];
  suppressed?: boolean;
};

export type IntentVector = Readonly<{
  vector: Readonly<Embedding>;
  method: IntentMethod;
  window: Readonly<{
    size: number;
    used: number;
    tokens: readonly string[];
  }>;
  confidence: number;
}>;

export type IntentBuildOptions = {
  window?: number;
  normalize?: boolean;
};

export type SifOptions = IntentBuildOptions & {
  // token → unigram probability
  frequencies?: Readonly<Record<string, number>>;
  a?: number;
  // Background common direction; estimated from the window when absent.
  commonComponent?: readonly number[];
};

export type SuppressionAwareOptions = IntentBuildOptions & {
  neighborBoost?: number;
};

const DEFAULT_WINDOW = 8;
const DEFAULT_SIF_A = 1e-3;
const DEFAULT_NEIGHBOR_BOOST = 1.5;
const RESIDUAL_EPS = 1e-9;

function emptyContext(method: IntentMethod, reason: string): SirenPipelineError {
  return new SirenPipelineError({
    code: "empty_context",
    message: `Cannot build ${method} intent: ${reason}`,
    reason,
  });
}

const takeWindow = (context: readonly IntentContextEntry[], window: number) =>
  window >= context.length ? context.slice() : context.slice(context.length - window);

/** Mean rescaled cosine of the contributors to the result. */
function stabilityOf(contributors: ReadonlyArray<readonly number[]>, result: readonly number[]) {
  if (contributors.length === 0) return 0;
  const total = contributors.reduce(
    (sum, embedding) => sum + (cosineSimilarity(embedding, result) + 1) / 2,
    0
  );
  return total / contributors.length;
}

function finalize(args: {
  raw: Embedding;
  method: IntentMethod;
  windowSize: number;
  contributors: readonly IntentContextEntry[];
  normalize: boolean;
}): IntentVector {
  const vector = args.normalize ? l2Normalize(args.raw) : args.raw;
  return Object.freeze({
    vector: Object.freeze(vector),
    method: args.method,
    window: Object.freeze({
      size: args.windowSize,
      used: args.contributors.length,
      tokens: Object.freeze(args.contributors.map((entry) => entry.token)),
    }),
    confidence: stabilityOf(
      args.contributors.map((entry) => entry.embedding),
      vector
    ),
  });
}

export function intentMean(
  context: readonly IntentContextEntry[],
  opts: IntentBuildOptions = {}
): IntentVector {
  const windowed = takeWindow(context, opts.window ?? DEFAULT_WINDOW);
  if (windowed.length === 0) throw emptyContext("mean", "context window is empty");

  return finalize({
    raw: meanOf(windowed.map((entry) => entry.embedding)),
    method: "mean",
    windowSize: windowed.length,
    contributors: windowed,
    normalize: opts.normalize ?? true,
  });
}

/**
 * Smoothed inverse frequency: weight a / (a + p(token)), then drop the
 * dominant shared direction so generic context stops dominating.
 */
export function intentSif(
  context: readonly IntentContextEntry[],
  opts: SifOptions = {}
): IntentVector {
  const windowed = takeWindow(context, opts.window ?? DEFAULT_WINDOW);
  if (windowed.length === 0) throw emptyContext("sif", "context window is empty");

  const a = opts.a ?? DEFAULT_SIF_A;
  const frequencies = opts.frequencies ?? {};
  const weights = windowed.map((entry) => {
    const p = frequencies[entry.token];
    return p === undefined ? 1 : a / (a + p);
  });
  const embeddings = windowed.map((entry) => entry.embedding);
  const weighted = weightedMean(embeddings, weights);

  let raw = weighted;
  const common =
    opts.commonComponent ??
    (windowed.length >= 2
      ? dominantDirection(embeddings.map((embedding, i) => embedding.map((v) => v * weights[i])))
      : null);
  if (common && norm(common) > RESIDUAL_EPS) {
    const residual = removeProjection(weighted, common);
    if (norm(residual) > RESIDUAL_EPS) raw = residual;
  }

  return finalize({
    raw,
    method: "sif",
    windowSize: windowed.length,
    contributors: windowed,
    normalize: opts.normalize ?? true,
  });
}

/**
 * Intent from analyst-chosen seed terms rather than conversation context.
 * Used for forensic queries, not online decoding.
 */
export function intentProbe(
  seeds: readonly IntentContextEntry[],
  opts: Pick<IntentBuildOptions, "normalize"> = {}
): IntentVector {
  if (seeds.length === 0) throw emptyContext("probe", "no probe terms");

  return finalize({
    raw: meanOf(seeds.map((entry) => entry.embedding)),
    method: "probe",
    windowSize: seeds.length,
    contributors: seeds,
    normalize: opts.normalize ?? true,
  });
}

export async function embedProbeTerms(
  terms: readonly string[],
  embedder: EmbeddingService
): Promise<IntentContextEntry[]> {
  const embeddings = await embedder.embed([...terms]);
  return terms.map((token, i) => ({ token, embedding: embeddings[i] }));
}

/**
 * Mean over the window with suppressed positions excluded. Unsuppressed
 * neighbours of a suppressed position are boosted so the gap still pulls
 * on the result.
 */
export function intentSuppressionAware(
  context: readonly IntentContextEntry[],
  opts: SuppressionAwareOptions = {}
): IntentVector {
  const windowed = takeWindow(context, opts.window ?? DEFAULT_WINDOW);
  if (windowed.length === 0) throw emptyContext("suppression_aware", "context window is empty");

  const boost = opts.neighborBoost ?? DEFAULT_NEIGHBOR_BOOST;
  const weights = windowed.map((entry) => (entry.suppressed ? 0 : 1));
  windowed.forEach((entry, i) => {
    if (!entry.suppressed) return;
    if (i - 1 >= 0 && weights[i - 1] > 0) weights[i - 1] *= boost;
    if (i + 1 < windowed.length && weights[i + 1] > 0) weights[i + 1] *= boost;
  });

  const kept = windowed.filter((entry) => !entry.suppressed);
  if (kept.length === 0) {
    throw emptyContext("suppression_aware", "every position in the window is suppressed");
  }
  const keptWeights = weights.filter((_, i) => !windowed[i].suppressed);

  return finalize({
    raw: weightedMean(
      kept.map((entry) => entry.embedding),
      keptWeights
    ),
    method: "suppression_aware",
    windowSize: windowed.length,
    contributors: kept,
    normalize: opts.normalize ?? true,
  });
}

export type BuildIntentOptions = {
  window: number;
  sifA?: number;
  frequencies?: Readonly<Record<string, number>>;
  neighborBoost?: number;
  // Required for "probe": the resolved seed terms.
  probeSeeds?: readonly IntentContextEntry[];
};

export function buildIntent(
  method: IntentMethod,
  context: readonly IntentContextEntry[],
  opts: BuildIntentOptions
): IntentVector {
  switch (method) {
    case "mean":
      return intentMean(context, { window: opts.window });
    case "sif":
      return intentSif(context, {
        window: opts.window,
        a: opts.sifA,
        frequencies: opts.frequencies,
      });
    case "suppression_aware":
      return intentSuppressionAware(context, {
        window: opts.window,
        neighborBoost: opts.neighborBoost,
      });
    case "probe":
      return intentProbe(opts.probeSeeds ?? []);
  }
}
