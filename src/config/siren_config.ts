import { config as loadEnv } from "dotenv";
import { z } from "zod";

import { SirenPipelineError } from "../errors/pipeline_error";

if (process.env.NODE_ENV !== "production") {
  loadEnv();
}

export const SIREN_EMBED_DIM = 64;

export const ScoreKindSchema = z.enum(["logit", "probability"]);
export type ScoreKind = z.infer<typeof ScoreKindSchema>;

export const IntentMethodSchema = z.enum(["mean", "sif", "probe", "suppression_aware"]);
export type IntentMethod = z.infer<typeof IntentMethodSchema>;

export const SirenProfileSchema = z.enum(["default", "conservative", "permissive"]);
export type SirenProfile = z.infer<typeof SirenProfileSchema>;

const unit = z.number().min(0).max(1);

export const ScoringConfigSchema = z
  .object({
    blendWeight: unit.default(0.5),
    kairosAlphaEnabled: z.boolean().default(true),
    alphaMin: unit.default(0.1),
    alphaMax: unit.default(0.9),
    alphaMapping: z.enum(["linear", "sigmoid"]).default("linear"),
    // Entropy above which alpha starts shifting toward fidelity.
    entropyPivot: z.number().default(1.5),
    linearSlope: z.number().min(0).default(0.1),
    sigmoidSteepness: z.number().min(0).default(4),
    maxShift: unit.default(0.25),
  })
  .strict()
  .refine((s) => s.alphaMin <= s.alphaMax, {
    message: "alphaMin must not exceed alphaMax",
    path: ["alphaMin"],
  });
export type ScoringConfig = z.infer<typeof ScoringConfigSchema>;

export const KairosConfigSchema = z
  .object({
    resonanceMin: unit.default(0.7),
    normLogitMax: unit.default(0.3),
    // null disables the entropy condition
    entropyMin: z.number().nullable().default(1.5),
    hysteresisDelta: unit.default(0.05),
    cooldownSeconds: z.number().min(0).default(1),
    cooldownSteps: z.number().int().min(0).nullable().default(null),
    entropyWindow: z.number().int().min(1).default(8),
    toleranceStep: unit.default(0.1),
  })
  .strict();
export type KairosConfig = z.infer<typeof KairosConfigSchema>;

export const CandidateConfigSchema = z
  .object({
    maxCandidates: z.number().int().min(1).default(32),
    auxiliaryTopK: z.number().int().min(0).default(8),
    indexTimeoutMs: z.number().int().min(1).default(50),
    defaultVocabulary: z.string().min(1).default("en"),
    auxiliaryBaseScore: z
      .object({ value: z.number(), kind: ScoreKindSchema })
      .strict()
      .default({ value: 0, kind: "probability" }),
  })
  .strict();
export type CandidateConfig = z.infer<typeof CandidateConfigSchema>;

export const IntentConfigSchema = z
  .object({
    method: IntentMethodSchema.default("mean"),
    window: z.number().int().min(1).default(8),
    // Rebuild the intent every N steps; reuse the previous one in between.
    stride: z.number().int().min(1).default(1),
    sifA: z.number().positive().default(1e-3),
    neighborBoost: z.number().min(1).default(1.5),
    probeTerms: z.array(z.string().min(1)).default([]),
    frequencies: z.record(z.string(), z.number().positive()).default({}),
    retainHistory: z.number().int().min(0).default(16),
  })
  .strict();
export type IntentConfig = z.infer<typeof IntentConfigSchema>;

export const MemoryConfigSchema = z
  .object({
    dbPath: z.string().min(1).nullable().default(null),
    bufferLimit: z.number().int().min(1).default(10_000),
    batchSize: z.number().int().min(1).default(256),
    topK: z.number().int().min(1).default(5),
  })
  .strict();
export type MemoryConfig = z.infer<typeof MemoryConfigSchema>;

export const ToleranceConfigSchema = z
  .object({
    enabled: z.boolean().default(true),
    horizon: z.number().int().min(1).default(200),
    emissionGain: z.number().min(0).default(0.05),
    suppressionPenalty: z.number().min(0).default(0.02),
    complaintPenalty: z.number().min(0).default(0.25),
  })
  .strict();
export type ToleranceConfig = z.infer<typeof ToleranceConfigSchema>;

export const ServerConfigSchema = z
  .object({
    port: z.number().int().min(0).max(65_535).default(3333),
    host: z.string().default("0.0.0.0"),
    vocabularyPath: z.string().min(1).nullable().default(null),
    indexCacheSize: z.number().int().min(0).default(512),
  })
  .strict();
export type ServerConfig = z.infer<typeof ServerConfigSchema>;

export const SirenConfigSchema = z
  .object({
    profile: SirenProfileSchema.default("default"),
    embeddingDim: z.number().int().min(1).default(SIREN_EMBED_DIM),
    scoring: ScoringConfigSchema.default({}),
    kairos: KairosConfigSchema.default({}),
    candidates: CandidateConfigSchema.default({}),
    intent: IntentConfigSchema.default({}),
    memory: MemoryConfigSchema.default({}),
    tolerance: ToleranceConfigSchema.default({}),
    server: ServerConfigSchema.default({}),
  })
  .strict();
export type SirenConfig = z.infer<typeof SirenConfigSchema>;
export type SirenConfigInput = z.input<typeof SirenConfigSchema>;

/**
 * Gate presets per deployment profile. Explicit `kairos` values and
 * SIREN_* environment variables win over the preset.
 */
export const KAIROS_PROFILES: Record<SirenProfile, Partial<KairosConfig>> = {
  default: {},
  conservative: {
    resonanceMin: 0.8,
    normLogitMax: 0.2,
    entropyMin: 2,
    hysteresisDelta: 0.08,
    cooldownSeconds: 5,
  },
  permissive: {
    resonanceMin: 0.6,
    normLogitMax: 0.4,
    entropyMin: 1,
    hysteresisDelta: 0.03,
    cooldownSeconds: 0.5,
  },
};

type Env = Record<string, string | undefined>;

const numberFromEnv = (env: Env, key: string): number | undefined => {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new SirenPipelineError({
      code: "invalid_config",
      message: `${key} must be a finite number`,
      reason: key,
    });
  }
  return value;
};

const isTruthy = (value: string) => ["1", "true", "yes", "on"].includes(value.toLowerCase());

const booleanFromEnv = (env: Env, key: string): boolean | undefined => {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return undefined;
  return isTruthy(raw);
};

const stringFromEnv = (env: Env, key: string): string | undefined => {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return undefined;
  return raw.trim();
};

const listFromEnv = (env: Env, key: string): string[] | undefined => {
  const raw = stringFromEnv(env, key);
  if (!raw) return undefined;
  return raw
    .split(",")
    .map((term) => term.trim())
    .filter(Boolean);
};

function entropyMinFromEnv(env: Env): number | null | undefined {
  const raw = stringFromEnv(env, "SIREN_ENTROPY_MIN");
  if (raw === undefined) return undefined;
  if (raw.toLowerCase() === "off" || raw.toLowerCase() === "none") return null;
  return numberFromEnv(env, "SIREN_ENTROPY_MIN");
}

export function configInputFromEnv(env: Env = process.env): SirenConfigInput {
  return {
    profile: SirenProfileSchema.optional().parse(stringFromEnv(env, "SIREN_PROFILE")),
    scoring: {
      blendWeight: numberFromEnv(env, "SIREN_BLEND_WEIGHT"),
      kairosAlphaEnabled: booleanFromEnv(env, "SIREN_KAIROS_ALPHA_ENABLED"),
      alphaMin: numberFromEnv(env, "SIREN_ALPHA_MIN"),
      alphaMax: numberFromEnv(env, "SIREN_ALPHA_MAX"),
      alphaMapping: z
        .enum(["linear", "sigmoid"])
        .optional()
        .parse(stringFromEnv(env, "SIREN_ALPHA_MAPPING")),
      entropyPivot: numberFromEnv(env, "SIREN_ALPHA_ENTROPY_PIVOT"),
      maxShift: numberFromEnv(env, "SIREN_ALPHA_MAX_SHIFT"),
    },
    kairos: {
      resonanceMin: numberFromEnv(env, "SIREN_RESONANCE_MIN"),
      normLogitMax: numberFromEnv(env, "SIREN_NORM_LOGIT_MAX"),
      entropyMin: entropyMinFromEnv(env),
      hysteresisDelta: numberFromEnv(env, "SIREN_HYSTERESIS_DELTA"),
      cooldownSeconds: numberFromEnv(env, "SIREN_COOLDOWN_SECONDS"),
      cooldownSteps: numberFromEnv(env, "SIREN_COOLDOWN_STEPS"),
    },
    candidates: {
      maxCandidates: numberFromEnv(env, "SIREN_MAX_CANDIDATES"),
      auxiliaryTopK: numberFromEnv(env, "SIREN_AUX_TOP_K"),
      indexTimeoutMs: numberFromEnv(env, "SIREN_INDEX_TIMEOUT_MS"),
      defaultVocabulary: stringFromEnv(env, "SIREN_DEFAULT_VOCABULARY"),
    },
    intent: {
      method: IntentMethodSchema.optional().parse(stringFromEnv(env, "SIREN_INTENT_METHOD")),
      window: numberFromEnv(env, "SIREN_INTENT_WINDOW"),
      stride: numberFromEnv(env, "SIREN_INTENT_STRIDE"),
      probeTerms: listFromEnv(env, "SIREN_PROBE_TERMS"),
    },
    memory: {
      dbPath: stringFromEnv(env, "SIREN_DB_PATH"),
      bufferLimit: numberFromEnv(env, "SIREN_MEMORY_BUFFER_LIMIT"),
    },
    tolerance: {
      enabled: booleanFromEnv(env, "SIREN_TOLERANCE_ENABLED"),
    },
    server: {
      port: numberFromEnv(env, "PORT"),
      vocabularyPath: stringFromEnv(env, "SIREN_VOCAB_PATH"),
    },
  };
}

/**
 * Resolve a full config: profile preset, then explicit input on top.
 * Throws SirenPipelineError("invalid_config") with the zod issues flattened.
 */
export function resolveSirenConfig(input: SirenConfigInput = {}): SirenConfig {
  const profile = SirenProfileSchema.safeParse(input.profile ?? "default");
  const preset = profile.success ? KAIROS_PROFILES[profile.data] : {};
  // Unset overrides must not mask the preset.
  const overrides = Object.fromEntries(
    Object.entries(input.kairos ?? {}).filter(([, value]) => value !== undefined)
  );
  const parsed = SirenConfigSchema.safeParse({
    ...input,
    kairos: { ...preset, ...overrides },
  });
  if (!parsed.success) {
    const flat = parsed.error.flatten();
    const first = parsed.error.issues[0];
    throw new SirenPipelineError({
      code: "invalid_config",
      message: first
        ? `Invalid config at ${first.path.join(".") || "(root)"}: ${first.message}`
        : "Invalid config",
      count: parsed.error.issues.length,
      reason: JSON.stringify(flat.fieldErrors),
    });
  }
  return parsed.data;
}

export function loadSirenConfig(env: Env = process.env): SirenConfig {
  let input: SirenConfigInput;
  try {
    input = configInputFromEnv(env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      throw new SirenPipelineError({
        code: "invalid_config",
        message: `Invalid environment: ${error.issues[0]?.message ?? "unknown"}`,
        count: error.issues.length,
      });
    }
    throw error;
  }
  return resolveSirenConfig(input);
}
