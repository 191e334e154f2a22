import { z } from "zod";

import { IntentMethodSchema } from "../config/siren_config";
import { ScoredCandidateSummarySchema } from "./candidate";

// Latest epoch ms whose ISO form keeps a four-digit year.
export const MAX_TIMESTAMP_MS = Date.UTC(9999, 11, 31, 23, 59, 59, 999);
export const TimestampMsSchema = z.number().min(0).max(MAX_TIMESTAMP_MS);

export const EmissionActionSchema = z.enum(["emit-candidate", "emit-default", "suppressed-candidate"]);
export type EmissionAction = z.infer<typeof EmissionActionSchema>;

export const KairosPhaseSchema = z.enum(["IDLE", "ARMED", "COOLDOWN"]);

export const GateStateSchema = z
  .object({
    phase: KairosPhaseSchema,
    aboveThreshold: z.boolean(),
    qualifyingStreak: z.number().int().min(0),
    lastEmissionStep: z.number().int().nullable(),
    lastEmissionAtMs: z.number().nullable(),
    entropyHistory: z.array(z.number()),
    evaluations: z.number().int().min(0),
  })
  .strict();

export const GateInputSchema = z
  .object({
    stepIndex: z.number().int().min(0),
    timestampMs: TimestampMsSchema,
    resonance: z.number().nullable(),
    normBase: z.number().nullable(),
    entropy: z.number().nullable(),
  })
  .strict();

export const GateTransitionSummarySchema = z
  .object({
    from: KairosPhaseSchema,
    to: KairosPhaseSchema,
    reason: z.enum([
      "no_contender",
      "below_threshold",
      "armed",
      "hysteresis_hold",
      "disarmed",
      "emitted",
      "cooldown_active",
    ]),
    decision: z.enum(["emit-candidate", "emit-default"]),
    cooldownExpired: z.boolean(),
  })
  .strict();

export const EmissionRecordSchema = z
  .object({
    sessionId: z.string().min(1),
    sequence: z.number().int().min(1),
    // Bumped on every gate reset; replay restarts from a fresh state at each change.
    gateEpoch: z.number().int().min(0),
    userId: z.string().min(1).nullable(),
    stepIndex: z.number().int().min(0),
    timestamp: z.string().datetime(),
    timestampMs: TimestampMsSchema,
    action: EmissionActionSchema,
    chosen: z
      .object({
        tokenId: z.string().nullable(),
        vocabulary: z.string().nullable(),
        resonance: z.number().nullable(),
      })
      .strict(),
    topCandidates: z.array(ScoredCandidateSummarySchema),
    gateInput: GateInputSchema,
    gateState: GateStateSchema,
    transition: GateTransitionSummarySchema,
    entropy: z.number().nullable(),
    alpha: z.number(),
    tolerance: z.number(),
    intent: z
      .object({
        method: IntentMethodSchema,
        confidence: z.number(),
        windowSize: z.number().int().min(0),
        reused: z.boolean(),
      })
      .strict()
      .nullable(),
    degradations: z.array(z.string()),
  })
  .strict();

export type EmissionRecord = z.infer<typeof EmissionRecordSchema>;

// What the pipeline hands to memory; sequence is assigned on append.
export type EmissionRecordDraft = Omit<EmissionRecord, "sequence">;

export const ComplaintSchema = z
  .object({
    sessionId: z.string().min(1),
    userId: z.string().min(1).nullable(),
    sequence: z.number().int().min(1),
    timestamp: z.string().datetime(),
  })
  .strict();
export type Complaint = z.infer<typeof ComplaintSchema>;
