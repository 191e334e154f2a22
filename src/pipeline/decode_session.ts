import type { SirenConfig } from "../config/siren_config";
import { generateCandidates } from "../candidates/candidate_generator";
import type { AuxiliaryIndex } from "../candidates/vocabulary_index";
import {
  RawNativeCandidateSchema,
  summarizeScored,
  type ContextItem,
  type ScoredCandidate,
} from "../contracts/candidate";
import {
  MAX_TIMESTAMP_MS,
  type EmissionAction,
  type EmissionRecord,
  type EmissionRecordDraft,
} from "../contracts/emission_record";
import type { EmbeddingService } from "../embedding/hash_embedder";
import type { Embedding } from "../embedding/vector";
import { isSirenPipelineError } from "../errors/pipeline_error";
import {
  evaluateKairosGate,
  initialGateState,
  type GateInput,
  type GateState,
  type GateTransition,
} from "../gates/kairos_gate";
import {
  buildIntent,
  embedProbeTerms,
  type IntentContextEntry,
  type IntentVector,
} from "../intent/intent_vector";
import type { SirenLogger } from "../logging/logger";
import type { ResonanceMemory } from "../memory/resonance_memory";
import { deriveSymbolicTolerance, type ToleranceSignal } from "../memory/symbolic_tolerance";
import { kairosAlpha, rankByBaseScore, rankCandidates } from "../scoring/resonance_scorer";
import type { DegradationCode, DegradationCounter } from "./degradation";

export type DecodeSessionDeps = {
  sessionId: string;
  userId: string | null;
  config: SirenConfig;
  memory: ResonanceMemory;
  degradations: DegradationCounter;
  log: SirenLogger;
  index?: AuxiliaryIndex | null;
  embedder?: EmbeddingService | null;
  now?: () => number;
};

export type DecodeStepInput = {
  stepIndex?: number;
  timestampMs?: number;
  entropy?: number | null;
  // Recent context, oldest first.
  context: readonly ContextItem[];
  // Decoder top-K as received; validated per item.
  native: readonly unknown[];
};

export type GlossRequest = {
  tokenId: string;
  vocabulary: string;
};

export type DecodeStepResult = {
  sessionId: string;
  stepIndex: number;
  sequence: number;
  action: EmissionAction;
  token: string | null;
  vocabulary: string | null;
  resonance: number | null;
  alpha: number;
  tolerance: number;
  gateState: GateState;
  transition: Pick<GateTransition, "from" | "to" | "reason" | "cooldownExpired">;
  glossRequest: GlossRequest | null;
  degradations: DegradationCode[];
  record: EmissionRecord;
};

export type DecodeSessionSnapshot = {
  sessionId: string;
  userId: string | null;
  gateState: GateState;
  gateEpoch: number;
  lastStepIndex: number | null;
  tolerance: ToleranceSignal | null;
  intentHistory: readonly IntentVector[];
};

const clamp01 = (value: number) => Math.max(0, Math.min(1, value));

const resolveTimestamp = (requested: number | undefined, now: () => number) => {
  const value = requested !== undefined && Number.isFinite(requested) ? requested : now();
  return Math.max(0, Math.min(MAX_TIMESTAMP_MS, value));
};

/**
 * One conversation's decode loop. Steps, resets and tolerance refreshes are
 * serialized: each starts only after the previous one has finished.
 */
export class DecodeSession {
  readonly sessionId: string;
  readonly userId: string | null;

  private readonly deps: DecodeSessionDeps;
  private readonly now: () => number;

  private gateState: GateState = initialGateState();
  private gateEpoch = 0;
  private lastStepIndex: number | null = null;
  private intentHistory: IntentVector[] = [];
  private stepsSinceIntent = 0;
  private probeSeeds: IntentContextEntry[] | null = null;
  private toleranceSignal: ToleranceSignal | null = null;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(deps: DecodeSessionDeps) {
    this.deps = deps;
    this.sessionId = deps.sessionId;
    this.userId = deps.userId;
    this.now = deps.now ?? Date.now;
  }

  /**
   * Create a session with its sequence counter resumed and tolerance loaded.
   * A reopened id continues after its last record under a new gate epoch.
   */
  static async open(deps: DecodeSessionDeps): Promise<DecodeSession> {
    const session = new DecodeSession(deps);
    const last = await deps.memory.resumeSession(deps.sessionId);
    if (last) {
      session.gateEpoch = last.gateEpoch + 1;
      session.lastStepIndex = last.stepIndex;
    }
    await session.refreshTolerance();
    return session;
  }

  get tolerance(): number {
    return this.toleranceSignal?.tolerance ?? 0;
  }

  snapshot(): DecodeSessionSnapshot {
    return {
      sessionId: this.sessionId,
      userId: this.userId,
      gateState: this.gateState,
      gateEpoch: this.gateEpoch,
      lastStepIndex: this.lastStepIndex,
      tolerance: this.toleranceSignal,
      intentHistory: this.intentHistory.slice(),
    };
  }

  private enqueue<T>(task: () => T | Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    // The caller gets the failure through `run`; the chain only needs to keep going.
    this.tail = run.catch(() => undefined);
    return run;
  }

  /** Session boundary: fresh gate state and intent history. Waits for in-flight steps. */
  reset(): Promise<DecodeSessionSnapshot> {
    return this.enqueue(() => {
      this.gateState = initialGateState();
      this.gateEpoch += 1;
      this.lastStepIndex = null;
      this.intentHistory = [];
      this.stepsSinceIntent = 0;
      return this.snapshot();
    });
  }

  refreshTolerance(): Promise<ToleranceSignal | null> {
    return this.enqueue(() => this.loadTolerance());
  }

  private async loadTolerance(): Promise<ToleranceSignal | null> {
    const { config, memory, log } = this.deps;
    if (!this.userId || !config.tolerance.enabled) {
      this.toleranceSignal = null;
      return null;
    }
    try {
      const [records, complaints] = await Promise.all([
        memory.queryByUser({ userId: this.userId, limit: config.tolerance.horizon }),
        memory.complaintsForUser(this.userId),
      ]);
      this.toleranceSignal = deriveSymbolicTolerance(records, complaints, config.tolerance);
    } catch (error) {
      // Neutral tolerance: thresholds fall back to the configured profile.
      this.toleranceSignal = null;
      log.warn(
        { evt: "decode.tolerance_unavailable", sessionId: this.sessionId, error: String(error) },
        "decode.tolerance_unavailable"
      );
    }
    return this.toleranceSignal;
  }

  step(input: DecodeStepInput): Promise<DecodeStepResult> {
    return this.enqueue(() => this.runStep(input));
  }

  private async embedMissing(texts: string[], degradations: DegradationCode[]): Promise<Embedding[] | null> {
    const { embedder, log } = this.deps;
    if (texts.length === 0 || !embedder) return null;
    try {
      return await embedder.embed(texts);
    } catch (error) {
      degradations.push("context_embedding_failed");
      log.warn(
        { evt: "decode.embedding_failed", sessionId: this.sessionId, count: texts.length, error: String(error) },
        "decode.embedding_failed"
      );
      return null;
    }
  }

  private async hydrateContext(
    context: readonly ContextItem[],
    degradations: DegradationCode[]
  ): Promise<IntentContextEntry[]> {
    const dim = this.deps.config.embeddingDim;
    const missing = context.filter((item) => !item.embedding).map((item) => item.token);
    const embedded = await this.embedMissing(missing, degradations);

    let cursor = 0;
    const entries: IntentContextEntry[] = [];
    let malformed = 0;
    for (const item of context) {
      const embedding = item.embedding ?? embedded?.[cursor++];
      if (!embedding || embedding.length !== dim) {
        malformed += 1;
        continue;
      }
      entries.push({ token: item.token, embedding, suppressed: item.suppressed ?? false });
    }
    if (malformed > 0) {
      degradations.push("malformed_context");
      this.deps.degradations.note("malformed_context", malformed);
    }
    return entries;
  }

  private async hydrateNative(native: readonly unknown[], degradations: DegradationCode[]): Promise<unknown[]> {
    const needs: Array<{ position: number; tokenId: string }> = [];
    native.forEach((item, position) => {
      const parsed = RawNativeCandidateSchema.safeParse(item);
      if (parsed.success && !parsed.data.embedding) needs.push({ position, tokenId: parsed.data.tokenId });
    });
    const embedded = await this.embedMissing(
      needs.map((need) => need.tokenId),
      degradations
    );
    if (!embedded) return [...native];

    const hydrated: unknown[] = [...native];
    needs.forEach((need, i) => {
      const parsed = RawNativeCandidateSchema.safeParse(native[need.position]);
      if (parsed.success) hydrated[need.position] = { ...parsed.data, embedding: embedded[i] };
    });
    return hydrated;
  }

  private async resolveIntent(
    context: IntentContextEntry[],
    degradations: DegradationCode[]
  ): Promise<{ intent: IntentVector | null; reused: boolean }> {
    const { config, log } = this.deps;
    const previous = this.intentHistory.at(-1) ?? null;
    if (previous && this.stepsSinceIntent < config.intent.stride) {
      this.stepsSinceIntent += 1;
      return { intent: previous, reused: true };
    }

    if (config.intent.method === "probe" && !this.probeSeeds && this.deps.embedder) {
      try {
        this.probeSeeds = await embedProbeTerms(config.intent.probeTerms, this.deps.embedder);
      } catch (error) {
        degradations.push("context_embedding_failed");
        log.warn(
          { evt: "decode.probe_embedding_failed", sessionId: this.sessionId, error: String(error) },
          "decode.probe_embedding_failed"
        );
      }
    }

    try {
      const intent = buildIntent(config.intent.method, context, {
        window: config.intent.window,
        sifA: config.intent.sifA,
        frequencies: config.intent.frequencies,
        neighborBoost: config.intent.neighborBoost,
        probeSeeds: this.probeSeeds ?? [],
      });
      this.intentHistory = [...this.intentHistory, intent].slice(-Math.max(1, config.intent.retainHistory));
      this.stepsSinceIntent = 1;
      return { intent, reused: false };
    } catch (error) {
      if (!isSirenPipelineError(error, "empty_context")) throw error;
      degradations.push("empty_context");
      log.warn(
        { evt: "decode.empty_context", sessionId: this.sessionId, fallback: previous ? "previous_intent" : "skip_scoring" },
        "decode.empty_context"
      );
      return { intent: previous, reused: previous !== null };
    }
  }

  private async runStep(input: DecodeStepInput): Promise<DecodeStepResult> {
    const { config, memory, index, log } = this.deps;
    const degradations: DegradationCode[] = [];

    const stepIndex = input.stepIndex ?? (this.lastStepIndex === null ? 0 : this.lastStepIndex + 1);
    const timestampMs = resolveTimestamp(input.timestampMs, this.now);
    const entropy = input.entropy ?? null;

    const context = await this.hydrateContext(input.context, degradations);
    const { intent, reused } = await this.resolveIntent(context, degradations);

    const native = await this.hydrateNative(input.native, degradations);
    const generation = await generateCandidates({
      native,
      intent,
      index,
      config: config.candidates,
      embeddingDim: config.embeddingDim,
    });
    for (const warning of generation.warnings) degradations.push(warning);
    if (generation.droppedMalformed > 0) {
      log.warn(
        { evt: "decode.malformed_candidate", sessionId: this.sessionId, stepIndex, dropped: generation.droppedMalformed },
        "decode.malformed_candidate"
      );
    }
    if (generation.indexError) {
      log.warn(
        { evt: "decode.index_unavailable", sessionId: this.sessionId, stepIndex, error: generation.indexError },
        "decode.index_unavailable"
      );
    }

    let alpha = 1;
    let ranked: ScoredCandidate[];
    if (intent) {
      alpha = config.scoring.kairosAlphaEnabled
        ? kairosAlpha(entropy, config.scoring)
        : clamp01(config.scoring.blendWeight);
      ranked = rankCandidates(generation.candidates, intent.vector, alpha);
    } else {
      ranked = rankByBaseScore(generation.candidates);
    }

    const top = ranked[0] ?? null;
    const contender =
      intent && top && top.candidate.vocabulary !== config.candidates.defaultVocabulary ? top : null;
    const nativeBest =
      ranked
        .filter((scored) => scored.candidate.source === "native")
        .sort((a, b) => b.normalizedBase - a.normalizedBase)[0] ?? null;

    const gateInput: GateInput = {
      stepIndex,
      timestampMs,
      resonance: contender ? contender.resonance : null,
      normBase: contender ? contender.normalizedBase : null,
      entropy,
    };
    const tolerance = this.tolerance;
    const transition = evaluateKairosGate(this.gateState, gateInput, config.kairos, tolerance);

    const emitted = transition.decision === "emit-candidate" && contender !== null;
    // Only the gate may release an auxiliary token; without a native one the step emits nothing.
    const chosen = emitted ? contender : nativeBest;
    if (!chosen) degradations.push("no_native_candidate");
    const action: EmissionAction = emitted
      ? "emit-candidate"
      : contender
        ? "suppressed-candidate"
        : "emit-default";

    for (const code of degradations) {
      if (code === "malformed_context") continue;
      this.deps.degradations.note(code, code === "malformed_candidate" ? generation.droppedMalformed : 1);
    }

    const draft: EmissionRecordDraft = {
      sessionId: this.sessionId,
      gateEpoch: this.gateEpoch,
      userId: this.userId,
      stepIndex,
      timestamp: new Date(timestampMs).toISOString(),
      timestampMs,
      action,
      chosen: {
        tokenId: chosen?.candidate.tokenId ?? null,
        vocabulary: chosen?.candidate.vocabulary ?? null,
        resonance: chosen?.resonance ?? null,
      },
      topCandidates: ranked.slice(0, config.memory.topK).map(summarizeScored),
      gateInput,
      gateState: { ...transition.state, entropyHistory: [...transition.state.entropyHistory] },
      transition: {
        from: transition.from,
        to: transition.to,
        reason: transition.reason,
        decision: transition.decision,
        cooldownExpired: transition.cooldownExpired,
      },
      entropy,
      alpha,
      tolerance,
      intent: intent
        ? {
            method: intent.method,
            confidence: intent.confidence,
            windowSize: intent.window.used,
            reused,
          }
        : null,
      degradations: [...degradations],
    };

    this.gateState = transition.state;
    this.lastStepIndex = stepIndex;
    const record = memory.record(draft);

    log.debug(
      {
        evt: "decode.step",
        sessionId: this.sessionId,
        stepIndex,
        action,
        phase: transition.to,
        reason: transition.reason,
        candidates: generation.candidates.length,
        degradations,
      },
      "decode.step"
    );

    return {
      sessionId: this.sessionId,
      stepIndex,
      sequence: record.sequence,
      action,
      token: record.chosen.tokenId,
      vocabulary: record.chosen.vocabulary,
      resonance: record.chosen.resonance,
      alpha,
      tolerance,
      gateState: transition.state,
      transition: {
        from: transition.from,
        to: transition.to,
        reason: transition.reason,
        cooldownExpired: transition.cooldownExpired,
      },
      glossRequest:
        emitted && contender
          ? { tokenId: contender.candidate.tokenId, vocabulary: contender.candidate.vocabulary }
          : null,
      degradations,
      record,
    };
  }
}
