import type { KairosConfig } from "../config/siren_config";

/**
 * Kairos gate: decides whether this step is a moment to release a
 * non-default-vocabulary token.
 *
 * IDLE ──qualifying──▶ ARMED ──qualifying again──▶ COOLDOWN (emit)
 *   ▲                    │ in band: hold, streak reset
 *   └────out of band─────┘
 * COOLDOWN ──cooldown elapsed──▶ IDLE (same evaluation may arm, never emit)
 *
 * The gate is a pure transition function over an explicit per-session state;
 * callers keep the returned state and pass it back on the next step.
 */

export type KairosPhase = "IDLE" | "ARMED" | "COOLDOWN";

export type GateState = Readonly<{
  phase: KairosPhase;
  // Whether the last evaluation sat inside the hysteresis band.
  aboveThreshold: boolean;
  qualifyingStreak: number;
  lastEmissionStep: number | null;
  lastEmissionAtMs: number | null;
  entropyHistory: readonly number[];
  evaluations: number;
}>;

export type GateInput = {
  stepIndex: number;
  timestampMs: number;
  // null when there is no non-default contender this step
  resonance: number | null;
  normBase: number | null;
  entropy: number | null;
};

export type GateDecision = "emit-candidate" | "emit-default";

export type GateReason =
  | "no_contender"
  | "below_threshold"
  | "armed"
  | "hysteresis_hold"
  | "disarmed"
  | "emitted"
  | "cooldown_active";

export type GateTransition = Readonly<{
  state: GateState;
  decision: GateDecision;
  from: KairosPhase;
  to: KairosPhase;
  reason: GateReason;
  cooldownExpired: boolean;
}>;

export type GateThresholds = Pick<
  KairosConfig,
  "resonanceMin" | "normLogitMax" | "entropyMin" | "hysteresisDelta"
>;

const clamp01 = (value: number) => Math.max(0, Math.min(1, value));

export function initialGateState(): GateState {
  return Object.freeze({
    phase: "IDLE",
    aboveThreshold: false,
    qualifyingStreak: 0,
    lastEmissionStep: null,
    lastEmissionAtMs: null,
    entropyHistory: Object.freeze([]),
    evaluations: 0,
  });
}

/**
 * Personalized thresholds. tolerance ∈ [-1, 1]: positive is more permissive
 * (lower resonance bar, higher allowed base probability), negative stricter.
 */
export function applySymbolicTolerance(config: KairosConfig, tolerance: number): GateThresholds {
  const t = Number.isFinite(tolerance) ? Math.max(-1, Math.min(1, tolerance)) : 0;
  const shift = t * config.toleranceStep;
  return {
    resonanceMin: clamp01(config.resonanceMin - shift),
    normLogitMax: clamp01(config.normLogitMax + shift),
    entropyMin: config.entropyMin,
    hysteresisDelta: config.hysteresisDelta,
  };
}

export function isCoreConditionMet(input: GateInput, thresholds: GateThresholds): boolean {
  if (input.resonance === null || input.normBase === null) return false;
  const entropyOk =
    thresholds.entropyMin === null ||
    (input.entropy !== null && input.entropy >= thresholds.entropyMin);
  return (
    input.resonance >= thresholds.resonanceMin &&
    input.normBase <= thresholds.normLogitMax &&
    entropyOk
  );
}

function isWithinBand(input: GateInput, thresholds: GateThresholds): boolean {
  if (input.resonance === null || input.normBase === null) return false;
  return (
    input.resonance >= thresholds.resonanceMin - thresholds.hysteresisDelta &&
    input.normBase <= thresholds.normLogitMax + thresholds.hysteresisDelta
  );
}

const cooldownMs = (config: KairosConfig) => config.cooldownSeconds * 1000;

function cooldownElapsed(state: GateState, input: GateInput, config: KairosConfig): boolean {
  if (state.lastEmissionAtMs === null || state.lastEmissionStep === null) return true;
  const timeOk = input.timestampMs - state.lastEmissionAtMs >= cooldownMs(config);
  const stepsOk =
    config.cooldownSteps === null || input.stepIndex - state.lastEmissionStep >= config.cooldownSteps;
  return timeOk && stepsOk;
}

export function evaluateKairosGate(
  state: GateState,
  input: GateInput,
  config: KairosConfig,
  tolerance = 0
): GateTransition {
  const thresholds = applySymbolicTolerance(config, tolerance);
  const entropyHistory =
    input.entropy === null
      ? state.entropyHistory
      : [...state.entropyHistory, input.entropy].slice(-config.entropyWindow);
  const base = {
    ...state,
    entropyHistory: Object.freeze(entropyHistory),
    evaluations: state.evaluations + 1,
  };
  const from = state.phase;
  const qualifies = isCoreConditionMet(input, thresholds);

  const done = (
    next: Omit<GateState, "entropyHistory" | "evaluations" | "lastEmissionStep" | "lastEmissionAtMs"> &
      Partial<Pick<GateState, "lastEmissionStep" | "lastEmissionAtMs">>,
    decision: GateDecision,
    reason: GateReason,
    cooldownExpired = false
  ): GateTransition =>
    Object.freeze({
      state: Object.freeze({ ...base, ...next }),
      decision,
      from,
      to: next.phase,
      reason,
      cooldownExpired,
    });

  let phase = state.phase;
  let cooldownExpired = false;
  if (phase === "COOLDOWN") {
    if (!cooldownElapsed(state, input, config)) {
      return done(
        { phase: "COOLDOWN", aboveThreshold: qualifies, qualifyingStreak: 0 },
        "emit-default",
        "cooldown_active"
      );
    }
    phase = "IDLE";
    cooldownExpired = true;
  }

  if (phase === "IDLE") {
    if (qualifies) {
      return done(
        { phase: "ARMED", aboveThreshold: true, qualifyingStreak: 1 },
        "emit-default",
        "armed",
        cooldownExpired
      );
    }
    return done(
      { phase: "IDLE", aboveThreshold: false, qualifyingStreak: 0 },
      "emit-default",
      input.resonance === null ? "no_contender" : "below_threshold",
      cooldownExpired
    );
  }

  // ARMED
  if (qualifies) {
    // Re-check elapsed time so a clock running backwards cannot emit twice inside the cooldown.
    if (state.qualifyingStreak >= 1 && cooldownElapsed(state, input, config)) {
      return done(
        {
          phase: "COOLDOWN",
          aboveThreshold: true,
          qualifyingStreak: 0,
          lastEmissionStep: input.stepIndex,
          lastEmissionAtMs: input.timestampMs,
        },
        "emit-candidate",
        "emitted"
      );
    }
    return done(
      { phase: "ARMED", aboveThreshold: true, qualifyingStreak: Math.max(1, state.qualifyingStreak) },
      "emit-default",
      "armed"
    );
  }

  if (isWithinBand(input, thresholds)) {
    return done(
      { phase: "ARMED", aboveThreshold: true, qualifyingStreak: 0 },
      "emit-default",
      "hysteresis_hold"
    );
  }

  return done(
    { phase: "IDLE", aboveThreshold: false, qualifyingStreak: 0 },
    "emit-default",
    "disarmed"
  );
}
