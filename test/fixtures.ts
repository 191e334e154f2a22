import type { EmissionRecordDraft } from "../src/contracts/emission_record";
import { initialGateState } from "../src/gates/kairos_gate";
import { resolveSirenConfig, type SirenConfig, type SirenConfigInput } from "../src/config/siren_config";
import type { EmbeddingService } from "../src/embedding/hash_embedder";
import type { Embedding } from "../src/embedding/vector";
import type { SirenLogger } from "../src/logging/logger";

export const DIM = 4;

// Basis vector e_axis in DIM dimensions.
export const axis = (i: number, dim = DIM): Embedding =>
  Array.from({ length: dim }, (_, j) => (j === i ? 1 : 0));

export const testConfig = (input: SirenConfigInput = {}): SirenConfig =>
  resolveSirenConfig({ embeddingDim: DIM, ...input });

/** Embedder with hand-placed vectors; unknown text maps to the last axis. */
export class FixtureEmbedder implements EmbeddingService {
  readonly dimension = DIM;
  calls: string[][] = [];

  constructor(private readonly table: Record<string, Embedding>) {}

  async embed(texts: string[]): Promise<Embedding[]> {
    this.calls.push([...texts]);
    return texts.map((text) => this.table[text] ?? axis(DIM - 1));
  }
}

export type LogLine = { level: string; obj: Record<string, unknown>; msg?: string };

export const captureLogger = (): SirenLogger & { lines: LogLine[] } => {
  const lines: LogLine[] = [];
  const push = (level: string) => (obj: Record<string, unknown>, msg?: string) => {
    lines.push({ level, obj, msg });
  };
  return {
    lines,
    debug: push("debug"),
    info: push("info"),
    warn: push("warn"),
    error: push("error"),
  };
};

export const draftRecord = (
  overrides: Partial<EmissionRecordDraft> & Pick<EmissionRecordDraft, "sessionId" | "stepIndex">
): EmissionRecordDraft => {
  const timestampMs = overrides.timestampMs ?? 1_700_000_000_000 + overrides.stepIndex * 1_000;
  const state = initialGateState();
  return {
    gateEpoch: 0,
    userId: null,
    timestamp: new Date(timestampMs).toISOString(),
    timestampMs,
    action: "emit-default",
    chosen: { tokenId: "the", vocabulary: "en", resonance: 0.5 },
    topCandidates: [],
    gateInput: {
      stepIndex: overrides.stepIndex,
      timestampMs,
      resonance: null,
      normBase: null,
      entropy: null,
    },
    gateState: { ...state, entropyHistory: [] },
    transition: { from: "IDLE", to: "IDLE", reason: "no_contender", decision: "emit-default", cooldownExpired: false },
    entropy: null,
    alpha: 0.5,
    tolerance: 0,
    intent: null,
    degradations: [],
    ...overrides,
  };
};
