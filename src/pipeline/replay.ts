import type { KairosConfig } from "../config/siren_config";
import type { EmissionRecord } from "../contracts/emission_record";
import {
  evaluateKairosGate,
  initialGateState,
  type GateState,
  type GateTransition,
} from "../gates/kairos_gate";

export type ReplayDivergence = {
  sequence: number;
  stepIndex: number;
  field: string;
  recorded: unknown;
  replayed: unknown;
};

export type ReplayResult = {
  transitions: GateTransition[];
  finalState: GateState;
  consistent: boolean;
  divergences: ReplayDivergence[];
};

const sameValue = (a: unknown, b: unknown) => JSON.stringify(a) === JSON.stringify(b);

/**
 * Re-run the gate over one session's records using only what each record
 * stored (gate input and tolerance). A gate reset between records shows up
 * as a change of gateEpoch and restarts from a fresh state.
 */
export function replayEmissionRecords(
  records: readonly EmissionRecord[],
  config: KairosConfig,
  initialState: GateState = initialGateState()
): ReplayResult {
  const ordered = [...records].sort((a, b) => a.sequence - b.sequence);
  const transitions: GateTransition[] = [];
  const divergences: ReplayDivergence[] = [];

  let state = initialState;
  let epoch: number | null = null;
  for (const record of ordered) {
    if (epoch !== null && record.gateEpoch !== epoch) state = initialGateState();
    epoch = record.gateEpoch;

    const transition = evaluateKairosGate(state, record.gateInput, config, record.tolerance);
    transitions.push(transition);
    state = transition.state;

    const checks: Array<[string, unknown, unknown]> = [
      ["gateState", record.gateState, transition.state],
      ["transition.from", record.transition.from, transition.from],
      ["transition.to", record.transition.to, transition.to],
      ["transition.reason", record.transition.reason, transition.reason],
      ["transition.decision", record.transition.decision, transition.decision],
      ["transition.cooldownExpired", record.transition.cooldownExpired, transition.cooldownExpired],
    ];
    for (const [field, recorded, replayed] of checks) {
      if (!sameValue(recorded, replayed)) {
        divergences.push({ sequence: record.sequence, stepIndex: record.stepIndex, field, recorded, replayed });
      }
    }
  }

  return { transitions, finalState: state, consistent: divergences.length === 0, divergences };
}
