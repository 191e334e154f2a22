import type { ToleranceConfig } from "../config/siren_config";
import type { Complaint, EmissionRecord } from "../contracts/emission_record";
import type { GateReason } from "../gates/kairos_gate";
import { recordKey } from "../store/emission_store";

export type ToleranceSignal = {
  tolerance: number;
  uncomplainedEmissions: number;
  suppressions: number;
  complaints: number;
  considered: number;
};

// Suppressions that reflect a rejected contender, as opposed to the arming
// step every emission passes through or an ordinary sub-threshold step.
const PENALIZED_SUPPRESSIONS: ReadonlySet<GateReason> = new Set<GateReason>(["disarmed", "cooldown_active"]);

/**
 * Per-user symbolic tolerance in [-1, 1], derived from the emission log.
 * Emissions nobody complained about make the gate more permissive;
 * disarms, cooldown suppressions and complaints make it more conservative.
 * Only read here; the Kairos gate decides how to apply it.
 */
export function deriveSymbolicTolerance(
  records: readonly EmissionRecord[],
  complaints: readonly Complaint[],
  config: Pick<ToleranceConfig, "horizon" | "emissionGain" | "suppressionPenalty" | "complaintPenalty">
): ToleranceSignal {
  const recent = records.slice(-config.horizon);
  const recentKeys = new Set(recent.map((record) => recordKey(record)));
  const complained = new Set(
    complaints.map((complaint) => recordKey(complaint)).filter((key) => recentKeys.has(key))
  );

  let uncomplainedEmissions = 0;
  let suppressions = 0;
  for (const record of recent) {
    if (record.action === "emit-candidate" && !complained.has(recordKey(record))) {
      uncomplainedEmissions += 1;
    } else if (
      record.action === "suppressed-candidate" &&
      PENALIZED_SUPPRESSIONS.has(record.transition.reason)
    ) {
      suppressions += 1;
    }
  }

  const raw =
    config.emissionGain * uncomplainedEmissions -
    config.suppressionPenalty * suppressions -
    config.complaintPenalty * complained.size;

  return {
    tolerance: Math.max(-1, Math.min(1, raw)),
    uncomplainedEmissions,
    suppressions,
    complaints: complained.size,
    considered: recent.length,
  };
}
