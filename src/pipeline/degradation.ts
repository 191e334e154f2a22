import type { SirenPipelineErrorCode } from "../errors/pipeline_error";

export type DegradationCode =
  | SirenPipelineErrorCode
  | "context_embedding_failed"
  | "malformed_context"
  | "no_native_candidate";

export type DegradationSnapshot = {
  total: number;
  byCode: Partial<Record<DegradationCode, number>>;
  lastAt: string | null;
};

/**
 * Process-wide tally of silent fallbacks. Counters only: nothing here feeds
 * back into a decision.
 */
export class DegradationCounter {
  private counts = new Map<DegradationCode, number>();
  private total = 0;
  private lastAt: string | null = null;

  note(code: DegradationCode, count = 1): void {
    if (count <= 0) return;
    this.counts.set(code, (this.counts.get(code) ?? 0) + count);
    this.total += count;
    this.lastAt = new Date().toISOString();
  }

  count(code: DegradationCode): number {
    return this.counts.get(code) ?? 0;
  }

  snapshot(): DegradationSnapshot {
    const byCode: Partial<Record<DegradationCode, number>> = {};
    for (const [code, value] of this.counts) byCode[code] = value;
    return { total: this.total, byCode, lastAt: this.lastAt };
  }
}
