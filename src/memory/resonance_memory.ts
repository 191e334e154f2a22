import type { MemoryConfig } from "../config/siren_config";
import type { Complaint, EmissionRecord, EmissionRecordDraft } from "../contracts/emission_record";
import { SirenPipelineError } from "../errors/pipeline_error";
import { createLogger, type SirenLogger } from "../logging/logger";
import type { DegradationCounter } from "../pipeline/degradation";
import {
  MemoryEmissionStore,
  compareRecords,
  compareRecordsByTime,
  recordKey,
  recordMentionsToken,
  type EmissionStore,
} from "../store/emission_store";

export type ResonanceMemoryOptions = {
  store?: EmissionStore;
  config?: Pick<MemoryConfig, "bufferLimit" | "batchSize">;
  degradations?: DegradationCounter;
  log?: SirenLogger;
};

const deepFreeze = <T>(value: T): T => {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
};

/**
 * Append-only log of gate decisions.
 *
 * record() never blocks and never throws on the decode path: the record is
 * sequenced, frozen and buffered, and a drain to the store is scheduled.
 * Store failures leave records buffered (bounded) for the next drain.
 * Queries see the store plus anything still buffered.
 */
export class ResonanceMemory {
  private readonly store: EmissionStore;
  private readonly bufferLimit: number;
  private readonly batchSize: number;
  private readonly degradations?: DegradationCounter;
  private readonly log: SirenLogger;

  private sequences = new Map<string, number>();
  private pending: EmissionRecord[] = [];
  private draining: Promise<void> | null = null;
  private lostRecords = 0;

  constructor(opts: ResonanceMemoryOptions = {}) {
    this.store = opts.store ?? new MemoryEmissionStore();
    this.bufferLimit = opts.config?.bufferLimit ?? 10_000;
    this.batchSize = opts.config?.batchSize ?? 256;
    this.degradations = opts.degradations;
    this.log = opts.log ?? createLogger({ component: "resonance_memory" });
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  get lostCount(): number {
    return this.lostRecords;
  }

  /**
   * Continue numbering after records already persisted for this session.
   * Returns the latest record by sequence, or null for a new session.
   */
  async resumeSession(sessionId: string): Promise<EmissionRecord | null> {
    const existing = await this.queryBySession(sessionId);
    const last = existing.reduce<EmissionRecord | null>(
      (latest, record) => (latest === null || record.sequence > latest.sequence ? record : latest),
      null
    );
    if (last && last.sequence > (this.sequences.get(sessionId) ?? 0)) {
      this.sequences.set(sessionId, last.sequence);
    }
    return last;
  }

  record(draft: EmissionRecordDraft): EmissionRecord {
    const sequence = (this.sequences.get(draft.sessionId) ?? 0) + 1;
    this.sequences.set(draft.sessionId, sequence);
    const record = deepFreeze<EmissionRecord>({ ...draft, sequence });

    this.pending.push(record);
    if (this.pending.length > this.bufferLimit) {
      const dropped = this.pending.shift();
      this.lostRecords += 1;
      this.noteDegradation(
        new SirenPipelineError({
          code: "memory_buffer_overflow",
          message: "Emission buffer full; oldest undelivered record dropped",
          sessionId: dropped?.sessionId,
          count: this.lostRecords,
        })
      );
    }

    this.scheduleDrain();
    return record;
  }

  async recordComplaint(args: { sessionId: string; userId: string | null; sequence: number }): Promise<Complaint> {
    const complaint: Complaint = {
      sessionId: args.sessionId,
      userId: args.userId,
      sequence: args.sequence,
      timestamp: new Date().toISOString(),
    };
    await this.store.appendComplaint(complaint);
    return complaint;
  }

  private scheduleDrain(): void {
    if (this.draining) return;
    this.draining = this.drain()
      .catch((error: unknown) => {
        this.log.error(
          { evt: "resonance_memory.drain_crashed", error: String(error) },
          "resonance_memory.drain_crashed"
        );
        return false;
      })
      .then((delivered) => {
        this.draining = null;
        // Records appended after the loop finished but before this point.
        if (delivered && this.pending.length > 0) this.scheduleDrain();
      });
  }

  private async drain(): Promise<boolean> {
    // Yield first so a burst of record() calls shares one batch.
    await Promise.resolve();
    while (this.pending.length > 0) {
      const batch = this.pending.slice(0, this.batchSize);
      try {
        await this.store.appendRecords(batch);
      } catch (error) {
        this.noteDegradation(
          new SirenPipelineError({
            code: "memory_sink_unavailable",
            message: "Emission store rejected a batch; records kept in buffer",
            count: batch.length,
            reason: String(error),
          })
        );
        return false;
      }
      // Overflow may have shifted the buffer meanwhile; remove by identity.
      const delivered = new Set(batch);
      this.pending = this.pending.filter((record) => !delivered.has(record));
    }
    return true;
  }

  /**
   * Wait for buffered records to reach the store. Resolves true when the
   * buffer is empty afterwards; a failing store leaves it non-empty.
   */
  async flush(): Promise<boolean> {
    if (this.draining) await this.draining;
    if (this.pending.length > 0) {
      this.scheduleDrain();
      if (this.draining) await this.draining;
    }
    return this.pending.length === 0;
  }

  private noteDegradation(error: SirenPipelineError): void {
    this.degradations?.note(error.code);
    this.log.warn({ evt: `resonance_memory.${error.code}`, ...error.details }, error.message);
  }

  private merge(stored: EmissionRecord[], filter: (record: EmissionRecord) => boolean) {
    const seen = new Set(stored.map((record) => recordKey(record)));
    const buffered = this.pending.filter((record) => filter(record) && !seen.has(recordKey(record)));
    return buffered.length === 0 ? stored : [...stored, ...buffered];
  }

  // Read failures surface to the caller; reads are off the decode path.
  async queryBySession(sessionId: string): Promise<EmissionRecord[]> {
    const stored = await this.store.listBySession(sessionId);
    return this.merge(stored, (record) => record.sessionId === sessionId).sort(compareRecords);
  }

  async queryByToken(tokenId: string): Promise<EmissionRecord[]> {
    const stored = await this.store.listByToken(tokenId);
    return this.merge(stored, (record) => recordMentionsToken(record, tokenId)).sort(compareRecords);
  }

  async queryByTimeRange(args: { fromMs: number; toMs: number }): Promise<EmissionRecord[]> {
    const stored = await this.store.listByTimeRange(args);
    return this.merge(
      stored,
      (record) => record.timestampMs >= args.fromMs && record.timestampMs <= args.toMs
    ).sort(compareRecords);
  }

  async queryByUser(args: { userId: string; limit?: number }): Promise<EmissionRecord[]> {
    const stored = await this.store.listByUser(args);
    const merged = this.merge(stored, (record) => record.userId === args.userId).sort(
      compareRecordsByTime
    );
    return args.limit === undefined ? merged : merged.slice(-args.limit);
  }

  async complaintsForUser(userId: string): Promise<Complaint[]> {
    return this.store.listComplaintsByUser(userId);
  }

  async close(): Promise<void> {
    const flushed = await this.flush();
    if (!flushed) {
      this.log.warn(
        { evt: "resonance_memory.closed_with_pending", pending: this.pending.length },
        "resonance_memory.closed_with_pending"
      );
    }
    await this.store.close?.();
  }
}
