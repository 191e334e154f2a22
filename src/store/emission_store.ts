import type { Complaint, EmissionRecord } from "../contracts/emission_record";

/**
 * Durable side of Resonance Memory. Append-only: no update or delete.
 *
 * Ordering contract: every list method returns records in step-index order
 * (then session id, then per-session sequence).
 */
export interface EmissionStore {
  appendRecords(records: readonly EmissionRecord[]): Promise<void>;
  appendComplaint(complaint: Complaint): Promise<void>;

  listBySession(sessionId: string): Promise<EmissionRecord[]>;
  listByToken(tokenId: string): Promise<EmissionRecord[]>;
  listByTimeRange(args: { fromMs: number; toMs: number }): Promise<EmissionRecord[]>;
  // Oldest first by wall clock; `limit` keeps the most recent records.
  listByUser(args: { userId: string; limit?: number }): Promise<EmissionRecord[]>;
  listComplaintsByUser(userId: string): Promise<Complaint[]>;

  close?(): Promise<void>;
}

export function compareRecords(a: EmissionRecord, b: EmissionRecord): number {
  if (a.stepIndex !== b.stepIndex) return a.stepIndex - b.stepIndex;
  if (a.sessionId !== b.sessionId) return a.sessionId < b.sessionId ? -1 : 1;
  return a.sequence - b.sequence;
}

export function compareRecordsByTime(a: EmissionRecord, b: EmissionRecord): number {
  if (a.timestampMs !== b.timestampMs) return a.timestampMs - b.timestampMs;
  if (a.sessionId !== b.sessionId) return a.sessionId < b.sessionId ? -1 : 1;
  return a.sequence - b.sequence;
}

export const recordKey = (record: Pick<EmissionRecord, "sessionId" | "sequence">) =>
  `${record.sessionId}#${record.sequence}`;

// A record matches a token when it chose it or carried it among the top candidates.
export const recordMentionsToken = (record: EmissionRecord, tokenId: string) =>
  record.chosen.tokenId === tokenId ||
  record.topCandidates.some((candidate) => candidate.tokenId === tokenId);

export class MemoryEmissionStore implements EmissionStore {
  private records = new Map<string, EmissionRecord>();
  private complaints: Complaint[] = [];

  async appendRecords(records: readonly EmissionRecord[]): Promise<void> {
    for (const record of records) {
      const key = recordKey(record);
      // Re-delivery after a partial failure is idempotent.
      if (this.records.has(key)) continue;
      this.records.set(key, record);
    }
  }

  async appendComplaint(complaint: Complaint): Promise<void> {
    this.complaints.push(complaint);
  }

  private sorted(filter: (record: EmissionRecord) => boolean): EmissionRecord[] {
    return Array.from(this.records.values()).filter(filter).sort(compareRecords);
  }

  async listBySession(sessionId: string): Promise<EmissionRecord[]> {
    return this.sorted((record) => record.sessionId === sessionId);
  }

  async listByToken(tokenId: string): Promise<EmissionRecord[]> {
    return this.sorted((record) => recordMentionsToken(record, tokenId));
  }

  async listByTimeRange(args: { fromMs: number; toMs: number }): Promise<EmissionRecord[]> {
    return this.sorted((record) => record.timestampMs >= args.fromMs && record.timestampMs <= args.toMs);
  }

  async listByUser(args: { userId: string; limit?: number }): Promise<EmissionRecord[]> {
    const all = Array.from(this.records.values())
      .filter((record) => record.userId === args.userId)
      .sort(compareRecordsByTime);
    return args.limit === undefined ? all : all.slice(-args.limit);
  }

  async listComplaintsByUser(userId: string): Promise<Complaint[]> {
    return this.complaints.filter((complaint) => complaint.userId === userId);
  }
}
