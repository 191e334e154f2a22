import * as fs from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { z } from "zod";

import {
  ComplaintSchema,
  EmissionRecordSchema,
  type Complaint,
  type EmissionRecord,
} from "../contracts/emission_record";
import { createLogger, type SirenLogger } from "../logging/logger";
import type { EmissionStore } from "./emission_store";

const PayloadRowSchema = z.object({ payload_json: z.string() });

const ComplaintRowSchema = z.object({
  session_id: z.string(),
  user_id: z.string().nullable(),
  sequence: z.number().int(),
  ts: z.string(),
});

/**
 * SQLite-backed emission log. The full record lives in payload_json; the
 * indexed columns exist only to serve the query paths.
 */
export class SqliteEmissionStore implements EmissionStore {
  private db: Database.Database;
  private log: SirenLogger;

  constructor(
    dbPath: string = "./data/emissions.db",
    log: SirenLogger = createLogger({ component: "sqlite_emission_store" })
  ) {
    this.log = log;
    if (dbPath !== ":memory:") {
      fs.mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.initSchema();
    this.log.info({ evt: "emission_store.opened", dbPath }, "emission_store.opened");
  }

  private initSchema() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS emission_records (
        session_id TEXT NOT NULL,
        sequence INTEGER NOT NULL,
        user_id TEXT,
        step_index INTEGER NOT NULL,
        ts_ms REAL NOT NULL,
        action TEXT NOT NULL,
        payload_json TEXT NOT NULL,
        PRIMARY KEY (session_id, sequence)
      );

      CREATE INDEX IF NOT EXISTS idx_emission_step ON emission_records(step_index, session_id, sequence);
      CREATE INDEX IF NOT EXISTS idx_emission_ts ON emission_records(ts_ms);
      CREATE INDEX IF NOT EXISTS idx_emission_user ON emission_records(user_id, ts_ms);

      CREATE TABLE IF NOT EXISTS emission_tokens (
        session_id TEXT NOT NULL,
        sequence INTEGER NOT NULL,
        token_id TEXT NOT NULL,
        PRIMARY KEY (session_id, sequence, token_id),
        FOREIGN KEY (session_id, sequence) REFERENCES emission_records(session_id, sequence)
      );

      CREATE INDEX IF NOT EXISTS idx_emission_token ON emission_tokens(token_id);

      CREATE TABLE IF NOT EXISTS emission_complaints (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        session_id TEXT NOT NULL,
        user_id TEXT,
        sequence INTEGER NOT NULL,
        ts TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_complaint_user ON emission_complaints(user_id);
    `);
  }

  async appendRecords(records: readonly EmissionRecord[]): Promise<void> {
    if (records.length === 0) return;
    // OR IGNORE: a batch re-delivered after a failed drain must not duplicate rows.
    const insertRecord = this.db.prepare(`
      INSERT OR IGNORE INTO emission_records (
        session_id, sequence, user_id, step_index, ts_ms, action, payload_json
      ) VALUES (?, ?, ?, ?, ?, ?, ?)
    `);
    const insertToken = this.db.prepare(`
      INSERT OR IGNORE INTO emission_tokens (session_id, sequence, token_id) VALUES (?, ?, ?)
    `);

    const tx = this.db.transaction((batch: readonly EmissionRecord[]) => {
      for (const record of batch) {
        insertRecord.run(
          record.sessionId,
          record.sequence,
          record.userId,
          record.stepIndex,
          record.timestampMs,
          record.action,
          JSON.stringify(record)
        );
        const tokens = new Set<string>(record.topCandidates.map((candidate) => candidate.tokenId));
        if (record.chosen.tokenId) tokens.add(record.chosen.tokenId);
        for (const tokenId of tokens) {
          insertToken.run(record.sessionId, record.sequence, tokenId);
        }
      }
    });
    tx(records);
  }

  async appendComplaint(complaint: Complaint): Promise<void> {
    this.db
      .prepare(`
        INSERT INTO emission_complaints (session_id, user_id, sequence, ts) VALUES (?, ?, ?, ?)
      `)
      .run(complaint.sessionId, complaint.userId, complaint.sequence, complaint.timestamp);
  }

  private parseRows(rows: unknown[]): EmissionRecord[] {
    const records: EmissionRecord[] = [];
    for (const row of rows) {
      const { payload_json } = PayloadRowSchema.parse(row);
      const parsed = EmissionRecordSchema.safeParse(JSON.parse(payload_json));
      if (!parsed.success) {
        this.log.warn(
          { evt: "emission_store.row_unreadable", issues: parsed.error.issues.length },
          "emission_store.row_unreadable"
        );
        continue;
      }
      records.push(parsed.data);
    }
    return records;
  }

  async listBySession(sessionId: string): Promise<EmissionRecord[]> {
    const rows = this.db
      .prepare(`
        SELECT payload_json FROM emission_records
        WHERE session_id = ?
        ORDER BY step_index ASC, sequence ASC
      `)
      .all(sessionId);
    return this.parseRows(rows);
  }

  async listByToken(tokenId: string): Promise<EmissionRecord[]> {
    const rows = this.db
      .prepare(`
        SELECT r.payload_json FROM emission_records r
        JOIN emission_tokens t ON t.session_id = r.session_id AND t.sequence = r.sequence
        WHERE t.token_id = ?
        ORDER BY r.step_index ASC, r.session_id ASC, r.sequence ASC
      `)
      .all(tokenId);
    return this.parseRows(rows);
  }

  async listByTimeRange(args: { fromMs: number; toMs: number }): Promise<EmissionRecord[]> {
    const rows = this.db
      .prepare(`
        SELECT payload_json FROM emission_records
        WHERE ts_ms >= ? AND ts_ms <= ?
        ORDER BY step_index ASC, session_id ASC, sequence ASC
      `)
      .all(args.fromMs, args.toMs);
    return this.parseRows(rows);
  }

  async listByUser(args: { userId: string; limit?: number }): Promise<EmissionRecord[]> {
    const limit = args.limit ?? -1;
    const rows = this.db
      .prepare(`
        SELECT payload_json FROM (
          SELECT payload_json, ts_ms, session_id, sequence FROM emission_records
          WHERE user_id = ?
          ORDER BY ts_ms DESC, session_id DESC, sequence DESC
          LIMIT ?
        )
        ORDER BY ts_ms ASC, session_id ASC, sequence ASC
      `)
      .all(args.userId, limit);
    return this.parseRows(rows);
  }

  async listComplaintsByUser(userId: string): Promise<Complaint[]> {
    const rows = this.db
      .prepare(`
        SELECT session_id, user_id, sequence, ts FROM emission_complaints
        WHERE user_id = ?
        ORDER BY id ASC
      `)
      .all(userId);
    return rows.map((row) => {
      const parsed = ComplaintRowSchema.parse(row);
      return ComplaintSchema.parse({
        sessionId: parsed.session_id,
        userId: parsed.user_id,
        sequence: parsed.sequence,
        timestamp: parsed.ts,
      });
    });
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
