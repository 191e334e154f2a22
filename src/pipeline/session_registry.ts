import { randomUUID } from "node:crypto";

import type { SirenConfig } from "../config/siren_config";
import type { AuxiliaryIndex } from "../candidates/vocabulary_index";
import type { EmbeddingService } from "../embedding/hash_embedder";
import type { SirenLogger } from "../logging/logger";
import type { ResonanceMemory } from "../memory/resonance_memory";
import { DecodeSession } from "./decode_session";
import type { DegradationCounter } from "./degradation";

export type SessionRegistryDeps = {
  config: SirenConfig;
  memory: ResonanceMemory;
  degradations: DegradationCounter;
  log: SirenLogger;
  index?: AuxiliaryIndex | null;
  embedder?: EmbeddingService | null;
  now?: () => number;
};

/**
 * Live decode sessions. Each session owns its gate state; nothing is shared
 * between them except memory and the auxiliary index.
 */
export class SessionRegistry {
  private readonly deps: SessionRegistryDeps;
  private sessions = new Map<string, DecodeSession>();

  constructor(deps: SessionRegistryDeps) {
    this.deps = deps;
  }

  get size(): number {
    return this.sessions.size;
  }

  /** Returns the existing session when the id is already open. */
  async open(args: { sessionId?: string; userId?: string | null } = {}): Promise<DecodeSession> {
    const sessionId = args.sessionId ?? randomUUID();
    const existing = this.sessions.get(sessionId);
    if (existing) return existing;

    const session = await DecodeSession.open({
      ...this.deps,
      sessionId,
      userId: args.userId ?? null,
    });
    // Another open() for the same id may have finished first.
    const raced = this.sessions.get(sessionId);
    if (raced) return raced;
    this.sessions.set(sessionId, session);
    this.deps.log.info({ evt: "session.opened", sessionId, userId: session.userId }, "session.opened");
    return session;
  }

  get(sessionId: string): DecodeSession | null {
    return this.sessions.get(sessionId) ?? null;
  }

  async reset(sessionId: string): Promise<DecodeSession | null> {
    const session = this.sessions.get(sessionId);
    if (!session) return null;
    await session.reset();
    this.deps.log.info({ evt: "session.reset", sessionId }, "session.reset");
    return session;
  }

  close(sessionId: string): boolean {
    const removed = this.sessions.delete(sessionId);
    if (removed) this.deps.log.info({ evt: "session.closed", sessionId }, "session.closed");
    return removed;
  }
}
