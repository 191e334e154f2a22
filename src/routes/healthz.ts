import type { FastifyInstance } from "fastify";

import type { SirenRuntime } from "../runtime";

export async function healthRoutes(app: FastifyInstance, opts: { runtime: SirenRuntime }) {
  const { runtime } = opts;
  app.get("/healthz", async () => ({
    ok: true,
    service: "siren-server",
    profile: runtime.config.profile,
    sessions: runtime.sessions.size,
    pendingRecords: runtime.memory.pendingCount,
    ts: new Date().toISOString(),
  }));
}
