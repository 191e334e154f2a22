import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";

import { isSirenPipelineError } from "./errors/pipeline_error";
import { healthRoutes } from "./routes/healthz";
import { probeRoutes } from "./routes/probe";
import { recordRoutes } from "./routes/records";
import { sessionRoutes } from "./routes/sessions";
import type { SirenRuntime } from "./runtime";

export function buildServer(runtime: SirenRuntime, opts: { logger?: boolean } = {}): FastifyInstance {
  const app = Fastify({ logger: opts.logger ?? false });

  // CORS (v0/dev): permissive. Tighten before prod.
  app.register(cors, {
    origin: true,
  });

  app.setErrorHandler((error, _req, reply) => {
    if (isSirenPipelineError(error)) {
      return reply.code(error.code === "invalid_config" ? 500 : 503).send(error.toJSON());
    }
    app.log.error({ evt: "http.unhandled", error: String(error) }, "http.unhandled");
    return reply.code(error.statusCode ?? 500).send({ error: "internal_error" });
  });

  app.register(healthRoutes, { runtime });
  app.register(sessionRoutes, { prefix: "/v1", runtime });
  app.register(recordRoutes, { prefix: "/v1", runtime });
  app.register(probeRoutes, { prefix: "/v1", runtime });

  app.addHook("onClose", async () => {
    await runtime.close();
  });

  return app;
}
