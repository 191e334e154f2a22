import type { FastifyInstance } from "fastify";
import { z } from "zod";

import { runProbe } from "../pipeline/probe";
import type { SirenRuntime } from "../runtime";
import { sendInvalidRequest } from "./validation";

const ProbeRequestSchema = z
  .object({
    terms: z.array(z.string().min(1)).min(1).max(64),
    native: z.array(z.unknown()).max(1024),
    alpha: z.number().min(0).max(1).optional(),
    entropy: z.number().finite().min(0).nullable().optional(),
    includeAuxiliary: z.boolean().optional(),
  })
  .strict();

export async function probeRoutes(app: FastifyInstance, opts: { runtime: SirenRuntime }) {
  const { runtime } = opts;

  app.post("/probe", async (req, reply) => {
    const parsed = ProbeRequestSchema.safeParse(req.body);
    if (!parsed.success) return sendInvalidRequest(reply, parsed.error);

    const report = await runProbe(parsed.data, runtime);
    return reply.code(200).send(report);
  });
}
