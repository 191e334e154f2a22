import type { FastifyInstance } from "fastify";
import { z } from "zod";

import { replayEmissionRecords } from "../pipeline/replay";
import type { SirenRuntime } from "../runtime";
import { sendInvalidRequest } from "./validation";

const timeParam = z
  .string()
  .min(1)
  .transform((raw, ctx) => {
    const asNumber = Number(raw);
    const ms = Number.isFinite(asNumber) ? asNumber : Date.parse(raw);
    if (!Number.isFinite(ms)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be epoch ms or an ISO timestamp" });
      return z.NEVER;
    }
    return ms;
  });

const RecordsQuerySchema = z
  .object({
    sessionId: z.string().min(1).optional(),
    tokenId: z.string().min(1).optional(),
    from: timeParam.optional(),
    to: timeParam.optional(),
  })
  .strict()
  .refine(
    (query) =>
      [query.sessionId, query.tokenId, query.from ?? query.to].filter((value) => value !== undefined)
        .length === 1,
    { message: "Exactly one of sessionId, tokenId or from/to is required" }
  );

const ReplayRequestSchema = z
  .object({
    sessionId: z.string().min(1),
  })
  .strict();

export async function recordRoutes(app: FastifyInstance, opts: { runtime: SirenRuntime }) {
  const { memory, config, degradations } = opts.runtime;

  app.get("/records", async (req, reply) => {
    const parsed = RecordsQuerySchema.safeParse(req.query);
    if (!parsed.success) return sendInvalidRequest(reply, parsed.error);
    const query = parsed.data;

    const records = query.sessionId
      ? await memory.queryBySession(query.sessionId)
      : query.tokenId
        ? await memory.queryByToken(query.tokenId)
        : await memory.queryByTimeRange({
            fromMs: query.from ?? Number.NEGATIVE_INFINITY,
            toMs: query.to ?? Number.POSITIVE_INFINITY,
          });
    return reply.code(200).send({ count: records.length, records });
  });

  app.post("/records/replay", async (req, reply) => {
    const parsed = ReplayRequestSchema.safeParse(req.body);
    if (!parsed.success) return sendInvalidRequest(reply, parsed.error);

    const records = await memory.queryBySession(parsed.data.sessionId);
    if (records.length === 0) return reply.code(404).send({ error: "not_found" });

    const result = replayEmissionRecords(records, config.kairos);
    return reply.code(200).send({
      sessionId: parsed.data.sessionId,
      records: records.length,
      consistent: result.consistent,
      divergences: result.divergences,
      finalState: result.finalState,
    });
  });

  app.get("/degradations", async (_req, reply) => {
    return reply.code(200).send({
      ...degradations.snapshot(),
      pendingRecords: memory.pendingCount,
      lostRecords: memory.lostCount,
    });
  });
}
