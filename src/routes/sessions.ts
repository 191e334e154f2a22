import type { FastifyInstance } from "fastify";
import { z } from "zod";

import { ContextItemSchema } from "../contracts/candidate";
import { TimestampMsSchema } from "../contracts/emission_record";
import type { DecodeSession } from "../pipeline/decode_session";
import type { SirenRuntime } from "../runtime";
import { SessionParamsSchema, sendInvalidRequest } from "./validation";

const OpenSessionSchema = z
  .object({
    sessionId: z.string().min(1).max(128).optional(),
    userId: z.string().min(1).max(128).nullable().optional(),
  })
  .strict();

const StepRequestSchema = z
  .object({
    stepIndex: z.number().int().min(0).optional(),
    timestampMs: TimestampMsSchema.optional(),
    entropy: z.number().finite().min(0).nullable().optional(),
    context: z.array(ContextItemSchema).max(256).default([]),
    // Items are validated one by one; a bad candidate is dropped, not a 400.
    native: z.array(z.unknown()).max(1024),
  })
  .strict();

const ComplaintRequestSchema = z
  .object({
    sequence: z.number().int().min(1),
  })
  .strict();

const describeSession = (session: DecodeSession) => {
  const snapshot = session.snapshot();
  return {
    sessionId: snapshot.sessionId,
    userId: snapshot.userId,
    gateState: snapshot.gateState,
    gateEpoch: snapshot.gateEpoch,
    lastStepIndex: snapshot.lastStepIndex,
    tolerance: snapshot.tolerance?.tolerance ?? 0,
  };
};

export async function sessionRoutes(app: FastifyInstance, opts: { runtime: SirenRuntime }) {
  const { sessions, memory } = opts.runtime;

  app.post("/sessions", async (req, reply) => {
    const parsed = OpenSessionSchema.safeParse(req.body ?? {});
    if (!parsed.success) return sendInvalidRequest(reply, parsed.error);

    const session = await sessions.open({
      sessionId: parsed.data.sessionId,
      userId: parsed.data.userId ?? null,
    });
    return reply.code(201).send(describeSession(session));
  });

  app.get("/sessions/:sessionId", async (req, reply) => {
    const params = SessionParamsSchema.safeParse(req.params);
    if (!params.success) return sendInvalidRequest(reply, params.error);

    const session = sessions.get(params.data.sessionId);
    if (!session) return reply.code(404).send({ error: "not_found" });
    return reply.code(200).send(describeSession(session));
  });

  app.post("/sessions/:sessionId/steps", async (req, reply) => {
    const params = SessionParamsSchema.safeParse(req.params);
    if (!params.success) return sendInvalidRequest(reply, params.error);
    const parsed = StepRequestSchema.safeParse(req.body);
    if (!parsed.success) return sendInvalidRequest(reply, parsed.error);

    const session = sessions.get(params.data.sessionId);
    if (!session) return reply.code(404).send({ error: "not_found" });

    const { record: _record, ...result } = await session.step(parsed.data);
    return reply.code(200).send(result);
  });

  app.post("/sessions/:sessionId/reset", async (req, reply) => {
    const params = SessionParamsSchema.safeParse(req.params);
    if (!params.success) return sendInvalidRequest(reply, params.error);

    const session = await sessions.reset(params.data.sessionId);
    if (!session) return reply.code(404).send({ error: "not_found" });
    return reply.code(200).send(describeSession(session));
  });

  app.delete("/sessions/:sessionId", async (req, reply) => {
    const params = SessionParamsSchema.safeParse(req.params);
    if (!params.success) return sendInvalidRequest(reply, params.error);

    if (!sessions.close(params.data.sessionId)) return reply.code(404).send({ error: "not_found" });
    return reply.code(204).send();
  });

  app.post("/sessions/:sessionId/complaints", async (req, reply) => {
    const params = SessionParamsSchema.safeParse(req.params);
    if (!params.success) return sendInvalidRequest(reply, params.error);
    const parsed = ComplaintRequestSchema.safeParse(req.body);
    if (!parsed.success) return sendInvalidRequest(reply, parsed.error);

    const session = sessions.get(params.data.sessionId);
    if (!session) return reply.code(404).send({ error: "not_found" });

    const records = await memory.queryBySession(session.sessionId);
    if (!records.some((record) => record.sequence === parsed.data.sequence)) {
      return reply.code(404).send({ error: "not_found", message: "No emission record with that sequence" });
    }

    const complaint = await memory.recordComplaint({
      sessionId: session.sessionId,
      userId: session.userId,
      sequence: parsed.data.sequence,
    });
    const tolerance = await session.refreshTolerance();
    return reply.code(201).send({ complaint, tolerance: tolerance?.tolerance ?? 0 });
  });
}
