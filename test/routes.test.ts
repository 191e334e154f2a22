import { describe, it, expect, beforeAll, afterAll } from "vitest";
import type { FastifyInstance } from "fastify";

import { createSirenRuntime } from "../src/runtime";
import { buildServer } from "../src/server";
import { axis, captureLogger, FixtureEmbedder, testConfig } from "./fixtures";

const CONTEXT = [{ token: "maiden", embedding: axis(0) }];
const NATIVE = [
  { tokenId: "the", baseScore: 2, embedding: axis(3) },
  { tokenId: "virgo", vocabulary: "la", baseScore: -2, embedding: axis(0) },
];

describe("HTTP routes", () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    const config = testConfig({
      kairos: { resonanceMin: 0.7, normLogitMax: 0.3, entropyMin: 1.5, cooldownSeconds: 1 },
      scoring: { kairosAlphaEnabled: false, blendWeight: 0.2 },
    });
    const runtime = await createSirenRuntime(config, {
      log: captureLogger(),
      embedder: new FixtureEmbedder({ maiden: axis(0), justice: axis(1), virgo: axis(0) }),
      index: null,
    });
    app = buildServer(runtime);
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it("reports health", async () => {
    const response = await app.inject({ method: "GET", url: "/healthz" });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ ok: true, service: "siren-server", profile: "default" });
  });

  it("rejects unknown keys when opening a session", async () => {
    const response = await app.inject({ method: "POST", url: "/v1/sessions", payload: { bogus: 1 } });
    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      error: "invalid_request",
      message: "Unrecognized keys in request",
      unrecognizedKeys: ["bogus"],
    });
  });

  it("answers 404 for unknown sessions", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/v1/sessions/missing/steps",
      payload: { context: CONTEXT, native: NATIVE },
    });
    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ error: "not_found" });
  });

  it("runs a session end to end", async () => {
    const opened = await app.inject({
      method: "POST",
      url: "/v1/sessions",
      payload: { sessionId: "http-1", userId: "user-1" },
    });
    expect(opened.statusCode).toBe(201);
    expect(opened.json()).toMatchObject({ sessionId: "http-1", userId: "user-1", gateEpoch: 0, tolerance: 0 });
    expect(opened.json().gateState.phase).toBe("IDLE");

    const invalid = await app.inject({
      method: "POST",
      url: "/v1/sessions/http-1/steps",
      payload: { context: CONTEXT },
    });
    expect(invalid.statusCode).toBe(400);
    expect(invalid.json().error).toBe("invalid_request");

    const actions: string[] = [];
    for (const i of [0, 1]) {
      const step = await app.inject({
        method: "POST",
        url: "/v1/sessions/http-1/steps",
        payload: { timestampMs: 1_000 + i * 100, entropy: 2, context: CONTEXT, native: NATIVE },
      });
      expect(step.statusCode).toBe(200);
      expect(step.json().record).toBeUndefined();
      actions.push(step.json().action);
    }
    expect(actions).toEqual(["suppressed-candidate", "emit-candidate"]);

    const records = await app.inject({ method: "GET", url: "/v1/records?sessionId=http-1" });
    expect(records.statusCode).toBe(200);
    expect(records.json().count).toBe(2);
    expect(records.json().records[1].chosen.tokenId).toBe("virgo");

    const byToken = await app.inject({ method: "GET", url: "/v1/records?tokenId=virgo" });
    expect(byToken.json().count).toBe(2);

    const byTime = await app.inject({ method: "GET", url: "/v1/records?from=1050&to=2000" });
    expect(byTime.json().records.map((record: { sequence: number }) => record.sequence)).toEqual([2]);

    const replay = await app.inject({ method: "POST", url: "/v1/records/replay", payload: { sessionId: "http-1" } });
    expect(replay.statusCode).toBe(200);
    expect(replay.json()).toMatchObject({ sessionId: "http-1", records: 2, consistent: true, divergences: [] });

    const complaint = await app.inject({
      method: "POST",
      url: "/v1/sessions/http-1/complaints",
      payload: { sequence: 2 },
    });
    expect(complaint.statusCode).toBe(201);
    // the arming step is not penalized; the only emission is under complaint
    expect(complaint.json().tolerance).toBeCloseTo(-0.25, 12);

    const unknownComplaint = await app.inject({
      method: "POST",
      url: "/v1/sessions/http-1/complaints",
      payload: { sequence: 99 },
    });
    expect(unknownComplaint.statusCode).toBe(404);

    const reset = await app.inject({ method: "POST", url: "/v1/sessions/http-1/reset" });
    expect(reset.json()).toMatchObject({ gateEpoch: 1, lastStepIndex: null });

    const closed = await app.inject({ method: "DELETE", url: "/v1/sessions/http-1" });
    expect(closed.statusCode).toBe(204);
    const closedAgain = await app.inject({ method: "DELETE", url: "/v1/sessions/http-1" });
    expect(closedAgain.statusCode).toBe(404);
  });

  it("rejects timestamps outside the recordable range", async () => {
    await app.inject({ method: "POST", url: "/v1/sessions", payload: { sessionId: "http-time" } });
    const response = await app.inject({
      method: "POST",
      url: "/v1/sessions/http-time/steps",
      payload: { timestampMs: 1e16, entropy: 2, context: CONTEXT, native: NATIVE },
    });
    expect(response.statusCode).toBe(400);
    expect(response.json().error).toBe("invalid_request");

    const session = await app.inject({ method: "GET", url: "/v1/sessions/http-time" });
    expect(session.json()).toMatchObject({ lastStepIndex: null, gateState: { phase: "IDLE" } });
  });

  it("reopens a closed session id under a new gate epoch", async () => {
    await app.inject({ method: "POST", url: "/v1/sessions", payload: { sessionId: "http-reopen" } });
    await app.inject({
      method: "POST",
      url: "/v1/sessions/http-reopen/steps",
      payload: { timestampMs: 1_000, entropy: 2, context: CONTEXT, native: NATIVE },
    });
    await app.inject({ method: "DELETE", url: "/v1/sessions/http-reopen" });

    const reopened = await app.inject({ method: "POST", url: "/v1/sessions", payload: { sessionId: "http-reopen" } });
    expect(reopened.statusCode).toBe(201);
    expect(reopened.json()).toMatchObject({ gateEpoch: 1, lastStepIndex: 0, gateState: { phase: "IDLE" } });

    const step = await app.inject({
      method: "POST",
      url: "/v1/sessions/http-reopen/steps",
      payload: { timestampMs: 2_000, entropy: 2, context: CONTEXT, native: NATIVE },
    });
    expect(step.json()).toMatchObject({ stepIndex: 1, sequence: 2 });

    const replay = await app.inject({
      method: "POST",
      url: "/v1/records/replay",
      payload: { sessionId: "http-reopen" },
    });
    expect(replay.json()).toMatchObject({ records: 2, consistent: true, divergences: [] });
  });

  it("requires exactly one record filter", async () => {
    const both = await app.inject({ method: "GET", url: "/v1/records?sessionId=a&tokenId=b" });
    expect(both.statusCode).toBe(400);
    const none = await app.inject({ method: "GET", url: "/v1/records" });
    expect(none.statusCode).toBe(400);
  });

  it("ranks candidates against probe terms", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/v1/probe",
      payload: {
        terms: ["maiden", "justice"],
        native: [
          { tokenId: "abduction", baseScore: 1.2, embedding: axis(3) },
          { tokenId: "virgo", vocabulary: "la", baseScore: -1.5 },
        ],
        alpha: 0.2,
      },
    });
    expect(response.statusCode).toBe(200);
    expect(response.json().ranked.map((entry: { tokenId: string }) => entry.tokenId)).toEqual([
      "virgo",
      "abduction",
    ]);
  });

  it("exposes degradation counters", async () => {
    await app.inject({ method: "POST", url: "/v1/sessions", payload: { sessionId: "http-2" } });
    await app.inject({
      method: "POST",
      url: "/v1/sessions/http-2/steps",
      payload: { context: [], native: NATIVE },
    });

    const response = await app.inject({ method: "GET", url: "/v1/degradations" });
    expect(response.statusCode).toBe(200);
    expect(response.json().byCode.empty_context).toBe(1);
    expect(response.json().lostRecords).toBe(0);
  });
});
