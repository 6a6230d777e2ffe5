import { describe, it, expect, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";

import { buildApp, type AppCollaborators } from "../src/app";
import { loadTurnConfig } from "../src/control-plane/turn_config";
import { MemoryIdentityProvider } from "../src/identity/identity_provider";
import type { GenerationBackend } from "../src/providers/generation_backend";
import { ADA_IDENTITY } from "./support";

const opened: FastifyInstance[] = [];

async function makeApp(env: NodeJS.ProcessEnv = {}, collaborators: AppCollaborators = {}) {
  const config = loadTurnConfig({ TURN_TOKENIZER: "estimate", ...env });
  const built = buildApp({
    config,
    logger: false,
    collaborators: {
      identityProvider: new MemoryIdentityProvider({ "user-1": ADA_IDENTITY }),
      ...collaborators,
    },
  });
  opened.push(built.app);
  await built.app.ready();
  return built;
}

const downBackend: GenerationBackend = {
  name: "fake",
  generate: async () => {
    throw new Error("connection refused");
  },
};

afterEach(async () => {
  await Promise.all(opened.splice(0).map((app) => app.close()));
});

describe("POST /v1/turn", () => {
  it("returns the generated response with metrics", async () => {
    const { app } = await makeApp();

    const res = await app.inject({
      method: "POST",
      url: "/v1/turn",
      payload: { userId: "user-1", sessionId: "s-1", message: "What should I drink?" },
    });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.ok).toBe(true);
    expect(body.response).toMatch(/^\[Ada\] Stub response: I received \d+ prompt chars\.$/);
    expect(body.identityVersion).toBe("ada-v3");
    expect(body.moodState.label).toBe("neutral");
    expect(body.metrics.status).toBe("success");
    expect(body.metrics.finalState).toBe("RESPONSE_READY");
    expect(body.metrics.capacityCeiling).toBe(100_800);
  });

  it("degrades to the skeleton persona for an unknown user", async () => {
    const { app } = await makeApp();

    const res = await app.inject({
      method: "POST",
      url: "/v1/turn",
      payload: { userId: "stranger", sessionId: "s-1", message: "hello" },
    });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.identityVersion).toBe("skeleton-v0");
    expect(body.response.startsWith("[Assistant] ")).toBe(true);
    expect(body.metrics.status).toBe("degraded");
    expect(body.metrics.degradationEvents[0].subsystem).toBe("identity");
  });

  it("uses an identity override from the request", async () => {
    const { app } = await makeApp();

    const res = await app.inject({
      method: "POST",
      url: "/v1/turn",
      payload: {
        userId: "stranger",
        sessionId: "s-1",
        message: "hello",
        identityOverride: { ...ADA_IDENTITY, version: "ada-preview" },
      },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json().identityVersion).toBe("ada-preview");
  });

  it("rejects an invalid body", async () => {
    const { app } = await makeApp();

    const res = await app.inject({
      method: "POST",
      url: "/v1/turn",
      payload: { userId: "user-1", sessionId: "s-1" },
    });

    expect(res.statusCode).toBe(400);
    const body = res.json();
    expect(body.error).toBe("invalid_request");
    expect(body.details.fieldErrors.message).toHaveLength(1);
  });

  it("answers 503 without a response field when generation fails", async () => {
    const { app } = await makeApp({}, { generationBackend: downBackend });

    const res = await app.inject({
      method: "POST",
      url: "/v1/turn",
      payload: { userId: "user-1", sessionId: "s-1", message: "hello" },
    });

    expect(res.statusCode).toBe(503);
    const body = res.json();
    expect(body.ok).toBe(false);
    expect(body.error).toBe("Service temporarily unavailable");
    expect("response" in body).toBe(false);
    expect(body.metrics.errors).toEqual(["llm_unreachable"]);
    expect(body.metrics.finalState).toBe("FAILED");
  });

  it("answers 503 when the request alone exceeds the prompt capacity", async () => {
    const { app } = await makeApp({
      TURN_TOTAL_CONTEXT: "2000",
      TURN_RESERVED_OUTPUT: "0",
      TURN_SAFETY_BUFFER: "0.5",
    });

    const res = await app.inject({
      method: "POST",
      url: "/v1/turn",
      payload: { userId: "user-1", sessionId: "s-1", message: "x".repeat(5000) },
    });

    expect(res.statusCode).toBe(503);
    const body = res.json();
    expect(body.error).toBe("Request exceeds prompt capacity");
    expect(body.metrics.errors).toEqual(["request_over_capacity"]);
  });
});

describe("GET /v1/budget", () => {
  it("reports the deployment budget", async () => {
    const { app } = await makeApp();

    const res = await app.inject({ method: "GET", url: "/v1/budget" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      ok: true,
      budget: { totalContext: 128_000, reservedOutput: 8_000, safetyBufferFraction: 0.85 },
      capacityCeiling: 100_800,
      timeouts: { identityMs: 100, moodMs: 100, memoryMs: 500 },
      tokenizer: "estimate",
    });
  });
});

describe("GET /v1/turns/recent", () => {
  it("lists recent turn metrics newest first", async () => {
    const { app } = await makeApp();
    for (const sessionId of ["s-1", "s-2"]) {
      await app.inject({
        method: "POST",
        url: "/v1/turn",
        payload: { userId: "user-1", sessionId, message: "hello" },
      });
    }

    const res = await app.inject({ method: "GET", url: "/v1/turns/recent?limit=1" });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.turns).toHaveLength(1);
    expect(body.turns[0].sessionId).toBe("s-2");
  });

  it("holds a bounded window of turns and degradation events", async () => {
    const { app, recentTurns } = await makeApp();
    for (let i = 0; i < 120; i += 1) {
      await app.inject({
        method: "POST",
        url: "/v1/turn",
        payload: { userId: `stranger-${i}`, sessionId: "s-1", message: "hello" },
      });
    }

    expect(recentTurns.turns).toHaveLength(100);
    expect(recentTurns.events).toHaveLength(100);
    expect(recentTurns.events[99].message).toBe("no identity snapshot for user stranger-119");
  });

  it("rejects an out-of-range limit", async () => {
    const { app } = await makeApp();

    const res = await app.inject({ method: "GET", url: "/v1/turns/recent?limit=0" });

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe("invalid_request");
  });
});

describe("GET /healthz", () => {
  it("reports liveness and the active settings", async () => {
    const { app } = await makeApp();

    const res = await app.inject({ method: "GET", url: "/healthz" });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body).toMatchObject({
      ok: true,
      service: "synthcore",
      provider: "fake",
      tokenizer: "estimate",
      capacityCeiling: 100_800,
    });
    expect(body.uptimeSec).toBeGreaterThanOrEqual(0);
  });
});
