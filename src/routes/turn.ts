import type { FastifyInstance } from "fastify";
import { z } from "zod";

import { TurnInput } from "../contracts/turn";
import type { TurnOrchestrator } from "../control-plane/turn_orchestrator";
import type { TurnConfig } from "../control-plane/turn_config";
import type { MemoryTelemetryRecorder } from "../observability/telemetry";

export type TurnRouteOptions = {
  orchestrator: TurnOrchestrator;
  config: Pick<TurnConfig, "budget" | "capacityCeiling" | "timeouts" | "tokenizer">;
  recentTurns?: MemoryTelemetryRecorder;
};

const RecentTurnsQuery = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export async function turnRoutes(app: FastifyInstance, opts: TurnRouteOptions) {
  app.options("/turn", async (_req, reply) => reply.code(204).send());

  app.post("/turn", async (req, reply) => {
    const parsed = TurnInput.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({
        error: "invalid_request",
        details: parsed.error.flatten(),
      });
    }

    const { userId, sessionId, message, identityOverride, moodOverride } = parsed.data;

    // Never log message content; ids and sizes only.
    req.log.debug(
      {
        plane: "turn",
        userId,
        sessionId,
        messageChars: message.length,
        hasIdentityOverride: Boolean(identityOverride),
        hasMoodOverride: Boolean(moodOverride),
      },
      "turn.request"
    );

    const result = await opts.orchestrator.processTurn({
      userId,
      sessionId,
      userText: message,
      identityOverride,
      moodOverride,
    });

    return reply.code(result.ok ? 200 : 503).send(result);
  });

  app.get("/budget", async () => ({
    ok: true,
    budget: opts.config.budget,
    capacityCeiling: opts.config.capacityCeiling,
    timeouts: opts.config.timeouts,
    tokenizer: opts.config.tokenizer,
  }));

  const recorder = opts.recentTurns;
  if (recorder) {
    app.get("/turns/recent", async (req, reply) => {
      const parsed = RecentTurnsQuery.safeParse(req.query);
      if (!parsed.success) {
        return reply.code(400).send({
          error: "invalid_request",
          details: parsed.error.flatten(),
        });
      }
      return { ok: true, turns: recorder.recentTurns(parsed.data.limit) };
    });
  }
}
