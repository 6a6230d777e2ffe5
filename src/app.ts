import Fastify, { type FastifyBaseLogger, type FastifyInstance } from "fastify";
import cors from "@fastify/cors";

import { MemoryMoodProvider, type MoodProvider } from "./affect/mood";
import { selectTokenCounter } from "./control-plane/token_counter";
import type { TurnConfig } from "./control-plane/turn_config";
import { TurnOrchestrator } from "./control-plane/turn_orchestrator";
import { MemoryIdentityProvider, type IdentityProvider } from "./identity/identity_provider";
import { InMemoryMemoryService, type MemoryService } from "./memory/memory_service";
import type { Logger } from "./observability/logger";
import {
  CompositeTelemetryRecorder,
  MemoryTelemetryRecorder,
  PinoTelemetryRecorder,
} from "./observability/telemetry";
import type { GenerationBackend } from "./providers/generation_backend";
import { createGenerationBackend } from "./providers/provider_config";
import { healthRoutes } from "./routes/healthz";
import { turnRoutes } from "./routes/turn";

export type AppCollaborators = {
  identityProvider?: IdentityProvider;
  moodProvider?: MoodProvider;
  memoryService?: MemoryService;
  generationBackend?: GenerationBackend;
};

/**
 * Wire the turn pipeline behind Fastify. Collaborators default to the in-process ones;
 * tests and deployments pass their own.
 */
export function buildApp(args: {
  config: TurnConfig;
  logger?: FastifyBaseLogger | boolean;
  collaborators?: AppCollaborators;
}): { app: FastifyInstance; orchestrator: TurnOrchestrator; recentTurns: MemoryTelemetryRecorder } {
  const { config, collaborators = {} } = args;
  const app = Fastify({ logger: args.logger ?? true });
  const log: Logger = app.log;

  const countTokens = selectTokenCounter(config.tokenizer);
  const recentTurns = new MemoryTelemetryRecorder();

  const orchestrator = new TurnOrchestrator({
    identityProvider: collaborators.identityProvider ?? new MemoryIdentityProvider(),
    moodProvider:
      collaborators.moodProvider
      ?? new MemoryMoodProvider({ halfLifeMinutes: config.moodHalfLifeMinutes }),
    memoryService: collaborators.memoryService ?? new InMemoryMemoryService({ countTokens }),
    generationBackend:
      collaborators.generationBackend ?? createGenerationBackend(config.provider, log),
    telemetry: new CompositeTelemetryRecorder(new PinoTelemetryRecorder(log), recentTurns),
    countTokens,
    budget: config.budget,
    timeouts: config.timeouts,
    logger: log,
  });

  // CORS (v0/dev): permissive.
  app.register(cors, { origin: true });

  app.register(healthRoutes, { config });
  app.register(turnRoutes, { prefix: "/v1", orchestrator, config, recentTurns });

  return { app, orchestrator, recentTurns };
}
