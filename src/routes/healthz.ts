import type { FastifyInstance } from "fastify";

import type { TurnConfig } from "../control-plane/turn_config";

export type HealthRouteOptions = {
  config: Pick<TurnConfig, "capacityCeiling" | "tokenizer" | "provider">;
  clock?: () => Date;
};

// Liveness plus the settings a turn will run with; no secrets.
export async function healthRoutes(app: FastifyInstance, opts: HealthRouteOptions) {
  const clock = opts.clock ?? (() => new Date());
  const startedAt = clock();

  app.get("/healthz", async () => {
    const now = clock();
    return {
      ok: true,
      service: "synthcore",
      provider: opts.config.provider.kind,
      tokenizer: opts.config.tokenizer,
      capacityCeiling: opts.config.capacityCeiling,
      uptimeSec: Math.floor((now.getTime() - startedAt.getTime()) / 1000),
      ts: now.toISOString(),
    };
  });
}
