import { z } from "zod";

import type { LogLevel } from "../observability/logger";
import type { GenerationBackendName } from "../providers/generation_backend";
import { assertViableBudget, type BudgetParams } from "./token_budget";
import type { TokenizerKind } from "./token_counter";

/**
 * Deployment parameters. Read from the environment once at process start; a bad value or a
 * capacity ceiling below the viable minimum stops the process before any turn runs.
 */

export type TurnTimeouts = {
  identityMs: number;
  moodMs: number;
  memoryMs: number;
};

export const DEFAULT_TURN_TIMEOUTS: Readonly<TurnTimeouts> = Object.freeze({
  identityMs: 100,
  moodMs: 100,
  memoryMs: 500,
});

export type TurnConfig = {
  budget: BudgetParams;
  capacityCeiling: number;
  timeouts: TurnTimeouts;
  tokenizer: TokenizerKind;
  moodHalfLifeMinutes: number;
  provider: {
    kind: GenerationBackendName;
    openai: { apiKey?: string; model: string; baseUrl: string };
  };
  server: {
    port: number;
    logLevel?: LogLevel;
    prettyLogs: boolean;
  };
};

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const TurnEnvSchema = z
  .object({
    TURN_TOTAL_CONTEXT: positiveInt(128_000),
    TURN_RESERVED_OUTPUT: z.coerce.number().int().min(0).default(8_000),
    TURN_SAFETY_BUFFER: z.coerce.number().gt(0).max(1).default(0.85),
    TURN_IDENTITY_TIMEOUT_MS: positiveInt(DEFAULT_TURN_TIMEOUTS.identityMs),
    TURN_MOOD_TIMEOUT_MS: positiveInt(DEFAULT_TURN_TIMEOUTS.moodMs),
    TURN_MEMORY_TIMEOUT_MS: positiveInt(DEFAULT_TURN_TIMEOUTS.memoryMs),
    TURN_TOKENIZER: z.enum(["cl100k", "estimate"]).default("cl100k"),
    MOOD_HALF_LIFE_MINUTES: z.coerce.number().positive().default(30),
    LLM_PROVIDER: z.enum(["fake", "openai"]).default("fake"),
    OPENAI_API_KEY: z.string().min(1).optional(),
    OPENAI_MODEL: z.string().min(1).default("gpt-4o-mini"),
    OPENAI_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
    PORT: positiveInt(3333),
    LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),
    PINO_PRETTY: z.enum(["0", "1"]).default("0"),
  })
  .superRefine((env, ctx) => {
    if (env.LLM_PROVIDER === "openai" && !env.OPENAI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["OPENAI_API_KEY"],
        message: "OPENAI_API_KEY is required when LLM_PROVIDER=openai",
      });
    }
  });

export class TurnConfigError extends Error {
  issues: string[];

  constructor(issues: string[]) {
    super(`Invalid turn configuration: ${issues.join("; ")}`);
    this.name = "TurnConfigError";
    this.issues = issues;
  }
}

// Unset and empty variables both mean "use the default".
function presentOnly(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (typeof value === "string" && value.trim() !== "") out[key] = value.trim();
  }
  return out;
}

export function loadTurnConfig(env: NodeJS.ProcessEnv = process.env): TurnConfig {
  const parsed = TurnEnvSchema.safeParse(presentOnly(env));
  if (!parsed.success) {
    throw new TurnConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const e = parsed.data;
  const budget: BudgetParams = {
    totalContext: e.TURN_TOTAL_CONTEXT,
    reservedOutput: e.TURN_RESERVED_OUTPUT,
    safetyBufferFraction: e.TURN_SAFETY_BUFFER,
  };

  return {
    budget,
    capacityCeiling: assertViableBudget(budget),
    timeouts: {
      identityMs: e.TURN_IDENTITY_TIMEOUT_MS,
      moodMs: e.TURN_MOOD_TIMEOUT_MS,
      memoryMs: e.TURN_MEMORY_TIMEOUT_MS,
    },
    tokenizer: e.TURN_TOKENIZER,
    moodHalfLifeMinutes: e.MOOD_HALF_LIFE_MINUTES,
    provider: {
      kind: e.LLM_PROVIDER,
      openai: { apiKey: e.OPENAI_API_KEY, model: e.OPENAI_MODEL, baseUrl: e.OPENAI_BASE_URL },
    },
    server: {
      port: e.PORT,
      logLevel: e.LOG_LEVEL,
      prettyLogs: e.PINO_PRETTY === "1",
    },
  };
}
