import { z } from "zod";

import { MoodStateSchema, type MoodState } from "../affect/mood";
import type { SectionOutcome } from "../control-plane/section_assembler";
import { IdentitySnapshotSchema } from "../identity/identity_provider";

export const TurnInput = z.object({
  userId: z.string().min(1).max(200),
  sessionId: z.string().min(1).max(200),
  message: z.string().min(1).max(200_000),
  identityOverride: IdentitySnapshotSchema.optional(),
  moodOverride: MoodStateSchema.optional(),
});

export type TurnInput = z.infer<typeof TurnInput>;

export const TURN_STATES = [
  "INIT",
  "IDENTITY_RESOLVED",
  "MOOD_RESOLVED",
  "BUDGET_READY",
  "MEMORY_RESOLVED",
  "PROMPT_ASSEMBLED",
  "RESPONSE_READY",
  "FAILED",
] as const;

export type TurnState = (typeof TURN_STATES)[number];

export type DegradationSubsystem = "identity" | "mood" | "memory";
export type DegradationKind = "timeout" | "error" | "fallback";

export type DegradationEvent = Readonly<{
  subsystem: DegradationSubsystem;
  kind: DegradationKind;
  message: string;
  timestamp: string;
}>;

export type TurnStatus = "success" | "degraded" | "failed";

export type TurnErrorTag = "llm_unreachable" | "request_over_capacity" | "internal_error";

export type TurnMetrics = Readonly<{
  turnId: string;
  userId: string;
  sessionId: string;
  totalLatencyMs: number;
  tokensUsed: number;
  budgetUtilizationPct: number;
  capacityCeiling: number;
  sectionTokens: Readonly<Record<string, number>>;
  /** Per-section assembly result, in prompt order. Empty when assembly never completed. */
  sections: readonly Readonly<SectionOutcome>[];
  degradationEvents: readonly DegradationEvent[];
  errors: readonly TurnErrorTag[];
  status: TurnStatus;
  finalState: TurnState;
  timestamp: string;
}>;

export const SERVICE_UNAVAILABLE_MESSAGE = "Service temporarily unavailable";
export const REQUEST_OVER_CAPACITY_MESSAGE = "Request exceeds prompt capacity";

export type TurnSuccess = {
  ok: true;
  response: string;
  identityVersion: string;
  moodState: MoodState;
  metrics: TurnMetrics;
};

/** No `response` on this branch: callers branch on `error`, not on exceptions. */
export type TurnFailure = {
  ok: false;
  error: string;
  metrics: TurnMetrics;
};

export type TurnResult = TurnSuccess | TurnFailure;
