import { randomUUID } from "node:crypto";

import { BASELINE_MOOD, MoodStateSchema, renderMoodInjection, type MoodProvider, type MoodState } from "../affect/mood";
import {
  REQUEST_OVER_CAPACITY_MESSAGE,
  SERVICE_UNAVAILABLE_MESSAGE,
  type DegradationEvent,
  type DegradationKind,
  type DegradationSubsystem,
  type TurnErrorTag,
  type TurnMetrics,
  type TurnResult,
  type TurnState,
} from "../contracts/turn";
import {
  IdentitySnapshotSchema,
  MINIMAL_SKELETON_IDENTITY,
  renderIdentitySnapshot,
  type IdentityProvider,
  type IdentitySnapshot,
} from "../identity/identity_provider";
import type { MemoryService } from "../memory/memory_service";
import { computeQueryEmbedding } from "../memory/query_embedding";
import { errorMessage, silentLogger, type Logger } from "../observability/logger";
import { makeDegradationEvent, type TelemetryRecorder } from "../observability/telemetry";
import { GenerationProviderError, type GenerationBackend } from "../providers/generation_backend";
import { resolveWithin, type BoundedOutcome } from "./bounded_call";
import {
  assembleSections,
  RequestOverCapacityError,
  type Section,
  type SectionOutcome,
} from "./section_assembler";
import {
  assertViableBudget,
  BudgetAllocator,
  DEFAULT_BUDGET_PARAMS,
  type BudgetParams,
} from "./token_budget";
import type { TokenCounter } from "./token_counter";
import { DEFAULT_TURN_TIMEOUTS, type TurnTimeouts } from "./turn_config";

/**
 * Turn orchestrator.
 *
 * INIT -> IDENTITY_RESOLVED -> MOOD_RESOLVED -> BUDGET_READY -> MEMORY_RESOLVED
 *      -> PROMPT_ASSEMBLED -> RESPONSE_READY
 *
 * FAILED is reached from generation (backend failure), or from assembly when the user's
 * request alone does not fit the capacity ceiling. Identity, mood and memory failures are
 * soft: a fallback is substituted, a DegradationEvent is recorded, and the turn moves on.
 * Nothing thrown inside a turn escapes processTurn.
 */

export const SYSTEM_INSTRUCTION = "Act as the kernel defined in IDENTITY SNAPSHOT.";
export const MEMORY_FALLBACK_TEXT = "[No prior relevant context]";

export type TurnRequest = {
  userId: string;
  sessionId: string;
  userText: string;
  identityOverride?: IdentitySnapshot;
  moodOverride?: MoodState;
};

export type TurnTransition = { turnId: string; from: TurnState; to: TurnState };

export type TurnOrchestratorDeps = {
  identityProvider: IdentityProvider;
  moodProvider: MoodProvider;
  memoryService: MemoryService;
  generationBackend: GenerationBackend;
  telemetry: TelemetryRecorder;
  countTokens: TokenCounter;
  budget?: BudgetParams;
  timeouts?: Partial<TurnTimeouts>;
  logger?: Logger;
  clock?: () => Date;
  onTransition?: (transition: TurnTransition) => void;
};

/** A collaborator answered in time, but with a value the turn cannot use. */
export class InvalidCollaboratorValueError extends Error {
  subsystem: DegradationSubsystem;

  constructor(subsystem: DegradationSubsystem, detail: string) {
    super(`invalid ${subsystem} value: ${detail}`);
    this.name = "InvalidCollaboratorValueError";
    this.subsystem = subsystem;
  }
}

function degradationKind(outcome: Extract<BoundedOutcome<unknown>, { status: "fallback" }>): DegradationKind {
  if (outcome.cause instanceof InvalidCollaboratorValueError) return "fallback";
  return outcome.reason;
}

const roundPct = (value: number): number => Math.round(value * 100) / 100;

/**
 * Per-turn mutable state. Owned by exactly one processTurn call.
 */
class TurnRun {
  state: TurnState = "INIT";
  budget: BudgetAllocator | null = null;
  readonly degradations: DegradationEvent[] = [];
  readonly errors: TurnErrorTag[] = [];
  readonly sections: SectionOutcome[] = [];
  emitted = false;
  private metrics: TurnMetrics | null = null;
  private readonly startNs = process.hrtime.bigint();

  constructor(
    readonly turnId: string,
    readonly req: TurnRequest,
    private readonly clock: () => Date
  ) {}

  finalize(): TurnMetrics {
    if (this.metrics) return this.metrics;

    const report = this.budget?.report();
    // A section the budget refused is a soft degradation like a subsystem fallback.
    const trimmed = this.sections.some((outcome) => outcome.disposition !== "included");
    const status = this.state === "FAILED"
      ? "failed"
      : this.degradations.length > 0 || trimmed
        ? "degraded"
        : "success";

    this.metrics = Object.freeze({
      turnId: this.turnId,
      userId: this.req.userId,
      sessionId: this.req.sessionId,
      totalLatencyMs: Number(process.hrtime.bigint() - this.startNs) / 1e6,
      tokensUsed: report?.used ?? 0,
      budgetUtilizationPct: roundPct(report?.utilizationPct ?? 0),
      capacityCeiling: report?.capacityCeiling ?? 0,
      sectionTokens: Object.freeze(report?.allocations ?? {}),
      sections: Object.freeze(this.sections.map((outcome) => Object.freeze({ ...outcome }))),
      degradationEvents: Object.freeze([...this.degradations]),
      errors: Object.freeze([...this.errors]),
      status,
      finalState: this.state,
      timestamp: this.clock().toISOString(),
    });
    return this.metrics;
  }
}

export class TurnOrchestrator {
  private readonly budgetParams: BudgetParams;
  private readonly timeouts: TurnTimeouts;
  private readonly log: Logger;
  private readonly clock: () => Date;

  constructor(private readonly deps: TurnOrchestratorDeps) {
    this.budgetParams = { ...DEFAULT_BUDGET_PARAMS, ...deps.budget };
    // Fails here, at wiring time, rather than inside a turn.
    assertViableBudget(this.budgetParams);
    this.timeouts = { ...DEFAULT_TURN_TIMEOUTS, ...deps.timeouts };
    this.log = deps.logger ?? silentLogger();
    this.clock = deps.clock ?? (() => new Date());
  }

  async processTurn(req: TurnRequest): Promise<TurnResult> {
    const run = new TurnRun(randomUUID(), req, this.clock);

    try {
      return await this.runTurn(run);
    } catch (err) {
      this.log.error(
        { turnId: run.turnId, state: run.state, error: errorMessage(err) },
        "turn.internal_error"
      );
      run.errors.push("internal_error");
      run.state = "FAILED";
      return this.fail(run, SERVICE_UNAVAILABLE_MESSAGE);
    }
  }

  private async runTurn(run: TurnRun): Promise<TurnResult> {
    const { req } = run;
    const { identityProvider, moodProvider, memoryService, generationBackend } = this.deps;

    const identity = req.identityOverride ?? this.settle(
      run,
      "identity",
      await resolveWithin(
        async (signal) => {
          const snapshot = await identityProvider.resolve(req.userId, { signal });
          const parsed = IdentitySnapshotSchema.safeParse(snapshot);
          if (!parsed.success) {
            throw new InvalidCollaboratorValueError("identity", parsed.error.issues[0]?.message ?? "schema");
          }
          return parsed.data;
        },
        { timeoutMs: this.timeouts.identityMs, fallback: MINIMAL_SKELETON_IDENTITY }
      )
    );
    this.advance(run, "IDENTITY_RESOLVED");

    // Decay runs inside the bounded call; the baseline fallback is used undecayed.
    const mood = this.settle(
      run,
      "mood",
      await resolveWithin(
        async (signal) => {
          const raw = req.moodOverride ?? (await moodProvider.resolve(req.userId, { signal }));
          const parsed = MoodStateSchema.safeParse(moodProvider.decay(raw, this.clock()));
          if (!parsed.success) {
            throw new InvalidCollaboratorValueError("mood", parsed.error.issues[0]?.message ?? "schema");
          }
          return parsed.data;
        },
        { timeoutMs: this.timeouts.moodMs, fallback: BASELINE_MOOD }
      )
    );
    this.advance(run, "MOOD_RESOLVED");

    const budget = new BudgetAllocator(this.budgetParams, { logger: this.log });
    run.budget = budget;
    this.advance(run, "BUDGET_READY");

    const memoryText = this.settle(
      run,
      "memory",
      await resolveWithin(
        (signal) =>
          memoryService.retrieve({
            userId: req.userId,
            sessionId: req.sessionId,
            requestText: req.userText,
            queryEmbedding: computeQueryEmbedding(req.userText),
            budget,
            expertiseDomains: identity.kernel.expertiseDomains,
            signal,
          }),
        { timeoutMs: this.timeouts.memoryMs, fallback: MEMORY_FALLBACK_TEXT }
      )
    );
    this.advance(run, "MEMORY_RESOLVED");

    const sections: Section[] = [
      { header: "SYSTEM", content: SYSTEM_INSTRUCTION },
      { header: "IDENTITY SNAPSHOT", content: renderIdentitySnapshot(identity) },
      { header: "MOOD STATE", content: this.renderMood(run, mood) },
      { header: "RELEVANT MEMORY", content: memoryText },
      { header: "CURRENT REQUEST", content: req.userText },
    ];

    let promptText: string;
    try {
      const assembled = assembleSections(sections, budget, {
        countTokens: this.deps.countTokens,
        logger: this.log,
      });
      run.sections.push(...assembled.outcomes);
      promptText = assembled.text;
    } catch (err) {
      if (!(err instanceof RequestOverCapacityError)) throw err;

      this.log.error(
        { turnId: run.turnId, requestedTokens: err.requestedTokens, remaining: err.remaining },
        "turn.request_over_capacity"
      );
      run.errors.push("request_over_capacity");
      this.advance(run, "FAILED");
      return this.fail(run, REQUEST_OVER_CAPACITY_MESSAGE);
    }
    this.advance(run, "PROMPT_ASSEMBLED");

    let response: string;
    try {
      response = await generationBackend.generate({ promptText, turnId: run.turnId });
    } catch (err) {
      const upstream = err instanceof GenerationProviderError
        ? { statusCode: err.statusCode, errorType: err.errorType }
        : {};
      this.log.fatal(
        { turnId: run.turnId, provider: generationBackend.name, ...upstream, error: errorMessage(err) },
        "provider.failed"
      );
      run.errors.push("llm_unreachable");
      this.advance(run, "FAILED");
      return this.fail(run, SERVICE_UNAVAILABLE_MESSAGE);
    }
    this.advance(run, "RESPONSE_READY");

    return {
      ok: true,
      response,
      identityVersion: identity.version,
      moodState: mood,
      metrics: this.emit(run),
    };
  }

  private settle<T>(run: TurnRun, subsystem: DegradationSubsystem, outcome: BoundedOutcome<T>): T {
    if (outcome.status === "fallback") {
      this.degrade(run, subsystem, degradationKind(outcome), outcome.message);
    }
    return outcome.value;
  }

  private renderMood(run: TurnRun, mood: MoodState): string {
    try {
      return this.deps.moodProvider.render(mood);
    } catch (err) {
      this.degrade(run, "mood", "error", `render failed: ${errorMessage(err)}`);
      return renderMoodInjection(BASELINE_MOOD);
    }
  }

  private degrade(
    run: TurnRun,
    subsystem: DegradationSubsystem,
    kind: DegradationKind,
    message: string
  ): void {
    let event: DegradationEvent;
    try {
      event = this.deps.telemetry.recordDegradation(subsystem, kind, message);
    } catch (err) {
      this.log.error({ turnId: run.turnId, error: errorMessage(err) }, "telemetry.record_failed");
      event = makeDegradationEvent(subsystem, kind, message, this.clock());
    }
    run.degradations.push(event);
  }

  private advance(run: TurnRun, to: TurnState): void {
    const from = run.state;
    run.state = to;
    this.log.debug({ turnId: run.turnId, from, to }, "turn.transition");
    this.deps.onTransition?.({ turnId: run.turnId, from, to });
  }

  private fail(run: TurnRun, error: string): TurnResult {
    return { ok: false, error, metrics: this.emit(run) };
  }

  // Emitted exactly once per turn.
  private emit(run: TurnRun): TurnMetrics {
    const metrics = run.finalize();
    if (run.emitted) return metrics;
    run.emitted = true;
    try {
      this.deps.telemetry.logTurn(metrics);
    } catch (err) {
      this.log.error({ turnId: run.turnId, error: errorMessage(err) }, "telemetry.log_failed");
    }
    return metrics;
  }
}
