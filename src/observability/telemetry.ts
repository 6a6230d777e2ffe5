import type {
  DegradationEvent,
  DegradationKind,
  DegradationSubsystem,
  TurnMetrics,
} from "../contracts/turn";
import type { Logger } from "./logger";

/**
 * Write-only sink for degradation events and end-of-turn metrics.
 * Nothing here is on the correctness path of a turn.
 */
export interface TelemetryRecorder {
  recordDegradation(
    subsystem: DegradationSubsystem,
    kind: DegradationKind,
    message: string
  ): DegradationEvent;
  logTurn(metrics: TurnMetrics): void;
}

export function makeDegradationEvent(
  subsystem: DegradationSubsystem,
  kind: DegradationKind,
  message: string,
  now: Date = new Date()
): DegradationEvent {
  return Object.freeze({ subsystem, kind, message, timestamp: now.toISOString() });
}

/**
 * Structured JSON lines through pino, ready for log shipping.
 */
export class PinoTelemetryRecorder implements TelemetryRecorder {
  constructor(
    private readonly log: Logger,
    private readonly clock: () => Date = () => new Date()
  ) {}

  recordDegradation(
    subsystem: DegradationSubsystem,
    kind: DegradationKind,
    message: string
  ): DegradationEvent {
    const event = makeDegradationEvent(subsystem, kind, message, this.clock());
    this.log.warn({ plane: "turn", ...event }, "turn.degradation");
    return event;
  }

  logTurn(metrics: TurnMetrics): void {
    this.log.info({ plane: "turn", metrics }, "turn.metrics");
  }
}

function keepNewest<T>(items: T[], max: number): void {
  if (items.length > max) {
    items.splice(0, items.length - max);
  }
}

/**
 * Bounded process-memory sink: the newest `maxTurns` metrics and `maxEvents` degradation
 * events. Backs the tests and the recent-turns debug route.
 */
export class MemoryTelemetryRecorder implements TelemetryRecorder {
  readonly events: DegradationEvent[] = [];
  readonly turns: TurnMetrics[] = [];
  private readonly maxTurns: number;
  private readonly maxEvents: number;
  private readonly clock: () => Date;

  constructor(opts: { maxTurns?: number; maxEvents?: number; clock?: () => Date } = {}) {
    this.maxTurns = opts.maxTurns ?? 100;
    this.maxEvents = opts.maxEvents ?? this.maxTurns;
    this.clock = opts.clock ?? (() => new Date());
  }

  recordDegradation(
    subsystem: DegradationSubsystem,
    kind: DegradationKind,
    message: string
  ): DegradationEvent {
    const event = makeDegradationEvent(subsystem, kind, message, this.clock());
    this.events.push(event);
    keepNewest(this.events, this.maxEvents);
    return event;
  }

  logTurn(metrics: TurnMetrics): void {
    this.turns.push(metrics);
    keepNewest(this.turns, this.maxTurns);
  }

  recentTurns(limit = 20): TurnMetrics[] {
    return this.turns.slice(-limit).reverse();
  }
}

/**
 * Fan out to several recorders. The first recorder's event is the one returned.
 */
export class CompositeTelemetryRecorder implements TelemetryRecorder {
  private readonly recorders: TelemetryRecorder[];

  constructor(primary: TelemetryRecorder, ...rest: TelemetryRecorder[]) {
    this.recorders = [primary, ...rest];
  }

  recordDegradation(
    subsystem: DegradationSubsystem,
    kind: DegradationKind,
    message: string
  ): DegradationEvent {
    const [primary, ...rest] = this.recorders;
    const event = primary.recordDegradation(subsystem, kind, message);
    for (const recorder of rest) {
      recorder.recordDegradation(subsystem, kind, message);
    }
    return event;
  }

  logTurn(metrics: TurnMetrics): void {
    for (const recorder of this.recorders) {
      recorder.logTurn(metrics);
    }
  }
}
