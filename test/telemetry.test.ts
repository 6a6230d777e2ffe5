import { describe, it, expect } from "vitest";

import type { TurnMetrics } from "../src/contracts/turn";
import {
  CompositeTelemetryRecorder,
  MemoryTelemetryRecorder,
  PinoTelemetryRecorder,
  makeDegradationEvent,
} from "../src/observability/telemetry";
import { FIXED_NOW, fixedClock, spyLogger } from "./support";

function metrics(turnId: string): TurnMetrics {
  return {
    turnId,
    userId: "user-1",
    sessionId: "s-1",
    totalLatencyMs: 3,
    tokensUsed: 120,
    budgetUtilizationPct: 0.12,
    capacityCeiling: 100_800,
    sectionTokens: { system: 20, "current request": 100 },
    sections: [],
    degradationEvents: [],
    errors: [],
    status: "success",
    finalState: "RESPONSE_READY",
    timestamp: FIXED_NOW.toISOString(),
  };
}

describe("makeDegradationEvent", () => {
  it("builds a frozen event", () => {
    const event = makeDegradationEvent("memory", "timeout", "timed out after 500ms", FIXED_NOW);

    expect(event).toEqual({
      subsystem: "memory",
      kind: "timeout",
      message: "timed out after 500ms",
      timestamp: "2026-03-01T12:00:00.000Z",
    });
    expect(Object.isFrozen(event)).toBe(true);
  });
});

describe("PinoTelemetryRecorder", () => {
  it("logs degradations at warn and metrics at info", () => {
    const log = spyLogger();
    const recorder = new PinoTelemetryRecorder(log, fixedClock);

    recorder.recordDegradation("identity", "fallback", "no identity snapshot for user u");
    recorder.logTurn(metrics("t1"));

    expect(log.warn).toHaveBeenCalledWith(
      {
        plane: "turn",
        subsystem: "identity",
        kind: "fallback",
        message: "no identity snapshot for user u",
        timestamp: "2026-03-01T12:00:00.000Z",
      },
      "turn.degradation"
    );
    expect(log.info).toHaveBeenCalledWith({ plane: "turn", metrics: metrics("t1") }, "turn.metrics");
  });
});

describe("MemoryTelemetryRecorder", () => {
  it("keeps only the newest turns and lists them newest first", () => {
    const recorder = new MemoryTelemetryRecorder({ maxTurns: 3 });
    for (const id of ["t1", "t2", "t3", "t4", "t5"]) {
      recorder.logTurn(metrics(id));
    }

    expect(recorder.turns.map((m) => m.turnId)).toEqual(["t3", "t4", "t5"]);
    expect(recorder.recentTurns(2).map((m) => m.turnId)).toEqual(["t5", "t4"]);
    expect(recorder.recentTurns().map((m) => m.turnId)).toEqual(["t5", "t4", "t3"]);
  });

  it("keeps only the newest degradation events", () => {
    const recorder = new MemoryTelemetryRecorder({ maxTurns: 2, clock: fixedClock });
    for (const message of ["e1", "e2", "e3", "e4"]) {
      recorder.recordDegradation("identity", "error", message);
    }

    expect(recorder.events.map((e) => e.message)).toEqual(["e3", "e4"]);
  });

  it("caps events separately when maxEvents is given", () => {
    const recorder = new MemoryTelemetryRecorder({ maxTurns: 1, maxEvents: 3, clock: fixedClock });
    for (const message of ["e1", "e2", "e3", "e4", "e5"]) {
      recorder.recordDegradation("memory", "timeout", message);
    }

    expect(recorder.events.map((e) => e.message)).toEqual(["e3", "e4", "e5"]);
  });

  it("collects degradation events", () => {
    const recorder = new MemoryTelemetryRecorder({ clock: fixedClock });
    recorder.recordDegradation("mood", "timeout", "timed out after 100ms");

    expect(recorder.events).toEqual([
      { subsystem: "mood", kind: "timeout", message: "timed out after 100ms", timestamp: "2026-03-01T12:00:00.000Z" },
    ]);
  });
});

describe("CompositeTelemetryRecorder", () => {
  it("forwards to every recorder and returns the primary's event", () => {
    const primary = new MemoryTelemetryRecorder({ clock: fixedClock });
    const secondary = new MemoryTelemetryRecorder({ clock: () => new Date(0) });
    const composite = new CompositeTelemetryRecorder(primary, secondary);

    const event = composite.recordDegradation("memory", "error", "store offline");
    composite.logTurn(metrics("t1"));

    expect(event).toBe(primary.events[0]);
    expect(secondary.events[0].timestamp).toBe("1970-01-01T00:00:00.000Z");
    expect(primary.turns).toHaveLength(1);
    expect(secondary.turns).toHaveLength(1);
  });
});
