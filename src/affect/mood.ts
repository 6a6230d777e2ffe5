import { z } from "zod";

import { deepFreeze } from "../contracts/immutable";

/**
 * Affective state (point-in-time).
 *
 * valence: -1 (negative) .. 1 (positive)
 * arousal:  0 (calm)     .. 1 (activated)
 */
export const MoodStateSchema = z
  .object({
    valence: z.number().min(-1).max(1),
    arousal: z.number().min(0).max(1),
    label: z.string().min(1).max(64),
    updatedAt: z.string().datetime(),
  })
  .strict()
  .readonly();

export type MoodState = z.infer<typeof MoodStateSchema>;

export const BASELINE_MOOD: MoodState = deepFreeze({
  valence: 0,
  arousal: 0.3,
  label: "neutral",
  updatedAt: "1970-01-01T00:00:00.000Z",
});

export const DEFAULT_MOOD_HALF_LIFE_MINUTES = 30;

// Below this distance from baseline on both axes the state reads as baseline again.
const SETTLED_EPSILON = 0.05;

export interface MoodProvider {
  resolve(userId: string, opts: { signal: AbortSignal }): Promise<MoodState>;
  /** Pure: no I/O, same inputs give the same state. */
  decay(state: MoodState, now: Date): MoodState;
  render(state: MoodState): string;
}

const round = (value: number): number => Math.round(value * 1000) / 1000;

/**
 * Exponential decay toward BASELINE_MOOD with the given half-life.
 * A state stamped in the future is treated as fresh (no decay).
 */
export function decayMood(
  state: MoodState,
  now: Date,
  halfLifeMinutes = DEFAULT_MOOD_HALF_LIFE_MINUTES
): MoodState {
  const elapsedMinutes = Math.max(0, (now.getTime() - Date.parse(state.updatedAt)) / 60_000);
  const factor = Math.pow(0.5, elapsedMinutes / halfLifeMinutes);

  const valence = round(BASELINE_MOOD.valence + (state.valence - BASELINE_MOOD.valence) * factor);
  const arousal = round(BASELINE_MOOD.arousal + (state.arousal - BASELINE_MOOD.arousal) * factor);

  const settled =
    Math.abs(valence - BASELINE_MOOD.valence) < SETTLED_EPSILON
    && Math.abs(arousal - BASELINE_MOOD.arousal) < SETTLED_EPSILON;

  return {
    valence,
    arousal,
    label: settled ? BASELINE_MOOD.label : state.label,
    updatedAt: now.toISOString(),
  };
}

function describeValence(valence: number): string {
  if (valence > 0.25) return "positive";
  if (valence < -0.25) return "negative";
  return "neutral";
}

function describeArousal(arousal: number): string {
  if (arousal > 0.6) return "high";
  if (arousal < 0.3) return "low";
  return "moderate";
}

function toneGuidance(valence: number, arousal: number): string {
  const v = describeValence(valence);
  const a = describeArousal(arousal);

  if (v === "negative" && a === "high") return "Stay calm and steady; keep replies short and grounding.";
  if (v === "negative") return "Be gentle and patient; acknowledge difficulty without dwelling on it.";
  if (v === "positive" && a === "high") return "Match the energy while staying precise.";
  if (v === "positive") return "Warm and relaxed tone is appropriate.";
  return "Neutral, even tone.";
}

export function renderMoodInjection(state: MoodState): string {
  const lines: string[] = [];

  lines.push(`Current affect: ${state.label}`);
  lines.push(`Valence: ${state.valence.toFixed(2)} (${describeValence(state.valence)})`);
  lines.push(`Arousal: ${state.arousal.toFixed(2)} (${describeArousal(state.arousal)})`);
  lines.push(`Guidance: ${toneGuidance(state.valence, state.arousal)}`);

  return lines.join("\n");
}

/**
 * Process-memory mood registry. Users with no recorded state resolve to the baseline.
 */
export class MemoryMoodProvider implements MoodProvider {
  private readonly states = new Map<string, MoodState>();
  private readonly halfLifeMinutes: number;

  constructor(opts: { halfLifeMinutes?: number } = {}) {
    this.halfLifeMinutes = opts.halfLifeMinutes ?? DEFAULT_MOOD_HALF_LIFE_MINUTES;
  }

  record(userId: string, state: unknown): MoodState {
    const parsed = deepFreeze(MoodStateSchema.parse(state));
    this.states.set(userId, parsed);
    return parsed;
  }

  async resolve(userId: string, opts: { signal: AbortSignal }): Promise<MoodState> {
    opts.signal.throwIfAborted();
    return this.states.get(userId) ?? BASELINE_MOOD;
  }

  decay(state: MoodState, now: Date): MoodState {
    return decayMood(state, now, this.halfLifeMinutes);
  }

  render(state: MoodState): string {
    return renderMoodInjection(state);
  }
}
