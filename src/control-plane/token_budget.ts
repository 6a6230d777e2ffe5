import type { Logger } from "../observability/logger";

/**
 * Token budget for a single turn.
 *
 * The capacity ceiling is what is left of the model context once the safety buffer and the
 * reserved output window are taken off. Allocations are first-come: a request either commits
 * in full or is refused with the counters untouched.
 *
 * One allocator belongs to one turn. It is never pooled or shared, so the counters need no lock.
 */

export const MIN_VIABLE_CAPACITY = 1000;

export type BudgetParams = {
  totalContext: number;
  reservedOutput: number;
  safetyBufferFraction: number;
};

export const DEFAULT_BUDGET_PARAMS: Readonly<BudgetParams> = Object.freeze({
  totalContext: 128_000,
  reservedOutput: 8_000,
  safetyBufferFraction: 0.85,
});

export type BudgetReport = {
  capacityCeiling: number;
  used: number;
  remaining: number;
  utilizationPct: number;
  allocations: Record<string, number>;
};

/**
 * Read-only view handed to collaborators (memory retrieval) so they can size what they return.
 * Only the assembler commits tokens.
 */
export interface BudgetView {
  readonly capacityCeiling: number;
  readonly used: number;
  remaining(): number;
}

export class BudgetConstructionError extends Error {
  capacityCeiling: number;
  minimum: number;

  constructor(capacityCeiling: number, minimum = MIN_VIABLE_CAPACITY) {
    super(`Context window too small for reasonable operation: ceiling ${capacityCeiling} < ${minimum}`);
    this.name = "BudgetConstructionError";
    this.capacityCeiling = capacityCeiling;
    this.minimum = minimum;
  }
}

export function computeCapacityCeiling(params: BudgetParams): number {
  return Math.floor(params.totalContext * params.safetyBufferFraction) - params.reservedOutput;
}

/**
 * Throws BudgetConstructionError when no usable turn could run under these parameters.
 * Called once at startup so per-turn construction cannot fail.
 */
export function assertViableBudget(params: BudgetParams): number {
  const ceiling = computeCapacityCeiling(params);
  if (!Number.isFinite(ceiling) || ceiling < MIN_VIABLE_CAPACITY) {
    throw new BudgetConstructionError(ceiling);
  }
  return ceiling;
}

export class BudgetAllocator implements BudgetView {
  readonly capacityCeiling: number;
  private usedTokens = 0;
  private readonly allocations = new Map<string, number>();
  private readonly log?: Logger;

  constructor(params: Partial<BudgetParams> = {}, opts: { logger?: Logger } = {}) {
    this.capacityCeiling = assertViableBudget({ ...DEFAULT_BUDGET_PARAMS, ...params });
    this.log = opts.logger;
  }

  get used(): number {
    return this.usedTokens;
  }

  allocate(component: string, tokenCount: number): boolean {
    if (!Number.isInteger(tokenCount) || tokenCount < 0) {
      throw new RangeError(`tokenCount must be a non-negative integer, got ${tokenCount}`);
    }

    if (this.usedTokens + tokenCount > this.capacityCeiling) {
      this.log?.warn(
        {
          component,
          requested: tokenCount,
          used: this.usedTokens,
          capacityCeiling: this.capacityCeiling,
        },
        "budget.refused"
      );
      return false;
    }

    this.usedTokens += tokenCount;
    this.allocations.set(component, (this.allocations.get(component) ?? 0) + tokenCount);
    return true;
  }

  remaining(): number {
    return this.capacityCeiling - this.usedTokens;
  }

  allocatedTo(component: string): number {
    return this.allocations.get(component) ?? 0;
  }

  report(): BudgetReport {
    return {
      capacityCeiling: this.capacityCeiling,
      used: this.usedTokens,
      remaining: this.remaining(),
      utilizationPct: (this.usedTokens / this.capacityCeiling) * 100,
      allocations: Object.fromEntries(this.allocations),
    };
  }
}
