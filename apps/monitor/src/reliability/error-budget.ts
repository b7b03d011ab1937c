/**
 * Error budget accounting.
 *
 * Consumption accumulates for the lifetime of the budget object: each
 * evaluation that falls short of the target adds the shortfall, and nothing is
 * ever credited back. A fresh window means a fresh ErrorBudgetTracker.
 */

import { sloStatus } from "../domain/slo/index.js";
import type { SloDefinition, SloStatus } from "../domain/slo/index.js";
import type { SliEvaluator } from "./sli-evaluator.js";

export const DEFAULT_CRITICAL_THRESHOLD = 0.5;

export class ErrorBudget {
  /** Allowed shortfall in percentage points: 100 - target */
  readonly budgetTotal: number;
  private consumed = 0;

  constructor(readonly slo: SloDefinition) {
    this.budgetTotal = 100 - slo.target;
  }

  get budgetConsumed(): number {
    return this.consumed;
  }

  /**
   * Charge the shortfall of `sliValue` below the target.
   *
   * @returns percentage points consumed by this call (0 when the SLI meets the target)
   */
  consume(sliValue: number): number {
    if (sliValue < this.slo.target) {
      const delta = this.slo.target - sliValue;
      this.consumed += delta;
      return delta;
    }
    return 0;
  }

  remaining(): number {
    return Math.max(0, this.budgetTotal - this.consumed);
  }

  /** Less than `threshold` (a fraction) of the budget is left */
  isCritical(threshold: number = DEFAULT_CRITICAL_THRESHOLD): boolean {
    return this.remaining() < this.budgetTotal * threshold;
  }

  /**
   * Days of budget left at a given daily burn, in percentage points per day.
   */
  remainingDays(dailyBudget: number): number {
    if (dailyBudget <= 0) {
      return 0;
    }
    return this.remaining() / dailyBudget;
  }
}

export interface BudgetEvaluation {
  sliValue: number;
  status: SloStatus;
  budgetConsumedThisCall: number;
  budgetRemaining: number;
  isCritical: boolean;
}

/**
 * Owns one {@link ErrorBudget} per SLO and charges it from SLI evaluations.
 */
export class ErrorBudgetTracker {
  private readonly budgets = new Map<string, ErrorBudget>();

  constructor(
    private readonly evaluator: SliEvaluator,
    slos: readonly SloDefinition[],
    private readonly criticalThreshold: number = DEFAULT_CRITICAL_THRESHOLD
  ) {
    for (const slo of slos) {
      this.budgets.set(slo.name, new ErrorBudget(slo));
    }
  }

  get(sloName: string): ErrorBudget | undefined {
    return this.budgets.get(sloName);
  }

  /**
   * Compute the SLO's indicator over [startTime, endTime] and charge its budget.
   * An SLO the tracker has not seen gets a budget on first use.
   */
  evaluate(slo: SloDefinition, startTime: number, endTime: number): BudgetEvaluation {
    let budget = this.budgets.get(slo.name);
    if (!budget) {
      budget = new ErrorBudget(slo);
      this.budgets.set(slo.name, budget);
    }

    const sliValue = this.evaluator.evaluate(slo.sliName, startTime, endTime);
    const budgetConsumedThisCall = budget.consume(sliValue);

    return {
      sliValue,
      status: sloStatus(sliValue, slo.target),
      budgetConsumedThisCall,
      budgetRemaining: budget.remaining(),
      isCritical: budget.isCritical(this.criticalThreshold),
    };
  }
}
