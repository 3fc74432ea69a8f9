/**
 * Priority Engine
 *
 * Pure scoring of entries. The score is the manual override plus, when
 * time saved, gross profit and effort are all present and non-zero,
 * `(timeSaved / 100 + grossProfit / 1000) * effortFactor`, truncated
 * toward zero. Lower effort multiplies more, so cheap high-value ideas
 * rank first.
 *
 * Callers merge stored and incoming values before scoring; nothing here
 * reads persisted state.
 */
import type { PriorityInputs } from '@brainswarming/types';
import { isEffort } from '@brainswarming/types';
import { PRIORITY } from '../constants.ts';
import { ValidationError } from '../utils/errors.ts';

/** Raised for an effort value outside low/medium/high */
export class PriorityValidationError extends ValidationError {
  constructor(effort: string) {
    super(
      `Invalid effort "${effort}": expected one of low, medium, high`,
      'INVALID_PRIORITY_INPUT',
    );
  }
}

/** Keys whose presence in an update forces a recomputation */
const PRIORITY_FIELDS = [
  'manualOverridePrio',
  'timeSavedPerYear',
  'grossProfitPerYear',
  'effort',
] as const satisfies ReadonlyArray<keyof PriorityInputs>;

/**
 * Compute the final priority of an entry.
 *
 * A zero time-saved or zero profit counts as absent and disables the
 * computed term: `computePriority(0, 0, 5000, 'low') === 0`.
 *
 * @throws {PriorityValidationError} when effort is set but not a known level
 */
export function computePriority(
  manualOverride: number | null | undefined,
  timeSavedPerYear: number | null | undefined,
  grossProfitPerYear: number | null | undefined,
  effort: string | null | undefined,
): number {
  if (effort != null && !isEffort(effort)) {
    throw new PriorityValidationError(effort);
  }

  let priority = manualOverride ?? 0;

  if (timeSavedPerYear && grossProfitPerYear && effort) {
    const timeFactor = timeSavedPerYear / PRIORITY.TIME_SAVED_DIVISOR;
    const profitFactor = grossProfitPerYear / PRIORITY.GROSS_PROFIT_DIVISOR;
    const effortFactor = PRIORITY.EFFORT_FACTORS[effort];

    priority += (timeFactor + profitFactor) * effortFactor;
  }

  return Math.trunc(priority);
}

/** Object-form wrapper around computePriority */
export function priorityFromInputs(inputs: PriorityInputs): number {
  return computePriority(
    inputs.manualOverridePrio,
    inputs.timeSavedPerYear,
    inputs.grossProfitPerYear,
    inputs.effort,
  );
}

/**
 * Materialize the full scoring record for an update. A key the patch
 * leaves undefined keeps the stored value; an explicit null clears it,
 * exactly as the row will be written.
 */
export function mergePriorityInputs(
  existing: PriorityInputs,
  patch: Partial<PriorityInputs>,
): PriorityInputs {
  return {
    manualOverridePrio: patch.manualOverridePrio ?? existing.manualOverridePrio,
    timeSavedPerYear:
      patch.timeSavedPerYear !== undefined
        ? patch.timeSavedPerYear
        : existing.timeSavedPerYear,
    grossProfitPerYear:
      patch.grossProfitPerYear !== undefined
        ? patch.grossProfitPerYear
        : existing.grossProfitPerYear,
    effort: patch.effort !== undefined ? patch.effort : existing.effort,
  };
}

/** Whether an update payload carries any field the score depends on */
export function touchesPriority(patch: Partial<PriorityInputs>): boolean {
  return PRIORITY_FIELDS.some((field) => patch[field] !== undefined);
}
