import {
  classifyGoalType,
  GoalDirection,
  GoalType,
} from "../common/common-enum";

export const GOAL_CONSTANTS = {
  // maintenance goals count as met within this many kg of the target
  MAINTENANCE_TOLERANCE_KG: 1.0,
} as const;

/**
 * Convenience default for a session's calories: duration times the exercise
 * coefficient, rounded to the nearest integer. An explicit value always wins.
 */
export function deriveCaloriesBurned(
  durationMinutes: number,
  caloriesPerMinute: number | null,
  explicitCalories?: number | null
): number | null {
  if (explicitCalories !== undefined && explicitCalories !== null) {
    return explicitCalories;
  }
  if (caloriesPerMinute === null) return null;
  return Math.round(durationMinutes * caloriesPerMinute);
}

export function resolveGoalDirection(
  goalType: string,
  baseline: number,
  target: number
): GoalDirection {
  const tag = classifyGoalType(goalType);
  if (tag.known) {
    switch (tag.value) {
      case GoalType.WEIGHT_LOSS:
        return GoalDirection.DECREASE;
      case GoalType.WEIGHT_GAIN:
      case GoalType.MUSCLE_GAIN:
        return GoalDirection.INCREASE;
      case GoalType.WEIGHT_MAINTENANCE:
        return GoalDirection.MAINTAIN;
    }
  }

  if (target < baseline) return GoalDirection.DECREASE;
  if (target > baseline) return GoalDirection.INCREASE;
  return GoalDirection.MAINTAIN;
}

export interface ProgressInput {
  goalType: string;
  baseline: number;
  currentValue: number;
  targetValue: number;
}

export interface ProgressResult {
  direction: GoalDirection;
  ratio: number;
  percent: number;
  movingTowardTarget: boolean;
  targetReached: boolean;
  remaining: number;
}

const round = (value: number, digits = 4): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

const clampPercent = (ratio: number): number =>
  round(Math.min(1, Math.max(0, ratio)) * 100, 2);

export function calculateGoalProgress({
  goalType,
  baseline,
  currentValue,
  targetValue,
}: ProgressInput): ProgressResult {
  const direction = resolveGoalDirection(goalType, baseline, targetValue);

  if (direction === GoalDirection.MAINTAIN) {
    const deviation = Math.abs(currentValue - targetValue);
    const tolerance = GOAL_CONSTANTS.MAINTENANCE_TOLERANCE_KG;
    const ratio = deviation <= tolerance ? 1 : tolerance / deviation;
    return {
      direction,
      ratio: round(ratio),
      percent: clampPercent(ratio),
      movingTowardTarget:
        Math.abs(currentValue - targetValue) <= Math.abs(baseline - targetValue),
      targetReached: deviation <= tolerance,
      remaining: round(deviation),
    };
  }

  const sign = direction === GoalDirection.DECREASE ? -1 : 1;
  // signed distance still to cover; <= 0 once the target is met or passed
  const remaining = (targetValue - currentValue) * sign;
  const targetReached = remaining <= 0;

  const span = targetValue - baseline;
  const ratio = span === 0 ? (targetReached ? 1 : 0) : (currentValue - baseline) / span;

  return {
    direction,
    ratio: round(ratio),
    percent: clampPercent(ratio),
    movingTowardTarget: (currentValue - baseline) * sign > 0,
    targetReached,
    remaining: round(Math.max(0, remaining)),
  };
}
