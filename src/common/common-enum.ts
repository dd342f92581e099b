export enum GoalStatus {
  ACTIVE = "active",
  COMPLETED = "completed",
  ABANDONED = "abandoned",
}

export enum GoalType {
  WEIGHT_LOSS = "weight_loss",
  WEIGHT_GAIN = "weight_gain",
  WEIGHT_MAINTENANCE = "weight_maintenance",
  MUSCLE_GAIN = "muscle_gain",
}

export enum IntensityLevel {
  LOW = "low",
  MEDIUM = "medium",
  HIGH = "high",
}

export enum ExerciseCategory {
  CARDIO = "Cardio",
  STRENGTH = "Strength",
  FLEXIBILITY = "Flexibility",
}

export enum GoalDirection {
  DECREASE = "decrease",
  INCREASE = "increase",
  MAINTAIN = "maintain",
}

/**
 * A free-form column value sorted into a known variant, or kept verbatim
 * when it predates (or falls outside) the variants the API knows about.
 */
export type Classified<T extends string> =
  | { known: true; value: T }
  | { known: false; value: string };

export const classify = <T extends string>(
  variants: Record<string, T>,
  raw: string
): Classified<T> => {
  const normalized = raw.trim().toLowerCase();
  const match = Object.values(variants).find(
    (variant) => variant.toLowerCase() === normalized
  );
  return match === undefined ? { known: false, value: raw } : { known: true, value: match };
};

export const classifyGoalStatus = (raw: string) => classify(GoalStatus, raw);
export const classifyGoalType = (raw: string) => classify(GoalType, raw);
export const classifyIntensity = (raw: string) => classify(IntensityLevel, raw);
export const classifyCategory = (raw: string) => classify(ExerciseCategory, raw);

/** Goal types whose values are body weights in kg. */
export const WEIGHT_GOAL_TYPES: readonly GoalType[] = [
  GoalType.WEIGHT_LOSS,
  GoalType.WEIGHT_GAIN,
  GoalType.WEIGHT_MAINTENANCE,
  GoalType.MUSCLE_GAIN,
];
