import { Classified, IntensityLevel } from "../../common/common-enum";

export interface WorkoutSession {
  id: number;
  userId: number;
  exerciseTypeId: number;
  exerciseName: string;
  durationMinutes: number;
  caloriesBurned: number | null;
  intensityLevel: string | null;
  intensityTag: Classified<IntensityLevel> | null;
  workoutDate: string; // YYYY-MM-DD
  notes: string | null;
  createdAt: Date;
}

export interface CalorieTotal {
  totalCalories: number;
  totalMinutes: number;
  sessionCount: number;
}

export interface DailyCalories extends CalorieTotal {
  date: string;
}

export interface WeeklyCalories extends CalorieTotal {
  weekStart: string; // Monday of the ISO week
}
