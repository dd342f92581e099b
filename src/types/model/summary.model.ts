import { User } from "./user.model";
import { WeightRecord } from "./weightRecord.model";

export interface CategoryBreakdown {
  category: string;
  sessionCount: number;
  totalMinutes: number;
  totalCalories: number;
}

export interface UserSummary {
  user: User;
  latestWeight: WeightRecord | null;
  startingWeight: WeightRecord | null;
  weightChangeKg: number | null;
  totalWorkouts: number;
  totalMinutes: number;
  totalCalories: number;
  workoutsByCategory: CategoryBreakdown[];
  activeGoals: number;
}
