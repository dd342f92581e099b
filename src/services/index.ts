import { Pool } from "pg";
import { DashboardService } from "./dashboard.service";
import { ExerciseTypeService } from "./exerciseType.service";
import { GoalService } from "./goal.service";
import { UserService } from "./user.service";
import { WeightRecordService } from "./weightRecord.service";
import { WorkoutSessionService } from "./workoutSession.service";

export interface Services {
  users: UserService;
  weights: WeightRecordService;
  exerciseTypes: ExerciseTypeService;
  workouts: WorkoutSessionService;
  goals: GoalService;
  dashboard: DashboardService;
}

export function createServices(pool: Pool): Services {
  const users = new UserService(pool);
  const weights = new WeightRecordService(pool);
  return {
    users,
    weights,
    exerciseTypes: new ExerciseTypeService(pool),
    workouts: new WorkoutSessionService(pool),
    goals: new GoalService(pool, weights),
    dashboard: new DashboardService(pool, users, weights),
  };
}
