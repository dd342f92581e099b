import express from "express";
import { Pool } from "pg";
import { ExerciseTypeController } from "../controllers/exerciseType.controller";
import { GoalController } from "../controllers/goal.controller";
import { UserController } from "../controllers/user.controller";
import { WeightController } from "../controllers/weight.controller";
import { WorkoutController } from "../controllers/workout.controller";
import { Services } from "../services";
import createExerciseTypeRouter from "./exercise-types";
import createGoalRouter from "./goals";
import createHealthRouter from "./health";
import createUserRouter from "./users";
import createWeightRouter from "./weights";
import createWorkoutRouter from "./workouts";

export default function createRoutes(pool: Pool, services: Services) {
  const router = express.Router();

  const users = new UserController(services.users, services.dashboard);
  const weights = new WeightController(services.weights);
  const exerciseTypes = new ExerciseTypeController(services.exerciseTypes);
  const workouts = new WorkoutController(services.workouts);
  const goals = new GoalController(services.goals);

  const healthRoute = createHealthRouter(pool);
  router.use("/health", healthRoute);
  router.use("/api/health", healthRoute);

  router.use("/api/users", createUserRouter({ users, weights, workouts, goals }));
  router.use("/api/weights", createWeightRouter(weights));
  router.use("/api/exercise-types", createExerciseTypeRouter(exerciseTypes));
  router.use("/api/workouts", createWorkoutRouter(workouts));
  router.use("/api/goals", createGoalRouter(goals));

  return router;
}
