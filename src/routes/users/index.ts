import express from "express";
import { GoalController } from "../../controllers/goal.controller";
import { UserController } from "../../controllers/user.controller";
import { WeightController } from "../../controllers/weight.controller";
import { WorkoutController } from "../../controllers/workout.controller";
import { validateRequest } from "../../middlewares/schema-validation.middleware";
import { dateRangeQuerySchema, idParamsSchema } from "../../validators/common.validator";
import { listGoalsSchema, setGoalSchema } from "../../validators/goal.validator";
import {
  createUserSchema,
  deleteUserSchema,
  updateUserSchema,
} from "../../validators/user.validator";
import { recordWeightSchema } from "../../validators/weight.validator";
import { caloriesSchema, logWorkoutSchema } from "../../validators/workout.validator";

interface UserRouteControllers {
  users: UserController;
  weights: WeightController;
  workouts: WorkoutController;
  goals: GoalController;
}

/** Users, plus every collection that hangs off a user. */
export default function createUserRouter({ users, weights, workouts, goals }: UserRouteControllers) {
  const router = express.Router();

  router.post("/", validateRequest(createUserSchema), users.createUser);
  router.get("/", users.listUsers);
  router.get("/:id", validateRequest(idParamsSchema), users.getUser);
  router.patch("/:id", validateRequest(updateUserSchema), users.updateUser);
  router.delete("/:id", validateRequest(deleteUserSchema), users.deleteUser);

  /**
   * @route GET /api/users/:id/summary
   * @desc Dashboard overview: weights, workout totals, active goals
   */
  router.get("/:id/summary", validateRequest(idParamsSchema), users.getSummary);

  router.post("/:id/weights", validateRequest(recordWeightSchema), weights.recordWeight);
  router.get("/:id/weights", validateRequest(dateRangeQuerySchema), weights.getSeries);
  router.get("/:id/weights/latest", validateRequest(idParamsSchema), weights.getLatestForUser);

  router.post("/:id/workouts", validateRequest(logWorkoutSchema), workouts.logWorkout);
  router.get("/:id/workouts", validateRequest(dateRangeQuerySchema), workouts.listSessions);
  router.get("/:id/calories", validateRequest(caloriesSchema), workouts.getCalories);

  router.post("/:id/goals", validateRequest(setGoalSchema), goals.setGoal);
  router.get("/:id/goals", validateRequest(listGoalsSchema), goals.listGoals);

  return router;
}
