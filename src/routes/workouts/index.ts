import express from "express";
import { WorkoutController } from "../../controllers/workout.controller";
import { validateRequest } from "../../middlewares/schema-validation.middleware";
import { idParamsSchema } from "../../validators/common.validator";
import { updateWorkoutSchema } from "../../validators/workout.validator";

export default function createWorkoutRouter(workouts: WorkoutController) {
  const router = express.Router();

  router.get("/:id", validateRequest(idParamsSchema), workouts.getSession);
  router.patch("/:id", validateRequest(updateWorkoutSchema), workouts.updateSession);
  router.delete("/:id", validateRequest(idParamsSchema), workouts.deleteSession);

  return router;
}
