import express from "express";
import { ExerciseTypeController } from "../../controllers/exerciseType.controller";
import { validateRequest } from "../../middlewares/schema-validation.middleware";
import { idParamsSchema } from "../../validators/common.validator";
import {
  createExerciseTypeSchema,
  listExerciseTypesSchema,
  updateExerciseTypeSchema,
} from "../../validators/exerciseType.validator";

export default function createExerciseTypeRouter(exerciseTypes: ExerciseTypeController) {
  const router = express.Router();

  router.post("/", validateRequest(createExerciseTypeSchema), exerciseTypes.create);
  router.get("/", validateRequest(listExerciseTypesSchema), exerciseTypes.list);
  router.get("/:id", validateRequest(idParamsSchema), exerciseTypes.get);
  router.patch("/:id", validateRequest(updateExerciseTypeSchema), exerciseTypes.update);
  router.delete("/:id", validateRequest(idParamsSchema), exerciseTypes.remove);

  return router;
}
