import express from "express";
import { GoalController } from "../../controllers/goal.controller";
import { validateRequest } from "../../middlewares/schema-validation.middleware";
import { idParamsSchema } from "../../validators/common.validator";
import { goalProgressSchema, goalStatusSchema } from "../../validators/goal.validator";

export default function createGoalRouter(goals: GoalController) {
  const router = express.Router();

  router.get("/:id", validateRequest(idParamsSchema), goals.getGoal);
  router.delete("/:id", validateRequest(idParamsSchema), goals.deleteGoal);

  /**
   * @route GET /api/goals/:id/progress
   * @desc Progress ratio from the baseline toward the target
   */
  router.get("/:id/progress", validateRequest(idParamsSchema), goals.getProgress);
  router.patch("/:id/progress", validateRequest(goalProgressSchema), goals.updateProgress);
  router.patch("/:id/status", validateRequest(goalStatusSchema), goals.updateStatus);

  return router;
}
