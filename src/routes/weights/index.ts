import express from "express";
import { WeightController } from "../../controllers/weight.controller";
import { validateRequest } from "../../middlewares/schema-validation.middleware";
import { idParamsSchema } from "../../validators/common.validator";
import { updateWeightSchema } from "../../validators/weight.validator";

export default function createWeightRouter(weights: WeightController) {
  const router = express.Router();

  /**
   * @route GET /api/weights/latest
   * @desc Most recent weight of every user
   */
  router.get("/latest", weights.getLatestForAll);
  router.get("/:id", validateRequest(idParamsSchema), weights.getRecord);
  router.patch("/:id", validateRequest(updateWeightSchema), weights.updateRecord);
  router.delete("/:id", validateRequest(idParamsSchema), weights.deleteRecord);

  return router;
}
