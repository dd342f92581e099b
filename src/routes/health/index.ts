import express from "express";
import { Pool } from "pg";
import { withClient } from "../../db/database";
import { isAppError } from "../../utils/errors";
import { logger } from "../../utils/logger";

export default function createHealthRouter(pool: Pool) {
  const healthRouter = express.Router();

  healthRouter.get("/", (_req, res) => {
    res.json({
      success: true,
      message: "Fitness tracker API is healthy",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: process.env.NODE_ENV || "development",
    });
  });

  /**
   * @route GET /health/status
   * @desc Liveness plus a round trip to the database
   */
  healthRouter.get("/status", async (_req, res) => {
    let database: "up" | "down" = "up";
    try {
      await withClient(pool, (client) => client.query("SELECT 1"));
    } catch (error) {
      database = "down";
      logger.warn(
        `Database health check failed: ${isAppError(error) ? error.message : String(error)}`
      );
    }

    res.status(database === "up" ? 200 : 503).json({
      success: database === "up",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      services: { database },
    });
  });

  return healthRouter;
}
