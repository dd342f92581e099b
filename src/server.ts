import express from "express";
import helmet from "helmet";
import cors from "cors";
import compression from "compression";
import { Pool } from "pg";
import { AppConfig, loadConfig } from "./configs/environment";
import { errorMiddleware, notFoundMiddleware } from "./middlewares/error.middleware";
import { requestLogger } from "./middlewares/logger.middleware";
import { createRateLimiter, validateContentType } from "./middlewares/validation.middleware";
import createRoutes from "./routes";
import { createServices, Services } from "./services";

export interface AppDependencies {
  pool: Pool;
  services?: Services;
  config?: AppConfig;
}

export function createApp({ pool, services = createServices(pool), config = loadConfig() }: AppDependencies) {
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: config.api.cors.origin }));
  app.use(compression());
  app.use(express.json({ limit: "1mb" }));
  app.use(createRateLimiter(config.api.rateLimit));
  app.use(validateContentType);
  app.use(requestLogger);

  app.use("/", createRoutes(pool, services));

  app.use(notFoundMiddleware);
  // Error middleware should be last
  app.use(errorMiddleware);

  return app;
}
