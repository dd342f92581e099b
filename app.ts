import { FitnessApplication } from "./src/main";
import { createApp } from "./src/server";
import { logger } from "./src/utils/logger";

const application = new FitnessApplication();

application
  .initialize()
  .then(() => {
    const app = createApp({
      pool: application.pool,
      services: application.services,
      config: application.config,
    });
    const port = application.config.port;
    const server = app.listen(port, () => logger.info(`Fitness tracker API listening on port ${port}`));

    const shutdown = (signal: string) => {
      logger.info(`${signal} received, shutting down`);
      server.close(() => {
        application.close().then(
          () => process.exit(0),
          (error: unknown) => {
            logger.error("Failed to close database pool", error);
            process.exit(1);
          }
        );
      });
    };
    process.on("SIGINT", () => shutdown("SIGINT"));
    process.on("SIGTERM", () => shutdown("SIGTERM"));
  })
  .catch((error: unknown) => {
    logger.error("Failed to initialize application:", error);
    process.exit(1);
  });
