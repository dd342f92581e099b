import { Pool } from "pg";
import { AppConfig, loadConfig, validateConfig } from "./configs/environment";
import { createPool } from "./configs/database";
import { withClient } from "./db/database";
import { applySchema } from "./db/migrator";
import { SeedLoader } from "./loaders/seedLoader";
import { createServices, Services } from "./services";
import { logger } from "./utils/logger";

class FitnessApplication {
  public readonly config: AppConfig;
  public readonly pool: Pool;
  public readonly services: Services;

  constructor(pool?: Pool) {
    this.config = loadConfig();
    this.pool = pool ?? createPool();
    this.services = createServices(this.pool);
  }

  async initialize(): Promise<void> {
    logger.info("Starting fitness tracker ...");
    validateConfig();

    await withClient(this.pool, (client) => client.query("SELECT 1"));
    logger.info("Database connection established");

    if (this.config.startup.autoMigrate) {
      await applySchema(this.pool);
    }

    if (this.config.startup.seedOnStart) {
      await new SeedLoader(this.pool, this.services).seed();
    }

    logger.info("Fitness tracker ready!");
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

export { FitnessApplication };
