import { createPool } from "../configs/database";
import { validateConfig } from "../configs/environment";
import { applySchema } from "../db/migrator";
import { SeedLoader } from "../loaders/seedLoader";
import { createServices } from "../services";
import { logger } from "../utils/logger";

async function main() {
  validateConfig();
  const pool = createPool();
  try {
    await applySchema(pool);
    const result = await new SeedLoader(pool, createServices(pool)).seed();
    if (!result.seeded) {
      logger.info("Nothing to do: the store is not empty");
    }
  } finally {
    await pool.end();
  }
}

main().catch((error: unknown) => {
  logger.error("Seeding failed", error);
  process.exit(1);
});
