import { createPool } from "../configs/database";
import { validateConfig } from "../configs/environment";
import { applySchema } from "../db/migrator";
import { logger } from "../utils/logger";

async function main() {
  validateConfig();
  const pool = createPool();
  try {
    await applySchema(pool);
  } finally {
    await pool.end();
  }
}

main().catch((error: unknown) => {
  logger.error("Migration failed", error);
  process.exit(1);
});
