import fs from "fs";
import path from "path";
import { Pool } from "pg";
import { logger } from "../utils/logger";
import { withTransaction } from "./database";

export const SCHEMA_PATH = path.join(__dirname, "schema.sql");

/** Splits a plain SQL script into statements, dropping `--` comment lines. */
export const splitStatements = (script: string): string[] =>
  script
    .split("\n")
    .filter((line) => !line.trim().startsWith("--"))
    .join("\n")
    .split(";")
    .map((statement) => statement.trim())
    .filter((statement) => statement.length > 0);

export const readSchema = (schemaPath: string = SCHEMA_PATH): string[] =>
  splitStatements(fs.readFileSync(schemaPath, "utf8"));

/**
 * Creates every table and index that is missing. Safe to run on each start.
 */
export async function applySchema(pool: Pool, schemaPath?: string): Promise<void> {
  const statements = readSchema(schemaPath);
  logger.info(`Applying schema (${statements.length} statements)...`);

  await withTransaction(pool, async (client) => {
    for (const statement of statements) {
      await client.query(statement);
    }
  });

  logger.info("Schema is up to date");
}
