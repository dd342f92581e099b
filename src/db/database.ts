import { PoolClient, QueryResultRow } from "pg";
import {
  AppError,
  ConflictError,
  NotFoundError,
  StorageUnavailableError,
  ValidationError,
} from "../utils/errors";
import { logger } from "../utils/logger";

/** Anything that can run a query: the pool itself or a checked-out client. */
export type Queryable = Pick<PoolClient, "query">;

const CONNECTION_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "ETIMEDOUT",
  "EHOSTUNREACH",
  "57P01",
  "57P02",
  "57P03",
]);

const readCode = (error: unknown): string | undefined => {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
};

const readField = (error: unknown, field: "constraint" | "detail"): string => {
  if (typeof error === "object" && error !== null && field in error) {
    const value: unknown = Reflect.get(error, field);
    return typeof value === "string" ? value : "";
  }
  return "";
};

const isConnectionFailure = (error: unknown): boolean => {
  const code = readCode(error);
  if (code && (CONNECTION_ERROR_CODES.has(code) || code.startsWith("08"))) {
    return true;
  }
  const message = error instanceof Error ? error.message : "";
  return /timeout exceeded when trying to connect|Connection terminated/i.test(
    message
  );
};

/**
 * Maps a driver error onto the application error kinds. Errors that are
 * already AppErrors, and anything unrecognised, pass through unchanged.
 */
export const translateDatabaseError = (error: unknown): unknown => {
  if (error instanceof AppError) return error;

  if (isConnectionFailure(error)) {
    return new StorageUnavailableError();
  }

  const code = readCode(error);
  switch (code) {
    case "23505":
      return new ConflictError(
        readField(error, "detail") ||
          `Duplicate value violates ${readField(error, "constraint") || "a unique constraint"}`
      );
    case "23503":
      return new NotFoundError(
        readField(error, "detail") || "Referenced record"
      );
    case "23502":
    case "23514":
      return new ValidationError(
        error instanceof Error ? error.message : "Invalid value"
      );
  }
  if (code?.startsWith("22")) {
    return new ValidationError(
      error instanceof Error ? error.message : "Invalid value"
    );
  }
  return error;
};

/** The slice of a checked-out client the helpers below rely on. */
export interface ReleasableClient {
  query(text: string): Promise<unknown>;
  release(): void;
}

/** A pool, or anything else that hands out clients. */
export interface ConnectionSource<C extends ReleasableClient> {
  connect(): Promise<C>;
}

const connect = async <C extends ReleasableClient>(
  pool: ConnectionSource<C>
): Promise<C> => {
  try {
    return await pool.connect();
  } catch (error) {
    logger.error("Failed to acquire database connection", error);
    throw translateDatabaseError(error);
  }
};

/** Runs `work` on one pooled client without a transaction. */
export const withClient = async <T, C extends ReleasableClient = PoolClient>(
  pool: ConnectionSource<C>,
  work: (client: C) => Promise<T>
): Promise<T> => {
  const client = await connect(pool);
  try {
    return await work(client);
  } catch (error) {
    throw translateDatabaseError(error);
  } finally {
    client.release();
  }
};

/** Runs `work` inside BEGIN/COMMIT; any failure rolls the whole unit back. */
export const withTransaction = async <T, C extends ReleasableClient = PoolClient>(
  pool: ConnectionSource<C>,
  work: (client: C) => Promise<T>
): Promise<T> => {
  const client = await connect(pool);
  try {
    await client.query("BEGIN");
    const result = await work(client);
    await client.query("COMMIT");
    return result;
  } catch (error) {
    try {
      await client.query("ROLLBACK");
    } catch (rollbackError) {
      logger.error("Rollback failed", rollbackError);
    }
    throw translateDatabaseError(error);
  } finally {
    client.release();
  }
};

export const queryRows = async <R extends QueryResultRow>(
  db: Queryable,
  text: string,
  params: unknown[] = []
): Promise<R[]> => {
  const result = await db.query<R>(text, params);
  return result.rows;
};

export const queryOne = async <R extends QueryResultRow>(
  db: Queryable,
  text: string,
  params: unknown[] = []
): Promise<R | null> => {
  const rows = await queryRows<R>(db, text, params);
  return rows[0] ?? null;
};

/**
 * Turns `[column, value]` pairs into a SET clause, skipping undefined values.
 * Placeholders are numbered from `startIndex`.
 */
export const buildSetClause = (
  assignments: Array<[column: string, value: unknown]>,
  startIndex = 1
): { clause: string; params: unknown[] } => {
  const params: unknown[] = [];
  const parts: string[] = [];
  for (const [column, value] of assignments) {
    if (value === undefined) continue;
    params.push(value);
    parts.push(`${column} = $${startIndex + params.length - 1}`);
  }
  return { clause: parts.join(", "), params };
};

/**
 * Appends inclusive date bounds on `column` to `params`, returning the SQL
 * fragment (empty, or starting with " AND").
 */
export const buildDateRange = (
  column: string,
  range: { from?: string; to?: string },
  params: unknown[]
): string => {
  let sql = "";
  if (range.from) {
    params.push(range.from);
    sql += ` AND ${column} >= $${params.length}::date`;
  }
  if (range.to) {
    params.push(range.to);
    sql += ` AND ${column} <= $${params.length}::date`;
  }
  return sql;
};
