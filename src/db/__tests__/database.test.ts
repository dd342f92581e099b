import { describe, expect, it } from "vitest";
import {
  ConflictError,
  NotFoundError,
  StorageUnavailableError,
  ValidationError,
} from "../../utils/errors";
import {
  buildDateRange,
  buildSetClause,
  translateDatabaseError,
  withClient,
  withTransaction,
} from "../database";
import { splitStatements } from "../migrator";

const pgError = (code: string, fields: Record<string, string> = {}) =>
  Object.assign(new Error(`pg error ${code}`), { code, ...fields });

describe("translateDatabaseError", () => {
  it("maps unique violations to ConflictError", () => {
    const error = translateDatabaseError(
      pgError("23505", { detail: "Key (username)=(john_doe) already exists." })
    );

    expect(error).toBeInstanceOf(ConflictError);
    expect(error).toHaveProperty("message", "Key (username)=(john_doe) already exists.");
  });

  it("maps foreign key violations to NotFoundError", () => {
    expect(translateDatabaseError(pgError("23503"))).toBeInstanceOf(NotFoundError);
  });

  it("maps data and check errors to ValidationError", () => {
    expect(translateDatabaseError(pgError("22007"))).toBeInstanceOf(ValidationError);
    expect(translateDatabaseError(pgError("23514"))).toBeInstanceOf(ValidationError);
  });

  it("maps connection failures to StorageUnavailableError", () => {
    expect(translateDatabaseError(pgError("ECONNREFUSED"))).toBeInstanceOf(
      StorageUnavailableError
    );
    expect(translateDatabaseError(pgError("08006"))).toBeInstanceOf(StorageUnavailableError);
    expect(
      translateDatabaseError(new Error("timeout exceeded when trying to connect"))
    ).toBeInstanceOf(StorageUnavailableError);
  });

  it("passes application and unknown errors through", () => {
    const notFound = new NotFoundError("User", 1);
    const other = new Error("boom");

    expect(translateDatabaseError(notFound)).toBe(notFound);
    expect(translateDatabaseError(other)).toBe(other);
  });
});

describe("buildSetClause", () => {
  it("numbers placeholders and skips undefined values", () => {
    const { clause, params } = buildSetClause([
      ["name", "Rowing"],
      ["category", undefined],
      ["calories_per_minute", null],
    ]);

    expect(clause).toBe("name = $1, calories_per_minute = $2");
    expect(params).toEqual(["Rowing", null]);
  });

  it("starts from the given index", () => {
    expect(buildSetClause([["notes", "x"]], 3).clause).toBe("notes = $3");
  });
});

describe("buildDateRange", () => {
  it("appends inclusive bounds after existing params", () => {
    const params: unknown[] = [7];

    const sql = buildDateRange("recorded_date", { from: "2024-08-01", to: "2024-08-31" }, params);

    expect(sql).toBe(" AND recorded_date >= $2::date AND recorded_date <= $3::date");
    expect(params).toEqual([7, "2024-08-01", "2024-08-31"]);
  });

  it("returns an empty fragment without bounds", () => {
    const params: unknown[] = [7];

    expect(buildDateRange("recorded_date", {}, params)).toBe("");
    expect(params).toEqual([7]);
  });
});

describe("splitStatements", () => {
  it("drops comment lines and blank statements", () => {
    const script = "-- users\nCREATE TABLE a (id INT);\n\n-- more\nCREATE INDEX i ON a (id);\n";

    expect(splitStatements(script)).toEqual([
      "CREATE TABLE a (id INT)",
      "CREATE INDEX i ON a (id)",
    ]);
  });
});

class RecordingClient {
  readonly queries: string[] = [];
  released = false;

  constructor(private readonly failOn?: string) {}

  async query(text: string): Promise<unknown> {
    this.queries.push(text);
    if (text === this.failOn) throw pgError("23505", { detail: "duplicate key" });
    return { rows: [] };
  }

  release(): void {
    this.released = true;
  }
}

const poolOf = (client: RecordingClient) => ({ connect: async () => client });

describe("withTransaction", () => {
  it("commits and releases after the unit succeeds", async () => {
    const client = new RecordingClient();

    const result = await withTransaction(poolOf(client), async (c) => {
      await c.query("INSERT 1");
      return "done";
    });

    expect(result).toBe("done");
    expect(client.queries).toEqual(["BEGIN", "INSERT 1", "COMMIT"]);
    expect(client.released).toBe(true);
  });

  it("rolls back, releases and translates the error when a statement fails", async () => {
    const client = new RecordingClient("INSERT 2");

    const outcome = withTransaction(poolOf(client), async (c) => {
      await c.query("INSERT 1");
      await c.query("INSERT 2");
      await c.query("INSERT 3");
    });

    await expect(outcome).rejects.toBeInstanceOf(ConflictError);
    await expect(outcome).rejects.toThrow("duplicate key");
    expect(client.queries).toEqual(["BEGIN", "INSERT 1", "INSERT 2", "ROLLBACK"]);
    expect(client.released).toBe(true);
  });

  it("answers StorageUnavailableError when no connection can be had", async () => {
    const pool = {
      connect: async (): Promise<RecordingClient> => {
        throw pgError("ECONNREFUSED");
      },
    };

    await expect(withTransaction(pool, async () => "never")).rejects.toBeInstanceOf(
      StorageUnavailableError
    );
  });
});

describe("withClient", () => {
  it("releases the client when the work fails", async () => {
    const client = new RecordingClient();

    await expect(
      withClient(poolOf(client), async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    expect(client.queries).toEqual([]);
    expect(client.released).toBe(true);
  });
});
