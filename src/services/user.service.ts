import { Pool, PoolClient } from "pg";
import {
  buildSetClause,
  queryOne,
  queryRows,
  withClient,
  withTransaction,
} from "../db/database";
import { countRows } from "../db/guards";
import { User } from "../types/model/user.model";
import { ConflictError, NotFoundError } from "../utils/errors";
import { logger } from "../utils/logger";
import { parseInput } from "../validators/common.validator";
import {
  CreateUserInput,
  createUserBody,
  UpdateUserInput,
  updateUserBody,
} from "../validators/user.validator";

const USER_COLUMNS = `
  id, username, email, age,
  height_cm as "heightCm",
  created_at as "createdAt"
`;

export interface DeleteUserOptions {
  /** Remove weight records, sessions and goals too; otherwise refuse while any exist. */
  cascade?: boolean;
}

export class UserService {
  constructor(private readonly pool: Pool) {}

  async createUser(input: CreateUserInput): Promise<User> {
    const { username, email, age, heightCm } = parseInput(createUserBody, input);

    return withTransaction(this.pool, async (client) => {
      await this.assertUnique(client, username, email);

      const inserted = await queryOne<{ id: number }>(
        client,
        `INSERT INTO users (username, email, age, height_cm)
         VALUES ($1, $2, $3, $4)
         RETURNING id`,
        [username, email, age ?? null, heightCm ?? null]
      );
      if (!inserted) throw new Error("User insert returned no row");

      logger.info(`Created user ${inserted.id} (${username})`);
      return this.findOrThrow(client, inserted.id);
    });
  }

  async getUser(id: number): Promise<User> {
    return withClient(this.pool, (client) => this.findOrThrow(client, id));
  }

  async listUsers(): Promise<User[]> {
    return withClient(this.pool, (client) =>
      queryRows<User>(client, `SELECT ${USER_COLUMNS} FROM users ORDER BY id`)
    );
  }

  async updateUser(id: number, input: UpdateUserInput): Promise<User> {
    const changes = parseInput(updateUserBody, input);

    return withTransaction(this.pool, async (client) => {
      await this.findOrThrow(client, id);
      await this.assertUnique(client, changes.username, changes.email, id);

      const { clause, params } = buildSetClause([
        ["username", changes.username],
        ["email", changes.email],
        ["age", changes.age],
        ["height_cm", changes.heightCm],
      ]);
      params.push(id);
      await client.query(`UPDATE users SET ${clause} WHERE id = $${params.length}`, params);

      return this.findOrThrow(client, id);
    });
  }

  async deleteUser(id: number, { cascade = false }: DeleteUserOptions = {}): Promise<void> {
    await withTransaction(this.pool, async (client) => {
      await this.findOrThrow(client, id);

      if (cascade) {
        await client.query("DELETE FROM weight_records WHERE user_id = $1", [id]);
        await client.query("DELETE FROM workout_sessions WHERE user_id = $1", [id]);
        await client.query("DELETE FROM goals WHERE user_id = $1", [id]);
      } else {
        const dependents =
          (await countRows(client, "weight_records", "user_id", id)) +
          (await countRows(client, "workout_sessions", "user_id", id)) +
          (await countRows(client, "goals", "user_id", id));
        if (dependents > 0) {
          throw new ConflictError(
            `User ${id} still has ${dependents} dependent records; delete with cascade to remove them`
          );
        }
      }

      await client.query("DELETE FROM users WHERE id = $1", [id]);
      logger.info(`Deleted user ${id}${cascade ? " with dependents" : ""}`);
    });
  }

  private async findOrThrow(client: PoolClient, id: number): Promise<User> {
    const user = await queryOne<User>(
      client,
      `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`,
      [id]
    );
    if (!user) throw new NotFoundError("User", id);
    return user;
  }

  private async assertUnique(
    client: PoolClient,
    username: string | undefined,
    email: string | undefined,
    excludeId?: number
  ): Promise<void> {
    if (username === undefined && email === undefined) return;

    const rows = await queryRows<{ id: number; username: string; email: string }>(
      client,
      "SELECT id, username, email FROM users WHERE username = $1 OR email = $2",
      [username ?? null, email ?? null]
    );
    const clash = rows.find((row) => row.id !== excludeId);
    if (!clash) return;

    if (username !== undefined && clash.username === username) {
      throw new ConflictError(`Username "${username}" is already taken`);
    }
    throw new ConflictError(`Email "${email}" is already registered`);
  }
}
