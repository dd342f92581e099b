import { Pool, PoolClient } from "pg";
import { classifyCategory } from "../common/common-enum";
import {
  buildSetClause,
  queryOne,
  queryRows,
  withClient,
  withTransaction,
} from "../db/database";
import { countRows } from "../db/guards";
import { ExerciseType } from "../types/model/exerciseType.model";
import { ConflictError, NotFoundError } from "../utils/errors";
import { logger } from "../utils/logger";
import { parseInput } from "../validators/common.validator";
import {
  CreateExerciseTypeInput,
  createExerciseTypeBody,
  listExerciseTypesQuery,
  UpdateExerciseTypeInput,
  updateExerciseTypeBody,
} from "../validators/exerciseType.validator";

const EXERCISE_TYPE_COLUMNS = `
  id, name, category,
  calories_per_minute as "caloriesPerMinute"
`;

type ExerciseTypeRow = Omit<ExerciseType, "categoryTag">;

const toExerciseType = (row: ExerciseTypeRow): ExerciseType => ({
  ...row,
  categoryTag: row.category === null ? null : classifyCategory(row.category),
});

/** Shared exercise catalog; not owned by any user. */
export class ExerciseTypeService {
  constructor(private readonly pool: Pool) {}

  async createExerciseType(input: CreateExerciseTypeInput): Promise<ExerciseType> {
    const { name, category, caloriesPerMinute } = parseInput(createExerciseTypeBody, input);

    return withTransaction(this.pool, async (client) => {
      await this.assertNameFree(client, name);
      const inserted = await queryOne<{ id: number }>(
        client,
        `INSERT INTO exercise_types (name, category, calories_per_minute)
         VALUES ($1, $2, $3)
         RETURNING id`,
        [name, category ?? null, caloriesPerMinute ?? null]
      );
      if (!inserted) throw new Error("Exercise type insert returned no row");

      logger.info(`Created exercise type ${inserted.id} (${name})`);
      return this.findOrThrow(client, inserted.id);
    });
  }

  async getExerciseType(id: number): Promise<ExerciseType> {
    return withClient(this.pool, (client) => this.findOrThrow(client, id));
  }

  async listExerciseTypes(filter: { category?: string } = {}): Promise<ExerciseType[]> {
    const { category } = parseInput(listExerciseTypesQuery, filter);

    const rows = await withClient(this.pool, (client) =>
      category
        ? queryRows<ExerciseTypeRow>(
            client,
            `SELECT ${EXERCISE_TYPE_COLUMNS} FROM exercise_types
             WHERE LOWER(category) = LOWER($1)
             ORDER BY name`,
            [category]
          )
        : queryRows<ExerciseTypeRow>(
            client,
            `SELECT ${EXERCISE_TYPE_COLUMNS} FROM exercise_types ORDER BY name`
          )
    );
    return rows.map(toExerciseType);
  }

  async updateExerciseType(id: number, input: UpdateExerciseTypeInput): Promise<ExerciseType> {
    const changes = parseInput(updateExerciseTypeBody, input);

    return withTransaction(this.pool, async (client) => {
      await this.findOrThrow(client, id);
      if (changes.name !== undefined) {
        await this.assertNameFree(client, changes.name, id);
      }

      const { clause, params } = buildSetClause([
        ["name", changes.name],
        ["category", changes.category],
        ["calories_per_minute", changes.caloriesPerMinute],
      ]);
      params.push(id);
      await client.query(
        `UPDATE exercise_types SET ${clause} WHERE id = $${params.length}`,
        params
      );
      return this.findOrThrow(client, id);
    });
  }

  /** Refuses while any workout session still references the type. */
  async deleteExerciseType(id: number): Promise<void> {
    await withTransaction(this.pool, async (client) => {
      await this.findOrThrow(client, id);
      const sessions = await countRows(client, "workout_sessions", "exercise_type_id", id);
      if (sessions > 0) {
        throw new ConflictError(
          `Exercise type ${id} is used by ${sessions} workout session(s)`
        );
      }
      await client.query("DELETE FROM exercise_types WHERE id = $1", [id]);
    });
  }

  private async findOrThrow(client: PoolClient, id: number): Promise<ExerciseType> {
    const row = await queryOne<ExerciseTypeRow>(
      client,
      `SELECT ${EXERCISE_TYPE_COLUMNS} FROM exercise_types WHERE id = $1`,
      [id]
    );
    if (!row) throw new NotFoundError("Exercise type", id);
    return toExerciseType(row);
  }

  private async assertNameFree(
    client: PoolClient,
    name: string,
    excludeId?: number
  ): Promise<void> {
    const clash = await queryOne<{ id: number }>(
      client,
      "SELECT id FROM exercise_types WHERE name = $1",
      [name]
    );
    if (clash && clash.id !== excludeId) {
      throw new ConflictError(`Exercise type "${name}" already exists`);
    }
  }
}
