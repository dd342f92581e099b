import { Pool, PoolClient } from "pg";
import {
  classifyGoalStatus,
  classifyGoalType,
  GoalStatus,
  WEIGHT_GOAL_TYPES,
} from "../common/common-enum";
import {
  buildDateRange,
  buildSetClause,
  Queryable,
  queryOne,
  queryRows,
  withClient,
  withTransaction,
} from "../db/database";
import { ensureUserExists } from "../db/guards";
import { LatestWeight, WeightRecord } from "../types/model/weightRecord.model";
import { toDateOnly } from "../utils/date";
import { NotFoundError } from "../utils/errors";
import { logger } from "../utils/logger";
import { DateRange, dateRangeQuery, parseInput } from "../validators/common.validator";
import {
  RecordWeightInput,
  recordWeightBody,
  UpdateWeightInput,
  updateWeightBody,
} from "../validators/weight.validator";

const WEIGHT_COLUMNS = `
  id,
  user_id as "userId",
  weight_kg as "weightKg",
  recorded_date as "recordedDate",
  notes,
  created_at as "createdAt"
`;

type WeightRow = Omit<WeightRecord, "recordedDate"> & { recordedDate: string | Date };

const toWeightRecord = (row: WeightRow): WeightRecord => ({
  ...row,
  recordedDate: toDateOnly(row.recordedDate),
});

export class WeightRecordService {
  constructor(private readonly pool: Pool) {}

  /**
   * Appends a weight record. When it becomes the user's latest reading, the
   * user's active weight goals take it as their current value in the same
   * transaction.
   */
  async recordWeight(userId: number, input: RecordWeightInput): Promise<WeightRecord> {
    const { weightKg, recordedDate, notes } = parseInput(recordWeightBody, input);

    return withTransaction(this.pool, async (client) => {
      await ensureUserExists(client, userId);

      const inserted = await queryOne<{ id: number }>(
        client,
        `INSERT INTO weight_records (user_id, weight_kg, recorded_date, notes)
         VALUES ($1, $2, $3, $4)
         RETURNING id`,
        [userId, weightKg, recordedDate, notes ?? null]
      );
      if (!inserted) throw new Error("Weight record insert returned no row");

      const latest = await this.findLatest(client, userId);
      if (latest?.id === inserted.id) {
        const synced = await this.syncWeightGoals(client, userId, weightKg);
        if (synced > 0) {
          logger.info(`Updated ${synced} active weight goal(s) for user ${userId}`);
        }
      }

      return this.findOrThrow(client, inserted.id);
    });
  }

  async getWeightRecord(id: number): Promise<WeightRecord> {
    return withClient(this.pool, (client) => this.findOrThrow(client, id));
  }

  /** Ascending by recorded date; same-date records keep insertion order. */
  async getWeightSeries(userId: number, range: DateRange = {}): Promise<WeightRecord[]> {
    const { from, to } = parseInput(dateRangeQuery, range);

    return withClient(this.pool, async (client) => {
      await ensureUserExists(client, userId);
      const params: unknown[] = [userId];
      const dateFilter = buildDateRange("recorded_date", { from, to }, params);
      const rows = await queryRows<WeightRow>(
        client,
        `SELECT ${WEIGHT_COLUMNS}
         FROM weight_records
         WHERE user_id = $1${dateFilter}
         ORDER BY recorded_date ASC, id ASC`,
        params
      );
      return rows.map(toWeightRecord);
    });
  }

  async getLatestWeight(userId: number): Promise<WeightRecord | null> {
    return withClient(this.pool, async (client) => {
      await ensureUserExists(client, userId);
      return this.findLatest(client, userId);
    });
  }

  /** Latest reading of every user that has one, ordered by user id. */
  async getLatestWeights(): Promise<LatestWeight[]> {
    const rows = await withClient(this.pool, (client) =>
      queryRows<Omit<LatestWeight, "recordedDate"> & { recordedDate: string | Date }>(
        client,
        `SELECT w.user_id as "userId", u.username,
                w.weight_kg as "weightKg", w.recorded_date as "recordedDate"
         FROM weight_records w
         JOIN users u ON u.id = w.user_id
         ORDER BY w.user_id ASC, w.recorded_date DESC, w.id DESC`
      )
    );

    const latest = new Map<number, LatestWeight>();
    for (const row of rows) {
      if (!latest.has(row.userId)) {
        latest.set(row.userId, { ...row, recordedDate: toDateOnly(row.recordedDate) });
      }
    }
    return [...latest.values()];
  }

  async updateWeightRecord(id: number, input: UpdateWeightInput): Promise<WeightRecord> {
    const changes = parseInput(updateWeightBody, input);

    return withTransaction(this.pool, async (client) => {
      const before = await this.findOrThrow(client, id);
      const wasLatest = (await this.findLatest(client, before.userId))?.id === id;
      const { clause, params } = buildSetClause([
        ["weight_kg", changes.weightKg],
        ["recorded_date", changes.recordedDate],
        ["notes", changes.notes],
      ]);
      params.push(id);
      await client.query(
        `UPDATE weight_records SET ${clause} WHERE id = $${params.length}`,
        params
      );

      const latest = await this.findLatest(client, before.userId);
      if (latest && (wasLatest || latest.id === id)) {
        await this.syncWeightGoals(client, before.userId, latest.weightKg);
      }
      return this.findOrThrow(client, id);
    });
  }

  /**
   * Removing the latest reading moves active weight goals back to the one
   * before it; with no readings left they keep their value.
   */
  async deleteWeightRecord(id: number): Promise<void> {
    await withTransaction(this.pool, async (client) => {
      const record = await this.findOrThrow(client, id);
      const wasLatest = (await this.findLatest(client, record.userId))?.id === id;
      await client.query("DELETE FROM weight_records WHERE id = $1", [id]);

      const latest = wasLatest ? await this.findLatest(client, record.userId) : null;
      if (latest) {
        await this.syncWeightGoals(client, record.userId, latest.weightKg);
      }
    });
  }

  async findFirst(db: Queryable, userId: number): Promise<WeightRecord | null> {
    const row = await queryOne<WeightRow>(
      db,
      `SELECT ${WEIGHT_COLUMNS} FROM weight_records
       WHERE user_id = $1
       ORDER BY recorded_date ASC, id ASC
       LIMIT 1`,
      [userId]
    );
    return row ? toWeightRecord(row) : null;
  }

  async findLatest(db: Queryable, userId: number): Promise<WeightRecord | null> {
    const row = await queryOne<WeightRow>(
      db,
      `SELECT ${WEIGHT_COLUMNS} FROM weight_records
       WHERE user_id = $1
       ORDER BY recorded_date DESC, id DESC
       LIMIT 1`,
      [userId]
    );
    return row ? toWeightRecord(row) : null;
  }

  private async findOrThrow(client: PoolClient, id: number): Promise<WeightRecord> {
    const row = await queryOne<WeightRow>(
      client,
      `SELECT ${WEIGHT_COLUMNS} FROM weight_records WHERE id = $1`,
      [id]
    );
    if (!row) throw new NotFoundError("Weight record", id);
    return toWeightRecord(row);
  }

  private async syncWeightGoals(
    client: PoolClient,
    userId: number,
    weightKg: number
  ): Promise<number> {
    const goals = await queryRows<{ id: number; goalType: string; status: string | null }>(
      client,
      `SELECT id, goal_type as "goalType", status FROM goals WHERE user_id = $1`,
      [userId]
    );
    const targets = goals.filter((goal) => {
      const status = classifyGoalStatus(goal.status ?? GoalStatus.ACTIVE);
      const type = classifyGoalType(goal.goalType);
      return (
        status.known &&
        status.value === GoalStatus.ACTIVE &&
        type.known &&
        WEIGHT_GOAL_TYPES.includes(type.value)
      );
    });

    for (const goal of targets) {
      await client.query("UPDATE goals SET current_value = $1 WHERE id = $2", [
        weightKg,
        goal.id,
      ]);
    }
    return targets.length;
  }
}
