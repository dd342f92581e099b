import { Pool, PoolClient } from "pg";
import {
  classifyGoalStatus,
  classifyGoalType,
  GoalStatus,
  WEIGHT_GOAL_TYPES,
} from "../common/common-enum";
import { queryOne, queryRows, withClient, withTransaction } from "../db/database";
import { ensureUserExists } from "../db/guards";
import { Goal, GoalProgress } from "../types/model/goal.model";
import { calculateGoalProgress } from "../utils/calculators";
import { toNullableDateOnly } from "../utils/date";
import { NotFoundError, ValidationError } from "../utils/errors";
import { logger } from "../utils/logger";
import { parseInput } from "../validators/common.validator";
import {
  goalProgressBody,
  goalStatusBody,
  listGoalsQuery,
  SetGoalInput,
  setGoalBody,
} from "../validators/goal.validator";
import { WeightRecordService } from "./weightRecord.service";

const GOAL_COLUMNS = `
  id,
  user_id as "userId",
  goal_type as "goalType",
  target_value as "targetValue",
  current_value as "currentValue",
  target_date as "targetDate",
  status,
  created_at as "createdAt"
`;

interface GoalRow {
  id: number;
  userId: number;
  goalType: string;
  targetValue: number | null;
  currentValue: number | null;
  targetDate: string | Date | null;
  status: string | null;
  createdAt: Date;
}

// a NULL status or current value reads as the column default
const toGoal = (row: GoalRow): Goal => {
  const status = row.status ?? GoalStatus.ACTIVE;
  return {
    ...row,
    goalTypeTag: classifyGoalType(row.goalType),
    currentValue: row.currentValue ?? 0,
    targetDate: toNullableDateOnly(row.targetDate),
    status,
    statusTag: classifyGoalStatus(status),
  };
};

const isWeightGoal = (goalType: string): boolean => {
  const tag = classifyGoalType(goalType);
  return tag.known && WEIGHT_GOAL_TYPES.includes(tag.value);
};

export class GoalService {
  constructor(
    private readonly pool: Pool,
    private readonly weights: WeightRecordService
  ) {}

  async setGoal(userId: number, input: SetGoalInput): Promise<Goal> {
    const data = parseInput(setGoalBody, input);

    return withTransaction(this.pool, async (client) => {
      await ensureUserExists(client, userId);
      const currentValue =
        data.currentValue ?? (await this.startingValue(client, userId, data.goalType));
      const inserted = await queryOne<{ id: number }>(
        client,
        `INSERT INTO goals (user_id, goal_type, target_value, current_value, target_date, status)
         VALUES ($1, $2, $3, $4, $5, $6)
         RETURNING id`,
        [
          userId,
          data.goalType,
          data.targetValue ?? null,
          currentValue,
          data.targetDate ?? null,
          data.status,
        ]
      );
      if (!inserted) throw new Error("Goal insert returned no row");

      logger.info(`Set ${data.goalType} goal ${inserted.id} for user ${userId}`);
      return this.findOrThrow(client, inserted.id);
    });
  }

  async getGoal(id: number): Promise<Goal> {
    return withClient(this.pool, (client) => this.findOrThrow(client, id));
  }

  /** A status filter matches case-insensitively. */
  async listGoals(userId: number, filter: { status?: string } = {}): Promise<Goal[]> {
    const { status } = parseInput(listGoalsQuery, filter);

    const rows = await withClient(this.pool, async (client) => {
      await ensureUserExists(client, userId);
      return queryRows<GoalRow>(
        client,
        `SELECT ${GOAL_COLUMNS} FROM goals WHERE user_id = $1 ORDER BY id`,
        [userId]
      );
    });

    const goals = rows.map(toGoal);
    if (!status) return goals;
    const wanted = status.toLowerCase();
    return goals.filter((goal) => goal.status.toLowerCase() === wanted);
  }

  async updateGoalProgress(goalId: number, currentValue: number): Promise<Goal> {
    const data = parseInput(goalProgressBody, { currentValue });

    return withTransaction(this.pool, async (client) => {
      await this.findOrThrow(client, goalId);
      await client.query("UPDATE goals SET current_value = $1 WHERE id = $2", [
        data.currentValue,
        goalId,
      ]);
      return this.findOrThrow(client, goalId);
    });
  }

  /** Any status string is stored; known ones are tagged on read. */
  async updateGoalStatus(goalId: number, status: string): Promise<Goal> {
    const data = parseInput(goalStatusBody, { status });

    return withTransaction(this.pool, async (client) => {
      const before = await this.findOrThrow(client, goalId);
      await client.query("UPDATE goals SET status = $1 WHERE id = $2", [data.status, goalId]);
      logger.info(`Goal ${goalId} status ${before.status} -> ${data.status}`);
      return this.findOrThrow(client, goalId);
    });
  }

  async deleteGoal(id: number): Promise<void> {
    await withTransaction(this.pool, async (client) => {
      await this.findOrThrow(client, id);
      await client.query("DELETE FROM goals WHERE id = $1", [id]);
    });
  }

  /**
   * Progress from a baseline toward the target. Weight goals start from the
   * user's first weight record (or the goal's own current value when there is
   * none); any other goal type counts up from zero.
   */
  async getGoalProgress(goalId: number): Promise<GoalProgress> {
    return withClient(this.pool, async (client) => {
      const goal = await this.findOrThrow(client, goalId);
      if (goal.targetValue === null) {
        throw new ValidationError(`Goal ${goalId} has no target value`);
      }

      let baseline = 0;
      if (isWeightGoal(goal.goalType)) {
        const first = await this.weights.findFirst(client, goal.userId);
        baseline = first ? first.weightKg : goal.currentValue;
      }

      const progress = calculateGoalProgress({
        goalType: goal.goalType,
        baseline,
        currentValue: goal.currentValue,
        targetValue: goal.targetValue,
      });

      return {
        goalId: goal.id,
        goalType: goal.goalType,
        baseline,
        currentValue: goal.currentValue,
        targetValue: goal.targetValue,
        ...progress,
      };
    });
  }

  private async startingValue(
    client: PoolClient,
    userId: number,
    goalType: string
  ): Promise<number> {
    if (!isWeightGoal(goalType)) return 0;
    const latest = await this.weights.findLatest(client, userId);
    return latest ? latest.weightKg : 0;
  }

  private async findOrThrow(client: PoolClient, id: number): Promise<Goal> {
    const row = await queryOne<GoalRow>(
      client,
      `SELECT ${GOAL_COLUMNS} FROM goals WHERE id = $1`,
      [id]
    );
    if (!row) throw new NotFoundError("Goal", id);
    return toGoal(row);
  }
}
