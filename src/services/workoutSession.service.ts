import { Pool, PoolClient } from "pg";
import { classifyIntensity } from "../common/common-enum";
import {
  buildDateRange,
  buildSetClause,
  queryOne,
  queryRows,
  withClient,
  withTransaction,
} from "../db/database";
import { ensureUserExists, findExerciseTypeOrThrow } from "../db/guards";
import {
  DailyCalories,
  WeeklyCalories,
  WorkoutSession,
} from "../types/model/workoutSession.model";
import { deriveCaloriesBurned } from "../utils/calculators";
import { isoWeekStart, toDateOnly } from "../utils/date";
import { NotFoundError } from "../utils/errors";
import { logger } from "../utils/logger";
import { DateRange, dateRangeQuery, parseInput } from "../validators/common.validator";
import {
  LogWorkoutInput,
  logWorkoutBody,
  UpdateWorkoutInput,
  updateWorkoutBody,
} from "../validators/workout.validator";

const SESSION_COLUMNS = `
  ws.id,
  ws.user_id as "userId",
  ws.exercise_type_id as "exerciseTypeId",
  et.name as "exerciseName",
  ws.duration_minutes as "durationMinutes",
  ws.calories_burned as "caloriesBurned",
  ws.intensity_level as "intensityLevel",
  ws.workout_date as "workoutDate",
  ws.notes,
  ws.created_at as "createdAt"
`;

type SessionRow = Omit<WorkoutSession, "workoutDate" | "intensityTag"> & {
  workoutDate: string | Date;
};

const toWorkoutSession = (row: SessionRow): WorkoutSession => ({
  ...row,
  intensityTag: row.intensityLevel === null ? null : classifyIntensity(row.intensityLevel),
  workoutDate: toDateOnly(row.workoutDate),
});

interface DailyRow {
  date: string | Date;
  totalCalories: number | string | null;
  totalMinutes: number | string | null;
  sessionCount: number | string;
}

export class WorkoutSessionService {
  constructor(private readonly pool: Pool) {}

  /**
   * Logs a session. Without an explicit calorie figure the exercise's
   * per-minute coefficient fills it in (left null when the type has none).
   */
  async logWorkout(userId: number, input: LogWorkoutInput): Promise<WorkoutSession> {
    const data = parseInput(logWorkoutBody, input);

    return withTransaction(this.pool, async (client) => {
      await ensureUserExists(client, userId);
      const exerciseType = await findExerciseTypeOrThrow(client, data.exerciseTypeId);

      const caloriesBurned = deriveCaloriesBurned(
        data.durationMinutes,
        exerciseType.caloriesPerMinute,
        data.caloriesBurned
      );

      const inserted = await queryOne<{ id: number }>(
        client,
        `INSERT INTO workout_sessions
           (user_id, exercise_type_id, duration_minutes, calories_burned,
            intensity_level, workout_date, notes)
         VALUES ($1, $2, $3, $4, $5, $6, $7)
         RETURNING id`,
        [
          userId,
          exerciseType.id,
          data.durationMinutes,
          caloriesBurned,
          data.intensityLevel ?? null,
          data.workoutDate,
          data.notes ?? null,
        ]
      );
      if (!inserted) throw new Error("Workout session insert returned no row");

      logger.info(
        `Logged ${data.durationMinutes} min of ${exerciseType.name} for user ${userId}`
      );
      return this.findOrThrow(client, inserted.id);
    });
  }

  async getWorkoutSession(id: number): Promise<WorkoutSession> {
    return withClient(this.pool, (client) => this.findOrThrow(client, id));
  }

  async listWorkoutSessions(userId: number, range: DateRange = {}): Promise<WorkoutSession[]> {
    const { from, to } = parseInput(dateRangeQuery, range);

    return withClient(this.pool, async (client) => {
      await ensureUserExists(client, userId);
      const params: unknown[] = [userId];
      const dateFilter = buildDateRange("ws.workout_date", { from, to }, params);
      const rows = await queryRows<SessionRow>(
        client,
        `SELECT ${SESSION_COLUMNS}
         FROM workout_sessions ws
         JOIN exercise_types et ON et.id = ws.exercise_type_id
         WHERE ws.user_id = $1${dateFilter}
         ORDER BY ws.workout_date ASC, ws.id ASC`,
        params
      );
      return rows.map(toWorkoutSession);
    });
  }

  async updateWorkoutSession(id: number, input: UpdateWorkoutInput): Promise<WorkoutSession> {
    const changes = parseInput(updateWorkoutBody, input);

    return withTransaction(this.pool, async (client) => {
      await this.findOrThrow(client, id);
      const { clause, params } = buildSetClause([
        ["duration_minutes", changes.durationMinutes],
        ["calories_burned", changes.caloriesBurned],
        ["intensity_level", changes.intensityLevel],
        ["workout_date", changes.workoutDate],
        ["notes", changes.notes],
      ]);
      params.push(id);
      await client.query(
        `UPDATE workout_sessions SET ${clause} WHERE id = $${params.length}`,
        params
      );
      return this.findOrThrow(client, id);
    });
  }

  async deleteWorkoutSession(id: number): Promise<void> {
    await withTransaction(this.pool, async (client) => {
      await this.findOrThrow(client, id);
      await client.query("DELETE FROM workout_sessions WHERE id = $1", [id]);
    });
  }

  /** Per-date totals, ascending. Sessions without a calorie figure count as 0. */
  async getDailyCalories(userId: number, range: DateRange = {}): Promise<DailyCalories[]> {
    const { from, to } = parseInput(dateRangeQuery, range);

    const rows = await withClient(this.pool, async (client) => {
      await ensureUserExists(client, userId);
      const params: unknown[] = [userId];
      const dateFilter = buildDateRange("workout_date", { from, to }, params);
      return queryRows<DailyRow>(
        client,
        `SELECT workout_date as "date",
                SUM(calories_burned) as "totalCalories",
                SUM(duration_minutes) as "totalMinutes",
                COUNT(*) as "sessionCount"
         FROM workout_sessions
         WHERE user_id = $1${dateFilter}
         GROUP BY workout_date
         ORDER BY workout_date ASC`,
        params
      );
    });

    return rows.map((row) => ({
      date: toDateOnly(row.date),
      totalCalories: Number(row.totalCalories ?? 0),
      totalMinutes: Number(row.totalMinutes ?? 0),
      sessionCount: Number(row.sessionCount),
    }));
  }

  /** Totals per ISO week (Monday start), ascending. */
  async getWeeklyCalories(userId: number, range: DateRange = {}): Promise<WeeklyCalories[]> {
    const daily = await this.getDailyCalories(userId, range);

    const weeks = new Map<string, WeeklyCalories>();
    for (const day of daily) {
      const weekStart = isoWeekStart(day.date);
      const week = weeks.get(weekStart) ?? {
        weekStart,
        totalCalories: 0,
        totalMinutes: 0,
        sessionCount: 0,
      };
      week.totalCalories += day.totalCalories;
      week.totalMinutes += day.totalMinutes;
      week.sessionCount += day.sessionCount;
      weeks.set(weekStart, week);
    }
    return [...weeks.values()];
  }

  private async findOrThrow(client: PoolClient, id: number): Promise<WorkoutSession> {
    const row = await queryOne<SessionRow>(
      client,
      `SELECT ${SESSION_COLUMNS}
       FROM workout_sessions ws
       JOIN exercise_types et ON et.id = ws.exercise_type_id
       WHERE ws.id = $1`,
      [id]
    );
    if (!row) throw new NotFoundError("Workout session", id);
    return toWorkoutSession(row);
  }
}
