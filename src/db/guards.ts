import { NotFoundError } from "../utils/errors";
import { Queryable, queryOne } from "./database";

export async function ensureUserExists(db: Queryable, userId: number): Promise<void> {
  const row = await queryOne<{ id: number }>(db, "SELECT id FROM users WHERE id = $1", [userId]);
  if (!row) throw new NotFoundError("User", userId);
}

export interface ExerciseCoefficientRow {
  id: number;
  name: string;
  caloriesPerMinute: number | null;
}

export async function findExerciseTypeOrThrow(
  db: Queryable,
  exerciseTypeId: number
): Promise<ExerciseCoefficientRow> {
  const row = await queryOne<ExerciseCoefficientRow>(
    db,
    `SELECT id, name, calories_per_minute as "caloriesPerMinute"
     FROM exercise_types WHERE id = $1`,
    [exerciseTypeId]
  );
  if (!row) throw new NotFoundError("Exercise type", exerciseTypeId);
  return row;
}

export async function countRows(
  db: Queryable,
  table: "weight_records" | "workout_sessions" | "goals",
  column: "user_id" | "exercise_type_id",
  id: number
): Promise<number> {
  const row = await queryOne<{ count: number | string }>(
    db,
    `SELECT COUNT(*) as "count" FROM ${table} WHERE ${column} = $1`,
    [id]
  );
  return Number(row?.count ?? 0);
}
