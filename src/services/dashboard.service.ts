import { Pool } from "pg";
import { classifyGoalStatus, GoalStatus } from "../common/common-enum";
import { queryRows, withClient } from "../db/database";
import { CategoryBreakdown, UserSummary } from "../types/model/summary.model";
import { UserService } from "./user.service";
import { WeightRecordService } from "./weightRecord.service";

interface CategoryRow {
  category: string | null;
  sessionCount: number | string;
  totalMinutes: number | string | null;
  totalCalories: number | string | null;
}

const UNCATEGORIZED = "Uncategorized";

/** Read-only figures behind the dashboard's overview cards and charts. */
export class DashboardService {
  constructor(
    private readonly pool: Pool,
    private readonly users: UserService,
    private readonly weights: WeightRecordService
  ) {}

  async getUserSummary(userId: number): Promise<UserSummary> {
    const user = await this.users.getUser(userId);

    return withClient(this.pool, async (client) => {
      const startingWeight = await this.weights.findFirst(client, userId);
      const latestWeight = await this.weights.findLatest(client, userId);

      const categoryRows = await queryRows<CategoryRow>(
        client,
        `SELECT et.category,
                COUNT(*) as "sessionCount",
                SUM(ws.duration_minutes) as "totalMinutes",
                SUM(ws.calories_burned) as "totalCalories"
         FROM workout_sessions ws
         JOIN exercise_types et ON et.id = ws.exercise_type_id
         WHERE ws.user_id = $1
         GROUP BY et.category
         ORDER BY et.category`,
        [userId]
      );

      const byCategory = new Map<string, CategoryBreakdown>();
      for (const row of categoryRows) {
        const category = row.category ?? UNCATEGORIZED;
        const entry = byCategory.get(category) ?? {
          category,
          sessionCount: 0,
          totalMinutes: 0,
          totalCalories: 0,
        };
        entry.sessionCount += Number(row.sessionCount);
        entry.totalMinutes += Number(row.totalMinutes ?? 0);
        entry.totalCalories += Number(row.totalCalories ?? 0);
        byCategory.set(category, entry);
      }
      const workoutsByCategory = [...byCategory.values()].sort((a, b) =>
        a.category.localeCompare(b.category)
      );

      const statuses = await queryRows<{ status: string | null }>(
        client,
        "SELECT status FROM goals WHERE user_id = $1",
        [userId]
      );
      const activeGoals = statuses.filter((row) => {
        const tag = classifyGoalStatus(row.status ?? GoalStatus.ACTIVE);
        return tag.known && tag.value === GoalStatus.ACTIVE;
      }).length;

      const weightChangeKg =
        startingWeight && latestWeight
          ? Math.round((latestWeight.weightKg - startingWeight.weightKg) * 100) / 100
          : null;

      return {
        user,
        latestWeight,
        startingWeight,
        weightChangeKg,
        totalWorkouts: workoutsByCategory.reduce((sum, c) => sum + c.sessionCount, 0),
        totalMinutes: workoutsByCategory.reduce((sum, c) => sum + c.totalMinutes, 0),
        totalCalories: workoutsByCategory.reduce((sum, c) => sum + c.totalCalories, 0),
        workoutsByCategory,
        activeGoals,
      };
    });
  }
}
