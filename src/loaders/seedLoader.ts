import { Pool } from "pg";
import { z } from "zod";
import seedData from "../data/seed.json";
import { queryOne, withClient } from "../db/database";
import { Services } from "../services";
import { logger } from "../utils/logger";

const byUser = { username: z.string() };

const seedSchema = z.object({
  users: z.array(
    z.object({
      username: z.string(),
      email: z.string(),
      age: z.number().nullable().optional(),
      heightCm: z.number().nullable().optional(),
    })
  ),
  exerciseTypes: z.array(
    z.object({
      name: z.string(),
      category: z.string().nullable().optional(),
      caloriesPerMinute: z.number().nullable().optional(),
    })
  ),
  weightRecords: z.array(
    z.object({
      ...byUser,
      weightKg: z.number(),
      recordedDate: z.string(),
      notes: z.string().nullable().optional(),
    })
  ),
  workoutSessions: z.array(
    z.object({
      ...byUser,
      exercise: z.string(),
      durationMinutes: z.number(),
      caloriesBurned: z.number().nullable().optional(),
      intensityLevel: z.string().nullable().optional(),
      workoutDate: z.string(),
      notes: z.string().nullable().optional(),
    })
  ),
  goals: z.array(
    z.object({
      ...byUser,
      goalType: z.string(),
      targetValue: z.number().nullable().optional(),
      currentValue: z.number().optional(),
      targetDate: z.string().nullable().optional(),
      status: z.string().optional(),
    })
  ),
});

export type SeedData = z.infer<typeof seedSchema>;

export interface SeedResult {
  seeded: boolean;
  users: number;
  exerciseTypes: number;
  weightRecords: number;
  workoutSessions: number;
  goals: number;
}

/**
 * Development fixtures. Rows reference each other by username and exercise
 * name, so the fixture file does not depend on generated ids.
 */
export class SeedLoader {
  constructor(
    private readonly pool: Pool,
    private readonly services: Services
  ) {}

  loadFixture(raw: unknown = seedData): SeedData {
    return seedSchema.parse(raw);
  }

  async isEmpty(): Promise<boolean> {
    const row = await withClient(this.pool, (client) =>
      queryOne<{ id: number }>(client, "SELECT id FROM users LIMIT 1")
    );
    return row === null;
  }

  /** Loads the fixture into an empty store; a store with users is left alone. */
  async seed(raw?: unknown): Promise<SeedResult> {
    const data = this.loadFixture(raw);

    if (!(await this.isEmpty())) {
      logger.info("Store already has users, skipping seed");
      return {
        seeded: false,
        users: 0,
        exerciseTypes: 0,
        weightRecords: 0,
        workoutSessions: 0,
        goals: 0,
      };
    }

    const { users, exerciseTypes, weights, workouts, goals } = this.services;

    const userIds = new Map<string, number>();
    for (const user of data.users) {
      const created = await users.createUser(user);
      userIds.set(created.username, created.id);
    }

    const exerciseIds = new Map<string, number>();
    for (const type of data.exerciseTypes) {
      const created = await exerciseTypes.createExerciseType(type);
      exerciseIds.set(created.name, created.id);
    }

    const userId = (username: string): number => {
      const id = userIds.get(username);
      if (id === undefined) throw new Error(`Seed references unknown user "${username}"`);
      return id;
    };

    for (const { username, ...record } of data.weightRecords) {
      await weights.recordWeight(userId(username), record);
    }

    for (const { username, exercise, ...session } of data.workoutSessions) {
      const exerciseTypeId = exerciseIds.get(exercise);
      if (exerciseTypeId === undefined) {
        throw new Error(`Seed references unknown exercise "${exercise}"`);
      }
      await workouts.logWorkout(userId(username), { ...session, exerciseTypeId });
    }

    for (const { username, ...goal } of data.goals) {
      await goals.setGoal(userId(username), goal);
    }

    const result: SeedResult = {
      seeded: true,
      users: data.users.length,
      exerciseTypes: data.exerciseTypes.length,
      weightRecords: data.weightRecords.length,
      workoutSessions: data.workoutSessions.length,
      goals: data.goals.length,
    };
    logger.info(`Seeded fixture data ${JSON.stringify(result)}`);
    return result;
  }
}
