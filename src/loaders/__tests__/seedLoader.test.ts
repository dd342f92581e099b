import { beforeEach, describe, expect, it } from "vitest";
import { ZodError } from "zod";
import { createTestStore, TestStore } from "../../__tests__/helpers/testDb";
import { SeedLoader } from "../seedLoader";

describe("SeedLoader", () => {
  let store: TestStore;
  let loader: SeedLoader;

  beforeEach(async () => {
    store = await createTestStore();
    loader = new SeedLoader(store.pool, store.services);
  });

  it("loads the bundled fixture into an empty store", async () => {
    const result = await loader.seed();

    expect(result).toEqual({
      seeded: true,
      users: 3,
      exerciseTypes: 8,
      weightRecords: 9,
      workoutSessions: 7,
      goals: 3,
    });

    const users = await store.services.users.listUsers();
    expect(users.map((u) => u.username)).toEqual(["john_doe", "jane_smith", "mike_johnson"]);
  });

  it("leaves a populated store alone", async () => {
    await loader.seed();

    const again = await loader.seed();

    expect(again.seeded).toBe(false);
    await expect(store.services.users.listUsers()).resolves.toHaveLength(3);
  });

  it("produces the fixture's running session and goal progress", async () => {
    await loader.seed();
    const [john] = await store.services.users.listUsers();

    const daily = await store.services.workouts.getDailyCalories(john.id);
    expect(daily[0]).toEqual({
      date: "2024-08-20",
      totalCalories: 360,
      totalMinutes: 30,
      sessionCount: 1,
    });

    const [goal] = await store.services.goals.listGoals(john.id);
    const progress = await store.services.goals.getGoalProgress(goal.id);
    expect(progress.baseline).toBe(75.2);
    expect(progress.percent).toBeCloseTo(34.38, 2);
  });

  it("rejects a malformed fixture", async () => {
    await expect(loader.seed({ users: "nope" })).rejects.toThrow(ZodError);
  });

  it("fails on a reference to an unknown exercise", async () => {
    const fixture = {
      users: [{ username: "ana", email: "ana@example.com" }],
      exerciseTypes: [],
      weightRecords: [],
      workoutSessions: [
        { username: "ana", exercise: "Rowing", durationMinutes: 20, workoutDate: "2024-08-20" },
      ],
      goals: [],
    };

    await expect(loader.seed(fixture)).rejects.toThrow('Seed references unknown exercise "Rowing"');
  });
});
