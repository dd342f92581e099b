import { beforeEach, describe, expect, it } from "vitest";
import { IntensityLevel } from "../../common/common-enum";
import { ExerciseType } from "../../types/model/exerciseType.model";
import { User } from "../../types/model/user.model";
import { NotFoundError, ValidationError } from "../../utils/errors";
import { createTestStore, seedRunning, TestStore } from "../../__tests__/helpers/testDb";

describe("WorkoutSessionService", () => {
  let store: TestStore;
  let john: User;
  let running: ExerciseType;

  beforeEach(async () => {
    store = await createTestStore();
    ({ user: john, running } = await seedRunning(store.services));
  });

  it("derives calories from the exercise coefficient when omitted", async () => {
    const session = await store.services.workouts.logWorkout(john.id, {
      exerciseTypeId: running.id,
      durationMinutes: 30,
      intensityLevel: "high",
      workoutDate: "2024-08-20",
    });

    expect(session).toMatchObject({
      userId: john.id,
      exerciseTypeId: running.id,
      exerciseName: "Running",
      durationMinutes: 30,
      caloriesBurned: 360,
      intensityLevel: "high",
      intensityTag: { known: true, value: IntensityLevel.HIGH },
      workoutDate: "2024-08-20",
      notes: null,
    });
  });

  it("keeps an explicitly entered calorie figure", async () => {
    const session = await store.services.workouts.logWorkout(john.id, {
      exerciseTypeId: running.id,
      durationMinutes: 30,
      workoutDate: "2024-08-20",
      caloriesBurned: 300,
    });

    expect(session.caloriesBurned).toBe(300);
  });

  it("leaves calories null when the type has no coefficient", async () => {
    const stretching = await store.services.exerciseTypes.createExerciseType({
      name: "Stretching",
    });

    const session = await store.services.workouts.logWorkout(john.id, {
      exerciseTypeId: stretching.id,
      durationMinutes: 10,
      workoutDate: "2024-08-20",
    });

    expect(session.caloriesBurned).toBeNull();
  });

  it("stores an unrecognised intensity label as given", async () => {
    const session = await store.services.workouts.logWorkout(john.id, {
      exerciseTypeId: running.id,
      durationMinutes: 30,
      workoutDate: "2024-08-20",
      intensityLevel: "tempo",
    });

    expect(session.intensityLevel).toBe("tempo");
    expect(session.intensityTag).toEqual({ known: false, value: "tempo" });
  });

  it("fails with NotFoundError for an unknown user or exercise type", async () => {
    const { workouts } = store.services;

    await expect(
      workouts.logWorkout(999, {
        exerciseTypeId: running.id,
        durationMinutes: 30,
        workoutDate: "2024-08-20",
      })
    ).rejects.toThrow("User 999 not found");
    await expect(
      workouts.logWorkout(john.id, {
        exerciseTypeId: 999,
        durationMinutes: 30,
        workoutDate: "2024-08-20",
      })
    ).rejects.toThrow("Exercise type 999 not found");
  });

  it("rejects non-positive or fractional durations", async () => {
    const { workouts } = store.services;
    const base = { exerciseTypeId: running.id, workoutDate: "2024-08-20" };

    await expect(workouts.logWorkout(john.id, { ...base, durationMinutes: 0 })).rejects.toThrow(
      ValidationError
    );
    await expect(
      workouts.logWorkout(john.id, { ...base, durationMinutes: 12.5 })
    ).rejects.toThrow("durationMinutes must be an integer");
  });

  describe("calorie totals", () => {
    beforeEach(async () => {
      const { workouts, exerciseTypes } = store.services;
      const squats = await exerciseTypes.createExerciseType({
        name: "Squats",
        category: "Strength",
        caloriesPerMinute: 6.0,
      });
      const stretching = await exerciseTypes.createExerciseType({ name: "Stretching" });
      // Tue 2024-08-20 and Thu 2024-08-22 share a week; Mon 2024-08-26 starts the next
      await workouts.logWorkout(john.id, { exerciseTypeId: running.id, durationMinutes: 30, workoutDate: "2024-08-20" });
      await workouts.logWorkout(john.id, { exerciseTypeId: squats.id, durationMinutes: 20, workoutDate: "2024-08-20" });
      await workouts.logWorkout(john.id, { exerciseTypeId: stretching.id, durationMinutes: 15, workoutDate: "2024-08-22" });
      await workouts.logWorkout(john.id, { exerciseTypeId: running.id, durationMinutes: 10, workoutDate: "2024-08-26" });
    });

    it("sums per date, counting missing calories as zero", async () => {
      const daily = await store.services.workouts.getDailyCalories(john.id);

      expect(daily).toEqual([
        { date: "2024-08-20", totalCalories: 480, totalMinutes: 50, sessionCount: 2 },
        { date: "2024-08-22", totalCalories: 0, totalMinutes: 15, sessionCount: 1 },
        { date: "2024-08-26", totalCalories: 120, totalMinutes: 10, sessionCount: 1 },
      ]);
    });

    it("sums per ISO week starting Monday", async () => {
      const weekly = await store.services.workouts.getWeeklyCalories(john.id);

      expect(weekly).toEqual([
        { weekStart: "2024-08-19", totalCalories: 480, totalMinutes: 65, sessionCount: 3 },
        { weekStart: "2024-08-26", totalCalories: 120, totalMinutes: 10, sessionCount: 1 },
      ]);
    });

    it("restricts totals to a date range", async () => {
      const daily = await store.services.workouts.getDailyCalories(john.id, {
        from: "2024-08-21",
        to: "2024-08-26",
      });

      expect(daily.map((d) => d.date)).toEqual(["2024-08-22", "2024-08-26"]);
    });

    it("lists sessions by date", async () => {
      const sessions = await store.services.workouts.listWorkoutSessions(john.id);

      expect(sessions.map((s) => [s.workoutDate, s.exerciseName])).toEqual([
        ["2024-08-20", "Running"],
        ["2024-08-20", "Squats"],
        ["2024-08-22", "Stretching"],
        ["2024-08-26", "Running"],
      ]);
    });
  });

  it("edits notes and calories, then deletes", async () => {
    const { workouts } = store.services;
    const session = await workouts.logWorkout(john.id, {
      exerciseTypeId: running.id,
      durationMinutes: 30,
      workoutDate: "2024-08-20",
    });

    const edited = await workouts.updateWorkoutSession(session.id, {
      notes: "Hill repeats",
      caloriesBurned: 400,
    });
    expect(edited).toMatchObject({ notes: "Hill repeats", caloriesBurned: 400, durationMinutes: 30 });

    await workouts.deleteWorkoutSession(session.id);
    await expect(workouts.getWorkoutSession(session.id)).rejects.toThrow(NotFoundError);
  });
});
