import { describe, expect, it } from "vitest";
import { GoalDirection } from "../../common/common-enum";
import {
  calculateGoalProgress,
  deriveCaloriesBurned,
  resolveGoalDirection,
} from "../calculators";

describe("deriveCaloriesBurned", () => {
  it("multiplies duration by the per-minute coefficient", () => {
    expect(deriveCaloriesBurned(30, 12.0)).toBe(360);
  });

  it("rounds to the nearest integer", () => {
    expect(deriveCaloriesBurned(10, 3.36)).toBe(34);
    expect(deriveCaloriesBurned(7, 2.1)).toBe(15);
    expect(deriveCaloriesBurned(3, 3.1)).toBe(9);
  });

  it("prefers an explicit value, including zero", () => {
    expect(deriveCaloriesBurned(30, 12.0, 200)).toBe(200);
    expect(deriveCaloriesBurned(30, 12.0, 0)).toBe(0);
  });

  it("returns null without a coefficient or explicit value", () => {
    expect(deriveCaloriesBurned(30, null)).toBeNull();
    expect(deriveCaloriesBurned(30, null, null)).toBeNull();
  });
});

describe("resolveGoalDirection", () => {
  it("branches on known goal types", () => {
    expect(resolveGoalDirection("weight_loss", 80, 90)).toBe(GoalDirection.DECREASE);
    expect(resolveGoalDirection("muscle_gain", 80, 70)).toBe(GoalDirection.INCREASE);
    expect(resolveGoalDirection("weight_gain", 60, 65)).toBe(GoalDirection.INCREASE);
    expect(resolveGoalDirection("weight_maintenance", 60, 65)).toBe(GoalDirection.MAINTAIN);
  });

  it("matches goal types case-insensitively", () => {
    expect(resolveGoalDirection("Weight_Loss", 80, 90)).toBe(GoalDirection.DECREASE);
  });

  it("infers the direction of unknown types from baseline and target", () => {
    expect(resolveGoalDirection("run_distance", 0, 100)).toBe(GoalDirection.INCREASE);
    expect(resolveGoalDirection("body_fat", 25, 18)).toBe(GoalDirection.DECREASE);
    expect(resolveGoalDirection("resting_hr", 60, 60)).toBe(GoalDirection.MAINTAIN);
  });
});

describe("calculateGoalProgress", () => {
  it("treats lower as better for weight loss", () => {
    const result = calculateGoalProgress({
      goalType: "weight_loss",
      baseline: 75.2,
      currentValue: 74.1,
      targetValue: 72.0,
    });

    expect(result.direction).toBe(GoalDirection.DECREASE);
    expect(result.ratio).toBeCloseTo(0.3438, 4);
    expect(result.percent).toBeCloseTo(34.38, 2);
    expect(result.movingTowardTarget).toBe(true);
    expect(result.targetReached).toBe(false);
    expect(result.remaining).toBeCloseTo(2.1, 4);
  });

  it("reports a negative ratio when moving away from the target", () => {
    const result = calculateGoalProgress({
      goalType: "weight_loss",
      baseline: 75,
      currentValue: 76,
      targetValue: 72,
    });

    expect(result.ratio).toBeCloseTo(-0.3333, 4);
    expect(result.percent).toBe(0);
    expect(result.movingTowardTarget).toBe(false);
  });

  it("caps percent at 100 once the target is passed", () => {
    const result = calculateGoalProgress({
      goalType: "muscle_gain",
      baseline: 80,
      currentValue: 86,
      targetValue: 85,
    });

    expect(result.ratio).toBe(1.2);
    expect(result.percent).toBe(100);
    expect(result.targetReached).toBe(true);
    expect(result.remaining).toBe(0);
  });

  it("counts unknown goal types up from their baseline", () => {
    const result = calculateGoalProgress({
      goalType: "workouts_completed",
      baseline: 0,
      currentValue: 5,
      targetValue: 20,
    });

    expect(result.direction).toBe(GoalDirection.INCREASE);
    expect(result.ratio).toBe(0.25);
    expect(result.percent).toBe(25);
  });

  it("scores a target equal to the baseline by whether it is met", () => {
    const met = calculateGoalProgress({
      goalType: "weight_loss",
      baseline: 70,
      currentValue: 70,
      targetValue: 70,
    });
    const missed = calculateGoalProgress({
      goalType: "weight_loss",
      baseline: 70,
      currentValue: 71,
      targetValue: 70,
    });

    expect(met.ratio).toBe(1);
    expect(missed.ratio).toBe(0);
  });

  it("scores maintenance goals by distance from the target", () => {
    const within = calculateGoalProgress({
      goalType: "weight_maintenance",
      baseline: 60.5,
      currentValue: 59.8,
      targetValue: 60,
    });
    const drifted = calculateGoalProgress({
      goalType: "weight_maintenance",
      baseline: 60,
      currentValue: 64,
      targetValue: 60,
    });

    expect(within.ratio).toBe(1);
    expect(within.targetReached).toBe(true);
    expect(within.movingTowardTarget).toBe(true);
    expect(drifted.ratio).toBe(0.25);
    expect(drifted.percent).toBe(25);
    expect(drifted.targetReached).toBe(false);
    expect(drifted.remaining).toBe(4);
  });
});
