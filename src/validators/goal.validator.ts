import { z } from "zod";
import { GoalStatus } from "../common/common-enum";
import { dateSchema, idSchema } from "./common.validator";

// goal_type and status are free-form columns; known variants are classified
// on read, anything else is stored as given
const goalType = z
  .string({ required_error: "goalType is required" })
  .trim()
  .min(1, "goalType is required")
  .max(50, "goalType must be at most 50 characters");

const status = z
  .string({ required_error: "status is required" })
  .trim()
  .min(1, "status is required")
  .max(20, "status must be at most 20 characters");

const metric = (field: string) =>
  z.number({
    required_error: `${field} is required`,
    invalid_type_error: `${field} must be a number`,
  });

export const setGoalBody = z.object({
  goalType,
  targetValue: metric("targetValue").nullable().optional(),
  targetDate: dateSchema.nullable().optional(),
  // omitted: the latest weigh-in for weight goals, otherwise 0
  currentValue: metric("currentValue").optional(),
  status: status.default(GoalStatus.ACTIVE),
});

export const goalProgressBody = z.object({
  currentValue: metric("currentValue"),
});

export const goalStatusBody = z.object({ status });

export const listGoalsQuery = z.object({
  status: status.optional(),
});

export type SetGoalInput = z.input<typeof setGoalBody>;

export const setGoalSchema = {
  params: z.object({ id: idSchema }),
  body: setGoalBody,
};
export const goalProgressSchema = {
  params: z.object({ id: idSchema }),
  body: goalProgressBody,
};
export const goalStatusSchema = {
  params: z.object({ id: idSchema }),
  body: goalStatusBody,
};
export const listGoalsSchema = {
  params: z.object({ id: idSchema }),
  query: listGoalsQuery,
};
