import { z } from "zod";
import {
  dateRangeFields,
  dateSchema,
  idSchema,
  isOrderedRange,
  notesSchema,
  RANGE_ORDER_ISSUE,
} from "./common.validator";

const durationMinutes = z
  .number({
    required_error: "durationMinutes is required",
    invalid_type_error: "durationMinutes must be a number",
  })
  .int("durationMinutes must be an integer")
  .positive("durationMinutes must be positive")
  .max(1440, "durationMinutes is out of range");

const caloriesBurned = z
  .number({ invalid_type_error: "caloriesBurned must be a number" })
  .int("caloriesBurned must be an integer")
  .min(0, "caloriesBurned must not be negative");

const intensityLevel = z
  .string()
  .trim()
  .min(1, "intensityLevel must not be empty")
  .max(20, "intensityLevel must be at most 20 characters");

export const logWorkoutBody = z.object({
  exerciseTypeId: idSchema,
  durationMinutes,
  intensityLevel: intensityLevel.nullable().optional(),
  workoutDate: dateSchema,
  caloriesBurned: caloriesBurned.nullable().optional(),
  notes: notesSchema,
});

export const updateWorkoutBody = z
  .object({
    durationMinutes: durationMinutes.optional(),
    caloriesBurned: caloriesBurned.nullable().optional(),
    intensityLevel: intensityLevel.nullable().optional(),
    workoutDate: dateSchema.optional(),
    notes: notesSchema,
  })
  .refine((body) => Object.values(body).some((v) => v !== undefined), {
    message: "at least one field must be provided",
  });

export const caloriesQuery = z
  .object({
    groupBy: z.enum(["day", "week"]).default("day"),
    ...dateRangeFields,
  })
  .refine(isOrderedRange, RANGE_ORDER_ISSUE);

export type LogWorkoutInput = z.input<typeof logWorkoutBody>;
export type UpdateWorkoutInput = z.input<typeof updateWorkoutBody>;

export const logWorkoutSchema = {
  params: z.object({ id: idSchema }),
  body: logWorkoutBody,
};
export const updateWorkoutSchema = {
  params: z.object({ id: idSchema }),
  body: updateWorkoutBody,
};
export const caloriesSchema = {
  params: z.object({ id: idSchema }),
  query: caloriesQuery,
};
