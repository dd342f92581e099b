import { z } from "zod";
import { idSchema } from "./common.validator";

const name = z
  .string({ required_error: "name is required" })
  .trim()
  .min(1, "name is required")
  .max(100, "name must be at most 100 characters");

const category = z
  .string()
  .trim()
  .min(1, "category must not be empty")
  .max(50, "category must be at most 50 characters");

const caloriesPerMinute = z
  .number({ invalid_type_error: "caloriesPerMinute must be a number" })
  .min(0, "caloriesPerMinute must not be negative")
  .max(100, "caloriesPerMinute is out of range");

export const createExerciseTypeBody = z.object({
  name,
  category: category.nullable().optional(),
  caloriesPerMinute: caloriesPerMinute.nullable().optional(),
});

export const updateExerciseTypeBody = z
  .object({
    name: name.optional(),
    category: category.nullable().optional(),
    caloriesPerMinute: caloriesPerMinute.nullable().optional(),
  })
  .refine((body) => Object.values(body).some((v) => v !== undefined), {
    message: "at least one field must be provided",
  });

export const listExerciseTypesQuery = z.object({
  category: z.string().trim().min(1).optional(),
});

export type CreateExerciseTypeInput = z.input<typeof createExerciseTypeBody>;
export type UpdateExerciseTypeInput = z.input<typeof updateExerciseTypeBody>;

export const createExerciseTypeSchema = { body: createExerciseTypeBody };
export const updateExerciseTypeSchema = {
  params: z.object({ id: idSchema }),
  body: updateExerciseTypeBody,
};
export const listExerciseTypesSchema = { query: listExerciseTypesQuery };
