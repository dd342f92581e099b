import { z } from "zod";
import { dateSchema, idSchema, notesSchema } from "./common.validator";

const weightKg = z
  .number({
    required_error: "weightKg is required",
    invalid_type_error: "weightKg must be a number",
  })
  .positive("weightKg must be positive")
  .max(1000, "weightKg is out of range");

export const recordWeightBody = z.object({
  weightKg,
  recordedDate: dateSchema,
  notes: notesSchema,
});

export const updateWeightBody = z
  .object({
    weightKg: weightKg.optional(),
    recordedDate: dateSchema.optional(),
    notes: notesSchema,
  })
  .refine((body) => Object.values(body).some((v) => v !== undefined), {
    message: "at least one field must be provided",
  });

export type RecordWeightInput = z.input<typeof recordWeightBody>;
export type UpdateWeightInput = z.input<typeof updateWeightBody>;

export const recordWeightSchema = {
  params: z.object({ id: idSchema }),
  body: recordWeightBody,
};
export const updateWeightSchema = {
  params: z.object({ id: idSchema }),
  body: updateWeightBody,
};
