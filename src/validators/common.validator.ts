import { z, ZodTypeAny } from "zod";
import { isValidDate } from "../utils/date";
import { ValidationError } from "../utils/errors";

// SERIAL columns are 32-bit
const PG_INT_MAX = 2147483647;

export const idSchema = z.coerce
  .number({ invalid_type_error: "id must be a number" })
  .int("id must be an integer")
  .positive("id must be positive")
  .max(PG_INT_MAX, "id is out of range");

export const dateSchema = z
  .string({ invalid_type_error: "date must be a string" })
  .refine(isValidDate, "date must be a valid date in YYYY-MM-DD format");

export const notesSchema = z.string().max(2000, "notes is too long").nullable().optional();

export const idParamsSchema = {
  params: z.object({ id: idSchema }),
};

export const dateRangeFields = {
  from: dateSchema.optional(),
  to: dateSchema.optional(),
};

export const isOrderedRange = (range: { from?: string; to?: string }) =>
  !range.from || !range.to || range.from <= range.to;

export const RANGE_ORDER_ISSUE = { message: "from must not be after to" };

export const dateRangeQuery = z
  .object(dateRangeFields)
  .refine(isOrderedRange, RANGE_ORDER_ISSUE);

export const dateRangeQuerySchema = {
  params: z.object({ id: idSchema }),
  query: dateRangeQuery,
};

export type DateRange = z.infer<typeof dateRangeQuery>;

/** Parses service input, turning zod issues into a ValidationError. */
export function parseInput<S extends ZodTypeAny>(
  schema: S,
  input: unknown
): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(
      parsed.error.errors.map((e) => e.message).join(", ")
    );
  }
  return parsed.data;
}
