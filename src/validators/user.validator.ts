import { z } from "zod";
import { idSchema } from "./common.validator";

const username = z
  .string({ required_error: "username is required" })
  .trim()
  .min(1, "username is required")
  .max(100, "username must be at most 100 characters");

const email = z
  .string({ required_error: "email is required" })
  .trim()
  .toLowerCase()
  .email("email must be a valid email address")
  .max(255, "email must be at most 255 characters");

const age = z
  .number({ invalid_type_error: "age must be a number" })
  .int("age must be an integer")
  .min(0, "age must not be negative")
  .max(150, "age is out of range");

const heightCm = z
  .number({ invalid_type_error: "heightCm must be a number" })
  .positive("heightCm must be positive")
  .max(300, "heightCm is out of range");

export const createUserBody = z.object({
  username,
  email,
  age: age.nullable().optional(),
  heightCm: heightCm.nullable().optional(),
});

export const updateUserBody = z
  .object({
    username: username.optional(),
    email: email.optional(),
    age: age.nullable().optional(),
    heightCm: heightCm.nullable().optional(),
  })
  .refine((body) => Object.values(body).some((v) => v !== undefined), {
    message: "at least one field must be provided",
  });

export const deleteUserQuery = z.object({
  cascade: z
    .enum(["true", "false"])
    .optional()
    .transform((v) => v === "true"),
});

export type CreateUserInput = z.input<typeof createUserBody>;
export type UpdateUserInput = z.input<typeof updateUserBody>;

export const createUserSchema = { body: createUserBody };
export const updateUserSchema = {
  params: z.object({ id: idSchema }),
  body: updateUserBody,
};
// the cascade flag is read by the handler, since its transform is not idempotent
export const deleteUserSchema = {
  params: z.object({ id: idSchema }),
};
