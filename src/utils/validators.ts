import { z } from "zod";
import { ValidationError } from "./errors";
import { ROLES, USERNAME_PATTERN } from "./types/Usertype";

/**
 * Parses untrusted input, turning schema failures into a ValidationError
 * listing each field.
 */
export const parseInput = <T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> => {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new ValidationError(details);
  }
  return parsed.data;
};

const queryInt = z
  .string()
  .regex(/^\d+$/, "must be a non-negative integer")
  .transform(Number)
  .optional();

export const pagingQuery = z.object({
  limit: queryInt,
  offset: queryInt,
  username: z.string().optional(),
});

export const idParam = z.object({
  id: z.string().regex(/^[1-9]\d*$/, "must be a positive integer").transform(Number),
});

export const usernameParam = z.object({
  username: z.string().regex(USERNAME_PATTERN, "invalid username"),
});

export const loginBody = z.object({
  username: z.string().min(1, "username is required"),
  password: z.string().min(1, "password is required"),
});

export const createApplicationBody = z.object({
  company: z.string({ required_error: "company is required" }),
  jobdescription: z.string().optional(),
  status: z.string().optional(),
  category: z.string().optional(),
});

export const updateApplicationBody = z.object({
  company: z.string().optional(),
  jobdescription: z.string().optional(),
  status: z.string().optional(),
  category: z.string().optional(),
});

export const createUserBody = z.object({
  username: z.string().regex(USERNAME_PATTERN, "may only contain letters, digits, '.', '_' and '-'"),
  password: z.string().min(1, "password is required"),
  role: z.enum(ROLES).default("user"),
});

// form posts send "" for fields left untouched
const blankAsUndefined = (value: unknown) => (value === "" ? undefined : value);

export const updateUserBody = z.object({
  password: z.preprocess(blankAsUndefined, z.string().optional()),
  role: z.preprocess(blankAsUndefined, z.enum(ROLES).optional()),
});
