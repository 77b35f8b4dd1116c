// Request schemas shared by the HTTP routes and the CLI.

import { z } from "zod";
import { ValidationError } from "./errors.js";
import { STATUSES } from "./tasks/types.js";
import { ROLES } from "./users/types.js";

export const MAX_TITLE_LENGTH = 200;
export const MAX_DESCRIPTION_LENGTH = 5000;
export const MAX_USERNAME_LENGTH = 64;

const DEADLINE_REGEX =
  /^\d{4}-\d{2}-\d{2}(T\d{2}:\d{2}(:\d{2}(\.\d{1,3})?)?(Z|[+-]\d{2}:\d{2})?)?$/;

export function sanitizeTitle(title: string): string {
  return title.replace(/[\r\n]+/g, " ").trim();
}

/**
 * Parse a deadline into a canonical UTC ISO string. Timestamps without an
 * offset are read as UTC; a bare date means midnight UTC.
 */
export function normalizeDeadline(value: string): string | null {
  const trimmed = value.trim();
  if (!DEADLINE_REGEX.test(trimmed)) {
    return null;
  }
  const hasOffset = /(Z|[+-]\d{2}:\d{2})$/.test(trimmed);
  const withZone = trimmed.includes("T") && !hasOffset ? `${trimmed}Z` : trimmed;
  const date = new Date(withZone);
  if (Number.isNaN(date.getTime())) {
    return null;
  }
  return date.toISOString();
}

export const titleSchema = z
  .string({ required_error: "Title is required." })
  .transform(sanitizeTitle)
  .pipe(
    z
      .string()
      .min(1, "Title is required.")
      .max(MAX_TITLE_LENGTH, `Title exceeds maximum length of ${MAX_TITLE_LENGTH} characters.`),
  );

export const descriptionSchema = z
  .string()
  .max(
    MAX_DESCRIPTION_LENGTH,
    `Description exceeds maximum length of ${MAX_DESCRIPTION_LENGTH} characters.`,
  );

export const assigneeSchema = z
  .string({ required_error: "Assignee is required." })
  .trim()
  .min(1, "Assignee is required.");

export const deadlineSchema = z
  .string({ required_error: "Deadline is required." })
  .transform((value, ctx) => {
    const normalized = normalizeDeadline(value);
    if (normalized === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "Invalid deadline. Expected an ISO 8601 date or timestamp.",
      });
      return z.NEVER;
    }
    return normalized;
  });

export const statusSchema = z.enum(STATUSES, {
  errorMap: () => ({ message: `Invalid status. Expected one of: ${STATUSES.join(", ")}.` }),
});

export const createTaskSchema = z.object({
  title: titleSchema,
  description: descriptionSchema.optional(),
  assignee: assigneeSchema,
  deadline: deadlineSchema,
});

export const updateTaskSchema = z
  .object({
    title: titleSchema.optional(),
    description: descriptionSchema.optional(),
    assignee: assigneeSchema.optional(),
    status: statusSchema.optional(),
    deadline: deadlineSchema.optional(),
  })
  .refine((fields) => Object.values(fields).some((v) => v !== undefined), "No fields to update.");

export const taskFilterSchema = z.object({
  status: statusSchema.optional(),
  assignee: z.string().min(1).optional(),
});

export const createUserSchema = z.object({
  username: z
    .string({ required_error: "Username is required." })
    .trim()
    .min(1, "Username is required.")
    .max(MAX_USERNAME_LENGTH, `Username exceeds maximum length of ${MAX_USERNAME_LENGTH} characters.`)
    .regex(/^[A-Za-z0-9._-]+$/, "Username may only contain letters, digits, '.', '_' and '-'."),
  email: z.string({ required_error: "Email is required." }).trim().email("Invalid email address."),
  role: z.enum(ROLES, { errorMap: () => ({ message: "Role must be admin or member." }) }).optional(),
});

/** Validate `input` against `schema`, raising the first issue as a ValidationError. */
export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ValidationError(issue ? issue.message : "Invalid input.");
  }
  return result.data;
}
