import { z } from "zod";
import { ValidationError } from "./errors";

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export const emailAddress = z
  .string()
  .trim()
  .regex(EMAIL_PATTERN, "must be a valid email address");

/** YYYY-MM-DD that is also a real calendar date. */
export const calendarDate = z
  .string()
  .trim()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "must be a date in YYYY-MM-DD format")
  .refine((value) => {
    const parsed = new Date(`${value}T00:00:00Z`);
    return (
      !Number.isNaN(parsed.getTime()) &&
      parsed.toISOString().slice(0, 10) === value
    );
  }, "is not a valid calendar date");

/** Blank strings become undefined so optional columns stay NULL. */
export const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0
      ? `${issue.path.join(".")} ${issue.message}`
      : issue.message
  );
}

/**
 * Parse `input` with `schema`, raising a ValidationError that names
 * `subject` when it does not conform.
 */
export function parseInput<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  subject: string
): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(`Invalid ${subject}`, describeIssues(result.error));
  }
  return result.data;
}
