import type { z } from "zod";

import type { FieldErrors } from "./errors.js";

import { ValidationError } from "./errors.js";

export function toFieldErrors(error: z.ZodError): FieldErrors {
  const errors: FieldErrors = {};
  for (const issue of error.issues) {
    const field = issue.path.join(".");
    (errors[field] ??= []).push(issue.message);
  }
  return errors;
}

export function parseCommand<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(toFieldErrors(parsed.error));
  }
  return parsed.data;
}
