import { STATUS_CODES } from "node:http";

import type { Logger } from "../platform/logger.js";
import type { FieldErrors } from "../shared/errors.js";

import { BusinessRuleViolationError, HttpError, ValidationError } from "../shared/errors.js";

export const PROBLEM_CONTENT_TYPE = "application/problem+json";

export interface ProblemPayload {
  type: string;
  title: string;
  status: number;
  detail: string;
  instance: string;
  errors?: FieldErrors;
  code?: string;
}

type ErrorKind<E extends Error> = abstract new (...args: never[]) => E;

/** Returning null passes the error on to the next registered mapping. */
export type ProblemFactory<E extends Error> = (error: E, instance: string) => ProblemPayload | null;

type Mapping = (error: unknown, instance: string) => ProblemPayload | null;

function statusTitle(status: number): string {
  return STATUS_CODES[status] ?? "Error";
}

export class ErrorMapper {
  private readonly mappings: Mapping[] = [];

  constructor(private readonly logger: Logger) {}

  /** Later registrations are consulted first. */
  map<E extends Error>(kind: ErrorKind<E>, factory: ProblemFactory<E>): this {
    this.mappings.unshift((error, instance) => (error instanceof kind ? factory(error, instance) : null));
    return this;
  }

  toProblem(error: unknown, instance: string): ProblemPayload {
    for (const mapping of this.mappings) {
      const problem = mapping(error, instance);
      if (problem) {
        return problem;
      }
    }

    this.logger.error({ err: error, instance }, "Unhandled error");
    return {
      type: "about:blank",
      title: statusTitle(500),
      status: 500,
      detail: "An unexpected error occurred.",
      instance,
    };
  }
}

function clientErrorStatus(error: Error): number | null {
  if (!("statusCode" in error) || typeof error.statusCode !== "number") {
    return null;
  }
  return error.statusCode >= 400 && error.statusCode < 500 ? error.statusCode : null;
}

export function createErrorMapper(logger: Logger): ErrorMapper {
  return new ErrorMapper(logger)
    .map(Error, (error, instance) => {
      const status = clientErrorStatus(error);
      if (status === null) {
        return null;
      }
      return { type: "about:blank", title: statusTitle(status), status, detail: error.message, instance };
    })
    .map(HttpError, (error, instance) => {
      if (error.statusCode >= 500) {
        return null;
      }
      return {
        type: "about:blank",
        title: statusTitle(error.statusCode),
        status: error.statusCode,
        detail: error.message,
        instance,
      };
    })
    .map(ValidationError, (error, instance) => ({
      type: "/problems/validation-error",
      title: "Command validation error",
      status: 400,
      detail: error.message,
      instance,
      errors: error.errors,
    }))
    .map(BusinessRuleViolationError, (error, instance) => ({
      type: "/problems/business-rule-violation",
      title: "Business rule broken",
      status: 409,
      detail: error.detail,
      instance,
      code: error.code,
    }));
}
