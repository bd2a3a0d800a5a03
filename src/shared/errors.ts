export class HttpError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string,
  ) {
    super(message);
  }
}

export class UnauthorizedError extends HttpError {
  constructor(message = "Unauthorized") {
    super(401, message);
  }
}

export class ForbiddenError extends HttpError {
  constructor(message = "Forbidden") {
    super(403, message);
  }
}

export class NotFoundError extends HttpError {
  constructor(message = "Not Found") {
    super(404, message);
  }
}

export type FieldErrors = Record<string, string[]>;

export class ValidationError extends Error {
  constructor(
    public readonly errors: FieldErrors,
    message = "Command validation failed",
  ) {
    super(message);
  }
}

export class BusinessRuleViolationError extends Error {
  constructor(
    public readonly code: string,
    public readonly detail: string,
  ) {
    super(`${code}: ${detail}`);
  }
}

export class ConfigurationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

export class ModuleInitializationError extends Error {
  constructor(
    public readonly moduleName: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Module ${moduleName} failed to initialize: ${reason}`, { cause });
  }
}
