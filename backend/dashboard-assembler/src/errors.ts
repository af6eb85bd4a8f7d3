/**
 * Request-terminal errors. Each maps to one HTTP status in app.ts.
 */

export class PayloadParseError extends Error {
  readonly statusCode = 400;

  constructor(message: string) {
    super(message);
    this.name = "PayloadParseError";
  }
}

export class PayloadValidationError extends Error {
  readonly statusCode = 422;

  constructor(readonly issues: string[]) {
    super("Payload validation failed:\n- " + issues.join("\n- "));
    this.name = "PayloadValidationError";
  }
}

export class AssemblyError extends Error {
  readonly statusCode = 500;

  constructor(message: string) {
    super(message);
    this.name = "AssemblyError";
  }
}

export class TemplateExtractionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TemplateExtractionError";
  }
}

export type DashboardRequestError = PayloadParseError | PayloadValidationError | AssemblyError;

export function isDashboardRequestError(e: unknown): e is DashboardRequestError {
  return e instanceof PayloadParseError || e instanceof PayloadValidationError || e instanceof AssemblyError;
}
