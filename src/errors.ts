export enum ErrorCode {
  BACKEND_UNAVAILABLE = "BACKEND_UNAVAILABLE",
  SCHEMA_VIOLATION = "SCHEMA_VIOLATION",
  RENDER_FAILURE = "RENDER_FAILURE",
  INVALID_INPUT = "INVALID_INPUT",
}

export class SeoPipelineError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The model service cannot be reached, or the requested model is not there. */
export class BackendUnavailableError extends SeoPipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.BACKEND_UNAVAILABLE, message, options);
  }
}

export class SchemaViolationError extends SeoPipelineError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
    options?: { cause?: unknown }
  ) {
    super(ErrorCode.SCHEMA_VIOLATION, message, options);
  }
}

export class RenderFailureError extends SeoPipelineError {
  constructor(
    public readonly tier: "remote" | "local",
    message: string,
    options?: { cause?: unknown }
  ) {
    super(ErrorCode.RENDER_FAILURE, message, options);
  }
}

/** The only error the public API lets through: there is nothing to analyze. */
export class InvalidInputError extends SeoPipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.INVALID_INPUT, message, options);
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
