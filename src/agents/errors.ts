import { z } from 'zod';

export class RetrievalError extends Error {
  constructor(
    public readonly url: string,
    reason: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(`Failed to retrieve document ${url}: ${reason}`, options);
    this.name = 'RetrievalError';
  }
}

export class ExtractionFailure extends Error {
  constructor(
    public readonly stage: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`${stage} extraction failed: ${reason}`, options);
    this.name = 'ExtractionFailure';
  }
}

export class SchemaValidationError extends ExtractionFailure {
  constructor(
    stage: string,
    public readonly validationErrors: z.ZodError
  ) {
    super(stage, `response did not match schema: ${formatValidationErrors(validationErrors)}`, {
      cause: validationErrors,
    });
    this.name = 'SchemaValidationError';
  }
}

export class TimeoutError extends ExtractionFailure {
  constructor(
    stage: string,
    public readonly timeoutMs: number
  ) {
    super(stage, `timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export class PersistenceFailure extends Error {
  constructor(
    public readonly operation: string,
    cause: unknown
  ) {
    super(
      `Failed to ${operation}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
    this.name = 'PersistenceFailure';
  }
}

export function formatValidationErrors(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}
