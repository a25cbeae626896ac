export class AppError extends Error {
  constructor(
    public statusCode: number,
    public code: string,
    message: string,
    public details?: unknown
  ) {
    super(message);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(400, 'VALIDATION_ERROR', message, details);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(404, 'NOT_FOUND', `${resource} not found`);
  }
}

/** A required sheet or column is absent; nothing is loaded. */
export class SchemaError extends AppError {
  constructor(
    message: string,
    public missing: { sheets: string[]; columns: Record<string, string[]> },
  ) {
    super(422, 'SCHEMA_ERROR', message, missing);
  }
}

/** A row that cannot be turned into a service record. */
export class NormalizationError extends AppError {
  constructor(
    message: string,
    public row: number,
    public column: string | null = null,
  ) {
    super(422, 'NORMALIZATION_ERROR', message, { row, column });
  }
}
