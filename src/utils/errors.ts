/**
 * Error types shared by the solver and the HTTP layer.
 * The error middleware maps `statusCode` and `code` onto the JSON error body.
 */

export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly details?: unknown;
  readonly isOperational: boolean;

  constructor(message: string, options: { statusCode?: number; code?: string; details?: unknown; isOperational?: boolean } = {}) {
    super(message);
    this.name = new.target.name;
    this.statusCode = options.statusCode ?? 500;
    this.code = options.code ?? (this.statusCode >= 500 ? 'INTERNAL_SERVER_ERROR' : 'BAD_REQUEST');
    this.details = options.details;
    this.isOperational = options.isOperational ?? this.statusCode < 500;
  }
}

/**
 * Malformed weekly time description (course `Dates` or busy schedule)
 */
export class FormatError extends AppError {
  constructor(message: string, details: { entry: string; source: string }) {
    super(message, { statusCode: 400, code: 'FORMAT_ERROR', details });
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, { statusCode: 400, code: 'VALIDATION_ERROR', details });
  }
}

export class CatalogUnavailableError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, { statusCode: 503, code: 'CATALOG_UNAVAILABLE', details, isOperational: true });
  }
}
