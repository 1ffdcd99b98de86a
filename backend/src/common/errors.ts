/**
 * Application Errors
 *
 * Base error carried through the Fastify error handler.
 * Every domain error extends AppError so the handler can render
 * `{ ok: false, error, message }` with the right status code.
 */

export class AppError extends Error {
  readonly code: string;
  readonly statusCode: number;

  constructor(code: string, message: string, statusCode = 500) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class ValidationError extends AppError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('VALIDATION_ERROR', message, 400);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}
