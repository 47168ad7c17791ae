/**
 * @file packages/gateway/src/domain/errors/app-error.ts
 * @description Error types translated into HTTP responses by the API layer.
 */

/**
 * Error with an HTTP status. Operational errors are expected failures
 * (bad input, missing resources); everything else is a programming error.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly isOperational: boolean = true,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * A generation, speech or action backend failed or is not configured.
 */
export class BackendError extends AppError {
  constructor(
    message: string,
    public readonly backend: string,
  ) {
    super(message, 502);
    this.name = 'BackendError';
  }
}

/**
 * Extracts a printable message from anything thrown.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
