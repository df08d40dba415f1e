export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "AppError";
  }
}

export function isAppError(error: unknown, code?: string): error is AppError {
  if (!(error instanceof AppError)) {
    return false;
  }
  return code === undefined || error.code === code;
}
