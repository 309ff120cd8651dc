export interface AppErrorOptions {
  message: string;
  code: string;
  /** Whether the pipeline can continue with degraded output after this error. */
  recoverable?: boolean;
  isOperational?: boolean;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class AppError extends Error {
  public readonly code: string;
  public readonly recoverable: boolean;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;

  constructor({
    message,
    code,
    recoverable = false,
    isOperational = true,
    details,
    cause,
  }: AppErrorOptions) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.code = code;
    this.recoverable = recoverable;
    this.isOperational = isOperational;
    this.details = details;

    // Restore prototype chain (necessary when extending built-ins in TS)
    Object.setPrototypeOf(this, new.target.prototype);

    Error.captureStackTrace(this, this.constructor);
  }

  static isAppError(err: unknown): err is AppError {
    return err instanceof AppError;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  return String(err);
}

/**
 * Convert anything thrown by a collaborator into the taxonomy. AppErrors pass
 * through untouched so the innermost classification wins.
 */
export function toAppError(
  err: unknown,
  wrap: (message: string, cause: unknown) => AppError,
): AppError {
  if (AppError.isAppError(err)) return err;
  return wrap(errorMessage(err), err);
}
