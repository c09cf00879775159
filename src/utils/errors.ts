/** Stable error kinds surfaced to REST and WebSocket clients */
export type ErrorKind =
  | 'NotFound'
  | 'ResourceBusy'
  | 'DependencyMissing'
  | 'ProcessStartFailure'
  | 'StreamFault'
  | 'InvalidRequest'
  | 'Conflict'
  | 'Unauthorized'
  | 'Internal';

export interface ErrorDetails {
  missing?: string[];
  installHint?: string;
  stage?: string;
  stderr?: string;
  resource?: string;
}

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  NotFound: 404,
  ResourceBusy: 409,
  DependencyMissing: 424,
  ProcessStartFailure: 500,
  StreamFault: 503,
  InvalidRequest: 400,
  Conflict: 409,
  Unauthorized: 401,
  Internal: 500,
};

const CODE_BY_KIND: Record<ErrorKind, string> = {
  NotFound: 'NOT_FOUND',
  ResourceBusy: 'RESOURCE_BUSY',
  DependencyMissing: 'DEPENDENCY_MISSING',
  ProcessStartFailure: 'PROCESS_START_FAILURE',
  StreamFault: 'STREAM_FAULT',
  InvalidRequest: 'INVALID_REQUEST',
  Conflict: 'CONFLICT',
  Unauthorized: 'UNAUTHORIZED',
  Internal: 'INTERNAL_ERROR',
};

export class AppError extends Error {
  readonly kind: ErrorKind;
  readonly code: string;
  readonly statusCode: number;
  readonly details?: ErrorDetails;

  constructor(kind: ErrorKind, message: string, details?: ErrorDetails) {
    super(message);
    this.name = 'AppError';
    this.kind = kind;
    this.code = CODE_BY_KIND[kind];
    this.statusCode = STATUS_BY_KIND[kind];
    this.details = details;
  }

  toJSON(): { error: string; code: string; kind: ErrorKind; details?: ErrorDetails } {
    return {
      error: this.message,
      code: this.code,
      kind: this.kind,
      ...(this.details ? { details: this.details } : {}),
    };
  }
}

export function notFound(message: string): AppError {
  return new AppError('NotFound', message);
}

export function invalidRequest(message: string): AppError {
  return new AppError('InvalidRequest', message);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Converts anything thrown inside a component into an AppError */
export function toAppError(err: unknown, fallback: ErrorKind = 'Internal'): AppError {
  if (err instanceof AppError) return err;
  return new AppError(fallback, errorMessage(err));
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
