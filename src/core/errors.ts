/**
 * Base error class for all service errors.
 * Extends Error with a machine-readable code, HTTP status, and structured context.
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;
  public readonly isOperational: boolean;

  constructor(params: {
    message: string;
    code: string;
    statusCode?: number;
    cause?: Error;
    context?: Record<string, unknown>;
    isOperational?: boolean;
  }) {
    super(params.message, { cause: params.cause });
    this.name = 'AppError';
    this.code = params.code;
    this.statusCode = params.statusCode ?? 500;
    this.context = params.context;
    this.isOperational = params.isOperational ?? true;
  }
}

/** Thrown when input validation (Zod or domain rules) fails. */
export class ValidationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'VALIDATION_ERROR',
      statusCode: 400,
      context,
    });
    this.name = 'ValidationError';
  }
}

/** Thrown when a requested resource does not exist. */
export class NotFoundError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'NOT_FOUND',
      statusCode: 404,
      context,
    });
    this.name = 'NotFoundError';
  }
}

/** Thrown when environment or file configuration is missing or inconsistent. */
export class ConfigError extends AppError {
  constructor(message: string, context?: Record<string, unknown>, code = 'CONFIG_ERROR') {
    super({
      message,
      code,
      statusCode: 500,
      context,
      isOperational: false,
    });
    this.name = 'ConfigError';
  }
}

/** Thrown when the relational store cannot be reached within the allowed attempts. */
export class StoreUnavailableError extends AppError {
  constructor(attempts: number, cause?: Error) {
    super({
      message: `Store unreachable after ${attempts} attempt(s)`,
      code: 'STORE_UNAVAILABLE',
      statusCode: 503,
      cause,
      context: { attempts },
    });
    this.name = 'StoreUnavailableError';
  }
}

/** Thrown when the broker cannot be reached (only surfaced when a retry budget is set). */
export class BrokerUnavailableError extends AppError {
  constructor(attempts: number, cause?: Error) {
    super({
      message: `Broker unreachable after ${attempts} attempt(s)`,
      code: 'BROKER_UNAVAILABLE',
      statusCode: 503,
      cause,
      context: { attempts },
    });
    this.name = 'BrokerUnavailableError';
  }
}

/** Thrown when a schema migration cannot be applied. */
export class MigrationError extends AppError {
  constructor(
    message: string,
    params: { migrationId?: string; code?: string; cause?: Error } = {},
  ) {
    super({
      message,
      code: params.code ?? 'MIGRATION_FAILED',
      statusCode: 500,
      cause: params.cause,
      context: params.migrationId ? { migrationId: params.migrationId } : undefined,
      isOperational: false,
    });
    this.name = 'MigrationError';
  }
}

/** Thrown when a SPIMEX bulletin download fails for a reason other than "no bulletin". */
export class BulletinDownloadError extends AppError {
  constructor(url: string, message: string, cause?: Error) {
    super({
      message: `Bulletin download failed (${url}): ${message}`,
      code: 'BULLETIN_DOWNLOAD_FAILED',
      statusCode: 502,
      cause,
      context: { url },
    });
    this.name = 'BulletinDownloadError';
  }
}

/** Normalise an unknown thrown value into an Error. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
