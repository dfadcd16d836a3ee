/**
 * Custom Error Classes
 * ====================
 * Every failure in a sync run is one of these. All of them are terminal for
 * the run.
 */

export type ErrorContext = Record<string, unknown>;

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: ErrorContext;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string = 'APP_ERROR',
    statusCode: number = 500,
    context?: ErrorContext,
    isOperational: boolean = true,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = context;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      context: this.context,
      isOperational: this.isOperational,
      stack: this.stack,
    };
  }
}

/**
 * Validation error - for input validation failures
 */
export class ValidationError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'VALIDATION_ERROR', 400, context);
  }
}

/**
 * Configuration error - for missing or invalid settings
 */
export class ConfigurationError extends AppError {
  constructor(message: string, configKey?: string, context?: ErrorContext) {
    super(message, 'CONFIGURATION_ERROR', 500, { configKey, ...context });
  }
}

/**
 * Fetch error - network failure, timeout, non-2xx status, or a response
 * that is not a series payload at all
 */
export class FetchError extends AppError {
  public readonly apiName?: string;
  public readonly apiStatusCode?: number;

  constructor(
    message: string,
    apiName?: string,
    apiStatusCode?: number,
    context?: ErrorContext,
    cause?: unknown
  ) {
    super(message, 'FETCH_ERROR', 502, { apiName, apiStatusCode, ...context }, true, { cause });
    this.apiName = apiName;
    this.apiStatusCode = apiStatusCode;
  }
}

/**
 * Parse error - a provider record is missing its date or value, or holds
 * one that cannot be coerced
 */
export class ParseError extends AppError {
  public readonly recordIndex?: number;

  constructor(message: string, recordIndex?: number, context?: ErrorContext) {
    super(message, 'PARSE_ERROR', 422, { recordIndex, ...context });
    this.recordIndex = recordIndex;
  }
}

/**
 * Persist error - the local cache file could not be written
 */
export class PersistError extends AppError {
  public readonly path: string;

  constructor(message: string, path: string, context?: ErrorContext, cause?: unknown) {
    super(message, 'PERSIST_ERROR', 500, { path, ...context }, true, { cause });
    this.path = path;
  }
}

/**
 * Sheet access error - credentials, sharing or a failed read
 */
export class SheetAccessError extends AppError {
  public readonly spreadsheetId?: string;
  public readonly apiStatusCode?: number;

  constructor(
    message: string,
    spreadsheetId?: string,
    apiStatusCode?: number,
    context?: ErrorContext,
    cause?: unknown
  ) {
    super(message, 'SHEET_ACCESS_ERROR', 403, { spreadsheetId, apiStatusCode, ...context }, true, {
      cause,
    });
    this.spreadsheetId = spreadsheetId;
    this.apiStatusCode = apiStatusCode;
  }
}

/**
 * Sheet write error - the Sheets API rejected a write (quota, bad range)
 */
export class SheetWriteError extends AppError {
  public readonly spreadsheetId?: string;
  public readonly apiStatusCode?: number;
  public readonly range?: string;

  constructor(
    message: string,
    spreadsheetId?: string,
    apiStatusCode?: number,
    range?: string,
    context?: ErrorContext,
    cause?: unknown
  ) {
    super(
      message,
      'SHEET_WRITE_ERROR',
      502,
      { spreadsheetId, apiStatusCode, range, ...context },
      true,
      { cause }
    );
    this.spreadsheetId = spreadsheetId;
    this.apiStatusCode = apiStatusCode;
    this.range = range;
  }
}
