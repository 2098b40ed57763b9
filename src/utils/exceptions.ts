/**
 * Error codes for clients to distinguish between error types.
 */
export const ErrorCode = {
  // Generic errors
  UNKNOWN_ERROR: 'UNKNOWN_ERROR',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  EXTERNAL_API_ERROR: 'EXTERNAL_API_ERROR',

  // Yahoo account / league errors
  YAHOO_AUTH_REQUIRED: 'YAHOO_AUTH_REQUIRED',
  TEAM_NOT_FOUND: 'TEAM_NOT_FOUND',

  // Lineup requests
  INVALID_STRATEGY: 'INVALID_STRATEGY',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base class for application exceptions
 */
export class AppException extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly errorCode: ErrorCodeType = ErrorCode.UNKNOWN_ERROR
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Thrown when validation fails
 */
export class ValidationException extends AppException {
  constructor(message: string, errorCode: ErrorCodeType = ErrorCode.VALIDATION_ERROR) {
    super(message, 400, errorCode);
  }
}

/**
 * Thrown when a strategy name is not one of balanced/floor/ceiling
 */
export class InvalidStrategyException extends ValidationException {
  constructor(strategy: unknown) {
    super(
      `Invalid strategy "${String(strategy)}". Expected one of: balanced, floor, ceiling`,
      ErrorCode.INVALID_STRATEGY
    );
  }
}

/**
 * Thrown when resource is not found
 */
export class NotFoundException extends AppException {
  constructor(message: string, errorCode: ErrorCodeType = ErrorCode.NOT_FOUND) {
    super(message, 404, errorCode);
  }
}

/**
 * Thrown when Yahoo credentials are missing or can no longer be refreshed.
 * The fix is always to re-run the auth setup script.
 */
export class YahooAuthException extends AppException {
  constructor(message: string) {
    super(message, 401, ErrorCode.YAHOO_AUTH_REQUIRED);
  }
}

/**
 * Thrown when an external API call fails (e.g., Yahoo, Sleeper).
 * Wraps the original error and provides context about the API and operation.
 */
export class ExternalApiException extends AppException {
  public readonly originalError?: Error;
  public readonly apiName: string;
  public readonly operation: string;

  constructor(
    apiName: string,
    operation: string,
    message: string,
    statusCode: number = 502,
    originalError?: Error
  ) {
    super(`[${apiName}] ${operation}: ${message}`, statusCode, ErrorCode.EXTERNAL_API_ERROR);
    this.apiName = apiName;
    this.operation = operation;
    this.originalError = originalError;
  }

  /**
   * Creates an ExternalApiException from a caught error.
   */
  static fromError(
    apiName: string,
    operation: string,
    error: unknown,
    statusCode: number = 502
  ): ExternalApiException {
    const originalError = error instanceof Error ? error : new Error(String(error));
    const message = originalError.message || 'Unknown error';
    return new ExternalApiException(apiName, operation, message, statusCode, originalError);
  }

  /**
   * Creates an ExternalApiException for timeout errors.
   */
  static timeout(apiName: string, operation: string): ExternalApiException {
    return new ExternalApiException(
      apiName,
      operation,
      'Request timed out',
      504,
      new Error('Timeout')
    );
  }

  /**
   * Creates an ExternalApiException for rate limit errors.
   */
  static rateLimited(apiName: string, operation: string): ExternalApiException {
    return new ExternalApiException(
      apiName,
      operation,
      'Rate limit exceeded',
      429,
      new Error('Rate limited')
    );
  }
}

export const LineupErrors = {
  teamNotFound: (leagueKey: string) =>
    new NotFoundException(
      `Could not find your team in league ${leagueKey}`,
      ErrorCode.TEAM_NOT_FOUND
    ),
  credentialsMissing: () =>
    new YahooAuthException(
      'Yahoo credentials are not configured. Run `npm run auth:setup` first.'
    ),
  refreshFailed: (reason: string) =>
    new YahooAuthException(
      `Yahoo token refresh failed (${reason}). Run \`npm run auth:setup\` to re-authenticate.`
    ),
};
