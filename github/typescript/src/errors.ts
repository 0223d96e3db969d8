/**
 * Error types for the GitHub Projects client.
 * @module errors
 */

/**
 * Error kinds for categorizing GitHub errors.
 */
export enum GitHubErrorKind {
  // Configuration errors
  /** Missing authentication configuration. */
  MissingAuth = 'missing_auth',
  /** Invalid base URL. */
  InvalidBaseUrl = 'invalid_base_url',
  /** Invalid GitHub App credentials. */
  InvalidAppCredentials = 'invalid_app_credentials',
  /** Invalid configuration. */
  InvalidConfiguration = 'invalid_configuration',

  // Authentication errors
  /** Bad credentials. */
  BadCredentials = 'bad_credentials',
  /** GitHub App authentication failed. */
  AppAuthenticationFailed = 'app_auth_failed',

  // Authorization errors
  /** Access forbidden. */
  Forbidden = 'forbidden',

  // Request errors
  /** Request validation failed. */
  ValidationError = 'validation_error',
  /** Invalid parameter. */
  InvalidParameter = 'invalid_parameter',
  /** Unprocessable entity (422). */
  UnprocessableEntity = 'unprocessable_entity',

  // Resource errors
  /** Resource not found (404). */
  NotFound = 'not_found',
  /** Resource is gone (410). */
  Gone = 'gone',
  /** Resource conflict (409). */
  Conflict = 'conflict',

  // Rate limit errors
  /** Primary rate limit exceeded. */
  PrimaryRateLimitExceeded = 'primary_rate_limit_exceeded',
  /** Secondary rate limit exceeded. */
  SecondaryRateLimitExceeded = 'secondary_rate_limit_exceeded',

  // Network errors
  /** Connection failed. */
  ConnectionFailed = 'connection_failed',
  /** Request timeout. */
  Timeout = 'timeout',

  // Server errors
  /** Internal server error (500). */
  InternalError = 'internal_error',
  /** Bad gateway (502). */
  BadGateway = 'bad_gateway',
  /** Service unavailable (503). */
  ServiceUnavailable = 'service_unavailable',

  // Response errors
  /** Failed to deserialize response. */
  DeserializationError = 'deserialization_error',
  /** Unexpected response format. */
  UnexpectedFormat = 'unexpected_format',

  // GraphQL errors
  /** GraphQL query error. */
  QueryError = 'query_error',

  // Generic
  /** Unknown error. */
  Unknown = 'unknown',
}

/**
 * Returns the error kind matching a serialized value, or `Unknown`.
 */
export function parseErrorKind(value: string | undefined): GitHubErrorKind {
  return Object.values(GitHubErrorKind).find((kind) => kind === value) ?? GitHubErrorKind.Unknown;
}

/**
 * GitHub API error with detailed information.
 */
export class GitHubError extends Error {
  /** Error kind. */
  public readonly kind: GitHubErrorKind;
  /** HTTP status code. */
  public readonly statusCode?: number;
  /** GitHub request ID. */
  public readonly requestId?: string;
  /** Documentation URL. */
  public readonly documentationUrl?: string;

  constructor(
    kind: GitHubErrorKind,
    message: string,
    options?: {
      statusCode?: number;
      requestId?: string;
      documentationUrl?: string;
      cause?: Error;
    }
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'GitHubError';
    this.kind = kind;
    this.statusCode = options?.statusCode;
    this.requestId = options?.requestId;
    this.documentationUrl = options?.documentationUrl;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GitHubError);
    }
  }

  /**
   * Creates an error from an HTTP status code and GitHub error response.
   */
  static fromResponse(
    status: number,
    message: string,
    options?: {
      documentationUrl?: string;
      requestId?: string;
    }
  ): GitHubError {
    const kind = GitHubError.kindFromStatus(status, message);
    return new GitHubError(kind, message, {
      statusCode: status,
      documentationUrl: options?.documentationUrl,
      requestId: options?.requestId,
    });
  }

  /**
   * Maps HTTP status code to error kind.
   */
  private static kindFromStatus(status: number, message: string): GitHubErrorKind {
    switch (status) {
      case 400:
        return GitHubErrorKind.ValidationError;
      case 401:
        return GitHubErrorKind.BadCredentials;
      case 403:
        return message.toLowerCase().includes('rate limit')
          ? GitHubErrorKind.PrimaryRateLimitExceeded
          : GitHubErrorKind.Forbidden;
      case 404:
        return GitHubErrorKind.NotFound;
      case 409:
        return GitHubErrorKind.Conflict;
      case 410:
        return GitHubErrorKind.Gone;
      case 422:
        return GitHubErrorKind.UnprocessableEntity;
      case 429:
        return GitHubErrorKind.SecondaryRateLimitExceeded;
      case 500:
        return GitHubErrorKind.InternalError;
      case 502:
        return GitHubErrorKind.BadGateway;
      case 503:
        return GitHubErrorKind.ServiceUnavailable;
      default:
        return GitHubErrorKind.Unknown;
    }
  }

  // Convenience factory methods

  /**
   * Creates a configuration error.
   */
  static configuration(message: string): GitHubError {
    return new GitHubError(GitHubErrorKind.InvalidConfiguration, message);
  }

  /**
   * Creates a not found error.
   */
  static notFound(message: string): GitHubError {
    return new GitHubError(GitHubErrorKind.NotFound, message, {
      statusCode: 404,
    });
  }

  /**
   * Creates an invalid parameter error.
   */
  static invalidParameter(message: string): GitHubError {
    return new GitHubError(GitHubErrorKind.InvalidParameter, message);
  }

  /**
   * Creates a timeout error.
   */
  static timeout(message: string): GitHubError {
    return new GitHubError(GitHubErrorKind.Timeout, message);
  }

  /**
   * Creates a connection error.
   */
  static connection(message: string, cause?: Error): GitHubError {
    return new GitHubError(GitHubErrorKind.ConnectionFailed, message, { cause });
  }

  /**
   * Creates a deserialization error.
   */
  static deserialization(message: string): GitHubError {
    return new GitHubError(GitHubErrorKind.DeserializationError, message);
  }

  /**
   * Creates a GraphQL query error.
   */
  static query(message: string): GitHubError {
    return new GitHubError(GitHubErrorKind.QueryError, `GraphQL error: ${message}`);
  }

  /**
   * Formats the error for display.
   */
  toString(): string {
    let result = `[${this.kind}] ${this.message}`;
    if (this.statusCode) {
      result += ` (HTTP ${this.statusCode})`;
    }
    if (this.requestId) {
      result += ` [request_id: ${this.requestId}]`;
    }
    return result;
  }
}

/**
 * Type guard for GitHubError.
 */
export function isGitHubError(error: unknown): error is GitHubError {
  return error instanceof GitHubError;
}
