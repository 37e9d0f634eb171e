/**
 * Error types surfaced by the wrapped report
 */

/**
 * Base class for every error the CLI knows how to report
 */
export class WrappedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "WrappedError";
  }
}

/**
 * Missing or malformed environment configuration
 */
export class ConfigurationError extends WrappedError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * Configured custom field names that do not exist in the Jira instance
 */
export class FieldResolutionError extends WrappedError {
  constructor(
    message: string,
    public readonly unknownFields: string[] = []
  ) {
    super(message);
    this.name = "FieldResolutionError";
  }
}

/**
 * Jira rejected the token (HTTP 401 or 403)
 */
export class AuthError extends WrappedError {
  constructor(
    message: string,
    public readonly status: number
  ) {
    super(message);
    this.name = "AuthError";
  }
}

/**
 * Any other failed Jira request. `status` is null when no response arrived.
 */
export class RequestError extends WrappedError {
  constructor(
    message: string,
    public readonly status: number | null,
    public readonly url: string
  ) {
    super(message);
    this.name = "RequestError";
  }
}

/**
 * Process exit code for an error raised during a run
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof AuthError) {
    return 2;
  }
  if (error instanceof RequestError) {
    return 3;
  }
  return 1;
}
