/**
 * Error types for OpsBridge operations
 *
 * Invariants:
 * - Validation errors are raised before any network call
 * - ApiError always carries the attempted URI
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all OpsBridge errors
 */
export abstract class OpsBridgeError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a required credential is neither in the environment nor supplied interactively
 */
export class MissingCredentialError extends OpsBridgeError {
  readonly code = "E_CREDENTIAL";

  constructor(
    public readonly service: string,
    public readonly variable: string,
    options?: ErrorOptions
  ) {
    super(`Missing ${service} credential: set ${variable} or enter it when prompted`, options);
  }
}

/**
 * Thrown when an action is invoked without one of its required parameters
 */
export class MissingParameterError extends OpsBridgeError {
  readonly code: string = "E_MISSING_PARAM";

  constructor(
    public readonly parameter: string,
    public readonly action: string,
    options?: ErrorOptions
  ) {
    super(`Missing required parameter "${parameter}" for action "${action}"`, options);
  }
}

/**
 * Thrown when an action needs a positional key (index name, issue key, object type) and none was given
 */
export class MissingPrimaryKeyError extends MissingParameterError {
  override readonly code = "E_MISSING_KEY";
}

/**
 * Thrown when a parameter is present but does not have the expected shape
 */
export class InvalidParameterError extends OpsBridgeError {
  readonly code = "E_INVALID_PARAM";

  constructor(
    public readonly parameter: string,
    public readonly action: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Invalid parameter "${parameter}" for action "${action}": ${reason}`, options);
  }
}

/**
 * Thrown when an action name is not part of a tool's catalog
 */
export class UnsupportedActionError extends OpsBridgeError {
  readonly code = "E_UNSUPPORTED_ACTION";

  constructor(
    public readonly action: string,
    public readonly supported: readonly string[],
    options?: ErrorOptions
  ) {
    super(`Unsupported action "${action}". Supported actions: ${supported.join(", ")}`, options);
  }
}

/**
 * Thrown when a CRM object type is not one of the supported types
 */
export class UnsupportedObjectTypeError extends OpsBridgeError {
  readonly code = "E_UNSUPPORTED_TYPE";

  constructor(
    public readonly objectType: string,
    public readonly supported: readonly string[],
    options?: ErrorOptions
  ) {
    super(
      `Unsupported object type "${objectType}". Supported types: ${supported.join(", ")}`,
      options
    );
  }
}

/**
 * Thrown when a requested workflow transition is not among the legal ones
 */
export class AmbiguousMatchError extends OpsBridgeError {
  readonly code = "E_NO_MATCH";

  constructor(
    public readonly requested: string,
    public readonly available: readonly string[],
    options?: ErrorOptions
  ) {
    const listed = available.length > 0 ? available.join(", ") : "(none)";
    super(`No transition named "${requested}". Available transitions: ${listed}`, options);
  }
}

/**
 * Thrown when a successful response does not have the shape a derived view needs
 */
export class UnexpectedResponseError extends OpsBridgeError {
  readonly code = "E_RESPONSE_SHAPE";

  constructor(uri: string, reason: string, options?: ErrorOptions) {
    super(`Unexpected response from ${uri}: ${reason}`, options);
  }
}

/**
 * Thrown on a non-2xx response or a transport failure
 */
export class ApiError extends OpsBridgeError {
  readonly code = "E_API";
  readonly statusCode?: number;
  readonly method: string;
  readonly uri: string;
  readonly rawBody?: string;

  constructor(
    input: { method: string; uri: string; statusCode?: number; rawBody?: string; reason?: string },
    options?: ErrorOptions
  ) {
    const outcome =
      input.statusCode !== undefined
        ? `failed with HTTP ${input.statusCode}`
        : `failed: ${input.reason ?? "transport error"}`;
    super(`${input.method} ${input.uri} ${outcome}`, options);
    this.method = input.method;
    this.uri = input.uri;
    this.statusCode = input.statusCode;
    this.rawBody = input.rawBody;
  }
}
