import { ClientError } from "graphql-request";

export class SdkError extends Error {
  /** Whether the operation that raised this error may be attempted again. */
  readonly retryable: boolean = false;

  constructor(
    public readonly code: number,
    message: string,
    public readonly details?: unknown,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;

    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      details: this.details,
      stack: this.stack,
    };
  }
}

export interface GraphQLErrorDetail {
  message: string;
  path?: ReadonlyArray<string | number>;
  extensions?: Record<string, unknown>;
}

export class InvalidQueryError extends SdkError {
  constructor(message: string, cause?: unknown) {
    super(1000, `Invalid GraphQL document: ${message}`, undefined, { cause });
  }
}

export class GraphQLConnectionError extends SdkError {
  override readonly retryable = true;

  constructor(endpoint: string, cause?: unknown) {
    super(1100, `Failed to connect to GraphQL endpoint: ${endpoint}`, { endpoint }, { cause });
  }
}

/**
 * The server refused the document or its variables. Never retried.
 */
export class GraphQLQueryError extends SdkError {
  constructor(
    public readonly errors: GraphQLErrorDetail[],
    public readonly status?: number,
    cause?: unknown
  ) {
    super(1101, errors[0]?.message ?? "GraphQL query execution failed", { errors, status }, { cause });
  }
}

/**
 * The locally cached schema rejected the document. The query client treats this
 * as a possibly stale schema and refreshes it once before giving up.
 */
export class GraphQLValidationError extends SdkError {
  readonly source = "local";

  constructor(public readonly errors: GraphQLErrorDetail[]) {
    super(1102, errors[0]?.message ?? "GraphQL validation failed", { errors });
  }
}

export class GraphQLSchemaError extends SdkError {
  constructor(message: string, cause?: unknown) {
    super(1103, `GraphQL schema error: ${message}`, undefined, { cause });
  }
}

export class GraphQLTimeoutError extends SdkError {
  override readonly retryable = true;

  constructor(timeoutMs: number, cause?: unknown) {
    super(1104, `GraphQL request timed out after ${timeoutMs}ms`, { timeoutMs }, { cause });
  }
}

/**
 * The backend failed while resolving the request for reasons unrelated to the
 * document itself.
 */
export class TransientServerError extends SdkError {
  override readonly retryable = true;

  constructor(
    message: string,
    public readonly status?: number,
    public readonly errors: GraphQLErrorDetail[] = [],
    cause?: unknown
  ) {
    super(1105, `Transient server error: ${message}`, { status, errors }, { cause });
  }
}

export class WebSocketDisconnectionError extends SdkError {
  constructor(sessionId: string, failedAttempts: number, cause?: unknown) {
    super(
      1106,
      `Subscription ${sessionId} gave up after ${failedAttempts} consecutive connection failures`,
      { sessionId, failedAttempts },
      { cause }
    );
  }
}

export class SubscriptionError extends SdkError {
  constructor(sessionId: string, payload: unknown) {
    super(1107, `Subscription ${sessionId} was terminated by the server`, { sessionId, payload });
  }
}

export class AuthenticationError extends SdkError {
  constructor(endpoint: string, reason: string, cause?: unknown) {
    super(1150, `Authentication failed against ${endpoint}: ${reason}`, { endpoint, reason }, { cause });
  }
}

export class InvalidParametersError extends SdkError {
  constructor(paramName: string, reason: string, value?: unknown) {
    super(1200, `Invalid parameter '${paramName}': ${reason}`, { paramName, reason, value });
  }
}

export class RateLimitExceededError extends SdkError {
  constructor(limit: number, windowMs: number, waitedMs: number, retryAfter?: number) {
    super(1300, `Rate limit exceeded: ${limit} requests per ${windowMs}ms`, {
      limit,
      windowMs,
      waitedMs,
      retryAfter,
    });
  }
}

export class InternalClientError extends SdkError {
  constructor(message: string, cause?: unknown) {
    super(1400, `Internal client error: ${message}`, undefined, { cause });
  }
}

export class SchemaCacheError extends SdkError {
  constructor(path: string, reason: string, cause?: unknown) {
    super(1403, `Schema cache failure at ${path}: ${reason}`, { path, reason }, { cause });
  }
}

const PERMANENT_CODES = new Set([
  "GRAPHQL_PARSE_FAILED",
  "GRAPHQL_VALIDATION_FAILED",
  "BAD_USER_INPUT",
  "PERSISTED_QUERY_NOT_SUPPORTED",
  "OPERATION_RESOLUTION_FAILURE",
  "NOT_FOUND",
]);

const AUTHENTICATION_CODES = new Set(["UNAUTHENTICATED", "FORBIDDEN"]);

const TRANSIENT_CODES = new Set([
  "INTERNAL_SERVER_ERROR",
  "SERVICE_UNAVAILABLE",
  "DOWNSTREAM_SERVICE_ERROR",
  "TIMEOUT",
]);

const TRANSIENT_STATUSES = new Set([429, 500, 502, 503, 504]);

// Best-effort fallback for servers that send no extensions.code.
const PERMANENT_MESSAGE_PATTERNS = [
  /cannot query field/i,
  /unknown argument/i,
  /unknown type/i,
  /was not provided/i,
  /expected type|expected value of type/i,
  /syntax error/i,
  /must have a selection of subfields/i,
];

const TRANSIENT_MESSAGE_PATTERNS = [
  /internal server error/i,
  /service unavailable/i,
  /econnreset|econnrefused|etimedout|socket hang up/i,
  /timed? ?out/i,
  /temporarily unavailable/i,
];

function errorCode(error: GraphQLErrorDetail): string | undefined {
  const code = error.extensions?.["code"];
  return typeof code === "string" ? code : undefined;
}

function toErrorDetails(errors: unknown): GraphQLErrorDetail[] {
  if (!Array.isArray(errors)) {
    return [];
  }
  return errors.map((error: unknown): GraphQLErrorDetail => {
    if (typeof error === "object" && error !== null && "message" in error) {
      const detail: GraphQLErrorDetail = { message: String(error.message) };
      if ("extensions" in error && typeof error.extensions === "object" && error.extensions !== null) {
        detail.extensions = { ...error.extensions };
      }
      if ("path" in error && Array.isArray(error.path)) {
        detail.path = error.path.filter(
          (segment: unknown): segment is string | number =>
            typeof segment === "string" || typeof segment === "number"
        );
      }
      return detail;
    }
    return { message: String(error) };
  });
}

function classifyErrors(
  errors: GraphQLErrorDetail[],
  status: number
): "permanent" | "transient" | "authentication" {
  const codes = errors.map(errorCode).filter((code): code is string => code !== undefined);

  if (status === 401 || status === 403 || codes.some((code) => AUTHENTICATION_CODES.has(code))) {
    return "authentication";
  }
  if (codes.some((code) => PERMANENT_CODES.has(code))) {
    return "permanent";
  }
  if (codes.some((code) => TRANSIENT_CODES.has(code))) {
    return "transient";
  }
  if (TRANSIENT_STATUSES.has(status)) {
    return "transient";
  }

  const messages = errors.map((error) => error.message);
  if (messages.some((message) => PERMANENT_MESSAGE_PATTERNS.some((re) => re.test(message)))) {
    return "permanent";
  }
  if (messages.some((message) => TRANSIENT_MESSAGE_PATTERNS.some((re) => re.test(message)))) {
    return "transient";
  }

  return "permanent";
}

function isAbortError(error: { name: string }): boolean {
  return error.name === "AbortError" || error.name === "TimeoutError";
}

// Errors raised by Node's fetch come from another realm under Jest and fail `instanceof`.
function hasErrorName(error: unknown): error is object & { name: string } {
  return typeof error === "object" && error !== null && "name" in error && typeof error.name === "string";
}

/**
 * Maps whatever the HTTP transport threw into the SDK taxonomy. Structured
 * signals (GraphQL `extensions.code`, HTTP status) decide first; message
 * matching only applies when the server sent neither.
 */
export function mapGraphQLError(
  error: unknown,
  context: { endpoint: string; timeoutMs: number }
): SdkError {
  if (error instanceof SdkError) {
    return error;
  }

  if (error instanceof ClientError) {
    const { status } = error.response;
    const errors = toErrorDetails(error.response.errors);
    const details: GraphQLErrorDetail[] =
      errors.length > 0 ? errors : [{ message: describeResponseBody(error.response, status) }];

    switch (classifyErrors(details, status)) {
      case "authentication":
        return new AuthenticationError(
          context.endpoint,
          details[0]?.message ?? `HTTP ${status}`,
          error
        );
      case "transient":
        return new TransientServerError(
          details[0]?.message ?? `HTTP ${status}`,
          status,
          details,
          error
        );
      case "permanent":
        return new GraphQLQueryError(details, status, error);
    }
  }

  if (hasErrorName(error)) {
    if (isAbortError(error)) {
      return new GraphQLTimeoutError(context.timeoutMs, error);
    }
    if (error.name === "TypeError" || "code" in error) {
      return new GraphQLConnectionError(context.endpoint, error);
    }
  }

  return new InternalClientError("Unexpected GraphQL transport error", error);
}

function describeResponseBody(response: ClientError["response"], status: number): string {
  const body: unknown = response["error"];
  if (typeof body === "string" && body.length > 0) {
    return body.slice(0, 500);
  }
  return `HTTP ${status}`;
}

export function isSdkError(error: unknown): error is SdkError {
  return error instanceof SdkError;
}

export function getErrorCode(error: unknown): number {
  if (isSdkError(error)) {
    return error.code;
  }
  return 1400;
}

export const ERROR_CODE_RANGES = {
  QUERY: { min: 1000, max: 1099 },
  GRAPHQL: { min: 1100, max: 1199 },
  VALIDATION: { min: 1200, max: 1299 },
  RATE_LIMIT: { min: 1300, max: 1399 },
  SYSTEM: { min: 1400, max: 1499 },
} as const;

export function isErrorInCategory(code: number, category: keyof typeof ERROR_CODE_RANGES): boolean {
  const range = ERROR_CODE_RANGES[category];
  return code >= range.min && code <= range.max;
}
