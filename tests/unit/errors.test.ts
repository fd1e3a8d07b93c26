import { describe, it, expect } from "@jest/globals";
import { GraphQLError } from "graphql";
import { ClientError } from "graphql-request";
import {
  AuthenticationError,
  GraphQLConnectionError,
  GraphQLQueryError,
  GraphQLTimeoutError,
  InternalClientError,
  RateLimitExceededError,
  TransientServerError,
  getErrorCode,
  isErrorInCategory,
  mapGraphQLError,
} from "../../src/errors/index.js";

const context = { endpoint: "http://api.test/graphql", timeoutMs: 1000 };

function clientError(status: number, errors?: GraphQLError[], error?: string): ClientError {
  return new ClientError({ status, errors, error }, { query: "{ me { id } }" });
}

function gqlError(message: string, code?: string): GraphQLError {
  return new GraphQLError(message, code === undefined ? {} : { extensions: { code } });
}

describe("mapGraphQLError", () => {
  it("treats extensions.code BAD_USER_INPUT as permanent", () => {
    const mapped = mapGraphQLError(
      clientError(200, [gqlError("bad id", "BAD_USER_INPUT")]),
      context
    );

    expect(mapped).toBeInstanceOf(GraphQLQueryError);
    expect(mapped.retryable).toBe(false);
    expect(mapped.message).toBe("bad id");
  });

  it("treats INTERNAL_SERVER_ERROR as transient", () => {
    const mapped = mapGraphQLError(
      clientError(200, [gqlError("boom", "INTERNAL_SERVER_ERROR")]),
      context
    );

    expect(mapped).toBeInstanceOf(TransientServerError);
    expect(mapped.retryable).toBe(true);
  });

  it("prefers the code over a transient-looking status", () => {
    const mapped = mapGraphQLError(
      clientError(500, [gqlError("Cannot query field", "GRAPHQL_VALIDATION_FAILED")]),
      context
    );

    expect(mapped).toBeInstanceOf(GraphQLQueryError);
  });

  it("maps 503 without a body to a transient error", () => {
    const mapped = mapGraphQLError(clientError(503, undefined, "upstream down"), context);

    expect(mapped).toBeInstanceOf(TransientServerError);
    expect(mapped.message).toBe("Transient server error: upstream down");
  });

  it("maps 401 to an authentication error", () => {
    const mapped = mapGraphQLError(clientError(401, [gqlError("invalid key")]), context);

    expect(mapped).toBeInstanceOf(AuthenticationError);
    expect(mapped.retryable).toBe(false);
  });

  it("falls back to message matching when no code is present", () => {
    const permanent = mapGraphQLError(
      clientError(200, [gqlError('Cannot query field "nope" on type "Query".')]),
      context
    );
    const transient = mapGraphQLError(
      clientError(200, [gqlError("Service Unavailable, try later")]),
      context
    );

    expect(permanent).toBeInstanceOf(GraphQLQueryError);
    expect(transient).toBeInstanceOf(TransientServerError);
  });

  it("maps timeouts and network failures", () => {
    const timeout = new Error("The operation was aborted due to timeout");
    timeout.name = "TimeoutError";

    expect(mapGraphQLError(timeout, context)).toBeInstanceOf(GraphQLTimeoutError);
    expect(mapGraphQLError(new TypeError("fetch failed"), context)).toBeInstanceOf(
      GraphQLConnectionError
    );
    expect(mapGraphQLError("weird", context)).toBeInstanceOf(InternalClientError);
  });

  it("recognizes transport errors that are not Error instances of this realm", () => {
    const aborted = { name: "AbortError", message: "This operation was aborted" };
    const refused = { name: "Error", message: "connect ECONNREFUSED", code: "ECONNREFUSED" };

    expect(mapGraphQLError(aborted, context)).toBeInstanceOf(GraphQLTimeoutError);
    expect(mapGraphQLError(refused, context)).toBeInstanceOf(GraphQLConnectionError);
    expect(mapGraphQLError({ name: "Error", message: "odd" }, context)).toBeInstanceOf(
      InternalClientError
    );
  });

  it("passes SDK errors through", () => {
    const error = new RateLimitExceededError(1, 1000, 0, 1000);

    expect(mapGraphQLError(error, context)).toBe(error);
  });
});

describe("error codes", () => {
  it("places errors in their categories", () => {
    expect(getErrorCode(new RateLimitExceededError(1, 1000, 0, 1000))).toBe(1300);
    expect(isErrorInCategory(1104, "GRAPHQL")).toBe(true);
    expect(isErrorInCategory(1104, "SYSTEM")).toBe(false);
    expect(getErrorCode(new Error("plain"))).toBe(1400);
  });
});
