import { buildSchema, graphql, type GraphQLSchema } from "graphql";
import type { Fetch } from "../../src/graphql/session.js";

export interface RecordedRequest {
  url: string;
  method: string;
  headers: Headers;
  query?: string;
  variables?: Record<string, unknown>;
}

export interface CannedResponse {
  status: number;
  body: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

/**
 * GraphQL backend running inside the test process, reached through an
 * injected `fetch`. Serves `/version` and executes documents against an
 * executable schema.
 */
export class FakeGraphQLServer {
  schema: GraphQLSchema;
  rootValue: Record<string, unknown>;
  /** Body of `GET /version`; null answers 404. */
  versionBody: unknown;
  readonly requests: RecordedRequest[] = [];
  /** Consumed in order by the next GraphQL POSTs, before executing anything. */
  readonly cannedResponses: CannedResponse[] = [];

  constructor(options: { sdl: string; rootValue?: Record<string, unknown>; version?: string | null }) {
    this.schema = buildSchema(options.sdl);
    this.rootValue = options.rootValue ?? {};
    this.versionBody = options.version === null ? null : { version: options.version ?? "1.0.0" };
  }

  setSchema(sdl: string, rootValue?: Record<string, unknown>): void {
    this.schema = buildSchema(sdl);
    if (rootValue !== undefined) {
      this.rootValue = rootValue;
    }
  }

  setVersion(version: string | null): void {
    this.versionBody = version === null ? null : { version };
  }

  /** Canned responses for the next `count` GraphQL POSTs. */
  failNext(count: number, response: CannedResponse): void {
    for (let i = 0; i < count; i++) {
      this.cannedResponses.push(response);
    }
  }

  graphqlRequests(): RecordedRequest[] {
    return this.requests.filter((request) => request.method === "POST");
  }

  introspectionCount(): number {
    return this.graphqlRequests().filter((request) => request.query?.includes("__schema") === true)
      .length;
  }

  versionCount(): number {
    return this.requests.filter((request) => request.url.endsWith("/version")).length;
  }

  readonly fetch: Fetch = async (input, init) => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
    const method = (init?.method ?? "GET").toUpperCase();
    const headers = new Headers(init?.headers);
    const recorded: RecordedRequest = { url, method, headers };
    this.requests.push(recorded);

    if (method === "GET" && url.endsWith("/version")) {
      return this.versionBody === null
        ? new Response("not found", { status: 404 })
        : jsonResponse(200, this.versionBody);
    }

    const body: unknown = typeof init?.body === "string" ? JSON.parse(init.body) : null;
    if (!isRecord(body) || typeof body["query"] !== "string") {
      return jsonResponse(400, { errors: [{ message: "Must provide query string." }] });
    }
    recorded.query = body["query"];
    const variables = isRecord(body["variables"]) ? body["variables"] : {};
    recorded.variables = variables;

    const canned = this.cannedResponses.shift();
    if (canned !== undefined) {
      return jsonResponse(canned.status, canned.body);
    }

    const result = await graphql({
      schema: this.schema,
      source: body["query"],
      rootValue: this.rootValue,
      variableValues: variables,
    });
    return jsonResponse(200, result);
  };
}
