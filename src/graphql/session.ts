import { Agent, fetch as undiciFetch, type Dispatcher } from "undici";
import { getConfig, type ClientName } from "../config/index.js";
import { InternalClientError } from "../errors/index.js";

export type Fetch = typeof fetch;

export interface TransportOptions {
  verifyTls: boolean;
  /** Per-request timeout in milliseconds. */
  timeout: number;
}

export interface ClientSessionOptions {
  endpoint?: string;
  apiKey?: string;
  clientName?: ClientName;
  clientVersion?: string;
  transport?: Partial<TransportOptions>;
  /** Replaces the HTTP implementation, TLS settings included. */
  fetch?: Fetch;
}

/**
 * Long-lived connection settings shared by the query and subscription clients.
 */
export interface ClientSession {
  readonly endpoint: string;
  readonly wsEndpoint: string;
  readonly versionEndpoint: string;
  readonly apiKey: string;
  readonly clientName: ClientName;
  readonly clientVersion: string;
  readonly transport: Readonly<TransportOptions>;
  readonly fetch: Fetch;
  /** Value of the Authorization header and of the connection_init payload. */
  readonly authorization: string;
  headers(): Record<string, string>;
}

export function toWebSocketUrl(endpoint: string): string {
  return endpoint.replace(/^http/, "ws");
}

export function toVersionUrl(endpoint: string): string {
  return endpoint.replace(/\/graphql$/, "/version");
}

// Statuses whose responses carry no body.
const NULL_BODY_STATUSES = new Set([101, 204, 205, 304]);

/**
 * A fetch that sends every request through `dispatcher`, by default an undici
 * Agent that skips certificate verification. Request bodies must be text.
 */
export function createInsecureFetch(
  dispatcher: Dispatcher = new Agent({ connect: { rejectUnauthorized: false } })
): Fetch {
  return async (input, init) => {
    const url = typeof input === "string" ? input : "url" in input ? input.url : input.href;
    const body = init?.body ?? undefined;
    if (body !== undefined && typeof body !== "string") {
      throw new InternalClientError("only text request bodies are supported without TLS verification");
    }

    const upstream = await undiciFetch(url, {
      method: init?.method,
      headers: Object.fromEntries(new Headers(init?.headers)),
      body,
      signal: init?.signal,
      dispatcher,
    });

    const payload = NULL_BODY_STATUSES.has(upstream.status) ? null : await upstream.arrayBuffer();
    return new Response(payload, {
      status: upstream.status,
      statusText: upstream.statusText,
      headers: Object.fromEntries(upstream.headers),
    });
  };
}

function createSessionFetch(options: ClientSessionOptions, transport: TransportOptions): Fetch {
  if (options.fetch !== undefined) {
    return options.fetch;
  }
  return transport.verifyTls ? globalThis.fetch : createInsecureFetch();
}

export function createClientSession(options: ClientSessionOptions = {}): ClientSession {
  const config = getConfig();

  const endpoint = options.endpoint ?? config.graphql.endpoint;
  const apiKey = options.apiKey ?? config.graphql.apiKey;
  const clientName = options.clientName ?? config.graphql.clientName;
  const clientVersion = options.clientVersion ?? config.version;
  const transport: TransportOptions = {
    verifyTls: options.transport?.verifyTls ?? config.graphql.verifyTls,
    timeout: options.transport?.timeout ?? config.graphql.timeout,
  };
  const authorization = `X-API-Key: ${apiKey}`;

  return {
    endpoint,
    wsEndpoint: toWebSocketUrl(endpoint),
    versionEndpoint: toVersionUrl(endpoint),
    apiKey,
    clientName,
    clientVersion,
    transport,
    fetch: createSessionFetch(options, transport),
    authorization,
    headers: () => ({
      Authorization: authorization,
      Accept: "application/json",
      "Content-Type": "application/json",
      "apollographql-client-name": clientName,
      "apollographql-client-version": clientVersion,
    }),
  };
}
