import { GraphQLClient, type Variables } from "graphql-request";
import { parse, print, validate, type DocumentNode } from "graphql";
import { v4 as uuidv4 } from "uuid";
import { getConfig } from "../config/index.js";
import {
  GraphQLValidationError,
  InternalClientError,
  InvalidQueryError,
  mapGraphQLError,
  type SdkError,
} from "../errors/index.js";
import { createRequestLogger, createTimer, getLogger, type Logger } from "../logging/index.js";
import { getRateLimiter, type RateLimiter } from "../rate-limit/index.js";
import { SchemaCache } from "./schema-cache.js";
import { SchemaLoader, type SchemaHandle } from "./schema-loader.js";
import type { ClientSession } from "./session.js";
import { cleanVariables, DEFAULT_OPAQUE_JSON_FIELDS } from "./variables.js";

const logger = getLogger("query-client");

const MAX_RETRY_DELAY_MS = 30_000;

export interface QueryClientOptions {
  session: ClientSession;
  /** Shared admission control; defaults to the process-wide limiter. */
  rateLimiter?: RateLimiter;
  enableSchemaCaching?: boolean;
  schemaCacheDir?: string | null;
  skipChecks?: boolean;
  /** Total attempts for a call failing with transient errors. */
  retryAttempts?: number;
  retryDelay?: number;
  opaqueJsonFields?: readonly string[];
  sleep?: (ms: number) => Promise<void>;
}

export interface ExecuteOptions {
  headers?: Record<string, string>;
  requestId?: string;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Request/response client for the GraphQL endpoint. Safe to share between
 * concurrent callers: schema refreshes swap the whole handle and are shared
 * by every caller that needs one at the same time.
 */
export class GraphQLQueryClient {
  private schemaHandle: SchemaHandle | null;
  private refreshing: Promise<SchemaHandle | null> | null = null;
  private readonly httpClient: GraphQLClient;
  private readonly rateLimiter: RateLimiter;
  private readonly retryAttempts: number;
  private readonly retryDelay: number;
  private readonly opaqueJsonFields: readonly string[];
  private readonly sleep: (ms: number) => Promise<void>;

  private constructor(
    readonly session: ClientSession,
    private readonly loader: SchemaLoader,
    handle: SchemaHandle | null,
    options: QueryClientOptions
  ) {
    const config = getConfig();

    this.schemaHandle = handle;
    this.rateLimiter = options.rateLimiter ?? getRateLimiter();
    this.retryAttempts = Math.max(1, options.retryAttempts ?? config.graphql.retryAttempts);
    this.retryDelay = options.retryDelay ?? config.graphql.retryDelay;
    this.opaqueJsonFields = options.opaqueJsonFields ?? DEFAULT_OPAQUE_JSON_FIELDS;
    this.sleep = options.sleep ?? defaultSleep;
    this.httpClient = new GraphQLClient(session.endpoint, {
      fetch: session.fetch,
      headers: session.headers(),
    });
  }

  /**
   * Builds a client and acquires its schema before first use.
   */
  static async create(options: QueryClientOptions): Promise<GraphQLQueryClient> {
    const config = getConfig();
    const cache = new SchemaCache({
      enabled: options.enableSchemaCaching ?? config.schemaCache.enabled,
      directory:
        options.schemaCacheDir !== undefined ? options.schemaCacheDir : config.schemaCache.directory,
    });
    const loader = new SchemaLoader(options.session, cache, {
      skipChecks: options.skipChecks ?? config.skipChecks,
    });

    const handle = await loader.load();

    logger.info(
      {
        endpoint: options.session.endpoint,
        clientName: options.session.clientName,
        localValidation: handle !== null,
        cachePath: handle?.cachePath ?? null,
      },
      "GraphQL query client initialized"
    );

    return new GraphQLQueryClient(options.session, loader, handle, options);
  }

  getSchemaHandle(): SchemaHandle | null {
    return this.schemaHandle;
  }

  /**
   * Invalidates the cached schema and loads the live one. Concurrent callers
   * share a single refresh.
   */
  async refreshSchema(): Promise<SchemaHandle | null> {
    if (this.refreshing === null) {
      this.refreshing = this.loader
        .refresh()
        .then((handle) => {
          this.schemaHandle = handle;
          logger.info({ cachePath: handle?.cachePath ?? null }, "Schema refreshed");
          return handle;
        })
        .finally(() => {
          this.refreshing = null;
        });
    }
    return this.refreshing;
  }

  async execute<T = unknown>(
    query: string | DocumentNode,
    variables?: Variables,
    options: ExecuteOptions = {}
  ): Promise<T> {
    const requestId = options.requestId ?? uuidv4();
    const requestLogger = createRequestLogger(requestId, logger);
    const document = parseDocument(query);
    const queryString = typeof query === "string" ? query : print(query);
    const cleanedVariables = cleanVariables(variables, this.opaqueJsonFields);
    const handle = this.schemaHandle;

    const send = (schemaHandle: SchemaHandle | null): Promise<T> =>
      this.executeWithRetry<T>({
        document,
        queryString,
        variables: cleanedVariables,
        headers: options.headers ?? {},
        requestId,
        requestLogger,
        schemaHandle,
      });

    try {
      return await send(handle);
    } catch (error) {
      if (!(error instanceof GraphQLValidationError)) {
        throw error;
      }

      requestLogger.warn(
        { errors: error.errors, cachePath: handle?.cachePath ?? null },
        "Query rejected by the local schema, refreshing the schema and retrying once"
      );

      // Another caller may already have replaced the handle that rejected us.
      const refreshed = this.schemaHandle === handle ? await this.refreshSchema() : this.schemaHandle;
      return send(refreshed);
    }
  }

  private async executeWithRetry<T>(request: {
    document: DocumentNode;
    queryString: string;
    variables: Variables;
    headers: Record<string, string>;
    requestId: string;
    requestLogger: Logger;
    schemaHandle: SchemaHandle | null;
  }): Promise<T> {
    const { requestLogger } = request;

    if (request.schemaHandle !== null) {
      const errors = validate(request.schemaHandle.schema, request.document);
      if (errors.length > 0) {
        throw new GraphQLValidationError(
          errors.map((error) => ({ message: error.message }))
        );
      }
    }

    const timer = createTimer();
    const context = {
      endpoint: this.session.endpoint,
      timeoutMs: this.session.transport.timeout,
    };
    let lastError: SdkError | null = null;

    for (let attempt = 0; attempt < this.retryAttempts; attempt++) {
      await this.rateLimiter.acquire("GraphQLQueryClient.execute");

      try {
        const result = await this.httpClient.request<T>({
          document: request.queryString,
          variables: request.variables,
          requestHeaders: {
            ...this.session.headers(),
            ...request.headers,
            "x-request-id": request.requestId,
          },
          signal: AbortSignal.timeout(this.session.transport.timeout),
        });

        timer.log(requestLogger, "GraphQL request completed", { attempt: attempt + 1 });
        return result;
      } catch (error) {
        lastError = mapGraphQLError(error, context);
        const willRetry = lastError.retryable && attempt < this.retryAttempts - 1;

        requestLogger.warn(
          {
            attempt: attempt + 1,
            maxAttempts: this.retryAttempts,
            code: lastError.code,
            errorType: lastError.name,
            errorMessage: lastError.message,
            willRetry,
          },
          "GraphQL request failed"
        );

        if (!lastError.retryable) {
          throw lastError;
        }

        if (willRetry) {
          const delay = Math.min(this.retryDelay * Math.pow(2, attempt), MAX_RETRY_DELAY_MS);
          await this.sleep(delay);
        }
      }
    }

    requestLogger.error(
      {
        attempts: this.retryAttempts,
        errorMessage: lastError?.message,
        endpoint: this.session.endpoint,
      },
      "GraphQL request failed after all retries"
    );

    throw lastError ?? new InternalClientError("GraphQL request failed without an error");
  }
}

function parseDocument(query: string | DocumentNode): DocumentNode {
  if (typeof query !== "string") {
    return query;
  }
  try {
    return parse(query);
  } catch (error) {
    throw new InvalidQueryError(error instanceof Error ? error.message : String(error), error);
  }
}
