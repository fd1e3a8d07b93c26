import Ajv, { type JSONSchemaType } from "ajv";
import { GraphQLClient } from "graphql-request";
import {
  buildClientSchema,
  buildSchema,
  getIntrospectionQuery,
  printSchema,
  type GraphQLSchema,
  type IntrospectionQuery,
} from "graphql";
import { AuthenticationError, GraphQLSchemaError, mapGraphQLError } from "../errors/index.js";
import { createTimer, getLogger } from "../logging/index.js";
import type { SchemaCache } from "./schema-cache.js";
import type { ClientSession } from "./session.js";

const logger = getLogger("schema-loader");

/**
 * An immutable loaded schema. Refreshing builds a new handle instead of
 * mutating this one.
 */
export interface SchemaHandle {
  readonly schema: GraphQLSchema;
  readonly sdl: string;
  /** File the schema was loaded from or written to; null when caching is off. */
  readonly cachePath: string | null;
  readonly version: string | null;
  readonly loadedAt: Date;
}

interface VersionResponse {
  version: string;
}

const versionResponseSchema: JSONSchemaType<VersionResponse> = {
  type: "object",
  properties: {
    version: { type: "string", minLength: 1 },
  },
  required: ["version"],
};

const validateVersionResponse = new Ajv().compile(versionResponseSchema);

export const INTROSPECTION_OPTIONS = {
  descriptions: true,
  specifiedByUrl: false,
  directiveIsRepeatable: true,
  schemaDescription: true,
  inputValueDeprecation: true,
} as const;

/**
 * Reads the backend build version. Returns null when the endpoint is
 * unreachable or answers with anything but `{ "version": string }`.
 */
export async function fetchBackendVersion(session: ClientSession): Promise<string | null> {
  try {
    const response = await session.fetch(session.versionEndpoint, {
      method: "GET",
      headers: { Accept: "application/json" },
      signal: AbortSignal.timeout(session.transport.timeout),
    });

    if (response.status !== 200) {
      logger.warn(
        { url: session.versionEndpoint, status: response.status },
        "Version endpoint returned a non-200 status"
      );
      return null;
    }

    const body: unknown = JSON.parse(await response.text());
    if (!validateVersionResponse(body)) {
      logger.warn(
        { url: session.versionEndpoint, errors: validateVersionResponse.errors },
        "Version endpoint returned a malformed payload"
      );
      return null;
    }

    return body.version;
  } catch (error) {
    logger.warn({ url: session.versionEndpoint, error }, "Could not read the backend version");
    return null;
  }
}

export async function introspectSchema(
  session: ClientSession
): Promise<{ schema: GraphQLSchema; sdl: string }> {
  const timer = createTimer();
  const client = new GraphQLClient(session.endpoint, {
    fetch: session.fetch,
    headers: session.headers(),
  });

  let result: IntrospectionQuery;
  try {
    result = await client.request<IntrospectionQuery>({
      document: getIntrospectionQuery(INTROSPECTION_OPTIONS),
      signal: AbortSignal.timeout(session.transport.timeout),
    });
  } catch (error) {
    const mapped = mapGraphQLError(error, {
      endpoint: session.endpoint,
      timeoutMs: session.transport.timeout,
    });
    if (mapped instanceof AuthenticationError) {
      throw mapped;
    }
    throw new GraphQLSchemaError(`introspection failed: ${mapped.message}`, mapped);
  }

  let schema: GraphQLSchema;
  try {
    schema = buildClientSchema(result);
  } catch (error) {
    throw new GraphQLSchemaError("introspection result is not a valid schema", error);
  }

  timer.log(logger, "Schema introspected", { endpoint: session.endpoint });
  return { schema, sdl: printSchema(schema) };
}

export interface SchemaLoaderOptions {
  /** Disables local validation entirely; every call is validated by the server only. */
  skipChecks?: boolean;
}

/**
 * Decides where the session's schema comes from: nowhere (skipped checks or
 * unknown backend version), live introspection, or the on-disk cache.
 */
export class SchemaLoader {
  constructor(
    private readonly session: ClientSession,
    private readonly cache: SchemaCache,
    private readonly options: SchemaLoaderOptions = {}
  ) {}

  async load(): Promise<SchemaHandle | null> {
    if (this.options.skipChecks === true) {
      logger.info("Schema checks skipped, queries are validated by the server only");
      return null;
    }

    if (!this.cache.enabled) {
      const { schema, sdl } = await introspectSchema(this.session);
      return { schema, sdl, cachePath: null, version: null, loadedAt: new Date() };
    }

    const version = await fetchBackendVersion(this.session);
    const cachePath = version === null ? null : this.cache.schemaPath(this.session.endpoint, version);
    if (version === null || cachePath === null) {
      logger.warn(
        { endpoint: this.session.endpoint },
        "Backend version unknown, schema caching and local validation disabled for this session"
      );
      return null;
    }

    return this.cache.withLock(async () => {
      const cached = await this.cache.read(cachePath);
      if (cached !== null) {
        try {
          const schema = buildSchema(cached);
          logger.debug({ cachePath, version }, "Loaded schema from cache");
          return { schema, sdl: cached, cachePath, version, loadedAt: new Date() };
        } catch (error) {
          logger.warn({ cachePath, error }, "Cached schema is unreadable, introspecting again");
        }
      }

      await this.cache.purgeHost(this.session.endpoint);
      const { schema, sdl } = await introspectSchema(this.session);
      await this.cache.write(cachePath, sdl);
      return { schema, sdl, cachePath, version, loadedAt: new Date() };
    });
  }

  /**
   * Drops every cached schema and loads the live one again.
   */
  async refresh(): Promise<SchemaHandle | null> {
    if (this.cache.enabled) {
      await this.cache.withLock(() => this.cache.purgeAll());
    }
    return this.load();
  }
}
