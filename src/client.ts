import Ajv, { type JSONSchemaType } from "ajv";
import type { DocumentNode } from "graphql";
import type { Variables } from "graphql-request";
import { AuthenticationError } from "./errors/index.js";
import {
  createClientSession,
  GraphQLQueryClient,
  SubscriptionClient,
  type ClientSession,
  type ClientSessionOptions,
  type ExecuteOptions,
  type QueryClientOptions,
  type SubscribeOptions,
  type SubscriptionCallback,
  type SubscriptionClientOptions,
  type SubscriptionHandle,
} from "./graphql/index.js";
import { getLogger } from "./logging/index.js";

const logger = getLogger("api-client");

export const CHECK_API_KEY_QUERY = /* GraphQL */ `
  query CheckApiKey {
    me {
      id
      email
    }
  }
`;

interface CurrentUser {
  me: { id: string; email: string };
}

const currentUserSchema: JSONSchemaType<CurrentUser> = {
  type: "object",
  properties: {
    me: {
      type: "object",
      properties: {
        id: { type: "string", minLength: 1 },
        email: { type: "string", minLength: 1 },
      },
      required: ["id", "email"],
    },
  },
  required: ["me"],
};

const validateCurrentUser = new Ajv().compile(currentUserSchema);

export interface ApiClientOptions
  extends ClientSessionOptions,
    Omit<QueryClientOptions, "session"> {
  subscription?: SubscriptionClientOptions;
}

/**
 * Entry point bundling the query client and a subscription client that share
 * one session. The subscription socket is opened on first use.
 */
export class ApiClient {
  private subscriptionClient: SubscriptionClient | null = null;

  constructor(
    readonly session: ClientSession,
    readonly queries: GraphQLQueryClient,
    private readonly subscriptionOptions: SubscriptionClientOptions = {}
  ) {}

  execute<T = unknown>(
    query: string | DocumentNode,
    variables?: Variables,
    options?: ExecuteOptions
  ): Promise<T> {
    return this.queries.execute<T>(query, variables, options);
  }

  subscribe(
    query: string | DocumentNode,
    variables: Variables | undefined,
    callback: SubscriptionCallback,
    options?: SubscribeOptions
  ): Promise<SubscriptionHandle> {
    return this.subscriptions().subscribe(query, variables, callback, options);
  }

  /** Single-shot document over the subscription socket. */
  queryOnce(
    query: string | DocumentNode,
    variables?: Variables,
    headers?: Record<string, string>
  ): Promise<unknown> {
    return this.subscriptions().queryOnce(query, variables, headers);
  }

  subscriptions(): SubscriptionClient {
    if (this.subscriptionClient === null) {
      this.subscriptionClient = new SubscriptionClient(this.session, this.subscriptionOptions);
    }
    return this.subscriptionClient;
  }

  /**
   * Confirms the API key belongs to a user.
   */
  async checkApiKey(): Promise<CurrentUser["me"]> {
    const result = await this.execute<unknown>(CHECK_API_KEY_QUERY);

    if (!validateCurrentUser(result)) {
      throw new AuthenticationError(this.session.endpoint, "API key is not attached to a user");
    }

    logger.debug({ userId: result.me.id }, "API key validated");
    return result.me;
  }

  close(): void {
    this.subscriptionClient?.close();
    this.subscriptionClient = null;
  }
}

export async function createApiClient(options: ApiClientOptions = {}): Promise<ApiClient> {
  const { subscription, endpoint, apiKey, clientName, clientVersion, transport, fetch, ...queryOptions } =
    options;

  const session = createClientSession({
    endpoint,
    apiKey,
    clientName,
    clientVersion,
    transport,
    fetch,
  });
  const queries = await GraphQLQueryClient.create({ ...queryOptions, session });

  return new ApiClient(session, queries, subscription);
}

let apiClient: Promise<ApiClient> | null = null;

export function getApiClient(): Promise<ApiClient> {
  if (apiClient === null) {
    apiClient = createApiClient().catch((error: unknown) => {
      apiClient = null;
      throw error;
    });
  }
  return apiClient;
}

export async function resetApiClient(): Promise<void> {
  if (apiClient !== null) {
    const pending = apiClient;
    apiClient = null;
    try {
      (await pending).close();
    } catch (error) {
      logger.debug({ error }, "Discarded API client had failed to initialize");
    }
  }
}
