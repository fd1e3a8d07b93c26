export {
  GraphQLQueryClient,
  type QueryClientOptions,
  type ExecuteOptions,
} from "./query-client.js";

export {
  SubscriptionClient,
  type SubscriptionCallback,
  type SubscribeOptions,
  type SubscriptionHandle,
  type SubscriptionClientEvents,
  type SubscriptionClientOptions,
  type StopReason,
} from "./subscription-client.js";

export {
  SubscriptionSocket,
  createWebSocket,
  type SocketLike,
  type SocketFactory,
  type SocketFactoryOptions,
} from "./subscription-socket.js";

export {
  GQL_WS_SUBPROTOCOL,
  parseServerFrame,
  encodeClientFrame,
  type ClientFrame,
  type ServerFrame,
  type ServerFrameType,
} from "./protocol.js";

export {
  createClientSession,
  createInsecureFetch,
  toWebSocketUrl,
  toVersionUrl,
  type ClientSession,
  type ClientSessionOptions,
  type TransportOptions,
  type Fetch,
} from "./session.js";

export { SchemaCache, type SchemaCacheOptions } from "./schema-cache.js";

export {
  SchemaLoader,
  fetchBackendVersion,
  introspectSchema,
  type SchemaHandle,
} from "./schema-loader.js";

export { cleanVariables, DEFAULT_OPAQUE_JSON_FIELDS } from "./variables.js";
