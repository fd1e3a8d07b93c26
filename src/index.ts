export {
  ApiClient,
  createApiClient,
  getApiClient,
  resetApiClient,
  CHECK_API_KEY_QUERY,
  type ApiClientOptions,
} from "./client.js";

export * from "./graphql/index.js";
export * from "./errors/index.js";

export { RateLimiter, getRateLimiter, resetRateLimiter } from "./rate-limit/index.js";

export {
  getConfig,
  resetConfig,
  loadConfig,
  CLIENT_NAMES,
  DEFAULT_SCHEMA_CACHE_DIR,
  type Config,
  type ClientName,
} from "./config/index.js";

export { getLogger, getRootLogger, type Logger } from "./logging/index.js";
