import { homedir } from "node:os";
import { join } from "node:path";
import Ajv, { type JSONSchemaType } from "ajv";
import addFormats from "ajv-formats";
import { pino } from "pino";

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly field: string
  ) {
    super(`Configuration error for ${field}: ${message}`);
    this.name = "ConfigurationError";
  }
}

export type Environment = "development" | "staging" | "production";

export const CLIENT_NAMES = ["typescript-sdk", "typescript-cli", "internal"] as const;

/**
 * Value of the `apollographql-client-name` header. Lets the backend tell SDK,
 * CLI and internal traffic apart.
 */
export type ClientName = (typeof CLIENT_NAMES)[number];

export interface LoggingConfig {
  level: pino.LevelWithSilent;
  pretty: boolean;
  redactPaths: string[];
}

export interface GraphQLConfig {
  endpoint: string;
  apiKey: string;
  clientName: ClientName;
  timeout: number;
  verifyTls: boolean;
  retryAttempts: number;
  retryDelay: number;
}

export interface SchemaCacheConfig {
  enabled: boolean;
  directory: string | null;
}

export interface RateLimitConfig {
  maxCalls: number;
  windowMs: number;
  maxWaitMs: number;
}

export interface SubscriptionConfig {
  maxReconnects: number;
  reconnectDelay: number;
  connectTimeout: number;
}

export interface Config {
  environment: Environment;
  serviceName: string;
  version: string;

  logging: LoggingConfig;
  graphql: GraphQLConfig;
  schemaCache: SchemaCacheConfig;
  rateLimit: RateLimitConfig;
  subscription: SubscriptionConfig;

  skipChecks: boolean;
}

const DEFAULT_SERVICE_NAME = "labeling-graphql-client";

export const DEFAULT_SCHEMA_CACHE_DIR = join(homedir(), ".cache", DEFAULT_SERVICE_NAME, "graphql");

export function loadConfig(): Config {
  const env = process.env;
  const environment = validateEnvironment(env["NODE_ENV"] || "development");

  const config: Config = {
    environment,
    serviceName: env["SERVICE_NAME"] || DEFAULT_SERVICE_NAME,
    version: env["SERVICE_VERSION"] || env["npm_package_version"] || "0.1.0",

    logging: {
      level: validateLogLevel(
        env["LOG_LEVEL"] || (environment === "production" ? "info" : "debug")
      ),
      pretty: environment !== "production" && env["LOG_PRETTY"] !== "false",
      redactPaths: parseStringArray(
        env["LOG_REDACT_PATHS"] || "password,token,secret,authorization,apiKey"
      ),
    },

    graphql: {
      endpoint: env["API_ENDPOINT"] || "http://localhost:4000/api/label/v2/graphql",
      apiKey: env["API_KEY"] || "",
      clientName: validateClientName(env["API_CLIENT_NAME"] || "typescript-sdk"),
      timeout: validateNumber(env["GRAPHQL_TIMEOUT_MS"], 30_000, "GRAPHQL_TIMEOUT_MS"),
      verifyTls: env["GRAPHQL_VERIFY_TLS"] !== "false",
      retryAttempts: validateNumber(env["GRAPHQL_RETRY_ATTEMPTS"], 10, "GRAPHQL_RETRY_ATTEMPTS"),
      retryDelay: validateNumber(env["GRAPHQL_RETRY_DELAY_MS"], 500, "GRAPHQL_RETRY_DELAY_MS"),
    },

    schemaCache: {
      enabled: env["SCHEMA_CACHE_ENABLED"] !== "false",
      directory: env["SCHEMA_CACHE_DIR"] || DEFAULT_SCHEMA_CACHE_DIR,
    },

    rateLimit: {
      maxCalls: validateNumber(env["RATE_LIMIT_MAX_CALLS"], 250, "RATE_LIMIT_MAX_CALLS"),
      windowMs: validateNumber(env["RATE_LIMIT_WINDOW_MS"], 60_000, "RATE_LIMIT_WINDOW_MS"),
      maxWaitMs: validateNumber(env["RATE_LIMIT_MAX_WAIT_MS"], 300_000, "RATE_LIMIT_MAX_WAIT_MS"),
    },

    subscription: {
      maxReconnects: validateNumber(
        env["SUBSCRIPTION_MAX_RECONNECTS"],
        10,
        "SUBSCRIPTION_MAX_RECONNECTS"
      ),
      reconnectDelay: validateNumber(
        env["SUBSCRIPTION_RECONNECT_DELAY_MS"],
        1000,
        "SUBSCRIPTION_RECONNECT_DELAY_MS"
      ),
      connectTimeout: validateNumber(
        env["SUBSCRIPTION_CONNECT_TIMEOUT_MS"],
        10_000,
        "SUBSCRIPTION_CONNECT_TIMEOUT_MS"
      ),
    },

    skipChecks: env["SDK_SKIP_CHECKS"] !== undefined,
  };

  validateConfig(config);

  return config;
}

function validateEnvironment(value: string): Environment {
  if (value === "test") {
    return "development";
  }

  switch (value) {
    case "development":
    case "staging":
    case "production":
      return value;
    default:
      throw new ConfigurationError(
        `Invalid environment: ${value}. Must be one of: development, staging, production`,
        "NODE_ENV"
      );
  }
}

const LOG_LEVELS: readonly pino.LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

function isLogLevel(value: string): value is pino.LevelWithSilent {
  return LOG_LEVELS.some((level) => level === value);
}

function validateLogLevel(value: string): pino.LevelWithSilent {
  if (!isLogLevel(value)) {
    throw new ConfigurationError(
      `Invalid log level: ${value}. Must be one of: ${LOG_LEVELS.join(", ")}`,
      "LOG_LEVEL"
    );
  }
  return value;
}

function isClientName(value: string): value is ClientName {
  return CLIENT_NAMES.some((name) => name === value);
}

function validateClientName(value: string): ClientName {
  if (!isClientName(value)) {
    throw new ConfigurationError(
      `Invalid client name: ${value}. Must be one of: ${CLIENT_NAMES.join(", ")}`,
      "API_CLIENT_NAME"
    );
  }
  return value;
}

function validateNumber(value: string | undefined, defaultValue: number, field: string): number {
  if (!value) return defaultValue;

  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new ConfigurationError(`Invalid number: ${value}`, field);
  }

  if (parsed <= 0) {
    throw new ConfigurationError(`Number must be positive: ${parsed}`, field);
  }

  return parsed;
}

function parseStringArray(value: string): string[] {
  return value
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

const ajv = new Ajv({ allErrors: true });
addFormats(ajv);

const endpointSchema: JSONSchemaType<{ endpoint: string }> = {
  type: "object",
  properties: {
    endpoint: { type: "string", format: "uri", pattern: "^https?://" },
  },
  required: ["endpoint"],
};

const validateEndpoint = ajv.compile(endpointSchema);

function validateConfig(config: Config): void {
  if (!validateEndpoint({ endpoint: config.graphql.endpoint })) {
    throw new ConfigurationError(
      `Endpoint must be an http(s) URL: ${config.graphql.endpoint}`,
      "API_ENDPOINT"
    );
  }

  if (config.rateLimit.maxWaitMs < config.rateLimit.windowMs) {
    throw new ConfigurationError(
      "Max wait must be >= the rate limit window",
      "RATE_LIMIT_MAX_WAIT_MS"
    );
  }

  if (config.schemaCache.enabled && !config.schemaCache.directory) {
    throw new ConfigurationError(
      "A cache directory is required when schema caching is enabled",
      "SCHEMA_CACHE_DIR"
    );
  }
}

let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

export function resetConfig(): void {
  configInstance = null;
}
