import pino from "pino";
import { getConfig } from "../config/index.js";
import type { Config } from "../config/index.js";

export interface LogContext {
  requestId?: string;
  sessionId?: string;
  endpoint?: string;
  attempt?: number;
  duration?: number;
  error?: Error;
  [key: string]: unknown;
}

export interface PerformanceTimer {
  start: number;
  end(): number;
  log(logger: pino.Logger, message: string, context?: LogContext): void;
}

export function createTimer(): PerformanceTimer {
  const start = Date.now();

  return {
    start,
    end: () => Date.now() - start,
    log: (logger: pino.Logger, message: string, context?: LogContext): void => {
      const duration = Date.now() - start;
      logger.info({ duration, ...context }, message);
    },
  };
}

const SENSITIVE_HEADERS = ["authorization", "cookie", "x-auth-token", "x-api-key", "x-access-token"];

export function redactHeaders(headers: Record<string, string> = {}): Record<string, string> {
  const redacted: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    redacted[key] = SENSITIVE_HEADERS.includes(key.toLowerCase()) ? "[REDACTED]" : value;
  }
  return redacted;
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return (
    typeof value === "object" &&
    value !== null &&
    Object.values(value).every((entry) => typeof entry === "string")
  );
}

function createBaseConfig(config: Config): pino.LoggerOptions {
  return {
    name: config.serviceName,
    level: config.logging.level,

    base: {
      pid: process.pid,
      environment: config.environment,
      version: config.version,
    },

    serializers: {
      error: pino.stdSerializers.err,
      headers: (headers: unknown) => (isStringRecord(headers) ? redactHeaders(headers) : headers),
    },

    redact: {
      paths: config.logging.redactPaths,
      censor: "[REDACTED]",
    },

    formatters: {
      level: (label: string) => ({ level: label }),
    },
  };
}

function createPrettyConfig(): pino.TransportSingleOptions {
  return {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "HH:MM:ss.l",
      ignore: "pid,environment,version",
      messageFormat: "[{component}] {msg}",
      errorLikeObjectKeys: ["error", "err"],
      destination: 2,
    },
  };
}

export function createLogger(customConfig?: Partial<Config>): pino.Logger {
  const config = customConfig ? { ...getConfig(), ...customConfig } : getConfig();
  const baseConfig = createBaseConfig(config);

  if (
    config.logging.pretty &&
    config.environment === "development" &&
    process.env["NODE_ENV"] !== "test"
  ) {
    return pino({
      ...baseConfig,
      transport: createPrettyConfig(),
    });
  }

  // stdout belongs to the host application
  return pino(baseConfig, pino.destination(2));
}

let rootLogger: pino.Logger | null = null;
const componentLoggers: Map<string, pino.Logger> = new Map();

export function getRootLogger(): pino.Logger {
  if (!rootLogger) {
    rootLogger = createLogger();
  }
  return rootLogger;
}

export function getLogger(component: string): pino.Logger {
  const existing = componentLoggers.get(component);
  if (existing) {
    return existing;
  }
  const logger = getRootLogger().child({ component });
  componentLoggers.set(component, logger);
  return logger;
}

export function createRequestLogger(requestId: string, parent?: pino.Logger): pino.Logger {
  return (parent ?? getRootLogger()).child({
    requestId,
    type: "request",
  });
}

export function logError(
  logger: pino.Logger,
  error: unknown,
  message: string,
  context?: LogContext
): void {
  const errorObj = error instanceof Error ? error : new Error(String(error));

  logger.error(
    {
      error: {
        message: errorObj.message,
        name: errorObj.name,
        stack: errorObj.stack,
        ...("code" in errorObj && typeof errorObj.code !== "undefined" && { code: errorObj.code }),
      },
      ...context,
    },
    message
  );
}

export type { Logger } from "pino";
