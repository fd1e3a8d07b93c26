import { EventEmitter } from "node:events";
import { parse, print, type DocumentNode } from "graphql";
import type { Variables } from "graphql-request";
import { v4 as uuidv4 } from "uuid";
import { getConfig } from "../config/index.js";
import {
  InternalClientError,
  InvalidParametersError,
  InvalidQueryError,
  SubscriptionError,
  WebSocketDisconnectionError,
} from "../errors/index.js";
import { getLogger, logError } from "../logging/index.js";
import type { ServerFrame } from "./protocol.js";
import type { ClientSession } from "./session.js";
import { SubscriptionSocket, type SocketFactory } from "./subscription-socket.js";

const logger = getLogger("subscription-client");

const MAX_RECONNECT_DELAY_MS = 30_000;

export type SubscriptionCallback = (sessionId: string, payload: unknown) => void | Promise<void>;

export interface SubscribeOptions {
  /** Sent inside the `start` payload. Credentials travel in `connection_init` only. */
  headers?: Record<string, string>;
  onError?: (error: Error) => void;
  onComplete?: () => void;
}

export interface SubscriptionHandle {
  readonly id: string;
  pause(): void;
  unpause(): void;
  stop(): void;
  isRunning(): boolean;
  isPaused(): boolean;
  /** Consecutive connection failures since this session last received a frame. */
  getFailedReconnects(): number;
}

export type StopReason = "stopped" | "completed" | "error" | "disconnected" | "closed";

export interface SubscriptionClientEvents {
  connected: () => void;

  disconnected: (code: number, reason: string) => void;

  reconnecting: (attempt: number, delayMs: number) => void;

  sessionStopped: (sessionId: string, reason: StopReason) => void;
}

export interface SubscriptionClientOptions {
  maxReconnects?: number;
  reconnectDelay?: number;
  connectTimeout?: number;
  socketFactory?: SocketFactory;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

interface SubscriptionSession {
  readonly id: string;
  wireId: string;
  readonly query: string;
  readonly variables: Variables;
  readonly headers: Record<string, string>;
  readonly callback: SubscriptionCallback;
  readonly onError: ((error: Error) => void) | undefined;
  readonly onComplete: (() => void) | undefined;
  running: boolean;
  paused: boolean;
  failedReconnects: number;
  /** Connection on which the current `start` frame was sent. */
  connection: number;
  /** Tail of the callback chain; keeps deliveries in frame order. */
  queue: Promise<void>;
}

/**
 * Multiplexes GraphQL subscriptions over one `graphql-ws` connection and
 * keeps them alive across disconnections.
 */
export class SubscriptionClient extends EventEmitter {
  private readonly socket: SubscriptionSocket;
  private readonly sessions = new Map<string, SubscriptionSession>();
  private readonly byWireId = new Map<string, SubscriptionSession>();
  private readonly maxReconnects: number;
  private readonly reconnectDelay: number;
  private readonly sleep: ((ms: number) => Promise<void>) | undefined;
  private connecting: Promise<void> | null = null;
  private connection = 0;
  private reconnecting = false;
  private closed = false;
  private pendingWait: { timer: NodeJS.Timeout; resolve: () => void } | null = null;

  constructor(
    session: ClientSession,
    options: SubscriptionClientOptions = {}
  ) {
    super();
    const config = getConfig().subscription;

    this.maxReconnects = options.maxReconnects ?? config.maxReconnects;
    this.reconnectDelay = options.reconnectDelay ?? config.reconnectDelay;
    if (!Number.isInteger(this.maxReconnects) || this.maxReconnects < 1) {
      throw new InvalidParametersError("maxReconnects", "must be a positive integer", this.maxReconnects);
    }
    if (this.reconnectDelay < 0) {
      throw new InvalidParametersError("reconnectDelay", "must not be negative", this.reconnectDelay);
    }
    this.sleep = options.sleep;

    this.socket = new SubscriptionSocket({
      url: session.wsEndpoint,
      authorization: session.authorization,
      headers: session.headers(),
      verifyTls: session.transport.verifyTls,
      connectTimeout: options.connectTimeout ?? config.connectTimeout,
      socketFactory: options.socketFactory,
      now: options.now,
    });
    this.socket.on("frame", (frame: ServerFrame) => this.handleFrame(frame));
    this.socket.on("close", (code: number, reason: string) => this.handleDisconnect(code, reason));
  }

  async subscribe(
    query: string | DocumentNode,
    variables: Variables | undefined,
    callback: SubscriptionCallback,
    options: SubscribeOptions = {}
  ): Promise<SubscriptionHandle> {
    if (this.closed) {
      throw new InternalClientError("subscription client is closed");
    }

    const queryString = toQueryString(query);
    await this.ensureConnected();

    const session: SubscriptionSession = {
      id: uuidv4(),
      wireId: uuidv4(),
      query: queryString,
      variables: variables ?? {},
      headers: options.headers ?? {},
      callback,
      onError: options.onError,
      onComplete: options.onComplete,
      running: true,
      paused: false,
      failedReconnects: 0,
      connection: this.connection,
      queue: Promise.resolve(),
    };

    this.sessions.set(session.id, session);
    this.byWireId.set(session.wireId, session);
    this.sendStart(session);

    logger.info({ sessionId: session.id }, "Subscription started");

    return {
      id: session.id,
      pause: (): void => {
        session.paused = true;
      },
      unpause: (): void => {
        session.paused = false;
      },
      stop: (): void => {
        if (session.running) {
          this.stopSession(session, "stopped");
        }
      },
      isRunning: (): boolean => session.running,
      isPaused: (): boolean => session.paused,
      getFailedReconnects: (): number => session.failedReconnects,
    };
  }

  /**
   * Runs a document over the socket and resolves with the first data payload.
   */
  queryOnce(
    query: string | DocumentNode,
    variables?: Variables,
    headers?: Record<string, string>
  ): Promise<unknown> {
    return new Promise<unknown>((resolve, reject) => {
      let handle: SubscriptionHandle | null = null;
      let settled = false;

      const settle = (action: () => void): void => {
        if (settled) {
          return;
        }
        settled = true;
        handle?.stop();
        action();
      };

      void this.subscribe(
        query,
        variables,
        (_sessionId, payload) => {
          settle(() => resolve(payload));
        },
        {
          headers,
          onError: (error) => settle(() => reject(error)),
          onComplete: () =>
            settle(() => reject(new SubscriptionError(handle?.id ?? "", "completed without data"))),
        }
      ).then(
        (created) => {
          handle = created;
          if (settled) {
            created.stop();
          }
        },
        (error: unknown) => settle(() => reject(error))
      );
    });
  }

  /**
   * Drops the current connection, reconnects and resubmits every running
   * subscription. Not counted as a connection failure.
   */
  async resetConnection(): Promise<void> {
    if (this.closed) {
      throw new InternalClientError("subscription client is closed");
    }

    logger.info({ sessions: this.runningSessions().length }, "Resetting subscription connection");
    this.socket.close();
    this.connecting = null;

    try {
      await this.ensureConnected();
    } catch (error) {
      this.startReconnect();
      throw error;
    }
    this.resubmitAll();
  }

  getConnectionAge(): number {
    return this.socket.getConnectionAge();
  }

  isConnected(): boolean {
    return this.socket.isConnected();
  }

  /** Stops every subscription and the connection; no callback runs afterwards. */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    for (const session of this.runningSessions()) {
      this.stopSession(session, "closed");
    }
    if (this.pendingWait !== null) {
      clearTimeout(this.pendingWait.timer);
      this.pendingWait.resolve();
      this.pendingWait = null;
    }
    this.socket.close();
    logger.info("Subscription client closed");
  }

  private runningSessions(): SubscriptionSession[] {
    return [...this.sessions.values()].filter((session) => session.running);
  }

  /**
   * Every connection attempt goes through here, so that `subscribe()`, the
   * reconnection loop and `resetConnection()` share one handshake.
   */
  private ensureConnected(): Promise<void> {
    if (this.socket.isConnected()) {
      return Promise.resolve();
    }
    if (this.connecting !== null) {
      return this.connecting;
    }

    const attempt = this.socket.connect().then(() => {
      this.connection++;
      this.emit("connected");
    });
    const settle = (): void => {
      if (this.connecting === attempt) {
        this.connecting = null;
      }
    };
    this.connecting = attempt;
    void attempt.then(settle, settle);
    return attempt;
  }

  private sendStart(session: SubscriptionSession): void {
    session.connection = this.connection;
    this.socket.send({
      type: "start",
      id: session.wireId,
      payload: {
        headers: session.headers,
        query: session.query,
        variables: session.variables,
      },
    });
  }

  private handleFrame(frame: ServerFrame): void {
    if (frame.type === "ka") {
      for (const session of this.sessions.values()) {
        session.failedReconnects = 0;
      }
      return;
    }

    if (frame.type === "connection_ack" || frame.type === "connection_error") {
      logger.debug({ type: frame.type }, "Ignoring connection frame after handshake");
      return;
    }

    const session = frame.id === undefined ? undefined : this.byWireId.get(frame.id);
    if (session === undefined || !session.running) {
      logger.debug({ type: frame.type, id: frame.id }, "Dropping frame for unknown subscription");
      return;
    }

    session.failedReconnects = 0;

    switch (frame.type) {
      case "data":
        if (session.paused) {
          logger.debug({ sessionId: session.id }, "Subscription paused, dropping data frame");
          return;
        }
        this.enqueue(session, () => {
          if (session.running && !session.paused && !this.closed) {
            return session.callback(session.id, frame.payload);
          }
          return undefined;
        });
        return;

      case "error": {
        const error = new SubscriptionError(session.id, frame.payload);
        logger.warn({ sessionId: session.id, payload: frame.payload }, "Subscription error frame");
        this.stopSession(session, "error");
        this.notify(session, () => session.onError?.(error));
        return;
      }

      case "complete":
        logger.info({ sessionId: session.id }, "Subscription completed by the server");
        this.stopSession(session, "completed");
        this.notify(session, () => session.onComplete?.());
        return;
    }
  }

  private enqueue(session: SubscriptionSession, task: () => void | Promise<void>): void {
    session.queue = session.queue.then(async () => {
      try {
        await task();
      } catch (error) {
        logError(logger, error, "Subscription callback failed", { sessionId: session.id });
        const reported = error instanceof Error ? error : new Error(String(error));
        this.notify(session, () => session.onError?.(reported));
      }
    });
  }

  /** Queues a listener call behind any pending deliveries. */
  private notify(session: SubscriptionSession, listener: () => void): void {
    session.queue = session.queue.then(() => {
      if (this.closed) {
        return;
      }
      try {
        listener();
      } catch (error) {
        logger.error({ sessionId: session.id, error }, "Subscription listener failed");
      }
    });
  }

  private stopSession(session: SubscriptionSession, reason: StopReason): void {
    session.running = false;
    this.sessions.delete(session.id);
    this.byWireId.delete(session.wireId);

    if (this.socket.isConnected() && reason !== "disconnected") {
      try {
        this.socket.send({ type: "stop", id: session.wireId });
      } catch (error) {
        logger.debug({ sessionId: session.id, error }, "Could not send stop frame");
      }
    }

    logger.debug({ sessionId: session.id, reason }, "Subscription stopped");
    this.emit("sessionStopped", session.id, reason);
  }

  private handleDisconnect(code: number, reason: string): void {
    if (this.closed) {
      return;
    }
    this.emit("disconnected", code, reason);
    this.startReconnect();
  }

  private startReconnect(): void {
    this.reconnect().catch((error: unknown) => {
      logError(logger, error, "Reconnection loop failed");
    });
  }

  private async reconnect(): Promise<void> {
    if (this.reconnecting) {
      return;
    }
    this.reconnecting = true;

    try {
      while (!this.closed) {
        const survivors = this.countFailure();
        if (survivors.length === 0) {
          logger.info("No subscription left to resume, staying disconnected");
          return;
        }

        const attempt = Math.max(...survivors.map((session) => session.failedReconnects));
        const delay = Math.min(
          this.reconnectDelay * Math.pow(2, attempt - 1),
          MAX_RECONNECT_DELAY_MS
        );

        logger.info(
          { attempt, delay, sessions: survivors.length },
          "Scheduling subscription reconnection"
        );
        this.emit("reconnecting", attempt, delay);

        await this.wait(delay);
        if (this.closed) {
          return;
        }

        try {
          await this.ensureConnected();
        } catch (error) {
          logger.warn({ attempt, error }, "Subscription reconnection failed");
          continue;
        }

        this.resubmitAll();
        return;
      }
    } finally {
      this.reconnecting = false;
    }
  }

  /**
   * Records one connection failure on every running session and stops the
   * ones that reached the limit. Returns the sessions still running.
   */
  private countFailure(): SubscriptionSession[] {
    const survivors: SubscriptionSession[] = [];

    for (const session of this.runningSessions()) {
      session.failedReconnects += 1;

      if (session.failedReconnects >= this.maxReconnects) {
        const error = new WebSocketDisconnectionError(session.id, session.failedReconnects);
        logger.error(
          { sessionId: session.id, failedReconnects: session.failedReconnects },
          "Subscription gave up reconnecting"
        );
        this.stopSession(session, "disconnected");
        this.notify(session, () => session.onError?.(error));
      } else {
        survivors.push(session);
      }
    }

    return survivors;
  }

  /** Restarts the sessions whose `start` went out on an earlier connection. */
  private resubmitAll(): void {
    for (const session of this.runningSessions()) {
      if (session.connection === this.connection) {
        continue;
      }
      this.byWireId.delete(session.wireId);
      session.wireId = uuidv4();
      this.byWireId.set(session.wireId, session);
      this.sendStart(session);
      logger.info(
        { sessionId: session.id, failedReconnects: session.failedReconnects },
        "Subscription resubmitted"
      );
    }
  }

  private wait(ms: number): Promise<void> {
    if (this.sleep !== undefined) {
      return this.sleep(ms);
    }
    return new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.pendingWait = null;
        resolve();
      }, ms);
      this.pendingWait = { timer, resolve };
    });
  }
}

function toQueryString(query: string | DocumentNode): string {
  if (typeof query !== "string") {
    return print(query);
  }
  try {
    parse(query);
  } catch (error) {
    throw new InvalidQueryError(error instanceof Error ? error.message : String(error), error);
  }
  return query;
}
