import { EventEmitter } from "node:events";
import WebSocket from "ws";
import { GraphQLConnectionError, GraphQLTimeoutError } from "../errors/index.js";
import { getLogger } from "../logging/index.js";
import {
  encodeClientFrame,
  GQL_WS_SUBPROTOCOL,
  parseServerFrame,
  type ClientFrame,
} from "./protocol.js";

const logger = getLogger("subscription-socket");

/**
 * The slice of a WebSocket the subscription layer relies on. Text messages
 * arrive already decoded.
 */
export interface SocketLike {
  send(data: string): void;
  close(code?: number, reason?: string): void;
  on(event: "open", listener: () => void): void;
  on(event: "message", listener: (data: string) => void): void;
  on(event: "close", listener: (code: number, reason: string) => void): void;
  on(event: "error", listener: (error: Error) => void): void;
}

export interface SocketFactoryOptions {
  rejectUnauthorized: boolean;
  handshakeTimeout: number;
}

export type SocketFactory = (
  url: string,
  protocol: string,
  options: SocketFactoryOptions
) => SocketLike;

class WsSocket extends EventEmitter implements SocketLike {
  constructor(private readonly ws: WebSocket) {
    super();
    ws.on("open", () => this.emit("open"));
    ws.on("message", (data: WebSocket.RawData) => this.emit("message", data.toString()));
    ws.on("close", (code: number, reason: Buffer) => this.emit("close", code, reason.toString()));
    ws.on("error", (error: Error) => this.emit("error", error));
  }

  send(data: string): void {
    this.ws.send(data);
  }

  close(code?: number, reason?: string): void {
    this.ws.close(code, reason);
  }
}

export const createWebSocket: SocketFactory = (url, protocol, options) =>
  new WsSocket(
    new WebSocket(url, protocol, {
      rejectUnauthorized: options.rejectUnauthorized,
      handshakeTimeout: options.handshakeTimeout,
    })
  );

export interface SubscriptionSocketOptions {
  url: string;
  authorization: string;
  headers: Record<string, string>;
  verifyTls: boolean;
  connectTimeout: number;
  socketFactory?: SocketFactory;
  now?: () => number;
}

/**
 * One acknowledged connection to the subscription endpoint. Emits `frame`
 * for every server frame after the handshake and `close` when the connection
 * drops without `close()` having been called.
 */
export class SubscriptionSocket extends EventEmitter {
  private socket: SocketLike | null = null;
  private connectedAt: number | null = null;
  private abortHandshake: ((error: Error) => void) | null = null;
  private readonly socketFactory: SocketFactory;
  private readonly now: () => number;

  constructor(private readonly options: SubscriptionSocketOptions) {
    super();
    this.socketFactory = options.socketFactory ?? createWebSocket;
    this.now = options.now ?? Date.now;
  }

  isConnected(): boolean {
    return this.connectedAt !== null;
  }

  /** Milliseconds since the last successful (re)connection; 0 when disconnected. */
  getConnectionAge(): number {
    return this.connectedAt === null ? 0 : this.now() - this.connectedAt;
  }

  /**
   * Opens a new connection, replacing any current one, and resolves once the
   * server acknowledges `connection_init`.
   */
  connect(): Promise<void> {
    this.close();

    const { url, connectTimeout } = this.options;
    const socket = this.socketFactory(url, GQL_WS_SUBPROTOCOL, {
      rejectUnauthorized: this.options.verifyTls,
      handshakeTimeout: connectTimeout,
    });
    this.socket = socket;

    return new Promise<void>((resolve, reject) => {
      let acknowledged = false;

      const fail = (error: Error): void => {
        clearTimeout(timer);
        if (this.abortHandshake === fail) {
          this.abortHandshake = null;
        }
        if (this.socket === socket) {
          this.socket = null;
          socket.close(1000, "connection failed");
        }
        reject(error);
      };

      const timer = setTimeout(() => {
        fail(new GraphQLTimeoutError(connectTimeout));
      }, connectTimeout);
      this.abortHandshake = fail;

      socket.on("open", () => {
        socket.send(
          encodeClientFrame({
            type: "connection_init",
            payload: { headers: this.options.headers, Authorization: this.options.authorization },
          })
        );
      });

      socket.on("message", (data) => {
        if (this.socket !== socket) {
          return;
        }
        const frame = parseServerFrame(data);
        if (frame === null) {
          return;
        }

        if (!acknowledged) {
          if (frame.type === "connection_ack") {
            acknowledged = true;
            clearTimeout(timer);
            this.abortHandshake = null;
            this.connectedAt = this.now();
            logger.info({ url }, "Subscription socket connected");
            resolve();
          } else if (frame.type === "connection_error") {
            fail(new GraphQLConnectionError(url, frame.payload));
          }
          return;
        }

        this.emit("frame", frame);
      });

      socket.on("error", (error) => {
        logger.warn({ url, error }, "Subscription socket error");
      });

      socket.on("close", (code, reason) => {
        if (this.socket !== socket) {
          return;
        }
        this.socket = null;

        if (!acknowledged) {
          fail(new GraphQLConnectionError(url, { code, reason }));
          return;
        }

        this.connectedAt = null;
        logger.warn({ url, code, reason }, "Subscription socket closed");
        this.emit("close", code, reason);
      });
    });
  }

  send(frame: ClientFrame): void {
    if (this.socket === null || this.connectedAt === null) {
      throw new GraphQLConnectionError(this.options.url, "socket is not connected");
    }
    this.socket.send(encodeClientFrame(frame));
  }

  /**
   * Tears the connection down without emitting `close`. A handshake still in
   * progress is rejected.
   */
  close(): void {
    const socket = this.socket;
    if (socket === null) {
      return;
    }
    const abort = this.abortHandshake;
    this.abortHandshake = null;
    if (this.connectedAt !== null) {
      try {
        socket.send(encodeClientFrame({ type: "connection_terminate" }));
      } catch (error) {
        logger.debug({ error }, "Could not send connection_terminate");
      }
    }
    this.detach();
    socket.close(1000, "client closed");
    abort?.(new GraphQLConnectionError(this.options.url, "closed during handshake"));
  }

  private detach(): void {
    this.socket = null;
    this.connectedAt = null;
  }
}
