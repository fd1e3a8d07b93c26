import Ajv from "ajv";
import type { Variables } from "graphql-request";
import { getLogger } from "../logging/index.js";

const logger = getLogger("subscription-protocol");

/** Sub-protocol name negotiated during the WebSocket handshake (legacy Apollo protocol). */
export const GQL_WS_SUBPROTOCOL = "graphql-ws";

export interface StartPayload {
  headers: Record<string, string>;
  query: string;
  variables: Variables;
}

export type ClientFrame =
  | {
      type: "connection_init";
      payload: { headers: Record<string, string>; Authorization: string };
    }
  | { type: "start"; id: string; payload: StartPayload }
  | { type: "stop"; id: string }
  | { type: "connection_terminate" };

export const SERVER_FRAME_TYPES = [
  "connection_ack",
  "connection_error",
  "ka",
  "data",
  "error",
  "complete",
] as const;

export type ServerFrameType = (typeof SERVER_FRAME_TYPES)[number];

export interface ServerFrame {
  type: ServerFrameType;
  id?: string;
  payload?: unknown;
}

interface RawServerFrame {
  type?: ServerFrameType;
  id?: string;
  payload?: unknown;
}

const serverFrameSchema = {
  type: "object",
  properties: {
    type: { type: "string", enum: SERVER_FRAME_TYPES },
    id: { type: "string" },
  },
  anyOf: [{ required: ["type"] }, { required: ["payload"] }],
};

const validateServerFrame = new Ajv().compile<RawServerFrame>(serverFrameSchema);

/**
 * Decodes one text frame from the server. A frame with a payload and no type
 * is a data frame. Returns null for anything that is not a valid frame.
 */
export function parseServerFrame(raw: string): ServerFrame | null {
  let body: unknown;
  try {
    body = JSON.parse(raw);
  } catch (error) {
    logger.warn({ error, length: raw.length }, "Dropping non-JSON frame");
    return null;
  }

  if (!validateServerFrame(body)) {
    logger.warn({ errors: validateServerFrame.errors }, "Dropping malformed frame");
    return null;
  }

  const frame: ServerFrame = { type: body.type ?? "data" };
  if (body.id !== undefined) {
    frame.id = body.id;
  }
  if (body.payload !== undefined) {
    frame.payload = body.payload;
  }
  return frame;
}

export function encodeClientFrame(frame: ClientFrame): string {
  return JSON.stringify(frame);
}
