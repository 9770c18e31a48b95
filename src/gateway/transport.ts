import { EventEmitter, once } from "node:events";
import { RawData, WebSocket } from "ws";
import { GatewayError, GatewayErrorKind } from "../utils/errors";

export enum GatewayTimeouts {
  handshake = 30_000,
  hello = 60_000,
}

export type TransportFrame =
  | { kind: "text"; payload: string }
  | { kind: "binary"; payload: Buffer };

export type TransportEventsMap = {
  open: [];
  frame: [frame: TransportFrame];
  closed: [payload: { code: number; reason: string }];
  error: [error: Error];
};

/** One WebSocket session. Ping and pong never surface here. */
export interface Transport extends EventEmitter<TransportEventsMap> {
  readonly isOpen: boolean;
  /** Resolves once the frame was handed to the socket */
  send(text: string): Promise<void>;
  /** Resolves once the socket is closed */
  close(code: number, reason?: string): Promise<void>;
}

export type TransportFactory = (url: string) => Transport;

const toBuffer = (data: RawData): Buffer => {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
};

export class WebSocketTransport
  extends EventEmitter<TransportEventsMap>
  implements Transport
{
  private readonly ws: WebSocket;

  constructor(url: string, handshakeTimeout: number = GatewayTimeouts.handshake) {
    super();
    this.ws = new WebSocket(url, { handshakeTimeout });

    this.ws.on("open", () => {
      this.emit("open");
    });

    this.ws.on("message", (data, isBinary) => {
      const payload = toBuffer(data);
      this.emit(
        "frame",
        isBinary
          ? { kind: "binary", payload }
          : { kind: "text", payload: payload.toString("utf8") }
      );
    });

    this.ws.on("close", (code, reason) => {
      this.emit("closed", { code, reason: reason.toString("utf8") });
    });

    this.ws.on("error", (error) => {
      this.emit(
        "error",
        new GatewayError(GatewayErrorKind.TransportFailure, error.message, {
          cause: error,
        })
      );
    });
  }

  get isOpen() {
    return this.ws.readyState === WebSocket.OPEN;
  }

  send(text: string): Promise<void> {
    if (!this.isOpen) {
      return Promise.reject(
        new GatewayError(
          GatewayErrorKind.TransportFailure,
          "Cannot send payload; the socket is not open"
        )
      );
    }

    return new Promise((resolve, reject) => {
      this.ws.send(text, (error) => {
        if (error) {
          reject(
            new GatewayError(GatewayErrorKind.TransportFailure, error.message, {
              cause: error,
            })
          );
        } else {
          resolve();
        }
      });
    });
  }

  async close(code: number, reason?: string): Promise<void> {
    if (this.ws.readyState === WebSocket.CLOSED) return;

    const closed = once(this.ws, "close");
    if (this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.terminate();
    } else if (this.ws.readyState === WebSocket.OPEN) {
      this.ws.close(code, reason);
    }
    await closed;
  }
}

export const webSocketTransport: TransportFactory = (url) => new WebSocketTransport(url);
