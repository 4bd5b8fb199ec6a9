// src/utility/websocket.ts

import { RawData, WebSocket } from "ws";
import logger from "./logger";
import { ConnectionClosedError } from "./errors";

/**
 * Client side of the simulator WebSocket. Frames are pulled with a bounded
 * `receive` so the listener loop can adapt its timeout and notice stop requests.
 */
export interface WebSocketTransport {
  readonly isOpen: boolean;
  open(url: string): Promise<void>;
  /** @throws ConnectionClosedError when the socket is not open */
  send(text: string): void;
  /**
   * Resolves with the next text frame, or null on timeout.
   * @throws ConnectionClosedError once the socket has closed and the queue is drained
   */
  receive(timeoutMs: number): Promise<string | null>;
  close(): void;
}

export type WebSocketTransportFactory = () => WebSocketTransport;

interface Waiter {
  resolve: (text: string | null) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

class WebSocketClient implements WebSocketTransport {
  private socket: WebSocket | null = null;
  private queue: string[] = [];
  private waiter: Waiter | null = null;
  private closeReason: string | null = null;

  public get isOpen(): boolean {
    return this.socket !== null && this.socket.readyState === WebSocket.OPEN;
  }

  public open(url: string): Promise<void> {
    this.queue = [];
    this.closeReason = null;
    const socket = new WebSocket(url);
    this.socket = socket;

    socket.on("message", (data: RawData, isBinary: boolean) => {
      if (this.socket !== socket) {
        return;
      }
      if (isBinary) {
        logger.warn(`Ignoring binary frame from ${url}`);
        return;
      }
      this.push(data.toString());
    });
    socket.on("close", (code: number, reason: Buffer) => {
      if (this.socket !== socket) {
        return;
      }
      const detail = reason.length > 0 ? ` ${reason.toString()}` : "";
      this.shutdown(`websocket closed (${code}${detail})`);
    });

    return new Promise((resolve, reject) => {
      const onError = (error: Error) => {
        socket.removeListener("open", onOpen);
        this.shutdown(`websocket error: ${error.message}`);
        reject(error);
      };
      const onOpen = () => {
        socket.removeListener("error", onError);
        socket.on("error", (error: Error) => {
          logger.error(`WebSocket error: ${error.message}`);
        });
        logger.info(`WebSocket opened at ${url}`);
        resolve();
      };
      socket.once("open", onOpen);
      socket.once("error", onError);
    });
  }

  public send(text: string): void {
    if (!this.socket || !this.isOpen) {
      throw new ConnectionClosedError("websocket not open");
    }
    this.socket.send(text);
  }

  public receive(timeoutMs: number): Promise<string | null> {
    const next = this.queue.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }
    if (this.closeReason !== null) {
      return Promise.reject(new ConnectionClosedError(this.closeReason));
    }
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve(null);
      }, timeoutMs);
      this.waiter = { resolve, reject, timer };
    });
  }

  public close(): void {
    if (this.socket) {
      this.socket.close();
    }
    this.shutdown("websocket closed by client");
  }

  private push(text: string) {
    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      clearTimeout(waiter.timer);
      waiter.resolve(text);
      return;
    }
    this.queue.push(text);
  }

  private shutdown(reason: string) {
    if (this.closeReason !== null) {
      return;
    }
    this.closeReason = reason;
    this.socket = null;
    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      clearTimeout(waiter.timer);
      waiter.reject(new ConnectionClosedError(reason));
    }
  }
}

export function createWebSocketTransport(): WebSocketTransport {
  return new WebSocketClient();
}
