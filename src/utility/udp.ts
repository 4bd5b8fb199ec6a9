import * as dgram from "dgram";
import { Buffer } from "buffer";
import logger from "./logger";

export interface Datagram {
  data: Buffer;
  host: string;
  port: number;
}

/**
 * Datagram socket with a pull-style receive, so monitor loops can bound each
 * wait and check their stop signal in between.
 */
export interface DatagramSocket {
  /** Resolves with the next datagram, or null when `timeoutMs` elapses first. */
  receive(timeoutMs: number): Promise<Datagram | null>;
  send(data: Buffer, port: number, host: string): Promise<void>;
  close(): void;
}

export type DatagramSocketFactory = () => Promise<DatagramSocket>;

class UDPSocket implements DatagramSocket {
  private queue: Datagram[] = [];
  private waiter: ((datagram: Datagram | null) => void) | null = null;
  private closed = false;

  constructor(private readonly socket: dgram.Socket, private readonly label: string) {
    this.socket.on("message", this.onMessage.bind(this));
    this.socket.on("error", this.onError.bind(this));
    this.socket.on("close", this.onClose.bind(this));
  }

  private onMessage(data: Buffer, rinfo: dgram.RemoteInfo) {
    const datagram: Datagram = { data, host: rinfo.address, port: rinfo.port };
    if (this.waiter) {
      const wake = this.waiter;
      this.waiter = null;
      wake(datagram);
      return;
    }
    this.queue.push(datagram);
  }

  private onError(error: Error) {
    logger.error(`${this.label} socket error: ${error.message}`);
    this.close();
  }

  private onClose() {
    this.closed = true;
    if (this.waiter) {
      const wake = this.waiter;
      this.waiter = null;
      wake(null);
    }
  }

  public receive(timeoutMs: number): Promise<Datagram | null> {
    const next = this.queue.shift();
    if (next) {
      return Promise.resolve(next);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve(null);
      }, timeoutMs);
      this.waiter = (datagram) => {
        clearTimeout(timer);
        resolve(datagram);
      };
    });
  }

  public send(data: Buffer, port: number, host: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.socket.send(data, port, host, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  public close() {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.socket.close();
  }
}

function bind(socket: dgram.Socket, port?: number): Promise<void> {
  return new Promise((resolve, reject) => {
    socket.once("error", reject);
    socket.bind(port, () => {
      socket.removeListener("error", reject);
      resolve();
    });
  });
}

/** Joins `group` on `port` to listen for multicast traffic (the simulator beacon). */
export async function openMulticastSocket(
  group: string,
  port: number
): Promise<DatagramSocket> {
  const socket = dgram.createSocket({ type: "udp4", reuseAddr: true });
  await bind(socket, port);
  socket.addMembership(group);
  logger.debug(`Listening for multicast on ${group}:${port}`);
  return new UDPSocket(socket, "beacon");
}

/** Unicast socket on an ephemeral port, used by the legacy UDP API. */
export async function openUnicastSocket(): Promise<DatagramSocket> {
  const socket = dgram.createSocket("udp4");
  await bind(socket);
  return new UDPSocket(socket, "udp");
}
