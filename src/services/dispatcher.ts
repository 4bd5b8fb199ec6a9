// src/services/dispatcher.ts

import logger, { trafficLogger } from "../utility/logger";
import { CallbackRegistry } from "../utility/callbacks";
import { NotConnectedError } from "../utility/errors";
import { decodeDataValue } from "../utility/valuecodec";
import { decodeFrame, encodeFrame } from "../utility/wsframe";
import { WebSocketTransport } from "../utility/websocket";
import { MetadataCache } from "../store/metadatastore";
import { SubscriptionTable } from "../store/subscriptiontable";
import { DatarefValue } from "../dataset/common";
import { CommandMeta, DatarefMeta, ValueKind } from "../dataset/metadata";
import {
  CommandActiveFrame,
  DatarefUpdateFrame,
  OutboundRequest,
  RequestResult,
  ResultFrame,
  wsResponseTypes,
} from "../dataset/messages";

/** One value delivered to `datarefUpdate` callbacks. */
export interface DatarefUpdate {
  path: string;
  index?: number;
  /** path, or path[index] for an array element */
  name: string;
  value: DatarefValue;
}

export type ClientEvents = {
  open: [];
  close: [];
  requestFeedback: [result: RequestResult];
  datarefUpdate: [update: DatarefUpdate];
  commandActive: [path: string, active: boolean];
  afterStart: [connected: boolean];
  beforeStop: [connected: boolean];
};

export interface DispatcherContext {
  datarefs: MetadataCache<DatarefMeta>;
  commands: MetadataCache<CommandMeta>;
  subscriptions: SubscriptionTable;
  values: Map<string, DatarefValue>;
}

interface PendingRequest {
  type: string;
  settle: (result: RequestResult) => void;
  settled: Promise<RequestResult>;
}

/**
 * Tags outbound requests with a request id and routes inbound frames:
 * results settle the matching pending request, value frames are turned
 * into callbacks.
 */
export class Dispatcher {
  public readonly events = new CallbackRegistry<ClientEvents>();

  private transport: WebSocketTransport | null = null;
  private lastRequestId = 0;
  private pending: Map<number, PendingRequest> = new Map();

  constructor(private readonly context: DispatcherContext) {}

  public attach(transport: WebSocketTransport): void {
    this.transport = transport;
  }

  public detach(): void {
    this.transport = null;
  }

  public get pendingCount(): number {
    return this.pending.size;
  }

  public nextRequestId(): number {
    this.lastRequestId++;
    return this.lastRequestId;
  }

  /**
   * Sends a request and returns its id.
   *
   * @throws NotConnectedError when no WebSocket is open
   */
  public send(request: OutboundRequest): number {
    const transport = this.transport;
    if (!transport || !transport.isOpen) {
      throw new NotConnectedError(`send ${request.type}`);
    }
    const reqId = this.nextRequestId();
    const text = encodeFrame(request, reqId);

    let settle: (result: RequestResult) => void = () => undefined;
    const settled = new Promise<RequestResult>((resolve) => {
      settle = resolve;
    });
    this.pending.set(reqId, { type: request.type, settle, settled });

    try {
      transport.send(text);
    } catch (error) {
      this.pending.delete(reqId);
      throw error;
    }
    trafficLogger.info(`>>> ${text}`);
    return reqId;
  }

  /**
   * Waits for the simulator's answer to `reqId`. Never rejects: a timeout or
   * a closed connection come back as an unsuccessful result.
   */
  public awaitResult(reqId: number, timeoutMs: number): Promise<RequestResult> {
    const request = this.pending.get(reqId);
    if (!request) {
      return Promise.resolve({
        requestId: reqId,
        success: false,
        errorMessage: "unknown or already settled request",
      });
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<RequestResult>((resolve) => {
      timer = setTimeout(() => {
        if (this.pending.get(reqId) === request) {
          this.pending.delete(reqId);
        }
        resolve({
          requestId: reqId,
          success: false,
          errorMessage: `no result after ${timeoutMs}ms`,
        });
      }, timeoutMs);
    });
    return Promise.race([request.settled, timeout]).finally(() => clearTimeout(timer));
  }

  /** Settles every pending request as failed, e.g. when the socket closed. */
  public failPending(reason: string): void {
    if (this.pending.size > 0) {
      logger.info(`${this.pending.size} pending request(s) failed: ${reason}`);
    }
    const pending = this.pending;
    this.pending = new Map();
    pending.forEach((request, reqId) => {
      request.settle({ requestId: reqId, success: false, errorMessage: reason });
    });
  }

  /** Handles one inbound text frame. Malformed frames are logged and dropped. */
  public handle(raw: string): void {
    trafficLogger.info(`<<< ${raw}`);
    const decoded = decodeFrame(raw);
    if (!decoded.ok) {
      logger.warn(`Dropping frame: ${decoded.reason}`);
      return;
    }
    const frame = decoded.frame;
    switch (frame.type) {
      case wsResponseTypes.result:
        this.onResult(frame);
        break;
      case wsResponseTypes.datarefUpdate:
        this.onDatarefUpdate(frame);
        break;
      case wsResponseTypes.commandActive:
        this.onCommandActive(frame);
        break;
    }
  }

  private onResult(frame: ResultFrame) {
    const result: RequestResult = {
      requestId: frame.req_id,
      success: frame.success,
      errorCode: frame.error_code,
      errorMessage: frame.error_message,
    };
    const request = this.pending.get(frame.req_id);
    if (request) {
      this.pending.delete(frame.req_id);
      request.settle(result);
    } else {
      logger.debug(`Result for unknown request ${frame.req_id}`);
    }
    if (!result.success) {
      const label = request ? `${frame.req_id} (${request.type})` : `${frame.req_id}`;
      logger.warn(
        `Request ${label} failed: ${result.errorMessage ?? "no message"} ` +
          `(${result.errorCode ?? "no code"})`
      );
    }
    this.events.emit("requestFeedback", result);
  }

  private onCommandActive(frame: CommandActiveFrame) {
    Object.entries(frame.data).forEach(([key, active]) => {
      const identifier = Number(key);
      const meta = this.context.commands.getById(identifier);
      if (!meta) {
        logger.warn(`Command active for ${this.context.commands.equiv(identifier)}`);
        return;
      }
      logger.debug(`Command ${meta.name} active: ${active}`);
      this.events.emit("commandActive", meta.name, active);
    });
  }

  private onDatarefUpdate(frame: DatarefUpdateFrame) {
    Object.entries(frame.data).forEach(([key, value]) => {
      const identifier = Number(key);
      const meta = this.context.datarefs.getById(identifier);
      if (!meta) {
        logger.warn(`Value for ${this.context.datarefs.equiv(identifier)}`);
        return;
      }

      switch (meta.valueKind) {
        case ValueKind.Bytes:
          this.deliver(
            meta.name,
            undefined,
            typeof value === "string" ? decodeDataValue(value) : value
          );
          return;
        case ValueKind.Scalar:
          this.deliver(meta.name, undefined, value);
          return;
        case ValueKind.Array:
          if (!Array.isArray(value)) {
            this.deliver(meta.name, undefined, value);
            return;
          }
          this.deliverArray(meta, identifier, value);
          return;
      }
    });
  }

  private deliverArray(meta: DatarefMeta, identifier: number, values: number[]) {
    const reconciled = this.context.subscriptions.reconcile(identifier, values.length);
    switch (reconciled.kind) {
      case "unknown":
        logger.debug(`${meta.name}: values received for an array no longer monitored`);
        return;
      case "whole":
        this.deliver(meta.name, undefined, values);
        reconciled.elements.forEach((index) => {
          if (index < values.length) {
            this.deliver(meta.name, index, values[index]);
          }
        });
        return;
      case "unmatched":
        logger.warn(
          `${meta.name}: ${values.length} values do not match requested indices ` +
            `[${reconciled.current.join(", ")}] or any previous request, dropped`
        );
        return;
      case "elements":
        if (reconciled.fromHistory) {
          logger.debug(
            `${meta.name}: values matched previous indices [${reconciled.indices.join(", ")}]`
          );
        }
        reconciled.indices.forEach((index, position) => {
          this.deliver(meta.name, index, values[position]);
        });
        return;
    }
  }

  private deliver(path: string, index: number | undefined, value: DatarefValue) {
    const name = index === undefined ? path : `${path}[${index}]`;
    this.context.values.set(name, value);
    this.events.emit("datarefUpdate", { path, index, name, value });
  }
}
