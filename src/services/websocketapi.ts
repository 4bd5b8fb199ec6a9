// src/services/websocketapi.ts

import logger from "../utility/logger";
import { BackgroundLoop } from "../utility/loop";
import { ConnectionClosedError, NotConnectedError } from "../utility/errors";
import { encodeDataValue } from "../utility/valuecodec";
import {
  WebSocketTransport,
  WebSocketTransportFactory,
  createWebSocketTransport,
} from "../utility/websocket";
import { config, WebSocketConfig } from "../config/config";
import ConnectionStore from "../store/connectionstore";
import { CommandSubscriptionTable, SubscriptionTable } from "../store/subscriptiontable";
import { Dataref } from "../entity/dataref";
import { Command } from "../entity/command";
import { WritableValue } from "../dataset/common";
import { BeaconData } from "../dataset/beacon";
import { ConnectionState } from "../dataset/connection";
import { CommandMeta, DatarefMeta, ValueKind } from "../dataset/metadata";
import { IDatarefSetValue, OutboundRequest, wsRequestTypes } from "../dataset/messages";
import { RestApi, RestApiOptions } from "./restapi";
import { ClientEvents, Dispatcher } from "./dispatcher";
import { SubscriptionManager } from "./subscriptionmanager";
import {
  ConnectionMonitor,
  ConnectionMonitorSettings,
  ConnectionTarget,
  defaultMonitorSettings,
} from "./connectionmonitor";
import { BeaconMonitor } from "./beaconmonitor";

export interface WebSocketApiOptions extends RestApiOptions {
  transportFactory?: WebSocketTransportFactory;
  websocket?: Partial<WebSocketConfig>;
  monitor?: Partial<ConnectionMonitorSettings>;
  historyDepth?: number;
}

/**
 * Receive loop of one WebSocket connection. The receive timeout is short
 * until the first frame arrives and longer once data flows.
 */
class WebSocketListener extends BackgroundLoop {
  private receiving = false;

  constructor(
    private readonly transport: WebSocketTransport,
    private readonly dispatcher: Dispatcher,
    private readonly connection: ConnectionStore,
    private readonly settings: WebSocketConfig,
    private readonly onClosed: (reason: string) => void
  ) {
    super("websocket listener", settings.receivingReceiveTimeoutMs + 1000);
  }

  public start(): boolean {
    const started = super.start();
    if (started) {
      this.receiving = false;
      this.connection.setState(ConnectionState.LISTENING);
    }
    return started;
  }

  public async step(): Promise<number> {
    const timeoutMs = this.receiving
      ? this.settings.receivingReceiveTimeoutMs
      : this.settings.searchingReceiveTimeoutMs;

    let text: string | null;
    try {
      text = await this.transport.receive(timeoutMs);
    } catch (error) {
      if (error instanceof ConnectionClosedError) {
        this.halt();
        this.onClosed(error.message);
        return 0;
      }
      throw error;
    }

    if (text === null) {
      logger.debug(`Receive timeout (${timeoutMs}ms), waiting for data from simulator`);
      return 0;
    }
    if (!this.receiving) {
      this.receiving = true;
      this.connection.setState(ConnectionState.RECEIVING);
    }
    this.dispatcher.handle(text);
    return 0;
  }
}

/**
 * Simulator WebSocket API: REST plus push updates, with a reconnecting
 * connection monitor and ref-counted subscriptions.
 */
export class WebSocketApi extends RestApi implements ConnectionTarget {
  public readonly connection = new ConnectionStore();
  public readonly subscriptions: SubscriptionTable;
  public readonly commandSubscriptions = new CommandSubscriptionTable();
  public readonly dispatcher: Dispatcher;
  public readonly monitor: ConnectionMonitor;

  private readonly manager: SubscriptionManager;
  private readonly wsSettings: WebSocketConfig;
  private readonly transportFactory: WebSocketTransportFactory;
  private readonly preferredVersion: string | undefined;
  private transport: WebSocketTransport | null = null;
  private listener: WebSocketListener | null = null;
  // set once metadata is reloaded and subscriptions are rebound
  private ready = false;
  private beaconLossTimer: NodeJS.Timeout | null = null;

  constructor(options: WebSocketApiOptions = {}) {
    super(options);
    this.useRest = false;
    this.preferredVersion = options.version;
    this.wsSettings = { ...config.websocket, ...options.websocket };
    this.transportFactory = options.transportFactory ?? createWebSocketTransport;
    this.subscriptions = new SubscriptionTable(
      options.historyDepth ?? config.subscriptions.historyDepth
    );

    this.dispatcher = new Dispatcher({
      datarefs: this.datarefs,
      commands: this.commands,
      subscriptions: this.subscriptions,
      values: this.values,
    });
    this.manager = new SubscriptionManager({
      datarefs: this.subscriptions,
      commands: this.commandSubscriptions,
      dispatcher: this.dispatcher,
      isConnected: () => this.isReady,
      lookupDataref: (path) => this.lookupDatarefMeta(path),
      lookupCommand: (path) => this.lookupCommandMeta(path),
      datarefIdentifier: (path) => this.datarefs.getByName(path)?.identifier,
      commandIdentifier: (path) => this.commands.getByName(path)?.identifier,
    });
    this.monitor = new ConnectionMonitor(this, this.connection, {
      ...defaultMonitorSettings(),
      ...options.monitor,
    });
  }

  public get wsUrl(): string {
    return this.url("ws");
  }

  public get isConnected(): boolean {
    return this.transport !== null && this.transport.isOpen;
  }

  /** Connected with fresh metadata and every subscription sent again. */
  public get isReady(): boolean {
    return this.ready && this.isConnected;
  }

  public get status(): ConnectionState {
    return this.connection.current;
  }

  public on<K extends keyof ClientEvents>(
    kind: K,
    callback: (...args: ClientEvents[K]) => void
  ): void {
    this.dispatcher.events.on(kind, callback);
  }

  public off<K extends keyof ClientEvents>(
    kind: K,
    callback: (...args: ClientEvents[K]) => void
  ): boolean {
    return this.dispatcher.events.off(kind, callback);
  }

  // --- Lifecycle ---

  /** Starts the connection monitor, which connects as soon as the simulator answers. */
  public connect(): boolean {
    return this.monitor.start();
  }

  /** Stops the connection monitor, closes the WebSocket and invalidates the caches. */
  public async disconnect(): Promise<void> {
    this.clearBeaconLossTimer();
    if (this.listener) {
      this.dispatcher.events.emit("beforeStop", this.isConnected);
    }
    await this.monitor.stop();
    const listener = this.listener;
    this.listener = null;
    this.handleClosed("closed by client");
    if (listener) {
      await listener.stop();
    }
    this.invalidateCaches();
    logger.info("Disconnected");
  }

  /** Drops the current connection and starts over, metadata and subscriptions included. */
  public async resetConnection(): Promise<void> {
    const listener = this.listener;
    this.listener = null;
    this.handleClosed("connection reset");
    if (listener) {
      await listener.stop();
    }
    this.resetConnectionState();
    if (!this.monitor.start()) {
      this.monitor.resume();
    }
  }

  /** Resolves true once connected, false after `timeoutMs`. */
  public waitConnection(timeoutMs: number = this.wsSettings.reconnectIntervalMs): Promise<boolean> {
    if (this.isConnected) {
      return Promise.resolve(true);
    }
    return new Promise((resolve) => {
      const onOpen = () => {
        clearTimeout(timer);
        this.off("open", onOpen);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this.off("open", onOpen);
        resolve(this.isConnected);
      }, timeoutMs);
      this.on("open", onOpen);
    });
  }

  /**
   * Follows the simulator's beacon: a detected beacon sets the address and
   * starts connecting, a lost beacon disconnects unless it returns within
   * the beacon loss timeout.
   */
  public attachBeacon(beacon: BeaconMonitor): void {
    beacon.onChange((connected, data, sameHost) => this.onBeacon(connected, data, sameHost));
  }

  /** The beacon carries the simulator's UDP port; the REST port stays as configured. */
  public onBeacon(connected: boolean, data: BeaconData | null, sameHost = false): void {
    if (connected && data) {
      if (this.beaconLossTimer) {
        logger.info("Beacon back, stop aborted");
      }
      this.clearBeaconLossTimer();
      this.setNetworkAddress(sameHost ? "127.0.0.1" : data.host, this.port);
      if (!this.isConnected) {
        this.connection.setState(ConnectionState.RECEIVING_BEACON);
      }
      if (!this.monitor.start()) {
        this.monitor.resume();
      }
      return;
    }

    if (!this.isConnected) {
      this.connection.setState(ConnectionState.NO_BEACON);
    }
    if (this.beaconLossTimer || !this.monitor.isRunning) {
      return;
    }
    logger.info(`Beacon not detected, will stop in ${this.wsSettings.beaconLossTimeoutMs}ms`);
    this.beaconLossTimer = setTimeout(() => {
      this.beaconLossTimer = null;
      this.disconnect()
        .then(() => this.connection.setState(ConnectionState.NO_BEACON))
        .catch((error) => logger.error(`Stop after beacon loss failed: ${error}`));
    }, this.wsSettings.beaconLossTimeoutMs);
  }

  // --- ConnectionTarget ---

  public async openWebSocket(): Promise<void> {
    await this.setApiVersion(this.preferredVersion);
    const transport = this.transportFactory();
    await transport.open(this.wsUrl);
    this.transport = transport;
    this.dispatcher.attach(transport);
  }

  /**
   * Reload, then rebuild identifiers, then resubscribe, strictly in that order.
   * A failed reload closes the socket so the monitor connects again.
   */
  public async onConnected(): Promise<boolean> {
    const transport = this.transport;
    if (!transport) {
      return false;
    }
    if (!(await this.reloadCaches(true))) {
      this.handleClosed("metadata reload failed", transport);
      return false;
    }
    if (this.transport !== transport) {
      return false;
    }

    const listener = new WebSocketListener(
      transport,
      this.dispatcher,
      this.connection,
      this.wsSettings,
      (reason) => this.handleClosed(reason, transport)
    );
    this.listener = listener;
    listener.start();

    this.ready = true;
    this.manager.resubscribeAll();
    logger.info(`WebSocket API connected to ${this.wsUrl}`);
    this.dispatcher.events.emit("open");
    this.dispatcher.events.emit("afterStart", this.isConnected);
    return true;
  }

  // --- Monitoring ---

  public monitorDataref(dataref: Dataref): Promise<boolean> {
    return this.manager.monitorDatarefs([dataref]);
  }

  public unmonitorDataref(dataref: Dataref): Promise<boolean> {
    return this.manager.unmonitorDatarefs([dataref]);
  }

  /** Monitors all datarefs with one bulk request. */
  public monitorDatarefs(datarefs: Dataref[]): Promise<boolean> {
    return this.manager.monitorDatarefs(datarefs);
  }

  public unmonitorDatarefs(datarefs: Dataref[]): Promise<boolean> {
    return this.manager.unmonitorDatarefs(datarefs);
  }

  public monitorCommand(command: Command): Promise<boolean> {
    return this.manager.monitorCommands([command]);
  }

  public unmonitorCommand(command: Command): Promise<boolean> {
    return this.manager.unmonitorCommands([command]);
  }

  // --- Writes ---

  protected async writeValue(
    dataref: Dataref,
    meta: DatarefMeta,
    value: WritableValue
  ): Promise<boolean> {
    if (this.useRest) {
      return super.writeValue(dataref, meta, value);
    }
    const item: IDatarefSetValue = {
      id: meta.identifier,
      value: meta.valueKind === ValueKind.Bytes ? encodeDataValue(String(value)) : value,
    };
    if (dataref.index !== undefined && meta.isArray) {
      item.index = dataref.index;
    }
    return this.request({
      type: wsRequestTypes.datarefSet,
      params: { datarefs: [item] },
    });
  }

  protected async executeCommand(
    command: Command,
    meta: CommandMeta,
    duration: number
  ): Promise<boolean> {
    if (this.useRest) {
      return super.executeCommand(command, meta, duration);
    }
    return this.request({
      type: wsRequestTypes.commandSetActive,
      params: { commands: [{ id: meta.identifier, is_active: true, duration }] },
    });
  }

  /** Sends a request and waits for its result. */
  private async request(request: OutboundRequest): Promise<boolean> {
    let reqId: number;
    try {
      reqId = this.dispatcher.send(request);
    } catch (error) {
      if (error instanceof NotConnectedError || error instanceof ConnectionClosedError) {
        logger.warn(`${request.type}: ${error.message}`);
        return false;
      }
      throw error;
    }
    const result = await this.dispatcher.awaitResult(reqId, this.wsSettings.resultTimeoutMs);
    return result.success;
  }

  /** Tears down the current connection; a stale `expected` transport is ignored. */
  private handleClosed(reason: string, expected?: WebSocketTransport): void {
    const transport = this.transport;
    if (!transport || (expected !== undefined && expected !== transport)) {
      return;
    }
    this.listener = null;
    this.transport = null;
    this.ready = false;
    transport.close();
    this.dispatcher.detach();
    this.dispatcher.failPending(reason);
    this.manager.suspend();
    this.invalidateCaches();
    this.connection.setState(ConnectionState.WS_DISCONNECTED);
    logger.info(`WebSocket closed: ${reason}`);
    this.dispatcher.events.emit("close");
    this.monitor.kick();
  }

  private clearBeaconLossTimer() {
    if (this.beaconLossTimer) {
      clearTimeout(this.beaconLossTimer);
      this.beaconLossTimer = null;
    }
  }
}
