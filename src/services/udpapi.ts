// src/services/udpapi.ts

import { Buffer } from "buffer";
import logger from "../utility/logger";
import { BackgroundLoop } from "../utility/loop";
import { CallbackRegistry } from "../utility/callbacks";
import { NotConnectedError } from "../utility/errors";
import { DatagramSocket, DatagramSocketFactory, openUnicastSocket } from "../utility/udp";
import { decodeRrefAnswer, encodeCmnd, encodeDref, encodeRref } from "../utility/udpframe";
import { config, UdpConfig } from "../config/config";
import ConnectionStore from "../store/connectionstore";
import { Dataref, DatarefHost } from "../entity/dataref";
import { Command, CommandHost } from "../entity/command";
import { DatarefValue } from "../dataset/common";
import { BeaconData } from "../dataset/beacon";
import { ConnectionState } from "../dataset/connection";
import { CommandMeta, DatarefMeta } from "../dataset/metadata";
import { DatarefUpdate } from "./dispatcher";
import { BeaconMonitor } from "./beaconmonitor";

export interface UdpApiOptions {
  host?: string;
  port?: number;
  settings?: Partial<UdpConfig>;
  socketFactory?: DatagramSocketFactory;
}

export type UdpEvents = {
  datarefUpdate: [update: DatarefUpdate];
};

/**
 * Legacy UDP access to the simulator: values of single datarefs streamed as
 * floats (RREF), single writes (DREF) and command presses (CMND). There is no
 * metadata, so every path is taken as given.
 */
export class UdpApi extends BackgroundLoop implements DatarefHost, CommandHost {
  public host: string;
  public port: number;
  public readonly connection = new ConnectionStore();
  public readonly events = new CallbackRegistry<UdpEvents>();

  private readonly settings: UdpConfig;
  private readonly socketFactory: DatagramSocketFactory;
  private socket: DatagramSocket | null = null;
  private opening: Promise<DatagramSocket> | null = null;
  private nextIndex = 0;
  // RREF index -> dataref name
  private readonly requested: Map<number, string> = new Map();
  private readonly values: Map<string, number> = new Map();
  private readonly monitors: Map<string, number> = new Map();

  constructor(options: UdpApiOptions = {}) {
    const settings = { ...config.udp, ...options.settings };
    super("udp listener", settings.receiveTimeoutMs + 1000);
    this.settings = settings;
    this.host = options.host ?? config.api.host;
    this.port = options.port ?? settings.port;
    this.socketFactory = options.socketFactory ?? openUnicastSocket;
  }

  /** Takes host and UDP port from the beacon. */
  public attachBeacon(beacon: BeaconMonitor): void {
    beacon.onChange((connected, data) => this.onBeacon(connected, data));
  }

  public onBeacon(connected: boolean, data: BeaconData | null): void {
    if (!connected || !data) {
      return;
    }
    if (data.host !== this.host || data.port !== this.port) {
      logger.info(`UDP address set to ${data.host}:${data.port}`);
      this.host = data.host;
      this.port = data.port;
    }
  }

  public dataref(path: string): Dataref {
    return new Dataref(path, this);
  }

  public command(path: string): Command {
    return new Command(path, this);
  }

  public get monitoredCount(): number {
    return this.requested.size;
  }

  // --- DatarefHost ---

  public datarefMeta(): DatarefMeta | undefined {
    return undefined;
  }

  public cachedValue(name: string): DatarefValue | undefined {
    return this.values.get(name);
  }

  /** Last value streamed for a monitored dataref; UDP has no one-off read. */
  public async fetchDatarefValue(dataref: Dataref): Promise<DatarefValue | undefined> {
    return this.values.get(dataref.name);
  }

  public async writeDataref(dataref: Dataref): Promise<boolean> {
    const value = dataref.pendingValue;
    if (typeof value !== "number") {
      logger.warn(`${dataref.name}: only numbers can be written through UDP`);
      return false;
    }
    await this.sendPacket(encodeDref(value, dataref.name));
    this.values.set(dataref.name, value);
    return true;
  }

  /** Asks the simulator to stream the dataref; several monitors share one stream. */
  public async monitorDataref(dataref: Dataref): Promise<boolean> {
    const count = this.monitors.get(dataref.name) ?? 0;
    dataref.retain();
    this.monitors.set(dataref.name, count + 1);
    if (count > 0) {
      return true;
    }
    const index = this.nextIndex++;
    this.requested.set(index, dataref.name);
    try {
      await this.sendPacket(encodeRref(this.settings.defaultFrequency, index, dataref.name));
    } catch (error) {
      this.requested.delete(index);
      const remaining = (this.monitors.get(dataref.name) ?? 1) - 1;
      if (remaining > 0) {
        this.monitors.set(dataref.name, remaining);
      } else {
        this.monitors.delete(dataref.name);
      }
      dataref.release();
      throw error;
    }
    if (!this.isRunning) {
      this.start();
    }
    return true;
  }

  public async unmonitorDataref(dataref: Dataref): Promise<boolean> {
    if (!dataref.release()) {
      return false;
    }
    const count = (this.monitors.get(dataref.name) ?? 1) - 1;
    if (count > 0) {
      this.monitors.set(dataref.name, count);
      return true;
    }
    this.monitors.delete(dataref.name);
    const index = this.indexOf(dataref.name);
    if (index === undefined) {
      return true;
    }
    this.requested.delete(index);
    this.values.delete(dataref.name);
    await this.sendPacket(encodeRref(0, index, dataref.name));
    return true;
  }

  // --- CommandHost ---

  public commandMeta(): CommandMeta | undefined {
    return undefined;
  }

  /** CMND has no duration, the command is pressed once. */
  public async execute(command: Command): Promise<boolean> {
    await this.sendPacket(encodeCmnd(command.path));
    return true;
  }

  public async monitorCommand(command: Command): Promise<boolean> {
    logger.warn(`Cannot monitor command ${command.path} through UDP`);
    return false;
  }

  public async unmonitorCommand(command: Command): Promise<boolean> {
    logger.warn(`Cannot unmonitor command ${command.path} through UDP`);
    return false;
  }

  // --- Receive loop ---

  public start(): boolean {
    const started = super.start();
    if (started) {
      this.connection.setState(ConnectionState.LISTENING);
    }
    return started;
  }

  /** Stops every stream, then the receive loop, and closes the socket. */
  public async stop(): Promise<boolean> {
    for (const [index, name] of [...this.requested]) {
      try {
        await this.sendPacket(encodeRref(0, index, name));
      } catch (error) {
        logger.warn(`Cannot stop stream of ${name}: ${error}`);
      }
    }
    this.requested.clear();
    this.monitors.clear();
    const socket = this.socket;
    this.socket = null;
    socket?.close();
    return super.stop();
  }

  public async step(): Promise<number> {
    const socket = await this.openSocket();
    const datagram = await socket.receive(this.settings.receiveTimeoutMs);
    if (!datagram) {
      if (this.connection.setState(ConnectionState.LISTENING)) {
        logger.warn(`No UDP data within ${this.settings.receiveTimeoutMs}ms`);
      }
      return 0;
    }

    const values = decodeRrefAnswer(datagram.data);
    if (!values) {
      logger.warn(`Unknown packet: ${datagram.data.subarray(0, 5).toString("hex")}`);
      return 0;
    }
    this.connection.setState(ConnectionState.RECEIVING);
    values.forEach(({ index, value }) => {
      const name = this.requested.get(index);
      if (name === undefined) {
        return;
      }
      this.values.set(name, value);
      this.events.emit("datarefUpdate", this.toUpdate(name, value));
    });
    return 0;
  }

  private toUpdate(name: string, value: number): DatarefUpdate {
    const dataref = new Dataref(name, this);
    return { path: dataref.path, index: dataref.index, name, value };
  }

  private indexOf(name: string): number | undefined {
    for (const [index, requested] of this.requested) {
      if (requested === name) {
        return index;
      }
    }
    return undefined;
  }

  private async sendPacket(packet: Buffer): Promise<void> {
    if (!this.host) {
      throw new NotConnectedError("send UDP packet without simulator address");
    }
    const socket = await this.openSocket();
    await socket.send(packet, this.port, this.host);
  }

  private async openSocket(): Promise<DatagramSocket> {
    if (this.socket) {
      return this.socket;
    }
    if (!this.opening) {
      this.opening = this.socketFactory().finally(() => {
        this.opening = null;
      });
    }
    const socket = await this.opening;
    this.socket = socket;
    return socket;
  }
}
