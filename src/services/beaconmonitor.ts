// src/services/beaconmonitor.ts

import * as os from "os";
import logger from "../utility/logger";
import { BackgroundLoop } from "../utility/loop";
import { decodeBeacon } from "../utility/beaconframe";
import { DatagramSocket, DatagramSocketFactory, openMulticastSocket } from "../utility/udp";
import { UnsupportedBeaconVersionError } from "../utility/errors";
import { config, BeaconConfig } from "../config/config";
import { BeaconCallback, BeaconData, BeaconMonitorStatus } from "../dataset/beacon";

export interface BeaconMonitorOptions {
  settings?: Partial<BeaconConfig>;
  socketFactory?: DatagramSocketFactory;
  localAddresses?: () => string[];
}

/** Every address of this machine's network interfaces. */
export function localAddresses(): string[] {
  const addresses: string[] = [];
  Object.values(os.networkInterfaces()).forEach((entries) => {
    (entries ?? []).forEach((entry) => addresses.push(entry.address));
  });
  return addresses;
}

/**
 * Listens for the simulator's multicast beacon. Callbacks fire on transitions
 * only: once when a beacon is first detected and once when it is lost.
 */
export class BeaconMonitor extends BackgroundLoop {
  private readonly settings: BeaconConfig;
  private readonly socketFactory: DatagramSocketFactory;
  private readonly addresses: () => string[];
  private readonly callbacks: Set<BeaconCallback> = new Set();

  private socket: DatagramSocket | null = null;
  private currentStatus = BeaconMonitorStatus.NOT_RUNNING;
  private beacon: BeaconData | null = null;
  private missedCount = 0;
  private openFailures = 0;

  constructor(options: BeaconMonitorOptions = {}) {
    const settings = { ...config.beacon, ...options.settings };
    super("beacon monitor", settings.receiveTimeoutMs + 1000);
    this.settings = settings;
    this.socketFactory =
      options.socketFactory ??
      (() => openMulticastSocket(settings.multicastGroup, settings.port));
    this.addresses = options.localAddresses ?? localAddresses;
  }

  public get status(): BeaconMonitorStatus {
    return this.currentStatus;
  }

  public get data(): BeaconData | null {
    return this.beacon;
  }

  public get receivingBeacon(): boolean {
    return this.currentStatus === BeaconMonitorStatus.DETECTING_BEACON;
  }

  public onChange(callback: BeaconCallback): void {
    this.callbacks.add(callback);
  }

  /** True when `host` is one of this machine's addresses. */
  public isSameHost(host: string): boolean {
    return this.addresses().includes(host);
  }

  public start(): boolean {
    const started = super.start();
    if (started) {
      this.currentStatus = BeaconMonitorStatus.RUNNING;
    }
    return started;
  }

  public async stop(): Promise<boolean> {
    this.closeSocket(); // wakes a pending receive
    const joined = await super.stop();
    this.closeSocket();
    const wasDetecting = this.receivingBeacon;
    this.currentStatus = BeaconMonitorStatus.NOT_RUNNING;
    this.beacon = null;
    if (wasDetecting) {
      this.notify(false, null, false);
    }
    return joined;
  }

  public async step(): Promise<number> {
    if (!this.socket) {
      try {
        this.socket = await this.socketFactory();
        this.openFailures = 0;
      } catch (error) {
        if (this.openFailures % this.settings.warnFrequency === 0) {
          logger.warn(`Cannot listen for beacon: ${error}`);
        }
        this.openFailures++;
        return this.settings.reconnectIntervalMs;
      }
    }

    const datagram = await this.socket.receive(this.settings.receiveTimeoutMs);
    if (!datagram) {
      return this.onTimeout();
    }

    try {
      const data = decodeBeacon(datagram.data, datagram.host);
      this.onBeacon(data);
    } catch (error) {
      if (error instanceof UnsupportedBeaconVersionError) {
        logger.error(error.message);
        this.beacon = null;
      } else {
        logger.warn(`Ignoring packet: ${error}`);
      }
    }
    return 0;
  }

  private onBeacon(data: BeaconData) {
    this.missedCount = 0;
    this.beacon = data;
    if (this.currentStatus === BeaconMonitorStatus.DETECTING_BEACON) {
      return;
    }
    this.currentStatus = BeaconMonitorStatus.DETECTING_BEACON;
    const sameHost = this.isSameHost(data.host);
    logger.info(
      `Beacon detected: simulator ${data.simulatorVersion} at ${data.host}:${data.port} ` +
        `(${data.hostname})${sameHost ? " on this host" : ""}`
    );
    this.notify(true, data, sameHost);
  }

  // No packet within the receive timeout: drop the socket and probe again later.
  private onTimeout(): number {
    this.closeSocket();
    this.missedCount++;
    const { warnFrequency, maxWarnings, receiveTimeoutMs } = this.settings;
    if (
      this.missedCount % warnFrequency === 1 &&
      this.missedCount <= warnFrequency * maxWarnings
    ) {
      logger.warn(`No beacon received within ${receiveTimeoutMs}ms (${this.missedCount})`);
    }
    if (this.currentStatus === BeaconMonitorStatus.DETECTING_BEACON) {
      this.currentStatus = BeaconMonitorStatus.RUNNING;
      this.beacon = null;
      logger.info("Beacon lost");
      this.notify(false, null, false);
    }
    return this.settings.reconnectIntervalMs;
  }

  private notify(connected: boolean, data: BeaconData | null, sameHost: boolean) {
    this.callbacks.forEach((callback) => {
      try {
        callback(connected, data, sameHost);
      } catch (error) {
        logger.error(`Beacon callback failed: ${error}`);
      }
    });
  }

  private closeSocket() {
    if (this.socket) {
      this.socket.close();
      this.socket = null;
    }
  }
}
