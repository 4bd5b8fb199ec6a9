// src/services/connectionmonitor.ts

import logger from "../utility/logger";
import { BackgroundLoop } from "../utility/loop";
import { checkVersionRange } from "../utility/version";
import { config } from "../config/config";
import ConnectionStore from "../store/connectionstore";
import { ConnectionState } from "../dataset/connection";

/** The side of the client the monitor connects. */
export interface ConnectionTarget {
  readonly isConnected: boolean;
  readonly simulatorVersion: string | undefined;
  isReachable(): Promise<boolean>;
  /** @throws when the WebSocket cannot be opened */
  openWebSocket(): Promise<void>;
  /**
   * Reload metadata, rebuild identifiers, resubscribe and start listening.
   * Resolves false when the connection was dropped on the way.
   */
  onConnected(): Promise<boolean>;
}

export interface ConnectionMonitorSettings {
  reconnectIntervalMs: number;
  retryIntervalMs: number;
  maxOpenFailures: number;
  joinTimeoutMs: number;
  warnFrequency: number;
  minSimulatorVersion: string;
  maxSimulatorVersion: string;
}

const REACHABLE_STATES = [
  ConnectionState.REST_REACHABLE,
  ConnectionState.WS_CONNECTED,
  ConnectionState.WS_DISCONNECTED,
  ConnectionState.LISTENING,
  ConnectionState.RECEIVING,
];

export function defaultMonitorSettings(): ConnectionMonitorSettings {
  return {
    reconnectIntervalMs: config.websocket.reconnectIntervalMs,
    retryIntervalMs: config.websocket.retryIntervalMs,
    maxOpenFailures: config.websocket.maxOpenFailures,
    joinTimeoutMs: config.websocket.joinTimeoutMs,
    warnFrequency: config.beacon.warnFrequency,
    minSimulatorVersion: config.simulator.minVersion,
    maxSimulatorVersion: config.simulator.maxVersion,
  };
}

/**
 * Reconnect loop: probes REST while disconnected, opens the WebSocket once
 * REST answers, and watches the connection afterwards. After too many failed
 * opens in a row it pauses until `resume()` or until REST comes back after
 * having been unreachable.
 */
export class ConnectionMonitor extends BackgroundLoop {
  private openFailures = 0;
  private unreachableCount = 0;
  private paused = false;
  private unreachableWhilePaused = false;

  constructor(
    private readonly target: ConnectionTarget,
    private readonly store: ConnectionStore,
    private readonly settings: ConnectionMonitorSettings = defaultMonitorSettings()
  ) {
    super("connection monitor", settings.joinTimeoutMs);
  }

  public get isPaused(): boolean {
    return this.paused;
  }

  /** Restarts connection attempts, e.g. when a beacon was detected. */
  public resume(): void {
    if (this.paused) {
      logger.info("Connection attempts resumed");
    }
    this.paused = false;
    this.unreachableWhilePaused = false;
    this.openFailures = 0;
    this.kick();
  }

  public async step(): Promise<number> {
    if (this.target.isConnected) {
      return this.settings.reconnectIntervalMs;
    }

    const reachable = await this.target.isReachable();
    if (!reachable) {
      if (this.store.is(...REACHABLE_STATES)) {
        this.store.setState(ConnectionState.REST_UNREACHABLE);
      }
      if (this.unreachableCount % this.settings.warnFrequency === 0) {
        logger.info("Not connected, REST API unreachable, trying..");
      }
      this.unreachableCount++;
      if (this.paused) {
        this.unreachableWhilePaused = true;
        return this.settings.reconnectIntervalMs;
      }
      return this.settings.retryIntervalMs;
    }
    this.unreachableCount = 0;

    if (this.paused) {
      if (!this.unreachableWhilePaused) {
        return this.settings.reconnectIntervalMs;
      }
      logger.info("REST API reachable again");
      this.resume();
    }

    this.store.setState(ConnectionState.REST_REACHABLE);
    try {
      await this.target.openWebSocket();
    } catch (error) {
      this.openFailures++;
      logger.info(
        `WebSocket open failed (${this.openFailures}/${this.settings.maxOpenFailures}): ${error}`
      );
      if (this.openFailures >= this.settings.maxOpenFailures) {
        logger.warn("Too many failed WebSocket opens, waiting for the simulator to come back");
        this.paused = true;
        return this.settings.reconnectIntervalMs;
      }
      return this.settings.retryIntervalMs;
    }

    this.openFailures = 0;
    this.store.setState(ConnectionState.WS_CONNECTED);
    this.checkSimulatorVersion();
    if (!(await this.target.onConnected())) {
      return this.settings.retryIntervalMs;
    }
    return this.settings.reconnectIntervalMs;
  }

  private checkSimulatorVersion(): void {
    const version = this.target.simulatorVersion;
    if (version === undefined) {
      return;
    }
    const { minSimulatorVersion: min, maxSimulatorVersion: max } = this.settings;
    switch (checkVersionRange(version, min, max)) {
      case "below":
        logger.warn(
          `Simulator version ${version} detected, minimal version is ${min}. ` +
            "Some features may not work properly"
        );
        break;
      case "above":
        logger.warn(
          `Simulator version ${version} detected, not tested after ${max}. ` +
            "Some features may not work properly"
        );
        break;
      case "within":
        logger.info(`Simulator version requirements ${min} <= ${version} <= ${max} satisfied`);
        break;
      case "unknown":
        logger.warn(`Simulator version ${version} could not be checked`);
        break;
    }
  }
}
