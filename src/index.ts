// src/index.ts

import { BeaconMonitor, BeaconMonitorOptions } from "./services/beaconmonitor";
import { RestApi, RestApiOptions } from "./services/restapi";
import { UdpApi, UdpApiOptions } from "./services/udpapi";
import { WebSocketApi, WebSocketApiOptions } from "./services/websocketapi";

export { config } from "./config/config";
export { default as logger } from "./utility/logger";
export * from "./utility/errors";
export { encodeBeacon, decodeBeacon } from "./utility/beaconframe";
export { sortVersions, latestVersion, checkVersionRange } from "./utility/version";

export type { BeaconData } from "./dataset/beacon";
export { BeaconMonitorStatus } from "./dataset/beacon";
export { ConnectionState } from "./dataset/connection";
export type { IStateTransition } from "./dataset/connection";
export type { DatarefValue, WritableValue } from "./dataset/common";
export { ValueKind } from "./dataset/metadata";
export type { DatarefMeta, CommandMeta } from "./dataset/metadata";
export type { ICapabilities } from "./dataset/capabilities";
export type { RequestResult } from "./dataset/messages";

export { Dataref, parseDatarefPath } from "./entity/dataref";
export { Command } from "./entity/command";

export { BeaconMonitor, RestApi, UdpApi, WebSocketApi };
export type { BeaconMonitorOptions, RestApiOptions, UdpApiOptions, WebSocketApiOptions };
export type { ClientEvents, DatarefUpdate } from "./services/dispatcher";

export interface ClientOptions extends WebSocketApiOptions {
  /** Follow the simulator's beacon instead of a fixed address. */
  useBeacon?: boolean;
  beacon?: BeaconMonitorOptions;
}

export interface Client {
  api: WebSocketApi;
  beacon: BeaconMonitor | null;
  /** Starts the beacon monitor when there is one, else connects straight away. */
  start(): void;
  stop(): Promise<void>;
}

/** A WebSocket API client, optionally wired to a beacon monitor. */
export function createClient(options: ClientOptions = {}): Client {
  const api = new WebSocketApi(options);
  const beacon = options.useBeacon ? new BeaconMonitor(options.beacon) : null;
  if (beacon) {
    api.attachBeacon(beacon);
  }
  return {
    api,
    beacon,
    start() {
      if (beacon) {
        beacon.start();
      } else {
        api.connect();
      }
    },
    async stop() {
      if (beacon) {
        await beacon.stop();
      }
      await api.disconnect();
    },
  };
}

export function createRestClient(options: RestApiOptions = {}): RestApi {
  return new RestApi(options);
}

export function createUdpClient(options: UdpApiOptions = {}): UdpApi {
  return new UdpApi(options);
}
