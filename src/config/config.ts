import { config as dotenvConfig } from "dotenv";
import path from "path";

dotenvConfig();

function envNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === "") {
    return fallback;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function envFlag(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined || raw === "") {
    return fallback;
  }
  return raw.toLowerCase() === "true" || raw === "1";
}

export const config = {
  beacon: {
    multicastGroup: "239.255.1.1",
    port: 49707,
    receiveTimeoutMs: 3000,
    reconnectIntervalMs: 10000, // between probes while no beacon is seen
    warnFrequency: 10,
    maxWarnings: 3,
  },
  api: {
    host: process.env.SIM_HOST ?? "127.0.0.1",
    port: envNumber("SIM_PORT", 8086),
    root: "/api",
    version: process.env.SIM_API_VERSION ?? "v2",
    requestTimeoutMs: 5000,
    unreachableWarnFrequency: 20,
  },
  websocket: {
    reconnectIntervalMs: 10000,
    retryIntervalMs: 1000,
    maxOpenFailures: 5,
    searchingReceiveTimeoutMs: 1000,
    receivingReceiveTimeoutMs: 5000,
    beaconLossTimeoutMs: 60000,
    joinTimeoutMs: 10000,
    resultTimeoutMs: 5000,
  },
  udp: {
    port: 49000,
    receiveTimeoutMs: 10000,
    defaultFrequency: 1,
  },
  metadata: {
    minReloadIntervalSec: 10,
  },
  subscriptions: {
    historyDepth: 3,
  },
  simulator: {
    minVersion: "12.1.4",
    maxVersion: "12.2.1",
  },
  logging: {
    label: "simnet-client",
    level: process.env.LOG_LEVEL ?? "info",
    toFile: envFlag("LOG_FILES", true),
    directory: process.env.LOG_DIR ?? path.join(__dirname, "..", "..", "logs"),
  },
};

export type BeaconConfig = typeof config.beacon;
export type ApiConfig = typeof config.api;
export type WebSocketConfig = typeof config.websocket;
export type UdpConfig = typeof config.udp;
