// src/dataset/beacon.ts

/**
 * Connection details advertised by the simulator in its UDP beacon.
 * Replaced wholesale on each decode, never mutated.
 */
export interface BeaconData {
  readonly host: string;
  readonly port: number;
  readonly hostname: string;
  readonly simulatorVersion: number; // 121400 for 12.1.4
  readonly role: number; // 1 master, 2 external visual, 3 IOS
}

export enum BeaconMonitorStatus {
  NOT_RUNNING = "NOT_RUNNING",
  RUNNING = "RUNNING", // socket open, no beacon seen yet
  DETECTING_BEACON = "DETECTING_BEACON",
}

export type BeaconCallback = (
  connected: boolean,
  data: BeaconData | null,
  sameHost: boolean
) => void;
