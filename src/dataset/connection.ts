// src/dataset/connection.ts

export enum ConnectionState {
  NO_BEACON = "NO_BEACON",
  RECEIVING_BEACON = "RECEIVING_BEACON",
  REST_REACHABLE = "REST_REACHABLE",
  REST_UNREACHABLE = "REST_UNREACHABLE",
  WS_CONNECTED = "WS_CONNECTED",
  WS_DISCONNECTED = "WS_DISCONNECTED",
  LISTENING = "LISTENING", // websocket open, no data yet
  RECEIVING = "RECEIVING",
}

export interface IStateTransition {
  from: ConnectionState;
  to: ConnectionState;
  at: Date;
}
