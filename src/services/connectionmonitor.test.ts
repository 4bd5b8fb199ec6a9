import { describe, expect, it } from "vitest";
import {
  ConnectionMonitor,
  ConnectionMonitorSettings,
  ConnectionTarget,
} from "./connectionmonitor";
import ConnectionStore from "../store/connectionstore";
import { ConnectionState } from "../dataset/connection";

const settings: ConnectionMonitorSettings = {
  reconnectIntervalMs: 10000,
  retryIntervalMs: 1000,
  maxOpenFailures: 5,
  joinTimeoutMs: 1000,
  warnFrequency: 10,
  minSimulatorVersion: "12.1.4",
  maxSimulatorVersion: "12.2.1",
};

class ScriptedTarget implements ConnectionTarget {
  public isConnected = false;
  public simulatorVersion: string | undefined = "12.1.4-r1";
  public reachable: boolean[] = [];
  public openFails = false;
  public opens = 0;
  public connectedCalls = 0;
  public connectedResults: boolean[] = [];

  public async isReachable(): Promise<boolean> {
    return this.reachable.shift() ?? true;
  }

  public async openWebSocket(): Promise<void> {
    this.opens++;
    if (this.openFails) {
      throw new Error("connection refused");
    }
    this.isConnected = true;
  }

  public async onConnected(): Promise<boolean> {
    this.connectedCalls++;
    const ok = this.connectedResults.shift() ?? true;
    if (!ok) {
      this.isConnected = false;
    }
    return ok;
  }
}

function states(store: ConnectionStore): ConnectionState[] {
  const transitions = store.getTransitions();
  return [ConnectionState.NO_BEACON, ...transitions.map((transition) => transition.to)];
}

describe("ConnectionMonitor", () => {
  it("probes REST until it answers, then opens the WebSocket once", async () => {
    const target = new ScriptedTarget();
    target.reachable = [false, false, false, false, false, true];
    const store = new ConnectionStore();
    const monitor = new ConnectionMonitor(target, store, settings);

    for (let i = 0; i < 5; i++) {
      expect(await monitor.step()).toBe(settings.retryIntervalMs);
    }
    expect(target.opens).toBe(0);
    expect(await monitor.step()).toBe(settings.reconnectIntervalMs);

    expect(target.opens).toBe(1);
    expect(target.connectedCalls).toBe(1);
    expect(states(store)).toEqual([
      ConnectionState.NO_BEACON,
      ConnectionState.REST_REACHABLE,
      ConnectionState.WS_CONNECTED,
    ]);
  });

  it("only watches while connected", async () => {
    const target = new ScriptedTarget();
    target.isConnected = true;
    const monitor = new ConnectionMonitor(target, new ConnectionStore(), settings);
    expect(await monitor.step()).toBe(settings.reconnectIntervalMs);
    expect(target.opens).toBe(0);
  });

  it("reports REST unreachable after having been reachable", async () => {
    const target = new ScriptedTarget();
    target.openFails = true;
    target.reachable = [true, false];
    const store = new ConnectionStore();
    const monitor = new ConnectionMonitor(target, store, settings);
    await monitor.step();
    await monitor.step();
    expect(store.current).toBe(ConnectionState.REST_UNREACHABLE);
  });

  it("pauses after too many failed opens and resumes on request", async () => {
    const target = new ScriptedTarget();
    target.openFails = true;
    const monitor = new ConnectionMonitor(target, new ConnectionStore(), settings);

    for (let i = 0; i < 4; i++) {
      expect(await monitor.step()).toBe(settings.retryIntervalMs);
    }
    expect(await monitor.step()).toBe(settings.reconnectIntervalMs);
    expect(monitor.isPaused).toBe(true);
    expect(target.opens).toBe(5);

    // still reachable: stays paused
    await monitor.step();
    expect(target.opens).toBe(5);

    monitor.resume();
    expect(monitor.isPaused).toBe(false);
    target.openFails = false;
    await monitor.step();
    expect(target.opens).toBe(6);
    expect(target.isConnected).toBe(true);
  });

  it("resumes by itself when REST comes back after an outage", async () => {
    const target = new ScriptedTarget();
    target.openFails = true;
    const monitor = new ConnectionMonitor(target, new ConnectionStore(), settings);
    for (let i = 0; i < 5; i++) {
      await monitor.step();
    }
    expect(monitor.isPaused).toBe(true);

    target.reachable = [false, true];
    target.openFails = false;
    await monitor.step();
    expect(monitor.isPaused).toBe(true);
    await monitor.step();
    expect(monitor.isPaused).toBe(false);
    expect(target.isConnected).toBe(true);
  });

  it("tries again soon when the connection drops during setup", async () => {
    const target = new ScriptedTarget();
    target.connectedResults = [false];
    const monitor = new ConnectionMonitor(target, new ConnectionStore(), settings);

    expect(await monitor.step()).toBe(settings.retryIntervalMs);
    expect(target.isConnected).toBe(false);
    expect(await monitor.step()).toBe(settings.reconnectIntervalMs);
    expect(target.opens).toBe(2);
    expect(target.connectedCalls).toBe(2);
  });
});
