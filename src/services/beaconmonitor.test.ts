import { Buffer } from "buffer";
import { describe, expect, it, vi } from "vitest";
import { BeaconMonitor } from "./beaconmonitor";
import { BeaconMonitorStatus } from "../dataset/beacon";
import { encodeBeacon } from "../utility/beaconframe";
import { FakeDatagramSocket } from "../testing/fakes";

const beacon = encodeBeacon({
  simulatorVersion: 121400,
  role: 1,
  port: 49000,
  hostname: "sim-host",
});

function setup(addresses: string[] = ["192.168.1.10"], receiveTimeoutMs = 20) {
  const socket = new FakeDatagramSocket();
  const socketFactory = vi.fn(async () => socket);
  const monitor = new BeaconMonitor({
    settings: { receiveTimeoutMs, reconnectIntervalMs: 20 },
    socketFactory,
    localAddresses: () => addresses,
  });
  const callback = vi.fn();
  monitor.onChange(callback);
  return { monitor, socket, socketFactory, callback };
}

describe("BeaconMonitor", () => {
  it("notifies on detection and on loss only", async () => {
    const { monitor, socket, callback } = setup();
    socket.push(beacon, "192.168.1.20");
    socket.push(beacon, "192.168.1.20");

    expect(await monitor.step()).toBe(0);
    expect(monitor.status).toBe(BeaconMonitorStatus.DETECTING_BEACON);
    expect(callback).toHaveBeenCalledTimes(1);
    expect(callback).toHaveBeenLastCalledWith(
      true,
      {
        host: "192.168.1.20",
        port: 49000,
        hostname: "sim-host",
        simulatorVersion: 121400,
        role: 1,
      },
      false
    );

    await monitor.step();
    expect(callback).toHaveBeenCalledTimes(1);

    // nothing more: receive times out
    expect(await monitor.step()).toBe(20);
    expect(callback).toHaveBeenCalledTimes(2);
    expect(callback).toHaveBeenLastCalledWith(false, null, false);
    expect(monitor.status).toBe(BeaconMonitorStatus.RUNNING);
    expect(monitor.data).toBeNull();
  });

  it("reopens the socket after a timeout", async () => {
    const { monitor, socketFactory } = setup();
    await monitor.step();
    await monitor.step();
    expect(socketFactory).toHaveBeenCalledTimes(2);
  });

  it("tells when the beacon comes from this machine", async () => {
    const { monitor, socket, callback } = setup(["127.0.0.1", "192.168.1.20"]);
    socket.push(beacon, "192.168.1.20");
    await monitor.step();
    expect(callback.mock.calls[0]?.[2]).toBe(true);
    expect(monitor.isSameHost("192.168.1.20")).toBe(true);
  });

  it("skips beacons of an unsupported version and foreign packets", async () => {
    const { monitor, socket, callback } = setup();
    const future = {
      majorVersion: 2,
      simulatorVersion: 121400,
      role: 1,
      port: 49000,
      hostname: "x",
    };
    socket.push(encodeBeacon(future));
    socket.push(Buffer.from("hello", "ascii"));
    await monitor.step();
    await monitor.step();
    expect(callback).not.toHaveBeenCalled();
    expect(monitor.receivingBeacon).toBe(false);
  });

  it("reports the loss of a detected beacon when stopped", async () => {
    const { monitor, socket, callback } = setup(["192.168.1.10"], 5000);
    socket.push(beacon, "192.168.1.20");
    expect(monitor.start()).toBe(true);
    await vi.waitFor(() => expect(monitor.receivingBeacon).toBe(true));

    expect(await monitor.stop()).toBe(true);
    expect(monitor.status).toBe(BeaconMonitorStatus.NOT_RUNNING);
    expect(callback).toHaveBeenLastCalledWith(false, null, false);
  });
});
