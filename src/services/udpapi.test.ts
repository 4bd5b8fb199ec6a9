import { Buffer } from "buffer";
import { afterEach, describe, expect, it, vi } from "vitest";
import { UdpApi } from "./udpapi";
import { DatarefUpdate } from "./dispatcher";
import { FakeDatagramSocket } from "../testing/fakes";

function rrefAnswer(pairs: [number, number][]): Buffer {
  const packet = Buffer.alloc(5 + pairs.length * 8);
  packet.write("RREF,", 0, "ascii");
  pairs.forEach(([index, value], i) => {
    packet.writeInt32LE(index, 5 + i * 8);
    packet.writeFloatLE(value, 9 + i * 8);
  });
  return packet;
}

const clients: UdpApi[] = [];

function setup() {
  const socket = new FakeDatagramSocket();
  const api = new UdpApi({
    host: "192.168.1.20",
    port: 49000,
    settings: { receiveTimeoutMs: 5000 },
    socketFactory: async () => socket,
  });
  clients.push(api);
  return { api, socket };
}

afterEach(async () => {
  await Promise.all(clients.splice(0).map((api) => api.stop()));
});

describe("UdpApi", () => {
  it("requests a stream per dataref and shares it between monitors", async () => {
    const { api, socket } = setup();
    const a = api.dataref("sim/x");
    const b = api.dataref("sim/x");
    await a.monitor();
    await b.monitor();

    expect(socket.sent).toHaveLength(1);
    const request = socket.sent[0];
    expect(request?.host).toBe("192.168.1.20");
    expect(request?.port).toBe(49000);
    expect(request?.data.readInt32LE(5)).toBe(1); // frequency
    expect(request?.data.readInt32LE(9)).toBe(0); // index
    expect(api.isRunning).toBe(true);

    await a.unmonitor();
    expect(socket.sent).toHaveLength(1);
    await b.unmonitor();
    expect(socket.sent).toHaveLength(2);
    expect(socket.sent[1]?.data.readInt32LE(5)).toBe(0);
    expect(api.monitoredCount).toBe(0);
  });

  it("forgets a monitor whose stream request could not be sent", async () => {
    const { api, socket } = setup();
    const dataref = api.dataref("sim/x");
    socket.failSend = true;
    await expect(dataref.monitor()).rejects.toThrow("EHOSTUNREACH");
    expect(api.monitoredCount).toBe(0);
    expect(dataref.monitorCount).toBe(0);

    socket.failSend = false;
    expect(await dataref.monitor()).toBe(true);
    expect(socket.sent).toHaveLength(1);
    expect(socket.sent[0]?.data.readInt32LE(9)).toBe(1);
  });

  it("delivers streamed values by index", async () => {
    const { api, socket } = setup();
    const x = api.dataref("sim/x");
    const y = api.dataref("sim/arr[2]");
    await x.monitor();
    await y.monitor();
    const updates: DatarefUpdate[] = [];
    api.events.on("datarefUpdate", (update) => updates.push(update));

    socket.push(rrefAnswer([[1, 2.5], [0, -0.0001], [9, 7]]));
    await vi.waitFor(() => expect(updates).toHaveLength(2));

    expect(updates).toEqual([
      { path: "sim/arr", index: 2, name: "sim/arr[2]", value: 2.5 },
      { path: "sim/x", index: undefined, name: "sim/x", value: 0 },
    ]);
    expect(y.value).toBe(2.5);
  });

  it("writes numbers with DREF and presses commands with CMND", async () => {
    const { api, socket } = setup();
    const dataref = api.dataref("sim/x");
    dataref.value = 3;
    expect(await dataref.write()).toBe(true);
    expect(socket.sent[0]?.data.subarray(0, 5).toString("ascii")).toBe("DREF\0");
    expect(socket.sent[0]?.data.readFloatLE(5)).toBe(3);

    dataref.value = "text";
    expect(await dataref.write()).toBe(false);

    expect(await api.command("sim/operation/pause_toggle").execute()).toBe(true);
    expect(socket.sent[1]?.data.subarray(0, 5).toString("ascii")).toBe("CMND\0");
  });

  it("takes host and port from the beacon", () => {
    const { api } = setup();
    const beacon = {
      host: "10.0.0.7",
      port: 49010,
      hostname: "sim",
      simulatorVersion: 121400,
      role: 1,
    };
    api.onBeacon(true, beacon);
    expect(api.host).toBe("10.0.0.7");
    expect(api.port).toBe(49010);
  });

  it("stops every stream on stop", async () => {
    const { api, socket } = setup();
    await api.dataref("sim/x").monitor();
    await api.stop();
    expect(socket.sent).toHaveLength(2);
    expect(socket.sent[1]?.data.readInt32LE(5)).toBe(0);
    expect(socket.closed).toBe(true);
    expect(api.isRunning).toBe(false);
  });
});
