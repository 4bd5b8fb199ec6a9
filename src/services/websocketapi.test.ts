import { afterEach, describe, expect, it, vi } from "vitest";
import { WebSocketApi } from "./websocketapi";
import { ConnectionState } from "../dataset/connection";
import { FakeWebSocketTransport, fakeSimulator } from "../testing/fakes";

const datarefs = [
  { id: 20, name: "sim/x", value_type: "float", value: 1 },
  { id: 21, name: "sim/rw", value_type: "int", is_writable: true },
  { id: 22, name: "sim/arr", value_type: "int_array" },
];
const commands = [{ id: 30, name: "sim/cmd" }];

const clients: WebSocketApi[] = [];

function setup() {
  const http = fakeSimulator({ datarefs, commands });
  const transports: FakeWebSocketTransport[] = [];
  const api = new WebSocketApi({
    http,
    host: "127.0.0.1",
    port: 8086,
    version: "v2",
    transportFactory: () => {
      const transport = new FakeWebSocketTransport();
      transports.push(transport);
      return transport;
    },
    websocket: {
      searchingReceiveTimeoutMs: 50,
      receivingReceiveTimeoutMs: 50,
      resultTimeoutMs: 500,
    },
    monitor: { retryIntervalMs: 20, reconnectIntervalMs: 50, joinTimeoutMs: 500 },
  });
  clients.push(api);
  const latest = () => {
    const transport = transports[transports.length - 1];
    if (!transport) {
      throw new Error("no websocket opened");
    }
    return transport;
  };
  return { api, http, transports, latest };
}

afterEach(async () => {
  await Promise.all(clients.splice(0).map((api) => api.disconnect()));
});

describe("WebSocketApi", () => {
  it("connects: REST reachable, socket open, metadata loaded, listening", async () => {
    const { api, latest } = setup();
    const opened = vi.fn();
    api.on("open", opened);

    await api.monitor.step();

    expect(api.isConnected).toBe(true);
    expect(latest().url).toBe("ws://127.0.0.1:8086/api/v2");
    expect(api.datarefs.getByName("sim/arr")?.identifier).toBe(22);
    expect(api.status).toBe(ConnectionState.LISTENING);
    expect(opened).toHaveBeenCalledTimes(1);
  });

  it("shares one subscription between instances of a path", async () => {
    const { api, latest } = setup();
    await api.monitor.step();
    const a = api.dataref("sim/x");
    const b = api.dataref("sim/x");

    await a.monitor();
    await b.monitor();
    const subscribes = latest().framesOfType("dataref_subscribe_values");
    expect(subscribes).toHaveLength(1);
    expect(subscribes[0]?.params).toEqual({ datarefs: [{ id: 20 }] });

    await a.unmonitor();
    expect(latest().framesOfType("dataref_unsubscribe_values")).toHaveLength(0);
    await b.unmonitor();
    const unsubscribes = latest().framesOfType("dataref_unsubscribe_values");
    expect(unsubscribes).toHaveLength(1);
    expect(unsubscribes[0]?.params).toEqual({ datarefs: [{ id: 20 }] });
  });

  it("subscribes array elements in one request and maps the payload back", async () => {
    const { api, latest } = setup();
    await api.monitor.step();
    const third = api.dataref("sim/arr[3]");
    const seventh = api.dataref("sim/arr[7]");

    await api.monitorDatarefs([third, seventh]);
    const subscribes = latest().framesOfType("dataref_subscribe_values");
    expect(subscribes).toHaveLength(1);
    expect(subscribes[0]?.params).toEqual({ datarefs: [{ id: 22, index: [3, 7] }] });

    const updates: [string, unknown][] = [];
    api.on("datarefUpdate", (update) => updates.push([update.name, update.value]));
    latest().push({ type: "dataref_update_values", data: { "22": [10, 20] } });

    await vi.waitFor(() => expect(seventh.value).toBe(20));
    expect(third.value).toBe(10);
    expect(updates).toEqual([
      ["sim/arr[3]", 10],
      ["sim/arr[7]", 20],
    ]);
  });

  it("resubscribes everything after the connection comes back", async () => {
    const { api, latest, transports } = setup();
    await api.monitor.step();
    await api.monitorDatarefs([api.dataref("sim/arr[3]"), api.dataref("sim/arr[7]")]);
    await api.command("sim/cmd").monitor();

    const closed = vi.fn();
    api.on("close", closed);
    latest().drop();
    await vi.waitFor(() => expect(api.status).toBe(ConnectionState.WS_DISCONNECTED));
    expect(closed).toHaveBeenCalledTimes(1);
    expect(api.datarefs.isValid).toBe(false);

    await api.monitor.step();
    expect(transports).toHaveLength(2);
    expect(latest().framesOfType("dataref_subscribe_values").map((frame) => frame.params)).toEqual([
      { datarefs: [{ id: 22, index: [3, 7] }] },
    ]);
    const commandFrames = latest().framesOfType("command_subscribe_is_active");
    expect(commandFrames.map((frame) => frame.params)).toEqual([{ commands: [{ id: 30 }] }]);
  });

  it("defers monitors made while disconnected until the connection is up", async () => {
    const { api, latest, transports } = setup();
    expect(await api.dataref("sim/x").monitor()).toBe(true);
    expect(transports).toHaveLength(0);

    await api.monitor.step();
    expect(latest().framesOfType("dataref_subscribe_values").map((frame) => frame.params)).toEqual([
      { datarefs: [{ id: 20 }] },
    ]);
  });

  it("holds back subscriptions until the connect-time metadata reload is done", async () => {
    const { api, http, latest } = setup();
    const release = http.hold("GET", "/api/v2/datarefs");
    const stepping = api.monitor.step();
    await vi.waitFor(() => expect(http.count("GET", "/api/v2/datarefs")).toBe(1));

    expect(api.isConnected).toBe(true);
    expect(api.isReady).toBe(false);
    expect(await api.dataref("sim/x").monitor()).toBe(true);
    expect(latest().framesOfType("dataref_subscribe_values")).toHaveLength(0);

    release();
    await stepping;
    expect(api.isReady).toBe(true);
    expect(latest().framesOfType("dataref_subscribe_values").map((frame) => frame.params)).toEqual([
      { datarefs: [{ id: 20 }] },
    ]);
  });

  it("drops the connection when the metadata reload fails and connects again", async () => {
    const { api, http, latest, transports } = setup();
    await api.dataref("sim/x").monitor();
    http.failNext("GET", "/api/v2/datarefs");

    await api.monitor.step();
    expect(api.isConnected).toBe(false);
    expect(api.status).toBe(ConnectionState.WS_DISCONNECTED);
    expect(latest().isOpen).toBe(false);
    expect(latest().framesOfType("dataref_subscribe_values")).toHaveLength(0);

    await api.monitor.step();
    expect(transports).toHaveLength(2);
    expect(api.isReady).toBe(true);
    expect(api.datarefs.isValid).toBe(true);
    expect(latest().framesOfType("dataref_subscribe_values").map((frame) => frame.params)).toEqual([
      { datarefs: [{ id: 20 }] },
    ]);
  });

  it("writes values over the socket and waits for the result", async () => {
    const { api, latest } = setup();
    await api.monitor.step();
    const dataref = api.dataref("sim/rw");
    dataref.value = 5;

    expect(await dataref.write()).toBe(true);
    expect(latest().framesOfType("dataref_set_values").map((frame) => frame.params)).toEqual([
      { datarefs: [{ id: 21, value: 5 }] },
    ]);
    expect(dataref.pendingValue).toBeUndefined();
    expect(dataref.value).toBe(5);
  });

  it("reports a failed write from the result frame", async () => {
    const { api, latest } = setup();
    await api.monitor.step();
    latest().autoReply = false;
    const dataref = api.dataref("sim/rw");
    dataref.value = 5;

    const written = dataref.write();
    await vi.waitFor(() => expect(latest().framesOfType("dataref_set_values")).toHaveLength(1));
    const frame = latest().framesOfType("dataref_set_values")[0];
    latest().push({
      type: "result",
      req_id: frame?.req_id,
      success: false,
      error_message: "read only",
    });

    expect(await written).toBe(false);
    expect(dataref.pendingValue).toBe(5);
  });

  it("does not write while disconnected", async () => {
    const { api } = setup();
    const dataref = api.dataref("sim/rw");
    dataref.value = 5;
    expect(await dataref.write()).toBe(false);
  });

  it("executes commands with a duration", async () => {
    const { api, latest } = setup();
    await api.monitor.step();
    expect(await api.command("sim/cmd").execute(1.5)).toBe(true);
    expect(latest().framesOfType("command_set_is_active").map((frame) => frame.params)).toEqual([
      { commands: [{ id: 30, is_active: true, duration: 1.5 }] },
    ]);
  });

  it("resolves waitConnection once open", async () => {
    const { api } = setup();
    const waiting = api.waitConnection(1000);
    await api.monitor.step();
    expect(await waiting).toBe(true);
  });

  it("gives up waiting for a connection after the timeout", async () => {
    const { api } = setup();
    expect(await api.waitConnection(20)).toBe(false);
  });

  it("follows the beacon host and keeps the REST port", () => {
    const { api } = setup();
    const beacon = {
      host: "10.0.0.5",
      port: 49000,
      hostname: "sim",
      simulatorVersion: 121400,
      role: 1,
    };
    api.onBeacon(true, beacon);
    expect(api.host).toBe("10.0.0.5");
    expect(api.port).toBe(8086);
    expect(api.status).toBe(ConnectionState.RECEIVING_BEACON);
    expect(api.monitor.isRunning).toBe(true);
  });

  it("closes and invalidates on disconnect", async () => {
    const { api, latest } = setup();
    await api.monitor.step();
    const stopping = vi.fn();
    api.on("beforeStop", stopping);

    await api.disconnect();
    expect(stopping).toHaveBeenCalledWith(true);
    expect(latest().isOpen).toBe(false);
    expect(api.isConnected).toBe(false);
    expect(api.datarefs.isValid).toBe(false);
    expect(api.status).toBe(ConnectionState.WS_DISCONNECTED);
  });
});
