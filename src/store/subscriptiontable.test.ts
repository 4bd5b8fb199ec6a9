import { describe, expect, it } from "vitest";
import {
  CommandSubscriptionTable,
  IndexHistory,
  SubscriptionTable,
  reconcileIndices,
} from "./subscriptiontable";

describe("reconcileIndices", () => {
  it("uses the current list when the lengths agree", () => {
    expect(reconcileIndices([3, 7], [[1]], 2)).toEqual([3, 7]);
  });

  it("falls back to the most recent history generation of that length", () => {
    expect(reconcileIndices([1, 2, 5, 7], [[1, 5, 7], [1, 2]], 2)).toEqual([1, 2]);
    expect(reconcileIndices([1], [[4, 5], [1, 5, 7], [8, 9]], 2)).toEqual([8, 9]);
  });

  it("returns null when nothing matches", () => {
    expect(reconcileIndices([1, 2, 3], [[1]], 2)).toBeNull();
  });
});

describe("IndexHistory", () => {
  it("keeps the last generations, oldest first, and skips empty lists", () => {
    const history = new IndexHistory(3);
    history.push([]);
    history.push([1]);
    history.push([1, 2]);
    history.push([1, 2, 3]);
    history.push([2, 3]);
    expect(history.size).toBe(3);
    expect(history.snapshot()).toEqual([[1, 2], [1, 2, 3], [2, 3]]);
  });
});

describe("SubscriptionTable", () => {
  it("sends one subscribe for several monitors of a path and one unsubscribe for the last", () => {
    const table = new SubscriptionTable(3);
    expect(table.monitor([{ path: "sim/x", identifier: 9 }])).toEqual({
      subscribe: [{ id: 9 }],
      unsubscribe: [],
    });
    expect(table.monitor([{ path: "sim/x", identifier: 9 }])).toEqual({
      subscribe: [],
      unsubscribe: [],
    });
    expect(table.monitorCount("sim/x")).toBe(2);
    expect(table.unmonitor([{ path: "sim/x" }])).toEqual({ subscribe: [], unsubscribe: [] });
    expect(table.unmonitor([{ path: "sim/x" }])).toEqual({
      subscribe: [],
      unsubscribe: [{ id: 9 }],
    });
    expect(table.size).toBe(0);
  });

  it("batches element subscriptions into one sorted index list", () => {
    const table = new SubscriptionTable(3);
    const changes = table.monitor([
      { path: "sim/arr", index: 7, identifier: 42 },
      { path: "sim/arr", index: 3, identifier: 42 },
    ]);
    expect(changes).toEqual({ subscribe: [{ id: 42, index: [3, 7] }], unsubscribe: [] });
    expect(table.indicesOf("sim/arr")).toEqual([3, 7]);
    // the list before the batch was empty
    expect(table.historyOf("sim/arr")).toEqual([]);
  });

  it("sends only the new index and remembers the previous list", () => {
    const table = new SubscriptionTable(3);
    table.monitor([{ path: "sim/arr", index: 1, identifier: 42 }]);
    table.monitor([{ path: "sim/arr", index: 2, identifier: 42 }]);
    expect(table.indicesOf("sim/arr")).toEqual([1, 2]);
    expect(table.historyOf("sim/arr")).toEqual([[1]]);
  });

  it("maps array payloads onto current or previous indices", () => {
    const table = new SubscriptionTable(3);
    table.monitor([
      { path: "sim/arr", index: 1, identifier: 42 },
      { path: "sim/arr", index: 2, identifier: 42 },
    ]);
    table.monitor([
      { path: "sim/arr", index: 5, identifier: 42 },
      { path: "sim/arr", index: 7, identifier: 42 },
    ]);
    expect(table.indicesOf("sim/arr")).toEqual([1, 2, 5, 7]);

    expect(table.reconcile(42, 4)).toEqual({
      kind: "elements",
      indices: [1, 2, 5, 7],
      fromHistory: false,
    });
    expect(table.reconcile(42, 2)).toEqual({
      kind: "elements",
      indices: [1, 2],
      fromHistory: true,
    });
    expect(table.reconcile(42, 3)).toEqual({ kind: "unmatched", current: [1, 2, 5, 7] });
    expect(table.reconcile(99, 2)).toEqual({ kind: "unknown" });
  });

  it("unsubscribes removed indices only", () => {
    const table = new SubscriptionTable(3);
    table.monitor([
      { path: "sim/arr", index: 3, identifier: 42 },
      { path: "sim/arr", index: 7, identifier: 42 },
    ]);
    expect(table.unmonitor([{ path: "sim/arr", index: 3 }])).toEqual({
      subscribe: [],
      unsubscribe: [{ id: 42, index: [3] }],
    });
    expect(table.unmonitor([{ path: "sim/arr", index: 7 }])).toEqual({
      subscribe: [],
      unsubscribe: [{ id: 42 }],
    });
  });

  it("lets a whole-array subscription cover its elements", () => {
    const table = new SubscriptionTable(3);
    table.monitor([{ path: "sim/arr", identifier: 42 }]);
    expect(table.monitor([{ path: "sim/arr", index: 4, identifier: 42 }])).toEqual({
      subscribe: [],
      unsubscribe: [],
    });
    expect(table.reconcile(42, 8)).toEqual({ kind: "whole", elements: [4] });

    expect(table.unmonitor([{ path: "sim/arr" }])).toEqual({
      subscribe: [{ id: 42, index: [4] }],
      unsubscribe: [{ id: 42 }],
    });
  });

  it("ignores unmonitor of what is not monitored", () => {
    const table = new SubscriptionTable(3);
    expect(table.unmonitor([{ path: "sim/none" }])).toEqual({ subscribe: [], unsubscribe: [] });
    table.monitor([{ path: "sim/arr", index: 1, identifier: 42 }]);
    expect(table.unmonitor([{ path: "sim/arr", index: 2 }])).toEqual({
      subscribe: [],
      unsubscribe: [],
    });
    expect(table.unmonitor([{ path: "sim/arr" }])).toEqual({ subscribe: [], unsubscribe: [] });
  });

  it("keeps counts without identifiers and subscribes after rebind", () => {
    const table = new SubscriptionTable(3);
    expect(table.monitor([{ path: "sim/arr", index: 2 }, { path: "sim/x" }])).toEqual({
      subscribe: [],
      unsubscribe: [],
    });
    table.rebind((path) => (path === "sim/arr" ? 42 : path === "sim/x" ? 9 : undefined));
    expect(table.subscriptions()).toEqual([{ id: 42, index: [2] }, { id: 9 }]);
    expect(table.historyOf("sim/arr")).toEqual([]);

    table.unbind();
    expect(table.subscriptions()).toEqual([]);
    expect(table.monitorCount("sim/arr", 2)).toBe(1);
  });
});

describe("CommandSubscriptionTable", () => {
  it("ref-counts command monitors", () => {
    const table = new CommandSubscriptionTable();
    expect(table.monitor("sim/cmd", 5)).toEqual({ id: 5 });
    expect(table.monitor("sim/cmd", 5)).toBeNull();
    expect(table.unmonitor("sim/cmd")).toBeNull();
    expect(table.unmonitor("sim/cmd")).toEqual({ id: 5 });
    expect(table.unmonitor("sim/cmd")).toBeNull();
  });
});
