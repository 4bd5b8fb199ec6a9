// src/store/subscriptiontable.ts

import logger from "../utility/logger";
import { ICommandRef, IDatarefRef } from "../dataset/messages";

/**
 * Bounded history of index lists that were sent to the simulator, oldest
 * first. Array payloads built against an older list can still arrive after a
 * resubscription, so the last few generations are kept for reconciliation.
 */
export class IndexHistory {
  private generations: number[][] = [];

  constructor(private readonly depth: number) {}

  public push(indices: number[]): void {
    if (indices.length === 0 || this.depth <= 0) {
      return;
    }
    this.generations.push([...indices]);
    if (this.generations.length > this.depth) {
      this.generations.shift();
    }
  }

  public snapshot(): number[][] {
    return this.generations.map((indices) => [...indices]);
  }

  public clear(): void {
    this.generations = [];
  }

  public get size(): number {
    return this.generations.length;
  }
}

/**
 * Picks the index list an array payload of `length` values was built for:
 * the current list when lengths agree, else the most recent history
 * generation of that length. Null when nothing matches.
 *
 * @param history generations, oldest first
 */
export function reconcileIndices(
  current: number[],
  history: number[][],
  length: number
): number[] | null {
  if (current.length === length) {
    return current;
  }
  for (let i = history.length - 1; i >= 0; i--) {
    if (history[i].length === length) {
      return history[i];
    }
  }
  return null;
}

export type Reconciliation =
  | { kind: "unknown" }
  // whole array subscribed: payload is the full array, `elements` are also monitored one by one
  | { kind: "whole"; elements: number[] }
  | { kind: "elements"; indices: number[]; fromHistory: boolean }
  | { kind: "unmatched"; current: number[] };

export interface SubscriptionRequest {
  path: string;
  index?: number;
  identifier?: number;
}

/** Requests to put on the wire after a change to the table. */
export interface WireChanges {
  subscribe: IDatarefRef[];
  unsubscribe: IDatarefRef[];
}

interface SubscriptionEntry {
  readonly path: string;
  identifier: number | undefined;
  wholeCount: number;
  indexCounts: Map<number, number>;
  indices: number[]; // sorted, one per index with a count > 0
  history: IndexHistory;
}

/**
 * Reference counts of monitored datarefs, keyed by path with an identifier
 * reverse index. Only transitions from 0 to 1 and from 1 to 0 produce wire
 * requests, so any number of monitors of one path share a single subscription.
 */
export class SubscriptionTable {
  private entries: Map<string, SubscriptionEntry> = new Map();
  private byId: Map<number, SubscriptionEntry> = new Map();

  constructor(private readonly historyDepth: number) {}

  public monitor(requests: SubscriptionRequest[]): WireChanges {
    const wholeAdded = new Set<SubscriptionEntry>();
    const before = new Map<SubscriptionEntry, number[]>();

    requests.forEach((request) => {
      const entry = this.getOrCreate(request.path, request.identifier);
      if (request.index === undefined) {
        entry.wholeCount++;
        if (entry.wholeCount === 1) {
          wholeAdded.add(entry);
        }
        return;
      }
      const count = entry.indexCounts.get(request.index) ?? 0;
      entry.indexCounts.set(request.index, count + 1);
      if (count === 0) {
        if (!before.has(entry)) {
          before.set(entry, [...entry.indices]);
        }
        entry.indices = [...entry.indices, request.index].sort((a, b) => a - b);
      }
    });

    const changes: WireChanges = { subscribe: [], unsubscribe: [] };
    wholeAdded.forEach((entry) => {
      if (entry.identifier !== undefined) {
        changes.subscribe.push({ id: entry.identifier });
      }
    });
    before.forEach((previous, entry) => {
      entry.history.push(previous);
      if (entry.identifier !== undefined && entry.wholeCount === 0) {
        changes.subscribe.push({ id: entry.identifier, index: [...entry.indices] });
      }
    });
    return changes;
  }

  public unmonitor(requests: SubscriptionRequest[]): WireChanges {
    const wholeRemoved = new Set<SubscriptionEntry>();
    const removed = new Map<SubscriptionEntry, number[]>();
    const before = new Map<SubscriptionEntry, number[]>();

    requests.forEach((request) => {
      const entry = this.entries.get(request.path);
      if (!entry) {
        logger.warn(`${request.path} is not monitored`);
        return;
      }
      if (request.index === undefined) {
        if (entry.wholeCount === 0) {
          logger.warn(`${request.path} is not monitored as a whole`);
          return;
        }
        entry.wholeCount--;
        if (entry.wholeCount === 0) {
          wholeRemoved.add(entry);
        }
        return;
      }
      const count = entry.indexCounts.get(request.index) ?? 0;
      if (count === 0) {
        logger.warn(`${request.path} index ${request.index} not in [${entry.indices.join(", ")}]`);
        return;
      }
      if (count > 1) {
        entry.indexCounts.set(request.index, count - 1);
        return;
      }
      entry.indexCounts.delete(request.index);
      if (!before.has(entry)) {
        before.set(entry, [...entry.indices]);
      }
      entry.indices = entry.indices.filter((index) => index !== request.index);
      removed.set(entry, [...(removed.get(entry) ?? []), request.index]);
    });

    const changes: WireChanges = { subscribe: [], unsubscribe: [] };
    const touched = new Set<SubscriptionEntry>([...wholeRemoved, ...removed.keys()]);
    touched.forEach((entry) => {
      const previous = before.get(entry);
      if (previous) {
        entry.history.push(previous);
      }
      const id = entry.identifier;
      if (id !== undefined) {
        if (wholeRemoved.has(entry)) {
          changes.unsubscribe.push({ id });
          if (entry.indices.length > 0) {
            // elements still wanted once the whole array is gone
            changes.subscribe.push({ id, index: [...entry.indices] });
          }
        } else if (entry.wholeCount === 0) {
          const indices = removed.get(entry) ?? [];
          changes.unsubscribe.push(
            entry.indices.length === 0 ? { id } : { id, index: indices.sort((a, b) => a - b) }
          );
        }
      }
      if (entry.wholeCount === 0 && entry.indices.length === 0) {
        this.entries.delete(entry.path);
        if (id !== undefined && this.byId.get(id) === entry) {
          this.byId.delete(id);
        }
      }
    });
    return changes;
  }

  /**
   * Maps an array payload of `length` values for `identifier` onto the
   * indices it was requested for.
   */
  public reconcile(identifier: number, length: number): Reconciliation {
    const entry = this.byId.get(identifier);
    if (!entry) {
      return { kind: "unknown" };
    }
    if (entry.wholeCount > 0) {
      return { kind: "whole", elements: [...entry.indices] };
    }
    const current = entry.indices;
    const indices = reconcileIndices(current, entry.history.snapshot(), length);
    if (indices === null) {
      return { kind: "unmatched", current: [...current] };
    }
    return { kind: "elements", indices: [...indices], fromHistory: indices !== current };
  }

  /**
   * Re-resolves identifiers after a metadata reload. History is dropped:
   * lists built against the previous identifiers no longer apply.
   */
  public rebind(resolve: (path: string) => number | undefined): void {
    this.byId.clear();
    this.entries.forEach((entry) => {
      entry.identifier = resolve(entry.path);
      entry.history.clear();
      if (entry.identifier !== undefined) {
        this.byId.set(entry.identifier, entry);
      } else {
        logger.warn(`${entry.path} not found after reload, subscription suspended`);
      }
    });
    logger.debug(`Subscription identifiers rebuilt (${this.byId.size}/${this.entries.size})`);
  }

  public unbind(): void {
    this.byId.clear();
    this.entries.forEach((entry) => {
      entry.identifier = undefined;
      entry.history.clear();
    });
  }

  /** One request per monitored identifier, to restore subscriptions after a reconnect. */
  public subscriptions(): IDatarefRef[] {
    const refs: IDatarefRef[] = [];
    this.byId.forEach((entry, id) => {
      if (entry.wholeCount > 0) {
        refs.push({ id });
      } else if (entry.indices.length > 0) {
        refs.push({ id, index: [...entry.indices] });
      }
    });
    return refs;
  }

  public monitorCount(path: string, index?: number): number {
    const entry = this.entries.get(path);
    if (!entry) {
      return 0;
    }
    return index === undefined ? entry.wholeCount : entry.indexCounts.get(index) ?? 0;
  }

  public indicesOf(path: string): number[] {
    return [...(this.entries.get(path)?.indices ?? [])];
  }

  public historyOf(path: string): number[][] {
    return this.entries.get(path)?.history.snapshot() ?? [];
  }

  public get size(): number {
    return this.entries.size;
  }

  private getOrCreate(path: string, identifier: number | undefined): SubscriptionEntry {
    let entry = this.entries.get(path);
    if (!entry) {
      entry = {
        path,
        identifier: undefined,
        wholeCount: 0,
        indexCounts: new Map(),
        indices: [],
        history: new IndexHistory(this.historyDepth),
      };
      this.entries.set(path, entry);
    }
    if (identifier !== undefined && entry.identifier !== identifier) {
      if (entry.identifier !== undefined) {
        this.byId.delete(entry.identifier);
      }
      entry.identifier = identifier;
      this.byId.set(identifier, entry);
    }
    return entry;
  }
}

/** Reference counts of commands monitored for their active state. */
export class CommandSubscriptionTable {
  private counts: Map<string, { identifier: number | undefined; count: number }> =
    new Map();

  /** Returns the request to send when this is the first monitor of `path`. */
  public monitor(path: string, identifier?: number): ICommandRef | null {
    const entry = this.counts.get(path) ?? { identifier: undefined, count: 0 };
    if (identifier !== undefined) {
      entry.identifier = identifier;
    }
    entry.count++;
    this.counts.set(path, entry);
    return entry.count === 1 && entry.identifier !== undefined ? { id: entry.identifier } : null;
  }

  /** Returns the request to send when the last monitor of `path` goes away. */
  public unmonitor(path: string): ICommandRef | null {
    const entry = this.counts.get(path);
    if (!entry) {
      logger.warn(`command ${path} is not monitored`);
      return null;
    }
    entry.count--;
    if (entry.count > 0) {
      return null;
    }
    this.counts.delete(path);
    return entry.identifier !== undefined ? { id: entry.identifier } : null;
  }

  public rebind(resolve: (path: string) => number | undefined): void {
    this.counts.forEach((entry, path) => {
      entry.identifier = resolve(path);
    });
  }

  public unbind(): void {
    this.counts.forEach((entry) => {
      entry.identifier = undefined;
    });
  }

  public subscriptions(): ICommandRef[] {
    const refs: ICommandRef[] = [];
    this.counts.forEach((entry) => {
      if (entry.identifier !== undefined) {
        refs.push({ id: entry.identifier });
      }
    });
    return refs;
  }

  public monitorCount(path: string): number {
    return this.counts.get(path)?.count ?? 0;
  }
}
