// src/store/metadatastore.ts

import logger from "../utility/logger";
import { ObjectMeta } from "../dataset/metadata";

/**
 * Name and identifier tables for one kind of simulator object.
 *
 * Identifiers are only valid for one connection: the tables are replaced
 * wholesale on every load, and `invalidate()` makes every lookup miss until
 * the next load so stale identifiers are never dereferenced.
 */
export class MetadataCache<M extends ObjectMeta> {
  // name -> meta (O(1))
  private byName: Map<string, M> = new Map();
  // identifier -> meta (O(1))
  private byId: Map<number, M> = new Map();
  private valid = false;

  constructor(public readonly kind: "datarefs" | "commands") {}

  public load(entries: M[]): void {
    const byName = new Map<string, M>();
    const byId = new Map<number, M>();
    entries.forEach((meta) => {
      byName.set(meta.name, meta);
      byId.set(meta.identifier, meta);
    });
    this.byName = byName;
    this.byId = byId;
    this.valid = true;
    logger.debug(`${this.kind} cached (${entries.length} entries)`);
  }

  public invalidate(): void {
    if (this.valid) {
      logger.debug(`${this.kind} cache invalidated`);
    }
    this.valid = false;
    this.byName = new Map();
    this.byId = new Map();
  }

  public getByName(name: string): M | undefined {
    return this.valid ? this.byName.get(name) : undefined;
  }

  public getById(identifier: number): M | undefined {
    return this.valid ? this.byId.get(identifier) : undefined;
  }

  /** "1234(sim/path/name)" for logs. */
  public equiv(identifier: number): string {
    const meta = this.getById(identifier);
    return meta ? `${identifier}(${meta.name})` : `no equivalence for ${identifier}`;
  }

  public get count(): number {
    return this.valid ? this.byName.size : 0;
  }

  public get isValid(): boolean {
    return this.valid;
  }
}
