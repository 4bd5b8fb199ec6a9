// src/entity/dataref.ts

import logger from "../utility/logger";
import { NotWritableError } from "../utility/errors";
import { DatarefValue, WritableValue } from "../dataset/common";
import { DatarefMeta, ValueKind } from "../dataset/metadata";

/** What a Dataref needs from the API that created it. */
export interface DatarefHost {
  datarefMeta(path: string): DatarefMeta | undefined;
  cachedValue(name: string): DatarefValue | undefined;
  fetchDatarefValue(dataref: Dataref): Promise<DatarefValue | undefined>;
  writeDataref(dataref: Dataref): Promise<boolean>;
  monitorDataref(dataref: Dataref): Promise<boolean>;
  unmonitorDataref(dataref: Dataref): Promise<boolean>;
}

const ELEMENT_PATH = /^(.+)\[(\d+)\]$/;

/** Splits "sim/arr[3]" into its path and element index. */
export function parseDatarefPath(raw: string): { path: string; index?: number } {
  const match = ELEMENT_PATH.exec(raw.trim());
  if (!match) {
    return { path: raw.trim() };
  }
  return { path: match[1], index: Number(match[2]) };
}

/**
 * A simulator variable, or one element of an array variable.
 *
 * Several instances may exist for one path. Values received from the
 * simulator are kept by the API under `name`, so every instance sees them.
 */
export class Dataref {
  public readonly path: string;
  public readonly index?: number;
  /** path, or path[index] for an array element */
  public readonly name: string;

  private pending: WritableValue | undefined;
  private monitors = 0;

  constructor(
    rawPath: string,
    private readonly api: DatarefHost,
    public autoSave: boolean = false
  ) {
    const { path, index } = parseDatarefPath(rawPath);
    this.path = path;
    this.index = index;
    this.name = index === undefined ? path : `${path}[${index}]`;
  }

  public toString(): string {
    return this.name;
  }

  public get meta(): DatarefMeta | undefined {
    return this.api.datarefMeta(this.path);
  }

  public get valid(): boolean {
    return this.meta !== undefined;
  }

  public get identifier(): number | undefined {
    return this.meta?.identifier;
  }

  public get valueType(): string | undefined {
    return this.meta?.valueType;
  }

  public get valueKind(): ValueKind | undefined {
    return this.meta?.valueKind;
  }

  public get isArray(): boolean {
    return this.meta?.isArray ?? false;
  }

  public get isWritable(): boolean {
    return this.meta?.isWritable ?? false;
  }

  /** The value set locally and not yet written, else the last value known from the simulator. */
  public get value(): DatarefValue | undefined {
    return this.pending ?? this.api.cachedValue(this.name);
  }

  /** @throws NotWritableError with auto-save on, when cached metadata says read-only */
  public set value(value: WritableValue | undefined) {
    if (this.autoSave && value !== undefined && this.meta?.isWritable === false) {
      throw new NotWritableError(this.name);
    }
    this.pending = value;
    if (this.autoSave && value !== undefined) {
      this.write().catch((error) => {
        logger.error(`Auto-save of ${this.name} failed: ${error}`);
      });
    }
  }

  public get pendingValue(): WritableValue | undefined {
    return this.pending;
  }

  /** Writes the pending value; it is dropped once the simulator accepted it. */
  public async write(): Promise<boolean> {
    const ok = await this.api.writeDataref(this);
    if (ok) {
      this.pending = undefined;
    }
    return ok;
  }

  /** Reads the current value from the simulator. */
  public fetch(): Promise<DatarefValue | undefined> {
    return this.api.fetchDatarefValue(this);
  }

  public get isMonitored(): boolean {
    return this.monitors > 0;
  }

  public get monitorCount(): number {
    return this.monitors;
  }

  public monitor(): Promise<boolean> {
    return this.api.monitorDataref(this);
  }

  public unmonitor(): Promise<boolean> {
    return this.api.unmonitorDataref(this);
  }

  /** Counts one more monitor of this instance. */
  public retain(): void {
    this.monitors++;
  }

  /** Returns false when this instance holds no monitor to release. */
  public release(): boolean {
    if (this.monitors === 0) {
      logger.warn(`${this.name} is not monitored by this instance`);
      return false;
    }
    this.monitors--;
    return true;
  }
}
