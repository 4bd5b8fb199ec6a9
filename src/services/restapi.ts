// src/services/restapi.ts

import { z } from "zod";
import logger from "../utility/logger";
import { config, ApiConfig } from "../config/config";
import { HttpClient, HttpMethod, HttpResponse, NodeHttpClient } from "../utility/http";
import { NotWritableError, UnknownPathError } from "../utility/errors";
import { decodeDataValue, encodeDataValue } from "../utility/valuecodec";
import { apiVersionNumber, latestVersion, sortVersions } from "../utility/version";
import { MetadataCache } from "../store/metadatastore";
import { Dataref, DatarefHost } from "../entity/dataref";
import { Command, CommandHost } from "../entity/command";
import { DatarefValue, WritableValue } from "../dataset/common";
import {
  CapabilitiesSchema,
  ICapabilities,
  V1_CAPABILITIES,
} from "../dataset/capabilities";
import {
  CommandListSchema,
  CommandMeta,
  DatarefListSchema,
  DatarefMeta,
  DatarefValueResponseSchema,
  ValueKind,
  toCommandMeta,
  toDatarefMeta,
} from "../dataset/metadata";

export const RUNNING_TIME = "sim/time/total_running_time_sec";

export interface RestApiOptions {
  host?: string;
  port?: number;
  version?: string;
  http?: HttpClient;
  api?: Partial<ApiConfig>;
  minReloadIntervalSec?: number;
}

function formatUptime(seconds: number): string {
  const total = Math.floor(seconds);
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = total % 60;
  return `${hours}:${String(minutes).padStart(2, "0")}:${String(secs).padStart(2, "0")}`;
}

/**
 * Simulator REST API with dataref and command metadata caches.
 *
 * Values read or written through this class are kept in a table keyed by
 * dataref name, which is what `Dataref.value` reads.
 */
export class RestApi implements DatarefHost, CommandHost {
  public host: string;
  public port: number;
  public version: string;
  public useRest = true;

  public readonly datarefs = new MetadataCache<DatarefMeta>("datarefs");
  public readonly commands = new MetadataCache<CommandMeta>("commands");

  protected readonly http: HttpClient;
  protected readonly settings: ApiConfig;
  protected readonly values: Map<string, DatarefValue> = new Map();

  private readonly minReloadIntervalSec: number;
  private readonly runningTime: Dataref;
  // metadata found by name filter while the caches lack it
  private readonly datarefsByFilter: Map<string, DatarefMeta> = new Map();
  private readonly commandsByFilter: Map<string, CommandMeta> = new Map();
  private capabilitiesDoc: ICapabilities | null = null;
  private lastReloadUptime: number | null = null;
  private unreachableCount = 0;
  private firstProbe = true;

  constructor(options: RestApiOptions = {}) {
    this.settings = { ...config.api, ...options.api };
    this.host = options.host ?? this.settings.host;
    this.port = options.port ?? this.settings.port;
    this.version = (options.version ?? this.settings.version).replace(/^\//, "");
    this.http = options.http ?? new NodeHttpClient();
    this.minReloadIntervalSec =
      options.minReloadIntervalSec ?? config.metadata.minReloadIntervalSec;
    this.runningTime = new Dataref(RUNNING_TIME, this);
  }

  protected url(protocol: "http" | "ws"): string {
    return `${protocol}://${this.host}:${this.port}${this.settings.root}/${this.version}`;
  }

  public get restUrl(): string {
    return this.url("http");
  }

  /** Points the API at another simulator; capabilities are fetched again on next use. */
  public setNetworkAddress(host: string, port: number): void {
    if (host === this.host && port === this.port) {
      return;
    }
    logger.info(`API address set to ${host}:${port}`);
    this.host = host;
    this.port = port;
    this.resetConnectionState();
  }

  public dataref(path: string, autoSave = false): Dataref {
    return new Dataref(path, this, autoSave);
  }

  public command(path: string, duration = 0): Command {
    return new Command(path, this, duration);
  }

  // --- Reachability and capabilities ---

  /** Cheap GET that works on every API version. */
  public async isReachable(): Promise<boolean> {
    const url = `http://${this.host}:${this.port}${this.settings.root}/v1/datarefs/count`;
    if (this.firstProbe) {
      logger.info(`Trying to connect to ${url}`);
      this.firstProbe = false;
    }
    try {
      const response = await this.send("GET", url);
      if (response.statusCode === 200) {
        this.unreachableCount = 0;
        return true;
      }
      logger.debug(`GET ${url}: HTTP ${response.statusCode}`);
    } catch (error) {
      if (this.unreachableCount % this.settings.unreachableWarnFrequency === 0) {
        logger.warn(`API unreachable, simulator may not be running (${error})`);
      }
      this.unreachableCount++;
    }
    return false;
  }

  /**
   * Capabilities document, fetched once per connection. Simulators that only
   * offer v1 have no such document and get the built-in v1 capabilities.
   */
  public async capabilities(): Promise<ICapabilities> {
    if (this.capabilitiesDoc) {
      return this.capabilitiesDoc;
    }
    const url = `http://${this.host}:${this.port}${this.settings.root}/capabilities`;
    const document = await this.getJson(url, CapabilitiesSchema);
    if (document) {
      logger.debug(`Capabilities: ${JSON.stringify(document)}`);
      this.capabilitiesDoc = document;
    } else {
      logger.info("No capabilities document, assuming API v1");
      this.capabilitiesDoc = V1_CAPABILITIES;
    }
    return this.capabilitiesDoc;
  }

  /** Simulator version reported in the capabilities, e.g. "12.1.4-r1". */
  public get simulatorVersion(): string | undefined {
    return this.capabilitiesDoc?.["x-plane"]?.version;
  }

  /**
   * Selects the API version, the latest offered when none is given.
   * Returns the version in use afterwards.
   */
  public async setApiVersion(version?: string): Promise<string> {
    const wanted = version?.replace(/^\//, "");
    const versions = (await this.capabilities()).api.versions;
    if (versions.length === 0) {
      logger.warn("No API versions in capabilities, cannot check API version");
      if (wanted) {
        this.version = wanted;
      }
      return this.version;
    }

    const selected = wanted ?? latestVersion(versions);
    if (selected !== undefined && versions.includes(selected)) {
      this.version = selected;
      logger.info(
        `Using API ${selected} of [${sortVersions(versions).join(", ")}], ` +
          `simulator ${this.simulatorVersion ?? "unknown"}`
      );
    } else {
      logger.warn(`No API ${selected} in [${versions.join(", ")}], keeping ${this.version}`);
    }
    return this.version;
  }

  // --- Metadata ---

  /**
   * Reloads both metadata caches. Skipped when the previous load is less than
   * the minimum interval of simulator uptime old, unless `force` is set.
   */
  public async reloadCaches(force = false): Promise<boolean> {
    if (!force && this.lastReloadUptime !== null && this.datarefs.isValid) {
      const now = await this.uptime();
      if (now !== null) {
        const elapsed = now - this.lastReloadUptime;
        if (elapsed < this.minReloadIntervalSec) {
          logger.info(`Metadata cache not reloaded, loaded ${elapsed.toFixed(1)} secs. ago`);
          return false;
        }
      } else {
        logger.warn(`No value for ${RUNNING_TIME}`);
      }
    }

    const datarefs = await this.getJson(`${this.restUrl}/datarefs`, DatarefListSchema);
    if (!datarefs) {
      logger.error("Dataref metadata could not be loaded");
      return false;
    }
    this.datarefs.load(datarefs.data.map(toDatarefMeta));
    this.datarefsByFilter.clear();

    if (apiVersionNumber(this.version) >= 2) {
      const commands = await this.getJson(`${this.restUrl}/commands`, CommandListSchema);
      this.commands.load(commands ? commands.data.map(toCommandMeta) : []);
    } else {
      this.commands.load([]);
    }
    this.commandsByFilter.clear();

    const uptime = await this.uptime();
    this.lastReloadUptime = uptime;
    const since = uptime === null ? "unknown" : formatUptime(uptime);
    logger.info(
      `Dataref cache (${this.datarefs.count}) and command cache (${this.commands.count}) ` +
        `reloaded, sim uptime ${since}`
    );
    return true;
  }

  public invalidateCaches(): void {
    this.datarefs.invalidate();
    this.commands.invalidate();
    this.datarefsByFilter.clear();
    this.commandsByFilter.clear();
    this.lastReloadUptime = null;
  }

  /** Forgets everything learnt from the current simulator connection. */
  public resetConnectionState(): void {
    this.capabilitiesDoc = null;
    this.invalidateCaches();
  }

  public datarefMeta(path: string): DatarefMeta | undefined {
    return this.datarefs.getByName(path) ?? this.datarefsByFilter.get(path);
  }

  public commandMeta(path: string): CommandMeta | undefined {
    return this.commands.getByName(path) ?? this.commandsByFilter.get(path);
  }

  /** Cached metadata, else a name-filtered query. */
  public async lookupDatarefMeta(path: string): Promise<DatarefMeta | undefined> {
    const known = this.datarefMeta(path);
    if (known) {
      return known;
    }
    const url = `${this.restUrl}/datarefs?filter[name]=${encodeURIComponent(path)}`;
    const found = await this.getJson(url, DatarefListSchema);
    const definition = found?.data[0];
    if (!definition) {
      logger.error(`dataref ${path} could not get metadata through REST API`);
      return undefined;
    }
    const meta = toDatarefMeta(definition);
    this.datarefsByFilter.set(path, meta);
    return meta;
  }

  public async lookupCommandMeta(path: string): Promise<CommandMeta | undefined> {
    const known = this.commandMeta(path);
    if (known) {
      return known;
    }
    const url = `${this.restUrl}/commands?filter[name]=${encodeURIComponent(path)}`;
    const found = await this.getJson(url, CommandListSchema);
    const definition = found?.data[0];
    if (!definition) {
      logger.error(`command ${path} could not get metadata through REST API`);
      return undefined;
    }
    const meta = toCommandMeta(definition);
    this.commandsByFilter.set(path, meta);
    return meta;
  }

  // --- Values ---

  public cachedValue(name: string): DatarefValue | undefined {
    return this.values.get(name);
  }

  /** Reads a value through REST and keeps it as the dataref's current value. */
  public async fetchDatarefValue(dataref: Dataref): Promise<DatarefValue | undefined> {
    const meta = await this.lookupDatarefMeta(dataref.path);
    if (!meta) {
      throw new UnknownPathError("dataref", dataref.path);
    }
    const url = `${this.restUrl}/datarefs/${meta.identifier}/value`;
    const response = await this.getJson(url, DatarefValueResponseSchema);
    if (!response) {
      return undefined;
    }

    let value: DatarefValue = response.data;
    if (meta.valueKind === ValueKind.Bytes && typeof value === "string") {
      value = decodeDataValue(value);
    }
    if (dataref.index !== undefined) {
      if (!Array.isArray(value) || dataref.index >= value.length) {
        logger.warn(`${dataref.name}: no element ${dataref.index} in value of ${dataref.path}`);
        return undefined;
      }
      value = value[dataref.index];
    }
    this.values.set(dataref.name, value);
    return value;
  }

  /**
   * Writes the dataref's pending value.
   *
   * @throws UnknownPathError when the simulator has no such dataref
   * @throws NotWritableError when the dataref is read-only
   */
  public async writeDataref(dataref: Dataref): Promise<boolean> {
    const meta = await this.lookupDatarefMeta(dataref.path);
    if (!meta) {
      throw new UnknownPathError("dataref", dataref.path);
    }
    if (!meta.isWritable) {
      throw new NotWritableError(dataref.name);
    }
    const value = dataref.pendingValue;
    if (value === undefined) {
      logger.warn(`${dataref.name}: no value to write`);
      return false;
    }
    const ok = await this.writeValue(dataref, meta, value);
    if (ok) {
      this.values.set(dataref.name, value);
    }
    return ok;
  }

  protected async writeValue(
    dataref: Dataref,
    meta: DatarefMeta,
    value: WritableValue
  ): Promise<boolean> {
    const data = meta.valueKind === ValueKind.Bytes ? encodeDataValue(String(value)) : value;
    let url = `${this.restUrl}/datarefs/${meta.identifier}/value`;
    if (dataref.index !== undefined && meta.isArray) {
      url += `?index=${dataref.index}`;
    }
    try {
      const response = await this.send("PATCH", url, { data });
      if (response.statusCode === 200) {
        return true;
      }
      logger.error(`Write of ${dataref.name} failed: HTTP ${response.statusCode} ${response.body}`);
    } catch (error) {
      logger.error(`Write of ${dataref.name} failed: ${error}`);
    }
    return false;
  }

  /**
   * Runs a command for `duration` seconds.
   *
   * @throws UnknownPathError when the simulator has no such command
   */
  public async execute(command: Command, duration: number = command.duration): Promise<boolean> {
    const meta = await this.lookupCommandMeta(command.path);
    if (!meta) {
      throw new UnknownPathError("command", command.path);
    }
    return this.executeCommand(command, meta, duration);
  }

  protected async executeCommand(
    command: Command,
    meta: CommandMeta,
    duration: number
  ): Promise<boolean> {
    const url = `${this.restUrl}/command/${meta.identifier}/activate`;
    try {
      const response = await this.send("POST", url, { id: meta.identifier, duration });
      if (response.statusCode === 200) {
        return true;
      }
      logger.error(`Execute ${command.path} failed: HTTP ${response.statusCode} ${response.body}`);
    } catch (error) {
      logger.error(`Execute ${command.path} failed: ${error}`);
    }
    return false;
  }

  // Monitoring needs the WebSocket API.
  public async monitorDataref(dataref: Dataref): Promise<boolean> {
    logger.warn(`Cannot monitor ${dataref.name} through REST API`);
    return false;
  }

  public async unmonitorDataref(dataref: Dataref): Promise<boolean> {
    logger.warn(`Cannot unmonitor ${dataref.name} through REST API`);
    return false;
  }

  public async monitorCommand(command: Command): Promise<boolean> {
    logger.warn(`Cannot monitor command ${command.path} through REST API`);
    return false;
  }

  public async unmonitorCommand(command: Command): Promise<boolean> {
    logger.warn(`Cannot unmonitor command ${command.path} through REST API`);
    return false;
  }

  /** Seconds the simulator has been running, null when unknown. */
  public async uptime(): Promise<number | null> {
    try {
      const value = await this.fetchDatarefValue(this.runningTime);
      return typeof value === "number" ? value : null;
    } catch (error) {
      logger.debug(`Uptime not available: ${error}`);
      return null;
    }
  }

  // --- HTTP ---

  protected send(method: HttpMethod, url: string, body?: unknown): Promise<HttpResponse> {
    return this.http.request({
      method,
      url,
      body,
      timeoutMs: this.settings.requestTimeoutMs,
    });
  }

  protected async getJson<T>(
    url: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T | null> {
    let response: HttpResponse;
    try {
      response = await this.send("GET", url);
    } catch (error) {
      logger.error(`GET ${url} failed: ${error}`);
      return null;
    }
    if (response.statusCode !== 200) {
      logger.debug(`GET ${url}: HTTP ${response.statusCode}`);
      return null;
    }

    let data: unknown;
    try {
      data = JSON.parse(response.body);
    } catch (error) {
      logger.error(`GET ${url}: invalid JSON (${error})`);
      return null;
    }
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0]?.message ?? "unknown";
      logger.error(`GET ${url}: unexpected payload (${issue})`);
      return null;
    }
    return parsed.data;
  }
}
