// src/services/subscriptionmanager.ts

import logger from "../utility/logger";
import {
  ConnectionClosedError,
  NotConnectedError,
  UnknownPathError,
} from "../utility/errors";
import {
  CommandSubscriptionTable,
  SubscriptionRequest,
  SubscriptionTable,
  WireChanges,
} from "../store/subscriptiontable";
import { Dataref } from "../entity/dataref";
import { Command } from "../entity/command";
import { CommandMeta, DatarefMeta } from "../dataset/metadata";
import { ICommandRef, wsRequestTypes } from "../dataset/messages";
import { Dispatcher } from "./dispatcher";

export interface SubscriptionManagerContext {
  datarefs: SubscriptionTable;
  commands: CommandSubscriptionTable;
  dispatcher: Dispatcher;
  isConnected: () => boolean;
  lookupDataref: (path: string) => Promise<DatarefMeta | undefined>;
  lookupCommand: (path: string) => Promise<CommandMeta | undefined>;
  /** Cache-only lookups, used to rebind identifiers after a reload. */
  datarefIdentifier: (path: string) => number | undefined;
  commandIdentifier: (path: string) => number | undefined;
}

/**
 * Turns monitor and unmonitor calls into bulk subscribe and unsubscribe
 * requests. While disconnected only the counts change; the wire catches up
 * in `resubscribeAll()` once the connection is back.
 */
export class SubscriptionManager {
  constructor(private readonly context: SubscriptionManagerContext) {}

  /**
   * Monitors every dataref of the list with one request per kind.
   *
   * @throws UnknownPathError when connected and the simulator has no such dataref
   */
  public async monitorDatarefs(datarefs: Dataref[]): Promise<boolean> {
    const requests = await this.resolve(datarefs);
    datarefs.forEach((dataref) => dataref.retain());
    const changes = this.context.datarefs.monitor(requests);
    return this.apply(changes, "monitor");
  }

  public async unmonitorDatarefs(datarefs: Dataref[]): Promise<boolean> {
    const released = datarefs.filter((dataref) => dataref.release());
    if (released.length === 0) {
      return false;
    }
    const changes = this.context.datarefs.unmonitor(
      released.map((dataref) => ({ path: dataref.path, index: dataref.index }))
    );
    const ok = this.apply(changes, "unmonitor");
    return ok && released.length === datarefs.length;
  }

  /** @throws UnknownPathError when connected and the simulator has no such command */
  public async monitorCommands(commands: Command[]): Promise<boolean> {
    const refs: ICommandRef[] = [];
    const identifiers: (number | undefined)[] = [];
    for (const command of commands) {
      identifiers.push(await this.resolveCommand(command));
    }
    commands.forEach((command, i) => {
      command.retain();
      const ref = this.context.commands.monitor(command.path, identifiers[i]);
      if (ref) {
        refs.push(ref);
      }
    });
    return this.sendCommands(wsRequestTypes.commandSubscribe, refs);
  }

  public async unmonitorCommands(commands: Command[]): Promise<boolean> {
    const refs: ICommandRef[] = [];
    let all = true;
    commands.forEach((command) => {
      if (!command.release()) {
        all = false;
        return;
      }
      const ref = this.context.commands.unmonitor(command.path);
      if (ref) {
        refs.push(ref);
      }
    });
    return this.sendCommands(wsRequestTypes.commandUnsubscribe, refs) && all;
  }

  /**
   * Rebinds identifiers from freshly loaded metadata and subscribes again to
   * everything monitored. Must run after the metadata reload.
   */
  public resubscribeAll(): void {
    this.context.datarefs.rebind(this.context.datarefIdentifier);
    this.context.commands.rebind(this.context.commandIdentifier);

    const datarefs = this.context.datarefs.subscriptions();
    if (datarefs.length > 0) {
      this.apply({ subscribe: datarefs, unsubscribe: [] }, "resubscribe");
      logger.info(`Resubscribed to ${datarefs.length} dataref(s)`);
    }
    const commands = this.context.commands.subscriptions();
    if (commands.length > 0) {
      this.sendCommands(wsRequestTypes.commandSubscribe, commands);
      logger.info(`Resubscribed to ${commands.length} command(s)`);
    }
  }

  /** Drops identifiers of a closed connection; counts are kept. */
  public suspend(): void {
    this.context.datarefs.unbind();
    this.context.commands.unbind();
  }

  private async resolve(datarefs: Dataref[]): Promise<SubscriptionRequest[]> {
    const requests: SubscriptionRequest[] = [];
    for (const dataref of datarefs) {
      let identifier: number | undefined;
      if (this.context.isConnected()) {
        const meta = await this.context.lookupDataref(dataref.path);
        if (!meta) {
          throw new UnknownPathError("dataref", dataref.path);
        }
        identifier = meta.identifier;
      }
      requests.push({ path: dataref.path, index: dataref.index, identifier });
    }
    return requests;
  }

  private async resolveCommand(command: Command): Promise<number | undefined> {
    if (!this.context.isConnected()) {
      return undefined;
    }
    const meta = await this.context.lookupCommand(command.path);
    if (!meta) {
      throw new UnknownPathError("command", command.path);
    }
    return meta.identifier;
  }

  private apply(changes: WireChanges, reason: string): boolean {
    if (changes.subscribe.length === 0 && changes.unsubscribe.length === 0) {
      return true;
    }
    if (!this.context.isConnected()) {
      logger.debug(`Not connected, ${reason} deferred until connection`);
      return true;
    }
    try {
      if (changes.unsubscribe.length > 0) {
        this.context.dispatcher.send({
          type: wsRequestTypes.datarefUnsubscribe,
          params: { datarefs: changes.unsubscribe },
        });
      }
      if (changes.subscribe.length > 0) {
        this.context.dispatcher.send({
          type: wsRequestTypes.datarefSubscribe,
          params: { datarefs: changes.subscribe },
        });
      }
      return true;
    } catch (error) {
      if (error instanceof NotConnectedError || error instanceof ConnectionClosedError) {
        logger.warn(`${reason}: ${error.message}, will resubscribe on connection`);
        return false;
      }
      throw error;
    }
  }

  private sendCommands(
    type: typeof wsRequestTypes.commandSubscribe | typeof wsRequestTypes.commandUnsubscribe,
    commands: ICommandRef[]
  ): boolean {
    if (commands.length === 0) {
      return true;
    }
    if (!this.context.isConnected()) {
      logger.debug(`Not connected, ${type} deferred until connection`);
      return true;
    }
    try {
      this.context.dispatcher.send({ type, params: { commands } });
      return true;
    } catch (error) {
      if (error instanceof NotConnectedError || error instanceof ConnectionClosedError) {
        logger.warn(`${type}: ${error.message}`);
        return false;
      }
      throw error;
    }
  }
}
