// src/entity/command.ts

import logger from "../utility/logger";
import { CommandMeta } from "../dataset/metadata";

export interface CommandHost {
  commandMeta(path: string): CommandMeta | undefined;
  execute(command: Command, duration: number): Promise<boolean>;
  monitorCommand(command: Command): Promise<boolean>;
  unmonitorCommand(command: Command): Promise<boolean>;
}

/** A triggerable simulator action. */
export class Command {
  public readonly path: string;
  private monitors = 0;

  constructor(
    path: string,
    private readonly api: CommandHost,
    public duration: number = 0
  ) {
    this.path = path.trim();
  }

  public toString(): string {
    return this.path;
  }

  public get meta(): CommandMeta | undefined {
    return this.api.commandMeta(this.path);
  }

  public get valid(): boolean {
    return this.meta !== undefined;
  }

  public get identifier(): number | undefined {
    return this.meta?.identifier;
  }

  public get description(): string | undefined {
    return this.meta?.description;
  }

  /** Runs the command for `duration` seconds; 0 means a single press. */
  public execute(duration: number = this.duration): Promise<boolean> {
    return this.api.execute(this, duration);
  }

  public get isMonitored(): boolean {
    return this.monitors > 0;
  }

  public monitor(): Promise<boolean> {
    return this.api.monitorCommand(this);
  }

  public unmonitor(): Promise<boolean> {
    return this.api.unmonitorCommand(this);
  }

  public retain(): void {
    this.monitors++;
  }

  public release(): boolean {
    if (this.monitors === 0) {
      logger.warn(`command ${this.path} is not monitored by this instance`);
      return false;
    }
    this.monitors--;
    return true;
  }
}
