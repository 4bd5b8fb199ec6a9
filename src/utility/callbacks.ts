import logger from "./logger";

type Handler<Args extends unknown[]> = (...args: Args) => void;

/**
 * Typed callback registry, one handler set per event kind. A throwing
 * handler is logged and does not stop the others.
 */
export class CallbackRegistry<Events extends Record<string, unknown[]>> {
  private handlers: { [K in keyof Events]?: Set<Handler<Events[K]>> } = {};

  public on<K extends keyof Events>(kind: K, handler: Handler<Events[K]>): void {
    let set = this.handlers[kind];
    if (!set) {
      set = new Set<Handler<Events[K]>>();
      this.handlers[kind] = set;
    }
    set.add(handler);
  }

  public off<K extends keyof Events>(kind: K, handler: Handler<Events[K]>): boolean {
    const set = this.handlers[kind];
    return set ? set.delete(handler) : false;
  }

  public count<K extends keyof Events>(kind: K): number {
    return this.handlers[kind]?.size ?? 0;
  }

  public emit<K extends keyof Events>(kind: K, ...args: Events[K]): void {
    const set = this.handlers[kind];
    if (!set) {
      return;
    }
    for (const handler of [...set]) {
      try {
        handler(...args);
      } catch (error) {
        logger.error(`Callback for ${String(kind)} failed: ${error}`);
      }
    }
  }

  public clear(): void {
    this.handlers = {};
  }
}
