import logger from "./logger";

/**
 * Long-running background loop. `step()` does one unit of work and returns
 * how long to wait before the next one; `stop()` signals the loop and waits
 * up to the join timeout for it to finish.
 */
export abstract class BackgroundLoop {
  private controller: AbortController | null = null;
  private running: Promise<void> | null = null;
  private wakeUp: (() => void) | null = null;

  constructor(
    public readonly name: string,
    private readonly joinTimeoutMs: number
  ) {}

  public abstract step(signal: AbortSignal): Promise<number>;

  public get isRunning(): boolean {
    return this.running !== null;
  }

  public start(): boolean {
    if (this.running) {
      logger.debug(`${this.name} already running`);
      return false;
    }
    const controller = new AbortController();
    this.controller = controller;
    this.running = this.run(controller.signal)
      .catch((error) => {
        logger.error(`${this.name} terminated: ${error}`);
      })
      .finally(() => {
        if (this.controller === controller) {
          this.running = null;
          this.controller = null;
        }
      });
    logger.debug(`${this.name} started`);
    return true;
  }

  /** Resolves true when the loop ended within the join timeout. */
  public async stop(): Promise<boolean> {
    const running = this.running;
    if (!running || !this.controller) {
      return true;
    }
    this.controller.abort();
    this.kick();

    let timer: NodeJS.Timeout | undefined;
    const joined = await Promise.race([
      running.then(() => true),
      new Promise<boolean>((resolve) => {
        timer = setTimeout(() => resolve(false), this.joinTimeoutMs);
      }),
    ]);
    clearTimeout(timer);

    this.running = null;
    this.controller = null;
    if (!joined) {
      logger.warn(`${this.name} did not stop within ${this.joinTimeoutMs}ms, loop may hang`);
    } else {
      logger.debug(`${this.name} stopped`);
    }
    return joined;
  }

  /** Ends the loop from inside `step()`, without waiting for it. */
  protected halt(): void {
    this.controller?.abort();
  }

  /** Cuts the current wait short. */
  public kick(): void {
    if (this.wakeUp) {
      const wake = this.wakeUp;
      this.wakeUp = null;
      wake();
    }
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let delay = 0;
      try {
        delay = await this.step(signal);
      } catch (error) {
        logger.error(`${this.name}: ${error}`);
        delay = 1000;
      }
      if (signal.aborted) {
        break;
      }
      if (delay > 0) {
        await this.sleep(delay);
      }
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wakeUp = null;
        resolve();
      }, ms);
      this.wakeUp = () => {
        clearTimeout(timer);
        resolve();
      };
    });
  }
}
