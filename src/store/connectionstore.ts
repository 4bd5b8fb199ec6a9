// src/store/connectionstore.ts

import logger from "../utility/logger";
import { ConnectionState, IStateTransition } from "../dataset/connection";

type StateListener = (transition: IStateTransition) => void;

const MAX_TRANSITIONS = 50;

/** Holds the one authoritative connection state of a client. */
class ConnectionStore {
  private state: ConnectionState = ConnectionState.NO_BEACON;
  private transitions: IStateTransition[] = [];
  private listeners: Set<StateListener> = new Set();

  public get current(): ConnectionState {
    return this.state;
  }

  /** Returns false when `next` is already the current state. */
  public setState(next: ConnectionState): boolean {
    if (this.state === next) {
      return false;
    }
    const transition: IStateTransition = {
      from: this.state,
      to: next,
      at: new Date(),
    };
    this.state = next;
    this.transitions.push(transition);
    if (this.transitions.length > MAX_TRANSITIONS) {
      this.transitions.shift();
    }
    logger.info(`Connection state: ${transition.from} -> ${transition.to}`);

    this.listeners.forEach((listener) => {
      try {
        listener(transition);
      } catch (error) {
        logger.error(`Connection state listener failed: ${error}`);
      }
    });
    return true;
  }

  public is(...states: ConnectionState[]): boolean {
    return states.includes(this.state);
  }

  public getTransitions(): IStateTransition[] {
    return [...this.transitions];
  }

  /** Returns a function that removes the listener. */
  public onChange(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}

export default ConnectionStore;
