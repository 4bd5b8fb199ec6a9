/**
 * Error types surfaced to callers of the client runtime.
 *
 * Transport problems (no beacon, REST unreachable, socket closed) are retried by
 * the monitor loops and only logged; the classes below are what escapes to
 * application code.
 */

export class SimApiError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class BeaconDecodeError extends SimApiError {}

export class UnsupportedBeaconVersionError extends SimApiError {
  constructor(
    public readonly majorVersion: number,
    public readonly minorVersion: number,
    public readonly hostId: number
  ) {
    super(
      `Beacon version not supported: ${majorVersion}.${minorVersion}.${hostId}`
    );
  }
}

export class NotConnectedError extends SimApiError {
  constructor(operation: string) {
    super(`Not connected, cannot ${operation}`);
  }
}

export class UnknownPathError extends SimApiError {
  constructor(
    public readonly kind: "dataref" | "command",
    public readonly path: string
  ) {
    super(`${kind} ${path} not found in simulator ${kind}s database`);
  }
}

export class NotWritableError extends SimApiError {
  constructor(public readonly path: string) {
    super(`dataref ${path} is not writable`);
  }
}

export class ConnectionClosedError extends SimApiError {
  constructor(reason = "websocket connection closed") {
    super(reason);
  }
}
