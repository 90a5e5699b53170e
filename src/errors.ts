/**
 * Base class for errors raised by the bridge client.
 */
export class BridgeError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * The initial connect failed (refused, unreachable, DNS failure, timeout).
 */
export class ConnectionError extends BridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("ECONNECT", message, options);
  }
}

/**
 * A write reported zero bytes or failed: the peer has closed the connection.
 */
export class BrokenConnectionError extends BridgeError {
  constructor(message = "Socket connection broken", options?: { cause?: unknown }) {
    super("EBROKEN", message, options);
  }
}

/**
 * Read or write attempted while the connection is not connected.
 */
export class NotConnectedError extends BridgeError {
  constructor(message = "Not connected") {
    super("ENOTCONN", message);
  }
}

export class ReadTimeoutError extends BridgeError {
  constructor(timeoutMs: number) {
    super("ETIMEDOUT", `No data received within ${timeoutMs}ms`);
  }
}

/**
 * Normalize an unknown thrown value into an Error.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
