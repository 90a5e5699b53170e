import type { ConnectionError } from "../errors";

/**
 * Host/port pair identifying the remote peer.
 */
export interface Endpoint {
  readonly host: string;
  readonly port: number;
}

/**
 * Transport mode, fixed when the client is constructed.
 */
export type Mode = "sync" | "async";

/**
 * Outcome of a connect attempt. Connect failures are reported, not thrown.
 */
export type ConnectResult =
  | { ok: true }
  | { ok: false; error: ConnectionError };

/**
 * Transport strategy used by the client facade.
 * Implementations are the direct sync path and the queue-backed async path.
 */
export interface Transport {
  readonly mode: Mode;

  /**
   * Called once the connection is established.
   */
  open(): void;

  /**
   * Hand a payload to the transport.
   */
  send(payload: Uint8Array): Promise<void>;

  /**
   * Take the next received bytes, or null when nothing is available.
   */
  receive(): Promise<Uint8Array | null>;

  /**
   * Stop the transport and close the underlying connection.
   */
  close(): Promise<void>;
}

/**
 * Validate and freeze an endpoint.
 */
export function createEndpoint(host: string, port: number): Endpoint {
  if (host.length === 0) {
    throw new RangeError("Endpoint host must not be empty");
  }
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new RangeError(`Endpoint port must be an integer in 0..65535, got ${port}`);
  }
  return Object.freeze({ host, port });
}
