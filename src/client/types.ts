import type { Endpoint, Mode } from "../transport/transport";

/**
 * Connection state for the bridge client.
 * `closed` is terminal; a failed start returns to `created`.
 */
export type ConnectionState =
  | "created"
  | "connecting"
  | "connected"
  | "closed";

/**
 * Event emitted when connection state changes.
 */
export interface ConnectionStateChangeEvent {
  previousState: ConnectionState;
  newState: ConnectionState;
}

/**
 * Bridge client type definition.
 */
export interface IClient {
  start(): Promise<boolean>;
  send(payload: Uint8Array | string): Promise<void>;
  receive(): Promise<string | null>;
  exchange(payload: Uint8Array | string): Promise<string | null>;
  close(): Promise<void>;
  isConnected(): boolean;
  isPeerClosed(): boolean;
  getEndpoint(): Endpoint;
  getMode(): Mode;

  onError(handler: (error: Error) => void): () => void;
  onConnected(handler: () => void): () => void;
  onClosed(handler: () => void): () => void;
  addStateChangeHandler(
    handler: (event: ConnectionStateChangeEvent) => void
  ): () => void;

  // Connection state
  getConnectionState(): ConnectionState;
}
