import type { Codec } from "../transport/codec";
import type { ConnectResult, Endpoint, Mode, Transport } from "../transport/transport";
import type { ClientOptions, ClientOption } from "./options";
import type {
  ConnectionState,
  ConnectionStateChangeEvent,
  IClient,
} from "./types";

import { Connection } from "../transport/connection";
import { SyncTransport } from "../transport/sync";
import { AsyncTransport } from "../transport/async";
import { createEndpoint } from "../transport/transport";
import { codecFor } from "../transport/codec";
import { ConnectionError, toError } from "../errors";
import { buildClientOptions } from "./options";

/**
 * TCP client bridging a request/response caller and a remote process.
 *
 * The transport mode is chosen once at construction: in sync mode every
 * `send` is one socket write and every `receive` one socket read; in async
 * mode both go through FIFO queues drained by background workers. Callers
 * see the same surface either way.
 */
export class BridgeClient implements IClient {
  private readonly endpoint: Endpoint;
  private readonly options: ClientOptions;
  private readonly codec: Codec;
  private readonly connection: Connection;
  private readonly transport: Transport;

  // Connection state
  private connectionState: ConnectionState = "created";

  // Multi-handler support using Sets
  private errorHandlers: Set<(error: Error) => void> = new Set();
  private connectedHandlers: Set<() => void> = new Set();
  private closedHandlers: Set<() => void> = new Set();
  private stateChangeHandlers: Set<(event: ConnectionStateChangeEvent) => void> =
    new Set();

  /**
   * Create a new bridge client. Nothing is connected until `start()`.
   * @param endpoint - Remote host and port
   * @param options - Client option setters
   */
  constructor(endpoint: Endpoint, options: ClientOption[] = []) {
    this.endpoint = createEndpoint(endpoint.host, endpoint.port);
    this.options = buildClientOptions(options);
    this.codec = codecFor(this.options.encoding);

    this.connection = new Connection(this.endpoint, {
      connectTimeout: this.options.connectTimeout,
      noDelay: this.options.noDelay,
    });
    this.connection.onError((err) => this.handleError(err));

    const onError = (err: Error) => this.handleError(err);
    this.transport =
      this.options.mode === "sync"
        ? new SyncTransport(this.connection, {
            chunkSize: this.options.syncChunkSize,
            readTimeout: this.options.readTimeout,
            onError,
          })
        : new AsyncTransport(this.connection, {
            chunkSize: this.options.asyncChunkSize,
            readTimeout: this.options.readTimeout,
            closeTimeout: this.options.closeTimeout,
            logger: this.options.logger,
            onError,
          });
  }

  /**
   * Create a client without connecting.
   */
  static create(endpoint: Endpoint, options: ClientOption[] = []): BridgeClient {
    return new BridgeClient(endpoint, options);
  }

  /**
   * Create a client and connect.
   * @returns Connected client instance
   * @throws ConnectionError when the connect fails
   */
  static async dial(
    endpoint: Endpoint,
    options: ClientOption[] = []
  ): Promise<BridgeClient> {
    const client = new BridgeClient(endpoint, options);
    const result = await client.open();
    if (!result.ok) {
      throw result.error;
    }
    return client;
  }

  /**
   * Connect to the endpoint and, in async mode, start the workers.
   * Failures are logged and passed to error handlers; the client stays
   * un-started and the promise resolves false.
   */
  async start(): Promise<boolean> {
    const result = await this.open();
    if (!result.ok) {
      this.options.logger.error(`Socket error: ${result.error.message}`);
      this.handleError(result.error);
      return false;
    }
    return true;
  }

  private async open(): Promise<ConnectResult> {
    const state = this.connectionState;
    if (state !== "created") {
      return {
        ok: false,
        error: new ConnectionError(`Cannot start a client that is ${state}`),
      };
    }

    this.setConnectionState("connecting");
    const result = await this.connection.connect();

    if (!result.ok) {
      // close() may have run while connecting
      if (this.getConnectionState() === "connecting") {
        this.setConnectionState("created");
      }
      return result;
    }
    if (this.getConnectionState() !== "connecting") {
      return {
        ok: false,
        error: new ConnectionError("Client was closed while connecting"),
      };
    }

    this.transport.open();
    this.setConnectionState("connected");
    this.options.logger.info("Client started");

    for (const handler of this.connectedHandlers) {
      try {
        handler();
      } catch {
        // Ignore handler errors
      }
    }
    return { ok: true };
  }

  /**
   * Send a payload. Strings are encoded with the configured encoding.
   *
   * Async mode enqueues and never fails. Sync mode writes directly and
   * rejects with BrokenConnectionError when the peer has closed, or
   * NotConnectedError before start and after close.
   */
  async send(payload: Uint8Array | string): Promise<void> {
    const bytes = typeof payload === "string" ? this.codec.encode(payload) : payload;
    await this.transport.send(bytes);
  }

  /**
   * Receive decoded text, or null when no data is available.
   * Never rejects; timeouts, decode failures and peer close all yield null.
   */
  async receive(): Promise<string | null> {
    const data = await this.transport.receive();
    if (data === null) {
      return null;
    }

    try {
      return this.codec.decode(data);
    } catch (err) {
      this.handleError(toError(err));
      return null;
    }
  }

  /**
   * Send a payload, then receive once.
   * In async mode the reply may not have arrived yet, in which case this
   * resolves null and the reply is left for a later receive().
   */
  async exchange(payload: Uint8Array | string): Promise<string | null> {
    await this.send(payload);
    return this.receive();
  }

  /**
   * Close the client. Idempotent.
   */
  async close(): Promise<void> {
    if (this.connectionState === "closed") return;
    this.setConnectionState("closed");

    await this.transport.close();
    this.options.logger.info("Client closed");

    for (const handler of this.closedHandlers) {
      try {
        handler();
      } catch {
        // Ignore handler errors
      }
    }
  }

  /**
   * Handle an error.
   */
  private handleError(err: Error): void {
    for (const handler of this.errorHandlers) {
      try {
        handler(err);
      } catch {
        // Ignore handler errors
      }
    }
  }

  /**
   * Set the connection state and notify handlers.
   */
  private setConnectionState(newState: ConnectionState): void {
    const previousState = this.connectionState;
    if (previousState === newState) return;

    this.connectionState = newState;

    // Notify state change handlers
    const event: ConnectionStateChangeEvent = {
      previousState,
      newState,
    };
    for (const handler of this.stateChangeHandlers) {
      try {
        handler(event);
      } catch {
        // Ignore handler errors
      }
    }
  }

  isConnected(): boolean {
    return this.connectionState === "connected" && this.connection.isConnected();
  }

  /**
   * Whether the remote side has closed the stream. The client stays
   * connected until close() is called.
   */
  isPeerClosed(): boolean {
    return this.connection.isPeerClosed();
  }

  getConnectionState(): ConnectionState {
    return this.connectionState;
  }

  getEndpoint(): Endpoint {
    return this.endpoint;
  }

  getMode(): Mode {
    return this.transport.mode;
  }

  /**
   * Add a handler for errors. Returns a function that removes it.
   */
  onError(handler: (error: Error) => void): () => void {
    this.errorHandlers.add(handler);
    return () => {
      this.errorHandlers.delete(handler);
    };
  }

  /**
   * Add a handler called after a successful start.
   */
  onConnected(handler: () => void): () => void {
    this.connectedHandlers.add(handler);
    return () => {
      this.connectedHandlers.delete(handler);
    };
  }

  /**
   * Add a handler called after close.
   */
  onClosed(handler: () => void): () => void {
    this.closedHandlers.add(handler);
    return () => {
      this.closedHandlers.delete(handler);
    };
  }

  /**
   * Add a state change handler.
   * @returns Unsubscribe function
   */
  addStateChangeHandler(
    handler: (event: ConnectionStateChangeEvent) => void
  ): () => void {
    this.stateChangeHandlers.add(handler);
    return () => {
      this.stateChangeHandlers.delete(handler);
    };
  }
}
