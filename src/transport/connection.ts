import { createConnection, type Socket } from "net";
import type { ConnectResult, Endpoint } from "./transport";
import { ConnectionError, NotConnectedError, ReadTimeoutError } from "../errors";

/**
 * Lifecycle of a connection. `closed` is terminal.
 */
export type ConnectionStatus = "unconnected" | "connecting" | "connected" | "closed";

export interface ConnectionOptions {
  /** Connect timeout in milliseconds (0 to disable) */
  connectTimeout: number;
  /** Disable Nagle's algorithm on the socket */
  noDelay: boolean;
}

export interface ReadOptions {
  /** Reject with ReadTimeoutError after this many milliseconds without data (0 to wait forever) */
  timeoutMs?: number;
  /** Resolve null as soon as the signal aborts */
  signal?: AbortSignal;
}

/**
 * Owns the TCP socket for one client.
 *
 * The socket is kept in paused mode: bytes stay in the socket's buffer
 * until `read()` pulls them, so a read of N bytes takes at most N bytes
 * and leaves the rest for the next read.
 */
export class Connection {
  readonly endpoint: Endpoint;
  private readonly options: ConnectionOptions;
  private socket: Socket | null = null;
  private status: ConnectionStatus = "unconnected";
  private peerEnded = false;
  private readableWaiters: Set<() => void> = new Set();
  private errorListeners: Array<(err: Error) => void> = [];

  constructor(endpoint: Endpoint, options: ConnectionOptions) {
    this.endpoint = endpoint;
    this.options = options;
  }

  /**
   * Open the socket. Never rejects; failures are returned as ConnectionError.
   */
  connect(): Promise<ConnectResult> {
    if (this.status !== "unconnected") {
      return Promise.resolve({
        ok: false,
        error: new ConnectionError(`Cannot connect while ${this.status}`),
      });
    }

    const { host, port } = this.endpoint;
    const address = `${host}:${port}`;
    this.status = "connecting";

    return new Promise((resolve) => {
      const socket = createConnection({ host, port });
      this.socket = socket;
      let timer: ReturnType<typeof setTimeout> | null = null;
      let settled = false;

      const fail = (error: ConnectionError) => {
        if (settled) return;
        settled = true;
        if (timer) {
          clearTimeout(timer);
          timer = null;
        }
        socket.removeListener("connect", onConnect);
        socket.removeListener("close", onClose);
        socket.destroy();
        if (this.status === "connecting") {
          this.status = "unconnected";
          this.socket = null;
        }
        resolve({ ok: false, error });
      };

      const onConnect = () => {
        if (settled) return;
        settled = true;
        if (timer) {
          clearTimeout(timer);
          timer = null;
        }
        socket.removeListener("error", onError);
        socket.removeListener("close", onClose);
        this.attach(socket);
        socket.setNoDelay(this.options.noDelay);
        this.status = "connected";
        resolve({ ok: true });
      };

      const onError = (err: Error) => {
        fail(new ConnectionError(`Failed to connect to ${address}: ${err.message}`, { cause: err }));
      };

      const onClose = () => {
        fail(new ConnectionError(`Connection to ${address} closed before it was established`));
      };

      socket.once("connect", onConnect);
      socket.on("error", onError);
      socket.once("close", onClose);

      if (this.options.connectTimeout > 0) {
        timer = setTimeout(() => {
          timer = null;
          fail(new ConnectionError(`Connect to ${address} timed out after ${this.options.connectTimeout}ms`));
        }, this.options.connectTimeout);
      }
    });
  }

  private attach(socket: Socket): void {
    socket.on("readable", () => {
      // Surface a pending FIN as "end" even when no read is waiting.
      if (socket.readableLength === 0) {
        socket.read(0);
      }
      this.notifyReadable();
    });

    socket.on("end", () => {
      this.peerEnded = true;
      this.notifyReadable();
    });

    socket.on("close", () => {
      if (this.status === "connected") {
        this.peerEnded = true;
      }
      this.notifyReadable();
    });

    socket.on("error", (err: Error) => {
      for (const listener of this.errorListeners) {
        try {
          listener(err);
        } catch {
          // Ignore listener errors
        }
      }
    });
  }

  private notifyReadable(): void {
    for (const waiter of Array.from(this.readableWaiters)) {
      waiter();
    }
  }

  /**
   * Read between 1 and maxBytes bytes in arrival order.
   * Resolves null at end of stream, after close, or when the signal aborts.
   */
  read(maxBytes: number, options: ReadOptions = {}): Promise<Uint8Array | null> {
    if (this.status === "closed") {
      return Promise.resolve(null);
    }
    const socket = this.socket;
    if (this.status !== "connected" || socket === null) {
      return Promise.reject(new NotConnectedError());
    }

    const { timeoutMs = 0, signal } = options;
    const immediate = this.take(socket, maxBytes);
    if (immediate) {
      return Promise.resolve(immediate);
    }
    if (this.isDrained(socket) || signal?.aborted) {
      return Promise.resolve(null);
    }

    return new Promise((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | null = null;

      const cleanup = () => {
        this.readableWaiters.delete(onReadable);
        signal?.removeEventListener("abort", onAbort);
        if (timer) {
          clearTimeout(timer);
          timer = null;
        }
      };

      const onReadable = () => {
        const chunk = this.status === "closed" ? null : this.take(socket, maxBytes);
        if (chunk) {
          cleanup();
          resolve(chunk);
        } else if (this.isDrained(socket)) {
          cleanup();
          resolve(null);
        }
      };

      const onAbort = () => {
        cleanup();
        resolve(null);
      };

      this.readableWaiters.add(onReadable);
      signal?.addEventListener("abort", onAbort, { once: true });

      if (timeoutMs > 0) {
        timer = setTimeout(() => {
          cleanup();
          reject(new ReadTimeoutError(timeoutMs));
        }, timeoutMs);
      }
    });
  }

  private take(socket: Socket, maxBytes: number): Uint8Array | null {
    const data: Buffer | null = socket.read();
    if (data === null) {
      return null;
    }
    if (data.length > maxBytes) {
      socket.unshift(data.subarray(maxBytes));
      return data.subarray(0, maxBytes);
    }
    return data;
  }

  private isDrained(socket: Socket): boolean {
    return this.status === "closed" || this.peerEnded || socket.destroyed;
  }

  /**
   * Write the full payload. Resolves with the number of bytes written,
   * or 0 when the peer has ended the stream.
   */
  async write(payload: Uint8Array): Promise<number> {
    const socket = this.socket;
    if (this.status !== "connected" || socket === null) {
      throw new NotConnectedError();
    }
    if (payload.length === 0 || this.peerEnded || !socket.writable) {
      return 0;
    }

    return new Promise((resolve, reject) => {
      socket.write(payload, (err?: Error | null) => {
        if (err) {
          reject(err);
        } else {
          resolve(payload.length);
        }
      });
    });
  }

  /**
   * Destroy the socket. Pending reads resolve null. Safe to call more than once
   * and before connect.
   */
  close(): void {
    if (this.status === "closed") return;
    this.status = "closed";
    if (this.socket) {
      this.socket.destroy();
    }
    this.notifyReadable();
  }

  isConnected(): boolean {
    return this.status === "connected";
  }

  /**
   * Whether the peer has ended the stream while we were connected.
   */
  isPeerClosed(): boolean {
    return this.peerEnded;
  }

  getStatus(): ConnectionStatus {
    return this.status;
  }

  /**
   * Add a listener for socket errors raised after the connection is established.
   */
  onError(listener: (err: Error) => void): void {
    this.errorListeners.push(listener);
  }
}
