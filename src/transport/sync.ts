import type { Transport } from "./transport";
import type { Connection } from "./connection";
import { BrokenConnectionError, NotConnectedError, ReadTimeoutError, toError } from "../errors";

export interface SyncTransportOptions {
  /** Maximum bytes returned by one receive */
  chunkSize: number;
  /** Read timeout in milliseconds (0 to wait forever) */
  readTimeout: number;
  /** Called with receive failures that are folded into "no data" */
  onError: (err: Error) => void;
}

/**
 * Direct request-then-reply transport: every send is one write and every
 * receive is one read on the caller's await.
 */
export class SyncTransport implements Transport {
  readonly mode = "sync";
  private readonly connection: Connection;
  private readonly options: SyncTransportOptions;

  constructor(connection: Connection, options: SyncTransportOptions) {
    this.connection = connection;
    this.options = options;
  }

  open(): void {
    // Nothing to start
  }

  async send(payload: Uint8Array): Promise<void> {
    if (payload.length === 0) {
      return;
    }

    let written: number;
    try {
      written = await this.connection.write(payload);
    } catch (err) {
      if (err instanceof NotConnectedError) {
        throw err;
      }
      throw new BrokenConnectionError("Socket write failed", { cause: err });
    }

    if (written === 0) {
      throw new BrokenConnectionError();
    }
  }

  async receive(): Promise<Uint8Array | null> {
    try {
      return await this.connection.read(this.options.chunkSize, {
        timeoutMs: this.options.readTimeout,
      });
    } catch (err) {
      if (!(err instanceof ReadTimeoutError)) {
        this.options.onError(toError(err));
      }
      return null;
    }
  }

  async close(): Promise<void> {
    this.connection.close();
  }
}
