import type { Transport } from "./transport";
import type { Connection } from "./connection";
import type { Logger } from "../logger";
import { AsyncQueue } from "./queue";
import { BrokenConnectionError, ReadTimeoutError, toError } from "../errors";

export interface AsyncTransportOptions {
  /** Maximum bytes pulled from the socket per inbound read */
  chunkSize: number;
  /** Read timeout in milliseconds (0 to wait forever); a timeout just restarts the read */
  readTimeout: number;
  /** Upper bound on how long close() waits for the workers (0 to not wait) */
  closeTimeout: number;
  logger: Logger;
  /** Called with worker failures; sends never report them directly */
  onError: (err: Error) => void;
}

/**
 * Queue-mediated transport.
 *
 * `send` only enqueues and `receive` only dequeues. Two workers move bytes
 * between the queues and the socket until the exit signal aborts:
 * the outbound worker drains the outbound queue to the socket, the inbound
 * worker pushes every chunk read from the socket onto the inbound queue.
 */
export class AsyncTransport implements Transport {
  readonly mode = "async";
  private readonly connection: Connection;
  private readonly options: AsyncTransportOptions;
  private readonly outbound = new AsyncQueue<Uint8Array>();
  private readonly inbound = new AsyncQueue<Uint8Array>();
  private readonly exit = new AbortController();
  private workers: Promise<void>[] | null = null;
  private running = 0;

  constructor(connection: Connection, options: AsyncTransportOptions) {
    this.connection = connection;
    this.options = options;
  }

  /**
   * Start both workers. Payloads enqueued before this call are sent first.
   */
  open(): void {
    if (this.workers || this.exit.signal.aborted) {
      return;
    }
    const signal = this.exit.signal;
    this.workers = [
      this.track(this.runOutbound(signal)),
      this.track(this.runInbound(signal)),
    ];
  }

  private async track(worker: Promise<void>): Promise<void> {
    this.running += 1;
    try {
      await worker;
    } finally {
      this.running -= 1;
    }
  }

  async send(payload: Uint8Array): Promise<void> {
    if (payload.length === 0) {
      return;
    }
    // Copy so the caller may reuse its buffer once send resolves
    if (!this.outbound.push(Uint8Array.from(payload))) {
      this.options.logger.debug(`Dropping ${payload.length}-byte payload: client is closed`);
    }
  }

  async receive(): Promise<Uint8Array | null> {
    return this.inbound.tryShift() ?? null;
  }

  /**
   * Number of payloads waiting to be written.
   */
  pendingOutbound(): number {
    return this.outbound.size;
  }

  /**
   * Number of received chunks waiting to be taken by receive().
   */
  pendingInbound(): number {
    return this.inbound.size;
  }

  /**
   * Number of workers still running.
   */
  runningWorkers(): number {
    return this.running;
  }

  async close(): Promise<void> {
    this.exit.abort();
    this.outbound.close();
    this.outbound.clear();
    this.connection.close();

    const workers = this.workers;
    if (!workers || this.options.closeTimeout === 0) {
      return;
    }

    let release: () => void = () => {};
    const timeout = new Promise<void>((resolve) => {
      release = resolve;
    });
    const timer = setTimeout(() => {
      this.options.logger.warn(`Transport workers still running after ${this.options.closeTimeout}ms`);
      release();
    }, this.options.closeTimeout);

    try {
      await Promise.race([Promise.all(workers), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async runOutbound(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const payload = await this.outbound.shift(signal);
      if (payload === null || signal.aborted) {
        return;
      }

      let written: number;
      try {
        written = await this.connection.write(payload);
      } catch (err) {
        this.fail(signal, new BrokenConnectionError("Socket write failed", { cause: err }));
        return;
      }

      if (written === 0) {
        this.fail(signal, new BrokenConnectionError());
        return;
      }
    }
  }

  private async runInbound(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let chunk: Uint8Array | null;
      try {
        chunk = await this.connection.read(this.options.chunkSize, {
          timeoutMs: this.options.readTimeout,
          signal,
        });
      } catch (err) {
        if (err instanceof ReadTimeoutError) {
          continue;
        }
        this.fail(signal, toError(err));
        return;
      }

      if (chunk === null) {
        if (!signal.aborted) {
          this.options.logger.debug("Peer closed the connection, inbound worker stopped");
        }
        return;
      }
      this.inbound.push(chunk);
    }
  }

  private fail(signal: AbortSignal, err: Error): void {
    if (signal.aborted) {
      return;
    }
    this.options.logger.warn(`Transport worker stopped: ${err.message}`);
    this.options.onError(err);
  }
}
