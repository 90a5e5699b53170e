import type { Mode } from "../transport/transport";
import type { Encoding } from "../transport/codec";
import type { Logger } from "../logger";

/**
 * Client options.
 */
export interface ClientOptions {
  /** Transport mode: 'sync' (direct read/write) or 'async' (queue-backed workers) */
  mode: Mode;
  /** Text encoding used for string payloads and received data */
  encoding: Encoding;
  /** Connection timeout in milliseconds (0 to disable) */
  connectTimeout: number;
  /** Read timeout in milliseconds (0 to wait forever) */
  readTimeout: number;
  /** How long close() waits for async workers, in milliseconds (0 to not wait) */
  closeTimeout: number;
  /** Bytes per inbound read in async mode */
  asyncChunkSize: number;
  /** Bytes per receive in sync mode */
  syncChunkSize: number;
  /** Disable Nagle's algorithm */
  noDelay: boolean;
  /** Log sink */
  logger: Logger;
}

/**
 * Default client options.
 */
const defaultOptions: ClientOptions = {
  mode: "async",
  encoding: "utf-8",
  connectTimeout: 30000,
  readTimeout: 0,
  closeTimeout: 1000,
  asyncChunkSize: 1024,
  syncChunkSize: 8192,
  noDelay: true,
  logger: console,
};

/**
 * Client option setter function type.
 */
export type ClientOption = (options: ClientOptions) => void;

function checkNonNegative(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative integer, got ${value}`);
  }
  return value;
}

function checkPositive(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

/**
 * With transport mode option.
 */
export function withMode(mode: Mode): ClientOption {
  return (options: ClientOptions) => {
    options.mode = mode;
  };
}

/**
 * With sync flag; `withSync(true)` is `withMode("sync")`.
 */
export function withSync(sync: boolean): ClientOption {
  return withMode(sync ? "sync" : "async");
}

/**
 * With encoding option.
 */
export function withEncoding(encoding: Encoding): ClientOption {
  return (options: ClientOptions) => {
    options.encoding = encoding;
  };
}

/**
 * With connection timeout option.
 */
export function withConnectTimeout(timeout: number): ClientOption {
  checkNonNegative("connectTimeout", timeout);
  return (options: ClientOptions) => {
    options.connectTimeout = timeout;
  };
}

/**
 * With read timeout option.
 */
export function withReadTimeout(timeout: number): ClientOption {
  checkNonNegative("readTimeout", timeout);
  return (options: ClientOptions) => {
    options.readTimeout = timeout;
  };
}

/**
 * With close timeout option.
 */
export function withCloseTimeout(timeout: number): ClientOption {
  checkNonNegative("closeTimeout", timeout);
  return (options: ClientOptions) => {
    options.closeTimeout = timeout;
  };
}

/**
 * With async inbound chunk size.
 */
export function withAsyncChunkSize(size: number): ClientOption {
  checkPositive("asyncChunkSize", size);
  return (options: ClientOptions) => {
    options.asyncChunkSize = size;
  };
}

/**
 * With sync receive chunk size.
 */
export function withSyncChunkSize(size: number): ClientOption {
  checkPositive("syncChunkSize", size);
  return (options: ClientOptions) => {
    options.syncChunkSize = size;
  };
}

/**
 * With noDelay option.
 */
export function withNoDelay(noDelay: boolean): ClientOption {
  return (options: ClientOptions) => {
    options.noDelay = noDelay;
  };
}

/**
 * With logger option.
 */
export function withLogger(logger: Logger): ClientOption {
  return (options: ClientOptions) => {
    options.logger = logger;
  };
}

/**
 * Build client options from option setters.
 */
export function buildClientOptions(
  setters: ClientOption[] = []
): ClientOptions {
  const options: ClientOptions = { ...defaultOptions };

  // Apply all option setters
  for (const setter of setters) {
    setter(options);
  }

  return options;
}
