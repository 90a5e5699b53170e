// Main exports
export { BridgeClient } from "./client";
export type { ClientOptions, ClientOption } from "./client";
export type {
  IClient,
  ConnectionState,
  ConnectionStateChangeEvent,
} from "./client/types";

// Transport exports
export type { Transport, Endpoint, Mode, ConnectResult } from "./transport/transport";
export { createEndpoint } from "./transport/transport";
export { Connection } from "./transport/connection";
export type { ConnectionStatus, ConnectionOptions, ReadOptions } from "./transport/connection";
export { SyncTransport } from "./transport/sync";
export { AsyncTransport } from "./transport/async";
export { AsyncQueue } from "./transport/queue";

// Codec exports
export type { Codec, Encoding } from "./transport/codec";
export { Utf8Codec, utf8Codec, lossyUtf8Codec, codecFor } from "./transport/codec";

// Errors
export {
  BridgeError,
  ConnectionError,
  BrokenConnectionError,
  NotConnectedError,
  ReadTimeoutError,
} from "./errors";

// Logging
export type { Logger } from "./logger";
export { silentLogger } from "./logger";

// Option builders
export {
  withMode,
  withSync,
  withEncoding,
  withConnectTimeout,
  withReadTimeout,
  withCloseTimeout,
  withAsyncChunkSize,
  withSyncChunkSize,
  withNoDelay,
  withLogger,
  buildClientOptions,
} from "./client/options";
