import { createServer, type Server, type Socket } from "net";
import type { Logger } from "../../src/logger";

/**
 * In-process TCP server on an ephemeral loopback port.
 */
export interface TestServer {
  readonly host: string;
  readonly port: number;
  /** All bytes received from clients, in arrival order */
  received(): Buffer;
  /** Sockets accepted so far */
  readonly sockets: Socket[];
  close(): Promise<void>;
}

export async function startServer(
  onConnection: (socket: Socket, record: (chunk: Buffer) => void) => void = () => {}
): Promise<TestServer> {
  const chunks: Buffer[] = [];
  const sockets: Socket[] = [];
  const record = (chunk: Buffer) => {
    chunks.push(chunk);
  };

  const server: Server = createServer((socket) => {
    sockets.push(socket);
    socket.on("error", () => {
      // Client resets are expected when tests close early
    });
    onConnection(socket, record);
  });

  await new Promise<void>((resolve) => {
    server.listen(0, "127.0.0.1", () => resolve());
  });

  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("Test server has no TCP address");
  }

  return {
    host: "127.0.0.1",
    port: address.port,
    received: () => Buffer.concat(chunks),
    sockets,
    close: () =>
      new Promise<void>((resolve) => {
        for (const socket of sockets) {
          socket.destroy();
        }
        server.close(() => resolve());
      }),
  };
}

/**
 * Writes every received chunk straight back.
 */
export function startEchoServer(): Promise<TestServer> {
  return startServer((socket, record) => {
    socket.on("data", (chunk: Buffer) => {
      record(chunk);
      socket.write(chunk);
    });
  });
}

/**
 * Records what it receives and never replies.
 */
export function startSilentServer(): Promise<TestServer> {
  return startServer((socket, record) => {
    socket.on("data", record);
  });
}

/**
 * Closes every connection as soon as it is accepted.
 */
export function startClosingServer(): Promise<TestServer> {
  return startServer((socket) => {
    socket.end();
  });
}

/**
 * Sends a fixed payload on every new connection.
 */
export function startGreetingServer(payload: Uint8Array): Promise<TestServer> {
  return startServer((socket, record) => {
    socket.on("data", record);
    socket.write(payload);
  });
}

/**
 * A loopback port with nothing listening on it.
 */
export async function findClosedPort(): Promise<number> {
  const server = await startServer();
  const { port } = server;
  await server.close();
  return port;
}

/**
 * Poll until the condition holds or the timeout elapses.
 */
export async function waitFor(
  condition: () => boolean | Promise<boolean>,
  timeoutMs = 2000,
  intervalMs = 10
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!(await condition())) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, intervalMs));
  }
}

/**
 * Logger whose methods are jest mocks.
 */
export function createMockLogger(): jest.Mocked<Logger> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}
