import { Connection } from "../src/transport/connection";
import { ConnectionError, NotConnectedError, ReadTimeoutError } from "../src/errors";
import {
  findClosedPort,
  startClosingServer,
  startEchoServer,
  startGreetingServer,
  startSilentServer,
  waitFor,
  type TestServer,
} from "./support/servers";

const text = (data: Uint8Array | null) =>
  data === null ? null : Buffer.from(data).toString("utf8");

describe("Connection", () => {
  let server: TestServer | null = null;
  let connection: Connection | null = null;

  const open = async (target: TestServer): Promise<Connection> => {
    const conn = new Connection(
      { host: target.host, port: target.port },
      { connectTimeout: 2000, noDelay: true }
    );
    connection = conn;
    const result = await conn.connect();
    expect(result).toEqual({ ok: true });
    return conn;
  };

  afterEach(async () => {
    connection?.close();
    connection = null;
    await server?.close();
    server = null;
  });

  describe("connect", () => {
    it("should move to connected on success", async () => {
      server = await startSilentServer();
      const conn = await open(server);

      expect(conn.isConnected()).toEqual(true);
      expect(conn.getStatus()).toEqual("connected");
    });

    it("should report a refused connect without throwing", async () => {
      const port = await findClosedPort();
      const conn = new Connection({ host: "127.0.0.1", port }, { connectTimeout: 2000, noDelay: true });
      connection = conn;

      const result = await conn.connect();

      expect(result.ok).toEqual(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(ConnectionError);
        expect(result.error.code).toEqual("ECONNECT");
        expect(result.error.cause).toHaveProperty("code", "ECONNREFUSED");
        expect(result.error.message).toContain(`127.0.0.1:${port}`);
      }
      expect(conn.isConnected()).toEqual(false);
      expect(conn.getStatus()).toEqual("unconnected");
    });

    it("should refuse a second connect", async () => {
      server = await startSilentServer();
      const conn = await open(server);

      const result = await conn.connect();

      expect(result.ok).toEqual(false);
      if (!result.ok) {
        expect(result.error.message).toEqual("Cannot connect while connected");
      }
    });

    it("should refuse to connect after close", async () => {
      server = await startSilentServer();
      const conn = new Connection({ host: server.host, port: server.port }, { connectTimeout: 0, noDelay: true });
      conn.close();

      const result = await conn.connect();

      expect(result.ok).toEqual(false);
      expect(conn.getStatus()).toEqual("closed");
    });
  });

  describe("before connect", () => {
    it("should reject reads", async () => {
      const conn = new Connection({ host: "127.0.0.1", port: 1 }, { connectTimeout: 0, noDelay: true });

      await expect(conn.read(16)).rejects.toBeInstanceOf(NotConnectedError);
    });

    it("should reject writes", async () => {
      const conn = new Connection({ host: "127.0.0.1", port: 1 }, { connectTimeout: 0, noDelay: true });

      await expect(conn.write(Buffer.from("x"))).rejects.toBeInstanceOf(NotConnectedError);
    });

    it("should allow close", () => {
      const conn = new Connection({ host: "127.0.0.1", port: 1 }, { connectTimeout: 0, noDelay: true });
      conn.close();
      conn.close();

      expect(conn.getStatus()).toEqual("closed");
    });
  });

  describe("read and write", () => {
    it("should write the full payload and read the echo", async () => {
      server = await startEchoServer();
      const conn = await open(server);

      await expect(conn.write(Buffer.from("hello"))).resolves.toEqual(5);
      expect(text(await conn.read(1024))).toEqual("hello");
    });

    it("should return at most maxBytes and keep the rest for the next read", async () => {
      server = await startGreetingServer(Buffer.from("abcdef"));
      const conn = await open(server);

      const first = await conn.read(4);
      expect(first).not.toBeNull();
      expect(first?.length).toBeLessThanOrEqual(4);

      let rest = "";
      while (text(first) + rest !== "abcdef") {
        rest += text(await conn.read(4)) ?? "";
      }
      expect(text(first) + rest).toEqual("abcdef");
    });

    it("should write nothing for an empty payload", async () => {
      server = await startSilentServer();
      const conn = await open(server);

      await expect(conn.write(new Uint8Array(0))).resolves.toEqual(0);
    });

    it("should reject with ReadTimeoutError when no data arrives", async () => {
      server = await startSilentServer();
      const conn = await open(server);

      await expect(conn.read(1024, { timeoutMs: 30 })).rejects.toBeInstanceOf(ReadTimeoutError);
    });

    it("should resolve a pending read with null on close", async () => {
      server = await startSilentServer();
      const conn = await open(server);

      const pending = conn.read(1024);
      conn.close();

      await expect(pending).resolves.toBeNull();
      expect(conn.isConnected()).toEqual(false);
    });

    it("should resolve a pending read with null when the signal aborts", async () => {
      server = await startSilentServer();
      const conn = await open(server);
      const controller = new AbortController();

      const pending = conn.read(1024, { signal: controller.signal });
      controller.abort();

      await expect(pending).resolves.toBeNull();
    });

    it("should resolve reads after close with null", async () => {
      server = await startSilentServer();
      const conn = await open(server);
      conn.close();

      await expect(conn.read(1024)).resolves.toBeNull();
    });

    it("should reject writes after close", async () => {
      server = await startSilentServer();
      const conn = await open(server);
      conn.close();

      await expect(conn.write(Buffer.from("x"))).rejects.toBeInstanceOf(NotConnectedError);
    });
  });

  describe("peer close", () => {
    it("should end pending reads with null", async () => {
      server = await startClosingServer();
      const conn = await open(server);

      await expect(conn.read(1024)).resolves.toBeNull();
      expect(conn.isPeerClosed()).toEqual(true);
    });

    it("should be detected without a pending read", async () => {
      server = await startClosingServer();
      const conn = await open(server);

      await waitFor(() => conn.isPeerClosed());
      expect(conn.isConnected()).toEqual(true);
    });

    it("should report zero bytes written", async () => {
      server = await startClosingServer();
      const conn = await open(server);
      await waitFor(() => conn.isPeerClosed());

      await expect(conn.write(Buffer.from("late"))).resolves.toEqual(0);
    });
  });
});
