import { describe, it, expect, vi, afterEach } from "vitest";
import WebSocket from "ws";
import { ServerPlugin, WsClientTransport } from "./server.plugin";
import { BridgePlugin } from "../bridge/bridge.plugin";
import { TEXT_NOT_FORWARDED, WELCOME_MESSAGE } from "../bridge/coordinator";
import { loadConfig, type BridgeConfig } from "../config/config";
import type { MockSerialOptions } from "../serial/drivers/mock-serial";
import { mockDriverFactory, silentLogger } from "../../testing/fakes";

const HELLO = [0x48, 0x65, 0x6c, 0x6c, 0x6f];

function toBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

/**
 * A real `ws` client that records binary frames and decoded control messages.
 */
class TestClient {
  readonly socket: WebSocket;
  readonly binary: number[][] = [];
  readonly controls: unknown[] = [];
  closeCode: number | null = null;

  constructor(url: string, options: WebSocket.ClientOptions = {}) {
    this.socket = new WebSocket(url, options);
    this.socket.on("message", (data, isBinary) => {
      const bytes = toBuffer(data);
      if (isBinary) this.binary.push(Array.from(bytes));
      else this.controls.push(JSON.parse(bytes.toString("utf8")));
    });
    this.socket.on("close", (code) => {
      this.closeCode = code;
    });
  }

  opened(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.socket.readyState === WebSocket.OPEN) return resolve();
      this.socket.once("open", () => resolve());
      this.socket.once("error", reject);
    });
  }

  closed(): Promise<void> {
    return new Promise((resolve) => {
      if (this.socket.readyState === WebSocket.CLOSED) return resolve();
      this.socket.once("close", () => resolve());
    });
  }
}

describe("WebSocket endpoint", () => {
  const running: { server: ServerPlugin; bridge: BridgePlugin }[] = [];
  const clients: TestClient[] = [];

  async function startServer(
    env: Record<string, string> = {},
    driver: MockSerialOptions = { loopback: true },
    websocket: Partial<BridgeConfig["websocket"]> = {}
  ) {
    const result = loadConfig({ UART_PORT: "mock://loopback", ...env });
    if (!result.success) throw result.error;
    const config: BridgeConfig = {
      ...result.config,
      http: { ...result.config.http, host: "127.0.0.1", port: 0 },
      websocket: { ...result.config.websocket, ...websocket },
    };

    const bridge = new BridgePlugin(config, mockDriverFactory(driver).create, silentLogger);
    const server = new ServerPlugin(config, bridge.coordinator, silentLogger);
    running.push({ server, bridge });
    await bridge.start();
    await server.start();

    const connect = async (options?: WebSocket.ClientOptions) => {
      const client = new TestClient(`ws://127.0.0.1:${server.port}/ws`, options);
      clients.push(client);
      await client.opened();
      await vi.waitFor(() => expect(client.controls).toHaveLength(1));
      return client;
    };
    return { bridge, server, connect };
  }

  afterEach(async () => {
    for (const client of clients.splice(0)) client.socket.terminate();
    for (const { server, bridge } of running.splice(0)) {
      await server.stop();
      await bridge.stop();
    }
  });

  it("should greet a client with the link status", async () => {
    const { connect } = await startServer();

    const client = await connect();

    expect(client.controls[0]).toMatchObject({
      type: "info",
      message: WELCOME_MESSAGE,
      uartStatus: { connected: true, port: "mock://loopback", parity: "N" },
    });
  });

  it("should still accept clients when the device is missing", async () => {
    const { connect, bridge } = await startServer(
      { UART_PORT: "/dev/ttyFAKE0" },
      { openError: new Error("No such file or directory") }
    );

    const client = await connect();

    expect(client.controls[0]).toMatchObject({
      type: "info",
      message: WELCOME_MESSAGE,
      uartStatus: { connected: false, port: "/dev/ttyFAKE0" },
    });
    expect(bridge.coordinator.status().clients).toBe(1);
  });

  it("should echo a binary message to every client", async () => {
    const { connect } = await startServer();
    const a = await connect();
    const b = await connect();

    a.socket.send(Buffer.from(HELLO));

    await vi.waitFor(() => {
      expect(a.binary).toEqual([HELLO]);
      expect(b.binary).toEqual([HELLO]);
    });
  });

  it("should answer a text message with a warning", async () => {
    const { connect } = await startServer();
    const client = await connect();

    client.socket.send("hello");

    await vi.waitFor(() => expect(client.controls).toHaveLength(2));
    expect(client.controls[1]).toMatchObject({ type: "warning", message: TEXT_NOT_FORWARDED });
    expect(client.binary).toEqual([]);
  });

  it("should unregister a client that disconnects", async () => {
    const { connect, bridge } = await startServer();
    const client = await connect();
    expect(bridge.coordinator.status().clients).toBe(1);

    client.socket.close(1000);
    await client.closed();

    await vi.waitFor(() => expect(bridge.coordinator.status().clients).toBe(0));
  });

  it("should keep a client that answers pings", async () => {
    const { connect, bridge } = await startServer({}, { loopback: true }, { pingIntervalMs: 30, pingTimeoutMs: 20 });
    const client = await connect();
    let pings = 0;
    client.socket.on("ping", () => pings++);

    await vi.waitFor(() => expect(pings).toBeGreaterThanOrEqual(3));

    expect(client.closeCode).toBeNull();
    expect(bridge.coordinator.status().clients).toBe(1);
  });

  it("should terminate a client that stops answering pings", async () => {
    const { connect, bridge } = await startServer({}, { loopback: true }, { pingIntervalMs: 30, pingTimeoutMs: 20 });
    const client = await connect({ autoPong: false });

    await client.closed();

    expect(client.closeCode).toBe(1006);
    await vi.waitFor(() => expect(bridge.coordinator.status().clients).toBe(0));
  });

  it("should close clients with 1001 when the server stops", async () => {
    const { connect, server } = await startServer();
    const client = await connect();

    await server.stop();
    await client.closed();

    expect(client.closeCode).toBe(1001);
  });
});

describe("WsClientTransport", () => {
  it("should reject a send on a socket that is not open", async () => {
    const socket = new WebSocket("ws://127.0.0.1:1/ws");
    socket.on("error", () => {});

    const transport = new WsClientTransport(socket);

    await expect(transport.send(Uint8Array.from([1]))).rejects.toThrow("WebSocket is not open");
    socket.terminate();
  });
});
