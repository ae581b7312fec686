import http from "http";
import { Hono } from "hono";
import { cors } from "hono/cors";
import type { Context } from "hono";
import { serve, type HttpBindings, type ServerType } from "@hono/node-server";
import { createNodeWebSocket } from "@hono/node-ws";
import { WebSocket } from "ws";
import type { Plugin } from "../../core/plugin";
import type { Application } from "../../core/app";
import type { BridgeCoordinator, InboundMessage } from "../bridge/coordinator";
import type { ClientHandle, ClientTransport } from "../clients/types";
import type { BridgeConfig } from "../config/config";
import { rootLogger } from "../observability/logger";
import type { Logger } from "../observability/types";
import { Heartbeat } from "./heartbeat";
import { createApiRoutes } from "./routes";

/**
 * Adapts a `ws` socket to the registry's transport: `send` settles when the
 * socket has flushed the payload.
 */
export class WsClientTransport implements ClientTransport {
  constructor(private socket: WebSocket) {}

  send(payload: Uint8Array | string): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.socket.readyState !== WebSocket.OPEN) {
        reject(new Error("WebSocket is not open"));
        return;
      }
      this.socket.send(payload, { binary: typeof payload !== "string" }, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  close(code?: number, reason?: string) {
    this.socket.close(code, reason);
  }
}

export function toInboundMessage(data: unknown): InboundMessage | null {
  if (typeof data === "string") return { kind: "text", data };
  if (data instanceof ArrayBuffer) return { kind: "binary", data: new Uint8Array(data) };
  if (ArrayBuffer.isView(data)) {
    return { kind: "binary", data: new Uint8Array(data.buffer, data.byteOffset, data.byteLength) };
  }
  return null;
}

function remoteAddressOf(c: Context<{ Bindings: HttpBindings }>): string | undefined {
  const forwarded = c.req.header("x-forwarded-for")?.split(",")[0]?.trim();
  if (forwarded) return forwarded;
  const socket = c.env?.incoming?.socket;
  return socket?.remoteAddress ? `${socket.remoteAddress}:${socket.remotePort}` : undefined;
}

export class ServerPlugin implements Plugin {
  readonly name = "server";
  private app: Hono<{ Bindings: HttpBindings }>;
  private server?: ServerType;
  private heartbeats = new Set<Heartbeat>();
  private injectWebSocket: ReturnType<typeof createNodeWebSocket>["injectWebSocket"];
  private logger: Logger;

  constructor(private config: BridgeConfig, private bridge: BridgeCoordinator, logger: Logger = rootLogger) {
    this.logger = logger.child({ component: "Server" });
    this.app = new Hono<{ Bindings: HttpBindings }>();

    const { upgradeWebSocket, injectWebSocket } = createNodeWebSocket({ app: this.app });
    this.injectWebSocket = injectWebSocket;

    const origins = config.http.corsOrigins;
    this.app.use("/*", cors({
      origin: origins.includes("*") ? "*" : origins,
      allowMethods: ["GET", "POST", "OPTIONS"],
      allowHeaders: ["Content-Type"],
      maxAge: 600,
    }));

    this.app.onError((err, c) => {
      this.logger.error(`Unhandled error on ${c.req.method} ${c.req.path}`, err);
      return c.json({ error: `Internal error: ${err.message}` }, 500);
    });

    this.app.get(
      "/ws",
      upgradeWebSocket((c) => {
        const remoteAddress = remoteAddressOf(c);
        let handle: ClientHandle | null = null;
        let heartbeat: Heartbeat | null = null;

        const release = () => {
          if (heartbeat) {
            heartbeat.stop();
            this.heartbeats.delete(heartbeat);
            heartbeat = null;
          }
          if (handle) {
            this.bridge.disconnect(handle);
            handle = null;
          }
        };

        return {
          onOpen: (_event, ws) => {
            const socket = ws.raw;
            if (!(socket instanceof WebSocket)) {
              this.logger.error("Unsupported WebSocket implementation; closing connection");
              ws.close(1011, "Unsupported WebSocket implementation");
              return;
            }

            handle = this.bridge.connect(new WsClientTransport(socket), remoteAddress);

            const beat = new Heartbeat(socket, {
              intervalMs: this.config.websocket.pingIntervalMs,
              timeoutMs: this.config.websocket.pingTimeoutMs,
              onTimeout: () => this.logger.warn("Client missed pong, terminating", { remoteAddress }),
            });
            socket.on("pong", () => beat.pong());
            beat.start();
            this.heartbeats.add(beat);
            heartbeat = beat;
          },
          onMessage: (event) => {
            const current = handle;
            if (!current) return;
            const message = toInboundMessage(event.data);
            if (!message) {
              this.logger.debug("Ignoring unsupported WebSocket payload", { remoteAddress });
              return;
            }
            this.bridge.handleMessage(current, message).catch((e: unknown) => {
              this.logger.error("Failed to handle client message", e, { remoteAddress });
            });
          },
          // Also the cleanup path after socket errors: @hono/node-ws cannot build an
          // ErrorEvent on Node 20, so onError is never delivered there
          onClose: () => release(),
        };
      })
    );

    this.app.route("/", createApiRoutes({ bridge, config }));
  }

  setup(_app: Application) {
    this.logger.debug("Setting up Server domain...");
  }

  get fetch() {
    return this.app.fetch;
  }

  // Bound port once listening; differs from the configured one when that is 0
  get port(): number | undefined {
    const address = this.server?.address();
    return address && typeof address === "object" ? address.port : undefined;
  }

  async start() {
    const { host, port } = this.config.http;
    await new Promise<void>((resolve, reject) => {
      const server = serve({ fetch: this.app.fetch, hostname: host, port }, (info) => {
        this.logger.info(`Listening on http://${host}:${info.port} (WebSocket: /ws)`);
        resolve();
      });
      if (server instanceof http.Server) server.once("error", reject);
      this.server = server;
      this.injectWebSocket(server);
    });
  }

  async stop() {
    for (const beat of this.heartbeats) beat.stop();
    this.heartbeats.clear();
    this.bridge.closeClients(1001, "Server shutting down");

    const server = this.server;
    if (!server) return;
    this.server = undefined;

    if (server instanceof http.Server) {
      server.closeAllConnections();
    }
    await new Promise<void>((resolve, reject) => {
      server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
    this.logger.info("Stopped");
  }
}
