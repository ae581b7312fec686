import { Hono } from "hono";
import type { BridgeCoordinator } from "../bridge/coordinator";
import type { BridgeConfig } from "../config/config";
import { PARITY_CODES } from "../serial/types";
import { decodePayload, sendDataSchema } from "./payload";

export const SERVICE_NAME = "UART WebSocket Bridge API";
export const SERVICE_VERSION = "1.0.0";

export interface ApiDeps {
  bridge: BridgeCoordinator;
  config: BridgeConfig;
}

const seconds = (ms: number) => ms / 1000;

/**
 * Administrative HTTP surface. Reads status from the bridge and forwards the two
 * mutating calls (reconnect, send) to it; never touches the relay path itself.
 */
export function createApiRoutes({ bridge, config }: ApiDeps) {
  const app = new Hono();

  app.get("/", (c) =>
    c.json({
      name: SERVICE_NAME,
      version: SERVICE_VERSION,
      description: "Bidirectional relay between WebSocket clients and a UART device",
      endpoints: {
        websocket: "/ws",
        status: "/api/status",
        uart_info: "/api/uart/info",
        uart_reconnect: "/api/uart/reconnect",
        uart_send: "/api/uart/send",
        config: "/api/config",
        health: "/health",
      },
    })
  );

  app.get("/health", (c) => {
    const { uart, clients } = bridge.status();
    return c.json({
      status: uart.connected ? "healthy" : "degraded",
      uart_connected: uart.connected,
      websocket_connections: clients,
    });
  });

  app.get("/api/status", (c) => {
    const { uart, link, clients } = bridge.status();
    return c.json({
      uart,
      link: {
        status: link.status,
        last_error: link.lastError,
      },
      websocket: {
        active_connections: clients,
        ping_interval: seconds(config.websocket.pingIntervalMs),
        max_message_size: config.websocket.maxMessageSize,
      },
      server: {
        host: config.http.host,
        port: config.http.port,
        log_level: config.logging.level,
      },
      timestamp: new Date().toISOString(),
    });
  });

  app.get("/api/uart/info", (c) => {
    const { uart, link } = bridge.status();
    return c.json({
      ...uart,
      timeout: seconds(link.readTimeoutMs),
      write_timeout: seconds(link.writeTimeoutMs),
      status: link.status,
      last_error: link.lastError,
    });
  });

  app.post("/api/uart/reconnect", async (c) => {
    const result = await bridge.reconnect();
    const { uart } = bridge.status();
    if (result.success) {
      return c.json({ status: "success", message: "UART reconnected successfully", uart_status: uart });
    }
    return c.json({
      status: "error",
      message: `Failed to reconnect UART: ${result.error.message}`,
      uart_status: uart,
    });
  });

  app.post("/api/uart/send", async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: "Request body must be valid JSON" }, 400);
    }

    const parsed = sendDataSchema.safeParse(body);
    if (!parsed.success) {
      return c.json({ error: "Invalid request", details: parsed.error.issues.map((i) => i.message) }, 400);
    }

    const decoded = decodePayload(parsed.data.data, parsed.data.encoding);
    if (!decoded.success) {
      return c.json({ error: decoded.error }, 400);
    }

    const result = await bridge.send(decoded.bytes);
    if (!result.success) {
      return c.json({ status: "error", bytes_sent: 0, message: result.error.message, code: result.error.code });
    }
    return c.json({
      status: "success",
      bytes_sent: decoded.bytes.length,
      message: `Sent ${decoded.bytes.length} bytes to UART`,
    });
  });

  app.get("/api/config", (c) =>
    c.json({
      http: {
        host: config.http.host,
        port: config.http.port,
        cors_origins: config.http.corsOrigins,
      },
      uart: {
        port: config.serial.path,
        baudrate: config.serial.baudRate,
        bytesize: config.serial.byteSize,
        stopbits: config.serial.stopBits,
        parity: PARITY_CODES[config.serial.parity],
        timeout: seconds(config.serial.readTimeoutMs),
        write_timeout: seconds(config.serial.writeTimeoutMs),
      },
      websocket: {
        ping_interval: seconds(config.websocket.pingIntervalMs),
        ping_timeout: seconds(config.websocket.pingTimeoutMs),
        max_size: config.websocket.maxMessageSize,
        queue_size: config.websocket.queueSize,
      },
      logging: {
        level: config.logging.level,
      },
    })
  );

  return app;
}
