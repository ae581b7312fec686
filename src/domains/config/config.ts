import { envSchema, STANDARD_BAUD_RATES, type ParsedEnv } from "./schema";
import type { SerialOptions } from "../serial/types";
import type { LogFormat, LogLevel } from "../observability/types";

export interface BridgeConfig {
  http: {
    host: string;
    port: number;
    corsOrigins: string[];
  };
  serial: SerialOptions;
  websocket: {
    pingIntervalMs: number;
    pingTimeoutMs: number;
    maxMessageSize: number;
    queueSize: number;
  };
  logging: {
    level: LogLevel;
    format?: LogFormat;
  };
}

export interface ConfigIssue {
  path: string;
  message: string;
}

export class ConfigValidationError extends Error {
  constructor(public readonly issues: ConfigIssue[]) {
    super(`Invalid configuration: ${issues.map((i) => `${i.path}: ${i.message}`).join("; ")}`);
    this.name = "ConfigValidationError";
  }
}

export type ConfigResult =
  | { success: true; config: BridgeConfig; warnings: string[] }
  | { success: false; error: ConfigValidationError };

/**
 * Validate loosely-typed environment input into a BridgeConfig. Pure: reads only
 * `env`, never touches the device.
 */
export function loadConfig(env: Record<string, string | undefined>): ConfigResult {
  const parsed = envSchema.safeParse(normalizeKeys(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.join(".") || "(root)",
      message: issue.message,
    }));
    return { success: false, error: new ConfigValidationError(issues) };
  }

  const values = parsed.data;
  const warnings: string[] = [];
  if (!STANDARD_BAUD_RATES.some((rate) => rate === values.UART_BAUDRATE)) {
    warnings.push(
      `Non-standard baud rate ${values.UART_BAUDRATE}; standard values are ${STANDARD_BAUD_RATES.join(", ")}`
    );
  }

  return { success: true, config: toBridgeConfig(values), warnings };
}

function toBridgeConfig(values: ParsedEnv): BridgeConfig {
  return {
    http: {
      host: values.HTTP_HOST,
      port: values.HTTP_PORT,
      corsOrigins: values.CORS_ORIGINS.split(",").map((o) => o.trim()).filter(Boolean),
    },
    serial: {
      path: values.UART_PORT,
      baudRate: values.UART_BAUDRATE,
      byteSize: values.UART_BYTESIZE,
      stopBits: values.UART_STOPBITS,
      parity: values.UART_PARITY,
      readTimeoutMs: Math.max(1, Math.round(values.UART_TIMEOUT * 1000)),
      writeTimeoutMs: Math.max(1, Math.round(values.UART_WRITE_TIMEOUT * 1000)),
    },
    websocket: {
      pingIntervalMs: Math.round(values.WS_PING_INTERVAL * 1000),
      pingTimeoutMs: Math.round(values.WS_PING_TIMEOUT * 1000),
      maxMessageSize: values.WS_MAX_SIZE,
      queueSize: values.WS_QUEUE_SIZE,
    },
    logging: {
      level: values.LOG_LEVEL,
      format: values.LOG_FORMAT,
    },
  };
}

// Exact upper-case keys win over other spellings of the same name
function normalizeKeys(env: Record<string, string | undefined>): Record<string, string> {
  const normalized: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value === undefined) continue;
    const upper = key.toUpperCase();
    if (!(upper in normalized) || key === upper) {
      normalized[upper] = value;
    }
  }
  return normalized;
}
