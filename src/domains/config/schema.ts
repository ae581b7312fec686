import { z } from "zod";
import type { ByteSize, Parity, StopBits } from "../serial/types";
import type { LogLevel } from "../observability/types";

export const STANDARD_BAUD_RATES = [
  300, 600, 1200, 2400, 4800, 9600, 14400, 19200,
  28800, 38400, 57600, 115200, 230400, 460800, 921600,
] as const;

const BYTE_SIZES: Record<string, ByteSize> = { "5": 5, "6": 6, "7": 7, "8": 8 };
const STOP_BITS: Record<string, StopBits> = { "1": 1, "2": 2 };

const PARITIES: Record<string, Parity> = {
  n: "none", none: "none",
  e: "even", even: "even",
  o: "odd", odd: "odd",
  m: "mark", mark: "mark",
  s: "space", space: "space",
};

const LOG_LEVELS: Record<string, LogLevel> = {
  debug: "debug",
  info: "info",
  warn: "warn",
  warning: "warn",
  error: "error",
  critical: "error",
};

function oneOf<T>(table: Record<string, T>, label: string) {
  const keys = Object.keys(table);
  return z
    .string()
    .trim()
    .toLowerCase()
    .refine((value) => keys.includes(value), { message: `${label} must be one of: ${keys.join(", ")}` })
    .transform((value) => table[value]);
}

// Longest delay a Node timer honours (2^31 - 1 ms), in whole seconds
export const MAX_TIMER_SECONDS = 2147483;

// ws keeps its default maxPayload under @hono/node-ws
export const MAX_WS_MESSAGE_SIZE = 104857600;

const duration = () =>
  z.coerce.number().max(MAX_TIMER_SECONDS, `Must be at most ${MAX_TIMER_SECONDS} seconds`);

const seconds = (fallback: number) => duration().positive().default(fallback);

/**
 * Raw environment input. Keys are matched case-insensitively by loadConfig.
 */
export const envSchema = z
  .object({
    HTTP_HOST: z.string().trim().min(1).default("0.0.0.0"),
    HTTP_PORT: z.coerce.number().int().min(1).max(65535).default(8000),

    UART_PORT: z.string().trim().min(1, "UART port must not be empty").default("/dev/ttyUSB0"),
    UART_BAUDRATE: z.coerce.number().int().min(300).max(921600).default(115200),
    UART_BYTESIZE: oneOf(BYTE_SIZES, "Byte size").default("8"),
    UART_STOPBITS: oneOf(STOP_BITS, "Stop bits").default("1"),
    UART_PARITY: oneOf(PARITIES, "Parity").default("N"),
    UART_TIMEOUT: seconds(1),
    UART_WRITE_TIMEOUT: seconds(1),

    WS_PING_INTERVAL: duration().min(1).default(30),
    WS_PING_TIMEOUT: duration().min(1).default(10),
    WS_MAX_SIZE: z.coerce
      .number()
      .int()
      .min(1024)
      .max(MAX_WS_MESSAGE_SIZE, `Must be at most ${MAX_WS_MESSAGE_SIZE} bytes`)
      .default(MAX_WS_MESSAGE_SIZE),
    WS_QUEUE_SIZE: z.coerce.number().int().min(1).default(256),

    CORS_ORIGINS: z.string().default("*"),

    LOG_LEVEL: oneOf(LOG_LEVELS, "Log level").default("info"),
    LOG_FORMAT: z.enum(["pretty", "json"]).optional(),
  })
  .superRefine((env, ctx) => {
    if (env.WS_PING_TIMEOUT >= env.WS_PING_INTERVAL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["WS_PING_TIMEOUT"],
        message: "Ping timeout must be shorter than the ping interval",
      });
    }
  });

export type EnvInput = z.input<typeof envSchema>;
export type ParsedEnv = z.output<typeof envSchema>;
