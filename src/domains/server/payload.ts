import { z } from "zod";

export const sendDataSchema = z.object({
  data: z.string({ required_error: "data is required" }),
  encoding: z.enum(["hex", "base64", "utf8"]).default("hex"),
});

export type PayloadEncoding = z.infer<typeof sendDataSchema>["encoding"];

export type DecodeResult =
  | { success: true; bytes: Uint8Array }
  | { success: false; error: string };

const HEX = /^(?:[0-9a-fA-F]{2})*$/;
const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Decode an HTTP send-data payload. Whitespace between hex or base64 digits is
 * ignored ("48 65 6c" is accepted).
 */
export function decodePayload(data: string, encoding: PayloadEncoding): DecodeResult {
  let bytes: Buffer;
  switch (encoding) {
    case "hex": {
      const compact = data.replace(/\s+/g, "");
      if (!HEX.test(compact)) {
        return { success: false, error: "Invalid hex string: expected an even number of hex digits" };
      }
      bytes = Buffer.from(compact, "hex");
      break;
    }
    case "base64": {
      const compact = data.replace(/\s+/g, "");
      if (compact.length % 4 !== 0 || !BASE64.test(compact)) {
        return { success: false, error: "Invalid base64 string" };
      }
      bytes = Buffer.from(compact, "base64");
      break;
    }
    default:
      bytes = Buffer.from(data, "utf8");
      break;
  }

  if (bytes.length === 0) {
    return { success: false, error: "Payload is empty" };
  }
  return { success: true, bytes };
}
