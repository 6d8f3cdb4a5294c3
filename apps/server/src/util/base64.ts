import { MalformedInputError } from "../errors.js";

const BASE64_RE = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Strict decode. Node's own decoder skips characters it does not understand,
 * which would silently corrupt audio.
 */
export function base64ToUint8Array(base64: string): Uint8Array {
  const input = base64.trim();
  if (input.length === 0) {
    throw new MalformedInputError("Chunk data is empty.");
  }
  if (input.length % 4 !== 0 || !BASE64_RE.test(input)) {
    throw new MalformedInputError("Chunk data is not valid base64.");
  }
  const bytes = Buffer.from(input, "base64");
  // Non-zero padding bits ("AF==") decode fine but are not canonical.
  if (bytes.toString("base64") !== input) {
    throw new MalformedInputError("Chunk data is not valid base64.");
  }
  return new Uint8Array(bytes);
}

export function uint8ArrayToBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("base64");
}
