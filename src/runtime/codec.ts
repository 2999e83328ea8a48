import zlib from "zlib";
import { CodecError } from "@core/errors";

/**
 * Inverse of the bundler's gzip step. Corrupt framing, a bad CRC or a
 * truncated stream all surface as CodecError; nothing is returned partially.
 */
export function decompress(data: Buffer, name: string): Buffer {
  try {
    return zlib.gunzipSync(data);
  } catch (err) {
    throw new CodecError(name, err);
  }
}

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

export function decodeBase64(text: string, name: string): Buffer {
  if (text.length % 4 !== 0 || !BASE64_PATTERN.test(text)) {
    throw new CodecError(name, new Error("malformed base64 payload"));
  }
  return Buffer.from(text, "base64");
}
