/**
 * Binary encoding schemes for string-encoded byte sequences
 */

import { TJSONEncodingError } from "../errors/types";

export interface Encoding {
  encode(bytes: Uint8Array): string;
  decode(text: string): Uint8Array;
}

const LINE_BREAKS_REGEX = /[\r\n]/g;
const BASE64_REGEX =
  /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;
const HEX_REGEX = /^[0-9a-fA-F]*$/;

function bufferBytes(buffer: Buffer): Uint8Array {
  return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
}

/**
 * Standard base64 alphabet with padding
 */
export const base64: Encoding = {
  encode(bytes) {
    return Buffer.from(bytes).toString("base64");
  },
  decode(text) {
    const compact = text.replace(LINE_BREAKS_REGEX, "");
    if (!BASE64_REGEX.test(compact)) {
      throw new TJSONEncodingError(`base64: illegal data in '${text}'`);
    }
    return bufferBytes(Buffer.from(compact, "base64"));
  },
};

/**
 * Lowercase hex, two digits per byte
 */
export const hex: Encoding = {
  encode(bytes) {
    return Buffer.from(bytes).toString("hex");
  },
  decode(text) {
    if (text.length % 2 !== 0) {
      throw new TJSONEncodingError(`hex: odd length hex string '${text}'`);
    }
    if (!HEX_REGEX.test(text)) {
      throw new TJSONEncodingError(`hex: invalid byte in '${text}'`);
    }
    return bufferBytes(Buffer.from(text, "hex"));
  },
};
