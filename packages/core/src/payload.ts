import { BridgeError } from "./errors.js";

export const LARGE_PAYLOAD_THRESHOLD = 10_000;

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export interface EncodedPayload {
  payload: string;
  isEncoded: boolean;
}

/** Wire form of a text body. `content` and `encodedContent` are mutually exclusive. */
export interface PayloadTransportRecord {
  content?: string;
  encodedContent?: string;
  contentEncoded: boolean;
}

export function encodeIfLarge(text: string, threshold = LARGE_PAYLOAD_THRESHOLD): EncodedPayload {
  if (text.length > threshold) {
    return {
      payload: Buffer.from(text, "utf8").toString("base64"),
      isEncoded: true,
    };
  }
  return {
    payload: text,
    isEncoded: false,
  };
}

export function decodePayload(payload: string, isEncoded: boolean): string {
  if (!isEncoded) {
    return payload;
  }
  const compact = payload.replace(/\s+/g, "");
  if (!BASE64_PATTERN.test(compact)) {
    throw new BridgeError("DecodeFailed", "Failed to decode content: payload is not valid base64.");
  }
  return Buffer.from(compact, "base64").toString("utf8");
}

export function toTransportRecord(text: string, threshold = LARGE_PAYLOAD_THRESHOLD): PayloadTransportRecord {
  const encoded = encodeIfLarge(text, threshold);
  if (encoded.isEncoded) {
    return {
      encodedContent: encoded.payload,
      contentEncoded: true,
    };
  }
  return {
    content: encoded.payload,
    contentEncoded: false,
  };
}
