import type { Payload } from './types';

const utf8 = new TextDecoder('utf-8', { fatal: true });

export function isPayload(value: unknown): value is Payload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Decode a raw transport payload. Anything that is not a UTF-8 JSON object is
// reported as `undefined` ("no data").
export function decodePayload(raw: Buffer | Uint8Array | string): Payload | undefined {
  let text: string;
  try {
    text = typeof raw === 'string' ? raw : utf8.decode(raw);
  } catch {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return isPayload(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

export function encodePayload(payload: Payload): string {
  return JSON.stringify(payload);
}

// Decode a JSON array (e.g. the retained bridge device list)
export function decodeArray(raw: Buffer | Uint8Array | string): unknown[] | undefined {
  let text: string;
  try {
    text = typeof raw === 'string' ? raw : utf8.decode(raw);
  } catch {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return Array.isArray(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}
