const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

// Matches unpaired UTF-16 surrogates only; valid pairs form one code point.
const LONE_SURROGATE_PATTERN = /\p{Cs}/u;

const strictUtf8Decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Decode canonical base64. Returns null for anything Buffer.from would
 * silently truncate or skip (bad characters, wrong padding).
 */
export function decodeBase64(value: string): Buffer | null {
  if (!BASE64_PATTERN.test(value)) return null;
  return Buffer.from(value, 'base64');
}

/** UTF-8 encode, or null when the string holds unpaired surrogates */
export function encodeUtf8(value: string): Buffer | null {
  if (LONE_SURROGATE_PATTERN.test(value)) return null;
  return Buffer.from(value, 'utf-8');
}

/** Strict UTF-8 decode; throws TypeError on malformed input */
export function decodeUtf8(bytes: Uint8Array): string {
  return strictUtf8Decoder.decode(bytes);
}
