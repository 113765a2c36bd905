import { InvalidKeyConfigurationError } from '../errors.js';
import { decodeBase64 } from '../encoding.js';

export const KEY_LENGTH = 32; // 256 bits

/**
 * Decode and validate a base64 256-bit key.
 * Throws InvalidKeyConfigurationError naming `label` on any problem.
 */
export function loadKey(label: string, keyBase64: string | undefined): Buffer {
  if (!keyBase64) {
    throw new InvalidKeyConfigurationError(`${label} cannot be empty`);
  }

  const key = decodeBase64(keyBase64.trim());
  if (!key) {
    throw new InvalidKeyConfigurationError(`${label} must be a valid base64 string`);
  }

  if (key.length !== KEY_LENGTH) {
    throw new InvalidKeyConfigurationError(
      `${label} must be exactly ${KEY_LENGTH} bytes (256 bits). Got ${key.length} bytes.`,
    );
  }

  // Buffer.from may hand out a slice of the shared pool; keep keys in memory of their own.
  const owned = Buffer.alloc(KEY_LENGTH);
  key.copy(owned);
  key.fill(0);
  return owned;
}
