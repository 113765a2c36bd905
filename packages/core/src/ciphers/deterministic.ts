import { createCipheriv, createDecipheriv, createHmac, timingSafeEqual } from 'node:crypto';
import { AuthenticationFailedError, DecryptError, EncryptError } from '../errors.js';
import { decodeBase64, decodeUtf8, encodeUtf8 } from '../encoding.js';
import { failure, tryCatch } from '../result.js';
import type { Result } from '../result.js';
import { loadKey } from './keys.js';
import type { DeterministicCipher, DeterministicCipherConfig } from './types.js';

const ALGORITHM = 'aes-256-cbc';
const BLOCK_SIZE = 16;
const HMAC_SIZE = 32;
const HEADER_LENGTH = BLOCK_SIZE + HMAC_SIZE;

/**
 * Create a deterministic AES-256-CBC cipher authenticated with HMAC-SHA256.
 *
 * The IV is the first 16 bytes of HMAC-SHA256(ivGenerationKey, plaintext),
 * so equal plaintexts always produce equal envelopes. Use it only for
 * values that must be matched by equality; it leaks which rows share a value.
 *
 * @throws InvalidKeyConfigurationError when either key is empty, not base64, or not 32 bytes
 */
export function createDeterministicCipher(config: DeterministicCipherConfig): DeterministicCipher {
  const encryptionKey = loadKey('Encryption key', config.masterKey);
  const ivGenerationKey = loadKey('IV generation key', config.ivGenerationKey);
  let disposed = false;

  function computeHmac(iv: Buffer, ciphertext: Buffer): Buffer {
    return createHmac('sha256', encryptionKey).update(iv).update(ciphertext).digest();
  }

  function deriveIv(plain: Buffer): Buffer {
    return createHmac('sha256', ivGenerationKey).update(plain).digest().subarray(0, BLOCK_SIZE);
  }

  function encrypt(plaintext: string | null | undefined): Result<string, EncryptError> {
    if (disposed) return failure(new EncryptError('Cipher has been disposed'));
    if (plaintext === null || plaintext === undefined || plaintext === '') {
      return failure(new EncryptError('The plaintext cannot be null or empty'));
    }

    const plain = encodeUtf8(plaintext);
    if (!plain) {
      return failure(new EncryptError('Failed to convert plaintext to bytes: string is not well-formed Unicode'));
    }

    return tryCatch(
      () => {
        const iv = deriveIv(plain);
        const cipher = createCipheriv(ALGORITHM, encryptionKey, iv);
        const ciphertext = Buffer.concat([cipher.update(plain), cipher.final()]);
        return Buffer.concat([iv, computeHmac(iv, ciphertext), ciphertext]).toString('base64');
      },
      (cause) => new EncryptError('Failed to perform AES encryption', { cause }),
    );
  }

  function decrypt(
    ciphertext: string | null | undefined,
  ): Result<string, DecryptError | AuthenticationFailedError> {
    if (disposed) return failure(new DecryptError('Cipher has been disposed'));
    if (ciphertext === null || ciphertext === undefined || ciphertext === '') {
      return failure(new DecryptError('The ciphertext cannot be null or empty'));
    }

    const envelope = decodeBase64(ciphertext);
    if (!envelope) {
      return failure(new DecryptError('Failed to decode base64 ciphertext'));
    }

    if (envelope.length <= HEADER_LENGTH) {
      return failure(
        new DecryptError(`Encrypted data too short. Expected more than ${HEADER_LENGTH} bytes, got ${envelope.length}`),
      );
    }

    const iv = envelope.subarray(0, BLOCK_SIZE);
    const authTag = envelope.subarray(BLOCK_SIZE, HEADER_LENGTH);
    const body = envelope.subarray(HEADER_LENGTH);

    if (!timingSafeEqual(authTag, computeHmac(iv, body))) {
      return failure(
        new AuthenticationFailedError('Authentication tag validation failed. Data may be corrupted or tampered with'),
      );
    }

    const plain = tryCatch(
      () => {
        const decipher = createDecipheriv(ALGORITHM, encryptionKey, iv);
        return Buffer.concat([decipher.update(body), decipher.final()]);
      },
      (cause) => new DecryptError('Decryption failed. Data might be corrupted or tampered with', { cause }),
    );
    if (!plain.ok) return plain;

    return tryCatch(
      () => decodeUtf8(plain.value),
      (cause) => new DecryptError('Failed to convert decrypted bytes to string', { cause }),
    );
  }

  return {
    encrypt,
    decrypt,

    dispose() {
      if (disposed) return;
      encryptionKey.fill(0);
      ivGenerationKey.fill(0);
      disposed = true;
    },
  };
}
