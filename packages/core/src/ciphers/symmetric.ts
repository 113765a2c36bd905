import { randomBytes } from 'node:crypto';
import { chacha20poly1305 } from '@noble/ciphers/chacha';
import { DecryptError, EncryptError } from '../errors.js';
import { decodeBase64, decodeUtf8, encodeUtf8 } from '../encoding.js';
import { failure, success, tryCatch } from '../result.js';
import type { Result } from '../result.js';
import { loadKey } from './keys.js';
import type { SymmetricCipher, SymmetricCipherConfig } from './types.js';

const NONCE_LENGTH = 12; // 96 bits
const AUTH_TAG_LENGTH = 16; // 128 bits
const MIN_ENVELOPE_LENGTH = NONCE_LENGTH + AUTH_TAG_LENGTH;

function toPlainBytes(plaintext: string | Buffer): Result<Buffer, EncryptError> {
  if (Buffer.isBuffer(plaintext)) return success(plaintext);

  const bytes = encodeUtf8(plaintext);
  return bytes
    ? success(bytes)
    : failure(new EncryptError('Failed to convert plaintext to bytes: string is not well-formed Unicode'));
}

function toEnvelopeBytes(ciphertext: string | Buffer): Result<Buffer, DecryptError> {
  if (Buffer.isBuffer(ciphertext)) return success(ciphertext);

  const bytes = decodeBase64(ciphertext);
  return bytes ? success(bytes) : failure(new DecryptError('Failed to decode base64 ciphertext'));
}

/**
 * Create a ChaCha20-Poly1305 cipher bound to one long-lived master key.
 *
 * Every call draws a fresh random nonce, so encrypting the same plaintext
 * twice yields different envelopes. The instance keeps no per-call state
 * and can be shared between concurrent requests.
 *
 * @throws InvalidKeyConfigurationError when the key is not base64 for 32 bytes
 */
export function createSymmetricCipher(config: SymmetricCipherConfig): SymmetricCipher {
  const masterKey = loadKey('Symmetric master key', config.masterKey);

  function seal(plain: Buffer): Result<Buffer, EncryptError> {
    return tryCatch(
      () => {
        const nonce = randomBytes(NONCE_LENGTH);
        // noble appends the tag; the envelope carries it before the ciphertext
        const sealed = chacha20poly1305(masterKey, nonce).encrypt(plain);
        const tagOffset = sealed.length - AUTH_TAG_LENGTH;
        return Buffer.concat([nonce, sealed.subarray(tagOffset), sealed.subarray(0, tagOffset)]);
      },
      (cause) => new EncryptError('Failed to encrypt data', { cause }),
    );
  }

  function open(envelope: Buffer): Result<Buffer, DecryptError> {
    if (envelope.length < MIN_ENVELOPE_LENGTH) {
      return failure(
        new DecryptError(
          `Ciphertext too short. Expected at least ${MIN_ENVELOPE_LENGTH} bytes, got ${envelope.length}`,
        ),
      );
    }

    const nonce = envelope.subarray(0, NONCE_LENGTH);
    const authTag = envelope.subarray(NONCE_LENGTH, MIN_ENVELOPE_LENGTH);
    const ciphertext = envelope.subarray(MIN_ENVELOPE_LENGTH);

    return tryCatch(
      () => Buffer.from(chacha20poly1305(masterKey, nonce).decrypt(Buffer.concat([ciphertext, authTag]))),
      (cause) => new DecryptError('Decryption failed. Data might be corrupted or tampered with', { cause }),
    );
  }

  function toText(plain: Buffer): Result<string, DecryptError> {
    return tryCatch(
      () => decodeUtf8(plain),
      (cause) => new DecryptError('Failed to convert decrypted bytes to string', { cause }),
    );
  }

  function encryptToBytes(plaintext: string | Buffer): Result<Buffer, EncryptError> {
    const plain = toPlainBytes(plaintext);
    return plain.ok ? seal(plain.value) : plain;
  }

  function decryptToBytes(ciphertext: string | Buffer): Result<Buffer, DecryptError> {
    const envelope = toEnvelopeBytes(ciphertext);
    return envelope.ok ? open(envelope.value) : envelope;
  }

  return {
    encrypt(plaintext) {
      const sealed = encryptToBytes(plaintext);
      return sealed.ok ? success(sealed.value.toString('base64')) : sealed;
    },

    encryptToBytes,

    decrypt(ciphertext) {
      const plain = decryptToBytes(ciphertext);
      return plain.ok ? toText(plain.value) : plain;
    },

    decryptToBytes,
  };
}
