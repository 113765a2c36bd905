import { constants, createPrivateKey, createPublicKey, generateKeyPair, privateDecrypt, publicEncrypt } from 'node:crypto';
import type { KeyObject } from 'node:crypto';
import { DecryptionError, EncryptError, decodeBase64, decodeUtf8, encodeUtf8, failure, success, tryCatch } from '@fieldseal/core';
import type { Result } from '@fieldseal/core';

export const RSA_MODULUS_LENGTH = 2048;

const OAEP = { padding: constants.RSA_PKCS1_OAEP_PADDING, oaepHash: 'sha256' } as const;

/** Base64 PKCS#1 DER halves of a fresh RSA key pair */
export interface RsaKeyMaterial {
  publicKey: string;
  privateKey: string;
}

/** Generate an RSA key pair and export both halves as base64 PKCS#1 DER. */
export function generateRsaKeyMaterial(modulusLength = RSA_MODULUS_LENGTH): Promise<RsaKeyMaterial> {
  return new Promise((resolve, reject) => {
    generateKeyPair(
      'rsa',
      {
        modulusLength,
        publicKeyEncoding: { type: 'pkcs1', format: 'der' },
        privateKeyEncoding: { type: 'pkcs1', format: 'der' },
      },
      (err, publicKey, privateKey) => {
        if (err) {
          reject(err);
          return;
        }
        resolve({
          publicKey: publicKey.toString('base64'),
          privateKey: privateKey.toString('base64'),
        });
      },
    );
  });
}

/** Parse a PKCS#1 DER private key */
export function importPrivateKey(der: Buffer): Result<KeyObject, DecryptionError> {
  return tryCatch(
    () => createPrivateKey({ key: der, format: 'der', type: 'pkcs1' }),
    (cause) => new DecryptionError('Failed to import private key', undefined, { cause }),
  );
}

/** RSA-OAEP(SHA-256) decrypt a base64 ciphertext into UTF-8 text */
export function decryptWithPrivateKey(key: KeyObject, ciphertextBase64: string): Result<string, DecryptionError> {
  const ciphertext = decodeBase64(ciphertextBase64);
  if (!ciphertext) {
    return failure(new DecryptionError('Ciphertext is not valid base64'));
  }

  const plain = tryCatch(
    () => privateDecrypt({ key, ...OAEP }, ciphertext),
    (cause) => new DecryptionError('RSA decryption failed', undefined, { cause }),
  );
  if (!plain.ok) return plain;

  return tryCatch(
    () => decodeUtf8(plain.value),
    (cause) => new DecryptionError('Decrypted bytes are not valid UTF-8', undefined, { cause }),
  );
}

/**
 * Client side of the exchange: RSA-OAEP(SHA-256) encrypt `plaintext`
 * with a public key returned by the service, as base64.
 */
export function encryptForKeyPair(publicKeyBase64: string, plaintext: string): Result<string, EncryptError> {
  const der = decodeBase64(publicKeyBase64);
  if (!der) {
    return failure(new EncryptError('Public key is not valid base64'));
  }

  const plain = encodeUtf8(plaintext);
  if (!plain) {
    return failure(new EncryptError('Failed to convert plaintext to bytes: string is not well-formed Unicode'));
  }

  const encrypted = tryCatch(
    () => {
      const key = createPublicKey({ key: der, format: 'der', type: 'pkcs1' });
      return publicEncrypt({ key, ...OAEP }, plain);
    },
    (cause) => new EncryptError('RSA encryption failed', { cause }),
  );
  return encrypted.ok ? success(encrypted.value.toString('base64')) : encrypted;
}
