import type { Result } from '../result.js';
import type { AuthenticationFailedError, DecryptError, EncryptError } from '../errors.js';

/** Symmetric cipher configuration */
export interface SymmetricCipherConfig {
  /** Base64-encoded 32-byte master key for ChaCha20-Poly1305 */
  masterKey: string;
}

/** Deterministic cipher configuration */
export interface DeterministicCipherConfig {
  /** Base64-encoded 32-byte key for AES-256-CBC and the envelope HMAC */
  masterKey: string;
  /** Base64-encoded 32-byte key used only to derive IVs */
  ivGenerationKey: string;
}

/**
 * Randomized authenticated cipher.
 * Envelope layout: nonce(12) || tag(16) || ciphertext.
 */
export interface SymmetricCipher {
  /** Encrypt and return the base64 envelope */
  encrypt(plaintext: string | Buffer): Result<string, EncryptError>;
  /** Encrypt and return the raw envelope bytes */
  encryptToBytes(plaintext: string | Buffer): Result<Buffer, EncryptError>;
  /** Decrypt a base64 string or raw envelope into UTF-8 text */
  decrypt(ciphertext: string | Buffer): Result<string, DecryptError>;
  /** Decrypt a base64 string or raw envelope into bytes */
  decryptToBytes(ciphertext: string | Buffer): Result<Buffer, DecryptError>;
}

/**
 * Cipher whose output is a pure function of the plaintext, for columns
 * that are looked up by equality. Envelope layout: iv(16) || hmac(32) || ciphertext.
 */
export interface DeterministicCipher {
  encrypt(plaintext: string | null | undefined): Result<string, EncryptError>;
  decrypt(ciphertext: string | null | undefined): Result<string, DecryptError | AuthenticationFailedError>;
  /** Zero the key material. Safe to call more than once. */
  dispose(): void;
}

/** Reversible password protection on top of the symmetric cipher */
export interface PasswordProtector {
  protect(password: string): Result<string, EncryptError>;
  verify(password: string, protectedValue: string): Result<boolean, DecryptError>;
}
