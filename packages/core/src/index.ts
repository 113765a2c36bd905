// Result
export { success, failure, tryCatch, tryCatchAsync } from './result.js';
export type { Result } from './result.js';

// Errors
export {
  EncryptionError,
  KeyGenerationError,
  KeyNotFoundError,
  KeyAlreadyUsedError,
  DecryptionError,
  EncryptError,
  DecryptError,
  AuthenticationFailedError,
  InvalidKeyConfigurationError,
} from './errors.js';
export type { EncryptionErrorKind } from './errors.js';

// Encoding helpers
export { decodeBase64, encodeUtf8, decodeUtf8 } from './encoding.js';

// Ciphers
export { createSymmetricCipher } from './ciphers/symmetric.js';
export { createDeterministicCipher } from './ciphers/deterministic.js';
export { createPasswordProtector } from './passwords.js';
export type {
  SymmetricCipher,
  SymmetricCipherConfig,
  DeterministicCipher,
  DeterministicCipherConfig,
  PasswordProtector,
} from './ciphers/types.js';

// Configuration
export { loadEncryptionConfig } from './config.js';
export type { EncryptionConfig } from './config.js';
