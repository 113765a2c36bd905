import { timingSafeEqual } from 'node:crypto';
import { DecryptError, EncryptError } from './errors.js';
import { failure, success } from './result.js';
import type { PasswordProtector, SymmetricCipher } from './ciphers/types.js';

/**
 * Protect passwords with the symmetric cipher.
 * The stored value is reversible; verification decrypts and compares.
 */
export function createPasswordProtector(cipher: SymmetricCipher): PasswordProtector {
  return {
    protect(password) {
      if (!password) {
        return failure(new EncryptError('Plaintext cannot be null or empty'));
      }
      return cipher.encrypt(password);
    },

    verify(password, protectedValue) {
      if (!protectedValue) {
        return failure(new DecryptError('Ciphertext cannot be null or empty'));
      }

      const decrypted = cipher.decrypt(protectedValue);
      if (!decrypted.ok) return decrypted;

      const expected = Buffer.from(decrypted.value, 'utf-8');
      const actual = Buffer.from(password, 'utf-8');
      return success(expected.length === actual.length && timingSafeEqual(expected, actual));
    },
  };
}
