import { DecryptionError, failure, success } from '@fieldseal/core';
import type { Result } from '@fieldseal/core';

/** Keys of `T` whose values are strings, possibly absent */
export type StringFieldKeys<T> = {
  [K in keyof T]-?: T[K] extends string | null | undefined ? K : never;
}[keyof T] &
  keyof T &
  string;

/** The fields of `T` that travel RSA-encrypted */
export interface EncryptedFieldSchema<T> {
  readonly fields: readonly StringFieldKeys<T>[];
}

/**
 * Declare which fields of a payload type are encrypted.
 * Only string-typed fields are accepted; define once per payload type.
 *
 * @example
 * ```typescript
 * interface PaymentRequest { cardNumber: string; amount: number }
 * const paymentFields = defineEncryptedFields<PaymentRequest>()('cardNumber');
 * ```
 */
export function defineEncryptedFields<T extends object>() {
  return <K extends StringFieldKeys<T>>(...fields: K[]): EncryptedFieldSchema<T> =>
    Object.freeze({ fields: Object.freeze([...new Set(fields)]) });
}

/**
 * Copy `source` and replace every schema field holding a non-empty string
 * with `decrypt(value)`. Null and undefined pass through, "" stays "".
 * Any other value, and the first failing field, aborts the whole copy.
 */
export function decryptFields<T extends object, E extends Error>(
  source: T,
  schema: EncryptedFieldSchema<T>,
  decrypt: (ciphertext: string) => Result<string, E>,
): Result<T, DecryptionError> {
  const target = { ...source };

  for (const field of schema.fields) {
    const value = source[field];
    if (value === null || value === undefined || value === '') continue;
    if (typeof value !== 'string') {
      return failure(new DecryptionError('Encrypted field must be a string', field));
    }

    const plain = decrypt(value);
    if (!plain.ok) {
      return failure(new DecryptionError('Failed to decrypt field', field, { cause: plain.error }));
    }
    Object.assign(target, { [field]: plain.value });
  }

  return success(target);
}
