import { z } from 'zod';
import { InvalidKeyConfigurationError } from './errors.js';
import { decodeBase64 } from './encoding.js';
import { KEY_LENGTH } from './ciphers/keys.js';
import type { DeterministicCipherConfig, SymmetricCipherConfig } from './ciphers/types.js';

const DEFAULT_KEY_PAIR_TTL_MINUTES = 30;

const base64Key = (name: string) =>
  z
    .string()
    .min(1, `${name} is required`)
    .refine(
      (value) => decodeBase64(value.trim())?.length === KEY_LENGTH,
      `${name} must be a base64-encoded ${KEY_LENGTH}-byte key`,
    );

const envSchema = z.object({
  ENCRYPTION_MASTER_KEY: base64Key('ENCRYPTION_MASTER_KEY'),
  DETERMINISTIC_ENCRYPTION_MASTER_KEY: base64Key('DETERMINISTIC_ENCRYPTION_MASTER_KEY'),
  DETERMINISTIC_ENCRYPTION_IV_KEY: base64Key('DETERMINISTIC_ENCRYPTION_IV_KEY'),
  KEY_PAIR_TTL_MINUTES: z.coerce
    .number({ invalid_type_error: 'KEY_PAIR_TTL_MINUTES must be a number' })
    .int('KEY_PAIR_TTL_MINUTES must be an integer')
    .positive('KEY_PAIR_TTL_MINUTES must be positive')
    .default(DEFAULT_KEY_PAIR_TTL_MINUTES),
});

/** Encryption settings resolved from the process environment */
export interface EncryptionConfig {
  symmetric: SymmetricCipherConfig;
  deterministic: DeterministicCipherConfig;
  /** Minutes a freshly issued key pair stays usable */
  keyPairTtlMinutes: number;
}

/**
 * Read encryption settings from environment variables.
 *
 * @throws InvalidKeyConfigurationError naming the offending variable
 */
export function loadEncryptionConfig(env: NodeJS.ProcessEnv = process.env): EncryptionConfig {
  const parsed = envSchema.safeParse({
    ENCRYPTION_MASTER_KEY: env['ENCRYPTION_MASTER_KEY'] ?? '',
    DETERMINISTIC_ENCRYPTION_MASTER_KEY: env['DETERMINISTIC_ENCRYPTION_MASTER_KEY'] ?? '',
    DETERMINISTIC_ENCRYPTION_IV_KEY: env['DETERMINISTIC_ENCRYPTION_IV_KEY'] ?? '',
    KEY_PAIR_TTL_MINUTES: env['KEY_PAIR_TTL_MINUTES'] || undefined,
  });

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidKeyConfigurationError(issue?.message ?? 'Invalid encryption configuration');
  }

  const values = parsed.data;
  return {
    symmetric: { masterKey: values.ENCRYPTION_MASTER_KEY },
    deterministic: {
      masterKey: values.DETERMINISTIC_ENCRYPTION_MASTER_KEY,
      ivGenerationKey: values.DETERMINISTIC_ENCRYPTION_IV_KEY,
    },
    keyPairTtlMinutes: values.KEY_PAIR_TTL_MINUTES,
  };
}
