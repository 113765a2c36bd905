import type { KeyPairDatabaseConfig, KeyPairService } from './types.js';
import { defineKeyPairModel } from './models/keyPair.js';
import { createKeyPairStore } from './store.js';
import { createKeyPairService } from './service.js';

/**
 * Create a key pair service backed by the `key_pairs` table.
 *
 * @example
 * ```typescript
 * import { createKeyPairServiceFromDatabase } from '@fieldseal/keypairs';
 *
 * const keyPairs = createKeyPairServiceFromDatabase({
 *   database: sequelize,
 *   privateKeyCipher: createSymmetricCipher(config.symmetric),
 *   ttlMinutes: config.keyPairTtlMinutes,
 *   audit: auditLogger,
 * });
 * ```
 */
export function createKeyPairServiceFromDatabase(config: KeyPairDatabaseConfig): KeyPairService {
  const KeyPair = defineKeyPairModel(config.database);
  const store = createKeyPairStore({ KeyPair, clock: config.clock });

  return createKeyPairService({
    store,
    privateKeyCipher: config.privateKeyCipher,
    clock: config.clock,
    ttlMinutes: config.ttlMinutes,
    audit: config.audit,
  });
}
