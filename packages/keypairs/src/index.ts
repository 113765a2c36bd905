// Types
export type {
  KeyPairAttributes,
  KeyPairInstance,
  KeyPairModel,
  KeyPairStore,
  KeyPairService,
  KeyPairServiceConfig,
  KeyPairDatabaseConfig,
  PublicKeyResponse,
  RequestContext,
  Clock,
} from './types.js';
export { KeyPairStoreError } from './errors.js';

// Encrypted field schemas
export { defineEncryptedFields, decryptFields } from './fields.js';
export type { EncryptedFieldSchema, StringFieldKeys } from './fields.js';

// RSA helpers
export { encryptForKeyPair, generateRsaKeyMaterial, RSA_MODULUS_LENGTH } from './rsa.js';
export type { RsaKeyMaterial } from './rsa.js';

// Persistence
export { defineKeyPairModel } from './models/keyPair.js';
export { keyPairMigrations } from './migrations/index.js';
export { createKeyPairStore } from './store.js';

// Service
export { createKeyPairService, DEFAULT_TTL_MINUTES } from './service.js';
export { createKeyPairServiceFromDatabase } from './factory.js';
