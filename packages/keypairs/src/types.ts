import type {
  Sequelize,
  Model,
  ModelStatic,
  CreationOptional,
  InferAttributes,
  InferCreationAttributes,
} from 'sequelize';
import type { AuditActorType, AuditLogger } from '@fieldseal/audit';
import type {
  EncryptionError,
  KeyAlreadyUsedError,
  KeyGenerationError,
  KeyNotFoundError,
  Result,
  SymmetricCipher,
} from '@fieldseal/core';
import type { KeyPairStoreError } from './errors.js';
import type { EncryptedFieldSchema } from './fields.js';

/** A single-use RSA key pair as held by the store */
export interface KeyPairAttributes {
  id: string;
  /** PKCS#1 DER public key, base64 */
  publicKey: string;
  /** PKCS#1 DER private key, base64, sealed with the symmetric cipher */
  privateKey: string;
  isActive: boolean;
  createdAt: Date;
  expiresAt: Date;
  usedAt: Date | null;
}

/** Key pair model instance */
export interface KeyPairInstance
  extends Model<InferAttributes<KeyPairInstance>, InferCreationAttributes<KeyPairInstance>>,
    KeyPairAttributes {
  isActive: CreationOptional<boolean>;
  createdAt: CreationOptional<Date>;
  usedAt: CreationOptional<Date | null>;
}

/** Key pair model class */
export type KeyPairModel = ModelStatic<KeyPairInstance>;

/** Source of "now"; injected so expiry can be tested */
export type Clock = () => Date;

/**
 * Persistence boundary for key pairs.
 * Every method reports failures as values; none throws.
 */
export interface KeyPairStore {
  /** Insert a new key pair. Duplicate ids and I/O problems are failures. */
  add(keyPair: KeyPairAttributes): Promise<Result<void, KeyPairStoreError>>;
  /** Active and unexpired pair, or null. Missing, expired and used look the same. */
  getById(id: string): Promise<Result<KeyPairAttributes | null, KeyPairStoreError>>;
  /** Mark the pair inactive and used. No matching row is a failure. */
  deactivate(id: string): Promise<Result<void, KeyPairStoreError>>;
  /**
   * Deactivate an unused pair without marking it used.
   * False when the id is unknown or the pair was already consumed.
   */
  revoke(id: string): Promise<Result<boolean, KeyPairStoreError>>;
  /**
   * Consume the pair in one conditional update.
   * True only for the call that moved it from unused to used.
   */
  claim(id: string): Promise<Result<boolean, KeyPairStoreError>>;
  /** Unfiltered lookup, used to tell a spent pair from a missing one */
  findById(id: string): Promise<Result<KeyPairAttributes | null, KeyPairStoreError>>;
}

/** What a client receives: never the private half */
export interface PublicKeyResponse {
  keyPairId: string;
  /** PKCS#1 DER public key, base64 */
  publicKey: string;
}

/** Who is calling, for the audit trail */
export interface RequestContext {
  actorId?: string;
  actorType?: AuditActorType;
  ipAddress?: string;
}

/** Dependencies of the field-decryption service */
export interface KeyPairServiceConfig {
  store: KeyPairStore;
  /** Seals private keys before they reach the store */
  privateKeyCipher: SymmetricCipher;
  clock?: Clock;
  /** Validity window of a new pair (default: 30) */
  ttlMinutes?: number;
  /** Optional audit trail; write failures are reported and otherwise ignored */
  audit?: AuditLogger;
}

/** Wiring for {@link createKeyPairServiceFromDatabase} */
export interface KeyPairDatabaseConfig {
  database: Sequelize;
  privateKeyCipher: SymmetricCipher;
  ttlMinutes?: number;
  audit?: AuditLogger;
  clock?: Clock;
}

/** Issues single-use key pairs and decrypts the payloads encrypted with them */
export interface KeyPairService {
  /** Generate, persist and return the public half of a new pair */
  generateNewKeyPair(context?: RequestContext): Promise<Result<PublicKeyResponse, KeyGenerationError>>;
  /**
   * Decrypt the schema's fields of `payload` with the pair's private key
   * and consume the pair. Returns a new object; `payload` is not touched.
   */
  decryptRequest<T extends object>(
    keyPairId: string,
    payload: T,
    schema: EncryptedFieldSchema<T>,
    context?: RequestContext,
  ): Promise<Result<T, EncryptionError>>;
  /** Deactivate a pair before it is used. A consumed pair keeps its `usedAt`. */
  revokeKeyPair(
    keyPairId: string,
    context?: RequestContext,
  ): Promise<Result<void, KeyNotFoundError | KeyAlreadyUsedError>>;
}
