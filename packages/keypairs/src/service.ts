import { randomUUID } from 'node:crypto';
import type { KeyObject } from 'node:crypto';
import { AuditEventType } from '@fieldseal/audit';
import type { AuditLogger } from '@fieldseal/audit';
import {
  DecryptionError,
  KeyAlreadyUsedError,
  KeyGenerationError,
  KeyNotFoundError,
  failure,
  success,
  tryCatchAsync,
} from '@fieldseal/core';
import type { EncryptionError, Result, SymmetricCipher } from '@fieldseal/core';
import { decryptFields } from './fields.js';
import { decryptWithPrivateKey, generateRsaKeyMaterial, importPrivateKey } from './rsa.js';
import type { KeyPairService, KeyPairServiceConfig, KeyPairStore, RequestContext } from './types.js';

export const DEFAULT_TTL_MINUTES = 30;

const TARGET_TYPE = 'key_pair';

function unsealPrivateKey(cipher: SymmetricCipher, sealed: string): Result<KeyObject, DecryptionError> {
  const der = cipher.decryptToBytes(sealed);
  if (!der.ok) {
    return failure(new DecryptionError('Failed to unseal private key', undefined, { cause: der.error }));
  }
  const key = importPrivateKey(der.value);
  der.value.fill(0);
  return key;
}

/**
 * Work out why an active lookup came back empty: a pair that exists with
 * `usedAt` set was consumed, anything else (revoked included) is missing or expired.
 */
async function explainMissing(
  store: KeyPairStore,
  keyPairId: string,
): Promise<KeyAlreadyUsedError | KeyNotFoundError> {
  const row = await store.findById(keyPairId);
  if (row.ok && row.value?.usedAt) {
    return new KeyAlreadyUsedError(`Key pair ${keyPairId} has already been used`);
  }
  return new KeyNotFoundError(
    `Key pair ${keyPairId} not found or expired`,
    row.ok ? undefined : { cause: row.error },
  );
}

/**
 * Create the asymmetric field-decryption service.
 */
export function createKeyPairService(config: KeyPairServiceConfig): KeyPairService {
  const { store, privateKeyCipher, audit } = config;
  const clock = config.clock ?? (() => new Date());
  const ttlMs = (config.ttlMinutes ?? DEFAULT_TTL_MINUTES) * 60 * 1000;

  async function record(
    eventType: AuditEventType,
    keyPairId: string,
    context: RequestContext,
    metadata?: Record<string, unknown>,
  ): Promise<void> {
    if (!audit) return;
    try {
      await audit.log({
        eventType,
        actorId: context.actorId ?? 'anonymous',
        actorType: context.actorType ?? 'client',
        targetId: keyPairId,
        targetType: TARGET_TYPE,
        ipAddress: context.ipAddress,
        metadata,
      });
    } catch (err) {
      console.warn(`[keypairs] Failed to write ${eventType} audit event:`, err);
    }
  }

  async function reject(
    keyPairId: string,
    error: EncryptionError,
    context: RequestContext,
  ): Promise<Result<never, EncryptionError>> {
    await record(AuditEventType.KEY_PAIR_REJECTED, keyPairId, context, { reason: error.kind });
    return failure(error);
  }

  return {
    async generateNewKeyPair(context = {}) {
      const material = await tryCatchAsync(
        () => generateRsaKeyMaterial(),
        (cause) => new KeyGenerationError('Failed to generate RSA key pair', { cause }),
      );
      if (!material.ok) return material;

      const sealed = privateKeyCipher.encrypt(Buffer.from(material.value.privateKey, 'base64'));
      if (!sealed.ok) {
        return failure(new KeyGenerationError('Failed to seal private key', { cause: sealed.error }));
      }

      const now = clock();
      const id = randomUUID();
      const added = await store.add({
        id,
        publicKey: material.value.publicKey,
        privateKey: sealed.value,
        isActive: true,
        createdAt: now,
        expiresAt: new Date(now.getTime() + ttlMs),
        usedAt: null,
      });
      if (!added.ok) {
        return failure(new KeyGenerationError('Failed to store key pair', { cause: added.error }));
      }

      await record(AuditEventType.KEY_PAIR_ISSUED, id, context);
      return success({ keyPairId: id, publicKey: material.value.publicKey });
    },

    async decryptRequest(keyPairId, payload, schema, context = {}) {
      const lookup = await store.getById(keyPairId);
      if (!lookup.ok) {
        return failure(new KeyNotFoundError(`Failed to load key pair ${keyPairId}`, { cause: lookup.error }));
      }

      const keyPair = lookup.value;
      if (!keyPair) {
        return reject(keyPairId, await explainMissing(store, keyPairId), context);
      }
      if (keyPair.usedAt) {
        return reject(keyPairId, new KeyAlreadyUsedError(`Key pair ${keyPairId} has already been used`), context);
      }

      const privateKey = unsealPrivateKey(privateKeyCipher, keyPair.privateKey);
      if (!privateKey.ok) return privateKey;

      // Consume before decrypting: a request that fails past this point still spends the pair.
      const claimed = await store.claim(keyPairId);
      if (!claimed.ok) {
        return failure(new DecryptionError('Failed to consume key pair', undefined, { cause: claimed.error }));
      }
      if (!claimed.value) {
        return reject(keyPairId, new KeyAlreadyUsedError(`Key pair ${keyPairId} has already been used`), context);
      }

      let decryptedFields = 0;
      const decrypted = decryptFields(payload, schema, (ciphertext) => {
        decryptedFields += 1;
        return decryptWithPrivateKey(privateKey.value, ciphertext);
      });
      if (!decrypted.ok) {
        await record(AuditEventType.FIELD_DECRYPTION_FAILED, keyPairId, context, {
          field: decrypted.error.fieldName,
        });
        return decrypted;
      }

      await record(AuditEventType.KEY_PAIR_CONSUMED, keyPairId, context, {
        fields: decryptedFields,
      });
      return decrypted;
    },

    async revokeKeyPair(keyPairId, context = {}) {
      const revoked = await store.revoke(keyPairId);
      if (!revoked.ok) {
        return failure(new KeyNotFoundError(`Failed to revoke key pair ${keyPairId}`, { cause: revoked.error }));
      }
      if (!revoked.value) {
        return failure(await explainMissing(store, keyPairId));
      }

      await record(AuditEventType.KEY_PAIR_REVOKED, keyPairId, { ...context, actorType: context.actorType ?? 'admin' });
      return success(undefined);
    },
  };
}
