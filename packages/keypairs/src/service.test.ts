import { describe, it, expect, vi, beforeEach } from 'vitest';
import { AuditEventType } from '@fieldseal/audit';
import type { AuditLogger } from '@fieldseal/audit';
import {
  DecryptionError,
  KeyAlreadyUsedError,
  KeyGenerationError,
  KeyNotFoundError,
  createSymmetricCipher,
  failure,
  success,
} from '@fieldseal/core';
import type { Result } from '@fieldseal/core';
import { createKeyPairService } from './service.js';
import { defineEncryptedFields } from './fields.js';
import { encryptForKeyPair } from './rsa.js';
import { KeyPairStoreError } from './errors.js';
import type { KeyPairAttributes, KeyPairStore } from './types.js';

// -- Fakes --

function createMemoryStore(clock: () => Date) {
  const rows = new Map<string, KeyPairAttributes>();

  const isAvailable = (row: KeyPairAttributes) =>
    row.isActive && row.usedAt === null && row.expiresAt.getTime() > clock().getTime();

  const store: KeyPairStore = {
    add: vi.fn(async (keyPair: KeyPairAttributes) => {
      if (rows.has(keyPair.id)) return failure(new KeyPairStoreError('duplicate id'));
      rows.set(keyPair.id, { ...keyPair });
      return success(undefined);
    }),
    getById: vi.fn(async (id: string) => {
      const row = rows.get(id);
      return success(row && row.isActive && row.expiresAt.getTime() > clock().getTime() ? { ...row } : null);
    }),
    findById: vi.fn(async (id: string) => {
      const row = rows.get(id);
      return success(row ? { ...row } : null);
    }),
    deactivate: vi.fn(async (id: string) => {
      const row = rows.get(id);
      if (!row) return failure(new KeyPairStoreError('no such key pair'));
      rows.set(id, { ...row, isActive: false, usedAt: clock() });
      return success(undefined);
    }),
    revoke: vi.fn(async (id: string) => {
      const row = rows.get(id);
      if (!row || row.usedAt !== null) return success(false);
      rows.set(id, { ...row, isActive: false });
      return success(true);
    }),
    claim: vi.fn(async (id: string) => {
      const row = rows.get(id);
      if (!row || !isAvailable(row)) return success(false);
      rows.set(id, { ...row, isActive: false, usedAt: clock() });
      return success(true);
    }),
  };

  return { store, rows };
}

function unwrap<T>(result: Result<T, Error>): T {
  if (!result.ok) throw result.error;
  return result.value;
}

interface ProfileUpdate {
  secret: string;
  label: string;
  nickname?: string | null;
}

const profileFields = defineEncryptedFields<ProfileUpdate>()('secret', 'nickname');

const profile = (update: ProfileUpdate): ProfileUpdate => update;

const MASTER_KEY = Buffer.alloc(32, 7).toString('base64');
const START = new Date('2026-03-01T12:00:00.000Z');

describe('createKeyPairService', () => {
  let now: Date;
  let memory: ReturnType<typeof createMemoryStore>;
  let audit: AuditLogger;

  const clock = () => now;
  const cipher = createSymmetricCipher({ masterKey: MASTER_KEY });

  function createService(overrides: { ttlMinutes?: number } = {}) {
    return createKeyPairService({
      store: memory.store,
      privateKeyCipher: cipher,
      clock,
      audit,
      ...overrides,
    });
  }

  beforeEach(() => {
    now = START;
    memory = createMemoryStore(clock);
    audit = {
      log: vi.fn(async () => {}),
      query: vi.fn(async () => []),
    };
  });

  describe('generateNewKeyPair()', () => {
    it('stores an active pair that expires after 30 minutes', async () => {
      const service = createService();

      const response = unwrap(await service.generateNewKeyPair());

      const row = memory.rows.get(response.keyPairId);
      expect(row).toBeDefined();
      expect(row!.publicKey).toBe(response.publicKey);
      expect(row!.isActive).toBe(true);
      expect(row!.usedAt).toBeNull();
      expect(row!.createdAt).toEqual(START);
      expect(row!.expiresAt).toEqual(new Date('2026-03-01T12:30:00.000Z'));
    });

    it('returns only the id and the public key', async () => {
      const service = createService();

      const response = unwrap(await service.generateNewKeyPair());

      expect(Object.keys(response).sort()).toEqual(['keyPairId', 'publicKey']);
      expect(response.keyPairId).toMatch(/^[0-9a-f-]{36}$/);
    });

    it('seals the private key before storing it', async () => {
      const service = createService();

      const response = unwrap(await service.generateNewKeyPair());

      const row = memory.rows.get(response.keyPairId)!;
      const der = unwrap(cipher.decryptToBytes(row.privateKey));
      // PKCS#1 RSAPrivateKey is a DER SEQUENCE
      expect(der[0]).toBe(0x30);
      expect(row.privateKey).not.toBe(der.toString('base64'));
    });

    it('honours a custom validity window', async () => {
      const service = createService({ ttlMinutes: 5 });

      const response = unwrap(await service.generateNewKeyPair());

      expect(memory.rows.get(response.keyPairId)!.expiresAt).toEqual(new Date('2026-03-01T12:05:00.000Z'));
    });

    it('wraps store failures in KeyGenerationError', async () => {
      const storeError = new KeyPairStoreError('disk full');
      vi.mocked(memory.store.add).mockResolvedValueOnce(failure(storeError));
      const service = createService();

      const result = await service.generateNewKeyPair();

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(KeyGenerationError);
      expect(result.error.message).toBe('Failed to store key pair');
      expect(result.error.cause).toBe(storeError);
    });

    it('records KEY_PAIR_ISSUED', async () => {
      const service = createService();

      const response = unwrap(await service.generateNewKeyPair({ actorId: 'client-7', ipAddress: '10.1.2.3' }));

      expect(audit.log).toHaveBeenCalledWith(
        expect.objectContaining({
          eventType: AuditEventType.KEY_PAIR_ISSUED,
          actorId: 'client-7',
          actorType: 'client',
          targetId: response.keyPairId,
          targetType: 'key_pair',
          ipAddress: '10.1.2.3',
        }),
      );
    });
  });

  describe('decryptRequest()', () => {
    it('decrypts marked fields once and rejects the second attempt', async () => {
      const service = createService();
      const { keyPairId, publicKey } = unwrap(await service.generateNewKeyPair());
      const payload: ProfileUpdate = {
        secret: unwrap(encryptForKeyPair(publicKey, 'secret-value')),
        label: 'plain-label',
      };

      const first = await service.decryptRequest(keyPairId, payload, profileFields);
      const second = await service.decryptRequest(keyPairId, payload, profileFields);

      expect(unwrap(first)).toEqual({ secret: 'secret-value', label: 'plain-label' });
      expect(second.ok).toBe(false);
      if (second.ok) return;
      expect(second.error).toBeInstanceOf(KeyAlreadyUsedError);
      expect(second.error.message).toBe(`Key pair ${keyPairId} has already been used`);
    });

    it('returns a new object and leaves the payload untouched', async () => {
      const service = createService();
      const { keyPairId, publicKey } = unwrap(await service.generateNewKeyPair());
      const ciphertext = unwrap(encryptForKeyPair(publicKey, 'hidden'));
      const payload: ProfileUpdate = { secret: ciphertext, label: 'x' };

      const decrypted = unwrap(await service.decryptRequest(keyPairId, payload, profileFields));

      expect(decrypted).not.toBe(payload);
      expect(payload.secret).toBe(ciphertext);
    });

    it('passes null and empty fields through without decrypting', async () => {
      const service = createService();
      const { keyPairId } = unwrap(await service.generateNewKeyPair());

      const decrypted = unwrap(
        await service.decryptRequest(keyPairId, profile({ secret: '', label: 'l', nickname: null }), profileFields),
      );

      expect(decrypted).toEqual({ secret: '', label: 'l', nickname: null });
    });

    it('decrypts several fields, including multi-byte text', async () => {
      const service = createService();
      const { keyPairId, publicKey } = unwrap(await service.generateNewKeyPair());

      const decrypted = unwrap(
        await service.decryptRequest(
          keyPairId,
          profile({
            secret: unwrap(encryptForKeyPair(publicKey, 'pässwörd ✓')),
            label: 'l',
            nickname: unwrap(encryptForKeyPair(publicKey, 'nick')),
          }),
          profileFields,
        ),
      );

      expect(decrypted).toEqual({ secret: 'pässwörd ✓', label: 'l', nickname: 'nick' });
    });

    it('reports an unknown id as KeyNotFoundError', async () => {
      const service = createService();

      const result = await service.decryptRequest('missing-id', profile({ secret: 'x', label: 'l' }), profileFields);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(KeyNotFoundError);
      expect(result.error.message).toBe('Key pair missing-id not found or expired');
      expect(audit.log).toHaveBeenCalledWith(
        expect.objectContaining({
          eventType: AuditEventType.KEY_PAIR_REJECTED,
          targetId: 'missing-id',
          metadata: { reason: 'KEY_NOT_FOUND' },
        }),
      );
    });

    it('treats an expired pair as not found', async () => {
      const service = createService();
      const { keyPairId, publicKey } = unwrap(await service.generateNewKeyPair());
      const payload = profile({ secret: unwrap(encryptForKeyPair(publicKey, 'late')), label: 'l' });

      now = new Date(START.getTime() + 31 * 60 * 1000);
      const result = await service.decryptRequest(keyPairId, payload, profileFields);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(KeyNotFoundError);
      expect(memory.store.claim).not.toHaveBeenCalled();
    });

    it('maps a store lookup failure to KeyNotFoundError', async () => {
      const storeError = new KeyPairStoreError('connection reset');
      vi.mocked(memory.store.getById).mockResolvedValueOnce(failure(storeError));
      const service = createService();

      const result = await service.decryptRequest('any-id', profile({ secret: 'x', label: 'l' }), profileFields);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(KeyNotFoundError);
      expect(result.error.cause).toBe(storeError);
    });

    it('rejects a looked-up pair that already carries usedAt', async () => {
      const service = createService();
      const { keyPairId } = unwrap(await service.generateNewKeyPair());
      const row = memory.rows.get(keyPairId)!;
      vi.mocked(memory.store.getById).mockResolvedValueOnce(success({ ...row, usedAt: START }));

      const result = await service.decryptRequest(keyPairId, profile({ secret: 'x', label: 'l' }), profileFields);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(KeyAlreadyUsedError);
      expect(memory.store.claim).not.toHaveBeenCalled();
    });

    it('fails with KeyAlreadyUsedError when another request wins the claim', async () => {
      const service = createService();
      const { keyPairId } = unwrap(await service.generateNewKeyPair());
      vi.mocked(memory.store.claim).mockResolvedValueOnce(success(false));

      const result = await service.decryptRequest(keyPairId, profile({ secret: 'x', label: 'l' }), profileFields);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(KeyAlreadyUsedError);
    });

    it('lets exactly one of two concurrent requests through', async () => {
      const service = createService();
      const { keyPairId, publicKey } = unwrap(await service.generateNewKeyPair());
      const payload = profile({ secret: unwrap(encryptForKeyPair(publicKey, 'race')), label: 'l' });

      const results = await Promise.all([
        service.decryptRequest(keyPairId, payload, profileFields),
        service.decryptRequest(keyPairId, payload, profileFields),
      ]);

      const succeeded = results.filter((r) => r.ok);
      const failed = results.filter((r) => !r.ok);
      expect(succeeded).toHaveLength(1);
      expect(failed).toHaveLength(1);
      const [loser] = failed;
      expect(loser && !loser.ok && loser.error).toBeInstanceOf(KeyAlreadyUsedError);
    });

    it('fails with DecryptionError when the claim cannot be written', async () => {
      const service = createService();
      const { keyPairId } = unwrap(await service.generateNewKeyPair());
      vi.mocked(memory.store.claim).mockResolvedValueOnce(failure(new KeyPairStoreError('read-only replica')));

      const result = await service.decryptRequest(keyPairId, profile({ secret: 'x', label: 'l' }), profileFields);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(DecryptionError);
      expect(result.error.message).toBe('Failed to consume key pair');
    });

    it('names the failing field and still consumes the pair', async () => {
      const service = createService();
      const { keyPairId } = unwrap(await service.generateNewKeyPair());

      const result = await service.decryptRequest(
        keyPairId,
        profile({ secret: Buffer.from('not rsa').toString('base64'), label: 'l' }),
        profileFields,
      );

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(DecryptionError);
      expect(result.error.message).toBe("Failed to decrypt field (field: 'secret')");
      expect(memory.rows.get(keyPairId)!.usedAt).toEqual(START);
      expect(audit.log).toHaveBeenCalledWith(
        expect.objectContaining({
          eventType: AuditEventType.FIELD_DECRYPTION_FAILED,
          metadata: { field: 'secret' },
        }),
      );
    });

    it('rejects a private key sealed under another master key', async () => {
      const service = createService();
      const { keyPairId } = unwrap(await service.generateNewKeyPair());
      const other = createKeyPairService({
        store: memory.store,
        privateKeyCipher: createSymmetricCipher({ masterKey: Buffer.alloc(32, 9).toString('base64') }),
        clock,
      });

      const result = await other.decryptRequest(keyPairId, profile({ secret: 'x', label: 'l' }), profileFields);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(DecryptionError);
      expect(result.error.message).toBe('Failed to unseal private key');
      expect(memory.store.claim).not.toHaveBeenCalled();
    });

    it('records KEY_PAIR_CONSUMED on success', async () => {
      const service = createService();
      const { keyPairId, publicKey } = unwrap(await service.generateNewKeyPair());

      await service.decryptRequest(
        keyPairId,
        profile({ secret: unwrap(encryptForKeyPair(publicKey, 'v')), label: 'l' }),
        profileFields,
        { actorId: 'checkout-service', actorType: 'service' },
      );

      expect(audit.log).toHaveBeenLastCalledWith(
        expect.objectContaining({
          eventType: AuditEventType.KEY_PAIR_CONSUMED,
          actorId: 'checkout-service',
          actorType: 'service',
          targetId: keyPairId,
          metadata: { fields: 1 },
        }),
      );
    });

    it('counts only the fields it actually decrypted', async () => {
      const service = createService();
      const { keyPairId, publicKey } = unwrap(await service.generateNewKeyPair());

      await service.decryptRequest(
        keyPairId,
        profile({ secret: '', label: 'l', nickname: unwrap(encryptForKeyPair(publicKey, 'nick')) }),
        profileFields,
      );

      expect(audit.log).toHaveBeenLastCalledWith(
        expect.objectContaining({
          eventType: AuditEventType.KEY_PAIR_CONSUMED,
          metadata: { fields: 1 },
        }),
      );
    });

    it('does not fail when the audit trail is unavailable', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      vi.mocked(audit.log).mockRejectedValue(new Error('audit down'));
      const service = createService();
      const { keyPairId, publicKey } = unwrap(await service.generateNewKeyPair());

      const result = await service.decryptRequest(
        keyPairId,
        profile({ secret: unwrap(encryptForKeyPair(publicKey, 'v')), label: 'l' }),
        profileFields,
      );

      expect(unwrap(result)).toEqual({ secret: 'v', label: 'l' });
      expect(warn).toHaveBeenCalledTimes(2);
      warn.mockRestore();
    });
  });

  describe('revokeKeyPair()', () => {
    it('deactivates the pair so it can no longer decrypt', async () => {
      const service = createService();
      const { keyPairId, publicKey } = unwrap(await service.generateNewKeyPair());

      unwrap(await service.revokeKeyPair(keyPairId, { actorId: 'admin-1' }));
      const result = await service.decryptRequest(
        keyPairId,
        profile({ secret: unwrap(encryptForKeyPair(publicKey, 'v')), label: 'l' }),
        profileFields,
      );

      expect(memory.rows.get(keyPairId)!.isActive).toBe(false);
      expect(result.ok).toBe(false);
      expect(audit.log).toHaveBeenCalledWith(
        expect.objectContaining({
          eventType: AuditEventType.KEY_PAIR_REVOKED,
          actorId: 'admin-1',
          actorType: 'admin',
        }),
      );
    });

    it('reports a revoked pair as not found rather than used', async () => {
      const service = createService();
      const { keyPairId, publicKey } = unwrap(await service.generateNewKeyPair());

      unwrap(await service.revokeKeyPair(keyPairId));
      const result = await service.decryptRequest(
        keyPairId,
        profile({ secret: unwrap(encryptForKeyPair(publicKey, 'v')), label: 'l' }),
        profileFields,
      );

      expect(memory.rows.get(keyPairId)!.usedAt).toBeNull();
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(KeyNotFoundError);
      expect(result.error.message).toBe(`Key pair ${keyPairId} not found or expired`);
    });

    it('refuses to revoke a consumed pair and keeps its usedAt', async () => {
      const service = createService();
      const { keyPairId, publicKey } = unwrap(await service.generateNewKeyPair());
      now = new Date('2026-03-01T12:01:00.000Z');
      unwrap(
        await service.decryptRequest(
          keyPairId,
          profile({ secret: unwrap(encryptForKeyPair(publicKey, 'v')), label: 'l' }),
          profileFields,
        ),
      );

      now = new Date('2026-03-01T12:20:00.000Z');
      const result = await service.revokeKeyPair(keyPairId);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(KeyAlreadyUsedError);
      expect(result.error.message).toBe(`Key pair ${keyPairId} has already been used`);
      expect(memory.rows.get(keyPairId)!.usedAt).toEqual(new Date('2026-03-01T12:01:00.000Z'));
      expect(audit.log).not.toHaveBeenCalledWith(
        expect.objectContaining({ eventType: AuditEventType.KEY_PAIR_REVOKED }),
      );
    });

    it('reports an unknown id as KeyNotFoundError', async () => {
      const service = createService();

      const result = await service.revokeKeyPair('missing-id');

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(KeyNotFoundError);
      expect(result.error.message).toBe('Key pair missing-id not found or expired');
    });

    it('maps a store failure to KeyNotFoundError', async () => {
      const storeError = new KeyPairStoreError('connection reset');
      vi.mocked(memory.store.revoke).mockResolvedValueOnce(failure(storeError));
      const service = createService();

      const result = await service.revokeKeyPair('any-id');

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(KeyNotFoundError);
      expect(result.error.message).toBe('Failed to revoke key pair any-id');
      expect(result.error.cause).toBe(storeError);
    });
  });
});
