import { Op } from 'sequelize';
import { tryCatchAsync, failure, success } from '@fieldseal/core';
import type { Result } from '@fieldseal/core';
import { KeyPairStoreError } from './errors.js';
import type { Clock, KeyPairAttributes, KeyPairInstance, KeyPairModel, KeyPairStore } from './types.js';

interface StoreDeps {
  KeyPair: KeyPairModel;
  clock?: Clock;
}

function toAttributes(row: KeyPairInstance): KeyPairAttributes {
  const data = row.get({ plain: true });
  return {
    id: data.id,
    publicKey: data.publicKey,
    privateKey: data.privateKey,
    isActive: Boolean(data.isActive),
    createdAt: data.createdAt,
    expiresAt: data.expiresAt,
    usedAt: data.usedAt ?? null,
  };
}

const storeError = (message: string) => (cause: unknown) => new KeyPairStoreError(message, { cause });

/**
 * Sequelize-backed key pair store.
 */
export function createKeyPairStore(deps: StoreDeps): KeyPairStore {
  const { KeyPair } = deps;
  const clock = deps.clock ?? (() => new Date());

  return {
    async add(keyPair) {
      return tryCatchAsync(async () => {
        await KeyPair.create({
          id: keyPair.id,
          publicKey: keyPair.publicKey,
          privateKey: keyPair.privateKey,
          isActive: keyPair.isActive,
          createdAt: keyPair.createdAt,
          expiresAt: keyPair.expiresAt,
          usedAt: keyPair.usedAt,
        });
      }, storeError(`Failed to add key pair ${keyPair.id}`));
    },

    async getById(id) {
      return tryCatchAsync(async () => {
        const row = await KeyPair.findOne({
          where: { id, isActive: true, expiresAt: { [Op.gt]: clock() } },
        });
        return row ? toAttributes(row) : null;
      }, storeError(`Failed to load key pair ${id}`));
    },

    async findById(id) {
      return tryCatchAsync(async () => {
        const row = await KeyPair.findByPk(id);
        return row ? toAttributes(row) : null;
      }, storeError(`Failed to load key pair ${id}`));
    },

    async deactivate(id): Promise<Result<void, KeyPairStoreError>> {
      const updated = await tryCatchAsync(
        () => KeyPair.update({ isActive: false, usedAt: clock() }, { where: { id } }),
        storeError(`Failed to deactivate key pair ${id}`),
      );
      if (!updated.ok) return updated;

      const [affected] = updated.value;
      return affected === 0 ? failure(new KeyPairStoreError(`Key pair ${id} does not exist`)) : success(undefined);
    },

    async revoke(id) {
      const updated = await tryCatchAsync(
        () => KeyPair.update({ isActive: false }, { where: { id, usedAt: null } }),
        storeError(`Failed to revoke key pair ${id}`),
      );
      if (!updated.ok) return updated;

      const [affected] = updated.value;
      return success(affected === 1);
    },

    async claim(id) {
      const now = clock();
      const updated = await tryCatchAsync(
        () =>
          KeyPair.update(
            { isActive: false, usedAt: now },
            { where: { id, isActive: true, usedAt: null, expiresAt: { [Op.gt]: now } } },
          ),
        storeError(`Failed to claim key pair ${id}`),
      );
      if (!updated.ok) return updated;

      const [affected] = updated.value;
      return success(affected === 1);
    },
  };
}
