import { DataTypes } from 'sequelize';
import type { Sequelize } from 'sequelize';
import type { KeyPairInstance, KeyPairModel } from '../types.js';

/**
 * Define the KeyPair model on a Sequelize instance.
 * Rows are written once and later flipped to inactive/used; nothing else changes them.
 */
export function defineKeyPairModel(sequelize: Sequelize): KeyPairModel {
  return sequelize.define<KeyPairInstance>(
    'KeyPair',
    {
      id: {
        type: DataTypes.UUID,
        primaryKey: true,
        allowNull: false,
      },
      publicKey: {
        type: DataTypes.TEXT,
        allowNull: false,
        field: 'public_key',
      },
      privateKey: {
        type: DataTypes.TEXT,
        allowNull: false,
        field: 'private_key',
      },
      isActive: {
        type: DataTypes.BOOLEAN,
        allowNull: false,
        defaultValue: true,
        field: 'is_active',
      },
      createdAt: {
        type: DataTypes.DATE,
        allowNull: false,
        defaultValue: DataTypes.NOW,
        field: 'created_at',
      },
      expiresAt: {
        type: DataTypes.DATE,
        allowNull: false,
        field: 'expires_at',
      },
      usedAt: {
        type: DataTypes.DATE,
        allowNull: true,
        field: 'used_at',
      },
    },
    {
      tableName: 'key_pairs',
      underscored: true,
      timestamps: false,
    },
  );
}
