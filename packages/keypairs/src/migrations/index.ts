import type { QueryInterface, DataTypes as DataTypesType } from 'sequelize';

/**
 * Key pair migrations. Run them in the consumer's migration pipeline:
 *
 * ```typescript
 * import { keyPairMigrations } from '@fieldseal/keypairs';
 * await keyPairMigrations.up(queryInterface, DataTypes);
 * ```
 */
export const keyPairMigrations = {
  async up(queryInterface: QueryInterface, DataTypes: typeof DataTypesType): Promise<void> {
    await queryInterface.createTable('key_pairs', {
      id: {
        type: DataTypes.UUID,
        primaryKey: true,
        allowNull: false,
      },
      public_key: {
        type: DataTypes.TEXT,
        allowNull: false,
      },
      private_key: {
        type: DataTypes.TEXT,
        allowNull: false,
      },
      is_active: {
        type: DataTypes.BOOLEAN,
        allowNull: false,
        defaultValue: true,
      },
      created_at: {
        type: DataTypes.DATE,
        allowNull: false,
        defaultValue: DataTypes.NOW,
      },
      expires_at: {
        type: DataTypes.DATE,
        allowNull: false,
      },
      used_at: {
        type: DataTypes.DATE,
        allowNull: true,
      },
    });

    await queryInterface.addIndex('key_pairs', ['expires_at'], {
      name: 'idx_key_pairs_expires_at',
    });

    await queryInterface.addIndex('key_pairs', ['is_active'], {
      name: 'idx_key_pairs_is_active',
    });
  },

  async down(queryInterface: QueryInterface): Promise<void> {
    await queryInterface.dropTable('key_pairs');
  },
};
