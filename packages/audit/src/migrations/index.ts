import type { QueryInterface, DataTypes as DataTypesType } from 'sequelize';

const TRIGGER_FUNCTION = 'prevent_audit_log_modification';

/**
 * Audit log migrations.
 *
 * Creates `audit_logs` with its query indexes. On PostgreSQL it also
 * installs BEFORE UPDATE / BEFORE DELETE triggers so rows cannot be
 * changed once written.
 */
export const auditMigrations = {
  async up(queryInterface: QueryInterface, DataTypes: typeof DataTypesType): Promise<void> {
    await queryInterface.createTable('audit_logs', {
      id: {
        type: DataTypes.UUID,
        defaultValue: DataTypes.UUIDV4,
        primaryKey: true,
        allowNull: false,
      },
      event_type: {
        type: DataTypes.STRING(30),
        allowNull: false,
      },
      actor_id: {
        type: DataTypes.STRING(255),
        allowNull: false,
      },
      actor_type: {
        type: DataTypes.STRING(10),
        allowNull: false,
      },
      target_id: {
        type: DataTypes.STRING(255),
        allowNull: true,
      },
      target_type: {
        type: DataTypes.STRING(50),
        allowNull: true,
      },
      ip_address: {
        type: DataTypes.STRING(45),
        allowNull: true,
      },
      metadata: {
        type: DataTypes.JSON,
        allowNull: true,
      },
      created_at: {
        type: DataTypes.DATE,
        allowNull: false,
        defaultValue: DataTypes.NOW,
      },
    });

    // Key pair history is read by target; dashboards read by type and time.
    for (const columns of [['event_type'], ['actor_id'], ['target_id'], ['created_at']]) {
      await queryInterface.addIndex('audit_logs', columns, {
        name: `idx_audit_logs_${columns.join('_')}`,
      });
    }

    if (queryInterface.sequelize.getDialect() !== 'postgres') return;

    await queryInterface.sequelize.query(`
      CREATE OR REPLACE FUNCTION ${TRIGGER_FUNCTION}()
      RETURNS TRIGGER AS $$
      BEGIN
        RAISE EXCEPTION 'audit_logs table is append-only: % operations are not permitted', TG_OP;
        RETURN NULL;
      END;
      $$ LANGUAGE plpgsql;
    `);

    for (const operation of ['UPDATE', 'DELETE']) {
      await queryInterface.sequelize.query(`
        CREATE TRIGGER audit_logs_prevent_${operation.toLowerCase()}
        BEFORE ${operation} ON audit_logs
        FOR EACH ROW
        EXECUTE FUNCTION ${TRIGGER_FUNCTION}();
      `);
    }
  },

  async down(queryInterface: QueryInterface): Promise<void> {
    if (queryInterface.sequelize.getDialect() === 'postgres') {
      await queryInterface.sequelize.query('DROP TRIGGER IF EXISTS audit_logs_prevent_delete ON audit_logs;');
      await queryInterface.sequelize.query('DROP TRIGGER IF EXISTS audit_logs_prevent_update ON audit_logs;');
      await queryInterface.sequelize.query(`DROP FUNCTION IF EXISTS ${TRIGGER_FUNCTION}();`);
    }

    await queryInterface.dropTable('audit_logs');
  },
};
