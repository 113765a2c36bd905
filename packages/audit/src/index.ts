// Types
export { AuditEventType } from './types.js';
export type {
  AuditEvent,
  AuditQueryFilters,
  AuditLogEntry,
  AuditConfig,
  AuditLogger,
  AuditActorType,
} from './types.js';

// Migrations
export { auditMigrations } from './migrations/index.js';

// Model
export { defineAuditLogModel } from './models/auditLog.js';

// IP masking utility
export { maskIpAddress } from './logger.js';

// Factory
import type { AuditConfig, AuditLogger } from './types.js';
import { defineAuditLogModel } from './models/auditLog.js';
import { createLoggerImpl } from './logger.js';

/**
 * Create an AuditLogger instance.
 *
 * The logger writes to the `audit_logs` table using the provided
 * Sequelize connection. On PostgreSQL the migration installs triggers
 * that reject UPDATE and DELETE on that table.
 *
 * @example
 * ```typescript
 * import { createAuditLogger, AuditEventType } from '@fieldseal/audit';
 *
 * const auditLogger = createAuditLogger({ database: sequelize });
 *
 * await auditLogger.log({
 *   eventType: AuditEventType.KEY_PAIR_CONSUMED,
 *   actorId: 'checkout-service',
 *   actorType: 'service',
 *   targetId: keyPairId,
 *   targetType: 'key_pair',
 * });
 * ```
 */
export function createAuditLogger(config: AuditConfig): AuditLogger {
  const enabled = config.enabled ?? true;
  const AuditLog = defineAuditLogModel(config.database);
  return createLoggerImpl(AuditLog, enabled);
}
