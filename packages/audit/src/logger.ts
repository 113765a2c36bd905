import { Op } from 'sequelize';
import type { WhereOptions } from 'sequelize';
import type {
  AuditEvent,
  AuditQueryFilters,
  AuditLogEntry,
  AuditLogAttributes,
  AuditLogModel,
  AuditLogger,
} from './types.js';

const DEFAULT_QUERY_LIMIT = 100;

/**
 * Mask an IP address for privacy.
 *
 * IPv4: zeroes the last octet        → 192.168.1.100 → 192.168.1.0
 * IPv6: replaces the last group by 0 → 2001:db8::1   → 2001:db8::0
 * Invalid or missing: returns null.
 */
export function maskIpAddress(ip: string | undefined | null): string | null {
  if (!ip) return null;

  const trimmed = ip.trim();
  if (!trimmed) return null;

  if (trimmed.includes('.') && !trimmed.includes(':')) {
    const parts = trimmed.split('.');
    if (parts.length !== 4) return null;
    parts[3] = '0';
    return parts.join('.');
  }

  // IPv4-mapped IPv6 (e.g. ::ffff:192.168.1.1)
  if (trimmed.includes(':') && trimmed.includes('.')) {
    const lastColon = trimmed.lastIndexOf(':');
    const parts = trimmed.substring(lastColon + 1).split('.');
    if (parts.length !== 4) return null;
    parts[3] = '0';
    return trimmed.substring(0, lastColon + 1) + parts.join('.');
  }

  if (trimmed.includes(':')) {
    return trimmed.substring(0, trimmed.lastIndexOf(':')) + ':0';
  }

  return null;
}

function buildWhere(filters: AuditQueryFilters): WhereOptions<AuditLogAttributes> {
  const { eventType, actorId, actorType, targetId, startDate, endDate } = filters;

  return {
    ...(eventType
      ? { eventType: Array.isArray(eventType) ? { [Op.in]: eventType } : eventType }
      : {}),
    ...(actorId ? { actorId } : {}),
    ...(actorType ? { actorType } : {}),
    ...(targetId ? { targetId } : {}),
    ...(startDate || endDate
      ? {
          createdAt: {
            ...(startDate ? { [Op.gte]: startDate } : {}),
            ...(endDate ? { [Op.lte]: endDate } : {}),
          },
        }
      : {}),
  };
}

/**
 * Create the audit logger implementation.
 * Wraps a Sequelize model to provide log() and query() methods.
 */
export function createLoggerImpl(AuditLog: AuditLogModel, enabled: boolean): AuditLogger {
  return {
    async log(event: AuditEvent): Promise<void> {
      if (!enabled) return;

      await AuditLog.create({
        eventType: event.eventType,
        actorId: event.actorId,
        actorType: event.actorType,
        targetId: event.targetId ?? null,
        targetType: event.targetType ?? null,
        ipAddress: maskIpAddress(event.ipAddress),
        metadata: event.metadata ?? null,
      });
    },

    async query(filters: AuditQueryFilters): Promise<AuditLogEntry[]> {
      const rows = await AuditLog.findAll({
        where: buildWhere(filters),
        order: [['createdAt', 'DESC']],
        limit: filters.limit ?? DEFAULT_QUERY_LIMIT,
        offset: filters.offset ?? 0,
      });

      return rows.map((row) => {
        const data = row.get({ plain: true });
        return {
          id: data.id,
          eventType: data.eventType,
          actorId: data.actorId,
          actorType: data.actorType,
          targetId: data.targetId ?? null,
          targetType: data.targetType ?? null,
          ipAddress: data.ipAddress ?? null,
          metadata: data.metadata ?? null,
          createdAt: data.createdAt,
        };
      });
    },
  };
}
