import type { Sequelize, Model, ModelStatic, Optional } from 'sequelize';

/** All event types that can be recorded in the audit log */
export enum AuditEventType {
  /** A key pair was generated and its public half handed out */
  KEY_PAIR_ISSUED = 'KEY_PAIR_ISSUED',
  /** A key pair decrypted a request and is now spent */
  KEY_PAIR_CONSUMED = 'KEY_PAIR_CONSUMED',
  /** A key pair was deactivated before use */
  KEY_PAIR_REVOKED = 'KEY_PAIR_REVOKED',
  /** A request named a key pair that is missing, expired or already used */
  KEY_PAIR_REJECTED = 'KEY_PAIR_REJECTED',
  /** A marked field could not be decrypted */
  FIELD_DECRYPTION_FAILED = 'FIELD_DECRYPTION_FAILED',
}

/** Who triggered the event */
export type AuditActorType = 'client' | 'service' | 'admin';

/** An audit event to be logged */
export interface AuditEvent {
  /** The type of event being logged */
  eventType: AuditEventType;
  /** ID of the actor performing the action (client ID, service name, admin ID) */
  actorId: string;
  /** Type of actor */
  actorType: AuditActorType;
  /** ID of the target resource (usually a key pair ID) */
  targetId?: string;
  /** Type of the target resource */
  targetType?: string;
  /** IP address of the request origin (will be masked for privacy) */
  ipAddress?: string;
  /** Additional structured metadata for the event */
  metadata?: Record<string, unknown>;
}

/** Filters for querying audit logs */
export interface AuditQueryFilters {
  /** Filter by event type(s) */
  eventType?: AuditEventType | AuditEventType[];
  /** Filter by actor ID */
  actorId?: string;
  /** Filter by actor type */
  actorType?: AuditActorType;
  /** Filter by target ID */
  targetId?: string;
  /** Filter events after this date (inclusive) */
  startDate?: Date;
  /** Filter events before this date (inclusive) */
  endDate?: Date;
  /** Maximum number of results to return */
  limit?: number;
  /** Number of results to skip (for pagination) */
  offset?: number;
}

/** A single audit log entry as returned from the database */
export interface AuditLogEntry {
  id: string;
  eventType: AuditEventType;
  actorId: string;
  actorType: AuditActorType;
  targetId: string | null;
  targetType: string | null;
  /** Masked IP address */
  ipAddress: string | null;
  metadata: Record<string, unknown> | null;
  createdAt: Date;
}

/** Configuration for creating an AuditLogger instance */
export interface AuditConfig {
  /** Sequelize instance connected to the database */
  database: Sequelize;
  /** Whether audit logging is enabled (default: true) */
  enabled?: boolean;
}

/** Audit logger service interface */
export interface AuditLogger {
  /** Log an audit event to the append-only audit trail */
  log(event: AuditEvent): Promise<void>;
  /** Query audit logs with optional filters, newest first */
  query(filters: AuditQueryFilters): Promise<AuditLogEntry[]>;
}

/** Internal model attributes for Sequelize */
export type AuditLogAttributes = AuditLogEntry;

/** Attributes the database fills in when omitted */
export type AuditLogCreationAttributes = Optional<AuditLogAttributes, 'id' | 'createdAt'>;

/** Sequelize model type for AuditLog */
export type AuditLogModel = ModelStatic<Model<AuditLogAttributes, AuditLogCreationAttributes>>;
