import { randomBytes } from 'crypto';
import { AuditEvent, AuditEventType, AuditLevel } from '../models/AuditEvent';
import { Logger, createSilentLogger } from '../utils/logger';

export interface AuditEntryOptions {
  level?: AuditLevel;
  strategyId?: string;
  venueId?: string;
  details?: Record<string, unknown>;
}

export interface AuditQuery {
  eventType?: AuditEventType;
  strategyId?: string;
  since?: Date;
}

export interface AuditServiceOptions {
  /** Events kept in memory; the oldest are dropped first. The logger keeps the full history. */
  maxEvents?: number;
}

export const DEFAULT_MAX_AUDIT_EVENTS = 10000;

const SENSITIVE_KEYS = ['apikey', 'secret', 'signature', 'password', 'token', 'credential'];

/**
 * Execution log: every validation outcome, order submission, fill and error
 * is written to the leveled logger, and the most recent events are kept in
 * memory for queries
 */
export class AuditService {
  private auditLog: AuditEvent[] = [];
  private readonly logger: Logger;
  private readonly maxEvents: number;

  constructor(logger?: Logger, options: AuditServiceOptions = {}) {
    this.logger = logger ?? createSilentLogger();
    this.maxEvents = Math.max(1, Math.floor(options.maxEvents ?? DEFAULT_MAX_AUDIT_EVENTS));
  }

  record(eventType: AuditEventType, message: string, options: AuditEntryOptions = {}): string {
    const event: AuditEvent = {
      eventId: randomBytes(8).toString('hex'),
      timestamp: new Date(),
      level: options.level ?? 'info',
      eventType,
      message,
      strategyId: options.strategyId,
      venueId: options.venueId,
      details: this.redactSensitiveData(options.details ?? {})
    };

    this.auditLog.push(event);
    if (this.auditLog.length > this.maxEvents) {
      this.auditLog.splice(0, this.auditLog.length - this.maxEvents);
    }

    const prefix = event.strategyId ? `[${event.strategyId}] ` : '';
    this.logger.log(event.level, `${prefix}${message}`);

    return event.eventId;
  }

  info(eventType: AuditEventType, message: string, options: Omit<AuditEntryOptions, 'level'> = {}): string {
    return this.record(eventType, message, { ...options, level: 'info' });
  }

  warn(eventType: AuditEventType, message: string, options: Omit<AuditEntryOptions, 'level'> = {}): string {
    return this.record(eventType, message, { ...options, level: 'warn' });
  }

  error(eventType: AuditEventType, message: string, options: Omit<AuditEntryOptions, 'level'> = {}): string {
    return this.record(eventType, message, { ...options, level: 'error' });
  }

  /**
   * Returns copies of the recorded events matching the query
   */
  getEvents(query: AuditQuery = {}): AuditEvent[] {
    return this.auditLog
      .filter(event => {
        if (query.eventType && event.eventType !== query.eventType) return false;
        if (query.strategyId && event.strategyId !== query.strategyId) return false;
        if (query.since && event.timestamp < query.since) return false;
        return true;
      })
      .map(event => ({ ...event, details: { ...event.details } }));
  }

  private redactSensitiveData(data: Record<string, unknown>): Record<string, unknown> {
    const redacted: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(data)) {
      const lowerKey = key.toLowerCase();

      if (SENSITIVE_KEYS.some(sensitiveKey => lowerKey.includes(sensitiveKey))) {
        redacted[key] = '[REDACTED]';
      } else if (isPlainRecord(value)) {
        redacted[key] = this.redactSensitiveData(value);
      } else if (Array.isArray(value)) {
        redacted[key] = value.map(item => (isPlainRecord(item) ? this.redactSensitiveData(item) : item));
      } else {
        redacted[key] = value;
      }
    }

    return redacted;
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}
