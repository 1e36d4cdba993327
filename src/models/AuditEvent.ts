/**
 * Execution log event model
 */

export type AuditLevel = 'debug' | 'info' | 'warn' | 'error';

export type AuditEventType =
  | 'VALIDATION_PASSED'
  | 'VALIDATION_FAILED'
  | 'ORDER_SUBMITTED'
  | 'ORDER_FAILED'
  | 'ORDER_FILLED'
  | 'ORDER_CANCELED'
  | 'ORDER_STATUS'
  | 'CANCEL_FAILED'
  | 'STRATEGY_CREATED'
  | 'STRATEGY_FINISHED'
  | 'MONITOR_ERROR'
  | 'EXCHANGE_AUTH_SUCCESS'
  | 'EXCHANGE_AUTH_FAILURE'
  | 'ACCOUNT_QUERY'
  | 'WARNING';

export interface AuditEvent {
  eventId: string;
  timestamp: Date;
  level: AuditLevel;
  eventType: AuditEventType;
  message: string;
  strategyId?: string;
  venueId?: string;
  details: Record<string, unknown>;
}
