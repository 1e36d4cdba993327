export * from './Order';
export * from './Strategy';
export * from './Market';
export * from './AuditEvent';
export * from './ConnectorStatus';
