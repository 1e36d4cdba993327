/**
 * Connector health models
 */

export type ConnectorHealthStatus = 'healthy' | 'degraded' | 'offline';
export type CircuitBreakerState = 'closed' | 'open' | 'half-open';

export interface ConnectorStatus {
  connectorId: string;
  name: string;
  baseUrl: string;
  authenticated: boolean;
  status: ConnectorHealthStatus;
  circuitState: CircuitBreakerState;
  lastHealthCheck: Date;
  latency: number;
  errorRate: number;
}
