/**
 * Exchange Connector interface and base implementation
 * Every strategy engine talks to the exchange through IExchangeConnector only
 */

import { OrderIntent, OrderSnapshot } from '../models/Order';
import { AccountInfo, ExchangeSymbol, OpenOrder, Position, SymbolFilters } from '../models/Market';
import { CircuitBreakerState, ConnectorStatus } from '../models/ConnectorStatus';
import {
  ApplicationError,
  ErrorCategory,
  ErrorSeverity,
  TransientQueryError,
  createContext,
  errorMessage
} from '../utils/ErrorHandler';
import { Scheduler, SystemScheduler } from '../utils/Scheduler';

export interface ExchangeCredentials {
  apiKey: string;
  secret: string;
}

/**
 * Standardized interface for futures exchange connectors
 */
export interface IExchangeConnector {
  /**
   * Verifies the credentials against a signed endpoint and keeps them for later calls
   */
  authenticate(credentials: ExchangeCredentials): Promise<boolean>;

  /**
   * Verifies connector operational status
   */
  healthCheck(): Promise<boolean>;

  getStatus(): ConnectorStatus;

  /**
   * Freshly fetched symbol metadata, null when the exchange does not list it
   */
  getExchangeSymbol(symbol: string): Promise<ExchangeSymbol | null>;

  getSymbolFilters(symbol: string): Promise<SymbolFilters>;

  getCurrentPrice(symbol: string): Promise<number>;

  submitOrder(intent: OrderIntent): Promise<OrderSnapshot>;

  getOrderStatus(symbol: string, orderId: string): Promise<OrderSnapshot>;

  cancelOrder(symbol: string, orderId: string): Promise<OrderSnapshot>;

  getAccountInfo(): Promise<AccountInfo>;

  getOpenPositions(symbol?: string): Promise<Position[]>;

  getOpenOrders(symbol?: string): Promise<OpenOrder[]>;
}

export interface CircuitBreakerConfig {
  failureThreshold: number;
  recoveryTimeout: number;
  monitoringPeriod: number;
}

export interface RateLimiterConfig {
  requestsPerSecond: number;
}

export interface RetryConfig {
  maxRetries: number;
  baseDelay: number;
  maxDelay: number;
  backoffMultiplier: number;
}

export interface ConnectorOptions {
  circuitBreaker?: Partial<CircuitBreakerConfig>;
  rateLimiter?: Partial<RateLimiterConfig>;
  retry?: Partial<RetryConfig>;
  scheduler?: Scheduler;
}

const DEFAULT_CIRCUIT_BREAKER: CircuitBreakerConfig = {
  failureThreshold: 5,
  recoveryTimeout: 60000,
  monitoringPeriod: 300000
};

const DEFAULT_RATE_LIMITER: RateLimiterConfig = {
  requestsPerSecond: 10
};

const DEFAULT_RETRY: RetryConfig = {
  maxRetries: 2,
  baseDelay: 500,
  maxDelay: 5000,
  backoffMultiplier: 2
};

export interface ProtectionOptions {
  /** Safe to repeat; order submission and cancellation never are */
  idempotent: boolean;
}

/**
 * Base exchange connector with circuit breaker, rate limiting and retries for reads
 */
export abstract class BaseExchangeConnector implements IExchangeConnector {
  protected readonly connectorId: string;
  protected readonly name: string;
  protected readonly scheduler: Scheduler;
  protected credentials?: ExchangeCredentials;
  protected isAuthenticated: boolean = false;

  private circuitBreakerState: CircuitBreakerState = 'closed';
  private failureCount: number = 0;
  private lastFailureTime: number = 0;
  private readonly circuitBreakerConfig: CircuitBreakerConfig;

  private requestTimes: number[] = [];
  private readonly rateLimiterConfig: RateLimiterConfig;

  private readonly retryConfig: RetryConfig;

  private lastHealthCheck: Date = new Date();
  private latency: number = 0;
  private errorRate: number = 0;
  private recentErrors: number[] = [];
  private recentRequests: number[] = [];

  constructor(connectorId: string, name: string, options: ConnectorOptions = {}) {
    this.connectorId = connectorId;
    this.name = name;
    this.scheduler = options.scheduler ?? new SystemScheduler();
    this.circuitBreakerConfig = { ...DEFAULT_CIRCUIT_BREAKER, ...options.circuitBreaker };
    this.rateLimiterConfig = { ...DEFAULT_RATE_LIMITER, ...options.rateLimiter };
    this.retryConfig = { ...DEFAULT_RETRY, ...options.retry };
  }

  /**
   * Executes a request behind the circuit breaker and rate limiter.
   * Only idempotent requests are retried, and only on retryable errors.
   */
  protected async executeWithProtection<T>(
    operation: () => Promise<T>,
    operationName: string,
    options: ProtectionOptions
  ): Promise<T> {
    if (!this.isCircuitBreakerClosed()) {
      throw new TransientQueryError(
        `Circuit breaker is ${this.circuitBreakerState} for ${this.name}`,
        createContext(this.name, operationName)
      );
    }

    await this.applyRateLimit();

    const maxRetries = options.idempotent ? this.retryConfig.maxRetries : 0;
    let attempt = 0;

    for (;;) {
      const startTime = this.scheduler.now();
      try {
        const result = await operation();
        this.latency = this.scheduler.now() - startTime;
        this.recordSuccess();
        return result;
      } catch (error) {
        const wrapped = this.toApplicationError(error, operationName);
        if (wrapped.isRetryable) {
          this.recordFailure();
        }

        if (!wrapped.isRetryable || attempt >= maxRetries) {
          throw wrapped;
        }

        const delay = Math.min(
          this.retryConfig.baseDelay * Math.pow(this.retryConfig.backoffMultiplier, attempt),
          this.retryConfig.maxDelay
        );
        attempt++;
        await this.scheduler.sleep(delay);
      }
    }
  }

  private toApplicationError(error: unknown, operationName: string): ApplicationError {
    if (error instanceof ApplicationError) {
      return error;
    }
    return new TransientQueryError(
      `${operationName} failed: ${errorMessage(error)}`,
      createContext(this.name, operationName),
      error instanceof Error ? error : undefined
    );
  }

  private isCircuitBreakerClosed(): boolean {
    switch (this.circuitBreakerState) {
      case 'closed':
        return true;
      case 'open':
        if (this.scheduler.now() - this.lastFailureTime > this.circuitBreakerConfig.recoveryTimeout) {
          this.circuitBreakerState = 'half-open';
          return true;
        }
        return false;
      case 'half-open':
        return true;
      default:
        return false;
    }
  }

  private recordSuccess(): void {
    this.failureCount = 0;
    if (this.circuitBreakerState === 'half-open') {
      this.circuitBreakerState = 'closed';
    }
  }

  private recordFailure(): void {
    const now = this.scheduler.now();
    this.failureCount++;
    this.lastFailureTime = now;

    if (this.circuitBreakerState === 'half-open' || this.failureCount >= this.circuitBreakerConfig.failureThreshold) {
      this.circuitBreakerState = 'open';
    }

    this.recentErrors.push(now);
    this.cleanupOldSamples();
    this.updateErrorRate();
  }

  private async applyRateLimit(): Promise<void> {
    const now = this.scheduler.now();
    this.requestTimes = this.requestTimes.filter(time => now - time < 1000);

    if (this.requestTimes.length >= this.rateLimiterConfig.requestsPerSecond) {
      const oldestRequest = Math.min(...this.requestTimes);
      const waitTime = 1000 - (now - oldestRequest);
      if (waitTime > 0) {
        await this.scheduler.sleep(waitTime);
      }
    }

    const sentAt = this.scheduler.now();
    this.requestTimes.push(sentAt);
    this.recentRequests.push(sentAt);
  }

  private cleanupOldSamples(): void {
    const cutoff = this.scheduler.now() - this.circuitBreakerConfig.monitoringPeriod;
    this.recentErrors = this.recentErrors.filter(time => time > cutoff);
    this.recentRequests = this.recentRequests.filter(time => time > cutoff);
  }

  private updateErrorRate(): void {
    const totalRequests = this.recentRequests.length;
    this.errorRate = totalRequests > 0 ? Math.min(1, this.recentErrors.length / totalRequests) : 0;
  }

  abstract authenticate(credentials: ExchangeCredentials): Promise<boolean>;
  abstract getExchangeSymbol(symbol: string): Promise<ExchangeSymbol | null>;
  abstract getSymbolFilters(symbol: string): Promise<SymbolFilters>;
  abstract getCurrentPrice(symbol: string): Promise<number>;
  abstract submitOrder(intent: OrderIntent): Promise<OrderSnapshot>;
  abstract getOrderStatus(symbol: string, orderId: string): Promise<OrderSnapshot>;
  abstract cancelOrder(symbol: string, orderId: string): Promise<OrderSnapshot>;
  abstract getAccountInfo(): Promise<AccountInfo>;
  abstract getOpenPositions(symbol?: string): Promise<Position[]>;
  abstract getOpenOrders(symbol?: string): Promise<OpenOrder[]>;

  async healthCheck(): Promise<boolean> {
    const startTime = this.scheduler.now();
    try {
      const isHealthy = await this.performHealthCheck();
      this.lastHealthCheck = new Date(this.scheduler.now());
      this.latency = this.scheduler.now() - startTime;
      return isHealthy;
    } catch {
      this.recordFailure();
      return false;
    }
  }

  /**
   * Connector-specific connectivity check
   */
  protected abstract performHealthCheck(): Promise<boolean>;

  protected abstract getBaseUrl(): string;

  getStatus(): ConnectorStatus {
    let status: ConnectorStatus['status'];

    if (this.circuitBreakerState === 'open') {
      status = 'offline';
    } else if (this.circuitBreakerState === 'half-open' || this.errorRate > 0.1) {
      status = 'degraded';
    } else {
      status = 'healthy';
    }

    return {
      connectorId: this.connectorId,
      name: this.name,
      baseUrl: this.getBaseUrl(),
      authenticated: this.isAuthenticated,
      status,
      circuitState: this.circuitBreakerState,
      lastHealthCheck: this.lastHealthCheck,
      latency: this.latency,
      errorRate: this.errorRate
    };
  }

  protected validateCredentials(credentials: ExchangeCredentials): void {
    if (!credentials.apiKey || !credentials.secret) {
      throw new ApplicationError(
        'Invalid credentials: API key and secret are required',
        'INVALID_CREDENTIALS',
        ErrorCategory.AUTHENTICATION,
        ErrorSeverity.HIGH,
        createContext(this.name, 'authenticate'),
        { isRetryable: false }
      );
    }
  }

  /**
   * Returns the stored credentials, failing when authenticate() has not succeeded
   */
  protected requireCredentials(operationName: string): ExchangeCredentials {
    if (!this.isAuthenticated || !this.credentials) {
      throw new ApplicationError(
        `${this.name} connector is not authenticated`,
        'NOT_AUTHENTICATED',
        ErrorCategory.AUTHENTICATION,
        ErrorSeverity.HIGH,
        createContext(this.name, operationName),
        { isRetryable: false }
      );
    }
    return this.credentials;
  }
}
