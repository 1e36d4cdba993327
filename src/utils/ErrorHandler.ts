/**
 * Error taxonomy and recovery helpers for strategy execution
 * Validation and setup errors reach the caller; monitor errors are classified and counted
 */

import { Scheduler, SystemScheduler } from './Scheduler';

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

export enum ErrorCategory {
  NETWORK = 'network',
  AUTHENTICATION = 'authentication',
  VALIDATION = 'validation',
  BUSINESS_LOGIC = 'business_logic',
  SYSTEM = 'system',
  EXTERNAL_SERVICE = 'external_service'
}

export enum RecoveryStrategy {
  RETRY = 'retry',
  FAIL_FAST = 'fail_fast'
}

export interface ErrorContext {
  operation: string;
  component: string;
  strategyId?: string;
  symbol?: string;
  timestamp: Date;
  metadata?: Record<string, unknown>;
}

export interface RecoveryAction {
  strategy: RecoveryStrategy;
  maxAttempts?: number;
  backoffMs?: number;
}

export type ErrorHandlingResult<T> =
  | { success: true; result: T; recoveryAttempts: number }
  | { success: false; error: ApplicationError; recoveryAttempts: number };

export function createContext(
  component: string,
  operation: string,
  extra: Omit<ErrorContext, 'component' | 'operation' | 'timestamp'> = {}
): ErrorContext {
  return { component, operation, timestamp: new Date(), ...extra };
}

/**
 * Application error with category, severity and a user-facing summary
 */
export class ApplicationError extends Error {
  public readonly code: string;
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly context: ErrorContext;
  public readonly originalError?: Error;
  public readonly isRetryable: boolean;
  public readonly userMessage: string;
  public readonly technicalMessage: string;
  public readonly suggestedActions: string[];

  constructor(
    message: string,
    code: string,
    category: ErrorCategory,
    severity: ErrorSeverity,
    context: ErrorContext,
    options: {
      originalError?: Error;
      isRetryable?: boolean;
      userMessage?: string;
      suggestedActions?: string[];
    } = {}
  ) {
    super(message);
    this.name = 'ApplicationError';
    this.code = code;
    this.category = category;
    this.severity = severity;
    this.context = context;
    this.originalError = options.originalError;
    this.isRetryable = options.isRetryable ?? this.determineRetryability();
    this.technicalMessage = message;
    this.userMessage = options.userMessage ?? this.generateUserMessage();
    this.suggestedActions = options.suggestedActions ?? this.generateSuggestedActions();
  }

  private determineRetryability(): boolean {
    if (this.category === ErrorCategory.NETWORK) {
      return true;
    }
    if (this.category === ErrorCategory.SYSTEM && this.severity !== ErrorSeverity.CRITICAL) {
      return true;
    }
    return false;
  }

  private generateUserMessage(): string {
    switch (this.category) {
      case ErrorCategory.NETWORK:
        return `Could not reach the exchange: ${this.message}`;
      case ErrorCategory.AUTHENTICATION:
        return 'Authentication failed. Check BINANCE_API_KEY, BINANCE_SECRET_KEY and the testnet setting.';
      case ErrorCategory.VALIDATION:
        return `Invalid input: ${this.message}`;
      case ErrorCategory.BUSINESS_LOGIC:
        return `Operation refused: ${this.message}`;
      case ErrorCategory.EXTERNAL_SERVICE:
        return `Exchange rejected the request: ${this.message}`;
      case ErrorCategory.SYSTEM:
        return `Unexpected error: ${this.message}`;
      default:
        return this.message;
    }
  }

  private generateSuggestedActions(): string[] {
    switch (this.category) {
      case ErrorCategory.NETWORK:
        return ['Check your internet connection', 'Try again in a few moments'];
      case ErrorCategory.AUTHENTICATION:
        return ['Verify your API credentials', 'Make sure the key is enabled for futures trading'];
      case ErrorCategory.VALIDATION:
        return ['Check the symbol filters with the price command', 'Adjust the quantity or prices'];
      case ErrorCategory.EXTERNAL_SERVICE:
        return ['Check the order against the symbol filters', 'Check your available margin'];
      default:
        return [];
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      category: this.category,
      severity: this.severity,
      context: this.context,
      isRetryable: this.isRetryable,
      userMessage: this.userMessage,
      suggestedActions: this.suggestedActions
    };
  }
}

/**
 * Bad symbol, quantity, price or price ordering; raised before any order is sent
 */
export class ValidationError extends ApplicationError {
  constructor(message: string, code: string, context: ErrorContext) {
    super(message, code, ErrorCategory.VALIDATION, ErrorSeverity.LOW, context, { isRetryable: false });
    this.name = 'ValidationError';
  }
}

/**
 * The exchange refused a request (filters, margin, rate limit, unknown order)
 */
export class ExchangeRejectionError extends ApplicationError {
  public readonly exchangeCode?: number;

  constructor(message: string, context: ErrorContext, exchangeCode?: number, code: string = 'EXCHANGE_REJECTION') {
    super(message, code, ErrorCategory.EXTERNAL_SERVICE, ErrorSeverity.MEDIUM, context, { isRetryable: false });
    this.name = 'ExchangeRejectionError';
    this.exchangeCode = exchangeCode;
  }
}

/**
 * Network failure or server-side error while talking to the exchange
 */
export class TransientQueryError extends ApplicationError {
  constructor(message: string, context: ErrorContext, originalError?: Error) {
    super(message, 'TRANSIENT_QUERY_ERROR', ErrorCategory.NETWORK, ErrorSeverity.MEDIUM, context, {
      originalError,
      isRetryable: true
    });
    this.name = 'TransientQueryError';
  }
}

/**
 * Exchange connectivity could not be established; nothing may start
 */
export class FatalSetupError extends ApplicationError {
  constructor(message: string, context: ErrorContext, originalError?: Error) {
    super(message, 'FATAL_SETUP_ERROR', ErrorCategory.SYSTEM, ErrorSeverity.CRITICAL, context, {
      originalError,
      isRetryable: false,
      userMessage: `Cannot start the strategy bot: ${message}`,
      suggestedActions: ['Verify your API credentials', 'Check that the exchange endpoint is reachable']
    });
    this.name = 'FatalSetupError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Classifies errors, keeps per-code counters and retries recoverable operations
 */
export class ErrorHandler {
  private recoveryStrategies: Map<string, RecoveryAction> = new Map();
  private errorMetrics: Map<string, { count: number; lastOccurrence: Date }> = new Map();

  constructor(private readonly scheduler: Scheduler = new SystemScheduler()) {
    this.initializeDefaultStrategies();
  }

  /**
   * Runs an operation, retrying retryable failures with exponential backoff
   */
  async handleError<T>(
    operation: () => Promise<T>,
    context: ErrorContext,
    recoveryAction?: RecoveryAction
  ): Promise<ErrorHandlingResult<T>> {
    const strategy = recoveryAction ?? this.getRecoveryStrategy(context.operation);
    const maxAttempts = strategy.maxAttempts ?? 3;
    let recoveryAttempts = 0;

    for (;;) {
      try {
        const result = await operation();
        return { success: true, result, recoveryAttempts };
      } catch (error) {
        recoveryAttempts++;
        const wrapped = this.normalize(error, context);
        this.record(wrapped);

        const canRetry =
          strategy.strategy === RecoveryStrategy.RETRY &&
          wrapped.isRetryable &&
          recoveryAttempts < maxAttempts;

        if (!canRetry) {
          return { success: false, error: wrapped, recoveryAttempts };
        }

        await this.scheduler.sleep(this.calculateBackoffDelay(recoveryAttempts, strategy.backoffMs ?? 1000));
      }
    }
  }

  /**
   * Wraps raw errors into ApplicationError, guessing the category from the message
   */
  normalize(error: unknown, context: ErrorContext): ApplicationError {
    if (error instanceof ApplicationError) {
      return error;
    }

    let category = ErrorCategory.SYSTEM;
    let severity = ErrorSeverity.MEDIUM;
    let code = 'UNKNOWN_ERROR';
    let isRetryable = false;

    if (error instanceof Error) {
      const message = error.message.toLowerCase();

      if (message.includes('network') || message.includes('timeout') || message.includes('econn') || message.includes('fetch failed')) {
        category = ErrorCategory.NETWORK;
        code = 'NETWORK_ERROR';
        isRetryable = true;
      } else if (message.includes('api-key') || message.includes('signature') || message.includes('permission')) {
        category = ErrorCategory.AUTHENTICATION;
        code = 'AUTHENTICATION_ERROR';
        severity = ErrorSeverity.HIGH;
      } else if (message.includes('invalid') || message.includes('must be')) {
        category = ErrorCategory.VALIDATION;
        code = 'VALIDATION_ERROR';
        severity = ErrorSeverity.LOW;
      } else if (message.includes('margin') || message.includes('balance') || message.includes('reduceonly')) {
        category = ErrorCategory.BUSINESS_LOGIC;
        code = 'BUSINESS_LOGIC_ERROR';
      }
    }

    return new ApplicationError(errorMessage(error), code, category, severity, context, {
      originalError: error instanceof Error ? error : undefined,
      isRetryable
    });
  }

  /**
   * Counts an error occurrence under category:code
   */
  record(error: ApplicationError): void {
    const key = `${error.category}:${error.code}`;
    const existing = this.errorMetrics.get(key) ?? { count: 0, lastOccurrence: new Date() };
    this.errorMetrics.set(key, { count: existing.count + 1, lastOccurrence: new Date() });
  }

  getErrorMetrics(): Map<string, { count: number; lastOccurrence: Date }> {
    return new Map(this.errorMetrics);
  }

  getErrorCount(category: ErrorCategory, code: string): number {
    return this.errorMetrics.get(`${category}:${code}`)?.count ?? 0;
  }

  registerRecoveryStrategy(operation: string, action: RecoveryAction): void {
    this.recoveryStrategies.set(operation, action);
  }

  private calculateBackoffDelay(attempt: number, baseDelay: number): number {
    const maxDelay = 30000;
    const jitter = Math.random() * 0.1;
    const delay = Math.min(baseDelay * Math.pow(2, attempt - 1), maxDelay);
    return delay * (1 + jitter);
  }

  private getRecoveryStrategy(operation: string): RecoveryAction {
    return this.recoveryStrategies.get(operation) ?? {
      strategy: RecoveryStrategy.FAIL_FAST,
      maxAttempts: 1
    };
  }

  private initializeDefaultStrategies(): void {
    // Connectivity check at startup
    this.recoveryStrategies.set('authenticate', {
      strategy: RecoveryStrategy.RETRY,
      maxAttempts: 3,
      backoffMs: 1000
    });
  }
}
