/**
 * Strategy bot bootstrap
 * Verifies exchange connectivity once, then exposes the engines and order services
 */

import { ExchangeCredentials, IExchangeConnector } from '../connectors/ExchangeConnector';
import { BinanceFuturesConnector } from '../connectors/exchanges/BinanceFuturesConnector';
import { BotConfig } from '../config/ConfigurationManager';
import {
  ErrorHandler,
  ExchangeRejectionError,
  FatalSetupError,
  RecoveryAction,
  createContext
} from '../utils/ErrorHandler';
import { Logger, createLogger } from '../utils/logger';
import { Scheduler, SystemScheduler } from '../utils/Scheduler';
import { AccountService } from './AccountService';
import { AuditService } from './AuditService';
import { GridEngine } from './GridEngine';
import { OcoEngine } from './OcoEngine';
import { OrderService } from './OrderService';
import { StrategyRegistry } from './StrategyRegistry';
import { TwapEngine } from './TwapEngine';
import { ValidationService } from './ValidationService';

export interface StrategyBotOptions {
  config: BotConfig;
  logger?: Logger;
  connector?: IExchangeConnector;
  scheduler?: Scheduler;
  /** Jitter source for TWAP schedules */
  random?: () => number;
  /** Retry policy for the startup connectivity check */
  authRecovery?: RecoveryAction;
}

export class StrategyBot {
  readonly auditService: AuditService;
  readonly errorHandler: ErrorHandler;
  readonly registry: StrategyRegistry;
  readonly connector: IExchangeConnector;
  readonly validation: ValidationService;
  readonly orders: OrderService;
  readonly account: AccountService;
  readonly grid: GridEngine;
  readonly twap: TwapEngine;
  readonly oco: OcoEngine;

  private readonly config: BotConfig;
  private readonly authRecovery?: RecoveryAction;
  private initialized = false;

  constructor(options: StrategyBotOptions) {
    this.config = options.config;
    this.authRecovery = options.authRecovery;

    const logger = options.logger ?? createLogger({ level: options.config.logging.level, logFile: options.config.logging.file });
    const scheduler = options.scheduler ?? new SystemScheduler();

    this.auditService = new AuditService(logger);
    this.errorHandler = new ErrorHandler(scheduler);
    this.registry = new StrategyRegistry(() => scheduler.now());
    this.connector =
      options.connector ??
      new BinanceFuturesConnector({
        testnet: options.config.exchange.testnet,
        baseUrl: options.config.exchange.baseUrl,
        recvWindowMs: options.config.exchange.recvWindowMs,
        requestTimeoutMs: options.config.exchange.requestTimeoutMs,
        auditService: this.auditService,
        scheduler
      });

    this.validation = new ValidationService(this.connector, this.auditService);
    this.orders = new OrderService(this.connector, this.validation, this.auditService, this.errorHandler);
    this.account = new AccountService(this.connector, this.auditService);

    const deps = {
      connector: this.connector,
      validation: this.validation,
      registry: this.registry,
      auditService: this.auditService,
      errorHandler: this.errorHandler,
      scheduler
    };
    this.grid = new GridEngine(deps, { pollIntervalMs: options.config.strategies.gridPollIntervalMs });
    this.twap = new TwapEngine(deps, { random: options.random });
    this.oco = new OcoEngine(deps, { pollIntervalMs: options.config.strategies.ocoPollIntervalMs });
  }

  static async start(options: StrategyBotOptions): Promise<StrategyBot> {
    const bot = new StrategyBot(options);
    await bot.initialize();
    return bot;
  }

  /**
   * Authenticates against the exchange; nothing may run until this succeeds
   */
  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    const credentials: ExchangeCredentials = {
      apiKey: this.config.exchange.apiKey,
      secret: this.config.exchange.secretKey
    };
    const context = createContext('StrategyBot', 'authenticate');

    const outcome = await this.errorHandler.handleError(
      async () => {
        const accepted = await this.connector.authenticate(credentials);
        if (!accepted) {
          throw new ExchangeRejectionError('Exchange rejected the API credentials', context, undefined, 'AUTHENTICATION_REJECTED');
        }
        return accepted;
      },
      context,
      this.authRecovery
    );

    if (!outcome.success) {
      this.auditService.error('EXCHANGE_AUTH_FAILURE', `Failed to connect to exchange: ${outcome.error.message}`);
      throw new FatalSetupError(`Failed to connect to exchange: ${outcome.error.message}`, context, outcome.error);
    }

    this.initialized = true;
    this.auditService.info('EXCHANGE_AUTH_SUCCESS', 'Bot initialized successfully');
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  /**
   * Signals every running strategy to stop; resting orders stay on the book
   */
  stopAll(): number {
    const stopped = this.registry.removeAll();
    if (stopped > 0) {
      this.auditService.warn('STRATEGY_FINISHED', `Stopped ${stopped} running strategies`);
    }
    return stopped;
  }
}
