/**
 * Futures strategy bot - library entry point
 * Grid, TWAP and OCO execution on USD-M futures
 */

export * from './models';
export * from './utils/ErrorHandler';
export * from './utils/quantization';
export * from './utils/Scheduler';
export * from './utils/logger';
export * from './config/ConfigurationManager';
export * from './connectors/ExchangeConnector';
export * from './connectors/exchanges/BinanceFuturesConnector';
export * from './services/AuditService';
export * from './services/ValidationService';
export * from './services/StrategyRegistry';
export * from './services/StrategyEngine';
export * from './services/GridEngine';
export * from './services/TwapEngine';
export * from './services/OcoEngine';
export * from './services/OrderService';
export * from './services/AccountService';
export * from './services/StrategyBot';

export const APP_VERSION = '1.0.0';
export const APP_NAME = 'Futures Strategy Bot';
