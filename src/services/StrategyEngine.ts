/**
 * Collaborators and monitor helpers shared by the grid, TWAP and OCO engines
 */

import { IExchangeConnector } from '../connectors/ExchangeConnector';
import { ErrorHandler, createContext, errorMessage } from '../utils/ErrorHandler';
import { Scheduler, isAbortError } from '../utils/Scheduler';
import { AuditService } from './AuditService';
import { StrategyRegistry } from './StrategyRegistry';
import { ValidationService } from './ValidationService';

export interface StrategyEngineDependencies {
  connector: IExchangeConnector;
  validation: ValidationService;
  registry: StrategyRegistry;
  auditService: AuditService;
  errorHandler: ErrorHandler;
  scheduler: Scheduler;
}

/**
 * Sleeps one polling interval. Resolves false when the strategy was cancelled.
 */
export async function waitForNextCycle(scheduler: Scheduler, intervalMs: number, signal: AbortSignal): Promise<boolean> {
  try {
    await scheduler.sleep(intervalMs, signal);
    return !signal.aborted;
  } catch (error) {
    if (isAbortError(error)) {
      return false;
    }
    throw error;
  }
}

/**
 * Logs and counts an error raised inside a monitor loop; the loop carries on
 */
export function recordMonitorError(
  deps: Pick<StrategyEngineDependencies, 'auditService' | 'errorHandler'>,
  component: string,
  operation: string,
  strategyId: string,
  symbol: string,
  error: unknown
): void {
  const wrapped = deps.errorHandler.normalize(error, createContext(component, operation, { strategyId, symbol }));
  deps.errorHandler.record(wrapped);
  deps.auditService.warn('MONITOR_ERROR', `${operation} failed, retrying next cycle: ${errorMessage(error)}`, {
    strategyId,
    details: { symbol, code: wrapped.code }
  });
}
