/**
 * OCO bracket engine
 * Places a reduce-only take-profit / stop-loss pair and cancels the sibling when one leg fills
 */

import { OrderRecord, OrderSide, OrderSnapshot, createOrderIntent, pendingRecord, toRecordStatus } from '../models/Order';
import { OcoPair, OcoResolution, PositionSide, StrategyId } from '../models/Strategy';
import {
  ApplicationError,
  ErrorCategory,
  ErrorContext,
  ErrorSeverity,
  ValidationError,
  createContext,
  errorMessage
} from '../utils/ErrorHandler';
import { roundToStep, roundToTick } from '../utils/quantization';
import { StrategyEngineDependencies, recordMonitorError, waitForNextCycle } from './StrategyEngine';
import { StrategyHandle } from './StrategyRegistry';

export interface OcoParams {
  symbol: string;
  quantity: number;
  takeProfitPrice: number;
  stopLossPrice: number;
  positionSide: string;
}

export interface OcoEngineOptions {
  pollIntervalMs?: number;
}

export interface OcoExecution {
  pair: OcoPair;
  /** Settles with the final record once the pair resolves or is cancelled */
  monitor: Promise<OcoPair>;
}

export interface CancelOcoOptions {
  cancelOrders?: boolean;
}

type Leg = 'takeProfit' | 'stopLoss';

const COMPONENT = 'OcoEngine';

/**
 * The take-profit leg was placed but the stop-loss leg was not.
 * The take-profit order is still on the book; the caller decides whether to cancel it.
 */
export class OcoPlacementError extends ApplicationError {
  public readonly takeProfitOrderId: string;

  constructor(message: string, context: ErrorContext, takeProfitOrderId: string, originalError?: Error) {
    super(message, 'OCO_PLACEMENT_FAILED', ErrorCategory.EXTERNAL_SERVICE, ErrorSeverity.HIGH, context, {
      originalError,
      isRetryable: false,
      suggestedActions: [`Cancel take-profit order ${takeProfitOrderId} if it should not stay open`]
    });
    this.name = 'OcoPlacementError';
    this.takeProfitOrderId = takeProfitOrderId;
  }
}

/**
 * Both legs close the position: SELL for a long, BUY for a short
 */
export function closingSide(positionSide: PositionSide): OrderSide {
  return positionSide === 'LONG' ? 'SELL' : 'BUY';
}

/**
 * LONG needs TP > current > SL, SHORT needs TP < current < SL
 */
export function validateOcoPrices(
  positionSide: PositionSide,
  takeProfitPrice: number,
  stopLossPrice: number,
  currentPrice: number
): void {
  const context = createContext(COMPONENT, 'validateOcoPrices', {
    metadata: { positionSide, takeProfitPrice, stopLossPrice, currentPrice }
  });

  if (positionSide === 'LONG') {
    if (takeProfitPrice <= currentPrice) {
      throw new ValidationError(`Take profit price (${takeProfitPrice}) must be above current price (${currentPrice}) for LONG position`, 'INVALID_PRICE_ORDER', context);
    }
    if (stopLossPrice >= currentPrice) {
      throw new ValidationError(`Stop loss price (${stopLossPrice}) must be below current price (${currentPrice}) for LONG position`, 'INVALID_PRICE_ORDER', context);
    }
    return;
  }

  if (takeProfitPrice >= currentPrice) {
    throw new ValidationError(`Take profit price (${takeProfitPrice}) must be below current price (${currentPrice}) for SHORT position`, 'INVALID_PRICE_ORDER', context);
  }
  if (stopLossPrice <= currentPrice) {
    throw new ValidationError(`Stop loss price (${stopLossPrice}) must be above current price (${currentPrice}) for SHORT position`, 'INVALID_PRICE_ORDER', context);
  }
}

export class OcoEngine {
  private readonly pollIntervalMs: number;
  private tasks: Map<StrategyId, { handle: StrategyHandle<'oco'>; monitor: Promise<OcoPair>; cancelOrders: boolean }> =
    new Map();

  constructor(
    private readonly deps: StrategyEngineDependencies,
    options: OcoEngineOptions = {}
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? 30000;
  }

  async createOco(params: OcoParams): Promise<OcoExecution> {
    const { connector, validation, registry, auditService, errorHandler, scheduler } = this.deps;
    const symbol = await validation.requireSymbol(params.symbol);
    const positionSide = validation.validatePositionSide(params.positionSide);
    validation.validatePositivePrice('Take profit price', params.takeProfitPrice);
    validation.validatePositivePrice('Stop loss price', params.stopLossPrice);

    const filters = await validation.validateQuantity(symbol, params.quantity);
    const quantity = roundToStep(params.quantity, filters.stepSize);
    const takeProfitPrice = roundToTick(params.takeProfitPrice, filters.tickSize);
    const stopLossPrice = roundToTick(params.stopLossPrice, filters.tickSize);

    const referencePrice = await connector.getCurrentPrice(symbol);
    try {
      validateOcoPrices(positionSide, takeProfitPrice, stopLossPrice, referencePrice);
    } catch (error) {
      auditService.error('VALIDATION_FAILED', `OCO price check failed: ${errorMessage(error)}`, {
        details: { symbol, positionSide, takeProfitPrice, stopLossPrice, referencePrice }
      });
      throw error;
    }

    const id = registry.createId('oco');
    const side = closingSide(positionSide);
    const takeProfitIntent = createOrderIntent({
      symbol,
      side,
      orderKind: 'LIMIT',
      quantity,
      price: takeProfitPrice,
      timeInForce: 'GTC',
      reduceOnly: true
    });
    const stopLossIntent = createOrderIntent({
      symbol,
      side,
      orderKind: 'STOP_MARKET',
      quantity,
      stopPrice: stopLossPrice,
      reduceOnly: true
    });

    auditService.info(
      'ORDER_SUBMITTED',
      `Placing OCO orders for ${positionSide} position: TP ${takeProfitPrice}, SL ${stopLossPrice}, qty ${quantity}`,
      { strategyId: id, details: { symbol, referencePrice } }
    );

    const takeProfitSnapshot = await connector.submitOrder(takeProfitIntent).catch((error: unknown) => {
      errorHandler.record(errorHandler.normalize(error, createContext(COMPONENT, 'submitTakeProfit', { strategyId: id, symbol })));
      auditService.error('ORDER_FAILED', `OCO take profit order failed: ${errorMessage(error)}`, { strategyId: id });
      throw error;
    });

    let stopLossSnapshot: OrderSnapshot;
    try {
      stopLossSnapshot = await connector.submitOrder(stopLossIntent);
    } catch (error) {
      const context = createContext(COMPONENT, 'submitStopLoss', { strategyId: id, symbol });
      errorHandler.record(errorHandler.normalize(error, context));
      auditService.error(
        'ORDER_FAILED',
        `OCO stop loss order failed; take profit ${takeProfitSnapshot.orderId} is still open: ${errorMessage(error)}`,
        { strategyId: id, details: { takeProfitOrderId: takeProfitSnapshot.orderId } }
      );
      throw new OcoPlacementError(
        `Stop loss order failed: ${errorMessage(error)}`,
        context,
        takeProfitSnapshot.orderId,
        error instanceof Error ? error : undefined
      );
    }

    const pair: OcoPair = {
      id,
      symbol,
      quantity,
      positionSide,
      referencePrice,
      takeProfit: this.placedRecord(takeProfitIntent, takeProfitSnapshot),
      stopLoss: this.placedRecord(stopLossIntent, stopLossSnapshot),
      status: 'ACTIVE',
      cancellationFailures: 0,
      createdAt: new Date(scheduler.now())
    };

    const handle = registry.register('oco', pair);
    auditService.info(
      'STRATEGY_CREATED',
      `OCO created: TP order ${takeProfitSnapshot.orderId}, SL order ${stopLossSnapshot.orderId}`,
      { strategyId: id, details: { symbol, positionSide, quantity } }
    );

    const task = { handle, monitor: Promise.resolve(pair), cancelOrders: false };
    task.monitor = this.runMonitor(task);
    this.tasks.set(id, task);

    return { pair: handle.current(), monitor: task.monitor };
  }

  /**
   * Stops watching the pair, optionally cancelling both legs
   */
  async cancelOco(id: StrategyId, options: CancelOcoOptions = {}): Promise<OcoPair | undefined> {
    const task = this.tasks.get(id);
    if (!task) {
      return undefined;
    }
    task.cancelOrders = options.cancelOrders ?? false;
    task.handle.release();
    return task.monitor;
  }

  getOco(id: StrategyId): OcoPair | undefined {
    return this.deps.registry.getTyped('oco', id);
  }

  private placedRecord(intent: OrderRecord['intent'], snapshot: OrderSnapshot): OrderRecord {
    return { ...pendingRecord(intent), exchangeOrderId: snapshot.orderId, status: toRecordStatus(snapshot.status) };
  }

  private async runMonitor(task: { handle: StrategyHandle<'oco'>; cancelOrders: boolean }): Promise<OcoPair> {
    const { handle } = task;
    const { scheduler, auditService } = this.deps;

    try {
      while (handle.current().status === 'ACTIVE') {
        if (!(await waitForNextCycle(scheduler, this.pollIntervalMs, handle.signal))) {
          break;
        }
        await this.pollLegs(handle);
      }

      if (handle.current().status === 'ACTIVE') {
        if (task.cancelOrders) {
          await this.cancelLeg(handle, 'takeProfit');
          await this.cancelLeg(handle, 'stopLoss');
        }
        const cancelled = handle.update(current => ({ ...current, status: 'CANCELED' }));
        auditService.warn('STRATEGY_FINISHED', 'OCO monitoring stopped before either leg filled', { strategyId: cancelled.id });
        return cancelled;
      }
      return handle.current();
    } catch (error) {
      const pair = handle.current();
      recordMonitorError(this.deps, COMPONENT, 'monitor', pair.id, pair.symbol, error);
      return handle.update(current => ({ ...current, status: 'CANCELED' }));
    } finally {
      handle.release();
      this.tasks.delete(handle.id);
    }
  }

  /**
   * One polling cycle: the first observed fill cancels the other leg and resolves the pair
   */
  private async pollLegs(handle: StrategyHandle<'oco'>): Promise<void> {
    const { connector } = this.deps;
    const pair = handle.current();
    const takeProfitId = pair.takeProfit.exchangeOrderId;
    const stopLossId = pair.stopLoss.exchangeOrderId;
    if (takeProfitId === undefined || stopLossId === undefined) {
      return;
    }

    let takeProfit: OrderSnapshot;
    let stopLoss: OrderSnapshot;
    try {
      takeProfit = await connector.getOrderStatus(pair.symbol, takeProfitId);
      stopLoss = await connector.getOrderStatus(pair.symbol, stopLossId);
    } catch (error) {
      recordMonitorError(this.deps, COMPONENT, 'getOrderStatus', pair.id, pair.symbol, error);
      return;
    }

    const takeProfitStatus = toRecordStatus(takeProfit.status);
    const stopLossStatus = toRecordStatus(stopLoss.status);
    handle.update(current => ({
      ...current,
      takeProfit: { ...current.takeProfit, status: takeProfitStatus },
      stopLoss: { ...current.stopLoss, status: stopLossStatus }
    }));

    if (takeProfitStatus === 'FILLED') {
      await this.cancelLeg(handle, 'stopLoss');
      this.resolve(handle, 'TAKE_PROFIT_FILLED', 'Take profit filled');
    } else if (stopLossStatus === 'FILLED') {
      await this.cancelLeg(handle, 'takeProfit');
      this.resolve(handle, 'STOP_LOSS_FILLED', 'Stop loss filled');
    } else if (takeProfitStatus === 'CANCELED' && stopLossStatus === 'CANCELED') {
      this.resolve(handle, 'EXTERNALLY_CANCELED', 'Both orders cancelled externally');
    }
  }

  /**
   * Best-effort cancel; a failure is counted on the pair and logged, never thrown
   */
  private async cancelLeg(handle: StrategyHandle<'oco'>, leg: Leg): Promise<void> {
    const { connector, auditService, errorHandler } = this.deps;
    const pair = handle.current();
    const record = pair[leg];
    const label = leg === 'takeProfit' ? 'take profit' : 'stop loss';
    if (record.exchangeOrderId === undefined || record.status !== 'PLACED') {
      return;
    }

    try {
      await connector.cancelOrder(pair.symbol, record.exchangeOrderId);
      handle.update(current =>
        leg === 'takeProfit'
          ? { ...current, takeProfit: { ...current.takeProfit, status: 'CANCELED' } }
          : { ...current, stopLoss: { ...current.stopLoss, status: 'CANCELED' } }
      );
      auditService.info('ORDER_CANCELED', `Cancelled ${label} order ${record.exchangeOrderId}`, { strategyId: pair.id });
    } catch (error) {
      errorHandler.record(
        errorHandler.normalize(error, createContext(COMPONENT, 'cancelLeg', { strategyId: pair.id, symbol: pair.symbol }))
      );
      const updated = handle.update(current => ({ ...current, cancellationFailures: current.cancellationFailures + 1 }));
      auditService.warn(
        'CANCEL_FAILED',
        `Could not cancel ${label} order ${record.exchangeOrderId} (may already be closed): ${errorMessage(error)}`,
        { strategyId: pair.id, details: { cancellationFailures: updated.cancellationFailures } }
      );
    }
  }

  private resolve(handle: StrategyHandle<'oco'>, resolution: OcoResolution, message: string): void {
    const resolved = handle.update(current => ({ ...current, status: 'RESOLVED', resolution }));
    this.deps.auditService.info('STRATEGY_FINISHED', `OCO resolved: ${message}`, {
      strategyId: resolved.id,
      details: { resolution, cancellationFailures: resolved.cancellationFailures }
    });
  }
}
