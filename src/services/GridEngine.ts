/**
 * Grid trading engine
 * Lays a ladder of resting LIMIT orders across a price range and watches them fill
 */

import { OrderRecord, OrderSide, OrderSnapshot, createOrderIntent, pendingRecord, toRecordStatus } from '../models/Order';
import { GridLevel, GridPlacementSummary, GridStrategy, GridTrade, StrategyId } from '../models/Strategy';
import {
  ExchangeRejectionError,
  ValidationError,
  createContext,
  errorMessage
} from '../utils/ErrorHandler';
import { roundToStep, roundToTick, toFixedPrecision } from '../utils/quantization';
import { StrategyEngineDependencies, recordMonitorError, waitForNextCycle } from './StrategyEngine';
import { StrategyHandle } from './StrategyRegistry';

export interface GridParams {
  symbol: string;
  lowPrice: number;
  highPrice: number;
  levelCount: number;
  quantityPerLevel: number;
}

export interface GridEngineOptions {
  pollIntervalMs?: number;
}

export interface GridExecution {
  strategy: GridStrategy;
  summary: GridPlacementSummary;
  /** Settles with the final record once the monitor ends */
  monitor: Promise<GridStrategy>;
}

export interface GridRung {
  levelIndex: number;
  price: number;
  /** null when the rung sits within half a spacing of the reference price */
  side: OrderSide | null;
}

export interface GridLadder {
  spacing: number;
  rungs: GridRung[];
}

export interface StopGridOptions {
  cancelOpenOrders?: boolean;
}

interface GridTask {
  handle: StrategyHandle<'grid'>;
  monitor: Promise<GridStrategy>;
  cancelOpenOrders: boolean;
}

const COMPONENT = 'GridEngine';

/**
 * Equally spaced, tick-quantized prices from low to high, classified against the reference
 */
export function computeGridLadder(
  lowPrice: number,
  highPrice: number,
  levelCount: number,
  tickSize: number,
  referencePrice: number
): GridLadder {
  const spacing = (highPrice - lowPrice) / (levelCount - 1);
  const rungs: GridRung[] = [];

  for (let i = 0; i < levelCount; i++) {
    const price = roundToTick(lowPrice + i * spacing, tickSize);
    let side: OrderSide | null;
    if (Math.abs(price - referencePrice) < spacing / 2) {
      side = null;
    } else {
      side = price < referencePrice ? 'BUY' : 'SELL';
    }
    rungs.push({ levelIndex: i + 1, price, side });
  }

  return { spacing, rungs };
}

export class GridEngine {
  private readonly pollIntervalMs: number;
  private tasks: Map<StrategyId, GridTask> = new Map();

  constructor(
    private readonly deps: StrategyEngineDependencies,
    options: GridEngineOptions = {}
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? 60000;
  }

  async createGrid(params: GridParams): Promise<GridExecution> {
    const { connector, validation, registry, auditService, scheduler } = this.deps;
    const symbol = await validation.requireSymbol(params.symbol);
    const context = createContext(COMPONENT, 'createGrid', { symbol, metadata: { ...params } });

    validation.validatePositivePrice('Low price', params.lowPrice);
    validation.validatePositivePrice('High price', params.highPrice);
    if (params.lowPrice >= params.highPrice) {
      throw new ValidationError('Low range must be less than high range', 'INVALID_PRICE_RANGE', context);
    }
    if (!Number.isInteger(params.levelCount) || params.levelCount < 2) {
      throw new ValidationError('Grid must have at least 2 levels', 'INVALID_LEVEL_COUNT', context);
    }

    const filters = await validation.validateQuantity(symbol, params.quantityPerLevel);
    const quantity = roundToStep(params.quantityPerLevel, filters.stepSize);

    const referencePrice = await connector.getCurrentPrice(symbol);
    if (!(params.lowPrice < referencePrice && referencePrice < params.highPrice)) {
      throw new ValidationError(
        `Current price (${referencePrice}) must be within grid range (${params.lowPrice}, ${params.highPrice})`,
        'REFERENCE_OUT_OF_RANGE',
        context
      );
    }

    const ladder = computeGridLadder(params.lowPrice, params.highPrice, params.levelCount, filters.tickSize, referencePrice);
    if (ladder.spacing < filters.tickSize) {
      throw new ValidationError(
        `Grid spacing ${ladder.spacing} is smaller than the tick size ${filters.tickSize}`,
        'GRID_SPACING_TOO_SMALL',
        context
      );
    }

    const id = registry.createId('grid');
    const summary: GridPlacementSummary = { placedBuy: 0, placedSell: 0, failed: [], skipped: 0 };
    const levels: GridLevel[] = [];
    const skippedLevels: number[] = [];
    const executedTrades: GridTrade[] = [];

    for (const rung of ladder.rungs) {
      if (rung.side === null) {
        skippedLevels.push(rung.levelIndex);
        summary.skipped++;
        continue;
      }

      const notional = rung.price * quantity;
      if (notional < filters.minNotional) {
        auditService.warn('WARNING', `Level ${rung.levelIndex} notional ${toFixedPrecision(notional, 2)} is below minimum ${filters.minNotional}`, {
          strategyId: id,
          details: { levelIndex: rung.levelIndex, price: rung.price, quantity }
        });
      }

      const order = await this.placeLevel(id, symbol, rung.levelIndex, rung.side, rung.price, quantity);
      levels.push({ levelIndex: rung.levelIndex, price: rung.price, quantity, side: rung.side, order });

      if (order.status === 'FAILED') {
        summary.failed.push({ levelIndex: rung.levelIndex, price: rung.price, error: order.lastError ?? 'unknown error' });
        continue;
      }
      if (rung.side === 'BUY') {
        summary.placedBuy++;
      } else {
        summary.placedSell++;
      }
      if (order.status === 'FILLED') {
        executedTrades.push({
          levelIndex: rung.levelIndex,
          side: rung.side,
          price: rung.price,
          quantity,
          filledAt: new Date(scheduler.now())
        });
      }
    }

    if (summary.placedBuy + summary.placedSell === 0) {
      auditService.error('STRATEGY_FINISHED', `Grid ${id} placed no orders`, {
        strategyId: id,
        details: { failed: summary.failed }
      });
      throw new ExchangeRejectionError(
        `Failed to place grid orders: ${summary.failed.map(f => `level ${f.levelIndex}: ${f.error}`).join('; ')}`,
        createContext(COMPONENT, 'createGrid', { strategyId: id, symbol, metadata: { failed: summary.failed } }),
        undefined,
        'GRID_PLACEMENT_FAILED'
      );
    }

    const strategy: GridStrategy = {
      id,
      symbol,
      lowPrice: params.lowPrice,
      highPrice: params.highPrice,
      levelCount: params.levelCount,
      quantityPerLevel: quantity,
      spacing: toFixedPrecision(ladder.spacing),
      referencePrice,
      levels,
      skippedLevels,
      executedTrades,
      status: 'ACTIVE',
      createdAt: new Date(scheduler.now())
    };

    const handle = registry.register('grid', strategy);
    auditService.info(
      'STRATEGY_CREATED',
      `Grid strategy created: ${summary.placedBuy} buy, ${summary.placedSell} sell, ${summary.failed.length} failed, ${summary.skipped} skipped`,
      { strategyId: id, details: { symbol, spacing: strategy.spacing, referencePrice } }
    );

    const task: GridTask = { handle, monitor: Promise.resolve(strategy), cancelOpenOrders: false };
    task.monitor = this.runMonitor(task);
    this.tasks.set(id, task);

    return { strategy: handle.current(), summary, monitor: task.monitor };
  }

  /**
   * Stops the monitor. Resting orders stay on the book unless cancelOpenOrders is set.
   */
  async stopGrid(id: StrategyId, options: StopGridOptions = {}): Promise<GridStrategy | undefined> {
    const task = this.tasks.get(id);
    if (!task) {
      return undefined;
    }
    task.cancelOpenOrders = options.cancelOpenOrders ?? false;
    task.handle.release();
    return task.monitor;
  }

  getGrid(id: StrategyId): GridStrategy | undefined {
    return this.deps.registry.getTyped('grid', id);
  }

  private async placeLevel(
    strategyId: StrategyId,
    symbol: string,
    levelIndex: number,
    side: OrderSide,
    price: number,
    quantity: number
  ): Promise<OrderRecord> {
    const { connector, auditService, errorHandler } = this.deps;
    const intent = createOrderIntent({ symbol, side, orderKind: 'LIMIT', quantity, price, timeInForce: 'GTC' });

    try {
      const snapshot = await connector.submitOrder(intent);
      auditService.info('ORDER_SUBMITTED', `Grid ${side.toLowerCase()} order placed: ${snapshot.orderId} at ${price}`, {
        strategyId,
        details: { levelIndex, orderId: snapshot.orderId, price, quantity }
      });
      return { intent, exchangeOrderId: snapshot.orderId, status: toRecordStatus(snapshot.status) };
    } catch (error) {
      errorHandler.record(errorHandler.normalize(error, createContext(COMPONENT, 'placeLevel', { strategyId, symbol })));
      auditService.error('ORDER_FAILED', `Grid ${side.toLowerCase()} order failed at ${price}: ${errorMessage(error)}`, {
        strategyId,
        details: { levelIndex, price, quantity }
      });
      return { ...pendingRecord(intent), status: 'FAILED', lastError: errorMessage(error) };
    }
  }

  private async runMonitor(task: GridTask): Promise<GridStrategy> {
    const { handle } = task;
    const { scheduler } = this.deps;

    try {
      while (handle.current().status === 'ACTIVE') {
        if (!(await waitForNextCycle(scheduler, this.pollIntervalMs, handle.signal))) {
          break;
        }
        await this.pollLevels(handle);
        if (!handle.current().levels.some(level => level.order.status === 'PLACED')) {
          break;
        }
      }

      if (task.cancelOpenOrders) {
        await this.cancelRestingOrders(handle);
      }
      return this.finish(handle);
    } catch (error) {
      const grid = handle.current();
      recordMonitorError(this.deps, COMPONENT, 'monitor', grid.id, grid.symbol, error);
      return this.finish(handle);
    } finally {
      handle.release();
      this.tasks.delete(handle.id);
    }
  }

  /**
   * One polling cycle over every level that is still resting
   */
  private async pollLevels(handle: StrategyHandle<'grid'>): Promise<void> {
    const { connector, auditService, scheduler } = this.deps;
    const grid = handle.current();

    for (const level of grid.levels) {
      const orderId = level.order.exchangeOrderId;
      if (level.order.status !== 'PLACED' || orderId === undefined) {
        continue;
      }

      let snapshot: OrderSnapshot;
      try {
        snapshot = await connector.getOrderStatus(grid.symbol, orderId);
      } catch (error) {
        recordMonitorError(this.deps, COMPONENT, 'getOrderStatus', grid.id, grid.symbol, error);
        continue;
      }

      const status = toRecordStatus(snapshot.status);
      if (status === 'PLACED') {
        continue;
      }

      const filledAt = new Date(scheduler.now());
      handle.update(current => {
        const levels = current.levels.map((candidate): GridLevel =>
          candidate.levelIndex === level.levelIndex
            ? { ...candidate, order: { ...candidate.order, status } }
            : candidate
        );
        const executedTrades =
          status === 'FILLED'
            ? [
                ...current.executedTrades,
                {
                  levelIndex: level.levelIndex,
                  side: level.side,
                  price: snapshot.averagePrice > 0 ? snapshot.averagePrice : level.price,
                  quantity: snapshot.executedQuantity > 0 ? snapshot.executedQuantity : level.quantity,
                  filledAt
                }
              ]
            : current.executedTrades;
        return { ...current, levels, executedTrades };
      });

      if (status === 'FILLED') {
        auditService.info('ORDER_FILLED', `Grid ${level.side.toLowerCase()} order filled at ${level.price}`, {
          strategyId: grid.id,
          details: { levelIndex: level.levelIndex, orderId }
        });
      } else {
        auditService.warn('ORDER_CANCELED', `Grid order ${orderId} at ${level.price} is ${snapshot.status}`, {
          strategyId: grid.id,
          details: { levelIndex: level.levelIndex, orderId }
        });
      }
    }
  }

  private async cancelRestingOrders(handle: StrategyHandle<'grid'>): Promise<void> {
    const { connector, auditService, errorHandler } = this.deps;
    const grid = handle.current();

    for (const level of grid.levels) {
      const orderId = level.order.exchangeOrderId;
      if (level.order.status !== 'PLACED' || orderId === undefined) {
        continue;
      }
      try {
        await connector.cancelOrder(grid.symbol, orderId);
        handle.update(current => ({
          ...current,
          levels: current.levels.map((candidate): GridLevel =>
            candidate.levelIndex === level.levelIndex
              ? { ...candidate, order: { ...candidate.order, status: 'CANCELED' } }
              : candidate
          )
        }));
        auditService.info('ORDER_CANCELED', `Grid order ${orderId} at ${level.price} cancelled`, {
          strategyId: grid.id,
          details: { levelIndex: level.levelIndex }
        });
      } catch (error) {
        errorHandler.record(errorHandler.normalize(error, createContext(COMPONENT, 'cancelOrder', { strategyId: grid.id })));
        auditService.warn('CANCEL_FAILED', `Could not cancel grid order ${orderId}: ${errorMessage(error)}`, {
          strategyId: grid.id,
          details: { levelIndex: level.levelIndex }
        });
      }
    }
  }

  private finish(handle: StrategyHandle<'grid'>): GridStrategy {
    const final = handle.update(current => ({ ...current, status: 'STOPPED' }));
    const resting = final.levels.filter(level => level.order.status === 'PLACED').length;
    this.deps.auditService.info(
      'STRATEGY_FINISHED',
      `Grid stopped: ${final.executedTrades.length} trades executed, ${resting} orders left on the book`,
      { strategyId: final.id }
    );
    return final;
  }
}
