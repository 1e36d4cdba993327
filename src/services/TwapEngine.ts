/**
 * TWAP execution engine
 * Splits a total quantity into time-sliced chunks and executes them in order on schedule
 */

import { OrderIntent, OrderSnapshot, createOrderIntent, pendingRecord, toRecordStatus } from '../models/Order';
import { StrategyId, TwapChunk, TwapPlan } from '../models/Strategy';
import { ValidationError, createContext, errorMessage } from '../utils/ErrorHandler';
import { isAbortError, sleepUntil } from '../utils/Scheduler';
import { roundToStep, toFixedPrecision } from '../utils/quantization';
import { StrategyEngineDependencies } from './StrategyEngine';
import { StrategyHandle } from './StrategyRegistry';

export const MAX_TWAP_CHUNKS = 10;
export const TWAP_JITTER_RATIO = 0.3;

export interface TwapParams {
  symbol: string;
  side: string;
  totalQuantity: number;
  durationMinutes: number;
  priceLimit?: number;
  randomizeTiming?: boolean;
}

export interface TwapEngineOptions {
  /** Uniform source in [0, 1) used for timing jitter */
  random?: () => number;
}

export interface TwapExecution {
  plan: TwapPlan;
  /** Settles once the last chunk has run or the plan was cancelled; never rejects */
  completion: Promise<TwapPlan>;
}

export interface ChunkSchedule {
  nominalAt: number;
  scheduledAt: number;
}

const COMPONENT = 'TwapEngine';

/**
 * clamp(round(duration / 2), 1, 10)
 */
export function computeChunkCount(durationMinutes: number): number {
  return Math.min(MAX_TWAP_CHUNKS, Math.max(1, Math.round(durationMinutes / 2)));
}

/**
 * Splits a step-aligned total into chunkCount quantities. Every chunk but the
 * last gets total / chunkCount rounded to the nearest step; the last absorbs
 * the rounding drift so the quantities add up to the total. When that leaves
 * the last chunk empty or below minQty, the shares are rounded down instead.
 */
export function splitQuantity(totalQuantity: number, chunkCount: number, stepSize: number, minQty: number = 0): number[] {
  const nearest = roundToStep(totalQuantity / chunkCount, stepSize);
  const split = withRemainder(totalQuantity, chunkCount, stepSize, nearest);
  const last = split[split.length - 1];
  if (chunkCount === 1 || (last > 0 && last >= minQty)) {
    return split;
  }

  const totalSteps = Math.round(totalQuantity / stepSize);
  const floored = toFixedPrecision(Math.floor(totalSteps / chunkCount) * stepSize);
  return withRemainder(totalQuantity, chunkCount, stepSize, floored);
}

function withRemainder(totalQuantity: number, chunkCount: number, stepSize: number, baseQuantity: number): number[] {
  const quantities: number[] = [];
  for (let i = 0; i < chunkCount - 1; i++) {
    quantities.push(baseQuantity);
  }
  quantities.push(roundToStep(totalQuantity - baseQuantity * (chunkCount - 1), stepSize));
  return quantities;
}

/**
 * Nominal times at createdAt + i * interval; chunks after the first are
 * shifted by up to ±30% of the interval when randomizing.
 */
export function scheduleChunks(
  createdAt: number,
  chunkCount: number,
  intervalMs: number,
  randomize: boolean,
  random: () => number
): ChunkSchedule[] {
  const schedule: ChunkSchedule[] = [];
  for (let i = 0; i < chunkCount; i++) {
    const nominalAt = createdAt + i * intervalMs;
    const jitter = randomize && i > 0 ? (random() * 2 - 1) * TWAP_JITTER_RATIO * intervalMs : 0;
    schedule.push({ nominalAt, scheduledAt: nominalAt + jitter });
  }
  return schedule;
}

export class TwapEngine {
  private readonly random: () => number;
  private tasks: Map<StrategyId, { handle: StrategyHandle<'twap'>; completion: Promise<TwapPlan> }> = new Map();

  constructor(
    private readonly deps: StrategyEngineDependencies,
    options: TwapEngineOptions = {}
  ) {
    this.random = options.random ?? Math.random;
  }

  async createTwap(params: TwapParams): Promise<TwapExecution> {
    const { connector, validation, registry, auditService, scheduler } = this.deps;
    const symbol = await validation.requireSymbol(params.symbol);
    const side = validation.validateSide(params.side);
    const context = createContext(COMPONENT, 'createTwap', { symbol, metadata: { ...params } });

    if (!Number.isFinite(params.durationMinutes) || params.durationMinutes <= 0) {
      throw new ValidationError(`Duration must be positive, got ${params.durationMinutes}`, 'INVALID_DURATION', context);
    }
    if (params.priceLimit !== undefined) {
      validation.validatePositivePrice('Price limit', params.priceLimit);
    }

    const filters = await validation.validateQuantity(symbol, params.totalQuantity);
    const chunkCount = computeChunkCount(params.durationMinutes);
    const quantities = splitQuantity(params.totalQuantity, chunkCount, filters.stepSize, filters.minQty);

    if (quantities.some(quantity => quantity <= 0)) {
      throw new ValidationError(
        `Total quantity ${params.totalQuantity} is too small to split into ${chunkCount} chunks of step ${filters.stepSize}`,
        'INVALID_QUANTITY',
        context
      );
    }
    for (const quantity of new Set(quantities)) {
      await validation.validateQuantity(symbol, quantity, filters);
    }

    const referencePrice = params.priceLimit ?? (await connector.getCurrentPrice(symbol));
    const randomizeTiming = params.randomizeTiming ?? true;
    const intervalMs = (params.durationMinutes * 60000) / chunkCount;
    const createdAt = scheduler.now();
    const schedule = scheduleChunks(createdAt, chunkCount, intervalMs, randomizeTiming, this.random);

    const chunks: TwapChunk[] = quantities.map((quantity, index): TwapChunk => {
      const notional = toFixedPrecision(quantity * referencePrice, 2);
      const intent: OrderIntent =
        params.priceLimit !== undefined
          ? { symbol, side, orderKind: 'LIMIT', quantity, price: params.priceLimit, timeInForce: 'GTC' }
          : { symbol, side, orderKind: 'MARKET', quantity };
      return {
        chunkIndex: index + 1,
        quantity,
        nominalAt: schedule[index].nominalAt,
        scheduledAt: schedule[index].scheduledAt,
        notional,
        belowMinNotional: notional < filters.minNotional,
        status: 'PENDING',
        order: pendingRecord(intent)
      };
    });

    const plan: TwapPlan = {
      id: registry.createId('twap'),
      symbol,
      side,
      totalQuantity: toFixedPrecision(params.totalQuantity),
      durationMinutes: params.durationMinutes,
      chunkCount,
      intervalSeconds: toFixedPrecision(intervalMs / 1000, 3),
      priceLimit: params.priceLimit,
      randomizeTiming,
      chunks,
      executedQuantity: 0,
      status: 'ACTIVE',
      createdAt: new Date(createdAt)
    };

    for (const chunk of chunks.filter(candidate => candidate.belowMinNotional)) {
      auditService.warn(
        'WARNING',
        `Chunk ${chunk.chunkIndex} notional ${chunk.notional} is below minimum ${filters.minNotional}; the exchange may reject it`,
        { strategyId: plan.id, details: { chunkIndex: chunk.chunkIndex, quantity: chunk.quantity } }
      );
    }

    const handle = registry.register('twap', plan);
    auditService.info(
      'STRATEGY_CREATED',
      `TWAP created: ${side} ${plan.totalQuantity} ${symbol} in ${chunkCount} chunks every ${plan.intervalSeconds}s`,
      { strategyId: plan.id, details: { durationMinutes: plan.durationMinutes, priceLimit: plan.priceLimit, randomizeTiming } }
    );

    const completion = this.execute(handle);
    this.tasks.set(plan.id, { handle, completion });

    return { plan: handle.current(), completion };
  }

  /**
   * Stops after the chunk in flight; remaining chunks stay PENDING
   */
  async cancelTwap(id: StrategyId): Promise<TwapPlan | undefined> {
    const task = this.tasks.get(id);
    if (!task) {
      return undefined;
    }
    task.handle.release();
    return task.completion;
  }

  getTwap(id: StrategyId): TwapPlan | undefined {
    return this.deps.registry.getTyped('twap', id);
  }

  private async execute(handle: StrategyHandle<'twap'>): Promise<TwapPlan> {
    const { scheduler, auditService } = this.deps;

    try {
      const chunkCount = handle.current().chunks.length;
      for (let index = 0; index < chunkCount; index++) {
        await sleepUntil(scheduler, handle.current().chunks[index].scheduledAt, handle.signal);
        await this.executeChunk(handle, index);
      }

      const final = handle.update(current => {
        const executed = current.chunks.filter(chunk => chunk.status === 'EXECUTED');
        const prices = executed.flatMap(chunk => (chunk.executionPrice !== undefined ? [chunk.executionPrice] : []));
        const averagePrice =
          prices.length > 0 ? toFixedPrecision(prices.reduce((sum, price) => sum + price, 0) / prices.length) : undefined;
        return { ...current, status: executed.length > 0 ? 'COMPLETED' : 'FAILED', averagePrice };
      });

      auditService.record(
        'STRATEGY_FINISHED',
        `TWAP ${final.status}: executed ${final.executedQuantity}/${final.totalQuantity}` +
          (final.averagePrice !== undefined ? ` at average ${final.averagePrice}` : ''),
        { level: final.status === 'COMPLETED' ? 'info' : 'error', strategyId: final.id }
      );
      return final;
    } catch (error) {
      if (isAbortError(error)) {
        const cancelled = handle.update(current => ({ ...current, status: 'CANCELED' }));
        auditService.warn('STRATEGY_FINISHED', `TWAP cancelled after ${cancelled.executedQuantity}/${cancelled.totalQuantity}`, {
          strategyId: cancelled.id
        });
        return cancelled;
      }

      const failed = handle.update(current => ({ ...current, status: 'ERROR', lastError: errorMessage(error) }));
      this.deps.errorHandler.record(
        this.deps.errorHandler.normalize(error, createContext(COMPONENT, 'execute', { strategyId: failed.id, symbol: failed.symbol }))
      );
      auditService.error('STRATEGY_FINISHED', `TWAP execution error: ${errorMessage(error)}`, { strategyId: failed.id });
      return failed;
    } finally {
      handle.release();
      this.tasks.delete(handle.id);
    }
  }

  private async executeChunk(handle: StrategyHandle<'twap'>, index: number): Promise<void> {
    const { connector, auditService, errorHandler } = this.deps;
    const plan = handle.current();
    const chunk = plan.chunks[index];
    const intent = createOrderIntent(chunk.order.intent);

    let snapshot: OrderSnapshot;
    try {
      snapshot = await connector.submitOrder(intent);
    } catch (error) {
      errorHandler.record(
        errorHandler.normalize(error, createContext(COMPONENT, 'executeChunk', { strategyId: plan.id, symbol: plan.symbol }))
      );
      auditService.error('ORDER_FAILED', `TWAP chunk ${chunk.chunkIndex}/${plan.chunkCount} failed: ${errorMessage(error)}`, {
        strategyId: plan.id,
        details: { chunkIndex: chunk.chunkIndex, quantity: chunk.quantity }
      });
      this.replaceChunk(handle, index, current => ({
        ...current,
        status: 'FAILED',
        order: { ...current.order, status: 'FAILED', lastError: errorMessage(error) }
      }));
      return;
    }

    const executionPrice = await this.realizedPrice(plan.symbol, plan.priceLimit, snapshot);
    this.replaceChunk(handle, index, current => ({
      ...current,
      status: 'EXECUTED',
      executionPrice,
      order: { ...current.order, exchangeOrderId: snapshot.orderId, status: toRecordStatus(snapshot.status) }
    }));
    handle.update(current => ({
      ...current,
      executedQuantity: toFixedPrecision(current.executedQuantity + chunk.quantity)
    }));

    auditService.info(
      'ORDER_SUBMITTED',
      `TWAP chunk ${chunk.chunkIndex}/${plan.chunkCount} executed: ${plan.side} ${chunk.quantity} ${plan.symbol}` +
        (executionPrice !== undefined ? ` @ ${executionPrice}` : ''),
      { strategyId: plan.id, details: { chunkIndex: chunk.chunkIndex, orderId: snapshot.orderId, status: snapshot.status } }
    );
  }

  /**
   * Average fill price when reported, otherwise the market price for filled
   * or market orders and the limit price for resting ones
   */
  private async realizedPrice(symbol: string, priceLimit: number | undefined, snapshot: OrderSnapshot): Promise<number | undefined> {
    if (snapshot.averagePrice > 0) {
      return snapshot.averagePrice;
    }
    if (priceLimit !== undefined && snapshot.status !== 'FILLED') {
      return priceLimit;
    }
    try {
      return await this.deps.connector.getCurrentPrice(symbol);
    } catch (error) {
      this.deps.auditService.warn('WARNING', `Could not read ${symbol} price for chunk accounting: ${errorMessage(error)}`);
      return priceLimit;
    }
  }

  private replaceChunk(handle: StrategyHandle<'twap'>, index: number, mutator: (chunk: TwapChunk) => TwapChunk): void {
    handle.update(current => ({
      ...current,
      chunks: current.chunks.map((chunk, position) => (position === index ? mutator(chunk) : chunk))
    }));
  }
}
