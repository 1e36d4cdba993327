import { describe, it, expect, beforeEach } from 'vitest';
import * as fc from 'fast-check';
import { TwapEngine, computeChunkCount, scheduleChunks, splitQuantity } from './TwapEngine';
import { AuditService } from './AuditService';
import { StrategyRegistry } from './StrategyRegistry';
import { ValidationService } from './ValidationService';
import { FakeExchangeConnector, rejection } from '../testing/FakeExchangeConnector';
import { ErrorHandler } from '../utils/ErrorHandler';
import { ManualScheduler, flushAsync } from '../testing/ManualScheduler';
import { isStepAligned } from '../utils/quantization';

const INTERVAL_MS = 180000;

describe('TwapEngine', () => {
  let connector: FakeExchangeConnector;
  let scheduler: ManualScheduler;
  let auditService: AuditService;
  let registry: StrategyRegistry;
  let engine: TwapEngine;

  const createEngine = (random: () => number = () => 0.5) =>
    new TwapEngine(
      {
        connector,
        validation: new ValidationService(connector, auditService),
        registry,
        auditService,
        errorHandler: new ErrorHandler(),
        scheduler
      },
      { random }
    );

  beforeEach(() => {
    connector = new FakeExchangeConnector();
    scheduler = new ManualScheduler(0);
    auditService = new AuditService();
    registry = new StrategyRegistry(() => scheduler.now());
    engine = createEngine();
  });

  const tenChunks = (overrides: { priceLimit?: number; randomizeTiming?: boolean } = {}) =>
    engine.createTwap({
      symbol: 'BTCUSDT',
      side: 'buy',
      totalQuantity: 0.01,
      durationMinutes: 30,
      randomizeTiming: false,
      ...overrides
    });

  describe('Property-Based Tests', () => {
    it('splits a quantity into positive step-aligned chunks that add up to the total', () => {
      fc.assert(
        fc.property(fc.integer({ min: 1, max: 10 }), fc.integer({ min: 0, max: 10000 }), (chunkCount, extraSteps) => {
          const totalSteps = chunkCount + extraSteps;
          const total = Number((totalSteps * 0.001).toFixed(3));
          const quantities = splitQuantity(total, chunkCount, 0.001);

          expect(quantities).toHaveLength(chunkCount);
          expect(quantities.reduce((sum, quantity) => sum + quantity, 0)).toBeCloseTo(total, 9);
          for (const quantity of quantities) {
            expect(quantity).toBeGreaterThan(0);
            expect(isStepAligned(quantity, 0, 0.001)).toBe(true);
          }
          expect(new Set(quantities.slice(0, -1)).size).toBeLessThanOrEqual(1);
        }),
        { numRuns: 200 }
      );
    });

    it('keeps jittered chunks within 30% of their slot and in order', () => {
      fc.assert(
        fc.property(
          fc.integer({ min: 1, max: 10 }),
          fc.integer({ min: 1000, max: 600000 }),
          fc.array(fc.double({ min: 0, max: 1, maxExcluded: true, noNaN: true }), { minLength: 10, maxLength: 10 }),
          (chunkCount, intervalMs, draws) => {
            let draw = 0;
            const schedule = scheduleChunks(5000, chunkCount, intervalMs, true, () => draws[draw++]);

            expect(schedule[0]).toEqual({ nominalAt: 5000, scheduledAt: 5000 });
            schedule.forEach((slot, index) => {
              expect(slot.nominalAt).toBe(5000 + index * intervalMs);
              expect(Math.abs(slot.scheduledAt - slot.nominalAt)).toBeLessThanOrEqual(0.3 * intervalMs + 1e-6);
              if (index > 0) {
                expect(slot.scheduledAt).toBeGreaterThan(schedule[index - 1].scheduledAt);
              }
            });
          }
        ),
        { numRuns: 200 }
      );
    });
  });

  describe('planning helpers', () => {
    it('uses one chunk per two minutes, between 1 and 10', () => {
      expect(computeChunkCount(0.5)).toBe(1);
      expect(computeChunkCount(1)).toBe(1);
      expect(computeChunkCount(3)).toBe(2);
      expect(computeChunkCount(5)).toBe(3);
      expect(computeChunkCount(30)).toBe(10);
      expect(computeChunkCount(100)).toBe(10);
    });

    it('rounds each share to the nearest step and gives the drift to the last chunk', () => {
      expect(splitQuantity(0.01, 10, 0.001)).toEqual([0.001, 0.001, 0.001, 0.001, 0.001, 0.001, 0.001, 0.001, 0.001, 0.001]);
      expect(splitQuantity(0.011, 3, 0.001)).toEqual([0.004, 0.004, 0.003]);
      expect(splitQuantity(0.019, 10, 0.001)).toEqual([0.002, 0.002, 0.002, 0.002, 0.002, 0.002, 0.002, 0.002, 0.002, 0.001]);
    });

    it('rounds shares down when rounding up would empty the last chunk', () => {
      expect(splitQuantity(0.017, 10, 0.001)).toEqual([0.001, 0.001, 0.001, 0.001, 0.001, 0.001, 0.001, 0.001, 0.001, 0.008]);
    });

    it('rounds shares down when the last chunk would fall below the minimum quantity', () => {
      expect(splitQuantity(0.011, 3, 0.001, 0.004)).toEqual([0.003, 0.003, 0.005]);
    });

    it('schedules exactly on the interval without randomization', () => {
      expect(scheduleChunks(0, 3, 1000, false, () => 0)).toEqual([
        { nominalAt: 0, scheduledAt: 0 },
        { nominalAt: 1000, scheduledAt: 1000 },
        { nominalAt: 2000, scheduledAt: 2000 }
      ]);
    });

    it('shifts later chunks by the jitter draw', () => {
      expect(scheduleChunks(0, 3, 1000, true, () => 0)).toEqual([
        { nominalAt: 0, scheduledAt: 0 },
        { nominalAt: 1000, scheduledAt: 700 },
        { nominalAt: 2000, scheduledAt: 1700 }
      ]);
    });
  });

  describe('createTwap', () => {
    it('plans 0.01 over 30 minutes as ten 0.001 chunks every 180 seconds', async () => {
      const { plan } = await tenChunks();

      expect(plan).toMatchObject({
        symbol: 'BTCUSDT',
        side: 'BUY',
        totalQuantity: 0.01,
        chunkCount: 10,
        intervalSeconds: 180,
        randomizeTiming: false,
        executedQuantity: 0,
        status: 'ACTIVE'
      });
      expect(plan.chunks.map(chunk => chunk.quantity)).toEqual(Array(10).fill(0.001));
      expect(plan.chunks.map(chunk => chunk.scheduledAt)).toEqual(plan.chunks.map((_, index) => index * INTERVAL_MS));
      expect(plan.chunks[0]).toMatchObject({ chunkIndex: 1, notional: 45, belowMinNotional: true, status: 'PENDING' });
      expect(plan.chunks[0].order.intent).toEqual({ symbol: 'BTCUSDT', side: 'BUY', orderKind: 'MARKET', quantity: 0.001 });
    });

    it('warns once per chunk below the minimum notional', async () => {
      const { plan } = await tenChunks();

      const warnings = auditService.getEvents({ eventType: 'WARNING', strategyId: plan.id });
      expect(warnings).toHaveLength(10);
      expect(warnings[0].message).toBe('Chunk 1 notional 45 is below minimum 100; the exchange may reject it');
    });

    it('uses resting limit orders at the price limit', async () => {
      const { plan } = await tenChunks({ priceLimit: 44000 });

      expect(plan.chunks[0].order.intent).toEqual({
        symbol: 'BTCUSDT',
        side: 'BUY',
        orderKind: 'LIMIT',
        quantity: 0.001,
        price: 44000,
        timeInForce: 'GTC'
      });
      expect(plan.chunks[0].notional).toBe(44);
      expect(connector.callCount('getCurrentPrice')).toBe(0);
    });

    it('applies timing jitter by default', async () => {
      engine = createEngine(() => 1);
      const { plan } = await engine.createTwap({ symbol: 'BTCUSDT', side: 'SELL', totalQuantity: 0.01, durationMinutes: 30 });

      expect(plan.randomizeTiming).toBe(true);
      expect(plan.chunks[0].scheduledAt).toBe(0);
      expect(plan.chunks[1].scheduledAt).toBe(INTERVAL_MS + 0.3 * INTERVAL_MS);
    });

    it('rejects bad input', async () => {
      await expect(
        engine.createTwap({ symbol: 'BTCUSDT', side: 'BUY', totalQuantity: 0.01, durationMinutes: 0 })
      ).rejects.toThrow('Duration must be positive, got 0');
      await expect(
        engine.createTwap({ symbol: 'BTCUSDT', side: 'BUY', totalQuantity: 0.001, durationMinutes: 30 })
      ).rejects.toThrow('Total quantity 0.001 is too small to split into 10 chunks of step 0.001');
      await expect(
        engine.createTwap({ symbol: 'BTCUSDT', side: 'HOLD', totalQuantity: 0.01, durationMinutes: 30 })
      ).rejects.toMatchObject({ code: 'INVALID_SIDE' });
      await expect(
        engine.createTwap({ symbol: 'BTCUSDT', side: 'BUY', totalQuantity: 0.01, durationMinutes: 30, priceLimit: 0 })
      ).rejects.toMatchObject({ code: 'INVALID_PRICE' });

      expect(registry.size()).toBe(0);
    });
  });

  describe('execution', () => {
    it('executes every chunk on schedule and completes', async () => {
      const { plan, completion } = await tenChunks();

      await flushAsync();
      expect(connector.submitted).toHaveLength(1);

      await scheduler.advance(INTERVAL_MS - 1);
      expect(connector.submitted).toHaveLength(1);

      await scheduler.advance(1);
      expect(connector.submitted).toHaveLength(2);
      expect(engine.getTwap(plan.id)?.executedQuantity).toBe(0.002);

      await scheduler.advance(INTERVAL_MS * 8);
      const final = await completion;

      expect(final.status).toBe('COMPLETED');
      expect(final.executedQuantity).toBe(0.01);
      expect(final.averagePrice).toBe(45000);
      expect(final.chunks.every(chunk => chunk.status === 'EXECUTED' && chunk.order.status === 'FILLED')).toBe(true);
      expect(engine.getTwap(plan.id)).toBeUndefined();
    });

    it('averages execution prices with equal weight', async () => {
      const { completion } = await engine.createTwap({
        symbol: 'BTCUSDT',
        side: 'BUY',
        totalQuantity: 0.002,
        durationMinutes: 4,
        randomizeTiming: false
      });

      await flushAsync();
      connector.setPrice('BTCUSDT', 46000);
      await scheduler.advance(120000);

      const final = await completion;
      expect(final.chunks.map(chunk => chunk.executionPrice)).toEqual([45000, 46000]);
      expect(final.averagePrice).toBe(45500);
    });

    it('values resting limit chunks at the price limit', async () => {
      const { completion } = await tenChunks({ priceLimit: 44000 });
      await scheduler.advance(INTERVAL_MS * 9);

      const final = await completion;
      expect(final.status).toBe('COMPLETED');
      expect(final.averagePrice).toBe(44000);
      expect(final.chunks[0].order.status).toBe('PLACED');
    });

    it('continues past a failed chunk', async () => {
      connector.failOn('submitOrder', rejection('Margin is insufficient.', -2019));
      const { completion } = await tenChunks();
      await scheduler.advance(INTERVAL_MS * 9);

      const final = await completion;
      expect(final.status).toBe('COMPLETED');
      expect(final.executedQuantity).toBe(0.009);
      expect(final.chunks[0]).toMatchObject({ status: 'FAILED' });
      expect(final.chunks[0].order.lastError).toBe('Margin is insufficient.');
      expect(auditService.getEvents({ eventType: 'ORDER_FAILED' })[0].message).toBe(
        'TWAP chunk 1/10 failed: Margin is insufficient.'
      );
    });

    it('fails when no chunk executes', async () => {
      connector.failAlways('submitOrder', rejection('Margin is insufficient.', -2019));
      const { completion } = await tenChunks();
      await scheduler.advance(INTERVAL_MS * 9);

      const final = await completion;
      expect(final.status).toBe('FAILED');
      expect(final.executedQuantity).toBe(0);
      expect(final.averagePrice).toBeUndefined();
    });

    it('stops on cancel and leaves the rest pending', async () => {
      const { plan, completion } = await tenChunks();
      await flushAsync();

      const cancelled = await engine.cancelTwap(plan.id);

      expect(cancelled?.status).toBe('CANCELED');
      expect(cancelled?.executedQuantity).toBe(0.001);
      expect(cancelled?.chunks.filter(chunk => chunk.status === 'PENDING')).toHaveLength(9);
      await expect(completion).resolves.toBe(cancelled);
      expect(registry.size()).toBe(0);
      expect(scheduler.pendingCount()).toBe(0);
    });

    it('returns undefined when cancelling an unknown plan', async () => {
      await expect(engine.cancelTwap('twap_missing')).resolves.toBeUndefined();
    });
  });
});
