import { describe, it, expect, beforeEach } from 'vitest';
import * as fc from 'fast-check';
import { OrderService } from './OrderService';
import { AuditService } from './AuditService';
import { ValidationService } from './ValidationService';
import { FakeExchangeConnector, rejection } from '../testing/FakeExchangeConnector';
import { ErrorCategory, ErrorHandler } from '../utils/ErrorHandler';

describe('OrderService', () => {
  let connector: FakeExchangeConnector;
  let auditService: AuditService;
  let errorHandler: ErrorHandler;
  let service: OrderService;

  beforeEach(() => {
    connector = new FakeExchangeConnector();
    auditService = new AuditService();
    errorHandler = new ErrorHandler();
    service = new OrderService(connector, new ValidationService(connector, auditService), auditService, errorHandler);
  });

  describe('Property-Based Tests', () => {
    it('always submits limit prices on the tick grid', async () => {
      await fc.assert(
        fc.asyncProperty(fc.integer({ min: 400000, max: 500000 }), fc.integer({ min: 0, max: 9 }), async (ticks, hundredths) => {
          const raw = ticks / 10 + hundredths / 100;
          const { record } = await service.placeLimitOrder('BTCUSDT', 'BUY', 0.001, raw);

          const price = record.intent.price ?? 0;
          expect(Math.abs(price - raw)).toBeLessThanOrEqual(0.05 + 1e-9);
          expect(price).toBe(Number(price.toFixed(1)));
        }),
        { numRuns: 50 }
      );
    });
  });

  describe('placeMarketOrder', () => {
    it('submits a market order and reports the fill', async () => {
      const placed = await service.placeMarketOrder('btcusdt', 'buy', 0.01);

      expect(connector.submitted).toEqual([{ symbol: 'BTCUSDT', side: 'BUY', orderKind: 'MARKET', quantity: 0.01 }]);
      expect(placed.currentPrice).toBe(45000);
      expect(placed.snapshot).toMatchObject({ orderId: '1', status: 'FILLED', averagePrice: 45000 });
      expect(placed.record).toMatchObject({ exchangeOrderId: '1', status: 'FILLED' });
      expect(auditService.getEvents({ eventType: 'ORDER_SUBMITTED' }).map(event => event.message)).toEqual([
        'Placing market order: BUY 0.01 BTCUSDT at market price ~45000',
        'MARKET order executed successfully: 1 (FILLED)'
      ]);
    });

    it('refuses an unaligned quantity before contacting the order endpoint', async () => {
      await expect(service.placeMarketOrder('BTCUSDT', 'BUY', 0.0015)).rejects.toThrow(
        "Invalid quantity: Quantity 0.0015 doesn't comply with step size 0.001"
      );
      expect(connector.callCount('submitOrder')).toBe(0);
    });

    it('refuses an unknown symbol', async () => {
      await expect(service.placeMarketOrder('DOGEUSDT', 'BUY', 1)).rejects.toThrow('Invalid symbol: DOGEUSDT');
    });
  });

  describe('placeLimitOrder', () => {
    it('rounds the price to the tick size and reports the deviation', async () => {
      const placed = await service.placeLimitOrder('BTCUSDT', 'SELL', 0.01, 46000.04, 'IOC');

      expect(connector.submitted[0]).toEqual({
        symbol: 'BTCUSDT',
        side: 'SELL',
        orderKind: 'LIMIT',
        quantity: 0.01,
        price: 46000,
        timeInForce: 'IOC'
      });
      expect(placed.priceDeviationPercent).toBe(2.22);
      expect(placed.record.status).toBe('PLACED');
      expect(auditService.getEvents({ eventType: 'WARNING' })).toHaveLength(0);
    });

    it('warns when the limit is more than 10% away from the market', async () => {
      const placed = await service.placeLimitOrder('BTCUSDT', 'BUY', 0.01, 49600);

      expect(placed.priceDeviationPercent).toBe(10.22);
      expect(auditService.getEvents({ eventType: 'WARNING' })[0].message).toBe(
        'Limit price 49600 is 10.22% from current market price 45000'
      );
      expect(connector.submitted[0].timeInForce).toBe('GTC');
    });

    it('rejects a non-positive price', async () => {
      await expect(service.placeLimitOrder('BTCUSDT', 'BUY', 0.01, -1)).rejects.toThrow('Price must be a positive number, got -1');
    });

    it('records and rethrows an exchange rejection', async () => {
      connector.rejectSubmit(() => true, rejection('Margin is insufficient.', -2019));

      await expect(service.placeLimitOrder('BTCUSDT', 'BUY', 0.01, 44000)).rejects.toThrow('Margin is insufficient.');

      expect(auditService.getEvents({ eventType: 'ORDER_FAILED' })[0].message).toBe('LIMIT order failed: Margin is insufficient.');
      expect(errorHandler.getErrorCount(ErrorCategory.EXTERNAL_SERVICE, 'EXCHANGE_REJECTION')).toBe(1);
    });
  });

  describe('placeStopLimitOrder', () => {
    it('submits a STOP order with both prices', async () => {
      const placed = await service.placeStopLimitOrder('BTCUSDT', 'BUY', 0.01, 46000, 46100);

      expect(connector.submitted[0]).toEqual({
        symbol: 'BTCUSDT',
        side: 'BUY',
        orderKind: 'STOP',
        quantity: 0.01,
        price: 46100,
        stopPrice: 46000,
        timeInForce: 'GTC',
        reduceOnly: false
      });
      expect(placed.currentPrice).toBe(45000);
    });

    it('passes reduce-only through', async () => {
      await service.placeStopLimitOrder('BTCUSDT', 'SELL', 0.01, 44000, 43900, true);

      expect(connector.submitted[0].reduceOnly).toBe(true);
    });

    it('rejects a stop on the wrong side of the market', async () => {
      await expect(service.placeStopLimitOrder('BTCUSDT', 'SELL', 0.01, 46000, 45900)).rejects.toThrow(
        'SELL stop price 46000 must be below current price 45000'
      );
      await expect(service.placeStopLimitOrder('BTCUSDT', 'BUY', 0.01, 45000, 45100)).rejects.toThrow(
        'BUY stop price 45000 must be above current price 45000'
      );
      expect(connector.callCount('submitOrder')).toBe(0);
    });
  });

  describe('cancelOrder', () => {
    it('cancels a resting order', async () => {
      await service.placeLimitOrder('BTCUSDT', 'BUY', 0.01, 44000);

      const snapshot = await service.cancelOrder('btcusdt', '1');

      expect(snapshot.status).toBe('CANCELED');
      expect(auditService.getEvents({ eventType: 'ORDER_CANCELED' })[0].message).toBe('Order cancelled: 1');
    });

    it('audits and rethrows when the order is already closed', async () => {
      await service.placeMarketOrder('BTCUSDT', 'BUY', 0.01);

      await expect(service.cancelOrder('BTCUSDT', '1')).rejects.toThrow('Unknown order sent.');
      expect(auditService.getEvents({ eventType: 'CANCEL_FAILED' })[0].message).toBe(
        'Error cancelling order 1: Unknown order sent.'
      );
    });
  });

  describe('getOrderStatus', () => {
    it('returns the exchange snapshot', async () => {
      await service.placeLimitOrder('BTCUSDT', 'BUY', 0.01, 44000);

      const snapshot = await service.getOrderStatus('btcusdt', '1');

      expect(snapshot.status).toBe('NEW');
      expect(auditService.getEvents({ eventType: 'ORDER_STATUS' })[0].message).toBe('Order status check: 1 -> NEW');
    });
  });
});
