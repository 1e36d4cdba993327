/**
 * Single-order placement: market, limit, stop-limit, cancellation and status lookup
 */

import { IExchangeConnector } from '../connectors/ExchangeConnector';
import {
  OrderIntent,
  OrderRecord,
  OrderSnapshot,
  TimeInForce,
  createOrderIntent,
  toRecordStatus
} from '../models/Order';
import { ErrorHandler, createContext, errorMessage } from '../utils/ErrorHandler';
import { roundToStep, roundToTick, toFixedPrecision } from '../utils/quantization';
import { AuditService } from './AuditService';
import { ValidationService } from './ValidationService';

export const PRICE_DEVIATION_WARNING_PERCENT = 10;

export interface PlacedOrder {
  record: OrderRecord;
  snapshot: OrderSnapshot;
  /** Market price read before submission */
  currentPrice: number;
  /** Limit price distance from the market, percent, signed */
  priceDeviationPercent?: number;
}

const COMPONENT = 'OrderService';

export class OrderService {
  constructor(
    private readonly connector: IExchangeConnector,
    private readonly validation: ValidationService,
    private readonly auditService: AuditService,
    private readonly errorHandler: ErrorHandler
  ) {}

  async placeMarketOrder(symbol: string, side: string, quantity: number): Promise<PlacedOrder> {
    const normalized = await this.validation.requireSymbol(symbol);
    const orderSide = this.validation.validateSide(side);
    const filters = await this.validation.validateQuantity(normalized, quantity);
    const currentPrice = await this.connector.getCurrentPrice(normalized);

    this.auditService.info('ORDER_SUBMITTED', `Placing market order: ${orderSide} ${quantity} ${normalized} at market price ~${currentPrice}`);

    const intent = createOrderIntent({
      symbol: normalized,
      side: orderSide,
      orderKind: 'MARKET',
      quantity: roundToStep(quantity, filters.stepSize)
    });
    return { ...(await this.submit(intent, 'MARKET')), currentPrice };
  }

  async placeLimitOrder(
    symbol: string,
    side: string,
    quantity: number,
    price: number,
    timeInForce: TimeInForce = 'GTC'
  ): Promise<PlacedOrder> {
    const normalized = await this.validation.requireSymbol(symbol);
    const orderSide = this.validation.validateSide(side);
    const filters = await this.validation.validateQuantity(normalized, quantity);
    this.validation.validatePositivePrice('Price', price);

    const currentPrice = await this.connector.getCurrentPrice(normalized);
    const limitPrice = roundToTick(price, filters.tickSize);
    const priceDeviationPercent = toFixedPrecision(((limitPrice - currentPrice) / currentPrice) * 100, 2);

    if (Math.abs(priceDeviationPercent) > PRICE_DEVIATION_WARNING_PERCENT) {
      this.auditService.warn(
        'WARNING',
        `Limit price ${limitPrice} is ${priceDeviationPercent}% from current market price ${currentPrice}`,
        { details: { symbol: normalized, limitPrice, currentPrice } }
      );
    }

    this.auditService.info('ORDER_SUBMITTED', `Placing limit order: ${orderSide} ${quantity} ${normalized} at ${limitPrice}`);

    const intent = createOrderIntent({
      symbol: normalized,
      side: orderSide,
      orderKind: 'LIMIT',
      quantity: roundToStep(quantity, filters.stepSize),
      price: limitPrice,
      timeInForce
    });
    return { ...(await this.submit(intent, 'LIMIT')), currentPrice, priceDeviationPercent };
  }

  /**
   * Futures STOP order: a limit order that rests until the stop price trades
   */
  async placeStopLimitOrder(
    symbol: string,
    side: string,
    quantity: number,
    stopPrice: number,
    limitPrice: number,
    reduceOnly: boolean = false
  ): Promise<PlacedOrder> {
    const normalized = await this.validation.requireSymbol(symbol);
    const orderSide = this.validation.validateSide(side);
    const filters = await this.validation.validateQuantity(normalized, quantity);
    this.validation.validatePositivePrice('Stop price', stopPrice);
    this.validation.validatePositivePrice('Limit price', limitPrice);

    const currentPrice = await this.connector.getCurrentPrice(normalized);
    const stop = roundToTick(stopPrice, filters.tickSize);
    const limit = roundToTick(limitPrice, filters.tickSize);
    this.validation.validateStopLimit(orderSide, stop, currentPrice);

    this.auditService.info(
      'ORDER_SUBMITTED',
      `Placing stop-limit order: ${orderSide} ${quantity} ${normalized} stop@${stop} limit@${limit}`
    );

    const intent = createOrderIntent({
      symbol: normalized,
      side: orderSide,
      orderKind: 'STOP',
      quantity: roundToStep(quantity, filters.stepSize),
      price: limit,
      stopPrice: stop,
      timeInForce: 'GTC',
      reduceOnly
    });
    return { ...(await this.submit(intent, 'STOP_LIMIT')), currentPrice };
  }

  async cancelOrder(symbol: string, orderId: string): Promise<OrderSnapshot> {
    const normalized = symbol.toUpperCase();
    try {
      const snapshot = await this.connector.cancelOrder(normalized, orderId);
      this.auditService.info('ORDER_CANCELED', `Order cancelled: ${orderId}`, { details: { symbol: normalized } });
      return snapshot;
    } catch (error) {
      this.errorHandler.record(this.errorHandler.normalize(error, createContext(COMPONENT, 'cancelOrder', { symbol: normalized })));
      this.auditService.error('CANCEL_FAILED', `Error cancelling order ${orderId}: ${errorMessage(error)}`, {
        details: { symbol: normalized }
      });
      throw error;
    }
  }

  async getOrderStatus(symbol: string, orderId: string): Promise<OrderSnapshot> {
    const snapshot = await this.connector.getOrderStatus(symbol.toUpperCase(), orderId);
    this.auditService.info('ORDER_STATUS', `Order status check: ${orderId} -> ${snapshot.status}`, {
      details: { symbol: snapshot.symbol }
    });
    return snapshot;
  }

  private async submit(intent: OrderIntent, label: string): Promise<Omit<PlacedOrder, 'currentPrice'>> {
    try {
      const snapshot = await this.connector.submitOrder(intent);
      this.auditService.info('ORDER_SUBMITTED', `${label} order executed successfully: ${snapshot.orderId} (${snapshot.status})`, {
        details: { symbol: intent.symbol, side: intent.side, quantity: intent.quantity, orderId: snapshot.orderId }
      });
      return {
        record: { intent, exchangeOrderId: snapshot.orderId, status: toRecordStatus(snapshot.status) },
        snapshot
      };
    } catch (error) {
      this.errorHandler.record(this.errorHandler.normalize(error, createContext(COMPONENT, 'submitOrder', { symbol: intent.symbol })));
      this.auditService.error('ORDER_FAILED', `${label} order failed: ${errorMessage(error)}`, {
        details: { symbol: intent.symbol, side: intent.side, quantity: intent.quantity }
      });
      throw error;
    }
  }
}
