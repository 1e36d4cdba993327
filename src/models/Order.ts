/**
 * Order intent and order record models
 */

export type OrderSide = 'BUY' | 'SELL';
export type OrderKind = 'LIMIT' | 'MARKET' | 'STOP_MARKET' | 'STOP';
export type TimeInForce = 'GTC' | 'IOC' | 'FOK';

/**
 * Lifecycle of an order as seen by the strategy that owns it
 */
export type OrderRecordStatus = 'PENDING' | 'PLACED' | 'FILLED' | 'CANCELED' | 'FAILED';

/**
 * Status values reported by the exchange for a single order
 */
export type ExchangeOrderStatus =
  | 'NEW'
  | 'PARTIALLY_FILLED'
  | 'FILLED'
  | 'CANCELED'
  | 'REJECTED'
  | 'EXPIRED';

export interface OrderIntent {
  readonly symbol: string;
  readonly side: OrderSide;
  readonly orderKind: OrderKind;
  readonly quantity: number;
  readonly price?: number;
  readonly stopPrice?: number;
  readonly timeInForce?: TimeInForce;
  readonly reduceOnly?: boolean;
}

export interface OrderRecord {
  readonly intent: OrderIntent;
  readonly exchangeOrderId?: string;
  readonly status: OrderRecordStatus;
  readonly lastError?: string;
}

/**
 * Order state returned by the exchange on submission or query
 */
export interface OrderSnapshot {
  orderId: string;
  symbol: string;
  status: ExchangeOrderStatus;
  averagePrice: number;
  executedQuantity: number;
  updatedAt: Date;
}

export function createOrderIntent(intent: OrderIntent): OrderIntent {
  return Object.freeze({ ...intent });
}

export function pendingRecord(intent: OrderIntent): OrderRecord {
  return { intent: createOrderIntent(intent), status: 'PENDING' };
}

/**
 * Maps an exchange-side status onto the owning strategy's view of the order
 */
export function toRecordStatus(status: ExchangeOrderStatus): OrderRecordStatus {
  switch (status) {
    case 'FILLED':
      return 'FILLED';
    case 'CANCELED':
    case 'REJECTED':
    case 'EXPIRED':
      return 'CANCELED';
    default:
      return 'PLACED';
  }
}
