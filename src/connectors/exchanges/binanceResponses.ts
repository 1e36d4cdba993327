/**
 * Parsers for Binance USDⓈ-M futures REST payloads
 */

import { ExchangeOrderStatus, OrderSnapshot } from '../../models/Order';
import { AccountInfo, AssetBalance, ExchangeSymbol, OpenOrder, Position, SymbolFilters } from '../../models/Market';

export type JsonRecord = Record<string, unknown>;

export class MalformedResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedResponseError';
  }
}

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function expectRecord(value: unknown, label: string): JsonRecord {
  if (!isRecord(value)) {
    throw new MalformedResponseError(`Expected an object for ${label}`);
  }
  return value;
}

export function expectArray(value: unknown, label: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new MalformedResponseError(`Expected an array for ${label}`);
  }
  return value;
}

/**
 * Reads a numeric field; the API sends most decimals as strings
 */
export function readNumber(record: JsonRecord, key: string, fallback?: number): number {
  const raw = record[key];
  const value = typeof raw === 'string' ? Number(raw) : raw;
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (fallback !== undefined) {
    return fallback;
  }
  throw new MalformedResponseError(`Field ${key} is not numeric`);
}

export function readString(record: JsonRecord, key: string, fallback?: string): string {
  const raw = record[key];
  if (typeof raw === 'string') {
    return raw;
  }
  if (typeof raw === 'number') {
    return raw.toString();
  }
  if (fallback !== undefined) {
    return fallback;
  }
  throw new MalformedResponseError(`Field ${key} is missing`);
}

const ORDER_STATUSES: readonly ExchangeOrderStatus[] = [
  'NEW',
  'PARTIALLY_FILLED',
  'FILLED',
  'CANCELED',
  'REJECTED',
  'EXPIRED'
];

function parseOrderStatus(raw: string): ExchangeOrderStatus {
  // EXPIRED_IN_MATCH is reported for self-trade prevention
  if (raw === 'EXPIRED_IN_MATCH') {
    return 'EXPIRED';
  }
  const status = ORDER_STATUSES.find(candidate => candidate === raw);
  if (!status) {
    throw new MalformedResponseError(`Unknown order status ${raw}`);
  }
  return status;
}

export function parseOrder(payload: unknown): OrderSnapshot {
  const order = expectRecord(payload, 'order');
  return {
    orderId: readString(order, 'orderId'),
    symbol: readString(order, 'symbol'),
    status: parseOrderStatus(readString(order, 'status')),
    averagePrice: readNumber(order, 'avgPrice', 0),
    executedQuantity: readNumber(order, 'executedQty', 0),
    updatedAt: new Date(readNumber(order, 'updateTime', Date.now()))
  };
}

function findFilter(filters: unknown[], filterType: string): JsonRecord | undefined {
  for (const filter of filters) {
    if (isRecord(filter) && filter.filterType === filterType) {
      return filter;
    }
  }
  return undefined;
}

export function parseSymbol(payload: unknown): ExchangeSymbol {
  const entry = expectRecord(payload, 'symbol');
  const filters = expectArray(entry.filters ?? [], 'filters');
  const priceFilter = findFilter(filters, 'PRICE_FILTER');
  const lotSize = findFilter(filters, 'LOT_SIZE');
  const minNotional = findFilter(filters, 'MIN_NOTIONAL');

  if (!priceFilter || !lotSize) {
    throw new MalformedResponseError(`Symbol ${readString(entry, 'symbol', '?')} has no PRICE_FILTER or LOT_SIZE filter`);
  }

  const symbolFilters: SymbolFilters = {
    tickSize: readNumber(priceFilter, 'tickSize'),
    stepSize: readNumber(lotSize, 'stepSize'),
    minQty: readNumber(lotSize, 'minQty'),
    maxQty: readNumber(lotSize, 'maxQty'),
    minNotional: minNotional ? readNumber(minNotional, 'notional', 0) : 0
  };

  return {
    symbol: readString(entry, 'symbol'),
    status: readString(entry, 'status'),
    filters: symbolFilters
  };
}

/**
 * Finds one symbol in a full exchangeInfo payload
 */
export function findSymbol(payload: unknown, symbol: string): ExchangeSymbol | null {
  const info = expectRecord(payload, 'exchangeInfo');
  for (const entry of expectArray(info.symbols, 'symbols')) {
    if (isRecord(entry) && entry.symbol === symbol) {
      return parseSymbol(entry);
    }
  }
  return null;
}

export function parseTickerPrice(payload: unknown): number {
  return readNumber(expectRecord(payload, 'ticker'), 'price');
}

function parseAsset(payload: unknown): AssetBalance {
  const asset = expectRecord(payload, 'asset');
  return {
    asset: readString(asset, 'asset'),
    walletBalance: readNumber(asset, 'walletBalance', 0),
    availableBalance: readNumber(asset, 'availableBalance', 0),
    unrealizedProfit: readNumber(asset, 'unrealizedProfit', 0)
  };
}

export function parseAccount(payload: unknown): AccountInfo {
  const account = expectRecord(payload, 'account');
  return {
    totalWalletBalance: readNumber(account, 'totalWalletBalance'),
    totalUnrealizedProfit: readNumber(account, 'totalUnrealizedProfit', 0),
    totalMarginBalance: readNumber(account, 'totalMarginBalance', 0),
    availableBalance: readNumber(account, 'availableBalance', 0),
    canTrade: account.canTrade === true,
    assets: expectArray(account.assets ?? [], 'assets')
      .map(parseAsset)
      .filter(asset => asset.walletBalance !== 0)
  };
}

export function parsePositions(payload: unknown): Position[] {
  return expectArray(payload, 'positionRisk').map(item => {
    const position = expectRecord(item, 'position');
    return {
      symbol: readString(position, 'symbol'),
      positionSide: readString(position, 'positionSide', 'BOTH'),
      positionAmt: readNumber(position, 'positionAmt'),
      entryPrice: readNumber(position, 'entryPrice', 0),
      markPrice: readNumber(position, 'markPrice', 0),
      unrealizedProfit: readNumber(position, 'unRealizedProfit', 0),
      leverage: readNumber(position, 'leverage', 1)
    };
  });
}

export function parseOpenOrders(payload: unknown): OpenOrder[] {
  return expectArray(payload, 'openOrders').map(item => {
    const order = expectRecord(item, 'openOrder');
    return {
      orderId: readString(order, 'orderId'),
      symbol: readString(order, 'symbol'),
      side: readString(order, 'side'),
      type: readString(order, 'type'),
      status: readString(order, 'status'),
      price: readNumber(order, 'price', 0),
      stopPrice: readNumber(order, 'stopPrice', 0),
      origQty: readNumber(order, 'origQty', 0),
      executedQty: readNumber(order, 'executedQty', 0),
      reduceOnly: order.reduceOnly === true,
      time: new Date(readNumber(order, 'time', 0))
    };
  });
}

/**
 * Error body shape: {"code": -2019, "msg": "Margin is insufficient."}
 */
export function parseApiError(payload: unknown): { code?: number; message?: string } {
  if (!isRecord(payload)) {
    return {};
  }
  return {
    code: typeof payload.code === 'number' ? payload.code : undefined,
    message: typeof payload.msg === 'string' ? payload.msg : undefined
  };
}
