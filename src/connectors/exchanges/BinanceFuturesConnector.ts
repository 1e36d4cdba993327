/**
 * Binance USDⓈ-M Futures Connector Implementation
 * Signed REST client for the futures API, testnet by default
 */

import { createHmac } from 'crypto';
import { BaseExchangeConnector, ConnectorOptions, ExchangeCredentials } from '../ExchangeConnector';
import { OrderIntent, OrderSnapshot } from '../../models/Order';
import { AccountInfo, ExchangeSymbol, OpenOrder, Position, SymbolFilters } from '../../models/Market';
import { AuditService } from '../../services/AuditService';
import {
  ExchangeRejectionError,
  TransientQueryError,
  createContext,
  errorMessage
} from '../../utils/ErrorHandler';
import { formatIncrement } from '../../utils/quantization';
import {
  findSymbol,
  parseAccount,
  parseApiError,
  parseOpenOrders,
  parseOrder,
  parsePositions,
  parseTickerPrice
} from './binanceResponses';

export const BINANCE_FUTURES_TESTNET_URL = 'https://testnet.binancefuture.com';
export const BINANCE_FUTURES_LIVE_URL = 'https://fapi.binance.com';

const FILTER_CACHE_TTL_MS = 300000;

type HttpMethod = 'GET' | 'POST' | 'DELETE';
type QueryParams = Record<string, string | number | boolean | undefined>;

export interface BinanceFuturesConnectorOptions extends ConnectorOptions {
  testnet?: boolean;
  baseUrl?: string;
  recvWindowMs?: number;
  requestTimeoutMs?: number;
  auditService?: AuditService;
}

export function signQuery(query: string, secret: string): string {
  return createHmac('sha256', secret).update(query).digest('hex');
}

/**
 * Binance USDⓈ-M futures connector
 */
export class BinanceFuturesConnector extends BaseExchangeConnector {
  private readonly baseUrl: string;
  private readonly recvWindowMs: number;
  private readonly requestTimeoutMs: number;
  private readonly auditService?: AuditService;
  private filterCache: Map<string, { filters: SymbolFilters; fetchedAt: number }> = new Map();

  constructor(options: BinanceFuturesConnectorOptions = {}) {
    super('binance-futures', 'Binance Futures', options);
    const testnet = options.testnet ?? true;
    this.baseUrl = (options.baseUrl ?? (testnet ? BINANCE_FUTURES_TESTNET_URL : BINANCE_FUTURES_LIVE_URL)).replace(/\/+$/, '');
    this.recvWindowMs = options.recvWindowMs ?? 5000;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 10000;
    this.auditService = options.auditService;
  }

  /**
   * Checks the credentials with a signed account request.
   * Returns false when the exchange refuses them; network failures propagate.
   */
  async authenticate(credentials: ExchangeCredentials): Promise<boolean> {
    this.validateCredentials(credentials);

    try {
      await this.executeWithProtection(
        () => this.request('GET', '/fapi/v2/account', {}, 'authenticate', credentials),
        'authenticate',
        { idempotent: true }
      );
    } catch (error) {
      this.auditService?.error('EXCHANGE_AUTH_FAILURE', `Authentication with ${this.name} failed: ${errorMessage(error)}`, {
        venueId: this.connectorId,
        details: { baseUrl: this.baseUrl }
      });
      if (error instanceof ExchangeRejectionError) {
        this.isAuthenticated = false;
        return false;
      }
      throw error;
    }

    this.credentials = credentials;
    this.isAuthenticated = true;
    this.auditService?.info('EXCHANGE_AUTH_SUCCESS', `Connected to ${this.name} at ${this.baseUrl}`, {
      venueId: this.connectorId,
      details: { baseUrl: this.baseUrl }
    });
    return true;
  }

  async getExchangeSymbol(symbol: string): Promise<ExchangeSymbol | null> {
    const normalized = symbol.toUpperCase();
    const payload = await this.executeWithProtection(
      () => this.request('GET', '/fapi/v1/exchangeInfo', {}, 'getExchangeSymbol'),
      'getExchangeSymbol',
      { idempotent: true }
    );
    const entry = findSymbol(payload, normalized);
    if (entry) {
      this.filterCache.set(normalized, { filters: entry.filters, fetchedAt: this.scheduler.now() });
    }
    return entry;
  }

  async getSymbolFilters(symbol: string): Promise<SymbolFilters> {
    const normalized = symbol.toUpperCase();
    const cached = this.filterCache.get(normalized);
    if (cached && this.scheduler.now() - cached.fetchedAt < FILTER_CACHE_TTL_MS) {
      return { ...cached.filters };
    }

    const entry = await this.getExchangeSymbol(normalized);
    if (!entry) {
      throw new ExchangeRejectionError(
        `Symbol ${normalized} is not listed`,
        createContext(this.name, 'getSymbolFilters', { symbol: normalized }),
        undefined,
        'UNKNOWN_SYMBOL'
      );
    }
    return { ...entry.filters };
  }

  async getCurrentPrice(symbol: string): Promise<number> {
    const payload = await this.executeWithProtection(
      () => this.request('GET', '/fapi/v1/ticker/price', { symbol: symbol.toUpperCase() }, 'getCurrentPrice'),
      'getCurrentPrice',
      { idempotent: true }
    );
    return parseTickerPrice(payload);
  }

  async submitOrder(intent: OrderIntent): Promise<OrderSnapshot> {
    const credentials = this.requireCredentials('submitOrder');
    const filters = await this.getSymbolFilters(intent.symbol);
    const params = this.orderParams(intent, filters);
    const payload = await this.executeWithProtection(
      () => this.request('POST', '/fapi/v1/order', params, 'submitOrder', credentials),
      'submitOrder',
      { idempotent: false }
    );
    return parseOrder(payload);
  }

  async getOrderStatus(symbol: string, orderId: string): Promise<OrderSnapshot> {
    const credentials = this.requireCredentials('getOrderStatus');
    const payload = await this.executeWithProtection(
      () => this.request('GET', '/fapi/v1/order', { symbol: symbol.toUpperCase(), orderId }, 'getOrderStatus', credentials),
      'getOrderStatus',
      { idempotent: true }
    );
    return parseOrder(payload);
  }

  async cancelOrder(symbol: string, orderId: string): Promise<OrderSnapshot> {
    const credentials = this.requireCredentials('cancelOrder');
    const payload = await this.executeWithProtection(
      () => this.request('DELETE', '/fapi/v1/order', { symbol: symbol.toUpperCase(), orderId }, 'cancelOrder', credentials),
      'cancelOrder',
      { idempotent: false }
    );
    return parseOrder(payload);
  }

  async getAccountInfo(): Promise<AccountInfo> {
    const credentials = this.requireCredentials('getAccountInfo');
    const payload = await this.executeWithProtection(
      () => this.request('GET', '/fapi/v2/account', {}, 'getAccountInfo', credentials),
      'getAccountInfo',
      { idempotent: true }
    );
    return parseAccount(payload);
  }

  async getOpenPositions(symbol?: string): Promise<Position[]> {
    const credentials = this.requireCredentials('getOpenPositions');
    const payload = await this.executeWithProtection(
      () => this.request('GET', '/fapi/v2/positionRisk', { symbol: symbol?.toUpperCase() }, 'getOpenPositions', credentials),
      'getOpenPositions',
      { idempotent: true }
    );
    return parsePositions(payload).filter(position => position.positionAmt !== 0);
  }

  async getOpenOrders(symbol?: string): Promise<OpenOrder[]> {
    const credentials = this.requireCredentials('getOpenOrders');
    const payload = await this.executeWithProtection(
      () => this.request('GET', '/fapi/v1/openOrders', { symbol: symbol?.toUpperCase() }, 'getOpenOrders', credentials),
      'getOpenOrders',
      { idempotent: true }
    );
    return parseOpenOrders(payload);
  }

  protected async performHealthCheck(): Promise<boolean> {
    await this.request('GET', '/fapi/v1/ping', {}, 'healthCheck');
    return true;
  }

  protected getBaseUrl(): string {
    return this.baseUrl;
  }

  /**
   * Quantities are written to the step size's decimals, prices to the tick size's
   */
  private orderParams(intent: OrderIntent, filters: SymbolFilters): QueryParams {
    const params: QueryParams = {
      symbol: intent.symbol.toUpperCase(),
      side: intent.side,
      type: intent.orderKind,
      quantity: formatIncrement(intent.quantity, filters.stepSize),
      newOrderRespType: 'RESULT'
    };

    if (intent.orderKind === 'LIMIT' || intent.orderKind === 'STOP') {
      if (intent.price !== undefined) {
        params.price = formatIncrement(intent.price, filters.tickSize);
      }
      params.timeInForce = intent.timeInForce ?? 'GTC';
    }

    if ((intent.orderKind === 'STOP' || intent.orderKind === 'STOP_MARKET') && intent.stopPrice !== undefined) {
      params.stopPrice = formatIncrement(intent.stopPrice, filters.tickSize);
    }

    if (intent.reduceOnly) {
      params.reduceOnly = true;
    }

    return params;
  }

  /**
   * Sends one request. Signed requests carry timestamp, recvWindow and an
   * HMAC-SHA256 signature over the query string.
   */
  private async request(
    method: HttpMethod,
    path: string,
    params: QueryParams,
    operationName: string,
    credentials?: ExchangeCredentials
  ): Promise<unknown> {
    const search = new URLSearchParams();
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) {
        search.append(key, String(value));
      }
    }

    const headers: Record<string, string> = {};
    if (credentials) {
      search.append('recvWindow', String(this.recvWindowMs));
      search.append('timestamp', String(this.scheduler.now()));
      search.append('signature', signQuery(search.toString(), credentials.secret));
      headers['X-MBX-APIKEY'] = credentials.apiKey;
    }

    const query = search.toString();
    const url = `${this.baseUrl}${path}${query ? `?${query}` : ''}`;

    const response = await fetch(url, {
      method,
      headers,
      signal: AbortSignal.timeout(this.requestTimeoutMs)
    });

    const text = await response.text();
    let body: unknown = undefined;
    if (text) {
      try {
        body = JSON.parse(text);
      } catch {
        body = undefined;
      }
    }

    if (!response.ok) {
      throw this.mapHttpError(response.status, body, text, operationName, params);
    }

    return body;
  }

  private mapHttpError(
    status: number,
    body: unknown,
    text: string,
    operationName: string,
    params: QueryParams
  ): ExchangeRejectionError | TransientQueryError {
    const apiError = parseApiError(body);
    const symbol = typeof params.symbol === 'string' ? params.symbol : undefined;
    const context = createContext(this.name, operationName, {
      symbol,
      metadata: { httpStatus: status, exchangeCode: apiError.code }
    });
    const detail = apiError.message ?? (text.slice(0, 200) || `HTTP ${status}`);

    // 418 is an IP ban after ignoring 429s
    if (status >= 500 || status === 429 || status === 418) {
      return new TransientQueryError(`${operationName}: ${detail}`, context);
    }

    return new ExchangeRejectionError(`${operationName}: ${detail}`, context, apiError.code);
  }
}
