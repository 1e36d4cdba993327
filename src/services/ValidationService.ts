/**
 * Symbol, quantity and price preconditions shared by every strategy
 */

import { IExchangeConnector } from '../connectors/ExchangeConnector';
import { SymbolFilters } from '../models/Market';
import { OrderSide } from '../models/Order';
import { PositionSide } from '../models/Strategy';
import { ValidationError, createContext, errorMessage } from '../utils/ErrorHandler';
import { isStepAligned, toFixedPrecision } from '../utils/quantization';
import { AuditService } from './AuditService';

const DEFAULT_STEP_SIZE = 0.001;
const DEFAULT_MAX_QTY = 1000;
const DEFAULT_MIN_NOTIONAL = 100;

const FALLBACK_TICK_SIZES: Record<string, number> = {
  BTCUSDT: 0.1,
  ETHUSDT: 0.01
};

const BOUND_TOLERANCE = 1e-9;

/**
 * Conservative filters used when exchange metadata cannot be fetched
 */
export function fallbackFilters(symbol: string): SymbolFilters {
  return {
    tickSize: FALLBACK_TICK_SIZES[symbol.toUpperCase()] ?? 0.01,
    stepSize: DEFAULT_STEP_SIZE,
    minQty: DEFAULT_STEP_SIZE,
    maxQty: DEFAULT_MAX_QTY,
    minNotional: DEFAULT_MIN_NOTIONAL
  };
}

export class ValidationService {
  constructor(
    private readonly connector: IExchangeConnector,
    private readonly auditService: AuditService
  ) {}

  /**
   * True iff the exchange lists the symbol with status TRADING. Metadata is
   * fetched on every call; a failed lookup counts as invalid.
   */
  async validateSymbol(symbol: string): Promise<boolean> {
    const normalized = symbol.toUpperCase();
    try {
      const entry = await this.connector.getExchangeSymbol(normalized);
      const isValid = entry !== null && entry.status === 'TRADING';
      this.auditService.record(
        isValid ? 'VALIDATION_PASSED' : 'VALIDATION_FAILED',
        `Symbol validation: ${normalized} -> ${isValid ? 'Valid' : 'Invalid'}`,
        { level: isValid ? 'info' : 'warn', details: { symbol: normalized, status: entry?.status } }
      );
      return isValid;
    } catch (error) {
      this.auditService.error('VALIDATION_FAILED', `Error validating symbol ${normalized}: ${errorMessage(error)}`, {
        details: { symbol: normalized }
      });
      return false;
    }
  }

  /**
   * Validates the symbol and returns it upper-cased, throwing when it is not tradable
   */
  async requireSymbol(symbol: string): Promise<string> {
    const normalized = symbol.trim().toUpperCase();
    if (!normalized || !(await this.validateSymbol(normalized))) {
      throw new ValidationError(
        `Invalid symbol: ${symbol}`,
        'INVALID_SYMBOL',
        createContext('ValidationService', 'requireSymbol', { symbol: normalized })
      );
    }
    return normalized;
  }

  /**
   * Symbol filters from the exchange, or the per-symbol fallback when the lookup fails
   */
  async resolveFilters(symbol: string): Promise<SymbolFilters> {
    const normalized = symbol.toUpperCase();
    try {
      return await this.connector.getSymbolFilters(normalized);
    } catch (error) {
      const filters = fallbackFilters(normalized);
      this.auditService.warn(
        'WARNING',
        `Could not load filters for ${normalized} (${errorMessage(error)}); using tick ${filters.tickSize}, step ${filters.stepSize}`,
        { details: { symbol: normalized, fallback: { ...filters } } }
      );
      return filters;
    }
  }

  /**
   * Checks qty against [minQty, maxQty] and step alignment from minQty.
   * Returns the filters the check used.
   */
  async validateQuantity(symbol: string, quantity: number, filters?: SymbolFilters): Promise<SymbolFilters> {
    const normalized = symbol.toUpperCase();
    const applied = filters ?? (await this.resolveFilters(normalized));
    const context = createContext('ValidationService', 'validateQuantity', {
      symbol: normalized,
      metadata: { quantity, ...applied }
    });

    let problem: string | undefined;
    if (!Number.isFinite(quantity) || quantity <= 0) {
      problem = `Quantity ${quantity} must be a positive number`;
    } else if (quantity < applied.minQty - BOUND_TOLERANCE || quantity > applied.maxQty + BOUND_TOLERANCE) {
      problem = `Quantity ${quantity} outside allowed range [${applied.minQty}, ${applied.maxQty}]`;
    } else if (!isStepAligned(quantity, applied.minQty, applied.stepSize)) {
      problem = `Quantity ${quantity} doesn't comply with step size ${applied.stepSize}`;
    }

    if (problem) {
      this.auditService.error('VALIDATION_FAILED', `Quantity validation failed: ${problem}`, {
        details: { symbol: normalized, quantity }
      });
      throw new ValidationError(`Invalid quantity: ${problem}`, 'INVALID_QUANTITY', context);
    }

    this.auditService.info('VALIDATION_PASSED', `Quantity validation passed: ${toFixedPrecision(quantity)}`, {
      details: { symbol: normalized, quantity }
    });
    return applied;
  }

  validateSide(side: string): OrderSide {
    const normalized = side.trim().toUpperCase();
    if (normalized === 'BUY' || normalized === 'SELL') {
      return normalized;
    }
    throw new ValidationError(
      `Invalid side: ${side}. Must be BUY or SELL`,
      'INVALID_SIDE',
      createContext('ValidationService', 'validateSide')
    );
  }

  validatePositionSide(positionSide: string): PositionSide {
    const normalized = positionSide.trim().toUpperCase();
    if (normalized === 'LONG' || normalized === 'SHORT') {
      return normalized;
    }
    throw new ValidationError(
      `Invalid position side: ${positionSide}. Must be LONG or SHORT`,
      'INVALID_POSITION_SIDE',
      createContext('ValidationService', 'validatePositionSide')
    );
  }

  validatePositivePrice(label: string, price: number): number {
    if (!Number.isFinite(price) || price <= 0) {
      throw new ValidationError(
        `${label} must be a positive number, got ${price}`,
        'INVALID_PRICE',
        createContext('ValidationService', 'validatePositivePrice', { metadata: { label, price } })
      );
    }
    return price;
  }

  /**
   * A BUY stop triggers above the market and a SELL stop below it
   */
  validateStopLimit(side: OrderSide, stopPrice: number, currentPrice: number): void {
    const context = createContext('ValidationService', 'validateStopLimit', {
      metadata: { side, stopPrice, currentPrice }
    });
    if (side === 'BUY' && stopPrice <= currentPrice) {
      throw new ValidationError(
        `BUY stop price ${stopPrice} must be above current price ${currentPrice}`,
        'INVALID_STOP_PRICE',
        context
      );
    }
    if (side === 'SELL' && stopPrice >= currentPrice) {
      throw new ValidationError(
        `SELL stop price ${stopPrice} must be below current price ${currentPrice}`,
        'INVALID_STOP_PRICE',
        context
      );
    }
  }
}
