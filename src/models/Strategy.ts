/**
 * Strategy state models for grid, TWAP and OCO execution
 */

import { OrderRecord, OrderSide } from './Order';

export type StrategyKind = 'grid' | 'twap' | 'oco';
export type StrategyId = string;

export interface GridLevel {
  readonly levelIndex: number;
  readonly price: number;
  readonly quantity: number;
  readonly side: OrderSide;
  readonly order: OrderRecord;
}

export interface GridTrade {
  readonly levelIndex: number;
  readonly side: OrderSide;
  readonly price: number;
  readonly quantity: number;
  readonly filledAt: Date;
}

export type GridStatus = 'ACTIVE' | 'STOPPED';

export interface GridStrategy {
  readonly id: StrategyId;
  readonly symbol: string;
  readonly lowPrice: number;
  readonly highPrice: number;
  readonly levelCount: number;
  readonly quantityPerLevel: number;
  readonly spacing: number;
  readonly referencePrice: number;
  readonly levels: readonly GridLevel[];
  /** 1-based indexes of ladder rungs left out because they sit at the reference price */
  readonly skippedLevels: readonly number[];
  readonly executedTrades: readonly GridTrade[];
  readonly status: GridStatus;
  readonly createdAt: Date;
}

export interface GridPlacementSummary {
  placedBuy: number;
  placedSell: number;
  failed: Array<{ levelIndex: number; price: number; error: string }>;
  skipped: number;
}

export type TwapChunkStatus = 'PENDING' | 'EXECUTED' | 'FAILED';
export type TwapStatus = 'ACTIVE' | 'COMPLETED' | 'FAILED' | 'ERROR' | 'CANCELED';

export interface TwapChunk {
  readonly chunkIndex: number;
  readonly quantity: number;
  /** Schedule time before jitter, epoch milliseconds */
  readonly nominalAt: number;
  /** Epoch milliseconds */
  readonly scheduledAt: number;
  readonly notional: number;
  readonly belowMinNotional: boolean;
  readonly status: TwapChunkStatus;
  readonly order: OrderRecord;
  readonly executionPrice?: number;
}

export interface TwapPlan {
  readonly id: StrategyId;
  readonly symbol: string;
  readonly side: OrderSide;
  readonly totalQuantity: number;
  readonly durationMinutes: number;
  readonly chunkCount: number;
  readonly intervalSeconds: number;
  readonly priceLimit?: number;
  readonly randomizeTiming: boolean;
  readonly chunks: readonly TwapChunk[];
  readonly executedQuantity: number;
  readonly averagePrice?: number;
  readonly status: TwapStatus;
  readonly lastError?: string;
  readonly createdAt: Date;
}

export type PositionSide = 'LONG' | 'SHORT';
export type OcoStatus = 'ACTIVE' | 'RESOLVED' | 'CANCELED';
export type OcoResolution = 'TAKE_PROFIT_FILLED' | 'STOP_LOSS_FILLED' | 'EXTERNALLY_CANCELED';

export interface OcoPair {
  readonly id: StrategyId;
  readonly symbol: string;
  readonly quantity: number;
  readonly positionSide: PositionSide;
  readonly referencePrice: number;
  readonly takeProfit: OrderRecord;
  readonly stopLoss: OrderRecord;
  readonly status: OcoStatus;
  readonly resolution?: OcoResolution;
  readonly cancellationFailures: number;
  readonly createdAt: Date;
}

export interface StrategyStateMap {
  grid: GridStrategy;
  twap: TwapPlan;
  oco: OcoPair;
}

export type AnyStrategy = StrategyStateMap[StrategyKind];
