/**
 * Exchange metadata, account and position models
 */

export interface SymbolFilters {
  tickSize: number;
  stepSize: number;
  minQty: number;
  maxQty: number;
  minNotional: number;
}

export type SymbolTradingStatus = 'TRADING' | 'BREAK' | 'PENDING_TRADING' | 'SETTLING' | 'CLOSE' | string;

export interface ExchangeSymbol {
  symbol: string;
  status: SymbolTradingStatus;
  filters: SymbolFilters;
}

export interface AssetBalance {
  asset: string;
  walletBalance: number;
  availableBalance: number;
  unrealizedProfit: number;
}

export interface AccountInfo {
  totalWalletBalance: number;
  totalUnrealizedProfit: number;
  totalMarginBalance: number;
  availableBalance: number;
  canTrade: boolean;
  assets: AssetBalance[];
}

export interface Position {
  symbol: string;
  positionSide: string;
  positionAmt: number;
  entryPrice: number;
  markPrice: number;
  unrealizedProfit: number;
  leverage: number;
}

export interface OpenOrder {
  orderId: string;
  symbol: string;
  side: string;
  type: string;
  status: string;
  price: number;
  stopPrice: number;
  origQty: number;
  executedQty: number;
  reduceOnly: boolean;
  time: Date;
}
