/**
 * Read-only account reporting: balances, positions, open orders and prices
 */

import { IExchangeConnector } from '../connectors/ExchangeConnector';
import { AccountInfo, OpenOrder, Position } from '../models/Market';
import { AuditService } from './AuditService';

export class AccountService {
  constructor(
    private readonly connector: IExchangeConnector,
    private readonly auditService: AuditService
  ) {}

  async getAccountSummary(): Promise<AccountInfo> {
    const account = await this.connector.getAccountInfo();
    this.auditService.info('ACCOUNT_QUERY', `Account balance: ${account.totalWalletBalance} USDT`);
    return account;
  }

  /**
   * Positions with a non-zero size
   */
  async getOpenPositions(symbol?: string): Promise<Position[]> {
    const positions = await this.connector.getOpenPositions(symbol?.toUpperCase());
    const open = positions.filter(position => position.positionAmt !== 0);
    this.auditService.info('ACCOUNT_QUERY', `Retrieved ${open.length} open positions`, { details: { symbol } });
    return open;
  }

  async getOpenOrders(symbol?: string): Promise<OpenOrder[]> {
    const orders = await this.connector.getOpenOrders(symbol?.toUpperCase());
    this.auditService.info('ACCOUNT_QUERY', `Retrieved ${orders.length} open orders`, { details: { symbol } });
    return orders;
  }

  async getCurrentPrice(symbol: string): Promise<number> {
    const normalized = symbol.toUpperCase();
    const price = await this.connector.getCurrentPrice(normalized);
    this.auditService.info('ACCOUNT_QUERY', `Current price for ${normalized}: ${price}`);
    return price;
  }
}
