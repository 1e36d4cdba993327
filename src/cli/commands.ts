/**
 * Command definitions for the futures strategy bot
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { OcoExecution, OcoPlacementError } from '../services/OcoEngine';
import { StrategyBot } from '../services/StrategyBot';
import { PlacedOrder } from '../services/OrderService';
import { GridStrategy, OcoPair, TwapPlan } from '../models/Strategy';
import { TimeInForce } from '../models/Order';
import { ApplicationError, errorMessage } from '../utils/ErrorHandler';

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  setExitCode(code: number): void;
  /** Registers an interrupt handler; returns a function that removes it */
  onInterrupt(handler: () => void): () => void;
}

export interface CliDependencies {
  createBot(): Promise<StrategyBot>;
  io: CliIO;
}

interface StatusOptions {
  positions?: boolean;
  orders?: boolean;
  symbol?: string;
}

interface LimitOptions {
  tif: TimeInForce;
  showOpen?: boolean;
}

interface StopLimitOptions {
  reduceOnly?: boolean;
}

interface OcoOptions {
  position: string;
}

interface TwapOptions {
  priceLimit?: number;
  randomize: boolean;
}

interface GridOptions {
  cancelOnExit?: boolean;
}

const TIME_IN_FORCE: readonly TimeInForce[] = ['GTC', 'IOC', 'FOK'];

export function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive number.');
  }
  return parsed;
}

export function parsePositiveInteger(value: string): number {
  const parsed = parsePositiveNumber(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function describeError(error: unknown): string {
  if (error instanceof ApplicationError) {
    return `${error.userMessage} [${error.code}]`;
  }
  return errorMessage(error);
}

function formatOrder(io: CliIO, label: string, placed: PlacedOrder): void {
  io.out(`${label} order placed`);
  io.out(`  Order ID: ${placed.snapshot.orderId}`);
  io.out(`  Symbol:   ${placed.snapshot.symbol}`);
  io.out(`  Side:     ${placed.record.intent.side}`);
  io.out(`  Quantity: ${placed.record.intent.quantity}`);
  if (placed.record.intent.price !== undefined) {
    io.out(`  Price:    ${placed.record.intent.price}`);
  }
  if (placed.record.intent.stopPrice !== undefined) {
    io.out(`  Stop:     ${placed.record.intent.stopPrice}`);
  }
  io.out(`  Status:   ${placed.snapshot.status}`);
  if (placed.snapshot.averagePrice > 0) {
    io.out(`  Avg fill: ${placed.snapshot.averagePrice}`);
  }
  if (placed.priceDeviationPercent !== undefined) {
    io.out(`  Distance from market: ${placed.priceDeviationPercent}%`);
  }
}

function formatGrid(io: CliIO, grid: GridStrategy): void {
  io.out(`Grid ${grid.id} on ${grid.symbol}: ${grid.status}`);
  io.out(`  Range:   ${grid.lowPrice} - ${grid.highPrice} (${grid.levelCount} levels, spacing ${grid.spacing})`);
  io.out(`  Reference price: ${grid.referencePrice}`);
  for (const level of grid.levels) {
    io.out(`  #${level.levelIndex} ${level.side} ${level.quantity} @ ${level.price} ${level.order.status}`);
  }
  io.out(`  Trades executed: ${grid.executedTrades.length}`);
}

function formatTwap(io: CliIO, plan: TwapPlan): void {
  io.out(`TWAP ${plan.id} on ${plan.symbol}: ${plan.status}`);
  io.out(`  ${plan.side} ${plan.totalQuantity} over ${plan.durationMinutes} min in ${plan.chunkCount} chunks (every ~${plan.intervalSeconds}s)`);
  for (const chunk of plan.chunks) {
    const at = new Date(chunk.scheduledAt).toISOString();
    io.out(`  #${chunk.chunkIndex} ${chunk.quantity} at ${at} ${chunk.status}`);
  }
  io.out(`  Executed: ${plan.executedQuantity}`);
  if (plan.averagePrice !== undefined) {
    io.out(`  Average price: ${plan.averagePrice}`);
  }
  if (plan.lastError) {
    io.out(`  Last error: ${plan.lastError}`);
  }
}

function formatOco(io: CliIO, pair: OcoPair): void {
  io.out(`OCO ${pair.id} on ${pair.symbol} (${pair.positionSide} ${pair.quantity}): ${pair.status}`);
  io.out(`  Take profit: ${pair.takeProfit.intent.price} [${pair.takeProfit.exchangeOrderId ?? '-'}] ${pair.takeProfit.status}`);
  io.out(`  Stop loss:   ${pair.stopLoss.intent.stopPrice} [${pair.stopLoss.exchangeOrderId ?? '-'}] ${pair.stopLoss.status}`);
  if (pair.resolution) {
    io.out(`  Resolution: ${pair.resolution}`);
  }
  if (pair.cancellationFailures > 0) {
    io.out(`  Cancellation failures: ${pair.cancellationFailures}`);
  }
}

export function buildProgram(deps: CliDependencies): Command {
  const { io } = deps;
  const program = new Command();

  program
    .name('futures-bot')
    .description('Grid, TWAP and OCO strategies for USD-M futures')
    .version('1.0.0')
    .configureOutput({
      writeOut: text => io.out(text.trimEnd()),
      writeErr: text => io.err(text.trimEnd())
    })
    .exitOverride();

  // Each action gets a started bot; failures end with exit code 1
  const withBot =
    <A extends unknown[]>(run: (bot: StrategyBot, ...args: A) => Promise<void>) =>
    async (...args: A): Promise<void> => {
      try {
        const bot = await deps.createBot();
        await run(bot, ...args);
      } catch (error) {
        io.err(`Error: ${describeError(error)}`);
        io.setExitCode(1);
      }
    };

  program
    .command('price')
    .description('Show the current price of a symbol')
    .argument('<symbol>', 'trading pair, e.g. BTCUSDT')
    .action(
      withBot(async (bot: StrategyBot, symbol: string) => {
        const price = await bot.account.getCurrentPrice(symbol);
        io.out(`${symbol.toUpperCase()}: ${price}`);
      })
    );

  program
    .command('status')
    .description('Show account balances, and optionally positions and open orders')
    .option('--positions', 'list open positions')
    .option('--orders', 'list open orders')
    .option('-s, --symbol <symbol>', 'restrict positions and orders to one symbol')
    .action(
      withBot(async (bot: StrategyBot, options: StatusOptions) => {
        const account = await bot.account.getAccountSummary();
        io.out('Account');
        io.out(`  Wallet balance:    ${account.totalWalletBalance} USDT`);
        io.out(`  Unrealized PnL:    ${account.totalUnrealizedProfit} USDT`);
        io.out(`  Margin balance:    ${account.totalMarginBalance} USDT`);
        io.out(`  Available balance: ${account.availableBalance} USDT`);
        io.out(`  Can trade:         ${account.canTrade ? 'yes' : 'no'}`);
        for (const asset of account.assets) {
          io.out(`  ${asset.asset}: ${asset.walletBalance} (available ${asset.availableBalance})`);
        }

        if (options.positions) {
          const positions = await bot.account.getOpenPositions(options.symbol);
          io.out(`Open positions: ${positions.length}`);
          for (const position of positions) {
            io.out(
              `  ${position.symbol} ${position.positionAmt} @ ${position.entryPrice} mark ${position.markPrice} PnL ${position.unrealizedProfit}`
            );
          }
        }

        if (options.orders) {
          const orders = await bot.account.getOpenOrders(options.symbol);
          io.out(`Open orders: ${orders.length}`);
          for (const order of orders) {
            io.out(`  ${order.orderId} ${order.symbol} ${order.side} ${order.type} ${order.origQty} @ ${order.price} ${order.status}`);
          }
        }
      })
    );

  program
    .command('market')
    .description('Place a market order')
    .argument('<symbol>', 'trading pair')
    .argument('<side>', 'BUY or SELL')
    .argument('<quantity>', 'order quantity', parsePositiveNumber)
    .action(
      withBot(async (bot: StrategyBot, symbol: string, side: string, quantity: number) => {
        formatOrder(io, 'Market', await bot.orders.placeMarketOrder(symbol, side, quantity));
      })
    );

  program
    .command('limit')
    .description('Place a limit order')
    .argument('<symbol>', 'trading pair')
    .argument('<side>', 'BUY or SELL')
    .argument('<quantity>', 'order quantity', parsePositiveNumber)
    .argument('<price>', 'limit price', parsePositiveNumber)
    .addOption(new Option('--tif <tif>', 'time in force').choices(TIME_IN_FORCE).default('GTC'))
    .option('--show-open', 'list open orders for the symbol afterwards')
    .action(
      withBot(async (bot: StrategyBot, symbol: string, side: string, quantity: number, price: number, options: LimitOptions) => {
        formatOrder(io, 'Limit', await bot.orders.placeLimitOrder(symbol, side, quantity, price, options.tif));
        if (options.showOpen) {
          const orders = await bot.account.getOpenOrders(symbol);
          io.out(`Open orders for ${symbol.toUpperCase()}: ${orders.length}`);
          for (const order of orders) {
            io.out(`  ${order.orderId} ${order.side} ${order.origQty} @ ${order.price}`);
          }
        }
      })
    );

  program
    .command('stop-limit')
    .description('Place a stop-limit order')
    .argument('<symbol>', 'trading pair')
    .argument('<side>', 'BUY or SELL')
    .argument('<quantity>', 'order quantity', parsePositiveNumber)
    .argument('<stopPrice>', 'trigger price', parsePositiveNumber)
    .argument('<limitPrice>', 'limit price once triggered', parsePositiveNumber)
    .option('--reduce-only', 'only reduce an existing position')
    .action(
      withBot(
        async (bot: StrategyBot, symbol: string, side: string, quantity: number, stopPrice: number, limitPrice: number, options: StopLimitOptions) => {
          formatOrder(
            io,
            'Stop-limit',
            await bot.orders.placeStopLimitOrder(symbol, side, quantity, stopPrice, limitPrice, options.reduceOnly ?? false)
          );
        }
      )
    );

  program
    .command('oco')
    .description('Protect a position with a take-profit and stop-loss pair, and watch it until one side fills')
    .argument('<symbol>', 'trading pair')
    .argument('<quantity>', 'position quantity to close', parsePositiveNumber)
    .argument('<takeProfit>', 'take-profit price', parsePositiveNumber)
    .argument('<stopLoss>', 'stop-loss price', parsePositiveNumber)
    .addOption(new Option('--position <side>', 'side of the position being protected').choices(['LONG', 'SHORT']).default('LONG'))
    .action(
      withBot(async (bot: StrategyBot, symbol: string, quantity: number, takeProfit: number, stopLoss: number, options: OcoOptions) => {
        let execution: OcoExecution;
        try {
          execution = await bot.oco.createOco({
            symbol,
            quantity,
            takeProfitPrice: takeProfit,
            stopLossPrice: stopLoss,
            positionSide: options.position
          });
        } catch (error) {
          if (error instanceof OcoPlacementError) {
            io.err(`Stop loss was not placed; cancelling take profit ${error.takeProfitOrderId}`);
            try {
              await bot.orders.cancelOrder(symbol, error.takeProfitOrderId);
            } catch (cancelError) {
              io.err(`Take profit ${error.takeProfitOrderId} is still open: ${describeError(cancelError)}`);
            }
          }
          throw error;
        }

        formatOco(io, execution.pair);
        io.out('Monitoring until one side fills (Ctrl+C to stop, orders stay open)');
        const pairId = execution.pair.id;
        const detach = io.onInterrupt(() => {
          bot.oco.cancelOco(pairId).catch(error => io.err(`Error: ${describeError(error)}`));
        });
        try {
          formatOco(io, await execution.monitor);
        } finally {
          detach();
        }
      })
    );

  program
    .command('twap')
    .description('Split an order into chunks executed over a duration')
    .argument('<symbol>', 'trading pair')
    .argument('<side>', 'BUY or SELL')
    .argument('<quantity>', 'total quantity', parsePositiveNumber)
    .argument('<minutes>', 'duration in minutes', parsePositiveInteger)
    .option('--price-limit <price>', 'use LIMIT chunks at this price instead of MARKET', parsePositiveNumber)
    .option('--no-randomize', 'run chunks at exact intervals')
    .action(
      withBot(async (bot: StrategyBot, symbol: string, side: string, quantity: number, minutes: number, options: TwapOptions) => {
        const execution = await bot.twap.createTwap({
          symbol,
          side,
          totalQuantity: quantity,
          durationMinutes: minutes,
          priceLimit: options.priceLimit,
          randomizeTiming: options.randomize
        });
        formatTwap(io, execution.plan);

        const planId = execution.plan.id;
        const detach = io.onInterrupt(() => {
          bot.twap.cancelTwap(planId).catch(error => io.err(`Error: ${describeError(error)}`));
        });
        try {
          const finished = await execution.completion;
          formatTwap(io, finished);
          if (finished.status !== 'COMPLETED') {
            io.setExitCode(1);
          }
        } finally {
          detach();
        }
      })
    );

  program
    .command('grid')
    .description('Lay a grid of limit orders across a price range and watch it fill')
    .argument('<symbol>', 'trading pair')
    .argument('<low>', 'lowest grid price', parsePositiveNumber)
    .argument('<high>', 'highest grid price', parsePositiveNumber)
    .argument('<levels>', 'number of grid levels', parsePositiveInteger)
    .argument('<quantity>', 'quantity per level', parsePositiveNumber)
    .option('--cancel-on-exit', 'cancel resting grid orders when interrupted')
    .action(
      withBot(async (bot: StrategyBot, symbol: string, low: number, high: number, levels: number, quantity: number, options: GridOptions) => {
        const execution = await bot.grid.createGrid({
          symbol,
          lowPrice: low,
          highPrice: high,
          levelCount: levels,
          quantityPerLevel: quantity
        });
        const { summary } = execution;
        io.out(`Placed ${summary.placedBuy} buy and ${summary.placedSell} sell orders (${summary.skipped} skipped, ${summary.failed.length} failed)`);
        for (const failure of summary.failed) {
          io.err(`  Level ${failure.levelIndex} @ ${failure.price}: ${failure.error}`);
        }
        formatGrid(io, execution.strategy);

        const gridId = execution.strategy.id;
        const detach = io.onInterrupt(() => {
          bot.grid
            .stopGrid(gridId, { cancelOpenOrders: options.cancelOnExit ?? false })
            .catch(error => io.err(`Error: ${describeError(error)}`));
        });
        try {
          formatGrid(io, await execution.monitor);
        } finally {
          detach();
        }
      })
    );

  program
    .command('cancel')
    .description('Cancel an open order')
    .argument('<symbol>', 'trading pair')
    .argument('<orderId>', 'exchange order id')
    .action(
      withBot(async (bot: StrategyBot, symbol: string, orderId: string) => {
        const snapshot = await bot.orders.cancelOrder(symbol, orderId);
        io.out(`Order ${snapshot.orderId} on ${snapshot.symbol}: ${snapshot.status}`);
      })
    );

  program
    .command('order')
    .description('Show the status of an order')
    .argument('<symbol>', 'trading pair')
    .argument('<orderId>', 'exchange order id')
    .action(
      withBot(async (bot: StrategyBot, symbol: string, orderId: string) => {
        const snapshot = await bot.orders.getOrderStatus(symbol, orderId);
        io.out(`Order ${snapshot.orderId} on ${snapshot.symbol}: ${snapshot.status}`);
        io.out(`  Executed: ${snapshot.executedQuantity} @ ${snapshot.averagePrice}`);
      })
    );

  return program;
}
