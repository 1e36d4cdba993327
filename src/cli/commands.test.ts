import { describe, it, expect, beforeEach } from 'vitest';
import { CommanderError, InvalidArgumentError } from 'commander';
import { CliIO, buildProgram, describeError, parsePositiveInteger, parsePositiveNumber } from './commands';
import { StrategyBot } from '../services/StrategyBot';
import { BotConfig } from '../config/ConfigurationManager';
import { FakeExchangeConnector, rejection } from '../testing/FakeExchangeConnector';
import { FatalSetupError, ValidationError, createContext } from '../utils/ErrorHandler';
import { createSilentLogger } from '../utils/logger';
import { ManualScheduler, flushAsync } from '../testing/ManualScheduler';

const CONFIG: BotConfig = {
  exchange: { apiKey: 'test-key', secretKey: 'test-secret', testnet: true, recvWindowMs: 5000, requestTimeoutMs: 10000 },
  logging: { level: 'error', file: 'logs/test.log' },
  strategies: { gridPollIntervalMs: 1000, ocoPollIntervalMs: 1000 }
};

class CapturingIO implements CliIO {
  readonly lines: string[] = [];
  readonly errors: string[] = [];
  exitCode?: number;
  private handlers: Array<() => void> = [];

  out(line: string): void {
    this.lines.push(line);
  }

  err(line: string): void {
    this.errors.push(line);
  }

  setExitCode(code: number): void {
    this.exitCode = code;
  }

  onInterrupt(handler: () => void): () => void {
    this.handlers.push(handler);
    return () => {
      this.handlers = this.handlers.filter(candidate => candidate !== handler);
    };
  }

  interrupt(): void {
    for (const handler of this.handlers) {
      handler();
    }
  }

  listenerCount(): number {
    return this.handlers.length;
  }
}

describe('cli', () => {
  let connector: FakeExchangeConnector;
  let scheduler: ManualScheduler;
  let io: CapturingIO;
  let botsCreated: number;

  const run = (...args: string[]) => {
    const program = buildProgram({
      createBot: async () => {
        botsCreated++;
        return StrategyBot.start({ config: CONFIG, connector, scheduler, logger: createSilentLogger(), random: () => 0.5 });
      },
      io
    });
    return program.parseAsync(['node', 'futures-bot', ...args]);
  };

  beforeEach(() => {
    connector = new FakeExchangeConnector();
    scheduler = new ManualScheduler(0);
    io = new CapturingIO();
    botsCreated = 0;
  });

  describe('argument parsers', () => {
    it('accepts positive numbers', () => {
      expect(parsePositiveNumber('0.01')).toBe(0.01);
      expect(parsePositiveInteger('30')).toBe(30);
    });

    it('rejects everything else', () => {
      expect(() => parsePositiveNumber('abc')).toThrow(InvalidArgumentError);
      expect(() => parsePositiveNumber('0')).toThrow('Must be a positive number.');
      expect(() => parsePositiveNumber(' ')).toThrow('Must be a positive number.');
      expect(() => parsePositiveInteger('2.5')).toThrow('Must be a positive integer.');
    });
  });

  describe('describeError', () => {
    it('shows the user message and code of application errors', () => {
      const error = new ValidationError('Invalid side: HOLD. Must be BUY or SELL', 'INVALID_SIDE', createContext('test', 'validate'));

      expect(describeError(error)).toBe('Invalid input: Invalid side: HOLD. Must be BUY or SELL [INVALID_SIDE]');
      expect(describeError(new Error('boom'))).toBe('boom');
    });
  });

  describe('single orders', () => {
    it('prints the price', async () => {
      await run('price', 'btcusdt');

      expect(io.lines).toEqual(['BTCUSDT: 45000']);
    });

    it('places a market order', async () => {
      await run('market', 'BTCUSDT', 'buy', '0.01');

      expect(io.lines).toEqual([
        'Market order placed',
        '  Order ID: 1',
        '  Symbol:   BTCUSDT',
        '  Side:     BUY',
        '  Quantity: 0.01',
        '  Status:   FILLED',
        '  Avg fill: 45000'
      ]);
      expect(io.exitCode).toBeUndefined();
    });

    it('places a limit order and lists open orders', async () => {
      await run('limit', 'BTCUSDT', 'BUY', '0.01', '44000', '--tif', 'IOC', '--show-open');

      expect(connector.submitted[0].timeInForce).toBe('IOC');
      expect(io.lines).toContain('  Distance from market: -2.22%');
      expect(io.lines.slice(-2)).toEqual(['Open orders for BTCUSDT: 1', '  1 BUY 0.01 @ 44000']);
    });

    it('places a reduce-only stop-limit order', async () => {
      await run('stop-limit', 'BTCUSDT', 'SELL', '0.01', '44000', '43900', '--reduce-only');

      expect(connector.submitted[0]).toMatchObject({ orderKind: 'STOP', stopPrice: 44000, price: 43900, reduceOnly: true });
      expect(io.lines).toContain('  Stop:     44000');
    });

    it('cancels and looks up orders', async () => {
      await connector.submitOrder({ symbol: 'BTCUSDT', side: 'BUY', orderKind: 'LIMIT', quantity: 0.01, price: 44000, timeInForce: 'GTC' });

      await run('order', 'BTCUSDT', '1');
      await run('cancel', 'BTCUSDT', '1');

      expect(io.lines).toEqual(['Order 1 on BTCUSDT: NEW', '  Executed: 0 @ 0', 'Order 1 on BTCUSDT: CANCELED']);
    });
  });

  describe('status', () => {
    it('prints balances, positions and orders', async () => {
      connector.positions = [
        { symbol: 'BTCUSDT', positionSide: 'BOTH', positionAmt: 0.01, entryPrice: 44000, markPrice: 45000, unrealizedProfit: 10, leverage: 5 }
      ];

      await run('status', '--positions', '--orders');

      expect(io.lines).toEqual([
        'Account',
        '  Wallet balance:    1000 USDT',
        '  Unrealized PnL:    0 USDT',
        '  Margin balance:    1000 USDT',
        '  Available balance: 1000 USDT',
        '  Can trade:         yes',
        '  USDT: 1000 (available 1000)',
        'Open positions: 1',
        '  BTCUSDT 0.01 @ 44000 mark 45000 PnL 10',
        'Open orders: 0'
      ]);
    });
  });

  describe('errors', () => {
    it('rejects a malformed argument before starting the bot', async () => {
      const failure = await run('market', 'BTCUSDT', 'BUY', 'abc').catch((error: unknown) => error);

      expect(failure).toBeInstanceOf(CommanderError);
      expect(failure).toMatchObject({ code: 'commander.invalidArgument' });
      expect(io.errors).toEqual(["error: command-argument value 'abc' is invalid for argument 'quantity'. Must be a positive number."]);
      expect(botsCreated).toBe(0);
    });

    it('reports validation failures with exit code 1', async () => {
      await run('market', 'BTCUSDT', 'HOLD', '0.01');

      expect(io.errors).toEqual(['Error: Invalid input: Invalid side: HOLD. Must be BUY or SELL [INVALID_SIDE]']);
      expect(io.exitCode).toBe(1);
      expect(connector.callCount('submitOrder')).toBe(0);
    });

    it('reports a failed start', async () => {
      const program = buildProgram({
        createBot: async () => {
          throw new FatalSetupError('Failed to connect to exchange: Service unavailable', createContext('StrategyBot', 'authenticate'));
        },
        io
      });

      await program.parseAsync(['node', 'futures-bot', 'price', 'BTCUSDT']);

      expect(io.errors).toEqual([
        'Error: Cannot start the strategy bot: Failed to connect to exchange: Service unavailable [FATAL_SETUP_ERROR]'
      ]);
      expect(io.exitCode).toBe(1);
    });
  });

  describe('strategies', () => {
    it('runs a TWAP to completion', async () => {
      const running = run('twap', 'BTCUSDT', 'buy', '0.002', '4', '--no-randomize');

      await scheduler.advance(120000);
      await running;

      expect(connector.submitted).toHaveLength(2);
      expect(io.lines.slice(-4)).toEqual([
        '  #1 0.001 at 1970-01-01T00:00:00.000Z EXECUTED',
        '  #2 0.001 at 1970-01-01T00:02:00.000Z EXECUTED',
        '  Executed: 0.002',
        '  Average price: 45000'
      ]);
      expect(io.exitCode).toBeUndefined();
      expect(io.listenerCount()).toBe(0);
    });

    it('cancels a TWAP on interrupt and exits with 1', async () => {
      const running = run('twap', 'BTCUSDT', 'buy', '0.01', '30', '--no-randomize');

      await flushAsync();
      io.interrupt();
      await running;

      const header = io.lines.filter(line => line.startsWith('TWAP '));
      expect(header[header.length - 1]).toMatch(/^TWAP twap_\S+ on BTCUSDT: CANCELED$/);
      expect(io.lines).toContain('  Executed: 0.001');
      expect(io.exitCode).toBe(1);
    });

    it('watches an OCO until the take profit fills', async () => {
      connector.setPrice('BTCUSDT', 42000);
      const running = run('oco', 'BTCUSDT', '0.01', '45000', '39000');

      await flushAsync();
      connector.fill('1');
      await scheduler.advance(1000);
      await running;

      expect(io.lines).toContain('  Resolution: TAKE_PROFIT_FILLED');
      expect(connector.canceled).toEqual(['2']);
    });

    it('cancels the take profit when the stop loss cannot be placed', async () => {
      connector.setPrice('BTCUSDT', 42000);
      connector.rejectSubmit(intent => intent.orderKind === 'STOP_MARKET', rejection('Order would immediately trigger.', -2021));

      await run('oco', 'BTCUSDT', '0.01', '45000', '39000');

      expect(connector.canceled).toEqual(['1']);
      expect(io.errors).toEqual([
        'Stop loss was not placed; cancelling take profit 1',
        'Error: Exchange rejected the request: Stop loss order failed: Order would immediately trigger. [OCO_PLACEMENT_FAILED]'
      ]);
      expect(io.exitCode).toBe(1);
    });

    it('lays a grid and cancels it on interrupt when asked', async () => {
      const running = run('grid', 'BTCUSDT', '40000', '50000', '10', '0.01', '--cancel-on-exit');

      await flushAsync();
      io.interrupt();
      await running;

      expect(io.lines).toContain('Placed 5 buy and 5 sell orders (0 skipped, 0 failed)');
      expect(connector.canceled).toHaveLength(10);
      expect(io.exitCode).toBeUndefined();
    });
  });
});
