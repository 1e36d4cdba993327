#!/usr/bin/env node
import { CommanderError } from 'commander';
import { ConfigurationManager } from '../config/ConfigurationManager';
import { StrategyBot } from '../services/StrategyBot';
import { CliIO, buildProgram, describeError } from './commands';

const io: CliIO = {
  out: line => console.log(line),
  err: line => console.error(line),
  setExitCode: code => {
    process.exitCode = code;
  },
  onInterrupt: handler => {
    process.once('SIGINT', handler);
    return () => {
      process.removeListener('SIGINT', handler);
    };
  }
};

async function main(): Promise<void> {
  const program = buildProgram({
    createBot: () => {
      const config = new ConfigurationManager().loadConfiguration();
      return StrategyBot.start({ config });
    },
    io
  });

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      process.exitCode = error.exitCode;
      return;
    }
    io.err(`Error: ${describeError(error)}`);
    process.exitCode = 1;
  }
}

main().catch(error => {
  console.error('Fatal error:', error);
  process.exit(1);
});
