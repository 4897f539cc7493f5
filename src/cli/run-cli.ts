import logger from '../shared/logger';
import { Config } from '../shared/types';
import { MarketDataService } from '../market-data/market-data-service';
import { describeError } from '../market-data/errors';
import { CliCommand, CliUsageError, USAGE, parseCommandLine } from './arguments';
import {
  CommandContext,
  LinePrinter,
  runFunding,
  runLegacy,
  runOhlcv,
  runOrderBook,
  runPairs,
  runTrades,
} from './commands';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface CliDependencies {
  config: Config;
  // Called only once a command that needs the exchange has been parsed.
  createService: () => MarketDataService;
  print?: LinePrinter;
}

async function dispatch(ctx: CommandContext, command: Exclude<CliCommand, { kind: 'help' }>): Promise<void> {
  switch (command.kind) {
    case 'pairs':
      await runPairs(ctx, command.limit);
      return;
    case 'ohlcv':
      await runOhlcv(ctx, command.symbol, command.timeframe, command.limit);
      return;
    case 'orderbook':
      await runOrderBook(ctx, command.symbol, command.limit);
      return;
    case 'trades':
      await runTrades(ctx, command.symbol, command.limit);
      return;
    case 'funding':
      await runFunding(ctx, command.symbol);
      return;
    case 'legacy':
      await runLegacy(ctx);
      return;
    default: {
      const unhandled: never = command;
      throw new Error(`Unhandled command ${JSON.stringify(unhandled)}`);
    }
  }
}

/**
 * Parses argv, runs one command and resolves to the process exit code.
 */
export async function runCli(argv: readonly string[], deps: CliDependencies): Promise<number> {
  const print: LinePrinter = deps.print ?? (line => console.log(line));

  let command: CliCommand;
  try {
    command = parseCommandLine(argv, deps.config.defaults);
  } catch (error) {
    if (!(error instanceof CliUsageError)) throw error;
    print(`Error: ${error.message}`);
    print('');
    print(USAGE);
    return EXIT_USAGE;
  }

  if (command.kind === 'help') {
    print(USAGE);
    return EXIT_OK;
  }

  const ctx: CommandContext = { service: deps.createService(), config: deps.config, print };
  try {
    await dispatch(ctx, command);
    return EXIT_OK;
  } catch (error) {
    // The all-in-one run reports its own failure before re-throwing.
    if (command.kind !== 'legacy') {
      const description = describeError(error);
      print('');
      print(description);
      logger.error(`[Cli] ${command.kind} failed: ${description}`);
    }
    return EXIT_FAILURE;
  }
}
