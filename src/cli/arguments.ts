import { parseArgs } from 'util';
import { Config } from '../shared/types';

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export type CliCommand =
  | { kind: 'pairs'; limit: number }
  | { kind: 'ohlcv'; symbol: string; timeframe: string; limit: number }
  | { kind: 'orderbook'; symbol: string; limit: number }
  | { kind: 'trades'; symbol: string; limit: number }
  | { kind: 'funding'; symbol: string }
  | { kind: 'legacy' }
  | { kind: 'help' };

export const USAGE = [
  'Usage: futures-data [command] [options]',
  '',
  'Commands:',
  '  pairs [-l N]                         List active linear futures pairs (default 20 shown)',
  '  ohlcv [symbol] [-t TF] [-l N]        Fetch candlesticks (default 1h, 100 candles)',
  '  orderbook [symbol] [-l N]            Fetch order book depth (default 20 levels)',
  '  trades [symbol] [-l N]               Fetch recent trades (default 50)',
  '  funding [symbol]                     Fetch the current funding rate',
  '  all                                  Run pairs, ohlcv, orderbook and trades (also the default)',
  '',
  'Options:',
  '  -l, --limit <n>        Number of rows to fetch or show',
  '  -t, --timeframe <tf>   Candle timeframe: 1m, 5m, 15m, 1h, 4h, 1d',
  '  -h, --help             Show this help',
  '',
  'Symbols use the unified perpetual notation, e.g. BTC/USDT:USDT.',
].join('\n');

const OPTIONS = {
  limit: { type: 'string', short: 'l' },
  timeframe: { type: 'string', short: 't' },
  help: { type: 'boolean', short: 'h' },
} as const;

function parseLimit(raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const trimmed = raw.trim();
  const value = Number.parseInt(trimmed, 10);
  if (!/^\d+$/.test(trimmed) || value <= 0) {
    throw new CliUsageError(`Invalid limit "${raw}": expected a positive integer`);
  }
  return value;
}

function singleSymbol(command: string, positionals: string[], fallback: string): string {
  if (positionals.length > 1) {
    throw new CliUsageError(`${command} takes at most one symbol, got: ${positionals.join(' ')}`);
  }
  return positionals[0] ?? fallback;
}

function parseRaw(argv: readonly string[]) {
  try {
    return parseArgs({ args: [...argv], options: OPTIONS, allowPositionals: true, strict: true });
  } catch (error) {
    // util.parseArgs throws TypeErrors for unknown options and missing values
    throw new CliUsageError(error instanceof Error ? error.message : String(error));
  }
}

export function parseCommandLine(argv: readonly string[], defaults: Config['defaults']): CliCommand {
  const { values, positionals } = parseRaw(argv);
  if (values.help) return { kind: 'help' };

  const [command, ...rest] = positionals;
  if (command === undefined || command === 'all') {
    if (rest.length > 0 || values.limit !== undefined || values.timeframe !== undefined) {
      throw new CliUsageError('The all-in-one run takes no arguments');
    }
    return { kind: 'legacy' };
  }
  if (command === 'help') return { kind: 'help' };

  if (values.timeframe !== undefined && command !== 'ohlcv') {
    throw new CliUsageError(`${command} does not take --timeframe`);
  }

  switch (command) {
    case 'pairs':
      if (rest.length > 0) throw new CliUsageError(`pairs takes no symbol, got: ${rest.join(' ')}`);
      return { kind: 'pairs', limit: parseLimit(values.limit, defaults.pairsLimit) };
    case 'ohlcv':
      return {
        kind: 'ohlcv',
        symbol: singleSymbol(command, rest, defaults.symbol),
        timeframe: values.timeframe?.trim() || defaults.timeframe,
        limit: parseLimit(values.limit, defaults.ohlcvLimit),
      };
    case 'orderbook':
      return {
        kind: 'orderbook',
        symbol: singleSymbol(command, rest, defaults.symbol),
        limit: parseLimit(values.limit, defaults.orderbookLimit),
      };
    case 'trades':
      return {
        kind: 'trades',
        symbol: singleSymbol(command, rest, defaults.symbol),
        limit: parseLimit(values.limit, defaults.tradesLimit),
      };
    case 'funding':
      if (values.limit !== undefined) throw new CliUsageError('funding does not take --limit');
      return { kind: 'funding', symbol: singleSymbol(command, rest, defaults.symbol) };
    default:
      throw new CliUsageError(`Unknown command "${command}"`);
  }
}
