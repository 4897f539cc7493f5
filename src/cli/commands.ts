/**
 * CLI commands. Each prints its section header, makes one fetch through the
 * market data service and prints the formatted result.
 */

import logger from '../shared/logger';
import { Candle, Config, FundingSnapshot, OrderBookSnapshot, Trade, TradingPair } from '../shared/types';
import { MarketDataService } from '../market-data/market-data-service';
import { describeError } from '../market-data/errors';
import {
  LegacyRunResult,
  formatBanner,
  formatFunding,
  formatLegacySummary,
  formatOhlcv,
  formatOrderBook,
  formatPairs,
  formatSectionHeader,
  formatTrades,
} from '../reporting/report-formatter';

export type LinePrinter = (line: string) => void;

export interface CommandContext {
  service: MarketDataService;
  config: Config;
  print: LinePrinter;
}

function printLines(print: LinePrinter, lines: readonly string[]): void {
  for (const line of lines) print(line);
}

export async function runPairs(ctx: CommandContext, displayLimit: number): Promise<TradingPair[]> {
  printLines(ctx.print, formatSectionHeader('Fetching Futures Trading Pairs'));
  const pairs = await ctx.service.fetchFuturesPairs();
  printLines(ctx.print, formatPairs(pairs, displayLimit));
  return pairs;
}

export async function runOhlcv(ctx: CommandContext, symbol: string, timeframe: string, limit: number): Promise<Candle[]> {
  printLines(ctx.print, formatSectionHeader(`Fetching OHLCV Data for ${symbol}`));
  const candles = await ctx.service.fetchOhlcv(symbol, timeframe, limit);
  printLines(ctx.print, formatOhlcv(candles, timeframe, limit, ctx.config.display.candles));
  return candles;
}

export async function runOrderBook(ctx: CommandContext, symbol: string, limit: number): Promise<OrderBookSnapshot> {
  printLines(ctx.print, formatSectionHeader(`Fetching Orderbook for ${symbol}`));
  const book = await ctx.service.fetchOrderBook(symbol, limit);
  printLines(ctx.print, formatOrderBook(book, ctx.config.display.bookLevels));
  return book;
}

export async function runTrades(ctx: CommandContext, symbol: string, limit: number): Promise<Trade[]> {
  printLines(ctx.print, formatSectionHeader(`Fetching Recent Trades for ${symbol}`));
  const trades = await ctx.service.fetchRecentTrades(symbol, limit);
  printLines(ctx.print, formatTrades(trades, ctx.config.display.trades));
  return trades;
}

/**
 * Unlike the other commands, a failed funding lookup is reported inline and
 * resolves to undefined instead of rejecting.
 */
export async function runFunding(ctx: CommandContext, symbol: string): Promise<FundingSnapshot | undefined> {
  printLines(ctx.print, formatSectionHeader(`Fetching Funding Rate for ${symbol}`));
  try {
    const snapshot = await ctx.service.fetchFundingSnapshot(symbol);
    printLines(ctx.print, formatFunding(snapshot));
    return snapshot;
  } catch (error) {
    const description = describeError(error);
    logger.error(`[Cli] Funding lookup for ${symbol} failed: ${description}`);
    ctx.print(`Error fetching funding rate: ${description}`);
    return undefined;
  }
}

/**
 * Pairs, OHLCV, order book and trades in sequence with the configured
 * defaults. Failures are reported and re-thrown so the process exits non-zero.
 */
export async function runLegacy(ctx: CommandContext): Promise<LegacyRunResult> {
  const { defaults } = ctx.config;
  printLines(ctx.print, formatBanner(ctx.config.app.name));

  try {
    const pairs = await runPairs(ctx, defaults.pairsLimit);
    const candles = await runOhlcv(ctx, defaults.symbol, defaults.timeframe, defaults.ohlcvLimit);
    const orderBook = await runOrderBook(ctx, defaults.symbol, defaults.orderbookLimit);
    const trades = await runTrades(ctx, defaults.symbol, defaults.tradesLimit);

    const result: LegacyRunResult = { pairs, candles, orderBook, trades };
    printLines(ctx.print, formatLegacySummary(result));
    return result;
  } catch (error) {
    const description = describeError(error);
    ctx.print('');
    ctx.print(description);
    logger.error(`[Cli] All-in-one run failed: ${description}`);
    throw error;
  }
}
