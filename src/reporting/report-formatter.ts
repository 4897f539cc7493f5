/**
 * Report Formatter
 * Turns market data entities into console lines. Pure: nothing here prints.
 */

import { computeSpread, computeTradeFlow } from '../market-data/statistics';
import {
  Candle,
  FundingSnapshot,
  OrderBookLevel,
  OrderBookSnapshot,
  Trade,
  TradeSide,
  TradingPair,
} from '../shared/types';

const RULE = '='.repeat(50);

const SIDE_LABELS: Record<TradeSide, string> = {
  buy: 'BUY ',
  sell: 'SELL',
  unknown: '?   ',
};

export interface LegacyRunResult {
  pairs: TradingPair[];
  candles: Candle[];
  orderBook: OrderBookSnapshot;
  trades: Trade[];
}

export function formatTimestamp(timestamp: number | undefined): string {
  if (timestamp === undefined || !Number.isFinite(timestamp)) return 'n/a';
  const date = new Date(timestamp);
  // Finite values beyond +/-8.64e15 ms give an invalid Date
  return Number.isNaN(date.getTime()) ? 'n/a' : date.toISOString();
}

export function formatBanner(title: string): string[] {
  return [RULE, title, RULE];
}

export function formatSectionHeader(title: string): string[] {
  return ['', `=== ${title} ===`];
}

export function formatPairs(pairs: readonly TradingPair[], displayLimit: number): string[] {
  const lines = [`Found ${pairs.length} active linear futures pairs`, '', 'Sample pairs:'];
  for (const pair of pairs.slice(0, displayLimit)) {
    lines.push(`  ${pair.symbol}`);
  }
  return lines;
}

export function formatOhlcv(candles: readonly Candle[], timeframe: string, limit: number, previewCount: number): string[] {
  const preview = candles.slice(-previewCount);
  const lines = [
    `Timeframe: ${timeframe}, Limit: ${limit}`,
    `Fetched ${candles.length} candles`,
    '',
    `Last ${preview.length} candles [timestamp, open, high, low, close, volume]:`,
  ];

  for (const candle of preview) {
    lines.push(
      `  ${formatTimestamp(candle.timestamp)}: O=${candle.open.toFixed(2)} H=${candle.high.toFixed(2)} ` +
        `L=${candle.low.toFixed(2)} C=${candle.close.toFixed(2)} V=${candle.volume.toFixed(2)}`
    );
  }
  return lines;
}

function formatLevels(title: string, levels: readonly OrderBookLevel[], previewCount: number): string[] {
  const preview = levels.slice(0, previewCount);
  const lines = ['', `Top ${preview.length} ${title} (price, amount):`];
  for (const level of preview) {
    lines.push(`  ${level.price.toFixed(2)} | ${level.amount.toFixed(4)}`);
  }
  return lines;
}

export function formatOrderBook(book: OrderBookSnapshot, previewCount: number): string[] {
  const lines = [
    `Orderbook timestamp: ${formatTimestamp(book.timestamp)}`,
    `Bids: ${book.bids.length}, Asks: ${book.asks.length}`,
    ...formatLevels('Bids', book.bids, previewCount),
    ...formatLevels('Asks', book.asks, previewCount),
  ];

  const spread = computeSpread(book);
  if (spread) {
    lines.push('', `Spread: ${spread.spread.toFixed(2)} (${spread.spreadPct.toFixed(4)}%)`);
  }
  return lines;
}

export function formatTrades(trades: readonly Trade[], previewCount: number): string[] {
  const preview = trades.slice(-previewCount);
  const lines = [`Fetched ${trades.length} trades`, '', `Last ${preview.length} trades:`];

  for (const trade of preview) {
    lines.push(
      `  ${formatTimestamp(trade.timestamp)} | ${SIDE_LABELS[trade.side]} | ${trade.price.toFixed(2)} | ${trade.amount.toFixed(4)}`
    );
  }

  const flow = computeTradeFlow(trades);
  if (flow.ratio) {
    lines.push('', `Buy/Sell ratio: ${flow.ratio.buyPct.toFixed(1)}% / ${flow.ratio.sellPct.toFixed(1)}%`);
  }
  return lines;
}

export function formatFunding(snapshot: FundingSnapshot): string[] {
  return [
    `Symbol: ${snapshot.symbol}`,
    `Funding rate: ${(snapshot.fundingRate * 100).toFixed(4)}%`,
    `Annualized rate: ${(snapshot.annualizedRate * 100).toFixed(2)}%`,
    `Mark price: ${snapshot.markPrice.toFixed(2)}`,
    `Index price: ${snapshot.indexPrice.toFixed(2)}`,
    `Next funding: ${formatTimestamp(snapshot.nextFundingTime || undefined)}`,
  ];
}

export function formatLegacySummary(result: LegacyRunResult): string[] {
  const lines = [
    '',
    ...formatBanner('Data fetch complete!'),
    `Pairs: ${result.pairs.length}`,
    `Candles: ${result.candles.length}`,
    `Order book: ${result.orderBook.bids.length} bids / ${result.orderBook.asks.length} asks`,
    `Trades: ${result.trades.length}`,
  ];

  const spread = computeSpread(result.orderBook);
  if (spread) lines.push(`Spread: ${spread.spread.toFixed(2)} (${spread.spreadPct.toFixed(4)}%)`);

  const flow = computeTradeFlow(result.trades);
  if (flow.ratio) lines.push(`Buy/Sell ratio: ${flow.ratio.buyPct.toFixed(1)}% / ${flow.ratio.sellPct.toFixed(1)}%`);

  return lines;
}
