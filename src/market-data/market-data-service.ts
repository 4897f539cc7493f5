/**
 * Market Data Service
 * One call per data kind against the exchange gateway, normalised into the
 * read-only entities the reports are built from.
 */

import logger from '../shared/logger';
import {
  Candle,
  FundingSnapshot,
  OrderBookLevel,
  OrderBookSnapshot,
  Trade,
  TradeSide,
  TradingPair,
} from '../shared/types';
import { MarketDataError } from './errors';
import { ExchangeGateway, RawBookLevel, RawCandle, RawTrade } from './exchange-gateway';
import { annualizeFundingRate } from './statistics';

function toNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string') return Number.parseFloat(value);
  return Number.NaN;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Unified contract symbol to the exchange-native id used by raw endpoints:
 * BTC/USDT:USDT -> BTCUSDT, BTC/USDT:USDT-250627 -> BTCUSDT_250627.
 */
export function toNativeSymbol(symbol: string): string {
  const [pair, settle = ''] = symbol.split(':');
  const base = pair.replace(/\//g, '').trim();
  const expiry = /-(\d{6})$/.exec(settle.trim());
  return expiry ? `${base}_${expiry[1]}` : base;
}

function normalizeSide(side: string | undefined): TradeSide {
  const lowered = side?.toLowerCase();
  return lowered === 'buy' || lowered === 'sell' ? lowered : 'unknown';
}

function toCandle(row: RawCandle): Candle | undefined {
  const timestamp = row[0];
  if (timestamp === undefined || !Number.isFinite(timestamp)) return undefined;
  return {
    timestamp,
    open: row[1] ?? 0,
    high: row[2] ?? 0,
    low: row[3] ?? 0,
    close: row[4] ?? 0,
    volume: row[5] ?? 0,
  };
}

function toBookLevels(levels: ReadonlyArray<RawBookLevel>, limit: number): OrderBookLevel[] {
  const result: OrderBookLevel[] = [];
  for (const [price, amount] of levels) {
    if (price === undefined || amount === undefined) continue;
    if (!Number.isFinite(price) || !Number.isFinite(amount)) continue;
    result.push({ price, amount });
  }
  return result.slice(0, limit);
}

function toTrade(raw: RawTrade): Trade | undefined {
  if (raw.timestamp === undefined || !Number.isFinite(raw.timestamp)) return undefined;
  return {
    timestamp: raw.timestamp,
    side: normalizeSide(raw.side),
    price: raw.price ?? 0,
    amount: raw.amount ?? 0,
  };
}

/**
 * Reads a premium-index payload. Single-symbol requests return an object; a
 * list is searched for the requested symbol.
 */
export function parsePremiumIndex(raw: unknown, nativeSymbol: string, now: number = Date.now()): FundingSnapshot {
  const payload: unknown = Array.isArray(raw)
    ? raw.find((item: unknown) => isRecord(item) && item.symbol === nativeSymbol)
    : raw;

  const symbol = isRecord(payload) ? payload.symbol : undefined;
  if (!isRecord(payload) || typeof symbol !== 'string' || !symbol) {
    throw new MarketDataError(`Unexpected premium index response for ${nativeSymbol}`);
  }
  if (symbol !== nativeSymbol) {
    throw new MarketDataError(`Premium index response is for ${symbol}, expected ${nativeSymbol}`);
  }

  const fundingRate = toNumber(payload.lastFundingRate);
  const markPrice = toNumber(payload.markPrice);
  const indexPrice = toNumber(payload.indexPrice);
  if (!Number.isFinite(fundingRate) || !Number.isFinite(markPrice) || !Number.isFinite(indexPrice)) {
    throw new MarketDataError(`Premium index response for ${symbol} is missing funding or price fields`);
  }

  const nextFundingTime = toNumber(payload.nextFundingTime);
  const timestamp = toNumber(payload.time);

  return {
    symbol,
    fundingRate,
    annualizedRate: annualizeFundingRate(fundingRate),
    markPrice,
    indexPrice,
    nextFundingTime: Number.isFinite(nextFundingTime) ? nextFundingTime : 0,
    timestamp: Number.isFinite(timestamp) ? timestamp : now,
  };
}

export class MarketDataService {
  constructor(private readonly gateway: ExchangeGateway) {}

  /**
   * Active linear contracts in catalog order. Callers decide how many to show.
   */
  async fetchFuturesPairs(): Promise<TradingPair[]> {
    const markets = await this.gateway.loadMarkets();
    const pairs: TradingPair[] = [];

    for (const market of markets) {
      if (market.linear !== true || market.active !== true) continue;
      pairs.push({
        symbol: market.symbol,
        base: market.base ?? '',
        quote: market.quote ?? '',
        contractSize: market.contractSize ?? 1,
      });
    }

    logger.debug(`[MarketData] ${pairs.length}/${markets.length} markets are active linear contracts`);
    return pairs;
  }

  async fetchOhlcv(symbol: string, timeframe: string, limit: number): Promise<Candle[]> {
    const rows = await this.gateway.fetchOhlcv(symbol, timeframe, limit);
    const candles: Candle[] = [];
    for (const row of rows) {
      const candle = toCandle(row);
      if (candle) candles.push(candle);
    }

    candles.sort((a, b) => a.timestamp - b.timestamp);
    logger.debug(`[MarketData] ${symbol} ${timeframe}: ${candles.length} candles (limit ${limit})`);
    return candles.length > limit ? candles.slice(-limit) : candles;
  }

  async fetchOrderBook(symbol: string, limit: number): Promise<OrderBookSnapshot> {
    const book = await this.gateway.fetchOrderBook(symbol, limit);
    const snapshot: OrderBookSnapshot = {
      symbol,
      bids: toBookLevels(book.bids, limit),
      asks: toBookLevels(book.asks, limit),
      timestamp: book.timestamp,
    };
    logger.debug(`[MarketData] ${symbol} book: ${snapshot.bids.length} bids / ${snapshot.asks.length} asks`);
    return snapshot;
  }

  async fetchRecentTrades(symbol: string, limit: number): Promise<Trade[]> {
    const rawTrades = await this.gateway.fetchTrades(symbol, limit);
    const trades: Trade[] = [];
    for (const raw of rawTrades) {
      const trade = toTrade(raw);
      if (trade) trades.push(trade);
    }

    trades.sort((a, b) => a.timestamp - b.timestamp);
    logger.debug(`[MarketData] ${symbol}: ${trades.length} trades (limit ${limit})`);
    return trades;
  }

  async fetchFundingSnapshot(symbol: string): Promise<FundingSnapshot> {
    const nativeSymbol = toNativeSymbol(symbol);
    const raw = await this.gateway.fetchPremiumIndex(nativeSymbol);
    return parsePremiumIndex(raw, nativeSymbol);
  }
}
