// Shared types for the futures data fetcher

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Config {
  app: {
    name: string;
    version: string;
    logLevel: LogLevel;
  };
  exchange: {
    enableRateLimit: boolean;
    defaultType: 'future';
  };
  defaults: {
    symbol: string;
    timeframe: string;
    ohlcvLimit: number;
    orderbookLimit: number;
    tradesLimit: number;
    pairsLimit: number;
  };
  display: {
    candles: number;
    bookLevels: number;
    trades: number;
  };
}

export interface TradingPair {
  symbol: string;
  base: string;
  quote: string;
  contractSize: number;
}

export interface Candle {
  timestamp: number; // epoch ms
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface OrderBookLevel {
  price: number;
  amount: number;
}

export interface OrderBookSnapshot {
  symbol: string;
  bids: OrderBookLevel[]; // best (highest) first
  asks: OrderBookLevel[]; // best (lowest) first
  timestamp?: number;
}

export type TradeSide = 'buy' | 'sell' | 'unknown';

export interface Trade {
  timestamp: number;
  side: TradeSide;
  price: number;
  amount: number;
}

export interface FundingSnapshot {
  symbol: string;
  fundingRate: number;
  annualizedRate: number;
  markPrice: number;
  indexPrice: number;
  nextFundingTime: number;
  timestamp: number;
}

export interface SpreadStats {
  bestBid: number;
  bestAsk: number;
  spread: number;
  spreadPct: number;
}

export interface TradeFlow {
  buyVolume: number;
  sellVolume: number;
  totalVolume: number;
  ratio?: {
    buyPct: number;
    sellPct: number;
  };
}
