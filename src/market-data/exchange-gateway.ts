/**
 * Exchange Gateway
 * The five public queries the fetcher needs from an exchange, in the loose
 * shapes the connectivity library returns them. MarketDataService normalises
 * everything that comes through here.
 */

export interface RawMarket {
  symbol: string;
  base?: string;
  quote?: string;
  linear?: boolean;
  active?: boolean;
  contractSize?: number;
}

/** [timestamp, open, high, low, close, volume] */
export type RawCandle = ReadonlyArray<number | undefined>;

/** [price, amount] */
export type RawBookLevel = ReadonlyArray<number | undefined>;

export interface RawOrderBook {
  bids: ReadonlyArray<RawBookLevel>;
  asks: ReadonlyArray<RawBookLevel>;
  timestamp?: number;
}

export interface RawTrade {
  timestamp?: number;
  side?: string;
  price?: number;
  amount?: number;
}

export interface ExchangeGateway {
  loadMarkets(): Promise<RawMarket[]>;
  fetchOhlcv(symbol: string, timeframe: string, limit: number): Promise<ReadonlyArray<RawCandle>>;
  fetchOrderBook(symbol: string, limit: number): Promise<RawOrderBook>;
  fetchTrades(symbol: string, limit: number): Promise<RawTrade[]>;
  /** Raw premium-index call; takes the exchange-native symbol id (e.g. BTCUSDT). */
  fetchPremiumIndex(nativeSymbol: string): Promise<unknown>;
}
