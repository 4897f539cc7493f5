/**
 * Binance USD-M exchange handle and its gateway adapter.
 * Transport, signing and request pacing all live inside ccxt.
 */

import { binanceusdm } from 'ccxt';
import logger from '../shared/logger';
import { Config } from '../shared/types';
import { ExchangeGateway, RawMarket, RawOrderBook, RawTrade, RawCandle } from './exchange-gateway';

export function createExchange(exchangeConfig: Config['exchange']): binanceusdm {
  const exchange = new binanceusdm({
    enableRateLimit: exchangeConfig.enableRateLimit,
    options: {
      defaultType: exchangeConfig.defaultType,
    },
  });
  logger.debug(`[ExchangeFactory] Created ${exchange.id} (rateLimit=${exchangeConfig.enableRateLimit}, type=${exchangeConfig.defaultType})`);
  return exchange;
}

export class CcxtExchangeGateway implements ExchangeGateway {
  constructor(private readonly exchange: binanceusdm) {}

  async loadMarkets(): Promise<RawMarket[]> {
    const markets = await this.exchange.loadMarkets();
    const result: RawMarket[] = [];

    for (const [symbol, market] of Object.entries(markets)) {
      if (!market) continue;
      result.push({
        symbol,
        base: market.base,
        quote: market.quote,
        linear: market.linear,
        active: market.active,
        contractSize: market.contractSize,
      });
    }

    return result;
  }

  async fetchOhlcv(symbol: string, timeframe: string, limit: number): Promise<ReadonlyArray<RawCandle>> {
    return this.exchange.fetchOHLCV(symbol, timeframe, undefined, limit);
  }

  async fetchOrderBook(symbol: string, limit: number): Promise<RawOrderBook> {
    const book = await this.exchange.fetchOrderBook(symbol, limit);
    return {
      bids: book.bids,
      asks: book.asks,
      timestamp: book.timestamp,
    };
  }

  async fetchTrades(symbol: string, limit: number): Promise<RawTrade[]> {
    const trades = await this.exchange.fetchTrades(symbol, undefined, limit);
    return trades.map(trade => ({
      timestamp: trade.timestamp,
      side: trade.side,
      price: trade.price,
      amount: trade.amount,
    }));
  }

  async fetchPremiumIndex(nativeSymbol: string): Promise<unknown> {
    const response: unknown = await this.exchange.fapiPublicGetPremiumIndex({ symbol: nativeSymbol });
    return response;
  }
}
