import { OrderBookSnapshot, SpreadStats, Trade, TradeFlow } from '../shared/types';

// Binance settles funding every 8 hours.
export const FUNDING_INTERVALS_PER_DAY = 3;

/**
 * Top-of-book spread. Undefined when either side is empty or the best ask is
 * not positive.
 */
export function computeSpread(book: Pick<OrderBookSnapshot, 'bids' | 'asks'>): SpreadStats | undefined {
  const bestBid = book.bids[0]?.price;
  const bestAsk = book.asks[0]?.price;
  if (bestBid === undefined || bestAsk === undefined || bestAsk <= 0) return undefined;

  const spread = bestAsk - bestBid;
  return {
    bestBid,
    bestAsk,
    spread,
    spreadPct: (spread / bestAsk) * 100,
  };
}

export function computeTradeFlow(trades: readonly Trade[]): TradeFlow {
  let buyVolume = 0;
  let sellVolume = 0;

  for (const trade of trades) {
    if (trade.side === 'buy') buyVolume += trade.amount;
    else if (trade.side === 'sell') sellVolume += trade.amount;
  }

  const totalVolume = buyVolume + sellVolume;
  if (totalVolume <= 0) {
    return { buyVolume, sellVolume, totalVolume };
  }

  return {
    buyVolume,
    sellVolume,
    totalVolume,
    ratio: {
      buyPct: (buyVolume / totalVolume) * 100,
      sellPct: (sellVolume / totalVolume) * 100,
    },
  };
}

export function annualizeFundingRate(fundingRate: number, intervalsPerDay: number = FUNDING_INTERVALS_PER_DAY): number {
  return (Number.isFinite(fundingRate) ? fundingRate : 0) * intervalsPerDay * 365;
}
