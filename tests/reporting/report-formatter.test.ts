/**
 * Report Formatter Unit Tests
 */

import {
    formatBanner,
    formatFunding,
    formatLegacySummary,
    formatOhlcv,
    formatOrderBook,
    formatPairs,
    formatSectionHeader,
    formatTimestamp,
    formatTrades,
} from '../../src/reporting/report-formatter';
import { Candle, OrderBookSnapshot, Trade, TradingPair } from '../../src/shared/types';

const T0 = Date.UTC(2024, 0, 1);
const ISO0 = '2024-01-01T00:00:00.000Z';

const PAIRS: TradingPair[] = [
    { symbol: 'BTC/USDT:USDT', base: 'BTC', quote: 'USDT', contractSize: 1 },
    { symbol: 'ETH/USDT:USDT', base: 'ETH', quote: 'USDT', contractSize: 1 },
    { symbol: 'SOL/USDT:USDT', base: 'SOL', quote: 'USDT', contractSize: 1 },
];

describe('formatTimestamp', () => {

    it('should render epoch milliseconds as ISO 8601', () => {
        expect(formatTimestamp(T0)).toBe(ISO0);
    });

    it('should render a missing timestamp as n/a', () => {
        expect(formatTimestamp(undefined)).toBe('n/a');
        expect(formatTimestamp(Number.NaN)).toBe('n/a');
    });

    it('should render timestamps outside the Date range as n/a', () => {
        expect(formatTimestamp(8.64e15 + 1)).toBe('n/a');
        expect(formatTimestamp(-9e15)).toBe('n/a');
    });
});

describe('headers', () => {

    it('should frame banners with a 50-character rule', () => {
        expect(formatBanner('Title')).toEqual(['='.repeat(50), 'Title', '='.repeat(50)]);
    });

    it('should start sections with a blank line', () => {
        expect(formatSectionHeader('Fetching Futures Trading Pairs')).toEqual(['', '=== Fetching Futures Trading Pairs ===']);
    });
});

describe('formatPairs', () => {

    it('should report the full count and show only the first entries', () => {
        expect(formatPairs(PAIRS, 2)).toEqual([
            'Found 3 active linear futures pairs',
            '',
            'Sample pairs:',
            '  BTC/USDT:USDT',
            '  ETH/USDT:USDT',
        ]);
    });
});

describe('formatOhlcv', () => {

    it('should preview the most recent candles', () => {
        const candles: Candle[] = [0, 1, 2].map(i => ({
            timestamp: T0 + i * 3_600_000,
            open: 100 + i,
            high: 101.5 + i,
            low: 99.25 + i,
            close: 100.5 + i,
            volume: 12 + i,
        }));

        expect(formatOhlcv(candles, '1h', 100, 2)).toEqual([
            'Timeframe: 1h, Limit: 100',
            'Fetched 3 candles',
            '',
            'Last 2 candles [timestamp, open, high, low, close, volume]:',
            '  2024-01-01T01:00:00.000Z: O=101.00 H=102.50 L=100.25 C=101.50 V=13.00',
            '  2024-01-01T02:00:00.000Z: O=102.00 H=103.50 L=101.25 C=102.50 V=14.00',
        ]);
    });
});

describe('formatOrderBook', () => {

    it('should print bids, an empty ask section and no spread for a one-sided book', () => {
        const book: OrderBookSnapshot = {
            symbol: 'BTC/USDT:USDT',
            bids: [100, 99, 98, 97, 96].map(price => ({ price, amount: 1.5 })),
            asks: [],
            timestamp: T0,
        };

        expect(formatOrderBook(book, 5)).toEqual([
            `Orderbook timestamp: ${ISO0}`,
            'Bids: 5, Asks: 0',
            '',
            'Top 5 Bids (price, amount):',
            '  100.00 | 1.5000',
            '  99.00 | 1.5000',
            '  98.00 | 1.5000',
            '  97.00 | 1.5000',
            '  96.00 | 1.5000',
            '',
            'Top 0 Asks (price, amount):',
        ]);
    });

    it('should append the spread when both sides are present', () => {
        const book: OrderBookSnapshot = {
            symbol: 'BTC/USDT:USDT',
            bids: [{ price: 100, amount: 2 }, { price: 99.5, amount: 1 }],
            asks: [{ price: 101, amount: 0.25 }],
        };

        expect(formatOrderBook(book, 1)).toEqual([
            'Orderbook timestamp: n/a',
            'Bids: 2, Asks: 1',
            '',
            'Top 1 Bids (price, amount):',
            '  100.00 | 2.0000',
            '',
            'Top 1 Asks (price, amount):',
            '  101.00 | 0.2500',
            '',
            'Spread: 1.00 (0.9901%)',
        ]);
    });
});

describe('formatTrades', () => {

    it('should list recent trades and the buy/sell ratio', () => {
        const trades: Trade[] = [
            { timestamp: T0, side: 'buy', price: 100, amount: 3 },
            { timestamp: T0 + 1000, side: 'sell', price: 101.25, amount: 1 },
        ];

        expect(formatTrades(trades, 10)).toEqual([
            'Fetched 2 trades',
            '',
            'Last 2 trades:',
            `  ${ISO0} | BUY  | 100.00 | 3.0000`,
            '  2024-01-01T00:00:01.000Z | SELL | 101.25 | 1.0000',
            '',
            'Buy/Sell ratio: 75.0% / 25.0%',
        ]);
    });

    it('should skip the ratio when no volume traded', () => {
        const trades: Trade[] = [{ timestamp: T0, side: 'buy', price: 100, amount: 0 }];

        expect(formatTrades(trades, 10)).toEqual([
            'Fetched 1 trades',
            '',
            'Last 1 trades:',
            `  ${ISO0} | BUY  | 100.00 | 0.0000`,
        ]);
    });

    it('should mark trades with an unrecognised side', () => {
        const lines = formatTrades([{ timestamp: T0, side: 'unknown', price: 5, amount: 1 }], 10);

        expect(lines[3]).toBe(`  ${ISO0} | ?    | 5.00 | 1.0000`);
    });
});

describe('formatFunding', () => {

    it('should show rates as percentages', () => {
        expect(formatFunding({
            symbol: 'BTCUSDT',
            fundingRate: 0.0001,
            annualizedRate: 0.2,
            markPrice: 65000.5,
            indexPrice: 64990.1,
            nextFundingTime: T0,
            timestamp: T0,
        })).toEqual([
            'Symbol: BTCUSDT',
            'Funding rate: 0.0100%',
            'Annualized rate: 20.00%',
            'Mark price: 65000.50',
            'Index price: 64990.10',
            `Next funding: ${ISO0}`,
        ]);
    });
});

describe('formatFunding with an out-of-range next funding time', () => {

    it('should print n/a instead of throwing', () => {
        const lines = formatFunding({
            symbol: 'BTCUSDT',
            fundingRate: 0,
            annualizedRate: 0,
            markPrice: 1,
            indexPrice: 1,
            nextFundingTime: 1e20,
            timestamp: T0,
        });

        expect(lines[5]).toBe('Next funding: n/a');
    });
});

describe('formatLegacySummary', () => {

    it('should close with counts and the derived statistics', () => {
        const lines = formatLegacySummary({
            pairs: PAIRS,
            candles: [],
            orderBook: {
                symbol: 'BTC/USDT:USDT',
                bids: [{ price: 100, amount: 1 }],
                asks: [{ price: 101, amount: 1 }],
            },
            trades: [
                { timestamp: T0, side: 'buy', price: 100, amount: 1 },
                { timestamp: T0, side: 'sell', price: 100, amount: 1 },
            ],
        });

        expect(lines).toEqual([
            '',
            '='.repeat(50),
            'Data fetch complete!',
            '='.repeat(50),
            'Pairs: 3',
            'Candles: 0',
            'Order book: 1 bids / 1 asks',
            'Trades: 2',
            'Spread: 1.00 (0.9901%)',
            'Buy/Sell ratio: 50.0% / 50.0%',
        ]);
    });
});
