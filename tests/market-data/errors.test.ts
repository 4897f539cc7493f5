/**
 * Error classification tests against the real ccxt error hierarchy.
 */

import { BadSymbol, BaseError, ExchangeError, NetworkError, RequestTimeout } from 'ccxt';
import { MarketDataError, classifyExchangeError, describeError, errorMessage } from '../../src/market-data/errors';

describe('classifyExchangeError', () => {

    it('should classify connectivity failures as network errors', () => {
        expect(classifyExchangeError(new NetworkError('socket hang up'))).toBe('network');
        expect(classifyExchangeError(new RequestTimeout('request timed out (10000 ms)'))).toBe('network');
    });

    it('should classify rejected requests as exchange errors', () => {
        expect(classifyExchangeError(new ExchangeError('rejected'))).toBe('exchange');
        expect(classifyExchangeError(new BadSymbol('binanceusdm does not have market symbol FOO/USDT:USDT'))).toBe('exchange');
    });

    it('should fall back to the library category for other ccxt errors', () => {
        expect(classifyExchangeError(new BaseError('something in ccxt'))).toBe('library');
    });

    it('should treat everything else as unexpected', () => {
        expect(classifyExchangeError(new MarketDataError('bad payload'))).toBe('unexpected');
        expect(classifyExchangeError(new Error('boom'))).toBe('unexpected');
        expect(classifyExchangeError('plain string')).toBe('unexpected');
    });
});

describe('describeError', () => {

    it('should prefix the message with the category label', () => {
        expect(describeError(new NetworkError('socket hang up'))).toBe('Network error: socket hang up');
        expect(describeError(new BadSymbol('Invalid symbol.'))).toBe('Exchange error: Invalid symbol.');
        expect(describeError(new BaseError('not supported'))).toBe('CCXT error: not supported');
        expect(describeError(new MarketDataError('bad payload'))).toBe('Unexpected error: bad payload');
    });

    it('should stringify non-error values', () => {
        expect(errorMessage(42)).toBe('42');
        expect(describeError(undefined)).toBe('Unexpected error: undefined');
    });
});
