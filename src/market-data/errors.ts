import { BaseError, ExchangeError, NetworkError } from 'ccxt';

export type ErrorCategory = 'network' | 'exchange' | 'library' | 'unexpected';

const CATEGORY_LABELS: Record<ErrorCategory, string> = {
  network: 'Network error',
  exchange: 'Exchange error',
  library: 'CCXT error',
  unexpected: 'Unexpected error',
};

/**
 * Raised when the exchange answers with a payload this client cannot read.
 */
export class MarketDataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MarketDataError';
  }
}

export function classifyExchangeError(error: unknown): ErrorCategory {
  // NetworkError and ExchangeError are sibling branches under BaseError.
  if (error instanceof NetworkError) return 'network';
  if (error instanceof ExchangeError) return 'exchange';
  if (error instanceof BaseError) return 'library';
  return 'unexpected';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function describeError(error: unknown): string {
  return `${CATEGORY_LABELS[classifyExchangeError(error)]}: ${errorMessage(error)}`;
}
