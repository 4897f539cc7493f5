#!/usr/bin/env node
// Main Entry Point - Binance futures market data fetcher

import 'dotenv/config';

import logger from './shared/logger';
import { ConfigManager } from './shared/config';
import { createExchange, CcxtExchangeGateway } from './market-data/exchange-factory';
import { MarketDataService } from './market-data/market-data-service';
import { runCli, EXIT_FAILURE } from './cli/run-cli';

async function main(): Promise<number> {
  const config = new ConfigManager().get();
  logger.level = config.app.logLevel;

  return runCli(process.argv.slice(2), {
    config,
    createService: () => new MarketDataService(new CcxtExchangeGateway(createExchange(config.exchange))),
  });
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    logger.error('[Main] Fatal error:', error);
    process.exitCode = EXIT_FAILURE;
  });
