// Trading domain: bulletin download, parsing and the trading-results service
export { createSpimexClient } from './spimex-client.js';
export type { SpimexClient, SpimexClientOptions } from './spimex-client.js';
export { parseBulletin } from './bulletin-parser.js';
export { createTradingService } from './trading-service.js';
export type { TradingService, TradingServiceOptions } from './trading-service.js';
export type {
  ImportReport,
  NewTradingResult,
  TradingResult,
  TradingResultFilters,
} from './types.js';
