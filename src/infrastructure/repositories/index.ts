// Repositories
export { createTradingResultsRepository, INSERT_CHUNK_SIZE } from './trading-results-repository.js';
export type { TradingResultsRepository } from './trading-results-repository.js';
