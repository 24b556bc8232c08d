export { WindowScheduler } from './WindowScheduler.js';
export { TickFetcher } from './TickFetcher.js';
export type { TickFetcherConfig } from './TickFetcher.js';
export { WindowStatistics } from './WindowStatistics.js';
export type { ScoreSums, TickVerdict, WindowStatisticsSnapshot } from './WindowStatistics.js';
export { EMPTY_SESSION, recordWindowOutcome, winRate } from './SessionStats.js';
export type { SessionStats } from './SessionStats.js';
export type {
  WindowSchedulerConfig,
  WindowSchedulerDeps,
  WindowSchedulerEvents,
  TickReport,
  TradeWindowPhase,
} from './types.js';
