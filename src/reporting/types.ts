/**
 * Reporting Types
 */

import type { Settlement } from '../position/types.js';
import type { SessionStats } from '../scheduler/SessionStats.js';
import type { ScoreSums, WindowStatisticsSnapshot } from '../scheduler/WindowStatistics.js';
import type { MarketWindow } from '../types.js';

/**
 * Everything known about a window once it has been settled
 */
export interface WindowReport {
  window: MarketWindow;
  statistics: WindowStatisticsSnapshot;
  averages: ScoreSums;
  settlement: Settlement;
  /** Session totals including this window */
  session: SessionStats;
  settledAt: number;
}

/**
 * Append-only destination for window reports
 */
export interface ReportSink {
  readonly name: string;
  recordWindow(report: WindowReport): Promise<void>;
}

/**
 * Anything that can deliver a formatted text message
 */
export interface MessageSender {
  sendMessage(text: string): Promise<boolean>;
}
