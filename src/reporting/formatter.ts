/**
 * Message Formatter
 *
 * Formats window results and lifecycle notifications for Telegram, and the
 * values shared with the CSV report.
 */

import { winRate } from '../scheduler/SessionStats.js';
import type { SessionStats } from '../scheduler/SessionStats.js';
import type { SettlementOutcome } from '../position/types.js';
import type { WindowReport } from './types.js';

/**
 * Dollar amount with thousands separators: $100,000.00
 */
export function formatUsd(value: number): string {
  return `$${value.toLocaleString('en-US', {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  })}`;
}

/**
 * Signed dollar amount: $+2.69, $-5.00
 */
export function formatSignedUsd(value: number): string {
  return `$${value >= 0 ? '+' : ''}${value.toFixed(2)}`;
}

export function formatSignedPercent(value: number): string {
  return `${value >= 0 ? '+' : ''}${value.toFixed(2)}%`;
}

export function formatOutcome(outcome: SettlementOutcome): string {
  return outcome === 'no-signal' ? 'NO SIGNAL' : outcome.toUpperCase();
}

export function formatTime(timestamp: number): string {
  return `${new Date(timestamp).toISOString().replace('T', ' ').slice(0, 19)} UTC`;
}

export function formatSessionSummary(session: SessionStats): string {
  const rate = winRate(session);
  return [
    `${session.windows} windows`,
    `${session.signals} signals`,
    `${session.wins}W/${session.losses}L`,
    `win rate ${rate === null ? 'n/a' : `${(rate * 100).toFixed(1)}%`}`,
    `P&L ${formatSignedUsd(session.realizedPnl)}`,
  ].join(' | ');
}

/**
 * Format a settled window into a Telegram message
 */
export function formatWindowMessage(report: WindowReport): string {
  const { window, settlement, statistics, averages } = report;
  const emoji =
    settlement.outcome === 'win' ? '✅' : settlement.outcome === 'loss' ? '❌' : '⏸️';

  const lines = [
    `${emoji} *Window settled: ${formatOutcome(settlement.outcome)}*`,
    '',
    `• Market: \`${window.slug}\``,
    `• Strike: \`${formatUsd(window.strikePrice)}\``,
    `• Final: \`${settlement.finalPrice === null ? 'unavailable' : formatUsd(settlement.finalPrice)}\``,
  ];

  const position = settlement.position;
  if (position) {
    lines.push(
      `• Entry: \`${position.direction} @ ${position.entryPrice.toFixed(3)} x ${position.entrySize}\``
    );
    if (position.close) {
      lines.push(
        `• Closed: \`${position.close.reason} @ ${position.close.price.toFixed(3)}\``
      );
    }
  }

  if (settlement.pnlUsd !== null) {
    const percent = settlement.pnlPercent === null ? '' : ` (${formatSignedPercent(settlement.pnlPercent)})`;
    lines.push(`• P&L: \`${formatSignedUsd(settlement.pnlUsd)}${percent}\``);
  }

  lines.push(
    `• Avg score: \`${averages.total.toFixed(1)}\` over \`${statistics.evaluations}\` ticks`,
    `• Signals: \`${statistics.signals}\`, blocked: \`${statistics.blocked}\``,
    '',
    `_Session: ${formatSessionSummary(report.session)}_`
  );

  return lines.join('\n');
}

/**
 * Format a startup notification
 */
export function formatStartupMessage(mode: 'paper' | 'live', preset: string, timestamp: number): string {
  return `🚀 *Strike Window Trader started*

• Execution: \`${mode}\`
• Scoring preset: \`${preset}\`
• Started: \`${formatTime(timestamp)}\``;
}

/**
 * Format a shutdown notification
 */
export function formatShutdownMessage(reason: string, session: SessionStats, timestamp: number): string {
  return `🛑 *Strike Window Trader stopped*

• Reason: ${escapeMarkdown(reason)}
• Session: \`${formatSessionSummary(session)}\`
• Stopped: \`${formatTime(timestamp)}\``;
}

/**
 * Escape special Markdown characters
 */
export function escapeMarkdown(text: string): string {
  return text.replace(/[_*[\]()~`>#+\-=|{}.!]/g, '\\$&');
}
