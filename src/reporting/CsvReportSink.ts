/**
 * CSV Report Sink
 *
 * Appends one row per settled window to a results file, writing the
 * header when the file is created.
 */

import { access, appendFile, mkdir } from 'fs/promises';
import path from 'path';
import { logger } from '../logger.js';
import { formatSignedPercent, formatSignedUsd, formatUsd } from './formatter.js';
import type { ReportSink, WindowReport } from './types.js';

export const CSV_COLUMNS = [
  'timestamp',
  'market_slug',
  'strike_price',
  'avg_score_a',
  'avg_score_b',
  'avg_score_c',
  'avg_score_d',
  'avg_total_score',
  'total_evaluations',
  'signals_triggered',
  'direction',
  'entry_price',
  'final_price',
  'result',
  'profit_loss_pct',
  'profit_loss_usd',
  'trade_amount',
] as const;

export interface CsvReportSinkConfig {
  path: string;
}

/**
 * Quote a field containing a separator, quote or line break
 */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function toCsvLine(fields: readonly string[]): string {
  return `${fields.map(escapeCsvField).join(',')}\n`;
}

/**
 * Column values of one report, in CSV_COLUMNS order
 */
export function toCsvRow(report: WindowReport): string[] {
  const { window, statistics, averages, settlement } = report;
  const position = settlement.position;

  return [
    new Date(report.settledAt).toISOString(),
    window.slug,
    formatUsd(window.strikePrice),
    averages.band.toFixed(1),
    averages.barrier.toFixed(1),
    averages.depth.toFixed(1),
    averages.value.toFixed(1),
    averages.total.toFixed(1),
    String(statistics.evaluations),
    String(statistics.signals),
    position ? position.direction : '',
    position ? `$${position.entryPrice.toFixed(3)}` : '',
    settlement.finalPrice === null ? '' : formatUsd(settlement.finalPrice),
    settlement.outcome === 'no-signal' ? '' : settlement.outcome.toUpperCase(),
    settlement.pnlPercent === null ? '' : formatSignedPercent(settlement.pnlPercent),
    settlement.pnlUsd === null ? '' : formatSignedUsd(settlement.pnlUsd),
    settlement.cost === null ? '' : formatUsd(settlement.cost),
  ];
}

export class CsvReportSink implements ReportSink {
  readonly name = 'csv';

  private readonly filePath: string;

  constructor(config: CsvReportSinkConfig) {
    this.filePath = path.resolve(config.path);
    logger.info('CSV report sink initialized', { path: this.filePath });
  }

  async recordWindow(report: WindowReport): Promise<void> {
    const needsHeader = !(await this.exists());
    if (needsHeader) {
      await mkdir(path.dirname(this.filePath), { recursive: true });
    }

    const content = (needsHeader ? toCsvLine(CSV_COLUMNS) : '') + toCsvLine(toCsvRow(report));
    await appendFile(this.filePath, content, 'utf8');

    logger.debug('Window appended to CSV', { slug: report.window.slug, path: this.filePath });
  }

  private async exists(): Promise<boolean> {
    try {
      await access(this.filePath);
      return true;
    } catch {
      return false;
    }
  }
}
