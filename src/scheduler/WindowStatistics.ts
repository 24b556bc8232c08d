/**
 * Window Statistics
 *
 * Running sums of every score component over the ticks evaluated for entry
 * in one window. Snapshots can be serialized and restored to resume
 * accumulation.
 */

import { isRecord, toFiniteNumber } from '../feeds/parse.js';
import type { ScoreBreakdown } from '../types.js';

export interface ScoreSums {
  band: number;
  barrier: number;
  depth: number;
  value: number;
  /** Sum of displayed totals */
  total: number;
}

export interface WindowStatisticsSnapshot {
  slug: string;
  strikePrice: number;
  startedAt: number;
  evaluations: number;
  signals: number;
  blocked: number;
  maxScore: number;
  sums: ScoreSums;
}

/**
 * What the entry decision did with a tick: opened (or tried to open) a
 * position, was stopped by the constraint gate, or neither
 */
export type TickVerdict = 'signal' | 'blocked' | 'none';

const SUM_KEYS = ['band', 'barrier', 'depth', 'value', 'total'] as const;

export class WindowStatistics {
  readonly slug: string;
  readonly strikePrice: number;
  readonly startedAt: number;

  private evaluationCount = 0;
  private signalCount = 0;
  private blockedCount = 0;
  private highestScore = 0;
  private readonly sums: ScoreSums = { band: 0, barrier: 0, depth: 0, value: 0, total: 0 };

  constructor(slug: string, strikePrice: number, startedAt: number) {
    this.slug = slug;
    this.strikePrice = strikePrice;
    this.startedAt = startedAt;
  }

  get evaluations(): number {
    return this.evaluationCount;
  }

  get signals(): number {
    return this.signalCount;
  }

  get blocked(): number {
    return this.blockedCount;
  }

  get maxScore(): number {
    return this.highestScore;
  }

  /**
   * Account one tick evaluated for entry
   */
  record(score: ScoreBreakdown, verdict: TickVerdict): void {
    this.evaluationCount++;
    this.sums.band += score.band;
    this.sums.barrier += score.barrier;
    this.sums.depth += score.depth;
    this.sums.value += score.value;
    this.sums.total += score.total;
    this.highestScore = Math.max(this.highestScore, score.total);

    if (verdict === 'signal') {
      this.signalCount++;
    } else if (verdict === 'blocked') {
      this.blockedCount++;
    }
  }

  /**
   * Mean of every sum over the evaluations, 0 before the first one
   */
  averages(): ScoreSums {
    const n = this.evaluationCount;
    const avg = (sum: number): number => (n === 0 ? 0 : sum / n);
    return {
      band: avg(this.sums.band),
      barrier: avg(this.sums.barrier),
      depth: avg(this.sums.depth),
      value: avg(this.sums.value),
      total: avg(this.sums.total),
    };
  }

  toJSON(): WindowStatisticsSnapshot {
    return {
      slug: this.slug,
      strikePrice: this.strikePrice,
      startedAt: this.startedAt,
      evaluations: this.evaluationCount,
      signals: this.signalCount,
      blocked: this.blockedCount,
      maxScore: this.highestScore,
      sums: { ...this.sums },
    };
  }

  static fromJSON(raw: unknown): WindowStatistics {
    if (!isRecord(raw) || typeof raw.slug !== 'string' || !isRecord(raw.sums)) {
      throw new Error('Invalid window statistics snapshot');
    }

    const number = (value: unknown, field: string): number => {
      const parsed = toFiniteNumber(value);
      if (parsed === null) {
        throw new Error(`Invalid window statistics snapshot: ${field}`);
      }
      return parsed;
    };

    const stats = new WindowStatistics(
      raw.slug,
      number(raw.strikePrice, 'strikePrice'),
      number(raw.startedAt, 'startedAt')
    );
    stats.evaluationCount = number(raw.evaluations, 'evaluations');
    stats.signalCount = number(raw.signals, 'signals');
    stats.blockedCount = number(raw.blocked, 'blocked');
    stats.highestScore = number(raw.maxScore, 'maxScore');
    for (const key of SUM_KEYS) {
      stats.sums[key] = number(raw.sums[key], `sums.${key}`);
    }
    return stats;
  }
}
