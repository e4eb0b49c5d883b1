/**
 * Request monitor: bounded in-memory history of request outcomes.
 */

import type { PipelineErrorCode } from '../types/errors.js';
import type { ProcessResponse, Tier } from '../types/models.js';

export interface RequestRecord {
  timestamp: number;
  /** First 100 characters. */
  question: string;
  succeeded: boolean;
  tier: Tier | null;
  attempts: number;
  cacheHit: boolean;
  durationMs: number;
  code?: PipelineErrorCode;
}

export interface MonitorStats {
  total: number;
  succeeded: number;
  failed: number;
  /** succeeded / total, 0 when empty. */
  successRate: number;
  cacheHitRate: number;
  avgAttempts: number;
  avgDurationMs: number;
  byTier: Record<Tier, number>;
  failuresByCode: Partial<Record<PipelineErrorCode, number>>;
  uptimeMs: number;
}

export const DEFAULT_HISTORY_SIZE = 1000;

function ratio(part: number, whole: number): number {
  return whole === 0 ? 0 : Math.round((part / whole) * 1000) / 1000;
}

export class RequestMonitor {
  private records: RequestRecord[] = [];
  private readonly startedAt: number;

  constructor(
    private readonly historySize: number = DEFAULT_HISTORY_SIZE,
    private readonly now: () => number = Date.now
  ) {
    this.startedAt = now();
  }

  record(response: ProcessResponse): void {
    const record: RequestRecord = {
      timestamp: this.now(),
      question: response.question.slice(0, 100),
      succeeded: response.status === 'succeeded',
      tier: response.tier,
      attempts: response.attempts,
      cacheHit: response.status === 'succeeded' && response.cacheHit,
      durationMs: response.durationMs,
      ...(response.status === 'failed' ? { code: response.code } : {}),
    };
    this.records.push(record);
    if (this.records.length > this.historySize) {
      this.records = this.records.slice(-this.historySize);
    }
  }

  recent(limit = 20): RequestRecord[] {
    return this.records.slice(-limit).reverse();
  }

  stats(): MonitorStats {
    const total = this.records.length;
    const succeeded = this.records.filter((r) => r.succeeded).length;
    const byTier: Record<Tier, number> = { simple: 0, moderate: 0, complex: 0 };
    const failuresByCode: Partial<Record<PipelineErrorCode, number>> = {};
    let attempts = 0;
    let duration = 0;
    let hits = 0;

    for (const record of this.records) {
      attempts += record.attempts;
      duration += record.durationMs;
      if (record.cacheHit) hits++;
      if (record.tier) byTier[record.tier]++;
      if (record.code) failuresByCode[record.code] = (failuresByCode[record.code] ?? 0) + 1;
    }

    return {
      total,
      succeeded,
      failed: total - succeeded,
      successRate: ratio(succeeded, total),
      cacheHitRate: ratio(hits, total),
      avgAttempts: ratio(attempts, total),
      avgDurationMs: total === 0 ? 0 : Math.round(duration / total),
      byTier,
      failuresByCode,
      uptimeMs: this.now() - this.startedAt,
    };
  }
}
