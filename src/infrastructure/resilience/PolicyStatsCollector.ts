/**
 * Execution statistics for one policy layer.
 */

import {
  AttemptTimeoutError,
  CircuitOpenError,
  RateLimitExceededError,
} from '../../domain/exceptions';
import type { Clock } from '../time';
import type { PolicyStats } from './IResiliencePolicy';

const MAX_SAMPLES = 1000;

export class PolicyStatsCollector {
  private totalExecutions = 0;
  private successCount = 0;
  private failureCount = 0;
  private rejectedCount = 0;
  private timeoutCount = 0;
  private totalDuration = 0;
  private samples: number[] = [];
  private lastExecutionTime?: Date;
  private windowStart: Date;

  constructor(private readonly clock: Clock) {
    this.windowStart = new Date(clock.now());
  }

  recordSuccess(duration: number): void {
    this.successCount++;
    this.record(duration);
  }

  /**
   * Admission denials count as rejections, everything else as failures.
   */
  recordError(error: unknown, duration: number): void {
    if (error instanceof CircuitOpenError || error instanceof RateLimitExceededError) {
      this.rejectedCount++;
    } else {
      this.failureCount++;
      if (error instanceof AttemptTimeoutError) {
        this.timeoutCount++;
      }
    }
    this.record(duration);
  }

  snapshot(): PolicyStats {
    const sorted = [...this.samples].sort((a, b) => a - b);
    return {
      totalExecutions: this.totalExecutions,
      successCount: this.successCount,
      failureCount: this.failureCount,
      rejectedCount: this.rejectedCount,
      timeoutCount: this.timeoutCount,
      averageExecutionTime: this.totalExecutions > 0 ? this.totalDuration / this.totalExecutions : 0,
      p95ExecutionTime: percentile(sorted, 0.95),
      p99ExecutionTime: percentile(sorted, 0.99),
      lastExecutionTime: this.lastExecutionTime,
      windowStart: this.windowStart,
    };
  }

  reset(): void {
    this.totalExecutions = 0;
    this.successCount = 0;
    this.failureCount = 0;
    this.rejectedCount = 0;
    this.timeoutCount = 0;
    this.totalDuration = 0;
    this.samples = [];
    this.lastExecutionTime = undefined;
    this.windowStart = new Date(this.clock.now());
  }

  private record(duration: number): void {
    this.totalExecutions++;
    this.totalDuration += duration;
    this.lastExecutionTime = new Date(this.clock.now());

    // Keep the most recent samples only
    if (this.samples.length >= MAX_SAMPLES) {
      this.samples.shift();
    }
    this.samples.push(duration);
  }
}

function percentile(sorted: number[], p: number): number {
  if (sorted.length === 0) return 0;
  const index = Math.min(sorted.length - 1, Math.ceil(p * sorted.length) - 1);
  return sorted[Math.max(0, index)];
}
