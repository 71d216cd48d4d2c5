/**
 * Pipeline Timer Utility
 * Tracks how long each stage of one merge request takes
 */

import { createChildLogger } from './logger.js';

const logger = createChildLogger({ service: 'timer' });

export interface StepTiming {
  step: string;
  durationMs: number;
  durationFormatted: string;
  /** False when the step threw */
  succeeded: boolean;
}

export interface PipelineSummary {
  requestId: string;
  totalDurationMs: number;
  totalDurationFormatted: string;
  steps: StepTiming[];
}

export interface TimerOptions {
  /** Log prefix (default: "[TIMER]") */
  logPrefix?: string;
}

/**
 * Format milliseconds to human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms.toFixed(0)}ms`;
  } else if (ms < 60000) {
    return `${(ms / 1000).toFixed(2)}s`;
  } else {
    const minutes = Math.floor(ms / 60000);
    const seconds = ((ms % 60000) / 1000).toFixed(1);
    return `${minutes}m ${seconds}s`;
  }
}

/**
 * Pipeline Timer - one instance per request
 */
export class PipelineTimer {
  private readonly startedAt: number;
  private readonly steps: StepTiming[] = [];
  private readonly logPrefix: string;

  constructor(
    private readonly requestId: string,
    options: TimerOptions = {}
  ) {
    this.startedAt = Date.now();
    this.logPrefix = options.logPrefix ?? '[TIMER]';
  }

  /**
   * Run a stage and record its duration, whether it resolves or throws
   */
  async timeStep<T>(step: string, operation: () => Promise<T>): Promise<T> {
    const start = Date.now();
    let succeeded = false;

    try {
      const result = await operation();
      succeeded = true;
      return result;
    } finally {
      const durationMs = Date.now() - start;
      this.steps.push({ step, durationMs, durationFormatted: formatDuration(durationMs), succeeded });
      logger.debug(
        { requestId: this.requestId, step, durationMs, succeeded },
        `${this.logPrefix} ${step}: ${formatDuration(durationMs)}`
      );
    }
  }

  getSummary(): PipelineSummary {
    const totalDurationMs = Date.now() - this.startedAt;
    return {
      requestId: this.requestId,
      totalDurationMs,
      totalDurationFormatted: formatDuration(totalDurationMs),
      steps: [...this.steps],
    };
  }

  /**
   * Log the summary once, at the end of the request
   */
  logSummary(outcome: string): void {
    const summary = this.getSummary();
    const breakdown = summary.steps
      .map((s) => `${s.step}: ${s.durationFormatted}${s.succeeded ? '' : ' (failed)'}`)
      .join(' | ');

    logger.info(
      {
        requestId: this.requestId,
        outcome,
        totalDurationMs: summary.totalDurationMs,
        steps: summary.steps,
      },
      `${this.logPrefix} Merge ${outcome} in ${summary.totalDurationFormatted}${breakdown ? ` - ${breakdown}` : ''}`
    );
  }
}
