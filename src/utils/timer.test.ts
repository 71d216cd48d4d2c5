import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const mockLogger = vi.hoisted(() => ({
  info: vi.fn(),
  debug: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

// Mock the logger
vi.mock('./logger.js', () => ({
  createChildLogger: () => mockLogger,
}));

import { formatDuration, PipelineTimer } from './timer.js';

describe('formatDuration', () => {
  it('should format milliseconds under 1 second', () => {
    expect(formatDuration(0)).toBe('0ms');
    expect(formatDuration(500)).toBe('500ms');
    expect(formatDuration(999)).toBe('999ms');
  });

  it('should format seconds under 1 minute', () => {
    expect(formatDuration(1000)).toBe('1.00s');
    expect(formatDuration(1500)).toBe('1.50s');
    expect(formatDuration(59999)).toBe('60.00s');
  });

  it('should format minutes and seconds', () => {
    expect(formatDuration(60000)).toBe('1m 0.0s');
    expect(formatDuration(90000)).toBe('1m 30.0s');
    expect(formatDuration(300000)).toBe('5m 0.0s');
  });
});

describe('PipelineTimer', () => {
  let originalDateNow: () => number;
  let mockTime: number;

  beforeEach(() => {
    originalDateNow = Date.now;
    mockTime = 1000000;
    Date.now = vi.fn(() => mockTime);
    mockLogger.info.mockClear();
    mockLogger.debug.mockClear();
  });

  afterEach(() => {
    Date.now = originalDateNow;
  });

  const advanceTime = (ms: number) => {
    mockTime += ms;
  };

  it('should return an empty summary for a fresh timer', () => {
    const summary = new PipelineTimer('req-1').getSummary();

    expect(summary).toEqual({
      requestId: 'req-1',
      totalDurationMs: 0,
      totalDurationFormatted: '0ms',
      steps: [],
    });
  });

  it('should record steps in order with their durations', async () => {
    const timer = new PipelineTimer('req-1');

    const composite = await timer.timeStep('composite', async () => {
      advanceTime(250);
      return 'png';
    });
    await timer.timeStep('submit_job', async () => {
      advanceTime(1500);
    });

    expect(composite).toBe('png');
    const summary = timer.getSummary();
    expect(summary.totalDurationMs).toBe(1750);
    expect(summary.totalDurationFormatted).toBe('1.75s');
    expect(summary.steps).toEqual([
      { step: 'composite', durationMs: 250, durationFormatted: '250ms', succeeded: true },
      { step: 'submit_job', durationMs: 1500, durationFormatted: '1.50s', succeeded: true },
    ]);
  });

  it('should record a failed step and rethrow', async () => {
    const timer = new PipelineTimer('req-1');

    await expect(
      timer.timeStep('upload_asset', async () => {
        advanceTime(40);
        throw new Error('connection refused');
      })
    ).rejects.toThrow('connection refused');

    expect(timer.getSummary().steps).toEqual([
      { step: 'upload_asset', durationMs: 40, durationFormatted: '40ms', succeeded: false },
    ]);
  });

  it('should log one summary line with the outcome', async () => {
    const timer = new PipelineTimer('req-7');
    await timer.timeStep('composite', async () => advanceTime(100));
    await timer
      .timeStep('publish', async () => {
        advanceTime(2000);
        throw new Error('530');
      })
      .catch(() => undefined);

    timer.logSummary('publish_failed');

    expect(mockLogger.info).toHaveBeenCalledTimes(1);
    expect(mockLogger.info).toHaveBeenCalledWith(
      expect.objectContaining({ requestId: 'req-7', outcome: 'publish_failed', totalDurationMs: 2100 }),
      '[TIMER] Merge publish_failed in 2.10s - composite: 100ms | publish: 2.00s (failed)'
    );
  });

  it('should honor a custom log prefix', () => {
    new PipelineTimer('req-2', { logPrefix: '[MERGE]' }).logSummary('completed');

    expect(mockLogger.info).toHaveBeenCalledWith(
      expect.objectContaining({ requestId: 'req-2' }),
      '[MERGE] Merge completed in 0ms'
    );
  });
});
