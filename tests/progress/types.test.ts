/**
 * Tests for progress formatting helpers
 */

import { describe, it, expect } from 'vitest';
import {
  ProgressReporterConfigSchema,
  calculateItemsPerSecond,
  calculatePercentage,
  createEmptyCounts,
  createProgressBar,
  estimateRemainingTime,
  formatDuration,
  formatProgress,
} from '../../lib/src/progress/types.js';

describe('ProgressReporterConfigSchema', () => {
  it('should apply defaults', () => {
    expect(ProgressReporterConfigSchema.parse({ total: 5 })).toEqual({
      total: 5,
      alreadyProcessed: 0,
      logIntervalPercent: 10,
      operationName: 'Processing',
    });
  });

  it('should reject a negative total', () => {
    expect(() => ProgressReporterConfigSchema.parse({ total: -1 })).toThrow();
  });
});

describe('calculatePercentage', () => {
  it('should bound the percentage', () => {
    expect(calculatePercentage(1, 4)).toBe(25);
    expect(calculatePercentage(5, 4)).toBe(100);
  });

  it('should treat an empty run as complete', () => {
    expect(calculatePercentage(0, 0)).toBe(100);
  });
});

describe('estimateRemainingTime', () => {
  it('should extrapolate from the pace so far', () => {
    expect(estimateRemainingTime(2000, 4, 6)).toBe(3000);
  });

  it('should be undefined before the first item or after the last', () => {
    expect(estimateRemainingTime(1000, 0, 5)).toBeUndefined();
    expect(estimateRemainingTime(1000, 5, 0)).toBeUndefined();
  });
});

describe('calculateItemsPerSecond', () => {
  it('should compute throughput', () => {
    expect(calculateItemsPerSecond(10, 4000)).toBe(2.5);
    expect(calculateItemsPerSecond(10, 0)).toBe(0);
  });
});

describe('formatDuration', () => {
  it('should pick a unit for the magnitude', () => {
    expect(formatDuration(500)).toBe('500ms');
    expect(formatDuration(1500)).toBe('1.5s');
    expect(formatDuration(125_000)).toBe('2m 5s');
    expect(formatDuration(3_725_000)).toBe('1h 2m');
  });
});

describe('createProgressBar', () => {
  it('should fill in proportion', () => {
    expect(createProgressBar(50, 10)).toBe('[#####-----]');
    expect(createProgressBar(0, 4)).toBe('[----]');
    expect(createProgressBar(150, 4)).toBe('[####]');
  });
});

describe('formatProgress', () => {
  it('should include ETA and throughput when known', () => {
    expect(
      formatProgress({
        current: 25,
        total: 100,
        percentage: 25,
        elapsedMs: 10_000,
        estimatedRemainingMs: 30_000,
        itemsPerSecond: 2.5,
        counts: createEmptyCounts(),
      })
    ).toBe('25/100 (25.0%) - ETA: 30.0s - 2.50 items/s');
  });

  it('should omit what is not known yet', () => {
    expect(
      formatProgress({
        current: 0,
        total: 3,
        percentage: 0,
        elapsedMs: 0,
        estimatedRemainingMs: undefined,
        itemsPerSecond: 0,
        counts: createEmptyCounts(),
      })
    ).toBe('0/3 (0.0%)');
  });
});
