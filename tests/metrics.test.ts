import { describe, it, expect } from 'vitest';
import { addCounts, computeMetrics, f1Score, ratio, sumCounts } from '../src/scoring/metrics';

describe('computeMetrics', () => {
  it('computes precision, recall and F1', () => {
    const m = computeMetrics({ tp: 3, fp: 1, fn: 2 });
    expect(m.precision).toBe(0.75);
    expect(m.recall).toBe(0.6);
    expect(m.f1).toBeCloseTo((2 * 0.75 * 0.6) / 1.35, 10);
  });

  it('is perfect when every span matches', () => {
    expect(computeMetrics({ tp: 4, fp: 0, fn: 0 })).toEqual({
      tp: 4,
      fp: 0,
      fn: 0,
      precision: 1,
      recall: 1,
      f1: 1,
    });
  });

  it('precision is not applicable without predictions', () => {
    const m = computeMetrics({ tp: 0, fp: 0, fn: 3 });
    expect(m.precision).toBeNull();
    expect(m.recall).toBe(0);
    expect(m.f1).toBe(0);
  });

  it('recall is not applicable without gold spans', () => {
    const m = computeMetrics({ tp: 0, fp: 2, fn: 0 });
    expect(m.precision).toBe(0);
    expect(m.recall).toBeNull();
    expect(m.f1).toBe(0);
  });

  it('every metric is not applicable for empty input', () => {
    const m = computeMetrics({ tp: 0, fp: 0, fn: 0 });
    expect([m.precision, m.recall, m.f1]).toEqual([null, null, null]);
  });
});

describe('count helpers', () => {
  it('ratio is null on a zero denominator', () => {
    expect(ratio(0, 0)).toBeNull();
    expect(ratio(1, 4)).toBe(0.25);
  });

  it('f1 is zero when both sides are zero', () => {
    expect(f1Score(0, 0)).toBe(0);
  });

  it('sums counts component-wise', () => {
    expect(addCounts({ tp: 1, fp: 2, fn: 3 }, { tp: 4, fp: 5, fn: 6 })).toEqual({ tp: 5, fp: 7, fn: 9 });
    expect(sumCounts([])).toEqual({ tp: 0, fp: 0, fn: 0 });
  });
});
