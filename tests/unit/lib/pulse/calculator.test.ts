import { describe, it, expect } from 'vitest';
import {
  applyWeightEdit,
  computePulse,
  isNormalized,
  resetToEqualWeights,
  roundPulseScore,
  settleResidual,
  sumWeights,
} from '@/lib/pulse/calculator';
import { InvalidWeightError, UnknownSectorError } from '@/lib/pulse/errors';
import { DEFAULT_SECTORS, ZERO_FLOOR_WEIGHT_BOUNDS } from '@/lib/constants';

function expectSumsTo100(weights: Record<string, number>) {
  expect(Math.abs(sumWeights(weights) - 100)).toBeLessThanOrEqual(0.01 + 1e-9);
}

describe('computePulse', () => {
  it('should average two equally weighted sectors', () => {
    expect(computePulse({ A: 80, B: 20 }, { A: 50, B: 50 })).toBe(50);
  });

  it('should weight scores by their share of the total', () => {
    expect(computePulse({ A: 80, B: 20 }, { A: 75, B: 25 })).toBeCloseTo(65, 10);
  });

  it('should normalize weights that do not sum to 100', () => {
    expect(computePulse({ A: 80, B: 20 }, { A: 3, B: 1 })).toBeCloseTo(65, 10);
  });

  it('should treat sectors missing from weights as zero weight', () => {
    expect(computePulse({ A: 80, B: 20 }, { A: 10 })).toBe(80);
  });

  it('should ignore weights for sectors without a score', () => {
    expect(computePulse({ A: 40 }, { A: 50, B: 50 })).toBe(40);
  });

  it('should return the neutral score for an empty feed', () => {
    expect(computePulse({}, {})).toBe(50);
  });

  it('should return the neutral score when every weight is zero', () => {
    expect(computePulse({ A: 90, B: 70 }, { A: 0, B: 0 })).toBe(50);
  });

  it('should clamp the result to the 0-100 scale', () => {
    expect(computePulse({ A: 150 }, { A: 100 })).toBe(100);
    expect(computePulse({ A: -20 }, { A: 100 })).toBe(0);
  });

  it('should stay within bounds for any valid scores and weights', () => {
    const scoreSets = [
      { A: 0, B: 0, C: 0 },
      { A: 100, B: 100, C: 100 },
      { A: 0, B: 100, C: 37.5 },
    ];
    const weightSets = [
      { A: 33.33, B: 33.33, C: 33.34 },
      { A: 1, B: 0, C: 250 },
      { A: 0.001, B: 0.002, C: 0 },
    ];

    for (const scores of scoreSets) {
      for (const weights of weightSets) {
        const pulse = computePulse(scores, weights);
        expect(pulse).toBeGreaterThanOrEqual(0);
        expect(pulse).toBeLessThanOrEqual(100);
      }
    }
  });
});

describe('applyWeightEdit', () => {
  it('should scale other sectors proportionally', () => {
    const weights = { A: 50, B: 30, C: 20 };

    expect(applyWeightEdit(weights, 'A', 70)).toEqual({ A: 70, B: 18, C: 12 });
  });

  it('should clamp values above 100 before redistributing', () => {
    expect(applyWeightEdit({ A: 50, B: 50 }, 'A', 150)).toEqual({ A: 100, B: 0 });
  });

  it('should not let a sector drop below the floor of 1', () => {
    expect(applyWeightEdit({ A: 50, B: 50 }, 'A', 0)).toEqual({ A: 1, B: 99 });
  });

  it('should allow zero with the zero-floor bounds', () => {
    expect(applyWeightEdit({ A: 50, B: 50 }, 'A', 0, ZERO_FLOOR_WEIGHT_BOUNDS)).toEqual({
      A: 0,
      B: 100,
    });
  });

  it('should round weights to two decimals', () => {
    expect(applyWeightEdit({ A: 50, B: 50 }, 'A', 33.333)).toEqual({ A: 33.33, B: 66.67 });
  });

  it('should put the rounding residual on the first other sector', () => {
    const weights = { A: 25, B: 25, C: 25, D: 25 };

    expect(applyWeightEdit(weights, 'A', 50)).toEqual({
      A: 50,
      B: 16.66,
      C: 16.67,
      D: 16.67,
    });
  });

  it('should hand the remainder to the first other sector when the others hold nothing', () => {
    expect(applyWeightEdit({ A: 100, B: 0, C: 0 }, 'A', 40)).toEqual({ A: 40, B: 60, C: 0 });
  });

  it('should keep a lone sector at 100', () => {
    expect(applyWeightEdit({ A: 100 }, 'A', 30)).toEqual({ A: 100 });
  });

  it('should not mutate the input map', () => {
    const weights = { A: 50, B: 30, C: 20 };

    applyWeightEdit(weights, 'B', 60);

    expect(weights).toEqual({ A: 50, B: 30, C: 20 });
  });

  it('should reject an unknown sector without touching the weights', () => {
    const weights = { A: 60, B: 40 };

    expect(() => applyWeightEdit(weights, 'C', 10)).toThrow(UnknownSectorError);
    expect(weights).toEqual({ A: 60, B: 40 });
  });

  it('should carry the sector and code on UnknownSectorError', () => {
    try {
      applyWeightEdit({ A: 60, B: 40 }, 'C', 10);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(UnknownSectorError);
      if (error instanceof UnknownSectorError) {
        expect(error.code).toBe('UNKNOWN_SECTOR');
        expect(error.sector).toBe('C');
        expect(error.message).toBe('Unknown sector: C');
      }
    }
  });

  it('should not treat inherited object keys as sectors', () => {
    expect(() => applyWeightEdit({ A: 60, B: 40 }, 'toString', 10)).toThrow(UnknownSectorError);
  });

  it('should reject non-finite values', () => {
    expect(() => applyWeightEdit({ A: 50, B: 50 }, 'A', NaN)).toThrow(InvalidWeightError);
    expect(() => applyWeightEdit({ A: 50, B: 50 }, 'A', Infinity)).toThrow(InvalidWeightError);
  });

  it('should keep the total at 100 across many edits', () => {
    const starts = [
      resetToEqualWeights(DEFAULT_SECTORS),
      { A: 50, B: 30, C: 20 },
      { A: 33.33, B: 33.33, C: 33.34 },
      { A: 97, B: 1, C: 1, D: 1 },
    ];
    const values = [1, 2.5, 17.333, 50, 99, 100];

    for (const start of starts) {
      for (const sector of Object.keys(start)) {
        for (const value of values) {
          const result = applyWeightEdit(start, sector, value);
          expectSumsTo100(result);
          expect(Object.keys(result)).toEqual(Object.keys(start));
        }
      }
    }
  });

  it('should keep the total at 100 across a chain of edits', () => {
    let weights = resetToEqualWeights(DEFAULT_SECTORS);
    const edits: [string, number][] = [
      ['AdTech', 20],
      ['Fintech', 3.75],
      ['Semiconductors', 41.2],
      ['AdTech', 1],
      ['Cybersecurity', 12.34],
    ];

    for (const [sector, value] of edits) {
      weights = applyWeightEdit(weights, sector, value);
      expectSumsTo100(weights);
    }
    expect(weights.Cybersecurity).toBe(12.34);
  });
});

describe('resetToEqualWeights', () => {
  it('should split 100 equally', () => {
    const weights = resetToEqualWeights(['A', 'B', 'C']);

    expect(weights.A).toBeCloseTo(33.333333, 5);
    expect(weights.B).toBe(weights.A);
    expect(weights.C).toBe(weights.A);
    expect(sumWeights(weights)).toBeCloseTo(100, 10);
  });

  it('should be idempotent', () => {
    expect(resetToEqualWeights(['A', 'B', 'C'])).toEqual(resetToEqualWeights(['A', 'B', 'C']));
  });

  it('should count duplicate sectors once', () => {
    expect(resetToEqualWeights(['A', 'B', 'A', 'B'])).toEqual({ A: 50, B: 50 });
  });

  it('should return an empty map for no sectors', () => {
    expect(resetToEqualWeights([])).toEqual({});
  });
});

describe('settleResidual', () => {
  it('should leave a normalized map alone', () => {
    const weights = { A: 70, B: 30 };

    expect(settleResidual(weights, 'B')).toBe(weights);
  });

  it('should add the missing amount to the absorbing sector', () => {
    expect(settleResidual({ A: 70, B: 29.5 }, 'B')).toEqual({ A: 70, B: 30 });
  });
});

describe('isNormalized', () => {
  it('should accept totals within 0.01 of 100', () => {
    expect(isNormalized({ A: 60, B: 40 })).toBe(true);
    expect(isNormalized({ A: 60, B: 39.995 })).toBe(true);
  });

  it('should reject totals further away', () => {
    expect(isNormalized({ A: 60, B: 39 })).toBe(false);
  });
});

describe('roundPulseScore', () => {
  it('should round to one decimal', () => {
    expect(roundPulseScore(64.96)).toBe(65);
    expect(roundPulseScore(64.94)).toBe(64.9);
  });
});
