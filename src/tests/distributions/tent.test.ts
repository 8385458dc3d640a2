import { describe, it, expect, beforeEach } from 'vitest';
import { TentDistribution } from '../../core/distributions/TentDistribution';
import { RNG } from '../../core/math/random';
import { EmmError, ErrorCode } from '../../core/errors';

describe('Tent Distribution', () => {
  let rng: RNG;

  beforeEach(() => {
    rng = new RNG(42); // Fixed seed for reproducibility
  });

  describe('Parameter Validation', () => {
    it('should reject an upper bound at or below the lower bound', () => {
      expect(() => new TentDistribution(1, 0, 0.5)).toThrow(EmmError);
      expect(() => new TentDistribution(0.5, 0.5, 0.5)).toThrow('Invalid Tent bounds');
    });

    it('should reject a non-positive precision', () => {
      let caught: unknown;
      try {
        new TentDistribution(0, 1, 0.5, { precision: 0 });
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(EmmError);
      expect(caught).toMatchObject({ code: ErrorCode.INVALID_INPUT });
    });

    it('should accept a peak on either bound', () => {
      expect(() => new TentDistribution(0, 1, 0)).not.toThrow();
      expect(() => new TentDistribution(0, 1, 1)).not.toThrow();
    });
  });

  describe('CDF', () => {
    const tent = new TentDistribution(0, 1, 0.3);

    it('should be 0 at and below the lower bound and 1 at and above the upper bound', () => {
      expect(tent.cdf(-0.5)).toBe(0);
      expect(tent.cdf(0)).toBe(0);
      expect(tent.cdf(1)).toBe(1);
      expect(tent.cdf(1.5)).toBe(1);
    });

    it('should join both branches at the peak', () => {
      // (c - L) / (U - L)
      expect(tent.cdf(0.3)).toBeCloseTo(0.3, 12);
      expect(tent.cdf(0.3 + 1e-9)).toBeCloseTo(0.3, 8);
    });

    it('should follow the quadratic branches', () => {
      expect(tent.cdf(0.15)).toBeCloseTo((0.15 * 0.15) / 0.3, 12);
      expect(tent.cdf(0.65)).toBeCloseTo(1 - (0.35 * 0.35) / 0.7, 12);
    });

    it('should increase monotonically', () => {
      let previous = 0;
      for (let x = 0; x <= 1; x += 0.01) {
        const value = tent.cdf(x);
        expect(value).toBeGreaterThanOrEqual(previous);
        previous = value;
      }
    });

    it('should respect bounds other than [0, 1]', () => {
      const narrow = new TentDistribution(0, 0.1, 0.04);
      expect(narrow.cdf(0.04)).toBeCloseTo(0.4, 12);
      expect(narrow.cdf(0.02)).toBeCloseTo((0.02 * 0.02) / (0.04 * 0.1), 12);
      expect(narrow.cdf(0.1)).toBe(1);
    });
  });

  describe('PDF', () => {
    const tent = new TentDistribution(0, 1, 0.3);

    it('should peak at the mode with height 2 / (U - L)', () => {
      expect(tent.pdf(0.3)).toBeCloseTo(2, 12);
    });

    it('should be linear on each side and zero outside the support', () => {
      expect(tent.pdf(0.15)).toBeCloseTo(1, 12);
      expect(tent.pdf(0.65)).toBeCloseTo(1, 12);
      expect(tent.pdf(-0.1)).toBe(0);
      expect(tent.pdf(1.1)).toBe(0);
    });

    it('should give log density as log of density', () => {
      expect(tent.logPdf(0.3)).toBeCloseTo(Math.log(2), 12);
      expect(tent.logPdf(-1)).toBe(-Infinity);
    });
  });

  describe('Moments', () => {
    const tent = new TentDistribution(0, 1, 0.3);

    it('should compute mean and variance', () => {
      expect(tent.mean()).toBeCloseTo(1.3 / 3, 12);
      expect(tent.variance()).toBeCloseTo(0.79 / 18, 12);
    });

    it('should report mode and support', () => {
      expect(tent.mode()).toBe(0.3);
      expect(tent.support()).toEqual({ min: 0, max: 1 });
    });
  });

  describe('Quantile', () => {
    const tent = new TentDistribution(0, 1, 0.3);

    it('should invert the CDF', () => {
      for (const p of [0.01, 0.1, 0.3, 0.5, 0.9, 0.99]) {
        expect(tent.cdf(tent.quantile(p))).toBeCloseTo(p, 10);
      }
    });

    it('should clamp to the bounds', () => {
      expect(tent.quantile(0)).toBe(0);
      expect(tent.quantile(1)).toBe(1);
    });
  });

  describe('Bisection', () => {
    const precision = 1000;
    const tent = new TentDistribution(0, 1, 0.3, { precision });
    const tolerance = 2 / precision;

    it('should derive its resolution from the precision', () => {
      expect(tent.resolution).toBe(0.001);
    });

    it('should land next to the lower bound for u = 0', () => {
      const value = tent.bisectQuantile(0);

      // Every step moves left; the smallest step above 0.001 is 0.25 / 128
      expect(value).toBeCloseTo(0.25 / 128, 12);
      expect(value).toBeLessThanOrEqual(tolerance);
    });

    it('should land next to the upper bound for u close to 1', () => {
      const value = tent.bisectQuantile(0.999999);

      expect(value).toBeGreaterThanOrEqual(1 - tolerance);
      expect(value).toBeLessThan(1);
    });

    it('should stay within two resolutions of the exact quantile', () => {
      for (let u = 0.05; u < 1; u += 0.05) {
        expect(Math.abs(tent.bisectQuantile(u) - tent.quantile(u))).toBeLessThanOrEqual(tolerance);
      }
    });

    it('should reproduce u through the CDF within the terminal tolerance', () => {
      // The CDF slope never exceeds the peak density 2 / (U - L)
      for (let u = 0.05; u < 1; u += 0.05) {
        expect(Math.abs(tent.cdf(tent.bisectQuantile(u)) - u)).toBeLessThanOrEqual(2 * tolerance);
      }
    });

    it('should return the midpoint straight away when it hits u exactly', () => {
      const symmetric = new TentDistribution(0, 1, 0.5, { precision });
      expect(symmetric.bisectQuantile(symmetric.cdf(0.5))).toBe(0.5);
    });

    it('should tighten with a higher precision', () => {
      const fine = new TentDistribution(0, 1, 0.3, { precision: 1_000_000 });
      expect(Math.abs(fine.bisectQuantile(0.42) - fine.quantile(0.42))).toBeLessThanOrEqual(2e-6);
    });

    it('should handle a peak sitting on the lower bound', () => {
      const edge = new TentDistribution(0, 1, 0, { precision });
      const value = edge.bisectQuantile(0.5);

      expect(Math.abs(value - edge.quantile(0.5))).toBeLessThanOrEqual(tolerance);
    });
  });

  describe('Sampling', () => {
    it('should keep samples inside the support', () => {
      const tent = new TentDistribution(0, 0.1, 0.07, { rng, precision: 10_000 });
      for (const sample of tent.sampleMultiple(500)) {
        expect(sample).toBeGreaterThanOrEqual(0);
        expect(sample).toBeLessThanOrEqual(0.1);
      }
    });

    it('should match the theoretical mean', () => {
      const tent = new TentDistribution(0, 1, 0.3, { rng, precision: 10_000 });
      const samples = tent.sampleMultiple(5000);
      const mean = samples.reduce((a, b) => a + b, 0) / samples.length;

      expect(mean).toBeCloseTo(tent.mean(), 1);
    });

    it('should be reproducible with a seeded RNG', () => {
      const tent = new TentDistribution(0, 1, 0.6, { precision: 10_000 });
      expect(tent.sampleMultiple(10, new RNG(9))).toEqual(tent.sampleMultiple(10, new RNG(9)));
    });
  });
});
