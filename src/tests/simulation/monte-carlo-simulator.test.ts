import { describe, it, expect, vi, afterEach } from 'vitest';
import { MonteCarloSimulator, runSimulation } from '../../simulation/MonteCarloSimulator';
import { FULL_SUBSET, SUBSET_COUNT } from '../../simulation/AgreementEvaluator';
import { EmmError } from '../../core/errors';

function isSubsetOf(subset: number, superset: number): boolean {
  return (subset & superset) === subset;
}

describe('MonteCarloSimulator', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('configuration', () => {
    it('should reject a non-positive trial count before running', () => {
      expect(() => new MonteCarloSimulator({ trialCount: 0 })).toThrow(EmmError);
    });

    it('should reject inverted bounds', () => {
      expect(() => new MonteCarloSimulator({ lowerBound: 1, upperBound: 0 })).toThrow(EmmError);
    });

    it('should expose the resolved configuration', () => {
      const simulator = new MonteCarloSimulator({ trialCount: 10, seed: 1 });
      expect(simulator.getConfig()).toMatchObject({
        trialCount: 10,
        bisectionPrecision: 10,
        tentMode: true,
        seed: 1,
      });
    });
  });

  describe('tallies', () => {
    const trialCount = 2000;

    it.each([false, true])('should count every trial for trivial subsets (tent: %s)', (tentMode) => {
      const tallies = runSimulation(trialCount, tentMode, { seed: 99 });

      expect(tallies).toHaveLength(SUBSET_COUNT);
      expect(tallies[0]).toBe(trialCount);
      for (const singleton of [1, 2, 4, 8, 16, 32]) {
        expect(tallies[singleton]).toBe(trialCount);
      }
    });

    it.each([false, true])('should never count a superset more than its subsets (tent: %s)', (tentMode) => {
      const tallies = runSimulation(trialCount, tentMode, { seed: 7 });

      for (let subset = 0; subset < SUBSET_COUNT; subset++) {
        for (let superset = 0; superset < SUBSET_COUNT; superset++) {
          if (isSubsetOf(subset, superset)) {
            expect(tallies[subset]).toBeGreaterThanOrEqual(tallies[superset]);
          }
        }
      }
    });

    it('should see real disagreement across all six measures', () => {
      const tallies = runSimulation(trialCount, false, { seed: 3 });

      expect(tallies[FULL_SUBSET]).toBeGreaterThan(0);
      expect(tallies[FULL_SUBSET]).toBeLessThan(trialCount);
    });

    it('should keep narrow bounds working', () => {
      const tallies = runSimulation(trialCount, false, { seed: 3, upperBound: 0.1 });
      expect(tallies[0]).toBe(trialCount);
    });
  });

  describe('determinism', () => {
    it('should reproduce tallies for the same seed', () => {
      const first = runSimulation(100_000, false, { lowerBound: 0, upperBound: 1, seed: 2021 });
      const second = runSimulation(100_000, false, { lowerBound: 0, upperBound: 1, seed: 2021 });

      expect(second).toEqual(first);
    });

    it('should reproduce tent-mode tallies for the same seed', () => {
      const first = runSimulation(5000, true, { seed: 17 });
      const second = runSimulation(5000, true, { seed: 17 });

      expect(second).toEqual(first);
    });
  });

  describe('run', () => {
    it('should answer probability queries', () => {
      const result = new MonteCarloSimulator({ trialCount: 3000, tentMode: false, seed: 11 }).run();

      expect(result.probability('')).toBe(1);
      expect(result.probability('c')).toBe(1);
      expect(result.probability('abcdef')).toBeLessThanOrEqual(result.probability('a'));
      expect(result.probability('abcdef')).toBeLessThanOrEqual(result.probability('ab'));
      expect(result.probability('abcdef')).toBe(result.getTallies()[63] / 3000);
    });

    it('should record run metadata', () => {
      const result = new MonteCarloSimulator({ trialCount: 100, tentMode: false, seed: 5 }).run();
      const metadata = result.getMetadata();

      expect(metadata.samplingMode).toBe('independent');
      expect(metadata.seed).toBe(5);
      expect(metadata.computeTime).toBeGreaterThanOrEqual(0);
      expect(metadata.timestamp).toBeInstanceOf(Date);
    });

    it('should leave the seed out of auto-seeded runs', () => {
      const result = new MonteCarloSimulator({ trialCount: 10 }).run();

      expect(result.getMetadata().samplingMode).toBe('tent');
      expect('seed' in result.getMetadata()).toBe(false);
    });

    it('should report progress every 1% and finish at 1', () => {
      const progress: number[] = [];
      new MonteCarloSimulator({ trialCount: 1000, seed: 1 }).run((p) => progress.push(p));

      expect(progress).toHaveLength(100);
      expect(progress[0]).toBe(0.01);
      expect(progress[progress.length - 1]).toBe(1);
      for (let i = 1; i < progress.length; i++) {
        expect(progress[i]).toBeGreaterThan(progress[i - 1]);
      }
    });

    it('should log through console.debug only in debug mode', () => {
      const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});

      new MonteCarloSimulator({ trialCount: 5, seed: 1 }).run();
      expect(debug).not.toHaveBeenCalled();

      new MonteCarloSimulator({ trialCount: 5, seed: 1, debug: true }).run();
      expect(debug).toHaveBeenCalledTimes(3);
    });
  });
});
