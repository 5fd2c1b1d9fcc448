import { describe, it, expect } from 'vitest';
import {
  createSeededNormal,
  createSeededUniform,
  createStandardNormal,
  zeroNormal,
} from './normal-source.js';

describe('normal sources', () => {
  describe('createStandardNormal', () => {
    it('should apply the Box-Muller transform', () => {
      const draws = [Math.exp(-2), 0.5];
      const normal = createStandardNormal(() => draws.shift() ?? 0.5);

      // sqrt(-2 * ln(e^-2)) * cos(pi)
      expect(normal()).toBeCloseTo(-2, 12);
    });

    it('should redraw zero uniforms instead of taking log(0)', () => {
      const draws = [0, Math.exp(-2), 0, 0.5];
      const normal = createStandardNormal(() => draws.shift() ?? 0.5);

      expect(normal()).toBeCloseTo(-2, 12);
      expect(draws).toHaveLength(0);
    });
  });

  describe('createSeededUniform', () => {
    it('should repeat the same sequence for the same seed', () => {
      const a = createSeededUniform(42);
      const b = createSeededUniform(42);

      const seqA = Array.from({ length: 5 }, () => a());
      const seqB = Array.from({ length: 5 }, () => b());

      expect(seqA).toEqual(seqB);
    });

    it('should differ between seeds', () => {
      const a = createSeededUniform(1);
      const b = createSeededUniform(2);

      expect(a()).not.toBe(b());
    });

    it('should stay within [0, 1)', () => {
      const uniform = createSeededUniform(7);

      for (let i = 0; i < 1000; i++) {
        const value = uniform();
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThan(1);
      }
    });
  });

  describe('createSeededNormal', () => {
    it('should have roughly zero mean and unit variance', () => {
      const normal = createSeededNormal(2024);
      const n = 10000;
      const samples = Array.from({ length: n }, () => normal());

      const mean = samples.reduce((sum, x) => sum + x, 0) / n;
      const variance = samples.reduce((sum, x) => sum + (x - mean) ** 2, 0) / n;

      expect(Math.abs(mean)).toBeLessThan(0.05);
      expect(Math.abs(variance - 1)).toBeLessThan(0.1);
    });
  });

  it('zeroNormal should always return 0', () => {
    expect(zeroNormal()).toBe(0);
    expect(zeroNormal()).toBe(0);
  });
});
