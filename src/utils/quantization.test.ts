import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  decimalsOf,
  formatIncrement,
  isStepAligned,
  roundToStep,
  roundToTick,
  toFixedPrecision
} from './quantization';

describe('quantization', () => {
  describe('Property-Based Tests', () => {
    it('rounding to a tick is idempotent and moves a price by at most half a tick', () => {
      fc.assert(
        fc.property(
          fc.double({ min: 1, max: 100000, noNaN: true }),
          fc.constantFrom(0.01, 0.1, 0.5, 1),
          (price, tick) => {
            const rounded = roundToTick(price, tick);
            expect(roundToTick(rounded, tick)).toBe(rounded);
            expect(Math.abs(rounded - price)).toBeLessThanOrEqual(tick / 2 + 1e-8);
            expect(isStepAligned(rounded, 0, tick)).toBe(true);
          }
        ),
        { numRuns: 200 }
      );
    });

    it('rounding to a step is idempotent', () => {
      fc.assert(
        fc.property(
          fc.double({ min: 0, max: 1000, noNaN: true }),
          fc.constantFrom(0.001, 0.01, 1),
          (quantity, step) => {
            const rounded = roundToStep(quantity, step);
            expect(roundToStep(rounded, step)).toBe(rounded);
          }
        ),
        { numRuns: 200 }
      );
    });
  });

  describe('roundToTick', () => {
    it('rounds to the nearest tick without floating residue', () => {
      expect(roundToTick(42123.456, 0.1)).toBe(42123.5);
      expect(roundToTick(41111.111, 0.1)).toBe(41111.1);
      expect(roundToTick(0.1 + 0.2, 0.1)).toBe(0.3);
    });

    it('rejects a non-positive tick size', () => {
      expect(() => roundToTick(100, 0)).toThrow(RangeError);
      expect(() => roundToTick(100, -0.1)).toThrow('Tick size must be a positive number, got -0.1');
    });
  });

  describe('roundToStep', () => {
    it('rounds quantities to the step size', () => {
      expect(roundToStep(0.0123, 0.001)).toBe(0.012);
      expect(roundToStep(0.0016, 0.001)).toBe(0.002);
    });

    it('rejects a zero step size', () => {
      expect(() => roundToStep(1, 0)).toThrow('Step size must be a positive number, got 0');
    });
  });

  describe('isStepAligned', () => {
    it('accepts whole steps from the base', () => {
      expect(isStepAligned(0.003, 0.001, 0.001)).toBe(true);
      expect(isStepAligned(0.0025, 0.001, 0.001)).toBe(false);
    });

    it('treats a zero step as always aligned', () => {
      expect(isStepAligned(1.2345, 0, 0)).toBe(true);
    });
  });

  describe('decimalsOf and formatIncrement', () => {
    it('derives decimals from the increment', () => {
      expect(decimalsOf(0.001)).toBe(3);
      expect(decimalsOf(0.1)).toBe(1);
      expect(decimalsOf(0.00001)).toBe(5);
      expect(decimalsOf(1e-8)).toBe(8);
      expect(decimalsOf(1)).toBe(0);
      expect(decimalsOf(10)).toBe(0);
    });

    it('formats without exponent notation', () => {
      expect(formatIncrement(0.00000123, 0.00000001)).toBe('0.00000123');
      expect(formatIncrement(45555.6, 0.1)).toBe('45555.6');
    });
  });

  it('toFixedPrecision strips floating drift', () => {
    expect(toFixedPrecision(0.1 + 0.2)).toBe(0.3);
    expect(toFixedPrecision(1.005, 2)).toBe(1);
  });
});
