/**
 * Price and quantity quantization to exchange tick/step sizes
 */

export const QUANTIZATION_DECIMALS = 8;

const ALIGNMENT_TOLERANCE = 1e-6;

/**
 * Fixes a value to 8 decimal places to strip floating drift
 */
export function toFixedPrecision(value: number, decimals: number = QUANTIZATION_DECIMALS): number {
  return Number(value.toFixed(decimals));
}

function roundToIncrement(value: number, increment: number, label: string): number {
  if (!Number.isFinite(increment) || increment <= 0) {
    throw new RangeError(`${label} must be a positive number, got ${increment}`);
  }
  return toFixedPrecision(Math.round(value / increment) * increment);
}

/**
 * Rounds a price to the nearest multiple of the symbol's tick size
 */
export function roundToTick(price: number, tickSize: number): number {
  return roundToIncrement(price, tickSize, 'Tick size');
}

/**
 * Rounds a quantity to the nearest multiple of the symbol's step size
 */
export function roundToStep(quantity: number, stepSize: number): number {
  return roundToIncrement(quantity, stepSize, 'Step size');
}

/**
 * Whether (value - base) is a whole number of steps, within floating tolerance
 */
export function isStepAligned(value: number, base: number, step: number): boolean {
  if (step <= 0) {
    return true;
  }
  const steps = (value - base) / step;
  return Math.abs(steps - Math.round(steps)) < ALIGNMENT_TOLERANCE;
}

/**
 * Number of decimals implied by an increment, e.g. 0.001 -> 3, 10 -> 0
 */
export function decimalsOf(increment: number): number {
  if (!Number.isFinite(increment) || increment <= 0 || increment >= 1) {
    return 0;
  }
  const text = toFixedPrecision(increment).toString();
  if (text.includes('e-')) {
    return Number(text.split('e-')[1]);
  }
  const fraction = text.split('.')[1];
  return fraction ? fraction.length : 0;
}

/**
 * Formats a quantized value for the wire without exponent notation
 */
export function formatIncrement(value: number, increment: number): string {
  return value.toFixed(decimalsOf(increment));
}
