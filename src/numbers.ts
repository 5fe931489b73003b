/**
 * Numeric conversions used wherever a float crosses into a stored
 * integer value. Non-finite input never propagates.
 */

const I32_MIN = -2147483648;
const I32_MAX = 2147483647;

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** Round half away from zero into the 32-bit signed range. NaN becomes 0. */
export function roundToI32(value: number): number {
  if (Number.isNaN(value)) return 0;
  if (value >= I32_MAX) return I32_MAX;
  if (value <= I32_MIN) return I32_MIN;
  const rounded = Math.sign(value) * Math.round(Math.abs(value));
  return rounded === 0 ? 0 : rounded;
}

/** Non-negative finite miles, anything else is 0. */
export function sanitizeMiles(value: number): number {
  if (!Number.isFinite(value) || value < 0) return 0;
  return value;
}
