/**
 * Round half away from zero: 157.5 → 158, -2.5 → -3.
 * Every damage, heal and buffed stat in the battle goes through this one rule.
 */
export function roundHalfAwayFromZero(value: number): number {
  return Math.sign(value) * Math.round(Math.abs(value));
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
