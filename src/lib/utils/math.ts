/**
 * Numeric helpers shared by the scoring functions
 */

/**
 * Round half away from zero to a number of decimal places
 */
export function roundTo(value: number, decimals: number = 0): number {
  const factor = 10 ** decimals;
  return Math.round((value + Number.EPSILON * Math.sign(value)) * factor) / factor;
}
