/**
 * Small numeric helpers shared by the tool handlers
 */

/**
 * Round to `digits` decimal places; exact halves go to the even neighbour.
 */
export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  if (scaled - floor === 0.5) {
    return (floor % 2 === 0 ? floor : floor + 1) / factor;
  }
  return Math.round(scaled) / factor;
}
