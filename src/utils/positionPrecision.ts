// Meshtastic channel position precision, bits -> approximate radius in meters
const PRECISION_TABLE: ReadonlyArray<readonly [number, number]> = [
  [10, 23300],
  [11, 11700],
  [12, 5800],
  [13, 2900],
  [14, 1500],
  [15, 729],
  [16, 364],
  [17, 182],
  [18, 91],
  [19, 45]
];

/**
 * Approximate position accuracy in meters for a precision_bits value.
 *
 * Values between table entries are interpolated in log space since each bit
 * roughly halves the radius.
 */
export function precisionMetersFromBits(precisionBits: number | null | undefined): number | null {
  if (precisionBits === null || precisionBits === undefined || precisionBits <= 0) {
    return null;
  }
  if (precisionBits >= 32) {
    return 1.0;
  }
  if (precisionBits < 10) {
    return 50000.0;
  }
  if (precisionBits > 19) {
    return 45.0 / 2 ** (precisionBits - 19);
  }

  const exact = PRECISION_TABLE.find(([bits]) => bits === precisionBits);
  if (exact) {
    return exact[1];
  }

  // Fractional bit counts only; integral 10..19 are all in the table
  const lower = [...PRECISION_TABLE].reverse().find(([bits]) => bits < precisionBits);
  const upper = PRECISION_TABLE.find(([bits]) => bits > precisionBits);
  if (!lower || !upper) {
    return null;
  }
  const ratio = (precisionBits - lower[0]) / (upper[0] - lower[0]);
  const logResult = Math.log(lower[1]) + ratio * (Math.log(upper[1]) - Math.log(lower[1]));
  return Math.exp(logResult);
}
