/**
 * Round half away from zero to a fixed number of decimals.
 */
export function roundTo(value: number, precision: number): number {
  const factor = 10 ** precision;
  return (Math.sign(value) * Math.round(Math.abs(value) * factor)) / factor;
}

export function percentage(part: number, whole: number, precision = 2): number {
  if (whole === 0) return 0;
  return roundTo((part / whole) * 100, precision);
}

export function average(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}
