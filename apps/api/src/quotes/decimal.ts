/**
 * Fixed-point rendering of a finite number, rounding exact ties to even.
 * Never falls back to exponent notation, unlike `Number.prototype.toFixed`
 * from 1e21 upwards.
 */
export function formatFixed(value: number, digits: number): string {
  if (!Number.isFinite(value)) throw new RangeError(`cannot format ${value}`);

  const sign = value < 0 ? '-' : '';
  const abs = Math.abs(value);
  const frac = digits > 0 ? `.${'0'.repeat(digits)}` : '';

  // Every double this large is an integer, so BigInt renders it exactly.
  if (abs >= 1e21) return `${sign}${BigInt(abs)}${frac}`;

  const rounded = value.toFixed(digits);

  // toFixed rounds an exact tie away from zero; step back when that lands on an odd digit.
  const exact = abs.toFixed(100);
  const dot = exact.indexOf('.');
  const cut = digits > 0 ? dot + 1 + digits : dot;
  if (!/^\.?50*$/.test(exact.slice(cut))) return rounded;

  const truncated = exact.slice(0, cut);
  const last = Number(truncated[truncated.length - 1]);
  return last % 2 === 0 ? `${sign}${truncated}` : rounded;
}
