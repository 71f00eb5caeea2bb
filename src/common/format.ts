/**
 * Fixed-point formatting that breaks exact ties to the even digit.
 *
 * `toFixed` rounds an exact tie away from zero. A double sits exactly halfway
 * between two `digits`-place decimals only when it is an odd multiple of
 * 2^-(digits + 1), so that case is detected exactly and rounded to even.
 */
export function toFixedHalfEven(x: number, digits: number): string {
  const scaled = x * 2 ** (digits + 1);
  if (!Number.isInteger(scaled) || scaled % 2 === 0) return x.toFixed(digits);

  const factor = 10 ** digits;
  let units = Math.floor(x * factor);
  if (units % 2 !== 0) units += 1;
  return (units / factor).toFixed(digits);
}
