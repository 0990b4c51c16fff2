/**
 * @ledgerlens/engine — Currency-scale rounding.
 *
 * Ties that are exact in binary floating point round to the even
 * neighbour (0.125 → 0.12, 0.375 → 0.38). Values whose decimal form only
 * looks like a tie (2.675 is stored as 2.67499…) round by their stored
 * value. Negative zero is normalized to zero.
 */

export const CURRENCY_DECIMALS = 2;

// Beyond this scale a double carries no digits below the rounding place.
const MAX_SAFE_UNITS = Number.MAX_SAFE_INTEGER;

// Digits past the rounding place read from the exact decimal expansion.
const GUARD_DIGITS = 30;

export function roundHalfEven(value: number, decimals: number = CURRENCY_DECIMALS): number {
  if (!Number.isFinite(value)) {
    return value;
  }

  const factor = 10 ** decimals;
  const magnitude = Math.abs(value);
  if (magnitude * factor >= MAX_SAFE_UNITS) {
    return value;
  }

  const digits = magnitude.toFixed(Math.min(100, decimals + GUARD_DIGITS));
  const cut = digits.indexOf(".") + 1 + decimals;
  const units = Number(digits.slice(0, cut).replace(".", ""));
  const rest = digits.slice(cut);

  const head = rest.charAt(0);
  const above = /[1-9]/.test(rest.slice(1));
  const up = head > "5" || (head === "5" && (above || units % 2 === 1));
  const rounded = up ? units + 1 : units;

  const result = (value < 0 ? -rounded : rounded) / factor;
  return result === 0 ? 0 : result;
}
