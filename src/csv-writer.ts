import type { SpectrumRow } from "./types";

export const CSV_HEADER = "Wavelength,Absorbance";

/**
 * Splits a finite, non-negative double into `mantissa * 2 ** exponent`.
 */
function decompose(x: number): { mantissa: bigint; exponent: number } {
  const view = new DataView(new ArrayBuffer(8));
  view.setFloat64(0, x);
  const bits = view.getBigUint64(0);

  const biased = Number((bits >> 52n) & 0x7ffn);
  const fraction = bits & ((1n << 52n) - 1n);
  if (biased === 0) {
    // subnormal
    return { mantissa: fraction, exponent: -1074 };
  }
  return { mantissa: fraction | (1n << 52n), exponent: biased - 1075 };
}

/**
 * Fixed-point rendering of a number.
 *
 * Rounds the exact binary value, with exact ties going to the even digit.
 * Non-finite values print as `inf`, `-inf` and `nan`, a negative value
 * keeps its sign even when it rounds to zero, and large magnitudes stay
 * positional.
 *
 * @param x - Value to render
 * @param digits - Digits after the decimal point
 *
 * @example
 * ```typescript
 * formatFixed(400.0625, 3); // "400.062"
 * formatFixed(400.1875, 3); // "400.188"
 * ```
 */
export function formatFixed(x: number, digits: number): string {
  if (Number.isNaN(x)) return "nan";
  if (x === Infinity) return "inf";
  if (x === -Infinity) return "-inf";

  const negative = x < 0 || Object.is(x, -0);
  const { mantissa, exponent } = decompose(Math.abs(x));
  const scale = 10n ** BigInt(digits);

  let scaled: bigint;
  if (exponent >= 0) {
    scaled = (mantissa << BigInt(exponent)) * scale;
  } else {
    const numerator = mantissa * scale;
    const denominator = 1n << BigInt(-exponent);
    scaled = numerator / denominator;
    const twiceRemainder = (numerator % denominator) * 2n;
    if (
      twiceRemainder > denominator ||
      (twiceRemainder === denominator && scaled % 2n === 1n)
    ) {
      scaled += 1n;
    }
  }

  let text = scaled.toString();
  if (digits > 0) {
    text = text.padStart(digits + 1, "0");
    text = `${text.slice(0, -digits)}.${text.slice(-digits)}`;
  }
  return negative ? `-${text}` : text;
}

/**
 * Renders rows as CSV: a header line, then `wavelength,value` per row with
 * 3 and 6 decimals respectively. Every line ends with a newline.
 *
 * @example
 * ```typescript
 * formatCsv([{ wavelength: 400, value: 1 }]);
 * // "Wavelength,Absorbance\n400.000,1.000000\n"
 * ```
 */
export function formatCsv(rows: readonly SpectrumRow[]): string {
  const lines = [CSV_HEADER];
  for (const row of rows) {
    lines.push(`${formatFixed(row.wavelength, 3)},${formatFixed(row.value, 6)}`);
  }
  return `${lines.join("\n")}\n`;
}
