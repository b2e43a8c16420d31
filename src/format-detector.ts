import type {
  DataFormat,
  FormatDetection,
  FormatLabel,
  FormatScores,
} from "./types";

/**
 * Plausibility scorer for a candidate float interpretation.
 */
export type FloatScorer = (values: readonly number[]) => number;

/**
 * Exclusive bound on plausible readings. Absorbance and transmittance both
 * sit well inside it, while a wrongly byte-swapped float usually does not.
 */
const PLAUSIBLE_LIMIT = 1000;

/**
 * Counts values that are finite and strictly within (-1000, 1000).
 *
 * @param values - Decoded float32 values
 * @returns Number of plausible readings
 */
export function scoreFloatArray(values: readonly number[]): number {
  let score = 0;
  for (const x of values) {
    if (Number.isFinite(x) && x > -PLAUSIBLE_LIMIT && x < PLAUSIBLE_LIMIT) {
      score++;
    }
  }
  return score;
}

/**
 * Reads every 4-byte group of `region` as a float32.
 */
export function readFloat32Array(
  region: Uint8Array,
  littleEndian: boolean,
): number[] {
  const view = new DataView(region.buffer, region.byteOffset, region.byteLength);
  const count = Math.floor(region.byteLength / 4);

  const values: number[] = new Array(count);
  for (let i = 0; i < count; i++) {
    values[i] = view.getFloat32(i * 4, littleEndian);
  }
  return values;
}

/**
 * Determines the sample encoding of the data region.
 *
 * Precedence, by region length:
 * 1. A positive multiple of 4 is float32. The region is decoded both ways
 *    and the interpretation with the higher score wins, ties going to
 *    big-endian.
 * 2. A positive multiple of 2 is unsigned little-endian int16.
 * 3. Anything else, including an empty region, is one sample per byte.
 *
 * @param region - Bytes from the header boundary to the end of the file
 * @param score - Scorer used to compare the two float interpretations
 * @returns Detected format, with both scores when float32 was chosen
 *
 * @example
 * ```typescript
 * const { format } = detectFormat(region);
 * console.log(formatLabel(format)); // "float32_be"
 * ```
 */
export function detectFormat(
  region: Uint8Array,
  score: FloatScorer = scoreFloatArray,
): FormatDetection {
  const n = region.byteLength;

  if (n > 0 && n % 4 === 0) {
    const scores: FormatScores = {
      littleEndian: score(readFloat32Array(region, true)),
      bigEndian: score(readFloat32Array(region, false)),
    };
    const littleEndian = scores.bigEndian < scores.littleEndian;
    return { format: { kind: "float32", littleEndian }, scores };
  }

  if (n > 0 && n % 2 === 0) {
    return { format: { kind: "int16" }, scores: null };
  }

  return { format: { kind: "bytes" }, scores: null };
}

/**
 * Diagnostic label for a format, as reported by the CLI.
 */
export function formatLabel(format: DataFormat): FormatLabel {
  switch (format.kind) {
    case "float32":
      return format.littleEndian ? "float32_le" : "float32_be";
    case "int16":
      return "int16";
    case "bytes":
      return "bytes";
  }
}
