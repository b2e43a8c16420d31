import { reconstructAxis } from "./axis-reconstructor";
import { decodeSamples } from "./data-decoder";
import { detectFormat, formatLabel } from "./format-detector";
import { locateHeader } from "./header-locator";
import type { DecodedSpectrum, SpectrumRow } from "./types";

/**
 * Decodes a spectrophotometer export into wavelength/value rows.
 *
 * Runs the header locator, format detector, sample decoder and axis
 * reconstructor in that order. Every byte sequence decodes to some result;
 * this never throws on file content.
 *
 * @param input - Raw bytes of the export
 * @returns Rows in file order with the detected format and header details
 *
 * @example
 * ```typescript
 * const bytes = await readFile("sample.sp");
 * const spectrum = decodeSpectrum(bytes);
 * console.log(spectrum.label, spectrum.rows.length);
 * ```
 */
export function decodeSpectrum(input: Uint8Array | ArrayBuffer): DecodedSpectrum {
  const buffer = input instanceof Uint8Array ? input : new Uint8Array(input);

  const header = locateHeader(buffer);
  const region = buffer.subarray(Math.min(header.boundary, buffer.length));

  const { format, scores } = detectFormat(region);
  const samples = decodeSamples(region, format);
  const { wavelengths, axisRange } = reconstructAxis(
    format,
    header.markerPosition,
    buffer,
    samples.length,
  );

  const rows: SpectrumRow[] = samples.map((sample) => ({
    wavelength: wavelengths[sample.index],
    value: sample.rawValue,
  }));

  return {
    format,
    label: formatLabel(format),
    header,
    axisRange,
    scores,
    rows,
  };
}

export { locateHeader, indexOfBytes } from "./header-locator";
export { detectFormat, formatLabel, scoreFloatArray } from "./format-detector";
export { decodeSamples } from "./data-decoder";
export { readAxisRange, reconstructAxis } from "./axis-reconstructor";
export { formatCsv } from "./csv-writer";
export type * from "./types";
