import { readFloat32Array } from "./format-detector";
import type { DataFormat, DecodedSample } from "./types";

/**
 * Decodes the data region into samples in file order.
 *
 * Group size follows the format: 4 bytes for float32, 2 for int16, 1 for
 * raw bytes. Float values are kept exactly as decoded, NaN and infinities
 * included.
 *
 * @param region - Bytes from the header boundary to the end of the file
 * @param format - Format chosen by `detectFormat`
 * @returns One sample per group, indexed from 0
 */
export function decodeSamples(
  region: Uint8Array,
  format: DataFormat,
): DecodedSample[] {
  let values: number[];

  switch (format.kind) {
    case "float32":
      values = readFloat32Array(region, format.littleEndian);
      break;
    case "int16": {
      const view = new DataView(
        region.buffer,
        region.byteOffset,
        region.byteLength,
      );
      const count = Math.floor(region.byteLength / 2);
      values = new Array(count);
      for (let i = 0; i < count; i++) {
        values[i] = view.getUint16(i * 2, true);
      }
      break;
    }
    case "bytes":
      values = Array.from(region);
      break;
  }

  return values.map((rawValue, index) => ({ index, rawValue }));
}
