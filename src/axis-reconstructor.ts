import type { AxisRange, DataFormat } from "./types";

/**
 * Returns the `length` bytes ending just before `position`, or null when
 * that window falls outside the buffer.
 */
export function readBytesBefore(
  buffer: Uint8Array,
  position: number,
  length: number,
): Uint8Array | null {
  const start = position - length;
  if (start < 0 || position > buffer.length) return null;
  return buffer.subarray(start, position);
}

/**
 * Reads the start and end wavelengths stored as two big-endian float32
 * values immediately before the end-of-header marker.
 *
 * @param buffer - Entire file contents
 * @param markerPosition - Offset of the end-of-header marker
 * @returns The stored range, or null when it cannot be read
 */
export function readAxisRange(
  buffer: Uint8Array,
  markerPosition: number | null,
): AxisRange | null {
  if (markerPosition === null) return null;

  const bytes = readBytesBefore(buffer, markerPosition, 8);
  if (!bytes) return null;

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  return {
    startWavelength: view.getFloat32(0, false),
    endWavelength: view.getFloat32(4, false),
  };
}

/**
 * Builds the wavelength for each of `count` samples.
 *
 * Only float32 exports carry a usable axis range. Every other format, and
 * any float32 export whose range cannot be read, is indexed 0..count-1.
 * Points are spaced linearly between start and end with no rounding.
 *
 * @param format - Detected data format
 * @param markerPosition - Offset of the end-of-header marker, if found
 * @param buffer - Entire file contents
 * @param count - Number of decoded samples
 * @returns Wavelengths in sample order, plus the range that was read
 */
export function reconstructAxis(
  format: DataFormat,
  markerPosition: number | null,
  buffer: Uint8Array,
  count: number,
): { wavelengths: number[]; axisRange: AxisRange | null } {
  if (format.kind !== "float32") {
    return {
      wavelengths: Array.from({ length: count }, (_, i) => i),
      axisRange: null,
    };
  }

  const axisRange = readAxisRange(buffer, markerPosition);
  const start = axisRange ? axisRange.startWavelength : 0;
  const end = axisRange ? axisRange.endWavelength : count - 1;
  const step = count > 1 ? (end - start) / (count - 1) : 0;

  return {
    wavelengths: Array.from({ length: count }, (_, i) => start + i * step),
    axisRange,
  };
}
