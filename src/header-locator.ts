import type { HeaderLocation } from "./types";

/** `.WAV`, the tail of the sample file name stored in the header. */
const WAV_NAME = new Uint8Array([0x2e, 0x57, 0x41, 0x56]);

/**
 * End-of-header marker: the big-endian float32 pair (0.0, 3.0).
 */
export const HEADER_END_MARKER = new Uint8Array([
  0x00, 0x00, 0x00, 0x00, 0x40, 0x40, 0x00, 0x00,
]);

/** Bytes skipped when no end-of-header marker is present. */
export const MIN_HEADER_LENGTH = 100;

/**
 * Finds the first occurrence of `needle` in `haystack` at or after `from`.
 *
 * @returns Offset of the match, or -1 when absent
 */
export function indexOfBytes(
  haystack: Uint8Array,
  needle: Uint8Array,
  from = 0,
): number {
  if (needle.length === 0) return Math.min(from, haystack.length);

  const last = haystack.length - needle.length;
  outer: for (let i = Math.max(from, 0); i <= last; i++) {
    for (let j = 0; j < needle.length; j++) {
      if (haystack[i + j] !== needle[j]) continue outer;
    }
    return i;
  }
  return -1;
}

/**
 * Locates the boundary between the header and the data region.
 *
 * The header starts with the sample name, terminated by a null byte after
 * its `.WAV` suffix. Axis metadata follows, closed by the (0.0, 3.0) marker.
 * When the marker is missing, at least {@link MIN_HEADER_LENGTH} bytes are
 * treated as header.
 *
 * @param buffer - Entire file contents
 * @returns Header boundary, marker position and the provisional boundary
 *
 * @example
 * ```typescript
 * const { boundary } = locateHeader(bytes);
 * const region = bytes.subarray(Math.min(boundary, bytes.length));
 * ```
 */
export function locateHeader(buffer: Uint8Array): HeaderLocation {
  let provisionalBoundary = 0;

  const nameIdx = indexOfBytes(buffer, WAV_NAME);
  if (nameIdx !== -1) {
    const nullPos = buffer.indexOf(0x00, nameIdx);
    if (nullPos !== -1) {
      provisionalBoundary = nullPos + 1;
    }
  }

  const markerIdx = indexOfBytes(buffer, HEADER_END_MARKER, provisionalBoundary);
  if (markerIdx !== -1) {
    return {
      boundary: markerIdx + HEADER_END_MARKER.length,
      markerPosition: markerIdx,
      provisionalBoundary,
    };
  }

  return {
    boundary: Math.max(provisionalBoundary, MIN_HEADER_LENGTH),
    markerPosition: null,
    provisionalBoundary,
  };
}
