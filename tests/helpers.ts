/**
 * Byte builders for synthetic exports.
 */

export const MARKER = [0x00, 0x00, 0x00, 0x00, 0x40, 0x40, 0x00, 0x00];

/** ASCII space; never part of the `.WAV` name or the end-of-header marker. */
export const FILLER = 0x20;

export function bytes(...parts: (ArrayLike<number> | number)[]): Uint8Array {
  const out: number[] = [];
  for (const part of parts) {
    if (typeof part === "number") out.push(part);
    else out.push(...Array.from(part));
  }
  return new Uint8Array(out);
}

export function filler(length: number): Uint8Array {
  return new Uint8Array(length).fill(FILLER);
}

export function ascii(text: string): Uint8Array {
  return new Uint8Array(Array.from(text, (ch) => ch.charCodeAt(0)));
}

export function float32(values: number[], littleEndian: boolean): Uint8Array {
  const out = new Uint8Array(values.length * 4);
  const view = new DataView(out.buffer);
  values.forEach((v, i) => view.setFloat32(i * 4, v, littleEndian));
  return out;
}

/**
 * A typical export: `.WAV` name, padding, big-endian (start, end)
 * wavelengths, marker, then `data`. The marker sits at offset 92 and the
 * data region starts at 100.
 */
export function exportWithRange(
  startWavelength: number,
  endWavelength: number,
  data: ArrayLike<number>,
): Uint8Array {
  return bytes(
    ascii("S1.WAV"),
    0x00,
    filler(77),
    float32([startWavelength, endWavelength], false),
    MARKER,
    data,
  );
}
