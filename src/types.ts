export type DataFormat =
  | { kind: "float32"; littleEndian: boolean }
  | { kind: "int16" }
  | { kind: "bytes" };

export type FormatLabel = "float32_be" | "float32_le" | "int16" | "bytes";

export interface HeaderLocation {
  /** Byte offset where the data region begins. May exceed the buffer length. */
  boundary: number;
  markerPosition: number | null;
  /** Offset just past the `.WAV` name terminator, or 0. */
  provisionalBoundary: number;
}

export interface FormatScores {
  littleEndian: number;
  bigEndian: number;
}

export interface FormatDetection {
  format: DataFormat;
  scores: FormatScores | null;
}

export interface DecodedSample {
  index: number;
  rawValue: number;
}

export interface AxisRange {
  startWavelength: number;
  endWavelength: number;
}

export interface SpectrumRow {
  wavelength: number;
  value: number;
}

export interface DecodedSpectrum {
  format: DataFormat;
  label: FormatLabel;
  header: HeaderLocation;
  axisRange: AxisRange | null;
  scores: FormatScores | null;
  rows: SpectrumRow[];
}

export interface ConversionResult {
  inputPath: string;
  outputPath: string;
  label: FormatLabel;
  rowCount: number;
  header: HeaderLocation;
  scores: FormatScores | null;
}
