import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { formatCsv } from "./csv-writer";
import { decodeSpectrum } from "./pipeline";
import type { ConversionResult } from "./types";

/**
 * Raised when an export cannot be read or its CSV cannot be written.
 */
export class ConversionError extends Error {
  readonly inputPath: string;

  constructor(message: string, inputPath: string, cause?: unknown) {
    super(message, { cause });
    this.name = "ConversionError";
    this.inputPath = inputPath;
  }
}

export interface ConvertOptions {
  /** Directory for the CSV. Defaults to the input file's directory. */
  outDir?: string;
}

/**
 * Output path for an input file: its extension replaced by `.csv`, or
 * `.csv` appended when it has none.
 *
 * @param inputPath - Path of the binary export
 * @param outDir - Optional directory to place the CSV in instead
 */
export function csvPathFor(inputPath: string, outDir?: string): string {
  const { dir, name } = path.parse(inputPath);
  return path.join(outDir ?? dir, `${name}.csv`);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : "Unknown error";
}

/**
 * Reads one export, decodes it and writes the CSV.
 *
 * @param inputPath - Path of the binary export
 * @param options - Output placement
 * @returns Summary of the conversion
 * @throws ConversionError if the input cannot be read or the CSV written
 *
 * @example
 * ```typescript
 * const result = await convertFile("runs/sample1.sp");
 * console.log(`${result.label}: ${result.rowCount} rows -> ${result.outputPath}`);
 * ```
 */
export async function convertFile(
  inputPath: string,
  options: ConvertOptions = {},
): Promise<ConversionResult> {
  let bytes: Uint8Array;
  try {
    bytes = await readFile(inputPath);
  } catch (err) {
    throw new ConversionError(
      `Could not read file: ${inputPath} (${errorMessage(err)})`,
      inputPath,
      err,
    );
  }

  const spectrum = decodeSpectrum(bytes);
  const outputPath = csvPathFor(inputPath, options.outDir);

  try {
    await writeFile(outputPath, formatCsv(spectrum.rows), "utf8");
  } catch (err) {
    throw new ConversionError(
      `Could not write file: ${outputPath} (${errorMessage(err)})`,
      inputPath,
      err,
    );
  }

  return {
    inputPath,
    outputPath,
    label: spectrum.label,
    rowCount: spectrum.rows.length,
    header: spectrum.header,
    scores: spectrum.scores,
  };
}
