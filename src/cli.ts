import { convertFile } from "./convert";
import type { ConversionResult } from "./types";

/**
 * CLI exit codes following Unix conventions.
 */
export const ExitCode = {
  Ok: 0,
  Usage: 1,
  Failed: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export interface CliOptions {
  files: string[];
  outDir: string | null;
  json: boolean;
  verbose: boolean;
  help: boolean;
  /** Set when the arguments could not be understood. */
  error: string | null;
}

export const USAGE = `
spectro-decode - Convert spectrophotometer binary exports to CSV

Usage:
  spectro-decode <file> [<file> ...]
  spectro-decode <file> --out-dir <dir>
  spectro-decode <file> --json
  spectro-decode <file> --verbose

Options:
  --out-dir   Write CSV files into this directory instead of beside the inputs
  --json      Print one JSON result per file
  --verbose   Show header boundary, marker and format scores
  --help      Show this help message

Exit codes:
  0  All files converted
  1  Usage error
  2  At least one file failed
`.trim();

/**
 * Parses command line arguments.
 *
 * @param args - Raw arguments from process.argv
 * @returns Parsed options and input files
 */
export function parseArgs(args: string[]): CliOptions {
  // process.argv: [node, script.js, ...userArgs]
  const userArgs = args.slice(2);

  const options: CliOptions = {
    files: [],
    outDir: null,
    json: false,
    verbose: false,
    help: false,
    error: null,
  };

  for (let i = 0; i < userArgs.length; i++) {
    const arg = userArgs[i];
    if (arg === "--json") {
      options.json = true;
    } else if (arg === "--verbose") {
      options.verbose = true;
    } else if (arg === "--help") {
      options.help = true;
    } else if (arg === "--out-dir") {
      const value = userArgs[i + 1];
      if (!value || value.startsWith("--")) {
        options.error = "--out-dir requires a directory";
      } else {
        options.outDir = value;
        i++;
      }
    } else if (arg.startsWith("--out-dir=")) {
      const value = arg.slice("--out-dir=".length);
      if (value) {
        options.outDir = value;
      } else {
        options.error = "--out-dir requires a directory";
      }
    } else if (arg.startsWith("--")) {
      options.error = `Unknown option: ${arg}`;
    } else {
      options.files.push(arg);
    }
  }

  return options;
}

function printResult(result: ConversionResult, options: CliOptions): void {
  if (options.json) {
    console.log(JSON.stringify({ ok: true, ...result }));
    return;
  }

  console.log(
    `Processed ${result.inputPath} (${result.label}), saved ${result.outputPath}`,
  );

  if (options.verbose) {
    const { boundary, markerPosition } = result.header;
    console.log(`  Header boundary: ${boundary}`);
    console.log(`  Marker: ${markerPosition ?? "not found"}`);
    if (result.scores) {
      console.log(
        `  Scores: big-endian ${result.scores.bigEndian}, little-endian ${result.scores.littleEndian}`,
      );
    }
    console.log(`  Rows: ${result.rowCount}`);
  }
}

/**
 * Converts every file named on the command line.
 *
 * A file that fails is reported and skipped; the remaining files are
 * still converted.
 *
 * @param args - Raw arguments from process.argv
 * @returns Exit code for the process
 */
export async function run(args: string[]): Promise<ExitCode> {
  const options = parseArgs(args);

  if (options.help) {
    console.log(USAGE);
    return ExitCode.Ok;
  }

  if (options.error) {
    console.error(`Error: ${options.error}\n`);
    console.log(USAGE);
    return ExitCode.Usage;
  }

  if (options.files.length === 0) {
    console.error("Error: No file specified\n");
    console.log(USAGE);
    return ExitCode.Usage;
  }

  let failures = 0;
  for (const file of options.files) {
    try {
      const result = await convertFile(file, {
        outDir: options.outDir ?? undefined,
      });
      printResult(result, options);
    } catch (err) {
      failures++;
      const message = err instanceof Error ? err.message : "Unknown error";
      if (options.json) {
        console.log(JSON.stringify({ ok: false, inputPath: file, error: message }));
      } else {
        console.error(`Error processing ${file}: ${message}`);
      }
    }
  }

  return failures === 0 ? ExitCode.Ok : ExitCode.Failed;
}
