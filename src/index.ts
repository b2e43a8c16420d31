#!/usr/bin/env node
import { run } from "./cli";

/**
 * Main entry point for the CLI.
 */
async function main(): Promise<void> {
  const code = await run(process.argv);
  process.exit(code);
}

// Run it
main().catch((err: unknown) => {
  console.error(err);
  process.exit(2);
});
