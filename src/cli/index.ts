#!/usr/bin/env tsx
/**
 * Merkle CLI
 * Main entry point for all CLI commands
 */

import { error } from "./utils/output.ts";
import {
  overridesFromOptions,
  parseArgs,
  parseFormat,
  proofRange,
  requirePositional,
  stringOption,
} from "./utils/args.ts";

const VERSION = "0.1.0";

/**
 * Main CLI handler
 */
async function main() {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    printHelp();
    process.exit(0);
  }

  const { command, positionals, options } = parseArgs(args);

  try {
    if (command === "root") {
      const { root } = await import("./commands/root.ts");
      await root({
        file: requirePositional(positionals, "file"),
        overrides: overridesFromOptions(options),
        config: stringOption(options, "config"),
      });
    } else if (command === "prove") {
      const { prove } = await import("./commands/prove.ts");
      const [begin, end] = proofRange(options);
      await prove({
        file: requirePositional(positionals, "file"),
        begin,
        end,
        out: stringOption(options, "out"),
        overrides: overridesFromOptions(options),
        config: stringOption(options, "config"),
      });
    } else if (command === "verify") {
      const { verify } = await import("./commands/verify.ts");
      const format = stringOption(options, "format");
      const valid = await verify({
        bundle: requirePositional(positionals, "bundle"),
        format: format === undefined ? undefined : parseFormat(format),
      });
      process.exitCode = valid ? 0 : 1;
    } else if (command === "config") {
      const { config } = await import("./commands/config.ts");
      const action = positionals[0] ?? "show";
      if (action !== "show" && action !== "init") {
        throw new Error(`Unknown config action: ${action}`);
      }
      await config({
        action,
        force: options.force === true,
        config: stringOption(options, "config"),
      });
    } else if (command === "help" || command === "--help" || command === "-h") {
      printHelp();
    } else if (command === "version" || command === "--version" || command === "-v") {
      console.log(`merkle version ${VERSION}`);
    } else {
      error(`Unknown command: ${command}`);
      printHelp();
      process.exit(1);
    }
  } catch (err) {
    error(`Command failed: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

/**
 * Print main help
 */
function printHelp() {
  console.log(`
Merkle CLI

Usage: merkle <command> [options]

Commands:
  root <file>                Print the Merkle root of a file
  prove <file>               Write a proof bundle for segments of a file
    --index <n>              Segment to prove
    --begin <n> --end <n>    Range of segments to prove [begin, end)
    --out <path>             Bundle path (default: <file>.proof)
  verify <bundle>            Verify a proof bundle (exit code 1 when invalid)
  config [show|init]         Show or initialize the configuration
    --force                  Overwrite an existing configuration
  help                       Show this help message
  version                    Show version information

Options for root and prove:
  --segment-size <bytes>     Leaf size (default from config: 64)
  --hash <algorithm>         Hash algorithm (default from config: sha256)
  --format <text|json>       Output format
  --config <path>            Custom config file path

Examples:
  merkle root data.bin
  merkle prove data.bin --index 3 --out data.proof
  merkle verify data.proof
`);
}

// Run CLI
main().catch((err) => {
  error(`Fatal error: ${err}`);
  process.exit(1);
});
