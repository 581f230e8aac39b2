/**
 * CLI Argument Utilities
 * Parsing of commands, flags and config overrides
 */

import type { OutputFormat, ToolConfig } from "../../types/config.ts";

/**
 * Parsed command line
 */
export interface ParsedArgs {
  command: string | undefined;
  positionals: string[];
  options: Record<string, string | boolean>;
}

/**
 * Parse CLI arguments
 */
export function parseArgs(args: string[]): ParsedArgs {
  const [command, ...rest] = args;

  const positionals: string[] = [];
  const options: Record<string, string | boolean> = {};

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];

    if (arg.startsWith("--")) {
      const key = arg.slice(2);
      const nextArg = rest[i + 1];

      if (nextArg !== undefined && !nextArg.startsWith("--")) {
        // Parse value
        options[key] = nextArg;
        i++;
      } else {
        // Boolean flag
        options[key] = true;
      }
    } else {
      positionals.push(arg);
    }
  }

  return { command, positionals, options };
}

/**
 * Config overrides given on the command line
 */
export function overridesFromOptions(options: Record<string, string | boolean>): Partial<ToolConfig> {
  const overrides: Partial<ToolConfig> = {};

  const segmentSize = stringOption(options, "segment-size");
  if (segmentSize !== undefined) {
    overrides.segmentSize = parseInteger(segmentSize, "--segment-size");
  }

  const hash = stringOption(options, "hash");
  if (hash !== undefined) {
    overrides.hashAlgorithm = hash;
  }

  const format = stringOption(options, "format");
  if (format !== undefined) {
    overrides.outputFormat = parseFormat(format);
  }

  return overrides;
}

/**
 * Read --index or --begin/--end
 */
export function proofRange(options: Record<string, string | boolean>): [number, number] {
  const index = stringOption(options, "index");
  if (index !== undefined) {
    const i = parseInteger(index, "--index");
    return [i, i + 1];
  }

  const begin = stringOption(options, "begin");
  const end = stringOption(options, "end");
  if (begin === undefined || end === undefined) {
    throw new Error("Either --index or both --begin and --end are required");
  }
  return [parseInteger(begin, "--begin"), parseInteger(end, "--end")];
}

export function stringOption(options: Record<string, string | boolean>, key: string): string | undefined {
  const value = options[key];
  return typeof value === "string" ? value : undefined;
}

export function requirePositional(positionals: string[], name: string): string {
  const value = positionals[0];
  if (value === undefined) {
    throw new Error(`Missing <${name}> argument`);
  }
  return value;
}

export function parseInteger(value: string, flag: string): number {
  if (!/^\d+$/.test(value)) {
    throw new Error(`${flag} expects a non-negative integer, got "${value}"`);
  }
  return parseInt(value, 10);
}

export function parseFormat(value: string): OutputFormat {
  if (value !== "text" && value !== "json") {
    throw new Error(`--format expects text or json, got "${value}"`);
  }
  return value;
}
