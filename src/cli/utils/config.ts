/**
 * CLI Configuration Utilities
 * Handles the configuration file of the merkle tool
 */

import * as fs from "fs";
import * as path from "path";
import type { OutputFormat, ToolConfig } from "../../types/config.ts";
import { isSupportedAlgorithm } from "../../lib/merkle/hash.ts";
import { warning } from "./output.ts";

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: ToolConfig = {
  segmentSize: 64,
  hashAlgorithm: "sha256",
  outputFormat: "text",
};

const OUTPUT_FORMATS: readonly OutputFormat[] = ["text", "json"];

/**
 * Get configuration directory
 */
export function getConfigDir(): string {
  const home = process.env.HOME || process.env.USERPROFILE || ".";
  return path.join(home, ".streaming-merkle");
}

/**
 * Get configuration file path
 */
export function getConfigPath(): string {
  return path.join(getConfigDir(), "config.json");
}

/**
 * Load configuration from file
 * Falls back to default if file doesn't exist or can't be parsed
 */
export function loadConfig(configPath: string = getConfigPath()): ToolConfig {
  if (!fs.existsSync(configPath)) {
    return { ...DEFAULT_CONFIG };
  }

  try {
    const content = fs.readFileSync(configPath, "utf-8");
    const parsed: unknown = JSON.parse(content);
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      warning(`Ignoring ${configPath}: expected a JSON object`);
      return { ...DEFAULT_CONFIG };
    }
    return mergeConfig(DEFAULT_CONFIG, pickConfig(parsed));
  } catch (err) {
    warning(`Error loading config from ${configPath}: ${err}`);
    return { ...DEFAULT_CONFIG };
  }
}

/**
 * Save configuration to file
 */
export function saveConfig(config: ToolConfig, configPath: string = getConfigPath()): void {
  const configDir = path.dirname(configPath);

  // Create config directory if it doesn't exist
  if (!fs.existsSync(configDir)) {
    fs.mkdirSync(configDir, { recursive: true });
  }

  fs.writeFileSync(configPath, JSON.stringify(config, null, 2), "utf-8");
}

/**
 * Merge configuration with CLI options
 */
export function mergeConfig(base: ToolConfig, options: Partial<ToolConfig>): ToolConfig {
  const merged = { ...base };
  if (options.segmentSize !== undefined) merged.segmentSize = options.segmentSize;
  if (options.hashAlgorithm !== undefined) merged.hashAlgorithm = options.hashAlgorithm;
  if (options.outputFormat !== undefined) merged.outputFormat = options.outputFormat;
  return merged;
}

/**
 * Validate configuration
 */
export function validateConfig(config: ToolConfig): string[] {
  const errors: string[] = [];

  if (!Number.isSafeInteger(config.segmentSize) || config.segmentSize < 1) {
    errors.push(`Invalid segment size: ${config.segmentSize} (must be a positive integer)`);
  }

  if (!isSupportedAlgorithm(config.hashAlgorithm)) {
    errors.push(`Unsupported hash algorithm: ${config.hashAlgorithm}`);
  }

  if (!OUTPUT_FORMATS.includes(config.outputFormat)) {
    errors.push(`Invalid output format: ${config.outputFormat} (must be text or json)`);
  }

  return errors;
}

/**
 * Keep the known keys of a parsed config file whose values have the right type
 */
function pickConfig(raw: object): Partial<ToolConfig> {
  const picked: Partial<ToolConfig> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (key === "segmentSize" && typeof value === "number") {
      picked.segmentSize = value;
    } else if (key === "hashAlgorithm" && typeof value === "string") {
      picked.hashAlgorithm = value;
    } else if (key === "outputFormat" && (value === "text" || value === "json")) {
      picked.outputFormat = value;
    }
  }
  return picked;
}

/**
 * Load the configuration file, apply CLI overrides and validate the result
 */
export function resolveConfig(overrides: Partial<ToolConfig>, configPath?: string): ToolConfig {
  const config = mergeConfig(loadConfig(configPath), overrides);

  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new Error(`Invalid configuration: ${errors.join("; ")}`);
  }

  return config;
}
