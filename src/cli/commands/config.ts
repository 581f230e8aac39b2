/**
 * Config Command
 * Shows or initializes the tool configuration
 */

import * as fs from "fs";
import { DEFAULT_CONFIG, getConfigPath, loadConfig, saveConfig, validateConfig } from "../utils/config.ts";
import { header, keyValue, printObject, success, warning } from "../utils/output.ts";

/**
 * Config command options
 */
export interface ConfigOptions {
  action: "show" | "init";
  force?: boolean;
  config?: string;
}

/**
 * Run the config command
 */
export async function config(options: ConfigOptions): Promise<void> {
  const configPath = options.config ?? getConfigPath();

  if (options.action === "init") {
    if (fs.existsSync(configPath) && !options.force) {
      throw new Error(`Configuration already exists at ${configPath} (use --force to overwrite)`);
    }
    saveConfig(DEFAULT_CONFIG, configPath);
    success(`Configuration written to ${configPath}`);
    return;
  }

  const current = loadConfig(configPath);
  if (current.outputFormat === "json") {
    printObject({ path: configPath, ...current }, "json");
  } else {
    header("Configuration");
    keyValue("Path", configPath);
    printObject({ ...current });
  }

  for (const problem of validateConfig(current)) {
    warning(problem);
  }
}
