/**
 * Configuration Type Definitions
 * Settings for the merkle command line tool
 */

/**
 * Output format type
 */
export type OutputFormat = "text" | "json";

/**
 * Tool configuration
 */
export interface ToolConfig {
  segmentSize: number;       // Bytes per leaf (default: 64)
  hashAlgorithm: string;     // node:crypto algorithm name (default: "sha256")
  outputFormat: OutputFormat; // Command output (default: "text")
}
