/**
 * CLI Output Formatting Utilities
 * Provides consistent output formatting for CLI commands
 */

import type { OutputFormat } from "../../types/config.ts";

/**
 * Print success message
 */
export function success(message: string): void {
  console.log(`✓ ${message}`);
}

/**
 * Print error message
 */
export function error(message: string): void {
  console.error(`✗ ${message}`);
}

/**
 * Print warning message
 */
export function warning(message: string): void {
  console.warn(`⚠ ${message}`);
}

/**
 * Print info message
 */
export function info(message: string): void {
  console.log(`ℹ ${message}`);
}

/**
 * Print section header
 */
export function header(title: string): void {
  console.log(`\n=== ${title} ===\n`);
}

/**
 * Print key-value pair
 */
export function keyValue(key: string, value: string | number | boolean): void {
  console.log(`  ${key}: ${value}`);
}

/**
 * Hex encode bytes for display
 */
export function toHex(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("hex");
}

/**
 * Print object as formatted output
 */
export function printObject(obj: Record<string, unknown>, format: OutputFormat = "text"): void {
  if (format === "json") {
    console.log(JSON.stringify(obj, null, 2));
  } else {
    printTextObject(obj);
  }
}

/**
 * Print object in text format
 */
function printTextObject(obj: object, indent: number = 0): void {
  const prefix = "  ".repeat(indent);

  for (const [key, value] of Object.entries(obj)) {
    if (value === null || value === undefined) {
      console.log(`${prefix}${key}: (not set)`);
    } else if (typeof value === "object" && !Array.isArray(value)) {
      console.log(`${prefix}${key}:`);
      printTextObject(value, indent + 1);
    } else if (Array.isArray(value)) {
      console.log(`${prefix}${key}: [${value.length} items]`);
    } else {
      console.log(`${prefix}${key}: ${value}`);
    }
  }
}

/**
 * Print table
 */
export function printTable(headers: string[], rows: string[][]): void {
  // Calculate column widths
  const widths = headers.map((h, i) => {
    const maxRowWidth = Math.max(0, ...rows.map((r) => String(r[i] || "").length));
    return Math.max(h.length, maxRowWidth);
  });

  // Print header
  const headerRow = headers.map((h, i) => h.padEnd(widths[i])).join(" | ");
  console.log(headerRow);
  console.log(widths.map((w) => "-".repeat(w)).join("-+-"));

  // Print rows
  for (const row of rows) {
    const rowStr = row.map((cell, i) => String(cell || "").padEnd(widths[i])).join(" | ");
    console.log(rowStr);
  }
}
