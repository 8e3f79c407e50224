/**
 * Output Formatter - chalk styling for tickwork command output
 */

import chalk from "chalk";

import { toZonedISOString } from "../utils/zoned-time.js";

export type MessageKind = "info" | "success" | "warning";

const MARKERS: Record<MessageKind, string> = {
  info: chalk.blue("ℹ "),
  success: chalk.green("✓ "),
  warning: chalk.yellow("⚠ "),
};

export class OutputFormatter {
  private readonly quiet: boolean;
  private readonly color: boolean;

  constructor(options: { quiet?: boolean; noColor?: boolean } = {}) {
    this.quiet = options.quiet ?? false;
    this.color = !(options.noColor ?? !process.stdout.isTTY);
  }

  /**
   * Status line with a colored marker. Suppressed in quiet mode.
   */
  message(text: string, kind: MessageKind = "info"): void {
    if (this.quiet) return;
    console.log(this.color ? MARKERS[kind] + text : text);
  }

  success(text: string): void {
    this.message(text, "success");
  }

  info(text: string): void {
    this.message(text, "info");
  }

  warn(text: string): void {
    this.message(text, "warning");
  }

  header(title: string): void {
    if (this.quiet) return;
    const rule = "=".repeat(title.length);
    console.log(this.color ? `\n${chalk.bold.cyan(title)}\n${chalk.dim(rule)}` : `\n${title}\n${rule}`);
  }

  keyValue(key: string, value: string | number): void {
    if (this.quiet) return;
    console.log(this.color ? `${chalk.dim(`  ${key}:`)} ${chalk.white(String(value))}` : `  ${key}: ${value}`);
  }

  /**
   * Numbered activations, each shown in `timezone` and in UTC. Columns are
   * separated by two spaces; the number column is right-aligned.
   */
  activationTable(activations: Date[], timezone: string): void {
    if (this.quiet || activations.length === 0) return;

    const headers = ["#", `Local (${timezone})`, "UTC"];
    const rows = activations.map((at, i) => [
      String(i + 1),
      toZonedISOString(at.getTime(), timezone),
      at.toISOString(),
    ]);
    const widths = headers.map((header, col) => Math.max(header.length, ...rows.map((row) => row[col].length)));
    const line = (cells: string[]) =>
      cells.map((cell, col) => (col === 0 ? cell.padStart(widths[col]) : cell.padEnd(widths[col]))).join("  ").trimEnd();

    const headerLine = line(headers);
    const separator = widths.map((width) => "-".repeat(width)).join("  ");
    console.log(this.color ? chalk.bold(headerLine) : headerLine);
    console.log(this.color ? chalk.dim(separator) : separator);
    for (const row of rows) {
      console.log(line(row));
    }
  }

  /**
   * Machine-readable output. Printed even in quiet mode.
   */
  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }
}
