/**
 * Output Formatter - CLI output with colors using chalk
 */

import chalk from "chalk";

export interface TableColumn {
  key: string;
  header: string;
  width?: number;
}

export class OutputFormatter {
  private readonly noColor: boolean;
  private readonly write: (line: string) => void;

  constructor(options: { noColor?: boolean; write?: (line: string) => void } = {}) {
    this.noColor = options.noColor ?? !process.stdout.isTTY;
    this.write = options.write ?? ((line) => {
      process.stdout.write(line + "\n");
    });
  }

  success(message: string): void {
    this.write(this.noColor ? message : chalk.green("✓ ") + message);
  }

  keyValue(key: string, value: string | number | boolean): void {
    const formattedKey = this.noColor ? `  ${key}:` : chalk.dim(`  ${key}:`);
    this.write(`${formattedKey} ${String(value)}`);
  }

  table<T extends Record<string, unknown>>(data: T[], columns: TableColumn[]): void {
    if (data.length === 0) return;

    const widths = columns.map((col) => {
      const maxDataWidth = Math.max(...data.map((row) => String(row[col.key] ?? "").length));
      return col.width ?? Math.max(col.header.length, maxDataWidth);
    });

    const headerRow = columns.map((col, i) => col.header.padEnd(widths[i])).join("  ").trimEnd();
    const separator = widths.map((w) => "-".repeat(w)).join("  ");
    this.write(this.noColor ? headerRow : chalk.bold(headerRow));
    this.write(this.noColor ? separator : chalk.dim(separator));

    for (const row of data) {
      const line = columns.map((col, i) => String(row[col.key] ?? "").padEnd(widths[i])).join("  ");
      this.write(line.trimEnd());
    }
  }
}
