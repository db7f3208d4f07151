import chalk from "chalk";
import Table from "cli-table3";
import YAML from "yaml";

export const OUTPUT_FORMATS = ["text", "json", "yaml", "table"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface OutputOptions {
  format: OutputFormat;
  quiet: boolean;
  verbose: boolean;
}

export class OutputFormatter {
  constructor(private options: OutputOptions) {}

  get format(): OutputFormat {
    return this.options.format;
  }

  // Output structured data
  output(data: unknown, textFormatter?: (data: unknown) => string): void {
    switch (this.options.format) {
      case "json":
        console.log(JSON.stringify(data, null, 2));
        break;
      case "yaml":
        console.log(YAML.stringify(data));
        break;
      case "table":
        if (Array.isArray(data)) {
          this.printTable(data);
        } else if (isRecord(data)) {
          this.printTable(toKeyValueRows(data));
        } else {
          console.log(formatValue(data));
        }
        break;
      default:
        if (textFormatter) {
          console.log(textFormatter(data));
        } else {
          console.log(data);
        }
    }
  }

  // Print array as table
  printTable(rows: unknown[], columns?: string[]): void {
    const records = rows.filter(isRecord);
    const firstRow = records[0];
    if (!firstRow) {
      console.log("(empty)");
      return;
    }

    const cols = columns || Object.keys(firstRow);
    const table = new Table({
      head: cols.map((c) => chalk.bold(c.toUpperCase())),
      style: { head: [], border: [] },
    });

    for (const row of records) {
      table.push(cols.map((c) => String(row[c] ?? "")));
    }

    console.log(table.toString());
  }

  // Print simple key-value pairs
  printKeyValue(pairs: Array<[string, unknown]>): void {
    const maxKeyLen = Math.max(...pairs.map(([k]) => k.length));
    for (const [key, value] of pairs) {
      console.log(`${chalk.bold(key.padEnd(maxKeyLen))}  ${formatValue(value)}`);
    }
  }

  // Print success message
  success(message: string): void {
    if (!this.options.quiet) {
      console.log(chalk.green("✓"), message);
    }
  }

  // Print warning message (stderr, so structured output stays parseable)
  warn(message: string): void {
    if (!this.options.quiet) {
      console.error(chalk.yellow("⚠"), message);
    }
  }

  // Print verbose/debug message (stderr)
  debug(message: string): void {
    if (this.options.verbose) {
      console.error(chalk.gray("⋯"), chalk.gray(message));
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toKeyValueRows(record: Record<string, unknown>): Array<{ key: string; value: unknown }> {
  return Object.entries(record).map(([key, value]) => ({ key, value }));
}

function formatValue(value: unknown): string {
  if (value === null || value === undefined) {
    return chalk.gray("—");
  }
  if (typeof value === "boolean") {
    return value ? chalk.green("true") : chalk.red("false");
  }
  if (typeof value === "number") {
    return chalk.cyan(String(value));
  }
  if (Array.isArray(value)) {
    return value.join(", ");
  }
  if (typeof value === "object") {
    return JSON.stringify(value);
  }
  return String(value);
}

function isOutputFormat(value: string): value is OutputFormat {
  return (OUTPUT_FORMATS as readonly string[]).includes(value);
}

// Helper to create formatter from command options
export function createFormatter(options: {
  format?: string;
  quiet?: boolean;
  verbose?: boolean;
}): OutputFormatter {
  const format = options.format || "text";
  if (!isOutputFormat(format)) {
    throw new Error(`Unknown output format: ${format} (expected ${OUTPUT_FORMATS.join("|")})`);
  }
  return new OutputFormatter({
    format,
    quiet: options.quiet || false,
    verbose: options.verbose || false,
  });
}
