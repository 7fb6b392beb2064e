/**
 * Output utilities for CLI
 */

export interface OutputOptions {
  json?: boolean;
  verbose?: boolean;
}

let globalOptions: OutputOptions = {};

export function setOutputOptions(options: OutputOptions): void {
  globalOptions = { ...globalOptions, ...options };
}

export function getOutputOptions(): OutputOptions {
  return globalOptions;
}

export function output(data: unknown, humanReadable?: string): void {
  if (globalOptions.json) {
    console.log(JSON.stringify(data, null, 2));
  } else {
    console.log(humanReadable ?? String(data));
  }
}

export function outputError(message: string, error?: Error): void {
  if (globalOptions.json) {
    console.error(JSON.stringify({
      error: message,
      details: error?.message,
    }));
  } else {
    console.error(`Error: ${message}`);
    if (error && globalOptions.verbose) {
      console.error(error.stack);
    }
  }
}

/**
 * Format rows as aligned text columns
 */
export function formatTable(headers: string[], rows: string[][]): string[] {
  const widths = headers.map((h, i) => {
    const cellWidths = [h.length, ...rows.map(r => (r[i] ?? '').length)];
    return Math.max(...cellWidths);
  });

  const headerLine = headers.map((h, i) => h.padEnd(widths[i])).join('  ').trimEnd();
  return [
    headerLine,
    '-'.repeat(headerLine.length),
    ...rows.map(row => row.map((cell, i) => (cell ?? '').padEnd(widths[i])).join('  ').trimEnd()),
  ];
}

export function outputTable(headers: string[], rows: string[][]): void {
  if (globalOptions.json) {
    const objects = rows.map(row => {
      const obj: Record<string, string> = {};
      headers.forEach((h, i) => {
        obj[h] = row[i] ?? '';
      });
      return obj;
    });
    console.log(JSON.stringify(objects, null, 2));
    return;
  }

  for (const line of formatTable(headers, rows)) {
    console.log(line);
  }
}
