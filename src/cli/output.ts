export type OutputOptions = {
  json?: boolean;
  quiet?: boolean;
};

/**
 * Print `data` as JSON, as bare keys (`--quiet`), or as a table/detail view.
 * `quietKey` names the field printed in quiet mode.
 */
export function output(data: unknown, opts: OutputOptions, quietKey = 'id'): void {
  if (opts.json) {
    console.log(JSON.stringify(data, null, 2));
    return;
  }

  if (opts.quiet) {
    const items = Array.isArray(data) ? data : [data];
    for (const item of items) {
      if (isRecord(item) && item[quietKey] != null) {
        console.log(formatValue(item[quietKey]));
      }
    }
    return;
  }

  if (Array.isArray(data)) {
    const rows = data.filter(isRecord);
    if (rows.length === 0) {
      console.log('No results.');
      return;
    }
    printTable(rows);
  } else if (isRecord(data)) {
    printDetail(data);
  } else {
    console.log(formatValue(data));
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function printTable(rows: Record<string, unknown>[]): void {
  const keys = Object.keys(rows[0]);
  const widths: Record<string, number> = {};

  for (const key of keys) {
    widths[key] = key.length;
    for (const row of rows) {
      widths[key] = Math.max(widths[key], formatValue(row[key]).length);
    }
  }

  console.log(keys.map((k) => k.toUpperCase().padEnd(widths[k])).join('  ').trimEnd());
  console.log(keys.map((k) => '-'.repeat(widths[k])).join('  '));

  for (const row of rows) {
    console.log(keys.map((k) => formatValue(row[k]).padEnd(widths[k])).join('  ').trimEnd());
  }
}

function printDetail(obj: Record<string, unknown>): void {
  const maxKeyLen = Math.max(...Object.keys(obj).map((k) => k.length));
  for (const [key, value] of Object.entries(obj)) {
    console.log(`${key.padEnd(maxKeyLen)}  ${formatValue(value)}`);
  }
}

function formatValue(val: unknown): string {
  if (val === null || val === undefined) return '';
  if (typeof val === 'object') return JSON.stringify(val);
  return String(val);
}
