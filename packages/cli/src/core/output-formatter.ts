/**
 * Output Formatter - JSON, table, CSV renderings of job records
 */

import { stringify } from 'csv-stringify/sync';
import { DateTime } from 'luxon';
import { columnHeaders, END_TIME, START_TIME, toRow, type JobRecord } from '@fiometrics/core';
import type { OutputFormat } from '../command-defs/extract.js';

/**
 * Epoch seconds as a UTC ISO timestamp, e.g. 2022-05-20T06:11:24Z
 */
export function formatEpochSeconds(seconds: number): string {
  return DateTime.fromSeconds(seconds, { zone: 'utc' }).toISO({ suppressMilliseconds: true }) ?? String(seconds);
}

export function formatJSON(records: readonly JobRecord[]): string {
  return JSON.stringify(records, null, 2);
}

/**
 * Format records as a simple table, one line per job
 */
export function formatTable(records: readonly JobRecord[]): string {
  if (records.length === 0) {
    return 'No data to display';
  }

  const columns = columnHeaders();
  const timeColumns = new Set([START_TIME, END_TIME]);
  const cells = records.map((record) =>
    toRow(record).map((value, i) => {
      const column = columns[i];
      return column !== undefined && timeColumns.has(column) && typeof value === 'number'
        ? formatEpochSeconds(value)
        : String(value);
    })
  );

  const widths = columns.map((col, i) =>
    Math.max(col.length, ...cells.map((row) => (row[i] ?? '').length))
  );

  const lines: string[] = [];
  lines.push(columns.map((col, i) => col.padEnd(widths[i] ?? 0)).join(' | '));
  lines.push(widths.map((width) => '-'.repeat(width)).join('-|-'));
  for (const row of cells) {
    lines.push(row.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join(' | '));
  }

  return lines.join('\n');
}

/**
 * Format records as CSV with a header line, in sheet column order
 */
export function formatCSV(records: readonly JobRecord[]): string {
  return stringify([columnHeaders(), ...records.map((record) => toRow(record))]);
}

export function formatOutput(records: readonly JobRecord[], format: OutputFormat): string {
  switch (format) {
    case 'json':
      return formatJSON(records);
    case 'csv':
      return formatCSV(records);
    case 'table':
      return formatTable(records);
  }
}
