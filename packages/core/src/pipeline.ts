/**
 * fio metrics pipeline: load, extract, and optionally hand the rows to a sink.
 */

import { createLogger, DEFAULT_WORKSHEET } from '@fiometrics/utils';
import { loadFioOutput } from './loader.js';
import { extractJobRecords, toRow, type JobRecord } from './records.js';
import type { RowSink, SinkReceipt } from './sinks/row-sink.js';
import { columnHeaders } from './specs.js';

const logger = createLogger('@fiometrics/core');

export interface CollectOptions {
  /** Destination for the rows; nothing is written without one */
  sink?: RowSink;
  worksheet?: string;
}

export interface CollectResult {
  records: JobRecord[];
  receipt?: SinkReceipt;
}

/**
 * Writes the records to a sink as one batch
 */
export async function writeRecords(
  sink: RowSink,
  records: readonly JobRecord[],
  worksheet: string = DEFAULT_WORKSHEET
): Promise<SinkReceipt> {
  const rows = records.map((record) => toRow(record));
  return sink.write(worksheet, columnHeaders(), rows);
}

/**
 * Returns the job records extracted from a fio output file, writing them to
 * `options.sink` when one is given.
 */
export async function collectFioMetrics(
  filePath: string,
  options: CollectOptions = {}
): Promise<CollectResult> {
  const fioOut = loadFioOutput(filePath);
  logger.debug('Loaded fio output', { file: filePath, jobs: fioOut.jobs.length });

  const records = extractJobRecords(fioOut);
  logger.info('Extracted job metrics', {
    file: filePath,
    jobs: fioOut.jobs.length,
    records: records.length,
  });

  if (!options.sink) {
    return { records };
  }

  const receipt = await writeRecords(options.sink, records, options.worksheet);
  return { records, receipt };
}
