import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { stringify } from 'csv-stringify';
import { createLogger } from '@fiometrics/utils';
import type { Row } from '../records.js';
import type { RowSink, SinkReceipt } from './row-sink.js';

const logger = createLogger('@fiometrics/core');

function toCsv(header: readonly string[], rows: readonly Row[]): Promise<string> {
  return new Promise((resolve, reject) => {
    stringify([[...header], ...rows], (err, output) => {
      if (err) reject(err);
      else resolve(output);
    });
  });
}

/**
 * Writes each worksheet to `<outputDir>/<worksheet>.csv`, replacing an
 * existing file.
 */
export class CsvFileSink implements RowSink {
  readonly id = 'csv';

  constructor(private readonly outputDir: string) {}

  async write(worksheet: string, header: readonly string[], rows: readonly Row[]): Promise<SinkReceipt> {
    const filePath = path.join(this.outputDir, `${worksheet}.csv`);
    const content = await toCsv(header, rows);

    await fs.mkdir(this.outputDir, { recursive: true });
    await fs.writeFile(filePath, content, 'utf-8');

    logger.info('Wrote job rows', { sink: this.id, worksheet, rows: rows.length, path: filePath });
    return { sinkId: this.id, worksheet, rowCount: rows.length, location: filePath };
  }
}
