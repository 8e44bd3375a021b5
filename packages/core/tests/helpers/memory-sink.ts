import type { Row } from '../../src/records.js';
import type { RowSink, SinkReceipt } from '../../src/sinks/row-sink.js';

export interface SinkBatch {
  worksheet: string;
  header: string[];
  rows: Row[];
}

/**
 * Keeps every batch in memory
 */
export class MemoryRowSink implements RowSink {
  readonly id = 'memory';
  readonly batches: SinkBatch[] = [];

  async write(worksheet: string, header: readonly string[], rows: readonly Row[]): Promise<SinkReceipt> {
    this.batches.push({ worksheet, header: [...header], rows: rows.map((row) => [...row]) });
    return { sinkId: this.id, worksheet, rowCount: rows.length };
  }
}
