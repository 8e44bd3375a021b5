/**
 * Row sink interface.
 *
 * A sink receives the extracted rows of one run as a single batch, addressed
 * by a worksheet label. Authentication and range handling are the sink's own
 * business.
 */

import type { Row } from '../records.js';

export interface SinkReceipt {
  sinkId: string;
  worksheet: string;
  rowCount: number;
  /** Where the rows ended up, when the sink has such a notion */
  location?: string;
}

export interface RowSink {
  readonly id: string;
  write(worksheet: string, header: readonly string[], rows: readonly Row[]): Promise<SinkReceipt>;
}
