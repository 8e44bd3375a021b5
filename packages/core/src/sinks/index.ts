export type { RowSink, SinkReceipt } from './row-sink.js';
export { CsvFileSink } from './csv-file-sink.js';
