import { collectFioMetrics, CsvFileSink, type CollectResult, type RowSink } from '@fiometrics/core';
import { resolveSinkConfig } from '@fiometrics/utils';
import type { ExtractArgs } from '../command-defs/extract.js';

export interface ExtractContext {
  /** Builds the sink for an output directory; the CSV file sink by default */
  createSink?: (outputDir: string) => RowSink;
}

export async function extractMetricsHandler(
  args: ExtractArgs,
  ctx: ExtractContext = {}
): Promise<CollectResult> {
  if (!args.sink) {
    return collectFioMetrics(args.file);
  }

  const sinkConfig = resolveSinkConfig(
    { worksheet: args.worksheet, outputDir: args.outDir },
    args.config
  );
  const createSink = ctx.createSink ?? ((outputDir: string) => new CsvFileSink(outputDir));

  return collectFioMetrics(args.file, {
    sink: createSink(sinkConfig.outputDir),
    worksheet: sinkConfig.worksheet,
  });
}
