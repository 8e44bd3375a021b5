/**
 * fio-metrics command definition
 */

import { Command } from 'commander';
import { extractSchema } from './command-defs/extract.js';
import { parseArguments } from './core/argument-parser.js';
import { formatOutput } from './core/output-formatter.js';
import { extractMetricsHandler, type ExtractContext } from './handlers/extract-metrics.js';

export interface ProgramIO extends ExtractContext {
  writeOut?: (text: string) => void;
}

export function createProgram(io: ProgramIO = {}): Command {
  const writeOut = io.writeOut ?? ((text: string) => process.stdout.write(text));

  return new Command()
    .name('fio-metrics')
    .description('Extract job parameters and metrics from fio JSON output')
    .version('1.0.0')
    .argument('<file>', 'fio output file (--output-format=json)')
    .option('--format <format>', 'Output format (json, table, csv)', 'table')
    .option('--no-sink', 'Print the rows without writing them to the sink')
    .option('--out-dir <dir>', 'Directory the CSV sink writes to')
    .option('--worksheet <name>', 'Worksheet the rows are written to')
    .option('--config <path>', 'Config file (default: ./fio-metrics.yaml)')
    .allowExcessArguments(false)
    .action(async (file: string, options: Record<string, unknown>) => {
      const args = parseArguments(extractSchema, { ...options, file });
      const { records, receipt } = await extractMetricsHandler(args, io);

      writeOut(`${formatOutput(records, args.format)}\n`);
      if (receipt?.location) {
        writeOut(`Wrote ${receipt.rowCount} rows to ${receipt.location}\n`);
      }
    });
}
