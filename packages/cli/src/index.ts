/**
 * @fiometrics/cli - command line interface
 */

export { createProgram, type ProgramIO } from './program.js';
export { extractMetricsHandler, type ExtractContext } from './handlers/extract-metrics.js';
export { extractSchema, type ExtractArgs, type OutputFormat } from './command-defs/extract.js';
export { parseArguments } from './core/argument-parser.js';
export { formatError, handleError, logError } from './core/error-handler.js';
export { formatOutput, formatJSON, formatTable, formatCSV, formatEpochSeconds } from './core/output-formatter.js';
