/**
 * Configuration loading from environment variables
 *
 * Provides typed configuration for the row sink. Values from a config file
 * take precedence (see yaml-config.ts).
 */

import * as path from 'path';

export interface SinkConfig {
  worksheet: string;
  outputDir: string;
}

export const DEFAULT_WORKSHEET = 'fio_metrics';

/**
 * Load sink configuration from environment variables
 */
export function getSinkConfigFromEnv(): SinkConfig {
  const { FIO_METRICS_WORKSHEET, FIO_METRICS_OUTPUT_DIR } = process.env;

  return {
    worksheet: FIO_METRICS_WORKSHEET || DEFAULT_WORKSHEET,
    outputDir: FIO_METRICS_OUTPUT_DIR || path.join(process.cwd(), 'results'),
  };
}

