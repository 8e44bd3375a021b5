/**
 * YAML Configuration Loader
 * ==========================
 * Loads configuration from fio-metrics.yaml with fallback to environment variables
 */

import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { load } from 'js-yaml';
import { z } from 'zod';
import { logger } from '../logger.js';
import { ConfigurationError } from '../errors.js';
import { getSinkConfigFromEnv, type SinkConfig } from './env-config.js';

export const CONFIG_FILE_NAME = 'fio-metrics.yaml';

export const appConfigSchema = z
  .object({
    sink: z
      .object({
        worksheet: z.string().min(1).optional(),
        outputDir: z.string().min(1).optional(),
      })
      .optional(),
  })
  .strict();

export type AppConfig = z.infer<typeof appConfigSchema>;

let cachedConfig: AppConfig | null = null;

/**
 * Load configuration from a YAML file.
 *
 * An explicitly named file must exist; the default file in the working
 * directory is optional.
 */
export function loadConfigFromYaml(configPath?: string): AppConfig {
  if (cachedConfig !== null) {
    return cachedConfig;
  }

  const resolvedPath = configPath || join(process.cwd(), CONFIG_FILE_NAME);

  if (!existsSync(resolvedPath)) {
    if (configPath) {
      throw new ConfigurationError(`Config file ${configPath} does not exist`, 'config', {
        path: configPath,
      });
    }
    logger.debug(`${CONFIG_FILE_NAME} not found, using environment variables only`);
    cachedConfig = {};
    return cachedConfig;
  }

  let raw: unknown;
  try {
    raw = load(readFileSync(resolvedPath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Failed to parse config file ${resolvedPath}`, 'config', {
      path: resolvedPath,
      error: error instanceof Error ? error.message : String(error),
    });
  }

  // An empty file loads as undefined
  const parsed = appConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid config file ${resolvedPath}`, 'config', {
      path: resolvedPath,
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  logger.info('Loaded configuration', { path: resolvedPath });
  cachedConfig = parsed.data;
  return cachedConfig;
}

/**
 * Resolve the sink configuration.
 *
 * Priority: overrides > config file > environment > default
 */
export function resolveSinkConfig(
  overrides: Partial<SinkConfig> = {},
  configPath?: string
): SinkConfig {
  const fromFile = loadConfigFromYaml(configPath).sink ?? {};
  const fromEnv = getSinkConfigFromEnv();

  return {
    worksheet: overrides.worksheet ?? fromFile.worksheet ?? fromEnv.worksheet,
    outputDir: overrides.outputDir ?? fromFile.outputDir ?? fromEnv.outputDir,
  };
}

/**
 * Clear cached config (useful for testing)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
