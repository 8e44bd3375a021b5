/**
 * Shape of the fio JSON output this package reads.
 *
 * Only the envelope is validated here. Result blocks stay opaque so that a
 * missing metric is reported by the metric extractor with its key path.
 */

import { z } from 'zod';

export const GLOBAL_OPTIONS = 'global options';
export const JOB_OPTIONS = 'job options';

// fio writes every option as a string; tolerate bare numbers
const optionValueSchema = z.union([z.string(), z.number()]).transform((value) => String(value));

export const fioOptionsSchema = z.record(z.string(), optionValueSchema);

export const resultBlockSchema = z.record(z.string(), z.unknown());

export const fioJobSchema = z
  .object({
    jobname: z.string().optional(),
    [JOB_OPTIONS]: fioOptionsSchema.optional(),
    read: resultBlockSchema.optional(),
    write: resultBlockSchema.optional(),
  })
  .passthrough();

export const fioOutputSchema = z
  .object({
    [GLOBAL_OPTIONS]: fioOptionsSchema.optional(),
    timestamp_ms: z.number().int().nonnegative(),
    jobs: z.array(fioJobSchema),
  })
  .passthrough();

export type FioOptions = z.infer<typeof fioOptionsSchema>;
export type ResultBlock = z.infer<typeof resultBlockSchema>;
export type FioJob = z.infer<typeof fioJobSchema>;
export type FioOutput = z.infer<typeof fioOutputSchema>;
