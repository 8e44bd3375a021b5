/**
 * Builders for fio output documents used across the core tests
 */

import { fileURLToPath } from 'url';
import type { FioJob, FioOptions, FioOutput, ResultBlock } from '../../src/schema.js';

export const fixturePath = (name: string): string =>
  fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));

export const TIMESTAMP_MS = 1653027155000;

export function buildResultBlock(overrides: Partial<{
  runtime: number;
  iops: number;
  bw_bytes: number;
  io_bytes: number;
  min: number;
  max: number;
  mean: number;
  p20: number;
  p50: number;
  p90: number;
  p95: number;
}> = {}): ResultBlock {
  return {
    runtime: overrides.runtime ?? 71000,
    iops: overrides.iops ?? 95.26093,
    bw_bytes: overrides.bw_bytes ?? 99888324,
    io_bytes: overrides.io_bytes ?? 6040846336,
    lat_ns: {
      min: overrides.min ?? 353377760,
      max: overrides.max ?? 1697519869,
      mean: overrides.mean ?? 417754876,
      percentile: {
        '20.000000': overrides.p20 ?? 379584512,
        '50.000000': overrides.p50 ?? 387973120,
        '90.000000': overrides.p90 ?? 492830720,
        '95.000000': overrides.p95 ?? 526385152,
      },
    },
  };
}

export const ZERO_BLOCK: ResultBlock = buildResultBlock({
  iops: 0,
  bw_bytes: 0,
  io_bytes: 0,
  min: 0,
  max: 0,
  mean: 0,
  p20: 0,
  p50: 0,
  p90: 0,
  p95: 0,
});

export function buildJob(jobOptions?: FioOptions, read: ResultBlock = buildResultBlock(), write: ResultBlock = ZERO_BLOCK): FioJob {
  const job: FioJob = { read, write };
  if (jobOptions !== undefined) {
    job['job options'] = jobOptions;
  }
  return job;
}

export function buildFioOutput(jobs: FioJob[], globalOptions?: FioOptions, timestampMs: number = TIMESTAMP_MS): FioOutput {
  const fioOut: FioOutput = { timestamp_ms: timestampMs, jobs };
  if (globalOptions !== undefined) {
    fioOut['global options'] = globalOptions;
  }
  return fioOut;
}
