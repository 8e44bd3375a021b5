/**
 * Job record assembly.
 *
 * Merges parameters, time windows and metrics into one record per job and
 * drops the jobs that carry no measurement.
 */

import { createLogger } from '@fiometrics/utils';
import { MissingMetricError, MissingParameterError, NoUsableDataError } from './errors.js';
import { extractJobMetrics, type JobMetrics } from './metrics.js';
import { extractJobParameters, type JobParameters } from './parameters.js';
import { toRwMode } from './rw-mode.js';
import type { FioOutput } from './schema.js';
import {
  METRIC_SPECS,
  PARAMETER_SPECS,
  RW,
  type MetricSpec,
  type ParameterSpec,
  type ParameterValue,
} from './specs.js';
import { reconstructTimeWindows, type TimeWindow } from './time-windows.js';

const logger = createLogger('@fiometrics/core');

export interface JobRecord extends TimeWindow {
  readonly params: JobParameters;
  readonly metrics: JobMetrics;
}

export type RowValue = ParameterValue;
export type Row = RowValue[];

export interface ExtractionSpecs {
  parameters?: readonly ParameterSpec[];
  metrics?: readonly MetricSpec[];
}

/**
 * A job is usable when its window is not empty and it measured something
 */
export function isUsableJob(window: TimeWindow, metrics: JobMetrics): boolean {
  if (window.startTime >= window.endTime) {
    return false;
  }
  return Object.values(metrics).some((value) => Boolean(value));
}

/**
 * Extracts one record per usable job.
 *
 * @example
 * [{ params: { rw: 'read', filesize_kb: 50000, num_threads: 40 },
 *    startTime: 1653027084, endTime: 1653027155,
 *    metrics: { iops: 95.26093, bw_bytes: 99888324, ..., lat_s_perc_95: 0.526385152 } }]
 *
 * @throws MissingMetricError when a job lacks a required metric
 * @throws NoUsableDataError when every job was dropped
 */
export function extractJobRecords(fioOut: FioOutput, specs: ExtractionSpecs = {}): JobRecord[] {
  const metricSpecs = specs.metrics ?? METRIC_SPECS;
  const jobParams = extractJobParameters(fioOut, specs.parameters ?? PARAMETER_SPECS);
  const windows = reconstructTimeWindows(fioOut, jobParams);

  const records: JobRecord[] = [];
  fioOut.jobs.forEach((job, index) => {
    const params = jobParams[index] ?? {};
    const window = windows[index];
    const rw = params[RW];
    if (rw === undefined || window === undefined) {
      throw new MissingParameterError(RW, index);
    }

    const mode = toRwMode(String(rw));
    const block = job[mode];
    if (block === undefined) {
      throw new MissingMetricError(mode, index);
    }
    const metrics = extractJobMetrics(block, index, metricSpecs);

    if (!isUsableJob(window, metrics)) {
      logger.warn('No job metrics in json, skipping job', {
        jobIndex: index,
        startTime: window.startTime,
        endTime: window.endTime,
      });
      return;
    }

    records.push(
      Object.freeze({
        params,
        startTime: window.startTime,
        endTime: window.endTime,
        metrics,
      })
    );
  });

  if (records.length === 0) {
    throw new NoUsableDataError('No data could be extracted from file', {
      jobs: fioOut.jobs.length,
    });
  }

  return records;
}

/**
 * Flattens a record into a sheet row: parameters, start, end, metrics
 */
export function toRow(
  record: JobRecord,
  parameterSpecs: readonly ParameterSpec[] = PARAMETER_SPECS,
  metricSpecs: readonly MetricSpec[] = METRIC_SPECS
): Row {
  return [
    ...parameterSpecs.map((spec) => record.params[spec.name] ?? spec.defaultValue),
    record.startTime,
    record.endTime,
    ...metricSpecs.map((spec) => record.metrics[spec.name] ?? 0),
  ];
}
