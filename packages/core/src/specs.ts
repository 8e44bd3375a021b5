/**
 * Job parameters and metrics extracted from every fio job.
 *
 * Both lists are ordered: rows are aligned to sheet columns positionally, so
 * new entries go at the end of a list.
 */

import { convertValue, FILESIZE_TO_KB } from './units.js';
import { ValueParseError } from './errors.js';

export type ParameterValue = string | number;

/**
 * A fio job parameter.
 *
 * `sourceKey` must match the fio option name inside "global options" or
 * "job options"; `name` is the key the formatted value is stored under.
 */
export interface ParameterSpec {
  readonly name: string;
  readonly sourceKey: string;
  readonly format: (raw: string) => ParameterValue;
  readonly defaultValue: ParameterValue;
}

/**
 * A fio job metric.
 *
 * `path` lists the keys leading to the value inside the job's read/write
 * block; `conversion` scales it to the reported unit.
 */
export interface MetricSpec {
  readonly name: string;
  readonly path: readonly string[];
  readonly conversion: number;
}

export const RW = 'rw';
export const FILESIZE_KB = 'filesize_kb';
export const NUM_THREADS = 'num_threads';
export const RAMP_TIME = 'ramp_time';
export const RUNTIME = 'runtime';

export const NS_TO_S = 10 ** -9;

const LAT_NS = 'lat_ns';
const PERCENTILE = 'percentile';

function parseInteger(raw: string): number {
  const trimmed = raw.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    throw new ValueParseError(raw);
  }
  return Number.parseInt(trimmed, 10);
}

function freezeAll<T extends object>(entries: T[]): readonly Readonly<T>[] {
  return Object.freeze(entries.map((entry) => Object.freeze(entry)));
}

export const PARAMETER_SPECS: readonly ParameterSpec[] = freezeAll<ParameterSpec>([
  // rw must stay first: the time windows and result blocks are keyed on it
  { name: RW, sourceKey: 'rw', format: (raw: string) => raw, defaultValue: 'read' },
  {
    name: FILESIZE_KB,
    sourceKey: 'filesize',
    format: (raw: string) => convertValue(raw, FILESIZE_TO_KB),
    defaultValue: 0,
  },
  { name: NUM_THREADS, sourceKey: 'numjobs', format: parseInteger, defaultValue: 1 },
]);

const latency = (name: string, ...path: string[]): MetricSpec => ({
  name,
  path: Object.freeze([LAT_NS, ...path]),
  conversion: NS_TO_S,
});

export const METRIC_SPECS: readonly MetricSpec[] = freezeAll<MetricSpec>([
  { name: 'iops', path: Object.freeze(['iops']), conversion: 1 },
  { name: 'bw_bytes', path: Object.freeze(['bw_bytes']), conversion: 1 },
  { name: 'io_bytes', path: Object.freeze(['io_bytes']), conversion: 1 },
  latency('lat_s_min', 'min'),
  latency('lat_s_max', 'max'),
  latency('lat_s_mean', 'mean'),
  latency('lat_s_perc_20', PERCENTILE, '20.000000'),
  latency('lat_s_perc_50', PERCENTILE, '50.000000'),
  latency('lat_s_perc_90', PERCENTILE, '90.000000'),
  latency('lat_s_perc_95', PERCENTILE, '95.000000'),
]);

export const START_TIME = 'start_time';
export const END_TIME = 'end_time';

/**
 * Column names in row order: parameters, start, end, metrics
 */
export function columnHeaders(
  parameterSpecs: readonly ParameterSpec[] = PARAMETER_SPECS,
  metricSpecs: readonly MetricSpec[] = METRIC_SPECS
): string[] {
  return [
    ...parameterSpecs.map((spec) => spec.name),
    START_TIME,
    END_TIME,
    ...metricSpecs.map((spec) => spec.name),
  ];
}
