/**
 * Start/end time reconstruction.
 *
 * fio only reports when the whole run finished (timestamp_ms). Jobs run one
 * after another, so each job ends where the next one started:
 *
 *   job start = job end - runtime - ramp time
 *   job end   = start of the following job (last job: timestamp_ms)
 *
 * which forces the walk to go from the last job to the first.
 */

import { MissingMetricError, MissingParameterError } from './errors.js';
import type { JobParameters } from './parameters.js';
import { toRwMode } from './rw-mode.js';
import { GLOBAL_OPTIONS, JOB_OPTIONS, type FioJob, type FioOptions, type FioOutput } from './schema.js';
import { RAMP_TIME, RUNTIME, RW } from './specs.js';
import { convertValue, TIME_DEFAULT_UNIT, TIME_TO_MS } from './units.js';

export interface TimeWindow {
  /** Seconds since epoch, floored */
  readonly startTime: number;
  /** Seconds since epoch, rounded half to even */
  readonly endTime: number;
}

function rampTimeMs(options: FioOptions | undefined): number | undefined {
  const raw = options?.[RAMP_TIME];
  return raw === undefined ? undefined : convertValue(raw, TIME_TO_MS, TIME_DEFAULT_UNIT);
}

/**
 * Banker's rounding: x.5 goes to the nearest even integer
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

function jobRuntimeMs(job: FioJob, params: JobParameters, jobIndex: number): number {
  const rw = params[RW];
  if (rw === undefined) {
    throw new MissingParameterError(RW, jobIndex);
  }
  const mode = toRwMode(String(rw));
  const block = job[mode];
  if (block === undefined) {
    throw new MissingMetricError(mode, jobIndex);
  }
  const runtime = block[RUNTIME];
  if (typeof runtime !== 'number') {
    throw new MissingMetricError(RUNTIME, jobIndex, { mode });
  }
  return runtime;
}

/**
 * Returns the start and end time of each job, in job order.
 *
 * @param jobParams parameters of each job, as returned by extractJobParameters
 * @example [{ startTime: 1653027014, endTime: 1653027084 }, { startTime: 1653027084, endTime: 1653027155 }]
 */
export function reconstructTimeWindows(fioOut: FioOutput, jobParams: readonly JobParameters[]): TimeWindow[] {
  const globalRampTimeMs = rampTimeMs(fioOut[GLOBAL_OPTIONS]) ?? 0;

  let prevStartTimeS = 0;
  const reversed: TimeWindow[] = [];

  for (let i = fioOut.jobs.length - 1; i >= 0; i -= 1) {
    const job = fioOut.jobs[i];
    const params = jobParams[i];
    if (job === undefined || params === undefined) {
      throw new MissingParameterError(RW, i);
    }

    const runtimeMs = jobRuntimeMs(job, params, i);
    const jobRampTimeMs = rampTimeMs(job[JOB_OPTIONS]) ?? globalRampTimeMs;

    const endTimeMs = prevStartTimeS > 0 ? prevStartTimeS * 1000 : fioOut.timestamp_ms;
    const startTimeMs = endTimeMs - runtimeMs - jobRampTimeMs;

    const startTime = Math.floor(startTimeMs / 1000);
    const endTime = roundHalfEven(endTimeMs / 1000);

    prevStartTimeS = startTime;
    reversed.push({ startTime, endTime });
  }

  return reversed.reverse();
}
