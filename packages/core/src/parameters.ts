/**
 * Job parameter extraction.
 *
 * Parameters come from "global options" and are overridden field by field by
 * each job's "job options". Values are formatted by their spec before storing.
 */

import { GLOBAL_OPTIONS, JOB_OPTIONS, type FioOptions, type FioOutput } from './schema.js';
import { PARAMETER_SPECS, type ParameterSpec, type ParameterValue } from './specs.js';

/**
 * Formatted parameters of one job, keyed by spec name in spec order.
 * Empty for a job without a "job options" block.
 */
export type JobParameters = Readonly<Record<string, ParameterValue>>;

function readParameter(options: FioOptions, spec: ParameterSpec): ParameterValue | undefined {
  const raw = options[spec.sourceKey];
  return raw === undefined ? undefined : spec.format(raw);
}

/**
 * Parameters from "global options", with each spec's default where the
 * option (or the whole block) is absent.
 */
export function extractGlobalParameters(
  fioOut: FioOutput,
  specs: readonly ParameterSpec[] = PARAMETER_SPECS
): JobParameters {
  const globalOptions = fioOut[GLOBAL_OPTIONS] ?? {};
  const params: Record<string, ParameterValue> = {};
  for (const spec of specs) {
    params[spec.name] = readParameter(globalOptions, spec) ?? spec.defaultValue;
  }
  return params;
}

/**
 * Returns the parameters of each job, in job order.
 *
 * @example
 * // {"global options": {"filesize": "50M", "numjobs": "40"},
 * //  "jobs": [{"job options": {"numjobs": "10"}}]}
 * // => [{ rw: 'read', filesize_kb: 50000, num_threads: 10 }]
 */
export function extractJobParameters(
  fioOut: FioOutput,
  specs: readonly ParameterSpec[] = PARAMETER_SPECS
): JobParameters[] {
  const globalParams = extractGlobalParameters(fioOut, specs);

  return fioOut.jobs.map((job) => {
    const jobOptions = job[JOB_OPTIONS];
    const params: Record<string, ParameterValue> = {};
    // Globals are only consulted through a job's own options block
    if (jobOptions === undefined) {
      return params;
    }
    for (const spec of specs) {
      params[spec.name] = readParameter(jobOptions, spec) ?? globalParams[spec.name] ?? spec.defaultValue;
    }
    return params;
  });
}
