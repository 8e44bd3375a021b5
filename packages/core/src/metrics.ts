import { MissingMetricError } from './errors.js';
import type { ResultBlock } from './schema.js';
import { METRIC_SPECS, type MetricSpec } from './specs.js';

/**
 * Scaled metric values of one job, keyed by spec name in spec order
 */
export type JobMetrics = Readonly<Record<string, number>>;

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
};

/**
 * Extracts the metrics of one job from its read/write result block.
 *
 * For path ['lat_ns', 'percentile', '20.000000'] the value read is
 * block.lat_ns.percentile['20.000000'].
 *
 * @throws MissingMetricError when any key on a path is absent; the output
 * file is then treated as incompatible, not as a zero reading
 */
export function extractJobMetrics(
  block: ResultBlock,
  jobIndex: number,
  specs: readonly MetricSpec[] = METRIC_SPECS
): JobMetrics {
  const metrics: Record<string, number> = {};

  for (const spec of specs) {
    let value: unknown = block;
    for (const key of spec.path) {
      if (!isRecord(value) || !Object.hasOwn(value, key)) {
        throw new MissingMetricError(key, jobIndex, { metric: spec.name });
      }
      value = value[key];
    }

    if (typeof value !== 'number') {
      throw new MissingMetricError(spec.path.join('.'), jobIndex, {
        metric: spec.name,
        reason: 'not a number',
      });
    }
    metrics[spec.name] = value * spec.conversion;
  }

  return metrics;
}
