import { describe, it, expect } from 'vitest';
import { columnHeaders, METRIC_SPECS, PARAMETER_SPECS } from '../../src/specs.js';

describe('parameter and metric tables', () => {
  it('freezes the lists and every entry in them', () => {
    expect(Object.isFrozen(PARAMETER_SPECS)).toBe(true);
    expect(Object.isFrozen(METRIC_SPECS)).toBe(true);
    expect(PARAMETER_SPECS.every((spec) => Object.isFrozen(spec))).toBe(true);
    expect(METRIC_SPECS.every((spec) => Object.isFrozen(spec) && Object.isFrozen(spec.path))).toBe(true);
  });

  it('rejects changes to an entry', () => {
    const [rw] = PARAMETER_SPECS;

    expect(() => Object.assign(rw ?? {}, { defaultValue: 'write' })).toThrow(TypeError);
    expect(PARAMETER_SPECS[0]?.defaultValue).toBe('read');
  });

  it('reads latencies from lat_ns in seconds', () => {
    const perc95 = METRIC_SPECS.find((spec) => spec.name === 'lat_s_perc_95');

    expect(perc95?.path).toEqual(['lat_ns', 'percentile', '95.000000']);
    expect(perc95?.conversion).toBe(10 ** -9);
  });

  it('lists columns as parameters, times, metrics', () => {
    expect(columnHeaders()).toEqual([
      'rw',
      'filesize_kb',
      'num_threads',
      'start_time',
      'end_time',
      'iops',
      'bw_bytes',
      'io_bytes',
      'lat_s_min',
      'lat_s_max',
      'lat_s_mean',
      'lat_s_perc_20',
      'lat_s_perc_50',
      'lat_s_perc_90',
      'lat_s_perc_95',
    ]);
  });
});
