/**
 * @fiometrics/core - fio JSON output extraction
 */

export * from './errors.js';
export * from './units.js';
export * from './rw-mode.js';
export * from './schema.js';
export * from './specs.js';
export * from './parameters.js';
export * from './time-windows.js';
export * from './metrics.js';
export * from './records.js';
export * from './loader.js';
export * from './pipeline.js';
export * from './sinks/index.js';
