export * from './env-config.js';
export * from './yaml-config.js';
