import { UnsupportedRwModeError } from './errors.js';

export type RwMode = 'read' | 'write';

const RW_MODES: ReadonlyMap<string, RwMode> = new Map([
  ['read', 'read'],
  ['randread', 'read'],
  ['write', 'write'],
  ['randwrite', 'write'],
]);

/**
 * Collapses read/randread/write/randwrite to the name of the result block
 * fio writes for the job.
 */
export function toRwMode(rw: string): RwMode {
  const mode = RW_MODES.get(rw);
  if (mode === undefined) {
    throw new UnsupportedRwModeError(rw);
  }
  return mode;
}
