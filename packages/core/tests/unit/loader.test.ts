import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadFioOutput } from '../../src/loader.js';
import { EmptyDocumentError, InputFileError, NoValuesError } from '../../src/errors.js';
import { fixturePath } from '../helpers/fio-output.js';

describe('loadFioOutput', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'fio-loader-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  const writeJson = (name: string, content: string): string => {
    const filePath = join(dir, name);
    writeFileSync(filePath, content);
    return filePath;
  };

  it('loads a fio output file', () => {
    const fioOut = loadFioOutput(fixturePath('two-jobs.json'));

    expect(fioOut.timestamp_ms).toBe(1653027155000);
    expect(fioOut.jobs).toHaveLength(2);
    expect(fioOut['global options']).toEqual({
      ioengine: 'sync',
      filesize: '50M',
      numjobs: '40',
      rw: 'read',
    });
    expect(fioOut.jobs[1]?.['job options']).toEqual({ rw: 'randread' });
  });

  it('keeps keys it does not validate', () => {
    const fioOut = loadFioOutput(fixturePath('two-jobs.json'));

    expect(fioOut['fio version']).toBe('fio-3.30');
  });

  it('turns numeric option values into strings', () => {
    const filePath = writeJson(
      'numeric.json',
      JSON.stringify({ timestamp_ms: 1, 'global options': { numjobs: 4 }, jobs: [] })
    );

    expect(loadFioOutput(filePath)['global options']).toEqual({ numjobs: '4' });
  });

  it('throws InputFileError for a missing file', () => {
    expect(() => loadFioOutput(join(dir, 'absent.json'))).toThrow(InputFileError);
  });

  it('throws InputFileError for malformed JSON', () => {
    expect(() => loadFioOutput(fixturePath('malformed.json'))).toThrow(InputFileError);
    expect(() => loadFioOutput(fixturePath('malformed.json'))).toThrow(/is not valid JSON$/);
  });

  it('throws EmptyDocumentError for an empty object', () => {
    expect(() => loadFioOutput(fixturePath('empty.json'))).toThrow(EmptyDocumentError);
  });

  it.each(['[]', 'null', '""', '0'])('treats %s as an empty document', (content) => {
    const filePath = writeJson('empty-value.json', content);

    expect(() => loadFioOutput(filePath)).toThrow(NoValuesError);
  });

  it('throws InputFileError when jobs are missing', () => {
    const filePath = writeJson('no-jobs.json', JSON.stringify({ timestamp_ms: 1653027155000 }));

    expect(() => loadFioOutput(filePath)).toThrow(InputFileError);
    expect(() => loadFioOutput(filePath)).toThrow(`File ${filePath} is not fio JSON output`);
  });

  it('throws InputFileError when timestamp_ms is not a number', () => {
    const filePath = writeJson('bad-ts.json', JSON.stringify({ timestamp_ms: 'soon', jobs: [] }));

    expect(() => loadFioOutput(filePath)).toThrow(InputFileError);
  });
});
