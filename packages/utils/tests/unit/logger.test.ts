/**
 * Logger Tests
 */

import { createLogger, logger, winstonLogger } from '../../src/index.js';

describe('Logger', () => {
  it('should tag info messages with the namespace', () => {
    const spy = vi.spyOn(winstonLogger, 'info');
    logger.info('Extracted job metrics', { file: 'out.json' });
    expect(spy).toHaveBeenCalledWith('Extracted job metrics', {
      namespace: 'fio-metrics',
      file: 'out.json',
    });
  });

  it('should use the package name given to createLogger', () => {
    const spy = vi.spyOn(winstonLogger, 'warn');
    createLogger('@fiometrics/core').warn('No job metrics in json, skipping job', { jobIndex: 2 });
    expect(spy).toHaveBeenCalledWith('No job metrics in json, skipping job', {
      namespace: '@fiometrics/core',
      jobIndex: 2,
    });
  });

  it('should log debug messages', () => {
    const spy = vi.spyOn(winstonLogger, 'debug');
    logger.debug('Loaded fio output', { jobs: 3 });
    expect(spy).toHaveBeenCalledWith('Loaded fio output', { namespace: 'fio-metrics', jobs: 3 });
  });

  it('should serialize Error objects', () => {
    const spy = vi.spyOn(winstonLogger, 'error');
    logger.error('Error occurred', new Error('Test error'));
    expect(spy).toHaveBeenCalledWith(
      'Error occurred',
      expect.objectContaining({
        namespace: 'fio-metrics',
        error: expect.objectContaining({ message: 'Test error', name: 'Error' }),
      })
    );
  });

  it('should log non-Error values as they are', () => {
    const spy = vi.spyOn(winstonLogger, 'error');
    logger.error('Error occurred', 'boom', { file: 'out.json' });
    expect(spy).toHaveBeenCalledWith('Error occurred', {
      namespace: 'fio-metrics',
      file: 'out.json',
      error: 'boom',
    });
  });

  it('should log without an error value', () => {
    const spy = vi.spyOn(winstonLogger, 'error');
    logger.error('Sink write failed');
    expect(spy).toHaveBeenCalledWith('Sink write failed', { namespace: 'fio-metrics' });
  });
});
