import { describe, it, expect } from '@jest/globals';
import { PolicyNotFoundError } from '../../src/core/errors.js';
import { createLogger, isLogLevel, silentLogger } from '../../src/core/logging/logger.js';
import type { LogRecord } from '../../src/core/logging/logger.js';

function capture(): { records: LogRecord[]; sink: (record: LogRecord) => void } {
  const records: LogRecord[] = [];
  return { records, sink: (record) => records.push(record) };
}

describe('Logger', () => {
  it('should write structured records', () => {
    const { records, sink } = capture();
    const logger = createLogger({ service: 'pdp-test', sink });

    logger.info('Loaded policies', { count: 2 });

    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      level: 'info',
      service: 'pdp-test',
      message: 'Loaded policies',
      count: 2,
    });
    expect(typeof records[0]?.timestamp).toBe('string');
  });

  it('should drop records below the threshold', () => {
    const { records, sink } = capture();
    const logger = createLogger({ level: 'warn', sink });

    logger.debug('a');
    logger.info('b');
    logger.warn('c');
    logger.error('d');

    expect(records.map((record) => record.message)).toEqual(['c', 'd']);
  });

  it('should carry bindings and threshold into child loggers', () => {
    const { records, sink } = capture();
    const child = createLogger({ level: 'info', sink, bindings: { node: 'n1' } }).child({
      component: 'scheduler',
    });

    child.debug('hidden');
    child.info('visible', { dutyId: 'd1' });

    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({ node: 'n1', component: 'scheduler', dutyId: 'd1' });
  });

  it('should not let context override the reserved fields', () => {
    const { records, sink } = capture();
    createLogger({ sink }).info('real', { message: 'fake', level: 'debug' });

    expect(records[0]?.message).toBe('real');
    expect(records[0]?.level).toBe('info');
  });

  it('should describe errors with their code', () => {
    const { records, sink } = capture();
    createLogger({ sink }).error('Lookup failed', { policyId: 'p1' }, new PolicyNotFoundError('p1'));

    expect(records[0]?.['error']).toEqual({
      name: 'PolicyNotFoundError',
      message: 'Policy not found: p1',
      code: 'POLICY_NOT_FOUND',
    });
  });

  it('should describe thrown non-errors', () => {
    const { records, sink } = capture();
    createLogger({ sink }).error('Hook failed', {}, 'disk full');

    expect(records[0]?.['error']).toEqual({ name: 'Error', message: 'disk full' });
  });

  it('should recognise log levels', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });

  it('should provide a silent logger', () => {
    expect(silentLogger.child({ a: 1 })).toBe(silentLogger);
  });
});
