/**
 * Logger Tests
 */

import { Logger, isLogLevel } from '../../src/utils/logger.js';

describe('Logger', () => {
  let lines: string[];
  let logger: Logger;

  beforeEach(() => {
    lines = [];
    logger = new Logger({ level: 'warn', write: (line) => lines.push(line) });
  });

  it('should drop messages below the level', () => {
    logger.info('loaded');
    logger.debug('details');
    expect(lines).toEqual([]);
  });

  it('should write level, message and context', () => {
    logger.warn('Skipped file', { file: 'a.yaml' });
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] WARN Skipped file \{"file":"a\.yaml"\}$/);
  });

  it('should omit an empty context', () => {
    logger.error('Failed', {});
    expect(lines[0]).toMatch(/\] ERROR Failed$/);
  });

  it('should change level at runtime', () => {
    logger.setLevel('debug');
    logger.debug('details');
    expect(logger.getLevel()).toBe('debug');
    expect(logger.isEnabled('info')).toBe(true);
    expect(lines).toHaveLength(1);
  });

  it('should recognise level names', () => {
    expect(isLogLevel('info')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
