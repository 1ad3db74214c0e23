import { describe, it, expect } from 'vitest';
import { componentLogger, createLogger, sanitizeTagsForLogging } from './logger';

function capture() {
  const lines: Record<string, unknown>[] = [];
  const stream = {
    write(message: string) {
      lines.push(JSON.parse(message));
    },
  };
  return { lines, stream };
}

describe('createLogger', () => {
  it('writes JSON lines with the component context', () => {
    const { lines, stream } = capture();
    const logger = componentLogger(createLogger({ level: 'debug' }, stream), 'calculator');

    logger.debug({ sku: 't3.micro' }, 'priced');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 20,
      name: 'aws-cost-engine',
      component: 'calculator',
      sku: 't3.micro',
      msg: 'priced',
    });
  });

  it('drops records below the configured level', () => {
    const { lines, stream } = capture();
    createLogger({ level: 'warn' }, stream).info('ignored');
    expect(lines).toHaveLength(0);
  });
});

describe('sanitizeTagsForLogging', () => {
  it('removes sensitive keys and keeps at most five tags', () => {
    expect(
      sanitizeTagsForLogging({
        a: '1',
        db_password: 'test-secret',
        b: '2',
        ApiToken: 'placeholder',
        c: '3',
        d: '4',
        e: '5',
        f: '6',
      }),
    ).toEqual({ a: '1', b: '2', c: '3', d: '4', e: '5' });
    expect(sanitizeTagsForLogging(undefined)).toEqual({});
  });
});

describe('createLogger defaults', () => {
  it('writes to stderr at info level', () => {
    const logger = createLogger();
    expect(logger.level).toBe('info');
    expect(logger.isLevelEnabled('debug')).toBe(false);
  });
});
