import { afterEach, describe, it, expect } from 'vitest';
import { createLogger, isLogLevel } from './logger.js';
import { captureOutput, type CapturedOutput } from './__tests__/helpers.js';

describe('createLogger', () => {
  let output: CapturedOutput | undefined;

  afterEach(() => {
    output?.restore();
    output = undefined;
  });

  it('writes prefixed lines to stderr', () => {
    output = captureOutput();
    createLogger('info').info('Processing input file: data.json');
    expect(output.stderr()).toBe(
      '[schemasmith] info: Processing input file: data.json\n'
    );
    expect(output.stdout()).toBe('');
  });

  it('drops messages above the configured level', () => {
    output = captureOutput();
    const logger = createLogger('warn');
    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');
    expect(output.stderr()).toBe(
      '[schemasmith] warn: w\n[schemasmith] error: e\n'
    );
  });

  it('writes nothing when silent', () => {
    output = captureOutput();
    createLogger('silent').error('boom');
    expect(output.stderr()).toBe('');
  });

  it('defaults to warn', () => {
    expect(createLogger().level).toBe('warn');
  });
});

describe('isLogLevel', () => {
  it('accepts only known level names', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('DEBUG')).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});
