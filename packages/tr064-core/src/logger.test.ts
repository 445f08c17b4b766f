import { describe, it, expect } from 'vitest';
import { createNullLogger, formatLogMetadata } from './logger';

describe('formatLogMetadata', () => {
  it('skips the fields of the line header', () => {
    expect(formatLogMetadata({ level: 'info', message: 'connected', module: 'SoapClient' })).toBe('');
  });

  it('writes the remaining fields as JSON', () => {
    expect(formatLogMetadata({ message: 'connected', host: '192.168.178.1', port: 49000 }))
      .toBe(' host="192.168.178.1" port=49000');
  });

  it('writes error-like objects field by field', () => {
    expect(formatLogMetadata({ cause: { code: 'ECONNREFUSED', port: 1012 } }))
      .toBe(' cause=PotentialError: { code: "ECONNREFUSED", port: 1012 }');
  });
});

describe('createNullLogger', () => {
  it('accepts every level without output', () => {
    const logger = createNullLogger();
    expect(logger.silent).toBe(true);
    expect(() => logger.trace('[test] trace line')).not.toThrow();
  });
});
