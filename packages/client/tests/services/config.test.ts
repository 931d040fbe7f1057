import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { DEFAULT_SERVER_URL, parseInterval, resolveServerUrl } from '../../src/services';

describe('resolveServerUrl', () => {
  it('prefers the explicit option', () => {
    expect(resolveServerUrl('http://10.0.0.2:9000/', { METADATA_SERVER_URL: 'http://other:1' })).toBe(
      'http://10.0.0.2:9000'
    );
  });

  it('falls back to the environment, then the default', () => {
    expect(resolveServerUrl(undefined, { METADATA_SERVER_URL: 'http://box:8787' })).toBe('http://box:8787');
    expect(resolveServerUrl(undefined, {})).toBe(DEFAULT_SERVER_URL);
    expect(resolveServerUrl('  ', {})).toBe(DEFAULT_SERVER_URL);
  });
});

describe('parseInterval', () => {
  it('accepts positive integers', () => {
    expect(parseInterval('600')).toBe(600);
  });

  it.each(['0', '-5', '1.5', 'soon'])('rejects %s', (value) => {
    expect(() => parseInterval(value)).toThrow(InvalidArgumentError);
  });
});
