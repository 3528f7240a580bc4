import { describe, it, expect } from 'vitest';
import { createConfig, getConfig, getFirstDefined } from '../config/index.js';

describe('getConfig', () => {
  it('parses values by the type of the default', () => {
    const env = { PORT: '9000', ENABLED: 'yes', NAME: 'reader' };

    expect(getConfig('PORT', 8000, env)).toBe(9000);
    expect(getConfig('ENABLED', false, env)).toBe(true);
    expect(getConfig('NAME', 'default', env)).toBe('reader');
  });

  it('falls back to the default when unset, empty or unparsable', () => {
    expect(getConfig('MISSING', 5, {})).toBe(5);
    expect(getConfig('EMPTY', 5, { EMPTY: '' })).toBe(5);
    expect(getConfig('PORT', 5, { PORT: 'eighty' })).toBe(5);
    expect(getConfig('FLAG', true, { FLAG: 'maybe' })).toBe(true);
  });
});

describe('getFirstDefined', () => {
  it('returns the first non-empty variable', () => {
    expect(getFirstDefined(['A', 'B', 'C'], { A: '', B: 'b', C: 'c' })).toBe('b');
    expect(getFirstDefined(['A'], {})).toBeUndefined();
  });
});

describe('ConfigBuilder', () => {
  type Settings = { port: number; host: string; debug: boolean };

  it('builds a frozen object from environment and defaults', () => {
    const config = createConfig<Settings>({ APP_PORT: '3000', DEBUG: 'true' })
      .add('port', 8000, 'APP_PORT')
      .add('host', 'localhost')
      .add('debug', false)
      .build();

    expect(config).toEqual({ port: 3000, host: 'localhost', debug: true });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('lets set() override environment values', () => {
    const config = createConfig<Settings>({ HOST: 'env-host' })
      .add('port', 8000)
      .add('host', 'localhost')
      .add('debug', false)
      .set('host', 'override')
      .build();

    expect(config.host).toBe('override');
  });
});
