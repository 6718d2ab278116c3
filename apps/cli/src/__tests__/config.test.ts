import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from '../config.js';

describe('loadConfig', () => {
  it('should default to expenses.json in the working directory and warn level', () => {
    expect(loadConfig({}, '/work')).toEqual({
      storePath: '/work/expenses.json',
      logLevel: 'warn',
    });
  });

  it('should resolve EXPENSES_FILE against the working directory', () => {
    expect(loadConfig({ EXPENSES_FILE: 'data/2024.json' }, '/work').storePath).toBe('/work/data/2024.json');
    expect(loadConfig({ EXPENSES_FILE: '/var/ledger.json' }, '/work').storePath).toBe('/var/ledger.json');
  });

  it('should let the --file override win', () => {
    const config = loadConfig({ EXPENSES_FILE: 'env.json' }, '/work', { file: 'flag.json' });
    expect(config.storePath).toBe('/work/flag.json');
  });

  it('should read LOG_LEVEL and treat an empty value as unset', () => {
    expect(loadConfig({ LOG_LEVEL: 'debug' }, '/work').logLevel).toBe('debug');
    expect(loadConfig({ LOG_LEVEL: '' }, '/work').logLevel).toBe('warn');
  });

  it('should reject a blank EXPENSES_FILE', () => {
    expect(() => loadConfig({ EXPENSES_FILE: '  ' }, '/work')).toThrow(ConfigError);
    expect(() => loadConfig({ EXPENSES_FILE: '  ' }, '/work')).toThrow(
      'Invalid configuration: EXPENSES_FILE must not be empty'
    );
  });
});
