import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config.js';

describe('loadConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.logLevel).toBe('info');
    expect(config.database.host).toBe('localhost');
    expect(config.database.port).toBe(5432);
    expect(config.probes.ports).toEqual({ timeout: 3000, maxConcurrent: 100 });
    expect(config.probes.breach).toEqual({ timeout: 10000, maxConcurrent: 2 });
    expect(config.breach.apiKey).toBeUndefined();
    expect(config.maxConcurrentScans).toBe(2);
    expect(config.discoveryAttempts).toBe(2);
  });

  it('reads overrides and coerces numbers', () => {
    const config = loadConfig({
      LOG_LEVEL: 'debug',
      DB_PORT: '6543',
      DB_USER: 'scanner',
      TLS_PROBE_TIMEOUT: '2500',
      BREACH_API_KEY: 'test-secret',
      MAX_SUBDOMAINS: '0',
    });

    expect(config.logLevel).toBe('debug');
    expect(config.database.port).toBe(6543);
    expect(config.database.user).toBe('scanner');
    expect(config.probes.tls.timeout).toBe(2500);
    expect(config.probes.tls.maxConcurrent).toBe(20);
    expect(config.breach.apiKey).toBe('test-secret');
    expect(config.maxSubdomains).toBe(0);
  });

  it('treats blank values as unset', () => {
    expect(loadConfig({ DB_HOST: '   ' }).database.host).toBe('localhost');
  });

  it('rejects malformed values', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(/^Invalid configuration: logLevel: /);
    expect(() => loadConfig({ HTTP_PROBE_TIMEOUT: 'soon' })).toThrow(/probes\.http\.timeout/);
  });
});
