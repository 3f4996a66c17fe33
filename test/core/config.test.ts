import { describe, it, expect } from 'vitest';
import { loadConfig, sessionConfigSchema } from '../../src/core/config.js';
import { ConfigurationError } from '../../src/core/errors.js';
import { silentLogger } from '../../src/types/logger.js';

describe('loadConfig', () => {
  it('should apply defaults', () => {
    const config = loadConfig({}, {});

    expect(config).toEqual({
      timeout: 30000,
      connectTimeout: 10000,
      userAgent: 'wirekit/0.1.0',
      followRedirects: true,
      maxRedirects: 20,
      torProxy: 'socks5h://localhost:9050',
      torCheckUrl: 'https://check.torproject.org',
      smtpTls: 'required',
      telnetIdleTimeout: 2000,
      debug: false,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('should read WIREKIT_* variables', () => {
    const config = loadConfig({}, {
      WIREKIT_CA_CERT: '/etc/ssl/ca.pem',
      WIREKIT_TIMEOUT: '1500',
      WIREKIT_TOR_PROXY: 'socks5h://127.0.0.1:9150',
    });

    expect(config.caCertPath).toBe('/etc/ssl/ca.pem');
    expect(config.timeout).toBe(1500);
    expect(config.torProxy).toBe('socks5h://127.0.0.1:9150');
  });

  it('should let explicit options win over the environment', () => {
    const config = loadConfig({ timeout: 100, caCertPath: undefined }, {
      WIREKIT_TIMEOUT: '1500',
      WIREKIT_CA_CERT: '/etc/ssl/ca.pem',
    });

    expect(config.timeout).toBe(100);
    expect(config.caCertPath).toBe('/etc/ssl/ca.pem');
  });

  it('should enable debug from DEBUG scopes', () => {
    expect(loadConfig({}, { DEBUG: '*' }).debug).toBe(true);
    expect(loadConfig({}, { DEBUG: 'express,wirekit:ftp' }).debug).toBe(true);
    expect(loadConfig({}, { DEBUG: 'express' }).debug).toBe(false);
  });

  it('should accept a logger object', () => {
    expect(loadConfig({ logger: silentLogger }, {}).logger).toBe(silentLogger);
  });

  it('should reject invalid values naming the key', () => {
    expect(() => loadConfig({ timeout: -1 }, {})).toThrow(ConfigurationError);

    try {
      loadConfig({ timeout: -1 }, {});
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.configKey).toBe('timeout');
        expect(error.message.startsWith('Invalid configuration for "timeout": ')).toBe(true);
      }
    }
  });

  it('should reject a non-numeric WIREKIT_TIMEOUT', () => {
    expect(() => loadConfig({}, { WIREKIT_TIMEOUT: 'soon' })).toThrow('Invalid configuration for "timeout"');
  });

  it('should reject unknown TLS policies and malformed proxy URLs', () => {
    expect(sessionConfigSchema.safeParse({ smtpTls: 'sometimes' }).success).toBe(false);
    expect(() => loadConfig({ torProxy: 'not a url' }, {})).toThrow('"torProxy"');
  });

  it('should reject loggers missing a level', () => {
    const partial = { debug: () => {}, info: () => {}, warn: () => {} };
    const result = sessionConfigSchema.safeParse({ logger: partial });

    expect(result.success).toBe(false);
    expect(result.error?.issues[0].path).toEqual(['logger']);
  });
});
