import { describe, it, expect } from 'vitest';
import {
  AuthenticationError,
  ConfigurationError,
  ConnectionError,
  LocalFileError,
  ProtocolError,
  StateError,
  TimeoutError,
  WirekitError,
  describeError,
} from '../../src/core/errors.js';

describe('Error Classes', () => {
  describe('TimeoutError', () => {
    it('should name the phase and limit', () => {
      const error = new TimeoutError({ phase: 'connect', timeout: 5000 });
      expect(error.message).toBe('Connection timed out after 5000ms');
      expect(error.phase).toBe('connect');
      expect(error.timeout).toBe(5000);
      expect(error.retriable).toBe(true);
      expect(error).toBeInstanceOf(WirekitError);
    });

    it('should default to the operation phase', () => {
      const error = new TimeoutError();
      expect(error.message).toBe('Operation timed out');
      expect(error.timeout).toBe(0);
    });

    it('should describe reply timeouts', () => {
      expect(new TimeoutError({ phase: 'reply', timeout: 10 }).message).toBe(
        'Waiting for server reply timed out after 10ms'
      );
    });
  });

  describe('ConnectionError', () => {
    it('should carry host, port and code', () => {
      const error = new ConnectionError('refused', { host: 'localhost', port: 21, code: 'ECONNREFUSED' });
      expect(error.name).toBe('ConnectionError');
      expect(error.host).toBe('localhost');
      expect(error.port).toBe(21);
      expect(error.code).toBe('ECONNREFUSED');
      expect(error.retriable).toBe(true);
    });

    it('should allow non-retriable failures', () => {
      expect(new ConnectionError('closed', { retriable: false }).retriable).toBe(false);
    });
  });

  describe('ProtocolError', () => {
    it('should give FTP suggestions', () => {
      const error = new ProtocolError('RETR failed', { protocol: 'ftp', code: 550, phase: 'transfer' });
      expect(error.protocol).toBe('ftp');
      expect(error.code).toBe(550);
      expect(error.phase).toBe('transfer');
      expect(error.suggestions).toContain('Verify the path exists and is correct.');
    });

    it('should give SMTP suggestions', () => {
      const error = new ProtocolError('RCPT TO failed', { protocol: 'smtp' });
      expect(error.suggestions).toContain('Verify the recipient address.');
    });

    it('should fall back to generic suggestions', () => {
      const error = new ProtocolError('odd', { protocol: 'gopher' });
      expect(error.suggestions).toContain('Review the error code for specific guidance.');
      expect(error.retriable).toBe(false);
    });
  });

  describe('AuthenticationError', () => {
    it('should not be retriable', () => {
      const error = new AuthenticationError('Access denied: 530', { authType: 'ftp' });
      expect(error.name).toBe('AuthenticationError');
      expect(error.authType).toBe('ftp');
      expect(error.retriable).toBe(false);
    });
  });

  describe('StateError', () => {
    it('should record expected and actual state', () => {
      const error = new StateError('Session is closed', { expectedState: 'open', actualState: 'closed' });
      expect(error.expectedState).toBe('open');
      expect(error.actualState).toBe('closed');
      expect(error.suggestions).toContain('Ensure the session was opened before use.');
    });
  });

  describe('ConfigurationError', () => {
    it('should name the offending key', () => {
      const error = new ConfigurationError('bad', { configKey: 'timeout' });
      expect(error.name).toBe('ConfigurationError');
      expect(error.configKey).toBe('timeout');
    });
  });

  describe('LocalFileError', () => {
    it('should carry the path', () => {
      const error = new LocalFileError('Unable to open output file', '/tmp/out');
      expect(error.path).toBe('/tmp/out');
      expect(error.message).toBe('Unable to open output file');
    });
  });

  describe('describeError', () => {
    it('should prefer the error message', () => {
      expect(describeError(new Error('boom'), 'fallback')).toBe('boom');
    });

    it('should fall back for non-errors and empty messages', () => {
      expect(describeError('text', 'fallback')).toBe('fallback');
      expect(describeError(new Error(''), 'fallback')).toBe('fallback');
    });
  });
});
