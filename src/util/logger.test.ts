import { logger } from './logger.js';

type LoggerModule = typeof import('./logger.js');

describe('Logger', () => {
  describe('API surface', () => {
    it.each(['debug', 'info', 'warn', 'error'] as const)('should have %s method', (method) => {
      expect(typeof logger[method]).toBe('function');
    });
  });

  describe('formatting', () => {
    let actual: LoggerModule;

    beforeAll(async () => {
      actual = await vi.importActual<LoggerModule>('./logger.js');
    });

    it('should prefix the timestamp and level', () => {
      expect(actual.formatMessage('warn', 'Disk almost full')).toMatch(
        /^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] \[WARN\] Disk almost full$/
      );
    });

    it('should append extra arguments', () => {
      const line = actual.formatMessage('info', 'Loaded', 3, { docs: 'data' });
      expect(line.endsWith('[INFO] Loaded 3 {\n  "docs": "data"\n}')).toBe(true);
    });

    it('should redact keys in the message and arguments', () => {
      const line = actual.formatMessage('error', 'Bearer abc.def', { apiKey: 'test-secret' });
      expect(line).toContain('Bearer [REDACTED]');
      expect(line).toContain('"apiKey": "[REDACTED]"');
      expect(line).not.toContain('test-secret');
    });

    it('should include the cause chain of errors', () => {
      const error = new Error('Failed to embed', { cause: new Error('socket hang up') });
      const line = actual.formatMessage('error', 'Indexing failed:', error);
      expect(line).toContain('Error: Failed to embed');
      expect(line).toContain('Caused by: Error: socket hang up');
    });

    it('should not throw on circular objects', () => {
      const circular: Record<string, unknown> = {};
      circular.self = circular;
      expect(() => actual.formatMessage('error', 'Circular:', circular)).not.toThrow();
    });
  });

  describe('levels', () => {
    let actual: LoggerModule;

    const captureStderr = () => vi.spyOn(console, 'error').mockImplementation(() => undefined);

    beforeEach(async () => {
      actual = await vi.importActual<LoggerModule>('./logger.js');
    });

    afterEach(() => {
      actual.setLogLevel('info');
      vi.restoreAllMocks();
    });

    it('should write to stderr at or above the current level', () => {
      const stderr = captureStderr();
      actual.setLogLevel('warn');
      actual.logger.info('hidden');
      actual.logger.warn('shown');
      actual.logger.error('also shown');
      expect(stderr).toHaveBeenCalledTimes(2);
    });

    it('should log everything at debug', () => {
      const stderr = captureStderr();
      actual.setLogLevel('debug');
      actual.logger.debug('a');
      actual.logger.info('b');
      expect(stderr).toHaveBeenCalledTimes(2);
    });

    it('should log nothing when silent', () => {
      const stderr = captureStderr();
      actual.setLogLevel('silent');
      actual.logger.error('nope');
      expect(stderr).not.toHaveBeenCalled();
      expect(actual.getLogLevel()).toBe('silent');
    });
  });
});
