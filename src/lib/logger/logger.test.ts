/**
 * Logger Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { GrammarError } from '../uri';
import { Logger, createLogger } from './logger';

describe('Logger', () => {
  let spy: MockInstance<typeof console.error>;

  beforeEach(() => {
    spy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  describe('level filtering', () => {
    it('should drop messages below the default warn level', () => {
      vi.stubEnv('LOG_LEVEL', '');
      const logger = createLogger('Test');

      logger.debug('debug');
      logger.info('info');
      logger.warn('warn');

      expect(spy).toHaveBeenCalledTimes(1);
      expect(spy).toHaveBeenCalledWith('[WARN][Test] warn');
    });

    it('should write everything at debug level', () => {
      vi.stubEnv('LOG_LEVEL', 'debug');
      const logger = createLogger('Test');

      logger.debug('a');
      logger.info('b');
      logger.warn('c');
      logger.error('d');

      expect(spy.mock.calls.map((call) => call[0])).toEqual([
        '[DEBUG][Test] a',
        '[INFO][Test] b',
        '[WARN][Test] c',
        '[ERROR][Test] d',
      ]);
    });

    it('should write nothing when silent', () => {
      vi.stubEnv('LOG_LEVEL', 'silent');

      createLogger('Test').error('boom', new Error('boom'));

      expect(spy).not.toHaveBeenCalled();
    });

    it('should read the level on every call', () => {
      const logger = createLogger('Test');

      vi.stubEnv('LOG_LEVEL', 'error');
      logger.warn('dropped');
      vi.stubEnv('LOG_LEVEL', 'warn');
      logger.warn('kept');

      expect(spy).toHaveBeenCalledTimes(1);
      expect(spy).toHaveBeenCalledWith('[WARN][Test] kept');
    });
  });

  describe('output', () => {
    beforeEach(() => {
      vi.stubEnv('LOG_LEVEL', 'debug');
    });

    it('should append data', () => {
      createLogger('Test').info('parsed', { count: 2 });

      expect(spy).toHaveBeenCalledWith('[INFO][Test] parsed', '\nData:', { count: 2 });
    });

    it('should omit the service prefix without a service', () => {
      new Logger().info('plain');

      expect(spy).toHaveBeenCalledWith('[INFO] plain');
    });

    it('should append extra context from child loggers', () => {
      createLogger('Test').child({ requestId: 'r-1' }).info('hello');

      expect(spy).toHaveBeenCalledWith('[INFO][Test] hello', '\nContext:', { requestId: 'r-1' });
    });

    it('should let a child override the service', () => {
      createLogger('Parent').child({ service: 'Child' }).info('hello');

      expect(spy).toHaveBeenCalledWith('[INFO][Child] hello');
    });
  });

  describe('errors', () => {
    beforeEach(() => {
      vi.stubEnv('LOG_LEVEL', 'error');
    });

    it('should format Error instances', () => {
      createLogger('Test').error('failed', new Error('boom'));

      expect(spy).toHaveBeenCalledWith(
        '[ERROR][Test] failed',
        '\nError:',
        expect.objectContaining({ name: 'Error', message: 'boom', code: undefined })
      );
    });

    it('should keep the code of grammar errors', () => {
      createLogger('Test').error('failed', new GrammarError('leftover', 3), { link: 'a:b c' });

      expect(spy).toHaveBeenCalledWith(
        '[ERROR][Test] failed',
        '\nData:',
        { link: 'a:b c' },
        '\nError:',
        expect.objectContaining({ name: 'GrammarError', message: 'leftover at offset 3', code: 'leftover' })
      );
    });

    it('should describe values that are not errors', () => {
      createLogger('Test').error('failed', { reason: 'x' });
      createLogger('Test').error('failed', 'text');

      expect(spy).toHaveBeenNthCalledWith(1, '[ERROR][Test] failed', '\nError:', {
        name: 'UnknownError',
        message: '{"reason":"x"}',
      });
      expect(spy).toHaveBeenNthCalledWith(2, '[ERROR][Test] failed', '\nError:', {
        name: 'UnknownError',
        message: 'text',
      });
    });

    it('should leave out a missing error', () => {
      createLogger('Test').error('failed');

      expect(spy).toHaveBeenCalledWith('[ERROR][Test] failed');
    });
  });
});
