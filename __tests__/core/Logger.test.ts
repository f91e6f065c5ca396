import { describe, it, expect, vi, afterEach } from 'vitest';
import { SilentLogger, ConsoleLogger } from '../../src/core/types/Logger';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('SilentLogger', () => {
    it('should not output anything', () => {
      const logger = new SilentLogger();
      const spies = (['log', 'debug', 'info', 'warn', 'error'] as const).map((method) =>
        vi.spyOn(console, method).mockImplementation(() => {})
      );

      logger.debug('test');
      logger.info('test');
      logger.warn('test');
      logger.error('test', new Error('boom'));

      for (const spy of spies) {
        expect(spy).not.toHaveBeenCalled();
      }
    });
  });

  describe('ConsoleLogger', () => {
    it('should log debug messages when minLevel is debug', () => {
      const logger = new ConsoleLogger('debug');
      const spy = vi.spyOn(console, 'debug').mockImplementation(() => {});

      logger.debug('queue bound', { queue: 'pricing_eu' });

      expect(spy).toHaveBeenCalledWith('[DEBUG] queue bound {"queue":"pricing_eu"}');
    });

    it('should not log debug messages at the default level', () => {
      const logger = new ConsoleLogger();
      const spy = vi.spyOn(console, 'debug').mockImplementation(() => {});

      logger.debug('test message');

      expect(spy).not.toHaveBeenCalled();
    });

    it('should log info and warn messages', () => {
      const logger = new ConsoleLogger('info');
      const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

      logger.info('Responder started', { endpoint: 'pricing' });
      logger.warn('Channel closed');

      expect(infoSpy).toHaveBeenCalledWith('[INFO] Responder started {"endpoint":"pricing"}');
      expect(warnSpy).toHaveBeenCalledWith('[WARN] Channel closed');
    });

    it('should log error messages with error object and stack', () => {
      const logger = new ConsoleLogger('info');
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

      const error = new Error('Something went wrong');
      logger.error('Handler failed', error, { endpoint: 'pricing' });

      expect(errorSpy).toHaveBeenCalledWith(
        '[ERROR] Handler failed - Something went wrong {"endpoint":"pricing"}'
      );
      expect(errorSpy).toHaveBeenCalledWith(error.stack);
    });

    it('should respect minLevel hierarchy', () => {
      const logger = new ConsoleLogger('error');
      const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
      const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

      logger.debug('debug');
      logger.info('info');
      logger.warn('warn');
      logger.error('error');

      expect(debugSpy).not.toHaveBeenCalled();
      expect(infoSpy).not.toHaveBeenCalled();
      expect(warnSpy).not.toHaveBeenCalled();
      expect(errorSpy).toHaveBeenCalledWith('[ERROR] error');
    });
  });
});
