/**
 * Logger Tests
 * 
 * Testar logger-modulen och dess hjälpfunktioner.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import log, { logger, setLogLevel } from '../../utils/logger';

describe('Logger', () => {

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('Loggningsmetoder', () => {

    it('ska logga info med metadata', () => {
      const spy = vi.spyOn(logger, 'info');

      log.info('Test info', { key: 'value' });

      expect(spy).toHaveBeenCalledWith('Test info', { key: 'value' });
    });

    it('ska logga varningar', () => {
      expect(() => log.warn('Test warning')).not.toThrow();
    });

    it('ska logga debug', () => {
      expect(() => log.debug('Test debug')).not.toThrow();
    });

  });

  describe('Nivå', () => {

    it('ska byta nivå', () => {
      const original = logger.level;

      setLogLevel('warn');
      expect(logger.level).toBe('warn');

      logger.level = original;
    });

  });

  describe('Fel', () => {

    it('ska packa upp Error-objekt till message och stack', () => {
      const spy = vi.spyOn(logger, 'error');
      const error = new Error('Test error');

      log.error('Caught error', error, { farmId: 'abc' });

      expect(spy).toHaveBeenCalledWith('Caught error', {
        error: 'Test error',
        stack: error.stack,
        farmId: 'abc',
      });
    });

    it('ska göra om andra värden till sträng', () => {
      const spy = vi.spyOn(logger, 'error');

      log.error('Okänt fel', 42);

      expect(spy).toHaveBeenCalledWith('Okänt fel', { error: '42' });
    });

    it('ska klara fel utan orsak', () => {
      const spy = vi.spyOn(logger, 'error');

      log.error('Bara meddelande');

      expect(spy).toHaveBeenCalledWith('Bara meddelande', {});
    });

  });

  describe('Specialiserade loggningsmetoder', () => {

    it('ska märka optimeringsloggar', () => {
      const spy = vi.spyOn(logger, 'info');

      log.optimize('Plan beräknad', { trips: 2 });

      expect(spy).toHaveBeenCalledWith('⚙️ Plan beräknad', { type: 'optimization', trips: 2 });
    });

    it('ska logga lagring på debug-nivå', () => {
      const spy = vi.spyOn(logger, 'debug');

      log.db('Sparade gård');

      expect(spy).toHaveBeenCalledWith('🗄️ Sparade gård', { type: 'database' });
    });

    it('ska logga säkerhetshändelser som varning', () => {
      const spy = vi.spyOn(logger, 'warn');

      log.security('Ogiltig API-nyckel', { ip: '127.0.0.1' });

      expect(spy).toHaveBeenCalledWith('🔐 Ogiltig API-nyckel', { type: 'security', ip: '127.0.0.1' });
    });

    it('ska ha startup-metod', () => {
      expect(() => log.startup('Test startup log')).not.toThrow();
    });

  });

  describe('Request/Response logging', () => {

    it('ska logga request med metadata', () => {
      expect(() => log.request('POST', '/api/optimize', { entries: 2 })).not.toThrow();
    });

    it('ska logga response med 200 status som info', () => {
      const spy = vi.spyOn(logger, 'info');

      log.response('GET', '/api/catalog', 200, 50);

      expect(spy).toHaveBeenCalledWith('📤 GET /api/catalog 200', {
        type: 'response',
        statusCode: 200,
        durationMs: 50,
      });
    });

    it('ska logga response med 404 status som varning', () => {
      const spy = vi.spyOn(logger, 'warn');

      log.response('GET', '/api/unknown', 404, 5);

      expect(spy).toHaveBeenCalledTimes(1);
    });

    it('ska logga response med 500 status som error', () => {
      const spy = vi.spyOn(logger, 'error');

      log.response('POST', '/api/optimize', 500, 100);

      expect(spy).toHaveBeenCalledTimes(1);
    });

  });

});
