import { ConfigService } from '@nestjs/config';
import { LoggerService, logLevelsFrom } from './logger.service';

describe('LoggerService', () => {
  describe('logLevelsFrom', () => {
    it('should enable the given level and everything more severe', () => {
      expect(logLevelsFrom('warn')).toEqual(['warn', 'error', 'fatal']);
    });

    it('should fall back to log for unknown levels', () => {
      expect(logLevelsFrom('chatty')).toEqual(['log', 'warn', 'error', 'fatal']);
    });
  });

  describe('security', () => {
    it('should write one JSON line under the Security context', () => {
      const logger = new LoggerService(new ConfigService({ logLevel: 'log' }));
      const logSpy = jest.spyOn(logger, 'log').mockImplementation(() => undefined);

      logger.security('SESSION_REVOKED', { sessionId: 'session-1' }, 'user-1');

      expect(logSpy).toHaveBeenCalledWith(
        '{"event":"SESSION_REVOKED","userId":"user-1","sessionId":"session-1"}',
        'Security',
      );
    });

    it('should record a missing user as null', () => {
      const logger = new LoggerService(new ConfigService({ logLevel: 'log' }));
      const logSpy = jest.spyOn(logger, 'log').mockImplementation(() => undefined);

      logger.security('TOKEN_REJECTED', { kind: 'InvalidToken' });

      expect(logSpy).toHaveBeenCalledWith(
        '{"event":"TOKEN_REJECTED","userId":null,"kind":"InvalidToken"}',
        'Security',
      );
    });
  });
});
