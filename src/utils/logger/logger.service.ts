import { ConsoleLogger, Injectable, LogLevel } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

const LOG_LEVELS: LogLevel[] = [
  'verbose',
  'debug',
  'log',
  'warn',
  'error',
  'fatal',
];

export type SecurityEvent =
  | 'SESSION_CREATED'
  | 'SESSION_REFRESHED'
  | 'SESSION_REVOKED'
  | 'IMPERSONATION_STARTED'
  | 'IMPERSONATION_REFRESHED'
  | 'IMPERSONATION_ENDED'
  | 'IMPERSONATION_EXPIRED'
  | 'TOKEN_REJECTED';

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** Levels from `minimum` upwards, e.g. `warn` enables warn, error and fatal. */
export function logLevelsFrom(minimum: string): LogLevel[] {
  const floor = isLogLevel(minimum) ? LOG_LEVELS.indexOf(minimum) : 2;
  return LOG_LEVELS.slice(floor);
}

@Injectable()
export class LoggerService extends ConsoleLogger {
  constructor(configService: ConfigService) {
    super('Application', {
      timestamp: true,
      logLevels: logLevelsFrom(configService.get<string>('logLevel', 'log')),
    });
  }

  info(message: string, context?: string): void {
    if (context) {
      this.log(message, context);
    } else {
      this.log(message);
    }
  }

  /**
   * Audit trail entry. Written as a single JSON line under the `Security`
   * context so it can be shipped and filtered separately.
   */
  security(
    event: SecurityEvent,
    data: Record<string, unknown>,
    userId?: string,
  ): void {
    this.log(
      JSON.stringify({ event, userId: userId ?? null, ...data }),
      'Security',
    );
  }
}
