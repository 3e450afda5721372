import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { CronJob } from 'cron';
import { ImpersonationService } from '../auth/services/impersonation.service';

export const IMPERSONATION_SWEEP_JOB = 'impersonationExpirySweep';

/**
 * Optional cron sweep that rewrites lapsed impersonation sessions as
 * `expired`. Off by default; token checks never wait for it.
 */
@Injectable()
export class ImpersonationExpiryService implements OnModuleInit {
  private readonly logger = new Logger(ImpersonationExpiryService.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly impersonationService: ImpersonationService,
    private readonly schedulerRegistry: SchedulerRegistry,
  ) {}

  onModuleInit(): void {
    if (!this.configService.get<boolean>('impersonation.sweep.enabled', false)) {
      this.logger.debug('Impersonation expiry sweep is disabled');
      return;
    }

    const schedule = this.configService.getOrThrow<string>(
      'impersonation.sweep.cronSchedule',
    );
    const job = new CronJob(schedule, () => {
      void this.sweep();
    });

    this.schedulerRegistry.addCronJob(IMPERSONATION_SWEEP_JOB, job);
    job.start();
    this.logger.log(`Impersonation expiry sweep scheduled: ${schedule}`);
  }

  /** Never rejects; a failed run is logged and retried on the next tick. */
  async sweep(): Promise<number> {
    try {
      return await this.impersonationService.expireLapsed();
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.error(
        `Impersonation expiry sweep failed: ${err.message}`,
        err.stack,
      );
      return 0;
    }
  }
}
