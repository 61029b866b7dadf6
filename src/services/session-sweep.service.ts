import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { CronJob } from 'cron';
import { SessionEventType } from '../events/session-event-type.enum';
import type { SessionExpiredEvent } from '../events/session-events';
import type { ResolvedSessionOptions } from '../interfaces/session-module-options.interface';
import { SESSION_MODULE_OPTIONS, SESSION_SWEEP_JOB } from '../session.constants';
import { QuoteCache } from './quote-cache.service';
import { SessionStore } from './session-store.service';

export interface SessionSweepResult {
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  sessionsRemoved: number;
  userKeys: string[];
  quotesEvicted: number;
}

/** Periodically deletes sessions past the TTL window and expired quotes. */
@Injectable()
export class SessionSweepService implements OnModuleInit {
  private readonly logger = new Logger(SessionSweepService.name);

  constructor(
    private readonly store: SessionStore,
    private readonly quoteCache: QuoteCache,
    private readonly schedulerRegistry: SchedulerRegistry,
    private readonly eventEmitter: EventEmitter2,
    @Inject(SESSION_MODULE_OPTIONS)
    private readonly options: Pick<
      ResolvedSessionOptions,
      'sweepCronExpression' | 'enableSessionSweep'
    >,
  ) {}

  onModuleInit(): void {
    if (!this.options.enableSessionSweep) {
      this.logger.log('Session sweep disabled by configuration');
      return;
    }

    const job = new CronJob(this.options.sweepCronExpression, () => {
      this.sweep()
        .then((summary) => {
          this.logger.log(
            `Session sweep summary: removed=${summary.sessionsRemoved}, quotesEvicted=${summary.quotesEvicted}, durationMs=${summary.durationMs}`,
          );
        })
        .catch((err) => {
          this.logger.error('Unhandled error in session sweep', err);
        });
    });

    this.schedulerRegistry.addCronJob(SESSION_SWEEP_JOB, job);
    job.start();
    this.logger.log(
      `Session sweep registered with expression: ${this.options.sweepCronExpression}`,
    );
  }

  async sweep(): Promise<SessionSweepResult> {
    const startedAt = new Date();
    const userKeys = await this.store.sweepExpired();
    const quotesEvicted = this.quoteCache.cleanupExpired();

    for (const userKey of userKeys) {
      this.eventEmitter.emit(SessionEventType.EXPIRED, {
        userKey,
        timestamp: new Date(),
      } satisfies SessionExpiredEvent);
    }

    if (userKeys.length > 0) {
      this.logger.warn(`Expired ${userKeys.length} stale session(s)`);
    }

    const finishedAt = new Date();
    return {
      startedAt,
      finishedAt,
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      sessionsRemoved: userKeys.length,
      userKeys,
      quotesEvicted,
    };
  }
}
