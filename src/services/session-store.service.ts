import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { StepMachine } from '../engines/step-machine.engine';
import type { StepId } from '../definitions/shipment-steps';
import { SessionEventType } from '../events/session-event-type.enum';
import type {
  SessionArchivedEvent,
  SessionCreatedEvent,
  SessionRolledBackEvent,
} from '../events/session-events';
import type { ISessionDbAdapter } from '../interfaces/session-db-adapter.interface';
import type { ResolvedSessionOptions } from '../interfaces/session-module-options.interface';
import type {
  ArchivedSessionRecord,
  ArchivePayload,
  Session,
  SessionUpdate,
  ShipmentFields,
} from '../interfaces/session-records.interface';
import type { ArchiveStrategy } from '../strategies/archive-strategy';
import { generateOrderCorrelationId } from '../utils/generate-order-correlation-id';
import { hydrateSession, toPatchRecord } from '../utils/hydrate-session';
import {
  ARCHIVE_STRATEGY,
  DEFAULT_ARCHIVE_LIST_LIMIT,
  SESSION_DB_ADAPTER,
  SESSION_MODULE_OPTIONS,
  STEP_MACHINE,
} from '../session.constants';

/**
 * Persisted per-user sessions. Every mutation is a single adapter call, so
 * the store never does check-then-write; TTL is enforced by the adapter on
 * every read and write.
 */
@Injectable()
export class SessionStore {
  private readonly logger = new Logger(SessionStore.name);

  constructor(
    @Inject(SESSION_DB_ADAPTER) private readonly adapter: ISessionDbAdapter,
    @Inject(ARCHIVE_STRATEGY)
    private readonly archiveStrategy: ArchiveStrategy,
    @Inject(STEP_MACHINE) private readonly machine: StepMachine,
    private readonly eventEmitter: EventEmitter2,
    @Inject(SESSION_MODULE_OPTIONS)
    private readonly options: Pick<
      ResolvedSessionOptions,
      'sessionTableName' | 'sessionTtlSeconds'
    >,
  ) {}

  /** `initialStep` only applies when a new session is created. */
  async getOrCreate(
    userKey: string,
    initialFields?: ShipmentFields,
    initialStep: StepId = this.machine.initial,
  ): Promise<Session> {
    const orderCorrelationId = generateOrderCorrelationId();
    const record = await this.adapter.upsertSession(
      this.options.sessionTableName,
      {
        userKey,
        orderCorrelationId,
        initialStep,
        initialFields: toPatchRecord(initialFields),
      },
      this.options.sessionTtlSeconds,
    );
    const session = hydrateSession(record);

    if (session.orderCorrelationId === orderCorrelationId) {
      this.logger.log(
        `Session created for user ${userKey} (${orderCorrelationId})`,
      );
      this.eventEmitter.emit(SessionEventType.CREATED, {
        userKey,
        orderCorrelationId,
        timestamp: new Date(),
      } satisfies SessionCreatedEvent);
    }

    return session;
  }

  /** Returns null when the user has no live session. */
  async updateAtomic(
    userKey: string,
    update: SessionUpdate,
  ): Promise<Session | null> {
    const record = await this.adapter.patchSession(
      this.options.sessionTableName,
      userKey,
      { step: update.step, patch: toPatchRecord(update.patch) },
      this.options.sessionTtlSeconds,
    );
    return record ? hydrateSession(record) : null;
  }

  async get(userKey: string): Promise<Session | null> {
    const record = await this.adapter.findSession(
      this.options.sessionTableName,
      userKey,
      this.options.sessionTtlSeconds,
    );
    return record ? hydrateSession(record) : null;
  }

  async clear(userKey: string): Promise<boolean> {
    return this.adapter.deleteSession(this.options.sessionTableName, userKey);
  }

  /** Drops any prior session, live or stale, and starts a fresh one. */
  async restart(
    userKey: string,
    initialFields?: ShipmentFields,
    initialStep?: StepId,
  ): Promise<Session> {
    await this.clear(userKey);
    return this.getOrCreate(userKey, initialFields, initialStep);
  }

  /**
   * Moves the session to the predecessor of `fromStep` and records why.
   * Collected fields are kept.
   */
  async rollback(
    userKey: string,
    fromStep: StepId,
    message: string,
  ): Promise<Session | null> {
    const toStep = this.machine.rollbackTarget(fromStep);
    const session = await this.updateAtomic(userKey, {
      step: toStep,
      patch: {
        lastError: message,
        errorStep: fromStep,
        errorAt: new Date().toISOString(),
        revertedFrom: fromStep,
        revertedTo: toStep,
      },
    });

    if (session) {
      this.logger.warn(
        `Session for user ${userKey} rolled back ${fromStep} -> ${toStep}: ${message}`,
      );
      this.eventEmitter.emit(SessionEventType.ROLLED_BACK, {
        userKey,
        fromStep,
        toStep,
        reason: message,
        timestamp: new Date(),
      } satisfies SessionRolledBackEvent);
    }

    return session;
  }

  async finalizeAndArchive(
    userKey: string,
    payload: ArchivePayload,
  ): Promise<void> {
    const atomic = await this.archiveStrategy.archive(
      this.adapter,
      this.options.sessionTableName,
      {
        userKey,
        orderCorrelationId: payload.orderCorrelationId,
        payload,
      },
    );

    this.logger.log(
      `Session for user ${userKey} archived as ${payload.orderCorrelationId}`,
    );
    this.eventEmitter.emit(SessionEventType.ARCHIVED, {
      userKey,
      orderCorrelationId: payload.orderCorrelationId,
      atomic,
      timestamp: new Date(),
    } satisfies SessionArchivedEvent);
  }

  /** Most recent first. */
  async listArchived(
    userKey: string,
    limit: number = DEFAULT_ARCHIVE_LIST_LIMIT,
  ): Promise<ArchivedSessionRecord[]> {
    return this.adapter.findArchived(
      this.options.sessionTableName,
      userKey,
      limit,
    );
  }

  /** Deletes sessions past the TTL window and returns their user keys. */
  async sweepExpired(): Promise<string[]> {
    return this.adapter.deleteStale(
      this.options.sessionTableName,
      this.options.sessionTtlSeconds,
    );
  }
}
