import { Logger } from '@nestjs/common';
import { TransactionUnsupportedError } from '../errors/transaction-unsupported.error';
import type {
  AdapterCapabilities,
  ISessionDbAdapter,
} from '../interfaces/session-db-adapter.interface';
import type { ArchivedSessionRecord } from '../interfaces/session-records.interface';

export type ArchiveInput = Omit<ArchivedSessionRecord, 'id' | 'createdAt'>;

/** Persists a completion record and removes the live session. */
export interface ArchiveStrategy {
  /** Resolves to whether the insert and the delete committed together. */
  archive(
    adapter: ISessionDbAdapter,
    tableName: string,
    data: ArchiveInput,
  ): Promise<boolean>;
}

export class SequentialArchiveStrategy implements ArchiveStrategy {
  private readonly logger = new Logger(SequentialArchiveStrategy.name);

  async archive(
    adapter: ISessionDbAdapter,
    tableName: string,
    data: ArchiveInput,
  ): Promise<boolean> {
    this.logger.warn(
      `Archiving session for user ${data.userKey} without a transaction; ` +
        `archive insert and session delete are not atomic`,
    );
    await adapter.insertArchive(tableName, data);
    await adapter.deleteSession(tableName, data.userKey);
    return false;
  }
}

export class TransactionalArchiveStrategy implements ArchiveStrategy {
  private readonly logger = new Logger(TransactionalArchiveStrategy.name);

  constructor(
    private readonly fallback: ArchiveStrategy = new SequentialArchiveStrategy(),
  ) {}

  async archive(
    adapter: ISessionDbAdapter,
    tableName: string,
    data: ArchiveInput,
  ): Promise<boolean> {
    try {
      await adapter.transaction(async (tx) => {
        await tx.insertArchive(tableName, data);
        await tx.deleteSession(tableName, data.userKey);
      });
      return true;
    } catch (error) {
      if (!(error instanceof TransactionUnsupportedError)) {
        throw error;
      }
      this.logger.warn(
        `${error.adapterName} refused a transaction; falling back to sequential archive`,
      );
      return this.fallback.archive(adapter, tableName, data);
    }
  }
}

export function selectArchiveStrategy(
  capabilities: AdapterCapabilities,
): ArchiveStrategy {
  return capabilities.transactions
    ? new TransactionalArchiveStrategy()
    : new SequentialArchiveStrategy();
}
