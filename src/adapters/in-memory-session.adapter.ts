import { randomUUID } from 'crypto';
import { TransactionUnsupportedError } from '../errors/transaction-unsupported.error';
import type {
  AdapterCapabilities,
  ISessionDbAdapter,
  PatchSessionInput,
  SaveTemplateInput,
  UpsertSessionInput,
} from '../interfaces/session-db-adapter.interface';
import type {
  ArchivedSessionRecord,
  SessionRecord,
  TemplateRecord,
} from '../interfaces/session-records.interface';
import {
  archiveTableName,
  assertTableName,
  templateTableName,
} from '../utils/assert-table-name';
import { SerialQueue } from '../utils/serial-queue';

interface InMemorySessionState {
  sessionsByTable: Map<string, Map<string, SessionRecord>>;
  archiveByTable: Map<string, ArchivedSessionRecord[]>;
  templatesByTable: Map<string, TemplateRecord[]>;
}

export interface InMemoryAdapterOptions {
  /** Set to false to emulate a store without multi-document transactions. Default: true */
  transactions?: boolean;
  /** Clock used for TTL checks. Default: Date.now */
  now?: () => number;
}

function createEmptyState(): InMemorySessionState {
  return {
    sessionsByTable: new Map<string, Map<string, SessionRecord>>(),
    archiveByTable: new Map<string, ArchivedSessionRecord[]>(),
    templatesByTable: new Map<string, TemplateRecord[]>(),
  };
}

function cloneState(state: InMemorySessionState): InMemorySessionState {
  return structuredClone(state);
}

/**
 * Process-local session store. Operations are serialized through a queue;
 * a transaction holds the queue for its whole callback and works on a copy
 * of the state that replaces the live state on commit.
 */
export class InMemorySessionAdapter implements ISessionDbAdapter {
  readonly capabilities: AdapterCapabilities;
  private readonly now: () => number;

  constructor(
    private readonly options: InMemoryAdapterOptions = {},
    private state: InMemorySessionState = createEmptyState(),
    private readonly queue: SerialQueue | null = new SerialQueue(),
  ) {
    this.capabilities = { transactions: options.transactions ?? true };
    this.now = options.now ?? Date.now;
  }

  async upsertSession(
    tableName: string,
    input: UpsertSessionInput,
    ttlSeconds: number,
  ): Promise<SessionRecord> {
    assertTableName(tableName);
    return this.exec(() => {
      const table = this.getSessionTable(tableName);
      const now = this.now();
      const existing = table.get(input.userKey);

      if (existing && this.isLive(existing, ttlSeconds, now)) {
        existing.lastTouchedAt = new Date(now);
        return structuredClone(existing);
      }

      const created: SessionRecord = {
        userKey: input.userKey,
        orderCorrelationId: input.orderCorrelationId,
        currentStep: input.initialStep,
        fields: structuredClone(input.initialFields),
        createdAt: new Date(now),
        lastTouchedAt: new Date(now),
      };
      table.set(input.userKey, created);
      return structuredClone(created);
    });
  }

  async patchSession(
    tableName: string,
    userKey: string,
    update: PatchSessionInput,
    ttlSeconds: number,
  ): Promise<SessionRecord | null> {
    assertTableName(tableName);
    return this.exec(() => {
      const now = this.now();
      const row = this.getSessionTable(tableName).get(userKey);
      if (!row || !this.isLive(row, ttlSeconds, now)) return null;

      row.fields = { ...row.fields, ...structuredClone(update.patch) };
      if (update.step !== undefined) {
        row.currentStep = update.step;
      }
      row.lastTouchedAt = new Date(now);
      return structuredClone(row);
    });
  }

  async findSession(
    tableName: string,
    userKey: string,
    ttlSeconds: number,
  ): Promise<SessionRecord | null> {
    assertTableName(tableName);
    return this.exec(() => {
      const row = this.getSessionTable(tableName).get(userKey);
      if (!row || !this.isLive(row, ttlSeconds, this.now())) return null;
      return structuredClone(row);
    });
  }

  async deleteSession(tableName: string, userKey: string): Promise<boolean> {
    assertTableName(tableName);
    return this.exec(() => this.getSessionTable(tableName).delete(userKey));
  }

  async deleteStale(tableName: string, ttlSeconds: number): Promise<string[]> {
    assertTableName(tableName);
    return this.exec(() => {
      const table = this.getSessionTable(tableName);
      const now = this.now();
      const removed: string[] = [];

      for (const [userKey, row] of table.entries()) {
        if (!this.isLive(row, ttlSeconds, now)) {
          table.delete(userKey);
          removed.push(userKey);
        }
      }
      return removed;
    });
  }

  async insertArchive(
    tableName: string,
    data: Omit<ArchivedSessionRecord, 'id' | 'createdAt'>,
  ): Promise<void> {
    assertTableName(tableName);
    const archiveTable = archiveTableName(tableName);
    return this.exec(() => {
      this.getArchiveTable(archiveTable).push({
        id: randomUUID(),
        userKey: data.userKey,
        orderCorrelationId: data.orderCorrelationId,
        payload: structuredClone(data.payload),
        createdAt: new Date(this.now()),
      });
    });
  }

  async findArchived(
    tableName: string,
    userKey: string,
    limit: number,
  ): Promise<ArchivedSessionRecord[]> {
    assertTableName(tableName);
    const archiveTable = archiveTableName(tableName);
    return this.exec(() => {
      const rows = this.getArchiveTable(archiveTable);
      const matches: ArchivedSessionRecord[] = [];

      // Newest first
      for (let i = rows.length - 1; i >= 0 && matches.length < limit; i--) {
        if (rows[i].userKey === userKey) {
          matches.push(structuredClone(rows[i]));
        }
      }
      return matches;
    });
  }

  async saveTemplate(
    tableName: string,
    input: SaveTemplateInput,
    maxPerUser: number,
  ): Promise<TemplateRecord | null> {
    assertTableName(tableName);
    const templateTable = templateTableName(tableName);
    return this.exec(() => {
      const rows = this.getTemplateTable(templateTable);
      const now = new Date(this.now());
      const existing = rows.find(
        (row) => row.userKey === input.userKey && row.name === input.name,
      );

      if (existing) {
        existing.fields = structuredClone(input.fields);
        existing.updatedAt = now;
        return structuredClone(existing);
      }

      const owned = rows.filter((row) => row.userKey === input.userKey);
      if (owned.length >= maxPerUser) return null;

      const created: TemplateRecord = {
        userKey: input.userKey,
        name: input.name,
        fields: structuredClone(input.fields),
        createdAt: now,
        updatedAt: now,
      };
      rows.push(created);
      return structuredClone(created);
    });
  }

  async findTemplates(
    tableName: string,
    userKey: string,
  ): Promise<TemplateRecord[]> {
    assertTableName(tableName);
    const templateTable = templateTableName(tableName);
    return this.exec(() =>
      this.getTemplateTable(templateTable)
        .filter((row) => row.userKey === userKey)
        .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
        .map((row) => structuredClone(row)),
    );
  }

  async findTemplate(
    tableName: string,
    userKey: string,
    name: string,
  ): Promise<TemplateRecord | null> {
    assertTableName(tableName);
    const templateTable = templateTableName(tableName);
    return this.exec(() => {
      const row = this.getTemplateTable(templateTable).find(
        (candidate) => candidate.userKey === userKey && candidate.name === name,
      );
      return row ? structuredClone(row) : null;
    });
  }

  async deleteTemplate(
    tableName: string,
    userKey: string,
    name: string,
  ): Promise<boolean> {
    assertTableName(tableName);
    const templateTable = templateTableName(tableName);
    return this.exec(() => {
      const rows = this.getTemplateTable(templateTable);
      const index = rows.findIndex(
        (row) => row.userKey === userKey && row.name === name,
      );
      if (index === -1) return false;
      rows.splice(index, 1);
      return true;
    });
  }

  async transaction<T>(
    cb: (adapter: ISessionDbAdapter) => Promise<T>,
  ): Promise<T> {
    if (!this.capabilities.transactions) {
      throw new TransactionUnsupportedError(InMemorySessionAdapter.name);
    }

    if (!this.queue) {
      return cb(this);
    }

    return this.queue.run(async () => {
      const txState = cloneState(this.state);
      const txAdapter = new InMemorySessionAdapter(this.options, txState, null);

      const result = await cb(txAdapter);
      this.state = txState;
      return result;
    });
  }

  /** Transaction-bound adapters run directly; the queue is already held. */
  private exec<T>(task: () => T): Promise<T> {
    if (!this.queue) {
      return Promise.resolve().then(task);
    }
    return this.queue.run(task);
  }

  private isLive(row: SessionRecord, ttlSeconds: number, now: number): boolean {
    return now - row.lastTouchedAt.getTime() <= ttlSeconds * 1000;
  }

  private getSessionTable(tableName: string): Map<string, SessionRecord> {
    const table = this.state.sessionsByTable.get(tableName);
    if (table) return table;

    const next = new Map<string, SessionRecord>();
    this.state.sessionsByTable.set(tableName, next);
    return next;
  }

  private getArchiveTable(tableName: string): ArchivedSessionRecord[] {
    const table = this.state.archiveByTable.get(tableName);
    if (table) return table;

    const next: ArchivedSessionRecord[] = [];
    this.state.archiveByTable.set(tableName, next);
    return next;
  }

  private getTemplateTable(tableName: string): TemplateRecord[] {
    const table = this.state.templatesByTable.get(tableName);
    if (table) return table;

    const next: TemplateRecord[] = [];
    this.state.templatesByTable.set(tableName, next);
    return next;
  }
}
