import type {
  ArchivedSessionRecord,
  SessionRecord,
  TemplateRecord,
} from './session-records.interface';

export interface AdapterCapabilities {
  /** True when the backing store can run multi-row/multi-document transactions. */
  transactions: boolean;
}

export interface UpsertSessionInput {
  userKey: string;
  orderCorrelationId: string;
  initialStep: string;
  initialFields: Record<string, unknown>;
}

export interface PatchSessionInput {
  step?: string;
  /** Each key is written independently; keys absent from the patch are untouched. */
  patch: Record<string, unknown>;
}

export interface SaveTemplateInput {
  userKey: string;
  name: string;
  fields: Record<string, unknown>;
}

export interface ISessionDbAdapter {
  readonly capabilities: AdapterCapabilities;

  /**
   * Atomic "update or insert" keyed by user_key.
   * An existing live row only gets its last_touched_at refreshed. A row older
   * than the TTL window is replaced by a fresh one built from the input.
   */
  upsertSession(
    tableName: string,
    input: UpsertSessionInput,
    ttlSeconds: number,
  ): Promise<SessionRecord>;

  /**
   * Apply a field-level patch and optional step change to a live row.
   * Returns the post-update row, or null when no live row exists.
   */
  patchSession(
    tableName: string,
    userKey: string,
    update: PatchSessionInput,
    ttlSeconds: number,
  ): Promise<SessionRecord | null>;

  /** Read a live row. Rows past the TTL window are treated as absent. */
  findSession(
    tableName: string,
    userKey: string,
    ttlSeconds: number,
  ): Promise<SessionRecord | null>;

  deleteSession(tableName: string, userKey: string): Promise<boolean>;

  /** Delete every row past the TTL window and return their user keys. */
  deleteStale(tableName: string, ttlSeconds: number): Promise<string[]>;

  insertArchive(
    tableName: string,
    data: Omit<ArchivedSessionRecord, 'id' | 'createdAt'>,
  ): Promise<void>;

  findArchived(
    tableName: string,
    userKey: string,
    limit: number,
  ): Promise<ArchivedSessionRecord[]>;

  /**
   * Insert or replace the user's template with this name.
   * Returns null, writing nothing, when the name is new and the user already
   * holds `maxPerUser` templates.
   */
  saveTemplate(
    tableName: string,
    input: SaveTemplateInput,
    maxPerUser: number,
  ): Promise<TemplateRecord | null>;

  /** Ordered by name. */
  findTemplates(tableName: string, userKey: string): Promise<TemplateRecord[]>;

  findTemplate(
    tableName: string,
    userKey: string,
    name: string,
  ): Promise<TemplateRecord | null>;

  deleteTemplate(
    tableName: string,
    userKey: string,
    name: string,
  ): Promise<boolean>;

  /**
   * Execute a callback within a database transaction.
   * Throws TransactionUnsupportedError when capabilities.transactions is false.
   */
  transaction<T>(cb: (adapter: ISessionDbAdapter) => Promise<T>): Promise<T>;
}
