import { sql, type SQL } from 'drizzle-orm';
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
import { isPlainObject } from '../utils/hydrate-session';
import {
  archiveTableName,
  assertTableName,
  templateTableName,
} from '../utils/assert-table-name';
import {
  ARCHIVE_COLUMNS,
  SESSION_COLUMNS,
  TEMPLATE_COLUMNS,
  extractRows,
  readArchiveRow,
  readSessionRow,
  readTemplateRow,
  toArchivedRecord,
  toSessionRecord,
  toTemplateRecord,
} from './session-rows';

/**
 * The slice of a Drizzle Postgres database this adapter needs. Satisfied by
 * `drizzle(pool)` from drizzle-orm/node-postgres and drizzle-orm/postgres-js.
 */
export interface DrizzleExecutor {
  execute(query: SQL): PromiseLike<unknown>;
  transaction<T>(cb: (tx: DrizzleExecutor) => Promise<T>): Promise<T>;
}

function staleCondition(tableName: string, ttlSeconds: number): SQL {
  return sql`${sql.raw(tableName)}.last_touched_at < CURRENT_TIMESTAMP - make_interval(secs => ${ttlSeconds}::double precision)`;
}

export class DrizzleSessionAdapter implements ISessionDbAdapter {
  readonly capabilities: AdapterCapabilities = { transactions: true };

  constructor(private readonly db: DrizzleExecutor) {}

  async upsertSession(
    tableName: string,
    input: UpsertSessionInput,
    ttlSeconds: number,
  ): Promise<SessionRecord> {
    assertTableName(tableName);
    const table = sql.raw(tableName);
    const stale = staleCondition(tableName, ttlSeconds);
    const fieldsJson = JSON.stringify(input.initialFields);

    const result = await this.db.execute(
      sql`INSERT INTO ${table} (${sql.raw(SESSION_COLUMNS)})
          VALUES (${input.userKey}, ${input.orderCorrelationId}, ${input.initialStep}, ${fieldsJson}::jsonb, CURRENT_TIMESTAMP, CURRENT_TIMESTAMP)
          ON CONFLICT (user_key) DO UPDATE SET
            order_correlation_id = CASE WHEN ${stale} THEN EXCLUDED.order_correlation_id ELSE ${table}.order_correlation_id END,
            current_step = CASE WHEN ${stale} THEN EXCLUDED.current_step ELSE ${table}.current_step END,
            fields = CASE WHEN ${stale} THEN EXCLUDED.fields ELSE ${table}.fields END,
            created_at = CASE WHEN ${stale} THEN EXCLUDED.created_at ELSE ${table}.created_at END,
            last_touched_at = CURRENT_TIMESTAMP
          RETURNING ${sql.raw(SESSION_COLUMNS)}`,
    );

    const rows = extractRows(result);
    if (rows.length === 0) {
      throw new Error(`Upsert into ${tableName} returned no row`);
    }
    return toSessionRecord(readSessionRow(rows[0]));
  }

  async patchSession(
    tableName: string,
    userKey: string,
    update: PatchSessionInput,
    ttlSeconds: number,
  ): Promise<SessionRecord | null> {
    assertTableName(tableName);
    const patchJson = JSON.stringify(update.patch);
    const step = update.step ?? null;

    const result = await this.db.execute(
      sql`UPDATE ${sql.raw(tableName)} SET
            fields = fields || ${patchJson}::jsonb,
            current_step = COALESCE(${step}::text, current_step),
            last_touched_at = CURRENT_TIMESTAMP
          WHERE user_key = ${userKey} AND NOT (${staleCondition(tableName, ttlSeconds)})
          RETURNING ${sql.raw(SESSION_COLUMNS)}`,
    );

    const rows = extractRows(result);
    if (rows.length === 0) return null;
    return toSessionRecord(readSessionRow(rows[0]));
  }

  async findSession(
    tableName: string,
    userKey: string,
    ttlSeconds: number,
  ): Promise<SessionRecord | null> {
    assertTableName(tableName);

    const result = await this.db.execute(
      sql`SELECT ${sql.raw(SESSION_COLUMNS)} FROM ${sql.raw(tableName)}
          WHERE user_key = ${userKey} AND NOT (${staleCondition(tableName, ttlSeconds)})`,
    );

    const rows = extractRows(result);
    if (rows.length === 0) return null;
    return toSessionRecord(readSessionRow(rows[0]));
  }

  async deleteSession(tableName: string, userKey: string): Promise<boolean> {
    assertTableName(tableName);

    const result = await this.db.execute(
      sql`DELETE FROM ${sql.raw(tableName)} WHERE user_key = ${userKey} RETURNING user_key`,
    );
    return extractRows(result).length > 0;
  }

  async deleteStale(tableName: string, ttlSeconds: number): Promise<string[]> {
    assertTableName(tableName);

    const result = await this.db.execute(
      sql`DELETE FROM ${sql.raw(tableName)}
          WHERE ${staleCondition(tableName, ttlSeconds)}
          RETURNING user_key`,
    );

    const userKeys: string[] = [];
    for (const row of extractRows(result)) {
      if (isPlainObject(row) && typeof row.user_key === 'string') {
        userKeys.push(row.user_key);
      }
    }
    return userKeys;
  }

  async insertArchive(
    tableName: string,
    data: Omit<ArchivedSessionRecord, 'id' | 'createdAt'>,
  ): Promise<void> {
    assertTableName(tableName);
    const archiveTable = archiveTableName(tableName);
    const payloadJson = JSON.stringify(data.payload);

    await this.db.execute(
      sql`INSERT INTO ${sql.raw(archiveTable)} (user_key, order_correlation_id, payload)
          VALUES (${data.userKey}, ${data.orderCorrelationId}, ${payloadJson}::jsonb)`,
    );
  }

  async findArchived(
    tableName: string,
    userKey: string,
    limit: number,
  ): Promise<ArchivedSessionRecord[]> {
    assertTableName(tableName);
    const archiveTable = archiveTableName(tableName);

    const result = await this.db.execute(
      sql`SELECT ${sql.raw(ARCHIVE_COLUMNS)} FROM ${sql.raw(archiveTable)}
          WHERE user_key = ${userKey}
          ORDER BY created_at DESC
          LIMIT ${limit}`,
    );

    return extractRows(result).map((row) =>
      toArchivedRecord(readArchiveRow(row)),
    );
  }

  async saveTemplate(
    tableName: string,
    input: SaveTemplateInput,
    maxPerUser: number,
  ): Promise<TemplateRecord | null> {
    assertTableName(tableName);
    const table = sql.raw(templateTableName(tableName));
    const fieldsJson = JSON.stringify(input.fields);

    const result = await this.db.execute(
      sql`INSERT INTO ${table} (${sql.raw(TEMPLATE_COLUMNS)})
          SELECT ${input.userKey}::text, ${input.name}::text, ${fieldsJson}::jsonb, CURRENT_TIMESTAMP, CURRENT_TIMESTAMP
          WHERE (SELECT count(*) FROM ${table} WHERE user_key = ${input.userKey}) < ${maxPerUser}
             OR EXISTS (SELECT 1 FROM ${table} WHERE user_key = ${input.userKey} AND name = ${input.name})
          ON CONFLICT (user_key, name) DO UPDATE SET
            fields = EXCLUDED.fields,
            updated_at = CURRENT_TIMESTAMP
          RETURNING ${sql.raw(TEMPLATE_COLUMNS)}`,
    );

    const rows = extractRows(result);
    if (rows.length === 0) return null;
    return toTemplateRecord(readTemplateRow(rows[0]));
  }

  async findTemplates(
    tableName: string,
    userKey: string,
  ): Promise<TemplateRecord[]> {
    assertTableName(tableName);

    const result = await this.db.execute(
      sql`SELECT ${sql.raw(TEMPLATE_COLUMNS)} FROM ${sql.raw(templateTableName(tableName))}
          WHERE user_key = ${userKey}
          ORDER BY name`,
    );

    return extractRows(result).map((row) =>
      toTemplateRecord(readTemplateRow(row)),
    );
  }

  async findTemplate(
    tableName: string,
    userKey: string,
    name: string,
  ): Promise<TemplateRecord | null> {
    assertTableName(tableName);

    const result = await this.db.execute(
      sql`SELECT ${sql.raw(TEMPLATE_COLUMNS)} FROM ${sql.raw(templateTableName(tableName))}
          WHERE user_key = ${userKey} AND name = ${name}`,
    );

    const rows = extractRows(result);
    if (rows.length === 0) return null;
    return toTemplateRecord(readTemplateRow(rows[0]));
  }

  async deleteTemplate(
    tableName: string,
    userKey: string,
    name: string,
  ): Promise<boolean> {
    assertTableName(tableName);

    const result = await this.db.execute(
      sql`DELETE FROM ${sql.raw(templateTableName(tableName))}
          WHERE user_key = ${userKey} AND name = ${name}
          RETURNING user_key`,
    );
    return extractRows(result).length > 0;
  }

  async transaction<T>(
    cb: (adapter: ISessionDbAdapter) => Promise<T>,
  ): Promise<T> {
    return this.db.transaction(async (tx) => cb(new DrizzleSessionAdapter(tx)));
  }
}
