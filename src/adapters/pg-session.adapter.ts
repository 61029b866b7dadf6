import type { Pool, PoolClient } from 'pg';
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
import {
  ARCHIVE_COLUMNS,
  SESSION_COLUMNS,
  TEMPLATE_COLUMNS,
  toArchivedRecord,
  toSessionRecord,
  toTemplateRecord,
  type ArchiveRow,
  type SessionRow,
  type TemplateRow,
} from './session-rows';

interface PgUserKeyRow {
  user_key: string;
}

type PgQueryable = Pick<Pool, 'query'> | Pick<PoolClient, 'query'>;

function staleCondition(tableName: string, ttlParam: string): string {
  return `${tableName}.last_touched_at < CURRENT_TIMESTAMP - make_interval(secs => ${ttlParam}::double precision)`;
}

export class PgSessionAdapter implements ISessionDbAdapter {
  readonly capabilities: AdapterCapabilities = { transactions: true };

  constructor(
    private readonly pool: Pool,
    private readonly client?: PoolClient,
  ) {}

  /**
   * One statement: a live row only gets its touch time refreshed, a stale
   * row is reset from the input, a missing row is inserted.
   */
  async upsertSession(
    tableName: string,
    input: UpsertSessionInput,
    ttlSeconds: number,
  ): Promise<SessionRecord> {
    assertTableName(tableName);
    const stale = staleCondition(tableName, '$5');

    const result = await this.getConn().query<SessionRow>(
      `INSERT INTO ${tableName} (${SESSION_COLUMNS})
       VALUES ($1, $2, $3, $4::jsonb, CURRENT_TIMESTAMP, CURRENT_TIMESTAMP)
       ON CONFLICT (user_key) DO UPDATE SET
         order_correlation_id = CASE WHEN ${stale} THEN EXCLUDED.order_correlation_id ELSE ${tableName}.order_correlation_id END,
         current_step = CASE WHEN ${stale} THEN EXCLUDED.current_step ELSE ${tableName}.current_step END,
         fields = CASE WHEN ${stale} THEN EXCLUDED.fields ELSE ${tableName}.fields END,
         created_at = CASE WHEN ${stale} THEN EXCLUDED.created_at ELSE ${tableName}.created_at END,
         last_touched_at = CURRENT_TIMESTAMP
       RETURNING ${SESSION_COLUMNS}`,
      [
        input.userKey,
        input.orderCorrelationId,
        input.initialStep,
        JSON.stringify(input.initialFields),
        ttlSeconds,
      ],
    );

    return toSessionRecord(result.rows[0]);
  }

  /** `fields || patch` merges top-level keys, so disjoint patches never clobber each other. */
  async patchSession(
    tableName: string,
    userKey: string,
    update: PatchSessionInput,
    ttlSeconds: number,
  ): Promise<SessionRecord | null> {
    assertTableName(tableName);

    const result = await this.getConn().query<SessionRow>(
      `UPDATE ${tableName} SET
         fields = fields || $2::jsonb,
         current_step = COALESCE($3::text, current_step),
         last_touched_at = CURRENT_TIMESTAMP
       WHERE user_key = $1 AND NOT (${staleCondition(tableName, '$4')})
       RETURNING ${SESSION_COLUMNS}`,
      [userKey, JSON.stringify(update.patch), update.step ?? null, ttlSeconds],
    );

    if (result.rows.length === 0) return null;
    return toSessionRecord(result.rows[0]);
  }

  async findSession(
    tableName: string,
    userKey: string,
    ttlSeconds: number,
  ): Promise<SessionRecord | null> {
    assertTableName(tableName);

    const result = await this.getConn().query<SessionRow>(
      `SELECT ${SESSION_COLUMNS}
       FROM ${tableName}
       WHERE user_key = $1 AND NOT (${staleCondition(tableName, '$2')})`,
      [userKey, ttlSeconds],
    );

    if (result.rows.length === 0) return null;
    return toSessionRecord(result.rows[0]);
  }

  async deleteSession(tableName: string, userKey: string): Promise<boolean> {
    assertTableName(tableName);

    const result = await this.getConn().query(
      `DELETE FROM ${tableName} WHERE user_key = $1`,
      [userKey],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async deleteStale(tableName: string, ttlSeconds: number): Promise<string[]> {
    assertTableName(tableName);

    const result = await this.getConn().query<PgUserKeyRow>(
      `DELETE FROM ${tableName}
       WHERE ${staleCondition(tableName, '$1')}
       RETURNING user_key`,
      [ttlSeconds],
    );
    return result.rows.map((row) => row.user_key);
  }

  async insertArchive(
    tableName: string,
    data: Omit<ArchivedSessionRecord, 'id' | 'createdAt'>,
  ): Promise<void> {
    assertTableName(tableName);
    const archiveTable = archiveTableName(tableName);

    await this.getConn().query(
      `INSERT INTO ${archiveTable} (user_key, order_correlation_id, payload)
       VALUES ($1, $2, $3::jsonb)`,
      [data.userKey, data.orderCorrelationId, JSON.stringify(data.payload)],
    );
  }

  async findArchived(
    tableName: string,
    userKey: string,
    limit: number,
  ): Promise<ArchivedSessionRecord[]> {
    assertTableName(tableName);
    const archiveTable = archiveTableName(tableName);

    const result = await this.getConn().query<ArchiveRow>(
      `SELECT ${ARCHIVE_COLUMNS}
       FROM ${archiveTable}
       WHERE user_key = $1
       ORDER BY created_at DESC
       LIMIT $2`,
      [userKey, limit],
    );
    return result.rows.map((row) => toArchivedRecord(row));
  }

  /**
   * The limit check and the write are one statement. An existing name always
   * passes the check and is updated through the conflict clause.
   */
  async saveTemplate(
    tableName: string,
    input: SaveTemplateInput,
    maxPerUser: number,
  ): Promise<TemplateRecord | null> {
    assertTableName(tableName);
    const templateTable = templateTableName(tableName);

    const result = await this.getConn().query<TemplateRow>(
      `INSERT INTO ${templateTable} (${TEMPLATE_COLUMNS})
       SELECT $1::text, $2::text, $3::jsonb, CURRENT_TIMESTAMP, CURRENT_TIMESTAMP
       WHERE (SELECT count(*) FROM ${templateTable} WHERE user_key = $1) < $4
          OR EXISTS (SELECT 1 FROM ${templateTable} WHERE user_key = $1 AND name = $2)
       ON CONFLICT (user_key, name) DO UPDATE SET
         fields = EXCLUDED.fields,
         updated_at = CURRENT_TIMESTAMP
       RETURNING ${TEMPLATE_COLUMNS}`,
      [input.userKey, input.name, JSON.stringify(input.fields), maxPerUser],
    );

    if (result.rows.length === 0) return null;
    return toTemplateRecord(result.rows[0]);
  }

  async findTemplates(
    tableName: string,
    userKey: string,
  ): Promise<TemplateRecord[]> {
    assertTableName(tableName);
    const templateTable = templateTableName(tableName);

    const result = await this.getConn().query<TemplateRow>(
      `SELECT ${TEMPLATE_COLUMNS}
       FROM ${templateTable}
       WHERE user_key = $1
       ORDER BY name`,
      [userKey],
    );
    return result.rows.map((row) => toTemplateRecord(row));
  }

  async findTemplate(
    tableName: string,
    userKey: string,
    name: string,
  ): Promise<TemplateRecord | null> {
    assertTableName(tableName);
    const templateTable = templateTableName(tableName);

    const result = await this.getConn().query<TemplateRow>(
      `SELECT ${TEMPLATE_COLUMNS}
       FROM ${templateTable}
       WHERE user_key = $1 AND name = $2`,
      [userKey, name],
    );

    if (result.rows.length === 0) return null;
    return toTemplateRecord(result.rows[0]);
  }

  async deleteTemplate(
    tableName: string,
    userKey: string,
    name: string,
  ): Promise<boolean> {
    assertTableName(tableName);
    const templateTable = templateTableName(tableName);

    const result = await this.getConn().query(
      `DELETE FROM ${templateTable} WHERE user_key = $1 AND name = $2`,
      [userKey, name],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async transaction<T>(
    cb: (adapter: ISessionDbAdapter) => Promise<T>,
  ): Promise<T> {
    if (this.client) {
      return cb(this);
    }

    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const txAdapter = new PgSessionAdapter(this.pool, client);
      const result = await cb(txAdapter);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  private getConn(): PgQueryable {
    return this.client ?? this.pool;
  }
}
