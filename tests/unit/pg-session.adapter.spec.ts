import { PgSessionAdapter } from '../../src/adapters/pg-session.adapter';
import { InvalidSessionRecordError } from '../../src/errors/invalid-session-record.error';
import type { ArchivePayload } from '../../src/interfaces/session-records.interface';
import { createMockPool, createQueryResult } from '../pg-mock';

const TABLE = 'shipment_sessions';

const sessionRow = {
  user_key: 'u1',
  order_correlation_id: 'ORD-1',
  current_step: 'FROM_NAME',
  fields: { fromName: 'Ann' },
  created_at: '2024-01-01T00:00:00.000Z',
  last_touched_at: '2024-01-01T00:05:00.000Z',
};

const archivePayload: ArchivePayload = {
  orderCorrelationId: 'ORD-1',
  paymentMethod: 'balance',
  amount: 8.25,
  fields: { toZip: '90001' },
};

describe('PgSessionAdapter', () => {
  it('should reject unsafe table names before querying', async () => {
    const { pool, query } = createMockPool();
    const adapter = new PgSessionAdapter(pool);

    await expect(
      adapter.findSession('sessions; DROP TABLE x', 'u1', 900),
    ).rejects.toThrow('Invalid table name');
    expect(query).not.toHaveBeenCalled();
  });

  describe('upsertSession', () => {
    it('should upsert in one statement with a stale-row reset', async () => {
      const { pool, query } = createMockPool();
      query.mockResolvedValueOnce(createQueryResult([sessionRow]));
      const adapter = new PgSessionAdapter(pool);

      const record = await adapter.upsertSession(
        TABLE,
        {
          userKey: 'u1',
          orderCorrelationId: 'ORD-2',
          initialStep: 'START',
          initialFields: {},
        },
        900,
      );

      expect(record).toEqual({
        userKey: 'u1',
        orderCorrelationId: 'ORD-1',
        currentStep: 'FROM_NAME',
        fields: { fromName: 'Ann' },
        createdAt: new Date('2024-01-01T00:00:00.000Z'),
        lastTouchedAt: new Date('2024-01-01T00:05:00.000Z'),
      });

      const [sql, params] = query.mock.calls[0];
      expect(sql).toContain('INSERT INTO shipment_sessions');
      expect(sql).toContain('ON CONFLICT (user_key) DO UPDATE SET');
      expect(sql).toContain(
        'CASE WHEN shipment_sessions.last_touched_at < CURRENT_TIMESTAMP - make_interval(secs => $5::double precision) THEN EXCLUDED.order_correlation_id',
      );
      expect(params).toEqual(['u1', 'ORD-2', 'START', '{}', 900]);
    });
  });

  describe('patchSession', () => {
    it('should merge the patch at the store and pass a null step through', async () => {
      const { pool, query } = createMockPool();
      query.mockResolvedValueOnce(createQueryResult([sessionRow]));
      const adapter = new PgSessionAdapter(pool);

      await adapter.patchSession(TABLE, 'u1', { patch: { fromName: 'Ann' } }, 900);

      const [sql, params] = query.mock.calls[0];
      expect(sql).toContain('fields = fields || $2::jsonb');
      expect(sql).toContain('current_step = COALESCE($3::text, current_step)');
      expect(sql).toContain(
        'WHERE user_key = $1 AND NOT (shipment_sessions.last_touched_at < CURRENT_TIMESTAMP - make_interval(secs => $4::double precision))',
      );
      expect(params).toEqual(['u1', '{"fromName":"Ann"}', null, 900]);
    });

    it('should return null when no live row matched', async () => {
      const { pool } = createMockPool();
      const adapter = new PgSessionAdapter(pool);

      expect(
        await adapter.patchSession(TABLE, 'u1', { step: 'TO_NAME', patch: {} }, 900),
      ).toBeNull();
    });

    it('should parse fields delivered as text', async () => {
      const { pool, query } = createMockPool();
      query.mockResolvedValueOnce(
        createQueryResult([{ ...sessionRow, fields: '{"toName":"Bob"}' }]),
      );
      const adapter = new PgSessionAdapter(pool);

      const record = await adapter.patchSession(
        TABLE,
        'u1',
        { step: 'TO_ADDRESS', patch: { toName: 'Bob' } },
        900,
      );
      expect(record?.fields).toEqual({ toName: 'Bob' });
      expect(query.mock.calls[0][1]).toEqual([
        'u1',
        '{"toName":"Bob"}',
        'TO_ADDRESS',
        900,
      ]);
    });
  });

  describe('findSession', () => {
    it('should filter stale rows in SQL', async () => {
      const { pool, query } = createMockPool();
      const adapter = new PgSessionAdapter(pool);

      expect(await adapter.findSession(TABLE, 'u1', 900)).toBeNull();
      const [sql, params] = query.mock.calls[0];
      expect(sql).toContain('make_interval(secs => $2::double precision)');
      expect(params).toEqual(['u1', 900]);
    });

    it('should reject a non-object fields column', async () => {
      const { pool, query } = createMockPool();
      query.mockResolvedValueOnce(
        createQueryResult([{ ...sessionRow, fields: '[1]' }]),
      );
      const adapter = new PgSessionAdapter(pool);

      const error = await adapter.findSession(TABLE, 'u1', 900).then(
        () => null,
        (reason: unknown) => reason,
      );
      expect(error).toBeInstanceOf(InvalidSessionRecordError);
      expect(error).toMatchObject({
        message: 'Session for user u1 has invalid fields payload',
      });
    });
  });

  describe('deleteSession / deleteStale', () => {
    it('should report deletion from rowCount', async () => {
      const { pool, query } = createMockPool();
      query
        .mockResolvedValueOnce(createQueryResult([], 1))
        .mockResolvedValueOnce(createQueryResult([], 0));
      const adapter = new PgSessionAdapter(pool);

      expect(await adapter.deleteSession(TABLE, 'u1')).toBe(true);
      expect(await adapter.deleteSession(TABLE, 'u1')).toBe(false);
    });

    it('should return the deleted user keys', async () => {
      const { pool, query } = createMockPool();
      query.mockResolvedValueOnce(
        createQueryResult([{ user_key: 'a' }, { user_key: 'b' }]),
      );
      const adapter = new PgSessionAdapter(pool);

      expect(await adapter.deleteStale(TABLE, 900)).toEqual(['a', 'b']);
      const [sql, params] = query.mock.calls[0];
      expect(sql).toContain('RETURNING user_key');
      expect(params).toEqual([900]);
    });
  });

  describe('archive', () => {
    it('should write to the archive table', async () => {
      const { pool, query } = createMockPool();
      const adapter = new PgSessionAdapter(pool);

      await adapter.insertArchive(TABLE, {
        userKey: 'u1',
        orderCorrelationId: 'ORD-1',
        payload: archivePayload,
      });

      const [sql, params] = query.mock.calls[0];
      expect(sql).toContain('INSERT INTO shipment_sessions_archive');
      expect(params).toEqual(['u1', 'ORD-1', JSON.stringify(archivePayload)]);
    });

    it('should read archived rows newest first', async () => {
      const { pool, query } = createMockPool();
      query.mockResolvedValueOnce(
        createQueryResult([
          {
            id: 'a-1',
            user_key: 'u1',
            order_correlation_id: 'ORD-1',
            payload: archivePayload,
            created_at: '2024-01-02T00:00:00.000Z',
          },
        ]),
      );
      const adapter = new PgSessionAdapter(pool);

      expect(await adapter.findArchived(TABLE, 'u1', 5)).toEqual([
        {
          id: 'a-1',
          userKey: 'u1',
          orderCorrelationId: 'ORD-1',
          payload: archivePayload,
          createdAt: new Date('2024-01-02T00:00:00.000Z'),
        },
      ]);
      const [sql, params] = query.mock.calls[0];
      expect(sql).toContain('ORDER BY created_at DESC');
      expect(params).toEqual(['u1', 5]);
    });

    it('should reject a malformed archive payload', async () => {
      const { pool, query } = createMockPool();
      query.mockResolvedValueOnce(
        createQueryResult([
          {
            id: 'a-1',
            user_key: 'u1',
            order_correlation_id: 'ORD-1',
            payload: { amount: 'lots' },
            created_at: '2024-01-02T00:00:00.000Z',
          },
        ]),
      );
      const adapter = new PgSessionAdapter(pool);

      await expect(adapter.findArchived(TABLE, 'u1', 5)).rejects.toThrow(
        'Archived session for user u1 has invalid payload',
      );
    });
  });

  describe('templates', () => {
    const templateRow = {
      user_key: 'u1',
      name: 'Home',
      fields: { fromZip: '10001' },
      created_at: '2024-01-01T00:00:00.000Z',
      updated_at: '2024-01-03T00:00:00.000Z',
    };

    it('should check the limit and upsert in one statement', async () => {
      const { pool, query } = createMockPool();
      query.mockResolvedValueOnce(createQueryResult([templateRow]));
      const adapter = new PgSessionAdapter(pool);

      const record = await adapter.saveTemplate(
        TABLE,
        { userKey: 'u1', name: 'Home', fields: { fromZip: '10001' } },
        10,
      );

      expect(record).toEqual({
        userKey: 'u1',
        name: 'Home',
        fields: { fromZip: '10001' },
        createdAt: new Date('2024-01-01T00:00:00.000Z'),
        updatedAt: new Date('2024-01-03T00:00:00.000Z'),
      });
      expect(query).toHaveBeenCalledTimes(1);
      const [sql, params] = query.mock.calls[0];
      expect(sql).toContain('INSERT INTO shipment_sessions_templates');
      expect(sql).toContain('ON CONFLICT (user_key, name) DO UPDATE');
      expect(params).toEqual(['u1', 'Home', '{"fromZip":"10001"}', 10]);
    });

    it('should return null when the limit refused the insert', async () => {
      const { pool } = createMockPool();
      const adapter = new PgSessionAdapter(pool);

      expect(
        await adapter.saveTemplate(
          TABLE,
          { userKey: 'u1', name: 'Gym', fields: {} },
          10,
        ),
      ).toBeNull();
    });

    it('should list templates ordered by name', async () => {
      const { pool, query } = createMockPool();
      query.mockResolvedValueOnce(createQueryResult([templateRow]));
      const adapter = new PgSessionAdapter(pool);

      const templates = await adapter.findTemplates(TABLE, 'u1');

      expect(templates.map((template) => template.name)).toEqual(['Home']);
      const [sql, params] = query.mock.calls[0];
      expect(sql).toContain('ORDER BY name');
      expect(params).toEqual(['u1']);
    });

    it('should delete by user and name', async () => {
      const { pool, query } = createMockPool();
      query.mockResolvedValueOnce(createQueryResult([], 1));
      const adapter = new PgSessionAdapter(pool);

      expect(await adapter.deleteTemplate(TABLE, 'u1', 'Home')).toBe(true);
      expect(query.mock.calls[0]).toEqual([
        'DELETE FROM shipment_sessions_templates WHERE user_key = $1 AND name = $2',
        ['u1', 'Home'],
      ]);
    });
  });

  describe('transaction', () => {
    it('should run the callback on one client between BEGIN and COMMIT', async () => {
      const { pool, query, clientQuery, release } = createMockPool();
      const adapter = new PgSessionAdapter(pool);

      await adapter.transaction(async (tx) => {
        await tx.deleteSession(TABLE, 'u1');
      });

      expect(clientQuery.mock.calls.map(([sql]) => sql)).toEqual([
        'BEGIN',
        'DELETE FROM shipment_sessions WHERE user_key = $1',
        'COMMIT',
      ]);
      expect(query).not.toHaveBeenCalled();
      expect(release).toHaveBeenCalledTimes(1);
    });

    it('should roll back and rethrow on error', async () => {
      const { pool, clientQuery, release } = createMockPool();
      const adapter = new PgSessionAdapter(pool);

      await expect(
        adapter.transaction(async () => {
          throw new Error('boom');
        }),
      ).rejects.toThrow('boom');

      expect(clientQuery.mock.calls.map(([sql]) => sql)).toEqual([
        'BEGIN',
        'ROLLBACK',
      ]);
      expect(release).toHaveBeenCalledTimes(1);
    });

    it('should reuse the client for nested transactions', async () => {
      const { pool, connect } = createMockPool();
      const adapter = new PgSessionAdapter(pool);

      await adapter.transaction(async (tx) =>
        tx.transaction(async (inner) => {
          expect(inner).toBe(tx);
        }),
      );
      expect(connect).toHaveBeenCalledTimes(1);
    });
  });
});
