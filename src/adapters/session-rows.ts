import { InvalidSessionRecordError } from '../errors/invalid-session-record.error';
import { isPlainObject, parseArchivePayload } from '../utils/hydrate-session';
import type {
  ArchivedSessionRecord,
  SessionRecord,
  TemplateRecord,
} from '../interfaces/session-records.interface';

export const SESSION_COLUMNS =
  'user_key, order_correlation_id, current_step, fields, created_at, last_touched_at';

export const ARCHIVE_COLUMNS =
  'id, user_key, order_correlation_id, payload, created_at';

export const TEMPLATE_COLUMNS = 'user_key, name, fields, created_at, updated_at';

export interface SessionRow {
  user_key: string;
  order_correlation_id: string;
  current_step: string;
  fields: unknown;
  created_at: Date | string;
  last_touched_at: Date | string;
}

export interface ArchiveRow {
  id: string;
  user_key: string;
  order_correlation_id: string;
  payload: unknown;
  created_at: Date | string;
}

export interface TemplateRow {
  user_key: string;
  name: string;
  fields: unknown;
  created_at: Date | string;
  updated_at: Date | string;
}

function isTimestamp(value: unknown): value is Date | string {
  return value instanceof Date || typeof value === 'string';
}

/** jsonb arrives parsed from node-postgres, as text from some drivers. */
export function parseJsonColumn(value: unknown): unknown {
  return typeof value === 'string' ? JSON.parse(value) : value;
}

/**
 * Extracts the row array from a driver result.
 * postgres-js returns the array directly, node-postgres `{ rows: [...] }`.
 */
export function extractRows(result: unknown): unknown[] {
  if (Array.isArray(result)) return result;
  if (isPlainObject(result) && Array.isArray(result.rows)) {
    return result.rows;
  }
  return [];
}

export function readSessionRow(value: unknown): SessionRow {
  if (
    !isPlainObject(value) ||
    typeof value.user_key !== 'string' ||
    typeof value.order_correlation_id !== 'string' ||
    typeof value.current_step !== 'string' ||
    !isTimestamp(value.created_at) ||
    !isTimestamp(value.last_touched_at)
  ) {
    throw new Error('Unexpected session row shape returned by the driver');
  }

  return {
    user_key: value.user_key,
    order_correlation_id: value.order_correlation_id,
    current_step: value.current_step,
    fields: value.fields,
    created_at: value.created_at,
    last_touched_at: value.last_touched_at,
  };
}

export function readArchiveRow(value: unknown): ArchiveRow {
  if (
    !isPlainObject(value) ||
    typeof value.id !== 'string' ||
    typeof value.user_key !== 'string' ||
    typeof value.order_correlation_id !== 'string' ||
    !isTimestamp(value.created_at)
  ) {
    throw new Error('Unexpected archive row shape returned by the driver');
  }

  return {
    id: value.id,
    user_key: value.user_key,
    order_correlation_id: value.order_correlation_id,
    payload: value.payload,
    created_at: value.created_at,
  };
}

export function readTemplateRow(value: unknown): TemplateRow {
  if (
    !isPlainObject(value) ||
    typeof value.user_key !== 'string' ||
    typeof value.name !== 'string' ||
    !isTimestamp(value.created_at) ||
    !isTimestamp(value.updated_at)
  ) {
    throw new Error('Unexpected template row shape returned by the driver');
  }

  return {
    user_key: value.user_key,
    name: value.name,
    fields: value.fields,
    created_at: value.created_at,
    updated_at: value.updated_at,
  };
}

export function toSessionRecord(row: SessionRow): SessionRecord {
  const fields = parseJsonColumn(row.fields);
  if (!isPlainObject(fields)) {
    throw new InvalidSessionRecordError(
      row.user_key,
      `Session for user ${row.user_key} has invalid fields payload`,
    );
  }

  return {
    userKey: row.user_key,
    orderCorrelationId: row.order_correlation_id,
    currentStep: row.current_step,
    fields,
    createdAt: new Date(row.created_at),
    lastTouchedAt: new Date(row.last_touched_at),
  };
}

export function toArchivedRecord(row: ArchiveRow): ArchivedSessionRecord {
  return {
    id: row.id,
    userKey: row.user_key,
    orderCorrelationId: row.order_correlation_id,
    payload: parseArchivePayload(row.user_key, parseJsonColumn(row.payload)),
    createdAt: new Date(row.created_at),
  };
}

export function toTemplateRecord(row: TemplateRow): TemplateRecord {
  const fields = parseJsonColumn(row.fields);
  if (!isPlainObject(fields)) {
    throw new InvalidSessionRecordError(
      row.user_key,
      `Template "${row.name}" for user ${row.user_key} has invalid fields payload`,
    );
  }

  return {
    userKey: row.user_key,
    name: row.name,
    fields,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}
