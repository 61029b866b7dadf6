import { InvalidSessionRecordError } from '../errors/invalid-session-record.error';
import { isStepId } from '../definitions/shipment-steps';
import type { Quote } from '../interfaces/collaborators.interface';
import type {
  ArchivePayload,
  Session,
  SessionRecord,
  ShipmentFields,
} from '../interfaces/session-records.interface';

const STRING_KEYS = [
  'fromName',
  'fromAddress',
  'fromCity',
  'fromState',
  'fromZip',
  'toName',
  'toAddress',
  'toCity',
  'toState',
  'toZip',
  'lastError',
  'errorAt',
] as const;

const NULLABLE_STRING_KEYS = [
  'fromAddress2',
  'fromPhone',
  'toAddress2',
  'toPhone',
] as const;

const NUMBER_KEYS = [
  'parcelWeight',
  'parcelLength',
  'parcelWidth',
  'parcelHeight',
] as const;

const STEP_KEYS = ['errorStep', 'revertedFrom', 'revertedTo'] as const;

export function isPlainObject(
  value: unknown,
): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isQuote(value: unknown): value is Quote {
  return (
    isPlainObject(value) &&
    typeof value.id === 'string' &&
    typeof value.carrier === 'string' &&
    typeof value.service === 'string' &&
    typeof value.amount === 'number' &&
    typeof value.currency === 'string' &&
    (value.estimatedDays === null || typeof value.estimatedDays === 'number')
  );
}

function cloneQuote(quote: Quote): Quote {
  return { ...quote };
}

/**
 * Serializes a typed patch into the adapter's key/value form. Undefined
 * values are dropped so they never overwrite a stored key.
 */
export function toPatchRecord(
  patch: ShipmentFields | undefined,
): Record<string, unknown> {
  const record: Record<string, unknown> = {};
  if (!patch) return record;

  for (const [key, value] of Object.entries(patch)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      record[key] = value.map(cloneQuote);
    } else if (isQuote(value)) {
      record[key] = cloneQuote(value);
    } else {
      record[key] = value;
    }
  }
  return record;
}

function invalidField(userKey: string, key: string): InvalidSessionRecordError {
  return new InvalidSessionRecordError(
    userKey,
    `Session for user ${userKey} has invalid value for field ${key}`,
  );
}

/** Unknown keys are dropped; known keys holding the wrong type are rejected. */
function readFields(
  userKey: string,
  raw: Record<string, unknown>,
): ShipmentFields {
  const fields: ShipmentFields = {};

  for (const key of STRING_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== 'string') throw invalidField(userKey, key);
    fields[key] = value;
  }

  for (const key of NULLABLE_STRING_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (value !== null && typeof value !== 'string') {
      throw invalidField(userKey, key);
    }
    fields[key] = value;
  }

  for (const key of NUMBER_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== 'number') throw invalidField(userKey, key);
    fields[key] = value;
  }

  for (const key of STEP_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (!isStepId(value)) throw invalidField(userKey, key);
    fields[key] = value;
  }

  if (raw.quotes !== undefined) {
    const quotes = raw.quotes;
    if (!Array.isArray(quotes)) throw invalidField(userKey, 'quotes');
    fields.quotes = quotes.map((quote: unknown) => {
      if (!isQuote(quote)) throw invalidField(userKey, 'quotes');
      return cloneQuote(quote);
    });
  }

  if (raw.selectedQuote !== undefined) {
    if (!isQuote(raw.selectedQuote)) {
      throw invalidField(userKey, 'selectedQuote');
    }
    fields.selectedQuote = cloneQuote(raw.selectedQuote);
  }

  if (raw.paymentMethod !== undefined) {
    const method = raw.paymentMethod;
    if (method !== 'balance' && method !== 'invoice') {
      throw invalidField(userKey, 'paymentMethod');
    }
    fields.paymentMethod = method;
  }

  return fields;
}

export function hydrateSession(record: SessionRecord): Session {
  if (!isStepId(record.currentStep)) {
    throw new InvalidSessionRecordError(
      record.userKey,
      `Session for user ${record.userKey} has invalid step ${String(record.currentStep)}`,
    );
  }

  if (!isPlainObject(record.fields)) {
    throw new InvalidSessionRecordError(
      record.userKey,
      `Session for user ${record.userKey} has invalid fields payload`,
    );
  }

  return {
    userKey: record.userKey,
    orderCorrelationId: record.orderCorrelationId,
    currentStep: record.currentStep,
    fields: readFields(record.userKey, record.fields),
    createdAt: new Date(record.createdAt),
    lastTouchedAt: new Date(record.lastTouchedAt),
  };
}

/** Validates an archive payload read back from a JSON column. */
export function parseArchivePayload(
  userKey: string,
  value: unknown,
): ArchivePayload {
  if (
    !isPlainObject(value) ||
    typeof value.orderCorrelationId !== 'string' ||
    typeof value.amount !== 'number' ||
    (value.paymentMethod !== 'balance' && value.paymentMethod !== 'invoice') ||
    !isPlainObject(value.fields)
  ) {
    throw new InvalidSessionRecordError(
      userKey,
      `Archived session for user ${userKey} has invalid payload`,
    );
  }

  return {
    orderCorrelationId: value.orderCorrelationId,
    paymentMethod: value.paymentMethod,
    amount: value.amount,
    fields: readFields(userKey, value.fields),
  };
}

/** Validates a fields snapshot read back from a JSON column. */
export function parseShipmentFields(
  userKey: string,
  value: unknown,
): ShipmentFields {
  if (!isPlainObject(value)) {
    throw new InvalidSessionRecordError(
      userKey,
      `Stored fields for user ${userKey} are not an object`,
    );
  }
  return readFields(userKey, value);
}
