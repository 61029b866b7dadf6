import type { StepId } from '../definitions/shipment-steps';
import type { Quote } from './collaborators.interface';
import type { PaymentMethod } from './ledger-records.interface';

/**
 * Fields collected while a session walks the step graph.
 * `null` marks an optional field the user explicitly skipped.
 */
export interface ShipmentFields {
  fromName?: string;
  fromAddress?: string;
  fromAddress2?: string | null;
  fromCity?: string;
  fromState?: string;
  fromZip?: string;
  fromPhone?: string | null;
  toName?: string;
  toAddress?: string;
  toAddress2?: string | null;
  toCity?: string;
  toState?: string;
  toZip?: string;
  toPhone?: string | null;
  parcelWeight?: number;
  parcelLength?: number;
  parcelWidth?: number;
  parcelHeight?: number;
  quotes?: Quote[];
  selectedQuote?: Quote;
  paymentMethod?: PaymentMethod;
  lastError?: string;
  errorStep?: StepId;
  errorAt?: string;
  revertedFrom?: StepId;
  revertedTo?: StepId;
}

export type ShipmentFieldKey = keyof ShipmentFields;

/** Sender and recipient fields; a template stores exactly these. */
export type TemplateFieldKey = Extract<
  ShipmentFieldKey,
  `from${string}` | `to${string}`
>;

export type TemplateFields = Pick<ShipmentFields, TemplateFieldKey>;

export interface Session {
  userKey: string;
  orderCorrelationId: string;
  currentStep: StepId;
  fields: ShipmentFields;
  createdAt: Date;
  lastTouchedAt: Date;
}

/** Row shape returned by session adapters, before validation. */
export interface SessionRecord {
  userKey: string;
  orderCorrelationId: string;
  currentStep: string;
  fields: Record<string, unknown>;
  createdAt: Date;
  lastTouchedAt: Date;
}

export interface SessionUpdate {
  step?: StepId;
  patch?: ShipmentFields;
}

export interface ArchivePayload {
  orderCorrelationId: string;
  paymentMethod: PaymentMethod;
  amount: number;
  fields: ShipmentFields;
}

export interface ArchivedSessionRecord {
  id: string;
  userKey: string;
  orderCorrelationId: string;
  payload: ArchivePayload;
  createdAt: Date;
}

export interface ShipmentTemplate {
  userKey: string;
  name: string;
  fields: TemplateFields;
  createdAt: Date;
  updatedAt: Date;
}

/** Row shape returned by session adapters for templates, before validation. */
export interface TemplateRecord {
  userKey: string;
  name: string;
  fields: Record<string, unknown>;
  createdAt: Date;
  updatedAt: Date;
}
