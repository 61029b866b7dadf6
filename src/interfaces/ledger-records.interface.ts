import type { Quote } from './collaborators.interface';
import type { ShipmentFields } from './session-records.interface';

export type PaymentStatus = 'pending' | 'paid' | 'failed' | 'expired';
export type PaymentKind = 'balance-topup' | 'order-payment';
export type PaymentMethod = 'balance' | 'invoice';
export type OrderPaymentStatus = 'unpaid' | 'paid';

export interface PaymentRecord {
  externalReference: string;
  userKey: string;
  requestedAmount: number;
  paidAmount: number | null;
  status: PaymentStatus;
  kind: PaymentKind;
  orderCorrelationId: string | null;
  createdAt: Date;
  updatedAt: Date;
}

/** Asynchronous status update delivered by a payment provider (at-least-once). */
export interface PaymentEvent {
  externalReference: string;
  status: PaymentStatus;
  /** Amount actually paid; may differ from the requested amount. */
  amount: number;
}

export type PaymentOutcome = 'applied' | 'duplicate-ignored' | 'rejected';

export interface OrderRecord {
  orderCorrelationId: string;
  userKey: string;
  fields: ShipmentFields;
  quote: Quote;
  amount: number;
  paymentStatus: OrderPaymentStatus;
  paymentMethod: PaymentMethod;
  createdAt: Date;
}
