import type { PaymentKind } from './ledger-records.interface';

/** Shipment-defining characteristics. Used for rate lookups and cache fingerprints. */
export interface ShipmentDescriptor {
  fromZip: string;
  toZip: string;
  /** Pounds */
  weight: number;
  /** Inches */
  length: number;
  width: number;
  height: number;
}

export interface Quote {
  id: string;
  carrier: string;
  service: string;
  amount: number;
  currency: string;
  estimatedDays: number | null;
}

/** Raw quote as returned by a rate provider, before normalization. */
export interface RawQuote {
  id?: string;
  carrier: string;
  service: string;
  amount: number | string;
  currency?: string;
  estimatedDays?: number | null;
}

export interface RateProvider {
  fetchQuotes(descriptor: ShipmentDescriptor): Promise<RawQuote[]>;
}

export interface CreateInvoiceInput {
  userKey: string;
  amount: number;
  kind: PaymentKind;
  orderCorrelationId: string | null;
}

export interface Invoice {
  externalReference: string;
  paymentUrl: string;
}

export interface PaymentProvider {
  createInvoice(input: CreateInvoiceInput): Promise<Invoice>;
}

export interface CompletionNotice {
  /** External payment reference, or the order correlation id for balance payments. */
  reference: string;
  source: 'payment-event' | 'balance';
  kind: PaymentKind;
  userKey: string;
  orderCorrelationId: string | null;
  amount: number;
}

export interface CompletionTrigger {
  onPaymentCompleted(notice: CompletionNotice): Promise<void>;
}
