import type { StepId } from '../definitions/shipment-steps';
import type { Quote } from './collaborators.interface';
import type { PaymentMethod } from './ledger-records.interface';

export type PromptSignal = 'restart' | 'cancelled' | 'completed';

export interface CheckoutResult {
  orderCorrelationId: string;
  method: PaymentMethod;
  amount: number;
  /** Balance left after a balance payment. */
  balance?: number;
  /** Set for invoice payments. */
  externalReference?: string;
  paymentUrl?: string;
}

/** What the transport layer needs to render the next prompt. */
export interface PromptDescriptor {
  userKey: string;
  step: StepId;
  promptKey: string;
  orderCorrelationId: string | null;
  /** Edge names accepted at this step (e.g. to render a "skip" button). */
  actions: string[];
  error?: string;
  signal?: PromptSignal;
  quotes?: Quote[];
  checkout?: CheckoutResult;
}
