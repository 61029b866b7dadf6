import type { StepId } from '../definitions/shipment-steps';
import type {
  PaymentKind,
  PaymentStatus,
} from '../interfaces/ledger-records.interface';

export interface SessionCreatedEvent {
  userKey: string;
  orderCorrelationId: string;
  timestamp: Date;
}

export interface SessionTransitionEvent {
  userKey: string;
  orderCorrelationId: string;
  fromStep: StepId;
  toStep: StepId;
  edge: string;
  fieldKeys: string[];
  timestamp: Date;
}

export interface SessionRolledBackEvent {
  userKey: string;
  fromStep: StepId;
  toStep: StepId;
  reason: string;
  timestamp: Date;
}

export interface SessionCancelledEvent {
  userKey: string;
  step: StepId | null;
  timestamp: Date;
}

export interface SessionArchivedEvent {
  userKey: string;
  orderCorrelationId: string;
  atomic: boolean;
  timestamp: Date;
}

export interface SessionExpiredEvent {
  userKey: string;
  timestamp: Date;
}

export interface PaymentAppliedEvent {
  externalReference: string;
  userKey: string;
  kind: PaymentKind;
  status: PaymentStatus;
  amount: number;
  orderCorrelationId: string | null;
  timestamp: Date;
}

export interface PaymentIgnoredEvent {
  externalReference: string;
  reason: string;
  timestamp: Date;
}
