import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { DuplicateEventError } from '../errors/duplicate-event.error';
import { UnknownReferenceError } from '../errors/unknown-reference.error';
import { SessionEventType } from '../events/session-event-type.enum';
import type {
  PaymentAppliedEvent,
  PaymentIgnoredEvent,
} from '../events/session-events';
import type { ILedgerDbAdapter } from '../interfaces/ledger-db-adapter.interface';
import type {
  PaymentEvent,
  PaymentOutcome,
  PaymentRecord,
} from '../interfaces/ledger-records.interface';
import { LEDGER_DB_ADAPTER } from '../session.constants';
import { withLedgerTransaction } from '../utils/with-ledger-transaction';
import { CompletionNotifier } from './completion-notifier.service';

/**
 * Applies provider payment events exactly once per external reference.
 * Deliveries are at-least-once and may race; the conditional status flip
 * at the store decides the single winner, so no per-user lock is taken.
 */
@Injectable()
export class PaymentCompletionCoordinator {
  private readonly logger = new Logger(PaymentCompletionCoordinator.name);

  constructor(
    @Inject(LEDGER_DB_ADAPTER) private readonly ledger: ILedgerDbAdapter,
    private readonly notifier: CompletionNotifier,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  async apply(event: PaymentEvent): Promise<PaymentOutcome> {
    const record = await this.ledger.findPayment(event.externalReference);

    if (!record) {
      const error = new UnknownReferenceError(event.externalReference);
      this.logger.warn(error.message);
      this.emitIgnored(SessionEventType.PAYMENT_REJECTED, event, error.message);
      return 'rejected';
    }

    if (record.status === 'paid') {
      return this.ignoreDuplicate(event);
    }

    if (event.status === 'pending') {
      this.logger.log(
        `Payment ${event.externalReference} still pending; nothing to apply`,
      );
      return 'duplicate-ignored';
    }

    if (event.status !== 'paid') {
      return this.closeUnpaid(record, event.status);
    }

    return this.applyPaid(record, event);
  }

  private async applyPaid(
    record: PaymentRecord,
    event: PaymentEvent,
  ): Promise<PaymentOutcome> {
    // Some providers report 0 when the paid amount equals the invoice.
    const paidAmount = event.amount > 0 ? event.amount : record.requestedAmount;

    const won = await withLedgerTransaction(this.ledger, async (tx) => {
      const flipped = await tx.markPaymentPaid(
        record.externalReference,
        paidAmount,
      );
      if (!flipped) return false;

      if (record.kind === 'balance-topup') {
        const balance = await tx.incrementBalance(record.userKey, paidAmount);
        this.logger.log(
          `Balance of user ${record.userKey} credited ${paidAmount.toFixed(2)}, now ${balance.toFixed(2)}`,
        );
      } else if (record.orderCorrelationId) {
        await tx.markOrderPaid(record.orderCorrelationId);
      } else {
        this.logger.warn(
          `Order payment ${record.externalReference} has no linked order`,
        );
      }
      return true;
    });

    if (!won) {
      return this.ignoreDuplicate(event);
    }

    this.eventEmitter.emit(SessionEventType.PAYMENT_APPLIED, {
      externalReference: record.externalReference,
      userKey: record.userKey,
      kind: record.kind,
      status: 'paid',
      amount: paidAmount,
      orderCorrelationId: record.orderCorrelationId,
      timestamp: new Date(),
    } satisfies PaymentAppliedEvent);

    await this.notifier.notify({
      reference: record.externalReference,
      source: 'payment-event',
      kind: record.kind,
      userKey: record.userKey,
      orderCorrelationId: record.orderCorrelationId,
      amount: paidAmount,
    });

    return 'applied';
  }

  private async closeUnpaid(
    record: PaymentRecord,
    status: 'failed' | 'expired',
  ): Promise<PaymentOutcome> {
    const closed = await this.ledger.closePayment(
      record.externalReference,
      status,
    );
    if (!closed) {
      this.logger.log(
        `Payment ${record.externalReference} already ${record.status}; ${status} event ignored`,
      );
      return 'duplicate-ignored';
    }

    this.logger.log(`Payment ${record.externalReference} marked ${status}`);
    this.eventEmitter.emit(SessionEventType.PAYMENT_APPLIED, {
      externalReference: record.externalReference,
      userKey: record.userKey,
      kind: record.kind,
      status,
      amount: 0,
      orderCorrelationId: record.orderCorrelationId,
      timestamp: new Date(),
    } satisfies PaymentAppliedEvent);
    return 'applied';
  }

  private ignoreDuplicate(event: PaymentEvent): PaymentOutcome {
    const duplicate = new DuplicateEventError(event.externalReference);
    this.logger.warn(duplicate.message);
    this.emitIgnored(
      SessionEventType.PAYMENT_DUPLICATE,
      event,
      duplicate.message,
    );
    return 'duplicate-ignored';
  }

  private emitIgnored(
    type: SessionEventType,
    event: PaymentEvent,
    reason: string,
  ): void {
    this.eventEmitter.emit(type, {
      externalReference: event.externalReference,
      reason,
      timestamp: new Date(),
    } satisfies PaymentIgnoredEvent);
  }
}
