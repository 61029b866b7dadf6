import { Inject, Injectable, Logger } from '@nestjs/common';
import { InsufficientBalanceError } from '../errors/insufficient-balance.error';
import { ValidationError } from '../errors/validation.error';
import type {
  Invoice,
  PaymentProvider,
  Quote,
} from '../interfaces/collaborators.interface';
import type { ILedgerDbAdapter } from '../interfaces/ledger-db-adapter.interface';
import type { CheckoutResult } from '../interfaces/prompt-descriptor.interface';
import type {
  ArchivePayload,
  Session,
} from '../interfaces/session-records.interface';
import { LEDGER_DB_ADAPTER, PAYMENT_PROVIDER } from '../session.constants';
import { withLedgerTransaction } from '../utils/with-ledger-transaction';
import { CompletionNotifier } from './completion-notifier.service';
import { SessionStore } from './session-store.service';

export const MIN_TOPUP_AMOUNT = 10;
export const MAX_TOPUP_AMOUNT = 10_000;

/**
 * Turns a completed session into an order. Balance payments are debited
 * and completed immediately; invoice payments complete later through the
 * payment coordinator.
 */
@Injectable()
export class CheckoutService {
  private readonly logger = new Logger(CheckoutService.name);

  constructor(
    @Inject(LEDGER_DB_ADAPTER) private readonly ledger: ILedgerDbAdapter,
    @Inject(PAYMENT_PROVIDER)
    private readonly paymentProvider: PaymentProvider,
    private readonly store: SessionStore,
    private readonly notifier: CompletionNotifier,
  ) {}

  async payFromBalance(session: Session, quote: Quote): Promise<CheckoutResult> {
    const { userKey, orderCorrelationId } = session;
    const amount = quote.amount;

    const balance = await withLedgerTransaction(this.ledger, async (tx) => {
      const remaining = await tx.debitBalance(userKey, amount);
      if (remaining === null) {
        throw new InsufficientBalanceError(
          userKey,
          amount,
          await tx.getBalance(userKey),
        );
      }

      await tx.insertOrder({
        orderCorrelationId,
        userKey,
        fields: session.fields,
        quote,
        amount,
        paymentStatus: 'paid',
        paymentMethod: 'balance',
      });
      return remaining;
    });

    this.logger.log(
      `Order ${orderCorrelationId} paid from balance by user ${userKey}: ${amount.toFixed(2)}`,
    );

    await this.archiveSession(userKey, {
      orderCorrelationId,
      paymentMethod: 'balance',
      amount,
      fields: session.fields,
    });

    await this.notifier.notify({
      reference: orderCorrelationId,
      source: 'balance',
      kind: 'order-payment',
      userKey,
      orderCorrelationId,
      amount,
    });

    return { orderCorrelationId, method: 'balance', amount, balance };
  }

  async payByInvoice(session: Session, quote: Quote): Promise<CheckoutResult> {
    const { userKey, orderCorrelationId } = session;
    const amount = quote.amount;

    const invoice = await this.paymentProvider.createInvoice({
      userKey,
      amount,
      kind: 'order-payment',
      orderCorrelationId,
    });

    await withLedgerTransaction(this.ledger, async (tx) => {
      await tx.insertOrder({
        orderCorrelationId,
        userKey,
        fields: session.fields,
        quote,
        amount,
        paymentStatus: 'unpaid',
        paymentMethod: 'invoice',
      });
      await tx.insertPayment({
        externalReference: invoice.externalReference,
        userKey,
        requestedAmount: amount,
        paidAmount: null,
        status: 'pending',
        kind: 'order-payment',
        orderCorrelationId,
      });
    });

    this.logger.log(
      `Invoice ${invoice.externalReference} created for order ${orderCorrelationId}`,
    );

    await this.archiveSession(userKey, {
      orderCorrelationId,
      paymentMethod: 'invoice',
      amount,
      fields: session.fields,
    });

    return {
      orderCorrelationId,
      method: 'invoice',
      amount,
      externalReference: invoice.externalReference,
      paymentUrl: invoice.paymentUrl,
    };
  }

  /** Invoice for adding funds to the user's balance. */
  async createTopUp(userKey: string, amount: number): Promise<Invoice> {
    if (!Number.isFinite(amount) || amount < MIN_TOPUP_AMOUNT) {
      throw new ValidationError(
        'amount',
        `Minimum top-up amount is $${MIN_TOPUP_AMOUNT}`,
      );
    }
    if (amount > MAX_TOPUP_AMOUNT) {
      throw new ValidationError(
        'amount',
        `Maximum top-up amount is $${MAX_TOPUP_AMOUNT}`,
      );
    }

    const invoice = await this.paymentProvider.createInvoice({
      userKey,
      amount,
      kind: 'balance-topup',
      orderCorrelationId: null,
    });

    await this.ledger.insertPayment({
      externalReference: invoice.externalReference,
      userKey,
      requestedAmount: amount,
      paidAmount: null,
      status: 'pending',
      kind: 'balance-topup',
      orderCorrelationId: null,
    });

    this.logger.log(
      `Top-up invoice ${invoice.externalReference} created for user ${userKey}: ${amount.toFixed(2)}`,
    );
    return invoice;
  }

  /**
   * Runs after the ledger unit has committed, so the order stands either way.
   * A session left behind is terminal and gets replaced on the next input.
   */
  private async archiveSession(
    userKey: string,
    payload: ArchivePayload,
  ): Promise<void> {
    try {
      await this.store.finalizeAndArchive(userKey, payload);
    } catch (error) {
      this.logger.error(
        `Order ${payload.orderCorrelationId} committed but its session could not be archived`,
        error instanceof Error ? error.stack : error,
      );
    }
  }
}
