import type { AdapterCapabilities } from './session-db-adapter.interface';
import type {
  OrderRecord,
  PaymentRecord,
  PaymentStatus,
} from './ledger-records.interface';

/**
 * Persistence port for payment records, orders and user balances.
 * Every mutating method is a single conditional statement at the store, so
 * concurrent callers racing on the same row see exactly one winner.
 */
export interface ILedgerDbAdapter {
  readonly capabilities: AdapterCapabilities;

  findPayment(externalReference: string): Promise<PaymentRecord | null>;

  insertPayment(
    data: Omit<PaymentRecord, 'createdAt' | 'updatedAt'>,
  ): Promise<void>;

  /** Flip a record to paid unless it already is. Returns true for the winning caller. */
  markPaymentPaid(
    externalReference: string,
    paidAmount: number,
  ): Promise<boolean>;

  /** Move a pending record to failed/expired. Returns false if it was not pending. */
  closePayment(
    externalReference: string,
    status: Exclude<PaymentStatus, 'pending' | 'paid'>,
  ): Promise<boolean>;

  /** Returns the balance after the increment. */
  incrementBalance(userKey: string, amount: number): Promise<number>;

  /** Debit only when the balance covers the amount. Returns the new balance or null. */
  debitBalance(userKey: string, amount: number): Promise<number | null>;

  getBalance(userKey: string): Promise<number>;

  insertOrder(data: Omit<OrderRecord, 'createdAt'>): Promise<void>;

  findOrder(orderCorrelationId: string): Promise<OrderRecord | null>;

  markOrderPaid(orderCorrelationId: string): Promise<boolean>;

  transaction<T>(cb: (adapter: ILedgerDbAdapter) => Promise<T>): Promise<T>;
}
