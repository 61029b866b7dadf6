import { TransactionUnsupportedError } from '../errors/transaction-unsupported.error';
import type { ILedgerDbAdapter } from '../interfaces/ledger-db-adapter.interface';
import type {
  OrderRecord,
  PaymentRecord,
  PaymentStatus,
} from '../interfaces/ledger-records.interface';
import type { AdapterCapabilities } from '../interfaces/session-db-adapter.interface';
import { SerialQueue } from '../utils/serial-queue';
import type { InMemoryAdapterOptions } from './in-memory-session.adapter';

interface InMemoryLedgerState {
  payments: Map<string, PaymentRecord>;
  orders: Map<string, OrderRecord>;
  balances: Map<string, number>;
}

function createEmptyState(): InMemoryLedgerState {
  return {
    payments: new Map<string, PaymentRecord>(),
    orders: new Map<string, OrderRecord>(),
    balances: new Map<string, number>(),
  };
}

/** Balances are kept in cents precision, like a numeric(12,2) column. */
function roundMoney(value: number): number {
  return Math.round(value * 100) / 100;
}

export class InMemoryLedgerAdapter implements ILedgerDbAdapter {
  readonly capabilities: AdapterCapabilities;
  private readonly now: () => number;

  constructor(
    private readonly options: InMemoryAdapterOptions = {},
    private state: InMemoryLedgerState = createEmptyState(),
    private readonly queue: SerialQueue | null = new SerialQueue(),
  ) {
    this.capabilities = { transactions: options.transactions ?? true };
    this.now = options.now ?? Date.now;
  }

  async findPayment(externalReference: string): Promise<PaymentRecord | null> {
    return this.exec(() => {
      const record = this.state.payments.get(externalReference);
      return record ? structuredClone(record) : null;
    });
  }

  async insertPayment(
    data: Omit<PaymentRecord, 'createdAt' | 'updatedAt'>,
  ): Promise<void> {
    return this.exec(() => {
      if (this.state.payments.has(data.externalReference)) {
        throw new Error(
          `Payment record ${data.externalReference} already exists`,
        );
      }
      const now = new Date(this.now());
      this.state.payments.set(data.externalReference, {
        ...data,
        createdAt: now,
        updatedAt: new Date(now),
      });
    });
  }

  async markPaymentPaid(
    externalReference: string,
    paidAmount: number,
  ): Promise<boolean> {
    return this.exec(() => {
      const record = this.state.payments.get(externalReference);
      if (!record || record.status === 'paid') return false;

      record.status = 'paid';
      record.paidAmount = paidAmount;
      record.updatedAt = new Date(this.now());
      return true;
    });
  }

  async closePayment(
    externalReference: string,
    status: Exclude<PaymentStatus, 'pending' | 'paid'>,
  ): Promise<boolean> {
    return this.exec(() => {
      const record = this.state.payments.get(externalReference);
      if (!record || record.status !== 'pending') return false;

      record.status = status;
      record.updatedAt = new Date(this.now());
      return true;
    });
  }

  async incrementBalance(userKey: string, amount: number): Promise<number> {
    return this.exec(() => {
      const next = roundMoney((this.state.balances.get(userKey) ?? 0) + amount);
      this.state.balances.set(userKey, next);
      return next;
    });
  }

  async debitBalance(userKey: string, amount: number): Promise<number | null> {
    return this.exec(() => {
      const current = this.state.balances.get(userKey) ?? 0;
      if (current < amount) return null;

      const next = roundMoney(current - amount);
      this.state.balances.set(userKey, next);
      return next;
    });
  }

  async getBalance(userKey: string): Promise<number> {
    return this.exec(() => this.state.balances.get(userKey) ?? 0);
  }

  async insertOrder(data: Omit<OrderRecord, 'createdAt'>): Promise<void> {
    return this.exec(() => {
      if (this.state.orders.has(data.orderCorrelationId)) {
        throw new Error(`Order ${data.orderCorrelationId} already exists`);
      }
      this.state.orders.set(data.orderCorrelationId, {
        ...structuredClone(data),
        createdAt: new Date(this.now()),
      });
    });
  }

  async findOrder(orderCorrelationId: string): Promise<OrderRecord | null> {
    return this.exec(() => {
      const order = this.state.orders.get(orderCorrelationId);
      return order ? structuredClone(order) : null;
    });
  }

  async markOrderPaid(orderCorrelationId: string): Promise<boolean> {
    return this.exec(() => {
      const order = this.state.orders.get(orderCorrelationId);
      if (!order || order.paymentStatus === 'paid') return false;

      order.paymentStatus = 'paid';
      return true;
    });
  }

  async transaction<T>(
    cb: (adapter: ILedgerDbAdapter) => Promise<T>,
  ): Promise<T> {
    if (!this.capabilities.transactions) {
      throw new TransactionUnsupportedError(InMemoryLedgerAdapter.name);
    }

    if (!this.queue) {
      return cb(this);
    }

    return this.queue.run(async () => {
      const txState = structuredClone(this.state);
      const txAdapter = new InMemoryLedgerAdapter(this.options, txState, null);

      const result = await cb(txAdapter);
      this.state = txState;
      return result;
    });
  }

  private exec<T>(task: () => T): Promise<T> {
    if (!this.queue) {
      return Promise.resolve().then(task);
    }
    return this.queue.run(task);
  }
}
