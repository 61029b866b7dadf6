import type { Pool, PoolClient } from 'pg';
import type { ILedgerDbAdapter } from '../interfaces/ledger-db-adapter.interface';
import type {
  OrderPaymentStatus,
  OrderRecord,
  PaymentKind,
  PaymentMethod,
  PaymentRecord,
  PaymentStatus,
} from '../interfaces/ledger-records.interface';
import type { AdapterCapabilities } from '../interfaces/session-db-adapter.interface';
import { assertTableName } from '../utils/assert-table-name';
import { isQuote, parseShipmentFields } from '../utils/hydrate-session';
import { parseJsonColumn } from './session-rows';

export const DEFAULT_LEDGER_TABLE_PREFIX = 'shipment_ledger';

interface PgPaymentRow {
  external_reference: string;
  user_key: string;
  requested_amount: string | number;
  paid_amount: string | number | null;
  status: string;
  kind: string;
  order_correlation_id: string | null;
  created_at: Date | string;
  updated_at: Date | string;
}

interface PgOrderRow {
  order_correlation_id: string;
  user_key: string;
  fields: unknown;
  quote: unknown;
  amount: string | number;
  payment_status: string;
  payment_method: string;
  created_at: Date | string;
}

interface PgBalanceRow {
  balance: string | number;
}

type PgQueryable = Pick<Pool, 'query'> | Pick<PoolClient, 'query'>;

const PAYMENT_COLUMNS =
  'external_reference, user_key, requested_amount, paid_amount, status, kind, order_correlation_id, created_at, updated_at';

const ORDER_COLUMNS =
  'order_correlation_id, user_key, fields, quote, amount, payment_status, payment_method, created_at';

function toPaymentStatus(value: string): PaymentStatus {
  if (
    value === 'pending' ||
    value === 'paid' ||
    value === 'failed' ||
    value === 'expired'
  ) {
    return value;
  }
  throw new Error(`Unknown payment status "${value}"`);
}

function toPaymentKind(value: string): PaymentKind {
  if (value === 'balance-topup' || value === 'order-payment') return value;
  throw new Error(`Unknown payment kind "${value}"`);
}

function toPaymentMethod(value: string): PaymentMethod {
  if (value === 'balance' || value === 'invoice') return value;
  throw new Error(`Unknown payment method "${value}"`);
}

function toOrderPaymentStatus(value: string): OrderPaymentStatus {
  if (value === 'unpaid' || value === 'paid') return value;
  throw new Error(`Unknown order payment status "${value}"`);
}

/**
 * Payments, orders and balances in three tables sharing a prefix.
 * numeric columns come back from node-postgres as strings.
 */
export class PgLedgerAdapter implements ILedgerDbAdapter {
  readonly capabilities: AdapterCapabilities = { transactions: true };
  private readonly paymentsTable: string;
  private readonly ordersTable: string;
  private readonly balancesTable: string;

  constructor(
    private readonly pool: Pool,
    private readonly tablePrefix: string = DEFAULT_LEDGER_TABLE_PREFIX,
    private readonly client?: PoolClient,
  ) {
    assertTableName(tablePrefix);
    this.paymentsTable = `${tablePrefix}_payments`;
    this.ordersTable = `${tablePrefix}_orders`;
    this.balancesTable = `${tablePrefix}_balances`;
  }

  async findPayment(externalReference: string): Promise<PaymentRecord | null> {
    const result = await this.getConn().query<PgPaymentRow>(
      `SELECT ${PAYMENT_COLUMNS} FROM ${this.paymentsTable}
       WHERE external_reference = $1`,
      [externalReference],
    );

    if (result.rows.length === 0) return null;
    return this.toPaymentRecord(result.rows[0]);
  }

  async insertPayment(
    data: Omit<PaymentRecord, 'createdAt' | 'updatedAt'>,
  ): Promise<void> {
    await this.getConn().query(
      `INSERT INTO ${this.paymentsTable}
       (external_reference, user_key, requested_amount, paid_amount, status, kind, order_correlation_id)
       VALUES ($1, $2, $3, $4, $5, $6, $7)`,
      [
        data.externalReference,
        data.userKey,
        data.requestedAmount,
        data.paidAmount,
        data.status,
        data.kind,
        data.orderCorrelationId,
      ],
    );
  }

  /** Conditional flip: of two racing deliveries only one sees a row updated. */
  async markPaymentPaid(
    externalReference: string,
    paidAmount: number,
  ): Promise<boolean> {
    const result = await this.getConn().query(
      `UPDATE ${this.paymentsTable}
       SET status = 'paid', paid_amount = $2, updated_at = CURRENT_TIMESTAMP
       WHERE external_reference = $1 AND status <> 'paid'`,
      [externalReference, paidAmount],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async closePayment(
    externalReference: string,
    status: Exclude<PaymentStatus, 'pending' | 'paid'>,
  ): Promise<boolean> {
    const result = await this.getConn().query(
      `UPDATE ${this.paymentsTable}
       SET status = $2, updated_at = CURRENT_TIMESTAMP
       WHERE external_reference = $1 AND status = 'pending'`,
      [externalReference, status],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async incrementBalance(userKey: string, amount: number): Promise<number> {
    const result = await this.getConn().query<PgBalanceRow>(
      `INSERT INTO ${this.balancesTable} (user_key, balance, updated_at)
       VALUES ($1, $2, CURRENT_TIMESTAMP)
       ON CONFLICT (user_key) DO UPDATE SET
         balance = ${this.balancesTable}.balance + EXCLUDED.balance,
         updated_at = CURRENT_TIMESTAMP
       RETURNING balance`,
      [userKey, amount],
    );
    return Number(result.rows[0].balance);
  }

  async debitBalance(userKey: string, amount: number): Promise<number | null> {
    const result = await this.getConn().query<PgBalanceRow>(
      `UPDATE ${this.balancesTable}
       SET balance = balance - $2, updated_at = CURRENT_TIMESTAMP
       WHERE user_key = $1 AND balance >= $2
       RETURNING balance`,
      [userKey, amount],
    );

    if (result.rows.length === 0) return null;
    return Number(result.rows[0].balance);
  }

  async getBalance(userKey: string): Promise<number> {
    const result = await this.getConn().query<PgBalanceRow>(
      `SELECT balance FROM ${this.balancesTable} WHERE user_key = $1`,
      [userKey],
    );

    if (result.rows.length === 0) return 0;
    return Number(result.rows[0].balance);
  }

  async insertOrder(data: Omit<OrderRecord, 'createdAt'>): Promise<void> {
    await this.getConn().query(
      `INSERT INTO ${this.ordersTable}
       (order_correlation_id, user_key, fields, quote, amount, payment_status, payment_method)
       VALUES ($1, $2, $3::jsonb, $4::jsonb, $5, $6, $7)`,
      [
        data.orderCorrelationId,
        data.userKey,
        JSON.stringify(data.fields),
        JSON.stringify(data.quote),
        data.amount,
        data.paymentStatus,
        data.paymentMethod,
      ],
    );
  }

  async findOrder(orderCorrelationId: string): Promise<OrderRecord | null> {
    const result = await this.getConn().query<PgOrderRow>(
      `SELECT ${ORDER_COLUMNS} FROM ${this.ordersTable}
       WHERE order_correlation_id = $1`,
      [orderCorrelationId],
    );

    if (result.rows.length === 0) return null;
    return this.toOrderRecord(result.rows[0]);
  }

  async markOrderPaid(orderCorrelationId: string): Promise<boolean> {
    const result = await this.getConn().query(
      `UPDATE ${this.ordersTable}
       SET payment_status = 'paid'
       WHERE order_correlation_id = $1 AND payment_status <> 'paid'`,
      [orderCorrelationId],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async transaction<T>(
    cb: (adapter: ILedgerDbAdapter) => Promise<T>,
  ): Promise<T> {
    if (this.client) {
      return cb(this);
    }

    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const txAdapter = new PgLedgerAdapter(this.pool, this.tablePrefix, client);
      const result = await cb(txAdapter);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  private getConn(): PgQueryable {
    return this.client ?? this.pool;
  }

  private toPaymentRecord(row: PgPaymentRow): PaymentRecord {
    return {
      externalReference: row.external_reference,
      userKey: row.user_key,
      requestedAmount: Number(row.requested_amount),
      paidAmount: row.paid_amount === null ? null : Number(row.paid_amount),
      status: toPaymentStatus(row.status),
      kind: toPaymentKind(row.kind),
      orderCorrelationId: row.order_correlation_id,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    };
  }

  private toOrderRecord(row: PgOrderRow): OrderRecord {
    const quote = parseJsonColumn(row.quote);
    if (!isQuote(quote)) {
      throw new Error(
        `Order ${row.order_correlation_id} has an invalid quote payload`,
      );
    }

    return {
      orderCorrelationId: row.order_correlation_id,
      userKey: row.user_key,
      fields: parseShipmentFields(row.user_key, parseJsonColumn(row.fields)),
      quote,
      amount: Number(row.amount),
      paymentStatus: toOrderPaymentStatus(row.payment_status),
      paymentMethod: toPaymentMethod(row.payment_method),
      createdAt: new Date(row.created_at),
    };
  }
}
