import type { ILedgerDbAdapter } from '../interfaces/ledger-db-adapter.interface';

/**
 * Runs `work` in a ledger transaction when the store has them, otherwise
 * directly against the adapter. Each ledger write is conditional on its own,
 * so the direct path still never applies a mutation twice.
 */
export function withLedgerTransaction<T>(
  ledger: ILedgerDbAdapter,
  work: (adapter: ILedgerDbAdapter) => Promise<T>,
): Promise<T> {
  return ledger.capabilities.transactions
    ? ledger.transaction(work)
    : work(ledger);
}
