export class TransactionUnsupportedError extends Error {
  constructor(public readonly adapterName: string) {
    super(
      `${adapterName} does not support multi-document transactions. ` +
        `Use the sequential archive strategy for this store.`,
    );
    this.name = 'TransactionUnsupportedError';
  }
}
