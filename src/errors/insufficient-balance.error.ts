export class InsufficientBalanceError extends Error {
  constructor(
    public readonly userKey: string,
    public readonly required: number,
    public readonly available: number,
  ) {
    super(
      `Insufficient balance for user "${userKey}": ` +
        `required ${required.toFixed(2)}, available ${available.toFixed(2)}.`,
    );
    this.name = 'InsufficientBalanceError';
  }
}
