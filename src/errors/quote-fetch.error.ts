export class QuoteFetchError extends Error {
  constructor(
    public readonly fingerprint: string,
    message: string,
    public readonly reason?: unknown,
  ) {
    super(message);
    this.name = 'QuoteFetchError';
  }
}
