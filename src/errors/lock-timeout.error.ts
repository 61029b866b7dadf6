export class LockTimeoutError extends Error {
  constructor(
    public readonly userKey: string,
    public readonly timeoutMs: number,
  ) {
    super(
      `Could not acquire session lock for user "${userKey}" within ${timeoutMs}ms. Retry the request.`,
    );
    this.name = 'LockTimeoutError';
  }
}
