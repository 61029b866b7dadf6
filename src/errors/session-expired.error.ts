export class SessionExpiredError extends Error {
  constructor(public readonly userKey: string) {
    super(`No active session for user "${userKey}". Please restart.`);
    this.name = 'SessionExpiredError';
  }
}
