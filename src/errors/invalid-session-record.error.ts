export class InvalidSessionRecordError extends Error {
  constructor(
    public readonly userKey: string,
    message: string,
  ) {
    super(message);
    this.name = 'InvalidSessionRecordError';
  }
}
