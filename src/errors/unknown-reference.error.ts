export class UnknownReferenceError extends Error {
  constructor(public readonly externalReference: string) {
    super(`No payment record found for reference "${externalReference}".`);
    this.name = 'UnknownReferenceError';
  }
}
