export class DuplicateEventError extends Error {
  constructor(public readonly externalReference: string) {
    super(`Payment event ${externalReference} has already been applied.`);
    this.name = 'DuplicateEventError';
  }
}
