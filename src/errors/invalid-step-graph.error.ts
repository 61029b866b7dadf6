export class InvalidStepGraphError extends Error {
  constructor(
    public readonly graphId: string,
    message: string,
  ) {
    super(`Step graph ${graphId}: ${message}`);
    this.name = 'InvalidStepGraphError';
  }
}
