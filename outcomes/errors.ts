export class OutcomeTableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OutcomeTableError';
  }
}
