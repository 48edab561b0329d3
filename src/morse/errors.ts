export class MorseOptionsError extends Error {
  constructor(
    message: string,
    public issues: string[]
  ) {
    super(message);
    this.name = 'MorseOptionsError';
  }
}
