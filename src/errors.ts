/** Raised when a caller passes an argument the trie cannot accept (e.g. an empty key). */
export class InvalidArgumentError extends Error {
  /** Name of the offending argument. */
  readonly argument: string;

  constructor(argument: string, message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
    this.argument = argument;
  }
}
