/** A meter context was built with an empty NMI or a non-positive interval length. */
export class InvalidContextError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidContextError';
  }
}
