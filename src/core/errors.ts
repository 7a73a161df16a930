/**
 * Raised when the next term does not fit in the engine's word width.
 * Terminal: the engine is exhausted by the time this is thrown.
 */
export class OverflowError extends Error {
  readonly bitWidth: number;

  constructor(bitWidth: number) {
    super(`Maximum ${bitWidth}-bit unsigned value reached.`);
    this.name = 'OverflowError';
    this.bitWidth = bitWidth;
  }
}

export function isOverflowError(err: unknown): err is OverflowError {
  return err instanceof OverflowError;
}
