/**
 * Error codes for accumulator contract violations.
 * These are caller bugs, not recoverable input conditions.
 */
export enum AccumulatorErrorCode {
  /** More characters requested from a string accumulator than it holds */
  OUT_OF_RANGE = 'out-of-range',

  /** A body part reader was used after finish() */
  READER_FINISHED = 'reader-finished'
}

export class AccumulatorError extends Error {
  readonly code: AccumulatorErrorCode;

  constructor(code: AccumulatorErrorCode, message: string) {
    super(message);
    this.name = 'AccumulatorError';
    this.code = code;
  }
}
