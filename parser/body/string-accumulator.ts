/**
 * StringAccumulator - append/truncate character buffer used while a body part
 * run is being scanned. Characters are kept as separate entries so that
 * popChars can drop exactly the count the scanner tracked.
 */

import { AccumulatorError, AccumulatorErrorCode } from './accumulator-errors.js';

export interface StringAccumulator {
  chars: string[];
}

export function createStringAccumulator(ch?: string): StringAccumulator {
  return { chars: ch === undefined ? [] : [ch] };
}

/** Adds a character to the end of the accumulator. */
export function pushChar(acc: StringAccumulator, ch: string): StringAccumulator {
  acc.chars.push(ch);
  return acc;
}

/**
 * Removes the last `count` characters.
 * Throws OUT_OF_RANGE before touching the buffer if fewer are available.
 */
export function popChars(acc: StringAccumulator, count: number): StringAccumulator {
  if (count === 0) return acc;

  const length = acc.chars.length;
  if (!Number.isInteger(count) || count < 0 || count > length) {
    throw new AccumulatorError(
      AccumulatorErrorCode.OUT_OF_RANGE,
      `StringAccumulator: cannot pop ${count} character(s) from ${length}`);
  }

  acc.chars.length = length - count;
  return acc;
}

export function stringAccumulatorLength(acc: StringAccumulator): number {
  return acc.chars.length;
}

/** Returns the accumulated characters as one string; the buffer is left as is. */
export function finalizeString(acc: StringAccumulator): string {
  const chars = acc.chars;
  if (chars.length === 0) return '';
  return chars.length === 1 ? chars[0] : chars.join('');
}
