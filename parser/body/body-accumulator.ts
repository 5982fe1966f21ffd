/**
 * Body part accumulator: collects BodyTokens in document order while a body
 * part is being read.
 */

import type { BodyToken } from './body-token.js';

export interface BodyAccumulator<F = unknown> {
  tokens: BodyToken<F>[];
}

export function createBodyAccumulator<F = unknown>(): BodyAccumulator<F> {
  return { tokens: [] };
}

export function pushToken<F>(acc: BodyAccumulator<F>, token: BodyToken<F>): BodyAccumulator<F> {
  acc.tokens.push(token);
  return acc;
}

export function bodyAccumulatorLength(acc: BodyAccumulator<unknown>): number {
  return acc.tokens.length;
}

/**
 * Hands the tokens over to postprocessing.
 * Currently the identity: the returned array is the accumulator's own, so the
 * accumulator must not be pushed to after it has been finalized.
 */
export function finalizeBody<F>(acc: BodyAccumulator<F>): readonly BodyToken<F>[] {
  return acc.tokens;
}
