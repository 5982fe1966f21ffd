/**
 * Merge engine: folds newlines, text runs and nested forms into the body
 * accumulator. The pair (BodyAccumulator, StringAccumulator) is the whole
 * state of a body part being read.
 */

import { type BodyAccumulator, pushToken } from './body-accumulator.js';
import { createBodyToken } from './body-token.js';
import { isWhiteSpace } from './character-codes.js';
import { type NestedForm, NestedFormKind } from './nested-form.js';
import {
  type StringAccumulator,
  createStringAccumulator,
  finalizeString,
  pushChar
} from './string-accumulator.js';

export type BodyState<F> = [body: BodyAccumulator<F>, str: StringAccumulator];

function pushTrailingWhitespace<F>(body: BodyAccumulator<F>, s: string): BodyAccumulator<F> {
  if (!s) return body;
  return pushToken(body, createBodyToken<F>(s, { trailingWhitespace: true }));
}

function pushString<F>(body: BodyAccumulator<F>, s: string): BodyAccumulator<F> {
  if (!s) return body;
  return pushToken(body, createBodyToken<F>(s));
}

function pushForm<F>(body: BodyAccumulator<F>, form: F): BodyAccumulator<F> {
  return pushToken(body, createBodyToken<F>(form));
}

export function pushNewline<F>(body: BodyAccumulator<F>): BodyAccumulator<F> {
  return pushToken(body, createBodyToken<F>('\n', { newline: true }));
}

/**
 * Pushes the accumulated leading whitespace of a body part.
 * The token is emitted even when empty: its position marks where the part starts.
 */
export function dumpLeadingWhitespace<F>(body: BodyAccumulator<F>, str: StringAccumulator): BodyAccumulator<F> {
  return pushToken(body, createBodyToken<F>(finalizeString(str), { leadingWhitespace: true }));
}

function dumpStringVerbatim<F>(body: BodyAccumulator<F>, str: StringAccumulator): BodyAccumulator<F> {
  return pushString(body, finalizeString(str));
}

/**
 * Splits off the maximal whitespace suffix.
 * Returns `[main, trailingWhitespace]`, either of which may be empty.
 */
export function splitTrailingWhitespace(s: string): [main: string, trailingWhitespace: string] {
  let end = s.length;
  while (end > 0 && isWhiteSpace(s.charCodeAt(end - 1))) end--;
  if (end === s.length) return [s, ''];
  return [s.substring(0, end), s.substring(end)];
}

/**
 * Pushes the accumulated run, with its trailing whitespace as a separate
 * token. An empty run leaves the body accumulator unchanged.
 */
export function dumpString<F>(body: BodyAccumulator<F>, str: StringAccumulator): BodyAccumulator<F> {
  const [main, trailingWhitespace] = splitTrailingWhitespace(finalizeString(str));
  return pushTrailingWhitespace(pushString(body, main), trailingWhitespace);
}

// O(length) per string form; these are rare and short
function appendText(str: StringAccumulator, text: string): StringAccumulator {
  for (const ch of text) pushChar(str, ch);
  return str;
}

/**
 * Pushes a nested form, flushing the current run first where needed.
 *
 * - with `leadingWhitespace`, the run is dumped as leading whitespace and the
 *   form is then handled against an empty run;
 * - a text form, or a single form holding a string, is appended to the run
 *   and the body is returned untouched;
 * - otherwise the run is pushed verbatim, followed by the form (or each item of
 *   a splice), and a fresh string accumulator is returned.
 */
export function dumpNestedForm<F>(
  body: BodyAccumulator<F>,
  str: StringAccumulator,
  form: NestedForm<F>,
  leadingWhitespace: boolean
): BodyState<F> {
  if (leadingWhitespace) {
    return dumpNestedForm(dumpLeadingWhitespace(body, str), createStringAccumulator(), form, false);
  }

  switch (form.kind) {
    case NestedFormKind.Text:
      return [body, appendText(str, form.text)];

    case NestedFormKind.Splice: {
      let withRun = dumpStringVerbatim(body, str);
      for (const item of form.items) withRun = pushForm(withRun, item);
      return [withRun, createStringAccumulator()];
    }

    case NestedFormKind.Single:
      // a bare string is never boxed
      if (typeof form.value === 'string') return [body, appendText(str, form.value)];
      return [pushForm(dumpStringVerbatim(body, str), form.value), createStringAccumulator()];
  }
}
