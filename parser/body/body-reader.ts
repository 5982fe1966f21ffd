import { AccumulatorError, AccumulatorErrorCode } from './accumulator-errors.js';
import { type BodyAccumulator, bodyAccumulatorLength, createBodyAccumulator, finalizeBody } from './body-accumulator.js';
import type { BodyToken } from './body-token.js';
import { dumpLeadingWhitespace, dumpNestedForm, dumpString, pushNewline } from './merge.js';
import { type NestedForm, textForm } from './nested-form.js';
import {
  type StringAccumulator,
  createStringAccumulator,
  finalizeString,
  popChars,
  pushChar,
  stringAccumulatorLength
} from './string-accumulator.js';

export interface BodyReaderOptions {
  /** Trace every operation to the console. Defaults to the BODY_DEBUG environment variable. */
  debug?: boolean;
}

/**
 * Holds the accumulator pair for one body part and applies the merge
 * operations to it. A reader loop owns one of these per body part.
 */
export interface BodyPartReader<F = unknown> {
  /** Appends one character to the current text run. */
  pushChar(ch: string): void;

  /** Drops the last `count` characters of the current text run. */
  popChars(count: number): void;

  /** Merges a literal string into the current text run. */
  pushText(text: string): void;

  /** Emits a newline token; the current run is left alone. */
  newline(): void;

  /** Emits the current run as leading whitespace and starts a new run. */
  leadingWhitespace(): void;

  /** Emits the current run, splitting off trailing whitespace, and starts a new run. */
  flush(): void;

  nestedForm(form: NestedForm<F>, leadingWhitespace?: boolean): void;

  /** Flushes the current run and returns the finished token sequence. */
  finish(): readonly BodyToken<F>[];

  /** Fill a zero-allocation diagnostics state object. */
  fillDebugState(state: BodyReaderDebugState): void;
}

export interface BodyReaderDebugState {
  /** Tokens emitted so far. */
  tokenCount: number;

  /** Characters in the current text run. */
  pendingCharCount: number;

  /** The current text run, materialized. */
  pendingText: string;

  /** True once finish() has been called. */
  finished: boolean;
}

export function createBodyPartReader<F = unknown>(options?: BodyReaderOptions): BodyPartReader<F> {
  const BODY_DEBUG = options?.debug ?? (typeof process !== 'undefined' && !!process.env.BODY_DEBUG);

  let body: BodyAccumulator<F> = createBodyAccumulator<F>();
  let str: StringAccumulator = createStringAccumulator();
  let finished = false;

  function ensureOpen(operation: string): void {
    if (finished) {
      throw new AccumulatorError(
        AccumulatorErrorCode.READER_FINISHED,
        `BodyPartReader: ${operation}() called after finish()`);
    }
  }

  function trace(operation: string): void {
    if (BODY_DEBUG) {
      console.log('[BODY] ' + operation, {
        tokenCount: bodyAccumulatorLength(body),
        pendingText: finalizeString(str)
      });
    }
  }

  return {
    pushChar(ch) {
      ensureOpen('pushChar');
      str = pushChar(str, ch);
    },

    popChars(count) {
      ensureOpen('popChars');
      str = popChars(str, count);
      trace('popChars');
    },

    pushText(text) {
      ensureOpen('pushText');
      [body, str] = dumpNestedForm(body, str, textForm(text), false);
      trace('pushText');
    },

    newline() {
      ensureOpen('newline');
      body = pushNewline(body);
      trace('newline');
    },

    leadingWhitespace() {
      ensureOpen('leadingWhitespace');
      body = dumpLeadingWhitespace(body, str);
      str = createStringAccumulator();
      trace('leadingWhitespace');
    },

    flush() {
      ensureOpen('flush');
      body = dumpString(body, str);
      str = createStringAccumulator();
      trace('flush');
    },

    nestedForm(form, leadingWhitespace = false) {
      ensureOpen('nestedForm');
      [body, str] = dumpNestedForm(body, str, form, leadingWhitespace);
      trace('nestedForm ' + form.kind);
    },

    finish() {
      ensureOpen('finish');
      body = dumpString(body, str);
      str = createStringAccumulator();
      finished = true;
      trace('finish');
      return finalizeBody(body);
    },

    fillDebugState(state) {
      state.tokenCount = bodyAccumulatorLength(body);
      state.pendingCharCount = stringAccumulatorLength(str);
      state.pendingText = finalizeString(str);
      state.finished = finished;
    }
  };
}
