/**
 * Body part tokens.
 *
 * While a body part is read it is organized into tokens holding either a
 * string or an arbitrary nested form, plus metadata that is readily available
 * at read time but would need another pass over the text to recover during
 * postprocessing.
 */

/**
 * Token flags, independent bits
 */
export const enum BodyTokenFlags {
  None = 0,

  /** Contents is the string "\n" */
  NewLine = 1 << 0,

  /** Contents is the leading whitespace of a body part (may be empty) */
  LeadingWhitespace = 1 << 1,

  /** Contents is the trailing whitespace of a body part */
  TrailingWhitespace = 1 << 2,
}

export interface BodyToken<F = unknown> {
  readonly contents: string | F;
  readonly flags: BodyTokenFlags;
}

export interface BodyTokenOptions {
  newline?: boolean;
  leadingWhitespace?: boolean;
  trailingWhitespace?: boolean;
}

export function createBodyToken<F>(contents: string | F, options?: BodyTokenOptions): BodyToken<F> {
  let flags = BodyTokenFlags.None;
  if (options) {
    if (options.newline) flags |= BodyTokenFlags.NewLine;
    if (options.leadingWhitespace) flags |= BodyTokenFlags.LeadingWhitespace;
    if (options.trailingWhitespace) flags |= BodyTokenFlags.TrailingWhitespace;
  }
  return Object.freeze({ contents, flags });
}

export function isNewLineToken(token: BodyToken<unknown>): boolean {
  return !!(token.flags & BodyTokenFlags.NewLine);
}

export function isLeadingWhitespaceToken(token: BodyToken<unknown>): boolean {
  return !!(token.flags & BodyTokenFlags.LeadingWhitespace);
}

export function isTrailingWhitespaceToken(token: BodyToken<unknown>): boolean {
  return !!(token.flags & BodyTokenFlags.TrailingWhitespace);
}

export function isStringToken<F>(token: BodyToken<F>): token is BodyToken<F> & { readonly contents: string } {
  return typeof token.contents === 'string';
}

/** A token that carries an embedded form for the postprocessor to recurse into */
export function isFormToken<F>(token: BodyToken<F>): token is BodyToken<F> & { readonly contents: Exclude<F, string> } {
  return typeof token.contents !== 'string';
}
