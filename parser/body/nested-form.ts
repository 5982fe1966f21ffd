/**
 * Values a reader hands to the merge engine when scanning meets something
 * that is not a plain character.
 */

export enum NestedFormKind {
  /** A string produced by the grammar; merged into the current text run */
  Text = 'Text',
  /** One nested form, kept as a single token */
  Single = 'Single',
  /** A sequence flattened into sibling tokens */
  Splice = 'Splice'
}

export interface TextForm {
  readonly kind: NestedFormKind.Text;
  readonly text: string;
}

export interface SingleForm<F> {
  readonly kind: NestedFormKind.Single;
  readonly value: F;
}

export interface SpliceForm<F> {
  readonly kind: NestedFormKind.Splice;
  readonly items: readonly F[];
}

export type NestedForm<F> = TextForm | SingleForm<F> | SpliceForm<F>;

export function textForm(text: string): TextForm {
  return { kind: NestedFormKind.Text, text };
}

export function singleForm<F>(value: F): SingleForm<F> {
  return { kind: NestedFormKind.Single, value };
}

/** Marks the items to be spliced into the body part of the enclosing reader. */
export function markForSplice<F>(items: readonly F[]): SpliceForm<F> {
  return { kind: NestedFormKind.Splice, items };
}

/**
 * Classifies a raw value returned by a nested read: strings merge into the
 * text run, anything else becomes a single form.
 */
export function toNestedForm<F>(value: string | F): NestedForm<F> {
  return typeof value === 'string' ? textForm(value) : singleForm(value);
}
