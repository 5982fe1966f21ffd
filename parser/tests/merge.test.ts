import { describe, expect, test } from 'vitest';

import { createBodyAccumulator, finalizeBody, pushToken } from '../body/body-accumulator.js';
import { createBodyToken } from '../body/body-token.js';
import {
  dumpLeadingWhitespace,
  dumpNestedForm,
  dumpString,
  pushNewline,
  splitTrailingWhitespace
} from '../body/merge.js';
import { markForSplice, singleForm, textForm } from '../body/nested-form.js';
import { createStringAccumulator, finalizeString, pushChar } from '../body/string-accumulator.js';
import { tokenStrings } from './body-test-utils.js';

interface Tag {
  tag: string;
}

function run(text: string) {
  const acc = createStringAccumulator();
  for (const ch of text) pushChar(acc, ch);
  return acc;
}

function dumpedString(text: string): string[] {
  return tokenStrings(finalizeBody(dumpString(createBodyAccumulator(), run(text))));
}

describe('splitTrailingWhitespace', () => {
  test('splits off the whitespace suffix', () => {
    expect(splitTrailingWhitespace('abc  ')).toEqual(['abc', '  ']);
  });

  test('no trailing whitespace', () => {
    expect(splitTrailingWhitespace('a b')).toEqual(['a b', '']);
  });

  test('all whitespace', () => {
    expect(splitTrailingWhitespace(' \t\n')).toEqual(['', ' \t\n']);
  });

  test('empty string', () => {
    expect(splitTrailingWhitespace('')).toEqual(['', '']);
  });

  test('CRLF and unicode spaces are trimmed', () => {
    expect(splitTrailingWhitespace('a\u3000 \r\n')).toEqual(['a', '\u3000 \r\n']);
  });

  test('no-break spaces are kept in the main part', () => {
    expect(splitTrailingWhitespace('a\u00A0')).toEqual(['a\u00A0', '']);
    expect(splitTrailingWhitespace('a\u202F ')).toEqual(['a\u202F', ' ']);
  });
});

describe('pushNewline', () => {
  test('appends a newline token', () => {
    const body = pushNewline(createBodyAccumulator());
    expect(tokenStrings(finalizeBody(body))).toEqual(['"\\n" NewLine']);
  });
});

describe('dumpLeadingWhitespace', () => {
  test('appends the run as leading whitespace', () => {
    const body = dumpLeadingWhitespace(createBodyAccumulator(), run('  \t'));
    expect(tokenStrings(finalizeBody(body))).toEqual(['"  \\t" LeadingWhitespace']);
  });

  test('an empty run still appends an empty leading token', () => {
    const body = dumpLeadingWhitespace(createBodyAccumulator(), createStringAccumulator());
    expect(tokenStrings(finalizeBody(body))).toEqual(['"" LeadingWhitespace']);
  });
});

describe('dumpString', () => {
  test('text with trailing whitespace gives two tokens', () => {
    expect(dumpedString('abc  ')).toEqual(['"abc"', '"  " TrailingWhitespace']);
  });

  test('whitespace-only run gives only the trailing token', () => {
    expect(dumpedString('   ')).toEqual(['"   " TrailingWhitespace']);
  });

  test('text without trailing whitespace gives one plain token', () => {
    expect(dumpedString('abc')).toEqual(['"abc"']);
  });

  test('interior whitespace stays in the main token', () => {
    expect(dumpedString('a  b\t')).toEqual(['"a  b"', '"\\t" TrailingWhitespace']);
  });

  test('empty run leaves the accumulator unchanged', () => {
    const body = createBodyAccumulator();
    pushNewline(body);
    const result = dumpString(body, createStringAccumulator());
    expect(result).toBe(body);
    expect(tokenStrings(finalizeBody(result))).toEqual(['"\\n" NewLine']);
  });

  test('appends after existing tokens', () => {
    const body = pushNewline(createBodyAccumulator());
    expect(tokenStrings(finalizeBody(dumpString(body, run('x '))))).toEqual([
      '"\\n" NewLine',
      '"x"',
      '" " TrailingWhitespace'
    ]);
  });
});

describe('dumpNestedForm', () => {
  test('text form merges into the current run', () => {
    const body = createBodyAccumulator<Tag>();
    const [nextBody, nextStr] = dumpNestedForm(body, run('ab'), textForm('cd'), false);
    expect(nextBody).toBe(body);
    expect(finalizeBody(nextBody)).toHaveLength(0);
    expect(finalizeString(nextStr)).toBe('abcd');
  });

  test('single form holding a string merges into the current run', () => {
    const body = createBodyAccumulator<string>();
    const [nextBody, nextStr] = dumpNestedForm(body, run('ab'), singleForm('cd'), false);
    expect(nextBody).toBe(body);
    expect(finalizeBody(nextBody)).toHaveLength(0);
    expect(finalizeString(nextStr)).toBe('abcd');
  });

  test('single form holding an empty string pushes no token', () => {
    const [body, str] = dumpNestedForm(createBodyAccumulator<string>(), run('ab'), singleForm(''), false);
    expect(finalizeBody(body)).toHaveLength(0);
    expect(finalizeString(str)).toBe('ab');
  });

  test('single form flushes the run verbatim then pushes the form', () => {
    const [body, str] = dumpNestedForm(createBodyAccumulator<Tag>(), run('see  '), singleForm({ tag: 'b' }), false);
    expect(tokenStrings(finalizeBody(body))).toEqual(['"see  "', 'form {"tag":"b"}']);
    expect(finalizeString(str)).toBe('');
  });

  test('single form with an empty run pushes only the form', () => {
    const [body] = dumpNestedForm(createBodyAccumulator<Tag>(), createStringAccumulator(), singleForm({ tag: 'i' }), false);
    expect(tokenStrings(finalizeBody(body))).toEqual(['form {"tag":"i"}']);
  });

  test('form contents are kept by reference', () => {
    const form: Tag = { tag: 'em' };
    const [body] = dumpNestedForm(createBodyAccumulator<Tag>(), createStringAccumulator(), singleForm(form), false);
    expect(finalizeBody(body)[0].contents).toBe(form);
  });

  test('splice pushes each item as its own token', () => {
    const [body, str] = dumpNestedForm(createBodyAccumulator<string>(), createStringAccumulator(), markForSplice(['x', 'y']), false);
    expect(tokenStrings(finalizeBody(body))).toEqual(['"x"', '"y"']);
    expect(finalizeString(str)).toBe('');
  });

  test('splice after a run keeps the run first', () => {
    const [body] = dumpNestedForm(
      createBodyAccumulator<Tag>(), run('a '), markForSplice([{ tag: 'b' }, { tag: 'i' }]), false);
    expect(tokenStrings(finalizeBody(body))).toEqual(['"a "', 'form {"tag":"b"}', 'form {"tag":"i"}']);
  });

  test('empty splice only flushes the run', () => {
    const [body, str] = dumpNestedForm(createBodyAccumulator<Tag>(), run('ab'), markForSplice<Tag>([]), false);
    expect(tokenStrings(finalizeBody(body))).toEqual(['"ab"']);
    expect(finalizeString(str)).toBe('');
  });

  test('leading whitespace is dumped before the form', () => {
    const [body, str] = dumpNestedForm(createBodyAccumulator<Tag>(), run('  '), singleForm({ tag: 'b' }), true);
    expect(tokenStrings(finalizeBody(body))).toEqual(['"  " LeadingWhitespace', 'form {"tag":"b"}']);
    expect(finalizeString(str)).toBe('');
  });

  test('leading whitespace before a text form starts a new run with the text', () => {
    const [body, str] = dumpNestedForm(createBodyAccumulator<Tag>(), run('  '), textForm('cd'), true);
    expect(tokenStrings(finalizeBody(body))).toEqual(['"  " LeadingWhitespace']);
    expect(finalizeString(str)).toBe('cd');
  });

  test('leading whitespace with an empty run emits an empty leading token', () => {
    const [body] = dumpNestedForm(createBodyAccumulator<string>(), createStringAccumulator(), markForSplice(['x']), true);
    expect(tokenStrings(finalizeBody(body))).toEqual(['"" LeadingWhitespace', '"x"']);
  });

  test('tokens already in the accumulator are preserved', () => {
    const body = pushToken(createBodyAccumulator<Tag>(), createBodyToken<Tag>('intro'));
    const [next] = dumpNestedForm(body, run('x'), singleForm({ tag: 'b' }), false);
    expect(tokenStrings(finalizeBody(next))).toEqual(['"intro"', '"x"', 'form {"tag":"b"}']);
  });
});
