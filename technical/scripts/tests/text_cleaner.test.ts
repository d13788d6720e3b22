import assert from 'node:assert/strict';
import test from 'node:test';

import { cleanText } from '../lib/text_cleaner.js';

test('cleanText replaces non-breaking spaces and right-trims lines', () => {
  assert.equal(cleanText('alpha\u00a0beta   \ngamma\t\n'), 'alpha beta\ngamma');
});

test('cleanText collapses blank-line runs to a single blank line', () => {
  assert.equal(cleanText('one\n\n\n\ntwo\n\nthree'), 'one\n\ntwo\n\nthree');
  assert.equal(cleanText('one\n  \n \n\ntwo'), 'one\n\ntwo');
});

test('cleanText trims the whole blob but keeps inner indentation', () => {
  assert.equal(cleanText('\n\n   first\n    nested\n\n'), 'first\n    nested');
});

test('cleanText is idempotent', () => {
  const samples = [
    '',
    '   ',
    'a\u00a0\u00a0b \n\n\n\nc  ',
    '  - item one\n\n\n    - item two\u00a0\n',
    '\u00a0\nline\n\u00a0\n\u00a0\nline'
  ];

  for (const sample of samples) {
    const once = cleanText(sample);
    assert.equal(cleanText(once), once);
  }
});
