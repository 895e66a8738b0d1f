import './helpers';
import { test, describe } from 'node:test';
import assert from 'node:assert/strict';
import { extractFeatures, hasSignals } from '../engine/signals';
import type { Transcript } from '../types';
import { CODE_SESSION } from './helpers';

const single = (text: string): Transcript => [{ role: 'assistant', text }];

describe('extractFeatures', () => {
  test('empty transcript gives an empty summary', () => {
    assert.deepEqual(extractFeatures([]), {
      languages: [],
      frameworks: [],
      codeBlockCount: 0,
      errorIndicatorCount: 0,
      totalChars: 0,
      turnCount: 0,
      patterns: [],
      issues: [],
      sessionType: 'general-development'
    });
  });

  test('summarizes a small coding session', () => {
    assert.deepEqual(extractFeatures(CODE_SESSION), {
      languages: ['python'],
      frameworks: ['flask'],
      codeBlockCount: 1,
      errorIndicatorCount: 0,
      totalChars: 152,
      turnCount: 2,
      patterns: ['api-development'],
      issues: [],
      sessionType: 'general-development'
    });
  });

  test('is deterministic for the same transcript', () => {
    assert.deepEqual(extractFeatures(CODE_SESSION), extractFeatures(CODE_SESSION));
  });

  test('orders detections by first occurrence, deduplicated', () => {
    const features = extractFeatures(single('I ran docker compose up, then fixed the React component. React again, docker again.'));
    assert.deepEqual(features.frameworks, ['docker', 'react']);
  });

  test('takes the language from a fence info string', () => {
    const features = extractFeatures(single('```ts\nconst x = 1\n```'));
    assert.deepEqual(features.languages, ['typescript']);
    assert.equal(features.codeBlockCount, 1);
  });

  test('counts an unclosed trailing fence as a block', () => {
    assert.equal(extractFeatures(single('```\na\n```\n```\nb')).codeBlockCount, 2);
  });

  test('matches extensions at word boundaries', () => {
    assert.deepEqual(extractFeatures(single('removed stale cache.pyc files')).languages, []);
    assert.deepEqual(extractFeatures(single('edited main.py')).languages, ['python']);
  });

  test('counts Python traceback indicators', () => {
    const text = 'Traceback (most recent call last):\n  File "app.py", line 3, in <module>\nValueError: bad input';
    assert.equal(extractFeatures(single(text)).errorIndicatorCount, 3);
  });

  test('counts a bare traceback mention', () => {
    assert.equal(extractFeatures(single('The traceback points at the parser')).errorIndicatorCount, 1);
  });

  test('ignores fence info strings that are not known aliases', () => {
    const features = extractFeatures(single('plain words here\n```constructor\nx\n```\n```__proto__\ny\n```'));
    assert.deepEqual(features.languages, []);
    assert.equal(features.codeBlockCount, 2);
  });

  test('counts JavaScript stack frames', () => {
    const text = 'TypeError: x is not a function\n    at run (/src/index.js:10:5)\n    at main (/src/index.js:20:3)';
    assert.equal(extractFeatures(single(text)).errorIndicatorCount, 3);
  });

  test('flags issues in order of appearance', () => {
    const features = extractFeatures(single('const password = "test-secret"; // TODO remove'));
    assert.deepEqual(features.issues, ['hardcoded-credentials', 'leftover-markers']);
  });

  test('classifies a bug-fixing session', () => {
    assert.equal(extractFeatures(single('Found the bug in the parser')).sessionType, 'bug-fixing');
  });
});

describe('hasSignals', () => {
  test('is false for plain prose and true once code shows up', () => {
    assert.equal(hasSignals(extractFeatures(single('Thanks, that is all for today. See you tomorrow.'))), false);
    assert.equal(hasSignals(extractFeatures(CODE_SESSION)), true);
  });
});
