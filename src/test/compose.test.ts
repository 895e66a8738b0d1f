import './helpers';
import { test, describe } from 'node:test';
import assert from 'node:assert/strict';
import type { GenerationResponse } from '../engine/capabilities';
import { SuggestionComposer } from '../engine/compose';
import { localSuggestion } from '../engine/fallback';
import { TRUNCATION_MARKER } from '../engine/transcript';
import { CATEGORIES } from '../types';
import { CODE_SESSION, FakeGeneration, generated, makeFeatures, makeSettings, never } from './helpers';

const features = makeFeatures({ totalChars: 152, languages: ['python'], frameworks: ['flask'], patterns: ['api-development'] });
const settings = makeSettings();

describe('SuggestionComposer', () => {
  test('cleans up a generated suggestion', async () => {
    const capability = generated({ category: 'Security', title: '## Rotate the leaked key\nextra line', body: '  Move it to the environment.  ' });
    const payload = await new SuggestionComposer(capability, settings).compose(features, CODE_SESSION);
    assert.deepEqual(payload, {
      category: 'security',
      title: 'Rotate the leaked key',
      body: 'Move it to the environment.',
      origin: 'generated'
    });
    assert.equal(capability.calls.length, 1);
  });

  test('coerces an unknown category to quality', async () => {
    const capability = generated({ category: 'style', title: 'Rename helpers', body: 'Use verbs.' });
    const payload = await new SuggestionComposer(capability, settings).compose(features, CODE_SESSION);
    assert.equal(payload.category, 'quality');
    assert.equal(payload.origin, 'generated');
  });

  test('sends the category list and a bounded transcript', async () => {
    const capability = generated({ category: 'testing', title: 'Add tests', body: 'Cover the route.' });
    await new SuggestionComposer(capability, makeSettings({ suggestionTranscriptChars: 10 })).compose(features, CODE_SESSION);
    assert.deepEqual(capability.calls[0].categories, CATEGORIES);
    assert.equal(capability.calls[0].transcript, `${TRUNCATION_MARKER}\nusers)\n\`\`\``);
  });

  test('clips an overlong body', async () => {
    const capability = generated({ category: 'testing', title: 'Add tests', body: 'abcdefghijklmno' });
    const payload = await new SuggestionComposer(capability, makeSettings({ maxBodyChars: 10 })).compose(features, CODE_SESSION);
    assert.equal(payload.body, 'abcdefghi…');
  });

  test('falls back to a local suggestion when generation throws', async () => {
    const capability = new FakeGeneration(async () => { throw new Error('connection reset'); });
    const payload = await new SuggestionComposer(capability, settings).compose(features, CODE_SESSION);
    assert.deepEqual(payload, localSuggestion(features));
    assert.equal(payload.origin, 'fallback');
  });

  test('falls back when generation times out', async () => {
    const capability = new FakeGeneration(() => never<GenerationResponse>(), 20);
    const payload = await new SuggestionComposer(capability, settings).compose(features, CODE_SESSION);
    assert.equal(payload.origin, 'fallback');
    assert.ok(payload.body.length > 0);
    assert.ok(CATEGORIES.includes(payload.category));
  });

  test('falls back when the suggestion has no body', async () => {
    const capability = generated({ category: 'testing', title: 'Add tests', body: '   ' });
    const payload = await new SuggestionComposer(capability, settings).compose(features, CODE_SESSION);
    assert.equal(payload.origin, 'fallback');
  });

  test('falls back without a capability', async () => {
    const payload = await new SuggestionComposer(null, settings).compose(features, CODE_SESSION);
    assert.deepEqual(payload, localSuggestion(features));
  });
});

describe('localSuggestion', () => {
  test('uses the first detected pattern and names the technologies', () => {
    assert.deepEqual(localSuggestion(features), {
      category: 'documentation',
      title: 'Document the API endpoints you changed',
      body: 'Endpoints changed in this session. Record request and response shapes and error codes next to the code so clients do not have to read the handler.'
        + '\n\nDetected in this session: python, flask.'
        + '\n\n_Offline tip: the suggestion service was unavailable._',
      origin: 'fallback'
    });
  });

  test('ranks security issues above everything else', () => {
    const payload = localSuggestion(makeFeatures({ issues: ['leftover-markers', 'hardcoded-credentials'], patterns: ['testing'] }));
    assert.equal(payload.category, 'security');
    assert.equal(payload.title, 'Move hard-coded credentials out of the source');
  });

  test('falls back to the session type', () => {
    const payload = localSuggestion(makeFeatures({ sessionType: 'bug-fixing' }));
    assert.equal(payload.category, 'testing');
    assert.equal(payload.title, 'Add a regression test for the bug you fixed');
    assert.equal(payload.body, 'Reproduce the bug in a test before moving on, and note the root cause next to the fix.\n\n_Offline tip: the suggestion service was unavailable._');
  });
});
