import './helpers';
import { test, describe } from 'node:test';
import assert from 'node:assert/strict';
import type { DecisionCapability, DecisionResponse } from '../engine/capabilities';
import { DecisionGate } from '../engine/decide';
import { TRUNCATION_MARKER } from '../engine/transcript';
import { FakeDecision, makeFeatures, makeSettings, never, yes } from './helpers';

const withSignals = makeFeatures({ totalChars: 500, codeBlockCount: 1, languages: ['python'] });
const settings = makeSettings();

describe('DecisionGate pre-filters', () => {
  test('rejects a short session without calling the capability', async () => {
    const capability = yes();
    const result = await new DecisionGate(capability, settings)
      .decide({ ...withSignals, totalChars: 50 }, false, 'tail');
    assert.equal(result.shouldSuggest, false);
    assert.equal(result.source, 'prefilter');
    assert.equal(capability.calls.length, 0);
  });

  test('rejects while cooling down', async () => {
    const capability = yes();
    const result = await new DecisionGate(capability, settings).decide(withSignals, true, 'tail');
    assert.deepEqual(result, { shouldSuggest: false, reasoning: 'cooldown active', source: 'prefilter' });
    assert.equal(capability.calls.length, 0);
  });

  test('rejects a summary with no signals', async () => {
    const capability = yes();
    const result = await new DecisionGate(capability, settings).decide(makeFeatures({ totalChars: 500 }), false, 'tail');
    assert.equal(result.shouldSuggest, false);
    assert.equal(result.source, 'prefilter');
    assert.equal(capability.calls.length, 0);
  });
});

describe('DecisionGate classification', () => {
  test('trusts a positive answer and sends a bounded tail', async () => {
    const capability = yes('missing tests');
    const gate = new DecisionGate(capability, makeSettings({ decisionExcerptChars: 4000 }));
    const result = await gate.decide(withSignals, false, 'x'.repeat(5000));

    assert.deepEqual(result, { shouldSuggest: true, reasoning: 'missing tests', source: 'capability' });
    assert.equal(capability.calls.length, 1);
    assert.equal(capability.calls[0].excerpt, `${TRUNCATION_MARKER}\n${'x'.repeat(4000)}`);
    assert.equal(capability.calls[0].features, withSignals);
  });

  test('trusts a negative answer', async () => {
    const capability = new FakeDecision(async () => ({ recommendation: false, rationale: 'trivial edit' }));
    const result = await new DecisionGate(capability, settings).decide(withSignals, false, 'tail');
    assert.deepEqual(result, { shouldSuggest: false, reasoning: 'trivial edit', source: 'capability' });
  });

  test('fails closed when the capability throws', async () => {
    const capability = new FakeDecision(async () => { throw new Error('503 from upstream'); });
    const result = await new DecisionGate(capability, settings).decide(withSignals, false, 'tail');
    assert.equal(result.shouldSuggest, false);
    assert.equal(result.source, 'fallback');
  });

  test('fails closed and aborts the request on timeout', async () => {
    const capability = new FakeDecision(() => never<DecisionResponse>(), 20);
    const result = await new DecisionGate(capability, settings).decide(withSignals, false, 'tail');
    assert.equal(result.shouldSuggest, false);
    assert.equal(result.source, 'fallback');
    assert.equal(capability.signals[0].aborted, true);
  });

  test('fails closed on a malformed response', async () => {
    const malformed: DecisionCapability = {
      timeoutMs: 1000,
      decide: async () => JSON.parse('{"recommendation":"yes"}')
    };
    const result = await new DecisionGate(malformed, settings).decide(withSignals, false, 'tail');
    assert.equal(result.shouldSuggest, false);
    assert.equal(result.source, 'fallback');
  });

  test('fails closed without a capability', async () => {
    const result = await new DecisionGate(null, settings).decide(withSignals, false, 'tail');
    assert.equal(result.shouldSuggest, false);
    assert.equal(result.source, 'fallback');
  });
});
