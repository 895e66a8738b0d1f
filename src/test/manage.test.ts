import './helpers';
import { test, describe } from 'node:test';
import assert from 'node:assert/strict';
import { hooksConfig, parseConfigFlags, selfTest, statusLines } from '../cli/manage';
import { makeSettings } from './helpers';

const now = new Date('2026-03-01T12:00:00.000Z');

describe('manage CLI', () => {
  test('parses config flags into a settings patch', () => {
    assert.deepEqual(
      parseConfigFlags(['--cooldown', '60', '--min-length', '250', '--decision-model', 'gpt-4o-mini']),
      { cooldownSeconds: 60, minSessionLength: 250, decisionModel: 'gpt-4o-mini' }
    );
  });

  test('rejects bad or unknown flags', () => {
    assert.throws(() => parseConfigFlags(['--cooldown', 'soon']), /--cooldown expects a non-negative integer, got soon/);
    assert.throws(() => parseConfigFlags(['--cooldown']), /got nothing/);
    assert.throws(() => parseConfigFlags(['--volume', '11']), /Unknown option: --volume/);
  });

  test('reports a session that never suggested', () => {
    const lines = statusLines(makeSettings(), null, now, false);
    assert.equal(lines[0], 'Suggestions: enabled');
    assert.equal(lines[2], 'Last suggestion: never');
    assert.equal(lines.length, 3);
  });

  test('reports the remaining cooldown', () => {
    const lines = statusLines(makeSettings({ enabled: false }), now.getTime() - 100_000, now, false);
    assert.equal(lines[0], 'Suggestions: disabled');
    assert.equal(lines[2], 'Last suggestion: 2026-03-01T11:58:20.000Z');
    assert.equal(lines[3], 'Cooldown: 200s remaining');
  });

  test('self-test passes offline with a key configured', () => {
    assert.deepEqual(selfTest(makeSettings(), 'test-secret'), {
      ok: true,
      lines: [
        'OK   suggestions enabled',
        'OK   API key configured',
        'OK   signal scan: python, flask',
        'OK   offline suggestion: Document the API endpoints you changed'
      ]
    });
  });

  test('self-test fails without a key and warns when disabled', () => {
    const result = selfTest(makeSettings({ enabled: false }), '');
    assert.equal(result.ok, false);
    assert.equal(result.lines[0], 'WARN suggestions disabled (run: session-guide enable)');
    assert.equal(result.lines[1], 'FAIL OPENAI_API_KEY is not set');
  });

  test('prints a Stop hook entry for the handler', () => {
    assert.deepEqual(hooksConfig('/opt/guide/stopHook.js'), {
      hooks: { Stop: [{ hooks: [{ type: 'command', command: 'node /opt/guide/stopHook.js', timeout: 60 }] }] }
    });
  });
});
