import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { DEFAULT_SETTINGS } from '../config';
import type {
  DecisionCapability, DecisionRequest, DecisionResponse,
  GenerationCapability, GenerationRequest, GenerationResponse
} from '../engine/capabilities';
import { extractFeatures } from '../engine/signals';
import type { Settings } from '../schemas/settings';
import type { FeatureSummary, Transcript } from '../types';
import { configureLogger } from '../util/logger';

configureLogger({ level: 'silent' });

export const CODE_SESSION: Transcript = [
  { role: 'user', text: 'Add a /users endpoint to the Flask app and return JSON.' },
  {
    role: 'assistant',
    text: "Here is the route:\n```python\n@app.route('/users')\ndef list_users():\n    return jsonify(users)\n```"
  }
];

export function makeSettings(patch: Partial<Settings> = {}): Settings {
  return { ...DEFAULT_SETTINGS, ...patch };
}

export function makeFeatures(patch: Partial<FeatureSummary> = {}): FeatureSummary {
  return { ...extractFeatures([]), ...patch };
}

export function tempDir(): string {
  return mkdtempSync(path.join(tmpdir(), 'session-guide-'));
}

/** A promise that never settles, for exercising timeouts. */
export function never<T>(): Promise<T> {
  return new Promise<T>(() => {});
}

export class FakeDecision implements DecisionCapability {
  calls: DecisionRequest[] = [];
  signals: AbortSignal[] = [];

  constructor(
    private readonly respond: (request: DecisionRequest) => Promise<DecisionResponse>,
    readonly timeoutMs = 1000
  ) {}

  decide(request: DecisionRequest, signal: AbortSignal): Promise<DecisionResponse> {
    this.calls.push(request);
    this.signals.push(signal);
    return this.respond(request);
  }
}

export class FakeGeneration implements GenerationCapability {
  calls: GenerationRequest[] = [];

  constructor(
    private readonly respond: (request: GenerationRequest) => Promise<GenerationResponse>,
    readonly timeoutMs = 1000
  ) {}

  generate(request: GenerationRequest): Promise<GenerationResponse> {
    this.calls.push(request);
    return this.respond(request);
  }
}

export const yes = (rationale = 'untested route') =>
  new FakeDecision(async () => ({ recommendation: true, rationale }));

export const generated = (response: GenerationResponse) =>
  new FakeGeneration(async () => response);
