import type { Settings } from '../schemas/settings';
import { DecisionResponseSchema } from '../schemas/suggestion';
import type { DecisionResult, FeatureSummary } from '../types';
import { describeError, logger } from '../util/logger';
import { MalformedResponseError, withTimeout } from '../util/timeout';
import type { DecisionCapability } from './capabilities';
import { hasSignals } from './signals';
import { tailExcerpt } from './transcript';

export type GateSettings = Pick<Settings, 'minSessionLength' | 'decisionExcerptChars'>;

const no = (reasoning: string, source: DecisionResult['source']): DecisionResult =>
  ({ shouldSuggest: false, reasoning, source });

export class DecisionGate {
  constructor(
    private readonly capability: DecisionCapability | null,
    private readonly settings: GateSettings
  ) {}

  async decide(features: FeatureSummary, cooldownActive: boolean, rawTranscriptTail: string): Promise<DecisionResult> {
    if (features.totalChars < this.settings.minSessionLength) {
      return no(`session too short (${features.totalChars} < ${this.settings.minSessionLength} chars)`, 'prefilter');
    }
    if (cooldownActive) {
      return no('cooldown active', 'prefilter');
    }
    if (!hasSignals(features)) {
      return no('no code, tool or pattern signals detected', 'prefilter');
    }

    // Fail closed: without a working classifier we stay silent.
    if (!this.capability) {
      return no('decision capability unavailable', 'fallback');
    }

    const capability = this.capability;
    const excerpt = tailExcerpt(rawTranscriptTail, this.settings.decisionExcerptChars);
    try {
      const raw = await withTimeout('decision', capability.timeoutMs,
        signal => capability.decide({ features, excerpt }, signal));
      const parsed = DecisionResponseSchema.safeParse(raw);
      if (!parsed.success) throw new MalformedResponseError('decision response has the wrong shape');

      logger.info('Gate', `Decision: ${parsed.data.recommendation ? 'YES' : 'NO'} (${parsed.data.rationale})`);
      return {
        shouldSuggest: parsed.data.recommendation,
        reasoning: parsed.data.rationale,
        source: 'capability'
      };
    } catch (error) {
      logger.warn('Gate', `Decision capability failed, not suggesting: ${describeError(error)}`);
      return no(`decision capability failed: ${describeError(error)}`, 'fallback');
    }
  }
}
