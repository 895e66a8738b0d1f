import type { Settings } from '../schemas/settings';
import { GenerationResponseSchema } from '../schemas/suggestion';
import { CATEGORIES, type FeatureSummary, type SuggestionPayload, type Transcript } from '../types';
import { describeError, logger } from '../util/logger';
import { MalformedResponseError, withTimeout } from '../util/timeout';
import type { GenerationCapability } from './capabilities';
import { localSuggestion } from './fallback';
import { sanitize } from './sanitize';
import { renderTranscript, tailExcerpt } from './transcript';

export type ComposerSettings = Pick<Settings, 'suggestionTranscriptChars' | 'maxBodyChars'>;

/**
 * Turns a positive decision into a suggestion. Once we have decided to speak,
 * failures degrade to a locally built tip instead of dropping the suggestion.
 */
export class SuggestionComposer {
  constructor(
    private readonly capability: GenerationCapability | null,
    private readonly settings: ComposerSettings
  ) {}

  async compose(features: FeatureSummary, transcript: Transcript): Promise<SuggestionPayload> {
    if (!this.capability) {
      logger.warn('Composer', 'Generation capability unavailable, using local suggestion');
      return localSuggestion(features);
    }

    const capability = this.capability;
    const request = {
      features,
      transcript: tailExcerpt(renderTranscript(transcript), this.settings.suggestionTranscriptChars),
      categories: CATEGORIES
    };

    try {
      const raw = await withTimeout('generation', capability.timeoutMs,
        signal => capability.generate(request, signal));
      const parsed = GenerationResponseSchema.safeParse(raw);
      if (!parsed.success) throw new MalformedResponseError('generation response has the wrong shape');
      const payload = sanitize(parsed.data, this.settings.maxBodyChars);
      logger.info('Composer', `Generated ${payload.category} suggestion: ${payload.title}`);
      return payload;
    } catch (error) {
      logger.warn('Composer', `Generation failed, using local suggestion: ${describeError(error)}`);
      return localSuggestion(features);
    }
  }
}
