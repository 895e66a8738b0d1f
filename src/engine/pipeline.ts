import { CFG } from '../config';
import { createOpenAIClient, type ClientOptions } from '../openai/client';
import { OpenAIDecisionCapability, OpenAIGenerationCapability } from '../openai/capabilities';
import type { Settings } from '../schemas/settings';
import { FileCooldownStore, type CooldownStore } from '../state/cooldownStore';
import type { SuggestionPayload, Transcript } from '../types';
import { describeError, logger } from '../util/logger';
import type { DecisionCapability, GenerationCapability } from './capabilities';
import { SuggestionComposer } from './compose';
import { DecisionGate } from './decide';
import { extractFeatures } from './signals';
import { renderTranscript } from './transcript';

export interface PipelineDeps {
  settings: Settings;
  cooldown: CooldownStore;
  decision: DecisionCapability | null;
  generation: GenerationCapability | null;
}

/**
 * Session-end pipeline: extract, gate, compose, record. `run` never rejects;
 * every failure that escapes the gate and composer resolves to null.
 */
export class SessionPipeline {
  private readonly gate: DecisionGate;
  private readonly composer: SuggestionComposer;

  constructor(private readonly deps: PipelineDeps) {
    this.gate = new DecisionGate(deps.decision, deps.settings);
    this.composer = new SuggestionComposer(deps.generation, deps.settings);
  }

  async run(transcript: Transcript, now: Date = new Date()): Promise<SuggestionPayload | null> {
    try {
      return await this.runUnguarded(transcript, now);
    } catch (error) {
      logger.error('Pipeline', `Unexpected failure, no suggestion: ${describeError(error)}`);
      return null;
    }
  }

  private async runUnguarded(transcript: Transcript, now: Date): Promise<SuggestionPayload | null> {
    if (!this.deps.settings.enabled) {
      logger.info('Pipeline', 'Suggestions disabled in settings');
      return null;
    }

    const features = extractFeatures(transcript);
    logger.debug('Pipeline', `Features: ${JSON.stringify(features)}`);

    const cooldownActive = this.deps.cooldown.isCoolingDown(now);
    const decision = await this.gate.decide(features, cooldownActive, renderTranscript(transcript));
    if (!decision.shouldSuggest) {
      logger.info('Pipeline', `No suggestion (${decision.source}): ${decision.reasoning}`);
      return null;
    }

    const payload = await this.composer.compose(features, transcript);

    try {
      this.deps.cooldown.recordSuggestion(now);
    } catch (error) {
      // Fail open: the suggestion is still delivered, the next run may repeat sooner.
      logger.error('Pipeline', `Failed to record cooldown: ${describeError(error)}`);
    }
    return payload;
  }
}

export interface CreatePipelineOptions extends ClientOptions {
  homeDir?: string;
}

/** Wires the file-backed cooldown and OpenAI capabilities from settings. */
export function createPipeline(settings: Settings, options: CreatePipelineOptions = {}): SessionPipeline {
  const client = createOpenAIClient(options);
  return new SessionPipeline({
    settings,
    cooldown: new FileCooldownStore(options.homeDir ?? CFG.HOME_DIR, settings.cooldownSeconds),
    decision: client && new OpenAIDecisionCapability(client, settings.decisionModel, settings.decisionTimeoutMs),
    generation: client && new OpenAIGenerationCapability(client, settings.suggestionModel, settings.suggestionTimeoutMs)
  });
}
