export * from './types';
export { extractFeatures, hasSignals } from './engine/signals';
export { parseTranscript, loadTranscript, renderTranscript, tailExcerpt } from './engine/transcript';
export { DecisionGate } from './engine/decide';
export { SuggestionComposer } from './engine/compose';
export { localSuggestion } from './engine/fallback';
export { SessionPipeline, createPipeline } from './engine/pipeline';
export type { PipelineDeps } from './engine/pipeline';
export type {
  DecisionCapability, DecisionRequest, DecisionResponse,
  GenerationCapability, GenerationRequest, GenerationResponse
} from './engine/capabilities';
export { OpenAIDecisionCapability, OpenAIGenerationCapability } from './openai/capabilities';
export { FileCooldownStore, MemoryCooldownStore } from './state/cooldownStore';
export type { CooldownStore } from './state/cooldownStore';
export { loadSettings, saveSettings, updateSettings, DEFAULT_SETTINGS } from './config';
export type { Settings } from './schemas/settings';
export { handleStopHook, formatSuggestion } from './cli/stopHook';
export { TimeoutError, MalformedResponseError } from './util/timeout';
