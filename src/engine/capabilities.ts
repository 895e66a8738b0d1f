import type { DecisionResponse, GenerationResponse } from '../schemas/suggestion';
import type { Category, FeatureSummary } from '../types';

export interface DecisionRequest {
  features: FeatureSummary;
  excerpt: string; // bounded tail of the rendered transcript
}

export interface GenerationRequest {
  features: FeatureSummary;
  transcript: string;
  categories: readonly Category[];
}

/**
 * Cheap yes/no classifier. Callers bound every call by `timeoutMs` and abort
 * `signal` when it elapses; the capability itself never retries.
 */
export interface DecisionCapability {
  readonly timeoutMs: number;
  decide(request: DecisionRequest, signal: AbortSignal): Promise<DecisionResponse>;
}

/** Heavier generator for the suggestion text. Same timeout contract. */
export interface GenerationCapability {
  readonly timeoutMs: number;
  generate(request: GenerationRequest, signal: AbortSignal): Promise<GenerationResponse>;
}

export type { DecisionResponse, GenerationResponse };
