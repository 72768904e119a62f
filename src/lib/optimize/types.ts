/** Thumbs up (1) or thumbs down (0) recorded for a response. */
export type PreferenceLabel = 0 | 1;

/** Training example: a past query, the answer it got, and the user's verdict. */
export interface LabeledExample {
  query: string;
  response: string;
  preferenceLabel: PreferenceLabel;
  embedding?: number[];
}

/** A training example retrieved for a particular query. */
export interface Neighbor extends LabeledExample {
  embedding: number[];
  similarity: number;
}

/** Which parse path produced an optimisation result. */
export type OptimizationSource = 'structured' | 'raw_text' | 'fallback';

export interface OptimizationResult {
  optimizedPrompt: string;
  rationale: string;
  source: OptimizationSource;
}

export interface ResponsePair {
  optimizedResponse: string;
  baselineResponse: string;
}

/** Which path produced a judgment. */
export type JudgmentSource = 'structured' | 'unparseable' | 'error';

export interface Judgment {
  score: PreferenceLabel;
  rationale: string;
  source: JudgmentSource;
}

export interface JudgmentPair {
  optimizedScore: PreferenceLabel;
  optimizedRationale: string;
  baselineScore: PreferenceLabel;
  baselineRationale: string;
}

/** Sampling settings for a text-generation call. */
export interface GenerationSettings {
  temperature?: number;
  maxTokens?: number;
}
