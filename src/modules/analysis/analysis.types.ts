/**
 * Deterministic prompt for one kind of analysis. The same query and data
 * always render the same prompt, which is what makes result caching valid.
 */
export interface PromptTemplate<T> {
  readonly kind: string;
  render(query: string, data: T): string;
}

export interface AnalysisOptions {
  timeoutMs?: number;
  model?: string;
}

export interface OllamaGenerateRequest {
  model: string;
  prompt: string;
  stream: false;
}

export interface OllamaGenerateResponse {
  model?: string;
  response?: string;
  done?: boolean;
}

export interface OllamaTagsResponse {
  models?: Array<{ name: string }>;
}

export const ANALYSIS_UNAVAILABLE =
  'Analysis unavailable: the language model could not be reached.';

export const NO_ANALYSIS = 'No analysis available';
