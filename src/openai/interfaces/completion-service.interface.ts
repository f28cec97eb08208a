/**
 * A single generative completion call.
 */
export interface CompletionRequest {
  systemPrompt: string;
  userPrompt: string;

  /** Sampling temperature (0 = deterministic) */
  temperature: number;

  maxTokens: number;

  /** Ask the model to answer with a JSON object */
  json?: boolean;

  /** Overrides the configured collaborator timeout */
  timeoutMs?: number;
}

/**
 * Interface for generative text completion.
 * Rejects on call failure, timeout or an empty reply; callers own the fallback.
 */
export interface ICompletionService {
  complete(request: CompletionRequest): Promise<string>;
}

export const COMPLETION_SERVICE = Symbol('COMPLETION_SERVICE');
