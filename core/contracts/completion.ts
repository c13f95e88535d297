export interface CompletionOptions {
  maxTokens?: number;
  temperature?: number;
  systemInstruction?: string;
  signal?: AbortSignal;
}

/**
 * Text completion service used by agent runtimes. Implementations report
 * failures as QuotaExceededError, ServiceUnavailableError or
 * InvalidRequestError.
 */
export interface CompletionCapability {
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

export const DEFAULT_MAX_TOKENS = 1024;
