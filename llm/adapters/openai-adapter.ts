import { z } from 'zod';
import { DEFAULT_MAX_TOKENS, type CompletionCapability, type CompletionOptions } from '../../core/contracts/completion';
import {
  AbortedError,
  InvalidRequestError,
  QuotaExceededError,
  ServiceUnavailableError
} from '../../core/errors';

interface OpenAIAdapterOptions {
  apiKey: string;
  model: string;
  baseUrl?: string;
  timeoutMs?: number;
  organization?: string;
}

const chatCompletionSchema = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullable().optional() }).optional(),
    text: z.string().optional()
  })).optional()
});

/**
 * Completion over an OpenAI-compatible `/chat/completions` endpoint.
 * HTTP 429 maps to QuotaExceeded, 5xx, network errors and timeouts to
 * ServiceUnavailable, other 4xx to InvalidRequest.
 */
export class OpenAIAdapter implements CompletionCapability {
  private readonly apiKey: string;
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly organization?: string;

  constructor(options: OpenAIAdapterOptions) {
    if (!options.apiKey) {
      throw new Error('OpenAI API key required');
    }
    if (!options.model) {
      throw new Error('OpenAI model required');
    }
    this.apiKey = options.apiKey;
    this.model = options.model;
    this.baseUrl = options.baseUrl ?? 'https://api.openai.com/v1';
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.organization = options.organization;
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    if (!prompt.trim()) {
      throw new InvalidRequestError('Prompt is required');
    }

    const messages = options.systemInstruction
      ? [{ role: 'system', content: options.systemInstruction }, { role: 'user', content: prompt }]
      : [{ role: 'user', content: prompt }];

    const payload = {
      model: this.model,
      messages,
      max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
      temperature: options.temperature ?? 0.2
    };

    const response = await fetchWithTimeout(`${trimSlash(this.baseUrl)}/chat/completions`, {
      method: 'POST',
      headers: buildHeaders(this.apiKey, this.organization),
      body: JSON.stringify(payload)
    }, this.timeoutMs, options.signal);

    if (!response.ok) {
      throw classifyStatus(response.status);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new ServiceUnavailableError('OpenAI returned a malformed response body', { cause: error });
    }

    const parsed = chatCompletionSchema.safeParse(body);
    const choice = parsed.success ? parsed.data.choices?.[0] : undefined;
    const content = choice?.message?.content ?? choice?.text;
    if (!content) {
      throw new InvalidRequestError('OpenAI response missing content');
    }
    return content;
  }
}

export function classifyStatus(status: number): Error {
  if (status === 429) {
    return new QuotaExceededError('OpenAI API quota exceeded (429)');
  }
  if (status >= 500) {
    return new ServiceUnavailableError(`OpenAI API unavailable (${status})`);
  }
  return new InvalidRequestError(`OpenAI API rejected the request (${status})`);
}

function trimSlash(url: string): string {
  return url.endsWith('/') ? url.slice(0, -1) : url;
}

function buildHeaders(apiKey: string, organization?: string): Record<string, string> {
  const headers: Record<string, string> = {
    Authorization: `Bearer ${apiKey}`,
    'Content-Type': 'application/json'
  };

  if (organization) {
    headers['OpenAI-Organization'] = organization;
  }

  return headers;
}

async function fetchWithTimeout(
  url: string,
  init: RequestInit,
  timeoutMs: number,
  callerSignal?: AbortSignal
): Promise<Response> {
  if (callerSignal?.aborted) {
    throw new AbortedError('Completion was aborted');
  }

  const controller = new AbortController();
  let timedOut = false;
  const timeout = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const forwardAbort = (): void => controller.abort();
  callerSignal?.addEventListener('abort', forwardAbort, { once: true });

  try {
    return await fetch(url, { ...init, signal: controller.signal });
  } catch (error) {
    if (timedOut) {
      throw new ServiceUnavailableError(`OpenAI request timed out after ${timeoutMs}ms`, { cause: error });
    }
    if (callerSignal?.aborted) {
      throw new AbortedError('Completion was aborted', { cause: error });
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new ServiceUnavailableError(`OpenAI request failed: ${message}`, { cause: error });
  } finally {
    clearTimeout(timeout);
    callerSignal?.removeEventListener('abort', forwardAbort);
  }
}
