import type { CompletionCapability, CompletionOptions } from '../core/contracts/completion';
import { AbortedError, InvalidRequestError } from '../core/errors';

interface MockCompletionOptions {
  response?: string;
  maxInputLength?: number;
  generateFn?: (prompt: string, options: CompletionOptions) => string | Promise<string>;
  /** Thrown from every call when set. */
  error?: Error;
}

export class MockCompletionAdapter implements CompletionCapability {
  private readonly response: string;
  private readonly maxInputLength: number;
  private readonly generateFn?: (prompt: string, options: CompletionOptions) => string | Promise<string>;
  private readonly error?: Error;
  private calls = 0;

  constructor(options: MockCompletionOptions = {}) {
    this.response = options.response ?? 'mock-response';
    this.maxInputLength = options.maxInputLength ?? 10_000;
    this.generateFn = options.generateFn;
    this.error = options.error;
  }

  get callCount(): number {
    return this.calls;
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    this.calls += 1;

    if (!prompt.trim()) {
      throw new InvalidRequestError('Prompt is required');
    }
    if (prompt.length > this.maxInputLength) {
      throw new InvalidRequestError('Prompt exceeds maximum length');
    }
    if (options.signal?.aborted) {
      throw new AbortedError('Completion was aborted');
    }
    if (this.error) {
      throw this.error;
    }

    return this.generateFn
      ? this.generateFn(prompt, options)
      : this.response;
  }
}
