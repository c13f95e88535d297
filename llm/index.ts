export type { CompletionCapability, CompletionOptions } from '../core/contracts/completion';
export { MockCompletionAdapter } from './mock-adapter';
export { OpenAIAdapter } from './adapters/openai-adapter';
