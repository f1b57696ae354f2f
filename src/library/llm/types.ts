import type { LLMProviders, Message } from '../../types.js';

/**
 * Configuration for calling an LLM (internal).
 */
export interface CallLLMConfig {
  provider: LLMProviders;
  apiKey: string;
  messages: Message[];
  useThinking?: boolean;
}

/**
 * Options for a provider-backed LanguageModel.
 */
export interface ProviderModelOptions {
  provider: LLMProviders;
  apiKey: string;
  thinking?: boolean;
  /** Sent as the system message of every call */
  systemPrompt?: string;
}
