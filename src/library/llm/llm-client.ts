import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import {
  PROVIDER_SPECS,
  ANTHROPIC_THINKING_BUDGET_TOKENS,
} from '../constants.js';
import { ProviderError, toProviderError } from '../errors.js';
import type { LanguageModel, LLMResult, Message } from '../../types.js';
import type { CallLLMConfig, ProviderModelOptions } from './types.js';

/**
 * Call an LLM provider with the given messages.
 * Returns raw text output and token usage. Failures are thrown as
 * ProviderError, retryable for timeouts and rate limiting.
 */
export async function callLLM(config: CallLLMConfig): Promise<LLMResult> {
  const { provider, apiKey, messages, useThinking = false } = config;
  const spec = PROVIDER_SPECS[provider];

  try {
    // Anthropic
    if (provider.startsWith('anthropic')) {
      const client = new Anthropic({ apiKey });
      const streamOptions: Parameters<typeof client.messages.stream>[0] = {
        model: spec.model,
        max_tokens: spec.maxTokens,
        system: messages.find((m) => m.role === 'system')?.content,
        messages: messages
          .filter((m): m is Message & { role: 'user' | 'assistant' } => m.role !== 'system')
          .map((m) => ({ role: m.role, content: m.content })),
      };

      if (useThinking) {
        streamOptions.thinking = {
          type: 'enabled',
          budget_tokens: ANTHROPIC_THINKING_BUDGET_TOKENS,
        };
      }

      const stream = client.messages.stream(streamOptions);
      const finalMessage = await stream.finalMessage();

      const textBlocks = finalMessage.content
        .filter((block) => block.type === 'text')
        .map((block) => block.text);
      const text = textBlocks.length > 0 ? textBlocks.join(' ') : '';

      return {
        text,
        inputTokens: finalMessage.usage.input_tokens,
        outputTokens: finalMessage.usage.output_tokens,
      };
    }

    // OpenAI
    if (provider.startsWith('openai')) {
      const client = new OpenAI({ apiKey });
      const completionOptions: OpenAI.ChatCompletionCreateParamsNonStreaming = {
        model: spec.model,
        messages: messages.map((m) => ({ role: m.role, content: m.content })),
        max_completion_tokens: spec.maxTokens,
      };

      if (useThinking) {
        completionOptions.reasoning_effort = 'high';
      }

      const response = await client.chat.completions.create(completionOptions);
      const text = response.choices[0]?.message.content ?? '';

      return {
        text,
        inputTokens: response.usage?.prompt_tokens ?? 0,
        outputTokens: response.usage?.completion_tokens ?? 0,
      };
    }

    throw new ProviderError(`Unsupported provider: ${provider}`, {
      category: 'api_error',
    });
  } catch (error) {
    throw toProviderError(error, spec.model);
  }
}

/**
 * Wrap a provider as the text-in, text-out boundary used by the optimizer.
 */
export function createProviderModel(options: ProviderModelOptions): LanguageModel {
  const { provider, apiKey, thinking = false, systemPrompt } = options;
  return {
    model: PROVIDER_SPECS[provider].model,
    generate(prompt: string): Promise<LLMResult> {
      const messages: Message[] = systemPrompt
        ? [
            { role: 'system', content: systemPrompt },
            { role: 'user', content: prompt },
          ]
        : [{ role: 'user', content: prompt }];
      return callLLM({ provider, apiKey, messages, useThinking: thinking });
    },
  };
}
