import type { Message, PromptRepresentation } from '../types.js';
import { DEFAULT_EDITABLE_ROLE } from '../library/constants.js';
import { ConfigurationError } from '../library/errors.js';

export type EditableRole = Message['role'];

/**
 * Wrap a plain instruction as a text prompt.
 */
export function textPrompt(text: string): PromptRepresentation {
  return { kind: 'text', text };
}

function messagesOf(prompt: PromptRepresentation): readonly Message[] {
  return prompt.kind === 'text' ? [] : prompt.messages;
}

/**
 * Index of the message to rewrite: the first with the editable role,
 * falling back to the first message.
 */
function editableIndex(messages: readonly Message[], role: EditableRole): number {
  if (messages.length === 0) {
    throw new ConfigurationError('No valid prompt content found: prompt has no messages');
  }
  const index = messages.findIndex((m) => m.role === role);
  return index === -1 ? 0 : index;
}

/**
 * The content the optimizer rewrites.
 */
export function editableContent(
  prompt: PromptRepresentation,
  role: EditableRole = DEFAULT_EDITABLE_ROLE
): string {
  if (prompt.kind === 'text') return prompt.text;
  const messages = messagesOf(prompt);
  return messages[editableIndex(messages, role)].content;
}

function replaceEditable(
  messages: readonly Message[],
  role: EditableRole,
  content: string
): Message[] {
  const index = editableIndex(messages, role);
  return messages.map((m, i) => (i === index ? { ...m, content } : { ...m }));
}

/**
 * Rebuild a prompt of the same shape with new editable content. All other
 * messages are carried over unchanged.
 */
export function withContent(
  prompt: PromptRepresentation,
  content: string,
  role: EditableRole = DEFAULT_EDITABLE_ROLE
): PromptRepresentation {
  switch (prompt.kind) {
    case 'text':
      return { kind: 'text', text: content };
    case 'messages':
      return { kind: 'messages', messages: replaceEditable(prompt.messages, role, content) };
    case 'versioned':
      // A rewrite is a new version: keep the model metadata, drop the id
      return {
        kind: 'versioned',
        ...(prompt.name !== undefined ? { name: prompt.name } : {}),
        description: `Optimized version of ${prompt.name ?? 'prompt'}`,
        modelName: prompt.modelName,
        modelProvider: prompt.modelProvider,
        messages: replaceEditable(prompt.messages, role, content),
      };
  }
}
