import type { Message } from './index.js';

export const DEFAULT_SYSTEM_PROMPT = `You are an expert code assistant that is always concise, and always answers the user's question exactly.
You always provide a code block in your answer if your answer contains code, and the block must have the correct language annotation.`;

export const LANGUAGE_TEMPLATE = 'My preferred language is {{language}}.';

export const CONTEXT_TEMPLATE = 'Some context that may help you answer my question is:\n{{context}}';

/**
 * Replace `{{variable}}` placeholders in a template string.
 * Unknown variables are left as-is.
 */
export function renderPrompt(
  template: string,
  vars: Record<string, string>,
): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) => {
    return Object.hasOwn(vars, key) ? (vars[key] ?? match) : match;
  });
}

export interface PromptInput {
  inputText: string;
  language?: string;
  context?: string;
  systemPrompt?: string;
}

// Order matters to the model: system prompt, language, context, then the question.
export function buildMessages(input: PromptInput): Message[] {
  const { inputText, language, context, systemPrompt } = input;
  const messages: Message[] = [
    { role: 'system', content: systemPrompt ?? DEFAULT_SYSTEM_PROMPT },
  ];

  if (language !== undefined) {
    messages.push({ role: 'user', content: renderPrompt(LANGUAGE_TEMPLATE, { language }) });
  }
  if (context !== undefined) {
    messages.push({ role: 'user', content: renderPrompt(CONTEXT_TEMPLATE, { context }) });
  }
  messages.push({ role: 'user', content: inputText });

  return messages;
}
