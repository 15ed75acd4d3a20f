import { ResponseFormatError } from './errors.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pull `choices[0].message.content` out of a chat completion body.
 */
export function extractContent(body: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (err) {
    throw new ResponseFormatError(
      `Response is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  const choices = isRecord(parsed) ? parsed['choices'] : undefined;
  if (!Array.isArray(choices)) {
    throw new ResponseFormatError('Response has no "choices" array');
  }
  const choice: unknown = choices[0];
  const message = isRecord(choice) ? choice['message'] : undefined;
  if (!isRecord(message)) {
    throw new ResponseFormatError('Response has no choices[0].message');
  }

  const content = message['content'];
  if (content === null) {
    throw new ResponseFormatError('content must not be null');
  }
  if (typeof content !== 'string') {
    throw new ResponseFormatError('Response has no string choices[0].message.content');
  }
  return content;
}

function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Collect the bodies of fenced blocks tagged with exactly `language`.
 * The tag is compared literally and case-sensitively; it must be followed by
 * whitespace, so `cs` does not pick up a `csharp` block.
 */
export function extractCodeBlocks(markdown: string, language: string): string[] {
  const pattern = new RegExp('```' + escapeRegex(language) + '(?=\\s)([\\s\\S]*?)```', 'g');
  const blocks: string[] = [];

  for (const match of markdown.matchAll(pattern)) {
    blocks.push((match[1] ?? '').trim());
  }

  return blocks;
}

/** Lines to print: the whole answer, or only the matching code blocks. */
export function formatResponse(content: string, language?: string): string[] {
  if (language === undefined) {
    return [content];
  }
  return extractCodeBlocks(content, language);
}
