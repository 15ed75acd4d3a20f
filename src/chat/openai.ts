import { HttpError } from '../errors.js';
import { log } from '../logger.js';
import type { ChatClient, Message } from './index.js';

export interface OpenAIChatClientOptions {
  apiKey: string;
  model: string;
  endpoint: string;
  fetch?: typeof fetch;
  /** Receives the raw body of a failed response. Defaults to stderr. */
  writeErr?: (text: string) => void;
}

/**
 * Single-shot client for an OpenAI-compatible `/chat/completions` endpoint.
 * No streaming and no retry: one POST, one full body.
 */
export class OpenAIChatClient implements ChatClient {
  private apiKey: string;
  private model: string;
  private endpoint: string;
  private fetchFn: typeof fetch;
  private writeErr: (text: string) => void;

  constructor(opts: OpenAIChatClientOptions) {
    this.apiKey = opts.apiKey;
    this.model = opts.model;
    this.endpoint = opts.endpoint;
    this.fetchFn = opts.fetch ?? fetch;
    this.writeErr = opts.writeErr ?? ((text) => process.stderr.write(text));
  }

  async completeChat(messages: readonly Message[]): Promise<string> {
    const body = {
      model: this.model,
      messages: messages.map(({ role, content }) => ({ role, content })),
    };

    log(`POST ${this.endpoint} (model ${this.model}, ${messages.length} messages)`);
    const response = await this.fetchFn(this.endpoint, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify(body),
    });

    const text = await response.text();
    log(`Response status ${response.status}`);

    if (!response.ok) {
      this.writeErr(`${text}\n`);
      throw new HttpError(response.status, response.statusText, text);
    }

    return text;
  }
}
