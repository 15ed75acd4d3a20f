export type Role = 'system' | 'user';

export interface Message {
  role: Role;
  content: string;
}

export interface ChatClient {
  /** Send the conversation and resolve with the raw response body. */
  completeChat(messages: readonly Message[]): Promise<string>;
}
