import type { Logger } from '../observability/logger.js';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatOptions {
  temperature: number;
  maxTokens: number;
}

/** Body of one streaming chat-completion request. */
export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  max_tokens: number;
  stream: true;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

/** Everything a session needs besides its agent and snapshot. */
export interface SessionSettings {
  baseUrl: string;
  apiKey: string;
  rules: string;
  model: string;
  options: ChatOptions;
  timeoutMs: number;
  fetch?: FetchLike;
  logger?: Logger;
}
