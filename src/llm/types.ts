/**
 * Chat message format for LLM APIs
 */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionOptions {
  /** Ask the backend for a JSON object response where it supports one. */
  json?: boolean;
  /** Base delay before the first retry; doubles on each attempt. */
  retryDelayMs?: number;
}
