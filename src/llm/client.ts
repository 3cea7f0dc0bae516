import OpenAI from 'openai';
import { LLMProfile } from '../configManager.js';
import { isRetryableError } from '../errors.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { countTokens } from '../utils/tokenCounter.js';
import { ChatMessage, CompletionOptions } from './types.js';

const llmLog = createLogger(NAMESPACES.llm.client);

// Retry configuration
const MAX_RETRIES = 3;
const INITIAL_BACKOFF_MS = 1000; // 1 second
const BACKOFF_MULTIPLIER = 2; // Double each retry

export function calculateBackoff(retryCount: number, initialMs = INITIAL_BACKOFF_MS): number {
  return initialMs * Math.pow(BACKOFF_MULTIPLIER, retryCount);
}

async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Keep the system prompt and the last user message; fill the remaining budget
 * with the most recent history.
 */
export function trimMessages(messages: ChatMessage[], maxTokens: number): ChatMessage[] {
  if (!maxTokens || messages.length <= 2) return messages;

  const systemMessage = messages.find((msg) => msg.role === 'system');
  const userMessages = messages.filter((msg) => msg.role === 'user');
  const currentUserMessage = userMessages[userMessages.length - 1];
  if (!systemMessage || !currentUserMessage) return messages;

  const baseTokens = countTokens(systemMessage.content) + countTokens(currentUserMessage.content);
  if (maxTokens - baseTokens <= 0) return [systemMessage, currentUserMessage];

  const trimmed: ChatMessage[] = [systemMessage];
  let usedTokens = baseTokens;
  const historyMessages = messages.filter((msg) => msg !== systemMessage && msg !== currentUserMessage);
  for (let i = historyMessages.length - 1; i >= 0; i--) {
    const msgTokens = countTokens(historyMessages[i].content);
    if (usedTokens + msgTokens > maxTokens) break;
    trimmed.splice(1, 0, historyMessages[i]);
    usedTokens += msgTokens;
  }
  trimmed.push(currentUserMessage);
  return trimmed;
}

/**
 * Send a chat completion to an OpenAI-compatible endpoint, retrying transient
 * failures with exponential backoff. The last error is rethrown unchanged so
 * callers can classify it.
 */
export async function chatCompletion(profile: LLMProfile, messages: ChatMessage[], options: CompletionOptions = {}): Promise<string> {
  let lastError: unknown = new Error('no attempt made');
  for (let retryCount = 0; retryCount < MAX_RETRIES; retryCount++) {
    try {
      llmLog('attempt %d/%d on %s', retryCount + 1, MAX_RETRIES, profile.baseURL);
      const result = await attemptChatCompletion(profile, messages, options);
      if (retryCount > 0) llmLog('retry succeeded on attempt %d', retryCount + 1);
      return result;
    } catch (error) {
      lastError = error;
      if (!isRetryableError(error)) {
        llmLog('non-retryable error: %s', errorMessage(error));
        break;
      }
      if (retryCount < MAX_RETRIES - 1) {
        const backoffMs = calculateBackoff(retryCount, options.retryDelayMs);
        llmLog('retryable error, waiting %dms: %s', backoffMs, errorMessage(error));
        await sleep(backoffMs);
      } else {
        llmLog('max retries (%d) reached', MAX_RETRIES);
      }
    }
  }
  throw lastError;
}

async function attemptChatCompletion(profile: LLMProfile, messages: ChatMessage[], options: CompletionOptions): Promise<string> {
  const client = new OpenAI({
    apiKey: profile.apiKey || 'not-needed',
    baseURL: profile.baseURL,
    maxRetries: 0
  });
  const model = profile.model || 'gpt-4o-mini';
  const sampler = profile.sampler ?? {};
  const response = await client.chat.completions.create({
    model,
    messages: trimMessages(messages, sampler.maxContextTokens ?? 0),
    temperature: sampler.temperature,
    top_p: sampler.topP,
    max_tokens: sampler.max_completion_tokens,
    frequency_penalty: sampler.frequencyPenalty,
    presence_penalty: sampler.presencePenalty,
    stop: sampler.stop,
    ...(options.json || profile.format === 'json' ? { response_format: { type: 'json_object' as const } } : {})
  });
  return response.choices[0]?.message?.content ?? '';
}
