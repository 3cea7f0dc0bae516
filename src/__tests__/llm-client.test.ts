import { describe, it, expect, beforeEach, vi } from 'vitest';
import { calculateBackoff, chatCompletion, trimMessages } from '../llm/client.js';
import { LLMProfile } from '../configManager.js';
import { ChatMessage } from '../llm/types.js';
import { countTokens } from '../utils/tokenCounter.js';

const { create } = vi.hoisted(() => ({ create: vi.fn() }));

vi.mock('openai', () => ({
  default: class {
    chat = { completions: { create } };
  }
}));

const profile: LLMProfile = { type: 'openai', baseURL: 'http://localhost:1234/v1', apiKey: 'test-secret', model: 'test-model' };
const messages: ChatMessage[] = [
  { role: 'system', content: 'You narrate.' },
  { role: 'user', content: 'Go on.' }
];

beforeEach(() => {
  create.mockReset();
});

describe('calculateBackoff', () => {
  it('doubles from the initial delay', () => {
    expect(calculateBackoff(0)).toBe(1000);
    expect(calculateBackoff(2)).toBe(4000);
    expect(calculateBackoff(1, 10)).toBe(20);
  });
});

describe('trimMessages', () => {
  it('keeps the system prompt, the last user message and as much recent history as fits', () => {
    const history: ChatMessage[] = [
      { role: 'system', content: 'sys' },
      { role: 'user', content: 'first question here' },
      { role: 'assistant', content: 'reply' },
      { role: 'user', content: 'now' }
    ];
    expect(trimMessages(history, 0)).toBe(history);
    expect(trimMessages(history, 1).map((m) => m.content)).toEqual(['sys', 'now']);
    const budget = countTokens('sys') + countTokens('reply') + countTokens('now');
    expect(trimMessages(history, budget).map((m) => m.content)).toEqual(['sys', 'reply', 'now']);
  });
});

describe('chatCompletion', () => {
  it('retries transient failures and returns the content', async () => {
    create.mockRejectedValueOnce({ status: 503 }).mockResolvedValueOnce({ choices: [{ message: { content: 'Onward.' } }] });

    expect(await chatCompletion(profile, messages, { json: true, retryDelayMs: 1 })).toBe('Onward.');
    expect(create).toHaveBeenCalledTimes(2);
    expect(create.mock.calls[0][0]).toMatchObject({ model: 'test-model', response_format: { type: 'json_object' } });
  });

  it('rethrows a non-retryable error after one attempt', async () => {
    const badRequest = Object.assign(new Error('bad request'), { status: 400 });
    create.mockRejectedValue(badRequest);

    await expect(chatCompletion(profile, messages, { retryDelayMs: 1 })).rejects.toBe(badRequest);
    expect(create).toHaveBeenCalledTimes(1);
  });

  it('gives up after three transient failures', async () => {
    create.mockRejectedValue({ status: 502 });

    await expect(chatCompletion(profile, messages, { retryDelayMs: 1 })).rejects.toEqual({ status: 502 });
    expect(create).toHaveBeenCalledTimes(3);
  });
});
