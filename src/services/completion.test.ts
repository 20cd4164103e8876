import { describe, it, expect, vi } from 'vitest';
import OpenAI from 'openai';
import { OpenAICompletionService, type ChatClient } from './completion';
import { ServiceError } from '../utils/errors';

function fakeClient() {
  const create = vi.fn();
  const client: ChatClient = { chat: { completions: { create } } };
  return { client, create };
}

function reply(content: string | null) {
  return { choices: [{ index: 0, message: { role: 'assistant', content } }] };
}

const options = { model: 'gpt-4o', temperature: 0.7 };

describe('OpenAICompletionService', () => {
  it('renders the prompt and returns the message text', async () => {
    const { client, create } = fakeClient();
    create.mockResolvedValue(reply('```json\n{"purpose": "renew"}\n```'));
    const service = new OpenAICompletionService(client, options);

    await expect(service.complete('User input: {user_input}', { user_input: 'renew my policy' })).resolves.toBe(
      '```json\n{"purpose": "renew"}\n```',
    );
    expect(create).toHaveBeenCalledWith({
      model: 'gpt-4o',
      messages: [{ role: 'user', content: 'User input: renew my policy' }],
      temperature: 0.7,
    });
  });

  it('raises ServiceError on an empty reply', async () => {
    const { client, create } = fakeClient();
    create.mockResolvedValue(reply(null));
    const service = new OpenAICompletionService(client, options);

    await expect(service.complete('hi', {})).rejects.toThrow(new ServiceError('Empty response from gpt-4o'));
  });

  it('wraps transport failures', async () => {
    const { client, create } = fakeClient();
    create.mockRejectedValue(new Error('socket hang up'));
    const service = new OpenAICompletionService(client, options);

    const err = await service.complete('hi', {}).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ServiceError);
    if (!(err instanceof ServiceError)) return;
    expect(err.message).toBe('Completion request failed: socket hang up');
    expect(err.status).toBeUndefined();
  });

  it('keeps the HTTP status of API errors', async () => {
    const { client, create } = fakeClient();
    create.mockRejectedValue(new OpenAI.APIError(429, undefined, 'Rate limit reached', undefined));
    const service = new OpenAICompletionService(client, options);

    const err = await service.complete('hi', {}).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ServiceError);
    if (!(err instanceof ServiceError)) return;
    expect(err.status).toBe(429);
  });

  it('does not call the API when a prompt variable is missing', async () => {
    const { client, create } = fakeClient();
    const service = new OpenAICompletionService(client, options);

    await expect(service.complete('Call log: {call_log}', {})).rejects.toThrow('Missing prompt variable: call_log');
    expect(create).not.toHaveBeenCalled();
  });
});
