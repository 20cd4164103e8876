import { describe, it, expect, vi, afterEach } from 'vitest';
import type { Server } from 'http';
import { createApp, listen, type AppOptions } from './app';
import { ServiceError } from './utils/errors';
import type { Logger } from './utils/logger';
import type { PromptVariables } from './types';

const log: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), child: () => log };

let server: Server | undefined;

async function start(responses: string[], options: Partial<AppOptions> = {}) {
  const complete = vi.fn<(prompt: string, variables: PromptVariables) => Promise<string>>();
  complete.mockRejectedValue(new Error('unexpected completion call'));
  for (const response of responses) complete.mockResolvedValueOnce(response);

  const app = createApp({ pipeline: { completion: { complete }, logger: log }, ...options });
  const listening = await listen(app, 0, '127.0.0.1');
  server = listening;

  const address = listening.address();
  if (!address || typeof address === 'string') throw new Error('server has no port');
  return { baseUrl: `http://127.0.0.1:${address.port}`, complete };
}

function post(url: string, body: unknown, headers: Record<string, string> = {}) {
  return fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(body),
  });
}

afterEach(async () => {
  const s = server;
  server = undefined;
  if (s) await new Promise<void>((resolve) => s.close(() => resolve()));
});

const intentJson = '{"purpose": "renew expired car insurance"}';
const planJson = '{"scenarios": [{"name": "Greeting", "description": "", "chainOfThought": "", "possibleActions": [{"action": "Ask about renewal", "next": "END"}]}]}';
const bundleJson = '```json\n{"system_prompt": "Renew expired car insurance.", "first_message": "Hello!"}\n```';

describe('GET /api/health', () => {
  it('reports ok', async () => {
    const { baseUrl } = await start([]);
    const res = await fetch(`${baseUrl}/api/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ok' });
  });
});

describe('POST /api/plans', () => {
  it('runs the planning pipeline', async () => {
    const { baseUrl, complete } = await start([intentJson, planJson, planJson, bundleJson]);

    const res = await post(`${baseUrl}/api/plans`, { request: 'Renew my car insurance', refinementIterations: 1 });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      intent: { purpose: 'renew expired car insurance' },
      plan: {
        scenarios: [
          {
            name: 'Greeting',
            description: '',
            chainOfThought: '',
            possibleActions: [{ action: 'Ask about renewal', next: 'END' }],
          },
        ],
      },
      systemPrompt: '{"system_prompt": "Renew expired car insurance.", "first_message": "Hello!"}',
      bundle: { systemPrompt: 'Renew expired car insurance.', firstMessage: 'Hello!' },
    });
    expect(complete).toHaveBeenCalledTimes(4);
  });

  it('uses the configured default iteration count', async () => {
    const { baseUrl, complete } = await start([intentJson, planJson, bundleJson], { refinementIterations: 0 });

    const res = await post(`${baseUrl}/api/plans`, { request: 'Renew my car insurance' });

    expect(res.status).toBe(200);
    expect(complete).toHaveBeenCalledTimes(3);
  });

  it('rejects an invalid body', async () => {
    const { baseUrl, complete } = await start([]);

    const res = await post(`${baseUrl}/api/plans`, { request: '   ', refinementIterations: 50 });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: 'Validation error' });
    expect(complete).not.toHaveBeenCalled();
  });

  it('requires the API key when one is configured', async () => {
    const { baseUrl } = await start([intentJson, planJson, bundleJson], {
      apiKey: 'test-secret',
      refinementIterations: 0,
    });

    const denied = await post(`${baseUrl}/api/plans`, { request: 'Renew my car insurance' });
    expect(denied.status).toBe(401);

    const wrong = await post(`${baseUrl}/api/plans`, { request: 'Renew my car insurance' }, { 'x-api-key': 'nope' });
    expect(wrong.status).toBe(401);

    const allowed = await post(
      `${baseUrl}/api/plans`,
      { request: 'Renew my car insurance' },
      { Authorization: 'Bearer test-secret' },
    );
    expect(allowed.status).toBe(200);
  });

  it('reports the failing stage when the model output is not JSON', async () => {
    const { baseUrl } = await start([intentJson, 'Here are some ideas for the call.']);

    const res = await post(`${baseUrl}/api/plans`, { request: 'Renew my car insurance' });

    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({ error: 'Model response was not valid JSON', stage: 'generate_call_plan' });
  });
});

describe('listen', () => {
  it('rejects when the port is already bound', async () => {
    const { baseUrl } = await start([]);
    const port = Number(new URL(baseUrl).port);
    const second = createApp({ pipeline: { completion: { complete: vi.fn() }, logger: log } });

    await expect(listen(second, port, '127.0.0.1')).rejects.toMatchObject({ code: 'EADDRINUSE' });
  });
});

describe('POST /api/summaries', () => {
  const summaryJson =
    '{"recipient":"Tony","purpose":"confirm meeting","result":"failure","failureReason":"car broken","nextSteps":"reschedule","additionalDetails":""}';

  it('formats transcript turns before summarizing', async () => {
    const { baseUrl, complete } = await start([summaryJson]);

    const res = await post(`${baseUrl}/api/summaries`, {
      transcript: [
        { role: 'agent', text: 'Hi Tony, calling to confirm 7pm.' },
        { role: 'user', text: 'My car is broken.' },
      ],
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ result: 'failure', failureReason: 'car broken' });
    expect(complete.mock.calls[0][1]).toEqual({
      call_log: 'AI Agent: Hi Tony, calling to confirm 7pm.\nRecipient: My car is broken.',
    });
  });

  it('reports an unexpected summary shape as a bad gateway', async () => {
    const { baseUrl } = await start(['{"result": "maybe"}']);

    const res = await post(`${baseUrl}/api/summaries`, { transcript: 'Hello?' });

    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({ error: 'Model response had an unexpected shape', stage: 'summarize_call_log' });
  });

  it('maps rate-limited completion failures to 503', async () => {
    const { baseUrl, complete } = await start([]);
    complete.mockRejectedValueOnce(new ServiceError('Completion request failed: rate limited', 429));

    const res = await post(`${baseUrl}/api/summaries`, { transcript: 'Hello?' });

    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({ error: 'Completion service failed' });
  });
});
