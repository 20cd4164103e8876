import OpenAI from 'openai';
import type { PromptVariables } from '../types';
import { renderPrompt } from '../utils/template';
import { ServiceError } from '../utils/errors';
import { logger, errorMessage } from '../utils/logger';

/** Text-generation boundary used by every pipeline stage. */
export interface CompletionService {
  complete(prompt: string, variables: PromptVariables): Promise<string>;
}

/** The slice of the OpenAI client the completion service calls. */
export interface ChatClient {
  chat: {
    completions: {
      create(body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming): Promise<OpenAI.Chat.ChatCompletion>;
    };
  };
}

export interface OpenAICompletionOptions {
  model: string;
  temperature: number;
}

export class OpenAICompletionService implements CompletionService {
  constructor(
    private readonly client: ChatClient,
    private readonly options: OpenAICompletionOptions,
  ) {}

  async complete(prompt: string, variables: PromptVariables): Promise<string> {
    const content = renderPrompt(prompt, variables);

    let response: OpenAI.Chat.ChatCompletion;
    try {
      response = await this.client.chat.completions.create({
        model: this.options.model,
        messages: [{ role: 'user', content }],
        temperature: this.options.temperature,
      });
    } catch (err) {
      const status = err instanceof OpenAI.APIError ? err.status : undefined;
      logger.error('Completion request failed', { model: this.options.model, status, error: errorMessage(err) });
      throw new ServiceError(`Completion request failed: ${errorMessage(err)}`, status);
    }

    const text = response.choices[0]?.message?.content;
    if (!text) throw new ServiceError(`Empty response from ${this.options.model}`);
    return text;
  }
}

export function createOpenAICompletionService(params: {
  apiKey: string;
  model: string;
  temperature: number;
  timeoutMs: number;
  maxRetries: number;
}): OpenAICompletionService {
  const client = new OpenAI({
    apiKey: params.apiKey,
    timeout: params.timeoutMs,
    maxRetries: params.maxRetries,
  });
  return new OpenAICompletionService(client, { model: params.model, temperature: params.temperature });
}
