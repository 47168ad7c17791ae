/**
 * @file packages/gateway/src/infrastructure/llm/openai-compatible-backend.ts
 * @description Chat-completions backend for LM Studio, OpenAI and Gemini's OpenAI-compatible endpoint.
 */

import OpenAI from 'openai';
import type { BackendEndpoint, RequestContext } from '@chorus/shared';
import type {
  GenerationBackend,
  GenerationRequest,
} from '../../domain/interfaces/generation-backend.interface.js';
import { BackendError, errorMessage } from '../../domain/errors/app-error.js';

/**
 * Renders the request context as the second system message.
 */
export function formatContextMessage(context: RequestContext): string {
  const show = (value: unknown): string => (value === undefined ? 'None' : String(value));
  return (
    `Context: user=${show(context.user)}, room=${show(context.room)}, ` +
    `noise_level=${show(context.noiseLevel)}, extra=${JSON.stringify(context.extensions ?? {})}`
  );
}

export class OpenAICompatibleBackend implements GenerationBackend {
  private client: OpenAI | null = null;

  constructor(
    public readonly name: string,
    private readonly endpoint: BackendEndpoint,
    private readonly defaultTemperature = 0.6,
  ) {}

  isConfigured(): boolean {
    return Boolean(this.endpoint.apiKey);
  }

  async generate(request: GenerationRequest): Promise<string> {
    const client = this.getClient();
    const messages: OpenAI.ChatCompletionMessageParam[] = [
      { role: 'system', content: request.systemPrompt },
    ];
    if (request.context) {
      messages.push({ role: 'system', content: formatContextMessage(request.context) });
    }
    messages.push({ role: 'user', content: request.userText });

    let completion: OpenAI.ChatCompletion;
    try {
      completion = await client.chat.completions.create({
        model: request.model ?? this.endpoint.model,
        messages,
        temperature: request.temperature ?? this.defaultTemperature,
        stream: false,
      });
    } catch (err) {
      throw new BackendError(`${this.name} request failed: ${errorMessage(err)}`, this.name);
    }
    return completion.choices[0]?.message?.content ?? '';
  }

  private getClient(): OpenAI {
    if (this.client) return this.client;
    if (!this.endpoint.apiKey) {
      throw new BackendError(
        `${this.name} is not configured. Set its API key in the environment.`,
        this.name,
      );
    }
    this.client = new OpenAI({
      apiKey: this.endpoint.apiKey,
      baseURL: this.endpoint.baseUrl,
      timeout: this.endpoint.timeoutMs,
      maxRetries: 0,
    });
    return this.client;
  }
}
