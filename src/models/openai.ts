/**
 * @relaygate/models - OpenAI-compatible adapter
 *
 * `POST {baseUrl}/chat/completions`. Works against OpenAI and any server
 * that speaks the same API (vLLM, LM Studio, llama.cpp server).
 */

import { Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import {
  MalformedResponseError,
  type CompletionAdapter,
  type CompletionCallOptions,
  type CompletionParameters,
  type CompletionResult,
} from '@relaygate/core';
import { postJson } from './http.js';

export const OPENAI_DEFAULT_BASE = 'https://api.openai.com/v1';

const ChatCompletionSchema = Type.Object({
  choices: Type.Array(
    Type.Object({
      message: Type.Object({
        content: Type.Union([Type.String(), Type.Null()]),
      }),
    }),
    { minItems: 1 },
  ),
  usage: Type.Optional(
    Type.Object({
      prompt_tokens: Type.Optional(Type.Integer()),
      completion_tokens: Type.Optional(Type.Integer()),
      total_tokens: Type.Integer(),
    }),
  ),
});

export class OpenAICompatibleAdapter implements CompletionAdapter {
  readonly model: string;
  private readonly baseUrl: string;
  private readonly apiKey?: string;

  constructor(model: string, options: { baseUrl?: string; apiKey?: string } = {}) {
    this.model = model;
    this.baseUrl = (options.baseUrl ?? OPENAI_DEFAULT_BASE).replace(/\/+$/, '');
    this.apiKey = options.apiKey;
  }

  async complete(
    prompt: string,
    parameters: CompletionParameters,
    options: CompletionCallOptions,
  ): Promise<CompletionResult> {
    const messages = [
      ...(parameters.system !== undefined ? [{ role: 'system', content: parameters.system }] : []),
      { role: 'user', content: prompt },
    ];

    const body: Record<string, unknown> = { model: this.model, messages };
    if (parameters.temperature !== undefined) body['temperature'] = parameters.temperature;
    if (parameters.maxTokens !== undefined) body['max_tokens'] = parameters.maxTokens;
    if (parameters.topP !== undefined) body['top_p'] = parameters.topP;
    if (parameters.stop !== undefined) body['stop'] = parameters.stop;

    const data = await postJson(`${this.baseUrl}/chat/completions`, body, {
      headers: this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : {},
      signal: options.signal,
    });

    if (!Value.Check(ChatCompletionSchema, data)) {
      throw new MalformedResponseError(`Unexpected response shape from model "${this.model}"`);
    }

    const [choice] = data.choices;
    const usage = data.usage;

    return {
      text: choice?.message.content ?? '',
      tokenUsage: usage
        ? {
            promptTokens: usage.prompt_tokens,
            completionTokens: usage.completion_tokens,
            totalTokens: usage.total_tokens,
          }
        : undefined,
    };
  }
}
