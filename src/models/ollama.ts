/**
 * @relaygate/models - Ollama adapter
 *
 * Non-streaming completion against an Ollama server (`POST /api/generate`).
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

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const OLLAMA_DEFAULT_BASE = 'http://localhost:11434';

const GenerateResponseSchema = Type.Object({
  response: Type.String(),
  prompt_eval_count: Type.Optional(Type.Integer()),
  eval_count: Type.Optional(Type.Integer()),
});

// ---------------------------------------------------------------------------
// OllamaAdapter
// ---------------------------------------------------------------------------

export class OllamaAdapter implements CompletionAdapter {
  readonly model: string;
  private readonly baseUrl: string;

  constructor(model: string, baseUrl?: string) {
    this.model = model;
    this.baseUrl = (baseUrl ?? process.env['OLLAMA_BASE_URL'] ?? OLLAMA_DEFAULT_BASE).replace(/\/+$/, '');
  }

  async complete(
    prompt: string,
    parameters: CompletionParameters,
    options: CompletionCallOptions,
  ): Promise<CompletionResult> {
    const ollamaOptions: Record<string, unknown> = {};
    if (parameters.temperature !== undefined) ollamaOptions['temperature'] = parameters.temperature;
    if (parameters.maxTokens !== undefined) ollamaOptions['num_predict'] = parameters.maxTokens;
    if (parameters.topP !== undefined) ollamaOptions['top_p'] = parameters.topP;
    if (parameters.stop !== undefined) ollamaOptions['stop'] = parameters.stop;

    const data = await postJson(
      `${this.baseUrl}/api/generate`,
      {
        model: this.model,
        prompt,
        ...(parameters.system !== undefined ? { system: parameters.system } : {}),
        stream: false,
        options: ollamaOptions,
      },
      { signal: options.signal },
    );

    if (!Value.Check(GenerateResponseSchema, data)) {
      throw new MalformedResponseError(`Unexpected response shape from Ollama model "${this.model}"`);
    }

    const promptTokens = data.prompt_eval_count;
    const completionTokens = data.eval_count;
    const hasUsage = promptTokens !== undefined || completionTokens !== undefined;

    return {
      text: data.response,
      tokenUsage: hasUsage
        ? { promptTokens, completionTokens, totalTokens: (promptTokens ?? 0) + (completionTokens ?? 0) }
        : undefined,
    };
  }
}
