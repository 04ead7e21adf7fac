/**
 * Text-completion backend contract. Any backend is interchangeable behind it:
 * one prompt plus generation parameters in, generated text out (or a thrown failure).
 */

import { defaultClient, OllamaClient, type RequestOptions } from './client.js';
import { HuggingFaceClient } from './huggingface.js';
import { OllamaModels } from './models.js';

export type CompletionBackendName = 'ollama' | 'huggingface';

export interface CompletionRequest {
  prompt: string;
  temperature: number;
  maxTokens: number;
}

export interface CompletionBackend {
  readonly name: CompletionBackendName;
  /** False when the backend cannot be called at all (e.g. missing credentials). */
  isConfigured(): boolean;
  complete(request: CompletionRequest, options: RequestOptions): Promise<string>;
}

export function createOllamaBackend(
  client: OllamaClient = defaultClient,
  model: string = OllamaModels.REASON,
): CompletionBackend {
  return {
    name: 'ollama',
    isConfigured: () => true,
    async complete(request, options) {
      const response = await client.generate(
        {
          model,
          prompt: request.prompt,
          options: {
            temperature: request.temperature,
            num_predict: request.maxTokens,
          },
        },
        options,
      );
      return response.response;
    },
  };
}

export function createHuggingFaceBackend(
  client: HuggingFaceClient = new HuggingFaceClient(),
): CompletionBackend {
  return {
    name: 'huggingface',
    isConfigured: () => client.isConfigured(),
    complete(request, options) {
      return client.generate(
        request.prompt,
        {
          max_new_tokens: request.maxTokens,
          temperature: request.temperature,
          return_full_text: false,
        },
        options,
      );
    },
  };
}
