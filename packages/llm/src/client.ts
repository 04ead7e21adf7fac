/**
 * Ollama HTTP client for local LLM inference and embeddings.
 */

import { z } from 'zod';
import { timeoutController } from './abort.js';
import { OLLAMA_BASE_URL, OllamaModels } from './models.js';

export interface OllamaGenerateRequest {
  model: string;
  prompt: string;
  system?: string;
  stream?: boolean;
  raw?: boolean;
  format?: 'json';
  options?: {
    temperature?: number;
    top_p?: number;
    num_predict?: number;
    stop?: string[];
  };
}

const generateResponseSchema = z.object({
  model: z.string().optional(),
  created_at: z.string().optional(),
  response: z.string().default(''),
  done: z.boolean().optional(),
  total_duration: z.number().optional(),
  eval_count: z.number().optional(),
});

export type OllamaGenerateResponse = z.infer<typeof generateResponseSchema>;

const embedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())).default([]),
});

const tagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() })).default([]),
});

export interface RequestOptions {
  timeout?: number;
  signal?: AbortSignal;
}

export class OllamaClient {
  private baseUrl: string;
  private defaultTimeout: number;

  constructor(baseUrl: string = OLLAMA_BASE_URL, defaultTimeout: number = 30000) {
    this.baseUrl = baseUrl.replace(/\/$/, '');
    this.defaultTimeout = defaultTimeout;
  }

  /**
   * Generate completion using the /api/generate endpoint.
   */
  async generate(
    request: OllamaGenerateRequest,
    options?: RequestOptions,
  ): Promise<OllamaGenerateResponse> {
    const { controller, dispose } = timeoutController(
      options?.timeout ?? this.defaultTimeout,
      options?.signal,
    );

    try {
      const response = await fetch(`${this.baseUrl}/api/generate`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ ...request, stream: false }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const error = await response.text();
        throw new Error(`Ollama generate failed: ${response.status} - ${error}`);
      }

      return generateResponseSchema.parse(await response.json());
    } finally {
      dispose();
    }
  }

  /**
   * Check if Ollama is running and a model is available.
   */
  async isAvailable(model?: string): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`);
      if (!response.ok) return false;

      if (model) {
        const data = tagsResponseSchema.parse(await response.json());
        return data.models.some((m) => m.name === model || m.name.startsWith(model));
      }

      return true;
    } catch {
      return false;
    }
  }

  /**
   * Generate embeddings for one or more texts using Ollama /api/embed.
   * Requires an embedding model (e.g. nomic-embed-text, mxbai-embed-large).
   */
  async embed(
    input: string | string[],
    options?: RequestOptions & { model?: string },
  ): Promise<number[][]> {
    const model = options?.model ?? OllamaModels.EMBED;
    const { controller, dispose } = timeoutController(options?.timeout ?? 60000, options?.signal);

    try {
      const response = await fetch(`${this.baseUrl}/api/embed`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ model, input }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const error = await response.text();
        throw new Error(`Ollama embed failed: ${response.status} - ${error}`);
      }

      return embedResponseSchema.parse(await response.json()).embeddings;
    } finally {
      dispose();
    }
  }
}

export const defaultClient = new OllamaClient();
