/**
 * Hugging Face Inference API client (hosted text generation).
 * Without a token the client reports itself unconfigured and makes no calls.
 */

import { z } from 'zod';
import { timeoutController } from './abort.js';
import type { RequestOptions } from './client.js';
import { HF_INFERENCE_URL, HF_MODEL } from './models.js';

export interface HuggingFaceClientOptions {
  token?: string;
  model?: string;
  baseUrl?: string;
  defaultTimeout?: number;
}

export interface HuggingFaceParameters {
  max_new_tokens?: number;
  temperature?: number;
  return_full_text?: boolean;
}

const generationResponseSchema = z.array(
  z.object({ generated_text: z.string().default('') }).passthrough(),
);

export class HuggingFaceClient {
  private token: string;
  private model: string;
  private baseUrl: string;
  private defaultTimeout: number;

  constructor(options: HuggingFaceClientOptions = {}) {
    this.token = (options.token ?? process.env.HF_API_TOKEN ?? '').trim();
    this.model = options.model ?? HF_MODEL;
    this.baseUrl = (options.baseUrl ?? HF_INFERENCE_URL).replace(/\/$/, '');
    this.defaultTimeout = options.defaultTimeout ?? 30000;
  }

  isConfigured(): boolean {
    return this.token.length > 0;
  }

  getModelName(): string {
    return this.model;
  }

  /**
   * Run text generation. Returns the first generated text, or '' when the
   * API answers with an unexpected shape.
   */
  async generate(
    inputs: string,
    parameters: HuggingFaceParameters,
    options?: RequestOptions,
  ): Promise<string> {
    if (!this.isConfigured()) {
      throw new Error('Hugging Face generate failed: HF_API_TOKEN is not set');
    }

    const { controller, dispose } = timeoutController(
      options?.timeout ?? this.defaultTimeout,
      options?.signal,
    );

    try {
      const response = await fetch(`${this.baseUrl}/${this.model}`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.token}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ inputs, parameters }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const error = await response.text();
        throw new Error(`Hugging Face generate failed: ${response.status} - ${error}`);
      }

      const parsed = generationResponseSchema.safeParse(await response.json());
      if (!parsed.success || parsed.data.length === 0) return '';
      return parsed.data[0]?.generated_text ?? '';
    } finally {
      dispose();
    }
  }
}
