/**
 * Model configuration loaded from environment variables.
 * Reasons come from a local Ollama model first, the hosted Hugging Face Inference API second.
 */

export const OllamaModels = {
  /** Short match justifications (Mistral 7B instruct by default) */
  REASON: process.env.OLLAMA_MODEL_REASON ?? process.env.OLLAMA_MODEL ?? 'mistral',

  /** Embeddings for semantic retrieval */
  EMBED: process.env.OLLAMA_EMBED_MODEL ?? 'nomic-embed-text',
} as const;

export const OLLAMA_BASE_URL =
  process.env.OLLAMA_BASE_URL ?? process.env.OLLAMA_HOST ?? 'http://localhost:11434';

export const HF_INFERENCE_URL = 'https://api-inference.huggingface.co/models';
export const HF_MODEL = process.env.HF_MODEL ?? 'mistralai/Mistral-7B-Instruct-v0.2';

export interface ModelConfig {
  temperature: number;
  maxTokens: number;
}

/** One sentence, ~25 words. */
export const reasonModelConfig: ModelConfig = {
  temperature: 0.3,
  maxTokens: 60,
};
