/**
 * Wires the matching pipeline from configuration: Ollama embeddings for retrieval,
 * Ollama and Hugging Face for reasons.
 */

import {
  createHuggingFaceBackend,
  createOllamaBackend,
  defaultClient,
  HuggingFaceClient,
  OllamaClient,
} from '@matchgraph/llm';
import { createConsoleLog } from '../shared/console-log.js';
import type { AgentLogFn } from '../shared/types.js';
import { MatchOrchestratorAgent } from './match-orchestrator-agent.js';
import { ReasonGenerator, selectBackends } from './reason-generator.js';
import { EmbeddingSimilarityRetriever, type Embedder } from './semantic-retriever.js';
import type { MatchingConfig } from './types.js';

export interface PipelineOptions {
  ollama?: OllamaClient;
  huggingface?: HuggingFaceClient;
  embedder?: Embedder;
  /** Sink for the retriever and reason generator; defaults to the console. */
  log?: AgentLogFn;
}

export interface MatchPipeline {
  agent: MatchOrchestratorAgent;
  retriever: EmbeddingSimilarityRetriever;
  reasonGenerator: ReasonGenerator;
}

export function createMatchPipeline(
  config: MatchingConfig,
  options: PipelineOptions = {},
): MatchPipeline {
  const ollama = options.ollama ?? defaultClient;
  const huggingface = options.huggingface ?? new HuggingFaceClient();
  const log = options.log ?? createConsoleLog('MatchPipeline');

  const retriever = new EmbeddingSimilarityRetriever(options.embedder ?? ollama, {
    topK: config.retrieval.topK,
    log,
  });

  const reasonGenerator = new ReasonGenerator(
    selectBackends(config.reason.mode, {
      ollama: createOllamaBackend(ollama),
      huggingface: createHuggingFaceBackend(huggingface),
    }),
    { timeoutMs: config.reason.timeoutMs, log },
  );

  const agent = new MatchOrchestratorAgent({
    retriever,
    reasonGenerator,
    config,
  });

  return { agent, retriever, reasonGenerator };
}
