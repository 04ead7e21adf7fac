/**
 * @matchgraph/llm - Ollama and Hugging Face clients behind one completion contract
 */

export {
  OllamaModels,
  OLLAMA_BASE_URL,
  HF_INFERENCE_URL,
  HF_MODEL,
  reasonModelConfig,
  type ModelConfig,
} from './models.js';

export {
  OllamaClient,
  defaultClient,
  type OllamaGenerateRequest,
  type OllamaGenerateResponse,
  type RequestOptions,
} from './client.js';

export {
  HuggingFaceClient,
  type HuggingFaceClientOptions,
  type HuggingFaceParameters,
} from './huggingface.js';

export {
  createOllamaBackend,
  createHuggingFaceBackend,
  type CompletionBackend,
  type CompletionBackendName,
  type CompletionRequest,
} from './backends.js';

export { timeoutController } from './abort.js';

export {
  buildPrompt,
  createPromptTemplate,
  executeTemplate,
  type PromptTemplate,
} from './prompts.js';
