/**
 * Resilient Reason Generator - one-sentence justification per candidate
 *
 * Per-candidate state machine:
 *   TRY_PRIMARY -> TRY_SECONDARY -> FALLBACK -> DONE
 *
 * A remote attempt that times out, errors, or returns nothing moves the chain on.
 * The fallback needs no remote call, so generate() always resolves to a non-empty reason.
 *
 * LLM Usage: Light (one short completion per candidate, optional)
 */

import {
  reasonModelConfig,
  type CompletionBackend,
  type CompletionBackendName,
  type ModelConfig,
} from '@matchgraph/llm';
import type { ReasonBackendMode } from '@matchgraph/schemas';
import { noopLog, type AgentLogFn } from '../shared/types.js';
import { buildReasonPrompt, type ReasonPromptInput } from './reason-prompt.js';

export type ReasonState = 'TRY_PRIMARY' | 'TRY_SECONDARY' | 'FALLBACK' | 'DONE';

export type AttemptFailure = 'timeout' | 'error' | 'empty' | 'unavailable';

export type AttemptResult =
  | { ok: true; backend: CompletionBackendName; text: string }
  | { ok: false; backend: CompletionBackendName; failure: AttemptFailure; message?: string };

export interface ReasonOutcome {
  reason: string;
  source: CompletionBackendName | 'fallback';
  attempts: AttemptResult[];
}

export interface BackendChain {
  primary?: CompletionBackend;
  secondary?: CompletionBackend;
}

export interface ReasonGeneratorOptions {
  timeoutMs: number;
  generation?: ModelConfig;
  log?: AgentLogFn;
}

/**
 * Pick the remote backends for a mode. `auto` tries Ollama then Hugging Face;
 * a pinned mode keeps exactly one; `none` goes straight to the fallback.
 */
export function selectBackends(
  mode: ReasonBackendMode,
  backends: { ollama?: CompletionBackend; huggingface?: CompletionBackend },
): BackendChain {
  switch (mode) {
    case 'auto':
      return { primary: backends.ollama, secondary: backends.huggingface };
    case 'ollama':
      return { primary: backends.ollama };
    case 'huggingface':
      return { primary: backends.huggingface };
    case 'none':
      return {};
  }
}

/**
 * Deterministic reason used when no remote backend produced one.
 */
export function fallbackReason(signals: string[], kgScore: number, similarityScore: number): string {
  const top = signals[0];
  if (top) {
    const combined = Math.round((kgScore + similarityScore) / 2);
    return `Strong match (${top}) with a combined alignment score of ${combined}/100.`;
  }
  return `Candidate aligns semantically with the target profile (similarity ${Math.round(similarityScore)}/100).`;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Trim whitespace and any quotes the model wrapped the sentence in. */
export function cleanCompletion(text: string): string {
  return text
    .trim()
    .replace(/^["'“”]+|["'“”]+$/g, '')
    .trim();
}

export class ReasonGenerator {
  private readonly chain: BackendChain;
  private readonly timeoutMs: number;
  private readonly generation: ModelConfig;
  private readonly log: AgentLogFn;

  constructor(chain: BackendChain, options: ReasonGeneratorOptions) {
    this.chain = chain;
    this.timeoutMs = options.timeoutMs;
    this.generation = options.generation ?? reasonModelConfig;
    this.log = options.log ?? noopLog;
  }

  /** `log` overrides the generator's sink for this call (e.g. the owning agent's). */
  async generate(input: ReasonPromptInput, log: AgentLogFn = this.log): Promise<ReasonOutcome> {
    const attempts: AttemptResult[] = [];
    let prompt: string | undefined;
    let outcome: ReasonOutcome | undefined;
    let state: ReasonState = 'TRY_PRIMARY';

    while (state !== 'DONE') {
      switch (state) {
        case 'TRY_PRIMARY':
        case 'TRY_SECONDARY': {
          const backend = state === 'TRY_PRIMARY' ? this.chain.primary : this.chain.secondary;
          const next: ReasonState = state === 'TRY_PRIMARY' ? 'TRY_SECONDARY' : 'FALLBACK';
          if (!backend) {
            state = next;
            break;
          }
          prompt ??= buildReasonPrompt(input);
          const result = await this.attempt(backend, prompt);
          attempts.push(result);
          if (result.ok) {
            outcome = { reason: result.text, source: result.backend, attempts };
            state = 'DONE';
          } else {
            log('warn', `${result.backend} reason attempt failed (${result.failure})`, {
              profileId: input.candidate.profile_id,
              message: result.message,
            });
            state = next;
          }
          break;
        }
        case 'FALLBACK':
          outcome = {
            reason: fallbackReason(input.signals, input.kgScore, input.similarityScore),
            source: 'fallback',
            attempts,
          };
          state = 'DONE';
          break;
      }
    }

    if (!outcome) {
      throw new Error('Reason chain finished without an outcome');
    }
    return outcome;
  }

  private async attempt(backend: CompletionBackend, prompt: string): Promise<AttemptResult> {
    let configured: boolean;
    try {
      configured = backend.isConfigured();
    } catch (err) {
      return { ok: false, backend: backend.name, failure: 'error', message: errorMessage(err) };
    }
    if (!configured) {
      return { ok: false, backend: backend.name, failure: 'unavailable' };
    }

    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    try {
      const timedOut = new Promise<AttemptResult>((resolve) => {
        timer = setTimeout(() => {
          controller.abort();
          resolve({
            ok: false,
            backend: backend.name,
            failure: 'timeout',
            message: `No response within ${this.timeoutMs}ms`,
          });
        }, this.timeoutMs);
      });

      // complete() may throw before it returns a promise
      const call = Promise.resolve()
        .then(() =>
          backend.complete(
            {
              prompt,
              temperature: this.generation.temperature,
              maxTokens: this.generation.maxTokens,
            },
            { timeout: this.timeoutMs, signal: controller.signal },
          ),
        )
        .then((text): AttemptResult => {
          const cleaned = cleanCompletion(text);
          return cleaned
            ? { ok: true, backend: backend.name, text: cleaned }
            : { ok: false, backend: backend.name, failure: 'empty' };
        })
        .catch(
          (err: unknown): AttemptResult => ({
            ok: false,
            backend: backend.name,
            failure: controller.signal.aborted ? 'timeout' : 'error',
            message: errorMessage(err),
          }),
        );

      return await Promise.race([call, timedOut]);
    } finally {
      clearTimeout(timer);
    }
  }
}
