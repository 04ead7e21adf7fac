import { z } from 'zod';

export const reasonBackendModeEnum = z.enum(['auto', 'ollama', 'huggingface', 'none']);
export type ReasonBackendMode = z.infer<typeof reasonBackendModeEnum>;

export const retrievalFailurePolicyEnum = z.enum(['zero_fill', 'abort']);
export type RetrievalFailurePolicy = z.infer<typeof retrievalFailurePolicyEnum>;
