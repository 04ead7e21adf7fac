/**
 * Shared types and interfaces for all agents.
 */

import type { ZodType, ZodTypeDef } from 'zod';

export interface AgentContext {
  userId?: string;
  runId?: string;
  timestamp: Date;
  metadata?: Record<string, unknown>;
}

export interface AgentResult<T> {
  success: boolean;
  data?: T;
  error?: string;
  duration: number;
  context: AgentContext;
}

export interface AgentConfig {
  name: string;
  description: string;
  version: string;
}

export interface Agent<TInput, TOutput> {
  config: AgentConfig;
  inputSchema: ZodType<TInput, ZodTypeDef, unknown>;
  outputSchema: ZodType<TOutput, ZodTypeDef, unknown>;
  /** Input is validated against `inputSchema` before the agent runs. */
  execute(input: unknown, context?: Partial<AgentContext>): Promise<AgentResult<TOutput>>;
}

export type AgentLogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface AgentLog {
  timestamp: Date;
  level: AgentLogLevel;
  message: string;
  data?: unknown;
}

/** Log sink handed to helpers that run on behalf of an agent. */
export type AgentLogFn = (level: AgentLogLevel, message: string, data?: unknown) => void;

export const noopLog: AgentLogFn = () => {};
