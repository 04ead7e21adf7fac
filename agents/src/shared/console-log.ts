import type { AgentLogFn, AgentLogLevel } from './types.js';

/**
 * Console-backed log sink for helpers that run outside an agent (e.g. model warm-up).
 * Prints everything under LOG_LEVEL=debug, otherwise warnings and errors only.
 */
export function createConsoleLog(name: string): AgentLogFn {
  return (level: AgentLogLevel, message: string, data?: unknown) => {
    if (process.env.LOG_LEVEL !== 'debug' && level !== 'warn' && level !== 'error') return;
    const line = `[${name}] [${level.toUpperCase()}] ${message}`;
    if (level === 'error') {
      console.error(line, data ?? '');
    } else if (level === 'warn') {
      console.warn(line, data ?? '');
    } else {
      console.log(line, data ?? '');
    }
  };
}
