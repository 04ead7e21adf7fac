import { describe, it, expect, vi, afterEach } from 'vitest';
import { createConsoleLog } from '@matchgraph/agents';

describe('createConsoleLog', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it('prints warnings and errors by default', () => {
    vi.stubEnv('LOG_LEVEL', '');
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const info = vi.spyOn(console, 'log').mockImplementation(() => {});
    const log = createConsoleLog('Retriever');

    log('info', 'Embedding model ready');
    log('warn', 'Slow response', { ms: 900 });
    log('error', 'Gave up');

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[Retriever] [WARN] Slow response', { ms: 900 });
    expect(error).toHaveBeenCalledWith('[Retriever] [ERROR] Gave up', '');
  });

  it('prints every level under LOG_LEVEL=debug', () => {
    vi.stubEnv('LOG_LEVEL', 'debug');
    const info = vi.spyOn(console, 'log').mockImplementation(() => {});
    const log = createConsoleLog('Retriever');

    log('debug', 'Semantic retrieval complete', { retrieved: 3 });

    expect(info).toHaveBeenCalledWith('[Retriever] [DEBUG] Semantic retrieval complete', {
      retrieved: 3,
    });
  });
});
