import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { loadConfig, type RetryPolicy } from './config.js';
import { computeBackoffDelay, createTextBackend, generateWithRetry, type RetryDeps } from './llm.js';
import { MockBackend, type GenerateRequest, type GenerateResult, type TextBackend } from './textBackend.js';

class ScriptedBackend implements TextBackend {
  readonly name = 'scripted';
  readonly model = 'scripted-1';
  calls = 0;

  constructor(private readonly script: Array<GenerateResult | Error>) {}

  async generate(_request: GenerateRequest): Promise<GenerateResult> {
    const step = this.script[Math.min(this.calls, this.script.length - 1)];
    this.calls++;
    if (step instanceof Error) throw step;
    return step;
  }
}

const request: GenerateRequest = { systemPrompt: 'system', userPayload: '{}' };

const policy: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 100,
  maxDelayMs: 1000,
  jitterRatio: 0,
  timeoutMs: 1000,
};

describe('computeBackoffDelay', () => {
  const backoff = { initialDelayMs: 1000, maxDelayMs: 30000, jitterRatio: 0.5 };

  it('doubles per retry up to the cap', () => {
    expect(computeBackoffDelay(0, backoff, () => 0)).toBe(1000);
    expect(computeBackoffDelay(1, backoff, () => 0)).toBe(2000);
    expect(computeBackoffDelay(4, backoff, () => 0)).toBe(16000);
    expect(computeBackoffDelay(10, backoff, () => 0)).toBe(30000);
  });

  it('shortens the delay by the jitter share', () => {
    expect(computeBackoffDelay(0, backoff, () => 1)).toBe(500);
    expect(computeBackoffDelay(2, backoff, () => 0.5)).toBe(3000);
  });
});

describe('generateWithRetry', () => {
  let deps: RetryDeps;
  let sleep: Mock<(ms: number) => Promise<void>>;

  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    sleep = vi.fn(async (_ms: number) => {});
    deps = { sleep, random: () => 0 };
  });

  it('returns the first successful result', async () => {
    const backend = new ScriptedBackend([{ kind: 'ok', content: '{"text":"hi"}' }]);

    const outcome = await generateWithRetry(backend, request, policy, deps);

    expect(outcome).toEqual({ result: { kind: 'ok', content: '{"text":"hi"}' }, attempts: 1 });
    expect(sleep).not.toHaveBeenCalled();
  });

  it('retries retryable failures with backoff', async () => {
    const backend = new ScriptedBackend([
      { kind: 'retryable', message: 'rate limited' },
      { kind: 'retryable', message: 'rate limited' },
      { kind: 'ok', content: 'done' },
    ]);

    const outcome = await generateWithRetry(backend, request, policy, deps);

    expect(outcome).toEqual({ result: { kind: 'ok', content: 'done' }, attempts: 3 });
    expect(sleep.mock.calls).toEqual([[100], [200]]);
  });

  it('does not retry fatal failures', async () => {
    const backend = new ScriptedBackend([{ kind: 'fatal', message: 'LLM API error: 401' }]);

    const outcome = await generateWithRetry(backend, request, policy, deps);

    expect(outcome).toEqual({ result: { kind: 'fatal', message: 'LLM API error: 401' }, attempts: 1 });
    expect(backend.calls).toBe(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('gives up after the last attempt', async () => {
    const backend = new ScriptedBackend([{ kind: 'retryable', message: 'LLM API error: 503' }]);

    const outcome = await generateWithRetry(backend, request, policy, deps);

    expect(outcome).toEqual({
      result: { kind: 'retryable', message: 'LLM API error: 503 (after 3 attempts)' },
      attempts: 3,
    });
    expect(backend.calls).toBe(3);
    expect(sleep.mock.calls).toEqual([[100], [200]]);
  });

  it('turns a thrown error into a fatal result', async () => {
    const backend = new ScriptedBackend([new Error('kaput')]);

    const outcome = await generateWithRetry(backend, request, policy, deps);

    expect(outcome.result).toEqual({ kind: 'fatal', message: 'Unexpected scripted error: kaput' });
    expect(backend.calls).toBe(1);
  });

  it('aborts an attempt that exceeds the timeout', async () => {
    let seen: AbortSignal | undefined;
    const hanging: TextBackend = {
      name: 'hanging',
      model: 'hanging',
      generate: (_request, signal) => {
        seen = signal;
        return new Promise(() => {});
      },
    };

    const outcome = await generateWithRetry(hanging, request, { ...policy, maxAttempts: 1, timeoutMs: 20 }, deps);

    expect(outcome).toEqual({
      result: { kind: 'retryable', message: 'LLM timeout after 20ms (after 1 attempts)' },
      attempts: 1,
    });
    expect(seen?.aborted).toBe(true);
  });
});

describe('createTextBackend', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  it('falls back to the mock backend without an API key', () => {
    const backend = createTextBackend(loadConfig({}).llm);
    expect(backend).toBeInstanceOf(MockBackend);
  });

  it('builds the API backend when a key is set', () => {
    const backend = createTextBackend(loadConfig({ OPENAI_API_KEY: 'test-key', LLM_MODEL: 'gpt-test' }).llm);
    expect(backend.name).toBe('openai_api');
    expect(backend.model).toBe('gpt-test');
  });

  it('builds command-line backends', () => {
    expect(createTextBackend(loadConfig({ LLM_BACKEND: 'claude_cli' }).llm).name).toBe('claude_cli');

    const ollama = createTextBackend(loadConfig({ LLM_BACKEND: 'ollama_cli', OLLAMA_MODEL: 'qwen2.5' }).llm);
    expect(ollama.name).toBe('ollama_cli');
    expect(ollama.model).toBe('qwen2.5');
  });

  it('builds the mock backend on request', () => {
    expect(createTextBackend(loadConfig({ LLM_BACKEND: 'mock' }).llm).name).toBe('mock');
  });
});
