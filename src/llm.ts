import type { AppConfig, RetryPolicy } from './config.js';
import { LocalProcessBackend } from './cliBackend.js';
import { RemoteApiBackend } from './openaiBackend.js';
import {
  errorMessage,
  fatal,
  MockBackend,
  retryable,
  type GenerateRequest,
  type GenerateResult,
  type TextBackend,
} from './textBackend.js';

/**
 * Pick the backend named in the configuration. Built once at startup and
 * handed to the renderer.
 */
export function createTextBackend(llm: AppConfig['llm']): TextBackend {
  switch (llm.backend) {
    case 'openai_api':
      if (!llm.apiKey) {
        console.log('[LLM] OPENAI_API_KEY not set, using mock backend');
        return new MockBackend();
      }
      return new RemoteApiBackend({ baseUrl: llm.baseUrl, apiKey: llm.apiKey, model: llm.model });
    case 'claude_cli':
      return new LocalProcessBackend({
        name: 'claude_cli',
        command: llm.cliCommand ?? 'claude',
        args: llm.cliArgs ?? ['-p'],
        model: 'claude',
      });
    case 'ollama_cli':
      return new LocalProcessBackend({
        name: 'ollama_cli',
        command: llm.cliCommand ?? 'ollama',
        args: llm.cliArgs ?? ['run', llm.ollamaModel, '--format', 'json'],
        model: llm.ollamaModel,
      });
    case 'mock':
      return new MockBackend();
  }
}

export interface RetryDeps {
  sleep: (ms: number) => Promise<void>;
  random: () => number;
}

const defaultDeps: RetryDeps = {
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
  random: Math.random,
};

/**
 * Delay before retry number `retryIndex` (0 for the first retry):
 * exponential, capped at `maxDelayMs`, then shortened by up to
 * `jitterRatio` of itself.
 */
export function computeBackoffDelay(
  retryIndex: number,
  policy: Pick<RetryPolicy, 'initialDelayMs' | 'maxDelayMs' | 'jitterRatio'>,
  random: () => number
): number {
  const base = Math.min(policy.maxDelayMs, policy.initialDelayMs * 2 ** retryIndex);
  return Math.round(base * (1 - policy.jitterRatio * random()));
}

async function attemptWithTimeout(
  backend: TextBackend,
  request: GenerateRequest,
  timeoutMs: number
): Promise<GenerateResult> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<GenerateResult>((resolve) => {
    timer = setTimeout(() => {
      controller.abort();
      resolve(retryable(`LLM timeout after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  const call = backend.generate(request, controller.signal).catch((error: unknown) =>
    fatal(`Unexpected ${backend.name} error: ${errorMessage(error)}`)
  );

  try {
    return await Promise.race([call, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export interface RetryOutcome {
  result: GenerateResult;
  attempts: number;
}

/**
 * Call the backend, retrying retryable failures up to `policy.maxAttempts`
 * attempts in total. Fatal failures return immediately.
 */
export async function generateWithRetry(
  backend: TextBackend,
  request: GenerateRequest,
  policy: RetryPolicy,
  deps: RetryDeps = defaultDeps
): Promise<RetryOutcome> {
  let lastMessage = 'LLM not called';

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    const result = await attemptWithTimeout(backend, request, policy.timeoutMs);

    if (result.kind !== 'retryable') {
      return { result, attempts: attempt };
    }

    lastMessage = result.message;
    console.warn(`[LLM] ${backend.name} attempt ${attempt}/${policy.maxAttempts} failed: ${result.message}`);

    if (attempt < policy.maxAttempts) {
      await deps.sleep(computeBackoffDelay(attempt - 1, policy, deps.random));
    }
  }

  return {
    result: retryable(`${lastMessage} (after ${policy.maxAttempts} attempts)`),
    attempts: policy.maxAttempts,
  };
}
