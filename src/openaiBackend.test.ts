import { describe, it, expect, vi, afterEach } from 'vitest';
import { RemoteApiBackend } from './openaiBackend.js';

const request = { systemPrompt: 'Write a reminder.', userPayload: '{"stage":"D-1"}' };

function stubFetch(impl: (url: string, init?: RequestInit) => Promise<Response>) {
  const fetchMock = vi.fn(impl);
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function completion(content: string | null): Response {
  return new Response(JSON.stringify({ choices: [{ message: { content } }] }), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('RemoteApiBackend', () => {
  const backend = new RemoteApiBackend({ baseUrl: 'https://llm.test/v1', apiKey: 'test-key', model: 'gpt-test' });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts a JSON-mode chat completion and returns the content', async () => {
    const fetchMock = stubFetch(async () => completion('{"text":"Call the dentist"}'));

    const result = await backend.generate(request);

    expect(result).toEqual({ kind: 'ok', content: '{"text":"Call the dentist"}' });
    expect(fetchMock).toHaveBeenCalledTimes(1);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://llm.test/v1/chat/completions');
    expect(init?.method).toBe('POST');
    expect(new Headers(init?.headers).get('Authorization')).toBe('Bearer test-key');
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'gpt-test',
      messages: [
        { role: 'system', content: 'Write a reminder.' },
        { role: 'user', content: '{"stage":"D-1"}' },
      ],
      response_format: { type: 'json_object' },
      temperature: 0.2,
      max_tokens: 500,
    });
  });

  it('returns empty content when the model sends null', async () => {
    stubFetch(async () => completion(null));
    expect(await backend.generate(request)).toEqual({ kind: 'ok', content: '' });
  });

  it('classifies rate limits and server errors as retryable', async () => {
    stubFetch(async () => new Response('slow down', { status: 429 }));
    expect(await backend.generate(request)).toEqual({ kind: 'retryable', message: 'LLM API error: 429 - slow down' });

    stubFetch(async () => new Response('', { status: 502 }));
    expect(await backend.generate(request)).toEqual({ kind: 'retryable', message: 'LLM API error: 502' });
  });

  it('classifies client errors as fatal', async () => {
    stubFetch(async () => new Response('invalid api key', { status: 401 }));
    expect(await backend.generate(request)).toEqual({ kind: 'fatal', message: 'LLM API error: 401 - invalid api key' });
  });

  it('classifies connection failures as retryable', async () => {
    stubFetch(async () => {
      throw new TypeError('fetch failed');
    });
    expect(await backend.generate(request)).toEqual({
      kind: 'retryable',
      message: 'LLM connection error: fetch failed',
    });
  });

  it('reports an aborted request as retryable', async () => {
    stubFetch(async () => {
      throw Object.assign(new Error('This operation was aborted'), { name: 'AbortError' });
    });
    expect(await backend.generate(request)).toEqual({ kind: 'retryable', message: 'LLM request aborted' });
  });

  it('rejects malformed response bodies', async () => {
    stubFetch(async () => new Response('<html>oops</html>', { status: 200 }));
    expect(await backend.generate(request)).toEqual({
      kind: 'fatal',
      message: 'LLM returned a non-JSON response body',
    });

    stubFetch(async () => new Response(JSON.stringify({ choices: [] }), { status: 200 }));
    expect(await backend.generate(request)).toEqual({
      kind: 'fatal',
      message: 'LLM returned unexpected response structure',
    });
  });
});
