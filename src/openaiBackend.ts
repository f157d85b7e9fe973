import { z } from 'zod';
import {
  errorMessage,
  fatal,
  isAbortError,
  ok,
  retryable,
  type GenerateRequest,
  type GenerateResult,
  type TextBackend,
} from './textBackend.js';

export interface RemoteApiOptions {
  baseUrl: string;
  apiKey: string;
  model: string;
  temperature?: number;
  maxTokens?: number;
}

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
      })
    )
    .min(1),
});

// 408/429 and server-side errors are worth another attempt; anything else
// (bad key, unknown model, malformed request) is not.
function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * OpenAI-compatible chat completions endpoint, asked for a JSON object.
 */
export class RemoteApiBackend implements TextBackend {
  readonly name = 'openai_api';
  readonly model: string;

  constructor(private readonly options: RemoteApiOptions) {
    this.model = options.model;
  }

  async generate(request: GenerateRequest, signal?: AbortSignal): Promise<GenerateResult> {
    let response: Response;
    try {
      response = await fetch(`${this.options.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.options.apiKey}`,
        },
        body: JSON.stringify({
          model: this.options.model,
          messages: [
            { role: 'system', content: request.systemPrompt },
            { role: 'user', content: request.userPayload },
          ],
          response_format: { type: 'json_object' },
          temperature: this.options.temperature ?? 0.2,
          max_tokens: this.options.maxTokens ?? 500,
        }),
        signal,
      });
    } catch (error) {
      if (isAbortError(error)) {
        return retryable('LLM request aborted');
      }
      return retryable(`LLM connection error: ${errorMessage(error)}`);
    }

    if (!response.ok) {
      const errorText = await response.text().catch(() => '');
      const message = `LLM API error: ${response.status}${errorText ? ` - ${errorText.slice(0, 200)}` : ''}`;
      return isRetryableStatus(response.status) ? retryable(message) : fatal(message);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      if (isAbortError(error)) {
        return retryable('LLM request aborted');
      }
      return fatal('LLM returned a non-JSON response body');
    }

    const parsed = ChatCompletionSchema.safeParse(body);
    if (!parsed.success) {
      return fatal('LLM returned unexpected response structure');
    }

    return ok(parsed.data.choices[0].message.content ?? '');
  }
}
