export interface GenerateRequest {
  systemPrompt: string;
  userPayload: string;
}

/**
 * Outcome of one backend call. `retryable` covers transient failures (rate
 * limits, connection errors, timeouts); `fatal` covers everything a retry
 * cannot fix (credentials, malformed requests, missing executables).
 */
export type GenerateResult =
  | { kind: 'ok'; content: string }
  | { kind: 'retryable'; message: string }
  | { kind: 'fatal'; message: string };

export interface TextBackend {
  readonly name: string;
  readonly model: string;
  generate(request: GenerateRequest, signal?: AbortSignal): Promise<GenerateResult>;
}

export function ok(content: string): GenerateResult {
  return { kind: 'ok', content };
}

export function retryable(message: string): GenerateResult {
  return { kind: 'retryable', message };
}

export function fatal(message: string): GenerateResult {
  return { kind: 'fatal', message };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Offline backend: answers with a short text built from the payload, so the
 * pipeline runs end to end without an API key.
 */
export class MockBackend implements TextBackend {
  readonly name = 'mock';
  readonly model = 'mock';

  async generate(request: GenerateRequest): Promise<GenerateResult> {
    let payload: unknown;
    try {
      payload = JSON.parse(request.userPayload);
    } catch {
      payload = null;
    }
    return ok(JSON.stringify({ text: describePayload(payload) }));
  }
}

function readString(source: unknown, key: string): string | undefined {
  if (!source || typeof source !== 'object') return undefined;
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'string' ? value : undefined;
}

function describePayload(payload: unknown): string {
  const kind = readString(payload, 'kind');
  if (kind === 'task_deadline_reminder') {
    const task = payload && typeof payload === 'object' ? Reflect.get(payload, 'task') : undefined;
    const title = readString(task, 'title') ?? 'task';
    const due = readString(task, 'due_date');
    const stage = readString(payload, 'stage') ?? 'reminder';
    return `[${stage}] ${title}${due ? ` (due ${due})` : ''}: take 15 minutes now for the next step.`;
  }
  if (kind === 'followup_summary') {
    const slot = readString(payload, 'slot') ?? 'daily';
    return `[${slot}] Follow-up: review overdue and due-today tasks first.`;
  }
  return 'Notification (mock mode)';
}
