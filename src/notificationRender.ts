import { z } from 'zod';
import type { RetryPolicy } from './config.js';
import { generateWithRetry, type RetryDeps } from './llm.js';
import {
  isNotificationKind,
  type NotificationEvent,
  type NotificationKind,
  type NotificationStore,
} from './notificationStore.js';
import { errorMessage, type TextBackend } from './textBackend.js';

export const REMINDER_SYSTEM_PROMPT = `
You write a deadline reminder for a personal task manager.
Return ONLY JSON: {"text": "..."}.

Requirements:
- Make it actionable: include one "next step" that can be done in about 15 minutes.
- Ask at most ONE clarifying question, and only if it is needed.
- Be concise but specific: mention the task and how close (or late) the deadline is.
`.trim();

export const FOLLOWUP_SYSTEM_PROMPT = `
You write a short follow-up summary (morning, noon or evening) for a personal task manager.
Return ONLY JSON: {"text": "..."}.
Be concise, put the most urgent items first and do not repeat yourself.
`.trim();

const PROMPTS: Record<NotificationKind, string> = {
  task_deadline_reminder: REMINDER_SYSTEM_PROMPT,
  followup_summary: FOLLOWUP_SYSTEM_PROMPT,
};

const MAX_ERROR_TEXT = 500;

const RenderedTextSchema = z.object({ text: z.string() });

export interface RenderDeps {
  store: NotificationStore;
  backend: TextBackend;
  retryPolicy: RetryPolicy;
  retryDeps?: RetryDeps;
  now?: () => Date;
}

/**
 * Pull `text` out of a backend response. Tolerates a surrounding markdown
 * code fence, which command-line models tend to add.
 */
export function extractRenderedText(content: string): string {
  const fenced = content.trim().match(/^```(?:json)?\s*([\s\S]*?)\s*```$/);
  const raw = fenced ? fenced[1] : content.trim();

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new Error(`LLM returned invalid JSON: ${raw.slice(0, 100)}`);
  }

  const result = RenderedTextSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error('LLM response has no "text" field');
  }

  const text = result.data.text.trim();
  if (!text) {
    throw new Error('empty rendered text');
  }
  return text;
}

export function formatRenderError(message: string): string {
  return `[render failed] ${message}`.slice(0, MAX_ERROR_TEXT);
}

async function renderEventText(deps: RenderDeps, event: NotificationEvent): Promise<string> {
  if (!isNotificationKind(event.kind)) {
    throw new Error(`unknown event kind: ${event.kind}`);
  }

  const { result, attempts } = await generateWithRetry(
    deps.backend,
    { systemPrompt: PROMPTS[event.kind], userPayload: JSON.stringify(event.payload) },
    deps.retryPolicy,
    deps.retryDeps
  );

  if (result.kind !== 'ok') {
    throw new Error(`${result.kind === 'fatal' ? 'LLM error' : 'LLM unavailable'}: ${result.message}`);
  }
  if (attempts > 1) {
    console.log(`[Render] Event ${event.id} rendered after ${attempts} attempts`);
  }
  return extractRenderedText(result.content);
}

/**
 * Render one event and record the outcome in its own write. Never throws.
 */
async function renderOne(deps: RenderDeps, event: NotificationEvent, now: Date): Promise<boolean> {
  try {
    const text = await renderEventText(deps, event);
    deps.store.completeRender(event.id, text, now);
    return true;
  } catch (error) {
    const message = errorMessage(error);
    console.error(`[Render] Event ${event.id} (${event.kind}) failed: ${message}`);
    try {
      deps.store.failRender(event.id, formatRenderError(message));
    } catch (markError) {
      console.error(`[Render] Could not mark event ${event.id} as failed, left pending: ${errorMessage(markError)}`);
    }
    return false;
  }
}

/**
 * Render up to `batchSize` pending events, oldest first, and project each
 * success to an in-app delivery and a feed message. Events are independent:
 * a failure is recorded on that event and the loop moves on.
 *
 * Returns the number of events rendered successfully.
 */
export async function renderPendingNotifications(deps: RenderDeps, batchSize: number): Promise<number> {
  const events = deps.store.listPendingEvents(batchSize);
  if (events.length === 0) return 0;

  const now = deps.now ? deps.now() : new Date();
  let rendered = 0;

  for (const event of events) {
    if (await renderOne(deps, event, now)) {
      rendered++;
    }
  }

  console.log(`[Render] Rendered ${rendered}/${events.length} event(s)`);
  return rendered;
}
