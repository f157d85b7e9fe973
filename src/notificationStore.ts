import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { Db } from './db.js';

export const NOTIFICATION_KINDS = ['task_deadline_reminder', 'followup_summary'] as const;
export const EVENT_STATUSES = ['created', 'rendered', 'failed'] as const;
export const FOLLOWUP_SLOTS = ['morning', 'noon', 'evening'] as const;

export type NotificationKind = (typeof NOTIFICATION_KINDS)[number];
export type EventStatus = (typeof EVENT_STATUSES)[number];
export type FollowupSlot = (typeof FOLLOWUP_SLOTS)[number];
export type DeliveryChannel = 'in_app';
export type MessageRole = 'user' | 'assistant' | 'system';

export function isNotificationKind(value: string): value is NotificationKind {
  return NOTIFICATION_KINDS.some((kind) => kind === value);
}

export interface NotificationEvent {
  id: string;
  // Kept as read from storage; the renderer rejects kinds it does not know.
  kind: string;
  taskId: string | null;
  stage: string | null;
  slot: string | null;
  slotDate: string | null;
  payload: unknown;
  renderedText: string | null;
  status: EventStatus;
  createdAt: string;
  renderedAt: string | null;
}

export interface NotificationDelivery {
  id: string;
  eventId: string;
  channel: string;
  status: 'sent' | 'failed';
  destination: string | null;
  error: string | null;
  sentAt: string | null;
  createdAt: string;
}

export interface FeedMessage {
  id: string;
  role: MessageRole;
  content: string;
  eventId: string | null;
  createdAt: string;
}

function parsePayload(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

const EventRowSchema = z
  .object({
    id: z.string(),
    kind: z.string(),
    task_id: z.string().nullable(),
    stage: z.string().nullable(),
    slot: z.string().nullable(),
    slot_date: z.string().nullable(),
    payload: z.string(),
    rendered_text: z.string().nullable(),
    status: z.enum(EVENT_STATUSES),
    created_at: z.string(),
    rendered_at: z.string().nullable(),
  })
  .transform(
    (row): NotificationEvent => ({
      id: row.id,
      kind: row.kind,
      taskId: row.task_id,
      stage: row.stage,
      slot: row.slot,
      slotDate: row.slot_date,
      payload: parsePayload(row.payload),
      renderedText: row.rendered_text,
      status: row.status,
      createdAt: row.created_at,
      renderedAt: row.rendered_at,
    })
  );

const DeliveryRowSchema = z
  .object({
    id: z.string(),
    event_id: z.string(),
    channel: z.string(),
    status: z.enum(['sent', 'failed']),
    destination: z.string().nullable(),
    error: z.string().nullable(),
    sent_at: z.string().nullable(),
    created_at: z.string(),
  })
  .transform(
    (row): NotificationDelivery => ({
      id: row.id,
      eventId: row.event_id,
      channel: row.channel,
      status: row.status,
      destination: row.destination,
      error: row.error,
      sentAt: row.sent_at,
      createdAt: row.created_at,
    })
  );

const MessageRowSchema = z
  .object({
    id: z.string(),
    role: z.enum(['user', 'assistant', 'system']),
    content: z.string(),
    event_id: z.string().nullable(),
    created_at: z.string(),
  })
  .transform(
    (row): FeedMessage => ({
      id: row.id,
      role: row.role,
      content: row.content,
      eventId: row.event_id,
      createdAt: row.created_at,
    })
  );

const EVENT_COLUMNS =
  'id, kind, task_id, stage, slot, slot_date, payload, rendered_text, status, created_at, rendered_at';

/**
 * Events, deliveries and feed messages. Deduplication of events is left to
 * the partial unique indexes; every status change is conditional on the
 * event still being `created`.
 */
export class NotificationStore {
  constructor(private readonly db: Db) {}

  /**
   * Insert a deadline reminder unless one exists for (taskId, stage).
   * Returns true when a row was inserted.
   */
  insertDeadlineEvent(params: { taskId: string; stage: string; payload: unknown; now: Date }): boolean {
    const result = this.db
      .prepare(
        `INSERT INTO notification_events (id, kind, task_id, stage, payload, status, created_at)
         VALUES (?, 'task_deadline_reminder', ?, ?, ?, 'created', ?)
         ON CONFLICT DO NOTHING`
      )
      .run(randomUUID(), params.taskId, params.stage, JSON.stringify(params.payload), params.now.toISOString());
    return result.changes === 1;
  }

  /**
   * Insert a follow-up summary unless one exists for (slot, slotDate).
   */
  insertFollowupEvent(params: { slot: FollowupSlot; slotDate: string; payload: unknown; now: Date }): boolean {
    const result = this.db
      .prepare(
        `INSERT INTO notification_events (id, kind, slot, slot_date, payload, status, created_at)
         VALUES (?, 'followup_summary', ?, ?, ?, 'created', ?)
         ON CONFLICT DO NOTHING`
      )
      .run(randomUUID(), params.slot, params.slotDate, JSON.stringify(params.payload), params.now.toISOString());
    return result.changes === 1;
  }

  /**
   * Oldest `created` events first.
   */
  listPendingEvents(limit: number): NotificationEvent[] {
    const rows = this.db
      .prepare(
        `SELECT ${EVENT_COLUMNS}
         FROM notification_events
         WHERE status = 'created'
         ORDER BY created_at ASC, rowid ASC
         LIMIT ?`
      )
      .all(limit);
    return z.array(EventRowSchema).parse(rows);
  }

  /**
   * Newest first.
   */
  listEvents(status: EventStatus, limit: number): NotificationEvent[] {
    const rows = this.db
      .prepare(
        `SELECT ${EVENT_COLUMNS}
         FROM notification_events
         WHERE status = ?
         ORDER BY created_at DESC, rowid DESC
         LIMIT ?`
      )
      .all(status, limit);
    return z.array(EventRowSchema).parse(rows);
  }

  getEvent(id: string): NotificationEvent | null {
    const row = this.db.prepare(`SELECT ${EVENT_COLUMNS} FROM notification_events WHERE id = ?`).get(id);
    return row === undefined ? null : EventRowSchema.parse(row);
  }

  listDeliveries(eventId: string): NotificationDelivery[] {
    const rows = this.db
      .prepare(
        `SELECT id, event_id, channel, status, destination, error, sent_at, created_at
         FROM notification_deliveries
         WHERE event_id = ?
         ORDER BY created_at ASC, rowid ASC`
      )
      .all(eventId);
    return z.array(DeliveryRowSchema).parse(rows);
  }

  /**
   * The latest `limit` feed messages, oldest first.
   */
  listMessages(limit: number): FeedMessage[] {
    const rows = this.db
      .prepare(
        `SELECT id, role, content, event_id, created_at FROM (
           SELECT rowid AS seq, id, role, content, event_id, created_at
           FROM messages
           ORDER BY created_at DESC, rowid DESC
           LIMIT ?
         )
         ORDER BY created_at ASC, seq ASC`
      )
      .all(limit);
    return z.array(MessageRowSchema).parse(rows);
  }

  /**
   * Record a successful render in one transaction: the event becomes
   * `rendered`, and one in-app delivery plus one assistant feed message are
   * written. Throws (and writes nothing) when the event is no longer
   * `created`.
   */
  completeRender(eventId: string, text: string, now: Date): void {
    const at = now.toISOString();
    const markRendered = this.db.prepare(
      `UPDATE notification_events
       SET status = 'rendered', rendered_text = ?, rendered_at = ?
       WHERE id = ? AND status = 'created'`
    );
    const insertDelivery = this.db.prepare(
      `INSERT INTO notification_deliveries (id, event_id, channel, status, sent_at, created_at)
       VALUES (?, ?, ?, 'sent', ?, ?)`
    );
    const insertMessage = this.db.prepare(
      `INSERT INTO messages (id, role, content, event_id, created_at)
       VALUES (?, 'assistant', ?, ?, ?)`
    );

    const apply = this.db.transaction(() => {
      const updated = markRendered.run(text, at, eventId);
      if (updated.changes !== 1) {
        throw new Error(`Event ${eventId} is no longer pending`);
      }
      const channel: DeliveryChannel = 'in_app';
      insertDelivery.run(randomUUID(), eventId, channel, at, at);
      insertMessage.run(randomUUID(), text, eventId, at);
    });
    apply();
  }

  /**
   * Mark a pending event as failed, keeping `errorText` for inspection.
   * Returns false when the event was not pending.
   */
  failRender(eventId: string, errorText: string): boolean {
    const result = this.db
      .prepare(
        `UPDATE notification_events
         SET status = 'failed', rendered_text = ?
         WHERE id = ? AND status = 'created'`
      )
      .run(errorText, eventId);
    return result.changes === 1;
  }
}
