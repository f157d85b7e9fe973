import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Db } from './db.js';
import { getSchemaVersion } from './db.js';
import { NotificationStore } from './notificationStore.js';
import { createTestDatabase } from './__testUtils__/index.js';

const t1 = new Date('2026-03-10T08:00:00.000Z');
const t2 = new Date('2026-03-10T09:00:00.000Z');
const t3 = new Date('2026-03-10T10:00:00.000Z');

describe('NotificationStore', () => {
  let db: Db;
  let store: NotificationStore;

  beforeEach(() => {
    db = createTestDatabase();
    store = new NotificationStore(db);
  });

  afterEach(() => {
    db.close();
  });

  function onlyPendingId(): string {
    const [event] = store.listPendingEvents(1);
    if (!event) throw new Error('expected a pending event');
    return event.id;
  }

  it('migrates a fresh database to the latest schema', () => {
    expect(getSchemaVersion(db)).toBe(2);
  });

  describe('insertDeadlineEvent', () => {
    it('inserts once per task and stage', () => {
      expect(store.insertDeadlineEvent({ taskId: 't1', stage: 'D-1', payload: { a: 1 }, now: t1 })).toBe(true);
      expect(store.insertDeadlineEvent({ taskId: 't1', stage: 'D-1', payload: { a: 2 }, now: t2 })).toBe(false);
      expect(store.insertDeadlineEvent({ taskId: 't1', stage: 'D-0', payload: { a: 3 }, now: t2 })).toBe(true);
      expect(store.insertDeadlineEvent({ taskId: 't2', stage: 'D-1', payload: { a: 4 }, now: t2 })).toBe(true);

      expect(store.listPendingEvents(10)).toHaveLength(3);
    });

    it('keeps the first payload on a duplicate', () => {
      store.insertDeadlineEvent({ taskId: 't1', stage: 'D-1', payload: { version: 1 }, now: t1 });
      store.insertDeadlineEvent({ taskId: 't1', stage: 'D-1', payload: { version: 2 }, now: t2 });

      const [event] = store.listPendingEvents(10);
      expect(event.payload).toEqual({ version: 1 });
      expect(event.createdAt).toBe('2026-03-10T08:00:00.000Z');
    });
  });

  describe('insertFollowupEvent', () => {
    it('inserts once per slot and day', () => {
      expect(store.insertFollowupEvent({ slot: 'morning', slotDate: '2026-03-10', payload: {}, now: t1 })).toBe(true);
      expect(store.insertFollowupEvent({ slot: 'morning', slotDate: '2026-03-10', payload: {}, now: t2 })).toBe(false);
      expect(store.insertFollowupEvent({ slot: 'noon', slotDate: '2026-03-10', payload: {}, now: t2 })).toBe(true);
      expect(store.insertFollowupEvent({ slot: 'morning', slotDate: '2026-03-11', payload: {}, now: t3 })).toBe(true);
    });

    it('does not collide with deadline reminders', () => {
      store.insertDeadlineEvent({ taskId: 't1', stage: 'D-1', payload: {}, now: t1 });
      expect(store.insertFollowupEvent({ slot: 'morning', slotDate: '2026-03-10', payload: {}, now: t1 })).toBe(true);

      const kinds = store.listPendingEvents(10).map((e) => e.kind);
      expect(kinds).toEqual(['task_deadline_reminder', 'followup_summary']);
    });
  });

  describe('listPendingEvents', () => {
    it('returns the oldest events first, up to the limit', () => {
      store.insertDeadlineEvent({ taskId: 'late', stage: 'D-0', payload: {}, now: t3 });
      store.insertDeadlineEvent({ taskId: 'early', stage: 'D-0', payload: {}, now: t1 });
      store.insertDeadlineEvent({ taskId: 'middle', stage: 'D-0', payload: {}, now: t2 });

      expect(store.listPendingEvents(2).map((e) => e.taskId)).toEqual(['early', 'middle']);
      expect(store.listPendingEvents(10).map((e) => e.taskId)).toEqual(['early', 'middle', 'late']);
    });

    it('skips events that are no longer pending', () => {
      store.insertDeadlineEvent({ taskId: 'a', stage: 'D-0', payload: {}, now: t1 });
      store.insertDeadlineEvent({ taskId: 'b', stage: 'D-0', payload: {}, now: t2 });
      store.failRender(onlyPendingId(), '[render failed] boom');

      expect(store.listPendingEvents(10).map((e) => e.taskId)).toEqual(['b']);
    });
  });

  describe('completeRender', () => {
    it('marks the event rendered and writes one delivery and one message', () => {
      store.insertDeadlineEvent({ taskId: 't1', stage: 'D-1', payload: { stage: 'D-1' }, now: t1 });
      const id = onlyPendingId();

      store.completeRender(id, 'Pack your bag tonight.', t2);

      const event = store.getEvent(id);
      expect(event?.status).toBe('rendered');
      expect(event?.renderedText).toBe('Pack your bag tonight.');
      expect(event?.renderedAt).toBe('2026-03-10T09:00:00.000Z');

      const deliveries = store.listDeliveries(id);
      expect(deliveries).toHaveLength(1);
      expect(deliveries[0]).toMatchObject({
        eventId: id,
        channel: 'in_app',
        status: 'sent',
        destination: null,
        error: null,
        sentAt: '2026-03-10T09:00:00.000Z',
      });

      expect(store.listMessages(10)).toEqual([
        {
          id: expect.any(String),
          role: 'assistant',
          content: 'Pack your bag tonight.',
          eventId: id,
          createdAt: '2026-03-10T09:00:00.000Z',
        },
      ]);
    });

    it('refuses an event that was already rendered and writes nothing', () => {
      store.insertDeadlineEvent({ taskId: 't1', stage: 'D-1', payload: {}, now: t1 });
      const id = onlyPendingId();
      store.completeRender(id, 'first', t2);

      expect(() => store.completeRender(id, 'second', t3)).toThrow(`Event ${id} is no longer pending`);

      expect(store.getEvent(id)?.renderedText).toBe('first');
      expect(store.listDeliveries(id)).toHaveLength(1);
      expect(store.listMessages(10)).toHaveLength(1);
    });

    it('refuses an event that already failed', () => {
      store.insertDeadlineEvent({ taskId: 't1', stage: 'D-1', payload: {}, now: t1 });
      const id = onlyPendingId();
      expect(store.failRender(id, '[render failed] boom')).toBe(true);

      expect(() => store.completeRender(id, 'late text', t2)).toThrow(`Event ${id} is no longer pending`);
      expect(store.getEvent(id)?.status).toBe('failed');
      expect(store.listDeliveries(id)).toEqual([]);
    });
  });

  describe('failRender', () => {
    it('records the error text and only applies to pending events', () => {
      store.insertDeadlineEvent({ taskId: 't1', stage: 'D-1', payload: {}, now: t1 });
      const id = onlyPendingId();

      expect(store.failRender(id, '[render failed] LLM error: bad key')).toBe(true);
      expect(store.getEvent(id)).toMatchObject({
        status: 'failed',
        renderedText: '[render failed] LLM error: bad key',
        renderedAt: null,
      });

      expect(store.failRender(id, '[render failed] again')).toBe(false);
      expect(store.getEvent(id)?.renderedText).toBe('[render failed] LLM error: bad key');
    });
  });

  describe('queries', () => {
    it('returns null for an unknown event', () => {
      expect(store.getEvent('missing')).toBeNull();
    });

    it('lists events of a status newest first', () => {
      store.insertDeadlineEvent({ taskId: 'a', stage: 'D-0', payload: {}, now: t1 });
      store.insertDeadlineEvent({ taskId: 'b', stage: 'D-0', payload: {}, now: t2 });
      store.insertDeadlineEvent({ taskId: 'c', stage: 'D-0', payload: {}, now: t3 });
      for (const event of store.listPendingEvents(10)) {
        store.completeRender(event.id, `text ${event.taskId}`, t3);
      }

      expect(store.listEvents('rendered', 10).map((e) => e.taskId)).toEqual(['c', 'b', 'a']);
      expect(store.listEvents('rendered', 1).map((e) => e.taskId)).toEqual(['c']);
      expect(store.listEvents('created', 10)).toEqual([]);
    });

    it('lists the latest messages oldest first', () => {
      store.insertDeadlineEvent({ taskId: 'a', stage: 'D-0', payload: {}, now: t1 });
      store.insertDeadlineEvent({ taskId: 'b', stage: 'D-0', payload: {}, now: t1 });
      store.insertDeadlineEvent({ taskId: 'c', stage: 'D-0', payload: {}, now: t1 });
      const [a, b, c] = store.listPendingEvents(10);
      store.completeRender(a.id, 'first', t1);
      store.completeRender(b.id, 'second', t2);
      store.completeRender(c.id, 'third', t3);

      expect(store.listMessages(2).map((m) => m.content)).toEqual(['second', 'third']);
      expect(store.listMessages(10).map((m) => m.content)).toEqual(['first', 'second', 'third']);
    });
  });
});
