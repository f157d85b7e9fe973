import { FOLLOWUP_SLOTS, type FollowupSlot, type NotificationStore } from './notificationStore.js';
import type { TaskSnapshot, TaskSource } from './tasks.js';
import { daysBetween, localDate, minuteOfDay, parseTimeOfDay } from './timezone.js';

export type FollowupSchedule = Record<FollowupSlot, string>; // HH:MM local time

export interface FollowupDeps {
  taskSource: TaskSource;
  store: NotificationStore;
  timeZone: string;
  taskLimit?: number;
  now?: () => Date;
}

const DEFAULT_TASK_LIMIT = 200;
const MAX_HIGHLIGHTS = 5;

export function isFollowupSlot(value: string): value is FollowupSlot {
  return FOLLOWUP_SLOTS.some((slot) => slot === value);
}

function slotMinute(time: string): number {
  const { hour, minute } = parseTimeOfDay(time);
  return hour * 60 + minute;
}

/**
 * The latest slot whose start time has passed at `minutes` past local
 * midnight, or null before the first slot of the day.
 */
export function currentFollowupSlot(minutes: number, schedule: FollowupSchedule): FollowupSlot | null {
  let current: FollowupSlot | null = null;
  let currentStart = -1;
  for (const slot of FOLLOWUP_SLOTS) {
    const start = slotMinute(schedule[slot]);
    if (start <= minutes && start > currentStart) {
      current = slot;
      currentStart = start;
    }
  }
  return current;
}

function highlight(task: TaskSnapshot, overdue: boolean) {
  return {
    id: task.id,
    title: task.title,
    status: task.status,
    priority: task.priority,
    due_date: task.dueDate,
    due_time: task.dueTime,
    overdue,
  };
}

export function buildFollowupPayload(tasks: TaskSnapshot[], slot: FollowupSlot, now: Date, timeZone: string) {
  const today = localDate(now, timeZone);
  const overdue = tasks.filter((t) => t.dueDate !== null && daysBetween(today, t.dueDate) < 0);
  const dueToday = tasks.filter((t) => t.dueDate === today);
  const doing = tasks.filter((t) => t.status === 'doing');

  const highlights = [
    ...overdue.map((t) => highlight(t, true)),
    ...dueToday.map((t) => highlight(t, false)),
  ].slice(0, MAX_HIGHLIGHTS);

  return {
    kind: 'followup_summary' as const,
    slot,
    date: today,
    now: now.toISOString(),
    timezone: timeZone,
    counts: {
      overdue: overdue.length,
      due_today: dueToday.length,
      doing: doing.length,
    },
    highlights,
  };
}

/**
 * Queue the follow-up summary for `slot` today. At most one per slot and
 * local day; returns true when a new event was created.
 */
export async function enqueueFollowupSummary(deps: FollowupDeps, slot: FollowupSlot): Promise<boolean> {
  const now = deps.now ? deps.now() : new Date();
  const tasks = await deps.taskSource.listActiveTasks(deps.taskLimit ?? DEFAULT_TASK_LIMIT);
  const payload = buildFollowupPayload(tasks, slot, now, deps.timeZone);

  const created = deps.store.insertFollowupEvent({ slot, slotDate: payload.date, payload, now });
  if (created) {
    console.log(`[Followup] Queued ${slot} summary for ${payload.date}`);
  }
  return created;
}

/**
 * Scheduler entry point: queue the slot that is current right now, if any.
 */
export async function runFollowupCheck(deps: FollowupDeps, schedule: FollowupSchedule): Promise<FollowupSlot | null> {
  const now = deps.now ? deps.now() : new Date();
  const slot = currentFollowupSlot(minuteOfDay(now, deps.timeZone), schedule);
  if (!slot) return null;

  const created = await enqueueFollowupSummary({ ...deps, now: () => now }, slot);
  return created ? slot : null;
}
