import type { NotificationStore } from './notificationStore.js';
import { computeStages, type Stage } from './stages.js';
import type { TaskSnapshot, TaskSource } from './tasks.js';
import { errorMessage } from './textBackend.js';

export interface ScanDeps {
  taskSource: TaskSource;
  store: NotificationStore;
  timeZone: string;
  /** Upper bound on tasks considered per run. */
  taskLimit?: number;
  now?: () => Date;
}

const DEFAULT_TASK_LIMIT = 200;

export function buildReminderPayload(task: TaskSnapshot, stage: string, now: Date, timeZone: string) {
  return {
    kind: 'task_deadline_reminder' as const,
    stage,
    now: now.toISOString(),
    timezone: timeZone,
    task: {
      id: task.id,
      title: task.title,
      description: task.description,
      status: task.status,
      priority: task.priority,
      due_date: task.dueDate,
      due_time: task.dueTime,
    },
  };
}

/**
 * Create deadline reminder events for every (task, stage) pair that is due
 * and not yet recorded. Stops once `limitNewEvents` events were created;
 * pairs left over are picked up by the next run.
 *
 * Storage errors propagate: the rest of the scan is abandoned, events already
 * inserted stay. A task whose stages cannot be evaluated is skipped.
 */
export async function scanDeadlineReminders(deps: ScanDeps, limitNewEvents: number): Promise<number> {
  if (limitNewEvents <= 0) return 0;

  const now = deps.now ? deps.now() : new Date();
  const tasks = await deps.taskSource.listDueTasks(deps.taskLimit ?? DEFAULT_TASK_LIMIT);

  let created = 0;
  for (const task of tasks) {
    let stages: Stage[];
    try {
      stages = computeStages(task, now, deps.timeZone);
    } catch (error) {
      console.warn(`[Scan] Skipping task ${task.id}: ${errorMessage(error)}`);
      continue;
    }

    for (const stage of stages) {
      const inserted = deps.store.insertDeadlineEvent({
        taskId: task.id,
        stage,
        payload: buildReminderPayload(task, stage, now, deps.timeZone),
        now,
      });

      if (inserted) {
        created++;
        if (created >= limitNewEvents) {
          console.log(`[Scan] Created ${created} reminder event(s), limit reached`);
          return created;
        }
      }
    }
  }

  if (created > 0) {
    console.log(`[Scan] Created ${created} reminder event(s) from ${tasks.length} task(s)`);
  }
  return created;
}
