import { openDatabase, type Db } from '../db.js';
import { isTerminalStatus, type TaskPriority, type TaskSnapshot, type TaskSource, type TaskStatus } from '../tasks.js';

export function createTestDatabase(): Db {
  return openDatabase(':memory:');
}

export interface TaskFixture {
  id: string;
  title?: string;
  description?: string;
  status?: TaskStatus;
  priority?: TaskPriority;
  dueDate?: string | null;
  dueTime?: string | null;
}

export function insertTask(db: Db, task: TaskFixture): void {
  const now = '2026-01-01T00:00:00.000Z';
  db.prepare(
    `INSERT INTO tasks (id, title, description, status, priority, due_date, due_time, created_at, updated_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
  ).run(
    task.id,
    task.title ?? `Task ${task.id}`,
    task.description ?? '',
    task.status ?? 'backlog',
    task.priority ?? 'normal',
    task.dueDate ?? null,
    task.dueTime ?? null,
    now,
    now
  );
}

export function makeTask(overrides: Partial<TaskSnapshot> & { id: string }): TaskSnapshot {
  return {
    title: `Task ${overrides.id}`,
    description: '',
    status: 'backlog',
    priority: 'normal',
    dueDate: null,
    dueTime: null,
    ...overrides,
  };
}

/**
 * In-memory task source over a fixed list, in the order given. Terminal tasks
 * are left out, as the real sources do.
 */
export class StaticTaskSource implements TaskSource {
  dueCalls = 0;
  activeCalls = 0;

  constructor(private readonly tasks: TaskSnapshot[]) {}

  async listDueTasks(maxRows: number): Promise<TaskSnapshot[]> {
    this.dueCalls++;
    return this.tasks.filter((t) => t.dueDate !== null && !isTerminalStatus(t.status)).slice(0, maxRows);
  }

  async listActiveTasks(maxRows: number): Promise<TaskSnapshot[]> {
    this.activeCalls++;
    return this.tasks.filter((t) => !isTerminalStatus(t.status)).slice(0, maxRows);
  }
}
