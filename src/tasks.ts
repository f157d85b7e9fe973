import { createClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { Db } from './db.js';

export type TaskStatus = 'backlog' | 'doing' | 'waiting' | 'done' | 'canceled';
export type TaskPriority = 'low' | 'normal' | 'high' | 'urgent';

export const ACTIVE_STATUSES: readonly TaskStatus[] = ['backlog', 'doing', 'waiting'];
export const TERMINAL_STATUSES: readonly TaskStatus[] = ['done', 'canceled'];

export function isTerminalStatus(status: TaskStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

/**
 * Read-only view of a task, as handed over by the task store.
 */
export interface TaskSnapshot {
  id: string;
  title: string;
  description: string;
  status: TaskStatus;
  priority: TaskPriority;
  dueDate: string | null; // YYYY-MM-DD
  dueTime: string | null; // HH:MM[:SS]
}

const TaskRowSchema = z
  .object({
    id: z.union([z.string(), z.number()]).transform(String),
    title: z.string().min(1),
    description: z.string().nullish().transform((value) => value ?? ''),
    status: z.enum(['backlog', 'doing', 'waiting', 'done', 'canceled']),
    priority: z.enum(['low', 'normal', 'high', 'urgent']).nullish().transform((value) => value ?? 'normal'),
    due_date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).nullish(),
    due_time: z
      .string()
      .regex(/^([01]\d|2[0-3]):[0-5]\d(:[0-5]\d(\.\d+)?)?$/, 'Invalid due_time')
      .nullish(),
  })
  .transform(
    (row): TaskSnapshot => ({
      id: row.id,
      title: row.title,
      description: row.description,
      status: row.status,
      priority: row.priority,
      dueDate: row.due_date ?? null,
      dueTime: row.due_time ?? null,
    })
  );

/**
 * Validate raw task rows. Rows that do not match the schema are skipped.
 */
export function parseTaskRows(rows: unknown[], source: string): TaskSnapshot[] {
  const tasks: TaskSnapshot[] = [];
  for (const row of rows) {
    const result = TaskRowSchema.safeParse(row);
    if (result.success) {
      tasks.push(result.data);
    } else {
      console.warn(`[Tasks] Skipping invalid task row from ${source}: ${result.error.issues[0]?.message ?? 'unknown issue'}`);
    }
  }
  return tasks;
}

export interface TaskSource {
  /** Non-terminal tasks with a due date, due date ascending. */
  listDueTasks(maxRows: number): Promise<TaskSnapshot[]>;
  /** All non-terminal tasks, due date ascending with undated tasks last. */
  listActiveTasks(maxRows: number): Promise<TaskSnapshot[]>;
}

const TASK_COLUMNS = 'id, title, description, status, priority, due_date, due_time';

/**
 * Tasks from the `tasks` table of the local database.
 */
export class SqliteTaskSource implements TaskSource {
  constructor(private readonly db: Db) {}

  async listDueTasks(maxRows: number): Promise<TaskSnapshot[]> {
    const rows = this.db
      .prepare(
        `SELECT ${TASK_COLUMNS}
         FROM tasks
         WHERE due_date IS NOT NULL AND status NOT IN ('done', 'canceled')
         ORDER BY due_date ASC, rowid ASC
         LIMIT ?`
      )
      .all(maxRows);
    return parseTaskRows(rows, 'sqlite');
  }

  async listActiveTasks(maxRows: number): Promise<TaskSnapshot[]> {
    const rows = this.db
      .prepare(
        `SELECT ${TASK_COLUMNS}
         FROM tasks
         WHERE status NOT IN ('done', 'canceled')
         ORDER BY due_date IS NULL, due_date ASC, rowid ASC
         LIMIT ?`
      )
      .all(maxRows);
    return parseTaskRows(rows, 'sqlite');
  }
}

/**
 * Tasks from a Supabase `tasks` table with the same columns.
 * The client is created on first use.
 */
export class SupabaseTaskSource implements TaskSource {
  private client: ReturnType<typeof createClient> | null = null;

  constructor(
    private readonly url: string,
    private readonly anonKey: string
  ) {}

  private getClient() {
    if (!this.client) {
      if (!this.url || !this.anonKey) {
        throw new Error('Supabase credentials not configured');
      }
      this.client = createClient(this.url, this.anonKey);
    }
    return this.client;
  }

  async listDueTasks(maxRows: number): Promise<TaskSnapshot[]> {
    const { data, error } = await this.getClient()
      .from('tasks')
      .select(TASK_COLUMNS)
      .not('due_date', 'is', null)
      .not('status', 'in', '(done,canceled)')
      .order('due_date', { ascending: true })
      .limit(maxRows);

    if (error) {
      throw new Error(`Supabase task query failed: ${error.message}`);
    }
    return parseTaskRows(data ?? [], 'supabase');
  }

  async listActiveTasks(maxRows: number): Promise<TaskSnapshot[]> {
    const { data, error } = await this.getClient()
      .from('tasks')
      .select(TASK_COLUMNS)
      .in('status', [...ACTIVE_STATUSES])
      .order('due_date', { ascending: true, nullsFirst: false })
      .limit(maxRows);

    if (error) {
      throw new Error(`Supabase task query failed: ${error.message}`);
    }
    return parseTaskRows(data ?? [], 'supabase');
  }
}
