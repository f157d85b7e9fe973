import { daysBetween, toZonedParts, zonedTimeToInstant } from './timezone.js';
import { isTerminalStatus, type TaskSnapshot } from './tasks.js';

export type Stage = 'OVERDUE' | 'T-30M' | 'T-2H' | 'D-0' | 'D-1' | 'D-3' | 'D-7';

export const STAGES: readonly Stage[] = ['OVERDUE', 'T-30M', 'T-2H', 'D-0', 'D-1', 'D-3', 'D-7'];

// Exact-day matches only: a task is re-evaluated on every scan and picks up
// each threshold on the day it is crossed.
const DATE_STAGES: ReadonlyArray<[Stage, number]> = [
  ['D-7', 7],
  ['D-3', 3],
  ['D-1', 1],
  ['D-0', 0],
];

// Only for tasks with a due_time that fall due today.
const TIME_STAGES: ReadonlyArray<[Stage, number]> = [
  ['T-2H', 2 * 60 * 60 * 1000],
  ['T-30M', 30 * 60 * 1000],
];

const URGENCY: Record<Stage, number> = {
  OVERDUE: 0,
  'T-30M': 1,
  'T-2H': 2,
  'D-0': 3,
  'D-1': 4,
  'D-3': 5,
  'D-7': 6,
};

export function isStage(value: string): value is Stage {
  return STAGES.some((stage) => stage === value);
}

/**
 * Escalation stages that apply to `task` at `now`, most urgent first.
 *
 * "Today" is the calendar day of `now` in `timeZone`. An overdue task yields
 * `['OVERDUE']` alone, whether it is overdue by date or by time.
 */
export function computeStages(
  task: Pick<TaskSnapshot, 'status' | 'dueDate' | 'dueTime'>,
  now: Date,
  timeZone: string
): Stage[] {
  if (isTerminalStatus(task.status)) return [];
  if (!task.dueDate) return [];

  const today = toZonedParts(now, timeZone).date;
  const daysLeft = daysBetween(today, task.dueDate);

  if (daysLeft < 0) return ['OVERDUE'];

  const stages: Stage[] = [];
  for (const [stage, days] of DATE_STAGES) {
    if (daysLeft === days) stages.push(stage);
  }

  if (task.dueTime && daysLeft === 0) {
    const due = zonedTimeToInstant(task.dueDate, task.dueTime, timeZone);
    const delta = due.getTime() - now.getTime();

    if (delta < 0) return ['OVERDUE'];

    for (const [stage, threshold] of TIME_STAGES) {
      if (delta <= threshold) stages.push(stage);
    }
  }

  return stages.sort((a, b) => URGENCY[a] - URGENCY[b]);
}
