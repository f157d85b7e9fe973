import { errorMessage } from './textBackend.js';

export interface ScheduledJob {
  name: string;
  intervalMs: number;
  run: () => Promise<unknown>;
}

export interface JobStatus {
  name: string;
  intervalMs: number;
  running: boolean;
  runs: number;
  skipped: number;
  lastStartedAt: string | null;
  lastFinishedAt: string | null;
  lastError: string | null;
}

export type ExclusiveRun<T> = { ran: true; value: T } | { ran: false };

export interface Scheduler {
  start(): void;
  stop(): void;
  /** Run a job now unless it is already running. Resolves to whether it ran. */
  runNow(name: string): Promise<boolean>;
  /**
   * Run `task` in place of job `name`'s own work, under the same in-flight
   * guard. Errors from `task` are recorded on the job and rethrown.
   */
  runExclusive<T>(name: string, task: () => Promise<T>): Promise<ExclusiveRun<T>>;
  has(name: string): boolean;
  status(): { started: boolean; jobs: JobStatus[] };
}

interface JobState {
  job: ScheduledJob;
  status: JobStatus;
  timer: NodeJS.Timeout | null;
}

/**
 * Fixed-interval runner for independent jobs. A job never overlaps itself:
 * a tick that fires while the previous run is still in flight is skipped.
 * Jobs run once right away on start, then on every interval.
 */
export function createScheduler(jobs: ScheduledJob[]): Scheduler {
  const states = new Map<string, JobState>();
  for (const job of jobs) {
    if (states.has(job.name)) {
      throw new Error(`Duplicate job name: ${job.name}`);
    }
    states.set(job.name, {
      job,
      timer: null,
      status: {
        name: job.name,
        intervalMs: job.intervalMs,
        running: false,
        runs: 0,
        skipped: 0,
        lastStartedAt: null,
        lastFinishedAt: null,
        lastError: null,
      },
    });
  }

  let started = false;

  function getState(name: string): JobState {
    const state = states.get(name);
    if (!state) {
      throw new Error(`Unknown job: ${name}`);
    }
    return state;
  }

  async function runGuarded<T>(state: JobState, task: () => Promise<T>): Promise<ExclusiveRun<T>> {
    const { status } = state;
    if (status.running) {
      status.skipped++;
      console.log(`[Scheduler] ${status.name} still running, skipping this run`);
      return { ran: false };
    }

    status.running = true;
    status.lastStartedAt = new Date().toISOString();
    try {
      const value = await task();
      status.lastError = null;
      return { ran: true, value };
    } catch (error) {
      status.lastError = errorMessage(error);
      throw error;
    } finally {
      status.running = false;
      status.runs++;
      status.lastFinishedAt = new Date().toISOString();
    }
  }

  async function runJob(state: JobState): Promise<boolean> {
    try {
      const outcome = await runGuarded(state, state.job.run);
      return outcome.ran;
    } catch (error) {
      console.error(`[Scheduler] ${state.status.name} failed: ${errorMessage(error)}`);
      return true;
    }
  }

  return {
    start() {
      if (started) {
        console.log('[Scheduler] Already running');
        return;
      }
      started = true;
      for (const state of states.values()) {
        console.log(`[Scheduler] Starting ${state.job.name} (interval: ${state.job.intervalMs / 1000}s)`);
        void runJob(state);
        state.timer = setInterval(() => {
          void runJob(state);
        }, state.job.intervalMs);
      }
    },

    stop() {
      for (const state of states.values()) {
        if (state.timer) {
          clearInterval(state.timer);
          state.timer = null;
        }
      }
      if (started) {
        console.log('[Scheduler] Stopped');
      }
      started = false;
    },

    async runNow(name: string) {
      return runJob(getState(name));
    },

    async runExclusive<T>(name: string, task: () => Promise<T>) {
      return runGuarded(getState(name), task);
    },

    has(name: string) {
      return states.has(name);
    },

    status() {
      return {
        started,
        jobs: [...states.values()].map((state) => ({ ...state.status })),
      };
    },
  };
}
