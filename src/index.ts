import { createApp } from './app.js';
import { loadConfig, type AppConfig } from './config.js';
import { openDatabase } from './db.js';
import { runFollowupCheck, type FollowupDeps } from './followup.js';
import { createTextBackend } from './llm.js';
import { renderPendingNotifications, type RenderDeps } from './notificationRender.js';
import { NotificationStore } from './notificationStore.js';
import { scanDeadlineReminders, type ScanDeps } from './reminders.js';
import { createScheduler, type ScheduledJob } from './scheduler.js';
import { SqliteTaskSource, SupabaseTaskSource, type TaskSource } from './tasks.js';
import { errorMessage } from './textBackend.js';

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    console.error(`[Init] ${errorMessage(error)}`);
    process.exit(1);
  }
}

const config = readConfig();

const db = openDatabase(config.databasePath);
const store = new NotificationStore(db);

let taskSource: TaskSource;
if (config.tasks.source === 'supabase' && config.tasks.supabaseUrl && config.tasks.supabaseAnonKey) {
  taskSource = new SupabaseTaskSource(config.tasks.supabaseUrl, config.tasks.supabaseAnonKey);
} else {
  taskSource = new SqliteTaskSource(db);
}

const backend = createTextBackend(config.llm);

const scan: ScanDeps = {
  taskSource,
  store,
  timeZone: config.timeZone,
  taskLimit: config.scan.taskLimit,
};
const render: RenderDeps = { store, backend, retryPolicy: config.llm.retry };
const followup: FollowupDeps = {
  taskSource,
  store,
  timeZone: config.timeZone,
  taskLimit: config.scan.taskLimit,
};

const scanLimit = config.scan.limitNewEvents;
const renderBatchSize = config.render.batchSize;
const followupSchedule = {
  morning: config.followup.morning,
  noon: config.followup.noon,
  evening: config.followup.evening,
};

const jobs: ScheduledJob[] = [
  { name: 'scan', intervalMs: config.scan.intervalMs, run: () => scanDeadlineReminders(scan, scanLimit) },
  { name: 'render', intervalMs: config.render.intervalMs, run: () => renderPendingNotifications(render, renderBatchSize) },
];
if (config.followup.enabled) {
  jobs.push({
    name: 'followup',
    intervalMs: config.followup.checkIntervalMs,
    run: () => runFollowupCheck(followup, followupSchedule),
  });
}
const scheduler = createScheduler(jobs);

const app = createApp({
  store,
  scan,
  render,
  followup,
  defaults: { scanLimit, renderBatchSize },
  scheduler,
});

const server = app.listen(config.port, () => {
  console.log(`[Server] Running on http://localhost:${config.port}`);
  console.log(`[Server] Time zone: ${config.timeZone}, tasks: ${config.tasks.source}`);
  console.log(`[Server] LLM: ${backend.name} (${backend.model})`);

  if (config.schedulerEnabled) {
    scheduler.start();
  } else {
    console.log('[Server] Scheduler disabled via SCHEDULER_ENABLED=false');
  }
});

function shutdown(signal: string) {
  console.log(`[Server] ${signal} received, shutting down`);
  scheduler.stop();
  server.close(() => {
    db.close();
    process.exit(0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
