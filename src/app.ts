import express from 'express';
import cors from 'cors';
import { z } from 'zod';
import { enqueueFollowupSummary, type FollowupDeps } from './followup.js';
import { renderPendingNotifications, type RenderDeps } from './notificationRender.js';
import { EVENT_STATUSES, FOLLOWUP_SLOTS, type NotificationStore } from './notificationStore.js';
import { scanDeadlineReminders, type ScanDeps } from './reminders.js';
import type { ExclusiveRun, Scheduler } from './scheduler.js';
import { errorMessage } from './textBackend.js';

export interface AppServices {
  store: NotificationStore;
  scan: ScanDeps;
  render: RenderDeps;
  followup: FollowupDeps;
  defaults: {
    scanLimit: number;
    renderBatchSize: number;
  };
  scheduler?: Scheduler;
}

const MAX_LIST_LIMIT = 200;

const ScanBodySchema = z.object({
  limit: z.number().int().nonnegative().max(1000).optional(),
});

const RenderBodySchema = z.object({
  batchSize: z.number().int().positive().max(1000).optional(),
});

const FollowupBodySchema = z.object({
  slot: z.enum(FOLLOWUP_SLOTS),
});

const listLimit = (fallback: number) =>
  z.coerce
    .number()
    .int()
    .positive()
    .default(fallback)
    .transform((value) => Math.min(value, MAX_LIST_LIMIT));

const EventsQuerySchema = z.object({
  status: z.enum(EVENT_STATUSES).default('rendered'),
  limit: listLimit(50),
});

const MessagesQuerySchema = z.object({
  limit: listLimit(50),
});

function firstIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  return issue ? `${issue.path.join('.') || 'body'}: ${issue.message}` : 'Invalid request';
}

export function createApp(services: AppServices): express.Express {
  const app = express();

  // Manual triggers share the scheduled job's in-flight guard when there is one.
  async function exclusive<T>(job: string, task: () => Promise<T>): Promise<ExclusiveRun<T>> {
    const { scheduler } = services;
    if (scheduler?.has(job)) {
      return scheduler.runExclusive(job, task);
    }
    return { ran: true, value: await task() };
  }

  function busy(res: express.Response, job: string) {
    return res.status(409).json({ success: false, error: `${job} job is already running` });
  }

  app.use(cors());
  app.use(express.json());

  app.post('/reminders/scan', async (req, res) => {
    const parsed = ScanBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ success: false, error: firstIssue(parsed.error) });
    }

    try {
      const limit = parsed.data.limit ?? services.defaults.scanLimit;
      const outcome = await exclusive('scan', () => scanDeadlineReminders(services.scan, limit));
      if (!outcome.ran) return busy(res, 'scan');
      return res.json({ success: true, data: { createdEvents: outcome.value } });
    } catch (error) {
      console.error('[Scan] Manual scan failed:', errorMessage(error));
      return res.status(500).json({ success: false, error: 'Reminder scan failed' });
    }
  });

  app.post('/notifications/render', async (req, res) => {
    const parsed = RenderBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ success: false, error: firstIssue(parsed.error) });
    }

    try {
      const batchSize = parsed.data.batchSize ?? services.defaults.renderBatchSize;
      const outcome = await exclusive('render', () => renderPendingNotifications(services.render, batchSize));
      if (!outcome.ran) return busy(res, 'render');
      return res.json({ success: true, data: { rendered: outcome.value } });
    } catch (error) {
      console.error('[Render] Manual render failed:', errorMessage(error));
      return res.status(500).json({ success: false, error: 'Notification render failed' });
    }
  });

  app.get('/notifications', (req, res) => {
    const parsed = EventsQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ success: false, error: firstIssue(parsed.error) });
    }

    const events = services.store.listEvents(parsed.data.status, parsed.data.limit);
    return res.json({ success: true, data: events });
  });

  app.get('/notifications/:id', (req, res) => {
    const event = services.store.getEvent(req.params.id);
    if (!event) {
      return res.status(404).json({ success: false, error: 'Notification not found' });
    }
    const deliveries = services.store.listDeliveries(event.id);
    return res.json({ success: true, data: { ...event, deliveries } });
  });

  app.get('/messages', (req, res) => {
    const parsed = MessagesQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ success: false, error: firstIssue(parsed.error) });
    }
    return res.json({ success: true, data: services.store.listMessages(parsed.data.limit) });
  });

  app.post('/followup/run', async (req, res) => {
    const parsed = FollowupBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ success: false, error: firstIssue(parsed.error) });
    }

    try {
      const { slot } = parsed.data;
      const outcome = await exclusive('followup', () => enqueueFollowupSummary(services.followup, slot));
      if (!outcome.ran) return busy(res, 'followup');
      return res.json({ success: true, data: { slot, created: outcome.value } });
    } catch (error) {
      console.error('[Followup] Manual run failed:', errorMessage(error));
      return res.status(500).json({ success: false, error: 'Follow-up failed' });
    }
  });

  app.get('/scheduler/status', (req, res) => {
    if (!services.scheduler) {
      return res.json({ success: true, data: { started: false, jobs: [] } });
    }
    return res.json({ success: true, data: services.scheduler.status() });
  });

  // Error handler middleware (must be after routes or it will not be called)
  app.use((err: Error, req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (err instanceof SyntaxError && 'body' in err) {
      return res.status(400).json({
        success: false,
        error: 'Invalid JSON in request body',
      });
    }
    console.error('[Server] Unhandled error:', err.message);
    return res.status(500).json({
      success: false,
      error: 'Internal server error',
    });
  });

  return app;
}
