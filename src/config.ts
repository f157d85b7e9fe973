import { z } from 'zod';
import { isValidTimeZone } from './timezone.js';

const slotTime = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'Expected HH:MM');

const flag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const emptyAsUndefined = (value: unknown) => (value === '' ? undefined : value);

const ConfigSchema = z.object({
  PORT: z.coerce.number().int().positive().default(5000),
  DATABASE_PATH: z.string().min(1).default('data/reminders.db'),
  TZ: z.preprocess(
    emptyAsUndefined,
    z.string().default('UTC').refine(isValidTimeZone, { message: 'Unknown IANA time zone' })
  ),

  REMINDER_SCAN_INTERVAL_MIN: z.coerce.number().positive().default(5),
  REMINDER_SCAN_LIMIT: z.coerce.number().int().nonnegative().default(10),
  SCAN_TASK_LIMIT: z.coerce.number().int().positive().default(200),
  RENDER_INTERVAL_SEC: z.coerce.number().positive().default(60),
  RENDER_BATCH_SIZE: z.coerce.number().int().positive().default(10),

  FOLLOWUP_ENABLED: flag.default('true'),
  FOLLOWUP_CHECK_INTERVAL_SEC: z.coerce.number().positive().default(300),
  FOLLOWUP_MORNING: slotTime.default('09:00'),
  FOLLOWUP_NOON: slotTime.default('13:00'),
  FOLLOWUP_EVENING: slotTime.default('18:00'),

  LLM_BACKEND: z.enum(['openai_api', 'claude_cli', 'ollama_cli', 'mock']).default('openai_api'),
  LLM_MODEL: z.string().min(1).default('gpt-4o-mini'),
  LLM_BASE_URL: z.preprocess(emptyAsUndefined, z.string().url().default('https://api.openai.com/v1')),
  OPENAI_API_KEY: z.preprocess(emptyAsUndefined, z.string().optional()),
  LLM_CLI_COMMAND: z.preprocess(emptyAsUndefined, z.string().optional()),
  LLM_CLI_ARGS: z.preprocess(emptyAsUndefined, z.string().optional()),
  OLLAMA_MODEL: z.string().min(1).default('llama3.1'),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(25000),
  LLM_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  LLM_RETRY_INITIAL_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
  LLM_RETRY_MAX_DELAY_MS: z.coerce.number().int().nonnegative().default(30000),
  LLM_RETRY_JITTER: z.coerce.number().min(0).max(1).default(0.5),

  TASK_SOURCE: z.enum(['sqlite', 'supabase']).default('sqlite'),
  SUPABASE_URL: z.preprocess(emptyAsUndefined, z.string().url().optional()),
  SUPABASE_ANON_KEY: z.preprocess(emptyAsUndefined, z.string().optional()),

  SCHEDULER_ENABLED: flag.default('true'),
});

export type LlmBackendName = z.infer<typeof ConfigSchema>['LLM_BACKEND'];

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  jitterRatio: number;
  timeoutMs: number;
}

export interface AppConfig {
  port: number;
  databasePath: string;
  timeZone: string;
  scan: {
    intervalMs: number;
    limitNewEvents: number;
    taskLimit: number;
  };
  render: {
    intervalMs: number;
    batchSize: number;
  };
  followup: {
    enabled: boolean;
    checkIntervalMs: number;
    morning: string;
    noon: string;
    evening: string;
  };
  llm: {
    backend: LlmBackendName;
    model: string;
    baseUrl: string;
    apiKey?: string;
    cliCommand?: string;
    cliArgs?: string[];
    ollamaModel: string;
    retry: RetryPolicy;
  };
  tasks: {
    source: 'sqlite' | 'supabase';
    supabaseUrl?: string;
    supabaseAnonKey?: string;
  };
  schedulerEnabled: boolean;
}

/**
 * Build the application configuration from environment variables.
 * Throws with every invalid variable listed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = ConfigSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const e = result.data;

  if (e.TASK_SOURCE === 'supabase' && (!e.SUPABASE_URL || !e.SUPABASE_ANON_KEY)) {
    throw new Error('Invalid configuration: TASK_SOURCE=supabase requires SUPABASE_URL and SUPABASE_ANON_KEY');
  }

  return {
    port: e.PORT,
    databasePath: e.DATABASE_PATH,
    timeZone: e.TZ,
    scan: {
      intervalMs: e.REMINDER_SCAN_INTERVAL_MIN * 60_000,
      limitNewEvents: e.REMINDER_SCAN_LIMIT,
      taskLimit: e.SCAN_TASK_LIMIT,
    },
    render: {
      intervalMs: e.RENDER_INTERVAL_SEC * 1000,
      batchSize: e.RENDER_BATCH_SIZE,
    },
    followup: {
      enabled: e.FOLLOWUP_ENABLED,
      checkIntervalMs: e.FOLLOWUP_CHECK_INTERVAL_SEC * 1000,
      morning: e.FOLLOWUP_MORNING,
      noon: e.FOLLOWUP_NOON,
      evening: e.FOLLOWUP_EVENING,
    },
    llm: {
      backend: e.LLM_BACKEND,
      model: e.LLM_MODEL,
      baseUrl: e.LLM_BASE_URL.replace(/\/+$/, ''),
      apiKey: e.OPENAI_API_KEY,
      cliCommand: e.LLM_CLI_COMMAND,
      cliArgs: e.LLM_CLI_ARGS ? e.LLM_CLI_ARGS.split(/\s+/).filter(Boolean) : undefined,
      ollamaModel: e.OLLAMA_MODEL,
      retry: {
        maxAttempts: e.LLM_MAX_ATTEMPTS,
        initialDelayMs: e.LLM_RETRY_INITIAL_DELAY_MS,
        maxDelayMs: e.LLM_RETRY_MAX_DELAY_MS,
        jitterRatio: e.LLM_RETRY_JITTER,
        timeoutMs: e.LLM_TIMEOUT_MS,
      },
    },
    tasks: {
      source: e.TASK_SOURCE,
      supabaseUrl: e.SUPABASE_URL,
      supabaseAnonKey: e.SUPABASE_ANON_KEY,
    },
    schedulerEnabled: e.SCHEDULER_ENABLED,
  };
}
