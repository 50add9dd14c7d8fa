import { z } from 'zod';

const toInt = (def?: number) =>
  z.preprocess((v) => {
    if (v === undefined || v === null || v === '') return def;
    const n = typeof v === 'number' ? v : Number(String(v).trim());
    return Number.isFinite(n) ? n : v;
  }, z.number().int());

const toFloat = (def?: number) =>
  z.preprocess((v) => {
    if (v === undefined || v === null || v === '') return def;
    const n = typeof v === 'number' ? v : Number(String(v).trim());
    return Number.isFinite(n) ? n : v;
  }, z.number());

const toBool = (def?: boolean) =>
  z.preprocess((v) => {
    if (v === undefined || v === null || v === '') return def;
    if (typeof v === 'boolean') return v;
    const s = String(v).trim().toLowerCase();
    if (['true', '1', 'yes', 'y', 'on'].includes(s)) return true;
    if (['false', '0', 'no', 'n', 'off'].includes(s)) return false;
    return v;
  }, z.boolean());

const hour = (def: number) => toInt(def).pipe(z.number().int().min(0).max(24));

const envObject = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('production'),
    APP_NAME: z.string().trim().default('market-truth-worker'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),

    PORT: toInt(3001).pipe(z.number().int().min(1).max(65535)),

    DATABASE_URL: z.string().trim().min(1, 'DATABASE_URL is required'),
    DATABASE_POOL_MAX: toInt(10).pipe(z.number().int().min(1).max(100)),

    REDIS_URL: z.string().trim().optional(),
    REDIS_HOST: z.string().trim().default('localhost'),
    REDIS_PORT: toInt(6379).pipe(z.number().int().min(1).max(65535)),
    REDIS_PASSWORD: z.string().optional().default(''),
    REDIS_COMMAND_TIMEOUT_MS: toInt(2000).pipe(z.number().int().min(100).max(60_000)),

    QUEUE_NOTIFICATIONS_NAME: z.string().trim().default('signal-notifications'),
    NOTIFY_JOB_ATTEMPTS: toInt(5).pipe(z.number().int().min(1).max(50)),
    NOTIFY_JOB_BACKOFF_DELAY_MS: toInt(3000).pipe(z.number().int().min(0).max(60_000)),

    CANDLE_PROVIDER: z.enum(['TWELVEDATA', 'BINANCE']).default('TWELVEDATA'),
    TWELVEDATA_REST_URL: z.string().trim().default('https://api.twelvedata.com'),
    TWELVEDATA_API_KEY: z.string().trim().optional().default(''),
    BINANCE_BASE_URL: z.string().trim().default('https://data-api.binance.vision'),
    FEED_TIMEOUT_MS: toInt(10000).pipe(z.number().int().min(1000).max(120_000)),
    FEED_RETRY_ATTEMPTS: toInt(3).pipe(z.number().int().min(1).max(10)),
    FEED_RETRY_BASE_DELAY_MS: toInt(500).pipe(z.number().int().min(0).max(10_000)),

    STRUCTURE_SENSITIVITY: toInt(2).pipe(z.number().int().min(1).max(10)),
    STRUCTURE_MIN_CANDLES: toInt(30).pipe(z.number().int().min(5).max(5000)),

    RELEASE_THRESHOLD: toFloat(0.75).pipe(z.number().min(0).max(1)),
    SESSION_PRIMARY_START_HOUR: hour(6),
    SESSION_OVERLAP_START_HOUR: hour(13),
    SESSION_OVERLAP_END_HOUR: hour(17),
    ROLLOVER_START_HOUR: hour(21),
    ROLLOVER_END_HOUR: hour(24),

    ENTRY_VALIDITY_MINUTES: toInt(35).pipe(z.number().int().min(1).max(7 * 24 * 60)),

    WATCHER_ENABLED: toBool(true).default(true),
    WATCHER_INTERVAL_SECONDS: toInt(30).pipe(z.number().int().min(5).max(3600)),
    WATCHER_MAX_LOOKBACK: toInt(500).pipe(z.number().int().min(2).max(5000)),
    WATCHER_STALL_MINUTES: toInt(5).pipe(z.number().int().min(1).max(24 * 60)),

    JANITOR_ENABLED: toBool(true).default(true),
    ZOMBIE_PENDING_MINUTES: toInt(120).pipe(z.number().int().min(1).max(30 * 24 * 60)),
    ZOMBIE_ACTIVE_MINUTES: toInt(1440).pipe(z.number().int().min(1).max(30 * 24 * 60)),
  })
  .passthrough();

export const envSchema = envObject;

export const envSchemaWithRefinements = envObject.superRefine((env, ctx) => {
  if (env.SESSION_PRIMARY_START_HOUR > env.SESSION_OVERLAP_START_HOUR) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['SESSION_PRIMARY_START_HOUR'],
      message: 'SESSION_PRIMARY_START_HOUR must not be after SESSION_OVERLAP_START_HOUR',
    });
  }

  if (env.SESSION_OVERLAP_START_HOUR >= env.SESSION_OVERLAP_END_HOUR) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['SESSION_OVERLAP_END_HOUR'],
      message: 'SESSION_OVERLAP_END_HOUR must be after SESSION_OVERLAP_START_HOUR',
    });
  }

  if (env.ROLLOVER_START_HOUR >= env.ROLLOVER_END_HOUR) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['ROLLOVER_END_HOUR'],
      message: 'ROLLOVER_END_HOUR must be after ROLLOVER_START_HOUR',
    });
  }

  if (env.CANDLE_PROVIDER === 'TWELVEDATA' && !env.TWELVEDATA_API_KEY) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['TWELVEDATA_API_KEY'],
      message: 'TWELVEDATA_API_KEY is required when CANDLE_PROVIDER=TWELVEDATA',
    });
  }
});

export type Env = z.infer<typeof envSchemaWithRefinements>;
