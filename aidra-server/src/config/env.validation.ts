import { z } from 'zod';

const LOG_LEVELS = [
  'verbose',
  'debug',
  'log',
  'warn',
  'error',
  'fatal',
] as const;

const int = (fallback: number) =>
  z.coerce.number().int().nonnegative().default(fallback);
const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);
const percentage = (fallback: number) =>
  z.coerce.number().min(0).max(100).default(fallback);

export const EnvSchema = z
  .object({
    PORT: positiveInt(3000),
    LOG_LEVEL: z.enum(LOG_LEVELS).default('log'),

    GEMINI_API_KEY: z.string().trim().min(1, 'GEMINI_API_KEY is required'),
    IMAGE_MODEL: z.string().trim().min(1).default('gemini-2.5-flash'),
    TEXT_MODEL: z.string().trim().min(1).default('gemini-2.5-flash-lite'),

    MODEL_MAX_CONCURRENCY: positiveInt(4),
    MODEL_SCHEMA_RETRIES: int(1),
    MODEL_UNAVAILABLE_RETRIES: int(2),
    MODEL_RETRY_BACKOFF_MS: int(500),
    ANALYSIS_TIMEOUT_MS: positiveInt(60_000),
    MAX_IMAGE_BYTES: positiveInt(10 * 1024 * 1024),

    RISK_MODERATE_THRESHOLD: percentage(30),
    RISK_HIGH_THRESHOLD: percentage(60),
    RISK_CRITICAL_THRESHOLD: percentage(80),

    // 0 keeps every session for the life of the process.
    SESSION_MAX_ENTRIES: int(0),
  })
  .refine(
    (env) =>
      env.RISK_MODERATE_THRESHOLD < env.RISK_HIGH_THRESHOLD &&
      env.RISK_HIGH_THRESHOLD < env.RISK_CRITICAL_THRESHOLD,
    {
      message:
        'Risk thresholds must satisfy RISK_MODERATE_THRESHOLD < ' +
        'RISK_HIGH_THRESHOLD < RISK_CRITICAL_THRESHOLD',
      path: ['RISK_HIGH_THRESHOLD'],
    },
  );

export type Env = z.infer<typeof EnvSchema>;
export type LogLevelName = (typeof LOG_LEVELS)[number];

export const validateEnv = (config: Record<string, unknown>): Env => {
  const parsed = EnvSchema.safeParse(config);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return parsed.data;
};

/** Nest enables the chosen level and everything more severe. */
export const enabledLogLevels = (level: LogLevelName): LogLevelName[] =>
  LOG_LEVELS.slice(LOG_LEVELS.indexOf(level));
