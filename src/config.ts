import { z } from 'zod';

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[]
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length ? value.trim() : undefined));

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().min(0).default(fallback);

const EnvSchema = z.object({
  DATABASE_URL: optionalString,
  PORT: positiveInt(8080),
  API_BASE_URL: z.string().url().default('https://api.torn.com'),
  API_TIMEOUT_MS: positiveInt(30_000),
  API_RATE_LIMIT: positiveInt(100),
  API_RATE_WINDOW_MS: positiveInt(60_000),
  CREDENTIALS_FILE: z.string().min(1).default('data/credentials.json'),
  SYNC_INTERVAL_MS: positiveInt(300_000),
  SYNC_PAGE_DELAY_MS: nonNegativeInt(1_100),
  SYNC_RATE_LIMIT_BACKOFF_MS: nonNegativeInt(60_000),
  HISTORY_RETENTION_DAYS: positiveInt(60),
  NOTIFY_WEBHOOK_URL: optionalString.pipe(z.string().url().optional()),
  COMMAND_SHARED_SECRET: optionalString,
  AUTH_DISABLE: optionalString,
});

export interface AppConfig {
  databaseUrl?: string;
  port: number;
  api: {
    baseUrl: string;
    timeoutMs: number;
    rateLimit: number;
    rateWindowMs: number;
  };
  credentialsFile: string;
  sync: {
    intervalMs: number;
    pageDelayMs: number;
    rateLimitBackoffMs: number;
  };
  retentionDays: number;
  notifyWebhookUrl?: string;
  auth: {
    sharedSecret?: string;
    disabled: boolean;
  };
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration (${issues.join('; ')})`, issues);
  }

  const values = parsed.data;
  return {
    databaseUrl: values.DATABASE_URL,
    port: values.PORT,
    api: {
      baseUrl: values.API_BASE_URL.replace(/\/+$/, ''),
      timeoutMs: values.API_TIMEOUT_MS,
      rateLimit: values.API_RATE_LIMIT,
      rateWindowMs: values.API_RATE_WINDOW_MS,
    },
    credentialsFile: values.CREDENTIALS_FILE,
    sync: {
      intervalMs: values.SYNC_INTERVAL_MS,
      pageDelayMs: values.SYNC_PAGE_DELAY_MS,
      rateLimitBackoffMs: values.SYNC_RATE_LIMIT_BACKOFF_MS,
    },
    retentionDays: values.HISTORY_RETENTION_DAYS,
    notifyWebhookUrl: values.NOTIFY_WEBHOOK_URL,
    auth: {
      sharedSecret: values.COMMAND_SHARED_SECRET,
      // Without a shared secret there is nothing to verify tokens against.
      disabled: values.AUTH_DISABLE === '1' || !values.COMMAND_SHARED_SECRET,
    },
  };
};
