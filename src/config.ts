import { z } from 'zod';
import type { Config, TrackedItem } from './types.js';

const directionSchema = z.enum(['any', 'decreaseOnly', 'increaseOnly']);

const priceRangeSchema = z
  .object({
    min: z.number().nonnegative(),
    max: z.number().nonnegative(),
  })
  .refine(range => range.min <= range.max, { message: 'targetRange.min must not exceed targetRange.max' });

const policyOverrideSchema = z
  .object({
    minAbsoluteDelta: z.number().nonnegative(),
    minPercentDelta: z.number().nonnegative(),
    direction: directionSchema,
    targetRange: priceRangeSchema,
  })
  .partial();

const trackedItemSchema = z.object({
  id: z.string().min(1),
  query: z.string().min(1).optional(),
  currency: z.string().length(3).optional(),
  policy: policyOverrideSchema.optional(),
});

const trackedItemsSchema = z.array(trackedItemSchema).min(1);

const csvList = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform(value =>
      value
        .split(',')
        .map(part => part.trim())
        .filter(part => part.length > 0)
    );

const envSchema = z
  .object({
    TRACKED_ITEMS: z.string().min(1),
    CHECK_INTERVAL: z.string().transform(Number).pipe(z.number().int().positive()).default('1800'),
    SOURCE_KIND: z.enum(['serper', 'json']).default('serper'),
    SERPER_API_KEY: z.string().min(1).optional(),
    SERPER_ENDPOINT: z.string().url().default('https://google.serper.dev/shopping'),
    SERPER_COUNTRY: z.string().default('uk'),
    SERPER_LANGUAGE: z.string().default('en'),
    SERPER_LOCATION: z.string().default('London, England, United Kingdom'),
    SERPER_RESULT_LIMIT: z.string().transform(Number).pipe(z.number().int().min(1).max(100)).default('20'),
    EXCLUDED_RETAILERS: csvList('shein,amazon,ebay'),
    SOURCE_URL: z.string().url().optional(),
    DEFAULT_CURRENCY: z.string().length(3).default('GBP'),
    MIN_ABSOLUTE_DELTA: z.string().transform(Number).pipe(z.number().nonnegative()).default('0'),
    MIN_PERCENT_DELTA: z.string().transform(Number).pipe(z.number().nonnegative()).default('5'),
    ALERT_DIRECTION: directionSchema.default('any'),
    FETCH_TIMEOUT_MS: z.string().transform(Number).pipe(z.number().int().positive()).default('15000'),
    NOTIFY_TIMEOUT_MS: z.string().transform(Number).pipe(z.number().int().positive()).default('10000'),
    DEGRADED_AFTER_FAILURES: z.string().transform(Number).pipe(z.number().int().nonnegative()).default('3'),
    DISCORD_WEBHOOK_URL: z.string().url().optional(),
    DB_PATH: z.string().min(1).default('./data/monitor.db'),
    PORT: z.string().transform(Number).pipe(z.number().int().min(0).max(65535)).default('10000'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  })
  .superRefine((env, ctx) => {
    if (env.SOURCE_KIND === 'serper' && !env.SERPER_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SERPER_API_KEY'],
        message: 'SERPER_API_KEY is required when SOURCE_KIND is serper',
      });
    }
    if (env.SOURCE_KIND === 'json' && !env.SOURCE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SOURCE_URL'],
        message: 'SOURCE_URL is required when SOURCE_KIND is json',
      });
    }
  });

/**
 * Accepts either a JSON array of items or a comma-separated list of ids,
 * in which case each id doubles as the search query.
 */
export function parseTrackedItems(raw: string): TrackedItem[] {
  const trimmed = raw.trim();
  const candidate: unknown = trimmed.startsWith('[')
    ? JSON.parse(trimmed)
    : trimmed
        .split(',')
        .map(id => id.trim())
        .filter(id => id.length > 0)
        .map(id => ({ id }));

  const items = trackedItemsSchema.parse(candidate);
  const seen = new Set<string>();
  for (const item of items) {
    if (seen.has(item.id)) {
      throw new Error(`Duplicate tracked item id: ${item.id}`);
    }
    seen.add(item.id);
  }

  return items.map(item => ({
    id: item.id,
    query: item.query ?? item.id,
    currency: item.currency,
    policy: item.policy,
  }));
}

// Values that are present but empty (e.g. `DISCORD_WEBHOOK_URL=` in a .env file) count as unset.
function withoutBlankValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value;
    }
  }
  return cleaned;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  const env = envSchema.parse(withoutBlankValues(source));

  return {
    items: parseTrackedItems(env.TRACKED_ITEMS),
    source: {
      kind: env.SOURCE_KIND,
      fetchTimeoutMs: env.FETCH_TIMEOUT_MS,
      defaultCurrency: env.DEFAULT_CURRENCY.toUpperCase(),
      serper: {
        apiKey: env.SERPER_API_KEY,
        endpoint: env.SERPER_ENDPOINT,
        country: env.SERPER_COUNTRY,
        language: env.SERPER_LANGUAGE,
        location: env.SERPER_LOCATION,
        excludedRetailers: env.EXCLUDED_RETAILERS.map(r => r.toLowerCase()),
        resultLimit: env.SERPER_RESULT_LIMIT,
      },
      jsonUrl: env.SOURCE_URL,
    },
    monitoring: {
      pollIntervalMs: env.CHECK_INTERVAL * 1000,
      policy: {
        minAbsoluteDelta: env.MIN_ABSOLUTE_DELTA,
        minPercentDelta: env.MIN_PERCENT_DELTA,
        direction: env.ALERT_DIRECTION,
      },
      degradedAfterFailures: env.DEGRADED_AFTER_FAILURES,
    },
    notifier: {
      discordWebhookUrl: env.DISCORD_WEBHOOK_URL,
      timeoutMs: env.NOTIFY_TIMEOUT_MS,
    },
    dbPath: env.DB_PATH,
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
  };
}
