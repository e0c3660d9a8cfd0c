import { z } from 'zod';
import { FatalError, formatZodIssues } from '../errors/index.js';

const numberFrom = (fallback: string) => z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

const envSchema = z
  .object({
    PORT: z.string().default('3000').transform(Number),
    GIT_SHA: z.string().default('unknown'),
    DATA_DIR: z.string().default('data'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    CLASSIFIER_PROVIDER: z.enum(['keyword', 'http']).default('keyword'),
    CLASSIFIER_URL: z.string().url().optional(),
    CLASSIFIER_API_KEY: z.string().min(1).optional(),
    CLASSIFIER_TIMEOUT_MS: numberFrom('15000'),
    MAILBOX_ADDRESS: z.string().email().default('assistant@example.com'),
    REVIEW_TIMEOUT_SECONDS: numberFrom('86400'),
    BOOKING_REVIEW_TIMEOUT_SECONDS: numberFrom('300'),
    BUSINESS_HOURS_START: z.string().default('9').transform(Number).pipe(z.number().int().min(0).max(23)),
    BUSINESS_HOURS_END: z.string().default('17').transform(Number).pipe(z.number().int().min(1).max(24)),
    MAX_ROUTE_VISITS: numberFrom('8'),
    EXPIRY_SWEEP_MS: numberFrom('30000'),
    DIRECTORY_FILE: z.string().default('data/contacts.json'),
    DOCUMENTS_FILE: z.string().default('data/documents.json'),
    CALENDAR_FILE: z.string().optional(),
  })
  .superRefine((env, ctx) => {
    if (env.CLASSIFIER_PROVIDER === 'http') {
      if (!env.CLASSIFIER_URL) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['CLASSIFIER_URL'], message: 'required when CLASSIFIER_PROVIDER=http' });
      }
      if (!env.CLASSIFIER_API_KEY) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['CLASSIFIER_API_KEY'], message: 'required when CLASSIFIER_PROVIDER=http' });
      }
    }
    if (env.BUSINESS_HOURS_END <= env.BUSINESS_HOURS_START) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['BUSINESS_HOURS_END'], message: 'must be later than BUSINESS_HOURS_START' });
    }
  });

export type EnvConfig = z.infer<typeof envSchema>;

let cachedConfig: EnvConfig | null = null;

/**
 * Parse a configuration source without touching the cache.
 */
export function loadEnvConfig(source: NodeJS.ProcessEnv): EnvConfig {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const errors = formatZodIssues(result.error);
    throw new FatalError(`Invalid environment configuration: ${errors.join(', ')}`, errors);
  }

  return result.data;
}

export function getEnvConfig(): EnvConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  cachedConfig = loadEnvConfig(process.env);
  return cachedConfig;
}
