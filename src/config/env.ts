import { z } from 'zod';
import 'dotenv/config';
import {
  DEFAULT_CLAUDE_MODEL,
  DEFAULT_POLL_INTERVAL_MINUTES,
  GBP_REPLY_MAX_LENGTH,
} from './constants.js';
import { intervalToCron } from '../lib/cron.js';

const flag = (fallback: 'true' | 'false') =>
  z.enum(['true', 'false']).default(fallback).transform((v) => v === 'true');

const stripPrefix = (prefix: string) => (value: string) =>
  value.startsWith(prefix) ? value.slice(prefix.length) : value;

export const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().positive().default(3000),
    LOG_LEVEL: z
      .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
      .default('info'),

    // Database
    DATABASE_PATH: z.string().default('./data/review-autoreply.sqlite'),

    // Google Business Profile
    GBP_ACCOUNT_ID: z.string().min(1).transform(stripPrefix('accounts/')),
    GBP_LOCATION_ID: z.string().min(1).transform(stripPrefix('locations/')),
    GBP_CLIENT_ID: z.string().optional(),
    GBP_CLIENT_SECRET: z.string().optional(),
    GBP_REFRESH_TOKEN: z.string().optional(),
    GBP_ACCESS_TOKEN: z.string().optional(),
    GBP_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),

    // Claude / Anthropic
    ANTHROPIC_API_KEY: z.string().min(1),
    ANTHROPIC_MODEL: z.string().min(1).default(DEFAULT_CLAUDE_MODEL),
    AI_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

    // Reply style
    REPLY_BUSINESS_NAME: z.string().min(1),
    REPLY_TONE: z.string().min(1).default('warm'),
    REPLY_SIGN_OFF: z.string().optional(),
    REPLY_INSTRUCTIONS: z.string().optional(),
    REPLY_MAX_LENGTH: z.coerce
      .number()
      .int()
      .min(1)
      .max(GBP_REPLY_MAX_LENGTH)
      .default(GBP_REPLY_MAX_LENGTH),
    REPLY_OVERFLOW_POLICY: z.enum(['truncate', 'reject']).default('truncate'),
    REPLY_SINCE: z.coerce.date().optional(),
    MAX_REPLIES_PER_CYCLE: z.coerce.number().int().positive().default(20),

    // Scheduling
    POLL_INTERVAL_MINUTES: z.coerce
      .number()
      .int()
      .positive()
      .default(DEFAULT_POLL_INTERVAL_MINUTES)
      .refine((m) => intervalToCron(m) !== null, {
        message: 'must divide 60, or be a whole number of hours that divides 24',
      }),
    POLL_TIMEZONE: z.string().min(1).default('UTC'),
    RUN_ON_STARTUP: flag('true'),
    TRIGGER_TOKEN: z.string().min(16).optional(),

    // Operator email
    SMTP_HOST: z.string().optional(),
    SMTP_PORT: z.coerce.number().int().positive().default(587),
    SMTP_USER: z.string().optional(),
    SMTP_PASS: z.string().optional(),
    SMTP_SECURE: flag('false'),
    EMAIL_FROM: z.string().optional(),
    NOTIFY_EMAIL_TO: z.string().optional(),
    NOTIFY_ON: z.enum(['activity', 'always']).default('activity'),
  })
  .superRefine((env, ctx) => {
    const oauthFields = ['GBP_CLIENT_ID', 'GBP_CLIENT_SECRET', 'GBP_REFRESH_TOKEN'] as const;
    const present = oauthFields.filter((key) => env[key] !== undefined);

    if (present.length > 0 && present.length < oauthFields.length) {
      for (const key of oauthFields) {
        if (env[key] === undefined) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [key],
            message: `required together with ${present.join(', ')}`,
          });
        }
      }
    }

    if (present.length === 0 && env.GBP_ACCESS_TOKEN === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['GBP_REFRESH_TOKEN'],
        message: 'set GBP_CLIENT_ID, GBP_CLIENT_SECRET and GBP_REFRESH_TOKEN, or GBP_ACCESS_TOKEN',
      });
    }

    if (env.NOTIFY_EMAIL_TO !== undefined) {
      for (const key of ['SMTP_HOST', 'SMTP_USER', 'SMTP_PASS'] as const) {
        if (env[key] === undefined) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [key],
            message: 'required when NOTIFY_EMAIL_TO is set',
          });
        }
      }
    }
  });

export type Config = z.infer<typeof envSchema>;

/**
 * Validate an environment map. Blank values count as unset, so an
 * `.env` copied from the example file falls back to the defaults.
 */
export function parseEnv(source: NodeJS.ProcessEnv) {
  const present = Object.entries(source).filter(
    (entry): entry is [string, string] => entry[1] !== undefined && entry[1].trim() !== '',
  );
  return envSchema.safeParse(Object.fromEntries(present));
}

const parsed = parseEnv(process.env);

if (!parsed.success) {
  console.error('Invalid environment variables:');
  for (const issue of parsed.error.issues) {
    console.error(`  ${issue.path.join('.')}: ${issue.message}`);
  }
  process.exit(1);
}

export const config: Config = parsed.data;
