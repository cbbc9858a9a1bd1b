/**
 * Environment configuration.
 *
 * `loadConfig(process.env)` validates every variable up front and returns a
 * typed, nested AppConfig. Invalid configuration throws, listing each issue.
 */

import { z } from 'zod';
import { LogLevel } from './logger';

/** Unset and empty values both mean "not configured". */
const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value && value.length > 0 ? value : undefined));

const flag = (defaultValue: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(defaultValue ? 'true' : 'false')
    .transform((value) => value === 'true' || value === '1');

const positiveInt = (defaultValue: number) => z.coerce.number().int().positive().default(defaultValue);

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  LOG_LEVEL: z.nativeEnum(LogLevel).default(LogLevel.Info),

  SHARED_SECRET: optionalSecret,
  REPOSITORY_OWNER: z.string().min(1).default('pagewright'),
  REPOSITORY_PREFIX: z.string().default(''),

  MAX_ATTACHMENT_BYTES: positiveInt(5 * 1024 * 1024),
  REQUIRE_ALL_ATTACHMENTS: flag(false),
  INCLUDE_ATTACHMENTS: flag(true),
  ATTACHMENT_FETCH_TIMEOUT_MS: positiveInt(15_000),

  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  RETRY_MULTIPLIER: z.coerce.number().gt(1).default(2),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(30_000),
  RETRY_JITTER: z.coerce.number().min(0).max(1).default(0.2),
  GENERATION_MAX_ATTEMPTS: positiveInt(2),
  PROVISION_MAX_ATTEMPTS: positiveInt(3),
  NOTIFY_MAX_ATTEMPTS: positiveInt(5),

  GENERATION_TIMEOUT_MS: positiveInt(120_000),
  PROVISION_TIMEOUT_MS: positiveInt(30_000),
  PUBLISH_TIMEOUT_MS: positiveInt(15_000),
  NOTIFY_TIMEOUT_MS: positiveInt(10_000),

  PUBLISH_FAILURE_POLICY: z.enum(['degrade', 'fail']).default('degrade'),
  NOTIFY_SIGNING_SECRET: optionalSecret,
  ALLOW_PRIVATE_CALLBACKS: flag(false),
  RATE_LIMIT_PER_MINUTE: positiveInt(60),
});

export interface AppConfig {
  port: number;
  logLevel: LogLevel;
  credentials: {
    sharedSecret?: string;
  };
  repository: {
    owner: string;
    prefix: string;
  };
  attachments: {
    maxBytes: number;
    requireAll: boolean;
    include: boolean;
    fetchTimeoutMs: number;
  };
  retry: {
    baseDelayMs: number;
    multiplier: number;
    maxDelayMs: number;
    jitter: number;
  };
  attempts: {
    generation: number;
    provision: number;
    notify: number;
  };
  timeouts: {
    generationMs: number;
    provisionMs: number;
    publishMs: number;
    notifyMs: number;
  };
  publishFailurePolicy: 'degrade' | 'fail';
  notifications: {
    signingSecret?: string;
    allowPrivateCallbacks: boolean;
  };
  rateLimitPerMinute: number;
}

export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('\n');
    throw new Error(`Invalid configuration:\n${msg}`);
  }
  const e = parsed.data;

  return {
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    credentials: {
      sharedSecret: e.SHARED_SECRET,
    },
    repository: {
      owner: e.REPOSITORY_OWNER,
      prefix: e.REPOSITORY_PREFIX,
    },
    attachments: {
      maxBytes: e.MAX_ATTACHMENT_BYTES,
      requireAll: e.REQUIRE_ALL_ATTACHMENTS,
      include: e.INCLUDE_ATTACHMENTS,
      fetchTimeoutMs: e.ATTACHMENT_FETCH_TIMEOUT_MS,
    },
    retry: {
      baseDelayMs: e.RETRY_BASE_DELAY_MS,
      multiplier: e.RETRY_MULTIPLIER,
      maxDelayMs: e.RETRY_MAX_DELAY_MS,
      jitter: e.RETRY_JITTER,
    },
    attempts: {
      generation: e.GENERATION_MAX_ATTEMPTS,
      provision: e.PROVISION_MAX_ATTEMPTS,
      notify: e.NOTIFY_MAX_ATTEMPTS,
    },
    timeouts: {
      generationMs: e.GENERATION_TIMEOUT_MS,
      provisionMs: e.PROVISION_TIMEOUT_MS,
      publishMs: e.PUBLISH_TIMEOUT_MS,
      notifyMs: e.NOTIFY_TIMEOUT_MS,
    },
    publishFailurePolicy: e.PUBLISH_FAILURE_POLICY,
    notifications: {
      signingSecret: e.NOTIFY_SIGNING_SECRET,
      allowPrivateCallbacks: e.ALLOW_PRIVATE_CALLBACKS,
    },
    rateLimitPerMinute: e.RATE_LIMIT_PER_MINUTE,
  };
}

/** Every configured credential, for masking. */
export function configuredSecrets(config: AppConfig): string[] {
  return [
    config.credentials.sharedSecret,
    config.notifications.signingSecret,
  ].filter((s): s is string => s !== undefined);
}
