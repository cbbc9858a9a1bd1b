/**
 * Express server configuration.
 *
 * Assembles the API surface with middleware, routes, and dependency injection.
 * Collaborators default to the in-memory repository host and the template
 * generator; callers embedding the service pass their own.
 */

import express from 'express';
import { AppConfig, configuredSecrets, loadConfig } from './config';
import { DEFAULT_ALLOWED_MEDIA_TYPES } from './attachments/codec';
import { FetchFn } from './attachments/fetcher';
import { CodeGenerationClient, GenerationChain } from './collaborators/code-generation';
import { InMemoryRepositoryHost } from './collaborators/in-memory-host';
import { PagesPublisher } from './collaborators/pages';
import { RepositoryProvisioner } from './collaborators/repository';
import { TemplateCodeGenerator } from './collaborators/template-generator';
import { PipelineController } from './engine/pipeline-controller';
import { RetryPolicy } from './engine/retry';
import { TaskRegistry } from './engine/task-registry';
import { NotificationDeliveryFn, NotificationDispatcher } from './notifications/dispatcher';
import { createHealthRoutes } from './api/health';
import { errorHandler } from './api/middleware';
import { rateLimit } from './api/rate-limit';
import { createTaskRoutes } from './api/tasks';
import { logger } from './logger';

export const SERVICE_VERSION = '0.1.0';

/** Collaborators and hooks that replace the defaults. */
export interface AppContextOverrides {
  generators?: CodeGenerationClient[];
  provisioner?: RepositoryProvisioner;
  publisher?: PagesPublisher;
  deliveryFn?: NotificationDeliveryFn;
  fetchFn?: FetchFn;
  /** Backoff sleep used by every retry policy. */
  sleep?: (ms: number) => Promise<void>;
}

/** Application context containing all services. */
export interface AppContext {
  config: AppConfig;
  registry: TaskRegistry;
  dispatcher: NotificationDispatcher;
  controller: PipelineController;
  startedAt: number;
}

/** Create the application context with all services. */
export function createAppContext(config?: AppConfig, overrides: AppContextOverrides = {}): AppContext {
  const cfg = config ?? loadConfig(process.env);

  const basePolicy = new RetryPolicy({
    baseDelayMs: cfg.retry.baseDelayMs,
    multiplier: cfg.retry.multiplier,
    maxAttempts: 1,
    maxDelayMs: cfg.retry.maxDelayMs,
    jitter: cfg.retry.jitter,
    isRetryable: () => false,
    sleep: overrides.sleep,
  });

  const host = new InMemoryRepositoryHost({
    owner: cfg.repository.owner,
    namePrefix: cfg.repository.prefix,
  });

  const registry = new TaskRegistry();
  const dispatcher = new NotificationDispatcher({
    retryPolicy: basePolicy.with({ maxAttempts: cfg.attempts.notify }),
    timeoutMs: cfg.timeouts.notifyMs,
    signingSecret: cfg.notifications.signingSecret,
    allowPrivateCallbacks: cfg.notifications.allowPrivateCallbacks,
    deliveryFn: overrides.deliveryFn,
  });

  const generation = new GenerationChain(overrides.generators ?? [new TemplateCodeGenerator()], {
    retryPolicy: basePolicy.with({ maxAttempts: cfg.attempts.generation }),
    timeoutMs: cfg.timeouts.generationMs,
  });

  const controller = new PipelineController(
    {
      registry,
      generation,
      provisioner: overrides.provisioner ?? host,
      publisher: overrides.publisher ?? host,
      notifications: dispatcher,
    },
    {
      sharedSecret: cfg.credentials.sharedSecret,
      maskedSecrets: configuredSecrets(cfg),
      provisionRetryPolicy: basePolicy.with({ maxAttempts: cfg.attempts.provision }),
      provisionTimeoutMs: cfg.timeouts.provisionMs,
      publishTimeoutMs: cfg.timeouts.publishMs,
      attachments: {
        maxBytes: cfg.attachments.maxBytes,
        allowedMediaTypes: DEFAULT_ALLOWED_MEDIA_TYPES,
        timeoutMs: cfg.attachments.fetchTimeoutMs,
        allowPrivateHosts: false,
        fetchFn: overrides.fetchFn,
      },
      requireAllAttachments: cfg.attachments.requireAll,
      includeAttachments: cfg.attachments.include,
      publishFailurePolicy: cfg.publishFailurePolicy,
    },
  );

  if (!cfg.credentials.sharedSecret) {
    logger.warn('SHARED_SECRET is not set; every task request will be rejected');
  }

  return { config: cfg, registry, dispatcher, controller, startedAt: Date.now() };
}

/** Create and configure the Express application. */
export function createApp(context?: AppContext): express.Application {
  const ctx = context ?? createAppContext();
  const app = express();

  // Body parsing; inline attachments arrive base64-encoded in the body.
  app.use(express.json({ limit: '25mb' }));

  app.use(createHealthRoutes({
    config: ctx.config,
    registry: ctx.registry,
    version: SERVICE_VERSION,
    startedAt: ctx.startedAt,
  }));

  app.use(['/submit', '/api/v1/tasks'], rateLimit({ maxRequests: ctx.config.rateLimitPerMinute }));
  app.use(createTaskRoutes(ctx.controller));

  // Error handler
  app.use(errorHandler);

  return app;
}
