/**
 * Health and service info routes.
 */

import { Router } from 'express';
import { AppConfig } from '../config';
import { TaskRegistry } from '../engine/task-registry';

export interface HealthRouteOptions {
  config: AppConfig;
  registry: TaskRegistry;
  version: string;
  startedAt: number;
}

export function createHealthRoutes(options: HealthRouteOptions): Router {
  const router = Router();
  const { config, registry, version, startedAt } = options;

  // Credentials are reported as present/absent only.
  router.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version,
      uptimeMs: Date.now() - startedAt,
      inFlightTasks: registry.inFlightCount(),
      credentials: {
        sharedSecret: config.credentials.sharedSecret !== undefined,
        signingSecret: config.notifications.signingSecret !== undefined,
      },
    });
  });

  router.get('/', (_req, res) => {
    res.json({
      service: 'pagewright',
      version,
      endpoints: {
        submit: 'POST /submit',
        tasks: 'POST /api/v1/tasks',
        health: 'GET /health',
      },
    });
  });

  return router;
}
