import express, { type Express } from 'express';
import type { DeploymentService } from '../services/deploymentService.js';
import type { LocalObjectStorage } from '../storage/localStorage.js';
import { createDeploymentsRouter } from './routes/deployments.js';
import { createArtifactsRouter } from './routes/artifacts.js';
import { createObjectsRouter } from './routes/objects.js';
import { asyncHandler, errorHandler, notFoundHandler } from './middleware/error.js';

export interface ApiDeps {
  deployments: DeploymentService;
  storage: LocalObjectStorage;
  linkExpireSeconds: number;
}

export function createApi(deps: ApiDeps): Express {
  const app = express();
  app.disable('x-powered-by');

  // Raw object bodies, mounted ahead of the JSON parser
  app.use('/objects', createObjectsRouter(deps.storage));

  app.use(express.json({ limit: '1mb' }));

  // GET /api/health
  app.get('/api/health', asyncHandler(async (_req, res) => {
    await deps.storage.healthCheck();
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  }));

  app.use('/api/deployments', createDeploymentsRouter(deps.deployments));
  app.use('/api/artifacts', createArtifactsRouter(deps.storage, deps.linkExpireSeconds));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
