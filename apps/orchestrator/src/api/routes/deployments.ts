import { Router } from 'express';
import {
  CreateConfigurationDeploymentBodySchema,
  DeviceStatusTransitionSchema,
  parseDeploymentQuery,
  toDeploymentView,
} from '@rollout/shared';
import type { DeploymentService } from '../../services/deploymentService.js';
import { asyncHandler } from '../middleware/error.js';
import { createPaginatedResponse } from '../../lib/pagination.js';

/**
 * Creation input from a request body. The targeted group only ever comes from the route.
 */
function constructorFromBody(body: unknown, group?: string): unknown {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    return body;
  }
  const fields = Object.fromEntries(Object.entries(body).filter(([key]) => key !== 'group'));
  return group === undefined ? fields : { ...fields, group };
}

export function createDeploymentsRouter(service: DeploymentService): Router {
  const router = Router();

  // POST /api/deployments - Deploy to a device list or to all devices
  router.post('/', asyncHandler(async (req, res) => {
    const deployment = await service.createDeployment(constructorFromBody(req.body));
    res.status(201).location(`/api/deployments/${deployment.id}`).json(toDeploymentView(deployment));
  }));

  // POST /api/deployments/group/:name - Deploy to every device of a group
  router.post('/group/:name', asyncHandler(async (req, res) => {
    const deployment = await service.createDeployment(constructorFromBody(req.body, req.params.name));
    res.status(201).location(`/api/deployments/${deployment.id}`).json(toDeploymentView(deployment));
  }));

  // POST /api/deployments/devices/:deviceId/configuration - Configuration deployment for one device
  router.post('/devices/:deviceId/configuration', asyncHandler(async (req, res) => {
    const body = CreateConfigurationDeploymentBodySchema.parse(req.body);
    const deployment = await service.createConfigurationDeployment(
      req.params.deviceId,
      body.name,
      new Uint8Array(Buffer.from(body.configuration, 'base64'))
    );
    res.status(201).location(`/api/deployments/${deployment.id}`).json(toDeploymentView(deployment));
  }));

  // GET /api/deployments - Filtered, paginated listing
  router.get('/', asyncHandler(async (req, res) => {
    const query = parseDeploymentQuery(req.query);
    const { deployments, total } = await service.listDeployments(query);
    res.json(createPaginatedResponse(
      deployments.map(toDeploymentView),
      total,
      { limit: query.limit, offset: query.skip }
    ));
  }));

  // GET /api/deployments/:id
  router.get('/:id', asyncHandler(async (req, res) => {
    res.json(toDeploymentView(await service.getDeployment(req.params.id)));
  }));

  // GET /api/deployments/:id/statistics - Device counters per status
  router.get('/:id/statistics', asyncHandler(async (req, res) => {
    res.json(await service.getStats(req.params.id));
  }));

  // PUT /api/deployments/:id/devices/:deviceId/status - Report a device status transition
  router.put('/:id/devices/:deviceId/status', asyncHandler(async (req, res) => {
    const { from, to } = DeviceStatusTransitionSchema.parse(req.body);
    const deployment = await service.reportDeviceStatus(req.params.id, req.params.deviceId, from, to);
    res.json(toDeploymentView(deployment));
  }));

  // POST /api/deployments/:id/abort
  router.post('/:id/abort', asyncHandler(async (req, res) => {
    res.json(toDeploymentView(await service.abort(req.params.id)));
  }));

  // POST /api/deployments/:id/finish
  router.post('/:id/finish', asyncHandler(async (req, res) => {
    res.json(toDeploymentView(await service.finish(req.params.id)));
  }));

  return router;
}
