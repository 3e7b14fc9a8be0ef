import { Router } from 'express';
import type { Link, ObjectStorage } from '../../storage/objectStorage.js';
import { artifactPath } from '../../services/deploymentService.js';
import { asyncHandler } from '../middleware/error.js';

function linkBody(link: Link) {
  return {
    uri: link.uri,
    method: link.method,
    expire: link.expire.toISOString(),
    ...(link.header ? { header: link.header } : {}),
  };
}

export function createArtifactsRouter(storage: ObjectStorage, expireSeconds: number): Router {
  const router = Router();

  // GET /api/artifacts/:name/download - Pre-signed download link
  router.get('/:name/download', asyncHandler(async (req, res) => {
    res.json(linkBody(await storage.getRequest(artifactPath(req.params.name), expireSeconds)));
  }));

  // POST /api/artifacts/:name/upload - Pre-signed upload link
  router.post('/:name/upload', asyncHandler(async (req, res) => {
    res.json(linkBody(await storage.putRequest(artifactPath(req.params.name), expireSeconds)));
  }));

  // DELETE /api/artifacts/:name
  router.delete('/:name', asyncHandler(async (req, res) => {
    await storage.deleteObject(artifactPath(req.params.name));
    res.status(204).end();
  }));

  return router;
}
