import { Router } from 'express';
import { pipeline } from 'stream/promises';
import type { LinkMethod } from '../../storage/objectStorage.js';
import type { LocalObjectStorage } from '../../storage/localStorage.js';
import { asyncHandler, createError } from '../middleware/error.js';

/**
 * Serves requests made with pre-signed links issued by the local object store.
 */
export function createObjectsRouter(storage: LocalObjectStorage): Router {
  const router = Router();

  function authorize(originalUrl: string, method: LinkMethod): string {
    const objectPath = storage.verifyLink(originalUrl, method);
    if (!objectPath) {
      throw createError('Link is invalid or has expired', 403, 'FORBIDDEN');
    }
    return objectPath;
  }

  router.get('/*', asyncHandler(async (req, res) => {
    const objectPath = authorize(req.originalUrl, 'GET');
    const info = await storage.statObject(objectPath);
    const stream = await storage.openObject(objectPath);
    res.status(200);
    res.setHeader('Content-Type', 'application/octet-stream');
    res.setHeader('Content-Length', String(info.size));
    await pipeline(stream, res);
  }));

  router.put('/*', asyncHandler(async (req, res) => {
    const objectPath = authorize(req.originalUrl, 'PUT');
    await storage.putObject(objectPath, req);
    res.status(204).end();
  }));

  router.delete('/*', asyncHandler(async (req, res) => {
    const objectPath = authorize(req.originalUrl, 'DELETE');
    await storage.deleteObject(objectPath);
    res.status(204).end();
  }));

  return router;
}
