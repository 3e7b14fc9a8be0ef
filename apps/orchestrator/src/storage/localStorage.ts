/**
 * Filesystem-backed object storage.
 *
 * Objects live under a root directory. Pre-signed links point at the
 * orchestrator's /objects route and carry an HMAC-SHA256 signature over the
 * method, object path and expiry.
 */

import { createHash, createHmac, randomUUID, timingSafeEqual } from 'crypto';
import { createReadStream, createWriteStream, constants as fsConstants } from 'fs';
import { access, mkdir, rename, rm, stat } from 'fs/promises';
import { basename, dirname, join } from 'path';
import type { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { NotFoundError, StorageOpError, type StorageOp } from '../lib/errors.js';
import { storageLogger } from '../lib/logger.js';
import type { Link, LinkMethod, ObjectInfo, ObjectStorage } from './objectStorage.js';

export interface LocalObjectStorageOptions {
  root: string;
  /** Base URI the signed links are issued under */
  publicUrl: string;
  signingKey: string;
  /** Appended to the object name in the Content-Disposition of uploads */
  filenameSuffix?: string;
  now?: () => Date;
}

// A name too long for the filesystem can never have been stored
function isMissingFileError(error: unknown): boolean {
  return error instanceof Error
    && 'code' in error
    && (error.code === 'ENOENT' || error.code === 'ENOTDIR' || error.code === 'ENAMETOOLONG');
}

function isValidObjectPath(objectPath: string): boolean {
  if (objectPath.length === 0 || objectPath.startsWith('/') || objectPath.includes('\0')) {
    return false;
  }
  return objectPath.split('/').every((segment) => segment !== '' && segment !== '.' && segment !== '..');
}

export class LocalObjectStorage implements ObjectStorage {
  private readonly root: string;
  private readonly publicUrl: string;
  private readonly signingKey: string;
  private readonly filenameSuffix?: string;
  private readonly now: () => Date;

  constructor(options: LocalObjectStorageOptions) {
    this.root = options.root;
    this.publicUrl = options.publicUrl.replace(/\/+$/, '');
    // Without a configured key links are still signed, just not across restarts
    this.signingKey = options.signingKey || createHash('sha256').update(randomUUID()).digest('hex');
    this.filenameSuffix = options.filenameSuffix;
    this.now = options.now ?? (() => new Date());
  }

  private resolve(objectPath: string, op: StorageOp): string {
    if (!isValidObjectPath(objectPath)) {
      throw new StorageOpError(op, `invalid object path "${objectPath}"`);
    }
    return join(this.root, ...objectPath.split('/'));
  }

  async healthCheck(): Promise<void> {
    try {
      await mkdir(this.root, { recursive: true });
      await access(this.root, fsConstants.R_OK | fsConstants.W_OK);
    } catch (error) {
      throw new StorageOpError('health-check', `storage root ${this.root} is not usable`, error);
    }
  }

  async putObject(objectPath: string, src: Readable): Promise<void> {
    const target = this.resolve(objectPath, 'put-object');
    const tmp = `${target}.${randomUUID()}.tmp`;

    try {
      await mkdir(dirname(target), { recursive: true });
      await pipeline(src, createWriteStream(tmp));
      await rename(tmp, target);
    } catch (error) {
      await rm(tmp, { force: true });
      throw new StorageOpError('put-object', 'failed to write object', error);
    }

    storageLogger.debug({ path: objectPath }, 'Object stored');
  }

  async deleteObject(objectPath: string): Promise<void> {
    const target = this.resolve(objectPath, 'delete-object');
    try {
      await rm(target);
    } catch (error) {
      if (isMissingFileError(error)) {
        throw new NotFoundError(`Object ${objectPath} not found`);
      }
      throw new StorageOpError('delete-object', 'failed to delete object', error);
    }
  }

  async statObject(objectPath: string): Promise<ObjectInfo> {
    const target = this.resolve(objectPath, 'stat-object');
    try {
      const info = await stat(target);
      if (!info.isFile()) {
        throw new NotFoundError(`Object ${objectPath} not found`);
      }
      return {
        path: objectPath,
        size: info.size,
        lastModified: info.mtime,
      };
    } catch (error) {
      if (error instanceof NotFoundError) {
        throw error;
      }
      if (isMissingFileError(error)) {
        throw new NotFoundError(`Object ${objectPath} not found`);
      }
      throw new StorageOpError('stat-object', 'failed to retrieve object properties', error);
    }
  }

  /**
   * Open an existing object for reading.
   */
  async openObject(objectPath: string): Promise<Readable> {
    const target = this.resolve(objectPath, 'open-object');
    await this.statObject(objectPath);
    return createReadStream(target);
  }

  async getRequest(objectPath: string, expireSeconds: number): Promise<Link> {
    await this.statObject(objectPath);
    return this.buildLink('get-request', objectPath, 'GET', expireSeconds);
  }

  async putRequest(objectPath: string, expireSeconds: number): Promise<Link> {
    const header: Record<string, string> = {};
    if (this.filenameSuffix) {
      header['Content-Disposition'] = `attachment; filename="${basename(objectPath)}${this.filenameSuffix}"`;
    }
    const link = this.buildLink('put-request', objectPath, 'PUT', expireSeconds);
    return Object.keys(header).length > 0 ? { ...link, header } : link;
  }

  async deleteRequest(objectPath: string, expireSeconds: number): Promise<Link> {
    return this.buildLink('delete-request', objectPath, 'DELETE', expireSeconds);
  }

  /**
   * Check a link issued by this store.
   * Returns the object path when the signature, method and expiry hold, null otherwise.
   */
  verifyLink(uri: string, method: LinkMethod): string | null {
    let url: URL;
    let base: URL;
    try {
      base = new URL(`${this.publicUrl}/`);
      // Relative URIs (a request's own path and query) resolve against the public URL
      url = new URL(uri, base);
    } catch {
      return null;
    }

    if (url.origin !== base.origin || !url.pathname.startsWith(base.pathname)) {
      return null;
    }

    let objectPath: string;
    try {
      objectPath = url.pathname.slice(base.pathname.length).split('/').map(decodeURIComponent).join('/');
    } catch {
      return null;
    }

    const expires = Number(url.searchParams.get('expires'));
    const signature = url.searchParams.get('signature') ?? '';
    if (!Number.isInteger(expires) || url.searchParams.get('method') !== method) {
      return null;
    }
    if (expires * 1000 < this.now().getTime()) {
      return null;
    }

    const expected = Buffer.from(this.sign(method, objectPath, expires), 'hex');
    const actual = Buffer.from(signature, 'hex');
    if (actual.length !== expected.length || !timingSafeEqual(actual, expected)) {
      return null;
    }

    return isValidObjectPath(objectPath) ? objectPath : null;
  }

  private sign(method: LinkMethod, objectPath: string, expires: number): string {
    return createHmac('sha256', this.signingKey)
      .update(`${method}\n${objectPath}\n${expires}`)
      .digest('hex');
  }

  private buildLink(op: StorageOp, objectPath: string, method: LinkMethod, expireSeconds: number): Link {
    this.resolve(objectPath, op);

    const expires = Math.floor(this.now().getTime() / 1000) + expireSeconds;
    const encodedPath = objectPath.split('/').map(encodeURIComponent).join('/');

    let url: URL;
    try {
      url = new URL(`${this.publicUrl}/${encodedPath}`);
    } catch (error) {
      throw new StorageOpError(op, 'failed to create pre-signed URL', error);
    }
    url.searchParams.set('expires', String(expires));
    url.searchParams.set('method', method);
    url.searchParams.set('signature', this.sign(method, objectPath, expires));

    return {
      uri: url.toString(),
      expire: new Date(expires * 1000),
      method,
    };
  }
}
