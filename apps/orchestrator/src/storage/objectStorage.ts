import type { Readable } from 'stream';

export type LinkMethod = 'GET' | 'PUT' | 'DELETE';

/**
 * Time-limited, method-scoped request a client can perform without further authentication.
 */
export interface Link {
  uri: string;
  expire: Date;
  method: LinkMethod;
  /** Headers the client must send with the request */
  header?: Record<string, string>;
}

export interface ObjectInfo {
  path: string;
  size: number;
  lastModified: Date;
}

/**
 * Blob store used for artifacts.
 *
 * Absent objects are reported with NotFoundError, every other failure with
 * StorageOpError. Implementations do not retry.
 */
export interface ObjectStorage {
  healthCheck(): Promise<void>;
  putObject(path: string, src: Readable): Promise<void>;
  deleteObject(path: string): Promise<void>;
  statObject(path: string): Promise<ObjectInfo>;
  /** Fails with NotFoundError when the object does not exist */
  getRequest(path: string, expireSeconds: number): Promise<Link>;
  putRequest(path: string, expireSeconds: number): Promise<Link>;
  deleteRequest(path: string, expireSeconds: number): Promise<Link>;
}
