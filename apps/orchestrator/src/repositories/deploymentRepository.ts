/**
 * Deployment persistence on SQLite.
 *
 * Counters are stored as JSON next to a status column that is recomputed on
 * every write, so status filters run in SQL.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import {
  DeviceDeploymentStatusSchema,
  emptyStats,
  getDeploymentStatus,
  isDeploymentType,
  type Deployment,
  type DeploymentQuery,
  type DeploymentStats,
} from '@rollout/shared';
import { getDb, runInTransaction, withBusyRetry } from '../db/index.js';
import { ConflictError, NotFoundError } from '../lib/errors.js';

export interface DeploymentPage {
  deployments: Deployment[];
  total: number;
}

export interface DeploymentRepository {
  /** Insert a new deployment; ConflictError when the id exists */
  save(deployment: Deployment): Promise<void>;
  /** Persist counters, targets and the finished timestamp; NotFoundError when absent */
  update(deployment: Deployment): Promise<void>;
  load(id: string): Promise<Deployment>;
  query(query: DeploymentQuery): Promise<DeploymentPage>;
}

interface DeploymentRow {
  id: string;
  name: string;
  artifact_name: string;
  device_group: string | null;
  all_devices: number;
  devices: string;
  device_list: string;
  artifacts: string;
  stats: string;
  status: string;
  device_count: number;
  max_devices: number;
  type: string | null;
  configuration: Buffer | null;
  created_at: string;
  finished_at: string | null;
}

const StringListSchema = z.array(z.string());
const StatsSchema = z.record(DeviceDeploymentStatusSchema, z.number().int().nonnegative());

function parseStats(raw: string): DeploymentStats {
  return { ...emptyStats(), ...StatsSchema.parse(JSON.parse(raw)) };
}

function rowToDeployment(row: DeploymentRow): Deployment {
  return {
    id: row.id,
    name: row.name,
    artifactName: row.artifact_name,
    devices: StringListSchema.parse(JSON.parse(row.devices)),
    allDevices: row.all_devices === 1,
    group: row.device_group ?? undefined,
    created: new Date(row.created_at),
    finished: row.finished_at ? new Date(row.finished_at) : null,
    artifacts: StringListSchema.parse(JSON.parse(row.artifacts)),
    stats: parseStats(row.stats),
    deviceCount: row.device_count,
    maxDevices: row.max_devices,
    deviceList: StringListSchema.parse(JSON.parse(row.device_list)),
    type: isDeploymentType(row.type) ? row.type : undefined,
    configuration: row.configuration ? new Uint8Array(row.configuration) : undefined,
  };
}

function escapeLike(text: string): string {
  return text.replace(/[\\%_]/g, (char) => `\\${char}`);
}

function isPrimaryKeyViolation(error: unknown): boolean {
  return error instanceof Error
    && 'code' in error
    && error.code === 'SQLITE_CONSTRAINT_PRIMARYKEY';
}

// SQLite lower() and LIKE only fold ASCII; search folds case the same way matchesQuery does
const FOLD_CASE_FUNCTION = 'js_lower';

function foldCase(value: unknown): string | null {
  return typeof value === 'string' ? value.toLowerCase() : null;
}

export class SqliteDeploymentRepository implements DeploymentRepository {
  constructor(private readonly db: Database.Database = getDb()) {
    this.db.function(FOLD_CASE_FUNCTION, { deterministic: true }, foldCase);
  }

  async save(deployment: Deployment): Promise<void> {
    try {
      await withBusyRetry(() => {
        this.db.prepare(`
          INSERT INTO deployments (
            id, name, artifact_name, device_group, all_devices, devices, device_list,
            artifacts, stats, status, device_count, max_devices, type, configuration,
            created_at, finished_at
          ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        `).run(
          deployment.id,
          deployment.name,
          deployment.artifactName,
          deployment.group ?? null,
          deployment.allDevices ? 1 : 0,
          JSON.stringify(deployment.devices),
          JSON.stringify(deployment.deviceList),
          JSON.stringify(deployment.artifacts),
          JSON.stringify(deployment.stats),
          getDeploymentStatus(deployment),
          deployment.deviceCount,
          deployment.maxDevices,
          deployment.type ?? null,
          deployment.configuration ? Buffer.from(deployment.configuration) : null,
          deployment.created.toISOString(),
          deployment.finished ? deployment.finished.toISOString() : null
        );
      });
    } catch (error) {
      if (isPrimaryKeyViolation(error)) {
        throw new ConflictError(`Deployment ${deployment.id} already exists`);
      }
      throw error;
    }
  }

  async update(deployment: Deployment): Promise<void> {
    const result = await withBusyRetry(() =>
      this.db.prepare(`
        UPDATE deployments
        SET stats = ?, status = ?, device_list = ?, device_count = ?, max_devices = ?,
            artifacts = ?, finished_at = ?
        WHERE id = ?
      `).run(
        JSON.stringify(deployment.stats),
        getDeploymentStatus(deployment),
        JSON.stringify(deployment.deviceList),
        deployment.deviceCount,
        deployment.maxDevices,
        JSON.stringify(deployment.artifacts),
        deployment.finished ? deployment.finished.toISOString() : null,
        deployment.id
      )
    );

    if (result.changes === 0) {
      throw new NotFoundError(`Deployment ${deployment.id} not found`);
    }
  }

  async load(id: string): Promise<Deployment> {
    const row = this.db.prepare('SELECT * FROM deployments WHERE id = ?').get(id) as DeploymentRow | undefined;
    if (!row) {
      throw new NotFoundError(`Deployment ${id} not found`);
    }
    return rowToDeployment(row);
  }

  async query(query: DeploymentQuery): Promise<DeploymentPage> {
    const conditions: string[] = [];
    const params: (string | number)[] = [];

    if (query.searchText) {
      const pattern = `%${escapeLike(query.searchText.toLowerCase())}%`;
      conditions.push(
        `(${FOLD_CASE_FUNCTION}(name) LIKE ? ESCAPE '\\' OR ${FOLD_CASE_FUNCTION}(artifact_name) LIKE ? ESCAPE '\\')`
      );
      params.push(pattern, pattern);
    }

    if (query.type === 'software') {
      conditions.push("(type = 'software' OR type IS NULL)");
    } else if (query.type) {
      conditions.push('type = ?');
      params.push(query.type);
    }

    if (query.status === 'aborted') {
      conditions.push("status = 'finished' AND json_extract(stats, '$.aborted') > 0");
    } else if (query.status !== 'any') {
      conditions.push('status = ?');
      params.push(query.status);
    }

    if (query.createdAfter) {
      conditions.push('created_at >= ?');
      params.push(query.createdAfter.toISOString());
    }
    if (query.createdBefore) {
      conditions.push('created_at <= ?');
      params.push(query.createdBefore.toISOString());
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const direction = query.sort === 'asc' ? 'ASC' : 'DESC';

    // Count and page from the same snapshot
    const { total, rows } = runInTransaction(() => {
      const count = this.db.prepare(`SELECT COUNT(*) as total FROM deployments ${where}`)
        .get(...params) as { total: number };
      const page = this.db.prepare(`
        SELECT * FROM deployments ${where}
        ORDER BY created_at ${direction}, id ${direction}
        LIMIT ? OFFSET ?
      `).all(...params, query.limit, query.skip) as DeploymentRow[];
      return { total: count.total, rows: page };
    }, this.db);

    return {
      deployments: rows.map(rowToDeployment),
      total,
    };
  }
}
